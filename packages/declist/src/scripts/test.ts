#!/usr/bin/env node
import { runTest } from '../lib/commands.js'

runTest(process.argv.slice(2)).catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
