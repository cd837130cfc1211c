#!/usr/bin/env node
import { runEval } from '../lib/commands.js'

runEval(process.argv.slice(2)).catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
