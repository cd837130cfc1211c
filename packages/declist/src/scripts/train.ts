#!/usr/bin/env node
import { runTrain } from '../lib/commands.js'

runTrain(process.argv.slice(2)).catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
