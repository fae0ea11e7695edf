#!/usr/bin/env node
/**
 * fanduct entry point. Errors end the process with status 1.
 */

import { CommanderError } from 'commander';
import { createProgram } from './program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  // Commander has already printed its own usage errors (and help/version)
  if (err instanceof CommanderError) process.exit(err.exitCode);
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
