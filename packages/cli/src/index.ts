#!/usr/bin/env node
/**
 * kubesim CLI entry point
 * @module @kubesim/cli
 */

import { createProgram } from './program.js';
import { ApiRequestError } from './config.js';
import { error } from './output.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof ApiRequestError) {
      error(err.message, err.details);
    } else {
      error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
