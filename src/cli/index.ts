#!/usr/bin/env node

/**
 * argsolve CLI entry point.
 */

import { runCli } from './run.js';

runCli().then(
  (exitCode) => {
    process.exit(exitCode);
  },
  (error: unknown) => {
    console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
);
