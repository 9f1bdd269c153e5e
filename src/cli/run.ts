// src/cli/run.ts
// Shared exit handling for the command-line tools.

import chalk from 'chalk';
import { ConfigError, UpstreamError, errorMessage } from '../errors.js';

export function describeFailure(error: unknown): string {
  if (error instanceof ConfigError || error instanceof UpstreamError) {
    return `Error: ${error.message}`;
  }
  return `Unexpected error: ${errorMessage(error)}`;
}

/**
 * Runs a command body and turns its outcome into an exit code:
 * 0 when it resolves, 1 when it throws or the user interrupts it.
 */
export async function runCommand(cancelMessage: string, body: () => Promise<void>): Promise<void> {
  process.once('SIGINT', () => {
    console.error(chalk.yellow(`\n${cancelMessage}`));
    process.exit(1);
  });

  try {
    await body();
  } catch (error) {
    console.error(chalk.red(describeFailure(error)));
    process.exitCode = 1;
  }
}
