/**
 * searchdeploy
 *
 * CLI entry point.
 */

import chalk from 'chalk';
import { createProgram, interruptMessage } from './commands';
import { logWarn } from './logger';
import { EXIT_CODES } from './services/report.service';

process.on('SIGINT', () => {
  logWarn('Interrupted by SIGINT');
  console.error(chalk.yellow(interruptMessage()));
  process.exit(EXIT_CODES.interrupted);
});

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = EXIT_CODES.failure;
  });
