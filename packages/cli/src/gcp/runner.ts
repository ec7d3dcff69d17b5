/**
 * Process runner used by every gcloud adapter
 */

import { execFile, type ExecFileException } from 'child_process';
import { promisify } from 'util';
import { createCommandLogger, logOutput } from '../logger';
import type { CommandResult, CommandRunner } from '../types';

const execFileAsync = promisify(execFile);

const logger = createCommandLogger('runner');

// Cloud Build streams its whole log to stdout
const MAX_BUFFER = 64 * 1024 * 1024;

type ExecFailure = ExecFileException & { stdout?: string; stderr?: string };

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && 'code' in error;
}

/**
 * Runs binaries directly (no shell), so arguments never need quoting
 */
export class ExecFileRunner implements CommandRunner {
  async run(command: string, args: string[]): Promise<CommandResult> {
    logger.command(`${command} ${args.join(' ')}`);

    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8',
      });
      logOutput('stdout', stdout);
      logOutput('stderr', stderr);
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (!isExecFailure(error)) {
        throw error;
      }

      const stdout = error.stdout ?? '';
      const stderr = error.stderr || error.message;
      logOutput('stdout', stdout);
      logOutput('stderr', stderr);

      const exitCode =
        typeof error.code === 'number' ? error.code : error.code === 'ENOENT' ? 127 : 1;
      logger.debug(`${command} exited with ${exitCode}`);
      return { exitCode, stdout, stderr };
    }
  }
}

/**
 * stderr if there is any, otherwise stdout
 */
export function diagnosticsOf(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim();
}
