/**
 * Final report: what happened, where to find the app, and the exit code
 */

import chalk from 'chalk';
import type { OrchestrationError } from '../errors';
import type { DeploymentOutcome, StageName, StepOutcome, StepReport } from '../types';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  cancelled: 2,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface ReportOptions {
  out?: (line: string) => void;
  err?: (line: string) => void;
  logPath?: string;
}

export function describeOutcome(outcome: StepOutcome): string {
  switch (outcome.status) {
    case 'created':
      return 'created';
    case 'already-present':
      return 'already present';
    case 'failed':
      return `failed: ${outcome.reason}`;
  }
}

function stepLine(report: StepReport): string {
  const icon =
    report.outcome.status === 'created' ? chalk.green('✓') :
    report.outcome.status === 'already-present' ? chalk.gray('=') :
    chalk.red('✗');
  return `  ${icon} ${report.title} ${chalk.gray(`(${describeOutcome(report.outcome)})`)}`;
}

/**
 * Print a failure with everything an operator needs to decide on a re-run
 */
export function reportError(
  stage: StageName,
  error: OrchestrationError,
  options: ReportOptions = {}
): ExitCode {
  const err = options.err ?? console.error;

  err(chalk.red(`\n  ✗ ${stage} failed: ${error.message}`));
  if (error.diagnostics) {
    err(chalk.gray(error.diagnostics.split('\n').map((line) => `    ${line}`).join('\n')));
  }
  if (error.remediation) {
    err(chalk.yellow(`  💡 ${error.remediation}`));
  }
  if (stage !== 'configuration' && stage !== 'preflight' && stage !== 'confirmation') {
    err(chalk.gray('  Resources created so far were left in place; run searchdeploy again to resume.'));
  }
  if (options.logPath) {
    err(chalk.gray(`  Full debug log: ${options.logPath}`));
  }

  return EXIT_CODES.failure;
}

export function reportOutcome(outcome: DeploymentOutcome, options: ReportOptions = {}): ExitCode {
  const out = options.out ?? console.log;

  if (outcome.status === 'cancelled') {
    out(chalk.gray('\n  Deployment cancelled.\n'));
    if (options.logPath) {
      out(chalk.gray(`  Full debug log: ${options.logPath}\n`));
    }
    return EXIT_CODES.cancelled;
  }

  if (outcome.steps.length > 0) {
    out(chalk.bold('\n  Provisioning'));
    outcome.steps.forEach((step) => out(stepLine(step)));
  }

  if (outcome.status === 'failed') {
    return reportError(outcome.stage, outcome.error, options);
  }

  out(chalk.bold('\n=== Deployment Complete ==='));
  out(`  Image: ${outcome.imageUri}`);
  out('  Your application is now deployed to Cloud Run.');
  out(`  You can access it at: ${chalk.underline(outcome.serviceUrl)}`);
  if (options.logPath) {
    out(chalk.gray(`\n  Full debug log: ${options.logPath}\n`));
  }

  return EXIT_CODES.success;
}
