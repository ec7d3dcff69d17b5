/**
 * searchdeploy
 *
 * Provision the GCP resources a Vertex AI Search chat app needs, then build
 * and deploy it to Cloud Run. Safe to re-run after any failure.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { configWarnings, detectNonInteractive, resolveConfig } from '../config';
import { toOrchestrationError } from '../errors';
import { createGcloudProvider, ExecFileRunner } from '../gcp';
import { getLogPath, logFullError } from '../logger';
import type { RetryPolicy, Sleep } from '../retry';
import type { Ask } from '../services/confirmation.service';
import { runDeployment } from '../services/orchestrator.service';
import type { ToolRequirement } from '../services/preflight.service';
import { reportError, reportOutcome, type ExitCode } from '../services/report.service';
import type { CloudProvider, CommandRunner, DeploymentConfig } from '../types';

export interface DeployCommandOptions {
  skipConfirmation?: boolean;
}

/** Everything runDeploy reaches outside the process; tests swap these out */
export interface DeployDependencies {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  createProvider?: (config: DeploymentConfig, runner: CommandRunner) => CloudProvider;
  ask?: Ask;
  isInteractive?: () => boolean;
  sleep?: Sleep;
  tools?: ToolRequirement[];
  propagation?: RetryPolicy;
  settleDelayMs?: number;
  out?: (line: string) => void;
  err?: (line: string) => void;
  spinners?: boolean;
  onExit?: (code: ExitCode) => void;
}

const SIGNAL_LABELS: Record<string, string> = {
  CLOUD_SHELL: 'Cloud Shell',
  CI: 'CI',
};

export async function runDeploy(
  options: DeployCommandOptions,
  deps: DeployDependencies = {}
): Promise<ExitCode> {
  const out = deps.out ?? console.log;
  const err = deps.err ?? console.error;
  const env = deps.env ?? process.env;
  const logPath = getLogPath();

  let config: DeploymentConfig;
  try {
    config = resolveConfig({ flags: { skipConfirmation: options.skipConfirmation === true }, env });
  } catch (error) {
    logFullError('configuration', error);
    return reportError('configuration', toOrchestrationError(error), { err, logPath });
  }

  const signal = detectNonInteractive(env);
  if (signal && !options.skipConfirmation) {
    out(chalk.gray(`Running in ${SIGNAL_LABELS[signal] ?? signal}, setting skip-confirmation to true`));
  }
  configWarnings(config).forEach((warning) => out(chalk.yellow(`  ⚠ ${warning}`)));

  const runner = deps.runner ?? new ExecFileRunner();
  const provider = (deps.createProvider ?? createGcloudProvider)(config, runner);
  const useSpinners = deps.spinners ?? true;
  let spinner: Ora | null = null;

  const outcome = await runDeployment(config, {
    runner,
    provider,
    ask: deps.ask,
    isInteractive: deps.isInteractive,
    tools: deps.tools,
    propagation: deps.propagation,
    settleDelayMs: deps.settleDelayMs,
    sleep: deps.sleep,
    onLog: out,
    onSection: (title) => out(chalk.bold(`\n=== ${title} ===`)),
    onStageStart: (_stage, message) => {
      if (useSpinners) {
        spinner = ora(message).start();
      } else {
        out(message);
      }
    },
    onStageEnd: (stage, ok) => {
      if (!spinner) return;
      if (ok) {
        spinner.succeed(stage === 'build' ? 'Image built and pushed' : 'Deployed to Cloud Run');
      } else {
        spinner.fail(stage === 'build' ? 'Image build failed' : 'Cloud Run deployment failed');
      }
      spinner = null;
    },
  });

  return reportOutcome(outcome, { out, err, logPath });
}

export function createProgram(deps: DeployDependencies = {}): Command {
  const onExit =
    deps.onExit ??
    ((code: ExitCode) => {
      process.exitCode = code;
    });

  return new Command()
    .name('searchdeploy')
    .description('Deploy a Vertex AI Search chat application to Cloud Run')
    .version('0.1.0')
    .option('--skip-confirmation', 'Do not ask before changing anything in GCP')
    .allowExcessArguments(false)
    .action(async (options: DeployCommandOptions) => {
      onExit(await runDeploy(options, deps));
    });
}

export function interruptMessage(): string {
  return (
    '\n  Interrupted. Resources created so far were left in place; ' +
    'run searchdeploy again to resume.'
  );
}
