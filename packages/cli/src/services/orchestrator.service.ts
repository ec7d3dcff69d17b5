/**
 * Runs one deployment end to end: preflight, confirmation, provisioning,
 * build, deploy. Every stage runs only if the previous one succeeded; the
 * result says where it stopped and why, and the caller decides what that
 * means for the exit code.
 */

import { ConfirmationDeclinedError, toOrchestrationError } from '../errors';
import { logFullError, logInfo } from '../logger';
import type { RetryPolicy, Sleep } from '../retry';
import type {
  CloudProvider,
  CommandRunner,
  DeploymentConfig,
  DeploymentOutcome,
  StageName,
  StepReport,
} from '../types';
import { confirmDeployment, describePlan, type Ask } from './confirmation.service';
import { buildAndDeploy, type PipelineOptions, type PipelineStage } from './deploy.service';
import { runPreflight, type ToolRequirement } from './preflight.service';
import { failedStep, provisionResources } from './provision.service';

export interface OrchestratorOptions extends PipelineOptions {
  runner: CommandRunner;
  provider: CloudProvider;
  ask?: Ask;
  isInteractive?: () => boolean;
  tools?: ToolRequirement[];
  propagation?: RetryPolicy;
  settleDelayMs?: number;
  sleep?: Sleep;
  onLog?: (message: string) => void;
  onSection?: (title: string) => void;
  onStep?: (report: StepReport) => void;
}

const STAGE_SECTIONS: Record<PipelineStage, string> = {
  build: 'Building and pushing Docker image',
  deploy: 'Deploying to Cloud Run',
};

function failed(stage: StageName, error: unknown, steps: StepReport[] = []): DeploymentOutcome {
  const failure = toOrchestrationError(error);
  logFullError(stage, error);
  return { status: 'failed', stage, reason: failure.message, error: failure, steps };
}

export async function runDeployment(
  config: DeploymentConfig,
  options: OrchestratorOptions
): Promise<DeploymentOutcome> {
  const log = options.onLog ?? console.log;
  const section = options.onSection ?? ((title: string) => log(`\n=== ${title} ===`));

  logInfo('Deployment started', { ...config });

  try {
    await runPreflight(options.runner, { tools: options.tools, onLog: log });
  } catch (error) {
    return failed('preflight', error);
  }

  describePlan(config).forEach((line) => log(line));

  try {
    await confirmDeployment(config, { ask: options.ask, isInteractive: options.isInteractive });
  } catch (error) {
    if (error instanceof ConfirmationDeclinedError) {
      logInfo('Deployment cancelled by operator');
      return { status: 'cancelled' };
    }
    return failed('confirmation', error);
  }

  const steps = await provisionResources(config, options.provider, {
    propagation: options.propagation,
    settleDelayMs: options.settleDelayMs,
    sleep: options.sleep,
    onLog: log,
    onStepStart: (step) => section(step.title),
    onStep: options.onStep,
  });

  const failure = failedStep(steps);
  if (failure && failure.outcome.status === 'failed') {
    return {
      status: 'failed',
      stage: failure.name,
      reason: failure.outcome.reason,
      error: failure.outcome.error,
      steps,
    };
  }

  const pipeline = await buildAndDeploy(config, options.provider, {
    onStageStart: (stage, message) => {
      section(STAGE_SECTIONS[stage]);
      options.onStageStart?.(stage, message);
    },
    onStageEnd: options.onStageEnd,
  });

  if (pipeline.status === 'failed') {
    return failed(pipeline.stage, pipeline.error, steps);
  }

  const { imageUri, serviceUrl } = pipeline;
  logInfo('Deployment finished', { imageUri, serviceUrl });
  return { status: 'succeeded', steps, imageUri, serviceUrl };
}
