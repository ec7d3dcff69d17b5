/**
 * Idempotent provisioning
 *
 * Five steps, always in this order. Each one asks GCP for the current state
 * of its resource before changing anything, so a run can be repeated after
 * any partial failure and simply picks up where the last one stopped.
 */

import { serviceAccountEmail, serviceAccountMember } from '../config';
import { PropagationTimeoutError, toOrchestrationError } from '../errors';
import { REQUIRED_APIS } from '../gcp/apis';
import { APP_ROLE } from '../gcp/iam';
import { createCommandLogger, logFullError } from '../logger';
import { fixedDelay, pollUntil, sleep, type RetryPolicy, type Sleep } from '../retry';
import type {
  CloudProvider,
  DeploymentConfig,
  ProvisionedResource,
  StepName,
  StepOutcome,
  StepReport,
} from '../types';

const logger = createCommandLogger('provision');

export const DEFAULT_PROPAGATION_POLICY: RetryPolicy = fixedDelay(3, 10_000);

/** Pause after creating the account, before the first visibility check */
export const DEFAULT_SETTLE_DELAY_MS = 15_000;

export interface ProvisionOptions {
  apis?: string[];
  role?: string;
  propagation?: RetryPolicy;
  settleDelayMs?: number;
  sleep?: Sleep;
  onLog?: (message: string) => void;
  onStepStart?: (step: ProvisioningStep) => void;
  onStep?: (report: StepReport) => void;
}

export interface ProvisioningContext {
  config: DeploymentConfig;
  provider: CloudProvider;
  apis: string[];
  role: string;
  propagation: RetryPolicy;
  settleDelayMs: number;
  sleep: Sleep;
  log: (message: string) => void;
  /** Reports of the steps that already ran in this attempt */
  previous: StepReport[];
}

type RecordResource = (resource: ProvisionedResource) => void;

export interface ProvisioningStep {
  name: StepName;
  title: string;
  run(ctx: ProvisioningContext, record: RecordResource): Promise<'created' | 'already-present'>;
}

// =============================================================================
// Steps
// =============================================================================

const enableServices: ProvisioningStep = {
  name: 'enable-services',
  title: 'Enable required GCP services',
  async run(ctx, record) {
    let enabledAny = false;

    for (const api of ctx.apis) {
      if (await ctx.provider.services.isEnabled(api)) {
        ctx.log(`Service ${api} is already enabled.`);
        record({ kind: 'service', identifier: api, state: 'present' });
        continue;
      }

      ctx.log(`Enabling service ${api}...`);
      record({ kind: 'service', identifier: api, state: 'absent' });
      await ctx.provider.services.enable(api);
      enabledAny = true;
    }

    return enabledAny ? 'created' : 'already-present';
  },
};

const createServiceAccount: ProvisioningStep = {
  name: 'create-service-account',
  title: 'Create the application service account',
  async run(ctx, record) {
    const email = serviceAccountEmail(ctx.config);
    const existing = await ctx.provider.identities.describe(email);

    if (existing) {
      ctx.log('Service account already exists.');
      record({ kind: 'identity', identifier: email, state: 'present' });
      return 'already-present';
    }

    ctx.log('Creating new service account...');
    record({ kind: 'identity', identifier: email, state: 'absent' });
    await ctx.provider.identities.create(
      ctx.config.serviceAccountName,
      `${ctx.config.appName} service account`
    );
    return 'created';
  },
};

const verifyPropagation: ProvisioningStep = {
  name: 'verify-propagation',
  title: 'Wait for the service account to propagate',
  async run(ctx, record) {
    const email = serviceAccountEmail(ctx.config);
    const createdNow = ctx.previous.some(
      (step) => step.name === 'create-service-account' && step.outcome.status === 'created'
    );

    if (createdNow && ctx.settleDelayMs > 0) {
      ctx.log('Waiting for service account to be fully created...');
      await ctx.sleep(ctx.settleDelayMs);
    }

    const visible = async (): Promise<boolean> => {
      try {
        return (await ctx.provider.identities.describe(email)) !== null;
      } catch (error) {
        // IAM can answer with errors other than NOT_FOUND while it catches up
        logger.debug(`describe ${email} failed during propagation`, error);
        return false;
      }
    };

    const result = await pollUntil(visible, ctx.propagation, {
      sleep: ctx.sleep,
      onRetry: (attempt, maxAttempts, delayMs) =>
        ctx.log(
          `Service account not found yet. Waiting ${Math.round(delayMs / 1000)} seconds before retry (${attempt}/${maxAttempts})...`
        ),
    });

    if (!result.satisfied) {
      record({ kind: 'identity', identifier: email, state: 'absent' });
      throw new PropagationTimeoutError(email, result.attempts);
    }

    record({ kind: 'identity', identifier: email, state: 'present' });
    return createdNow ? 'created' : 'already-present';
  },
};

const grantRole: ProvisioningStep = {
  name: 'grant-role',
  title: 'Grant the Discovery Engine Admin role to the service account',
  async run(ctx, record) {
    const member = serviceAccountMember(ctx.config);
    const identifier = `${ctx.role} for ${member}`;
    const policy = await ctx.provider.policies.getPolicy(ctx.config.projectId);

    if (policy.format === 'text') {
      ctx.log('Structured IAM policy unavailable; using a best-effort text match.');
    }

    if (ctx.provider.policies.hasBinding(policy, ctx.role, member)) {
      ctx.log(`Role '${ctx.role}' is already assigned to the service account.`);
      record({ kind: 'role-binding', identifier, state: 'present' });
      return 'already-present';
    }

    ctx.log(`Assigning '${ctx.role}' role to service account...`);
    record({ kind: 'role-binding', identifier, state: 'absent' });
    await ctx.provider.policies.addBinding(ctx.config.projectId, member, ctx.role);
    return 'created';
  },
};

const createRepository: ProvisioningStep = {
  name: 'create-repository',
  title: 'Create the Artifact Registry repository',
  async run(ctx, record) {
    const { repositoryName, region } = ctx.config;
    const identifier = `${region}/${repositoryName}`;
    const existing = await ctx.provider.artifacts.describe(repositoryName, region);

    if (existing) {
      ctx.log('Repository already exists.');
      record({ kind: 'registry', identifier, state: 'present' });
      return 'already-present';
    }

    ctx.log('Creating new Artifact Registry repository...');
    record({ kind: 'registry', identifier, state: 'absent' });
    await ctx.provider.artifacts.create(repositoryName, region);
    return 'created';
  },
};

export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  enableServices,
  createServiceAccount,
  verifyPropagation,
  grantRole,
  createRepository,
];

// =============================================================================
// Sequencer
// =============================================================================

/**
 * Run every step in order, stopping after the first failed one.
 * Never throws; failures come back as a `failed` outcome on the last report.
 */
export async function provisionResources(
  config: DeploymentConfig,
  provider: CloudProvider,
  options: ProvisionOptions = {}
): Promise<StepReport[]> {
  const reports: StepReport[] = [];
  const ctx: ProvisioningContext = {
    config,
    provider,
    apis: options.apis ?? REQUIRED_APIS,
    role: options.role ?? APP_ROLE,
    propagation: options.propagation ?? DEFAULT_PROPAGATION_POLICY,
    settleDelayMs: options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS,
    sleep: options.sleep ?? sleep,
    log: options.onLog ?? console.log,
    previous: reports,
  };

  for (const step of PROVISIONING_STEPS) {
    const resources: ProvisionedResource[] = [];
    let outcome: StepOutcome;

    logger.info(`Starting ${step.name}`);
    options.onStepStart?.(step);
    try {
      const status = await step.run(ctx, (r) => resources.push(r));
      outcome = status === 'created' ? { status: 'created' } : { status: 'already-present' };
    } catch (error) {
      const failure = toOrchestrationError(error);
      logFullError(step.name, error);
      outcome = { status: 'failed', reason: failure.message, error: failure };
    }

    const report: StepReport = { name: step.name, title: step.title, outcome, resources };
    reports.push(report);
    options.onStep?.(report);

    if (outcome.status === 'failed') {
      break;
    }
  }

  return reports;
}

export function failedStep(reports: StepReport[]): StepReport | undefined {
  return reports.find((r) => r.outcome.status === 'failed');
}
