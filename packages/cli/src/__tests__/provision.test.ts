import { describe, it, expect, vi } from 'vitest';
import { PermissionGrantError, PropagationTimeoutError } from '../errors';
import { APP_ROLE } from '../gcp/iam';
import { provisionResources, type ProvisionOptions } from '../services/provision.service';
import type { StepReport } from '../types';
import { FakeGcp, captureLines, testConfig } from './fakes';

const EMAIL = 'vertex-search-app-sa@p1.iam.gserviceaccount.com';
const MEMBER = `serviceAccount:${EMAIL}`;

function statuses(reports: StepReport[]): [string, string][] {
  return reports.map((r) => [r.name, r.outcome.status]);
}

function quiet(overrides: ProvisionOptions = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const log = captureLines();
  return { sleep, log, options: { sleep, onLog: log.write, ...overrides } };
}

describe('provisionResources', () => {
  it('should create everything on a fresh project', async () => {
    const gcp = new FakeGcp();
    const { sleep, options } = quiet();

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(statuses(reports)).toEqual([
      ['enable-services', 'created'],
      ['create-service-account', 'created'],
      ['verify-propagation', 'created'],
      ['grant-role', 'created'],
      ['create-repository', 'created'],
    ]);
    expect([...gcp.enabledApis]).toEqual([
      'run.googleapis.com',
      'artifactregistry.googleapis.com',
      'discoveryengine.googleapis.com',
      'cloudbuild.googleapis.com',
    ]);
    expect(gcp.accounts.get(EMAIL)?.displayName).toBe('vertex-search-app service account');
    expect(gcp.bindings).toEqual([{ role: APP_ROLE, members: [MEMBER] }]);
    expect([...gcp.repositories]).toEqual(['us-central1/chainlit-apps']);
    expect(sleep.mock.calls).toEqual([[15_000]]);
  });

  it('should find everything already present on a second run', async () => {
    const gcp = new FakeGcp();
    await provisionResources(testConfig(), gcp, quiet().options);
    const { sleep, log, options } = quiet();

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(statuses(reports)).toEqual([
      ['enable-services', 'already-present'],
      ['create-service-account', 'already-present'],
      ['verify-propagation', 'already-present'],
      ['grant-role', 'already-present'],
      ['create-repository', 'already-present'],
    ]);
    expect(gcp.count('services.enable')).toBe(4);
    expect(gcp.count('identities.create')).toBe(1);
    expect(gcp.count('policies.addBinding')).toBe(1);
    expect(gcp.count('artifacts.create')).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(log.lines).toContain('Service account already exists.');
    expect(log.lines).toContain(`Role '${APP_ROLE}' is already assigned to the service account.`);
    expect(log.lines).toContain('Repository already exists.');
  });

  it('should record what each step observed', async () => {
    const reports = await provisionResources(testConfig(), new FakeGcp(), quiet().options);

    expect(reports[0].resources).toHaveLength(4);
    expect(reports[0].resources[0]).toEqual({ kind: 'service', identifier: 'run.googleapis.com', state: 'absent' });
    expect(reports[3].resources).toEqual([
      { kind: 'role-binding', identifier: `${APP_ROLE} for ${MEMBER}`, state: 'absent' },
    ]);
    expect(reports[4].resources).toEqual([
      { kind: 'registry', identifier: 'us-central1/chainlit-apps', state: 'absent' },
    ]);
  });

  it('should give up on an identity that never becomes visible', async () => {
    const gcp = new FakeGcp({ neverVisible: true });
    const { sleep, log, options } = quiet();

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(statuses(reports)).toEqual([
      ['enable-services', 'created'],
      ['create-service-account', 'created'],
      ['verify-propagation', 'failed'],
    ]);
    const outcome = reports[2].outcome;
    expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(PropagationTimeoutError);
    // one describe from the create step, then three polls
    expect(gcp.count('identities.describe')).toBe(4);
    expect(sleep.mock.calls).toEqual([[15_000], [10_000], [10_000]]);
    expect(log.lines).toContain('Service account not found yet. Waiting 10 seconds before retry (2/3)...');
    expect(gcp.count('policies.getPolicy')).toBe(0);
  });

  it('should wait for a lagging identity within the retry bound', async () => {
    const gcp = new FakeGcp({ propagationLag: 2 });
    const { sleep, options } = quiet({ settleDelayMs: 0 });

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(reports[2].outcome.status).toBe('created');
    expect(sleep.mock.calls).toEqual([[10_000], [10_000]]);
    expect(reports).toHaveLength(5);
  });

  it('should not settle or retry for an existing account', async () => {
    const gcp = new FakeGcp();
    gcp.accounts.set(EMAIL, { email: EMAIL });
    const { sleep, options } = quiet();

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(reports[1].outcome.status).toBe('already-present');
    expect(reports[2].outcome.status).toBe('already-present');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should grant the role when it is bound only to another member', async () => {
    const gcp = new FakeGcp();
    gcp.bindings.push({ role: APP_ROLE, members: ['serviceAccount:other-sa@p1.iam.gserviceaccount.com'] });

    const reports = await provisionResources(testConfig(), gcp, quiet().options);

    expect(reports[3].outcome.status).toBe('created');
    expect(gcp.calls).toContain(`policies.addBinding:${APP_ROLE} ${MEMBER}`);
    expect(gcp.bindings[0].members).toEqual(['serviceAccount:other-sa@p1.iam.gserviceaccount.com', MEMBER]);
  });

  it('should not grant a role the account already holds', async () => {
    const gcp = new FakeGcp();
    gcp.bindings.push({ role: APP_ROLE, members: [MEMBER] });

    const reports = await provisionResources(testConfig(), gcp, quiet().options);

    expect(reports[3].outcome.status).toBe('already-present');
    expect(gcp.count('policies.addBinding')).toBe(0);
  });

  it('should say when it falls back to the text policy', async () => {
    const gcp = new FakeGcp({ policyFormat: 'text' });
    gcp.bindings.push({ role: APP_ROLE, members: [MEMBER] });
    const { log, options } = quiet();

    const reports = await provisionResources(testConfig(), gcp, options);

    expect(reports[3].outcome.status).toBe('already-present');
    expect(log.lines).toContain('Structured IAM policy unavailable; using a best-effort text match.');
  });

  it('should grant the role when the text policy holds only a conditional binding', async () => {
    const gcp = new FakeGcp({ policyFormat: 'text' });
    gcp.bindings.push({ role: APP_ROLE, members: [MEMBER], condition: { expression: 'resource.name.startsWith("x")' } });

    const reports = await provisionResources(testConfig(), gcp, quiet().options);

    expect(reports[3].outcome.status).toBe('created');
    expect(gcp.count('policies.addBinding')).toBe(1);
  });

  it('should stop at a failed grant', async () => {
    const gcp = new FakeGcp({ grantFails: true });

    const reports = await provisionResources(testConfig(), gcp, quiet().options);

    expect(reports).toHaveLength(4);
    const outcome = reports[3].outcome;
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(PermissionGrantError);
      expect(outcome.error.diagnostics).toBe('PERMISSION_DENIED: caller lacks setIamPolicy');
    }
    expect(gcp.count('artifacts.describe')).toBe(0);
  });

  it('should wrap unexpected errors', async () => {
    const gcp = new FakeGcp({ throwOn: 'services.isEnabled' });

    const reports = await provisionResources(testConfig(), gcp, quiet().options);

    expect(reports).toHaveLength(1);
    const outcome = reports[0].outcome;
    expect(outcome.status === 'failed' && outcome.reason).toBe('services.isEnabled exploded');
    expect(outcome.status === 'failed' && outcome.error.code).toBe('UNEXPECTED');
  });

  it('should announce each step before running it', async () => {
    const started: string[] = [];
    const finished: string[] = [];

    await provisionResources(testConfig(), new FakeGcp(), {
      ...quiet().options,
      onStepStart: (step) => started.push(step.name),
      onStep: (report) => finished.push(report.name),
    });

    expect(started).toEqual([
      'enable-services',
      'create-service-account',
      'verify-propagation',
      'grant-role',
      'create-repository',
    ]);
    expect(finished).toEqual(started);
  });
});
