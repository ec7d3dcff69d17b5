/**
 * GCP IAM: service accounts and project policy bindings
 */

import { z } from 'zod';
import { PermissionGrantError, ResourceCreationError } from '../errors';
import { createCommandLogger } from '../logger';
import type {
  CommandRunner,
  IdentityStore,
  PolicyDocument,
  PolicyStore,
  ServiceAccount,
} from '../types';
import { hasBinding, parseStructuredPolicy } from './policy';
import { diagnosticsOf } from './runner';

const logger = createCommandLogger('iam');

/**
 * Role the application needs to query the search datastore
 */
export const APP_ROLE = 'roles/discoveryengine.admin';

const NOT_FOUND = /NOT_FOUND|not found|does not exist/i;

export class GcloudIdentityStore implements IdentityStore {
  constructor(
    private readonly runner: CommandRunner,
    private readonly projectId: string
  ) {}

  async describe(email: string): Promise<ServiceAccount | null> {
    const result = await this.runner.run('gcloud', [
      'iam',
      'service-accounts',
      'describe',
      email,
      `--project=${this.projectId}`,
      '--format=json',
    ]);

    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return null;
      }
      throw new ResourceCreationError(`Could not describe service account ${email}.`, diagnosticsOf(result));
    }

    return parseServiceAccount(result.stdout, email);
  }

  async create(accountId: string, displayName: string): Promise<void> {
    const result = await this.runner.run('gcloud', [
      'iam',
      'service-accounts',
      'create',
      accountId,
      `--display-name=${displayName}`,
      `--project=${this.projectId}`,
    ]);

    if (result.exitCode !== 0) {
      throw new ResourceCreationError(`Failed to create service account ${accountId}.`, diagnosticsOf(result));
    }
  }
}

const serviceAccountSchema = z.object({
  email: z.string(),
  uniqueId: z.string().optional(),
  displayName: z.string().optional(),
});

function parseServiceAccount(raw: string, email: string): ServiceAccount {
  try {
    const parsed = serviceAccountSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
  } catch {
    logger.debug(`describe output for ${email} was not JSON`);
  }
  return { email };
}

export class GcloudPolicyStore implements PolicyStore {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Fetch the project policy as JSON; fall back to the text rendering only
   * when the JSON cannot be parsed into a policy.
   */
  async getPolicy(projectId: string): Promise<PolicyDocument> {
    const json = await this.runner.run('gcloud', [
      'projects',
      'get-iam-policy',
      projectId,
      '--format=json',
    ]);

    if (json.exitCode === 0) {
      const structured = parseStructuredPolicy(json.stdout);
      if (structured) {
        return structured;
      }
      logger.warn('IAM policy JSON could not be parsed; falling back to text matching');
    }

    const text = await this.runner.run('gcloud', [
      'projects',
      'get-iam-policy',
      projectId,
      '--format=text',
    ]);

    if (text.exitCode !== 0) {
      throw new ResourceCreationError(`Could not read the IAM policy of ${projectId}.`, diagnosticsOf(text));
    }

    return { format: 'text', text: text.stdout };
  }

  hasBinding(policy: PolicyDocument, role: string, member: string): boolean {
    return hasBinding(policy, role, member);
  }

  async addBinding(projectId: string, member: string, role: string): Promise<void> {
    const result = await this.runner.run('gcloud', [
      'projects',
      'add-iam-policy-binding',
      projectId,
      `--member=${member}`,
      `--role=${role}`,
      '--condition=None',
      '--quiet',
    ]);

    if (result.exitCode !== 0) {
      throw new PermissionGrantError(role, member, diagnosticsOf(result));
    }
  }
}
