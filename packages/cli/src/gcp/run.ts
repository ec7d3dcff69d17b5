/**
 * Cloud Run services
 */

import { DeployError } from '../errors';
import type { CommandRunner, DeployRequest, Hoster } from '../types';
import { diagnosticsOf } from './runner';

/**
 * Serialise env vars for --set-env-vars. Values containing commas switch the
 * delimiter using gcloud's `^DELIM^` escaping.
 */
export function formatEnvVars(env: Record<string, string>): string {
  const pairs = Object.entries(env).map(([key, value]) => `${key}=${value}`);
  if (pairs.some((pair) => pair.includes(','))) {
    return `^@^${pairs.join('@')}`;
  }
  return pairs.join(',');
}

export class GcloudHoster implements Hoster {
  constructor(
    private readonly runner: CommandRunner,
    private readonly projectId: string,
    private readonly region: string
  ) {}

  async deploy(request: DeployRequest): Promise<void> {
    const result = await this.runner.run('gcloud', [
      'run',
      'deploy',
      request.serviceName,
      `--image=${request.image}`,
      '--platform=managed',
      `--region=${this.region}`,
      '--allow-unauthenticated',
      `--service-account=${request.identity}`,
      `--set-env-vars=${formatEnvVars(request.env)}`,
      `--project=${this.projectId}`,
      '--quiet',
    ]);

    if (result.exitCode !== 0) {
      throw new DeployError(`Cloud Run deploy of ${request.serviceName} failed.`, diagnosticsOf(result));
    }
  }

  async getAddress(serviceName: string): Promise<string> {
    const result = await this.runner.run('gcloud', [
      'run',
      'services',
      'describe',
      serviceName,
      `--region=${this.region}`,
      `--project=${this.projectId}`,
      '--format=value(status.url)',
    ]);

    if (result.exitCode !== 0) {
      throw new DeployError(`Could not read the URL of ${serviceName}.`, diagnosticsOf(result));
    }

    return result.stdout.trim();
  }
}
