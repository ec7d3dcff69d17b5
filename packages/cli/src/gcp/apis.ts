/**
 * GCP API enablement
 */

import { ResourceCreationError } from '../errors';
import type { CommandRunner, ServiceCatalog } from '../types';
import { diagnosticsOf } from './runner';

/**
 * APIs the search application needs
 */
export const REQUIRED_APIS = [
  'run.googleapis.com',
  'artifactregistry.googleapis.com',
  'discoveryengine.googleapis.com',
  'cloudbuild.googleapis.com',
];

/**
 * Get human-readable name for an API
 */
export function getApiDisplayName(api: string): string {
  const names: Record<string, string> = {
    'run.googleapis.com': 'Cloud Run API',
    'artifactregistry.googleapis.com': 'Artifact Registry API',
    'discoveryengine.googleapis.com': 'Discovery Engine API',
    'cloudbuild.googleapis.com': 'Cloud Build API',
  };
  return names[api] || api.replace('.googleapis.com', '');
}

export class GcloudServiceCatalog implements ServiceCatalog {
  constructor(
    private readonly runner: CommandRunner,
    private readonly projectId: string
  ) {}

  async isEnabled(name: string): Promise<boolean> {
    const result = await this.runner.run('gcloud', [
      'services',
      'list',
      '--enabled',
      `--project=${this.projectId}`,
      `--filter=config.name:${name}`,
      '--format=value(config.name)',
    ]);

    if (result.exitCode !== 0) {
      throw new ResourceCreationError(
        `Could not list enabled services for ${this.projectId}.`,
        diagnosticsOf(result)
      );
    }

    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .includes(name);
  }

  async enable(name: string): Promise<void> {
    const result = await this.runner.run('gcloud', [
      'services',
      'enable',
      name,
      `--project=${this.projectId}`,
    ]);

    if (result.exitCode !== 0) {
      throw new ResourceCreationError(`Failed to enable ${getApiDisplayName(name)}.`, diagnosticsOf(result));
    }
  }
}
