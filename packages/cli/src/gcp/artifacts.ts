/**
 * Artifact Registry repositories
 */

import { ResourceCreationError } from '../errors';
import type { ArtifactStore, CommandRunner, Repository } from '../types';
import { diagnosticsOf } from './runner';

const NOT_FOUND = /NOT_FOUND|not found|does not exist/i;

export class GcloudArtifactStore implements ArtifactStore {
  constructor(
    private readonly runner: CommandRunner,
    private readonly projectId: string
  ) {}

  async describe(repoName: string, location: string): Promise<Repository | null> {
    const result = await this.runner.run('gcloud', [
      'artifacts',
      'repositories',
      'describe',
      repoName,
      `--location=${location}`,
      `--project=${this.projectId}`,
      '--format=value(format)',
    ]);

    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return null;
      }
      throw new ResourceCreationError(
        `Could not describe Artifact Registry repository ${repoName}.`,
        diagnosticsOf(result)
      );
    }

    const format = result.stdout.trim();
    return { name: repoName, format: format || undefined };
  }

  async create(repoName: string, location: string): Promise<void> {
    const result = await this.runner.run('gcloud', [
      'artifacts',
      'repositories',
      'create',
      repoName,
      '--repository-format=docker',
      `--location=${location}`,
      `--project=${this.projectId}`,
    ]);

    if (result.exitCode !== 0) {
      throw new ResourceCreationError(
        `Failed to create Artifact Registry repository ${repoName}.`,
        diagnosticsOf(result)
      );
    }
  }
}
