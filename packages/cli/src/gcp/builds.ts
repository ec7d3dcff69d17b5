/**
 * Cloud Build image builds
 */

import { BuildError } from '../errors';
import type { Builder, BuildResult, CommandRunner } from '../types';
import { diagnosticsOf } from './runner';

export class GcloudBuilder implements Builder {
  constructor(
    private readonly runner: CommandRunner,
    private readonly projectId: string
  ) {}

  async build(sourceDir: string, tag: string): Promise<BuildResult> {
    const result = await this.runner.run('gcloud', [
      'builds',
      'submit',
      sourceDir,
      `--tag=${tag}`,
      `--project=${this.projectId}`,
      '--quiet',
    ]);

    if (result.exitCode !== 0) {
      throw new BuildError(tag, diagnosticsOf(result));
    }

    return { image: tag };
  }
}
