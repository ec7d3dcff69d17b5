/**
 * Build and deploy
 *
 * Builds the application image with Cloud Build, deploys it to Cloud Run as
 * the provisioned service account, and reads back the public URL. Neither
 * the build nor the deploy is retried.
 */

import { imageUri, runtimeEnv, serviceAccountEmail } from '../config';
import { DeployError } from '../errors';
import { createCommandLogger } from '../logger';
import type { CloudProvider, DeploymentConfig } from '../types';

const logger = createCommandLogger('deploy');

export type PipelineStage = 'build' | 'deploy';

export interface PipelineOptions {
  onStageStart?: (stage: PipelineStage, message: string) => void;
  onStageEnd?: (stage: PipelineStage, ok: boolean) => void;
}

export function isReachableAddress(address: string): boolean {
  try {
    const url = new URL(address);
    return url.protocol === 'https:' && url.hostname.length > 0;
  } catch {
    return false;
  }
}

async function runStage<T>(
  stage: PipelineStage,
  message: string,
  options: PipelineOptions,
  work: () => Promise<T>
): Promise<T> {
  options.onStageStart?.(stage, message);
  try {
    const value = await work();
    options.onStageEnd?.(stage, true);
    return value;
  } catch (error) {
    options.onStageEnd?.(stage, false);
    throw error;
  }
}

/**
 * Throws BuildError with Cloud Build's output on failure
 */
export async function buildImage(
  config: DeploymentConfig,
  provider: CloudProvider,
  options: PipelineOptions = {}
): Promise<string> {
  const tag = imageUri(config);

  return runStage('build', 'Building and pushing Docker image (this may take a few minutes)...', options, async () => {
    const result = await provider.builder.build(config.sourceDir, tag);
    logger.info(`Built ${result.image}`);
    return result.image;
  });
}

/**
 * Deploy the image and return the service URL. Throws DeployError.
 */
export async function deployImage(
  config: DeploymentConfig,
  provider: CloudProvider,
  image: string,
  options: PipelineOptions = {}
): Promise<string> {
  return runStage('deploy', `Deploying ${config.appName} to Cloud Run...`, options, async () => {
    await provider.hoster.deploy({
      serviceName: config.appName,
      image,
      identity: serviceAccountEmail(config),
      env: runtimeEnv(config),
    });

    const address = await provider.hoster.getAddress(config.appName);
    if (!isReachableAddress(address)) {
      throw new DeployError(
        `Cloud Run did not report a reachable URL for ${config.appName}.`,
        address ? `Reported address: ${address}` : undefined
      );
    }

    logger.info(`Deployed ${config.appName} at ${address}`);
    return address;
  });
}

export type PipelineResult =
  | { status: 'deployed'; imageUri: string; serviceUrl: string }
  | { status: 'failed'; stage: PipelineStage; error: unknown };

/**
 * Build, then deploy. Stops at the first failing stage and says which one.
 */
export async function buildAndDeploy(
  config: DeploymentConfig,
  provider: CloudProvider,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  let image: string;
  try {
    image = await buildImage(config, provider, options);
  } catch (error) {
    return { status: 'failed', stage: 'build', error };
  }

  try {
    const serviceUrl = await deployImage(config, provider, image, options);
    return { status: 'deployed', imageUri: image, serviceUrl };
  } catch (error) {
    return { status: 'failed', stage: 'deploy', error };
  }
}
