/**
 * Deployment configuration resolver
 *
 * Merges CLI flags, environment variables and defaults into one frozen
 * DeploymentConfig. Runs before anything touches GCP.
 */

import { InvalidConfigError, MissingConfigError, type ConfigIssue } from './errors';
import { REGION_PATTERN, isKnownRegion } from './regions';
import type { DeploymentConfig } from './types';

export const DEFAULT_REGION = 'us-central1';
export const DEFAULT_LOCATION = 'global';
export const DEFAULT_APP_NAME = 'vertex-search-app';
export const DEFAULT_REPOSITORY_NAME = 'chainlit-apps';
export const DEFAULT_SOURCE_DIR = '.';

export const DATASTORE_LOCATIONS = ['global', 'us', 'eu'];

/**
 * Environment variables that mark a run without an operator at the keyboard
 */
export const NON_INTERACTIVE_SIGNALS = ['CLOUD_SHELL', 'CI'];

/** Values a caller may pin explicitly; anything set here beats the environment */
export type ConfigOverrides = {
  -readonly [K in keyof DeploymentConfig]?: DeploymentConfig[K];
};

export interface ConfigSources {
  flags?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function pick(flag: string | undefined, env: NodeJS.ProcessEnv, name: string): string | undefined {
  const fromFlag = flag?.trim();
  return fromFlag ? fromFlag : readEnv(env, name);
}

/**
 * Name of the environment signal that marks this run as non-interactive, or null
 */
export function detectNonInteractive(env: NodeJS.ProcessEnv = process.env): string | null {
  for (const name of NON_INTERACTIVE_SIGNALS) {
    const value = readEnv(env, name);
    if (value && value !== '0' && value.toLowerCase() !== 'false') {
      return name;
    }
  }
  return null;
}

/**
 * Resolve the configuration for one run.
 * Throws MissingConfigError for the first absent required value and
 * InvalidConfigError when any value is malformed.
 */
export function resolveConfig(sources: ConfigSources = {}): DeploymentConfig {
  const flags = sources.flags ?? {};
  const env = sources.env ?? process.env;

  const projectId = pick(flags.projectId, env, 'PROJECT_ID');
  if (!projectId) {
    throw new MissingConfigError('projectId', 'PROJECT_ID');
  }

  const dataStoreId = pick(flags.dataStoreId, env, 'DATA_STORE_ID');
  if (!dataStoreId) {
    throw new MissingConfigError('dataStoreId', 'DATA_STORE_ID');
  }

  const appName = pick(flags.appName, env, 'APP_NAME') ?? DEFAULT_APP_NAME;

  const config: DeploymentConfig = {
    projectId,
    dataStoreId,
    region: pick(flags.region, env, 'REGION') ?? DEFAULT_REGION,
    location: pick(flags.location, env, 'LOCATION') ?? DEFAULT_LOCATION,
    appName,
    serviceAccountName: pick(flags.serviceAccountName, env, 'SERVICE_ACCOUNT_NAME') ?? `${appName}-sa`,
    repositoryName: pick(flags.repositoryName, env, 'REPOSITORY_NAME') ?? DEFAULT_REPOSITORY_NAME,
    sourceDir: pick(flags.sourceDir, env, 'SOURCE_DIR') ?? DEFAULT_SOURCE_DIR,
    skipConfirmation: flags.skipConfirmation === true || detectNonInteractive(env) !== null,
  };

  const issues = validateDeploymentConfig(config);
  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }

  return Object.freeze(config);
}

// =============================================================================
// Validation
// =============================================================================

const CLOUD_RUN_NAME = /^[a-z]([-a-z0-9]*[a-z0-9])?$/;

export function validateDeploymentConfig(config: DeploymentConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!CLOUD_RUN_NAME.test(config.appName) || config.appName.length > 49) {
    issues.push({
      path: 'appName',
      message: 'must be lowercase alphanumeric with hyphens, start with a letter, 1-49 chars',
      value: config.appName,
    });
  }

  const sa = config.serviceAccountName;
  if (!CLOUD_RUN_NAME.test(sa) || sa.length < 6 || sa.length > 30) {
    issues.push({
      path: 'serviceAccountName',
      message: 'must be lowercase alphanumeric with hyphens, start with a letter, 6-30 chars',
      value: sa,
    });
  }

  if (!CLOUD_RUN_NAME.test(config.repositoryName) || config.repositoryName.length > 63) {
    issues.push({
      path: 'repositoryName',
      message: 'must be lowercase alphanumeric with hyphens, start with a letter, 1-63 chars',
      value: config.repositoryName,
    });
  }

  if (!DATASTORE_LOCATIONS.includes(config.location)) {
    issues.push({
      path: 'location',
      message: `must be one of ${DATASTORE_LOCATIONS.join(', ')}`,
      value: config.location,
    });
  }

  if (!REGION_PATTERN.test(config.region)) {
    issues.push({
      path: 'region',
      message: 'must be a GCP region such as us-central1',
      value: config.region,
    });
  }

  return issues;
}

/**
 * Non-fatal remarks about a valid config
 */
export function configWarnings(config: DeploymentConfig): string[] {
  const warnings: string[] = [];
  if (!isKnownRegion(config.region)) {
    warnings.push(`Region ${config.region} is not in the known Cloud Run region list; continuing anyway.`);
  }
  return warnings;
}

// =============================================================================
// Derived values
// =============================================================================

export function serviceAccountEmail(config: DeploymentConfig): string {
  return `${config.serviceAccountName}@${config.projectId}.iam.gserviceaccount.com`;
}

export function serviceAccountMember(config: DeploymentConfig): string {
  return `serviceAccount:${serviceAccountEmail(config)}`;
}

export function imageUri(config: DeploymentConfig): string {
  return `${config.region}-docker.pkg.dev/${config.projectId}/${config.repositoryName}/${config.appName}`;
}

/**
 * The three values the application image reads at start-up
 */
export function runtimeEnv(config: DeploymentConfig): Record<string, string> {
  return {
    PROJECT_ID: config.projectId,
    LOCATION: config.location,
    DATA_STORE_ID: config.dataStoreId,
  };
}
