/**
 * gcloud-backed provider for searchdeploy
 */

import type { CloudProvider, CommandRunner, DeploymentConfig } from '../types';
import { GcloudServiceCatalog } from './apis';
import { GcloudArtifactStore } from './artifacts';
import { GcloudBuilder } from './builds';
import { GcloudIdentityStore, GcloudPolicyStore } from './iam';
import { GcloudHoster } from './run';
import { ExecFileRunner } from './runner';

export { REQUIRED_APIS, getApiDisplayName, GcloudServiceCatalog } from './apis';
export { APP_ROLE, GcloudIdentityStore, GcloudPolicyStore } from './iam';
export { GcloudArtifactStore } from './artifacts';
export { GcloudBuilder } from './builds';
export { GcloudHoster, formatEnvVars } from './run';
export { ExecFileRunner, diagnosticsOf } from './runner';
export { hasBinding, hasStructuredBinding, hasTextBinding, parseStructuredPolicy } from './policy';

export function createGcloudProvider(
  config: DeploymentConfig,
  runner: CommandRunner = new ExecFileRunner()
): CloudProvider {
  return {
    services: new GcloudServiceCatalog(runner, config.projectId),
    identities: new GcloudIdentityStore(runner, config.projectId),
    policies: new GcloudPolicyStore(runner),
    artifacts: new GcloudArtifactStore(runner, config.projectId),
    builder: new GcloudBuilder(runner, config.projectId),
    hoster: new GcloudHoster(runner, config.projectId, config.region),
  };
}
