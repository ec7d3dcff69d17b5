/**
 * Core types shared by the resolver, the provisioner and the gcloud adapters
 */

import type { OrchestrationError } from './errors';

// =============================================================================
// Configuration
// =============================================================================

export interface DeploymentConfig {
  readonly projectId: string;
  readonly region: string;
  /** Discovery Engine location: global, us or eu */
  readonly location: string;
  readonly appName: string;
  readonly serviceAccountName: string;
  readonly repositoryName: string;
  readonly dataStoreId: string;
  readonly sourceDir: string;
  readonly skipConfirmation: boolean;
}

// =============================================================================
// Resources & outcomes
// =============================================================================

export type ResourceKind = 'service' | 'identity' | 'role-binding' | 'registry';

export type ExistenceState = 'absent' | 'present';

export interface ProvisionedResource {
  kind: ResourceKind;
  identifier: string;
  /** State observed when the owning step queried the provider */
  state: ExistenceState;
}

export type StepOutcome =
  | { status: 'created' }
  | { status: 'already-present' }
  | { status: 'failed'; reason: string; error: OrchestrationError };

export type StepName =
  | 'enable-services'
  | 'create-service-account'
  | 'verify-propagation'
  | 'grant-role'
  | 'create-repository';

export interface StepReport {
  name: StepName;
  title: string;
  outcome: StepOutcome;
  resources: ProvisionedResource[];
}

export type StageName = 'configuration' | 'preflight' | 'confirmation' | StepName | 'build' | 'deploy';

export type DeploymentOutcome =
  | {
      status: 'succeeded';
      steps: StepReport[];
      imageUri: string;
      serviceUrl: string;
    }
  | {
      status: 'failed';
      stage: StageName;
      reason: string;
      error: OrchestrationError;
      steps: StepReport[];
    }
  | { status: 'cancelled' };

// =============================================================================
// Provider collaborators
// =============================================================================

export interface ServiceCatalog {
  isEnabled(name: string): Promise<boolean>;
  enable(name: string): Promise<void>;
}

export interface ServiceAccount {
  email: string;
  uniqueId?: string;
  displayName?: string;
}

export interface IdentityStore {
  /** Resolves null when the account does not exist (or is not visible yet) */
  describe(email: string): Promise<ServiceAccount | null>;
  create(accountId: string, displayName: string): Promise<void>;
}

export interface PolicyCondition {
  expression: string;
  title?: string;
}

export interface PolicyBinding {
  role: string;
  members: string[];
  condition?: PolicyCondition;
}

/**
 * An IAM policy as fetched from the provider. `structured` is the normal
 * case; `text` is the degraded rendering used only when the structured form
 * could not be obtained.
 */
export type PolicyDocument =
  | { format: 'structured'; bindings: PolicyBinding[]; etag?: string }
  | { format: 'text'; text: string };

export interface PolicyStore {
  getPolicy(projectId: string): Promise<PolicyDocument>;
  hasBinding(policy: PolicyDocument, role: string, member: string): boolean;
  addBinding(projectId: string, member: string, role: string): Promise<void>;
}

export interface Repository {
  name: string;
  format?: string;
}

export interface ArtifactStore {
  describe(repoName: string, location: string): Promise<Repository | null>;
  create(repoName: string, location: string): Promise<void>;
}

export interface BuildResult {
  /** Tag the pushed image is reachable under */
  image: string;
}

export interface Builder {
  build(sourceDir: string, tag: string): Promise<BuildResult>;
}

export interface DeployRequest {
  serviceName: string;
  image: string;
  /** Service account email the revision runs as */
  identity: string;
  env: Record<string, string>;
}

export interface Hoster {
  deploy(request: DeployRequest): Promise<void>;
  getAddress(serviceName: string): Promise<string>;
}

export interface CloudProvider {
  services: ServiceCatalog;
  identities: IdentityStore;
  policies: PolicyStore;
  artifacts: ArtifactStore;
  builder: Builder;
  hoster: Hoster;
}

// =============================================================================
// Process execution
// =============================================================================

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Never rejects on a non-zero exit; a missing binary resolves with exit code 127 */
  run(command: string, args: string[]): Promise<CommandResult>;
}
