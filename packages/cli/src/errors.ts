/**
 * Error taxonomy for searchdeploy
 *
 * Every failure the orchestrator can report is one of these. Adapters throw
 * them, provisioning steps turn them into failed outcomes, and the reporter
 * maps them to an exit code.
 */

export type ErrorCode =
  | 'MISSING_CONFIG'
  | 'INVALID_CONFIG'
  | 'TOOL_MISSING'
  | 'CONFIRMATION_DECLINED'
  | 'NOT_INTERACTIVE'
  | 'PROPAGATION_TIMEOUT'
  | 'PERMISSION_GRANT_FAILED'
  | 'RESOURCE_CREATION_FAILED'
  | 'BUILD_FAILED'
  | 'DEPLOY_FAILED'
  | 'UNEXPECTED';

export interface ErrorDetails {
  remediation?: string;
  diagnostics?: string;
}

export abstract class OrchestrationError extends Error {
  abstract readonly code: ErrorCode;
  readonly remediation?: string;
  /** Raw output of the external tool that failed, if any */
  readonly diagnostics?: string;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.remediation = details.remediation;
    this.diagnostics = details.diagnostics?.trim() || undefined;
  }
}

export class MissingConfigError extends OrchestrationError {
  readonly code = 'MISSING_CONFIG' as const;

  constructor(
    readonly field: string,
    readonly envVar: string
  ) {
    super(`${envVar} environment variable is not set.`, {
      remediation: `Please set it with: export ${envVar}=your-${envVar.toLowerCase().replace(/_/g, '-')}`,
    });
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
  value?: unknown;
}

export class InvalidConfigError extends OrchestrationError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(readonly issues: ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`
    );
  }
}

export class ToolMissingError extends OrchestrationError {
  readonly code = 'TOOL_MISSING' as const;

  constructor(
    readonly tool: string,
    manualInstall: string
  ) {
    super(`Could not install ${tool}. Please install it manually and try again.`, {
      remediation: manualInstall,
    });
  }
}

export class ConfirmationDeclinedError extends OrchestrationError {
  readonly code = 'CONFIRMATION_DECLINED' as const;

  constructor() {
    super('Deployment cancelled.');
  }
}

export class NotInteractiveError extends OrchestrationError {
  readonly code = 'NOT_INTERACTIVE' as const;

  constructor() {
    super('Cannot ask for confirmation: standard input is not a terminal.', {
      remediation: 'Re-run with --skip-confirmation, or set CI=true, to deploy without a prompt.',
    });
  }
}

export class PropagationTimeoutError extends OrchestrationError {
  readonly code = 'PROPAGATION_TIMEOUT' as const;

  constructor(
    readonly identity: string,
    readonly attempts: number
  ) {
    super(
      `Service account ${identity} was not visible after ${attempts} attempts.`,
      {
        remediation:
          'Check your permissions, then run searchdeploy again; it resumes from where it stopped.',
      }
    );
  }
}

export class PermissionGrantError extends OrchestrationError {
  readonly code = 'PERMISSION_GRANT_FAILED' as const;

  constructor(role: string, member: string, diagnostics?: string) {
    super(`Failed to grant ${role} to ${member}.`, {
      diagnostics,
      remediation:
        'This may be due to insufficient permissions or a propagation delay. ' +
        'Run searchdeploy again or grant the role manually.',
    });
  }
}

export class ResourceCreationError extends OrchestrationError {
  readonly code = 'RESOURCE_CREATION_FAILED' as const;

  constructor(message: string, diagnostics?: string) {
    super(message, { diagnostics });
  }
}

export class BuildError extends OrchestrationError {
  readonly code = 'BUILD_FAILED' as const;

  constructor(image: string, diagnostics?: string) {
    super(`Cloud Build failed for ${image}.`, {
      diagnostics,
      remediation: 'Inspect the build log above, fix the application source and run again.',
    });
  }
}

export class DeployError extends OrchestrationError {
  readonly code = 'DEPLOY_FAILED' as const;

  constructor(message: string, diagnostics?: string) {
    super(message, { diagnostics });
  }
}

export class UnexpectedError extends OrchestrationError {
  readonly code = 'UNEXPECTED' as const;

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), {
      diagnostics: cause instanceof Error ? cause.stack : undefined,
    });
  }
}

/**
 * Normalise anything thrown into the taxonomy
 */
export function toOrchestrationError(error: unknown): OrchestrationError {
  return error instanceof OrchestrationError ? error : new UnexpectedError(error);
}
