/**
 * Hardline Error Codes
 */
export const ErrorCodes = {
  PRECONDITION: 'PRECONDITION',
  DEP_MISSING: 'DEP_MISSING',
  UNREACHABLE: 'UNREACHABLE',
  AUTH_FAILED: 'AUTH_FAILED',
  COMMAND_FAILED: 'COMMAND_FAILED',
  BOOTSTRAP_FAILED: 'BOOTSTRAP_FAILED',
  SNAPSHOT_FAILED: 'SNAPSHOT_FAILED',
  STAGE_FAILED: 'STAGE_FAILED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  GUARD_CONFLICT: 'GUARD_CONFLICT',
  GUARD_FAILED: 'GUARD_FAILED',
  APPLY_FAILED: 'APPLY_FAILED',
  CONFIRMATION_FAILED: 'CONFIRMATION_FAILED',
  CANCEL_FAILED: 'CANCEL_FAILED',
  REVERT_FAILED: 'REVERT_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for hardline errors
 */
export class HardlineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    public readonly resource?: string,
  ) {
    super(message);
    this.name = 'HardlineError';
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: Bad arguments or missing local files. Raised before touching the target.
 */
export class PreconditionError extends HardlineError {
  constructor(message: string, hint?: string) {
    super(ErrorCodes.PRECONDITION, message, hint);
    this.name = 'PreconditionError';
  }
}

/**
 * Error: Missing required local dependency
 */
export class DependencyMissingError extends HardlineError {
  constructor(
    public readonly dependency: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.DEP_MISSING,
      `Missing required dependency: ${dependency}`,
      hint ?? `Please install ${dependency} and try again`,
    );
    this.name = 'DependencyMissingError';
  }
}

/**
 * Error: Target unreachable or credentials rejected
 */
export class ConnectivityError extends HardlineError {
  constructor(
    public readonly target: string,
    public readonly status: 'auth-failed' | 'unreachable',
    detail?: string,
  ) {
    super(
      status === 'auth-failed' ? ErrorCodes.AUTH_FAILED : ErrorCodes.UNREACHABLE,
      status === 'auth-failed'
        ? `Authentication failed for ${target}`
        : `Cannot connect to ${target}${detail ? `: ${detail}` : ''}`,
      status === 'auth-failed'
        ? 'Check the username and credential'
        : 'Check the address, that the SSH service is running, and that no firewall blocks port 22',
    );
    this.name = 'ConnectivityError';
  }
}

/**
 * Error: A remote action exited non-zero
 */
export class RemoteCommandError extends HardlineError {
  constructor(
    public readonly step: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(
      ErrorCodes.COMMAND_FAILED,
      `${step} failed (exit ${exitCode})${stderr.trim() ? `: ${stderr.trim()}` : ''}`,
    );
    this.name = 'RemoteCommandError';
  }
}

/**
 * Error: Identity provisioning failed. Partial identity state is left as is.
 */
export class BootstrapError extends HardlineError {
  constructor(
    public readonly step: string,
    reason: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.BOOTSTRAP_FAILED,
      `Bootstrap step "${step}" failed: ${reason}`,
      hint ?? 'Check that the bootstrap user has sudo rights',
    );
    this.name = 'BootstrapError';
  }
}

/**
 * Error: The live configuration could not be backed up. Nothing was changed.
 */
export class SnapshotError extends HardlineError {
  constructor(resource: string, reason: string) {
    super(
      ErrorCodes.SNAPSHOT_FAILED,
      `Snapshot of ${resource} failed: ${reason}`,
      'No change was made to the target',
      resource,
    );
    this.name = 'SnapshotError';
  }
}

/**
 * Error: The pending change could not be written next to the live file
 */
export class StageError extends HardlineError {
  constructor(resource: string, reason: string) {
    super(
      ErrorCodes.STAGE_FAILED,
      `Staging ${resource} failed: ${reason}`,
      'The live configuration was not touched',
      resource,
    );
    this.name = 'StageError';
  }
}

/**
 * Error: The target's own checker rejected the staged configuration
 */
export class ValidationError extends HardlineError {
  constructor(
    resource: string,
    public readonly output: string,
  ) {
    super(
      ErrorCodes.VALIDATION_FAILED,
      `Staged ${resource} configuration is invalid${output.trim() ? `: ${output.trim()}` : ''}`,
      'The staged file was discarded; the live configuration is unchanged',
      resource,
    );
    this.name = 'ValidationError';
  }
}

/**
 * Error: Another guard is still outstanding for the resource
 */
export class GuardConflictError extends HardlineError {
  constructor(resource: string, detail?: string) {
    super(
      ErrorCodes.GUARD_CONFLICT,
      `A rollback guard is already armed for ${resource}${detail ? ` (${detail})` : ''}`,
      'Wait for the outstanding guard to resolve before starting a new transaction',
      resource,
    );
    this.name = 'GuardConflictError';
  }
}

/**
 * Error: The guard could not be started. Nothing live was changed.
 */
export class GuardFailedError extends HardlineError {
  constructor(resource: string, reason: string) {
    super(
      ErrorCodes.GUARD_FAILED,
      `Arming rollback guard for ${resource} failed: ${reason}`,
      'The live configuration was not touched',
      resource,
    );
    this.name = 'GuardFailedError';
  }
}

/**
 * Error: The new configuration was activated but its service did not come up.
 * The armed guard restores the snapshot at its deadline.
 */
export class ApplyError extends HardlineError {
  constructor(resource: string, reason: string, deadlineAt?: string) {
    super(
      ErrorCodes.APPLY_FAILED,
      `Applying ${resource} failed: ${reason}`,
      deadlineAt
        ? `The rollback guard restores the previous configuration at ${deadlineAt}`
        : undefined,
      resource,
    );
    this.name = 'ApplyError';
  }
}

/**
 * Error: The new configuration is live but a functional check failed
 */
export class ConfirmationError extends HardlineError {
  constructor(resource: string, reason: string, hint?: string) {
    super(ErrorCodes.CONFIRMATION_FAILED, `Confirming ${resource} failed: ${reason}`, hint, resource);
    this.name = 'ConfirmationError';
  }
}

/**
 * Error: The guard could not be cancelled after a successful confirmation
 */
export class CancelError extends HardlineError {
  constructor(resource: string, reason: string, deadlineAt: string) {
    super(
      ErrorCodes.CANCEL_FAILED,
      `Cancelling the rollback guard for ${resource} failed: ${reason}`,
      `The guard will revert ${resource} at ${deadlineAt} unless it is removed manually`,
      resource,
    );
    this.name = 'CancelError';
  }
}

/**
 * Error: Restoring the snapshot failed. Requires out-of-band intervention.
 */
export class RevertError extends HardlineError {
  constructor(resource: string, reason: string, hint?: string) {
    super(
      ErrorCodes.REVERT_FAILED,
      `Reverting ${resource} failed: ${reason}`,
      hint ?? 'Restore the backup manually from the console',
      resource,
    );
    this.name = 'RevertError';
  }
}

/**
 * Process exit code for a failed run. Every failure maps to 1.
 */
export function exitCodeFor(error: unknown): number {
  return error === undefined || error === null ? 0 : 1;
}
