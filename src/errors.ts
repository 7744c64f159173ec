import type { RuleResult } from './compliance/types.js';

export type DeploymentErrorCode =
  | 'PREREQUISITE_FAILED'
  | 'COMPLIANCE_FAILED'
  | 'RECONCILIATION_FAILED'
  | 'MISSING_STATE'
  | 'REMOTE_COMMAND_FAILED'
  | 'HEALTH_CHECK_FAILED'
  | 'INVALID_CONFIGURATION'
  | 'STATE_OWNERSHIP'
  | 'PHASE_FAILED';

/**
 * Base class for every error that aborts a run.
 */
export abstract class DeploymentError extends Error {
  abstract readonly code: DeploymentErrorCode;

  constructor(message: string, readonly remediation?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PrerequisiteError extends DeploymentError {
  readonly code = 'PREREQUISITE_FAILED';
}

export class ComplianceError extends DeploymentError {
  readonly code = 'COMPLIANCE_FAILED';

  constructor(readonly violations: readonly RuleResult[]) {
    super(
      `Compliance check failed:\n${violations.map(v => `  - [${v.rule}] ${v.message}`).join('\n')}`,
      'Fix the listed conditions (or pass --force where the rule allows it) and re-run'
    );
  }
}

export class ReconciliationError extends DeploymentError {
  readonly code = 'RECONCILIATION_FAILED';

  constructor(readonly kind: string, readonly resourceName: string, reason: string) {
    super(
      `Failed to reconcile ${kind} ${resourceName}: ${reason}`,
      'Re-run the same phases; resources that already exist are left untouched'
    );
  }
}

export class MissingStateError extends DeploymentError {
  readonly code = 'MISSING_STATE';

  constructor(readonly key: string, readonly producedBy: number, readonly neededBy?: number) {
    super(
      neededBy === undefined
        ? `Deployment state "${key}" not found`
        : `Phase ${neededBy} needs deployment state "${key}", which is not recorded`,
      `Run phase ${producedBy} first`
    );
  }
}

export class RemoteCommandError extends DeploymentError {
  readonly code = 'REMOTE_COMMAND_FAILED';

  constructor(readonly step: string, readonly output: string) {
    super(`Remote command "${step}" failed${output ? `: ${output}` : ''}`);
  }
}

export class HealthCheckError extends DeploymentError {
  readonly code = 'HEALTH_CHECK_FAILED';

  constructor(readonly failedChecks: readonly string[], reportPath: string) {
    super(
      `${failedChecks.length} health check(s) failed: ${failedChecks.join(', ')}`,
      `See ${reportPath} for details`
    );
  }
}

export class ConfigurationError extends DeploymentError {
  readonly code = 'INVALID_CONFIGURATION';
}

export class StateOwnershipError extends DeploymentError {
  readonly code = 'STATE_OWNERSHIP';

  constructor(key: string, owner: number, writer: number) {
    super(`Deployment state "${key}" is owned by phase ${owner}; phase ${writer} cannot write it`);
  }
}

/** A phase step failed outside resource reconciliation and remote commands */
export class PhaseExecutionError extends DeploymentError {
  readonly code = 'PHASE_FAILED';

  constructor(readonly phase: string, reason: string) {
    super(`Phase ${phase} failed: ${reason}`, 'Fix the cause and re-run; completed steps are skipped');
  }
}

/** Non-fatal diagnostic accumulated by cleanup and informational checks */
export interface BestEffortWarning {
  source: string;
  message: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toDeploymentError(error: unknown, fallback: (message: string) => DeploymentError): DeploymentError {
  return error instanceof DeploymentError ? error : fallback(describeError(error));
}
