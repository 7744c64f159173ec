// Orchestration-specific types
import type { RuleResult } from '../compliance/types.js';
import type { DeploymentError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { CallerIdentity, CloudGateway } from '../provisioning/types.js';
import type { ResourceCatalog } from '../reconciler/catalog.js';
import type { DeploymentStateStore, StateKey } from '../state/state-store.js';
import type { TemplateEngine } from '../templates/template-engine.js';
import type { DeploymentConfig, PhaseId, Result, RunMode } from '../types/index.js';
import type { CleanupReport } from '../cleanup/cleanup-engine.js';
import type { HttpProbe } from './http-probe.js';

/**
 * Everything a phase may touch during one run
 */
export interface PhaseContext {
  config: Readonly<DeploymentConfig>;
  cloud: CloudGateway;
  catalog: ResourceCatalog;
  store: DeploymentStateStore;
  templates: TemplateEngine;
  http: HttpProbe;
  /** Caller verified by the prerequisite check of this run */
  identity: CallerIdentity;
  logger: Logger;
  wait: (ms: number) => Promise<void>;
  now: () => Date;
}

export interface DeploymentPhase {
  id: PhaseId;
  name: string;
  description: string;
  /** Records that must already exist before the phase starts */
  requires: readonly StateKey[];
  /** Records the phase writes on success */
  produces: readonly StateKey[];
  execute(context: PhaseContext): Promise<Result<void, DeploymentError>>;
}

export type RunState =
  | { status: 'idle' }
  | { status: 'validating' }
  | { status: 'running'; phase: PhaseId; name: string }
  | { status: 'completed' }
  | { status: 'aborted'; reason: string };

export interface StateTransition {
  at: Date;
  state: RunState;
}

export interface RunOptions {
  /** Phase ordinals in any order; defaults to every phase */
  phases?: readonly number[];
  mode: RunMode;
  /** Cleanup only: list without deleting */
  dryRun?: boolean;
}

export interface RunReport {
  runId: string;
  mode: RunMode;
  environment: string;
  phases: PhaseId[];
  completedPhases: PhaseId[];
  transitions: StateTransition[];
  compliance: RuleResult[];
  finalState: RunState;
  /** `https://<address>` once a deploy completes and the address is known */
  endpoint?: string;
  cleanup?: CleanupReport;
  error?: DeploymentError;
  durationMs: number;
}
