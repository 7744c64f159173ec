import { v4 as uuidv4 } from 'uuid';
import { CleanupEngine } from '../cleanup/cleanup-engine.js';
import { ComplianceGuard } from '../compliance/guard.js';
import type { RuleResult } from '../compliance/types.js';
import {
  ConfigurationError,
  type DeploymentError,
  MissingStateError,
  PhaseExecutionError,
  PrerequisiteError,
  describeError,
  toDeploymentError
} from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { CallerIdentity, CloudGateway } from '../provisioning/types.js';
import { ResourceCatalog } from '../reconciler/catalog.js';
import { DeploymentStateStore, STATE_OWNERS } from '../state/state-store.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { type DeploymentConfig, type PhaseId, type Result, err, ok } from '../types/index.js';
import { type HttpProbe, NodeHttpProbe } from './http-probe.js';
import { DEFAULT_PHASES } from './phases/index.js';
import { HOST_LAYOUT } from './remote-steps.js';
import type { DeploymentPhase, PhaseContext, RunOptions, RunReport, RunState } from './types.js';

/** Phase 6 only reads and checks; every other phase changes the account */
const READ_ONLY_PHASES: ReadonlySet<PhaseId> = new Set<PhaseId>([6]);

export interface OrchestratorDependencies {
  config: Readonly<DeploymentConfig>;
  cloud: CloudGateway;
  logger: Logger;
  store?: DeploymentStateStore;
  templates?: TemplateEngine;
  catalog?: ResourceCatalog;
  guard?: ComplianceGuard;
  cleanup?: CleanupEngine;
  phases?: readonly DeploymentPhase[];
  http?: HttpProbe;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultWait = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs the selected phases in ordinal order behind the prerequisite and
 * compliance gates, or hands over to the cleanup engine.
 */
export class DeploymentOrchestrator {
  readonly store: DeploymentStateStore;
  readonly catalog: ResourceCatalog;
  private readonly config: Readonly<DeploymentConfig>;
  private readonly cloud: CloudGateway;
  private readonly logger: Logger;
  private readonly templates: TemplateEngine;
  private readonly guard: ComplianceGuard;
  private readonly cleanupEngine: CleanupEngine;
  private readonly phases: readonly DeploymentPhase[];
  private readonly http: HttpProbe;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.config = deps.config;
    this.cloud = deps.cloud;
    this.logger = deps.logger;
    this.store = deps.store ?? new DeploymentStateStore(deps.config.state.directory, deps.config.environment);
    this.templates = deps.templates ?? new TemplateEngine();
    this.catalog = deps.catalog ?? new ResourceCatalog(deps.config, deps.cloud, () => this.renderUserData());
    this.guard = deps.guard ?? new ComplianceGuard(deps.cloud.inventory, deps.cloud.budgets, deps.logger);
    this.cleanupEngine = deps.cleanup ?? new CleanupEngine(this.catalog, this.store, deps.cloud.remote, deps.logger);
    this.phases = deps.phases ?? DEFAULT_PHASES;
    this.http = deps.http ?? new NodeHttpProbe();
    this.wait = deps.wait ?? defaultWait;
    this.now = deps.now ?? (() => new Date());
  }

  async run(options: RunOptions): Promise<RunReport> {
    const startTime = Date.now();
    const report: RunReport = {
      runId: uuidv4(),
      mode: options.mode,
      environment: this.config.environment,
      phases: [],
      completedPhases: [],
      transitions: [],
      compliance: [],
      finalState: { status: 'idle' },
      durationMs: 0
    };
    this.transition(report, { status: 'idle' });

    const failure = await this.execute(options, report);
    if (failure) {
      report.error = failure;
      this.logger.error(`${failure.code}: ${failure.message}`);
      if (failure.remediation) {
        this.logger.info(`Remediation: ${failure.remediation}`);
      }
      this.transition(report, { status: 'aborted', reason: failure.message });
    } else {
      this.transition(report, { status: 'completed' });
    }

    report.durationMs = Date.now() - startTime;
    return report;
  }

  /**
   * Sorted, de-duplicated selection; every phase when none is given
   */
  resolvePhases(requested?: readonly number[]): Result<DeploymentPhase[], ConfigurationError> {
    if (!requested || requested.length === 0) {
      return ok([...this.phases].sort((a, b) => a.id - b.id));
    }

    const unknown = requested.filter(id => !this.phases.some(phase => phase.id === id));
    if (unknown.length > 0) {
      const known = this.phases.map(phase => phase.id).join(', ');
      return err(new ConfigurationError(
        `Unknown phase(s): ${[...new Set(unknown)].join(', ')}`,
        `Choose from ${known}`
      ));
    }

    const wanted = new Set(requested);
    return ok(this.phases.filter(phase => wanted.has(phase.id)).sort((a, b) => a.id - b.id));
  }

  /** Returns the error that aborted the run, undefined when it completed */
  private async execute(options: RunOptions, report: RunReport): Promise<DeploymentError | undefined> {
    const selection = this.resolvePhases(options.mode === 'deploy' ? options.phases : []);
    if (!selection.ok) {
      return selection.error;
    }
    if (options.mode === 'deploy') {
      report.phases = selection.value.map(phase => phase.id);
    }

    this.transition(report, { status: 'validating' });
    const identity = await this.checkPrerequisites();
    if (!identity.ok) {
      return identity.error;
    }

    switch (options.mode) {
      case 'validate-only': {
        const compliance = await this.runCompliance(report);
        return compliance.ok ? undefined : compliance.error;
      }

      case 'cleanup': {
        try {
          report.cleanup = await this.cleanupEngine.cleanup(options.dryRun ? 'dry-run' : 'execute');
        } catch (error) {
          return toDeploymentError(error, message => new PhaseExecutionError('cleanup', message));
        }
        return undefined;
      }

      case 'deploy':
        return this.deploy(selection.value, identity.value, report);
    }
  }

  private async deploy(
    phases: readonly DeploymentPhase[],
    identity: CallerIdentity,
    report: RunReport
  ): Promise<DeploymentError | undefined> {
    if (phases.some(phase => !READ_ONLY_PHASES.has(phase.id))) {
      const compliance = await this.runCompliance(report);
      if (!compliance.ok) {
        return compliance.error;
      }
    }

    const context: PhaseContext = {
      config: this.config,
      cloud: this.cloud,
      catalog: this.catalog,
      store: this.store,
      templates: this.templates,
      http: this.http,
      identity,
      logger: this.logger,
      wait: this.wait,
      now: this.now
    };

    for (const [index, phase] of phases.entries()) {
      this.transition(report, { status: 'running', phase: phase.id, name: phase.name });
      this.logger.info(`Phase ${index + 1}/${phases.length}: ${phase.name} - ${phase.description}`);

      const missing = phase.requires.find(key => !this.store.has(key));
      if (missing) {
        return new MissingStateError(missing, STATE_OWNERS[missing], phase.id);
      }

      let result: Result<void, DeploymentError>;
      try {
        result = await phase.execute(context);
      } catch (error) {
        result = err(toDeploymentError(error, message => new PhaseExecutionError(phase.name, message)));
      }
      if (!result.ok) {
        this.logger.warn(`Phase ${phase.id} (${phase.name}) did not complete`);
        return result.error;
      }

      report.completedPhases.push(phase.id);
      this.logger.success(`Phase ${phase.id} (${phase.name}) complete`);
    }

    report.endpoint = await this.currentEndpoint();
    return undefined;
  }

  private async checkPrerequisites(): Promise<Result<CallerIdentity, PrerequisiteError>> {
    this.logger.info('Checking prerequisites...');
    try {
      const identity = await this.cloud.account.whoAmI();
      this.logger.success(`Authenticated as ${identity.arn} (account ${identity.accountId})`);
      return ok(identity);
    } catch (error) {
      return err(new PrerequisiteError(
        `Cloud credentials are not usable: ${describeError(error)}`,
        'Configure credentials for the selected profile and region, then re-run'
      ));
    }
  }

  private async runCompliance(report: RunReport): Promise<Result<RuleResult[], DeploymentError>> {
    try {
      const results = await this.guard.check(this.config, this.catalog.names);
      if (results.ok) {
        report.compliance = results.value;
      } else {
        report.compliance = results.error.violations.slice();
      }
      return results;
    } catch (error) {
      return err(toDeploymentError(error, message => new PrerequisiteError(`Compliance check could not run: ${message}`)));
    }
  }

  /**
   * Current external address, read live since it changes across stop/start
   */
  private async currentEndpoint(): Promise<string | undefined> {
    try {
      const instance = await this.catalog.instance().lookup();
      if (instance?.externalAddress) {
        this.logger.success(`Service endpoint: https://${instance.externalAddress}`);
        return `https://${instance.externalAddress}`;
      }
      this.logger.info('No external address is currently assigned');
    } catch (error) {
      this.logger.info(`Could not read the current address: ${describeError(error)}`);
    }
    return undefined;
  }

  private renderUserData(): string {
    return this.templates.render('startup.sh', {
      instanceName: this.catalog.names.instance,
      appDirectory: HOST_LAYOUT.appDirectory,
      serviceUser: HOST_LAYOUT.serviceUser,
      serviceName: HOST_LAYOUT.serviceName,
      readinessMarker: HOST_LAYOUT.readinessMarker
    });
  }

  private transition(report: RunReport, state: RunState): void {
    report.finalState = state;
    report.transitions.push({ at: this.now(), state });
    const detail = state.status === 'running'
      ? ` (phase ${state.phase}: ${state.name})`
      : state.status === 'aborted' ? ` (${state.reason})` : '';
    this.logger.info(`Run state: ${state.status}${detail}`);
  }
}
