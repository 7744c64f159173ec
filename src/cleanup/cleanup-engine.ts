import { type BestEffortWarning, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { HOST_LAYOUT } from '../orchestration/remote-steps.js';
import type { RemoteCommandApi } from '../provisioning/types.js';
import type { ResourceCatalog } from '../reconciler/catalog.js';
import type { DeploymentStateStore, StateKey } from '../state/state-store.js';
import type { CleanupMode, ResourceDescriptor, ResourceKind } from '../types/index.js';

export interface ResourceRef {
  kind: ResourceKind;
  name: string;
}

export interface CleanupReport {
  mode: CleanupMode;
  /** Resources found present, in deletion order */
  planned: ResourceRef[];
  deleted: ResourceRef[];
  absent: ResourceRef[];
  warnings: BestEffortWarning[];
  /** Still present after the verification pass; in dry-run, everything planned */
  remaining: ResourceRef[];
  /** Local records found before cleanup */
  stateRecords: StateKey[];
}

const refOf = (descriptor: ResourceDescriptor): ResourceRef => ({ kind: descriptor.kind, name: descriptor.name });
const label = (ref: ResourceRef): string => `${ref.kind} ${ref.name}`;

/**
 * Reverse-order, best-effort teardown. No single failure stops the remaining deletions.
 */
export class CleanupEngine {
  constructor(
    private readonly catalog: ResourceCatalog,
    private readonly store: DeploymentStateStore,
    private readonly remote: RemoteCommandApi,
    private readonly logger: Logger
  ) {}

  async cleanup(mode: CleanupMode): Promise<CleanupReport> {
    const report: CleanupReport = {
      mode,
      planned: [],
      deleted: [],
      absent: [],
      warnings: [],
      remaining: [],
      stateRecords: this.store.present()
    };
    const descriptors = this.catalog.cleanupOrder();

    if (mode === 'dry-run') {
      this.logger.info('Dry run: nothing will be deleted');
      for (const descriptor of descriptors) {
        const present = await this.isPresent(descriptor, report.warnings);
        (present ? report.planned : report.absent).push(refOf(descriptor));
        this.logger.info(`${present ? 'Would delete' : 'Not found'}: ${label(refOf(descriptor))}`);
      }
      for (const key of report.stateRecords) {
        this.logger.info(`Would delete local state: ${key}`);
      }
      report.remaining = [...report.planned];
      return report;
    }

    await this.stopServices(report.warnings);

    for (const descriptor of descriptors) {
      const ref = refOf(descriptor);
      if (!(await this.isPresent(descriptor, report.warnings))) {
        report.absent.push(ref);
        this.logger.debug(`${label(ref)} not found`);
        continue;
      }

      report.planned.push(ref);
      this.logger.info(`Deleting ${label(ref)}...`);
      try {
        await descriptor.remove();
        report.deleted.push(ref);
        this.logger.success(`Deleted ${label(ref)}`);
      } catch (error) {
        this.warn(report.warnings, label(ref), `delete failed: ${describeError(error)}`);
      }
    }

    try {
      await this.store.clear();
      if (report.stateRecords.length > 0) {
        this.logger.success(`Removed local state (${report.stateRecords.join(', ')})`);
      }
    } catch (error) {
      this.warn(report.warnings, 'local-state', describeError(error));
    }

    report.remaining = await this.verify(report.warnings);
    if (report.remaining.length === 0) {
      this.logger.success('Verification: no deployment resources remain');
    } else {
      this.logger.warn(`Verification: ${report.remaining.length} resource(s) still present ` +
        `(deletion may still be in progress): ${report.remaining.map(label).join(', ')}`);
    }
    return report;
  }

  /**
   * Re-run every lookup after deletion
   */
  private async verify(warnings: BestEffortWarning[]): Promise<ResourceRef[]> {
    const remaining: ResourceRef[] = [];
    for (const descriptor of this.catalog.cleanupOrder()) {
      if (await this.isPresent(descriptor, warnings)) {
        remaining.push(refOf(descriptor));
      }
    }
    return remaining;
  }

  /** A lookup that fails counts as present so it is never reported as gone */
  private async isPresent(descriptor: ResourceDescriptor, warnings: BestEffortWarning[]): Promise<boolean> {
    try {
      return (await descriptor.lookup()) !== undefined;
    } catch (error) {
      this.warn(warnings, label(refOf(descriptor)), `lookup failed: ${describeError(error)}`);
      return true;
    }
  }

  private async stopServices(warnings: BestEffortWarning[]): Promise<void> {
    try {
      const instance = await this.catalog.instance().lookup();
      if (!instance || instance.state !== 'running') {
        return;
      }
      this.logger.info('Stopping services on the instance...');
      const result = await this.remote.run(instance.instanceId, [
        `systemctl stop ${HOST_LAYOUT.serviceName} || true`,
        'systemctl stop caddy || true'
      ], { timeoutSeconds: 60 });
      if (!result.ok) {
        this.warn(warnings, 'services', `stop failed: ${result.output}`);
      }
    } catch (error) {
      this.warn(warnings, 'services', `stop failed: ${describeError(error)}`);
    }
  }

  private warn(warnings: BestEffortWarning[], source: string, message: string): void {
    warnings.push({ source, message });
    this.logger.warn(`${source}: ${message}`);
  }
}
