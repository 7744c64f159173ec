import type { ResourceNames } from '../config/naming.js';
import { ComplianceError, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { BudgetApi, InventoryApi } from '../provisioning/types.js';
import { type DeploymentConfig, type Result, err, ok } from '../types/index.js';
import { COMPLIANCE_RULES, COUNTED_VOLUME_TYPES, MINIMAL_INSTANCE_TYPES } from './rules.js';
import type { ComplianceRule, LiveState, RuleResult } from './types.js';

/**
 * Evaluate every rule against one snapshot. Pure and synchronous.
 */
export function evaluate(
  config: Readonly<DeploymentConfig>,
  names: ResourceNames,
  live: LiveState,
  rules: readonly ComplianceRule[] = COMPLIANCE_RULES
): RuleResult[] {
  return rules.map(rule => rule.evaluate({ config, names, live }));
}

export function hardFailures(results: readonly RuleResult[]): RuleResult[] {
  return results.filter(entry => entry.severity === 'HARD' && !entry.passed);
}

/**
 * Read-only pre-flight gate. Live state is re-read on every check.
 */
export class ComplianceGuard {
  constructor(
    private readonly inventory: InventoryApi,
    private readonly budgets: BudgetApi,
    private readonly logger: Logger
  ) {}

  async gatherLiveState(): Promise<LiveState> {
    const minimalInstances = await this.inventory.listInstances(MINIMAL_INSTANCE_TYPES);
    const volumes = await this.inventory.listVolumes(COUNTED_VOLUME_TYPES);
    const staticAddresses = await this.inventory.listStaticAddresses();

    let billing: LiveState['billing'];
    try {
      billing = { accessible: await this.budgets.billingAccessible() };
    } catch (error) {
      // Reported through the WARN rule instead of aborting
      billing = { accessible: false, detail: describeError(error) };
    }

    return { minimalInstances, volumes, staticAddresses, billing };
  }

  /**
   * Gather, evaluate and log; any failed HARD rule is a ComplianceError
   */
  async check(config: Readonly<DeploymentConfig>, names: ResourceNames): Promise<Result<RuleResult[], ComplianceError>> {
    this.logger.info('Running compliance checks...');
    const results = evaluate(config, names, await this.gatherLiveState());

    for (const entry of results) {
      if (entry.passed) {
        this.logger.success(`[${entry.rule}] ${entry.message}`);
      } else if (entry.severity === 'WARN') {
        this.logger.warn(`[${entry.rule}] ${entry.message}`);
      } else {
        this.logger.error(`[${entry.rule}] ${entry.message}`);
      }
    }

    const failures = hardFailures(results);
    return failures.length > 0 ? err(new ComplianceError(failures)) : ok(results);
  }
}
