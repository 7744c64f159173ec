import type { ResourceNames } from '../config/naming.js';
import type { InventoryApi } from '../provisioning/types.js';
import type { DeploymentConfig } from '../types/index.js';

export type Severity = 'HARD' | 'WARN';

export type RuleId =
  | 'region-allowed'
  | 'machine-class'
  | 'minimal-instance-count'
  | 'storage-ceiling'
  | 'volume-size'
  | 'static-addresses'
  | 'billing-linked';

export interface RuleResult {
  rule: RuleId;
  severity: Severity;
  passed: boolean;
  message: string;
}

export type ListedInstance = Awaited<ReturnType<InventoryApi['listInstances']>>[number];
export type ListedVolume = Awaited<ReturnType<InventoryApi['listVolumes']>>[number];
export type ListedAddress = Awaited<ReturnType<InventoryApi['listStaticAddresses']>>[number];

/**
 * Snapshot of the account taken right before evaluation. Never reused across checks.
 */
export interface LiveState {
  minimalInstances: readonly ListedInstance[];
  volumes: readonly ListedVolume[];
  staticAddresses: readonly ListedAddress[];
  billing: { accessible: boolean; detail?: string };
}

export interface RuleContext {
  config: Readonly<DeploymentConfig>;
  names: ResourceNames;
  live: LiveState;
}

export interface ComplianceRule {
  id: RuleId;
  evaluate(context: RuleContext): RuleResult;
}
