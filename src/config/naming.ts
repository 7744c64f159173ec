import { createHash } from 'node:crypto';
import type { DeploymentConfig, ResourceKind } from '../types/index.js';

/** Log groups are named by path rather than by suffix */
export type SuffixedKind = Exclude<ResourceKind, 'log-group'>;

/**
 * Suffix appended to the deployment prefix for each resource kind.
 * Kinds with several instances (firewall rules, alarms, metrics) take a qualifier.
 */
const KIND_SUFFIX: Record<SuffixedKind, (qualifier?: string) => string> = {
  network: () => 'vpc',
  subnet: () => 'subnet',
  'firewall-rule': qualifier => `allow-${qualifier ?? 'all'}`,
  'service-account': () => 'sa',
  disk: () => 'disk',
  instance: () => 'vm',
  secret: () => 'api-key',
  'alert-policy': qualifier => `alarm-${qualifier ?? 'default'}`,
  'uptime-check': () => 'uptime',
  'notification-topic': () => 'alerts',
  dashboard: () => 'dashboard',
  'log-metric': qualifier => `metric-${qualifier ?? 'default'}`,
  budget: () => 'budget'
};

const MAX_NAME_LENGTH = 64;

/**
 * Derive the identifier of a resource from the deployment prefix.
 * Pure: the same inputs always give the same name, which is what lets every
 * phase find what an earlier run created without a mapping table.
 */
export function resourceName(kind: SuffixedKind, prefix: string, qualifier?: string): string {
  const name = sanitizeName(`${prefix}-${KIND_SUFFIX[kind](qualifier)}`);
  return truncateWithHash(name, MAX_NAME_LENGTH);
}

/**
 * Prefix shared by every resource of one deployment: `<project>-<environment>`
 */
export function deploymentPrefix(config: Pick<DeploymentConfig, 'project' | 'environment'>): string {
  return sanitizeName(`${config.project}-${config.environment}`).toLowerCase();
}

/**
 * Sanitize a name to the character set every target service accepts
 * - Replace invalid characters with hyphens
 * - Collapse consecutive hyphens
 * - Ensure it starts with a letter
 */
export function sanitizeName(name: string): string {
  let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
  sanitized = sanitized.replace(/-+/g, '-');
  sanitized = sanitized.replace(/^-+|-+$/g, '');

  if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
    sanitized = 'app-' + sanitized;
  }

  return sanitized || 'app';
}

/**
 * Truncate to the limit, keeping a short content hash so truncated names stay distinct
 */
export function truncateWithHash(name: string, maxLength: number): string {
  if (name.length <= maxLength) {
    return name;
  }

  const hash = createHash('sha256').update(name).digest('hex').substring(0, 6);
  return name.substring(0, maxLength - hash.length - 1).replace(/-+$/, '') + '-' + hash;
}

/**
 * Every name a deployment uses, resolved once per run
 */
export interface ResourceNames {
  prefix: string;
  network: string;
  subnet: string;
  firewallRules: Record<FirewallRuleId, string>;
  serviceAccount: string;
  disk: string;
  instance: string;
  secret: string;
  alertPolicies: Record<AlertPolicyId, string>;
  notificationTopic: string;
  uptimeCheck: string;
  dashboard: string;
  logMetrics: Record<LogMetricId, string>;
  logGroup: string;
  budget: string;
}

export type FirewallRuleId = 'http' | 'https' | 'ssh';
export type AlertPolicyId = 'instance-down' | 'high-cpu';
export type LogMetricId = 'error-rate' | 'requests';

export const FIREWALL_RULE_IDS: readonly FirewallRuleId[] = ['http', 'https', 'ssh'];
export const ALERT_POLICY_IDS: readonly AlertPolicyId[] = ['instance-down', 'high-cpu'];
export const LOG_METRIC_IDS: readonly LogMetricId[] = ['error-rate', 'requests'];

export class ResourceNamingService {
  generateResourceNames(config: Pick<DeploymentConfig, 'project' | 'environment'>): ResourceNames {
    const prefix = deploymentPrefix(config);

    return {
      prefix,
      network: resourceName('network', prefix),
      subnet: resourceName('subnet', prefix),
      firewallRules: {
        http: resourceName('firewall-rule', prefix, 'http'),
        https: resourceName('firewall-rule', prefix, 'https'),
        ssh: resourceName('firewall-rule', prefix, 'ssh')
      },
      serviceAccount: resourceName('service-account', prefix),
      disk: resourceName('disk', prefix),
      instance: resourceName('instance', prefix),
      secret: resourceName('secret', prefix),
      alertPolicies: {
        'instance-down': resourceName('alert-policy', prefix, 'instance-down'),
        'high-cpu': resourceName('alert-policy', prefix, 'high-cpu')
      },
      notificationTopic: resourceName('notification-topic', prefix),
      uptimeCheck: resourceName('uptime-check', prefix),
      dashboard: resourceName('dashboard', prefix),
      logMetrics: {
        'error-rate': resourceName('log-metric', prefix, 'error-rate'),
        requests: resourceName('log-metric', prefix, 'requests')
      },
      logGroup: `/${prefix}/application`,
      budget: resourceName('budget', prefix)
    };
  }
}

export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
