import { randomBytes } from 'node:crypto';
import {
  ALERT_POLICY_IDS,
  FIREWALL_RULE_IDS,
  LOG_METRIC_IDS,
  createNamingService,
  type AlertPolicyId,
  type FirewallRuleId,
  type LogMetricId,
  type ResourceNames
} from '../config/naming.js';
import { describeError } from '../errors.js';
import { INSTANCE_POLICY_ARNS } from '../provisioning/iam-manager.js';
import { MANAGED_BY_TAG, rollBack } from '../provisioning/sdk-helpers.js';
import type { AlarmSpec, CloudGateway, LogMetricSpec, Tags } from '../provisioning/types.js';
import type { DeploymentConfig, ResourceDescriptor, ResourceScope } from '../types/index.js';

export type NetworkAttributes = { vpcId: string; cidr: string };
export type SubnetAttributes = { subnetId: string; vpcId: string; zone: string };
export type FirewallRuleAttributes = { groupId: string; port: string };
export type ServiceAccountAttributes = { roleArn: string; instanceProfileArn: string };
export type DiskAttributes = { volumeId: string; sizeGb: string; zone: string };
export type InstanceAttributes = {
  instanceId: string;
  zone: string;
  state: string;
  internalAddress: string;
  externalAddress: string;
};
export type SecretAttributes = { secretName: string; secretArn: string };
export type ArnAttributes = { arn: string };
export type LogMetricAttributes = { metricName: string };
export type UptimeCheckAttributes = { checkId: string; address: string };
export type BudgetAttributes = { budgetName: string };

const FIREWALL_PORTS: Record<FirewallRuleId, number> = { http: 80, https: 443, ssh: 22 };

export const BUDGET_THRESHOLDS_PERCENT: readonly number[] = [50, 90, 100];

export const LOG_RETENTION_DAYS = 7;

/** Where the uptime check reaches the proxy */
export const UPTIME_CHECK_PORT = 443;
export const UPTIME_CHECK_PATH = '/health';

/** Produces the instance's first-boot script; called only when the instance is created */
export type UserDataProvider = () => string;

export function generateApiKey(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Every resource a deployment can own, as fresh descriptors built from the
 * immutable config. Dependencies are re-read through their own lookup inside
 * create(), so no descriptor holds state between calls.
 */
export class ResourceCatalog {
  readonly names: ResourceNames;
  private readonly tags: Tags;

  constructor(
    private readonly config: Readonly<DeploymentConfig>,
    private readonly cloud: CloudGateway,
    private readonly userData: UserDataProvider = () => ''
  ) {
    this.names = createNamingService().generateResourceNames(config);
    this.tags = {
      ...MANAGED_BY_TAG,
      Project: config.project,
      Environment: config.environment
    };
  }

  get metricNamespace(): string {
    return `Deployments/${this.names.prefix}`;
  }

  network(): ResourceDescriptor<NetworkAttributes> {
    const name = this.names.network;
    const { network } = this.cloud;
    return {
      kind: 'network',
      name,
      scope: this.regionScope(),
      lookup: () => network.findNetwork(name),
      create: () => network.createNetwork(name, this.config.network.vpcCidr, this.tags),
      remove: async () => {
        const found = await network.findNetwork(name);
        if (found) {
          await network.deleteNetwork(found.vpcId);
        }
      }
    };
  }

  subnet(): ResourceDescriptor<SubnetAttributes> {
    const name = this.names.subnet;
    const { network } = this.cloud;
    return {
      kind: 'subnet',
      name,
      scope: this.zoneScope(),
      lookup: () => network.findSubnet(name),
      create: async () => {
        const vpc = await this.requireExisting(this.network());
        return network.createSubnet({
          name,
          vpcId: vpc.vpcId,
          cidr: this.config.network.subnetCidr,
          zone: this.config.aws.zone,
          tags: this.tags
        });
      },
      remove: async () => {
        const found = await network.findSubnet(name);
        if (found) {
          await network.deleteSubnet(found.subnetId);
        }
      }
    };
  }

  firewallRule(id: FirewallRuleId): ResourceDescriptor<FirewallRuleAttributes> {
    const name = this.names.firewallRules[id];
    const { network } = this.cloud;
    const port = FIREWALL_PORTS[id];
    const lookup = async (): Promise<FirewallRuleAttributes | undefined> => {
      const found = await network.findFirewallRule(name);
      return found ? { groupId: found.groupId, port: String(found.port) } : undefined;
    };
    return {
      kind: 'firewall-rule',
      name,
      scope: this.regionScope(),
      lookup,
      create: async () => {
        const vpc = await this.requireExisting(this.network());
        const created = await network.createFirewallRule({
          name,
          vpcId: vpc.vpcId,
          port,
          sourceRange: id === 'ssh' ? this.config.network.sshSourceRange : '0.0.0.0/0',
          description: `Allow ${id.toUpperCase()} (tcp/${port})`,
          tags: this.tags
        });
        return { groupId: created.groupId, port: String(created.port) };
      },
      remove: async () => {
        const found = await lookup();
        if (found) {
          await network.deleteFirewallRule(found.groupId);
        }
      }
    };
  }

  firewallRules(): ResourceDescriptor<FirewallRuleAttributes>[] {
    return FIREWALL_RULE_IDS.map(id => this.firewallRule(id));
  }

  serviceAccount(): ResourceDescriptor<ServiceAccountAttributes> {
    const name = this.names.serviceAccount;
    const { identity } = this.cloud;
    return {
      kind: 'service-account',
      name,
      scope: { level: 'global' },
      lookup: () => identity.findServiceAccount(name),
      create: () => identity.createServiceAccount(name, INSTANCE_POLICY_ARNS, this.tags),
      remove: () => identity.deleteServiceAccount(name)
    };
  }

  disk(): ResourceDescriptor<DiskAttributes> {
    const name = this.names.disk;
    const { compute } = this.cloud;
    const lookup = async (): Promise<DiskAttributes | undefined> => {
      const found = await compute.findDisk(name);
      return found ? { volumeId: found.volumeId, sizeGb: String(found.sizeGb), zone: found.zone } : undefined;
    };
    return {
      kind: 'disk',
      name,
      scope: this.zoneScope(),
      lookup,
      create: async () => {
        const created = await compute.createDisk({
          name,
          zone: this.config.aws.zone,
          sizeGb: this.config.storage.dataVolumeGb,
          volumeType: this.config.storage.volumeType,
          tags: this.tags
        });
        return { volumeId: created.volumeId, sizeGb: String(created.sizeGb), zone: created.zone };
      },
      remove: async () => {
        const found = await lookup();
        if (found) {
          await compute.deleteDisk(found.volumeId);
        }
      }
    };
  }

  instance(): ResourceDescriptor<InstanceAttributes> {
    const name = this.names.instance;
    const { compute } = this.cloud;
    const lookup = async (): Promise<InstanceAttributes | undefined> => {
      const found = await compute.findInstance(name);
      if (!found) {
        return undefined;
      }
      return {
        instanceId: found.instanceId,
        zone: found.zone,
        state: found.state,
        internalAddress: found.privateAddress ?? '',
        externalAddress: found.publicAddress ?? ''
      };
    };
    return {
      kind: 'instance',
      name,
      scope: this.zoneScope(),
      lookup,
      create: async () => {
        const subnet = await this.requireExisting(this.subnet());
        const account = await this.requireExisting(this.serviceAccount());
        const disk = await this.requireExisting(this.disk());
        const securityGroupIds: string[] = [];
        for (const rule of this.firewallRules()) {
          securityGroupIds.push((await this.requireExisting(rule)).groupId);
        }

        await compute.launchInstance({
          name,
          zone: this.config.aws.zone,
          instanceType: this.config.compute.instanceType,
          imageId: this.config.compute.imageId,
          subnetId: subnet.subnetId,
          securityGroupIds,
          instanceProfileArn: account.instanceProfileArn,
          rootVolumeGb: this.config.storage.rootVolumeGb,
          volumeType: this.config.storage.volumeType,
          dataVolumeId: disk.volumeId,
          userData: this.userData(),
          tags: this.tags
        });
        const launched = await lookup();
        if (!launched) {
          throw new Error(`instance ${name} was launched but cannot be found`);
        }
        return launched;
      },
      remove: async () => {
        const found = await lookup();
        if (found) {
          await compute.terminateInstance(found.instanceId);
        }
      }
    };
  }

  /** Created with a freshly generated key as its first version */
  secret(): ResourceDescriptor<SecretAttributes> {
    const name = this.names.secret;
    const { secrets } = this.cloud;
    return {
      kind: 'secret',
      name,
      scope: this.regionScope(),
      lookup: async () => {
        const found = await secrets.findSecret(name);
        return found ? { secretName: found.name, secretArn: found.arn } : undefined;
      },
      create: async () => {
        const created = await secrets.create(name, this.tags);
        await secrets.addVersion(name, generateApiKey());
        return { secretName: created.name, secretArn: created.arn };
      },
      remove: async () => {
        if (await secrets.findSecret(name)) {
          await secrets.deleteSecret(name);
        }
      }
    };
  }

  alertPolicy(id: AlertPolicyId): ResourceDescriptor<ArnAttributes> {
    const name = this.names.alertPolicies[id];
    const { monitoring } = this.cloud;
    return {
      kind: 'alert-policy',
      name,
      scope: this.regionScope(),
      lookup: () => monitoring.findAlarm(name),
      create: async () => {
        const instance = await this.requireExisting(this.instance());
        const topic = await this.requireExisting(this.notificationTopic());
        return monitoring.putAlarm({ ...this.alarmSpec(id, name, instance.instanceId), actionArns: [topic.arn] });
      },
      remove: async () => {
        if (await monitoring.findAlarm(name)) {
          await monitoring.deleteAlarm(name);
        }
      }
    };
  }

  dashboard(): ResourceDescriptor<ArnAttributes> {
    const name = this.names.dashboard;
    const { monitoring } = this.cloud;
    return {
      kind: 'dashboard',
      name,
      scope: { level: 'global' },
      lookup: () => monitoring.findDashboard(name),
      create: async () => {
        const instance = await this.requireExisting(this.instance());
        return monitoring.putDashboard(name, this.dashboardBody(instance.instanceId));
      },
      remove: async () => {
        if (await monitoring.findDashboard(name)) {
          await monitoring.deleteDashboard(name);
        }
      }
    };
  }

  logMetric(id: LogMetricId): ResourceDescriptor<LogMetricAttributes> {
    const name = this.names.logMetrics[id];
    const logGroupName = this.names.logGroup;
    const { monitoring } = this.cloud;
    return {
      kind: 'log-metric',
      name,
      scope: this.regionScope(),
      lookup: () => monitoring.findLogMetric(name, logGroupName),
      create: async () => {
        await this.requireExisting(this.logGroup());
        return monitoring.putLogMetric(this.logMetricSpec(id, name));
      },
      remove: async () => {
        if (await monitoring.findLogMetric(name, logGroupName)) {
          await monitoring.deleteLogMetric(name, logGroupName);
        }
      }
    };
  }

  /** Application log group the metric filters read from */
  logGroup(): ResourceDescriptor<ArnAttributes> {
    const name = this.names.logGroup;
    const { monitoring } = this.cloud;
    return {
      kind: 'log-group',
      name,
      scope: this.regionScope(),
      lookup: () => monitoring.findLogGroup(name),
      create: () => monitoring.createLogGroup(name, LOG_RETENTION_DAYS, this.tags),
      remove: async () => {
        if (await monitoring.findLogGroup(name)) {
          await monitoring.deleteLogGroup(name);
        }
      }
    };
  }

  /**
   * Topic every alarm notifies. The configured address is subscribed when
   * the topic is created; without one the alarms only change state.
   */
  notificationTopic(): ResourceDescriptor<ArnAttributes> {
    const name = this.names.notificationTopic;
    const { notifications } = this.cloud;
    const email = this.config.monitoring.notificationEmail;
    return {
      kind: 'notification-topic',
      name,
      scope: this.regionScope(),
      lookup: () => notifications.findTopic(name),
      create: async () => {
        const topic = await notifications.createTopic(name, this.tags);
        if (email) {
          try {
            await notifications.subscribeEmail(topic.arn, email);
          } catch (error) {
            const rollback = await rollBack([() => notifications.deleteTopic(topic.arn)]);
            throw rollback ? new Error(`${describeError(error)}${rollback}`) : error;
          }
        }
        return topic;
      },
      remove: async () => {
        const found = await notifications.findTopic(name);
        if (found) {
          await notifications.deleteTopic(found.arn);
        }
      }
    };
  }

  /** External HTTPS check against the instance's public address */
  uptimeCheck(): ResourceDescriptor<UptimeCheckAttributes> {
    const name = this.names.uptimeCheck;
    const { uptime } = this.cloud;
    return {
      kind: 'uptime-check',
      name,
      scope: { level: 'global' },
      lookup: () => uptime.findUptimeCheck(name),
      create: async () => {
        const instance = await this.requireExisting(this.instance());
        if (!instance.externalAddress) {
          throw new Error(`instance ${instance.instanceId} has no public address`);
        }
        return uptime.createUptimeCheck({
          name,
          address: instance.externalAddress,
          port: UPTIME_CHECK_PORT,
          path: UPTIME_CHECK_PATH,
          tags: this.tags
        });
      },
      remove: async () => {
        const found = await uptime.findUptimeCheck(name);
        if (found) {
          await uptime.deleteUptimeCheck(found.checkId);
        }
      }
    };
  }

  budget(): ResourceDescriptor<BudgetAttributes> {
    const name = this.names.budget;
    const { budgets } = this.cloud;
    return {
      kind: 'budget',
      name,
      scope: { level: 'global' },
      lookup: async () => {
        const found = await budgets.findBudget(name);
        return found ? { budgetName: found.name } : undefined;
      },
      create: async () => {
        const created = await budgets.createBudget({
          name,
          limitUsd: this.config.budget.monthlyLimitUsd,
          thresholdsPercent: BUDGET_THRESHOLDS_PERCENT,
          notificationEmail: this.config.monitoring.notificationEmail
        });
        return { budgetName: created.name };
      },
      remove: async () => {
        if (await budgets.findBudget(name)) {
          await budgets.deleteBudget(name);
        }
      }
    };
  }

  /** What the instance is launched into, in creation order */
  infrastructureDependencies(): ResourceDescriptor[] {
    return [
      this.network(),
      this.subnet(),
      ...this.firewallRules(),
      this.serviceAccount(),
      this.disk()
    ];
  }

  /** Phase 5 body, in creation order */
  monitoringResources(): ResourceDescriptor[] {
    return [
      this.logGroup(),
      ...LOG_METRIC_IDS.map(id => this.logMetric(id)),
      this.notificationTopic(),
      ...ALERT_POLICY_IDS.map(id => this.alertPolicy(id)),
      this.uptimeCheck(),
      this.dashboard()
    ];
  }

  /**
   * Dependency-safe deletion order: dependents before what they reference
   */
  cleanupOrder(): ResourceDescriptor[] {
    return [
      this.instance(),
      this.disk(),
      ...this.firewallRules(),
      this.subnet(),
      this.network(),
      this.serviceAccount(),
      this.secret(),
      this.uptimeCheck(),
      ...ALERT_POLICY_IDS.map(id => this.alertPolicy(id)),
      this.notificationTopic(),
      this.dashboard(),
      ...LOG_METRIC_IDS.map(id => this.logMetric(id)),
      this.logGroup(),
      this.budget()
    ];
  }

  private alarmSpec(id: AlertPolicyId, name: string, instanceId: string): Omit<AlarmSpec, 'actionArns'> {
    const dimensions = { InstanceId: instanceId };
    switch (id) {
      case 'instance-down':
        return {
          name,
          description: `${this.names.instance} failed its status checks`,
          namespace: 'AWS/EC2',
          metricName: 'StatusCheckFailed',
          dimensions,
          comparison: 'GreaterThanOrEqualToThreshold',
          threshold: 1,
          periodSeconds: 60,
          evaluationPeriods: 5,
          statistic: 'Maximum'
        };
      case 'high-cpu':
        return {
          name,
          description: `${this.names.instance} CPU above 80%`,
          namespace: 'AWS/EC2',
          metricName: 'CPUUtilization',
          dimensions,
          comparison: 'GreaterThanThreshold',
          threshold: 80,
          periodSeconds: 300,
          evaluationPeriods: 2,
          statistic: 'Average'
        };
    }
  }

  private logMetricSpec(id: LogMetricId, name: string): LogMetricSpec {
    const base = {
      name,
      logGroupName: this.names.logGroup,
      metricNamespace: this.metricNamespace
    };
    switch (id) {
      case 'error-rate':
        return { ...base, filterPattern: '?ERROR ?Error ?error', metricName: 'ApplicationErrors' };
      case 'requests':
        return { ...base, filterPattern: '?GET ?POST', metricName: 'ApplicationRequests' };
    }
  }

  private dashboardBody(instanceId: string): string {
    const region = this.config.aws.region;
    const widget = (title: string, metrics: string[][], x: number, y: number) => ({
      type: 'metric',
      x,
      y,
      width: 12,
      height: 6,
      properties: { title, region, metrics, period: 300, stat: 'Average', view: 'timeSeries' }
    });
    return JSON.stringify({
      widgets: [
        widget('CPU utilization', [['AWS/EC2', 'CPUUtilization', 'InstanceId', instanceId]], 0, 0),
        widget('Status check failures', [['AWS/EC2', 'StatusCheckFailed', 'InstanceId', instanceId]], 12, 0),
        widget('Application requests', [[this.metricNamespace, 'ApplicationRequests']], 0, 6),
        widget('Application errors', [[this.metricNamespace, 'ApplicationErrors']], 12, 6)
      ]
    });
  }

  private async requireExisting<A extends Readonly<Record<string, string>>>(descriptor: ResourceDescriptor<A>): Promise<A> {
    const found = await descriptor.lookup();
    if (!found) {
      throw new Error(`${descriptor.kind} ${descriptor.name} does not exist`);
    }
    return found;
  }

  private regionScope(): ResourceScope {
    return { level: 'region', region: this.config.aws.region };
  }

  private zoneScope(): ResourceScope {
    return { level: 'zone', zone: this.config.aws.zone };
  }
}
