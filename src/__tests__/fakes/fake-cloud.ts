import type { ListedAddress, ListedInstance, ListedVolume } from '../../compliance/types.js';
import type {
  AlarmSpec,
  BudgetSpec,
  CallerIdentity,
  CloudGateway,
  CreateFirewallRuleOptions,
  DiskInfo,
  FirewallRuleInfo,
  InstanceInfo,
  LaunchInstanceOptions,
  LogMetricSpec,
  NetworkInfo,
  RemoteCommandResult,
  SecretInfo,
  ServiceAccountInfo,
  SubnetInfo,
  UptimeCheckInfo,
  UptimeCheckSpec
} from '../../provisioning/types.js';

interface StoredSecret {
  info: SecretInfo;
  versions: string[];
  accessors: string[];
}

interface StoredTopic {
  arn: string;
  subscriptions: string[];
}

interface StoredInstance extends InstanceInfo {
  name: string;
  launch: LaunchInstanceOptions;
}

export interface RemoteCall {
  instanceId: string;
  commands: readonly string[];
}

/**
 * In-memory cloud. Every port call is recorded by method name; `failOn`
 * makes a method throw until `clearFailures` is called.
 */
export class FakeCloud implements CloudGateway {
  readonly calls: string[] = [];
  readonly remoteCalls: RemoteCall[] = [];
  readonly data = {
    networks: new Map<string, NetworkInfo>(),
    subnets: new Map<string, SubnetInfo>(),
    firewallRules: new Map<string, FirewallRuleInfo>(),
    serviceAccounts: new Map<string, ServiceAccountInfo>(),
    disks: new Map<string, DiskInfo>(),
    instances: new Map<string, StoredInstance>(),
    secrets: new Map<string, StoredSecret>(),
    alarms: new Map<string, AlarmSpec>(),
    dashboards: new Map<string, string>(),
    logGroups: new Map<string, number>(),
    logMetrics: new Map<string, LogMetricSpec>(),
    topics: new Map<string, StoredTopic>(),
    uptimeChecks: new Map<string, UptimeCheckSpec & UptimeCheckInfo>(),
    budgets: new Map<string, BudgetSpec>()
  };

  /** Instances, volumes and addresses that belong to nobody in this deployment */
  readonly foreign: { instances: ListedInstance[]; volumes: ListedVolume[]; addresses: ListedAddress[] } = {
    instances: [],
    volumes: [],
    addresses: []
  };

  billingAccessible = true;
  caller: CallerIdentity = { accountId: '123456789012', arn: 'arn:aws:iam::123456789012:user/tester' };
  /** Decides the result of every remote command; succeeds by default */
  remoteHandler: (call: RemoteCall) => RemoteCommandResult = () => ({ ok: true, exitCode: 0, output: '' });

  private readonly failures = new Map<string, string>();
  private sequence = 0;

  failOn(method: string, message = `${method} failed`): void {
    this.failures.set(method, message);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Number of recorded calls to `method` */
  count(method: string): number {
    return this.calls.filter(call => call === method).length;
  }

  /** Calls that create or change something */
  mutations(): number {
    return this.calls.filter(call => /^(create|put|launch|add|grant|subscribe)/.test(call)).length;
  }

  private record(method: string): void {
    this.calls.push(method);
    const failure = this.failures.get(method);
    if (failure !== undefined) {
      throw new Error(failure);
    }
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${String(this.sequence).padStart(4, '0')}`;
  }

  readonly account = {
    whoAmI: async (): Promise<CallerIdentity> => {
      this.record('whoAmI');
      return this.caller;
    }
  };

  readonly network = {
    findNetwork: async (name: string) => {
      this.record('findNetwork');
      return this.data.networks.get(name);
    },
    createNetwork: async (name: string, cidr: string) => {
      this.record('createNetwork');
      const created = { vpcId: this.nextId('vpc'), cidr };
      this.data.networks.set(name, created);
      return created;
    },
    deleteNetwork: async (vpcId: string) => {
      this.record('deleteNetwork');
      deleteWhere(this.data.networks, entry => entry.vpcId === vpcId);
    },
    findSubnet: async (name: string) => {
      this.record('findSubnet');
      return this.data.subnets.get(name);
    },
    createSubnet: async (options: { name: string; vpcId: string; zone: string }) => {
      this.record('createSubnet');
      const created = { subnetId: this.nextId('subnet'), vpcId: options.vpcId, zone: options.zone };
      this.data.subnets.set(options.name, created);
      return created;
    },
    deleteSubnet: async (subnetId: string) => {
      this.record('deleteSubnet');
      deleteWhere(this.data.subnets, entry => entry.subnetId === subnetId);
    },
    findFirewallRule: async (name: string) => {
      this.record('findFirewallRule');
      return this.data.firewallRules.get(name);
    },
    createFirewallRule: async (options: CreateFirewallRuleOptions) => {
      this.record('createFirewallRule');
      const created = { groupId: this.nextId('sg'), vpcId: options.vpcId, port: options.port };
      this.data.firewallRules.set(options.name, created);
      return created;
    },
    deleteFirewallRule: async (groupId: string) => {
      this.record('deleteFirewallRule');
      deleteWhere(this.data.firewallRules, entry => entry.groupId === groupId);
    }
  };

  readonly identity = {
    findServiceAccount: async (name: string) => {
      this.record('findServiceAccount');
      return this.data.serviceAccounts.get(name);
    },
    createServiceAccount: async (name: string) => {
      this.record('createServiceAccount');
      const created = {
        roleArn: `arn:aws:iam::123456789012:role/${name}`,
        instanceProfileArn: `arn:aws:iam::123456789012:instance-profile/${name}`
      };
      this.data.serviceAccounts.set(name, created);
      return created;
    },
    deleteServiceAccount: async (name: string) => {
      this.record('deleteServiceAccount');
      this.data.serviceAccounts.delete(name);
    }
  };

  readonly compute = {
    findDisk: async (name: string) => {
      this.record('findDisk');
      return this.data.disks.get(name);
    },
    createDisk: async (options: { name: string; zone: string; sizeGb: number }) => {
      this.record('createDisk');
      const created = { volumeId: this.nextId('vol'), sizeGb: options.sizeGb, zone: options.zone, state: 'available' };
      this.data.disks.set(options.name, created);
      return created;
    },
    deleteDisk: async (volumeId: string) => {
      this.record('deleteDisk');
      deleteWhere(this.data.disks, entry => entry.volumeId === volumeId);
    },
    findInstance: async (name: string): Promise<InstanceInfo | undefined> => {
      this.record('findInstance');
      return this.data.instances.get(name);
    },
    launchInstance: async (options: LaunchInstanceOptions): Promise<InstanceInfo> => {
      this.record('launchInstance');
      const created: StoredInstance = {
        name: options.name,
        launch: options,
        instanceId: this.nextId('i'),
        zone: options.zone,
        state: 'running',
        instanceType: options.instanceType,
        privateAddress: '10.0.1.10',
        publicAddress: '203.0.113.10'
      };
      this.data.instances.set(options.name, created);
      return created;
    },
    terminateInstance: async (instanceId: string) => {
      this.record('terminateInstance');
      deleteWhere(this.data.instances, entry => entry.instanceId === instanceId);
    }
  };

  readonly inventory = {
    listInstances: async (instanceTypes: readonly string[]) => {
      this.record('listInstances');
      const own = [...this.data.instances.values()].map(entry => ({
        instanceId: entry.instanceId,
        name: entry.name,
        region: entry.zone.slice(0, -1),
        instanceType: entry.instanceType
      }));
      return [...own, ...this.foreign.instances].filter(entry => instanceTypes.includes(entry.instanceType));
    },
    listVolumes: async () => {
      this.record('listVolumes');
      const own = [...this.data.disks.entries()].map(([name, disk]) => ({ volumeId: disk.volumeId, name, sizeGb: disk.sizeGb }));
      return [...own, ...this.foreign.volumes];
    },
    listStaticAddresses: async () => {
      this.record('listStaticAddresses');
      return [...this.foreign.addresses];
    }
  };

  readonly secrets = {
    findSecret: async (name: string) => {
      this.record('findSecret');
      return this.data.secrets.get(name)?.info;
    },
    create: async (name: string) => {
      this.record('createSecret');
      const info = { name, arn: `arn:aws:secretsmanager:us-east-1:123456789012:secret:${name}` };
      this.data.secrets.set(name, { info, versions: [], accessors: [] });
      return info;
    },
    addVersion: async (name: string, value: string) => {
      this.record('addSecretVersion');
      this.requireSecret(name).versions.push(value);
    },
    accessLatest: async (name: string) => {
      this.record('accessLatest');
      return this.data.secrets.get(name)?.versions.at(-1);
    },
    grantAccessor: async (name: string, principalArn: string) => {
      this.record('grantAccessor');
      this.requireSecret(name).accessors.push(principalArn);
    },
    deleteSecret: async (name: string) => {
      this.record('deleteSecret');
      this.data.secrets.delete(name);
    }
  };

  readonly monitoring = {
    findAlarm: async (name: string) => {
      this.record('findAlarm');
      return this.data.alarms.has(name) ? { arn: `arn:aws:cloudwatch:alarm:${name}` } : undefined;
    },
    putAlarm: async (spec: AlarmSpec) => {
      this.record('putAlarm');
      this.data.alarms.set(spec.name, spec);
      return { arn: `arn:aws:cloudwatch:alarm:${spec.name}` };
    },
    deleteAlarm: async (name: string) => {
      this.record('deleteAlarm');
      this.data.alarms.delete(name);
    },
    findDashboard: async (name: string) => {
      this.record('findDashboard');
      return this.data.dashboards.has(name) ? { arn: `arn:aws:cloudwatch::dashboard/${name}` } : undefined;
    },
    putDashboard: async (name: string, body: string) => {
      this.record('putDashboard');
      this.data.dashboards.set(name, body);
      return { arn: `arn:aws:cloudwatch::dashboard/${name}` };
    },
    deleteDashboard: async (name: string) => {
      this.record('deleteDashboard');
      this.data.dashboards.delete(name);
    },
    findLogGroup: async (name: string) => {
      this.record('findLogGroup');
      return this.data.logGroups.has(name) ? { arn: `arn:aws:logs:us-east-1:123456789012:log-group:${name}` } : undefined;
    },
    createLogGroup: async (name: string, retentionDays: number) => {
      this.record('createLogGroup');
      this.data.logGroups.set(name, retentionDays);
      return { arn: `arn:aws:logs:us-east-1:123456789012:log-group:${name}` };
    },
    deleteLogGroup: async (name: string) => {
      this.record('deleteLogGroup');
      this.data.logGroups.delete(name);
    },
    findLogMetric: async (name: string) => {
      this.record('findLogMetric');
      const found = this.data.logMetrics.get(name);
      return found ? { metricName: found.metricName } : undefined;
    },
    putLogMetric: async (spec: LogMetricSpec) => {
      this.record('putLogMetric');
      this.data.logMetrics.set(spec.name, spec);
      return { metricName: spec.metricName };
    },
    deleteLogMetric: async (name: string) => {
      this.record('deleteLogMetric');
      this.data.logMetrics.delete(name);
    }
  };

  readonly notifications = {
    findTopic: async (name: string) => {
      this.record('findTopic');
      const found = this.data.topics.get(name);
      return found ? { arn: found.arn } : undefined;
    },
    createTopic: async (name: string) => {
      this.record('createTopic');
      const arn = `arn:aws:sns:us-east-1:123456789012:${name}`;
      this.data.topics.set(name, { arn, subscriptions: [] });
      return { arn };
    },
    subscribeEmail: async (topicArn: string, address: string) => {
      this.record('subscribeEmail');
      const topic = [...this.data.topics.values()].find(entry => entry.arn === topicArn);
      if (!topic) {
        throw new Error(`topic ${topicArn} does not exist`);
      }
      topic.subscriptions.push(address);
    },
    deleteTopic: async (topicArn: string) => {
      this.record('deleteTopic');
      deleteWhere(this.data.topics, entry => entry.arn === topicArn);
    }
  };

  readonly uptime = {
    findUptimeCheck: async (name: string): Promise<UptimeCheckInfo | undefined> => {
      this.record('findUptimeCheck');
      const found = this.data.uptimeChecks.get(name);
      return found ? { checkId: found.checkId, address: found.address } : undefined;
    },
    createUptimeCheck: async (spec: UptimeCheckSpec): Promise<UptimeCheckInfo> => {
      this.record('createUptimeCheck');
      const checkId = this.nextId('hc');
      this.data.uptimeChecks.set(spec.name, { ...spec, checkId });
      return { checkId, address: spec.address };
    },
    deleteUptimeCheck: async (checkId: string) => {
      this.record('deleteUptimeCheck');
      deleteWhere(this.data.uptimeChecks, entry => entry.checkId === checkId);
    }
  };

  readonly budgets = {
    billingAccessible: async () => {
      this.record('billingAccessible');
      return this.billingAccessible;
    },
    findBudget: async (name: string) => {
      this.record('findBudget');
      return this.data.budgets.has(name) ? { name } : undefined;
    },
    createBudget: async (spec: BudgetSpec) => {
      this.record('createBudget');
      this.data.budgets.set(spec.name, spec);
      return { name: spec.name };
    },
    deleteBudget: async (name: string) => {
      this.record('deleteBudget');
      this.data.budgets.delete(name);
    }
  };

  readonly remote = {
    run: async (instanceId: string, commands: readonly string[]): Promise<RemoteCommandResult> => {
      this.record('remoteRun');
      const call = { instanceId, commands };
      this.remoteCalls.push(call);
      return this.remoteHandler(call);
    }
  };

  /** Resources of every kind currently held */
  resourceCount(): number {
    return Object.values(this.data).reduce((total, map) => total + map.size, 0);
  }

  private requireSecret(name: string): StoredSecret {
    const found = this.data.secrets.get(name);
    if (!found) {
      throw new Error(`secret ${name} does not exist`);
    }
    return found;
  }
}

function deleteWhere<V>(map: Map<string, V>, predicate: (value: V) => boolean): void {
  for (const [key, value] of map) {
    if (predicate(value)) {
      map.delete(key);
    }
  }
}
