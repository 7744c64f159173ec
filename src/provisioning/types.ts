// Provisioning-specific types: the cloud operations the pipeline consumes.
// AWS-backed managers implement these; tests substitute an in-memory cloud.

export type Tags = Readonly<Record<string, string>>;

export interface NetworkInfo {
  vpcId: string;
  cidr: string;
}

export interface SubnetInfo {
  subnetId: string;
  vpcId: string;
  zone: string;
}

export interface FirewallRuleInfo {
  groupId: string;
  vpcId: string;
  port: number;
}

export interface CreateFirewallRuleOptions {
  name: string;
  vpcId: string;
  port: number;
  sourceRange: string;
  description: string;
  tags: Tags;
}

export interface NetworkApi {
  findNetwork(name: string): Promise<NetworkInfo | undefined>;
  /** Creates the VPC with its internet gateway and default route; a failure removes what was built */
  createNetwork(name: string, cidr: string, tags: Tags): Promise<NetworkInfo>;
  deleteNetwork(vpcId: string): Promise<void>;
  findSubnet(name: string): Promise<SubnetInfo | undefined>;
  createSubnet(options: { name: string; vpcId: string; cidr: string; zone: string; tags: Tags }): Promise<SubnetInfo>;
  deleteSubnet(subnetId: string): Promise<void>;
  /** Undefined for a group that has no ingress entry yet */
  findFirewallRule(name: string): Promise<FirewallRuleInfo | undefined>;
  createFirewallRule(options: CreateFirewallRuleOptions): Promise<FirewallRuleInfo>;
  deleteFirewallRule(groupId: string): Promise<void>;
}

export interface ServiceAccountInfo {
  roleArn: string;
  instanceProfileArn: string;
}

export interface IdentityApi {
  findServiceAccount(name: string): Promise<ServiceAccountInfo | undefined>;
  createServiceAccount(name: string, policyArns: readonly string[], tags: Tags): Promise<ServiceAccountInfo>;
  deleteServiceAccount(name: string): Promise<void>;
}

export interface DiskInfo {
  volumeId: string;
  sizeGb: number;
  zone: string;
  state: string;
}

export type InstanceState = 'pending' | 'running' | 'stopping' | 'stopped' | 'shutting-down' | 'terminated';

export interface InstanceInfo {
  instanceId: string;
  zone: string;
  state: InstanceState;
  instanceType: string;
  privateAddress?: string;
  publicAddress?: string;
}

export interface LaunchInstanceOptions {
  name: string;
  zone: string;
  instanceType: string;
  imageId?: string;
  subnetId: string;
  securityGroupIds: readonly string[];
  instanceProfileArn: string;
  rootVolumeGb: number;
  volumeType: string;
  dataVolumeId: string;
  userData: string;
  tags: Tags;
}

export interface ComputeApi {
  findDisk(name: string): Promise<DiskInfo | undefined>;
  createDisk(options: { name: string; zone: string; sizeGb: number; volumeType: string; tags: Tags }): Promise<DiskInfo>;
  deleteDisk(volumeId: string): Promise<void>;
  findInstance(name: string): Promise<InstanceInfo | undefined>;
  /** Launches, waits until running and attaches the data volume; terminates the instance when a later step fails */
  launchInstance(options: LaunchInstanceOptions): Promise<InstanceInfo>;
  /** Terminates and waits until the instance no longer holds its dependencies */
  terminateInstance(instanceId: string): Promise<void>;
}

/** Read-only account inventory consumed by the compliance guard */
export interface InventoryApi {
  listInstances(instanceTypes: readonly string[]): Promise<Array<{ instanceId: string; name?: string; region: string; instanceType: string }>>;
  listVolumes(volumeTypes: readonly string[]): Promise<Array<{ volumeId: string; name?: string; sizeGb: number }>>;
  listStaticAddresses(): Promise<Array<{ allocationId: string; publicAddress: string }>>;
}

export interface SecretInfo {
  name: string;
  arn: string;
}

export interface SecretStoreApi {
  findSecret(name: string): Promise<SecretInfo | undefined>;
  create(name: string, tags: Tags): Promise<SecretInfo>;
  addVersion(name: string, value: string): Promise<void>;
  /** Latest version's value, or undefined when the secret holds no version */
  accessLatest(name: string): Promise<string | undefined>;
  grantAccessor(name: string, principalArn: string): Promise<void>;
  deleteSecret(name: string): Promise<void>;
}

export interface AlarmSpec {
  name: string;
  description: string;
  namespace: string;
  metricName: string;
  dimensions: Readonly<Record<string, string>>;
  comparison: 'GreaterThanThreshold' | 'GreaterThanOrEqualToThreshold' | 'LessThanThreshold';
  threshold: number;
  periodSeconds: number;
  evaluationPeriods: number;
  statistic: 'Average' | 'Maximum' | 'Sum';
  /** Notified when the alarm fires */
  actionArns: readonly string[];
}

export interface LogMetricSpec {
  name: string;
  logGroupName: string;
  filterPattern: string;
  metricNamespace: string;
  metricName: string;
}

export interface MonitoringApi {
  findAlarm(name: string): Promise<{ arn: string } | undefined>;
  putAlarm(spec: AlarmSpec): Promise<{ arn: string }>;
  deleteAlarm(name: string): Promise<void>;
  findDashboard(name: string): Promise<{ arn: string } | undefined>;
  putDashboard(name: string, body: string): Promise<{ arn: string }>;
  deleteDashboard(name: string): Promise<void>;
  findLogGroup(name: string): Promise<{ arn: string } | undefined>;
  createLogGroup(name: string, retentionDays: number, tags: Tags): Promise<{ arn: string }>;
  deleteLogGroup(name: string): Promise<void>;
  findLogMetric(name: string, logGroupName: string): Promise<{ metricName: string } | undefined>;
  /** The log group must already exist */
  putLogMetric(spec: LogMetricSpec): Promise<{ metricName: string }>;
  deleteLogMetric(name: string, logGroupName: string): Promise<void>;
}

export interface NotificationApi {
  findTopic(name: string): Promise<{ arn: string } | undefined>;
  createTopic(name: string, tags: Tags): Promise<{ arn: string }>;
  /** The address receives a confirmation mail before any alert */
  subscribeEmail(topicArn: string, address: string): Promise<void>;
  deleteTopic(topicArn: string): Promise<void>;
}

export interface UptimeCheckSpec {
  name: string;
  address: string;
  port: number;
  path: string;
  tags: Tags;
}

export interface UptimeCheckInfo {
  checkId: string;
  address: string;
}

/** External HTTPS checks run from the provider's own locations */
export interface UptimeCheckApi {
  findUptimeCheck(name: string): Promise<UptimeCheckInfo | undefined>;
  createUptimeCheck(spec: UptimeCheckSpec): Promise<UptimeCheckInfo>;
  deleteUptimeCheck(checkId: string): Promise<void>;
}

export interface BudgetSpec {
  name: string;
  limitUsd: number;
  thresholdsPercent: readonly number[];
  notificationEmail?: string;
}

export interface BudgetApi {
  /** False when billing data cannot be reached for the account */
  billingAccessible(): Promise<boolean>;
  findBudget(name: string): Promise<{ name: string } | undefined>;
  createBudget(spec: BudgetSpec): Promise<{ name: string }>;
  deleteBudget(name: string): Promise<void>;
}

export interface CallerIdentity {
  accountId: string;
  arn: string;
}

export interface AccountApi {
  /** Throws when no credentials are configured or they are rejected */
  whoAmI(): Promise<CallerIdentity>;
}

export interface RemoteCommandResult {
  ok: boolean;
  exitCode: number;
  output: string;
}

export interface RemoteCommandApi {
  run(instanceId: string, commands: readonly string[], options?: { timeoutSeconds?: number }): Promise<RemoteCommandResult>;
}

/**
 * Every cloud-facing collaborator of the pipeline, built once per run
 */
export interface CloudGateway {
  account: AccountApi;
  network: NetworkApi;
  identity: IdentityApi;
  compute: ComputeApi;
  inventory: InventoryApi;
  secrets: SecretStoreApi;
  monitoring: MonitoringApi;
  notifications: NotificationApi;
  uptime: UptimeCheckApi;
  budgets: BudgetApi;
  remote: RemoteCommandApi;
}
