// Core type definitions for the free-tier deployment pipeline

export type InstanceType = 't2.micro' | 't3.micro' | (string & {});

export interface AwsSettings {
  region: string;
  zone: string;
  profile?: string;
}

export interface ComputeSettings {
  instanceType: InstanceType;
  /** Explicit AMI; when absent the latest Ubuntu LTS image is resolved at launch */
  imageId?: string;
}

export interface StorageSettings {
  rootVolumeGb: number;
  dataVolumeGb: number;
  volumeType: 'gp2' | 'gp3' | 'standard';
}

export interface NetworkSettings {
  vpcCidr: string;
  subnetCidr: string;
  sshSourceRange: string;
}

export interface ApplicationSettings {
  /** npm package installed on the instance */
  package: string;
  /** Bin installed by the package plus arguments; defaults to the package's own name */
  startCommand: string;
  port: number;
  rateLimitPerMinute: number;
}

export interface MonitoringSettings {
  notificationEmail?: string;
}

export interface BudgetSettings {
  monthlyLimitUsd: number;
}

export interface TimeoutSettings {
  readinessAttempts: number;
  readinessIntervalMs: number;
}

export interface DeploymentConfig {
  project: string;
  environment: string;
  aws: AwsSettings;
  compute: ComputeSettings;
  storage: StorageSettings;
  network: NetworkSettings;
  application: ApplicationSettings;
  monitoring: MonitoringSettings;
  budget: BudgetSettings;
  state: { directory: string };
  logging: { directory: string };
  timeouts: TimeoutSettings;
  /** Downgrades the overridable compliance rules from HARD to WARN */
  force: boolean;
}

export type ResourceKind =
  | 'network'
  | 'subnet'
  | 'firewall-rule'
  | 'service-account'
  | 'disk'
  | 'instance'
  | 'secret'
  | 'log-group'
  | 'log-metric'
  | 'notification-topic'
  | 'alert-policy'
  | 'uptime-check'
  | 'dashboard'
  | 'budget';

export type ResourceScope =
  | { level: 'global' }
  | { level: 'region'; region: string }
  | { level: 'zone'; zone: string };

/** Attributes a resource exposes once it exists (ids, addresses, ARNs) */
export type ResourceAttributes = Readonly<Record<string, string>>;

export interface ResourceDescriptor<A extends ResourceAttributes = ResourceAttributes> {
  kind: ResourceKind;
  name: string;
  scope: ResourceScope;
  /** Read-only existence predicate: attributes when present, undefined when absent */
  lookup(): Promise<A | undefined>;
  create(): Promise<A>;
  remove(): Promise<void>;
}

export type ReconcileOutcome<A extends ResourceAttributes = ResourceAttributes> =
  | { status: 'created'; kind: ResourceKind; name: string; attributes: A }
  | { status: 'already-exists'; kind: ResourceKind; name: string; attributes: A }
  | { status: 'failed'; kind: ResourceKind; name: string; reason: string };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type RunMode = 'deploy' | 'cleanup' | 'validate-only';

export type CleanupMode = 'dry-run' | 'execute';

/** Ordinal of a deployment phase */
export type PhaseId = 1 | 2 | 3 | 4 | 5 | 6;

export const PHASE_IDS: readonly PhaseId[] = [1, 2, 3, 4, 5, 6];
