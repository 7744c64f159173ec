import { chmod, mkdir, readFile, readdir, rm, rmdir, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseEnv } from 'dotenv';
import Joi from 'joi';
import { MissingStateError, StateOwnershipError, describeError } from '../errors.js';
import type { PhaseId } from '../types/index.js';

export type AccountRecord = { accountId: string; callerArn: string; validatedAt: string };
export type InstanceRecord = {
  name: string;
  instanceId: string;
  zone: string;
  internalAddress: string;
  externalAddress: string;
};
/** Pointer to the stored key; the key itself is never written locally */
export type CredentialRecord = { secretName: string; secretArn: string };
export type DeploymentRecord = {
  deployedAt: string;
  environment: string;
  httpUrl: string;
  httpsUrl: string;
  healthUrl: string;
};
export type MonitoringRecord = { dashboardName: string; alarmNames: string; logGroupName: string };

export interface StateRecords {
  account: AccountRecord;
  instance: InstanceRecord;
  credential: CredentialRecord;
  deployment: DeploymentRecord;
  monitoring: MonitoringRecord;
}

export type StateKey = keyof StateRecords;

export const STATE_KEYS: readonly StateKey[] = ['account', 'instance', 'credential', 'deployment', 'monitoring'];

/** The single phase allowed to write each record */
export const STATE_OWNERS: Readonly<Record<StateKey, PhaseId>> = {
  account: 1,
  instance: 2,
  credential: 3,
  deployment: 4,
  monitoring: 5
};

const RESTRICTED_KEYS: ReadonlySet<StateKey> = new Set<StateKey>(['credential']);

export const HEALTH_REPORT_FILE = 'health-check-report.txt';

const text = () => Joi.string().required();
const optionalText = () => Joi.string().allow('').required();

const RECORD_SCHEMAS: { [K in StateKey]: Joi.ObjectSchema<StateRecords[K]> } = {
  account: Joi.object<AccountRecord>({
    accountId: text(),
    callerArn: text(),
    validatedAt: text()
  }),
  instance: Joi.object<InstanceRecord>({
    name: text(),
    instanceId: text(),
    zone: text(),
    internalAddress: optionalText(),
    externalAddress: optionalText()
  }),
  credential: Joi.object<CredentialRecord>({
    secretName: text(),
    secretArn: text()
  }),
  deployment: Joi.object<DeploymentRecord>({
    deployedAt: text(),
    environment: text(),
    httpUrl: text(),
    httpsUrl: text(),
    healthUrl: text()
  }),
  monitoring: Joi.object<MonitoringRecord>({
    dashboardName: text(),
    alarmNames: optionalText(),
    logGroupName: text()
  })
};

const toEnvName = (field: string): string => field.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
const toFieldName = (envName: string): string =>
  envName.toLowerCase().replace(/_([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());

/**
 * Serialize one record as `KEY="value"` lines
 */
export function serializeRecord(record: Readonly<Record<string, string>>): string {
  return Object.entries(record)
    .map(([field, value]) => {
      if (/["\r\n]/.test(value)) {
        throw new Error(`Value of ${field} cannot contain quotes or line breaks`);
      }
      return `${toEnvName(field)}="${value}"`;
    })
    .join('\n') + '\n';
}

/**
 * Parse and validate one record file's content
 */
export function parseRecord<K extends StateKey>(key: K, content: string): StateRecords[K] {
  const raw: Record<string, string> = {};
  for (const [envName, value] of Object.entries(parseEnv(content))) {
    raw[toFieldName(envName)] = value;
  }

  const { error, value } = RECORD_SCHEMAS[key].validate(raw, { stripUnknown: true, abortEarly: false });
  if (error) {
    throw new Error(`Deployment state "${key}" is malformed: ${error.details.map(d => d.message).join('; ')}`);
  }
  return value;
}

/**
 * Cross-phase records for one environment, one human-editable file per key under
 * `<root>/<environment>/`.
 */
export class DeploymentStateStore {
  readonly directory: string;

  constructor(root: string, environment: string) {
    this.directory = join(root, environment);
  }

  get reportPath(): string {
    return join(this.directory, HEALTH_REPORT_FILE);
  }

  pathOf(key: StateKey): string {
    return join(this.directory, `${key}.env`);
  }

  async write<K extends StateKey>(phase: PhaseId, key: K, record: StateRecords[K]): Promise<void> {
    const owner = STATE_OWNERS[key];
    if (owner !== phase) {
      throw new StateOwnershipError(key, owner, phase);
    }

    await mkdir(this.directory, { recursive: true });
    const path = this.pathOf(key);
    const mode = RESTRICTED_KEYS.has(key) ? 0o600 : 0o644;
    await writeFile(path, serializeRecord(record), { mode });
    // mode only applies when the file is created
    await chmod(path, mode);
  }

  /**
   * Throws MissingStateError naming the producing phase when the record is absent
   */
  async read<K extends StateKey>(key: K, neededBy?: PhaseId): Promise<StateRecords[K]> {
    const path = this.pathOf(key);
    if (!existsSync(path)) {
      throw new MissingStateError(key, STATE_OWNERS[key], neededBy);
    }
    return parseRecord(key, await readFile(path, 'utf-8'));
  }

  /** Record if present, undefined otherwise; for status display */
  async tryRead<K extends StateKey>(key: K): Promise<StateRecords[K] | undefined> {
    return this.has(key) ? this.read(key) : undefined;
  }

  has(key: StateKey): boolean {
    return existsSync(this.pathOf(key));
  }

  present(): StateKey[] {
    return STATE_KEYS.filter(key => this.has(key));
  }

  async remove(key: StateKey): Promise<void> {
    await rm(this.pathOf(key), { force: true });
  }

  async writeReport(content: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.reportPath, content);
    return this.reportPath;
  }

  /**
   * Remove every record and the health report, then the directory when nothing else is left
   */
  async clear(): Promise<void> {
    for (const key of STATE_KEYS) {
      await this.remove(key);
    }
    await rm(this.reportPath, { force: true });

    if (!existsSync(this.directory)) {
      return;
    }
    const leftovers = await readdir(this.directory);
    if (leftovers.length === 0) {
      try {
        await rmdir(this.directory);
      } catch (error) {
        throw new Error(`Failed to remove ${this.directory}: ${describeError(error)}`);
      }
    }
  }
}
