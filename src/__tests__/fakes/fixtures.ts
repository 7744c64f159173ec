import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger, type LogLevel } from '../../logging/logger.js';
import type { DeploymentConfig } from '../../types/index.js';

export interface LoggedLine {
  level: LogLevel;
  line: string;
}

/** Logger that keeps console output in memory */
export function recordingLogger(): { logger: Logger; lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const logger = new Logger({
    verbose: true,
    console: { write: (level, line) => lines.push({ level, line }) },
    clock: () => new Date(2024, 0, 15, 9, 30, 0)
  });
  return { logger, lines };
}

export function testConfig(overrides: Partial<DeploymentConfig> = {}, stateDirectory = '.deploy-state'): DeploymentConfig {
  return {
    project: 'demo',
    environment: 'test',
    aws: { region: 'us-east-1', zone: 'us-east-1a' },
    compute: { instanceType: 't2.micro' },
    storage: { rootVolumeGb: 10, dataVolumeGb: 20, volumeType: 'gp3' },
    network: { vpcCidr: '10.0.0.0/16', subnetCidr: '10.0.1.0/24', sshSourceRange: '0.0.0.0/0' },
    application: { package: 'demo-proxy', startCommand: 'demo-proxy', port: 3456, rateLimitPerMinute: 30 },
    monitoring: {},
    budget: { monthlyLimitUsd: 1 },
    state: { directory: stateDirectory },
    logging: { directory: 'logs' },
    timeouts: { readinessAttempts: 3, readinessIntervalMs: 0 },
    force: false,
    ...overrides
  };
}

/** Fresh temporary directory and its removal */
export async function temporaryDirectory(): Promise<{ path: string; remove: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'deploy-test-'));
  return { path, remove: () => rm(path, { recursive: true, force: true }) };
}
