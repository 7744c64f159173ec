import { InvalidArgumentError } from 'commander';
import { dump } from 'js-yaml';
import type { RunReport } from './orchestration/types.js';

/**
 * Commander argument parser for `--phase 3,1,2`; range and ordering are checked by the orchestrator
 */
export function parsePhaseList(value: string): number[] {
  const entries = value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
  if (entries.length === 0) {
    throw new InvalidArgumentError('Expected a comma-separated list of phase numbers.');
  }

  return entries.map(entry => {
    if (!/^\d+$/.test(entry)) {
      throw new InvalidArgumentError(`"${entry}" is not a phase number.`);
    }
    return Number(entry);
  });
}

/**
 * Starter environment file written by `init`
 */
export function starterConfig(project: string, environment: string, generatedAt: Date = new Date()): string {
  const body = dump({
    project,
    environment,
    aws: { region: 'us-east-1', zone: 'us-east-1a' },
    compute: { instance_type: 't2.micro' },
    storage: { root_volume_gb: 10, data_volume_gb: 20, volume_type: 'gp3' },
    network: { vpc_cidr: '10.0.0.0/16', subnet_cidr: '10.0.1.0/24', ssh_source_range: '0.0.0.0/0' },
    application: { package: 'my-proxy', port: 3456, rate_limit_per_minute: 30 },
    monitoring: {},
    budget: { monthly_limit_usd: 1 },
    state: { directory: '.deploy-state' },
    logging: { directory: 'logs' },
    timeouts: { readiness_attempts: 60, readiness_interval_ms: 30000 },
    force: false
  }, { lineWidth: 120 });

  return [
    `# Deployment configuration for ${environment}`,
    `# Generated on ${generatedAt.toISOString()}`,
    '# aws.profile and monitoring.notification_email are optional; ${VAR} and ${VAR:-default} are expanded',
    '',
    body
  ].join('\n');
}

/** Plain lines describing how a run ended */
export function summarizeRun(report: RunReport, logFile?: string): string[] {
  const lines: string[] = [];
  const seconds = (report.durationMs / 1000).toFixed(1);

  if (report.finalState.status === 'completed') {
    if (report.completedPhases.length > 0) {
      lines.push(`Completed phases: ${report.completedPhases.join(', ')}`);
    }
    if (report.endpoint) {
      lines.push(`Endpoint: ${report.endpoint}`);
    }
  } else if (report.error) {
    lines.push(`${report.error.code}: ${report.error.message}`);
    if (report.error.remediation) {
      lines.push(`Remediation: ${report.error.remediation}`);
    }
    if (report.completedPhases.length > 0) {
      lines.push(`Completed before the failure: ${report.completedPhases.join(', ')}`);
    }
  }

  if (report.cleanup) {
    const { cleanup } = report;
    lines.push(
      `${cleanup.mode === 'dry-run' ? 'Would delete' : 'Deleted'}: ${cleanup.mode === 'dry-run' ? cleanup.planned.length : cleanup.deleted.length}` +
        `, not found: ${cleanup.absent.length}, warnings: ${cleanup.warnings.length}, remaining: ${cleanup.remaining.length}`
    );
  }

  lines.push(`Run ${report.runId} took ${seconds}s`);
  if (logFile && report.finalState.status === 'aborted') {
    lines.push(`Log file: ${logFile}`);
  }
  return lines;
}

export interface SummaryOutput {
  out(line: string): void;
  err(line: string): void;
}

/**
 * Summary of a completed run on stdout; an aborted run's summary and log path on stderr
 */
export function printRunSummary(report: RunReport, logFile: string | undefined, output: SummaryOutput): void {
  const write = report.finalState.status === 'completed' ? output.out : output.err;
  for (const line of summarizeRun(report, logFile)) {
    write(line);
  }
}
