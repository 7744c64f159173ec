import { HealthCheckError, describeError } from '../../errors.js';
import { formatTimestamp } from '../../logging/logger.js';
import { err, ok } from '../../types/index.js';
import { HOST_LAYOUT, STEP_SHELL_OPTIONS } from '../remote-steps.js';
import { AGENT_SERVICE } from './monitoring.js';
import type { DeploymentPhase, PhaseContext } from '../types.js';

export interface HealthCheckResult {
  name: string;
  passed: boolean;
  detail: string;
}

export interface CheckTargets {
  instanceId: string;
  address: string;
  secretName: string;
}

export interface HealthCheck {
  name: string;
  run(context: PhaseContext, targets: CheckTargets): Promise<{ passed: boolean; detail: string }>;
}

/** Root filesystem usage at which the resource check fails */
export const DISK_USAGE_LIMIT_PERCENT = 90;

/** Requests past the configured per-minute limit sent by the rate limit check */
export const RATE_LIMIT_HEADROOM = 5;

async function remoteCheck(context: PhaseContext, instanceId: string, commands: string[]): Promise<{ passed: boolean; detail: string }> {
  const result = await context.cloud.remote.run(instanceId, [STEP_SHELL_OPTIONS, ...commands], { timeoutSeconds: 60 });
  const output = result.output.trim().split('\n').filter(line => line.length > 0).join(', ');
  return { passed: result.ok, detail: output || `exit ${result.exitCode}` };
}

export const HEALTH_CHECKS: readonly HealthCheck[] = [
  {
    name: 'Service status',
    run: (context, { instanceId }) => remoteCheck(context, instanceId, [
      'systemctl is-active caddy',
      `systemctl is-active ${HOST_LAYOUT.serviceName}`
    ])
  },
  {
    name: 'Local health endpoint',
    run: (context, { instanceId }) => remoteCheck(context, instanceId, [
      `curl -fsS http://localhost:${context.config.application.port}/health`
    ])
  },
  {
    name: 'HTTP to HTTPS redirect',
    async run({ http }, { address }) {
      const response = await http.get(`http://${address}/`);
      const passed = [301, 302, 307, 308].includes(response.status) &&
        (response.location ?? '').startsWith('https://');
      return { passed, detail: `status ${response.status}${response.location ? ` -> ${response.location}` : ''}` };
    }
  },
  {
    name: 'HTTPS health endpoint',
    async run({ http }, { address }) {
      const response = await http.get(`https://${address}/health`, { timeoutMs: 15_000 });
      return { passed: response.status === 200, detail: `status ${response.status}` };
    }
  },
  {
    name: 'TLS certificate',
    async run({ http, now }, { address }) {
      const { certificate } = await http.get(`https://${address}/health`, { timeoutMs: 15_000 });
      if (!certificate) {
        return { passed: false, detail: 'no certificate served' };
      }
      const at = now();
      const current = certificate.validFrom <= at && at < certificate.validTo;
      const signer = certificate.issuer === certificate.subject ? 'self-signed' : `issued by ${certificate.issuer}`;
      return {
        passed: current,
        detail: `${signer}, valid until ${formatTimestamp(certificate.validTo)}${current ? '' : ' (not currently valid)'}`
      };
    }
  },
  {
    name: 'API authentication',
    async run({ cloud, http }, { address, secretName }) {
      const url = `https://${address}/v1/messages`;
      const anonymous = await http.get(url);
      if (anonymous.status !== 401 && anonymous.status !== 403) {
        return { passed: false, detail: `request without key answered ${anonymous.status}` };
      }
      // Read fresh for this check only
      const key = await cloud.secrets.accessLatest(secretName);
      if (!key) {
        return { passed: false, detail: `secret ${secretName} holds no value` };
      }
      const authorized = await http.get(url, { headers: { 'x-api-key': key } });
      return {
        passed: authorized.status !== 401 && authorized.status !== 403,
        detail: `without key ${anonymous.status}, with key ${authorized.status}`
      };
    }
  },
  {
    name: 'Monitoring agent',
    run: (context, { instanceId }) => remoteCheck(context, instanceId, [`systemctl is-active ${AGENT_SERVICE}`])
  },
  {
    name: 'Resource usage',
    run: (context, { instanceId }) => remoteCheck(context, instanceId, [
      "free -m | awk '/^Mem:/ {print \"memory \" $3 \"/\" $2 \" MB\"}'",
      "echo \"load $(cut -d' ' -f1-3 /proc/loadavg)\"",
      "used=$(df --output=pcent / | tail -1 | tr -dc '0-9')",
      'echo "disk $used%"',
      `[ "$used" -lt ${DISK_USAGE_LIMIT_PERCENT} ]`
    ])
  },
  {
    name: 'Network connectivity',
    run: (context, { instanceId }) => {
      const endpoint = `secretsmanager.${context.config.aws.region}.amazonaws.com`;
      return remoteCheck(context, instanceId, [
        `getent hosts ${endpoint} > /dev/null`,
        `curl -sS -o /dev/null --max-time 10 https://${endpoint}/`,
        'curl -fsS -o /dev/null --max-time 10 https://registry.npmjs.org/',
        'echo "dns ok, secrets endpoint reachable, package registry reachable"'
      ]);
    }
  },
  {
    // Informational: a missing limit is reported, not failed
    name: 'Rate limiting',
    async run({ cloud, config, http, logger }, { address, secretName }) {
      const key = await cloud.secrets.accessLatest(secretName);
      if (!key) {
        return { passed: false, detail: `secret ${secretName} holds no value` };
      }
      const url = `https://${address}/v1/messages`;
      const attempts = config.application.rateLimitPerMinute + RATE_LIMIT_HEADROOM;
      for (let sent = 1; sent <= attempts; sent++) {
        const response = await http.get(url, { headers: { 'x-api-key': key } });
        if (response.status === 429) {
          return { passed: true, detail: `limited after ${sent} requests` };
        }
      }
      logger.warn(`No request was limited within ${attempts} requests`);
      return { passed: true, detail: `no 429 within ${attempts} requests` };
    }
  }
];

export function formatHealthReport(
  results: readonly HealthCheckResult[],
  meta: { environment: string; address: string; generatedAt: Date }
): string {
  const passed = results.filter(result => result.passed).length;
  const lines = [
    'Deployment health check report',
    `Generated: ${formatTimestamp(meta.generatedAt)}`,
    `Environment: ${meta.environment}`,
    `Address: ${meta.address}`,
    '',
    ...results.map(result => `[${result.passed ? 'PASS' : 'FAIL'}] ${result.name}: ${result.detail}`),
    '',
    `Passed: ${passed}`,
    `Failed: ${results.length - passed}`,
    `Overall: ${passed === results.length ? 'PASS' : 'FAIL'}`
  ];
  return lines.join('\n') + '\n';
}

export const healthcheckPhase: DeploymentPhase = {
  id: 6,
  name: 'healthcheck',
  description: 'End-to-end checks and the health report',
  requires: ['instance', 'credential', 'deployment'],
  produces: [],

  async execute(context) {
    const { config, store, logger, now } = context;
    const instance = await store.read('instance', 6);
    const credential = await store.read('credential', 6);
    const deployment = await store.read('deployment', 6);
    const address = new URL(deployment.httpsUrl).hostname;
    const targets: CheckTargets = { instanceId: instance.instanceId, address, secretName: credential.secretName };

    const results: HealthCheckResult[] = [];
    for (const healthCheck of HEALTH_CHECKS) {
      let result: HealthCheckResult;
      try {
        result = { name: healthCheck.name, ...(await healthCheck.run(context, targets)) };
      } catch (error) {
        result = { name: healthCheck.name, passed: false, detail: describeError(error) };
      }
      results.push(result);
      if (result.passed) {
        logger.success(`${result.name}: PASSED`);
      } else {
        logger.error(`${result.name}: FAILED (${result.detail})`);
      }
    }

    const reportPath = await store.writeReport(formatHealthReport(results, {
      environment: config.environment,
      address,
      generatedAt: now()
    }));
    logger.info(`Health report written to ${reportPath}`);

    const failed = results.filter(result => !result.passed).map(result => result.name);
    if (failed.length > 0) {
      return err(new HealthCheckError(failed, reportPath));
    }
    logger.success('All health checks passed');
    return ok(undefined);
  }
};
