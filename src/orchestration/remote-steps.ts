import { RemoteCommandError, describeError } from '../errors.js';
import { type Result, err, ok } from '../types/index.js';
import type { PhaseContext } from './types.js';

/** Fixed layout of the provisioned host */
export const HOST_LAYOUT = {
  appDirectory: '/app',
  serviceUser: 'appsvc',
  serviceName: 'proxy-app',
  readinessMarker: '/var/log/startup-complete',
  caddyfilePath: '/etc/caddy/Caddyfile',
  agentConfigPath: '/opt/aws/amazon-cloudwatch-agent/etc/agent.json',
  logrotateDirectory: '/etc/logrotate.d'
} as const;

/** First line of every step; the SSM agent runs the script with /bin/sh, which has no pipefail */
export const STEP_SHELL_OPTIONS = 'set -eu';

/**
 * Shell command writing `content` to `path`, base64-encoded so no quoting is needed
 */
export function writeFileCommand(path: string, content: string, mode = '0644'): string {
  const encoded = Buffer.from(content, 'utf-8').toString('base64');
  return `echo '${encoded}' | base64 -d > ${path} && chmod ${mode} ${path}`;
}

/**
 * Run one named step on the instance; a non-zero exit is a RemoteCommandError
 */
export async function runRemoteStep(
  context: Pick<PhaseContext, 'cloud' | 'logger'>,
  instanceId: string,
  step: string,
  commands: readonly string[],
  timeoutSeconds?: number
): Promise<Result<string, RemoteCommandError>> {
  context.logger.info(`${step}...`);

  try {
    const result = await context.cloud.remote.run(instanceId, [STEP_SHELL_OPTIONS, ...commands], { timeoutSeconds });
    if (!result.ok) {
      context.logger.error(`${step} failed (exit ${result.exitCode})`);
      return err(new RemoteCommandError(step, result.output));
    }
    context.logger.debug(result.output);
    return ok(result.output);
  } catch (error) {
    return err(new RemoteCommandError(step, describeError(error)));
  }
}
