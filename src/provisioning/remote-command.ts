import { SSMClient, SendCommandCommand, GetCommandInvocationCommand } from '@aws-sdk/client-ssm';
import { type ClientSettings, clientConfig, isAwsError, required, sleep } from './sdk-helpers.js';
import type { RemoteCommandApi, RemoteCommandResult } from './types.js';

const FINISHED_STATUSES = new Set(['Success', 'Cancelled', 'TimedOut', 'Failed']);

export interface RemoteCommandRunnerOptions {
  pollIntervalMs?: number;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Runs shell commands on the instance through SSM Run Command and waits for the outcome.
 */
export class RemoteCommandRunner implements RemoteCommandApi {
  private client: SSMClient;
  private readonly pollIntervalMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(settings: ClientSettings, options: RemoteCommandRunnerOptions = {}) {
    this.client = new SSMClient(clientConfig(settings));
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.wait = options.wait ?? sleep;
  }

  async run(instanceId: string, commands: readonly string[], options: { timeoutSeconds?: number } = {}): Promise<RemoteCommandResult> {
    const timeoutSeconds = options.timeoutSeconds ?? 600;
    const sent = await this.client.send(new SendCommandCommand({
      InstanceIds: [instanceId],
      DocumentName: 'AWS-RunShellScript',
      Parameters: {
        commands: [...commands],
        executionTimeout: [String(timeoutSeconds)]
      },
      TimeoutSeconds: 60
    }));
    const commandId = required(sent.Command?.CommandId, 'CommandId');
    const deadline = Date.now() + (timeoutSeconds + 60) * 1000;

    while (Date.now() < deadline) {
      await this.wait(this.pollIntervalMs);

      try {
        const invocation = await this.client.send(new GetCommandInvocationCommand({
          CommandId: commandId,
          InstanceId: instanceId
        }));
        const status = invocation.Status ?? 'Pending';
        if (!FINISHED_STATUSES.has(status)) {
          continue;
        }

        const output = [invocation.StandardOutputContent, invocation.StandardErrorContent]
          .filter((part): part is string => Boolean(part))
          .join('\n')
          .trim();
        return {
          ok: status === 'Success',
          exitCode: invocation.ResponseCode ?? -1,
          output
        };
      } catch (error) {
        // The invocation is registered a moment after SendCommand returns
        if (!isAwsError(error, 'InvocationDoesNotExist')) {
          throw error;
        }
      }
    }

    return { ok: false, exitCode: -1, output: `Command ${commandId} did not finish within ${timeoutSeconds}s` };
  }
}
