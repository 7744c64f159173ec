import {
  Route53Client,
  ChangeTagsForResourceCommand,
  CreateHealthCheckCommand,
  DeleteHealthCheckCommand,
  ListHealthChecksCommand,
  type HealthCheck
} from '@aws-sdk/client-route-53';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, required, rollBack, toSdkTags } from './sdk-helpers.js';
import type { UptimeCheckApi, UptimeCheckInfo, UptimeCheckSpec } from './types.js';

/** Route 53 is a global service served from us-east-1 */
export const ROUTE53_REGION = 'us-east-1';

/**
 * Route 53 health checks probing the instance over HTTPS.
 *
 * Health checks have no name of their own, so the caller reference carries it:
 * `<name>:<creation time>`. The suffix keeps the reference unique across
 * delete-and-recreate, which Route 53 requires.
 */
export class UptimeCheckManager implements UptimeCheckApi {
  private client: Route53Client;

  constructor(settings: ClientSettings, private readonly now: () => Date = () => new Date()) {
    this.client = new Route53Client(clientConfig({ ...settings, region: ROUTE53_REGION }));
  }

  async findUptimeCheck(name: string): Promise<UptimeCheckInfo | undefined> {
    let marker: string | undefined;
    do {
      const result = await this.client.send(new ListHealthChecksCommand({ Marker: marker, MaxItems: 100 }));
      const found = result.HealthChecks?.find(check => check.CallerReference?.startsWith(`${name}:`));
      if (found) {
        return this.toInfo(found);
      }
      marker = result.IsTruncated ? result.NextMarker : undefined;
    } while (marker);
    return undefined;
  }

  async createUptimeCheck(spec: UptimeCheckSpec): Promise<UptimeCheckInfo> {
    const undo: Array<() => Promise<unknown>> = [];
    try {
      const result = await this.client.send(new CreateHealthCheckCommand({
        CallerReference: `${spec.name}:${this.now().getTime()}`,
        HealthCheckConfig: {
          Type: 'HTTPS',
          IPAddress: spec.address,
          Port: spec.port,
          ResourcePath: spec.path,
          RequestInterval: 30,
          FailureThreshold: 3
        }
      }));
      const check = required(result.HealthCheck, 'HealthCheck');
      const checkId = required(check.Id, 'HealthCheck.Id');
      undo.push(() => this.deleteUptimeCheck(checkId));

      await this.client.send(new ChangeTagsForResourceCommand({
        ResourceType: 'healthcheck',
        ResourceId: checkId,
        AddTags: toSdkTags(spec.name, spec.tags)
      }));

      return { checkId, address: spec.address };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create uptime check ${spec.name}: ${describeError(error)}${rollback}`);
    }
  }

  async deleteUptimeCheck(checkId: string): Promise<void> {
    await this.client.send(new DeleteHealthCheckCommand({ HealthCheckId: checkId }));
  }

  private toInfo(check: HealthCheck): UptimeCheckInfo | undefined {
    if (!check.Id) {
      return undefined;
    }
    return { checkId: check.Id, address: check.HealthCheckConfig?.IPAddress ?? '' };
  }
}
