import {
  EC2Client,
  DescribeRegionsCommand,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  DescribeAddressesCommand
} from '@aws-sdk/client-ec2';
import { type ClientSettings, clientConfig, nameTag } from './sdk-helpers.js';
import type { InventoryApi } from './types.js';

type ListedInstance = Awaited<ReturnType<InventoryApi['listInstances']>>[number];
type ListedVolume = Awaited<ReturnType<InventoryApi['listVolumes']>>[number];
type ListedAddress = Awaited<ReturnType<InventoryApi['listStaticAddresses']>>[number];

/**
 * Read-only account inventory. Instances are counted in every enabled region,
 * volumes and addresses in the deployment region.
 */
export class InventoryManager implements InventoryApi {
  private client: EC2Client;

  constructor(private readonly settings: ClientSettings) {
    this.client = new EC2Client(clientConfig(settings));
  }

  async listInstances(instanceTypes: readonly string[]): Promise<ListedInstance[]> {
    const instances: ListedInstance[] = [];

    for (const region of await this.listRegions()) {
      const client = region === this.settings.region
        ? this.client
        : new EC2Client(clientConfig({ ...this.settings, region }));
      let nextToken: string | undefined;

      do {
        const page = await client.send(new DescribeInstancesCommand({
          Filters: [
            { Name: 'instance-type', Values: [...instanceTypes] },
            { Name: 'instance-state-name', Values: ['pending', 'running', 'stopping', 'stopped'] }
          ],
          NextToken: nextToken
        }));

        for (const instance of page.Reservations?.flatMap(reservation => reservation.Instances ?? []) ?? []) {
          if (instance.InstanceId) {
            instances.push({
              instanceId: instance.InstanceId,
              name: nameTag(instance.Tags),
              region,
              instanceType: instance.InstanceType ?? ''
            });
          }
        }
        nextToken = page.NextToken;
      } while (nextToken);
    }

    return instances;
  }

  async listVolumes(volumeTypes: readonly string[]): Promise<ListedVolume[]> {
    const volumes: ListedVolume[] = [];
    let nextToken: string | undefined;

    do {
      const page = await this.client.send(new DescribeVolumesCommand({
        Filters: [{ Name: 'volume-type', Values: [...volumeTypes] }],
        NextToken: nextToken
      }));

      for (const volume of page.Volumes ?? []) {
        if (volume.VolumeId) {
          volumes.push({ volumeId: volume.VolumeId, name: nameTag(volume.Tags), sizeGb: volume.Size ?? 0 });
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return volumes;
  }

  async listStaticAddresses(): Promise<ListedAddress[]> {
    const result = await this.client.send(new DescribeAddressesCommand({}));
    return (result.Addresses ?? []).map(address => ({
      allocationId: address.AllocationId ?? '',
      publicAddress: address.PublicIp ?? ''
    }));
  }

  private async listRegions(): Promise<string[]> {
    const result = await this.client.send(new DescribeRegionsCommand({}));
    const regions = (result.Regions ?? [])
      .map(region => region.RegionName)
      .filter((name): name is string => typeof name === 'string');
    return regions.length > 0 ? regions : [this.settings.region];
  }
}
