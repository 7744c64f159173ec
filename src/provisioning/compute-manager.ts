import {
  EC2Client,
  CreateVolumeCommand,
  DeleteVolumeCommand,
  DescribeVolumesCommand,
  AttachVolumeCommand,
  RunInstancesCommand,
  TerminateInstancesCommand,
  DescribeInstancesCommand,
  waitUntilInstanceRunning,
  waitUntilInstanceTerminated,
  waitUntilVolumeAvailable,
  waitUntilVolumeInUse,
  _InstanceType,
  VolumeType,
  type Instance,
  type RunInstancesCommandOutput,
  type Volume
} from '@aws-sdk/client-ec2';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, isAwsError, required, rollBack, sleep, toSdkTags } from './sdk-helpers.js';
import type { ComputeApi, DiskInfo, InstanceInfo, InstanceState, LaunchInstanceOptions, Tags } from './types.js';

/** Public SSM parameter tracking the current Ubuntu 22.04 LTS image */
export const UBUNTU_IMAGE_PARAMETER = '/aws/service/canonical/ubuntu/server/22.04/stable/current/amd64/hvm/ebs-gp2/ami-id';

export const DATA_DEVICE_NAME = '/dev/sdf';

const INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));
const VOLUME_TYPES: ReadonlySet<string> = new Set(Object.values(VolumeType));
const INSTANCE_STATES: ReadonlySet<string> = new Set<InstanceState>([
  'pending', 'running', 'stopping', 'stopped', 'shutting-down', 'terminated'
]);

const LIVE_INSTANCE_STATES = ['pending', 'running', 'stopping', 'stopped'];

function isInstanceType(value: string): value is _InstanceType {
  return INSTANCE_TYPES.has(value);
}

function isVolumeType(value: string): value is VolumeType {
  return VOLUME_TYPES.has(value);
}

function isInstanceState(value: string | undefined): value is InstanceState {
  return value !== undefined && INSTANCE_STATES.has(value);
}

export interface ComputeManagerOptions {
  /** Pause between launch attempts while a new instance profile propagates */
  profileRetryDelayMs?: number;
  profileRetryAttempts?: number;
}

/**
 * EBS data volume and EC2 instance operations.
 */
export class ComputeManager implements ComputeApi {
  private client: EC2Client;
  private ssm: SSMClient;
  private readonly profileRetryDelayMs: number;
  private readonly profileRetryAttempts: number;

  constructor(settings: ClientSettings, options: ComputeManagerOptions = {}) {
    this.client = new EC2Client(clientConfig(settings));
    this.ssm = new SSMClient(clientConfig(settings));
    this.profileRetryDelayMs = options.profileRetryDelayMs ?? 10_000;
    this.profileRetryAttempts = options.profileRetryAttempts ?? 6;
  }

  async findDisk(name: string): Promise<DiskInfo | undefined> {
    const result = await this.client.send(new DescribeVolumesCommand({
      Filters: [
        { Name: 'tag:Name', Values: [name] },
        { Name: 'status', Values: ['creating', 'available', 'in-use'] }
      ]
    }));
    const volume = result.Volumes?.[0];
    return volume ? this.toDiskInfo(volume) : undefined;
  }

  async createDisk(options: { name: string; zone: string; sizeGb: number; volumeType: string; tags: Tags }): Promise<DiskInfo> {
    if (!isVolumeType(options.volumeType)) {
      throw new Error(`Unsupported volume type: ${options.volumeType}`);
    }

    const undo: Array<() => Promise<unknown>> = [];
    try {
      const result = await this.client.send(new CreateVolumeCommand({
        AvailabilityZone: options.zone,
        Size: options.sizeGb,
        VolumeType: options.volumeType,
        TagSpecifications: [{ ResourceType: 'volume', Tags: toSdkTags(options.name, options.tags) }]
      }));
      const volumeId = required(result.VolumeId, 'VolumeId');
      undo.push(() => this.deleteDisk(volumeId));

      await waitUntilVolumeAvailable({ client: this.client, maxWaitTime: 300 }, { VolumeIds: [volumeId] });

      return { volumeId, sizeGb: options.sizeGb, zone: options.zone, state: 'available' };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create volume ${options.name}: ${describeError(error)}${rollback}`);
    }
  }

  async deleteDisk(volumeId: string): Promise<void> {
    await this.client.send(new DeleteVolumeCommand({ VolumeId: volumeId }));
  }

  async findInstance(name: string): Promise<InstanceInfo | undefined> {
    const result = await this.client.send(new DescribeInstancesCommand({
      Filters: [
        { Name: 'tag:Name', Values: [name] },
        { Name: 'instance-state-name', Values: LIVE_INSTANCE_STATES }
      ]
    }));
    const instance = result.Reservations?.flatMap(reservation => reservation.Instances ?? [])[0];
    return instance ? this.toInstanceInfo(instance) : undefined;
  }

  async launchInstance(options: LaunchInstanceOptions): Promise<InstanceInfo> {
    if (!isInstanceType(options.instanceType)) {
      throw new Error(`Unknown instance type: ${options.instanceType}`);
    }
    if (!isVolumeType(options.volumeType)) {
      throw new Error(`Unsupported volume type: ${options.volumeType}`);
    }

    const undo: Array<() => Promise<unknown>> = [];
    try {
      const imageId = options.imageId ?? await this.resolveDefaultImage();
      const command = new RunInstancesCommand({
        ImageId: imageId,
        InstanceType: options.instanceType,
        MinCount: 1,
        MaxCount: 1,
        SubnetId: options.subnetId,
        SecurityGroupIds: [...options.securityGroupIds],
        IamInstanceProfile: { Arn: options.instanceProfileArn },
        UserData: Buffer.from(options.userData, 'utf-8').toString('base64'),
        BlockDeviceMappings: [{
          DeviceName: '/dev/sda1',
          Ebs: {
            VolumeSize: options.rootVolumeGb,
            VolumeType: options.volumeType,
            DeleteOnTermination: true
          }
        }],
        Placement: { AvailabilityZone: options.zone },
        TagSpecifications: [
          { ResourceType: 'instance', Tags: toSdkTags(options.name, options.tags) },
          // The root volume carries the instance name so inventory can tell it apart
          { ResourceType: 'volume', Tags: toSdkTags(options.name, options.tags) }
        ]
      });

      const result = await this.runWithProfileRetry(command);
      const instanceId = required(result.Instances?.[0]?.InstanceId, 'InstanceId');
      // An instance without its data volume is not the one this deployment needs
      undo.push(() => this.terminateInstance(instanceId));

      await waitUntilInstanceRunning({ client: this.client, maxWaitTime: 600 }, { InstanceIds: [instanceId] });

      await this.client.send(new AttachVolumeCommand({
        InstanceId: instanceId,
        VolumeId: options.dataVolumeId,
        Device: DATA_DEVICE_NAME
      }));
      await waitUntilVolumeInUse({ client: this.client, maxWaitTime: 300 }, { VolumeIds: [options.dataVolumeId] });

      const launched = await this.describeInstance(instanceId);
      return launched ?? { instanceId, zone: options.zone, state: 'running', instanceType: options.instanceType };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to launch instance ${options.name}: ${describeError(error)}${rollback}`);
    }
  }

  async terminateInstance(instanceId: string): Promise<void> {
    await this.client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] }));
    // The data volume and security groups stay in use until termination completes
    await waitUntilInstanceTerminated({ client: this.client, maxWaitTime: 600 }, { InstanceIds: [instanceId] });
  }

  private async resolveDefaultImage(): Promise<string> {
    const result = await this.ssm.send(new GetParameterCommand({ Name: UBUNTU_IMAGE_PARAMETER }));
    return required(result.Parameter?.Value, `parameter ${UBUNTU_IMAGE_PARAMETER}`);
  }

  private async runWithProfileRetry(command: RunInstancesCommand): Promise<RunInstancesCommandOutput> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.send(command);
      } catch (error) {
        // A freshly created instance profile is not visible to EC2 for a few seconds
        const profilePending = isAwsError(error, 'InvalidParameterValue') &&
          describeError(error).includes('iamInstanceProfile');
        if (!profilePending || attempt >= this.profileRetryAttempts) {
          throw error;
        }
        await sleep(this.profileRetryDelayMs);
      }
    }
  }

  private async describeInstance(instanceId: string): Promise<InstanceInfo | undefined> {
    const result = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
    const instance = result.Reservations?.[0]?.Instances?.[0];
    return instance ? this.toInstanceInfo(instance) : undefined;
  }

  private toDiskInfo(volume: Volume): DiskInfo | undefined {
    if (!volume.VolumeId) {
      return undefined;
    }
    return {
      volumeId: volume.VolumeId,
      sizeGb: volume.Size ?? 0,
      zone: volume.AvailabilityZone ?? '',
      state: volume.State ?? 'unknown'
    };
  }

  private toInstanceInfo(instance: Instance): InstanceInfo | undefined {
    const stateName = instance.State?.Name;
    if (!instance.InstanceId || !isInstanceState(stateName)) {
      return undefined;
    }
    return {
      instanceId: instance.InstanceId,
      zone: instance.Placement?.AvailabilityZone ?? '',
      state: stateName,
      instanceType: instance.InstanceType ?? '',
      privateAddress: instance.PrivateIpAddress,
      publicAddress: instance.PublicIpAddress
    };
  }
}
