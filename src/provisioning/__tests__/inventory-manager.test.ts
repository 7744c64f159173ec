import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InventoryManager } from '../inventory-manager.js';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

// Every client reports its region with each call, so per-region traffic can be told apart
vi.mock('@aws-sdk/client-ec2', () => {
  const command = (type: string) => vi.fn(function (input: unknown) {
    return { type, input };
  });
  return {
    EC2Client: vi.fn(function (config: { region: string }) {
      return { send: (sent: unknown) => send(config.region, sent) };
    }),
    DescribeRegionsCommand: command('DescribeRegions'),
    DescribeInstancesCommand: command('DescribeInstances'),
    DescribeVolumesCommand: command('DescribeVolumes'),
    DescribeAddressesCommand: command('DescribeAddresses')
  };
});

const calls = (): string[] => send.mock.calls.map(([region, command]) => `${region} ${command.type}`);

const instance = (id: string, name?: string) => ({
  InstanceId: id,
  InstanceType: 't2.micro',
  Tags: name ? [{ Key: 'Name', Value: name }] : []
});

describe('InventoryManager', () => {
  let inventory: InventoryManager;

  beforeEach(() => {
    send.mockReset();
    inventory = new InventoryManager({ region: 'us-east-1' });
  });

  describe('listInstances', () => {
    it('counts instances in every enabled region', async () => {
      send.mockImplementation(async (region: string, command: { type: string }) => {
        if (command.type === 'DescribeRegions') {
          return { Regions: [{ RegionName: 'us-east-1' }, { RegionName: 'eu-west-1' }] };
        }
        return region === 'us-east-1'
          ? { Reservations: [{ Instances: [instance('i-1', 'demo-test-vm')] }] }
          : { Reservations: [{ Instances: [instance('i-2')] }] };
      });

      await expect(inventory.listInstances(['t2.micro', 't3.micro'])).resolves.toEqual([
        { instanceId: 'i-1', name: 'demo-test-vm', region: 'us-east-1', instanceType: 't2.micro' },
        { instanceId: 'i-2', name: undefined, region: 'eu-west-1', instanceType: 't2.micro' }
      ]);
      expect(calls()).toEqual(['us-east-1 DescribeRegions', 'us-east-1 DescribeInstances', 'eu-west-1 DescribeInstances']);
      expect(send.mock.calls[1][1].input.Filters[0]).toEqual({ Name: 'instance-type', Values: ['t2.micro', 't3.micro'] });
    });

    it('follows every page of a region', async () => {
      send
        .mockResolvedValueOnce({ Regions: [{ RegionName: 'us-east-1' }] })
        .mockResolvedValueOnce({ Reservations: [{ Instances: [instance('i-1')] }], NextToken: 'page-2' })
        .mockResolvedValueOnce({ Reservations: [{ Instances: [instance('i-2')] }] });

      const listed = await inventory.listInstances(['t2.micro']);

      expect(listed.map(entry => entry.instanceId)).toEqual(['i-1', 'i-2']);
      expect(send.mock.calls[2][1].input.NextToken).toBe('page-2');
    });

    it('falls back to the deployment region when none are listed', async () => {
      send.mockResolvedValueOnce({ Regions: [] }).mockResolvedValueOnce({ Reservations: [] });

      await expect(inventory.listInstances(['t2.micro'])).resolves.toEqual([]);
      expect(calls()).toEqual(['us-east-1 DescribeRegions', 'us-east-1 DescribeInstances']);
    });
  });

  it('pages through volumes', async () => {
    send
      .mockResolvedValueOnce({ Volumes: [{ VolumeId: 'vol-1', Size: 20, Tags: [{ Key: 'Name', Value: 'demo-test-disk' }] }], NextToken: 't' })
      .mockResolvedValueOnce({ Volumes: [{ VolumeId: 'vol-2', Size: 8 }] });

    await expect(inventory.listVolumes(['gp2', 'gp3'])).resolves.toEqual([
      { volumeId: 'vol-1', name: 'demo-test-disk', sizeGb: 20 },
      { volumeId: 'vol-2', name: undefined, sizeGb: 8 }
    ]);
    expect(send.mock.calls[0][1].input.Filters).toEqual([{ Name: 'volume-type', Values: ['gp2', 'gp3'] }]);
  });

  it('lists allocated addresses', async () => {
    send.mockResolvedValueOnce({ Addresses: [{ AllocationId: 'eipalloc-1', PublicIp: '198.51.100.7' }] });

    await expect(inventory.listStaticAddresses()).resolves.toEqual([
      { allocationId: 'eipalloc-1', publicAddress: '198.51.100.7' }
    ]);
  });
});
