import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NetworkManager } from '../network-manager.js';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

vi.mock('@aws-sdk/client-ec2', () => {
  const command = (type: string) => vi.fn(function (input: unknown) {
    return { type, input };
  });
  return {
    EC2Client: vi.fn(function () {
      return { send };
    }),
    CreateVpcCommand: command('CreateVpc'),
    DeleteVpcCommand: command('DeleteVpc'),
    DescribeVpcsCommand: command('DescribeVpcs'),
    ModifyVpcAttributeCommand: command('ModifyVpcAttribute'),
    CreateInternetGatewayCommand: command('CreateInternetGateway'),
    AttachInternetGatewayCommand: command('AttachInternetGateway'),
    DetachInternetGatewayCommand: command('DetachInternetGateway'),
    DeleteInternetGatewayCommand: command('DeleteInternetGateway'),
    DescribeInternetGatewaysCommand: command('DescribeInternetGateways'),
    DescribeRouteTablesCommand: command('DescribeRouteTables'),
    CreateRouteCommand: command('CreateRoute'),
    CreateSubnetCommand: command('CreateSubnet'),
    DeleteSubnetCommand: command('DeleteSubnet'),
    DescribeSubnetsCommand: command('DescribeSubnets'),
    ModifySubnetAttributeCommand: command('ModifySubnetAttribute'),
    CreateSecurityGroupCommand: command('CreateSecurityGroup'),
    AuthorizeSecurityGroupIngressCommand: command('AuthorizeSecurityGroupIngress'),
    DeleteSecurityGroupCommand: command('DeleteSecurityGroup'),
    DescribeSecurityGroupsCommand: command('DescribeSecurityGroups')
  };
});

const sentTypes = (): string[] => send.mock.calls.map(([command]) => command.type);

/** Answers each command by type; a listed failure rejects that command every time */
const respond = (responses: Record<string, unknown>, failures: Record<string, Error> = {}): void => {
  send.mockImplementation(async (command: { type: string }) => {
    const failure = failures[command.type];
    if (failure) {
      throw failure;
    }
    return responses[command.type] ?? {};
  });
};

const NETWORK_RESPONSES = {
  CreateVpc: { Vpc: { VpcId: 'vpc-1' } },
  CreateInternetGateway: { InternetGateway: { InternetGatewayId: 'igw-1' } },
  DescribeRouteTables: { RouteTables: [{ RouteTableId: 'rtb-1' }] }
};

const RULE_OPTIONS = {
  name: 'demo-test-allow-https',
  vpcId: 'vpc-1',
  port: 443,
  sourceRange: '0.0.0.0/0',
  description: 'Allow HTTPS (tcp/443)',
  tags: { Project: 'demo' }
};

describe('NetworkManager', () => {
  let network: NetworkManager;

  beforeEach(() => {
    send.mockReset();
    network = new NetworkManager({ region: 'us-east-1' });
  });

  describe('createNetwork', () => {
    it('creates the VPC with a gateway and a default route', async () => {
      respond(NETWORK_RESPONSES);

      const result = await network.createNetwork('demo-test-vpc', '10.0.0.0/16', { Project: 'demo' });

      expect(result).toEqual({ vpcId: 'vpc-1', cidr: '10.0.0.0/16' });
      expect(sentTypes()).toEqual([
        'CreateVpc',
        'ModifyVpcAttribute',
        'CreateInternetGateway',
        'AttachInternetGateway',
        'DescribeRouteTables',
        'CreateRoute'
      ]);
      expect(send.mock.calls[5][0].input).toEqual({
        RouteTableId: 'rtb-1',
        DestinationCidrBlock: '0.0.0.0/0',
        GatewayId: 'igw-1'
      });
    });

    it('removes what it built when a later step fails', async () => {
      respond(NETWORK_RESPONSES, { CreateRoute: new Error('route limit exceeded') });

      await expect(network.createNetwork('demo-test-vpc', '10.0.0.0/16', {}))
        .rejects.toThrow('Failed to create VPC demo-test-vpc: route limit exceeded');
      expect(sentTypes().slice(6)).toEqual(['DetachInternetGateway', 'DeleteInternetGateway', 'DeleteVpc']);
      expect(send.mock.calls[8][0].input).toEqual({ VpcId: 'vpc-1' });
    });

    it('only undoes the steps that ran', async () => {
      respond(NETWORK_RESPONSES, { ModifyVpcAttribute: new Error('throttled') });

      await expect(network.createNetwork('demo-test-vpc', '10.0.0.0/16', {})).rejects.toThrow('throttled');
      expect(sentTypes()).toEqual(['CreateVpc', 'ModifyVpcAttribute', 'DeleteVpc']);
    });

    it('reports an undo step that fails too', async () => {
      respond(NETWORK_RESPONSES, {
        ModifyVpcAttribute: new Error('throttled'),
        DeleteVpc: new Error('DependencyViolation')
      });

      await expect(network.createNetwork('demo-test-vpc', '10.0.0.0/16', {})).rejects.toThrow(
        'Failed to create VPC demo-test-vpc: throttled (rollback incomplete: DependencyViolation)'
      );
    });
  });

  it('deletes a subnet whose public addressing could not be enabled', async () => {
    respond({ CreateSubnet: { Subnet: { SubnetId: 'subnet-1' } } }, { ModifySubnetAttribute: new Error('denied') });

    await expect(network.createSubnet({
      name: 'demo-test-subnet',
      vpcId: 'vpc-1',
      cidr: '10.0.1.0/24',
      zone: 'us-east-1a',
      tags: {}
    })).rejects.toThrow('Failed to create subnet demo-test-subnet: denied');
    expect(sentTypes()).toEqual(['CreateSubnet', 'ModifySubnetAttribute', 'DeleteSubnet']);
  });

  describe('findFirewallRule', () => {
    it('returns the group with its port', async () => {
      respond({
        DescribeSecurityGroups: {
          SecurityGroups: [{ GroupId: 'sg-1', VpcId: 'vpc-1', IpPermissions: [{ FromPort: 443, ToPort: 443 }] }]
        }
      });

      await expect(network.findFirewallRule('demo-test-allow-https'))
        .resolves.toEqual({ groupId: 'sg-1', vpcId: 'vpc-1', port: 443 });
      expect(send.mock.calls[0][0].input).toEqual({
        Filters: [{ Name: 'group-name', Values: ['demo-test-allow-https'] }]
      });
    });

    it('treats a group without ingress as missing', async () => {
      respond({ DescribeSecurityGroups: { SecurityGroups: [{ GroupId: 'sg-1', VpcId: 'vpc-1', IpPermissions: [] }] } });

      await expect(network.findFirewallRule('demo-test-allow-https')).resolves.toBeUndefined();
    });
  });

  describe('createFirewallRule', () => {
    it('creates the group and opens the port', async () => {
      respond({ DescribeSecurityGroups: { SecurityGroups: [] }, CreateSecurityGroup: { GroupId: 'sg-1' } });

      await expect(network.createFirewallRule(RULE_OPTIONS)).resolves.toEqual({ groupId: 'sg-1', vpcId: 'vpc-1', port: 443 });
      expect(sentTypes()).toEqual(['DescribeSecurityGroups', 'CreateSecurityGroup', 'AuthorizeSecurityGroupIngress']);
      expect(send.mock.calls[2][0].input).toEqual({
        GroupId: 'sg-1',
        IpPermissions: [{
          IpProtocol: 'tcp',
          FromPort: 443,
          ToPort: 443,
          IpRanges: [{ CidrIp: '0.0.0.0/0', Description: 'Allow HTTPS (tcp/443)' }]
        }]
      });
    });

    it('deletes the new group when the ingress cannot be added, so a retry starts clean', async () => {
      respond(
        { DescribeSecurityGroups: { SecurityGroups: [] }, CreateSecurityGroup: { GroupId: 'sg-1' } },
        { AuthorizeSecurityGroupIngress: new Error('RulesPerSecurityGroupLimitExceeded') }
      );

      await expect(network.createFirewallRule(RULE_OPTIONS)).rejects.toThrow(
        'Failed to create firewall rule demo-test-allow-https: RulesPerSecurityGroupLimitExceeded'
      );
      expect(sentTypes()).toEqual([
        'DescribeSecurityGroups',
        'CreateSecurityGroup',
        'AuthorizeSecurityGroupIngress',
        'DeleteSecurityGroup'
      ]);

      send.mockClear();
      respond({ DescribeSecurityGroups: { SecurityGroups: [] }, CreateSecurityGroup: { GroupId: 'sg-2' } });

      await expect(network.findFirewallRule('demo-test-allow-https')).resolves.toBeUndefined();
      await expect(network.createFirewallRule(RULE_OPTIONS)).resolves.toEqual({ groupId: 'sg-2', vpcId: 'vpc-1', port: 443 });
    });

    it('finishes a group an interrupted run left without ingress', async () => {
      respond({ DescribeSecurityGroups: { SecurityGroups: [{ GroupId: 'sg-1', VpcId: 'vpc-1', IpPermissions: [] }] } });

      await expect(network.createFirewallRule(RULE_OPTIONS)).resolves.toEqual({ groupId: 'sg-1', vpcId: 'vpc-1', port: 443 });
      expect(sentTypes()).toEqual(['DescribeSecurityGroups', 'AuthorizeSecurityGroupIngress']);
    });

    it('keeps a group it did not create when the ingress fails', async () => {
      respond(
        { DescribeSecurityGroups: { SecurityGroups: [{ GroupId: 'sg-1', VpcId: 'vpc-1', IpPermissions: [] }] } },
        { AuthorizeSecurityGroupIngress: new Error('throttled') }
      );

      await expect(network.createFirewallRule(RULE_OPTIONS)).rejects.toThrow('throttled');
      expect(sentTypes()).toEqual(['DescribeSecurityGroups', 'AuthorizeSecurityGroupIngress']);
    });
  });

  it('detaches gateways and removes leftover groups before deleting the VPC', async () => {
    respond({
      DescribeInternetGateways: { InternetGateways: [{ InternetGatewayId: 'igw-1' }] },
      DescribeSecurityGroups: {
        SecurityGroups: [{ GroupId: 'sg-default', GroupName: 'default' }, { GroupId: 'sg-7', GroupName: 'demo-test-allow-ssh' }]
      }
    });

    await network.deleteNetwork('vpc-1');

    expect(sentTypes()).toEqual([
      'DescribeInternetGateways',
      'DetachInternetGateway',
      'DeleteInternetGateway',
      'DescribeSecurityGroups',
      'DeleteSecurityGroup',
      'DeleteVpc'
    ]);
    expect(send.mock.calls[4][0].input).toEqual({ GroupId: 'sg-7' });
  });
});
