import {
  EC2Client,
  CreateVpcCommand,
  DeleteVpcCommand,
  DescribeVpcsCommand,
  ModifyVpcAttributeCommand,
  CreateInternetGatewayCommand,
  AttachInternetGatewayCommand,
  DetachInternetGatewayCommand,
  DeleteInternetGatewayCommand,
  DescribeInternetGatewaysCommand,
  DescribeRouteTablesCommand,
  CreateRouteCommand,
  CreateSubnetCommand,
  DeleteSubnetCommand,
  DescribeSubnetsCommand,
  ModifySubnetAttributeCommand,
  CreateSecurityGroupCommand,
  AuthorizeSecurityGroupIngressCommand,
  DeleteSecurityGroupCommand,
  DescribeSecurityGroupsCommand,
  type SecurityGroup
} from '@aws-sdk/client-ec2';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, required, rollBack, toSdkTags } from './sdk-helpers.js';
import type {
  CreateFirewallRuleOptions,
  FirewallRuleInfo,
  NetworkApi,
  NetworkInfo,
  SubnetInfo,
  Tags
} from './types.js';

/**
 * VPC, subnet and security-group operations.
 * Each firewall rule is its own security group so it can be found and removed by name.
 */
export class NetworkManager implements NetworkApi {
  private client: EC2Client;

  constructor(settings: ClientSettings) {
    this.client = new EC2Client(clientConfig(settings));
  }

  async findNetwork(name: string): Promise<NetworkInfo | undefined> {
    const result = await this.client.send(new DescribeVpcsCommand({
      Filters: [{ Name: 'tag:Name', Values: [name] }]
    }));
    const vpc = result.Vpcs?.[0];
    if (!vpc?.VpcId) {
      return undefined;
    }
    return { vpcId: vpc.VpcId, cidr: vpc.CidrBlock ?? '' };
  }

  async createNetwork(name: string, cidr: string, tags: Tags): Promise<NetworkInfo> {
    const undo: Array<() => Promise<unknown>> = [];
    try {
      const vpcResult = await this.client.send(new CreateVpcCommand({
        CidrBlock: cidr,
        TagSpecifications: [{ ResourceType: 'vpc', Tags: toSdkTags(name, tags) }]
      }));
      const vpcId = required(vpcResult.Vpc?.VpcId, 'VpcId');
      undo.push(() => this.client.send(new DeleteVpcCommand({ VpcId: vpcId })));

      await this.client.send(new ModifyVpcAttributeCommand({
        VpcId: vpcId,
        EnableDnsHostnames: { Value: true }
      }));

      // Internet gateway and default route so instances with a public address are reachable
      const gatewayResult = await this.client.send(new CreateInternetGatewayCommand({
        TagSpecifications: [{ ResourceType: 'internet-gateway', Tags: toSdkTags(`${name}-igw`, tags) }]
      }));
      const gatewayId = required(gatewayResult.InternetGateway?.InternetGatewayId, 'InternetGatewayId');
      undo.push(() => this.client.send(new DeleteInternetGatewayCommand({ InternetGatewayId: gatewayId })));

      await this.client.send(new AttachInternetGatewayCommand({
        InternetGatewayId: gatewayId,
        VpcId: vpcId
      }));
      undo.push(() => this.client.send(new DetachInternetGatewayCommand({ InternetGatewayId: gatewayId, VpcId: vpcId })));

      const routeTables = await this.client.send(new DescribeRouteTablesCommand({
        Filters: [
          { Name: 'vpc-id', Values: [vpcId] },
          { Name: 'association.main', Values: ['true'] }
        ]
      }));
      const routeTableId = required(routeTables.RouteTables?.[0]?.RouteTableId, 'main RouteTableId');

      await this.client.send(new CreateRouteCommand({
        RouteTableId: routeTableId,
        DestinationCidrBlock: '0.0.0.0/0',
        GatewayId: gatewayId
      }));

      return { vpcId, cidr };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create VPC ${name}: ${describeError(error)}${rollback}`);
    }
  }

  async deleteNetwork(vpcId: string): Promise<void> {
    const gateways = await this.client.send(new DescribeInternetGatewaysCommand({
      Filters: [{ Name: 'attachment.vpc-id', Values: [vpcId] }]
    }));

    for (const gateway of gateways.InternetGateways ?? []) {
      if (!gateway.InternetGatewayId) {
        continue;
      }
      await this.client.send(new DetachInternetGatewayCommand({
        InternetGatewayId: gateway.InternetGatewayId,
        VpcId: vpcId
      }));
      await this.client.send(new DeleteInternetGatewayCommand({
        InternetGatewayId: gateway.InternetGatewayId
      }));
    }

    // Groups an interrupted rule create left behind hold the VPC open
    const groups = await this.client.send(new DescribeSecurityGroupsCommand({
      Filters: [{ Name: 'vpc-id', Values: [vpcId] }]
    }));
    for (const group of groups.SecurityGroups ?? []) {
      if (group.GroupId && group.GroupName !== 'default') {
        await this.deleteFirewallRule(group.GroupId);
      }
    }

    await this.client.send(new DeleteVpcCommand({ VpcId: vpcId }));
  }

  async findSubnet(name: string): Promise<SubnetInfo | undefined> {
    const result = await this.client.send(new DescribeSubnetsCommand({
      Filters: [{ Name: 'tag:Name', Values: [name] }]
    }));
    const subnet = result.Subnets?.[0];
    if (!subnet?.SubnetId) {
      return undefined;
    }
    return {
      subnetId: subnet.SubnetId,
      vpcId: subnet.VpcId ?? '',
      zone: subnet.AvailabilityZone ?? ''
    };
  }

  async createSubnet(options: { name: string; vpcId: string; cidr: string; zone: string; tags: Tags }): Promise<SubnetInfo> {
    const undo: Array<() => Promise<unknown>> = [];
    try {
      const result = await this.client.send(new CreateSubnetCommand({
        VpcId: options.vpcId,
        CidrBlock: options.cidr,
        AvailabilityZone: options.zone,
        TagSpecifications: [{ ResourceType: 'subnet', Tags: toSdkTags(options.name, options.tags) }]
      }));
      const subnetId = required(result.Subnet?.SubnetId, 'SubnetId');
      undo.push(() => this.deleteSubnet(subnetId));

      await this.client.send(new ModifySubnetAttributeCommand({
        SubnetId: subnetId,
        MapPublicIpOnLaunch: { Value: true }
      }));

      return { subnetId, vpcId: options.vpcId, zone: options.zone };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create subnet ${options.name}: ${describeError(error)}${rollback}`);
    }
  }

  async deleteSubnet(subnetId: string): Promise<void> {
    await this.client.send(new DeleteSubnetCommand({ SubnetId: subnetId }));
  }

  /** A group without its ingress entry is an unfinished rule and counts as missing */
  async findFirewallRule(name: string): Promise<FirewallRuleInfo | undefined> {
    const group = await this.describeGroup(name);
    const port = group?.IpPermissions?.[0]?.FromPort;
    if (!group?.GroupId || port === undefined) {
      return undefined;
    }
    return { groupId: group.GroupId, vpcId: group.VpcId ?? '', port };
  }

  /**
   * Creates the group and its single ingress entry. A group left without
   * ingress by an interrupted run is reused rather than created again.
   */
  async createFirewallRule(options: CreateFirewallRuleOptions): Promise<FirewallRuleInfo> {
    const undo: Array<() => Promise<unknown>> = [];
    try {
      let groupId = (await this.describeGroup(options.name))?.GroupId;
      if (!groupId) {
        const result = await this.client.send(new CreateSecurityGroupCommand({
          GroupName: options.name,
          Description: options.description,
          VpcId: options.vpcId,
          TagSpecifications: [{ ResourceType: 'security-group', Tags: toSdkTags(options.name, options.tags) }]
        }));
        const createdId = required(result.GroupId, 'GroupId');
        undo.push(() => this.deleteFirewallRule(createdId));
        groupId = createdId;
      }

      await this.client.send(new AuthorizeSecurityGroupIngressCommand({
        GroupId: groupId,
        IpPermissions: [{
          IpProtocol: 'tcp',
          FromPort: options.port,
          ToPort: options.port,
          IpRanges: [{ CidrIp: options.sourceRange, Description: options.description }]
        }]
      }));

      return { groupId, vpcId: options.vpcId, port: options.port };
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create firewall rule ${options.name}: ${describeError(error)}${rollback}`);
    }
  }

  async deleteFirewallRule(groupId: string): Promise<void> {
    await this.client.send(new DeleteSecurityGroupCommand({ GroupId: groupId }));
  }

  private async describeGroup(name: string): Promise<SecurityGroup | undefined> {
    const result = await this.client.send(new DescribeSecurityGroupsCommand({
      Filters: [{ Name: 'group-name', Values: [name] }]
    }));
    return result.SecurityGroups?.[0];
  }
}
