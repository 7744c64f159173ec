import {
  IAMClient,
  CreateRoleCommand,
  GetRoleCommand,
  DeleteRoleCommand,
  AttachRolePolicyCommand,
  DetachRolePolicyCommand,
  ListAttachedRolePoliciesCommand,
  ListRolePoliciesCommand,
  DeleteRolePolicyCommand,
  CreateInstanceProfileCommand,
  GetInstanceProfileCommand,
  DeleteInstanceProfileCommand,
  AddRoleToInstanceProfileCommand,
  RemoveRoleFromInstanceProfileCommand,
  waitUntilInstanceProfileExists
} from '@aws-sdk/client-iam';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, isAwsError, required, toSdkTags } from './sdk-helpers.js';
import type { IdentityApi, ServiceAccountInfo, Tags } from './types.js';

export const INSTANCE_POLICY_ARNS = [
  'arn:aws:iam::aws:policy/AmazonSSMManagedInstanceCore',
  'arn:aws:iam::aws:policy/CloudWatchAgentServerPolicy'
] as const;

interface PolicyDocument {
  Version: '2012-10-17';
  Statement: Array<{
    Effect: 'Allow' | 'Deny';
    Principal?: { Service: string };
    Action: string | string[];
    Resource?: string | string[];
  }>;
}

/**
 * The instance's service account: an IAM role and an instance profile sharing one name.
 */
export class IAMManager implements IdentityApi {
  private client: IAMClient;

  constructor(settings: ClientSettings) {
    this.client = new IAMClient(clientConfig(settings));
  }

  async findServiceAccount(name: string): Promise<ServiceAccountInfo | undefined> {
    const role = await this.getRoleIfExists(name);
    if (!role) {
      return undefined;
    }
    // A profile that never received its role is an unfinished service account
    const profile = await this.getInstanceProfile(name);
    if (!profile?.roleNames.includes(name)) {
      return undefined;
    }
    return { roleArn: role, instanceProfileArn: profile.arn };
  }

  async createServiceAccount(name: string, policyArns: readonly string[], tags: Tags): Promise<ServiceAccountInfo> {
    try {
      // A previous run may have stopped between the role and the profile
      let roleArn = await this.getRoleIfExists(name);
      if (!roleArn) {
        const roleResult = await this.client.send(new CreateRoleCommand({
          RoleName: name,
          AssumeRolePolicyDocument: JSON.stringify(this.createTrustPolicy('ec2.amazonaws.com')),
          Description: 'Instance role for the proxy host',
          Tags: toSdkTags(name, tags)
        }));
        roleArn = required(roleResult.Role?.Arn, 'Role.Arn');
      }

      for (const policyArn of policyArns) {
        await this.client.send(new AttachRolePolicyCommand({ RoleName: name, PolicyArn: policyArn }));
      }

      const profile = await this.getInstanceProfile(name);
      let instanceProfileArn = profile?.arn;
      if (!instanceProfileArn) {
        const profileResult = await this.client.send(new CreateInstanceProfileCommand({
          InstanceProfileName: name,
          Tags: toSdkTags(name, tags)
        }));
        instanceProfileArn = required(profileResult.InstanceProfile?.Arn, 'InstanceProfile.Arn');
      }

      if (!profile?.roleNames.includes(name)) {
        await this.client.send(new AddRoleToInstanceProfileCommand({
          InstanceProfileName: name,
          RoleName: name
        }));
        await waitUntilInstanceProfileExists(
          { client: this.client, maxWaitTime: 120 },
          { InstanceProfileName: name }
        );
      }

      return { roleArn, instanceProfileArn };
    } catch (error) {
      throw new Error(`Failed to create IAM role ${name}: ${describeError(error)}`);
    }
  }

  async deleteServiceAccount(name: string): Promise<void> {
    try {
      const profile = await this.getInstanceProfile(name);
      if (profile) {
        if (profile.roleNames.includes(name)) {
          await this.client.send(new RemoveRoleFromInstanceProfileCommand({
            InstanceProfileName: name,
            RoleName: name
          }));
        }
        await this.client.send(new DeleteInstanceProfileCommand({ InstanceProfileName: name }));
      }

      if (!(await this.getRoleIfExists(name))) {
        return;
      }

      // Policies must be detached before the role itself can go
      const attached = await this.client.send(new ListAttachedRolePoliciesCommand({ RoleName: name }));
      for (const policy of attached.AttachedPolicies ?? []) {
        if (policy.PolicyArn) {
          await this.client.send(new DetachRolePolicyCommand({ RoleName: name, PolicyArn: policy.PolicyArn }));
        }
      }

      const inline = await this.client.send(new ListRolePoliciesCommand({ RoleName: name }));
      for (const policyName of inline.PolicyNames ?? []) {
        await this.client.send(new DeleteRolePolicyCommand({ RoleName: name, PolicyName: policyName }));
      }

      await this.client.send(new DeleteRoleCommand({ RoleName: name }));
    } catch (error) {
      throw new Error(`Failed to delete IAM role ${name}: ${describeError(error)}`);
    }
  }

  private createTrustPolicy(servicePrincipal: string): PolicyDocument {
    return {
      Version: '2012-10-17',
      Statement: [
        {
          Effect: 'Allow',
          Principal: { Service: servicePrincipal },
          Action: 'sts:AssumeRole'
        }
      ]
    };
  }

  private async getRoleIfExists(roleName: string): Promise<string | undefined> {
    try {
      const result = await this.client.send(new GetRoleCommand({ RoleName: roleName }));
      return result.Role?.Arn;
    } catch (error) {
      if (isAwsError(error, 'NoSuchEntityException')) {
        return undefined;
      }
      throw error;
    }
  }

  private async getInstanceProfile(profileName: string): Promise<{ arn: string; roleNames: string[] } | undefined> {
    try {
      const result = await this.client.send(new GetInstanceProfileCommand({ InstanceProfileName: profileName }));
      const arn = result.InstanceProfile?.Arn;
      if (!arn) {
        return undefined;
      }
      const roleNames = (result.InstanceProfile?.Roles ?? []).flatMap(role => (role.RoleName ? [role.RoleName] : []));
      return { arn, roleNames };
    } catch (error) {
      if (isAwsError(error, 'NoSuchEntityException')) {
        return undefined;
      }
      throw error;
    }
  }
}
