import {
  SecretsManagerClient,
  CreateSecretCommand,
  DescribeSecretCommand,
  DeleteSecretCommand,
  GetSecretValueCommand,
  PutSecretValueCommand,
  PutResourcePolicyCommand
} from '@aws-sdk/client-secrets-manager';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, isAwsError, required, toSdkTags } from './sdk-helpers.js';
import type { SecretInfo, SecretStoreApi, Tags } from './types.js';

export class SecretStore implements SecretStoreApi {
  private client: SecretsManagerClient;

  constructor(settings: ClientSettings) {
    this.client = new SecretsManagerClient(clientConfig(settings));
  }

  async findSecret(name: string): Promise<SecretInfo | undefined> {
    try {
      const result = await this.client.send(new DescribeSecretCommand({ SecretId: name }));
      // Scheduled for deletion counts as gone; the name is reusable once it is purged
      if (!result.ARN || result.DeletedDate) {
        return undefined;
      }
      return { name, arn: result.ARN };
    } catch (error) {
      if (isAwsError(error, 'ResourceNotFoundException')) {
        return undefined;
      }
      throw error;
    }
  }

  async create(name: string, tags: Tags): Promise<SecretInfo> {
    try {
      const result = await this.client.send(new CreateSecretCommand({
        Name: name,
        Description: 'API key for the proxy service',
        Tags: toSdkTags(name, tags)
      }));
      return { name, arn: required(result.ARN, 'ARN') };
    } catch (error) {
      throw new Error(`Failed to create secret ${name}: ${describeError(error)}`);
    }
  }

  async addVersion(name: string, value: string): Promise<void> {
    await this.client.send(new PutSecretValueCommand({ SecretId: name, SecretString: value }));
  }

  async accessLatest(name: string): Promise<string | undefined> {
    try {
      const result = await this.client.send(new GetSecretValueCommand({ SecretId: name, VersionStage: 'AWSCURRENT' }));
      return result.SecretString || undefined;
    } catch (error) {
      // A secret created without a value has no AWSCURRENT version yet
      if (isAwsError(error, 'ResourceNotFoundException')) {
        return undefined;
      }
      throw error;
    }
  }

  async grantAccessor(name: string, principalArn: string): Promise<void> {
    const policy = {
      Version: '2012-10-17',
      Statement: [{
        Effect: 'Allow',
        Principal: { AWS: principalArn },
        Action: 'secretsmanager:GetSecretValue',
        Resource: '*'
      }]
    };
    await this.client.send(new PutResourcePolicyCommand({
      SecretId: name,
      ResourcePolicy: JSON.stringify(policy)
    }));
  }

  async deleteSecret(name: string): Promise<void> {
    await this.client.send(new DeleteSecretCommand({ SecretId: name, ForceDeleteWithoutRecovery: true }));
  }
}
