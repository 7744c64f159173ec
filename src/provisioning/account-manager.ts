import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { type ClientSettings, clientConfig, required } from './sdk-helpers.js';
import type { AccountApi, CallerIdentity } from './types.js';

export class AccountManager implements AccountApi {
  private client: STSClient;

  constructor(settings: ClientSettings) {
    this.client = new STSClient(clientConfig(settings));
  }

  async whoAmI(): Promise<CallerIdentity> {
    const result = await this.client.send(new GetCallerIdentityCommand({}));
    return {
      accountId: required(result.Account, 'Account'),
      arn: required(result.Arn, 'Arn')
    };
  }
}
