import {
  SNSClient,
  CreateTopicCommand,
  DeleteTopicCommand,
  ListTopicsCommand,
  SubscribeCommand
} from '@aws-sdk/client-sns';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, required, toSdkTags } from './sdk-helpers.js';
import type { NotificationApi, Tags } from './types.js';

/**
 * SNS topic that alarms publish to, with optional e-mail subscribers.
 */
export class NotificationManager implements NotificationApi {
  private client: SNSClient;

  constructor(settings: ClientSettings) {
    this.client = new SNSClient(clientConfig(settings));
  }

  async findTopic(name: string): Promise<{ arn: string } | undefined> {
    let nextToken: string | undefined;
    do {
      const result = await this.client.send(new ListTopicsCommand({ NextToken: nextToken }));
      // Topic ARNs end in `:<name>`
      const arn = result.Topics?.find(topic => topic.TopicArn?.endsWith(`:${name}`))?.TopicArn;
      if (arn) {
        return { arn };
      }
      nextToken = result.NextToken;
    } while (nextToken);
    return undefined;
  }

  async createTopic(name: string, tags: Tags): Promise<{ arn: string }> {
    try {
      const result = await this.client.send(new CreateTopicCommand({ Name: name, Tags: toSdkTags(name, tags) }));
      return { arn: required(result.TopicArn, 'TopicArn') };
    } catch (error) {
      throw new Error(`Failed to create topic ${name}: ${describeError(error)}`);
    }
  }

  async subscribeEmail(topicArn: string, address: string): Promise<void> {
    try {
      await this.client.send(new SubscribeCommand({ TopicArn: topicArn, Protocol: 'email', Endpoint: address }));
    } catch (error) {
      throw new Error(`Failed to subscribe ${address}: ${describeError(error)}`);
    }
  }

  async deleteTopic(topicArn: string): Promise<void> {
    await this.client.send(new DeleteTopicCommand({ TopicArn: topicArn }));
  }
}
