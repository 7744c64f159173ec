import {
  BudgetsClient,
  CreateBudgetCommand,
  DeleteBudgetCommand,
  DescribeBudgetCommand,
  DescribeBudgetsCommand,
  type NotificationWithSubscribers
} from '@aws-sdk/client-budgets';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, isAwsError } from './sdk-helpers.js';
import type { AccountApi, BudgetApi, BudgetSpec } from './types.js';

/** The Budgets API is only served from us-east-1 */
export const BUDGETS_REGION = 'us-east-1';

export class BudgetManager implements BudgetApi {
  private client: BudgetsClient;
  private accountId?: Promise<string>;

  constructor(settings: ClientSettings, private readonly account: AccountApi) {
    this.client = new BudgetsClient(clientConfig({ ...settings, region: BUDGETS_REGION }));
  }

  async billingAccessible(): Promise<boolean> {
    try {
      await this.client.send(new DescribeBudgetsCommand({ AccountId: await this.getAccountId(), MaxResults: 1 }));
      return true;
    } catch (error) {
      if (isAwsError(error, 'AccessDeniedException', 'NotFoundException')) {
        return false;
      }
      throw error;
    }
  }

  async findBudget(name: string): Promise<{ name: string } | undefined> {
    try {
      const result = await this.client.send(new DescribeBudgetCommand({
        AccountId: await this.getAccountId(),
        BudgetName: name
      }));
      return result.Budget?.BudgetName ? { name: result.Budget.BudgetName } : undefined;
    } catch (error) {
      if (isAwsError(error, 'NotFoundException')) {
        return undefined;
      }
      throw error;
    }
  }

  async createBudget(spec: BudgetSpec): Promise<{ name: string }> {
    const email = spec.notificationEmail;
    // Notifications need a subscriber; without an address the budget only tracks spend
    const notifications = email
      ? spec.thresholdsPercent.map((threshold): NotificationWithSubscribers => ({
        Notification: {
          NotificationType: 'ACTUAL',
          ComparisonOperator: 'GREATER_THAN',
          Threshold: threshold,
          ThresholdType: 'PERCENTAGE'
        },
        Subscribers: [{ SubscriptionType: 'EMAIL', Address: email }]
      }))
      : undefined;

    try {
      await this.client.send(new CreateBudgetCommand({
        AccountId: await this.getAccountId(),
        Budget: {
          BudgetName: spec.name,
          BudgetLimit: { Amount: spec.limitUsd.toFixed(2), Unit: 'USD' },
          TimeUnit: 'MONTHLY',
          BudgetType: 'COST'
        },
        NotificationsWithSubscribers: notifications
      }));
      return { name: spec.name };
    } catch (error) {
      throw new Error(`Failed to create budget ${spec.name}: ${describeError(error)}`);
    }
  }

  async deleteBudget(name: string): Promise<void> {
    await this.client.send(new DeleteBudgetCommand({ AccountId: await this.getAccountId(), BudgetName: name }));
  }

  private getAccountId(): Promise<string> {
    // A failed lookup is not cached, so the next call asks again
    this.accountId ??= this.account.whoAmI().then(
      identity => identity.accountId,
      (error: unknown) => {
        this.accountId = undefined;
        throw error;
      }
    );
    return this.accountId;
  }
}
