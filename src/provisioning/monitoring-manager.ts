import {
  CloudWatchClient,
  DescribeAlarmsCommand,
  PutMetricAlarmCommand,
  DeleteAlarmsCommand,
  ListDashboardsCommand,
  PutDashboardCommand,
  DeleteDashboardsCommand
} from '@aws-sdk/client-cloudwatch';
import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  DeleteLogGroupCommand,
  DescribeLogGroupsCommand,
  PutRetentionPolicyCommand,
  DescribeMetricFiltersCommand,
  PutMetricFilterCommand,
  DeleteMetricFilterCommand
} from '@aws-sdk/client-cloudwatch-logs';
import { describeError } from '../errors.js';
import { type ClientSettings, clientConfig, isAwsError, required, rollBack } from './sdk-helpers.js';
import type { AlarmSpec, LogMetricSpec, MonitoringApi, Tags } from './types.js';

/**
 * CloudWatch alarms and dashboards; CloudWatch Logs groups and metric filters.
 */
export class MonitoringManager implements MonitoringApi {
  private metrics: CloudWatchClient;
  private logs: CloudWatchLogsClient;

  constructor(settings: ClientSettings) {
    this.metrics = new CloudWatchClient(clientConfig(settings));
    this.logs = new CloudWatchLogsClient(clientConfig(settings));
  }

  async findAlarm(name: string): Promise<{ arn: string } | undefined> {
    const result = await this.metrics.send(new DescribeAlarmsCommand({ AlarmNames: [name] }));
    const arn = result.MetricAlarms?.[0]?.AlarmArn;
    return arn ? { arn } : undefined;
  }

  async putAlarm(spec: AlarmSpec): Promise<{ arn: string }> {
    try {
      await this.metrics.send(new PutMetricAlarmCommand({
        AlarmName: spec.name,
        AlarmDescription: spec.description,
        Namespace: spec.namespace,
        MetricName: spec.metricName,
        Dimensions: Object.entries(spec.dimensions).map(([Name, Value]) => ({ Name, Value })),
        ComparisonOperator: spec.comparison,
        Threshold: spec.threshold,
        Period: spec.periodSeconds,
        EvaluationPeriods: spec.evaluationPeriods,
        Statistic: spec.statistic,
        TreatMissingData: 'breaching',
        AlarmActions: [...spec.actionArns]
      }));
      // PutMetricAlarm returns no identifier
      return required(await this.findAlarm(spec.name), `alarm ${spec.name}`);
    } catch (error) {
      throw new Error(`Failed to create alarm ${spec.name}: ${describeError(error)}`);
    }
  }

  async deleteAlarm(name: string): Promise<void> {
    await this.metrics.send(new DeleteAlarmsCommand({ AlarmNames: [name] }));
  }

  async findDashboard(name: string): Promise<{ arn: string } | undefined> {
    const result = await this.metrics.send(new ListDashboardsCommand({ DashboardNamePrefix: name }));
    const entry = result.DashboardEntries?.find(dashboard => dashboard.DashboardName === name);
    return entry?.DashboardArn ? { arn: entry.DashboardArn } : undefined;
  }

  async putDashboard(name: string, body: string): Promise<{ arn: string }> {
    try {
      const result = await this.metrics.send(new PutDashboardCommand({ DashboardName: name, DashboardBody: body }));
      const problems = result.DashboardValidationMessages ?? [];
      if (problems.length > 0) {
        throw new Error(problems.map(problem => problem.Message ?? '').join('; '));
      }
      return required(await this.findDashboard(name), `dashboard ${name}`);
    } catch (error) {
      throw new Error(`Failed to create dashboard ${name}: ${describeError(error)}`);
    }
  }

  async deleteDashboard(name: string): Promise<void> {
    await this.metrics.send(new DeleteDashboardsCommand({ DashboardNames: [name] }));
  }

  async findLogMetric(name: string, logGroupName: string): Promise<{ metricName: string } | undefined> {
    try {
      const result = await this.logs.send(new DescribeMetricFiltersCommand({
        logGroupName,
        filterNamePrefix: name
      }));
      const filter = result.metricFilters?.find(candidate => candidate.filterName === name);
      const metricName = filter?.metricTransformations?.[0]?.metricName;
      return metricName ? { metricName } : undefined;
    } catch (error) {
      // No log group means no filter
      if (isAwsError(error, 'ResourceNotFoundException')) {
        return undefined;
      }
      throw error;
    }
  }

  async findLogGroup(name: string): Promise<{ arn: string } | undefined> {
    const result = await this.logs.send(new DescribeLogGroupsCommand({ logGroupNamePrefix: name }));
    const arn = result.logGroups?.find(group => group.logGroupName === name)?.arn;
    return arn ? { arn } : undefined;
  }

  async createLogGroup(name: string, retentionDays: number, tags: Tags): Promise<{ arn: string }> {
    const undo: Array<() => Promise<unknown>> = [];
    try {
      await this.logs.send(new CreateLogGroupCommand({ logGroupName: name, tags: { ...tags } }));
      undo.push(() => this.deleteLogGroup(name));
      await this.logs.send(new PutRetentionPolicyCommand({ logGroupName: name, retentionInDays: retentionDays }));
      return required(await this.findLogGroup(name), `log group ${name}`);
    } catch (error) {
      const rollback = await rollBack(undo);
      throw new Error(`Failed to create log group ${name}: ${describeError(error)}${rollback}`);
    }
  }

  /** Deletes the group together with its metric filters and events */
  async deleteLogGroup(name: string): Promise<void> {
    await this.logs.send(new DeleteLogGroupCommand({ logGroupName: name }));
  }

  async putLogMetric(spec: LogMetricSpec): Promise<{ metricName: string }> {
    try {
      await this.logs.send(new PutMetricFilterCommand({
        logGroupName: spec.logGroupName,
        filterName: spec.name,
        filterPattern: spec.filterPattern,
        metricTransformations: [{
          metricName: spec.metricName,
          metricNamespace: spec.metricNamespace,
          metricValue: '1',
          defaultValue: 0
        }]
      }));
      return { metricName: spec.metricName };
    } catch (error) {
      throw new Error(`Failed to create log metric ${spec.name}: ${describeError(error)}`);
    }
  }

  async deleteLogMetric(name: string, logGroupName: string): Promise<void> {
    await this.logs.send(new DeleteMetricFilterCommand({ logGroupName, filterName: name }));
  }
}
