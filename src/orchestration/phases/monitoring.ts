import { ALERT_POLICY_IDS } from '../../config/naming.js';
import { LOG_RETENTION_DAYS } from '../../reconciler/catalog.js';
import { reconcileAll } from '../../reconciler/reconciler.js';
import { ok } from '../../types/index.js';
import { HOST_LAYOUT, runRemoteStep, writeFileCommand } from '../remote-steps.js';
import type { DeploymentPhase } from '../types.js';

const AGENT_PACKAGE_URL = 'https://s3.amazonaws.com/amazoncloudwatch-agent/ubuntu/amd64/latest/amazon-cloudwatch-agent.deb';

/** systemd unit of the agent installed below */
export const AGENT_SERVICE = 'amazon-cloudwatch-agent';

export const monitoringPhase: DeploymentPhase = {
  id: 5,
  name: 'monitoring',
  description: 'Log group and metrics, alarm notifications, uptime check, dashboard, log agent and log rotation',
  requires: ['instance'],
  produces: ['monitoring'],

  async execute(context) {
    const { catalog, store, templates, logger } = context;
    const instance = await store.read('instance', 5);
    const { names } = catalog;

    if (!context.config.monitoring.notificationEmail) {
      logger.warn('No notification e-mail configured; alarms will change state without notifying anyone');
    }

    const resources = await reconcileAll(catalog.monitoringResources(), logger);
    if (!resources.ok) {
      return resources;
    }

    const agentConfig = templates.render('cloudwatch-agent.json', {
      serviceName: HOST_LAYOUT.serviceName,
      logGroupName: names.logGroup,
      metricNamespace: catalog.metricNamespace
    });

    const agent = await runRemoteStep(context, instance.instanceId, 'Configuring the log agent', [
      `[ -x /opt/aws/amazon-cloudwatch-agent/bin/amazon-cloudwatch-agent-ctl ] || ` +
        `(curl -fsSL -o /tmp/cwagent.deb ${AGENT_PACKAGE_URL} && dpkg -i -E /tmp/cwagent.deb)`,
      `mkdir -p $(dirname ${HOST_LAYOUT.agentConfigPath})`,
      writeFileCommand(HOST_LAYOUT.agentConfigPath, agentConfig),
      `/opt/aws/amazon-cloudwatch-agent/bin/amazon-cloudwatch-agent-ctl -a fetch-config -m ec2 -s -c file:${HOST_LAYOUT.agentConfigPath}`
    ], 600);
    if (!agent.ok) {
      return agent;
    }

    const rotationPath = `${HOST_LAYOUT.logrotateDirectory}/${HOST_LAYOUT.serviceName}`;
    const rotation = await runRemoteStep(context, instance.instanceId, 'Configuring log rotation', [
      writeFileCommand(rotationPath, templates.render('logrotate.conf', {
        serviceName: HOST_LAYOUT.serviceName,
        keepDays: LOG_RETENTION_DAYS
      })),
      `logrotate -d ${rotationPath}`
    ]);
    if (!rotation.ok) {
      return rotation;
    }

    const running = await runRemoteStep(context, instance.instanceId, 'Verifying the log agent', [
      `systemctl is-active ${AGENT_SERVICE}`
    ]);
    if (!running.ok) {
      return running;
    }

    await store.write(5, 'monitoring', {
      dashboardName: names.dashboard,
      alarmNames: ALERT_POLICY_IDS.map(id => names.alertPolicies[id]).join(','),
      logGroupName: names.logGroup
    });
    logger.success(`Monitoring in place (dashboard ${names.dashboard})`);
    return ok(undefined);
  }
};
