import { PhaseExecutionError } from '../../errors.js';
import { err, ok } from '../../types/index.js';
import { HOST_LAYOUT, runRemoteStep, writeFileCommand } from '../remote-steps.js';
import type { DeploymentPhase } from '../types.js';

export const applicationPhase: DeploymentPhase = {
  id: 4,
  name: 'application',
  description: 'Install the application, write its configuration and start services',
  requires: ['instance', 'credential'],
  produces: ['deployment'],

  async execute(context) {
    const { catalog, config, store, templates, logger, now } = context;
    const instance = await store.read('instance', 4);
    const credential = await store.read('credential', 4);
    const { appDirectory, serviceName, serviceUser } = HOST_LAYOUT;

    const install = await runRemoteStep(context, instance.instanceId, `Installing ${config.application.package}`, [
      `systemctl stop ${serviceName} || true`,
      `cd ${appDirectory}`,
      `[ -f package.json ] || echo '{"private":true}' > package.json`,
      `NODE_OPTIONS=--max-old-space-size=512 npm install --omit=dev --no-audit --no-fund ${config.application.package}`,
      `chown -R ${serviceUser}:${serviceUser} ${appDirectory}`,
      'npm cache clean --force'
    ], 900);
    if (!install.ok) {
      return install;
    }

    const appConfig = templates.render('app-config.json', {
      appPort: config.application.port,
      rateLimitPerMinute: config.application.rateLimitPerMinute
    });
    const setupScript = templates.render('setup-env.sh', {
      region: config.aws.region,
      secretName: credential.secretName,
      appDirectory,
      serviceUser
    });

    // The key is fetched on the instance; it never passes through this process
    const configure = await runRemoteStep(context, instance.instanceId, 'Writing runtime configuration', [
      writeFileCommand(`${appDirectory}/config.template.json`, appConfig),
      writeFileCommand(`${appDirectory}/setup-env.sh`, setupScript, '0700'),
      `${appDirectory}/setup-env.sh`
    ]);
    if (!configure.ok) {
      return configure;
    }

    const start = await runRemoteStep(context, instance.instanceId, 'Starting services', [
      'systemctl restart caddy',
      `systemctl restart ${serviceName}`,
      'sleep 10',
      'systemctl is-active --quiet caddy',
      `systemctl is-active --quiet ${serviceName}`,
      `for attempt in $(seq 1 10); do curl -fsS http://localhost:${config.application.port}/health && exit 0; sleep 3; done; exit 1`
    ]);
    if (!start.ok) {
      return start;
    }

    // Ephemeral addresses change across stop/start; prefer the live one
    const current = await catalog.instance().lookup();
    const address = current?.externalAddress || instance.externalAddress;
    if (!address) {
      return err(new PhaseExecutionError('application', `instance ${instance.instanceId} has no external address`));
    }

    await store.write(4, 'deployment', {
      deployedAt: now().toISOString(),
      environment: config.environment,
      httpUrl: `http://${address}`,
      httpsUrl: `https://${address}`,
      healthUrl: `https://${address}/health`
    });
    logger.success(`Application is serving at https://${address}`);
    return ok(undefined);
  }
};
