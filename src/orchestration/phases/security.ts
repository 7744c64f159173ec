import { ReconciliationError, describeError } from '../../errors.js';
import { generateApiKey } from '../../reconciler/catalog.js';
import { reconcile } from '../../reconciler/reconciler.js';
import { err, ok } from '../../types/index.js';
import { HOST_LAYOUT, runRemoteStep, writeFileCommand } from '../remote-steps.js';
import type { DeploymentPhase } from '../types.js';

export const securityPhase: DeploymentPhase = {
  id: 3,
  name: 'security',
  description: 'API key secret, accessor grant, reverse proxy and host hardening',
  requires: ['instance'],
  produces: ['credential'],

  async execute(context) {
    const { catalog, cloud, config, store, templates, logger } = context;
    const instance = await store.read('instance', 3);

    const secret = await reconcile(catalog.secret(), logger);
    if (secret.status === 'failed') {
      return err(new ReconciliationError(secret.kind, secret.name, secret.reason));
    }
    const { secretName, secretArn } = secret.attributes;

    // An existing secret is reused; only an empty one gets a fresh key
    if (secret.status === 'already-exists') {
      try {
        const current = await cloud.secrets.accessLatest(secretName);
        if (current) {
          logger.success('Using the existing API key');
        } else {
          logger.warn(`Secret ${secretName} holds no value; generating a new key`);
          await cloud.secrets.addVersion(secretName, generateApiKey());
        }
      } catch (error) {
        return err(new ReconciliationError('secret', secretName, describeError(error)));
      }
    }

    const account = await catalog.serviceAccount().lookup();
    if (!account) {
      return err(new ReconciliationError('service-account', catalog.names.serviceAccount, 'does not exist'));
    }
    try {
      await cloud.secrets.grantAccessor(secretName, account.roleArn);
      logger.success('Instance role granted read access to the API key');
    } catch (error) {
      return err(new ReconciliationError('secret', secretName, `granting access failed: ${describeError(error)}`));
    }

    const caddyfile = templates.render('Caddyfile', { appPort: config.application.port });
    const unit = templates.render('app.service', {
      serviceName: HOST_LAYOUT.serviceName,
      serviceUser: HOST_LAYOUT.serviceUser,
      appDirectory: HOST_LAYOUT.appDirectory,
      appCommand: config.application.startCommand,
      environment: config.environment
    });

    const proxy = await runRemoteStep(context, instance.instanceId, 'Configuring reverse proxy', [
      'mkdir -p /var/log/caddy',
      writeFileCommand(HOST_LAYOUT.caddyfilePath, caddyfile),
      `caddy validate --config ${HOST_LAYOUT.caddyfilePath} --adapter caddyfile`,
      'systemctl enable caddy'
    ]);
    if (!proxy.ok) {
      return proxy;
    }

    const service = await runRemoteStep(context, instance.instanceId, 'Installing service unit', [
      writeFileCommand(`/etc/systemd/system/${HOST_LAYOUT.serviceName}.service`, unit),
      'systemctl daemon-reload',
      `systemctl enable ${HOST_LAYOUT.serviceName}`
    ]);
    if (!service.ok) {
      return service;
    }

    const hardening = await runRemoteStep(context, instance.instanceId, 'Hardening SSH', [
      "sed -i 's/^#\\?PasswordAuthentication.*/PasswordAuthentication no/' /etc/ssh/sshd_config",
      "sed -i 's/^#\\?PermitRootLogin.*/PermitRootLogin no/' /etc/ssh/sshd_config",
      'systemctl reload ssh'
    ]);
    if (!hardening.ok) {
      return hardening;
    }

    await store.write(3, 'credential', { secretName, secretArn });
    logger.success(`Credential pointer recorded for ${secretName}`);
    return ok(undefined);
  }
};
