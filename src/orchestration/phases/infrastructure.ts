import { describeError } from '../../errors.js';
import { ensure, reconcileAll } from '../../reconciler/reconciler.js';
import { ok } from '../../types/index.js';
import { HOST_LAYOUT } from '../remote-steps.js';
import type { DeploymentPhase, PhaseContext } from '../types.js';

export const infrastructurePhase: DeploymentPhase = {
  id: 2,
  name: 'infrastructure',
  description: 'Network, firewall rules, service account, disk and instance',
  requires: ['account'],
  produces: ['instance'],

  async execute(context) {
    const { catalog, store, logger } = context;

    const dependencies = await reconcileAll(catalog.infrastructureDependencies(), logger);
    if (!dependencies.ok) {
      return dependencies;
    }

    const instance = await ensure(catalog.instance(), logger);
    if (!instance.ok) {
      return instance;
    }

    const { instanceId, zone, state, internalAddress, externalAddress } = instance.value;
    if (state !== 'running' && state !== 'pending') {
      logger.warn(`Instance ${instanceId} is ${state}; start it before running later phases`);
    } else {
      await waitForReadiness(context, instanceId);
    }

    await store.write(2, 'instance', {
      name: catalog.names.instance,
      instanceId,
      zone,
      internalAddress,
      externalAddress
    });
    logger.success(`Instance ${instanceId} recorded (external address ${externalAddress || 'none'})`);
    return ok(undefined);
  }
};

/**
 * Poll for the first-boot marker. Running out of attempts is only a warning:
 * later phases fail on their own if the host is not usable.
 */
export async function waitForReadiness(context: PhaseContext, instanceId: string): Promise<boolean> {
  const { cloud, config, logger, wait } = context;
  const { readinessAttempts, readinessIntervalMs } = config.timeouts;
  logger.info('Waiting for the instance to finish its first-boot setup...');

  for (let attempt = 1; attempt <= readinessAttempts; attempt++) {
    try {
      const marker = await cloud.remote.run(instanceId, [`test -f ${HOST_LAYOUT.readinessMarker}`], { timeoutSeconds: 30 });
      if (marker.ok) {
        logger.success('Instance is ready');
        return true;
      }
    } catch (error) {
      // The agent registers a while after boot
      logger.debug(`Readiness check ${attempt}/${readinessAttempts}: ${describeError(error)}`);
    }
    if (attempt < readinessAttempts) {
      await wait(readinessIntervalMs);
    }
  }

  logger.warn(`Instance did not report ready after ${readinessAttempts} attempts; continuing`);
  return false;
}
