import { ensure } from '../../reconciler/reconciler.js';
import { ok } from '../../types/index.js';
import type { DeploymentPhase } from '../types.js';

/**
 * Account checks are done by the orchestrator before any phase runs; this phase
 * puts the spending guard rail in place and records who deployed.
 */
export const predeployPhase: DeploymentPhase = {
  id: 1,
  name: 'predeploy',
  description: 'Budget guard rail and account record',
  requires: [],
  produces: ['account'],

  async execute({ catalog, store, identity, logger, now }) {
    const budget = await ensure(catalog.budget(), logger);
    if (!budget.ok) {
      return budget;
    }

    await store.write(1, 'account', {
      accountId: identity.accountId,
      callerArn: identity.arn,
      validatedAt: now().toISOString()
    });
    logger.success(`Account ${identity.accountId} validated`);
    return ok(undefined);
  }
};
