import { ReconciliationError, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ReconcileOutcome, ResourceAttributes, ResourceDescriptor, Result } from '../types/index.js';
import { err, ok } from '../types/index.js';

/**
 * Bring one resource into existence. An existing resource is never touched;
 * a failed lookup or create is reported, not retried.
 */
export async function reconcile<A extends ResourceAttributes>(
  descriptor: ResourceDescriptor<A>,
  logger?: Logger
): Promise<ReconcileOutcome<A>> {
  const { kind, name } = descriptor;

  let existing: A | undefined;
  try {
    existing = await descriptor.lookup();
  } catch (error) {
    return { status: 'failed', kind, name, reason: `lookup failed: ${describeError(error)}` };
  }

  if (existing) {
    logger?.info(`${kind} ${name} already exists`);
    return { status: 'already-exists', kind, name, attributes: existing };
  }

  logger?.info(`Creating ${kind} ${name}...`);
  try {
    const attributes = await descriptor.create();
    logger?.success(`Created ${kind} ${name}`);
    return { status: 'created', kind, name, attributes };
  } catch (error) {
    return { status: 'failed', kind, name, reason: describeError(error) };
  }
}

/**
 * Reconcile in order and stop at the first failure. Resources before it stay
 * created; later ones are not attempted.
 */
export async function reconcileAll(
  descriptors: readonly ResourceDescriptor[],
  logger?: Logger
): Promise<Result<ReconcileOutcome[], ReconciliationError>> {
  const outcomes: ReconcileOutcome[] = [];

  for (const descriptor of descriptors) {
    const outcome = await reconcile(descriptor, logger);
    if (outcome.status === 'failed') {
      logger?.error(`Failed to reconcile ${outcome.kind} ${outcome.name}: ${outcome.reason}`);
      return err(new ReconciliationError(outcome.kind, outcome.name, outcome.reason));
    }
    outcomes.push(outcome);
  }

  return ok(outcomes);
}

/**
 * Single-descriptor variant returning the attributes or the error
 */
export async function ensure<A extends ResourceAttributes>(
  descriptor: ResourceDescriptor<A>,
  logger?: Logger
): Promise<Result<A, ReconciliationError>> {
  const outcome = await reconcile(descriptor, logger);
  if (outcome.status === 'failed') {
    logger?.error(`Failed to reconcile ${outcome.kind} ${outcome.name}: ${outcome.reason}`);
    return err(new ReconciliationError(outcome.kind, outcome.name, outcome.reason));
  }
  return ok(outcome.attributes);
}
