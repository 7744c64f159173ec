import { fromIni } from '@aws-sdk/credential-providers';
import { describeError } from '../errors.js';
import type { Tags } from './types.js';

export const MANAGED_BY_TAG = { ManagedBy: 'free-tier-deploy' } as const;

/**
 * Tag list in the Key/Value shape the SDK clients expect, with the Name tag first
 */
export function toSdkTags(name: string, tags: Tags): Array<{ Key: string; Value: string }> {
  return [
    { Key: 'Name', Value: name },
    ...Object.entries(tags)
      .filter(([key]) => key !== 'Name')
      .map(([Key, Value]) => ({ Key, Value }))
  ];
}

export function nameTag(tags: ReadonlyArray<{ Key?: string; Value?: string }> | undefined): string | undefined {
  return tags?.find(tag => tag.Key === 'Name')?.Value;
}

/**
 * True when the SDK rejected with one of the named service exceptions
 */
export function isAwsError(error: unknown, ...names: string[]): boolean {
  return typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    names.includes(String(error.name));
}

/**
 * Narrow an optional response field the service always fills on success
 */
export function required<T>(value: T | undefined | null, what: string): T {
  if (value === undefined || value === null) {
    throw new Error(`AWS response did not include ${what}`);
  }
  return value;
}

/**
 * Undo the finished steps of a failed multi-step create, newest first, so the
 * next lookup finds nothing instead of a half-built resource. Returns a suffix
 * for the create's error naming any undo step that failed as well.
 */
export async function rollBack(undo: ReadonlyArray<() => Promise<unknown>>): Promise<string> {
  const failures: string[] = [];
  for (const step of [...undo].reverse()) {
    try {
      await step();
    } catch (error) {
      failures.push(describeError(error));
    }
  }
  return failures.length > 0 ? ` (rollback incomplete: ${failures.join('; ')})` : '';
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export interface ClientSettings {
  region: string;
  /** Named profile from the shared credentials file; default provider chain when absent */
  profile?: string;
}

/** Constructor input shared by every SDK client */
export function clientConfig(settings: ClientSettings): { region: string; credentials?: ReturnType<typeof fromIni> } {
  return settings.profile
    ? { region: settings.region, credentials: fromIni({ profile: settings.profile }) }
    : { region: settings.region };
}
