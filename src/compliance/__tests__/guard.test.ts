import { describe, it, expect, beforeEach } from 'vitest';
import { FakeCloud } from '../../__tests__/fakes/fake-cloud.js';
import { recordingLogger, testConfig } from '../../__tests__/fakes/fixtures.js';
import { createNamingService } from '../../config/naming.js';
import { ComplianceError } from '../../errors.js';
import type { DeploymentConfig } from '../../types/index.js';
import { ComplianceGuard, evaluate, hardFailures } from '../guard.js';
import type { LiveState } from '../types.js';

const emptyLive = (): LiveState => ({
  minimalInstances: [],
  volumes: [],
  staticAddresses: [],
  billing: { accessible: true }
});

function evaluateWith(config: DeploymentConfig, live: LiveState = emptyLive()) {
  return evaluate(config, createNamingService().generateResourceNames(config), live);
}

const ruleResult = (results: ReturnType<typeof evaluateWith>, rule: string) => results.find(entry => entry.rule === rule);

describe('evaluate', () => {
  it('passes every rule for a minimal deployment in an empty account', () => {
    const results = evaluateWith(testConfig());

    expect(results).toHaveLength(7);
    expect(results.every(entry => entry.passed)).toBe(true);
  });

  it('fails exactly one HARD rule for a disallowed region and names the region', () => {
    const config = testConfig({ aws: { region: 'eu-central-1', zone: 'eu-central-1a' } });

    const failures = hardFailures(evaluateWith(config));

    expect(failures).toHaveLength(1);
    expect(failures[0].rule).toBe('region-allowed');
    expect(failures[0].message).toBe('Region eu-central-1 is not in the low-cost list (us-east-1, us-east-2, us-west-2)');
  });

  it('rejects a zone outside the region', () => {
    const config = testConfig({ aws: { region: 'us-east-1', zone: 'us-west-2a' } });

    expect(ruleResult(evaluateWith(config), 'region-allowed')).toEqual({
      rule: 'region-allowed',
      severity: 'HARD',
      passed: false,
      message: 'Zone us-west-2a does not belong to region us-east-1'
    });
  });

  it('accepts exactly 30 GiB of storage', () => {
    const config = testConfig({ storage: { rootVolumeGb: 10, dataVolumeGb: 10, volumeType: 'gp3' } });
    const live = { ...emptyLive(), volumes: [{ volumeId: 'vol-other', name: 'other', sizeGb: 10 }] };

    const storage = ruleResult(evaluateWith(config, live), 'storage-ceiling');

    expect(storage?.passed).toBe(true);
    expect(storage?.message).toBe('10 GiB existing + 20 GiB requested = 30 GiB (within the 30 GiB ceiling)');
  });

  it('rejects 31 GiB of storage', () => {
    const config = testConfig({ storage: { rootVolumeGb: 10, dataVolumeGb: 11, volumeType: 'gp3' } });
    const live = { ...emptyLive(), volumes: [{ volumeId: 'vol-other', sizeGb: 10 }] };

    const storage = ruleResult(evaluateWith(config, live), 'storage-ceiling');

    expect(storage?.passed).toBe(false);
    expect(storage?.severity).toBe('HARD');
    expect(storage?.message).toBe('10 GiB existing + 21 GiB requested = 31 GiB (exceeds the 30 GiB ceiling)');
  });

  it('does not count the deployment\'s own volumes or instance', () => {
    const live: LiveState = {
      ...emptyLive(),
      minimalInstances: [{ instanceId: 'i-own', name: 'demo-test-vm', region: 'us-east-1', instanceType: 't2.micro' }],
      volumes: [
        { volumeId: 'vol-root', name: 'demo-test-vm', sizeGb: 10 },
        { volumeId: 'vol-data', name: 'demo-test-disk', sizeGb: 20 }
      ]
    };

    expect(hardFailures(evaluateWith(testConfig(), live))).toEqual([]);
  });

  it('counts other minimal-tier instances', () => {
    const live: LiveState = {
      ...emptyLive(),
      minimalInstances: [{ instanceId: 'i-other', name: 'web', region: 'us-east-2', instanceType: 't3.micro' }]
    };

    expect(ruleResult(evaluateWith(testConfig(), live), 'minimal-instance-count')).toEqual({
      rule: 'minimal-instance-count',
      severity: 'HARD',
      passed: false,
      message: '1 other minimal-tier instance(s) already exist: i-other (us-east-2)'
    });
  });

  it('downgrades the overridable rules with force', () => {
    const config = testConfig({ compute: { instanceType: 't3.small' }, force: true });

    const machine = ruleResult(evaluateWith(config), 'machine-class');

    expect(machine?.passed).toBe(false);
    expect(machine?.severity).toBe('WARN');
    expect(hardFailures(evaluateWith(config))).toEqual([]);
  });

  it('only warns about static addresses and billing', () => {
    const live: LiveState = {
      ...emptyLive(),
      staticAddresses: [{ allocationId: 'eipalloc-1', publicAddress: '198.51.100.7' }],
      billing: { accessible: false, detail: 'AccessDenied' }
    };

    const results = evaluateWith(testConfig(), live);

    expect(hardFailures(results)).toEqual([]);
    expect(ruleResult(results, 'billing-linked')?.message)
      .toBe('Billing data is not reachable: AccessDenied; budget alerts may not work');
  });
});

describe('ComplianceGuard', () => {
  let cloud: FakeCloud;

  beforeEach(() => {
    cloud = new FakeCloud();
  });

  it('returns every result when nothing HARD fails', async () => {
    const { logger } = recordingLogger();
    const guard = new ComplianceGuard(cloud.inventory, cloud.budgets, logger);
    const config = testConfig();

    const outcome = await guard.check(config, createNamingService().generateResourceNames(config));

    expect(outcome.ok && outcome.value).toHaveLength(7);
  });

  it('returns a ComplianceError carrying the violations', async () => {
    const { logger, lines } = recordingLogger();
    const guard = new ComplianceGuard(cloud.inventory, cloud.budgets, logger);
    const config = testConfig({ aws: { region: 'ap-south-1', zone: 'ap-south-1a' } });

    const outcome = await guard.check(config, createNamingService().generateResourceNames(config));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ComplianceError);
      expect(outcome.error.violations.map(entry => entry.rule)).toEqual(['region-allowed']);
    }
    expect(lines.filter(entry => entry.level === 'error')).toHaveLength(1);
  });

  it('reads live state on every check', async () => {
    const { logger } = recordingLogger();
    const guard = new ComplianceGuard(cloud.inventory, cloud.budgets, logger);
    const config = testConfig();
    const names = createNamingService().generateResourceNames(config);

    await guard.check(config, names);
    cloud.foreign.instances.push({ instanceId: 'i-late', region: 'us-east-1', instanceType: 't2.micro' });
    const second = await guard.check(config, names);

    expect(cloud.count('listInstances')).toBe(2);
    expect(second.ok).toBe(false);
  });

  it('turns an unreachable billing API into a warning', async () => {
    const { logger } = recordingLogger();
    cloud.failOn('billingAccessible', 'not subscribed');
    const guard = new ComplianceGuard(cloud.inventory, cloud.budgets, logger);

    const live = await guard.gatherLiveState();

    expect(live.billing).toEqual({ accessible: false, detail: 'not subscribed' });
  });
});
