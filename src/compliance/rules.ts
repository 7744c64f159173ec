import type { ComplianceRule, RuleContext, RuleId, RuleResult, Severity } from './types.js';

export const ALLOWED_REGIONS: readonly string[] = ['us-east-1', 'us-east-2', 'us-west-2'];
export const MINIMAL_INSTANCE_TYPES: readonly string[] = ['t2.micro', 't3.micro'];
/** Volume types that draw on the free general-purpose storage allowance */
export const COUNTED_VOLUME_TYPES: readonly string[] = ['gp2', 'gp3', 'standard'];
export const STORAGE_CEILING_GB = 30;
export const MAX_MINIMAL_INSTANCES = 1;

const result = (rule: RuleId, severity: Severity, passed: boolean, message: string): RuleResult => ({
  rule,
  severity,
  passed,
  message
});

/** HARD, or WARN when the operator passed --force */
const overridable = (context: RuleContext): Severity => (context.config.force ? 'WARN' : 'HARD');

export const regionAllowed: ComplianceRule = {
  id: 'region-allowed',
  evaluate({ config }) {
    const { region, zone } = config.aws;
    if (!ALLOWED_REGIONS.includes(region)) {
      return result('region-allowed', 'HARD', false,
        `Region ${region} is not in the low-cost list (${ALLOWED_REGIONS.join(', ')})`);
    }
    if (!new RegExp(`^${region}[a-z]$`).test(zone)) {
      return result('region-allowed', 'HARD', false, `Zone ${zone} does not belong to region ${region}`);
    }
    return result('region-allowed', 'HARD', true, `Region ${region} (zone ${zone}) is allowed`);
  }
};

export const machineClass: ComplianceRule = {
  id: 'machine-class',
  evaluate(context) {
    const type = context.config.compute.instanceType;
    const passed = MINIMAL_INSTANCE_TYPES.includes(type);
    return result('machine-class', overridable(context), passed, passed
      ? `Instance type ${type} is a minimal tier`
      : `Instance type ${type} is not a minimal tier (${MINIMAL_INSTANCE_TYPES.join(', ')})`);
  }
};

export const minimalInstanceCount: ComplianceRule = {
  id: 'minimal-instance-count',
  evaluate(context) {
    // This deployment's own instance does not count, so re-runs pass
    const others = context.live.minimalInstances.filter(instance => instance.name !== context.names.instance);
    const total = others.length + 1;
    const passed = total <= MAX_MINIMAL_INSTANCES;
    const listing = others.map(instance => `${instance.instanceId} (${instance.region})`).join(', ');
    return result('minimal-instance-count', overridable(context), passed, passed
      ? 'No other minimal-tier instance is running in the account'
      : `${others.length} other minimal-tier instance(s) already exist: ${listing}`);
  }
};

export const storageCeiling: ComplianceRule = {
  id: 'storage-ceiling',
  evaluate({ config, names, live }) {
    const own = new Set([names.disk, names.instance]);
    const existingGb = live.volumes
      .filter(volume => volume.name === undefined || !own.has(volume.name))
      .reduce((sum, volume) => sum + volume.sizeGb, 0);
    const requestedGb = config.storage.rootVolumeGb + config.storage.dataVolumeGb;
    const totalGb = existingGb + requestedGb;
    const passed = totalGb <= STORAGE_CEILING_GB;
    return result('storage-ceiling', 'HARD', passed,
      `${existingGb} GiB existing + ${requestedGb} GiB requested = ${totalGb} GiB ` +
      `(${passed ? 'within' : 'exceeds'} the ${STORAGE_CEILING_GB} GiB ceiling)`);
  }
};

export const volumeSize: ComplianceRule = {
  id: 'volume-size',
  evaluate(context) {
    const { rootVolumeGb, dataVolumeGb } = context.config.storage;
    const requestedGb = rootVolumeGb + dataVolumeGb;
    const passed = requestedGb <= STORAGE_CEILING_GB;
    return result('volume-size', overridable(context), passed, passed
      ? `Requested volumes total ${requestedGb} GiB`
      : `Requested volumes total ${requestedGb} GiB, above ${STORAGE_CEILING_GB} GiB`);
  }
};

export const staticAddresses: ComplianceRule = {
  id: 'static-addresses',
  evaluate({ live }) {
    const count = live.staticAddresses.length;
    return result('static-addresses', 'WARN', count === 0, count === 0
      ? 'No static addresses allocated'
      : `${count} static address(es) allocated; unattached addresses are billed hourly`);
  }
};

export const billingLinked: ComplianceRule = {
  id: 'billing-linked',
  evaluate({ live }) {
    const { accessible, detail } = live.billing;
    return result('billing-linked', 'WARN', accessible, accessible
      ? 'Billing data is reachable'
      : `Billing data is not reachable${detail ? `: ${detail}` : ''}; budget alerts may not work`);
  }
};

export const COMPLIANCE_RULES: readonly ComplianceRule[] = [
  regionAllowed,
  machineClass,
  minimalInstanceCount,
  storageCeiling,
  volumeSize,
  staticAddresses,
  billingLinked
];
