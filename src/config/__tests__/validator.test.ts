import { describe, it, expect } from 'vitest';
import { getConfigSchema, validateAndNormalizeConfig, validateConfig } from '../validator.js';

const minimal = () => ({
  project: 'demo',
  application: { package: 'demo-proxy' }
});

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('accepts a minimal file', () => {
      expect(validateConfig(minimal())).toEqual({ valid: true, errors: [] });
    });

    it('accepts a complete file', () => {
      const result = validateConfig({
        project: 'demo',
        environment: 'production',
        aws: { region: 'us-west-2', zone: 'us-west-2b', profile: 'deploy' },
        compute: { instance_type: 't3.micro', image_id: 'ami-0abc1234' },
        storage: { root_volume_gb: 10, data_volume_gb: 20, volume_type: 'gp2' },
        network: { vpc_cidr: '10.1.0.0/16', subnet_cidr: '10.1.1.0/24', ssh_source_range: '198.51.100.0/24' },
        application: { package: '@acme/proxy@1.2.0', start_command: 'proxy --quiet', port: 8080, rate_limit_per_minute: 60 },
        monitoring: { notification_email: 'ops@example.com' },
        budget: { monthly_limit_usd: 5 },
        state: { directory: 'state' },
        logging: { directory: 'var/log' },
        timeouts: { readiness_attempts: 10, readiness_interval_ms: 1000 },
        force: true
      });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('requires the project and the application package', () => {
      const result = validateConfig({ application: {} });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Project name is required', 'Application package is required']);
    });

    it('reports every violation at once', () => {
      const result = validateConfig({
        ...minimal(),
        aws: { region: 'nowhere' },
        storage: { volume_type: 'io2' }
      });

      expect(result.errors).toEqual([
        'AWS region must be a valid region identifier (e.g., us-east-1)',
        'Volume type must be one of: gp2, gp3, standard'
      ]);
    });

    it('rejects unknown keys', () => {
      expect(validateConfig({ ...minimal(), extra: true }).errors).toEqual(['"extra" is not allowed']);
    });

    it('rejects a malformed CIDR and a bad email', () => {
      const result = validateConfig({
        ...minimal(),
        network: { vpc_cidr: '10.0.0.0' },
        monitoring: { notification_email: 'ops' }
      });

      expect(result.errors).toEqual([
        'VPC CIDR must be an IPv4 CIDR block',
        'Notification email must be a valid email address'
      ]);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('applies defaults', () => {
      const file = validateAndNormalizeConfig({ ...minimal(), aws: { region: 'us-east-2', zone: 'us-east-2c' } });

      expect(file.compute.instance_type).toBe('t2.micro');
      expect(file.storage).toEqual({ root_volume_gb: 10, data_volume_gb: 20, volume_type: 'gp3' });
      expect(file.application.port).toBe(3456);
      expect(file.budget.monthly_limit_usd).toBe(1);
      expect(file.state.directory).toBe('.deploy-state');
      expect(file.timeouts).toEqual({ readiness_attempts: 60, readiness_interval_ms: 30000 });
      expect(file.force).toBe(false);
    });

    it('throws with every message', () => {
      expect(() => validateAndNormalizeConfig({ application: { package: 'demo-proxy' } }))
        .toThrow('Configuration validation failed:\nProject name is required');
    });
  });

  describe('getConfigSchema', () => {
    it('describes the top-level keys', () => {
      const keys = Object.keys(getConfigSchema().describe().keys ?? {});

      expect(keys).toContain('application');
      expect(keys).toContain('timeouts');
    });
  });
});
