import { describe, it, expect } from 'vitest';
import {
  createNamingService,
  deploymentPrefix,
  resourceName,
  sanitizeName,
  truncateWithHash
} from '../naming.js';

describe('Resource naming', () => {
  describe('deploymentPrefix', () => {
    it('joins project and environment in lower case', () => {
      expect(deploymentPrefix({ project: 'My_App', environment: 'prod' })).toBe('my-app-prod');
    });
  });

  describe('resourceName', () => {
    it('appends the kind suffix to the prefix', () => {
      expect(resourceName('instance', 'demo-test')).toBe('demo-test-vm');
      expect(resourceName('secret', 'demo-test')).toBe('demo-test-api-key');
    });

    it('uses the qualifier for kinds with several members', () => {
      expect(resourceName('firewall-rule', 'demo-test', 'ssh')).toBe('demo-test-allow-ssh');
      expect(resourceName('alert-policy', 'demo-test', 'high-cpu')).toBe('demo-test-alarm-high-cpu');
    });

    it('is stable across calls', () => {
      expect(resourceName('disk', 'a'.repeat(80))).toBe(resourceName('disk', 'a'.repeat(80)));
    });
  });

  describe('sanitizeName', () => {
    it('replaces invalid characters and collapses hyphens', () => {
      expect(sanitizeName('my__app..name')).toBe('my-app-name');
    });

    it('makes the name start with a letter', () => {
      expect(sanitizeName('123-service')).toBe('app-123-service');
    });

    it('falls back when nothing is left', () => {
      expect(sanitizeName('--')).toBe('app');
    });
  });

  describe('truncateWithHash', () => {
    it('leaves short names alone', () => {
      expect(truncateWithHash('short', 10)).toBe('short');
    });

    it('keeps truncated names within the limit and distinct', () => {
      const first = truncateWithHash(`${'x'.repeat(70)}-one`, 64);
      const second = truncateWithHash(`${'x'.repeat(70)}-two`, 64);

      expect(first.length).toBeLessThanOrEqual(64);
      expect(first).toMatch(/-[0-9a-f]{6}$/);
      expect(first).not.toBe(second);
    });
  });

  describe('generateResourceNames', () => {
    it('derives every name of a deployment from the prefix', () => {
      const names = createNamingService().generateResourceNames({ project: 'demo', environment: 'test' });

      expect(names).toEqual({
        prefix: 'demo-test',
        network: 'demo-test-vpc',
        subnet: 'demo-test-subnet',
        firewallRules: {
          http: 'demo-test-allow-http',
          https: 'demo-test-allow-https',
          ssh: 'demo-test-allow-ssh'
        },
        serviceAccount: 'demo-test-sa',
        disk: 'demo-test-disk',
        instance: 'demo-test-vm',
        secret: 'demo-test-api-key',
        alertPolicies: {
          'instance-down': 'demo-test-alarm-instance-down',
          'high-cpu': 'demo-test-alarm-high-cpu'
        },
        notificationTopic: 'demo-test-alerts',
        uptimeCheck: 'demo-test-uptime',
        dashboard: 'demo-test-dashboard',
        logMetrics: {
          'error-rate': 'demo-test-metric-error-rate',
          requests: 'demo-test-metric-requests'
        },
        logGroup: '/demo-test/application',
        budget: 'demo-test-budget'
      });
    });

    it('keeps environments apart', () => {
      const service = createNamingService();

      expect(service.generateResourceNames({ project: 'demo', environment: 'staging' }).instance)
        .not.toBe(service.generateResourceNames({ project: 'demo', environment: 'production' }).instance);
    });
  });
});
