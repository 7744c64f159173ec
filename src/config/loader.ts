// Configuration loading logic
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { DeploymentConfig } from '../types/index.js';
import { ConfigurationError, describeError } from '../errors.js';
import type { ConfigLoader, ConfigOverrides, ConfigValidationResult } from './types.js';
import { type ConfigFile, validateAndNormalizeConfig, validateConfig } from './validator.js';

const CONFIG_EXTENSIONS = ['.yml', '.yaml', '.json'];

/**
 * Loads an environment file (YAML or JSON) with environment variable
 * substitution and turns it into the immutable configuration every component receives.
 */
export class DeploymentConfigLoader implements ConfigLoader<ConfigFile> {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load, substitute and validate one configuration file
   */
  async load(path: string): Promise<ConfigFile> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      return validateAndNormalizeConfig(this.resolveEnvironmentVariables(rawConfig));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${describeError(error)}`);
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Resolve `<configDir>/<environment>.{yml,yaml,json}` and build the frozen deployment config
   */
  async loadEnvironment(
    configDir: string,
    environment: string,
    overrides: ConfigOverrides = {}
  ): Promise<Readonly<DeploymentConfig>> {
    const candidates = CONFIG_EXTENSIONS.map(ext => join(configDir, `${environment}${ext}`));
    const path = candidates.find(candidate => existsSync(candidate));

    if (!path) {
      throw new ConfigurationError(
        `No configuration for environment "${environment}". Looked for:\n${candidates.join('\n')}`,
        'Create one with the init command'
      );
    }

    const file = await this.load(path);
    if (file.environment && file.environment !== environment) {
      throw new ConfigurationError(
        `${path} declares environment "${file.environment}" but "${environment}" was requested`
      );
    }

    return toDeploymentConfig(file, environment, overrides);
  }

  /**
   * Recursively resolve ${VAR_NAME} and ${VAR_NAME:-default} placeholders
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder so validation reports it
      return match;
    });
  }
}

/**
 * Map a validated environment file onto the runtime configuration and freeze it
 */
export function toDeploymentConfig(
  file: ConfigFile,
  environment: string,
  overrides: ConfigOverrides = {}
): Readonly<DeploymentConfig> {
  const config: DeploymentConfig = {
    project: file.project,
    environment,
    aws: {
      region: file.aws.region,
      zone: file.aws.zone,
      profile: file.aws.profile
    },
    compute: {
      instanceType: file.compute.instance_type,
      imageId: file.compute.image_id
    },
    storage: {
      rootVolumeGb: file.storage.root_volume_gb,
      dataVolumeGb: file.storage.data_volume_gb,
      volumeType: file.storage.volume_type
    },
    network: {
      vpcCidr: file.network.vpc_cidr,
      subnetCidr: file.network.subnet_cidr,
      sshSourceRange: file.network.ssh_source_range
    },
    application: {
      package: file.application.package,
      startCommand: file.application.start_command ?? defaultStartCommand(file.application.package),
      port: file.application.port,
      rateLimitPerMinute: file.application.rate_limit_per_minute
    },
    monitoring: {
      notificationEmail: file.monitoring.notification_email
    },
    budget: {
      monthlyLimitUsd: file.budget.monthly_limit_usd
    },
    state: { directory: file.state.directory },
    logging: { directory: file.logging.directory },
    timeouts: {
      readinessAttempts: file.timeouts.readiness_attempts,
      readinessIntervalMs: file.timeouts.readiness_interval_ms
    },
    force: overrides.force ?? file.force
  };

  return deepFreeze(config);
}

/** `@scope/tool@1.2.0` -> `tool` */
export function defaultStartCommand(packageSpec: string): string {
  const unscoped = packageSpec.replace(/^@[^/]+\//, '');
  return unscoped.split('@')[0];
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const entry of Object.values(value)) {
    if (entry && typeof entry === 'object' && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}

export function createConfigLoader(): DeploymentConfigLoader {
  return new DeploymentConfigLoader();
}
