import Joi from 'joi';
import { ConfigValidationResult } from './types.js';

/**
 * Shape of an environment file (`config/<environment>.yml`) after defaults are applied
 */
export interface ConfigFile {
  project: string;
  environment?: string;
  aws: {
    region: string;
    zone: string;
    profile?: string;
  };
  compute: {
    instance_type: string;
    image_id?: string;
  };
  storage: {
    root_volume_gb: number;
    data_volume_gb: number;
    volume_type: 'gp2' | 'gp3' | 'standard';
  };
  network: {
    vpc_cidr: string;
    subnet_cidr: string;
    ssh_source_range: string;
  };
  application: {
    package: string;
    start_command?: string;
    port: number;
    rate_limit_per_minute: number;
  };
  monitoring: {
    notification_email?: string;
  };
  budget: {
    monthly_limit_usd: number;
  };
  state: {
    directory: string;
  };
  logging: {
    directory: string;
  };
  timeouts: {
    readiness_attempts: number;
    readiness_interval_ms: number;
  };
  force: boolean;
}

const cidrPattern = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;

const awsSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    }),
  zone: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d[a-z]$/)
    .default((parent: { region?: string }) => `${parent.region ?? 'us-east-1'}a`)
    .messages({
      'string.pattern.base': 'Availability zone must be a valid zone identifier (e.g., us-east-1a)'
    }),
  profile: Joi.string().optional()
});

const computeSchema = Joi.object({
  instance_type: Joi.string()
    .pattern(/^[a-z][a-z0-9]*\.[a-z0-9]+$/)
    .default('t2.micro')
    .messages({
      'string.pattern.base': 'Instance type must look like "t2.micro"'
    }),
  image_id: Joi.string()
    .pattern(/^ami-[0-9a-f]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Image id must be an AMI id (e.g., ami-0abc1234)'
    })
});

const storageSchema = Joi.object({
  root_volume_gb: Joi.number().integer().min(8).max(16384).default(10).messages({
    'number.min': 'Root volume must be at least 8 GB'
  }),
  data_volume_gb: Joi.number().integer().min(1).max(16384).default(20),
  volume_type: Joi.string().valid('gp2', 'gp3', 'standard').default('gp3').messages({
    'any.only': 'Volume type must be one of: gp2, gp3, standard'
  })
});

const networkSchema = Joi.object({
  vpc_cidr: Joi.string().pattern(cidrPattern).default('10.0.0.0/16').messages({
    'string.pattern.base': 'VPC CIDR must be an IPv4 CIDR block'
  }),
  subnet_cidr: Joi.string().pattern(cidrPattern).default('10.0.1.0/24').messages({
    'string.pattern.base': 'Subnet CIDR must be an IPv4 CIDR block'
  }),
  ssh_source_range: Joi.string().pattern(cidrPattern).default('0.0.0.0/0').messages({
    'string.pattern.base': 'SSH source range must be an IPv4 CIDR block'
  })
});

const applicationSchema = Joi.object({
  package: Joi.string()
    .required()
    .pattern(/^(@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*(@[a-zA-Z0-9.^~*-]+)?$/)
    .messages({
      'any.required': 'Application package is required',
      'string.pattern.base': 'Application package must be an npm package spec (e.g., my-proxy@1.2.0)'
    }),
  start_command: Joi.string().pattern(/^[a-zA-Z0-9@._-]+( [^\n]+)?$/).optional().messages({
    'string.pattern.base': 'Start command must be an installed bin name followed by its arguments'
  }),
  port: Joi.number().port().default(3456),
  rate_limit_per_minute: Joi.number().integer().min(1).default(30)
});

const configFileSchema = Joi.object<ConfigFile>({
  project: Joi.string()
    .required()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .min(1)
    .max(40)
    .messages({
      'any.required': 'Project name is required',
      'string.pattern.base': 'Project name must contain only alphanumeric characters, hyphens, and underscores',
      'string.max': 'Project name must be no more than 40 characters long'
    }),
  environment: Joi.string().pattern(/^[a-z0-9-]+$/).optional(),
  aws: awsSchema.default(),
  compute: computeSchema.default(),
  storage: storageSchema.default(),
  network: networkSchema.default(),
  application: applicationSchema.required(),
  monitoring: Joi.object({
    notification_email: Joi.string().email().optional().messages({
      'string.email': 'Notification email must be a valid email address'
    })
  }).default(),
  budget: Joi.object({
    monthly_limit_usd: Joi.number().positive().default(1)
  }).default(),
  state: Joi.object({
    directory: Joi.string().default('.deploy-state')
  }).default(),
  logging: Joi.object({
    directory: Joi.string().default('logs')
  }).default(),
  timeouts: Joi.object({
    readiness_attempts: Joi.number().integer().min(1).default(60),
    readiness_interval_ms: Joi.number().integer().min(0).default(30000)
  }).default(),
  force: Joi.boolean().default(false)
}).unknown(false);

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates an environment file object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = configFileSchema.validate(config, validationOptions);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates an environment file object and applies defaults
 * @throws Error listing every violation if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ConfigFile {
  const { error, value } = configFileSchema.validate(config, validationOptions);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<ConfigFile> {
  return configFileSchema;
}
