import Joi from 'joi';
import { ProvisionerConfig } from '../types/index.js';
import { InvalidConfiguration } from '../errors.js';

export interface ConfigValidationResult {
  valid: boolean;
  /** Every problem found, not just the first */
  errors: string[];
}

// Joi schema for AzureSettings
const azureSettingsSchema = Joi.object({
  subscription_id: Joi.string()
    .required()
    .guid()
    .messages({
      'any.required': 'Azure subscription id is required (set AZURE_SUBSCRIPTION_ID)',
      'string.empty': 'Azure subscription id is required (set AZURE_SUBSCRIPTION_ID)',
      'string.guid': 'Azure subscription id must be a GUID (set AZURE_SUBSCRIPTION_ID)'
    }),
  region: Joi.string()
    .pattern(/^[a-z0-9]+$/)
    .default('eastus')
    .messages({
      'string.pattern.base': 'Azure region must be a lowercase region name such as eastus'
    })
});

// Prefixes start the generated names, so they must already begin with a letter
const prefixSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .max(20)
  .messages({
    'string.pattern.base': '{{#label}} must start with a letter and contain only letters, digits and hyphens',
    'string.max': '{{#label}} must be no more than 20 characters long'
  });

const namingSettingsSchema = Joi.object({
  resource_group_prefix: prefixSchema.default('rgEvHb'),
  namespace_prefix: prefixSchema.default('ns'),
  cosmos_prefix: prefixSchema.default('docdb')
});

const cosmosLocationSchema = Joi.object({
  name: Joi.string()
    .required()
    .pattern(/^[a-z0-9]+$/)
    .messages({
      'string.pattern.base': 'Cosmos DB location must be a lowercase region name'
    }),
  failover_priority: Joi.number().integer().min(0).required(),
  zone_redundant: Joi.boolean().default(false)
});

const cosmosConfigSchema = Joi.object({
  kind: Joi.string()
    .valid('GlobalDocumentDB', 'MongoDB', 'Parse')
    .default('MongoDB')
    .messages({
      'any.only': 'Cosmos DB kind must be one of: GlobalDocumentDB, MongoDB, Parse'
    }),
  consistency_level: Joi.string()
    .valid('Eventual', 'Session', 'BoundedStaleness', 'Strong', 'ConsistentPrefix')
    .default('Eventual'),
  max_interval_seconds: Joi.number().integer().min(0).max(86400).optional(),
  max_staleness_prefix: Joi.number().integer().min(0).optional(),
  locations: Joi.array()
    .items(cosmosLocationSchema)
    .min(1)
    .unique('failover_priority')
    .unique('name')
    .required()
    .messages({
      'array.min': 'At least one Cosmos DB location is required',
      'array.unique': 'Cosmos DB locations must have distinct names and failover priorities'
    })
});

const eventHubConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/)
    .max(256)
    .default('FirstEventHub')
    .messages({
      'string.pattern.base': 'Event hub name must start with a letter or digit and contain only letters, digits, periods, hyphens and underscores'
    }),
  sku: Joi.string().valid('Basic', 'Standard', 'Premium').default('Standard'),
  partition_count: Joi.number().integer().min(1).max(32).default(4),
  message_retention_days: Joi.number().integer().min(1).max(7).default(1),
  authorization_rule: Joi.string()
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/)
    .max(256)
    .default('DiagnosticsStream')
});

const diagnosticsConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9 ._-]*$/)
    .default('DiaEventHub'),
  metrics: Joi.array()
    .items(
      Joi.object({
        category: Joi.string().required(),
        time_grain: Joi.string()
          .pattern(/^P(T\d+[HMS])+$|^P\d+D$/)
          .default('PT5M')
          .messages({
            'string.pattern.base': 'Metric time grain must be an ISO 8601 duration such as PT5M'
          })
      })
    )
    .default([{ category: 'AllMetrics', time_grain: 'PT5M' }]),
  logs: Joi.array().items(Joi.string()).default(['DataPlaneRequests', 'MongoRequests'])
});

const runSettingsSchema = Joi.object({
  poll_interval_ms: Joi.number().integer().min(0).default(5000),
  operation_timeout_ms: Joi.number().integer().min(1000).default(1800000),
  tags: Joi.object()
    .pattern(Joi.string(), Joi.string())
    .default({})
    .messages({
      'object.pattern.match': 'Tags must be key-value pairs of strings'
    })
});

// Main ProvisionerConfig schema
const provisionerConfigSchema: Joi.ObjectSchema<ProvisionerConfig> = Joi.object({
  azure: azureSettingsSchema.required(),
  naming: namingSettingsSchema.default(),
  cosmos: cosmosConfigSchema.required(),
  event_hub: eventHubConfigSchema.default(),
  diagnostics: diagnosticsConfigSchema.default(),
  run: runSettingsSchema.default()
})
  .custom((value: ProvisionerConfig, helpers) => {
    // Also runs when a child failed, so the sections may be malformed here
    const { diagnostics } = value;
    if (diagnostics?.metrics?.length === 0 && diagnostics.logs?.length === 0) {
      return helpers.message({ custom: 'Diagnostics must stream at least one metric or log category' });
    }
    return value;
  })
  .unknown(false);

/**
 * Validates a provisioner configuration object against the schema
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = provisionerConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

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
 * Validates and normalizes a provisioner configuration
 * @returns The validated configuration with defaults applied
 * @throws InvalidConfiguration if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ProvisionerConfig {
  const { error, value } = provisionerConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    throw new InvalidConfiguration(error.details.map(detail => detail.message));
  }

  return value;
}

/**
 * Gets the Joi schema for provisioner configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<ProvisionerConfig> {
  return provisionerConfigSchema;
}
