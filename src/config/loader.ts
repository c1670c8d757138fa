// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { ProvisionerConfig } from '../types/index.js';
import { InvalidConfiguration, describeError } from '../errors.js';
import { ConfigValidationResult, validateAndNormalizeConfig, validateConfig } from './validator.js';

type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };
type ConfigObject = { [key: string]: ConfigValue };

export interface ConfigLoader {
  load(path: string): Promise<ProvisionerConfig>;
  validate(config: unknown): ConfigValidationResult;
}

/**
 * An East US resource group holding a MongoDB Cosmos DB account replicated to
 * West US and South Central US.
 */
export const DEFAULT_CONFIG: ConfigObject = {
  azure: {
    subscription_id: '${AZURE_SUBSCRIPTION_ID:-}',
    region: 'eastus'
  },
  cosmos: {
    kind: 'MongoDB',
    consistency_level: 'Eventual',
    max_interval_seconds: 0,
    max_staleness_prefix: 0,
    locations: [
      { name: 'westus', failover_priority: 0, zone_redundant: false },
      { name: 'southcentralus', failover_priority: 1, zone_redundant: false }
    ]
  },
  run: {
    tags: { ManagedBy: 'ehub-provisioner' }
  }
};

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class ProvisionerConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated and normalized ProvisionerConfig
   */
  async load(path: string): Promise<ProvisionerConfig> {
    if (!existsSync(path)) {
      throw new InvalidConfiguration([`Configuration file not found: ${path}`]);
    }

    let rawConfig: unknown;
    try {
      const content = await readFile(path, 'utf-8');

      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      throw new InvalidConfiguration([`Failed to load configuration from ${path}: ${describeError(error)}`]);
    }

    // An empty YAML document parses to null and means "all defaults"
    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }
    if (!isConfigObject(rawConfig)) {
      throw new InvalidConfiguration([`Configuration in ${path} must be a mapping at the top level`]);
    }

    return this.fromObject(rawConfig);
  }

  /**
   * Build a configuration from defaults and environment variables only
   */
  loadDefaults(): ProvisionerConfig {
    return this.fromObject({});
  }

  /**
   * Apply defaults, resolve environment variables and validate a raw configuration object
   */
  fromObject(rawConfig: ConfigObject): ProvisionerConfig {
    const merged = this.deepMerge(DEFAULT_CONFIG, rawConfig);
    return validateAndNormalizeConfig(this.resolveEnvironmentVariables(merged));
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: ConfigValue): ConfigValue {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isConfigObject(value)) {
      const result: ConfigObject = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const separator = varExpression.indexOf(':-');
      const varName = separator === -1 ? varExpression : varExpression.slice(0, separator);
      const envValue = this.env[varName];

      if (envValue !== undefined && envValue !== '') {
        return envValue;
      }

      if (separator !== -1) {
        return varExpression.slice(separator + 2);
      }

      // Unset and no default: keep the placeholder so validation names it
      return match;
    });
  }

  /**
   * Deep merge two objects, with the second object taking precedence.
   * Arrays are replaced, not merged.
   */
  private deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
    const result: ConfigObject = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isConfigObject(value) && isConfigObject(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: NodeJS.ProcessEnv): ProvisionerConfigLoader {
  return new ProvisionerConfigLoader(env);
}

/**
 * Load configuration from a file when one is given, otherwise from defaults and the environment
 */
export async function loadConfig(path?: string, env?: NodeJS.ProcessEnv): Promise<ProvisionerConfig> {
  const loader = createConfigLoader(env);
  return path ? loader.load(path) : loader.loadDefaults();
}
