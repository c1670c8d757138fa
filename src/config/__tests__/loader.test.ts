import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, rm, mkdir } from 'fs/promises';
import { ProvisionerConfigLoader, createConfigLoader, loadConfig } from '../loader.js';
import { InvalidConfiguration } from '../../errors.js';

const SUBSCRIPTION_ID = '11111111-1111-1111-1111-111111111111';

describe('Configuration Loader', () => {
  const testDir = './test-configs';
  let loader: ProvisionerConfigLoader;

  beforeEach(async () => {
    loader = new ProvisionerConfigLoader({ AZURE_SUBSCRIPTION_ID: SUBSCRIPTION_ID });
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should load a JSON configuration file over the defaults', async () => {
      await writeFile(
        `${testDir}/config.json`,
        JSON.stringify({ azure: { subscription_id: SUBSCRIPTION_ID, region: 'westus2' } }, null, 2)
      );

      const config = await loader.load(`${testDir}/config.json`);

      expect(config.azure).toEqual({ subscription_id: SUBSCRIPTION_ID, region: 'westus2' });
      expect(config.cosmos.locations).toEqual([
        { name: 'westus', failover_priority: 0, zone_redundant: false },
        { name: 'southcentralus', failover_priority: 1, zone_redundant: false }
      ]);
      expect(config.run.tags).toEqual({ ManagedBy: 'ehub-provisioner' });
    });

    it('should load a YAML configuration file', async () => {
      const yamlConfig = `
azure:
  region: westeurope
event_hub:
  name: audit-events
  partition_count: 8
`;
      await writeFile(`${testDir}/config.yaml`, yamlConfig);

      const config = await loader.load(`${testDir}/config.yaml`);

      expect(config.azure.subscription_id).toBe(SUBSCRIPTION_ID);
      expect(config.azure.region).toBe('westeurope');
      expect(config.event_hub.name).toBe('audit-events');
      expect(config.event_hub.partition_count).toBe(8);
      expect(config.event_hub.sku).toBe('Standard');
    });

    it('should resolve environment variables and their defaults', async () => {
      const yamlConfig = `
azure:
  subscription_id: \${AZURE_SUBSCRIPTION_ID}
run:
  tags:
    Owner: \${OWNER:-platform}
    Stage: \${STAGE:-dev}
diagnostics:
  logs:
    - \${LOG_CATEGORY}
`;
      await writeFile(`${testDir}/env.yml`, yamlConfig);
      const envLoader = new ProvisionerConfigLoader({
        AZURE_SUBSCRIPTION_ID: SUBSCRIPTION_ID,
        STAGE: 'prod',
        LOG_CATEGORY: 'ControlPlaneRequests'
      });

      const config = await envLoader.load(`${testDir}/env.yml`);

      expect(config.azure.subscription_id).toBe(SUBSCRIPTION_ID);
      expect(config.run.tags).toEqual({ ManagedBy: 'ehub-provisioner', Owner: 'platform', Stage: 'prod' });
      expect(config.diagnostics.logs).toEqual(['ControlPlaneRequests']);
    });

    it('should replace arrays instead of merging them', async () => {
      await writeFile(
        `${testDir}/config.json`,
        JSON.stringify({ cosmos: { locations: [{ name: 'northeurope', failover_priority: 0 }] } })
      );

      const config = await loader.load(`${testDir}/config.json`);

      expect(config.cosmos.locations).toEqual([{ name: 'northeurope', failover_priority: 0, zone_redundant: false }]);
      expect(config.cosmos.kind).toBe('MongoDB');
    });

    it('should treat an empty YAML file as all defaults', async () => {
      await writeFile(`${testDir}/empty.yml`, '');

      const config = await loader.load(`${testDir}/empty.yml`);

      expect(config.azure.region).toBe('eastus');
      expect(config.event_hub.authorization_rule).toBe('DiagnosticsStream');
    });

    it('should throw error for non-existent file', async () => {
      await expect(loader.load(`${testDir}/missing.yml`)).rejects.toThrow(
        `Configuration file not found: ${testDir}/missing.yml`
      );
    });

    it('should throw error for unsupported file format', async () => {
      await writeFile(`${testDir}/config.txt`, 'azure: {}');

      await expect(loader.load(`${testDir}/config.txt`)).rejects.toThrow('Unsupported file format');
    });

    it('should throw InvalidConfiguration for invalid JSON', async () => {
      await writeFile(`${testDir}/broken.json`, '{ "azure": ');

      await expect(loader.load(`${testDir}/broken.json`)).rejects.toBeInstanceOf(InvalidConfiguration);
    });

    it('should reject a document that is not a mapping', async () => {
      await writeFile(`${testDir}/list.yml`, '- eastus\n- westus\n');

      await expect(loader.load(`${testDir}/list.yml`)).rejects.toThrow(
        `Configuration in ${testDir}/list.yml must be a mapping at the top level`
      );
    });

    it('should keep an unresolved placeholder so validation reports it', async () => {
      await writeFile(`${testDir}/config.yml`, 'azure:\n  subscription_id: ${OTHER_SUBSCRIPTION}\n');

      await expect(loader.load(`${testDir}/config.yml`)).rejects.toThrow(
        'Azure subscription id must be a GUID (set AZURE_SUBSCRIPTION_ID)'
      );
    });
  });

  describe('loadDefaults', () => {
    it('should build a configuration from the environment alone', () => {
      const config = loader.loadDefaults();

      expect(config.azure.subscription_id).toBe(SUBSCRIPTION_ID);
      expect(config.naming.cosmos_prefix).toBe('docdb');
      expect(config.diagnostics.name).toBe('DiaEventHub');
    });

    it('should require AZURE_SUBSCRIPTION_ID when nothing else provides one', () => {
      const bare = createConfigLoader({});

      expect(() => bare.loadDefaults()).toThrow('Azure subscription id is required (set AZURE_SUBSCRIPTION_ID)');
    });
  });

  describe('validate', () => {
    it('should report errors without throwing', () => {
      const result = loader.validate({ azure: { subscription_id: 'not-a-guid' }, cosmos: { locations: [] } });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Azure subscription id must be a GUID (set AZURE_SUBSCRIPTION_ID)',
        'At least one Cosmos DB location is required'
      ]);
    });
  });

  describe('loadConfig', () => {
    it('should use defaults when no path is given', async () => {
      const config = await loadConfig(undefined, { AZURE_SUBSCRIPTION_ID: SUBSCRIPTION_ID });

      expect(config.azure.region).toBe('eastus');
    });

    it('should load the given file', async () => {
      await writeFile(`${testDir}/config.yml`, 'azure:\n  region: uksouth\n');

      const config = await loadConfig(`${testDir}/config.yml`, { AZURE_SUBSCRIPTION_ID: SUBSCRIPTION_ID });

      expect(config.azure.region).toBe('uksouth');
    });
  });
});
