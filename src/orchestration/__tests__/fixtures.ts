import { vi, type Mock } from 'vitest';
import {
  CosmosAccountDescriptor,
  DiagnosticSettingDescriptor,
  EventHubDescriptor,
  EventHubNamespaceDescriptor,
  ResourceDescriptor,
  ResourceGroupDescriptor
} from '../../types/index.js';
import { ProvisioningLogger } from '../../logger.js';

export function resourceGroup(name: string, dependsOn: string[] = []): ResourceGroupDescriptor {
  return { kind: 'ResourceGroup', name, region: 'eastus', configuration: { tags: {} }, dependsOn };
}

export function cosmosAccount(name: string, group: string): CosmosAccountDescriptor {
  return {
    kind: 'CosmosDBAccount',
    name,
    region: 'eastus',
    configuration: {
      resourceGroup: group,
      kind: 'MongoDB',
      consistencyLevel: 'Eventual',
      locations: [{ name: 'westus', failoverPriority: 0, zoneRedundant: false }],
      tags: {}
    },
    dependsOn: [group]
  };
}

export function namespace(name: string, group: string): EventHubNamespaceDescriptor {
  return {
    kind: 'EventHubNamespace',
    name,
    region: 'eastus',
    configuration: { resourceGroup: group, sku: 'Standard', tags: {} },
    dependsOn: [group]
  };
}

export function eventHub(name: string, ns: string, dependsOn: string[] = [ns]): EventHubDescriptor {
  return {
    kind: 'EventHub',
    name,
    region: 'eastus',
    configuration: { namespace: ns, partitionCount: 4, messageRetentionInDays: 1 },
    dependsOn
  };
}

export function diagnosticSetting(name: string, target: string, hub: string): DiagnosticSettingDescriptor {
  return {
    kind: 'DiagnosticSetting',
    name,
    region: 'eastus',
    configuration: {
      target,
      eventHub: hub,
      metrics: [{ category: 'AllMetrics', timeGrain: 'PT5M' }],
      logs: ['DataPlaneRequests']
    },
    dependsOn: [target, hub]
  };
}

/** Resource group, Cosmos DB account, namespace, hub and a diagnostic setting on the account */
export function scenarioPlan(): ResourceDescriptor[] {
  return [
    resourceGroup('rg1'),
    cosmosAccount('db1', 'rg1'),
    namespace('ns1', 'rg1'),
    eventHub('hub1', 'ns1'),
    diagnosticSetting('diag1', 'db1', 'hub1')
  ];
}

export function mockLogger(): ProvisioningLogger & {
  info: Mock;
  warn: Mock;
  error: Mock;
  debug: Mock;
} {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}
