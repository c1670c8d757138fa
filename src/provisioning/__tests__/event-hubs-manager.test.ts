import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AuthorizationRuleManager, EventHubManager, EventHubNamespaceManager } from '../event-hubs-manager.js';
import { AuthorizationRuleDescriptor } from '../../types/index.js';
import { UnsupportedResource } from '../../errors.js';
import { eventHub, namespace, resourceGroup } from '../../orchestration/__tests__/fixtures.js';
import { HUB1, NS1, RG1, RULE1, conflict, context, notFound, provisioned, request } from './helpers.js';

function namespacesApi() {
  return {
    beginCreateOrUpdateAndWait: vi.fn(),
    beginDeleteAndWait: vi.fn(),
    get: vi.fn(),
    createOrUpdateAuthorizationRule: vi.fn(),
    deleteAuthorizationRule: vi.fn(),
    getAuthorizationRule: vi.fn()
  };
}

function authorizationRule(name: string, ns: string): AuthorizationRuleDescriptor {
  return {
    kind: 'AuthorizationRule',
    name,
    region: 'eastus',
    configuration: { namespace: ns, rights: ['Listen', 'Send'] },
    dependsOn: [ns]
  };
}

const group = provisioned(resourceGroup('rg1'), RG1);
const ns = provisioned(namespace('ns1', 'rg1'), NS1);

describe('EventHubNamespaceManager', () => {
  let namespaces: ReturnType<typeof namespacesApi>;
  let manager: EventHubNamespaceManager;

  beforeEach(() => {
    namespaces = namespacesApi();
    manager = new EventHubNamespaceManager(namespaces, context);
  });

  it('should create the namespace with its SKU as name and tier', async () => {
    namespaces.beginCreateOrUpdateAndWait.mockResolvedValue({
      id: NS1,
      provisioningState: 'Succeeded',
      serviceBusEndpoint: 'https://ns1.servicebus.windows.net:443/'
    });

    const result = await manager.create(request(namespace('ns1', 'rg1'), group));

    expect(namespaces.beginCreateOrUpdateAndWait).toHaveBeenCalledWith(
      'rg1',
      'ns1',
      { location: 'eastus', sku: { name: 'Standard', tier: 'Standard' }, tags: {} },
      { updateIntervalInMs: 0, abortSignal: undefined }
    );
    expect(result).toEqual({
      resourceId: NS1,
      provisioningState: 'Succeeded',
      metadata: { serviceBusEndpoint: 'https://ns1.servicebus.windows.net:443/' }
    });
  });

  it('should treat a missing namespace as deleted', async () => {
    namespaces.beginDeleteAndWait.mockRejectedValue(notFound());

    await manager.delete(NS1);

    expect(namespaces.beginDeleteAndWait).toHaveBeenCalledWith('rg1', 'ns1', {
      updateIntervalInMs: 0,
      abortSignal: undefined
    });
  });

  it('should report the namespace state', async () => {
    namespaces.get.mockResolvedValue({ id: NS1, name: 'ns1', provisioningState: 'Activating' });

    expect(await manager.get(NS1)).toEqual({
      identifier: NS1,
      kind: 'EventHubNamespace',
      name: 'ns1',
      provisioningState: 'Activating'
    });
  });

  it('should identify the namespace by its configured group', () => {
    expect(manager.identify(request(namespace('ns1', 'rg1')))).toBe(NS1);
  });
});

describe('EventHubManager', () => {
  let eventHubs: { createOrUpdate: Mock; delete: Mock; get: Mock };
  let manager: EventHubManager;

  beforeEach(() => {
    eventHubs = { createOrUpdate: vi.fn(), delete: vi.fn(), get: vi.fn() };
    manager = new EventHubManager(eventHubs, context);
  });

  it('should create the hub inside its namespace', async () => {
    eventHubs.createOrUpdate.mockResolvedValue({ id: HUB1, status: 'Active' });

    const result = await manager.create(request(eventHub('hub1', 'ns1'), ns));

    expect(eventHubs.createOrUpdate).toHaveBeenCalledWith(
      'rg1',
      'ns1',
      'hub1',
      { partitionCount: 4, messageRetentionInDays: 1 },
      { abortSignal: undefined }
    );
    expect(result).toEqual({ resourceId: HUB1, metadata: { status: 'Active' } });
  });

  it('should refuse to create before its namespace exists', async () => {
    await expect(manager.create(request(eventHub('hub1', 'ns1')))).rejects.toThrow(
      'EventHub hub1 needs EventHubNamespace ns1, which has not been provisioned'
    );
  });

  it('should refuse a dependency whose id is not a namespace', async () => {
    const wrong = provisioned(namespace('ns1', 'rg1'), RG1);

    await expect(manager.create(request(eventHub('hub1', 'ns1'), wrong))).rejects.toThrow(UnsupportedResource);
  });

  it('should delete by namespace and hub name', async () => {
    eventHubs.delete.mockResolvedValue(undefined);

    await manager.delete(HUB1);

    expect(eventHubs.delete).toHaveBeenCalledWith('rg1', 'ns1', 'hub1');
  });

  it('should rethrow delete errors other than not found', async () => {
    eventHubs.delete.mockRejectedValue(conflict());

    await expect(manager.delete(HUB1)).rejects.toThrow('Conflict');
  });

  it('should return null for a missing hub', async () => {
    eventHubs.get.mockRejectedValue(notFound());

    expect(await manager.get(HUB1)).toBeNull();
  });

  it('should identify the hub from its provisioned namespace', () => {
    expect(manager.identify(request(eventHub('hub1', 'ns1'), ns))).toBe(HUB1);
  });
});

describe('AuthorizationRuleManager', () => {
  let namespaces: ReturnType<typeof namespacesApi>;
  let manager: AuthorizationRuleManager;

  beforeEach(() => {
    namespaces = namespacesApi();
    manager = new AuthorizationRuleManager(namespaces, context);
  });

  it('should create the rule with its rights', async () => {
    namespaces.createOrUpdateAuthorizationRule.mockResolvedValue({});

    const result = await manager.create(request(authorizationRule('rule1', 'ns1'), ns));

    expect(namespaces.createOrUpdateAuthorizationRule).toHaveBeenCalledWith(
      'rg1',
      'ns1',
      'rule1',
      { rights: ['Listen', 'Send'] },
      { abortSignal: undefined }
    );
    expect(result).toEqual({ resourceId: RULE1 });
  });

  it('should delete and look up by namespace and rule name', async () => {
    namespaces.deleteAuthorizationRule.mockResolvedValue(undefined);
    namespaces.getAuthorizationRule.mockResolvedValue({ id: RULE1, name: 'rule1' });

    await manager.delete(RULE1);
    const state = await manager.get(RULE1);

    expect(namespaces.deleteAuthorizationRule).toHaveBeenCalledWith('rg1', 'ns1', 'rule1');
    expect(state).toEqual({ identifier: RULE1, kind: 'AuthorizationRule', name: 'rule1', provisioningState: 'Succeeded' });
  });

  it('should treat a missing rule as deleted', async () => {
    namespaces.deleteAuthorizationRule.mockRejectedValue(notFound());

    await expect(manager.delete(RULE1)).resolves.toBeUndefined();
  });
});
