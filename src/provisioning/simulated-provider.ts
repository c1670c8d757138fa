import { setTimeout as sleep } from 'timers/promises';
import { ResourceState, TerminalState } from '../types/index.js';
import { CreateRequest, ProvisioningResult, ResourceProvider } from './types.js';
import {
  authorizationRuleId,
  cosmosAccountId,
  diagnosticSettingId,
  eventHubId,
  namespaceId,
  parseResourceId,
  resourceGroupId
} from './resource-id.js';

export const SIMULATED_SUBSCRIPTION_ID = '00000000-0000-0000-0000-000000000000';

/**
 * The environment with AZURE_SUBSCRIPTION_ID defaulted, for commands that
 * never reach Azure but still load configuration.
 */
export function simulatedEnvironment(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return { ...env, AZURE_SUBSCRIPTION_ID: env.AZURE_SUBSCRIPTION_ID || SIMULATED_SUBSCRIPTION_ID };
}

export interface SimulatedProviderOptions {
  subscriptionId?: string;
  /** Milliseconds every operation takes; aborting the request's signal cuts a create short */
  simulateDelay?: number;
  /** Descriptor names whose create ends in the Failed state */
  failCreate?: string[];
  /** Resource names whose delete throws */
  failDelete?: string[];
}

export interface SimulatedCall {
  operation: 'create' | 'delete' | 'get';
  identifier: string;
  /** Descriptor name for creates, last id segment otherwise */
  name: string;
}

/**
 * Simulated Provider for Testing
 *
 * Holds resources in memory under real-looking ARM ids. Nothing leaves the
 * process. Deleting a resource group takes everything inside it along.
 */
export class SimulatedResourceProvider implements ResourceProvider {
  readonly calls: SimulatedCall[] = [];

  private readonly subscriptionId: string;
  private readonly simulateDelay: number;
  private readonly failCreate: Set<string>;
  private readonly failDelete: Set<string>;
  private readonly resources = new Map<string, ResourceState>();

  constructor(options: SimulatedProviderOptions = {}) {
    this.subscriptionId = options.subscriptionId ?? SIMULATED_SUBSCRIPTION_ID;
    this.simulateDelay = options.simulateDelay ?? 0;
    this.failCreate = new Set(options.failCreate ?? []);
    this.failDelete = new Set(options.failDelete ?? []);
  }

  async createOrUpdate(request: CreateRequest): Promise<ProvisioningResult> {
    const { descriptor } = request;
    const identifier = this.identify(request);
    this.calls.push({ operation: 'create', identifier, name: descriptor.name });

    await this.delay(request.signal);

    if (this.failCreate.has(descriptor.name)) {
      return { resourceId: identifier, state: 'Failed', provisioningState: 'Failed' };
    }

    this.resources.set(identifier.toLowerCase(), {
      identifier,
      kind: descriptor.kind,
      name: descriptor.name,
      provisioningState: 'Succeeded'
    });
    return { resourceId: identifier, state: 'Succeeded', provisioningState: 'Succeeded' };
  }

  async delete(identifier: string): Promise<TerminalState> {
    const name = lastSegment(identifier);
    this.calls.push({ operation: 'delete', identifier, name });

    await this.delay();

    if (this.failDelete.has(name)) {
      throw new Error(`Simulated failure deleting ${identifier}`);
    }

    const key = identifier.toLowerCase();
    for (const existing of [...this.resources.keys()]) {
      if (existing === key || existing.startsWith(`${key}/`)) {
        this.resources.delete(existing);
      }
    }
    return 'Succeeded';
  }

  async get(identifier: string): Promise<ResourceState | null> {
    this.calls.push({ operation: 'get', identifier, name: lastSegment(identifier) });
    const resource = this.resources.get(identifier.toLowerCase());
    return resource ? { ...resource } : null;
  }

  identify(request: CreateRequest): string {
    const { descriptor } = request;
    const parent = (name: string) => {
      const provisioned = request.dependencies.get(name);
      if (!provisioned) {
        throw new Error(`${descriptor.kind} ${descriptor.name} needs ${name}, which has not been provisioned`);
      }
      return parseResourceId(provisioned.identifier);
    };

    switch (descriptor.kind) {
      case 'ResourceGroup':
        return resourceGroupId(this.subscriptionId, descriptor.name);
      case 'CosmosDBAccount':
        return cosmosAccountId(this.subscriptionId, descriptor.configuration.resourceGroup, descriptor.name);
      case 'EventHubNamespace':
        return namespaceId(this.subscriptionId, descriptor.configuration.resourceGroup, descriptor.name);
      case 'EventHub': {
        const ns = parent(descriptor.configuration.namespace);
        return eventHubId(ns.subscriptionId, ns.resourceGroup, ns.names[0], descriptor.name);
      }
      case 'AuthorizationRule': {
        const ns = parent(descriptor.configuration.namespace);
        return authorizationRuleId(ns.subscriptionId, ns.resourceGroup, ns.names[0], descriptor.name);
      }
      case 'DiagnosticSetting':
        return diagnosticSettingId(parent(descriptor.configuration.target).id, descriptor.name);
    }
  }

  /** Identifiers currently held, in creation order */
  listResources(): string[] {
    return [...this.resources.values()].map(resource => resource.identifier);
  }

  has(identifier: string): boolean {
    return this.resources.has(identifier.toLowerCase());
  }

  private async delay(signal?: AbortSignal): Promise<void> {
    if (this.simulateDelay > 0) {
      await sleep(this.simulateDelay, undefined, { signal });
    } else {
      signal?.throwIfAborted();
    }
  }
}

function lastSegment(identifier: string): string {
  return identifier.split('/').pop() ?? '';
}
