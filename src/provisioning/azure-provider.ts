/**
 * Azure implementation of ResourceProvider.
 *
 * Creates go to the manager for the descriptor's kind; deletes and lookups
 * go to the manager for the kind parsed out of the ARM id. Long-running
 * operations are awaited by the SDK pollers; a create that still reports a
 * non-terminal provisioning state is polled through `get` until it settles.
 */

import { setTimeout as sleep } from 'timers/promises';
import { CosmosDBManagementClient } from '@azure/arm-cosmosdb';
import { EventHubManagementClient } from '@azure/arm-eventhub';
import { MonitorClient } from '@azure/arm-monitor';
import { ResourceManagementClient } from '@azure/arm-resources';
import { DefaultAzureCredential, TokenCredential } from '@azure/identity';
import { ProvisionerConfig, ResourceKind, ResourceState, TerminalState } from '../types/index.js';
import { ProvisioningLogger, consoleLogger } from '../logger.js';
import { CreateRequest, ProvisioningResult, RemoteResource, ResourceManager, ResourceProvider } from './types.js';
import { AzureManagerContext } from './azure-common.js';
import { parseResourceId } from './resource-id.js';
import { ResourceGroupManager } from './resource-group-manager.js';
import { CosmosAccountManager } from './cosmos-account-manager.js';
import { AuthorizationRuleManager, EventHubManager, EventHubNamespaceManager } from './event-hubs-manager.js';
import { DiagnosticSettingsManager } from './diagnostic-settings-manager.js';

export type AzureManagers = { [K in ResourceKind]: ResourceManager<K> };

export interface AzureProviderOptions {
  managers: AzureManagers;
  /** Interval between `get` polls for creates that return before settling */
  pollIntervalMs: number;
  /** Upper bound on that polling */
  operationTimeoutMs: number;
  logger?: ProvisioningLogger;
}

/**
 * Map a provisioning state onto a terminal state; null while still in progress.
 */
export function terminalStateOf(provisioningState: string | undefined): TerminalState | null {
  if (provisioningState === undefined) {
    return 'Succeeded';
  }
  switch (provisioningState.toLowerCase()) {
    case 'succeeded':
      return 'Succeeded';
    case 'failed':
      return 'Failed';
    case 'canceled':
    case 'cancelled':
      return 'Canceled';
    default:
      return null;
  }
}

export class AzureResourceProvider implements ResourceProvider {
  private readonly managers: AzureManagers;
  private readonly pollIntervalMs: number;
  private readonly operationTimeoutMs: number;
  private readonly logger: ProvisioningLogger;

  constructor(options: AzureProviderOptions) {
    this.managers = options.managers;
    this.pollIntervalMs = options.pollIntervalMs;
    this.operationTimeoutMs = options.operationTimeoutMs;
    this.logger = options.logger ?? consoleLogger;
  }

  async createOrUpdate(request: CreateRequest): Promise<ProvisioningResult> {
    const remote = await this.createWithManager(request);
    let provisioningState = remote.provisioningState;
    let state = terminalStateOf(provisioningState);

    if (state === null) {
      provisioningState = await this.waitForTerminalState(remote.resourceId, request.signal);
      state = terminalStateOf(provisioningState) ?? 'Failed';
    }

    return {
      resourceId: remote.resourceId,
      state,
      provisioningState,
      metadata: remote.metadata
    };
  }

  async delete(identifier: string): Promise<TerminalState> {
    const { kind } = parseResourceId(identifier);
    await this.managers[kind].delete(identifier);
    return 'Succeeded';
  }

  async get(identifier: string): Promise<ResourceState | null> {
    const { kind } = parseResourceId(identifier);
    return this.managers[kind].get(identifier);
  }

  identify(request: CreateRequest): string {
    const { descriptor } = request;
    switch (descriptor.kind) {
      case 'ResourceGroup':
        return this.managers.ResourceGroup.identify({ ...request, descriptor });
      case 'CosmosDBAccount':
        return this.managers.CosmosDBAccount.identify({ ...request, descriptor });
      case 'EventHubNamespace':
        return this.managers.EventHubNamespace.identify({ ...request, descriptor });
      case 'EventHub':
        return this.managers.EventHub.identify({ ...request, descriptor });
      case 'AuthorizationRule':
        return this.managers.AuthorizationRule.identify({ ...request, descriptor });
      case 'DiagnosticSetting':
        return this.managers.DiagnosticSetting.identify({ ...request, descriptor });
    }
  }

  private createWithManager(request: CreateRequest): Promise<RemoteResource> {
    const { descriptor } = request;
    switch (descriptor.kind) {
      case 'ResourceGroup':
        return this.managers.ResourceGroup.create({ ...request, descriptor });
      case 'CosmosDBAccount':
        return this.managers.CosmosDBAccount.create({ ...request, descriptor });
      case 'EventHubNamespace':
        return this.managers.EventHubNamespace.create({ ...request, descriptor });
      case 'EventHub':
        return this.managers.EventHub.create({ ...request, descriptor });
      case 'AuthorizationRule':
        return this.managers.AuthorizationRule.create({ ...request, descriptor });
      case 'DiagnosticSetting':
        return this.managers.DiagnosticSetting.create({ ...request, descriptor });
    }
  }

  private async waitForTerminalState(identifier: string, signal?: AbortSignal): Promise<string> {
    const startTime = Date.now();
    const { kind } = parseResourceId(identifier);

    while (Date.now() - startTime < this.operationTimeoutMs) {
      await sleep(this.pollIntervalMs, undefined, { signal });

      const resource = await this.managers[kind].get(identifier, { signal });
      if (!resource) {
        throw new Error(`Resource ${identifier} disappeared while it was being provisioned`);
      }
      if (terminalStateOf(resource.provisioningState) !== null) {
        return resource.provisioningState;
      }
      this.logger.debug(`Still ${resource.provisioningState}: ${identifier}`);
    }

    throw new Error(`Provisioning of ${identifier} timed out after ${this.operationTimeoutMs / 1000} seconds`);
  }
}

export interface AzureProviderFactoryOptions {
  config: ProvisionerConfig;
  /** Defaults to DefaultAzureCredential */
  credential?: TokenCredential;
  logger?: ProvisioningLogger;
}

/**
 * Build the SDK clients and managers for a subscription and wrap them in a provider.
 */
export function createAzureProvider(options: AzureProviderFactoryOptions): AzureResourceProvider {
  const { config } = options;
  const subscriptionId = config.azure.subscription_id;
  const credential = options.credential ?? new DefaultAzureCredential();
  const logger = options.logger ?? consoleLogger;

  const resources = new ResourceManagementClient(credential, subscriptionId);
  const cosmos = new CosmosDBManagementClient(credential, subscriptionId);
  const eventHubs = new EventHubManagementClient(credential, subscriptionId);
  const monitor = new MonitorClient(credential, subscriptionId);

  const context: AzureManagerContext = {
    subscriptionId,
    pollIntervalMs: config.run.poll_interval_ms,
    logger
  };

  return new AzureResourceProvider({
    managers: {
      ResourceGroup: new ResourceGroupManager(resources.resourceGroups, context),
      CosmosDBAccount: new CosmosAccountManager(cosmos.databaseAccounts, context),
      EventHubNamespace: new EventHubNamespaceManager(eventHubs.namespaces, context),
      EventHub: new EventHubManager(eventHubs.eventHubs, context),
      AuthorizationRule: new AuthorizationRuleManager(eventHubs.namespaces, context),
      DiagnosticSetting: new DiagnosticSettingsManager(monitor.diagnosticSettings, context)
    },
    pollIntervalMs: config.run.poll_interval_ms,
    operationTimeoutMs: config.run.operation_timeout_ms,
    logger
  });
}
