/**
 * Cosmos DB account provisioning via @azure/arm-cosmosdb.
 */

import type { DatabaseAccounts } from '@azure/arm-cosmosdb';
import { CosmosAccountDescriptor, ResourceState } from '../types/index.js';
import { isNotFound } from '../errors.js';
import { CreateRequest, OperationOptions, RemoteResource, ResourceManager } from './types.js';
import { AzureManagerContext, pollerOptions, requireDependency } from './azure-common.js';
import { cosmosAccountId, expectKind } from './resource-id.js';

export type DatabaseAccountsApi = Pick<DatabaseAccounts, 'beginCreateOrUpdateAndWait' | 'beginDeleteAndWait' | 'get'>;

export class CosmosAccountManager implements ResourceManager<'CosmosDBAccount'> {
  readonly kind = 'CosmosDBAccount';

  constructor(
    private readonly databaseAccounts: DatabaseAccountsApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<CosmosAccountDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;
    const settings = descriptor.configuration;
    const { resourceGroup } = requireDependency(request, settings.resourceGroup, 'ResourceGroup');

    this.context.logger.debug(
      `Creating ${settings.kind} Cosmos DB account ${descriptor.name} replicated to ${settings.locations.map(l => l.name).join(', ')}`
    );
    const account = await this.databaseAccounts.beginCreateOrUpdateAndWait(
      resourceGroup,
      descriptor.name,
      {
        location: descriptor.region,
        kind: settings.kind,
        databaseAccountOfferType: 'Standard',
        consistencyPolicy: {
          defaultConsistencyLevel: settings.consistencyLevel,
          maxIntervalInSeconds: settings.maxIntervalInSeconds,
          maxStalenessPrefix: settings.maxStalenessPrefix
        },
        locations: settings.locations.map(location => ({
          locationName: location.name,
          failoverPriority: location.failoverPriority,
          isZoneRedundant: location.zoneRedundant
        })),
        tags: { ...settings.tags }
      },
      pollerOptions(this.context, signal)
    );

    return {
      resourceId: account.id ?? this.identify(request),
      provisioningState: account.provisioningState,
      metadata: account.documentEndpoint ? { documentEndpoint: account.documentEndpoint } : undefined
    };
  }

  async delete(identifier: string): Promise<void> {
    const { resourceGroup, names } = expectKind(identifier, 'CosmosDBAccount');
    try {
      await this.databaseAccounts.beginDeleteAndWait(resourceGroup, names[0], pollerOptions(this.context));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { resourceGroup, names } = expectKind(identifier, 'CosmosDBAccount');
    try {
      const account = await this.databaseAccounts.get(resourceGroup, names[0], { abortSignal: options.signal });
      return {
        identifier: account.id ?? identifier,
        kind: this.kind,
        name: account.name ?? names[0],
        provisioningState: account.provisioningState ?? 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<CosmosAccountDescriptor>): string {
    const { descriptor } = request;
    return cosmosAccountId(this.context.subscriptionId, descriptor.configuration.resourceGroup, descriptor.name);
  }
}
