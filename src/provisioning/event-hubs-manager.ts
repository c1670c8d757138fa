/**
 * Event Hubs provisioning via @azure/arm-eventhub.
 *
 * Three managers share the namespace and event hub operation groups:
 * namespaces, event hubs inside them, and namespace authorization rules.
 */

import type { EventHubs, Namespaces } from '@azure/arm-eventhub';
import {
  AuthorizationRuleDescriptor,
  EventHubDescriptor,
  EventHubNamespaceDescriptor,
  ResourceState
} from '../types/index.js';
import { isNotFound } from '../errors.js';
import { CreateRequest, OperationOptions, RemoteResource, ResourceManager } from './types.js';
import { AzureManagerContext, pollerOptions, requireDependency } from './azure-common.js';
import { authorizationRuleId, eventHubId, expectKind, namespaceId } from './resource-id.js';

export type NamespacesApi = Pick<
  Namespaces,
  | 'beginCreateOrUpdateAndWait'
  | 'beginDeleteAndWait'
  | 'get'
  | 'createOrUpdateAuthorizationRule'
  | 'deleteAuthorizationRule'
  | 'getAuthorizationRule'
>;

export type EventHubsApi = Pick<EventHubs, 'createOrUpdate' | 'delete' | 'get'>;

/** Every namespace is created with this rule; diagnostics fall back to it */
export const ROOT_AUTHORIZATION_RULE = 'RootManageSharedAccessKey';

export class EventHubNamespaceManager implements ResourceManager<'EventHubNamespace'> {
  readonly kind = 'EventHubNamespace';

  constructor(
    private readonly namespaces: NamespacesApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<EventHubNamespaceDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;
    const settings = descriptor.configuration;
    const { resourceGroup } = requireDependency(request, settings.resourceGroup, 'ResourceGroup');

    this.context.logger.debug(`Creating ${settings.sku} Event Hubs namespace ${descriptor.name}`);
    const namespace = await this.namespaces.beginCreateOrUpdateAndWait(
      resourceGroup,
      descriptor.name,
      {
        location: descriptor.region,
        sku: { name: settings.sku, tier: settings.sku },
        tags: { ...settings.tags }
      },
      pollerOptions(this.context, signal)
    );

    return {
      resourceId: namespace.id ?? this.identify(request),
      provisioningState: namespace.provisioningState,
      metadata: namespace.serviceBusEndpoint ? { serviceBusEndpoint: namespace.serviceBusEndpoint } : undefined
    };
  }

  async delete(identifier: string): Promise<void> {
    const { resourceGroup, names } = expectKind(identifier, 'EventHubNamespace');
    try {
      await this.namespaces.beginDeleteAndWait(resourceGroup, names[0], pollerOptions(this.context));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { resourceGroup, names } = expectKind(identifier, 'EventHubNamespace');
    try {
      const namespace = await this.namespaces.get(resourceGroup, names[0], { abortSignal: options.signal });
      return {
        identifier: namespace.id ?? identifier,
        kind: this.kind,
        name: namespace.name ?? names[0],
        provisioningState: namespace.provisioningState ?? 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<EventHubNamespaceDescriptor>): string {
    const { descriptor } = request;
    return namespaceId(this.context.subscriptionId, descriptor.configuration.resourceGroup, descriptor.name);
  }
}

export class EventHubManager implements ResourceManager<'EventHub'> {
  readonly kind = 'EventHub';

  constructor(
    private readonly eventHubs: EventHubsApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<EventHubDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;
    const settings = descriptor.configuration;
    const { resourceGroup, names } = requireDependency(request, settings.namespace, 'EventHubNamespace');

    // Synchronous on the service side: the response carries the final entity
    const hub = await this.eventHubs.createOrUpdate(
      resourceGroup,
      names[0],
      descriptor.name,
      {
        partitionCount: settings.partitionCount,
        messageRetentionInDays: settings.messageRetentionInDays
      },
      { abortSignal: signal }
    );

    return {
      resourceId: hub.id ?? eventHubId(this.context.subscriptionId, resourceGroup, names[0], descriptor.name),
      metadata: hub.status ? { status: hub.status } : undefined
    };
  }

  async delete(identifier: string): Promise<void> {
    const { resourceGroup, names } = expectKind(identifier, 'EventHub');
    try {
      await this.eventHubs.delete(resourceGroup, names[0], names[1]);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { resourceGroup, names } = expectKind(identifier, 'EventHub');
    try {
      const hub = await this.eventHubs.get(resourceGroup, names[0], names[1], { abortSignal: options.signal });
      return {
        identifier: hub.id ?? identifier,
        kind: this.kind,
        name: hub.name ?? names[1],
        provisioningState: 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<EventHubDescriptor>): string {
    const { resourceGroup, names } = requireDependency(request, request.descriptor.configuration.namespace, 'EventHubNamespace');
    return eventHubId(this.context.subscriptionId, resourceGroup, names[0], request.descriptor.name);
  }
}

export class AuthorizationRuleManager implements ResourceManager<'AuthorizationRule'> {
  readonly kind = 'AuthorizationRule';

  constructor(
    private readonly namespaces: NamespacesApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<AuthorizationRuleDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;
    const settings = descriptor.configuration;
    const { resourceGroup, names } = requireDependency(request, settings.namespace, 'EventHubNamespace');

    this.context.logger.debug(`Granting ${settings.rights.join('/')} on namespace ${names[0]} through rule ${descriptor.name}`);
    const rule = await this.namespaces.createOrUpdateAuthorizationRule(
      resourceGroup,
      names[0],
      descriptor.name,
      { rights: [...settings.rights] },
      { abortSignal: signal }
    );

    return {
      resourceId: rule.id ?? authorizationRuleId(this.context.subscriptionId, resourceGroup, names[0], descriptor.name)
    };
  }

  async delete(identifier: string): Promise<void> {
    const { resourceGroup, names } = expectKind(identifier, 'AuthorizationRule');
    try {
      await this.namespaces.deleteAuthorizationRule(resourceGroup, names[0], names[1]);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { resourceGroup, names } = expectKind(identifier, 'AuthorizationRule');
    try {
      const rule = await this.namespaces.getAuthorizationRule(resourceGroup, names[0], names[1], {
        abortSignal: options.signal
      });
      return {
        identifier: rule.id ?? identifier,
        kind: this.kind,
        name: rule.name ?? names[1],
        provisioningState: 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<AuthorizationRuleDescriptor>): string {
    const { resourceGroup, names } = requireDependency(request, request.descriptor.configuration.namespace, 'EventHubNamespace');
    return authorizationRuleId(this.context.subscriptionId, resourceGroup, names[0], request.descriptor.name);
  }
}
