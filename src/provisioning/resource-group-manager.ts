import type { ResourceGroups } from '@azure/arm-resources';
import { ResourceGroupDescriptor, ResourceState } from '../types/index.js';
import { isNotFound } from '../errors.js';
import { CreateRequest, OperationOptions, RemoteResource, ResourceManager } from './types.js';
import { AzureManagerContext, pollerOptions } from './azure-common.js';
import { expectKind, resourceGroupId } from './resource-id.js';

export type ResourceGroupsApi = Pick<ResourceGroups, 'createOrUpdate' | 'beginDeleteAndWait' | 'get'>;

export class ResourceGroupManager implements ResourceManager<'ResourceGroup'> {
  readonly kind = 'ResourceGroup';

  constructor(
    private readonly resourceGroups: ResourceGroupsApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<ResourceGroupDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;

    this.context.logger.debug(`Creating resource group ${descriptor.name} in ${descriptor.region}`);
    const group = await this.resourceGroups.createOrUpdate(
      descriptor.name,
      { location: descriptor.region, tags: { ...descriptor.configuration.tags } },
      { abortSignal: signal }
    );

    return {
      resourceId: group.id ?? this.identify(request),
      provisioningState: group.properties?.provisioningState
    };
  }

  async delete(identifier: string): Promise<void> {
    const { resourceGroup } = expectKind(identifier, 'ResourceGroup');
    try {
      // Removes everything still inside the group as well
      await this.resourceGroups.beginDeleteAndWait(resourceGroup, pollerOptions(this.context));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { resourceGroup } = expectKind(identifier, 'ResourceGroup');
    try {
      const group = await this.resourceGroups.get(resourceGroup, { abortSignal: options.signal });
      return {
        identifier: group.id ?? identifier,
        kind: this.kind,
        name: group.name ?? resourceGroup,
        provisioningState: group.properties?.provisioningState ?? 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<ResourceGroupDescriptor>): string {
    return resourceGroupId(this.context.subscriptionId, request.descriptor.name);
  }
}
