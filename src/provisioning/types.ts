// Provisioning-specific types
import {
  DescriptorOfKind,
  ProvisionedResource,
  ResourceDescriptor,
  ResourceKind,
  ResourceState,
  TerminalState
} from '../types/index.js';

export interface CreateRequest<D extends ResourceDescriptor = ResourceDescriptor> {
  descriptor: D;
  /** Already provisioned dependencies, keyed by descriptor name */
  dependencies: ReadonlyMap<string, ProvisionedResource>;
  signal?: AbortSignal;
}

export interface ProvisioningResult {
  /** Remote identifier (an ARM resource id for Azure) */
  resourceId: string;
  state: TerminalState;
  /** Raw provisioning state reported by the provider */
  provisioningState?: string;
  metadata?: Record<string, string>;
}

/**
 * The control plane the executor and cleanup coordinator talk to.
 * createOrUpdate and delete resolve only once the remote operation is terminal.
 */
export interface ResourceProvider {
  createOrUpdate(request: CreateRequest): Promise<ProvisioningResult>;
  /** Deleting something already gone resolves with 'Succeeded' */
  delete(identifier: string): Promise<TerminalState>;
  /** null when the resource does not exist */
  get(identifier: string): Promise<ResourceState | null>;
  /** Identifier the request's resource has or would have; no remote calls */
  identify(request: CreateRequest): string;
}

/** What a manager reports right after its create call returns */
export interface RemoteResource {
  resourceId: string;
  /** Missing when the service reports none, which counts as succeeded */
  provisioningState?: string;
  metadata?: Record<string, string>;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * One per Azure resource kind. The provider picks a manager by kind for
 * creates and by parsed resource id for deletes and lookups.
 */
export interface ResourceManager<K extends ResourceKind> {
  readonly kind: K;
  create(request: CreateRequest<DescriptorOfKind<K>>): Promise<RemoteResource>;
  /** Runs to completion; cleanup is not cancellable */
  delete(identifier: string): Promise<void>;
  get(identifier: string, options?: OperationOptions): Promise<ResourceState | null>;
  identify(request: CreateRequest<DescriptorOfKind<K>>): string;
}
