import { ResourceKind } from '../types/index.js';
import { ProvisioningLogger } from '../logger.js';
import { CreateRequest } from './types.js';
import { ParsedResourceId, expectKind } from './resource-id.js';

/**
 * Shared settings every Azure manager needs.
 */
export interface AzureManagerContext {
  subscriptionId: string;
  /** How often the SDK pollers check a long-running operation */
  pollIntervalMs: number;
  logger: ProvisioningLogger;
}

/** Options for the SDK's begin...AndWait pollers */
export function pollerOptions(
  context: AzureManagerContext,
  signal?: AbortSignal
): { updateIntervalInMs: number; abortSignal?: AbortSignal } {
  return { updateIntervalInMs: context.pollIntervalMs, abortSignal: signal };
}

/**
 * Look up a provisioned dependency of the request and parse its id.
 *
 * @throws Error when the dependency was never provisioned
 */
export function requireDependency(request: CreateRequest, name: string, kind: ResourceKind): ParsedResourceId {
  const provisioned = request.dependencies.get(name);
  if (!provisioned) {
    const { descriptor } = request;
    throw new Error(`${descriptor.kind} ${descriptor.name} needs ${kind} ${name}, which has not been provisioned`);
  }
  return expectKind(provisioned.identifier, kind);
}
