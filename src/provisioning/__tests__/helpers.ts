import { ProvisionedResource, ResourceDescriptor } from '../../types/index.js';
import { silentLogger } from '../../logger.js';
import { AzureManagerContext } from '../azure-common.js';
import { CreateRequest } from '../types.js';

export const SUB = '11111111-1111-1111-1111-111111111111';
export const RG1 = `/subscriptions/${SUB}/resourceGroups/rg1`;
export const DB1 = `${RG1}/providers/Microsoft.DocumentDB/databaseAccounts/db1`;
export const NS1 = `${RG1}/providers/Microsoft.EventHub/namespaces/ns1`;
export const HUB1 = `${NS1}/eventhubs/hub1`;
export const RULE1 = `${NS1}/authorizationRules/rule1`;
export const DIAG1 = `${DB1}/providers/Microsoft.Insights/diagnosticSettings/diag1`;

export const context: AzureManagerContext = { subscriptionId: SUB, pollIntervalMs: 0, logger: silentLogger };

export function notFound(): Error {
  return Object.assign(new Error('Not found'), { statusCode: 404 });
}

export function conflict(): Error {
  return Object.assign(new Error('Conflict'), { statusCode: 409 });
}

export function provisioned(descriptor: ResourceDescriptor, identifier: string): ProvisionedResource {
  return { descriptor, identifier, createdAt: new Date(), ambiguous: false };
}

/** A create request whose dependencies are already provisioned */
export function request<D extends ResourceDescriptor>(
  descriptor: D,
  ...dependencies: ProvisionedResource[]
): CreateRequest<D> {
  return {
    descriptor,
    dependencies: new Map(dependencies.map(resource => [resource.descriptor.name, resource]))
  };
}
