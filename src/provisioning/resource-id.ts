import { ResourceKind } from '../types/index.js';
import { UnsupportedResource } from '../errors.js';

/**
 * A classified ARM resource id. `names` holds the path names after the
 * resource group, outermost first; `scope` is set for extension resources
 * (diagnostic settings) and is the id of the resource they attach to.
 */
export interface ParsedResourceId {
  kind: ResourceKind;
  id: string;
  subscriptionId: string;
  resourceGroup: string;
  names: string[];
  scope?: string;
}

const RESOURCE_GROUP = /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)$/i;
const PROVIDER_PATH = /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)\/providers\/([^/]+)\/(.+)$/i;
const DIAGNOSTIC_SETTING = /^(.+)\/providers\/microsoft\.insights\/diagnosticSettings\/([^/]+)$/i;

// Provider namespace and path types, lowercased, per kind
const PROVIDER_KINDS: Array<{ provider: string; types: string[]; kind: ResourceKind }> = [
  { provider: 'microsoft.documentdb', types: ['databaseaccounts'], kind: 'CosmosDBAccount' },
  { provider: 'microsoft.eventhub', types: ['namespaces'], kind: 'EventHubNamespace' },
  { provider: 'microsoft.eventhub', types: ['namespaces', 'eventhubs'], kind: 'EventHub' },
  { provider: 'microsoft.eventhub', types: ['namespaces', 'authorizationrules'], kind: 'AuthorizationRule' }
];

/**
 * Classify an ARM id as one of the kinds this tool manages.
 *
 * @throws UnsupportedResource for any other id
 */
export function parseResourceId(id: string): ParsedResourceId {
  const diagnostic = DIAGNOSTIC_SETTING.exec(id);
  if (diagnostic) {
    const scope = parseResourceId(diagnostic[1]);
    return {
      kind: 'DiagnosticSetting',
      id,
      subscriptionId: scope.subscriptionId,
      resourceGroup: scope.resourceGroup,
      names: [diagnostic[2]],
      scope: scope.id
    };
  }

  const group = RESOURCE_GROUP.exec(id);
  if (group) {
    return { kind: 'ResourceGroup', id, subscriptionId: group[1], resourceGroup: group[2], names: [] };
  }

  const providerPath = PROVIDER_PATH.exec(id);
  if (providerPath) {
    const [, subscriptionId, resourceGroup, provider, rest] = providerPath;
    const segments = rest.split('/');
    if (segments.length % 2 === 0) {
      const types = segments.filter((_, i) => i % 2 === 0).map(t => t.toLowerCase());
      const names = segments.filter((_, i) => i % 2 === 1);
      const match = PROVIDER_KINDS.find(
        entry =>
          entry.provider === provider.toLowerCase() &&
          entry.types.length === types.length &&
          entry.types.every((t, i) => t === types[i])
      );
      if (match) {
        return { kind: match.kind, id, subscriptionId, resourceGroup, names };
      }
    }
  }

  throw new UnsupportedResource(`Unsupported or malformed resource id: ${id}`);
}

export function resourceGroupId(subscriptionId: string, resourceGroup: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
}

export function cosmosAccountId(subscriptionId: string, resourceGroup: string, account: string): string {
  return `${resourceGroupId(subscriptionId, resourceGroup)}/providers/Microsoft.DocumentDB/databaseAccounts/${account}`;
}

export function namespaceId(subscriptionId: string, resourceGroup: string, namespace: string): string {
  return `${resourceGroupId(subscriptionId, resourceGroup)}/providers/Microsoft.EventHub/namespaces/${namespace}`;
}

export function eventHubId(subscriptionId: string, resourceGroup: string, namespace: string, hub: string): string {
  return `${namespaceId(subscriptionId, resourceGroup, namespace)}/eventhubs/${hub}`;
}

export function authorizationRuleId(
  subscriptionId: string,
  resourceGroup: string,
  namespace: string,
  rule: string
): string {
  return `${namespaceId(subscriptionId, resourceGroup, namespace)}/authorizationRules/${rule}`;
}

export function diagnosticSettingId(scope: string, name: string): string {
  return `${scope}/providers/Microsoft.Insights/diagnosticSettings/${name}`;
}

/**
 * Parse an id and insist on its kind; used when following a dependency.
 */
export function expectKind(id: string, kind: ResourceKind): ParsedResourceId {
  const parsed = parseResourceId(id);
  if (parsed.kind !== kind) {
    throw new UnsupportedResource(`Expected a ${kind} id but got a ${parsed.kind} id: ${id}`);
  }
  return parsed;
}
