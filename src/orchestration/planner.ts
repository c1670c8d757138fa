/**
 * Resource Planner
 *
 * Builds the descriptor list for a run and orders it so that every
 * descriptor follows the descriptors it depends on. No I/O happens here;
 * the only non-determinism is the naming strategy.
 */

import { ProvisionerConfig, ResourceDescriptor } from '../types/index.js';
import { InvalidConfiguration } from '../errors.js';
import { NamingStrategy } from '../config/naming.js';

/**
 * Names a descriptor's configuration points at. Each must also be listed in
 * dependsOn, otherwise the referenced resource may not exist yet.
 */
export function referencedNames(descriptor: ResourceDescriptor): string[] {
  switch (descriptor.kind) {
    case 'ResourceGroup':
      return [];
    case 'CosmosDBAccount':
    case 'EventHubNamespace':
      return [descriptor.configuration.resourceGroup];
    case 'EventHub':
    case 'AuthorizationRule':
      return [descriptor.configuration.namespace];
    case 'DiagnosticSetting': {
      const { target, eventHub, authorizationRule } = descriptor.configuration;
      return authorizationRule === undefined ? [target, eventHub] : [target, eventHub, authorizationRule];
    }
  }
}

/**
 * Validate a descriptor list for:
 * - Duplicate names
 * - Unknown or self dependencies
 * - Configuration references not declared as dependencies
 * - Circular dependencies
 *
 * Returns an array of error messages. Empty array = valid list.
 */
export function validateDescriptors(descriptors: readonly ResourceDescriptor[]): string[] {
  const errors: string[] = [];
  const names = new Set<string>();

  for (const descriptor of descriptors) {
    if (names.has(descriptor.name)) {
      errors.push(`Duplicate resource name "${descriptor.name}"`);
    }
    names.add(descriptor.name);
  }

  for (const descriptor of descriptors) {
    for (const dependency of descriptor.dependsOn) {
      if (dependency === descriptor.name) {
        errors.push(`${descriptor.kind} "${descriptor.name}" depends on itself`);
      } else if (!names.has(dependency)) {
        errors.push(`${descriptor.kind} "${descriptor.name}" depends on "${dependency}", which is not in the plan`);
      }
    }

    for (const reference of referencedNames(descriptor)) {
      if (!descriptor.dependsOn.includes(reference)) {
        errors.push(`${descriptor.kind} "${descriptor.name}" references "${reference}" without depending on it`);
      }
    }
  }

  const cycle = findCycle(descriptors);
  if (cycle) {
    errors.push(`Circular dependency detected: ${cycle.join(' -> ')}`);
  }

  return errors;
}

function findCycle(descriptors: readonly ResourceDescriptor[]): string[] | null {
  const byName = new Map(descriptors.map(d => [d.name, d]));
  const visiting = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    if (done.has(name)) return null;
    if (visiting.has(name)) {
      return [...path.slice(path.indexOf(name)), name];
    }
    const descriptor = byName.get(name);
    if (!descriptor) return null;

    visiting.add(name);
    path.push(name);
    for (const dependency of descriptor.dependsOn) {
      if (dependency === name) continue;
      const cycle = visit(dependency);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(name);
    done.add(name);
    return null;
  };

  for (const descriptor of descriptors) {
    const cycle = visit(descriptor.name);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Stable topological order: among descriptors whose dependencies are all
 * placed, the one listed first goes next.
 *
 * @throws InvalidConfiguration if the list fails validation
 */
export function orderByDependencies(descriptors: readonly ResourceDescriptor[]): ResourceDescriptor[] {
  const errors = validateDescriptors(descriptors);
  if (errors.length > 0) {
    throw new InvalidConfiguration(errors);
  }

  const ordered: ResourceDescriptor[] = [];
  const placed = new Set<string>();
  const remaining = [...descriptors];

  while (remaining.length > 0) {
    const index = remaining.findIndex(d => d.dependsOn.every(dep => placed.has(dep)));
    // Validation rules out cycles, so some descriptor is always ready
    const [next] = remaining.splice(index, 1);
    ordered.push(next);
    placed.add(next.name);
  }

  return ordered;
}

/**
 * Check that a list is already in dependency order.
 *
 * @throws InvalidConfiguration naming every descriptor that comes too early
 */
export function assertDependencyOrder(plan: readonly ResourceDescriptor[]): void {
  const errors = validateDescriptors(plan);
  const seen = new Set<string>();

  for (const descriptor of plan) {
    for (const dependency of descriptor.dependsOn) {
      if (!seen.has(dependency) && plan.some(d => d.name === dependency)) {
        errors.push(`${descriptor.kind} "${descriptor.name}" is planned before its dependency "${dependency}"`);
      }
    }
    seen.add(descriptor.name);
  }

  if (errors.length > 0) {
    throw new InvalidConfiguration(errors);
  }
}

function freezeDescriptor(descriptor: ResourceDescriptor): ResourceDescriptor {
  Object.freeze(descriptor.dependsOn);
  Object.freeze(descriptor.configuration);
  Object.freeze(descriptor);
  return descriptor;
}

export class ResourcePlanner {
  constructor(private readonly naming: NamingStrategy) {}

  /**
   * Resource group -> Cosmos DB account -> Event Hubs namespace -> event hub
   * -> authorization rule -> diagnostic setting on the account.
   */
  plan(config: ProvisionerConfig): ResourceDescriptor[] {
    const region = config.azure.region;
    const tags = { ...config.run.tags };

    const resourceGroup = this.naming.generate('ResourceGroup', config.naming.resource_group_prefix);
    const cosmosAccount = this.naming.generate('CosmosDBAccount', config.naming.cosmos_prefix);
    const namespace = this.naming.generate('EventHubNamespace', config.naming.namespace_prefix);
    const eventHub = config.event_hub.name;
    const authorizationRule = config.event_hub.authorization_rule;

    const descriptors: ResourceDescriptor[] = [
      {
        kind: 'ResourceGroup',
        name: resourceGroup,
        region,
        configuration: { tags },
        dependsOn: []
      },
      {
        kind: 'CosmosDBAccount',
        name: cosmosAccount,
        region,
        configuration: {
          resourceGroup,
          kind: config.cosmos.kind,
          consistencyLevel: config.cosmos.consistency_level,
          maxIntervalInSeconds: config.cosmos.max_interval_seconds,
          maxStalenessPrefix: config.cosmos.max_staleness_prefix,
          locations: config.cosmos.locations.map(location => ({
            name: location.name,
            failoverPriority: location.failover_priority,
            zoneRedundant: location.zone_redundant
          })),
          tags
        },
        dependsOn: [resourceGroup]
      },
      {
        kind: 'EventHubNamespace',
        name: namespace,
        region,
        configuration: { resourceGroup, sku: config.event_hub.sku, tags },
        dependsOn: [resourceGroup]
      },
      {
        kind: 'EventHub',
        name: eventHub,
        region,
        configuration: {
          namespace,
          partitionCount: config.event_hub.partition_count,
          messageRetentionInDays: config.event_hub.message_retention_days
        },
        dependsOn: [namespace]
      },
      {
        kind: 'AuthorizationRule',
        name: authorizationRule,
        region,
        // Diagnostic settings need all three rights on the rule they stream through
        configuration: { namespace, rights: ['Listen', 'Send', 'Manage'] },
        dependsOn: [namespace]
      },
      {
        kind: 'DiagnosticSetting',
        name: config.diagnostics.name,
        region,
        configuration: {
          target: cosmosAccount,
          eventHub,
          authorizationRule,
          metrics: config.diagnostics.metrics.map(metric => ({
            category: metric.category,
            timeGrain: metric.time_grain
          })),
          logs: [...config.diagnostics.logs]
        },
        dependsOn: [cosmosAccount, eventHub, authorizationRule]
      }
    ];

    return orderByDependencies(descriptors).map(freezeDescriptor);
  }
}

export function planResources(config: ProvisionerConfig, naming: NamingStrategy): ResourceDescriptor[] {
  return new ResourcePlanner(naming).plan(config);
}
