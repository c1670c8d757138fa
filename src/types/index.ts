// Core type definitions for the Event Hub diagnostics provisioner

export type ResourceKind =
  | 'ResourceGroup'
  | 'CosmosDBAccount'
  | 'EventHubNamespace'
  | 'EventHub'
  | 'AuthorizationRule'
  | 'DiagnosticSetting';

export type CosmosAccountKind = 'GlobalDocumentDB' | 'MongoDB' | 'Parse';

export type ConsistencyLevel = 'Eventual' | 'Session' | 'BoundedStaleness' | 'Strong' | 'ConsistentPrefix';

export type AccessRight = 'Listen' | 'Send' | 'Manage';

export interface CosmosLocation {
  name: string;
  failoverPriority: number;
  zoneRedundant: boolean;
}

export interface ResourceGroupSettings {
  tags: Record<string, string>;
}

export interface CosmosAccountSettings {
  resourceGroup: string;
  kind: CosmosAccountKind;
  consistencyLevel: ConsistencyLevel;
  maxIntervalInSeconds?: number;
  maxStalenessPrefix?: number;
  locations: CosmosLocation[];
  tags: Record<string, string>;
}

export interface EventHubNamespaceSettings {
  resourceGroup: string;
  sku: 'Basic' | 'Standard' | 'Premium';
  tags: Record<string, string>;
}

export interface EventHubSettings {
  namespace: string;
  partitionCount: number;
  messageRetentionInDays: number;
}

export interface AuthorizationRuleSettings {
  namespace: string;
  rights: AccessRight[];
}

export interface MetricCategory {
  category: string;
  /** ISO 8601 duration, e.g. PT5M */
  timeGrain: string;
}

export interface DiagnosticSettingSettings {
  /** Name of the descriptor whose resource is monitored */
  target: string;
  eventHub: string;
  /** Rule to stream through; the namespace's root rule when omitted */
  authorizationRule?: string;
  metrics: MetricCategory[];
  logs: string[];
}

interface DescriptorBase<K extends ResourceKind, C> {
  readonly kind: K;
  readonly name: string;
  readonly region: string;
  readonly configuration: Readonly<C>;
  readonly dependsOn: readonly string[];
}

export type ResourceGroupDescriptor = DescriptorBase<'ResourceGroup', ResourceGroupSettings>;
export type CosmosAccountDescriptor = DescriptorBase<'CosmosDBAccount', CosmosAccountSettings>;
export type EventHubNamespaceDescriptor = DescriptorBase<'EventHubNamespace', EventHubNamespaceSettings>;
export type EventHubDescriptor = DescriptorBase<'EventHub', EventHubSettings>;
export type AuthorizationRuleDescriptor = DescriptorBase<'AuthorizationRule', AuthorizationRuleSettings>;
export type DiagnosticSettingDescriptor = DescriptorBase<'DiagnosticSetting', DiagnosticSettingSettings>;

export type ResourceDescriptor =
  | ResourceGroupDescriptor
  | CosmosAccountDescriptor
  | EventHubNamespaceDescriptor
  | EventHubDescriptor
  | AuthorizationRuleDescriptor
  | DiagnosticSettingDescriptor;

export type DescriptorOfKind<K extends ResourceKind> = Extract<ResourceDescriptor, { kind: K }>;

export type DescriptorState = 'Planned' | 'Creating' | 'Created' | 'CreateFailed';

export type TerminalState = 'Succeeded' | 'Failed' | 'Canceled';

export interface ProvisionedResource {
  readonly descriptor: ResourceDescriptor;
  readonly identifier: string;
  readonly createdAt: Date;
  /** True when a cancelled create left the remote outcome unknown */
  readonly ambiguous: boolean;
}

export interface ResourceState {
  identifier: string;
  kind: ResourceKind;
  name: string;
  provisioningState: string;
}

export interface PlannedResourceSummary {
  kind: ResourceKind;
  name: string;
  dependsOn: string[];
  state: DescriptorState;
}

export interface ProvisionedResourceSummary {
  kind: ResourceKind;
  name: string;
  identifier: string;
  createdAt: Date;
  ambiguous: boolean;
  verifiedState?: string;
}

export interface RunError {
  code: string;
  message: string;
  details?: unknown;
  remediation?: string;
}

export interface CleanupFailureRecord {
  identifier: string;
  kind: ResourceKind;
  name: string;
  message: string;
}

export interface RunMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  region: string;
}

export interface AzureSettings {
  subscription_id: string;
  region: string;
}

export interface NamingSettings {
  resource_group_prefix: string;
  namespace_prefix: string;
  cosmos_prefix: string;
}

export interface CosmosLocationConfig {
  name: string;
  failover_priority: number;
  zone_redundant: boolean;
}

export interface CosmosConfig {
  kind: CosmosAccountKind;
  consistency_level: ConsistencyLevel;
  max_interval_seconds?: number;
  max_staleness_prefix?: number;
  locations: CosmosLocationConfig[];
}

export interface EventHubConfig {
  name: string;
  sku: 'Basic' | 'Standard' | 'Premium';
  partition_count: number;
  message_retention_days: number;
  authorization_rule: string;
}

export interface DiagnosticsConfig {
  name: string;
  metrics: Array<{ category: string; time_grain: string }>;
  logs: string[];
}

export interface RunSettings {
  poll_interval_ms: number;
  operation_timeout_ms: number;
  tags: Record<string, string>;
}

export interface ProvisionerConfig {
  azure: AzureSettings;
  naming: NamingSettings;
  cosmos: CosmosConfig;
  event_hub: EventHubConfig;
  diagnostics: DiagnosticsConfig;
  run: RunSettings;
}
