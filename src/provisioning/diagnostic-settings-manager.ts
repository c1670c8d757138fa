import type { DiagnosticSettings } from '@azure/arm-monitor';
import { DiagnosticSettingDescriptor, ResourceState } from '../types/index.js';
import { isNotFound } from '../errors.js';
import { CreateRequest, OperationOptions, RemoteResource, ResourceManager } from './types.js';
import { AzureManagerContext, requireDependency } from './azure-common.js';
import { authorizationRuleId, diagnosticSettingId, expectKind, parseResourceId } from './resource-id.js';
import { ROOT_AUTHORIZATION_RULE } from './event-hubs-manager.js';

export type DiagnosticSettingsApi = Pick<DiagnosticSettings, 'createOrUpdate' | 'delete' | 'get'>;

// Streaming only; nothing is kept in a storage account
const NO_RETENTION = { enabled: false, days: 0 };

/**
 * Diagnostic settings on a monitored resource that stream to an event hub,
 * via @azure/arm-monitor.
 */
export class DiagnosticSettingsManager implements ResourceManager<'DiagnosticSetting'> {
  readonly kind = 'DiagnosticSetting';

  constructor(
    private readonly diagnosticSettings: DiagnosticSettingsApi,
    private readonly context: AzureManagerContext
  ) {}

  async create(request: CreateRequest<DiagnosticSettingDescriptor>): Promise<RemoteResource> {
    const { descriptor, signal } = request;
    const settings = descriptor.configuration;
    const target = this.resolveTarget(request);
    const hub = requireDependency(request, settings.eventHub, 'EventHub');
    const ruleId = settings.authorizationRule
      ? requireDependency(request, settings.authorizationRule, 'AuthorizationRule').id
      : authorizationRuleId(hub.subscriptionId, hub.resourceGroup, hub.names[0], ROOT_AUTHORIZATION_RULE);

    this.context.logger.debug(`Streaming diagnostics of ${target} to event hub ${hub.names[1]}`);
    const setting = await this.diagnosticSettings.createOrUpdate(
      target,
      descriptor.name,
      {
        eventHubName: hub.names[1],
        eventHubAuthorizationRuleId: ruleId,
        metrics: settings.metrics.map(metric => ({
          category: metric.category,
          timeGrain: metric.timeGrain,
          enabled: true,
          retentionPolicy: NO_RETENTION
        })),
        logs: settings.logs.map(category => ({
          category,
          enabled: true,
          retentionPolicy: NO_RETENTION
        }))
      },
      { abortSignal: signal }
    );

    return { resourceId: setting.id ?? diagnosticSettingId(target, descriptor.name) };
  }

  async delete(identifier: string): Promise<void> {
    const { scope, names } = this.parse(identifier);
    try {
      await this.diagnosticSettings.delete(scope, names[0]);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async get(identifier: string, options: OperationOptions = {}): Promise<ResourceState | null> {
    const { scope, names } = this.parse(identifier);
    try {
      const setting = await this.diagnosticSettings.get(scope, names[0], { abortSignal: options.signal });
      return {
        identifier: setting.id ?? identifier,
        kind: this.kind,
        name: setting.name ?? names[0],
        provisioningState: 'Succeeded'
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  identify(request: CreateRequest<DiagnosticSettingDescriptor>): string {
    return diagnosticSettingId(this.resolveTarget(request), request.descriptor.name);
  }

  private resolveTarget(request: CreateRequest<DiagnosticSettingDescriptor>): string {
    const target = request.dependencies.get(request.descriptor.configuration.target);
    if (!target) {
      throw new Error(
        `Diagnostic setting ${request.descriptor.name} needs ${request.descriptor.configuration.target}, which has not been provisioned`
      );
    }
    // Any resource this tool manages can be monitored; the id just has to parse
    return parseResourceId(target.identifier).id;
  }

  private parse(identifier: string): { scope: string; names: string[] } {
    const parsed = expectKind(identifier, 'DiagnosticSetting');
    return { scope: parsed.scope ?? '', names: parsed.names };
  }
}
