/**
 * Provisioning Executor
 *
 * Creates descriptors strictly one after another, in plan order, and records
 * each success in the ledger. The first failure stops the run; the ledger
 * keeps everything created before it so cleanup can still run.
 */

import {
  DescriptorState,
  PlannedResourceSummary,
  ProvisionedResource,
  ResourceDescriptor
} from '../types/index.js';
import { ProvisioningCancelled, ProvisioningFailed, describeError } from '../errors.js';
import { ProvisioningLogger, consoleLogger } from '../logger.js';
import { CreateRequest, ProvisioningResult, ResourceProvider } from '../provisioning/types.js';
import { ProvisioningLedger } from './ledger.js';
import { assertDependencyOrder } from './planner.js';
import { ExecuteOptions } from './types.js';

const TRANSITIONS: Record<DescriptorState, readonly DescriptorState[]> = {
  Planned: ['Creating'],
  Creating: ['Created', 'CreateFailed'],
  Created: [],
  CreateFailed: []
};

export class ProvisioningExecutor {
  private readonly states = new Map<string, DescriptorState>();
  private plan: readonly ResourceDescriptor[] = [];

  constructor(
    private readonly provider: ResourceProvider,
    private readonly logger: ProvisioningLogger = consoleLogger
  ) {}

  /**
   * @throws InvalidConfiguration before any remote call if the plan is out of order
   * @throws ProvisioningFailed for the first descriptor that could not be created
   */
  async execute(
    plan: readonly ResourceDescriptor[],
    ledger: ProvisioningLedger,
    options: ExecuteOptions = {}
  ): Promise<void> {
    this.plan = plan;
    this.states.clear();
    for (const descriptor of plan) {
      this.states.set(descriptor.name, 'Planned');
    }

    assertDependencyOrder(plan);

    for (const descriptor of plan) {
      await this.provision(descriptor, ledger, options.signal);
    }
  }

  stateOf(name: string): DescriptorState | undefined {
    return this.states.get(name);
  }

  summary(): PlannedResourceSummary[] {
    return this.plan.map(descriptor => ({
      kind: descriptor.kind,
      name: descriptor.name,
      dependsOn: [...descriptor.dependsOn],
      state: this.states.get(descriptor.name) ?? 'Planned'
    }));
  }

  private async provision(
    descriptor: ResourceDescriptor,
    ledger: ProvisioningLedger,
    signal?: AbortSignal
  ): Promise<void> {
    if (signal?.aborted) {
      throw new ProvisioningFailed(descriptor, new ProvisioningCancelled(descriptor.name, signal.reason));
    }

    const dependencies = new Map<string, ProvisionedResource>();
    for (const name of descriptor.dependsOn) {
      const resource = ledger.find(name);
      if (resource) {
        dependencies.set(name, resource);
      }
    }
    const request: CreateRequest = { descriptor, dependencies, signal };

    this.transition(descriptor, 'Creating');
    this.logger.info(`Creating ${descriptor.kind} ${descriptor.name}`);

    let result: ProvisioningResult;
    try {
      result = await this.provider.createOrUpdate(request);
    } catch (error) {
      this.transition(descriptor, 'CreateFailed');
      if (signal?.aborted) {
        this.recordAmbiguous(request, ledger);
        throw new ProvisioningFailed(descriptor, new ProvisioningCancelled(descriptor.name, error));
      }
      throw new ProvisioningFailed(descriptor, error);
    }

    if (result.state !== 'Succeeded') {
      this.transition(descriptor, 'CreateFailed');
      throw new ProvisioningFailed(
        descriptor,
        new Error(`Operation ended in state ${result.provisioningState ?? result.state}`)
      );
    }

    ledger.record({
      descriptor,
      identifier: result.resourceId,
      createdAt: new Date(),
      ambiguous: false
    });
    this.transition(descriptor, 'Created');
    this.logger.info(`Created ${descriptor.kind} ${descriptor.name}: ${result.resourceId}`);
  }

  /**
   * The create was in flight when the run was cancelled, so the resource may
   * exist. Record where it would be so cleanup tries to delete it.
   */
  private recordAmbiguous(request: CreateRequest, ledger: ProvisioningLedger): void {
    const { descriptor } = request;
    let identifier: string;
    try {
      identifier = this.provider.identify(request);
    } catch (error) {
      this.logger.warn(
        `Could not determine the id of ${descriptor.kind} ${descriptor.name}; it may need manual deletion: ${describeError(error)}`
      );
      return;
    }

    ledger.record({ descriptor, identifier, createdAt: new Date(), ambiguous: true });
    this.logger.warn(`Outcome of ${descriptor.kind} ${descriptor.name} is unknown; it will be deleted during cleanup`);
  }

  private transition(descriptor: ResourceDescriptor, next: DescriptorState): void {
    const current = this.states.get(descriptor.name) ?? 'Planned';
    if (!TRANSITIONS[current].includes(next)) {
      throw new Error(`Illegal state transition for ${descriptor.name}: ${current} -> ${next}`);
    }
    this.states.set(descriptor.name, next);
    this.logger.debug(`${descriptor.name}: ${current} -> ${next}`);
  }
}
