import { v4 as uuidv4 } from 'uuid';
import {
  ProvisionedResource,
  ProvisionedResourceSummary,
  ProvisionerConfig,
  ResourceDescriptor,
  RunError,
  RunMetadata
} from '../types/index.js';
import { ProvisioningError, describeError } from '../errors.js';
import { ProvisioningLogger, consoleLogger } from '../logger.js';
import { NamingStrategy, createNamingStrategy } from '../config/naming.js';
import { ResourceProvider } from '../provisioning/types.js';
import { createAzureProvider } from '../provisioning/azure-provider.js';
import { ResourcePlanner } from './planner.js';
import { ProvisioningLedger } from './ledger.js';
import { ProvisioningExecutor } from './executor.js';
import { CleanupCoordinator } from './cleanup.js';
import { CleanupReport, ExecuteOptions, RunResult } from './types.js';

export interface OrchestratorOptions {
  provider: ResourceProvider;
  naming?: NamingStrategy;
  logger?: ProvisioningLogger;
}

function toRunError(error: unknown): RunError {
  if (error instanceof ProvisioningError) {
    return error.toRunError();
  }
  return {
    code: 'UNEXPECTED_ERROR',
    message: describeError(error),
    details: error
  };
}

function summarize(resource: ProvisionedResource, verifiedState?: string): ProvisionedResourceSummary {
  return {
    kind: resource.descriptor.kind,
    name: resource.descriptor.name,
    identifier: resource.identifier,
    createdAt: resource.createdAt,
    ambiguous: resource.ambiguous,
    verifiedState
  };
}

function emptyCleanupReport(): CleanupReport {
  return { attempted: 0, deleted: [], failures: [] };
}

/**
 * Runs plan, provision, verify and cleanup in sequence. Whatever happens
 * while provisioning, everything recorded in the run's ledger is handed to
 * the cleanup coordinator before the result is returned.
 */
export class ProvisioningOrchestrator {
  private readonly provider: ResourceProvider;
  private readonly planner: ResourcePlanner;
  private readonly cleanupCoordinator: CleanupCoordinator;
  private readonly logger: ProvisioningLogger;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.logger = options.logger ?? consoleLogger;
    this.planner = new ResourcePlanner(options.naming ?? createNamingStrategy());
    this.cleanupCoordinator = new CleanupCoordinator(this.provider, this.logger);
  }

  async run(config: ProvisionerConfig, options: ExecuteOptions = {}): Promise<RunResult> {
    const startTime = Date.now();

    let plan: ResourceDescriptor[];
    try {
      plan = this.planner.plan(config);
    } catch (error) {
      const runError = toRunError(error);
      this.logger.error(runError.message);
      return {
        success: false,
        plan: [],
        resources: [],
        errors: [runError],
        cleanup: emptyCleanupReport(),
        metadata: {
          runId: uuidv4(),
          timestamp: new Date(startTime),
          duration: Date.now() - startTime,
          region: config.azure.region
        }
      };
    }

    return this.execute(plan, options);
  }

  async execute(plan: readonly ResourceDescriptor[], options: ExecuteOptions = {}): Promise<RunResult> {
    const startTime = Date.now();
    const metadata: RunMetadata = {
      runId: uuidv4(),
      timestamp: new Date(startTime),
      region: plan[0]?.region ?? 'unknown'
    };

    const ledger = new ProvisioningLedger();
    const executor = new ProvisioningExecutor(this.provider, this.logger);
    const errors: RunError[] = [];
    let resources: ProvisionedResourceSummary[] = [];
    let cleanup = emptyCleanupReport();

    this.logger.info(`Run ${metadata.runId}: provisioning ${plan.length} resource(s) in ${metadata.region}`);

    try {
      await executor.execute(plan, ledger, options);
      const verified = await this.verify(ledger);
      resources = ledger.entries().map(resource => summarize(resource, verified.get(resource.identifier)));
    } catch (error) {
      const runError = toRunError(error);
      this.logger.error(runError.message);
      errors.push(runError);
      resources = ledger.entries().map(resource => summarize(resource));
    } finally {
      cleanup = await this.cleanupCoordinator.cleanup(ledger);
    }

    const success = errors.length === 0;
    if (cleanup.error) {
      errors.push(cleanup.error.toRunError());
      if (success) {
        this.logger.warn('Provisioning succeeded but cleanup left resources behind');
      }
    }

    metadata.duration = Date.now() - startTime;

    return {
      success,
      plan: executor.summary(),
      resources,
      errors,
      cleanup,
      metadata
    };
  }

  /**
   * Look each created resource up once more. Only informational: a missing
   * resource or a failed lookup is a warning.
   */
  private async verify(ledger: ProvisioningLedger): Promise<Map<string, string>> {
    const states = new Map<string, string>();

    for (const { descriptor, identifier } of ledger.entries()) {
      try {
        const state = await this.provider.get(identifier);
        if (state) {
          states.set(identifier, state.provisioningState);
          this.logger.info(`Verified ${descriptor.kind} ${descriptor.name}: ${state.provisioningState}`);
        } else {
          this.logger.warn(`${descriptor.kind} ${descriptor.name} was not found during verification`);
        }
      } catch (error) {
        this.logger.warn(`Could not verify ${descriptor.kind} ${descriptor.name}: ${describeError(error)}`);
      }
    }

    return states;
  }
}

/**
 * Provision against Azure with DefaultAzureCredential, then clean up.
 */
export async function provision(config: ProvisionerConfig, options: ExecuteOptions = {}): Promise<RunResult> {
  const orchestrator = new ProvisioningOrchestrator({ provider: createAzureProvider({ config }) });
  return orchestrator.run(config, options);
}
