import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProvisioningExecutor } from '../executor.js';
import { ProvisioningLedger } from '../ledger.js';
import { InvalidConfiguration, ProvisioningCancelled, ProvisioningFailed } from '../../errors.js';
import { silentLogger } from '../../logger.js';
import { SIMULATED_SUBSCRIPTION_ID, SimulatedResourceProvider } from '../../provisioning/simulated-provider.js';
import { ResourceProvider } from '../../provisioning/types.js';
import { mockLogger, scenarioPlan } from './fixtures.js';

const RG1 = `/subscriptions/${SIMULATED_SUBSCRIPTION_ID}/resourceGroups/rg1`;
const DB1 = `${RG1}/providers/Microsoft.DocumentDB/databaseAccounts/db1`;
const NS1 = `${RG1}/providers/Microsoft.EventHub/namespaces/ns1`;
const HUB1 = `${NS1}/eventhubs/hub1`;
const DIAG1 = `${DB1}/providers/Microsoft.Insights/diagnosticSettings/diag1`;

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

function createNames(provider: SimulatedResourceProvider): string[] {
  return provider.calls.filter(call => call.operation === 'create').map(call => call.name);
}

describe('ProvisioningExecutor', () => {
  let provider: SimulatedResourceProvider;
  let ledger: ProvisioningLedger;

  beforeEach(() => {
    provider = new SimulatedResourceProvider();
    ledger = new ProvisioningLedger();
  });

  describe('execute', () => {
    it('should create every descriptor in order and record it', async () => {
      const executor = new ProvisioningExecutor(provider, silentLogger);

      await executor.execute(scenarioPlan(), ledger);

      expect(createNames(provider)).toEqual(['rg1', 'db1', 'ns1', 'hub1', 'diag1']);
      expect(ledger.entries().map(entry => entry.identifier)).toEqual([RG1, DB1, NS1, HUB1, DIAG1]);
      expect(ledger.entries().every(entry => !entry.ambiguous)).toBe(true);
      expect(executor.summary().map(summary => summary.state)).toEqual([
        'Created',
        'Created',
        'Created',
        'Created',
        'Created'
      ]);
    });

    it('should pass provisioned dependencies to each create', async () => {
      const create = vi.spyOn(provider, 'createOrUpdate');
      const executor = new ProvisioningExecutor(provider, silentLogger);

      await executor.execute(scenarioPlan(), ledger);

      const diagnosticRequest = create.mock.calls[4][0];
      expect(diagnosticRequest.descriptor.name).toBe('diag1');
      expect([...diagnosticRequest.dependencies.keys()]).toEqual(['db1', 'hub1']);
      expect(diagnosticRequest.dependencies.get('hub1')?.identifier).toBe(HUB1);
    });

    it('should stop at the first failed create and keep what was created', async () => {
      provider = new SimulatedResourceProvider({ failCreate: ['hub1'] });
      const executor = new ProvisioningExecutor(provider, silentLogger);

      const error = await captureRejection(executor.execute(scenarioPlan(), ledger));

      expect(error).toBeInstanceOf(ProvisioningFailed);
      if (error instanceof ProvisioningFailed) {
        expect(error.failedDescriptor.name).toBe('hub1');
        expect(error.message).toBe('Failed to create EventHub hub1: Operation ended in state Failed');
      }
      expect(ledger.entries().map(entry => entry.descriptor.name)).toEqual(['rg1', 'db1', 'ns1']);
      expect(createNames(provider)).toEqual(['rg1', 'db1', 'ns1', 'hub1']);
      expect(executor.stateOf('hub1')).toBe('CreateFailed');
      expect(executor.stateOf('diag1')).toBe('Planned');
    });

    it('should wrap errors thrown by the provider', async () => {
      const create = provider.createOrUpdate.bind(provider);
      vi.spyOn(provider, 'createOrUpdate').mockImplementation(async request => {
        if (request.descriptor.name === 'ns1') {
          throw new Error('quota exceeded');
        }
        return create(request);
      });
      const executor = new ProvisioningExecutor(provider, silentLogger);

      const error = await captureRejection(executor.execute(scenarioPlan(), ledger));

      expect(error).toBeInstanceOf(ProvisioningFailed);
      if (error instanceof ProvisioningFailed) {
        expect(error.message).toBe('Failed to create EventHubNamespace ns1: quota exceeded');
        expect(error.cause).toBeInstanceOf(Error);
      }
      expect(ledger.entries().map(entry => entry.descriptor.name)).toEqual(['rg1', 'db1']);
    });

    it('should treat a Canceled terminal state as a failure', async () => {
      const canceling: ResourceProvider = {
        createOrUpdate: vi.fn(async () => ({ resourceId: RG1, state: 'Canceled' as const })),
        delete: vi.fn(),
        get: vi.fn(),
        identify: vi.fn(() => RG1)
      };
      const executor = new ProvisioningExecutor(canceling, silentLogger);

      const error = await captureRejection(executor.execute(scenarioPlan(), ledger));

      expect(error).toBeInstanceOf(ProvisioningFailed);
      if (error instanceof ProvisioningFailed) {
        expect(error.message).toBe('Failed to create ResourceGroup rg1: Operation ended in state Canceled');
      }
      expect(ledger.isEmpty()).toBe(true);
    });

    it('should reject an out-of-order plan before touching the provider', async () => {
      const executor = new ProvisioningExecutor(provider, silentLogger);

      const error = await captureRejection(executor.execute(scenarioPlan().reverse(), ledger));

      expect(error).toBeInstanceOf(InvalidConfiguration);
      expect(provider.calls).toHaveLength(0);
      expect(ledger.isEmpty()).toBe(true);
    });
  });

  describe('cancellation', () => {
    it('should make no calls when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const executor = new ProvisioningExecutor(provider, silentLogger);

      const error = await captureRejection(executor.execute(scenarioPlan(), ledger, { signal: controller.signal }));

      expect(error).toBeInstanceOf(ProvisioningFailed);
      if (error instanceof ProvisioningFailed) {
        expect(error.failedDescriptor.name).toBe('rg1');
        expect(error.cause).toBeInstanceOf(ProvisioningCancelled);
      }
      expect(provider.calls).toHaveLength(0);
      expect(executor.stateOf('rg1')).toBe('Planned');
    });

    it('should record an ambiguous entry for a create cut short', async () => {
      provider = new SimulatedResourceProvider({ simulateDelay: 10_000 });
      const controller = new AbortController();
      const executor = new ProvisioningExecutor(provider, silentLogger);

      const running = executor.execute(scenarioPlan(), ledger, { signal: controller.signal });
      controller.abort();
      const error = await captureRejection(running);

      expect(error).toBeInstanceOf(ProvisioningFailed);
      if (error instanceof ProvisioningFailed) {
        expect(error.cause).toBeInstanceOf(ProvisioningCancelled);
      }
      expect(ledger.entries()).toHaveLength(1);
      expect(ledger.entries()[0].identifier).toBe(RG1);
      expect(ledger.entries()[0].ambiguous).toBe(true);
      expect(executor.stateOf('rg1')).toBe('CreateFailed');
    });

    it('should warn when the identifier of a cut-short create is unknown', async () => {
      const controller = new AbortController();
      const logger = mockLogger();
      const failing: ResourceProvider = {
        createOrUpdate: vi.fn(async () => {
          controller.abort();
          throw new Error('operation aborted');
        }),
        delete: vi.fn(),
        get: vi.fn(),
        identify: vi.fn(() => {
          throw new Error('no id');
        })
      };
      const executor = new ProvisioningExecutor(failing, logger);

      const error = await captureRejection(executor.execute(scenarioPlan(), ledger, { signal: controller.signal }));

      expect(error).toBeInstanceOf(ProvisioningFailed);
      expect(ledger.isEmpty()).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        'Could not determine the id of ResourceGroup rg1; it may need manual deletion: no id'
      );
    });
  });

  describe('stateOf', () => {
    it('should return undefined for names outside the plan', () => {
      const executor = new ProvisioningExecutor(provider, silentLogger);

      expect(executor.stateOf('unknown')).toBeUndefined();
    });
  });
});
