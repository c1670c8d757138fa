/**
 * Cleanup Coordinator
 *
 * Deletes everything the ledger holds, newest first. Each delete stands on
 * its own: a failure is recorded and the next entry is still attempted.
 */

import { CleanupFailureRecord } from '../types/index.js';
import { CleanupFailed, describeError } from '../errors.js';
import { ProvisioningLogger, consoleLogger } from '../logger.js';
import { ResourceProvider } from '../provisioning/types.js';
import { ProvisioningLedger } from './ledger.js';
import { CleanupReport } from './types.js';

export class CleanupCoordinator {
  constructor(
    private readonly provider: ResourceProvider,
    private readonly logger: ProvisioningLogger = consoleLogger
  ) {}

  /**
   * Never rejects because a delete failed; failures come back in the report.
   */
  async cleanup(ledger: ProvisioningLedger): Promise<CleanupReport> {
    const report: CleanupReport = { attempted: 0, deleted: [], failures: [] };

    if (ledger.isEmpty()) {
      this.logger.info('Did not create any resources in Azure. No clean up is necessary');
      return report;
    }

    for (const resource of ledger.drainReverse()) {
      const { descriptor, identifier } = resource;
      report.attempted++;
      this.logger.info(`Deleting ${descriptor.kind} ${descriptor.name}: ${identifier}`);

      const failure = (message: string): CleanupFailureRecord => ({
        identifier,
        kind: descriptor.kind,
        name: descriptor.name,
        message
      });

      try {
        const state = await this.provider.delete(identifier);
        if (state === 'Succeeded') {
          report.deleted.push(identifier);
          this.logger.info(`Deleted ${descriptor.kind} ${descriptor.name}`);
        } else {
          report.failures.push(failure(`Delete ended in state ${state}`));
          this.logger.warn(`Delete of ${descriptor.kind} ${descriptor.name} ended in state ${state}`);
        }
      } catch (error) {
        report.failures.push(failure(describeError(error)));
        this.logger.warn(`Failed to delete ${descriptor.kind} ${descriptor.name}: ${describeError(error)}`);
      }
    }

    if (report.failures.length > 0) {
      report.error = new CleanupFailed(report.failures);
      this.logger.error(report.error.message);
    }

    return report;
  }
}
