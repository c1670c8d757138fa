import { ProvisionedResource } from '../types/index.js';

/**
 * In-memory record of what a run created, in creation order.
 *
 * Entries are appended while provisioning and taken back out, newest first,
 * while cleaning up. It is the only source of cleanup targets.
 */
export class ProvisioningLedger {
  private readonly records: ProvisionedResource[] = [];

  record(resource: ProvisionedResource): void {
    this.records.push(resource);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  entries(): readonly ProvisionedResource[] {
    return [...this.records];
  }

  find(name: string): ProvisionedResource | undefined {
    return this.records.find(record => record.descriptor.name === name);
  }

  /**
   * Remove and yield entries newest first. An entry is gone from the ledger
   * as soon as it is yielded, whatever the caller does with it.
   */
  *drainReverse(): Generator<ProvisionedResource> {
    let next = this.records.pop();
    while (next !== undefined) {
      yield next;
      next = this.records.pop();
    }
  }
}
