// Orchestration-specific types
import {
  CleanupFailureRecord,
  PlannedResourceSummary,
  ProvisionedResourceSummary,
  RunError,
  RunMetadata
} from '../types/index.js';
import { CleanupFailed } from '../errors.js';

export interface ExecuteOptions {
  /** Aborting stops provisioning; cleanup still runs */
  signal?: AbortSignal;
}

export interface CleanupReport {
  attempted: number;
  /** Identifiers deleted (or already gone), in deletion order */
  deleted: string[];
  failures: CleanupFailureRecord[];
  error?: CleanupFailed;
}

export interface RunResult {
  success: boolean;
  plan: PlannedResourceSummary[];
  /** What was provisioned, in creation order, as it stood before cleanup */
  resources: ProvisionedResourceSummary[];
  /** Earliest failure first; a cleanup failure is appended after it */
  errors: RunError[];
  cleanup: CleanupReport;
  metadata: RunMetadata;
}
