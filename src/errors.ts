import { CleanupFailureRecord, ResourceDescriptor, RunError } from './types/index.js';

/**
 * Base class for every failure the provisioner reports.
 * `code` is stable and ends up in RunResult.errors.
 */
export class ProvisioningError extends Error {
  readonly code: string;
  readonly remediation?: string;

  constructor(code: string, message: string, options: { cause?: unknown; remediation?: string } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
  }

  toRunError(): RunError {
    return {
      code: this.code,
      message: this.message,
      details: this.cause,
      remediation: this.remediation
    };
  }
}

export class InvalidConfiguration extends ProvisioningError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_CONFIGURATION', `Invalid configuration:\n${problems.join('\n')}`, {
      remediation: 'Fix the configuration file or environment variables and run again'
    });
    this.problems = problems;
  }
}

export class ProvisioningCancelled extends ProvisioningError {
  constructor(descriptorName: string, reason?: unknown) {
    super('PROVISIONING_CANCELLED', `Provisioning cancelled before ${descriptorName} completed`, { cause: reason });
  }
}

export class ProvisioningFailed extends ProvisioningError {
  readonly failedDescriptor: ResourceDescriptor;

  constructor(failedDescriptor: ResourceDescriptor, cause: unknown) {
    super(
      'PROVISIONING_FAILED',
      `Failed to create ${failedDescriptor.kind} ${failedDescriptor.name}: ${describeError(cause)}`,
      {
        cause,
        remediation: 'Check the Azure activity log of the subscription for the failed operation'
      }
    );
    this.failedDescriptor = failedDescriptor;
  }
}

export class CleanupFailed extends ProvisioningError {
  readonly failures: CleanupFailureRecord[];

  constructor(failures: CleanupFailureRecord[]) {
    super(
      'CLEANUP_FAILED',
      `Failed to delete ${failures.length} resource(s):\n` +
        failures.map(f => `  ${f.kind} ${f.name} (${f.identifier}): ${f.message}`).join('\n'),
      { remediation: 'Delete the listed resources manually from the Azure portal' }
    );
    this.failures = failures;
  }
}

export class UnsupportedResource extends ProvisioningError {
  constructor(message: string) {
    super('UNSUPPORTED_RESOURCE', message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** True for REST errors the Azure SDK raises on a 404 response. */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === 404
  );
}
