export class CancelledError extends Error {
  override readonly name = 'CancelledError';

  constructor(reason?: unknown) {
    super('Operation cancelled.', {cause: reason});
  }
}

export class TimeoutError extends Error {
  override readonly name = 'TimeoutError';

  constructor(readonly timeout: number) {
    super(`Operation timed out after ${timeout}ms.`);
  }
}

export class PoolClosedError extends Error {
  override readonly name = 'PoolClosedError';

  constructor() {
    super('Worker pool is closed.');
  }
}

export class NoAddressAvailableError extends Error {
  override readonly name = 'NoAddressAvailableError';

  constructor(readonly family: string) {
    super(`No public ${family} address available from any service.`);
  }
}

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

export class DNSProviderAuthenticationError extends Error {
  override readonly name = 'DNSProviderAuthenticationError';
}

/**
 * Whether the error stands for an aborted operation rather than a failure of
 * the operation itself.
 */
export function isCancellation(error: unknown): boolean {
  return (
    error instanceof CancelledError ||
    (error instanceof Error && error.name === 'AbortError')
  );
}
