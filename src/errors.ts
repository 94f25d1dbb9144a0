/** No record matched the requested hostname in the configured zone */
export class RecordNotFoundError extends Error {
  readonly hostname: string;

  constructor(hostname: string) {
    super(`DNS record not found: ${hostname}`);
    this.name = 'RecordNotFoundError';
    this.hostname = hostname;
  }
}

/**
 * A call to the DNS provider failed: transport error, timeout, non-2xx status,
 * an unsuccessful envelope or a payload that does not match the expected shape.
 */
export class ProviderError extends Error {
  /** HTTP status returned by the provider, when one was received */
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ProviderError';
    this.status = options?.status;
  }
}
