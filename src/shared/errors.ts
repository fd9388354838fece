export class ScraperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ScraperError';
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class InputError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

export class FetchError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

/**
 * auth: the credential was rejected; fatal for the whole run.
 * quota: rate limit or quota exhausted; retry with backoff.
 * transient: anything else the service or transport threw at us.
 */
export type ServiceErrorKind = 'auth' | 'quota' | 'transient';

export class ServiceError extends ScraperError {
  constructor(
    message: string,
    public readonly kind: ServiceErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'SERVICE_ERROR', details);
    this.name = 'ServiceError';
  }

  get retryable(): boolean {
    return this.kind !== 'auth';
  }
}

export class ParseError extends ScraperError {
  constructor(
    message: string,
    public readonly rawResponse: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class PipelineError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PIPELINE_ERROR', details);
    this.name = 'PipelineError';
  }
}

export class OutputError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OUTPUT_ERROR', details);
    this.name = 'OutputError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
