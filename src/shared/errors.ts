export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class SourceError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, code = 'SOURCE_ERROR') {
    super(message, code, details);
    this.name = 'SourceError';
  }
}

/**
 * The origin answered 429. Callers may retry against a different origin.
 */
export class RateLimitError extends SourceError {
  constructor(
    message: string,
    public readonly retryAfter: string | null,
    details?: Record<string, unknown>,
  ) {
    super(message, { ...details, retryAfter }, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

export class LedgerError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LEDGER_ERROR', details);
    this.name = 'LedgerError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
