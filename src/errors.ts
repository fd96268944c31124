/**
 * A source id could not be fetched: network error, timeout, non-2xx status,
 * or a payload that is not shaped like a listing. Recovered per source id.
 */
export class FetchError extends Error {
  readonly sourceId: string;
  readonly status?: number;

  constructor(message: string, sourceId: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FetchError';
    this.sourceId = sourceId;
    this.status = options?.status;
  }
}

/**
 * The store rejected a write or a query. A cycle that hits one is discarded
 * without committing classifier state.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, { cause: options?.cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
