/**
 * Panel Geocoder Error Types
 *
 * Transient errors (provider failures, empty results) are absorbed by the
 * fallback resolver as failed tier attempts. Input and cache errors are
 * fatal and abort the run before any geocoding starts.
 */

/**
 * Provider responded but found nothing for the query.
 *
 * Counted the same as a transport failure for fallback purposes.
 */
export class NoResultError extends Error {
  readonly query: string;

  constructor(query: string) {
    super(`No geocoding result for query: ${query}`);
    this.name = 'NoResultError';
    this.query = query;
  }
}

/**
 * Provider returned a body that does not match the expected shape
 */
export class ProviderResponseError extends Error {
  readonly query: string;
  readonly issues: readonly string[];

  constructor(query: string, issues: readonly string[]) {
    super(`Malformed geocoding response for "${query}": ${issues.join('; ')}`);
    this.name = 'ProviderResponseError';
    this.query = query;
    this.issues = issues;
  }
}

/**
 * Source data missing or unreadable.
 *
 * RECOVERY:
 * - Check the input path and extension (.csv, .ndjson, .jsonl)
 * - Make sure every required column is present in the header
 */
export class PermanentInputError extends Error {
  readonly path: string;
  readonly missingColumns: readonly string[];

  constructor(message: string, path: string, missingColumns: readonly string[] = []) {
    super(message);
    this.name = 'PermanentInputError';
    this.path = path;
    this.missingColumns = missingColumns;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermanentInputError);
    }
  }
}

/**
 * Resolution cache storage could not be opened
 */
export class CacheUnavailableError extends Error {
  readonly location: string;
  readonly cause: unknown;

  constructor(location: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Resolution cache unavailable at ${location}: ${reason}`);
    this.name = 'CacheUnavailableError';
    this.location = location;
    this.cause = cause;
  }
}

/**
 * Invalid configuration value or file
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
