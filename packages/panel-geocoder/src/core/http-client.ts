/**
 * JSON-over-HTTP client used by the geocoding providers.
 *
 * One GET per call, aborted after `timeoutMs`, always with the configured
 * User-Agent (Nominatim refuses anonymous clients). Failures surface as one
 * of the `HTTPRequestError` subclasses below. There is no retry loop here:
 * the fallback resolver counts each thrown error as one failed attempt.
 *
 * ```typescript
 * const http = new HTTPClient({ userAgent: 'panel-geocoder/1.0 (ops@example.org)' });
 * const body = await http.fetchJSON('https://nominatim.openstreetmap.org/search?q=Nakuru');
 * ```
 */

export interface HTTPClientConfig {
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Readonly<Record<string, string>>;
}

const DEFAULT_CONFIG: HTTPClientConfig = {
  timeoutMs: 10_000,
  userAgent: 'panel-geocoder/1.0',
};

// ============================================================================
// Errors
// ============================================================================

export abstract class HTTPRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** The server answered with a non-2xx status */
export class HTTPError extends HTTPRequestError {
  constructor(
    url: string,
    readonly statusCode: number,
    statusText: string
  ) {
    super(`HTTP ${statusCode} ${statusText}`.trimEnd(), url);
  }
}

export class HTTPTimeoutError extends HTTPRequestError {
  constructor(
    url: string,
    readonly timeoutMs: number
  ) {
    super(`No response within ${timeoutMs}ms`, url);
  }
}

/** DNS, connection refused, TLS and the like */
export class HTTPNetworkError extends HTTPRequestError {
  constructor(url: string, cause: unknown) {
    super(`Request failed: ${cause instanceof Error ? cause.message : String(cause)}`, url, cause);
  }
}

export class HTTPJSONParseError extends HTTPRequestError {
  /** First 200 characters of the body, for the log line */
  readonly excerpt: string;

  constructor(url: string, body: string, cause: unknown) {
    super('Response body is not JSON', url, cause);
    this.excerpt = body.slice(0, 200);
  }
}

// ============================================================================
// Client
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config: Partial<HTTPClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async fetchJSON(url: string, options: FetchOptions = {}): Promise<unknown> {
    const { response, body } = await this.get(url, options);
    if (!response.ok) {
      throw new HTTPError(url, response.status, response.statusText);
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(url, body, error);
    }
  }

  /**
   * The timeout covers the whole exchange: a server that sends headers and
   * then stalls on the body is cut off too.
   */
  private async get(
    url: string,
    options: FetchOptions
  ): Promise<{ readonly response: Response; readonly body: string }> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.config.userAgent,
          ...options.headers,
        },
        signal: controller.signal,
      });
      const body = await response.text();
      return { response, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
