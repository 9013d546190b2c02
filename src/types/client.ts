export type CustomHeaders = Record<string, string | number | boolean>

/**
 * Request pacing applied per base.
 *
 * Airtable allows 5 requests per second per base and answers with 429 (and
 * a 30 second penalty) past that, so requests are spaced out client-side.
 */
export interface RateLimitOptions {
  /**
   * Maximum number of in-flight requests per base.
   *
   * Default: `50`.
   */
  maxConcurrent?: number

  /**
   * Maximum number of requests started per second per base.
   *
   * Default: `5`.
   */
  requestsPerSecond?: number
}

/**
 * Options for constructing an `Airtable` client.
 *
 * Every option can also be set process-wide with `configure(...)`; the API
 * key and endpoint additionally fall back to the `AIRTABLE_API_KEY` and
 * `AIRTABLE_ENDPOINT_URL` environment variables.
 */
export interface AirtableClientOptions {
  /**
   * Personal access token (or OAuth token), sent as a Bearer token.
   */
  apiKey?: string

  /**
   * API version path segment. Default: `"v0"`.
   */
  apiVersion?: string

  /**
   * Headers added to every request. Values are stringified; per-request
   * headers override them.
   */
  customHeaders?: CustomHeaders

  /**
   * API root URL. Default: `https://api.airtable.com`.
   */
  endpointUrl?: string

  /**
   * `fetch` implementation. Defaults to the global `fetch`.
   */
  fetch?: typeof fetch

  /**
   * Do not retry 429 responses even when 429 is listed in
   * {@link retryOnStatuses}.
   *
   * Default: `false`.
   */
  noRetryIfRateLimited?: boolean

  /**
   * Maximum number of retries of one request.
   *
   * Default: `5`.
   */
  maxRetries?: number

  /**
   * Initial backoff delay in milliseconds, doubled on every attempt. Only
   * used when the response carries no `Retry-After` header.
   *
   * Default: `500`.
   */
  retryInitialDelayMs?: number

  /**
   * Response statuses that are retried.
   *
   * Default: `[408, 429, 503, 504]`.
   */
  retryOnStatuses?: number[]

  /**
   * Per-attempt timeout in milliseconds. A timed-out attempt is retried
   * like a network failure.
   *
   * Default: `300000` (5 minutes).
   */
  timeoutMs?: number

  /**
   * Per-base request pacing, or `false` to send requests unpaced.
   */
  rateLimit?: RateLimitOptions | false
}

/**
 * Client options after defaults, global configuration and environment
 * variables have been applied.
 */
export interface ResolvedClientOptions {
  apiKey: string
  apiVersion: string
  customHeaders?: CustomHeaders
  endpointUrl: string
  fetch: typeof fetch
  noRetryIfRateLimited: boolean
  maxRetries: number
  retryInitialDelayMs: number
  retryOnStatuses: number[]
  timeoutMs: number
  rateLimit: Required<RateLimitOptions> | false
}

/**
 * Process-wide defaults set with `configure(...)`.
 */
export type AirtableGlobalConfig = AirtableClientOptions
