import type { AirtableErrorResponseBody, AirtableValidationIssue } from '@/types'

/**
 * Error thrown for a non-successful Airtable response.
 *
 * Wraps the HTTP status, Airtable's error type (when given) and the raw
 * error payload.
 *
 * @example
 * ```ts
 * try {
 *   await table.getRecord('recMissing0000000')
 * } catch (err) {
 *   if (isAirtableError(err) && err.status === 404) {
 *     // gone
 *   }
 * }
 * ```
 */
export class AirtableError extends Error {
  /**
   * HTTP status of the failed response.
   */
  public readonly status: number

  /**
   * Airtable error type, e.g. `"INVALID_PERMISSIONS_OR_MODEL_NOT_FOUND"`.
   */
  public readonly type?: string

  public readonly payload?: AirtableErrorResponseBody

  /**
   * The message is taken from `payload.error.message`, or from
   * `payload.error` when Airtable sends a bare string. Without either a
   * generic message naming the status is used.
   */
  constructor(status: number, payload?: AirtableErrorResponseBody) {
    const { type, message }
      = typeof payload?.error === 'string'
        ? {
            type: payload.error,
            message: payload.error,
          }
        : {
            type: payload?.error?.type,
            message: payload?.error?.message,
          }

    super(message || `Airtable API request failed with status ${status}`)
    this.name = 'AirtableError'
    this.status = status
    this.type = type
    this.payload = payload
  }

  /**
   * `true` for 4xx responses: the request itself was rejected.
   */
  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500
  }

  /**
   * `true` for 429 responses.
   */
  get isRateLimited(): boolean {
    return this.status === 429
  }

  /**
   * `true` for 5xx responses.
   */
  get isServerError(): boolean {
    return this.status >= 500 && this.status < 600
  }
}

/**
 * Error thrown when a request never got a response: the connection failed
 * or the attempt timed out, on every allowed attempt.
 */
export class AirtableConnectionError extends Error {
  /**
   * Number of attempts made before giving up.
   */
  public readonly attempts: number

  constructor(url: string, attempts: number, options?: { cause?: unknown }) {
    super(`Airtable request to ${url} failed after ${attempts} attempt(s)`, options)
    this.name = 'AirtableConnectionError'
    this.attempts = attempts
  }
}

/**
 * Error thrown before any request when record input is malformed.
 */
export class AirtableValidationError extends Error {
  public readonly issues: AirtableValidationIssue[]

  constructor(issues: AirtableValidationIssue[]) {
    const summary = issues
      .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    super(`Invalid record input: ${summary}`)
    this.name = 'AirtableValidationError'
    this.issues = issues
  }
}

/**
 * Error thrown when client options are missing or invalid.
 */
export class AirtableConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AirtableConfigError'
  }
}

/**
 * Type guard for {@link AirtableError}.
 */
export function isAirtableError(err: unknown): err is AirtableError {
  return err instanceof AirtableError
}
