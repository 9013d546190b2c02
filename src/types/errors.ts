/**
 * JSON error body returned by Airtable for a failed request.
 *
 * Airtable sends either a bare string (`{ "error": "NOT_FOUND" }`) or an
 * object with a `type` and a `message`:
 *
 * ```jsonc
 * {
 *   "error": {
 *     "type": "INVALID_REQUEST_UNKNOWN",
 *     "message": "Invalid request: parameter validation failed."
 *   }
 * }
 * ```
 */
export interface AirtableErrorResponseBody {
  error?:
    | string
    | {
      /**
       * Machine-readable error code, e.g. `"AUTHENTICATION_REQUIRED"`.
       */
      type?: string
      message?: string
      [key: string]: unknown
    }

  [key: string]: unknown
}

/**
 * A single problem found while validating caller-provided record input.
 */
export interface AirtableValidationIssue {
  /**
   * Location of the problem, e.g. `[2, "fields"]` for the third record.
   */
  path: (string | number)[]
  message: string
}
