import type {
  AirtableErrorResponseBody,
  CustomHeaders,
  GetRecordParams,
  ListRecordsParams,
  RateLimitOptions,
  ResolvedClientOptions,
} from '@/types'
import Bottleneck from 'bottleneck'
import { AirtableConnectionError, AirtableError } from '@/errors'
import { createLogger } from '@/logger'

/**
 * Maximum number of records Airtable accepts in one create, update or
 * delete request.
 */
export const MAX_RECORDS_PER_BATCH = 10

/**
 * Limiter key shared by requests that do not target a single base
 * (metadata endpoints).
 */
export const META_LIMITER_KEY = 'meta'

/**
 * Per-request options of {@link AirtableCoreClient.requestJson}.
 */
export interface RequestOptions {
  /**
   * Base the request targets. Requests of the same base share one pacing
   * queue; omitted means the shared metadata queue.
   */
  baseId?: string
}

const log = createLogger('http')

/**
 * Shared HTTP transport used by every higher-level client.
 *
 * Owns the API key, the `fetch` implementation, per-base request pacing,
 * and the retry policy. One instance is created per `Airtable` client and
 * shared by all of its bases and tables.
 */
export class AirtableCoreClient {
  readonly apiKey: string
  readonly apiVersion: string
  readonly endpointUrl: string
  readonly fetchImpl: typeof fetch
  readonly customHeaders?: CustomHeaders
  readonly noRetryIfRateLimited: boolean
  readonly maxRetries: number
  readonly retryInitialDelayMs: number
  readonly retryOnStatuses: number[]
  readonly timeoutMs: number
  readonly rateLimit: Required<RateLimitOptions> | false

  private readonly limiters = new Map<string, Bottleneck>()

  constructor(options: ResolvedClientOptions) {
    this.apiKey = options.apiKey
    this.apiVersion = options.apiVersion
    this.endpointUrl = options.endpointUrl
    this.fetchImpl = options.fetch
    this.customHeaders = options.customHeaders
    this.noRetryIfRateLimited = options.noRetryIfRateLimited
    this.maxRetries = options.maxRetries
    this.retryInitialDelayMs = options.retryInitialDelayMs
    this.retryOnStatuses = options.retryOnStatuses
    this.timeoutMs = options.timeoutMs
    this.rateLimit = options.rateLimit
  }

  /**
   * Authorization header for the configured API key.
   */
  get authHeaders(): { Authorization: string } {
    return { Authorization: `Bearer ${this.apiKey}` }
  }

  // ---------------------------------------------------------------------------
  // URL builders
  // ---------------------------------------------------------------------------

  /**
   * URL of a table (`/{version}/{baseId}/{table}`) or of one of its records
   * (`/{version}/{baseId}/{table}/{recordId}`).
   */
  buildTableUrl(
    baseId: string,
    tableIdOrName: string,
    recordId?: string,
    query?: URLSearchParams,
  ): URL {
    const encodedBase = encodeURIComponent(baseId)
    const encodedTable = encodeURIComponent(tableIdOrName)
    const encodedRecord = recordId ? `/${encodeURIComponent(recordId)}` : ''
    const url = new URL(
      `/${this.apiVersion}/${encodedBase}/${encodedTable}${encodedRecord}`,
      this.endpointUrl,
    )

    return withQuery(url, query)
  }

  /**
   * URL under `/{version}/meta`.
   */
  buildMetaUrl(path: string, query?: URLSearchParams): URL {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`
    const url = new URL(`/${this.apiVersion}/meta${normalizedPath}`, this.endpointUrl)
    return withQuery(url, query)
  }

  // ---------------------------------------------------------------------------
  // Query builders
  // ---------------------------------------------------------------------------

  /**
   * Query string of the "List records" endpoint.
   */
  buildListQuery(params?: ListRecordsParams): URLSearchParams | undefined {
    if (!params)
      return undefined
    const search = new URLSearchParams()

    if (params.maxRecords != null)
      search.set('maxRecords', String(params.maxRecords))
    if (params.pageSize != null)
      search.set('pageSize', String(params.pageSize))
    if (params.offset)
      search.set('offset', params.offset)
    if (params.view)
      search.set('view', params.view)
    if (params.filterByFormula)
      search.set('filterByFormula', params.filterByFormula)

    appendFormatParams(search, params)

    if (params.fields) {
      for (const field of params.fields) {
        search.append('fields[]', field)
      }
    }

    params.sort?.forEach((spec, index) => {
      search.append(`sort[${index}][field]`, spec.field)
      if (spec.direction) {
        search.append(`sort[${index}][direction]`, spec.direction)
      }
    })

    return search
  }

  /**
   * Query string of the "Get record" endpoint.
   */
  buildGetQuery(params?: GetRecordParams): URLSearchParams | undefined {
    if (!params)
      return undefined
    const search = new URLSearchParams()
    appendFormatParams(search, params)
    return search
  }

  buildReturnFieldsQuery(returnFieldsByFieldId?: boolean): URLSearchParams | undefined {
    if (returnFieldsByFieldId === undefined)
      return undefined
    const search = new URLSearchParams()
    search.set('returnFieldsByFieldId', String(returnFieldsByFieldId))
    return search
  }

  // ---------------------------------------------------------------------------
  // HTTP / retry / error handling
  // ---------------------------------------------------------------------------

  /**
   * Send a request and decode the JSON response.
   *
   * - injects the Authorization, API version and custom headers
   * - paces requests per base
   * - retries retryable statuses, network failures and timeouts
   *
   * @throws `AirtableError` - For a non-2xx response that is not retried
   *   (or still fails after the last retry).
   * @throws `AirtableConnectionError` - When no attempt got a response.
   */
  async requestJson<T>(
    url: URL,
    init: RequestInit,
    options: RequestOptions = {},
  ): Promise<T> {
    const headers = this.buildHeaders(init)
    const method = init.method ?? 'GET'
    const target = url.toString()
    let attempt = 0

    while (true) {
      let response: Response
      try {
        response = await this.schedule(options.baseId, () =>
          this.fetchImpl(target, {
            ...init,
            headers,
            signal: withTimeout(init.signal, this.timeoutMs),
          }))
      }
      catch (err) {
        if (attempt >= this.maxRetries) {
          log('%s %s failed: %O', method, target, err)
          throw new AirtableConnectionError(target, attempt + 1, { cause: err })
        }
        const delayMs = this.getBackoffDelayMs(attempt)
        log('%s %s failed, retrying in %dms', method, target, Math.round(delayMs))
        await this.sleep(delayMs)
        attempt += 1
        continue
      }

      log('%s %s -> %d', method, target, response.status)

      if (!this.shouldRetry(response.status, attempt)) {
        return this.handleResponse<T>(response)
      }

      const delayMs = this.getRetryDelayMs(response, attempt)
      log('retrying %s %s in %dms (attempt %d)', method, target, Math.round(delayMs), attempt + 1)
      await response.body?.cancel()
      await this.sleep(delayMs)
      attempt += 1
    }
  }

  /**
   * Pacing queue of one base, created on first use.
   */
  limiterFor(baseId?: string): Bottleneck | undefined {
    if (!this.rateLimit)
      return undefined

    const key = baseId ?? META_LIMITER_KEY
    let limiter = this.limiters.get(key)
    if (!limiter) {
      limiter = new Bottleneck({
        maxConcurrent: this.rateLimit.maxConcurrent,
        minTime: Math.ceil(1000 / this.rateLimit.requestsPerSecond),
      })
      this.limiters.set(key, limiter)
    }
    return limiter
  }

  private schedule<R>(baseId: string | undefined, task: () => Promise<R>): Promise<R> {
    const limiter = this.limiterFor(baseId)
    return limiter ? limiter.schedule(task) : task()
  }

  /**
   * Headers of one request: auth and version first, then the global custom
   * headers, then the request's own headers.
   *
   * @internal
   */
  private buildHeaders(init: RequestInit): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.authHeaders,
      'X-Airtable-API-Version': this.apiVersion,
    }

    if (this.customHeaders) {
      for (const [key, value] of Object.entries(this.customHeaders)) {
        headers[key] = String(value)
      }
    }

    for (const [key, value] of headerEntries(init.headers)) {
      const existing = Object.keys(headers).find(name => name.toLowerCase() === key.toLowerCase())
      headers[existing ?? key] = value
    }

    const method = init.method ?? 'GET'
    if (method !== 'GET' && method !== 'HEAD') {
      const hasContentType = Object.keys(headers).some(name => name.toLowerCase() === 'content-type')
      if (!hasContentType) {
        headers['Content-Type'] = 'application/json'
      }
    }

    return headers
  }

  /**
   * Decode a response, throwing `AirtableError` for non-2xx statuses.
   *
   * @internal
   */
  private async handleResponse<T>(response: Response): Promise<T> {
    if (response.status === 204) {
      return undefined as T
    }

    const contentType = response.headers.get('Content-Type') ?? ''
    const text = await response.text()
    const isJson = contentType.includes('application/json')
    const data: unknown = isJson && text ? JSON.parse(text) : text

    if (response.ok) {
      return data as T
    }

    throw new AirtableError(response.status, isErrorBody(data) ? data : undefined)
  }

  /**
   * @internal
   */
  private shouldRetry(status: number, attempt: number): boolean {
    if (attempt >= this.maxRetries) {
      return false
    }
    if (this.noRetryIfRateLimited && status === 429) {
      return false
    }
    return this.retryOnStatuses.includes(status)
  }

  /**
   * `Retry-After` (seconds) when present and positive, otherwise
   * exponential backoff.
   *
   * @internal
   */
  private getRetryDelayMs(response: Response, attempt: number): number {
    const retryAfter = response.headers.get('Retry-After')
    if (retryAfter) {
      const seconds = Number(retryAfter)
      if (!Number.isNaN(seconds) && seconds > 0) {
        return seconds * 1000
      }
    }

    return this.getBackoffDelayMs(attempt)
  }

  /**
   * `retryInitialDelayMs * 2^attempt` plus up to 20% jitter.
   *
   * @internal
   */
  private getBackoffDelayMs(attempt: number): number {
    const base = this.retryInitialDelayMs * 2 ** attempt
    const jitter = base * 0.2 * Math.random()
    return base + jitter
  }

  /**
   * @internal
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

function withQuery(url: URL, query?: URLSearchParams): URL {
  if (query && Array.from(query.keys()).length > 0) {
    url.search = query.toString()
  }
  return url
}

function headerEntries(init?: HeadersInit): [string, string][] {
  if (!init)
    return []
  if (init instanceof Headers) {
    const entries: [string, string][] = []
    init.forEach((value, key) => entries.push([key, value]))
    return entries
  }
  if (Array.isArray(init))
    return init.map(([key, value]): [string, string] => [key, value])
  return Object.entries(init)
}

function withTimeout(signal: AbortSignal | null | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([signal, timeout]) : timeout
}

function appendFormatParams(search: URLSearchParams, params: GetRecordParams): void {
  if (params.cellFormat)
    search.set('cellFormat', params.cellFormat)
  if (params.timeZone)
    search.set('timeZone', params.timeZone)
  if (params.userLocale)
    search.set('userLocale', params.userLocale)
  if (params.returnFieldsByFieldId !== undefined)
    search.set('returnFieldsByFieldId', String(params.returnFieldsByFieldId))
}

function isErrorBody(data: unknown): data is AirtableErrorResponseBody {
  return typeof data === 'object' && data !== null && !Array.isArray(data)
}
