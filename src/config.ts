import type {
  AirtableClientOptions,
  AirtableGlobalConfig,
  RateLimitOptions,
  ResolvedClientOptions,
} from '@/types'
import { z } from 'zod'
import { AirtableConfigError } from '@/errors'

/**
 * Default Airtable API root URL.
 */
export const DEFAULT_ENDPOINT_URL = 'https://api.airtable.com'

export const DEFAULT_API_VERSION = 'v0'

export const DEFAULT_MAX_RETRIES = 5

export const DEFAULT_RETRY_INITIAL_DELAY_MS = 500

export const DEFAULT_RETRY_ON_STATUSES: readonly number[] = [408, 429, 503, 504]

/**
 * 5 minutes per attempt.
 */
export const DEFAULT_TIMEOUT_MS = 300_000

/**
 * Airtable's documented limit is 5 requests per second per base.
 */
export const DEFAULT_RATE_LIMIT: Required<RateLimitOptions> = {
  maxConcurrent: 50,
  requestsPerSecond: 5,
}

export const API_KEY_ENV = 'AIRTABLE_API_KEY'

export const ENDPOINT_URL_ENV = 'AIRTABLE_ENDPOINT_URL'

/**
 * Process-wide defaults written by {@link configure}.
 */
const globalConfig: AirtableGlobalConfig = {}

const optionsSchema = z.object({
  apiKey: z.string().min(1),
  apiVersion: z.string().min(1),
  customHeaders: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  endpointUrl: z.string().url(),
  noRetryIfRateLimited: z.boolean(),
  maxRetries: z.number().int().nonnegative(),
  retryInitialDelayMs: z.number().nonnegative(),
  retryOnStatuses: z.array(z.number().int().min(100).max(599)),
  timeoutMs: z.number().int().positive(),
  rateLimit: z.union([
    z.literal(false),
    z.object({
      maxConcurrent: z.number().int().positive(),
      requestsPerSecond: z.number().positive(),
    }),
  ]),
})

/**
 * Set process-wide defaults for every client constructed afterwards.
 *
 * Later calls overwrite only the keys they carry.
 *
 * @example
 * ```ts
 * configure({ apiKey: process.env.MY_TOKEN, maxRetries: 3 })
 * const airtable = new Airtable()
 * ```
 */
export function configure(config: AirtableGlobalConfig): void {
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) {
      Object.assign(globalConfig, { [key]: value })
    }
  }
}

/**
 * Drop everything set through {@link configure}.
 */
export function resetConfig(): void {
  for (const key of Object.keys(globalConfig)) {
    Reflect.deleteProperty(globalConfig, key)
  }
}

/**
 * Snapshot of the current process-wide defaults.
 */
export function getGlobalConfig(): Readonly<AirtableGlobalConfig> {
  return { ...globalConfig }
}

function resolveRateLimit(
  rateLimit: RateLimitOptions | false | undefined,
): Required<RateLimitOptions> | false {
  if (rateLimit === false) {
    return false
  }
  return {
    maxConcurrent: rateLimit?.maxConcurrent ?? DEFAULT_RATE_LIMIT.maxConcurrent,
    requestsPerSecond: rateLimit?.requestsPerSecond ?? DEFAULT_RATE_LIMIT.requestsPerSecond,
  }
}

/**
 * Merge explicit options, {@link configure} defaults, environment
 * variables and built-in defaults, in that order of precedence, and
 * validate the result.
 *
 * @throws AirtableConfigError - When no API key can be found, no `fetch`
 *   is available, or any option is out of range.
 */
export function resolveClientOptions(
  options: AirtableClientOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedClientOptions {
  const merged: AirtableClientOptions = { ...globalConfig }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }

  const apiKey = merged.apiKey ?? env[API_KEY_ENV]
  if (!apiKey) {
    throw new AirtableConfigError(
      `apiKey is required (pass it, call configure(), or set ${API_KEY_ENV})`,
    )
  }

  const fetchImpl = merged.fetch ?? (typeof fetch === 'function' ? fetch : undefined)
  if (!fetchImpl) {
    throw new AirtableConfigError(
      'fetch is not available in this environment; pass a fetch implementation in the client options',
    )
  }

  const candidate = {
    apiKey,
    apiVersion: merged.apiVersion ?? DEFAULT_API_VERSION,
    customHeaders: merged.customHeaders,
    endpointUrl: merged.endpointUrl ?? env[ENDPOINT_URL_ENV] ?? DEFAULT_ENDPOINT_URL,
    noRetryIfRateLimited: merged.noRetryIfRateLimited ?? false,
    maxRetries: merged.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryInitialDelayMs: merged.retryInitialDelayMs ?? DEFAULT_RETRY_INITIAL_DELAY_MS,
    retryOnStatuses: merged.retryOnStatuses ?? [...DEFAULT_RETRY_ON_STATUSES],
    timeoutMs: merged.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    rateLimit: resolveRateLimit(merged.rateLimit),
  }

  const parsed = optionsSchema.safeParse(candidate)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new AirtableConfigError(`Invalid Airtable client options: ${problems}`)
  }

  return { ...parsed.data, fetch: fetchImpl }
}
