export { Account } from './account'
export { Airtable, Airtable as default } from './airtable'
export { Base } from './base'
export type { BaseInit } from './base'
export * from './client'
export {
  API_KEY_ENV,
  configure,
  DEFAULT_API_VERSION,
  DEFAULT_ENDPOINT_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RETRY_INITIAL_DELAY_MS,
  DEFAULT_RETRY_ON_STATUSES,
  DEFAULT_TIMEOUT_MS,
  ENDPOINT_URL_ENV,
  getGlobalConfig,
  resetConfig,
  resolveClientOptions,
} from './config'
export * from './errors'
export { createLogger, LOG_NAMESPACE } from './logger'
export type { Logger } from './logger'
export { Table } from './table'
export type { TableUpdateOptions } from './table'
export type * from './types'
export * from './utils'
export * from './validations'
