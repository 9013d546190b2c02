/**
 * @module types
 *
 * Public type model of the library.
 */

export * from './client'
export * from './errors'
export * from './field-values'
export * from './metadata'
export * from './records'

/**
 * How `getBase` / `getTable` match their `value` argument: by ID, by name,
 * or by either when omitted.
 */
export type LookupKey = 'id' | 'name'
