import createDebug from 'debug'

/**
 * Root namespace of every logger created by this library.
 *
 * Enable output with the `DEBUG` environment variable, e.g.
 * `DEBUG=airkit:*` for everything or `DEBUG=airkit:table` for record
 * operations only.
 */
export const LOG_NAMESPACE = 'airkit'

export type Logger = createDebug.Debugger

/**
 * Create a logger scoped under {@link LOG_NAMESPACE}.
 */
export function createLogger(scope: string): Logger {
  return createDebug(`${LOG_NAMESPACE}:${scope}`)
}

/**
 * `"1 record"` / `"3 records"`.
 */
export function countLabel(count: number): string {
  return `${count} record${count === 1 ? '' : 's'}`
}
