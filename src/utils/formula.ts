/**
 * One equality test of {@link composeFormula}.
 */
export interface FormulaCondition {
  field: string
  value: string | number | boolean

  /**
   * `false` negates the test with `NOT(...)`. Default: `true`.
   */
  equal?: boolean
}

/**
 * Field reference as written in a formula: `{Field name}`.
 */
export function fieldRef(field: string): string {
  return `{${field}}`
}

function quote(value: string | number | boolean): string {
  return `'${String(value).replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`
}

/**
 * `AND(...)` of field equality tests, usable as `filterByFormula`.
 *
 * @example
 * ```ts
 * composeFormula([
 *   { field: 'Status', value: 'Done' },
 *   { field: 'Owner', value: 'Ada', equal: false },
 * ])
 * // => "AND({Status} = 'Done',NOT({Owner} = 'Ada'))"
 * ```
 */
export function composeFormula(conditions: readonly FormulaCondition[]): string {
  const tests = conditions.map(({ field, value, equal = true }) => {
    const test = `${fieldRef(field)} = ${quote(value)}`
    return equal ? test : `NOT(${test})`
  })
  return `AND(${tests.join(',')})`
}

/**
 * Matches records whose date field lies less than `seconds` in the past.
 *
 * @example
 * ```ts
 * composeTimeFormula('Last Modified', 3600)
 * // => "DATETIME_DIFF(NOW(), {Last Modified}, 'seconds') < 3600"
 * ```
 */
export function composeTimeFormula(field: string, seconds: number): string {
  return `DATETIME_DIFF(NOW(), ${fieldRef(field)}, 'seconds') < ${seconds}`
}
