/**
 * Runtime check for "plain" objects.
 */
export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (val === null || typeof val !== 'object') {
    return false
  }
  const proto = Object.getPrototypeOf(val)
  return proto === Object.prototype || proto === null
}

/**
 * `JSON.stringify` with the keys of every plain object sorted, so that
 * `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` serialize identically.
 *
 * Arrays keep their order. Non-plain objects (`Date`, class instances) are
 * left to `JSON.stringify`. Circular structures throw a `TypeError`.
 *
 * @example
 * ```ts
 * stableStringify({ meta: { z: 3, a: 1 }, ids: [3, 2, 1] })
 * // => '{"ids":[3,2,1],"meta":{"a":1,"z":3}}'
 * ```
 */
export function stableStringify(value: unknown): string {
  const seen = new WeakSet<object>()

  const normalize = (val: unknown): unknown => {
    if (val === null || typeof val !== 'object') {
      return val
    }
    if (!isPlainObject(val) && !Array.isArray(val)) {
      return val
    }

    if (seen.has(val)) {
      throw new TypeError('Converting circular structure to JSON in stableStringify')
    }
    seen.add(val)

    const result = Array.isArray(val) ? val.map(item => normalize(item)) : normalizeObject(val)
    // only ancestors count; a value shared by siblings is not a cycle
    seen.delete(val)
    return result
  }

  const normalizeObject = (val: Record<string, unknown>): Record<string, unknown> => {
    const result: Record<string, unknown> = {}
    for (const key of Object.keys(val).sort()) {
      const item = val[key]
      if (item !== undefined)
        result[key] = normalize(item)
    }
    return result
  }

  return JSON.stringify(normalize(value)) ?? ''
}

/**
 * Structural equality of two cell values, ignoring object key order.
 */
export function sameValue(a: unknown, b: unknown): boolean {
  if (a === b)
    return true
  return stableStringify(a) === stableStringify(b)
}
