import type {
  AirtableCellValue,
  AirtableCollaborator,
  AirtableFieldSet,
  AirtableRecord,
} from '@/types'
import { hasUrl } from './attachment'
import { sameValue } from './stable-stringify'

const RECORD_ID_PATTERN = /^rec[A-Z0-9]{14}$/i

/**
 * Whether `value` is a record ID (`rec` + 14 characters) or a non-empty list
 * whose first item is one, i.e. the value of a linked-record field.
 */
export function isRecordId(value: unknown): boolean {
  const candidate: unknown = Array.isArray(value) ? value[0] : value
  return typeof candidate === 'string' && RECORD_ID_PATTERN.test(candidate)
}

/**
 * A cell counts as set when it holds something other than `null`,
 * `undefined`, `false`, `0`, `''` or an empty list.
 */
export function isSet(value: AirtableCellValue): boolean {
  if (Array.isArray(value))
    return value.length > 0
  return Boolean(value)
}

/**
 * Values of `keys` that are set on `record`, in key order. Usable as a
 * composite lookup key (see `stableStringify`).
 *
 * @returns `undefined` when none of the keys is set.
 */
export function primaryKeyTuple(
  record: AirtableRecord,
  keys: readonly string[],
): AirtableCellValue[] | undefined {
  const values = keys
    .map(key => record.fields[key])
    .filter(isSet)
  return values.length > 0 ? values : undefined
}

export interface GraftFieldsOptions {
  /**
   * Default: `","`.
   */
  separator?: string

  /**
   * Sort the resulting list. Default: `true`.
   */
  sort?: boolean
}

/**
 * Turn separator-joined string cells into lists, e.g. `"b, a"` into
 * `["a", "b"]`. A string without the separator becomes a one-item list.
 * Other values are left alone.
 */
export function graftFields(
  record: AirtableRecord,
  fields: readonly string[],
  options: GraftFieldsOptions = {},
): AirtableRecord {
  const { separator = ',', sort = true } = options
  const grafted: AirtableFieldSet = { ...record.fields }

  for (const field of fields) {
    const value = record.fields[field]
    if (typeof value !== 'string' || !value)
      continue

    const parts = value.split(separator).map(part => part.trim())
    grafted[field] = sort ? parts.sort() : parts
  }

  return { ...record, fields: grafted }
}

/**
 * Replace comma-separated names in `fieldsToLink` of every record of
 * `tableA` with the IDs of the `tableB` records whose `primaryKeyB` field
 * holds that name. Names without a match are dropped.
 *
 * Returns new records; the inputs are not modified.
 *
 * @example
 * ```ts
 * linkTables(
 *   [{ id: 'recA', fields: { Tags: 'red, blue' } }],
 *   [{ id: 'recR', fields: { Name: 'red' } }],
 *   ['Tags'],
 *   'Name',
 * )
 * // => [{ id: 'recA', fields: { Tags: ['recR'] } }]
 * ```
 */
export function linkTables(
  tableA: readonly AirtableRecord[],
  tableB: readonly AirtableRecord[],
  fieldsToLink: readonly string[],
  primaryKeyB: string,
): AirtableRecord[] {
  const keyB = primaryKeyB.trim()
  const idsByKey = new Map<string, string>()
  for (const record of tableB) {
    const key = record.fields[keyB]
    if (typeof key === 'string' && key)
      idsByKey.set(key, record.id)
  }

  return tableA.map((record) => {
    const linked: AirtableFieldSet = structuredClone(record.fields)
    for (const rawField of fieldsToLink) {
      const field = rawField.trim()
      const value = record.fields[field]
      if (typeof value !== 'string' || !value)
        continue

      const ids: string[] = []
      for (const name of value.split(',')) {
        const id = idsByKey.get(name.trim())
        if (id)
          ids.push(id)
      }
      linked[field] = ids
    }
    return { ...record, fields: linked }
  })
}

/**
 * Merge `recordA`'s values into `recordB`'s: lists are unioned, strings
 * joined with `", "`, numbers added. The result carries `recordB`'s ID and
 * only the merged fields.
 *
 * @param joinFields - Fields to merge. Default: every field of `recordA`.
 */
export function combineRecords(
  recordA: AirtableRecord,
  recordB: AirtableRecord,
  joinFields?: readonly string[],
): AirtableRecord {
  const keys = joinFields ?? Object.keys(recordA.fields)
  const fields: AirtableFieldSet = {}

  for (const key of keys) {
    if (!(key in recordA.fields))
      continue
    fields[key] = combineValues(recordA.fields[key], recordB.fields[key])
  }

  return { id: recordB.id, fields }
}

function combineValues(a: AirtableCellValue, b: AirtableCellValue): AirtableCellValue {
  if (typeof a === 'string' && typeof b === 'string')
    return `${a}, ${b}`
  if (typeof a === 'number' && typeof b === 'number')
    return a + b
  if (isListOf(a, isString) && isListOf(b, isString))
    return union(a, b)
  if (isListOf(a, isCollaborator) && isListOf(b, isCollaborator))
    return union(a, b)
  if (isListOf(a, hasUrl) && isListOf(b, hasUrl))
    return union<{ url: string }>(a, b)
  return a
}

/**
 * Fields of `recordA` that differ from `recordB`, under `recordB`'s ID.
 * A field missing from `recordB` is kept when `recordA` has it set.
 *
 * @param filterFields - Fields to compare. Default: every field of
 *   `recordA`.
 */
export function filterRecord(
  recordA: AirtableRecord,
  recordB: AirtableRecord,
  filterFields?: readonly string[],
): AirtableRecord {
  const keys = filterFields ?? Object.keys(recordA.fields)
  const fields: AirtableFieldSet = {}

  for (const key of keys) {
    const value = recordA.fields[key]
    const changed = key in recordB.fields
      ? !sameValue(value, recordB.fields[key])
      : isSet(value)
    if (changed)
      fields[key] = value
  }

  return { id: recordB.id, fields }
}

/**
 * Pair of a checkbox field and the field it protects.
 */
export interface FieldOverride {
  /**
   * Checkbox field; when checked on the existing record, the override
   * field keeps its existing value.
   */
  refField: string
  overrideField: string
}

/**
 * Copy `existing`'s value of every override field whose checkbox is
 * checked on `existing` into a copy of `record`, so that values edited by
 * hand in Airtable are not overwritten.
 */
export function overrideRecord(
  record: AirtableRecord,
  existing: AirtableRecord,
  overrides: readonly FieldOverride[],
): AirtableRecord {
  const fields: AirtableFieldSet = { ...record.fields }
  for (const { refField, overrideField } of overrides) {
    if (existing.fields[refField])
      fields[overrideField] = existing.fields[overrideField]
  }
  return { ...record, fields }
}

export type CompareMethod = 'overwrite' | 'combine'

export interface CompareRecordsOptions {
  overrides?: readonly FieldOverride[]
  filterFields?: readonly string[]
}

/**
 * Prepare `recordA` as an update of the existing `recordB`.
 *
 * Overrides are applied first. `overwrite` then keeps only the changed
 * fields ({@link filterRecord}); `combine` merges both records
 * ({@link combineRecords}).
 */
export function compareRecords(
  recordA: AirtableRecord,
  recordB: AirtableRecord,
  method: CompareMethod,
  options: CompareRecordsOptions = {},
): AirtableRecord {
  const candidate = options.overrides
    ? overrideRecord(recordA, recordB, options.overrides)
    : recordA

  return method === 'overwrite'
    ? filterRecord(candidate, recordB, options.filterFields)
    : combineRecords(candidate, recordB, options.filterFields)
}

/**
 * First record of `records` whose values equal `record`'s for every one of
 * `fields`.
 */
export function recordExists<TRecord extends AirtableRecord>(
  record: AirtableRecord,
  records: readonly TRecord[],
  fields: readonly string[],
): { record: TRecord, index: number } | undefined {
  const index = records.findIndex(existing =>
    fields.every(field => sameValue(existing.fields[field], record.fields[field])),
  )
  if (index === -1)
    return undefined
  return { record: records[index], index }
}

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

function isCollaborator(value: unknown): value is AirtableCollaborator {
  return typeof value === 'object'
    && value !== null
    && 'id' in value
    && 'email' in value
    && typeof value.email === 'string'
}

function isListOf<T>(value: unknown, guard: (item: unknown) => item is T): value is readonly T[] {
  return Array.isArray(value) && value.every(item => guard(item))
}

function union<T>(a: readonly T[], b: readonly T[]): T[] {
  const merged = [...a]
  for (const item of b) {
    if (!merged.some(existing => sameValue(existing, item)))
      merged.push(item)
  }
  return merged
}
