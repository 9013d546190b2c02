import type { AirtableFieldSet } from './field-values'

/**
 * A record as returned by the Airtable records API.
 *
 * @typeParam TFields - Shape of the `fields` object.
 *
 * @example
 * ```ts
 * const record: AirtableRecord<{ Name: string }> = {
 *   id: 'recA1b2C3d4E5f6G7',
 *   createdTime: '2024-10-01T10:00:00.000Z',
 *   fields: { Name: 'Buy milk' },
 * }
 * ```
 */
export interface AirtableRecord<TFields = AirtableFieldSet> {
  /**
   * Record ID, e.g. `"recXXXXXXXXXXXXXX"`.
   */
  id: string

  /**
   * ISO-8601 creation time. Present on every record Airtable returns, but
   * optional here so caller-built snapshots type-check.
   */
  createdTime?: string

  fields: TFields
}

export type SortDirection = 'asc' | 'desc'

/**
 * Sort specification for one field when listing records.
 */
export interface SortSpec {
  /**
   * Field name or field ID.
   */
  field: string

  /**
   * Defaults to `"asc"` on Airtable's side when omitted.
   */
  direction?: SortDirection
}

/**
 * - `"json"`: structured cell values
 * - `"string"`: values formatted as display strings (requires `timeZone`
 *   and `userLocale`)
 */
export type CellFormat = 'json' | 'string'

/**
 * Query parameters of the **"List records"** endpoint.
 */
export interface ListRecordsParams {
  /**
   * Maximum number of records returned across all pages.
   */
  maxRecords?: number

  /**
   * Records per page, 1–100. Airtable defaults to 100.
   */
  pageSize?: number

  /**
   * Cursor returned by the previous page.
   */
  offset?: string

  /**
   * View name or ID; records are filtered and sorted as in that view.
   */
  view?: string

  /**
   * Only return these fields (names or IDs). Sent as `fields[]`.
   */
  fields?: string[]

  /**
   * Airtable formula; only records for which it evaluates truthy are
   * returned, e.g. `"{Status} = 'Done'"`.
   */
  filterByFormula?: string

  sort?: SortSpec[]
  cellFormat?: CellFormat
  timeZone?: string
  userLocale?: string

  /**
   * Key the `fields` of returned records by field ID instead of name.
   */
  returnFieldsByFieldId?: boolean
}

/**
 * One page of **"List records"**.
 */
export interface ListRecordsResult<TFields> {
  records: AirtableRecord<TFields>[]

  /**
   * Present while more pages remain.
   */
  offset?: string
}

/**
 * Query parameters of the **"Get record"** endpoint.
 */
export interface GetRecordParams {
  cellFormat?: CellFormat
  timeZone?: string
  userLocale?: string
  returnFieldsByFieldId?: boolean
}

export interface CreateRecordInput<TFields> {
  fields: Partial<TFields>
}

export interface CreateRecordsOptions {
  /**
   * Let Airtable coerce string values into the target field type
   * (select options are created when missing).
   */
  typecast?: boolean

  returnFieldsByFieldId?: boolean
}

export interface CreateRecordsResult<TFields> {
  records: AirtableRecord<TFields>[]
}

export interface UpdateRecordInput<TFields> {
  id: string
  fields: Partial<TFields>
}

/**
 * Input of an upsert: `id` may be omitted, in which case Airtable matches
 * on `fieldsToMergeOn`.
 */
export interface UpsertRecordInput<TFields> {
  id?: string
  fields: Partial<TFields>
}

export interface PerformUpsertOptions {
  /**
   * One to three field names or IDs used as the external key.
   */
  fieldsToMergeOn: string[]
}

export interface UpdateRecordsOptions {
  typecast?: boolean
  performUpsert?: PerformUpsertOptions
  returnFieldsByFieldId?: boolean
}

export interface UpdateRecordsResult<TFields> {
  records: AirtableRecord<TFields>[]

  /**
   * IDs of records that were updated by an upsert.
   */
  updatedRecords?: string[]

  /**
   * IDs of records that were created by an upsert.
   */
  createdRecords?: string[]
}

export interface DeletedRecord {
  id: string
  deleted: boolean
}

export interface DeleteRecordsResult {
  records: DeletedRecord[]
}

/**
 * Parameters accepted by `Table.getRecords` and `Table.iterateRecords`.
 *
 * `filterByFields` and `filterByFormula` are the table-level names of the
 * `fields[]` and `filterByFormula` query parameters.
 */
export interface GetRecordsParams
  extends Omit<ListRecordsParams, 'offset' | 'fields'> {
  filterByFields?: string[]
}

/**
 * Record input accepted by the `Table` write helpers.
 *
 * Records fetched from Airtable can be passed back as-is; extra keys such
 * as `createdTime` are not sent.
 */
export interface TableRecordInput<TFields = AirtableFieldSet> {
  id?: string
  createdTime?: string
  fields?: Partial<TFields>
}

export interface TableWriteOptions {
  typecast?: boolean
}

/**
 * Query returned by `Table.select(...)`.
 */
export interface AirtableQuery<TFields> {
  /**
   * Every page, concatenated.
   */
  all: () => Promise<AirtableRecord<TFields>[]>

  /**
   * The first page only.
   */
  firstPage: () => Promise<AirtableRecord<TFields>[]>
}
