import type { Base } from './base'
import type {
  AirtableFieldSchema,
  AirtableFieldSet,
  AirtableQuery,
  AirtableRecord,
  AirtableTableSchema,
  AirtableViewSchema,
  GetRecordParams,
  GetRecordsParams,
  ListRecordsParams,
  TableRecordInput,
  TableWriteOptions,
  UpdateRecordInput,
  UpdateRecordsResult,
} from '@/types'
import { AirtableValidationError } from '@/errors'
import { countLabel, createLogger } from '@/logger'
import { validateRecords } from '@/validations'

const log = createLogger('table')

export interface TableUpdateOptions extends TableWriteOptions {
  /**
   * Match records without an `id` on these fields and create the ones that
   * have no match.
   */
  fieldsToMergeOn?: string[]
}

/**
 * One table of a base.
 *
 * Tables loaded through `Base.getTables()` carry their schema (`id`,
 * `primaryFieldId`, `fields`, `views`); handles made with `Base.table(name)`
 * only know their name.
 *
 * @typeParam TFields - Shape of the `fields` object of this table's records.
 *
 * @example
 * ```ts
 * interface Task {
 *   Name: string
 *   Status?: 'Todo' | 'Doing' | 'Done'
 * }
 *
 * const tasks = airtable.getTable<Task>('appXXXXXXXXXXXXXX', 'Tasks')
 * const open = await tasks.getRecords({ filterByFormula: "{Status} != 'Done'" })
 * await tasks.postRecord({ fields: { Name: 'Buy milk' } })
 * ```
 */
export class Table<TFields = AirtableFieldSet> {
  readonly id?: string
  readonly description?: string
  readonly primaryFieldId?: string
  readonly fields: AirtableFieldSchema[]
  readonly views: AirtableViewSchema[]

  /**
   * Records of the last {@link getRecords} call.
   */
  records?: AirtableRecord<TFields>[]

  constructor(
    readonly base: Base,
    readonly name: string,
    readonly schema?: AirtableTableSchema,
  ) {
    this.id = schema?.id
    this.description = schema?.description
    this.primaryFieldId = schema?.primaryFieldId
    this.fields = schema?.fields ?? []
    this.views = schema?.views ?? []
  }

  /**
   * Records URL of this table.
   */
  get url(): string {
    return this.base.client.core.buildTableUrl(this.base.id, this.name).toString()
  }

  /**
   * Name of the primary field, when the schema is known.
   */
  get primaryFieldName(): string | undefined {
    if (!this.primaryFieldId)
      return undefined
    return this.fields.find(field => field.id === this.primaryFieldId)?.name
  }

  /**
   * @throws `AirtableError` - 404 when the record does not exist.
   */
  async getRecord(recordId: string, params?: GetRecordParams): Promise<AirtableRecord<TFields>> {
    const record = await this.base.records.getRecord<TFields>(this.name, recordId, params)
    log('Fetched: %s', this.labelOf(record))
    return record
  }

  /**
   * Every record matching `params`, across all pages. The result is also
   * kept on {@link records}.
   *
   * @example
   * ```ts
   * await tasks.getRecords({
   *   view: 'Grid view',
   *   filterByFields: ['Name', 'Status'],
   *   sort: [{ field: 'Name' }],
   * })
   * ```
   */
  async getRecords(params?: GetRecordsParams): Promise<AirtableRecord<TFields>[]> {
    const records = await this.base.records.listAllRecords<TFields>(this.name, toListParams(params))
    this.records = records
    log('Fetched %s from table: %s', countLabel(records.length), this.name)
    return records
  }

  /**
   * Stream records page by page.
   */
  iterateRecords(params?: GetRecordsParams): AsyncGenerator<AirtableRecord<TFields>, void, void> {
    return this.base.records.iterateRecords<TFields>(this.name, toListParams(params))
  }

  select(params?: GetRecordsParams): AirtableQuery<TFields> {
    return {
      all: () => this.getRecords(params),
      firstPage: async () => {
        const page = await this.base.records.listRecords<TFields>(this.name, toListParams(params))
        return page.records
      },
    }
  }

  /**
   * @throws AirtableValidationError - When the record has no `fields`.
   */
  async postRecord(
    record: TableRecordInput<TFields>,
    options?: TableWriteOptions,
  ): Promise<AirtableRecord<TFields>> {
    validateRecords(record, { requireFields: true })

    const created = await this.base.records.createRecord<TFields>(
      this.name,
      record.fields ?? {},
      options,
    )
    log('Posted: %s', this.labelOf(created))
    return created
  }

  /**
   * @throws AirtableValidationError - When any record has no `fields`.
   */
  async postRecords(
    records: TableRecordInput<TFields>[],
    options?: TableWriteOptions,
  ): Promise<AirtableRecord<TFields>[]> {
    validateRecords(records, { requireFields: true })

    const result = await this.base.records.createRecords<TFields>(
      this.name,
      records.map(record => ({ fields: record.fields ?? {} })),
      options,
    )
    log('Posted: %s', this.labelOfMany(result.records))
    return result.records
  }

  /**
   * PATCH one record; only the given fields change.
   *
   * @throws AirtableValidationError - When the record has no `id` or no
   *   `fields`.
   */
  async updateRecord(
    record: TableRecordInput<TFields>,
    options?: TableWriteOptions,
  ): Promise<AirtableRecord<TFields>> {
    validateRecords(record, { requireId: true, requireFields: true })
    const { id, fields } = toUpdateInput(record)

    const updated = await this.base.records.updateRecord<TFields>(this.name, id, fields, options)
    log('Updated: %s', this.labelOf(updated))
    return updated
  }

  /**
   * PATCH records in batches of 10.
   *
   * With `fieldsToMergeOn`, records may omit `id` (see {@link upsertRecords}).
   */
  async updateRecords(
    records: TableRecordInput<TFields>[],
    options: TableUpdateOptions = {},
  ): Promise<AirtableRecord<TFields>[]> {
    if (options.fieldsToMergeOn) {
      const result = await this.upsertRecords(records, options.fieldsToMergeOn, options)
      return result.records
    }

    validateRecords(records, { requireId: true, requireFields: true })

    const result = await this.base.records.updateRecords<TFields>(
      this.name,
      records.map(toUpdateInput),
      { typecast: options.typecast },
    )
    log('Updated: %s', this.labelOfMany(result.records))
    return result.records
  }

  /**
   * Update records matched on `fieldsToMergeOn` and create the rest.
   *
   * @returns Every written record, plus the IDs Airtable reports as
   *   created and as updated.
   */
  async upsertRecords(
    records: TableRecordInput<TFields>[],
    fieldsToMergeOn: string[],
    options: TableWriteOptions = {},
  ): Promise<UpdateRecordsResult<TFields>> {
    validateRecords(records, { requireFields: true })

    const result = await this.base.records.updateRecords<TFields>(
      this.name,
      records.map(record => ({ id: record.id, fields: record.fields ?? {} })),
      { typecast: options.typecast, performUpsert: { fieldsToMergeOn } },
    )
    log(
      'Upserted: %d created, %d updated in table: %s',
      result.createdRecords?.length ?? 0,
      result.updatedRecords?.length ?? 0,
      this.name,
    )
    return result
  }

  /**
   * @returns `true` when Airtable confirms the deletion.
   */
  async deleteRecord(recordOrId: string | TableRecordInput<TFields>): Promise<boolean> {
    const id = toRecordId(recordOrId)

    const deleted = await this.base.records.deleteRecord(this.name, id)
    log('Deleted: %s', typeof recordOrId === 'string' ? id : this.labelOf(recordOrId))
    return deleted.deleted
  }

  /**
   * @returns IDs of the deleted records.
   */
  async deleteRecords(recordsOrIds: Array<string | TableRecordInput<TFields>>): Promise<string[]> {
    const ids = recordsOrIds.map(toRecordId)

    const result = await this.base.records.deleteRecords(this.name, ids)
    const deletedIds = result.records.filter(record => record.deleted).map(record => record.id)
    log('Deleted: %s', ids.length === 1 ? ids[0] : countLabel(deletedIds.length))
    return deletedIds
  }

  /**
   * Log label of a record: its primary field value when known, else its ID,
   * else `1 record`.
   */
  labelOf(record: TableRecordInput<TFields>): string {
    const name = this.primaryFieldName
    const fields: unknown = record.fields
    if (name && typeof fields === 'object' && fields !== null) {
      const value: unknown = Reflect.get(fields, name)
      if (typeof value === 'string' || typeof value === 'number')
        return String(value)
    }
    return record.id ?? countLabel(1)
  }

  private labelOfMany(records: TableRecordInput<TFields>[]): string {
    return records.length === 1 ? this.labelOf(records[0]) : countLabel(records.length)
  }
}

function toListParams(params?: GetRecordsParams): Omit<ListRecordsParams, 'offset'> | undefined {
  if (!params)
    return undefined
  const { filterByFields, ...rest } = params
  return filterByFields ? { ...rest, fields: filterByFields } : rest
}

function toUpdateInput<TFields>(record: TableRecordInput<TFields>): UpdateRecordInput<TFields> {
  if (!record.id)
    throw new AirtableValidationError([{ path: ['id'], message: 'id is required' }])
  return { id: record.id, fields: record.fields ?? {} }
}

function toRecordId<TFields>(recordOrId: string | TableRecordInput<TFields>): string {
  if (typeof recordOrId === 'string') {
    if (!recordOrId)
      throw new AirtableValidationError([{ path: [], message: 'record id must not be empty' }])
    return recordOrId
  }
  validateRecords(recordOrId, { requireId: true })
  return toUpdateInput(recordOrId).id
}
