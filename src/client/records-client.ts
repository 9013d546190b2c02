import type { AirtableCoreClient } from './core'
import type {
  AirtableFieldSet,
  AirtableRecord,
  CreateRecordInput,
  CreateRecordsOptions,
  CreateRecordsResult,
  DeletedRecord,
  DeleteRecordsResult,
  GetRecordParams,
  ListRecordsParams,
  ListRecordsResult,
  UpdateRecordInput,
  UpdateRecordsOptions,
  UpdateRecordsResult,
  UpsertRecordInput,
} from '@/types'
import { MAX_RECORDS_PER_BATCH } from './core'

/**
 * Records API of one base: list / get / create / update / replace /
 * delete.
 *
 * Every `Base` owns one instance, exposed as `base.records`.
 *
 * @typeParam TDefaultFields - Field shape used when a call does not name
 *   its own.
 */
export class AirtableRecordsClient<TDefaultFields = AirtableFieldSet> {
  constructor(
    private readonly core: AirtableCoreClient,
    readonly baseId: string,
  ) {}

  /**
   * List one page of records.
   *
   * Use {@link listAllRecords} or {@link iterateRecords} to follow the
   * `offset` cursor automatically.
   *
   * @example
   * ```ts
   * const page = await base.records.listRecords('Tasks', {
   *   view: 'Grid view',
   *   pageSize: 50,
   * })
   * ```
   */
  async listRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    params?: ListRecordsParams,
  ): Promise<ListRecordsResult<TFields>> {
    const url = this.core.buildTableUrl(
      this.baseId,
      tableIdOrName,
      undefined,
      this.core.buildListQuery(params),
    )

    return this.core.requestJson<ListRecordsResult<TFields>>(
      url,
      { method: 'GET' },
      { baseId: this.baseId },
    )
  }

  /**
   * List every record, following `offset` until Airtable stops returning
   * one, or until `maxRecords` records have been collected.
   */
  async listAllRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    params?: Omit<ListRecordsParams, 'offset'>,
  ): Promise<AirtableRecord<TFields>[]> {
    const all: AirtableRecord<TFields>[] = []
    for await (const record of this.iterateRecords<TFields>(tableIdOrName, params)) {
      all.push(record)
    }
    return all
  }

  /**
   * Async generator over every record of a table, fetching one page at a
   * time.
   *
   * @example
   * ```ts
   * for await (const record of base.records.iterateRecords('Tasks')) {
   *   console.log(record.id)
   * }
   * ```
   */
  async* iterateRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    params?: Omit<ListRecordsParams, 'offset'>,
  ): AsyncGenerator<AirtableRecord<TFields>, void, void> {
    const maxRecords = params?.maxRecords
    let offset: string | undefined
    let yielded = 0

    do {
      const page = await this.listRecords<TFields>(tableIdOrName, {
        ...params,
        offset,
      })

      for (const record of page.records) {
        yield record
        yielded += 1
        if (maxRecords != null && yielded >= maxRecords) {
          return
        }
      }

      offset = page.offset
    } while (offset)
  }

  /**
   * Retrieve a single record by ID.
   *
   * @throws `AirtableError` - 404 when the record does not exist.
   */
  async getRecord<TFields = TDefaultFields>(
    tableIdOrName: string,
    recordId: string,
    params?: GetRecordParams,
  ): Promise<AirtableRecord<TFields>> {
    const url = this.core.buildTableUrl(
      this.baseId,
      tableIdOrName,
      recordId,
      this.core.buildGetQuery(params),
    )

    return this.core.requestJson<AirtableRecord<TFields>>(
      url,
      { method: 'GET' },
      { baseId: this.baseId },
    )
  }

  /**
   * Create one record.
   */
  async createRecord<TFields = TDefaultFields>(
    tableIdOrName: string,
    fields: Partial<TFields>,
    options?: CreateRecordsOptions,
  ): Promise<AirtableRecord<TFields>> {
    const url = this.core.buildTableUrl(
      this.baseId,
      tableIdOrName,
      undefined,
      this.core.buildReturnFieldsQuery(options?.returnFieldsByFieldId),
    )

    return this.core.requestJson<AirtableRecord<TFields>>(
      url,
      { method: 'POST', body: JSON.stringify(withTypecast({ fields }, options?.typecast)) },
      { baseId: this.baseId },
    )
  }

  /**
   * Create records in batches of {@link MAX_RECORDS_PER_BATCH}.
   *
   * Batches are sent one after another; the created records come back in
   * input order. An empty input sends nothing.
   */
  async createRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    records: CreateRecordInput<TFields>[],
    options?: CreateRecordsOptions,
  ): Promise<CreateRecordsResult<TFields>> {
    const created: AirtableRecord<TFields>[] = []
    const query = this.core.buildReturnFieldsQuery(options?.returnFieldsByFieldId)

    for (const batch of chunk(records)) {
      const url = this.core.buildTableUrl(this.baseId, tableIdOrName, undefined, query)
      const body = withTypecast({ records: batch.map(r => ({ fields: r.fields })) }, options?.typecast)

      const resp = await this.core.requestJson<CreateRecordsResult<TFields>>(
        url,
        { method: 'POST', body: JSON.stringify(body) },
        { baseId: this.baseId },
      )
      created.push(...resp.records)
    }

    return { records: created }
  }

  /**
   * Update (PATCH) records in batches of {@link MAX_RECORDS_PER_BATCH}.
   *
   * Only the given fields change. With `performUpsert`, records without an
   * `id` are matched on `fieldsToMergeOn` and created when no match
   * exists; the result then also lists the created and updated IDs.
   */
  async updateRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    records: UpdateRecordInput<TFields>[] | UpsertRecordInput<TFields>[],
    options?: UpdateRecordsOptions,
  ): Promise<UpdateRecordsResult<TFields>> {
    return this.writeRecords('PATCH', tableIdOrName, records, options)
  }

  /**
   * Replace (PUT) records in batches of {@link MAX_RECORDS_PER_BATCH}.
   *
   * Fields missing from the input are cleared on Airtable's side.
   */
  async replaceRecords<TFields = TDefaultFields>(
    tableIdOrName: string,
    records: UpdateRecordInput<TFields>[],
    options?: Omit<UpdateRecordsOptions, 'performUpsert'>,
  ): Promise<UpdateRecordsResult<TFields>> {
    return this.writeRecords('PUT', tableIdOrName, records, options)
  }

  /**
   * Update one record (PATCH `/{table}/{recordId}`).
   */
  async updateRecord<TFields = TDefaultFields>(
    tableIdOrName: string,
    recordId: string,
    fields: Partial<TFields>,
    options?: Omit<UpdateRecordsOptions, 'performUpsert'>,
  ): Promise<AirtableRecord<TFields>> {
    const url = this.core.buildTableUrl(
      this.baseId,
      tableIdOrName,
      recordId,
      this.core.buildReturnFieldsQuery(options?.returnFieldsByFieldId),
    )

    return this.core.requestJson<AirtableRecord<TFields>>(
      url,
      { method: 'PATCH', body: JSON.stringify(withTypecast({ fields }, options?.typecast)) },
      { baseId: this.baseId },
    )
  }

  /**
   * Delete one record.
   */
  async deleteRecord(
    tableIdOrName: string,
    recordId: string,
  ): Promise<DeletedRecord> {
    const url = this.core.buildTableUrl(this.baseId, tableIdOrName, recordId)
    return this.core.requestJson<DeletedRecord>(
      url,
      { method: 'DELETE' },
      { baseId: this.baseId },
    )
  }

  /**
   * Delete records in batches of {@link MAX_RECORDS_PER_BATCH}; IDs are
   * sent as `records[]=recXXXX`.
   */
  async deleteRecords(
    tableIdOrName: string,
    recordIds: string[],
  ): Promise<DeleteRecordsResult> {
    const deleted: DeletedRecord[] = []

    for (const batch of chunk(recordIds)) {
      const params = new URLSearchParams()
      for (const id of batch) {
        params.append('records[]', id)
      }

      const url = this.core.buildTableUrl(this.baseId, tableIdOrName, undefined, params)
      const resp = await this.core.requestJson<DeleteRecordsResult>(
        url,
        { method: 'DELETE' },
        { baseId: this.baseId },
      )
      deleted.push(...resp.records)
    }

    return { records: deleted }
  }

  private async writeRecords<TFields>(
    method: 'PATCH' | 'PUT',
    tableIdOrName: string,
    records: Array<UpdateRecordInput<TFields> | UpsertRecordInput<TFields>>,
    options?: UpdateRecordsOptions,
  ): Promise<UpdateRecordsResult<TFields>> {
    const allRecords: AirtableRecord<TFields>[] = []
    const createdIds: string[] = []
    const updatedIds: string[] = []
    const query = this.core.buildReturnFieldsQuery(options?.returnFieldsByFieldId)

    for (const batch of chunk(records)) {
      const url = this.core.buildTableUrl(this.baseId, tableIdOrName, undefined, query)

      const body: Record<string, unknown> = withTypecast(
        { records: batch.map(r => (r.id ? { id: r.id, fields: r.fields } : { fields: r.fields })) },
        options?.typecast,
      )
      if (options?.performUpsert) {
        body.performUpsert = options.performUpsert
      }

      const resp = await this.core.requestJson<UpdateRecordsResult<TFields>>(
        url,
        { method, body: JSON.stringify(body) },
        { baseId: this.baseId },
      )

      allRecords.push(...resp.records)
      if (resp.createdRecords)
        createdIds.push(...resp.createdRecords)
      if (resp.updatedRecords)
        updatedIds.push(...resp.updatedRecords)
    }

    const result: UpdateRecordsResult<TFields> = { records: allRecords }
    if (options?.performUpsert) {
      result.createdRecords = createdIds
      result.updatedRecords = updatedIds
    }
    return result
  }
}

/**
 * Split `items` into consecutive slices of at most
 * {@link MAX_RECORDS_PER_BATCH}.
 */
export function chunk<T>(items: readonly T[], size = MAX_RECORDS_PER_BATCH): T[][] {
  const batches: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size))
  }
  return batches
}

function withTypecast<T extends object>(
  body: T,
  typecast?: boolean,
): T & { typecast?: boolean } {
  return typecast === undefined ? body : { ...body, typecast }
}
