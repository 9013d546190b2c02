import type { Airtable } from './airtable'
import type { AirtableFieldSet, LookupKey, PermissionLevel } from '@/types'
import { AirtableRecordsClient } from '@/client/records-client'
import { createLogger } from '@/logger'
import { Table } from './table'

const log = createLogger('base')

export interface BaseInit {
  id: string
  name?: string
  permissionLevel?: PermissionLevel
}

/**
 * One Airtable base.
 *
 * Bases returned by `Airtable.getBases()` carry their name and permission
 * level; handles made with `Airtable.base(id)` only know their ID.
 */
export class Base {
  readonly id: string
  readonly name?: string
  readonly permissionLevel?: PermissionLevel

  /**
   * Records API bound to this base.
   */
  readonly records: AirtableRecordsClient

  /**
   * Tables of the last {@link getTables} call.
   */
  tables?: Table[]

  private tablesById = new Map<string, Table>()
  private tablesByName = new Map<string, Table>()

  constructor(readonly client: Airtable, init: BaseInit) {
    this.id = init.id
    this.name = init.name
    this.permissionLevel = init.permissionLevel
    this.records = new AirtableRecordsClient(client.core, init.id)
  }

  /**
   * Fetch the base schema and build one {@link Table} per table. Always
   * re-fetches.
   */
  async getTables(): Promise<Table[]> {
    const schema = await this.client.metadata.getBaseSchema(this.id)
    const tables = schema.tables.map(table => new Table(this, table.name, table))

    this.tables = tables
    this.tablesById = new Map(tables.map((table): [string, Table] => [table.id ?? table.name, table]))
    this.tablesByName = new Map(tables.map((table): [string, Table] => [table.name, table]))

    log('Fetched %d tables from base: %s', tables.length, this.name ?? this.id)
    return tables
  }

  /**
   * Look up a table by ID (`key: 'id'`), by name (`key: 'name'`) or by
   * either.
   *
   * With `key: 'name'` and no tables loaded yet, returns a handle without a
   * request. Otherwise the tables are loaded once.
   *
   * @returns `undefined` when no table matches.
   */
  async getTable(value: string, key?: LookupKey): Promise<Table | undefined> {
    if (key === 'name' && !this.tables)
      return this.table(value)

    if (!this.tables)
      await this.getTables()

    if (key === 'id')
      return this.tablesById.get(value)
    if (key === 'name')
      return this.tablesByName.get(value)
    return this.tablesById.get(value) ?? this.tablesByName.get(value)
  }

  /**
   * Handle of a table by name or ID, without a request.
   */
  table<TFields = AirtableFieldSet>(tableIdOrName: string): Table<TFields> {
    return new Table<TFields>(this, tableIdOrName)
  }
}
