import type {
  AirtableClientOptions,
  AirtableFieldSet,
  AirtableGlobalConfig,
  LookupKey,
} from '@/types'
import type { Table } from './table'
import { AirtableCoreClient } from '@/client/core'
import { AirtableMetadataClient } from '@/client/meta-client'
import { configure, resolveClientOptions } from '@/config'
import { createLogger } from '@/logger'
import { Account } from './account'
import { Base } from './base'

const log = createLogger('client')

/**
 * Entry point: one session against the Airtable API.
 *
 * Owns the HTTP transport shared by every base and table reached through
 * it.
 *
 * @example
 * ```ts
 * import Airtable from 'airkit'
 *
 * const airtable = new Airtable({ apiKey: 'pat-your-token' })
 *
 * const base = await airtable.getBase('Projects', 'name')
 * const tasks = await base?.getTable('Tasks')
 * const records = await tasks?.getRecords({ view: 'Grid view' })
 * ```
 */
export class Airtable {
  /**
   * Set process-wide defaults for clients constructed afterwards.
   */
  static configure(config: AirtableGlobalConfig): void {
    configure(config)
  }

  /**
   * Shared HTTP transport.
   */
  readonly core: AirtableCoreClient

  /**
   * Metadata API (bases, schema, enterprise accounts).
   */
  readonly metadata: AirtableMetadataClient

  /**
   * Bases of the last {@link getBases} call.
   */
  bases?: Base[]

  private basesById = new Map<string, Base>()
  private basesByName = new Map<string, Base>()

  /**
   * @throws AirtableConfigError - When no API key is found or an option is
   *   invalid.
   */
  constructor(options?: AirtableClientOptions) {
    this.core = new AirtableCoreClient(resolveClientOptions(options))
    this.metadata = new AirtableMetadataClient(this.core)
  }

  get apiKey(): string {
    return this.core.apiKey
  }

  get authHeaders(): { Authorization: string } {
    return this.core.authHeaders
  }

  /**
   * Fetch every base visible to the token. Always re-fetches.
   */
  async getBases(): Promise<Base[]> {
    const summaries = await this.metadata.listAllBases()
    const bases = summaries.map(summary => new Base(this, summary))

    this.bases = bases
    this.basesById = new Map(bases.map((base): [string, Base] => [base.id, base]))
    this.basesByName = new Map(
      bases.flatMap((base): [string, Base][] => (base.name ? [[base.name, base]] : [])),
    )

    log('Fetched %d bases', bases.length)
    return bases
  }

  /**
   * Look up a base by ID (`key: 'id'`), by name (`key: 'name'`) or by
   * either.
   *
   * With `key: 'id'` and no bases loaded yet, returns a handle without a
   * request. Otherwise the bases are loaded once.
   *
   * @returns `undefined` when no base matches.
   */
  async getBase(value: string, key?: LookupKey): Promise<Base | undefined> {
    if (key === 'id' && !this.bases)
      return this.base(value)

    if (!this.bases)
      await this.getBases()

    if (key === 'id')
      return this.basesById.get(value)
    if (key === 'name')
      return this.basesByName.get(value)
    return this.basesById.get(value) ?? this.basesByName.get(value)
  }

  /**
   * Handle of a base by ID, without a request.
   */
  base(baseId: string): Base {
    return new Base(this, { id: baseId })
  }

  /**
   * Handle of a table, without a request.
   */
  getTable<TFields = AirtableFieldSet>(baseId: string, tableIdOrName: string): Table<TFields> {
    return this.base(baseId).table<TFields>(tableIdOrName)
  }

  async getEnterpriseAccount(accountId: string): Promise<Account> {
    const data = await this.metadata.getEnterpriseAccount(accountId)
    return new Account(this, data)
  }
}

export default Airtable
