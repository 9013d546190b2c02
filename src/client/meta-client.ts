import type { AirtableCoreClient } from './core'
import type {
  AirtableBaseSchema,
  AirtableBaseSummary,
  AirtableEnterpriseAccountData,
  AirtableTableSchema,
  ListBasesParams,
  ListBasesResult,
} from '@/types'

/**
 * Metadata API client: bases, base schema, enterprise accounts.
 *
 * One instance per `Airtable` client, exposed as `airtable.metadata`.
 */
export class AirtableMetadataClient {
  constructor(private readonly core: AirtableCoreClient) {}

  /**
   * List one page of the bases visible to the current token.
   *
   * @example
   * ```ts
   * const page = await airtable.metadata.listBases()
   * for (const base of page.bases) {
   *   console.log(base.id, base.name, base.permissionLevel)
   * }
   * ```
   */
  async listBases(params?: ListBasesParams): Promise<ListBasesResult> {
    const search = new URLSearchParams()
    if (params?.offset) {
      search.set('offset', params.offset)
    }

    const url = this.core.buildMetaUrl('/bases', search)
    return this.core.requestJson<ListBasesResult>(url, { method: 'GET' })
  }

  /**
   * Walk every page of {@link listBases} until Airtable stops returning an
   * `offset`.
   */
  async listAllBases(): Promise<AirtableBaseSummary[]> {
    const all: AirtableBaseSummary[] = []
    let offset: string | undefined

    do {
      const page = await this.listBases(offset ? { offset } : undefined)
      all.push(...page.bases)
      offset = page.offset
    } while (offset)

    return all
  }

  /**
   * Tables, fields and views of a base ("Get base schema").
   */
  async getBaseSchema(baseId: string): Promise<AirtableBaseSchema> {
    const url = this.core.buildMetaUrl(`/bases/${encodeURIComponent(baseId)}/tables`)
    return this.core.requestJson<AirtableBaseSchema>(url, { method: 'GET' })
  }

  /**
   * Schema of one table, matched by ID or name.
   *
   * Costs one full {@link getBaseSchema} request.
   *
   * @returns The matching table, or `undefined` when the base has none.
   */
  async getTableSchema(
    baseId: string,
    tableIdOrName: string,
  ): Promise<AirtableTableSchema | undefined> {
    const schema = await this.getBaseSchema(baseId)
    return schema.tables.find(
      table => table.id === tableIdOrName || table.name === tableIdOrName,
    )
  }

  async getEnterpriseAccount(accountId: string): Promise<AirtableEnterpriseAccountData> {
    const url = this.core.buildMetaUrl(`/enterpriseAccounts/${encodeURIComponent(accountId)}`)
    return this.core.requestJson<AirtableEnterpriseAccountData>(url, { method: 'GET' })
  }
}
