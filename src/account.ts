import type { Airtable } from './airtable'
import type { AirtableEnterpriseAccountData } from '@/types'

/**
 * An enterprise account, as returned by `Airtable.getEnterpriseAccount()`.
 */
export class Account {
  readonly id: string
  readonly createdTime?: string
  readonly workspaceIds: string[]
  readonly userIds: string[]
  readonly emailDomains: string[]

  constructor(
    readonly client: Airtable,
    readonly data: AirtableEnterpriseAccountData,
  ) {
    this.id = data.id
    this.createdTime = data.createdTime
    this.workspaceIds = data.workspaceIds ?? []
    this.userIds = data.userIds ?? []
    this.emailDomains = (data.emailDomains ?? []).map(domain => domain.emailDomain)
  }
}
