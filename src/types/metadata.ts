/**
 * Permission level of the current token on a base.
 */
export type PermissionLevel = 'none' | 'read' | 'comment' | 'edit' | 'create'

/**
 * One entry of the **"List bases"** metadata endpoint.
 */
export interface AirtableBaseSummary {
  /**
   * Base ID, e.g. `"appXXXXXXXXXXXXXX"`.
   */
  id: string
  name: string
  permissionLevel: PermissionLevel
}

export interface ListBasesParams {
  offset?: string
}

export interface ListBasesResult {
  bases: AirtableBaseSummary[]
  offset?: string
}

/**
 * Field model from **"Get base schema"**.
 *
 * `options` is left loose; its shape depends on `type` and Airtable keeps
 * adding field types.
 */
export interface AirtableFieldSchema {
  /**
   * Field ID, e.g. `"fldXXXXXXXXXXXXXX"`.
   */
  id: string
  name: string

  /**
   * Field type, e.g. `"singleLineText"`, `"multipleRecordLinks"`.
   */
  type: string
  description?: string
  options?: Record<string, unknown>
}

/**
 * View model from **"Get base schema"**.
 */
export interface AirtableViewSchema {
  /**
   * View ID, e.g. `"viwXXXXXXXXXXXXXX"`.
   */
  id: string
  name: string

  /**
   * `"grid"`, `"form"`, `"calendar"`, `"gallery"`, `"kanban"`, ...
   */
  type: string
}

/**
 * Table model from **"Get base schema"**.
 */
export interface AirtableTableSchema {
  /**
   * Table ID, e.g. `"tblXXXXXXXXXXXXXX"`.
   */
  id: string
  name: string
  primaryFieldId: string
  description?: string
  fields: AirtableFieldSchema[]
  views: AirtableViewSchema[]
}

export interface AirtableBaseSchema {
  tables: AirtableTableSchema[]
}

/**
 * Response of **"Get enterprise"** (`/meta/enterpriseAccounts/{id}`).
 *
 * Only the members this library maps are typed; the rest of the payload is
 * kept under `unknown` values.
 */
export interface AirtableEnterpriseAccountData {
  id: string
  createdTime?: string
  workspaceIds?: string[]
  userIds?: string[]
  emailDomains?: Array<{ emailDomain: string, isSsoRequired?: boolean }>
  [key: string]: unknown
}
