/**
 * One thumbnail rendition of an image attachment.
 */
export interface AirtableThumbnail {
  url: string
  width: number
  height: number
}

/**
 * Cell value of an attachment field.
 *
 * Image attachments carry pre-generated `thumbnails`; other files (PDFs,
 * archives) omit them.
 */
export interface AirtableAttachment {
  id: string
  url: string
  filename: string
  /**
   * File size in bytes.
   */
  size: number
  /**
   * MIME type, e.g. `"image/png"`.
   */
  type: string
  thumbnails?: {
    small: AirtableThumbnail
    large: AirtableThumbnail
    full: AirtableThumbnail
  }
}

/**
 * Cell value of a collaborator (user) field.
 */
export interface AirtableCollaborator {
  id: string
  email: string
  name: string
}

/**
 * Any value a single Airtable cell can hold once decoded from JSON.
 */
export type AirtableCellValue =
  | undefined
  | null
  | string
  | number
  | boolean
  | AirtableCollaborator
  | readonly AirtableCollaborator[]
  | readonly string[]
  | readonly AirtableAttachment[]
  | readonly { url: string }[]

/**
 * Loosely typed field set: field name → cell value.
 *
 * Airtable omits empty cells from responses, so every key may be missing.
 * Extend it to describe a concrete table:
 *
 * @example
 * ```ts
 * interface Task extends AirtableFieldSet {
 *   Name: string
 *   Status?: 'Todo' | 'Doing' | 'Done'
 *   Files?: readonly AirtableAttachment[]
 * }
 * ```
 */
export interface AirtableFieldSet {
  [fieldName: string]: AirtableCellValue
}
