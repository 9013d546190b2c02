import type { AirtableAttachment, AirtableCellValue } from '@/types'

export function looksLikeAttachment(value: unknown): value is AirtableAttachment {
  return typeof value === 'object'
    && value !== null
    && 'id' in value
    && typeof value.id === 'string'
    && 'url' in value
    && typeof value.url === 'string'
}

export function hasUrl(value: unknown): value is { url: string } {
  return typeof value === 'object'
    && value !== null
    && 'url' in value
    && typeof value.url === 'string'
}

/**
 * Reduce an attachment list to `{ url }` items, the form Airtable accepts
 * when attachments are copied into another record. Items without a `url`
 * are dropped. Any other value is returned unchanged.
 *
 * @example
 * ```ts
 * simplifyAttachments(record.fields.Files)
 * // => [{ url: 'https://dl.airtable.com/.../photo.png' }]
 * ```
 */
export function simplifyAttachments(value: AirtableCellValue): AirtableCellValue {
  if (!isList(value) || value.length === 0)
    return value

  const first: unknown = value[0]
  if (typeof first !== 'object' || first === null)
    return value

  const items: readonly unknown[] = value
  return items.filter(hasUrl).map(item => ({ url: item.url }))
}

function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value)
}
