import type { AirtableValidationIssue, PermissionLevel } from '@/types'
import { z } from 'zod'
import { AirtableValidationError } from '@/errors'

/**
 * Field types known to the Airtable schema.
 */
export const FIELD_TYPES = [
  'singleLineText',
  'email',
  'url',
  'multilineText',
  'number',
  'percent',
  'currency',
  'singleSelect',
  'multipleSelects',
  'singleCollaborator',
  'multipleCollaborators',
  'multipleRecordLinks',
  'dateTime',
  'phoneNumber',
  'multipleAttachments',
  'checkbox',
  'formula',
  'rollup',
  'count',
  'multipleLookupValues',
  'autoNumber',
  'barcode',
] as const

export type FieldType = typeof FIELD_TYPES[number]

export const VIEW_TYPES = ['grid', 'form', 'calendar', 'gallery', 'kanban'] as const

export type ViewType = typeof VIEW_TYPES[number]

export const PERMISSION_LEVELS: readonly PermissionLevel[] = ['none', 'read', 'comment', 'edit', 'create']

const STRING_FIELD_TYPES: readonly FieldType[] = [
  'singleLineText',
  'email',
  'url',
  'multilineText',
  'singleSelect',
  'phoneNumber',
]

const LIST_FIELD_TYPES: readonly FieldType[] = [
  'multipleSelects',
  'multipleCollaborators',
  'multipleRecordLinks',
  'multipleAttachments',
]

const NUMBER_FIELD_TYPES: readonly FieldType[] = ['number', 'percent', 'currency']

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some(type => type === value)
}

/**
 * Whether `value` can be written to a field of type `fieldType`.
 *
 * Computed and read-only field types never accept a value.
 *
 * @throws Error - When `fieldType` is not one of {@link FIELD_TYPES}.
 */
export function isValueAcceptable(value: unknown, fieldType: string): boolean {
  if (!isFieldType(fieldType)) {
    throw new Error(`${fieldType} is not an acceptable field type`)
  }

  if (typeof value === 'string')
    return STRING_FIELD_TYPES.includes(fieldType)
  if (Array.isArray(value))
    return LIST_FIELD_TYPES.includes(fieldType)
  if (typeof value === 'number')
    return Number.isFinite(value) && NUMBER_FIELD_TYPES.includes(fieldType)
  if (typeof value === 'boolean')
    return fieldType === 'checkbox'
  return false
}

export interface ValidateRecordsOptions {
  /**
   * Every record must carry a non-empty string `id`.
   */
  requireId?: boolean

  /**
   * Every record must carry a `fields` object.
   */
  requireFields?: boolean
}

const fieldsSchema = z.record(z.unknown(), {
  required_error: 'fields is required',
  invalid_type_error: 'fields must be an object',
})

function recordSchema(options: ValidateRecordsOptions) {
  return z.object(
    {
      id: options.requireId
        ? z.string({ required_error: 'id is required' }).min(1, 'id must not be empty')
        : z.string().optional(),
      createdTime: z.string().optional(),
      fields: options.requireFields ? fieldsSchema : fieldsSchema.optional(),
    },
    {
      required_error: 'record is required',
      invalid_type_error: 'record must be an object',
    },
  )
}

/**
 * Check record input before it is sent.
 *
 * `input` is one record or an array of records. Issue paths start with the
 * record's index when an array is given.
 *
 * @throws AirtableValidationError - Listing every offending record.
 *
 * @example
 * ```ts
 * validateRecords([{ id: 'recA1b2C3d4E5f6G7', fields: {} }], { requireId: true })
 * ```
 */
export function validateRecords(
  input: unknown,
  options: ValidateRecordsOptions = {},
): void {
  const schema = recordSchema(options)
  const parsed = Array.isArray(input)
    ? z.array(schema).safeParse(input)
    : schema.safeParse(input)

  if (parsed.success)
    return

  const issues: AirtableValidationIssue[] = parsed.error.issues.map(issue => ({
    path: issue.path,
    message: issue.message,
  }))
  throw new AirtableValidationError(issues)
}
