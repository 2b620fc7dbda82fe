import { Type, type Static } from '@sinclair/typebox'

/** SQL identifier usable unquoted: table and field names */
export const IdentifierString = Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$', maxLength: 64 })
export type IdentifierString = Static<typeof IdentifierString>

/** Columns every table carries; they may not be declared as fields */
export const RESERVED_COLUMNS = ['id', 'name'] as const
