import { Type, type Static } from '@sinclair/typebox'
import { IdentifierString } from './common.js'

/** Logical type of a declared field */
export const SemanticType = Type.Union([
  Type.Literal('integer'),
  Type.Literal('text'),
  Type.Literal('real'),
  Type.Literal('boolean'),
  Type.Literal('structured'),
])
export type SemanticType = Static<typeof SemanticType>

/** Table declaration schema: model name, optional table name, ordered field map */
export const TableDeclarationSchema = Type.Object({
  model: IdentifierString,
  table: Type.Optional(IdentifierString),
  fields: Type.Record(Type.String(), SemanticType),
})

export type FieldMap = Record<string, SemanticType>

export interface TableDeclaration<F extends FieldMap = FieldMap> {
  model: string
  table?: string
  fields: F
}

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/** Mapping or sequence stored as JSON text */
export type StructuredValue = JsonValue[] | { [key: string]: JsonValue }

/** Native TypeScript value for each semantic type */
export interface SemanticValueMap {
  integer: number
  text: string
  real: number
  boolean: boolean
  structured: StructuredValue | null
}

export type SemanticValue<T extends SemanticType> = SemanticValueMap[T]

/** Value as handed to or read from better-sqlite3 */
export type StorableValue = number | bigint | string | Buffer | null

/** A decoded row: implicit id and name, then every declared field */
export type Row<F extends FieldMap> = { id: number; name: string } & {
  [K in keyof F]: SemanticValue<F[K]>
}

/** Fields accepted by writes; every declared field is optional */
export type FieldInput<F extends FieldMap> = {
  [K in keyof F]?: SemanticValue<F[K]>
}
