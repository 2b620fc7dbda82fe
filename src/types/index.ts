// Common types
export { IdentifierString, RESERVED_COLUMNS } from './common.js'

// Table declarations and values
export { SemanticType, TableDeclarationSchema } from './table.js'
export type {
  FieldMap,
  TableDeclaration,
  JsonPrimitive,
  JsonValue,
  StructuredValue,
  SemanticValueMap,
  SemanticValue,
  StorableValue,
  Row,
  FieldInput,
} from './table.js'

// Configuration
export { RowfileConfigSchema, JournalMode, LogLevel } from './config.js'
export type { RowfileConfig } from './config.js'
