export { Store, withStore } from './store/index.js'
export type { StoreOptions } from './store/index.js'
export { TableBinding, declareTable } from './table/index.js'
export type { TableState, PageOptions, Count, ResolvedDeclaration } from './table/index.js'
export { encode, decode, columnType, defaultValue } from './codec/index.js'
export { SqliteStorage } from './storage/index.js'
export type { StorageEngine, RunResult, SqliteStorageOptions } from './storage/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG, STORAGE_PATH_ENV } from './config/index.js'
export { createLogger, silentLogger } from './logging/index.js'
export type { Logger, LogStream, LoggerOptions } from './logging/index.js'
export {
  RowfileError,
  ValidationError,
  NotFoundError,
  ConstraintError,
  SerializationError,
  DeserializationError,
  StorageError,
} from './errors/index.js'
export type { RowfileErrorCode, FieldIssue } from './errors/index.js'
export { SemanticType, TableDeclarationSchema, RowfileConfigSchema } from './types/index.js'
export type {
  FieldMap,
  TableDeclaration,
  JsonValue,
  StructuredValue,
  SemanticValue,
  Row,
  FieldInput,
  RowfileConfig,
  LogLevel,
  JournalMode,
} from './types/index.js'
