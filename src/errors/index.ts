export {
  RowfileError,
  ValidationError,
  NotFoundError,
  ConstraintError,
  SerializationError,
  DeserializationError,
  StorageError,
} from './errors.js'
export type { RowfileErrorCode, FieldIssue } from './errors.js'
