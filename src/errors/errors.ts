/** Typed error codes for downstream error handling */
export type RowfileErrorCode =
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'CONSTRAINT_VIOLATION'
  | 'SERIALIZATION_FAILED'
  | 'DESERIALIZATION_FAILED'
  | 'STORAGE_FAILED'
  | 'CONFIG_INVALID'

/** A single field-level problem reported by validation. */
export interface FieldIssue {
  path: string
  message: string
}

/** Base class for every error the library throws. */
export class RowfileError extends Error {
  readonly code: RowfileErrorCode

  constructor(code: RowfileErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RowfileError'
    this.code = code
  }
}

/** A write was missing its name, named an undeclared field, or a declaration is invalid. */
export class ValidationError extends RowfileError {
  public readonly fields: FieldIssue[]

  constructor(message: string, fields: FieldIssue[] = []) {
    super('VALIDATION_FAILED', message)
    this.name = 'ValidationError'
    this.fields = fields
  }
}

/** No row with the requested name exists. */
export class NotFoundError extends RowfileError {
  constructor(
    public readonly table: string,
    public readonly rowName: string,
  ) {
    super('NOT_FOUND', `No row named "${rowName}" in table "${table}"`)
    this.name = 'NotFoundError'
  }
}

/** SQLite rejected a write on a constraint (usually the unique name). */
export class ConstraintError extends RowfileError {
  constructor(message: string, cause?: unknown) {
    super('CONSTRAINT_VIOLATION', message, { cause })
    this.name = 'ConstraintError'
  }
}

export class SerializationError extends RowfileError {
  constructor(
    public readonly field: string,
    message: string,
    cause?: unknown,
  ) {
    super('SERIALIZATION_FAILED', message, { cause })
    this.name = 'SerializationError'
  }
}

export class DeserializationError extends RowfileError {
  constructor(
    public readonly field: string,
    message: string,
    cause?: unknown,
  ) {
    super('DESERIALIZATION_FAILED', message, { cause })
    this.name = 'DeserializationError'
  }
}

/**
 * Underlying SQLite or I/O failure. The driver's error is kept on `cause`.
 */
export class StorageError extends RowfileError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_FAILED', message, { cause })
    this.name = 'StorageError'
  }
}
