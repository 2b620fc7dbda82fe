/**
 * Result from a SQL write operation.
 */
export interface RunResult {
  changes: number
  lastInsertRowid: number | bigint
}

/**
 * Thin storage engine abstraction.
 *
 * Provides raw SQL access via exec/run/get/all with transaction support.
 * Implementations own the connection and translate driver failures into
 * ConstraintError or StorageError.
 */
export interface StorageEngine {
  /** Whether the connection is still open. */
  readonly isOpen: boolean

  /** Close the database connection. */
  close(): void

  /** Execute one or more statements without parameters (DDL). */
  exec(sql: string): void

  /** Execute a write SQL statement. Returns changes count and last insert rowid. */
  run(sql: string, params?: unknown[]): RunResult

  /** Execute a read SQL statement. Returns a single row or undefined. */
  get<T>(sql: string, params?: unknown[]): T | undefined

  /** Execute a read SQL statement. Returns all matching rows. */
  all<T>(sql: string, params?: unknown[]): T[]

  /** Execute a function inside an immediate transaction. Rolls back on error. */
  transaction<T>(fn: () => T): T
}
