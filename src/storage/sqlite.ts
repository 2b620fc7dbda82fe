import Database from 'better-sqlite3'
import { RowfileError, ConstraintError, StorageError } from '../errors/index.js'
import type { JournalMode } from '../types/index.js'
import type { StorageEngine, RunResult } from './interface.js'

export interface SqliteStorageOptions {
  /** Journal mode for file-backed databases. Defaults to 'wal'. */
  journalMode?: JournalMode
  /** How long a statement waits on another connection's lock, in ms. Defaults to 5000. */
  busyTimeoutMs?: number
  readonly?: boolean
  /** Called with the text of every statement executed. */
  trace?: (sql: string) => void
}

function sqliteCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * Map a driver failure onto the library's error types.
 * Errors the library raised itself pass through untouched.
 */
export function translateError(err: unknown): RowfileError {
  if (err instanceof RowfileError) return err
  const message = err instanceof Error ? err.message : String(err)
  if (sqliteCode(err)?.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintError(message, err)
  }
  return new StorageError(message, err)
}

/**
 * SQLite implementation of the StorageEngine interface.
 *
 * Uses better-sqlite3 for synchronous database operations. One handle is
 * held from construction until close(). Supports both file-backed and
 * in-memory databases (pass ':memory:' for tests).
 */
export class SqliteStorage implements StorageEngine {
  private db: Database.Database

  /**
   * @param path - Path to the SQLite database file, or ':memory:' for in-memory
   */
  constructor(path: string, options: SqliteStorageOptions = {}) {
    const trace = options.trace
    try {
      this.db = new Database(path, {
        readonly: options.readonly ?? false,
        timeout: options.busyTimeoutMs ?? 5000,
        verbose: trace ? (message?: unknown) => trace(String(message)) : undefined,
      })
    } catch (err) {
      throw new StorageError(`Failed to open database at ${path}: ${translateError(err).message}`, err)
    }
    if (!options.readonly) {
      this.guard(() => this.db.pragma(`journal_mode = ${options.journalMode === 'delete' ? 'DELETE' : 'WAL'}`))
    }
  }

  get isOpen(): boolean {
    return this.db.open
  }

  close(): void {
    this.db.close()
  }

  exec(sql: string): void {
    this.guard(() => this.db.exec(sql))
  }

  run(sql: string, params: unknown[] = []): RunResult {
    return this.guard(() => {
      const result = this.db.prepare(sql).run(...params)
      return {
        changes: result.changes,
        lastInsertRowid: result.lastInsertRowid,
      }
    })
  }

  get<T>(sql: string, params: unknown[] = []): T | undefined {
    return this.guard(() => this.db.prepare(sql).get(...params) as T | undefined)
  }

  all<T>(sql: string, params: unknown[] = []): T[] {
    return this.guard(() => this.db.prepare(sql).all(...params) as T[])
  }

  transaction<T>(fn: () => T): T {
    return this.guard(() => this.db.transaction(fn).immediate())
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      throw translateError(err)
    }
  }
}
