import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { StorageError, ValidationError } from '../errors/index.js'
import { createLogger, silentLogger, type Logger } from '../logging/index.js'
import { SqliteStorage, type SqliteStorageOptions, type StorageEngine } from '../storage/index.js'
import {
  TableBinding,
  declareTable,
  sameFields,
  type TableLifecycle,
} from '../table/index.js'
import type { FieldMap, RowfileConfig, TableDeclaration } from '../types/index.js'

export interface StoreOptions extends Omit<SqliteStorageOptions, 'trace'> {
  logger?: Logger
  /** Log every executed statement at debug level. */
  traceSql?: boolean
}

interface RegisteredTable {
  fields: FieldMap
  lifecycle: TableLifecycle
}

/**
 * An open SQLite database and the tables declared against it.
 *
 * The store holds one connection from open() until close(). Each table is
 * registered once per store; every binding handed out for the same table
 * shares its creation state, so drop() through one binding is seen by all.
 */
export class Store {
  private readonly tables = new Map<string, RegisteredTable>()
  private readonly logger: Logger

  constructor(
    private readonly storage: StorageEngine,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Open (or create) the database file at `path`. Pass ':memory:' for a
   * private in-memory database.
   */
  static open(path: string, options: StoreOptions = {}): Store {
    const logger = options.logger ?? silentLogger
    const storage = new SqliteStorage(path, {
      journalMode: options.journalMode,
      busyTimeoutMs: options.busyTimeoutMs,
      readonly: options.readonly,
      trace: options.traceSql ? (sql) => logger.debug(`SQL ${sql}`) : undefined,
    })
    logger.debug(`Opened store at ${path}`)
    return new Store(storage, { logger })
  }

  /**
   * Open the store described by a loaded configuration, creating the
   * parent directory of the database file if needed.
   */
  static fromConfig(config: RowfileConfig, logger?: Logger): Store {
    const path = config.storage.path
    if (path !== ':memory:') {
      try {
        mkdirSync(dirname(path), { recursive: true })
      } catch (err) {
        throw new StorageError(`Failed to create data directory for ${path}`, err)
      }
    }
    return Store.open(path, {
      journalMode: config.storage.journalMode,
      busyTimeoutMs: config.storage.busyTimeoutMs,
      traceSql: config.logging.traceSql,
      logger: logger ?? createLogger({ level: config.logging.level }),
    })
  }

  get isOpen(): boolean {
    return this.storage.isOpen
  }

  /**
   * Bind a table declaration to this store.
   *
   * The table itself is created lazily by the binding's first operation.
   *
   * @throws ValidationError if the declaration is invalid, or if the same
   *   table was already declared here with different fields
   */
  table<F extends FieldMap>(declaration: TableDeclaration<F>): TableBinding<F> {
    const resolved = declareTable(declaration)
    const key = resolved.table.toLowerCase()
    let registered = this.tables.get(key)
    if (registered && !sameFields(registered.fields, resolved.fields)) {
      throw new ValidationError(`Table "${resolved.table}" is already declared with different fields`, [
        { path: '/fields', message: 'does not match the existing declaration' },
      ])
    }
    if (!registered) {
      registered = { fields: resolved.fields, lifecycle: { state: 'uninitialized' } }
      this.tables.set(key, registered)
    }
    return new TableBinding(this.storage, resolved, {
      logger: this.logger,
      lifecycle: registered.lifecycle,
    })
  }

  /** Close the connection. Safe to call more than once. */
  close(): void {
    if (!this.storage.isOpen) return
    this.storage.close()
    this.logger.debug('Closed store')
  }
}

/**
 * Open a store, hand it to `fn`, and close it on every exit path.
 * `fn` must finish its work synchronously.
 */
export function withStore<T>(path: string, fn: (store: Store) => T, options: StoreOptions = {}): T {
  const store = Store.open(path, options)
  try {
    return fn(store)
  } finally {
    store.close()
  }
}
