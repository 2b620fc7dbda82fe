/**
 * Named-row CRUD for one declared table.
 *
 * Rows are selected by their unique `name`; `id` is assigned by SQLite and
 * returned but never used as a selector. The table is created on the first
 * operation and again on the first operation after drop(), whichever store
 * on the file issued the drop.
 */

import { encode, decode, defaultValue } from '../codec/index.js'
import { NotFoundError, ValidationError } from '../errors/index.js'
import { silentLogger, type Logger } from '../logging/index.js'
import type { StorageEngine } from '../storage/index.js'
import type { FieldInput, FieldMap, Row, SemanticType, StorableValue } from '../types/index.js'
import type { ResolvedDeclaration } from './declaration.js'
import { buildStatements, type TableStatements } from './sql.js'

export type TableState = 'uninitialized' | 'ready'

/** Creation state of a physical table, shared by every binding on it. */
export interface TableLifecycle {
  state: TableState
}

export interface TableBindingOptions {
  logger?: Logger
  lifecycle?: TableLifecycle
}

export interface PageOptions {
  /** 1-indexed page number. Omit to read every row. */
  page?: number
  /** Rows per page. Defaults to 10. */
  perPage?: number
}

/** Row total and page maths returned by count(). */
export interface Count {
  total: number
  pages: number
  perPage: number
}

const DEFAULT_PER_PAGE = 10

/** Raw row as returned by better-sqlite3. */
type RawRow = Record<string, unknown>

/** Declared fields with their types, in declaration order. */
function fieldEntries(fields: FieldMap): Array<[string, SemanticType]> {
  return Object.entries(fields)
}

function requireName(name: unknown): string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new ValidationError('A non-empty row name is required', [
      { path: '/name', message: 'must be a non-empty string' },
    ])
  }
  return name
}

function requireInteger(value: number, path: string, min: number): number {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ValidationError(`${path.slice(1)} must be an integer of at least ${min}`, [
      { path, message: `must be an integer of at least ${min}` },
    ])
  }
  return value
}

export class TableBinding<F extends FieldMap> {
  readonly model: string
  readonly table: string
  readonly fields: Readonly<F>

  private readonly columns: ReadonlyArray<[string, SemanticType]>
  private readonly statements: TableStatements
  private readonly lifecycle: TableLifecycle
  private readonly logger: Logger

  constructor(
    private readonly storage: StorageEngine,
    declaration: ResolvedDeclaration<F>,
    options: TableBindingOptions = {},
  ) {
    this.model = declaration.model
    this.table = declaration.table
    this.fields = declaration.fields
    this.columns = fieldEntries(declaration.fields)
    this.statements = buildStatements(declaration.table, declaration.fields)
    this.lifecycle = options.lifecycle ?? { state: 'uninitialized' }
    this.logger = options.logger ?? silentLogger
  }

  get state(): TableState {
    return this.lifecycle.state
  }

  /**
   * Insert or partially update the row called `name`.
   *
   * On update only the supplied fields change. On insert, declared fields
   * left out are written with their type's default (0, '', false, null).
   * The existence check and the write share one immediate transaction.
   *
   * @returns The row as stored after the write
   */
  set(name: string, fields: FieldInput<F> = {}): Row<F> {
    const rowName = requireName(name)
    const values = this.encodeFields(fields)
    this.ensureReady()
    return this.storage.transaction(() => {
      const existing = this.storage.get<{ id: number }>(this.statements.selectId, [rowName])
      if (existing) {
        this.updateRow(rowName, values)
      } else {
        this.insertRow(rowName, values)
      }
      return this.fetch(rowName)
    })
  }

  /**
   * Create the row called `name`. Fails with ConstraintError if it exists.
   */
  insert(name: string, fields: FieldInput<F> = {}): Row<F> {
    const rowName = requireName(name)
    const values = this.encodeFields(fields)
    this.ensureReady()
    return this.storage.transaction(() => {
      this.insertRow(rowName, values)
      return this.fetch(rowName)
    })
  }

  /**
   * Change the supplied fields of an existing row. Fails with NotFoundError
   * if no row is called `name`.
   */
  update(name: string, fields: FieldInput<F>): Row<F> {
    const rowName = requireName(name)
    const values = this.encodeFields(fields)
    this.ensureReady()
    return this.storage.transaction(() => {
      if (values.size > 0 && this.updateRow(rowName, values) === 0) {
        throw new NotFoundError(this.table, rowName)
      }
      return this.fetch(rowName)
    })
  }

  /** Read the row called `name`. Fails with NotFoundError on a miss. */
  get(name: string): Row<F> {
    const rowName = requireName(name)
    this.ensureReady()
    return this.fetch(rowName)
  }

  /**
   * Read every row, or one page of rows.
   *
   * Rows come back in SQLite's default scan order; no ORDER BY is issued,
   * so the order is not guaranteed to be stable across SQLite versions.
   */
  all(options: PageOptions = {}): Row<F>[] {
    let raw: RawRow[]
    if (options.page === undefined) {
      this.ensureReady()
      raw = this.storage.all<RawRow>(this.statements.selectAll)
    } else {
      const perPage = requireInteger(options.perPage ?? DEFAULT_PER_PAGE, '/perPage', 1)
      const page = requireInteger(options.page, '/page', 1)
      const offset = (page - 1) * perPage
      if (!Number.isSafeInteger(offset)) {
        throw new ValidationError('page and perPage put the offset beyond the safe integer range', [
          { path: '/page', message: 'offset (page - 1) * perPage must be a safe integer' },
        ])
      }
      this.ensureReady()
      raw = this.storage.all<RawRow>(this.statements.selectPage, [perPage, offset])
    }
    return raw.map((row) => this.decodeRow(row))
  }

  /** Count rows and work out how many pages of `perPage` they fill. */
  count(options: Pick<PageOptions, 'perPage'> = {}): Count {
    const perPage = requireInteger(options.perPage ?? DEFAULT_PER_PAGE, '/perPage', 1)
    this.ensureReady()
    const row = this.storage.get<{ total: number }>(this.statements.count)
    const total = row?.total ?? 0
    return {
      total,
      pages: total > 0 ? Math.ceil(total / perPage) : 0,
      perPage,
    }
  }

  /** Remove the row called `name`. Returns false when there was none. */
  delete(name: string): boolean {
    const rowName = requireName(name)
    this.ensureReady()
    return this.storage.run(this.statements.deleteByName, [rowName]).changes > 0
  }

  /** Remove every row. Returns how many were removed. */
  deleteAll(): number {
    this.ensureReady()
    return this.storage.run(this.statements.deleteAll).changes
  }

  /** Remove the table itself. The next operation creates it again. */
  drop(): void {
    this.storage.exec(this.statements.drop)
    this.lifecycle.state = 'uninitialized'
    this.logger.info(`Dropped table ${this.table}`)
  }

  /**
   * Issue CREATE TABLE IF NOT EXISTS before every operation. Another store
   * on the same file may have dropped the table since this one last saw it.
   */
  private ensureReady(): void {
    this.storage.exec(this.statements.create)
    if (this.lifecycle.state === 'ready') return
    this.lifecycle.state = 'ready'
    this.logger.info(`Table ${this.table} ready for ${this.model}`)
  }

  /**
   * Encode supplied fields in declaration order. Undefined values count
   * as not supplied.
   */
  private encodeFields(input: FieldInput<F>): Map<string, StorableValue> {
    const supplied = new Map<string, unknown>(Object.entries(input))
    const undeclared = [...supplied.keys()].filter((key) => !Object.hasOwn(this.fields, key))
    if (undeclared.length > 0) {
      throw new ValidationError(
        `Unknown field(s) for ${this.model}: ${undeclared.join(', ')}`,
        undeclared.map((key) => ({ path: `/${key}`, message: 'is not a declared field' })),
      )
    }

    const values = new Map<string, StorableValue>()
    for (const [field, type] of this.columns) {
      const value = supplied.get(field)
      if (value !== undefined) {
        values.set(field, encode(value, type, field))
      }
    }
    return values
  }

  private insertRow(name: string, values: Map<string, StorableValue>): void {
    const params: StorableValue[] = [name]
    for (const [field, type] of this.columns) {
      params.push(values.has(field) ? values.get(field) ?? null : encode(defaultValue(type), type, field))
    }
    this.storage.run(this.statements.insert, params)
  }

  /** Returns the number of rows changed (0 or 1). */
  private updateRow(name: string, values: Map<string, StorableValue>): number {
    if (values.size === 0) return 0
    const columns = [...values.keys()]
    return this.storage.run(this.statements.update(columns), [...values.values(), name]).changes
  }

  private fetch(name: string): Row<F> {
    const raw = this.storage.get<RawRow>(this.statements.selectByName, [name])
    if (!raw) throw new NotFoundError(this.table, name)
    return this.decodeRow(raw)
  }

  private decodeRow(raw: RawRow): Row<F> {
    const row: Record<string, unknown> = {
      id: decode(raw.id, 'integer', 'id'),
      name: decode(raw.name, 'text', 'name'),
    }
    for (const [field, type] of this.columns) {
      row[field] = decode(raw[field], type, field)
    }
    return row as Row<F>
  }
}
