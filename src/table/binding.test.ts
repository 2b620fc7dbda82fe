import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  ConstraintError,
  DeserializationError,
  NotFoundError,
  SerializationError,
  ValidationError,
} from '../errors/index.js'
import { createLogger } from '../logging/index.js'
import { SqliteStorage, type StorageEngine, type RunResult } from '../storage/index.js'
import { TableBinding, type TableLifecycle } from './binding.js'
import { declareTable } from './declaration.js'

const components = declareTable({
  model: 'Components',
  fields: {
    project_id: 'integer',
    docs: 'text',
    meta: 'structured',
    info: 'structured',
  },
})

function tableNames(storage: StorageEngine): string[] {
  return storage
    .all<{ name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
    .map((t) => t.name)
}

/**
 * Storage that hides existing rows from the upsert existence check,
 * as if another writer inserted the row after the check ran.
 */
class RacingStorage implements StorageEngine {
  constructor(private readonly inner: StorageEngine) {}

  get isOpen(): boolean {
    return this.inner.isOpen
  }

  close(): void {
    this.inner.close()
  }

  exec(sql: string): void {
    this.inner.exec(sql)
  }

  run(sql: string, params?: unknown[]): RunResult {
    return this.inner.run(sql, params)
  }

  get<T>(sql: string, params?: unknown[]): T | undefined {
    if (sql.startsWith('SELECT id FROM')) return undefined
    return this.inner.get<T>(sql, params)
  }

  all<T>(sql: string, params?: unknown[]): T[] {
    return this.inner.all<T>(sql, params)
  }

  transaction<T>(fn: () => T): T {
    return this.inner.transaction(fn)
  }
}

describe('TableBinding', () => {
  let storage: SqliteStorage
  let table: TableBinding<typeof components.fields>

  beforeEach(() => {
    storage = new SqliteStorage(':memory:')
    table = new TableBinding(storage, components)
  })

  afterEach(() => {
    storage.close()
  })

  describe('lazy creation', () => {
    it('should not touch the database until the first operation', () => {
      expect(table.state).toBe('uninitialized')
      expect(tableNames(storage)).toEqual([])
    })

    it('should create the table on the first operation', () => {
      expect(table.all()).toEqual([])
      expect(table.state).toBe('ready')
      expect(tableNames(storage)).toEqual(['components'])
    })

    it('should create the table even when the first operation is a miss', () => {
      expect(() => table.get('missing')).toThrow(NotFoundError)
      expect(table.state).toBe('ready')
    })

    it('should bind to a table that already exists', () => {
      table.set('button', { docs: 'doc' })
      const second = new TableBinding(storage, components)
      expect(second.get('button').docs).toBe('doc')
    })
  })

  describe('set', () => {
    it('should insert a new row and return it', () => {
      const row = table.set('button', {
        project_id: 1,
        docs: 'doc',
        meta: { author: 'John' },
        info: [1, 2, 3],
      })
      expect(row).toEqual({
        id: 1,
        name: 'button',
        project_id: 1,
        docs: 'doc',
        meta: { author: 'John' },
        info: [1, 2, 3],
      })
    })

    it('should fill unsupplied fields with type defaults on insert', () => {
      expect(table.set('card')).toEqual({
        id: 1,
        name: 'card',
        project_id: 0,
        docs: '',
        meta: null,
        info: null,
      })
    })

    it('should keep a single row when called twice with the same arguments', () => {
      table.set('x', { project_id: 1 })
      table.set('x', { project_id: 1 })
      const rows = table.all()
      expect(rows).toHaveLength(1)
      expect(rows[0].name).toBe('x')
      expect(rows[0].project_id).toBe(1)
    })

    it('should update only the supplied fields of an existing row', () => {
      table.set('x', { project_id: 1, docs: 'first' })
      const row = table.set('x', { project_id: 9 })
      expect(row.project_id).toBe(9)
      expect(row.docs).toBe('first')
    })

    it('should keep the id of an updated row', () => {
      const inserted = table.set('x', { project_id: 1 })
      const updated = table.set('x', { project_id: 2 })
      expect(updated.id).toBe(inserted.id)
    })

    it('should treat undefined values as not supplied', () => {
      table.set('x', { docs: 'kept' })
      const row = table.set('x', { docs: undefined, project_id: 3 })
      expect(row.docs).toBe('kept')
      expect(row.project_id).toBe(3)
    })

    it('should clear a structured field set to null', () => {
      table.set('x', { meta: { author: 'John' } })
      expect(table.set('x', { meta: null }).meta).toBeNull()
    })

    it('should return the existing row when no fields are supplied', () => {
      table.set('x', { docs: 'doc' })
      expect(table.set('x').docs).toBe('doc')
    })

    it('should require a name', () => {
      expect(() => table.set('', { docs: 'doc' })).toThrow(ValidationError)
      expect(() => table.set(undefined as unknown as string)).toThrow('A non-empty row name is required')
    })

    it('should reject undeclared fields without writing', () => {
      const input = { docs: 'doc', colour: 'red' } as unknown as { docs: string }
      try {
        table.set('x', input)
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError)
        expect((err as ValidationError).fields).toEqual([{ path: '/colour', message: 'is not a declared field' }])
      }
      expect(table.state).toBe('uninitialized')
    })

    it('should reject values of the wrong type without writing', () => {
      table.set('x', { project_id: 1 })
      const input = { project_id: 'two' } as unknown as { project_id: number }
      expect(() => table.set('x', input)).toThrow(SerializationError)
      expect(table.get('x').project_id).toBe(1)
    })

    it('should surface ConstraintError when a row appears between the check and the insert', () => {
      table.set('button', { docs: 'doc' })
      const racing = new TableBinding(new RacingStorage(storage), components)

      expect(() => racing.set('button', { docs: 'racing' })).toThrow(ConstraintError)
      expect(table.get('button').docs).toBe('doc')
      expect(table.count().total).toBe(1)
    })
  })

  describe('insert', () => {
    it('should create a row', () => {
      expect(table.insert('button', { docs: 'doc' }).docs).toBe('doc')
    })

    it('should raise ConstraintError for an existing name', () => {
      table.insert('button')
      expect(() => table.insert('button', { docs: 'again' })).toThrow(ConstraintError)
      expect(table.get('button').docs).toBe('')
    })
  })

  describe('update', () => {
    it('should change the supplied fields', () => {
      table.set('button', { project_id: 1, docs: 'doc' })
      const row = table.update('button', { docs: 'new' })
      expect(row.project_id).toBe(1)
      expect(row.docs).toBe('new')
    })

    it('should raise NotFoundError for a missing row', () => {
      expect(() => table.update('missing', { docs: 'new' })).toThrow(NotFoundError)
      expect(() => table.update('missing', {})).toThrow(NotFoundError)
      expect(table.all()).toEqual([])
    })
  })

  describe('get', () => {
    it('should return the decoded row', () => {
      table.set('button', { meta: { author: 'John', tags: ['ui'] } })
      expect(table.get('button').meta).toEqual({ author: 'John', tags: ['ui'] })
    })

    it('should raise NotFoundError with the table and name for a miss', () => {
      table.set('button')
      try {
        table.get('missing')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(NotFoundError)
        const error = err as NotFoundError
        expect(error.code).toBe('NOT_FOUND')
        expect(error.table).toBe('components')
        expect(error.rowName).toBe('missing')
        expect(error.message).toBe('No row named "missing" in table "components"')
      }
    })

    it('should match names exactly', () => {
      table.set('Button')
      expect(() => table.get('button')).toThrow(NotFoundError)
    })

    it('should raise DeserializationError for corrupted structured text', () => {
      table.set('button', { meta: { author: 'John' } })
      storage.run('UPDATE components SET meta = ? WHERE name = ?', ['{not json', 'button'])
      expect(() => table.get('button')).toThrow(DeserializationError)
    })
  })

  describe('all', () => {
    beforeEach(() => {
      for (const name of ['a', 'b', 'c', 'd', 'e']) table.set(name)
    })

    it('should return every row', () => {
      expect(table.all().map((r) => r.name)).toEqual(['a', 'b', 'c', 'd', 'e'])
    })

    it('should return one page of rows', () => {
      expect(table.all({ page: 2, perPage: 2 }).map((r) => r.name)).toEqual(['c', 'd'])
      expect(table.all({ page: 3, perPage: 2 }).map((r) => r.name)).toEqual(['e'])
      expect(table.all({ page: 4, perPage: 2 })).toEqual([])
    })

    it('should default to ten rows per page', () => {
      expect(table.all({ page: 1 })).toHaveLength(5)
    })

    it('should reject invalid paging', () => {
      expect(() => table.all({ page: 0 })).toThrow(ValidationError)
      expect(() => table.all({ page: 1, perPage: 0 })).toThrow(ValidationError)
      expect(() => table.all({ page: 1.5 })).toThrow('page must be an integer of at least 1')
    })

    it('should reject paging whose offset is not a safe integer', () => {
      const page = Number.MAX_SAFE_INTEGER
      expect(() => table.all({ page, perPage: 1000 })).toThrow(ValidationError)
      expect(() => table.all({ page, perPage: 1000 })).toThrow(
        'page and perPage put the offset beyond the safe integer range',
      )
    })
  })

  describe('count', () => {
    it('should report zero pages for an empty table', () => {
      expect(table.count()).toEqual({ total: 0, pages: 0, perPage: 10 })
    })

    it('should round the page count up', () => {
      for (const name of ['a', 'b', 'c', 'd', 'e']) table.set(name)
      expect(table.count({ perPage: 2 })).toEqual({ total: 5, pages: 3, perPage: 2 })
    })
  })

  describe('delete', () => {
    it('should return true exactly once for an existing row', () => {
      table.set('x')
      expect(table.delete('x')).toBe(true)
      expect(table.delete('x')).toBe(false)
      expect(table.delete('x')).toBe(false)
    })

    it('should return false for a name that never existed', () => {
      expect(table.delete('missing')).toBe(false)
    })

    it('should require a name', () => {
      expect(() => table.delete('')).toThrow(ValidationError)
    })
  })

  describe('deleteAll', () => {
    it('should return the number of rows removed', () => {
      table.set('a')
      table.set('b')
      table.set('c')
      expect(table.deleteAll()).toBe(3)
      expect(table.all()).toEqual([])
      expect(table.deleteAll()).toBe(0)
    })
  })

  describe('drop', () => {
    it('should remove the table and reset the state', () => {
      table.set('x')
      table.drop()
      expect(table.state).toBe('uninitialized')
      expect(tableNames(storage)).toEqual([])
    })

    it('should recreate an empty table on the next operation', () => {
      table.set('x', { docs: 'old' })
      table.drop()
      expect(table.all()).toEqual([])
      expect(() => table.get('x')).toThrow(NotFoundError)
    })

    it('should be safe on a table that was never created', () => {
      expect(() => table.drop()).not.toThrow()
    })

    it('should reset every binding sharing the lifecycle', () => {
      const lifecycle: TableLifecycle = { state: 'uninitialized' }
      const first = new TableBinding(storage, components, { lifecycle })
      const second = new TableBinding(storage, components, { lifecycle })
      first.set('x')
      expect(second.state).toBe('ready')
      second.drop()
      expect(first.state).toBe('uninitialized')
      expect(first.all()).toEqual([])
    })
  })

  describe('value types', () => {
    it('should round-trip booleans and reals through the table', () => {
      const settings = new TableBinding(
        storage,
        declareTable({ model: 'Settings', fields: { enabled: 'boolean', ratio: 'real' } }),
      )
      settings.set('theme', { enabled: true, ratio: 0.75 })
      expect(settings.get('theme')).toEqual({ id: 1, name: 'theme', enabled: true, ratio: 0.75 })
      expect(settings.set('theme', { enabled: false }).enabled).toBe(false)
    })
  })

  describe('logging', () => {
    it('should log creation and drop at info level', () => {
      const lines: string[] = []
      const logger = createLogger({ level: 'info', stream: { write: (chunk: string) => lines.push(chunk) } })
      const logged = new TableBinding(storage, components, { logger })
      logged.all()
      logged.drop()
      expect(lines).toEqual(['INFO: Table components ready for Components\n', 'INFO: Dropped table components\n'])
    })
  })
})
