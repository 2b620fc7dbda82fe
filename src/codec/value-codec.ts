/**
 * Conversion between native field values and SQLite column values.
 *
 * Scalars pass through after a type check (booleans become 0/1).
 * Structured values are stored as JSON text and must be plain data:
 * objects, arrays, strings, finite numbers other than -0, booleans and null.
 */

import { SerializationError, DeserializationError } from '../errors/index.js'
import type {
  SemanticType,
  SemanticValue,
  SemanticValueMap,
  StorableValue,
  StructuredValue,
} from '../types/index.js'

/** SQLite column type for each semantic type. */
const COLUMN_TYPES: Record<SemanticType, 'INTEGER' | 'TEXT' | 'REAL'> = {
  integer: 'INTEGER',
  text: 'TEXT',
  real: 'REAL',
  boolean: 'INTEGER',
  structured: 'TEXT',
}

/** Values written for declared fields a caller leaves out of an insert. */
const DEFAULTS: SemanticValueMap = {
  integer: 0,
  text: '',
  real: 0,
  boolean: false,
  structured: null,
}

export function columnType(type: SemanticType): 'INTEGER' | 'TEXT' | 'REAL' {
  return COLUMN_TYPES[type]
}

export function defaultValue<T extends SemanticType>(type: T): SemanticValue<T> {
  return DEFAULTS[type]
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  return typeof value
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Walk a candidate JSON value. Returns a description of the first
 * problem found, or undefined when the value serializes losslessly.
 */
function findJsonProblem(value: unknown, path: string, ancestors: Set<object>): string | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return undefined
  if (value === undefined) return `${path} is undefined`
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return `${path} is ${String(value)}`
    if (Object.is(value, -0)) return `${path} is -0, which JSON stores as 0`
    return undefined
  }
  if (typeof value !== 'object') return `${path} is a ${typeof value}`
  if (ancestors.has(value)) return `${path} is a circular reference`

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        const problem = findJsonProblem(value[i], `${path}[${i}]`, ancestors)
        if (problem) return problem
      }
      return undefined
    }
    if (!isPlainObject(value)) {
      return `${path} is an instance of ${value.constructor.name}`
    }
    for (const [key, child] of Object.entries(value)) {
      const problem = findJsonProblem(child, `${path}.${key}`, ancestors)
      if (problem) return problem
    }
    return undefined
  } finally {
    ancestors.delete(value)
  }
}

function isStructured(value: unknown): value is StructuredValue {
  return value !== null && typeof value === 'object' && (Array.isArray(value) || isPlainObject(value))
}

/**
 * Convert a native value to the form stored in its column.
 *
 * @param field - Field name, used in error messages
 * @throws SerializationError when the value does not fit the declared type
 */
export function encode(value: unknown, type: SemanticType, field = 'value'): StorableValue {
  const reject = (detail: string): never => {
    throw new SerializationError(field, `Cannot store field "${field}" as ${type}: ${detail}`)
  }

  switch (type) {
    case 'integer':
      if (typeof value === 'number' && Number.isSafeInteger(value)) return value
      return reject(`expected a safe integer, got ${describe(value)}`)
    case 'real':
      if (typeof value === 'number' && Number.isFinite(value)) return value
      return reject(`expected a finite number, got ${describe(value)}`)
    case 'text':
      if (typeof value === 'string') return value
      return reject(`expected a string, got ${describe(value)}`)
    case 'boolean':
      if (typeof value === 'boolean') return value ? 1 : 0
      return reject(`expected a boolean, got ${describe(value)}`)
    case 'structured': {
      if (value === null) return null
      if (!isStructured(value)) {
        return reject(`expected a mapping or sequence, got ${describe(value)}`)
      }
      const problem = findJsonProblem(value, field, new Set())
      if (problem) return reject(problem)
      return JSON.stringify(value)
    }
  }
}

/**
 * Convert a stored column value back to its native form.
 *
 * @throws DeserializationError when the stored value cannot be read as the declared type
 */
export function decode<T extends SemanticType>(stored: unknown, type: T, field?: string): SemanticValue<T>
export function decode(stored: unknown, type: SemanticType, field = 'value'): SemanticValue<SemanticType> {
  const reject = (detail: string, cause?: unknown): never => {
    throw new DeserializationError(field, `Cannot read field "${field}" as ${type}: ${detail}`, cause)
  }

  switch (type) {
    case 'integer':
      if (typeof stored === 'number' && Number.isInteger(stored)) return stored
      if (typeof stored === 'bigint' && stored <= BigInt(Number.MAX_SAFE_INTEGER) && stored >= BigInt(Number.MIN_SAFE_INTEGER)) {
        return Number(stored)
      }
      return reject(`stored value is ${describe(stored)}`)
    case 'real':
      if (typeof stored === 'number') return stored
      return reject(`stored value is ${describe(stored)}`)
    case 'text':
      if (typeof stored === 'string') return stored
      return reject(`stored value is ${describe(stored)}`)
    case 'boolean':
      if (stored === 0 || stored === 1) return stored === 1
      return reject(`stored value is ${typeof stored === 'number' ? String(stored) : describe(stored)}`)
    case 'structured': {
      if (stored === null) return null
      if (typeof stored !== 'string') return reject(`stored value is ${describe(stored)}`)
      let parsed: unknown
      try {
        parsed = JSON.parse(stored)
      } catch (err) {
        return reject('stored text is not valid JSON', err)
      }
      if (!isStructured(parsed)) return reject(`stored JSON is ${describe(parsed)}, not a mapping or sequence`)
      return parsed
    }
  }
}
