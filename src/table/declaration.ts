import { Value } from '@sinclair/typebox/value'
import { ValidationError, type FieldIssue } from '../errors/index.js'
import {
  TableDeclarationSchema,
  RESERVED_COLUMNS,
  type FieldMap,
  type TableDeclaration,
} from '../types/index.js'

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/** A validated declaration with its physical table name resolved. */
export interface ResolvedDeclaration<F extends FieldMap = FieldMap> {
  readonly model: string
  readonly table: string
  readonly fields: F
}

/**
 * Validate a table declaration and resolve its table name.
 *
 * The table name defaults to the model name lower-cased
 * (`Components` becomes `components`).
 *
 * @throws ValidationError listing every problem found
 */
export function declareTable<F extends FieldMap>(declaration: TableDeclaration<F>): ResolvedDeclaration<F> {
  if (!Value.Check(TableDeclarationSchema, declaration)) {
    const issues = [...Value.Errors(TableDeclarationSchema, declaration)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    throw invalid(issues)
  }

  const issues: FieldIssue[] = []
  const fieldNames = Object.keys(declaration.fields)
  for (const field of fieldNames) {
    const path = `/fields/${field}`
    if (!IDENTIFIER.test(field)) {
      issues.push({ path, message: 'field name must be a letter or underscore followed by letters, digits or underscores' })
    } else if (RESERVED_COLUMNS.some((reserved) => reserved === field.toLowerCase())) {
      issues.push({ path, message: `"${field}" is an implicit column and cannot be declared` })
    }
  }
  const lowered = new Set(fieldNames.map((f) => f.toLowerCase()))
  if (lowered.size !== fieldNames.length) {
    issues.push({ path: '/fields', message: 'field names must be unique ignoring case' })
  }
  if (issues.length > 0) throw invalid(issues)

  const fields: F = { ...declaration.fields }
  Object.freeze(fields)
  return Object.freeze({
    model: declaration.model,
    table: declaration.table ?? declaration.model.toLowerCase(),
    fields,
  })
}

/** Whether two field maps declare the same fields, types and order. */
export function sameFields(a: FieldMap, b: FieldMap): boolean {
  const left = Object.entries(a)
  const right = Object.entries(b)
  return left.length === right.length && left.every(([field, type], i) => right[i][0] === field && right[i][1] === type)
}

function invalid(issues: FieldIssue[]): ValidationError {
  const details = issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
  return new ValidationError(`Table declaration invalid:\n${details}`, issues)
}
