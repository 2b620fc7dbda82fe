/**
 * SQL text for one declared table.
 *
 * Identifiers are validated at declaration time and quoted here anyway;
 * values always travel as bound parameters.
 */

import { columnType } from '../codec/index.js'
import type { FieldMap } from '../types/index.js'

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`
}

/** Column definition for a declared field. Structured fields stay nullable. */
function columnDefinition(field: string, type: FieldMap[string]): string {
  const nullability = type === 'structured' ? '' : ' NOT NULL'
  return `${quoteIdentifier(field)} ${columnType(type)}${nullability}`
}

export interface TableStatements {
  create: string
  drop: string
  selectId: string
  selectByName: string
  selectAll: string
  selectPage: string
  count: string
  insert: string
  deleteByName: string
  deleteAll: string
  /** UPDATE setting the given columns, then matching on name as the last parameter. */
  update(columns: readonly string[]): string
}

export function buildStatements(table: string, fields: FieldMap): TableStatements {
  const t = quoteIdentifier(table)
  const fieldNames = Object.keys(fields)
  const columns = [
    'id INTEGER PRIMARY KEY AUTOINCREMENT',
    'name TEXT NOT NULL UNIQUE',
    ...fieldNames.map((field) => columnDefinition(field, fields[field])),
  ]
  const insertColumns = ['name', ...fieldNames].map(quoteIdentifier)

  return {
    create: `CREATE TABLE IF NOT EXISTS ${t} (${columns.join(', ')})`,
    drop: `DROP TABLE IF EXISTS ${t}`,
    selectId: `SELECT id FROM ${t} WHERE name = ?`,
    selectByName: `SELECT * FROM ${t} WHERE name = ?`,
    selectAll: `SELECT * FROM ${t}`,
    selectPage: `SELECT * FROM ${t} LIMIT ? OFFSET ?`,
    count: `SELECT COUNT(*) AS total FROM ${t}`,
    insert: `INSERT INTO ${t} (${insertColumns.join(', ')}) VALUES (${insertColumns.map(() => '?').join(', ')})`,
    deleteByName: `DELETE FROM ${t} WHERE name = ?`,
    deleteAll: `DELETE FROM ${t}`,
    update(updateColumns) {
      const assignments = updateColumns.map((column) => `${quoteIdentifier(column)} = ?`)
      return `UPDATE ${t} SET ${assignments.join(', ')} WHERE name = ?`
    },
  }
}
