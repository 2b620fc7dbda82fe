export { TableBinding } from './binding.js'
export type { TableState, TableLifecycle, TableBindingOptions, PageOptions, Count } from './binding.js'
export { declareTable, sameFields } from './declaration.js'
export type { ResolvedDeclaration } from './declaration.js'
export { buildStatements, quoteIdentifier } from './sql.js'
export type { TableStatements } from './sql.js'
