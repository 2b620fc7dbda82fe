export type { StorageEngine, RunResult } from './interface.js'
export { SqliteStorage, translateError } from './sqlite.js'
export type { SqliteStorageOptions } from './sqlite.js'
