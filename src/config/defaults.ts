import type { RowfileConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: RowfileConfig = {
  storage: {
    path: './data/rowfile.db',
    journalMode: 'wal',
    busyTimeoutMs: 5000,
  },
  logging: {
    level: 'warn',
    traceSql: false,
  },
}
