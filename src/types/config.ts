import { Type, type Static } from '@sinclair/typebox'

export const JournalMode = Type.Union([Type.Literal('wal'), Type.Literal('delete')])
export type JournalMode = Static<typeof JournalMode>

export const LogLevel = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('silent'),
])
export type LogLevel = Static<typeof LogLevel>

/** Configuration schema for rowfile.config.json */
export const RowfileConfigSchema = Type.Object({
  storage: Type.Object({
    path: Type.String({ minLength: 1, default: './data/rowfile.db' }),
    journalMode: JournalMode,
    busyTimeoutMs: Type.Number({ minimum: 0, default: 5000 }),
  }),
  logging: Type.Object({
    level: LogLevel,
    traceSql: Type.Boolean({ default: false }),
  }),
})

export type RowfileConfig = Static<typeof RowfileConfigSchema>
