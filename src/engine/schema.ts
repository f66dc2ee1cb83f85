import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

export const TYPO_CACHE_TABLE = 'typo_cache'

export const typoCache = sqliteTable(TYPO_CACHE_TABLE, {
  word: text('word').primaryKey(),
  status: text('status', { enum: ['correct', 'typo'] }).notNull(),
  suggestions: text('suggestions', { mode: 'json' }).$type<string[]>().notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
})

export type TypoCacheRow = typeof typoCache.$inferSelect

export const CREATE_TYPO_CACHE_SQL = `
  CREATE TABLE IF NOT EXISTS typo_cache (
    word TEXT PRIMARY KEY NOT NULL,
    status TEXT NOT NULL,
    suggestions TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  )
`
