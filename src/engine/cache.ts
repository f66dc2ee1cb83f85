/**
 * Cache stage: verdicts of earlier speller calls, persisted in SQLite.
 *
 * The store is opened lazily. Lookups and counts go through a read-only
 * connection and never write to the database: a file that does not exist
 * yet, or has no table yet, is an all-miss. The first save creates both.
 */

import { existsSync } from 'node:fs'
import Database from 'better-sqlite3'
import { count, inArray, sql } from 'drizzle-orm'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import type {
  BackendContext,
  CacheEntry,
  CacheStatus,
  CacheStore,
  OracleResult,
  TypoFinding,
  TyposBackend,
} from '../types.js'
import { chunks } from './chunks.js'
import { CREATE_TYPO_CACHE_SQL, TYPO_CACHE_TABLE, typoCache } from './schema.js'

const IN_MEMORY = ':memory:'
/** Rows per statement, well under SQLite's bound-parameter limit */
const STATEMENT_BATCH_SIZE = 200

interface Connection {
  sqlite: Database.Database
  db: BetterSQLite3Database
  writable: boolean
}

export class SqliteCacheStore implements CacheStore {
  private connection: Connection | null = null

  constructor(readonly path: string) {}

  private exists(): boolean {
    return this.connection !== null || this.path === IN_MEMORY || existsSync(this.path)
  }

  private open(writable: boolean): Connection {
    if (this.connection && (this.connection.writable || !writable)) return this.connection
    this.close()

    // An in-memory database cannot be opened read-only
    const sqlite = writable || this.path === IN_MEMORY
      ? new Database(this.path)
      : new Database(this.path, { readonly: true, fileMustExist: true })
    const isWritable = !sqlite.readonly
    if (isWritable) {
      sqlite.pragma('journal_mode = WAL')
      sqlite.exec(CREATE_TYPO_CACHE_SQL)
    }
    this.connection = { sqlite, db: drizzle(sqlite), writable: isWritable }
    return this.connection
  }

  /** Read-only connection, or null when the store holds nothing yet */
  private openForReading(): Connection | null {
    if (!this.exists()) return null
    const connection = this.open(false)
    const table = connection.sqlite
      .prepare('SELECT 1 FROM sqlite_master WHERE type = ? AND name = ?')
      .get('table', TYPO_CACHE_TABLE)
    return table === undefined ? null : connection
  }

  lookup(words: readonly string[]): Map<string, CacheEntry> {
    const found = new Map<string, CacheEntry>()
    if (words.length === 0) return found
    const connection = this.openForReading()
    if (!connection) return found

    const { db } = connection
    for (const batch of chunks(words, STATEMENT_BATCH_SIZE)) {
      const rows = db.select().from(typoCache).where(inArray(typoCache.word, batch)).all()
      for (const row of rows) {
        found.set(row.word, {
          word: row.word,
          status: row.status,
          suggestions: row.suggestions,
          updatedAt: row.updatedAt,
        })
      }
    }
    return found
  }

  save(entries: readonly CacheEntry[]): void {
    if (entries.length === 0) return

    const { db } = this.open(true)
    for (const batch of chunks(entries, STATEMENT_BATCH_SIZE)) {
      db.insert(typoCache)
        .values(batch.map((entry) => ({ ...entry, suggestions: [...entry.suggestions] })))
        .onConflictDoUpdate({
          target: typoCache.word,
          set: {
            status: sql`excluded.status`,
            suggestions: sql`excluded.suggestions`,
            updatedAt: sql`excluded.updated_at`,
          },
        })
        .run()
    }
  }

  /** Entry counts by status; an absent store counts as empty */
  countByStatus(): Record<CacheStatus, number> {
    const counts: Record<CacheStatus, number> = { correct: 0, typo: 0 }
    const connection = this.openForReading()
    if (!connection) return counts

    const { db } = connection
    const rows = db
      .select({ status: typoCache.status, total: count() })
      .from(typoCache)
      .groupBy(typoCache.status)
      .all()
    for (const row of rows) counts[row.status] = row.total
    return counts
  }

  close(): void {
    this.connection?.sqlite.close()
    this.connection = null
  }
}

/** Store used when no cache path is configured: every lookup misses, saves are dropped */
export function createNullCacheStore(): CacheStore {
  return {
    lookup: () => new Map(),
    save: () => {},
    close: () => {},
  }
}

export function openCacheStore(cachePath: string | undefined): CacheStore {
  return cachePath === undefined ? createNullCacheStore() : new SqliteCacheStore(cachePath)
}

export async function processWithCache(
  words: readonly string[],
  context: BackendContext,
): Promise<OracleResult> {
  let entries: Map<string, CacheEntry>
  try {
    entries = context.cache.lookup(words)
  } catch (error) {
    context.logger.warn(
      `Cache lookup for ${words.length} words failed, passing them on:`,
      error instanceof Error ? error.message : error,
    )
    return { sureCorrect: [], sureWithTypoInfo: [], unknown: [...words] }
  }

  const sureCorrect: string[] = []
  const sureWithTypoInfo: TypoFinding[] = []
  const unknown: string[] = []
  for (const word of words) {
    const entry = entries.get(word)
    if (!entry) {
      unknown.push(word)
    } else if (entry.status === 'correct') {
      sureCorrect.push(word)
    } else {
      sureWithTypoInfo.push({ original: word, possibleOptions: [...entry.suggestions] })
    }
  }
  return { sureCorrect, sureWithTypoInfo, unknown }
}

export const cacheBackend: TyposBackend = {
  name: 'cache',
  process: processWithCache,
}
