/**
 * spellsweep type definitions.
 */

import type { Logger } from './logger.js'

export interface TypoFinding {
  /** The misspelled word, as it was classified */
  readonly original: string
  /** Suggested replacements, best first (may be empty) */
  readonly possibleOptions: readonly string[]
}

export type SpellerProvider = 'yandex' | 'languagetool'

export interface SpellerSettings {
  /** Remote service used for the last cascade stage (default: 'yandex') */
  readonly provider: SpellerProvider
  /** Language passed to the service (default: 'ru,en' for Yandex, 'ru-RU' for LanguageTool) */
  readonly language: string
  /** Per-request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number
}

export interface BackendConfiguration {
  /** Vocabulary file with always-correct words. Unset = empty vocabulary */
  readonly vocabularyPath?: string
  /** SQLite file with previously resolved words. Unset = no cache */
  readonly cachePath?: string
  /** Max words per outer chunk and per speller request (default: 100) */
  readonly spellerChunkSize: number
  readonly speller: SpellerSettings
}

/** Three-way partition every cascade stage returns */
export interface OracleResult {
  sureCorrect: string[]
  sureWithTypoInfo: TypoFinding[]
  unknown: string[]
}

export type CacheStatus = 'correct' | 'typo'

export interface CacheEntry {
  word: string
  status: CacheStatus
  suggestions: string[]
  updatedAt: Date
}

/** Persistent word → verdict store behind the cache stage */
export interface CacheStore {
  /** Entries for the given words; words without an entry are absent from the map */
  lookup(words: readonly string[]): Map<string, CacheEntry>
  /** Insert or replace entries (last write wins) */
  save(entries: readonly CacheEntry[]): void
  close(): void
}

export type SpellerVerdict =
  | { status: 'correct' }
  | { status: 'typo'; suggestions: string[] }

/** Remote spelling service. Words the service did not answer for are absent from the map */
export interface SpellerClient {
  readonly name: string
  /** Minimum time between the starts of two requests through this client, if the service rate-limits */
  readonly minRequestIntervalMs?: number
  checkWords(words: readonly string[]): Promise<Map<string, SpellerVerdict>>
}

/** Everything a cascade stage may read during one run */
export interface BackendContext {
  config: BackendConfiguration
  logger: Logger
  cache: CacheStore
  speller: SpellerClient
}

export interface TyposBackend {
  name: string
  process(words: readonly string[], context: BackendContext): Promise<OracleResult>
}

export interface CascadeReport {
  /** Confirmed typos, in chunk-then-stage order */
  typos: TypoFinding[]
  /** Words no stage could classify (e.g. the speller was unreachable) */
  unresolved: string[]
  /** Number of words each stage resolved, keyed by stage name */
  resolvedBy: Record<string, number>
}
