import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { vi } from 'vitest'
import { createBackendConfiguration, type BackendConfigurationInput } from '../config.js'
import { createSilentLogger } from '../logger.js'
import type {
  BackendContext,
  CacheEntry,
  CacheStore,
  SpellerClient,
  SpellerVerdict,
} from '../types.js'

/** In-process CacheStore fake */
export function createMemoryCacheStore(initial: CacheEntry[] = []): CacheStore & { entries: Map<string, CacheEntry> } {
  const entries = new Map(initial.map((entry) => [entry.word, entry]))
  return {
    entries,
    lookup(words) {
      const found = new Map<string, CacheEntry>()
      for (const word of words) {
        const entry = entries.get(word)
        if (entry) found.set(word, entry)
      }
      return found
    },
    save(saved) {
      for (const entry of saved) entries.set(entry.word, entry)
    },
    close() {},
  }
}

export function cacheEntry(word: string, status: 'correct' | 'typo', suggestions: string[] = []): CacheEntry {
  return { word, status, suggestions, updatedAt: new Date(0) }
}

/** Speller stub answering from a fixed table; words not in the table are omitted */
export function createStubSpeller(answers: Record<string, SpellerVerdict>) {
  const checkWords = vi.fn(async (words: readonly string[]) => {
    const verdicts = new Map<string, SpellerVerdict>()
    for (const word of words) {
      const verdict = answers[word]
      if (verdict) verdicts.set(word, verdict)
    }
    return verdicts
  })
  const speller: SpellerClient = { name: 'stub', checkWords }
  return { speller, checkWords }
}

export function createContext(
  overrides: Omit<Partial<BackendContext>, 'config'> & { config?: BackendConfigurationInput } = {},
): BackendContext {
  const { config, ...rest } = overrides
  return {
    config: createBackendConfiguration(config ?? {}),
    logger: createSilentLogger(),
    cache: createMemoryCacheStore(),
    speller: createStubSpeller({}).speller,
    ...rest,
  }
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'spellsweep-'))
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
