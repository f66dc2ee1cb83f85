/**
 * Vocabulary stage: words the user declared correct.
 * Never reports typos, only confirms correctness.
 */

import { readFile } from 'node:fs/promises'
import type { BackendContext, OracleResult, TyposBackend } from '../types.js'

// --- In-memory vocabulary cache (5 min TTL) ---

interface CachedVocabulary {
  words: Set<string>
  loadedAt: number
}

const cachedVocabularies = new Map<string, CachedVocabulary>()
const CACHE_TTL = 5 * 60 * 1000 // 5 minutes

/** Drop the cached copy of one vocabulary file, or of all of them */
export function invalidateVocabularyCache(vocabularyPath?: string): void {
  if (vocabularyPath === undefined) {
    cachedVocabularies.clear()
  } else {
    cachedVocabularies.delete(vocabularyPath)
  }
}

export function parseVocabularyWords(content: string): Set<string> {
  const words = new Set<string>()
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line || line.startsWith('#')) continue
    words.add(line.toLowerCase())
  }
  return words
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

/**
 * Load the lowercased vocabulary entries, with in-memory cache.
 * A missing file is an empty vocabulary.
 */
export async function loadVocabulary(vocabularyPath: string): Promise<Set<string>> {
  const now = Date.now()
  const cached = cachedVocabularies.get(vocabularyPath)
  if (cached && now - cached.loadedAt < CACHE_TTL) {
    return cached.words
  }

  let words: Set<string>
  try {
    words = parseVocabularyWords(await readFile(vocabularyPath, 'utf-8'))
  } catch (error) {
    if (!isMissingFile(error)) throw error
    words = new Set()
  }
  cachedVocabularies.set(vocabularyPath, { words, loadedAt: now })
  return words
}

export async function processWithVocabulary(
  words: readonly string[],
  context: BackendContext,
): Promise<OracleResult> {
  const { vocabularyPath } = context.config
  if (vocabularyPath === undefined) {
    return { sureCorrect: [], sureWithTypoInfo: [], unknown: [...words] }
  }

  const vocabulary = await loadVocabulary(vocabularyPath)
  if (vocabulary.size === 0) {
    context.logger.debug(`Vocabulary ${vocabularyPath} is missing or empty`)
  }

  const sureCorrect: string[] = []
  const unknown: string[] = []
  for (const word of words) {
    if (vocabulary.has(word.toLowerCase())) {
      sureCorrect.push(word)
    } else {
      unknown.push(word)
    }
  }
  return { sureCorrect, sureWithTypoInfo: [], unknown }
}

export const vocabularyBackend: TyposBackend = {
  name: 'vocabulary',
  process: processWithVocabulary,
}
