/**
 * Speller stage, the last and most expensive one.
 *
 * Residue is sent in bounded requests; every verdict is written to the cache
 * so the next run does not ask again. A failed request leaves its words
 * unknown and the run goes on.
 */

import type {
  BackendContext,
  CacheEntry,
  OracleResult,
  SpellerClient,
  SpellerSettings,
  SpellerVerdict,
  TypoFinding,
  TyposBackend,
} from '../types.js'
import { chunks } from './chunks.js'
import { createLanguageToolClient } from './languagetool.js'
import { createYandexSpellerClient } from './yandexSpeller.js'

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Start time of the latest request per client, kept across stage calls */
const lastRequestAt = new WeakMap<SpellerClient, number>()

/** Wait until the client's minimum interval since its previous request has passed */
async function waitForTurn(speller: SpellerClient): Promise<void> {
  const interval = speller.minRequestIntervalMs
  if (!interval) return
  const previous = lastRequestAt.get(speller)
  if (previous !== undefined) {
    const remaining = previous + interval - Date.now()
    if (remaining > 0) await sleep(remaining)
  }
  lastRequestAt.set(speller, Date.now())
}

export function createSpellerClient(settings: SpellerSettings): SpellerClient {
  switch (settings.provider) {
    case 'yandex':
      return createYandexSpellerClient({ language: settings.language, timeoutMs: settings.timeoutMs })
    case 'languagetool':
      return createLanguageToolClient({ language: settings.language, timeoutMs: settings.timeoutMs })
  }
}

export async function processWithSpeller(
  words: readonly string[],
  context: BackendContext,
): Promise<OracleResult> {
  const { config, speller, cache } = context
  const logger = context.logger.child(speller.name)

  const sureCorrect: string[] = []
  const sureWithTypoInfo: TypoFinding[] = []
  const unknown: string[] = []

  for (const batch of chunks(words, config.spellerChunkSize)) {
    await waitForTurn(speller)

    let verdicts: Map<string, SpellerVerdict>
    try {
      verdicts = await speller.checkWords(batch)
    } catch (error) {
      logger.warn(
        `Request for ${batch.length} words failed, leaving them unresolved:`,
        error instanceof Error ? error.message : error,
      )
      unknown.push(...batch)
      continue
    }

    const updatedAt = new Date()
    const resolved: CacheEntry[] = []
    for (const word of batch) {
      const verdict = verdicts.get(word)
      if (!verdict) {
        unknown.push(word)
      } else if (verdict.status === 'correct') {
        sureCorrect.push(word)
        resolved.push({ word, status: 'correct', suggestions: [], updatedAt })
      } else {
        sureWithTypoInfo.push({ original: word, possibleOptions: [...verdict.suggestions] })
        resolved.push({ word, status: 'typo', suggestions: [...verdict.suggestions], updatedAt })
      }
    }

    try {
      cache.save(resolved)
    } catch (error) {
      logger.error(`Failed to cache ${resolved.length} verdicts:`, error)
    }
    logger.debug(`Checked ${batch.length} words, ${resolved.length} resolved`)
  }

  return { sureCorrect, sureWithTypoInfo, unknown }
}

export const spellerBackend: TyposBackend = {
  name: 'speller',
  process: processWithSpeller,
}
