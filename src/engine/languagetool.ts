/**
 * LanguageTool API client.
 * Sends the words one per line and maps misspelling matches back to words by offset.
 *
 * Rate limit: max 1 request per 3 seconds on the free API.
 * Max text length: 18,000 characters.
 */

import { z } from 'zod'
import { RemoteUnavailableError } from '../errors.js'
import type { SpellerClient, SpellerVerdict } from '../types.js'

const LANGUAGETOOL_API = 'https://api.languagetool.org/v2/check'
const MAX_TEXT_LENGTH = 18_000
const REQUEST_TIMEOUT = 30_000
const RATE_LIMIT_DELAY = 3_000
const MAX_SUGGESTIONS = 3

const ltMatchSchema = z.object({
  offset: z.number(),
  length: z.number(),
  replacements: z.array(z.object({ value: z.string() })),
  rule: z.object({
    id: z.string(),
    issueType: z.string().optional(),
    category: z.object({ id: z.string() }),
  }),
})

const ltResponseSchema = z.object({
  matches: z.array(ltMatchSchema),
})

type LTMatch = z.infer<typeof ltMatchSchema>

export interface LanguageToolOptions {
  /** LanguageTool language code (default: 'ru-RU') */
  language?: string
  timeoutMs?: number
  endpoint?: string
}

/** Spelling matches only: grammar and style rules have no meaning for single words */
function isMisspelling(match: LTMatch): boolean {
  return match.rule.issueType === 'misspelling'
    || match.rule.category.id === 'TYPOS'
    || match.rule.id.startsWith('MORFOLOGIK_RULE')
}

export function createLanguageToolClient(options: LanguageToolOptions = {}): SpellerClient {
  const language = options.language ?? 'ru-RU'
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT
  const endpoint = options.endpoint ?? LANGUAGETOOL_API

  return {
    name: 'languagetool',
    minRequestIntervalMs: RATE_LIMIT_DELAY,
    async checkWords(words) {
      const verdicts = new Map<string, SpellerVerdict>()

      // Keep whole lines only, up to the API limit
      const starts: number[] = []
      let length = 0
      for (const word of words) {
        if (length + word.length > MAX_TEXT_LENGTH) break
        starts.push(length)
        length += word.length + 1
      }
      const sent = words.slice(0, starts.length)
      if (sent.length === 0) return verdicts

      const params = new URLSearchParams({
        text: sent.join('\n'),
        language,
        disabledRules: 'WHITESPACE_RULE,UPPERCASE_SENTENCE_START',
      })

      const controller = new AbortController()
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

      let body: unknown
      try {
        const response = await fetch(endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: params.toString(),
          signal: controller.signal,
        })
        if (!response.ok) {
          throw new RemoteUnavailableError(
            `LanguageTool API error: ${response.status} ${response.statusText}`,
            'languagetool',
          )
        }
        body = await response.json()
      } catch (error) {
        if (error instanceof RemoteUnavailableError) throw error
        const reason = error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${timeoutMs}ms`
          : String(error)
        throw new RemoteUnavailableError(`LanguageTool request failed: ${reason}`, 'languagetool', { cause: error })
      } finally {
        clearTimeout(timeoutId)
      }

      const parsed = ltResponseSchema.safeParse(body)
      if (!parsed.success) {
        throw new RemoteUnavailableError(
          `LanguageTool returned an unexpected body: ${parsed.error.message}`,
          'languagetool',
          { cause: parsed.error },
        )
      }

      for (const word of sent) verdicts.set(word, { status: 'correct' })
      for (const match of parsed.data.matches) {
        if (!isMisspelling(match)) continue
        const index = wordIndexAt(starts, match.offset)
        if (index < 0) continue
        const word = sent[index]
        const previous = verdicts.get(word)
        if (previous?.status === 'typo') continue
        verdicts.set(word, {
          status: 'typo',
          suggestions: match.replacements.slice(0, MAX_SUGGESTIONS).map((r) => r.value),
        })
      }
      return verdicts
    },
  }
}

/** Index of the line containing `offset` (binary search over line starts) */
function wordIndexAt(starts: readonly number[], offset: number): number {
  let low = 0
  let high = starts.length - 1
  let found = -1
  while (low <= high) {
    const middle = (low + high) >> 1
    if (starts[middle] <= offset) {
      found = middle
      low = middle + 1
    } else {
      high = middle - 1
    }
  }
  return found
}
