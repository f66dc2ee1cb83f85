/**
 * Yandex Speller API client.
 * Sends every word as its own `text` so the response lines up with the input by index.
 *
 * Max 10,000 characters per request.
 */

import { z } from 'zod'
import { RemoteUnavailableError } from '../errors.js'
import type { SpellerClient, SpellerVerdict } from '../types.js'

const YANDEX_SPELLER_API = 'https://speller.yandex.net/services/spellservice.json/checkTexts'
const REQUEST_TIMEOUT = 30_000

/** Error code for a word the speller does not know */
const ERROR_UNKNOWN_WORD = 1

const IGNORE_DIGITS = 2
const IGNORE_URLS = 4
const IGNORE_CAPITALIZATION = 512

const spellErrorSchema = z.object({
  code: z.number(),
  word: z.string(),
  s: z.array(z.string()),
})

const checkTextsResponseSchema = z.array(z.array(spellErrorSchema))

export interface YandexSpellerOptions {
  /** Comma-separated language list (default: 'ru,en') */
  language?: string
  timeoutMs?: number
  /** Override for tests or a self-hosted mirror */
  endpoint?: string
}

export function createYandexSpellerClient(options: YandexSpellerOptions = {}): SpellerClient {
  const language = options.language ?? 'ru,en'
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT
  const endpoint = options.endpoint ?? YANDEX_SPELLER_API

  return {
    name: 'yandex',
    async checkWords(words) {
      const verdicts = new Map<string, SpellerVerdict>()
      if (words.length === 0) return verdicts

      const params = new URLSearchParams({
        lang: language,
        options: String(IGNORE_DIGITS | IGNORE_URLS | IGNORE_CAPITALIZATION),
        format: 'plain',
      })
      for (const word of words) params.append('text', word)

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
            `Yandex Speller API error: ${response.status} ${response.statusText}`,
            'yandex',
          )
        }
        body = await response.json()
      } catch (error) {
        if (error instanceof RemoteUnavailableError) throw error
        const reason = error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${timeoutMs}ms`
          : String(error)
        throw new RemoteUnavailableError(`Yandex Speller request failed: ${reason}`, 'yandex', { cause: error })
      } finally {
        clearTimeout(timeoutId)
      }

      const parsed = checkTextsResponseSchema.safeParse(body)
      if (!parsed.success) {
        throw new RemoteUnavailableError(
          `Yandex Speller returned an unexpected body: ${parsed.error.message}`,
          'yandex',
          { cause: parsed.error },
        )
      }

      // Texts past the end of the response were not answered
      parsed.data.slice(0, words.length).forEach((errors, index) => {
        verdicts.set(words[index], toVerdict(errors))
      })
      return verdicts
    },
  }
}

function toVerdict(errors: z.infer<typeof spellErrorSchema>[]): SpellerVerdict {
  const unknownWord = errors.find((error) => error.code === ERROR_UNKNOWN_WORD)
  if (!unknownWord) return { status: 'correct' }
  return { status: 'typo', suggestions: unknownWord.s }
}
