/**
 * Turn raw extracted strings into candidate words:
 * unique, lowercased, long enough and, optionally, in the target alphabet.
 */

import { isNonNaturalText, stripNonNaturalText } from './filters.js'

export type TargetScript = 'cyrillic' | 'latin'

export interface WordNormalizerOptions {
  /** Shortest word kept (default: 3) */
  minWordLength?: number
  /** Keep only words written in `targetScript` (default: true) */
  onlyTargetScript?: boolean
  /** Alphabet used by `onlyTargetScript` (default: 'cyrillic') */
  targetScript?: TargetScript
  /** Split "кое-где" and "snake_case" into separate words (default: false) */
  splitCompounds?: boolean
}

export const DEFAULT_MIN_WORD_LENGTH = 3

const SCRIPT_PATTERNS: Record<TargetScript, RegExp> = {
  cyrillic: /^[а-яё-]+$/,
  latin: /^[a-z-]+$/,
}

const SIMPLE_WORD = /[\p{L}\p{N}]+/gu
const COMPOUND_WORD = /[\p{L}\p{N}]+(?:[-_][\p{L}\p{N}]+)*/gu

/**
 * Normalize raw strings into a deduplicated list of candidate words.
 * Order of the result follows first appearance but carries no meaning.
 */
export function extractWords(
  rawStrings: Iterable<string>,
  options: WordNormalizerOptions = {},
): string[] {
  const minWordLength = options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH
  const scriptPattern = options.onlyTargetScript === false
    ? null
    : SCRIPT_PATTERNS[options.targetScript ?? 'cyrillic']
  const tokenPattern = options.splitCompounds ? SIMPLE_WORD : COMPOUND_WORD

  const words = new Set<string>()
  for (const raw of rawStrings) {
    const text = stripNonNaturalText(raw)
    for (const match of text.matchAll(tokenPattern)) {
      const word = match[0].trim().toLowerCase()
      if (word.length < minWordLength) continue
      if (isNonNaturalText(word)) continue
      if (scriptPattern && !scriptPattern.test(word)) continue
      words.add(word)
    }
  }
  return [...words]
}

