/**
 * Vocabulary file maintenance: reorder sections and add words.
 *
 * File format: one word per line, `#` lines are section headers,
 * a blank line between sections and none after the last one.
 */

import { existsSync } from 'node:fs'
import { readFile, rename, writeFile } from 'node:fs/promises'
import { invalidateVocabularyCache } from './vocabulary.js'

export const HEADER_MARKER = '#'

export interface VocabularySection {
  headers: string[]
  entries: string[]
}

export interface AddWordsResult {
  added: string[]
  skipped: string[]
}

function isHeader(line: string): boolean {
  return line.startsWith(HEADER_MARKER)
}

/**
 * Split file content into sections. Blank lines are dropped; every header
 * line opens a new section unless the current one is still empty.
 */
export function parseVocabulary(content: string): VocabularySection[] {
  const groups: string[][] = []
  let current: string[] = []
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line) continue
    if (isHeader(line) && current.length > 0) {
      groups.push(current)
      current = []
    }
    current.push(line)
  }
  if (current.length > 0) groups.push(current)

  return groups.map((lines) => ({
    headers: lines.filter(isHeader),
    entries: lines.filter((line) => !isHeader(line)),
  }))
}

/**
 * Lines compare by code point with their newline attached, so "a" sorts
 * before "a-b" and after "a\tb"
 */
function compareEntries(a: string, b: string): number {
  const left = [...`${a}\n`]
  const right = [...`${b}\n`]
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0)
    if (diff !== 0) return diff
  }
  return left.length - right.length
}

export function renderVocabulary(sections: readonly VocabularySection[]): string {
  return sections
    .map((section, index) => {
      const lines = [...section.headers, ...[...section.entries].sort(compareEntries)]
      const body = lines.map((line) => `${line}\n`).join('')
      return index < sections.length - 1 ? `${body}\n` : body
    })
    .join('')
}

/** Sort entries inside every section, keeping headers on top */
export function reorderVocabularyContent(content: string): string {
  return renderVocabulary(parseVocabulary(content))
}

async function replaceFile(path: string, content: string): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`
  await writeFile(tmpPath, content, 'utf-8')
  await rename(tmpPath, path)
  invalidateVocabularyCache(path)
}

/**
 * Rewrite the vocabulary file with sorted sections.
 * The file is read fully first, then replaced through a temporary sibling.
 */
export async function reorderVocabulary(vocabularyPath: string): Promise<void> {
  const content = await readFile(vocabularyPath, 'utf-8')
  await replaceFile(vocabularyPath, reorderVocabularyContent(content))
}

/**
 * Add words to a section (matched by its header line, created at the end
 * when missing) and reorder the file. Words are trimmed and lowercased;
 * words already present anywhere in the vocabulary are skipped.
 */
export async function addVocabularyWords(
  vocabularyPath: string,
  words: readonly string[],
  section?: string,
): Promise<AddWordsResult> {
  const content = existsSync(vocabularyPath) ? await readFile(vocabularyPath, 'utf-8') : ''
  const sections = parseVocabulary(content)
  const known = new Set(sections.flatMap((s) => s.entries.map((entry) => entry.toLowerCase())))

  const added: string[] = []
  const skipped: string[] = []
  for (const word of words) {
    const cleaned = word.trim().toLowerCase()
    if (!cleaned) continue
    if (known.has(cleaned) || isHeader(cleaned)) {
      skipped.push(cleaned)
      continue
    }
    known.add(cleaned)
    added.push(cleaned)
  }

  if (added.length === 0) return { added, skipped }

  const header = section === undefined ? undefined : normalizeHeader(section)
  let target = header === undefined
    ? sections[sections.length - 1]
    : sections.find((s) => s.headers.includes(header))
  if (!target) {
    target = { headers: header === undefined ? [] : [header], entries: [] }
    sections.push(target)
  }
  target.entries.push(...added)

  await replaceFile(vocabularyPath, renderVocabulary(sections))
  return { added, skipped }
}

function normalizeHeader(section: string): string {
  const trimmed = section.trim()
  return isHeader(trimmed) ? trimmed : `${HEADER_MARKER} ${trimmed}`
}
