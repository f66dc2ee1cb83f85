import { describe, it, expect } from 'vitest'
import { extractWords } from '../engine/words.js'
import { isNonNaturalText, stripNonNaturalText } from '../engine/filters.js'

describe('extractWords', () => {
  it('should lowercase, deduplicate and drop short words', () => {
    const words = extractWords(['Привет, мир! Привет снова', 'ПРИВЕТ да'])
    expect(words.sort()).toEqual(['мир', 'привет', 'снова'])
  })

  it('should keep only Cyrillic words by default', () => {
    const words = extractWords(['const сообщение = "Ошибка загрузки file"'])
    expect(words.sort()).toEqual(['загрузки', 'ошибка', 'сообщение'])
  })

  it('should keep hyphenated words whole unless compounds are split', () => {
    expect(extractWords(['кое-где'])).toEqual(['кое-где'])
    expect(extractWords(['кое-где'], { splitCompounds: true })).toEqual(['кое', 'где'])
  })

  it('should honor minWordLength', () => {
    expect(extractWords(['он она оно'], { minWordLength: 2 }).sort()).toEqual(['он', 'она', 'оно'])
    expect(extractWords(['он она оно'], { minWordLength: 4 })).toEqual([])
  })

  it('should check Latin words when asked', () => {
    const words = extractWords(['Recieve the мир'], { targetScript: 'latin' })
    expect(words.sort()).toEqual(['recieve', 'the'])
  })

  it('should keep every alphabet when script filtering is off', () => {
    const words = extractWords(['Hello мир 2024'], { onlyTargetScript: false })
    expect(words.sort()).toEqual(['hello', 'мир'])
  })

  it('should skip URLs, e-mails and numbers with units', () => {
    const words = extractWords(
      ['Смотрите https://example.com/page или пишите на mail@example.com, ширина 80px'],
      { onlyTargetScript: false },
    )
    expect(words.sort()).toEqual(['или', 'пишите', 'смотрите', 'ширина'])
  })

  it('should be idempotent', () => {
    const raw = ['Кое-где ВСТРЕЧАЮТСЯ опечатки_и ошибки', 'snake_case и размер:80px', 'ёлка']
    for (const options of [{}, { splitCompounds: true }, { onlyTargetScript: false }]) {
      const once = extractWords(raw, options)
      const twice = extractWords(once, options)
      expect(new Set(twice)).toEqual(new Set(once))
    }
  })

  it('should return an empty list for empty input', () => {
    expect(extractWords([])).toEqual([])
    expect(extractWords(['   ', ''])).toEqual([])
  })
})

describe('isNonNaturalText', () => {
  it('should recognize non-natural-language pieces', () => {
    expect(isNonNaturalText('https://example.com')).toBe(true)
    expect(isNonNaturalText('(mailto:test@example.com)')).toBe(true)
    expect(isNonNaturalText('test@example.com,')).toBe(true)
    expect(isNonNaturalText('example.com')).toBe(true)
    expect(isNonNaturalText('#ff0000')).toBe(true)
    expect(isNonNaturalText('1,5')).toBe(true)
    expect(isNonNaturalText('24h')).toBe(true)
  })

  it('should keep ordinary words', () => {
    expect(isNonNaturalText('привет.')).toBe(false)
    expect(isNonNaturalText('«слово»')).toBe(false)
    expect(isNonNaturalText('#')).toBe(false)
  })
})

describe('stripNonNaturalText', () => {
  it('should drop matching pieces and join the rest with spaces', () => {
    expect(stripNonNaturalText('см.  https://a.io  и\tдалее')).toBe('см. и далее')
  })
})
