import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { beforeEach, describe, it, expect } from 'vitest'
import {
  invalidateVocabularyCache,
  loadVocabulary,
  parseVocabularyWords,
  processWithVocabulary,
} from '../engine/vocabulary.js'
import {
  addVocabularyWords,
  parseVocabulary,
  reorderVocabulary,
  reorderVocabularyContent,
} from '../engine/vocabularyFile.js'
import { createContext, withTempDir } from './helpers.js'

beforeEach(() => {
  invalidateVocabularyCache()
})

describe('parseVocabularyWords', () => {
  it('should skip headers and blank lines and lowercase entries', () => {
    const words = parseVocabularyWords('# Термины\nЯндекс\n  джанго  \n\n# Прочее\nтудушка\n')
    expect([...words].sort()).toEqual(['джанго', 'тудушка', 'яндекс'])
  })
})

describe('processWithVocabulary', () => {
  it('should confirm vocabulary words and forward the rest', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, '# A\nпривет\nЯндекс\n')
      const context = createContext({ config: { vocabularyPath } })

      const result = await processWithVocabulary(['привет', 'превет', 'яндекс'], context)

      expect(result).toEqual({
        sureCorrect: ['привет', 'яндекс'],
        sureWithTypoInfo: [],
        unknown: ['превет'],
      })
    })
  })

  it('should treat a missing file as an empty vocabulary', async () => {
    await withTempDir(async (dir) => {
      const context = createContext({ config: { vocabularyPath: join(dir, 'absent.txt') } })
      const result = await processWithVocabulary(['слово'], context)
      expect(result).toEqual({ sureCorrect: [], sureWithTypoInfo: [], unknown: ['слово'] })
    })
  })

  it('should forward everything when no vocabulary is configured', async () => {
    const result = await processWithVocabulary(['слово'], createContext())
    expect(result.unknown).toEqual(['слово'])
  })
})

describe('loadVocabulary', () => {
  it('should serve the cached copy until invalidated', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, 'первое\n')
      expect([...(await loadVocabulary(vocabularyPath))]).toEqual(['первое'])

      await writeFile(vocabularyPath, 'второе\n')
      expect([...(await loadVocabulary(vocabularyPath))]).toEqual(['первое'])

      invalidateVocabularyCache(vocabularyPath)
      expect([...(await loadVocabulary(vocabularyPath))]).toEqual(['второе'])
    })
  })
})

describe('reorderVocabularyContent', () => {
  it('should sort each section under its header, with one blank line between sections', () => {
    const input = '#A\nzeta\nalpha\n\n\n#B\nmike\nbravo\n  \nDelta\n'
    expect(reorderVocabularyContent(input)).toBe('#A\nalpha\nzeta\n\n#B\nDelta\nbravo\nmike\n')
  })

  it('should open a new section at every header that follows a non-empty section', () => {
    expect(reorderVocabularyContent('#A\n#B\nb\na\n')).toBe('#A\n\n#B\na\nb\n')
    const input = '# Термины\n# (проверены вручную)\nяндекс\nгугл\n'
    expect(reorderVocabularyContent(input)).toBe('# Термины\n\n# (проверены вручную)\nгугл\nяндекс\n')
  })

  it('should sort by code point, not by UTF-16 code unit', () => {
    expect(reorderVocabularyContent('\u{1F600}\n\uFF5A\n')).toBe('\uFF5A\n\u{1F600}\n')
  })

  it('should sort a leading section without header', () => {
    expect(reorderVocabularyContent('b\na\n#H\nd\nc')).toBe('a\nb\n\n#H\nc\nd\n')
  })

  it('should sort a word before its hyphenated extension', () => {
    expect(reorderVocabularyContent('кое-где\nкое\n')).toBe('кое\nкое-где\n')
  })

  it('should be idempotent', () => {
    const inputs = [
      '#A\nzeta\nalpha\n\n#B\nmike\nbravo\n',
      'b\na\n#H\n#H2\nd\nc\n\n\n',
      '',
      '#only header\n',
    ]
    for (const input of inputs) {
      const once = reorderVocabularyContent(input)
      expect(reorderVocabularyContent(once)).toBe(once)
    }
  })

  it('should produce an empty file from blank input', () => {
    expect(reorderVocabularyContent('\n  \n')).toBe('')
  })
})

describe('reorderVocabulary', () => {
  it('should rewrite the file in place and drop the cached copy', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, '#A\nб\nа\n#B\nг\nв\n')
      await loadVocabulary(vocabularyPath)

      await reorderVocabulary(vocabularyPath)

      expect(await readFile(vocabularyPath, 'utf-8')).toBe('#A\nа\nб\n\n#B\nв\nг\n')
      await reorderVocabulary(vocabularyPath)
      expect(await readFile(vocabularyPath, 'utf-8')).toBe('#A\nа\nб\n\n#B\nв\nг\n')
    })
  })
})

describe('addVocabularyWords', () => {
  it('should add new words to the named section and skip known ones', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, '# Термины\nяндекс\n\n# Имена\nвася\n')

      const result = await addVocabularyWords(vocabularyPath, ['  Гугл ', 'ЯНДЕКС', 'гугл'], '# Термины')

      expect(result).toEqual({ added: ['гугл'], skipped: ['яндекс', 'гугл'] })
      expect(await readFile(vocabularyPath, 'utf-8')).toBe('# Термины\nгугл\nяндекс\n\n# Имена\nвася\n')
    })
  })

  it('should create a missing section at the end', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, '# Термины\nяндекс\n')

      await addVocabularyWords(vocabularyPath, ['петя'], 'Имена')

      expect(await readFile(vocabularyPath, 'utf-8')).toBe('# Термины\nяндекс\n\n# Имена\nпетя\n')
    })
  })

  it('should create the file when it does not exist', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      const result = await addVocabularyWords(vocabularyPath, ['слово'])
      expect(result.added).toEqual(['слово'])
      expect(await readFile(vocabularyPath, 'utf-8')).toBe('слово\n')
    })
  })

  it('should make new words visible to the vocabulary stage', async () => {
    await withTempDir(async (dir) => {
      const vocabularyPath = join(dir, 'vocabulary.txt')
      await writeFile(vocabularyPath, '# A\nпривет\n')
      const context = createContext({ config: { vocabularyPath } })
      expect((await processWithVocabulary(['превет'], context)).unknown).toEqual(['превет'])

      await addVocabularyWords(vocabularyPath, ['превет'])

      expect((await processWithVocabulary(['превет'], context)).sureCorrect).toEqual(['превет'])
    })
  })
})

describe('parseVocabulary', () => {
  it('should split two headed sections', () => {
    expect(parseVocabulary('#A\nb\na\n\n#B\nd\nc\n')).toEqual([
      { headers: ['#A'], entries: ['b', 'a'] },
      { headers: ['#B'], entries: ['d', 'c'] },
    ])
  })

  it('should give a header with no entries a section of its own', () => {
    expect(parseVocabulary('#A\n#B\nb\n')).toEqual([
      { headers: ['#A'], entries: [] },
      { headers: ['#B'], entries: ['b'] },
    ])
  })
})
