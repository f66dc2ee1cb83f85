import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { Command } from 'commander'
import { DEFAULT_VOCABULARY_FILENAME } from '../../config.js'
import { ConfigurationError } from '../../errors.js'
import { addVocabularyWords, reorderVocabulary } from '../../engine/vocabularyFile.js'
import type { CliDependencies } from '../index.js'

export function createVocabularyCommand(deps: CliDependencies = {}): Command {
  const output = deps.output ?? console.log

  const vocabularyCommand = new Command('vocabulary')
    .description('Vocabulary file maintenance')

  vocabularyCommand
    .command('reorder')
    .description('Sort words inside every section, keeping section headers on top')
    .argument('[file]', 'vocabulary file', DEFAULT_VOCABULARY_FILENAME)
    .action(async (file: string) => {
      const vocabularyPath = resolve(file)
      if (!existsSync(vocabularyPath)) {
        throw new ConfigurationError(`Vocabulary file not found: ${vocabularyPath}`)
      }
      await reorderVocabulary(vocabularyPath)
      output(`Reordered ${vocabularyPath}`)
    })

  vocabularyCommand
    .command('add')
    .description('Add words to the vocabulary (lowercased, duplicates skipped)')
    .argument('<words...>', 'words to add')
    .option('--file <file>', 'vocabulary file', DEFAULT_VOCABULARY_FILENAME)
    .option('--section <name>', 'section header to add the words under (created when missing)')
    .action(async (words: string[], options: { file: string; section?: string }) => {
      const vocabularyPath = resolve(options.file)
      const { added, skipped } = await addVocabularyWords(vocabularyPath, words, options.section)
      output(`Added ${added.length} words, skipped ${skipped.length} already known`)
    })

  return vocabularyCommand
}
