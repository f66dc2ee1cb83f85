/**
 * `spellsweep check [path]`: find typos and print them, one per line.
 * Exit code 1 when typos were found (unless --exit-zero).
 */

import { existsSync } from 'node:fs'
import { Command } from 'commander'
import { resolveRunOptions, type CheckCommandInput } from '../../config.js'
import { openCacheStore } from '../../engine/cache.js'
import { classifyWords } from '../../engine/cascade.js'
import { createSpellerClient } from '../../engine/speller.js'
import { reorderVocabulary } from '../../engine/vocabularyFile.js'
import { extractWords } from '../../engine/words.js'
import { Extractor } from '../../extraction/extractor.js'
import { createConsoleLogger, levelFromVerbosity } from '../../logger.js'
import type { TypoFinding } from '../../types.js'
import type { CliDependencies } from '../index.js'

export function formatFinding(finding: TypoFinding): string {
  return finding.possibleOptions.length > 0
    ? `${finding.original}: ${finding.possibleOptions.join(', ')}`
    : finding.original
}

/** Run one check and return the process exit code */
export async function runCheck(input: CheckCommandInput, deps: CliDependencies = {}): Promise<number> {
  const options = resolveRunOptions(input)
  const logger = deps.logger ?? createConsoleLogger({ level: levelFromVerbosity(options.verbosity) })
  const output = deps.output ?? console.log

  logger.debug('Starting with following parameters:', options)

  const extractor = new Extractor(
    {
      extensions: options.extensions,
      exclude: options.exclude,
      processDots: options.processDots,
      processes: options.processes,
    },
    logger.child('extract'),
  )
  const rawStrings = await extractor.extractFromPath(options.path)
  const words = extractWords(rawStrings, options.normalizer)
  logger.info(`${rawStrings.length} raw strings, ${words.length} candidate words`)

  const config = options.backend
  const cache = deps.cache ?? openCacheStore(config.cachePath)
  const speller = deps.speller ?? createSpellerClient(config.speller)
  let typos: TypoFinding[]
  try {
    const report = await classifyWords(words, { config, logger, cache, speller })
    typos = report.typos
  } finally {
    cache.close()
  }

  const { vocabularyPath } = config
  if (options.reorderVocabulary && vocabularyPath !== undefined && existsSync(vocabularyPath)) {
    await reorderVocabulary(vocabularyPath)
    logger.info(`Reordered ${vocabularyPath}`)
  }

  for (const typo of typos) output(formatFinding(typo))
  return typos.length > 0 && !options.exitZero ? 1 : 0
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...value.split(',').map((part) => part.trim()).filter(Boolean)]
}

export function createCheckCommand(deps: CliDependencies = {}): Command {
  return new Command('check')
    .description('Find typos in the natural-language text of a file or directory')
    .argument('[path]', 'file or directory to scan', '.')
    .option('--vocabulary-path <file>', 'vocabulary of always-correct words (default: <path>/vocabulary.txt)')
    .option('--cache-path <file>', 'SQLite cache of speller verdicts (default: <path>/.spellsweep.db)')
    .option('--no-cache', 'do not read or write the cache')
    .option('--exclude <names>', 'comma-separated directory or file names to skip (repeatable)', collect)
    .option('--extensions <exts>', 'comma-separated file extensions to scan (repeatable)', collect)
    .option('--process-dots', 'also scan dot-files and dot-directories')
    .option('--processes <n>', 'concurrent extraction batches (default: CPU count)')
    .option('--chunk-size <n>', 'words per speller request')
    .option('--speller <name>', 'remote speller: yandex or languagetool (env: SPELLSWEEP_SPELLER)')
    .option('--language <code>', 'language passed to the speller')
    .option('--timeout <ms>', 'speller request timeout')
    .option('--min-word-length <n>', 'shortest word checked')
    .option('--script <name>', 'alphabet of checked words: cyrillic or latin')
    .option('--any-script', 'check words in any alphabet')
    .option('--split-compounds', 'split hyphenated and snake_case words')
    .option('-v, --verbosity', 'more logging (repeat for debug)', increaseVerbosity, 0)
    .option('--exit-zero', 'exit with 0 even when typos were found')
    .option('--reorder-vocabulary', 'sort the vocabulary file after the check')
    .action(async (path: string, options: Omit<CheckCommandInput, 'path'>) => {
      const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code })
      setExitCode(await runCheck({ ...options, path }, deps))
    })
}
