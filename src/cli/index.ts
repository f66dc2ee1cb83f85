import { Command } from 'commander'
import { ConfigurationError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { CacheStore, SpellerClient } from '../types.js'
import { createCacheCommand } from './commands/cache.js'
import { createCheckCommand } from './commands/check.js'
import { createVocabularyCommand } from './commands/vocabulary.js'

export const VERSION = '0.1.0'

/** Seams the entry point fills with real implementations and tests with fakes */
export interface CliDependencies {
  logger?: Logger
  speller?: SpellerClient
  cache?: CacheStore
  output?: (line: string) => void
  setExitCode?: (code: number) => void
}

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command()

  program
    .name('spellsweep')
    .description('Find typos in the natural-language text of a source tree')
    .version(VERSION)
    .enablePositionalOptions()

  program.addCommand(createCheckCommand(deps), { isDefault: true })
  program.addCommand(createVocabularyCommand(deps))
  program.addCommand(createCacheCommand(deps))

  return program
}

/** Exit code for an error that escaped a command: 2 for configuration, 1 otherwise */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? 2 : 1
}
