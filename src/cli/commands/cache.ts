import { resolve } from 'node:path'
import { Command } from 'commander'
import { DEFAULT_CACHE_FILENAME } from '../../config.js'
import { SqliteCacheStore } from '../../engine/cache.js'
import type { CliDependencies } from '../index.js'

export function createCacheCommand(deps: CliDependencies = {}): Command {
  const output = deps.output ?? console.log

  const cacheCommand = new Command('cache')
    .description('Speller cache operations')

  cacheCommand
    .command('stats')
    .description('Show how many cached words are correct and how many are typos')
    .option('--cache-path <file>', 'SQLite cache file', DEFAULT_CACHE_FILENAME)
    .action((options: { cachePath: string }) => {
      const store = new SqliteCacheStore(resolve(options.cachePath))
      try {
        const counts = store.countByStatus()
        output(`Cache: ${store.path}`)
        output(`  correct: ${counts.correct}`)
        output(`  typo:    ${counts.typo}`)
      } finally {
        store.close()
      }
    })

  return cacheCommand
}
