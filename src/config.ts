/**
 * Run configuration and its validation.
 * Everything is validated once, up front; a bad value is a ConfigurationError
 * before any file is read.
 */

import { existsSync, statSync } from 'node:fs'
import { availableParallelism } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { BackendConfiguration, SpellerProvider } from './types.js'
import type { WordNormalizerOptions } from './engine/words.js'

export const DEFAULT_WORDS_CHUNK_SIZE = 100
export const DEFAULT_VOCABULARY_FILENAME = 'vocabulary.txt'
export const DEFAULT_CACHE_FILENAME = '.spellsweep.db'
export const DEFAULT_EXCLUDE = ['node_modules', 'dist', 'build', 'coverage', 'venv']
export const DEFAULT_EXTENSIONS = ['py', 'pyi', 'md', 'html', 'js', 'ts', 'tsx', 'po']
export const DEFAULT_SPELLER_TIMEOUT = 30_000

const DEFAULT_LANGUAGES: Record<SpellerProvider, string> = {
  yandex: 'ru,en',
  languagetool: 'ru-RU',
}

const positiveInt = z.number().int().positive()

const backendConfigurationSchema = z.object({
  vocabularyPath: z.string().min(1).optional(),
  cachePath: z.string().min(1).optional(),
  spellerChunkSize: positiveInt.default(DEFAULT_WORDS_CHUNK_SIZE),
  speller: z
    .object({
      provider: z.enum(['yandex', 'languagetool']).default('yandex'),
      language: z.string().min(1).optional(),
      timeoutMs: positiveInt.default(DEFAULT_SPELLER_TIMEOUT),
    })
    .default({}),
})

export type BackendConfigurationInput = z.input<typeof backendConfigurationSchema>

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ')
}

/** Validate and freeze the configuration every cascade stage reads */
export function createBackendConfiguration(input: BackendConfigurationInput = {}): BackendConfiguration {
  const parsed = backendConfigurationSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid backend configuration: ${describeIssues(parsed.error)}`)
  }
  const { speller, ...rest } = parsed.data
  return Object.freeze({
    ...rest,
    speller: Object.freeze({
      provider: speller.provider,
      language: speller.language ?? DEFAULT_LANGUAGES[speller.provider],
      timeoutMs: speller.timeoutMs,
    }),
  })
}

// --- Full run options (CLI) ---

export interface RunOptions {
  /** File or directory to scan */
  path: string
  /** Directory next to which default vocabulary and cache live */
  baseDir: string
  exclude: string[]
  extensions: string[]
  processDots: boolean
  processes: number
  normalizer: WordNormalizerOptions
  backend: BackendConfiguration
  verbosity: number
  exitZero: boolean
  reorderVocabulary: boolean
}

/** Raw CLI values, as commander hands them over */
export interface CheckCommandInput {
  path?: string
  vocabularyPath?: string
  cachePath?: string
  cache?: boolean
  exclude?: string[]
  extensions?: string[]
  processDots?: boolean
  processes?: string
  chunkSize?: string
  speller?: string
  language?: string
  timeout?: string
  minWordLength?: string
  anyScript?: boolean
  script?: string
  splitCompounds?: boolean
  verbosity?: number
  exitZero?: boolean
  reorderVocabulary?: boolean
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`--${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

const providerSchema = z.enum(['yandex', 'languagetool'])
const scriptSchema = z.enum(['cyrillic', 'latin'])

export function resolveRunOptions(
  input: CheckCommandInput,
  env: NodeJS.ProcessEnv = process.env,
): RunOptions {
  const path = resolve(input.path ?? '.')
  if (!existsSync(path)) {
    throw new ConfigurationError(`Path does not exist: ${path}`)
  }
  const baseDir = statSync(path).isDirectory() ? path : dirname(path)

  const rawProvider = input.speller ?? env.SPELLSWEEP_SPELLER ?? 'yandex'
  const provider = providerSchema.safeParse(rawProvider)
  if (!provider.success) {
    throw new ConfigurationError(`Unknown speller "${rawProvider}" (expected yandex or languagetool)`)
  }

  const script = scriptSchema.safeParse(input.script ?? 'cyrillic')
  if (!script.success) {
    throw new ConfigurationError(`Unknown script "${input.script}" (expected cyrillic or latin)`)
  }

  const backend = createBackendConfiguration({
    vocabularyPath: resolve(input.vocabularyPath ?? join(baseDir, DEFAULT_VOCABULARY_FILENAME)),
    cachePath: input.cache === false
      ? undefined
      : resolve(input.cachePath ?? join(baseDir, DEFAULT_CACHE_FILENAME)),
    spellerChunkSize: parseInteger('chunk-size', input.chunkSize),
    speller: {
      provider: provider.data,
      language: input.language,
      timeoutMs: parseInteger('timeout', input.timeout),
    },
  })

  return {
    path,
    baseDir,
    exclude: input.exclude ?? DEFAULT_EXCLUDE,
    extensions: (input.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.replace(/^\./, '')),
    processDots: input.processDots ?? false,
    processes: parseInteger('processes', input.processes) ?? availableParallelism(),
    normalizer: {
      minWordLength: parseInteger('min-word-length', input.minWordLength),
      onlyTargetScript: !input.anyScript,
      targetScript: script.data,
      splitCompounds: input.splitCompounds ?? false,
    },
    backend,
    verbosity: input.verbosity ?? 0,
    exitZero: input.exitZero ?? false,
    reorderVocabulary: input.reorderVocabulary ?? false,
  }
}
