// Library entry — engine + extraction + types
export type {
  BackendConfiguration,
  BackendContext,
  CacheEntry,
  CacheStatus,
  CacheStore,
  CascadeReport,
  OracleResult,
  SpellerClient,
  SpellerProvider,
  SpellerSettings,
  SpellerVerdict,
  TypoFinding,
  TyposBackend,
} from './types.js'
export { ConfigurationError, InvalidArgumentError, RemoteUnavailableError } from './errors.js'
export { createConsoleLogger, createSilentLogger, levelFromVerbosity } from './logger.js'
export type { Logger, LogLevel } from './logger.js'
export {
  createBackendConfiguration,
  resolveRunOptions,
  DEFAULT_WORDS_CHUNK_SIZE,
} from './config.js'
export type { BackendConfigurationInput, RunOptions } from './config.js'
export { chunks, flat } from './engine/chunks.js'
export { extractWords } from './engine/words.js'
export type { WordNormalizerOptions, TargetScript } from './engine/words.js'
export { loadVocabulary, invalidateVocabularyCache, processWithVocabulary } from './engine/vocabulary.js'
export { reorderVocabulary, addVocabularyWords, reorderVocabularyContent } from './engine/vocabularyFile.js'
export { SqliteCacheStore, openCacheStore, createNullCacheStore, processWithCache } from './engine/cache.js'
export { createSpellerClient, processWithSpeller } from './engine/speller.js'
export { createYandexSpellerClient } from './engine/yandexSpeller.js'
export { createLanguageToolClient } from './engine/languagetool.js'
export { classifyWords, fetchTyposInfo, DEFAULT_BACKENDS } from './engine/cascade.js'
export { Extractor } from './extraction/extractor.js'
export { TaskPool } from './extraction/pool.js'
