/**
 * Typo classification cascade.
 *
 * Words go through the stages in a fixed order, one outer chunk at a time.
 * Each stage only sees what every earlier stage left unknown, so a word is
 * resolved by at most one stage.
 */

import type {
  BackendContext,
  CascadeReport,
  TypoFinding,
  TyposBackend,
} from '../types.js'
import { cacheBackend } from './cache.js'
import { chunks } from './chunks.js'
import { spellerBackend } from './speller.js'
import { vocabularyBackend } from './vocabulary.js'

/** Cheapest first: vocabulary file, then the local cache, then the remote speller */
export const DEFAULT_BACKENDS: readonly TyposBackend[] = [
  vocabularyBackend,
  cacheBackend,
  spellerBackend,
]

interface StageOutcome {
  typos: TypoFinding[]
  unresolved: string[]
  resolvedBy: Record<string, number>
}

async function runStages(
  residue: readonly string[],
  stages: readonly TyposBackend[],
  context: BackendContext,
): Promise<StageOutcome> {
  const [stage, ...rest] = stages
  if (!stage || residue.length === 0) {
    return { typos: [], unresolved: [...residue], resolvedBy: {} }
  }

  const result = await stage.process(residue, context)
  const next = await runStages(result.unknown, rest, context)
  return {
    typos: [...result.sureWithTypoInfo, ...next.typos],
    unresolved: next.unresolved,
    resolvedBy: {
      ...next.resolvedBy,
      [stage.name]: result.sureCorrect.length + result.sureWithTypoInfo.length,
    },
  }
}

/**
 * Classify candidate words and report typos, unresolved words and
 * how many words each stage resolved.
 */
export async function classifyWords(
  words: Iterable<string>,
  context: BackendContext,
  backends: readonly TyposBackend[] = DEFAULT_BACKENDS,
): Promise<CascadeReport> {
  const unique = [...new Set(words)]
  const report: CascadeReport = { typos: [], unresolved: [], resolvedBy: {} }
  for (const backend of backends) report.resolvedBy[backend.name] = 0

  for (const chunk of chunks(unique, context.config.spellerChunkSize)) {
    const outcome = await runStages(chunk, backends, context)
    report.typos.push(...outcome.typos)
    report.unresolved.push(...outcome.unresolved)
    for (const [name, resolved] of Object.entries(outcome.resolvedBy)) {
      report.resolvedBy[name] = (report.resolvedBy[name] ?? 0) + resolved
    }
  }

  context.logger.debug('Resolved words by stage:', report.resolvedBy)
  if (report.unresolved.length > 0) {
    context.logger.warn(`${report.unresolved.length} words could not be classified and were not checked`)
  }
  return report
}

/** Typos only, in chunk-then-stage order */
export async function fetchTyposInfo(
  words: Iterable<string>,
  context: BackendContext,
  backends: readonly TyposBackend[] = DEFAULT_BACKENDS,
): Promise<TypoFinding[]> {
  const report = await classifyWords(words, context, backends)
  return report.typos
}
