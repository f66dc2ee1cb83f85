/**
 * Extraction stage: raw strings from every matching file under a path.
 *
 * Files are split into batches and read on a bounded pool; each batch returns
 * a set of strings and the sets are merged, so batch completion order does not
 * matter. No format-specific parsing: every non-blank line is one raw string.
 */

import type { Logger } from '../logger.js'
import { chunks } from '../engine/chunks.js'
import { findFiles, readTextFile, type FileDiscoveryOptions } from './files.js'
import { TaskPool } from './pool.js'

export interface ExtractorOptions extends FileDiscoveryOptions {
  /** Concurrent batches */
  processes: number
}

export function extractRawStrings(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
}

export class Extractor {
  private readonly pool: TaskPool

  constructor(
    private readonly options: ExtractorOptions,
    private readonly logger: Logger,
  ) {
    this.pool = new TaskPool(options.processes)
  }

  private async extractFromFiles(filePaths: readonly string[]): Promise<Set<string>> {
    const strings = new Set<string>()
    for (const filePath of filePaths) {
      this.logger.debug(`Start reading ${filePath}...`)
      let content: string | null
      try {
        content = await readTextFile(filePath, this.logger)
      } catch (error) {
        this.logger.warn(`Skipping unreadable file ${filePath}:`, error instanceof Error ? error.message : error)
        continue
      }
      if (content === null) continue
      for (const raw of extractRawStrings(content)) strings.add(raw)
    }
    return strings
  }

  /** Deduplicated raw strings from every file found under `path` */
  async extractFromPath(path: string): Promise<string[]> {
    const files = await findFiles(path, this.options)
    if (files.length === 0) {
      this.logger.info(`No files with extensions ${this.options.extensions.join(', ')} under ${path}`)
      return []
    }

    const batchSize = Math.ceil(files.length / this.pool.size)
    const batches = [...chunks(files, batchSize)]
    this.logger.info(`Extracting from ${files.length} files in ${batches.length} batches`)

    const results = await this.pool.map(batches, (batch) => this.extractFromFiles(batch))
    const merged = new Set<string>()
    for (const result of results) {
      for (const raw of result) merged.add(raw)
    }
    return [...merged]
  }
}
