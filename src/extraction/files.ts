/**
 * File discovery and decoding for the extraction stage.
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import { basename, extname, join, relative, sep } from 'node:path'
import type { Logger } from '../logger.js'

export interface FileDiscoveryOptions {
  /** Extensions without the leading dot */
  extensions: readonly string[]
  /** Directory or file names skipped wherever they appear in a path */
  exclude: readonly string[]
  /** Include dot-files and files under dot-directories */
  processDots: boolean
}

function hasDotSegment(relativePath: string): boolean {
  return relativePath.split(sep).some((segment) => segment.startsWith('.') && segment !== '.')
}

function matchesExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = extname(filePath).slice(1)
  return ext !== '' && extensions.includes(ext)
}

/**
 * All files under `root` (or `root` itself when it is a file) with one of the
 * given extensions, sorted for stable batching.
 */
export async function findFiles(root: string, options: FileDiscoveryOptions): Promise<string[]> {
  const rootStat = await stat(root)
  if (!rootStat.isDirectory()) {
    if (!matchesExtension(root, options.extensions)) return []
    if (!options.processDots && basename(root).startsWith('.')) return []
    return [root]
  }

  const exclude = new Set(options.exclude)
  const found: string[] = []

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true })
    for (const entry of entries) {
      if (exclude.has(entry.name)) continue
      const fullPath = join(dir, entry.name)
      if (!options.processDots && hasDotSegment(relative(root, fullPath))) continue
      if (entry.isDirectory()) {
        await walk(fullPath)
      } else if (entry.isFile() && matchesExtension(entry.name, options.extensions)) {
        found.push(fullPath)
      }
    }
  }

  await walk(root)
  return found.sort()
}

const utf8 = new TextDecoder('utf-8', { fatal: true })
const cp1251 = new TextDecoder('windows-1251', { fatal: true })

/**
 * Read a text file as UTF-8, falling back to windows-1251.
 * Returns null when neither decodes.
 */
export async function readTextFile(filePath: string, logger: Logger): Promise<string | null> {
  const raw = await readFile(filePath)
  try {
    return utf8.decode(raw)
  } catch {
    logger.debug(`${filePath} is not UTF-8, trying windows-1251`)
  }
  try {
    return cp1251.decode(raw)
  } catch {
    logger.debug(`Skipping ${filePath}: encoding not recognized`)
    return null
  }
}
