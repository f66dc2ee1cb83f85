/**
 * Bounded-size batching, used for extraction batches and speller requests.
 */

import { InvalidArgumentError } from '../errors.js'

/**
 * Yield contiguous slices of at most `size` items, in order.
 * The last slice may be shorter; an empty input yields nothing.
 */
export function* chunks<T>(items: readonly T[], size: number): Generator<T[]> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError(`Chunk size must be a positive integer, got ${size}`)
  }
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size)
  }
}

export function flat<T>(nested: Iterable<readonly T[]>): T[] {
  const result: T[] = []
  for (const part of nested) result.push(...part)
  return result
}
