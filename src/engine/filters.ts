/**
 * Filter pieces of raw text that are not natural language before they are
 * split into words, so a URL or an e-mail never turns into "https" + "example".
 */

/** Patterns that indicate non-natural-language content */
const SKIP_PATTERNS = [
  /^https?:\/\//i,                // URLs
  /^mailto:/i,                    // Email links
  /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, // Emails
  /^[#@]\S/,                      // Hashtags, mentions, CSS colors
  /^\d+[\d.,]*$/,                 // Numbers
  /^\d+[a-zA-Zа-яА-ЯёЁ]+$/,       // Numbers with units (80px, 24h, 5кг)
  /^[a-z0-9-]+(\.[a-z0-9-]+)*\.[a-z]{2,}\/?$/i, // Domain names
]

/** Punctuation a piece may be wrapped in ("(https://…)", "<a@b.io>,") */
const WRAPPING_PUNCTUATION = /^[("'<[«]+|[)"'>\]».,;:!?]+$/g

export function isNonNaturalText(piece: string): boolean {
  const bare = piece.replace(WRAPPING_PUNCTUATION, '')
  if (!bare) return false
  return SKIP_PATTERNS.some((pattern) => pattern.test(bare))
}

/**
 * Remove whitespace-delimited pieces matching SKIP_PATTERNS.
 * The remaining pieces are re-joined with single spaces.
 */
export function stripNonNaturalText(raw: string): string {
  return raw
    .split(/\s+/)
    .filter((piece) => piece && !isNonNaturalText(piece))
    .join(' ')
}
