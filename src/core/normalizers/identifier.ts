/**
 * Tokens dropped by {@link normalizeMoveLabel}. Rosters often qualify a move
 * with the battle mode it was published for ("Electro Shot (Singles)").
 */
export const MOVE_STOP_WORDS: ReadonlySet<string> = new Set([
  'singles',
  'doubles',
  'triples',
  'battle',
  'mode',
  'form',
  'forms',
])

/**
 * Folds a label to the canonical identifier form used by the reference corpus:
 * compatibility-decomposed, ASCII only, alphanumerics only, lowercase.
 *
 * Total and idempotent. Null, undefined and empty input yield the empty token.
 *
 * @example
 * ```typescript
 * normalizeId('Flutter Mane') // 'fluttermane'
 * normalizeId('Farfetch’d') // 'farfetchd'
 * normalizeId('Flabébé') // 'flabebe'
 * normalizeId(null) // ''
 * ```
 */
export function normalizeId(value: string | null | undefined): string {
  if (value == null) return ''
  return value
    .normalize('NFKD')
    .replace(/’/g, "'")
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[^A-Za-z0-9]/g, '')
    .toLowerCase()
}

/**
 * Normalizer for free-text move labels. Parenthesized qualifiers and mode
 * words are dropped before the remaining words are concatenated.
 *
 * @example
 * ```typescript
 * normalizeMoveLabel('Icy Wind (Doubles)') // 'icywind'
 * normalizeMoveLabel('U-turn') // 'uturn'
 * normalizeMoveLabel("King's Shield") // 'kingsshield'
 * ```
 */
export function normalizeMoveLabel(value: string | null | undefined): string {
  if (value == null) return ''
  const spaced = value
    .normalize('NFKD')
    .toLowerCase()
    .replace(/\(.*?\)/g, ' ')
    .replace(/["'[\]()\-_`]/g, ' ')
    .replace(/[^a-z0-9\s]/g, ' ')

  return spaced
    .split(/\s+/)
    .filter((token) => token.length > 0 && !MOVE_STOP_WORDS.has(token))
    .join('')
}
