/**
 * Options for sequence-ratio comparison.
 */
export interface SequenceRatioOptions {
  /** Whether two null/undefined values should match (default: true) */
  nullMatchesNull?: boolean
}

interface MatchingBlock {
  a: number
  b: number
  size: number
}

type PositionIndex = Map<string, number[]>

function indexPositions(value: string): PositionIndex {
  const index: PositionIndex = new Map()
  for (let j = 0; j < value.length; j++) {
    const char = value[j]
    const positions = index.get(char)
    if (positions) positions.push(j)
    else index.set(char, [j])
  }
  return index
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi]. Ties are broken by
 * the earliest start in `a`, then the earliest start in `b`.
 */
function longestMatch(
  a: string,
  bIndex: PositionIndex,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let bestA = alo
  let bestB = blo
  let bestSize = 0
  let lengths = new Map<number, number>()

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>()
    for (const j of bIndex.get(a[i]) ?? []) {
      if (j < blo) continue
      if (j >= bhi) break
      const k = (lengths.get(j - 1) ?? 0) + 1
      next.set(j, k)
      if (k > bestSize) {
        bestA = i - k + 1
        bestB = j - k + 1
        bestSize = k
      }
    }
    lengths = next
  }

  return { a: bestA, b: bestB, size: bestSize }
}

function countMatches(a: string, b: string, bIndex: PositionIndex): number {
  let matched = 0
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ]

  let range = pending.pop()
  while (range) {
    const [alo, ahi, blo, bhi] = range
    const block = longestMatch(a, bIndex, alo, ahi, blo, bhi)
    if (block.size > 0) {
      matched += block.size
      if (alo < block.a && blo < block.b) {
        pending.push([alo, block.a, blo, block.b])
      }
      if (block.a + block.size < ahi && block.b + block.size < bhi) {
        pending.push([block.a + block.size, ahi, block.b + block.size, bhi])
      }
    }
    range = pending.pop()
  }

  return matched
}

function ratioWithIndex(a: string, b: string, bIndex: PositionIndex): number {
  const total = a.length + b.length
  if (total === 0) return 1
  return (2 * countMatches(a, b, bIndex)) / total
}

/**
 * Ratcliff/Obershelp similarity: twice the number of characters in the
 * recursively found longest common blocks, divided by the combined length.
 *
 * The comparison is case-sensitive and applies no junk heuristics, so the
 * result depends only on the two strings.
 *
 * @example
 * ```typescript
 * sequenceRatio('hidropomp', 'hydropump') // 0.7777...
 * sequenceRatio('abc', 'abc') // 1
 * sequenceRatio('abc', 'xyz') // 0
 * ```
 */
export function sequenceRatio(
  a: unknown,
  b: unknown,
  options: SequenceRatioOptions = {}
): number {
  const { nullMatchesNull = true } = options

  if (a == null && b == null) return nullMatchesNull ? 1 : 0
  if (a == null || b == null) return 0

  const strA = String(a)
  const strB = String(b)
  return ratioWithIndex(strA, strB, indexPositions(strB))
}

/**
 * Options for closest-match search.
 */
export interface ClosestMatchOptions {
  /** Minimum similarity a candidate must reach (default: 0.72) */
  cutoff?: number
}

/**
 * Best candidate found by {@link closestMatch}.
 */
export interface ClosestMatch {
  /** The matching candidate */
  value: string
  /** Its similarity to the query */
  score: number
}

export const DEFAULT_FUZZY_CUTOFF = 0.72

/**
 * Finds the candidate most similar to `query`.
 *
 * Candidates scoring below the cutoff are ignored. Among equal scores the
 * lexicographically greatest candidate wins, so the result does not depend on
 * candidate order.
 *
 * @returns The best match, or null when nothing clears the cutoff
 */
export function closestMatch(
  query: string,
  candidates: Iterable<string>,
  options: ClosestMatchOptions = {}
): ClosestMatch | null {
  const { cutoff = DEFAULT_FUZZY_CUTOFF } = options
  const queryIndex = indexPositions(query)
  let best: ClosestMatch | null = null

  for (const candidate of candidates) {
    // Upper bound on the ratio from lengths alone
    const total = candidate.length + query.length
    if (total > 0) {
      const bound = (2 * Math.min(candidate.length, query.length)) / total
      if (bound < cutoff) continue
      if (best && bound < best.score) continue
    }

    const score = ratioWithIndex(candidate, query, queryIndex)
    if (score < cutoff) continue
    if (
      !best ||
      score > best.score ||
      (score === best.score && candidate > best.value)
    ) {
      best = { value: candidate, score }
    }
  }

  return best
}
