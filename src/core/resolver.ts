import type { Logger } from 'pino'
import type { AliasIndex } from '../types/dataset.js'
import { closestMatch, DEFAULT_FUZZY_CUTOFF } from './comparators.js'
import { normalizeId, normalizeMoveLabel } from './normalizers/identifier.js'
import { normalizeSpeciesLabel, parseSpeciesLabel } from './species/label-parser.js'
import { requireInRange } from '../utils/errors.js'
import { moduleLogger } from '../utils/logger.js'

/**
 * Anything carrying an alias index can back a resolver.
 */
export interface ResolverCorpus {
  readonly aliases: AliasIndex
}

/**
 * Options for the resolver.
 */
export interface ResolverOptions {
  /** Minimum similarity for approximate matches (default: 0.72) */
  fuzzyCutoff?: number
  logger?: Logger
}

/**
 * How a species label was resolved.
 * - `exact`: the rewritten `Base-Forme` candidate matched
 * - `raw`: the label itself matched
 * - `base`: only the base name matched
 * - `fuzzy`: approximate match against every alias
 */
export type SpeciesResolutionMethod = 'exact' | 'raw' | 'base' | 'fuzzy'

export interface SpeciesResolution {
  id: string
  method: SpeciesResolutionMethod
  /** Normalized token that produced the hit */
  candidate: string
}

const PARENTHETICAL = /\(.*?\)/g

/**
 * Candidate spellings tried for a move label, in lookup order.
 */
export function moveCandidates(rawLabel: string): string[] {
  const cleaned = rawLabel.trim()
  const candidates = [cleaned, cleaned.replace(PARENTHETICAL, '').trim()]
  const words = cleaned.replace(/-/g, ' ').split(/\s+/).filter(Boolean)
  if (words.length > 1) candidates.push(words.slice(0, -1).join(' '))
  return [...new Set(candidates.filter((candidate) => candidate.length > 0))]
}

/**
 * Resolves free-text roster labels to canonical ids.
 *
 * Exact alias lookups are tried first. Species and moves fall back to an
 * approximate match over every alias token of their category; items and
 * abilities never do.
 *
 * @example
 * ```typescript
 * const resolver = new Resolver(dataset)
 * resolver.resolveSpecies('Slowbro [Galarian Form]') // 'slowbrogalar'
 * resolver.resolveMove('Shdow Ball') // 'shadowball'
 * ```
 */
export class Resolver {
  private readonly aliases: AliasIndex
  private readonly fuzzyCutoff: number
  private readonly logger: Logger

  constructor(corpus: ResolverCorpus, options: ResolverOptions = {}) {
    this.aliases = corpus.aliases
    this.fuzzyCutoff = requireInRange(
      options.fuzzyCutoff ?? DEFAULT_FUZZY_CUTOFF,
      0,
      1,
      'fuzzyCutoff'
    )
    this.logger = options.logger ?? moduleLogger('resolver')
  }

  resolveSpecies(rawLabel: string): string | null {
    return this.resolveSpeciesDetailed(rawLabel)?.id ?? null
  }

  resolveSpeciesDetailed(rawLabel: string): SpeciesResolution | null {
    const species = this.aliases.species
    const lookups: Array<[SpeciesResolutionMethod, string]> = [
      ['exact', normalizeId(normalizeSpeciesLabel(rawLabel))],
      ['raw', normalizeId(rawLabel)],
      ['base', normalizeId(parseSpeciesLabel(rawLabel).base)],
    ]

    for (const [method, token] of lookups) {
      const id = token ? species.get(token) : undefined
      if (id) return { id, method, candidate: token }
    }

    const query = lookups[0][1] || lookups[2][1]
    if (!query) return null
    const match = closestMatch(query, species.keys(), { cutoff: this.fuzzyCutoff })
    const id = match ? species.get(match.value) : undefined
    if (!match || !id) {
      this.logger.debug({ label: rawLabel, query }, 'species unresolved')
      return null
    }

    this.logger.debug(
      { label: rawLabel, alias: match.value, score: match.score },
      'species fuzzy matched'
    )
    return { id, method: 'fuzzy', candidate: match.value }
  }

  resolveMove(rawLabel: string): string | null {
    const moves = this.aliases.moves
    const tokens = moveCandidates(rawLabel)
      .map(normalizeMoveLabel)
      .filter((token) => token.length > 0)

    for (const token of tokens) {
      const id = moves.get(token)
      if (id) return id
    }

    const fallback = moves.get(normalizeId(rawLabel))
    if (fallback) return fallback

    const seed = tokens.reduce(
      (longest, token) => (token.length > longest.length ? token : longest),
      ''
    )
    if (!seed) return null

    const match = closestMatch(seed, moves.keys(), { cutoff: this.fuzzyCutoff })
    if (!match) {
      this.logger.debug({ label: rawLabel, query: seed }, 'move unresolved')
      return null
    }
    this.logger.debug(
      { label: rawLabel, alias: match.value, score: match.score },
      'move fuzzy matched'
    )
    return moves.get(match.value) ?? null
  }

  resolveItem(rawLabel: string): string | null {
    return this.aliases.items.get(normalizeId(rawLabel)) ?? null
  }

  resolveAbility(rawLabel: string): string | null {
    return this.aliases.abilities.get(normalizeId(rawLabel)) ?? null
  }
}
