import type {
  AliasIndex,
  FormatRecord,
  FormatSpeciesMeta,
  SpeciesRecord,
} from '../types/dataset.js'
import { normalizeId } from './normalizers/identifier.js'

/**
 * Corpus data the validator reads.
 */
export interface LegalityCorpus {
  readonly aliases: AliasIndex
  readonly species: ReadonlyMap<string, SpeciesRecord>
  readonly learnsets: ReadonlyMap<string, ReadonlySet<string>>
  readonly formats: readonly FormatRecord[]
  readonly formatsData: ReadonlyMap<string, FormatSpeciesMeta>
}

/** Nonstandard statuses that make a species ineligible everywhere */
export const UNRELEASED_STATUSES: ReadonlySet<string> = new Set([
  'Past',
  'Future',
  'Unobtainable',
])

/** Banlist entries that ban every species carrying the tag */
export const CATEGORY_TAGS: ReadonlySet<string> = new Set([
  'Restricted Legendary',
  'Sub-Legendary',
  'Mythical',
  'Paradox',
  'Ultra Beast',
])

/**
 * Learnset membership and format eligibility checks.
 */
export class LegalityValidator {
  constructor(private readonly corpus: LegalityCorpus) {}

  /**
   * Whether the species learns the move, falling back to the learnset of its
   * base species for formes that have none of their own.
   */
  canLearn(speciesId: string, moveId: string): boolean {
    if (this.corpus.learnsets.get(speciesId)?.has(moveId)) return true

    const base = this.corpus.species.get(speciesId)?.baseSpecies
    if (!base) return false
    const baseId = this.corpus.aliases.species.get(normalizeId(base))
    if (!baseId) return false
    return this.corpus.learnsets.get(baseId)?.has(moveId) ?? false
  }

  /**
   * Ids of the formats the species may be used in, sorted.
   *
   * @param restrictToDoublesVgc - Only consider VGC formats (default: true)
   */
  validFormats(speciesId: string, restrictToDoublesVgc = true): string[] {
    const record = this.corpus.species.get(speciesId)
    const meta = this.corpus.formatsData.get(speciesId)
    if (isUnreleased(record?.isNonstandard) || isUnreleased(meta?.isNonstandard)) {
      return []
    }

    const tags = new Set(record?.tags ?? [])
    const eligible: string[] = []

    for (const format of this.corpus.formats) {
      if (restrictToDoublesVgc && !format.name.toLowerCase().includes('vgc')) continue
      if (format.gameType && format.gameType !== 'doubles') continue
      if (isBanned(speciesId, tags, format.banlist)) continue
      eligible.push(format.id)
    }

    return eligible.sort()
  }
}

function isUnreleased(status: string | null | undefined): boolean {
  return status != null && UNRELEASED_STATUSES.has(status)
}

function isBanned(
  speciesId: string,
  tags: ReadonlySet<string>,
  banlist: readonly string[]
): boolean {
  return banlist.some(
    (entry) =>
      normalizeId(entry) === speciesId ||
      (CATEGORY_TAGS.has(entry) && tags.has(entry))
  )
}
