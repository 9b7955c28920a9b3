/**
 * Nonstandard status a record may carry in the reference corpus.
 * Unrecognized values are kept as plain strings.
 */
export type NonstandardStatus = 'Past' | 'Future' | 'Unobtainable' | (string & {})

/**
 * A species (or forme) in the reference corpus.
 */
export interface SpeciesRecord {
  /** Canonical identifier, e.g. 'slowbrogalar' */
  id: string
  /** Display name, e.g. 'Slowbro-Galar' */
  name: string
  /** Name of the base species for forme records */
  baseSpecies?: string
  /** Forme label, e.g. 'Galar' */
  forme?: string
  /** Category tags such as 'Paradox' or 'Mythical' */
  tags: readonly string[]
  /** Cosmetic variants sharing this record, e.g. 'Vivillon-Fancy' */
  cosmeticFormes: readonly string[]
  isNonstandard: NonstandardStatus | null
}

/**
 * A move, item or ability.
 */
export interface NamedRecord {
  id: string
  name: string
  /** Alternative spellings declared by the corpus */
  aliases: readonly string[]
}

/**
 * A playable format with its banlist.
 */
export interface FormatRecord {
  /** Declared id, or the normalized name when none is declared */
  id: string
  name: string
  /** 'doubles', 'singles', ... when the format declares one */
  gameType?: string
  /** Banned species ids, names or category tags, as published */
  banlist: readonly string[]
}

/**
 * Per-species legality metadata from the formats-data resource.
 */
export interface FormatSpeciesMeta {
  isNonstandard: NonstandardStatus | null
  tier?: string
}

export type AliasCategory = 'species' | 'moves' | 'items' | 'abilities'

/**
 * Normalized token → canonical id, one map per category.
 */
export type AliasIndex = Readonly<Record<AliasCategory, ReadonlyMap<string, string>>>
