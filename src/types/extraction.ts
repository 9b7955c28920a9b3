/**
 * One roster slot as published by the standings site. Every label is
 * untrusted free text.
 */
export interface RosterEntry {
  /** Species label, e.g. 'Tauros [Paldean Form - Aqua Breed]' */
  species: string
  teraType?: string
  ability?: string
  item?: string
  moves: readonly string[]
}

/**
 * A move label after resolution.
 */
export interface MoveExtraction {
  /** Label as published */
  raw: string
  /** Canonical id, or null when unresolved */
  id: string | null
  /** Corpus display name, falling back to the raw label */
  name: string
  /** Whether the resolved species can learn the move */
  legal: boolean
}

/**
 * A roster slot after resolution and validation.
 */
export interface PokemonExtraction {
  rawSpecies: string
  /** Corpus display name, falling back to the raw label */
  species: string
  /** Canonical id, or null when the species is unresolved */
  speciesId: string | null
  teraType?: string
  ability?: string
  item?: string
  moves: readonly MoveExtraction[]
  /** Ids of the formats the species is eligible for, sorted */
  validFormats: readonly string[]
  issues: readonly string[]
}

/**
 * Win/loss/tie counts as published. Other fields pass through untouched.
 */
export interface PlayerRecord {
  wins?: number
  losses?: number
  ties?: number
  [field: string]: unknown
}

export interface PlayerExtraction {
  name: string
  /** Two-letter country code parsed from the player label */
  country?: string
  placing?: number
  record: PlayerRecord
  /** Team rendered in the usual text export layout */
  teamText: string
  pokemon: readonly PokemonExtraction[]
  /** Every slot's issues, in slot order */
  issues: readonly string[]
  /** True iff there are no issues */
  isValid: boolean
}

export interface TournamentSummary {
  id: string
  name: string
  /** Date text as shown on the listing, e.g. 'January 1-2, 2025' */
  date: string
  url: string
}

export interface DivisionResult {
  tournament: TournamentSummary
  division: string
  /** Sorted by placing, unplaced players last */
  players: readonly PlayerExtraction[]
}
