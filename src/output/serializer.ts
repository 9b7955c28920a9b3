import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { STANDINGS_BASE_URL } from '../standings/listing-parser.js'
import type {
  DivisionResult,
  MoveExtraction,
  PlayerRecord,
  PokemonExtraction,
} from '../types/extraction.js'

export interface SerializedPokemon {
  rawSpecies: string
  species: string
  speciesId: string | null
  teraType: string | null
  ability: string | null
  item: string | null
  moves: readonly MoveExtraction[]
  validFormats: readonly string[]
  issues: readonly string[]
}

export interface SerializedPlayer {
  playerName: string
  country: string | null
  placing: number | null
  record: PlayerRecord
  teamText: string
  pokemon: SerializedPokemon[]
  isValid: boolean
  issues: readonly string[]
}

export interface SerializedDivision {
  tournamentId: string
  name: string
  date: string
  division: string
  players: SerializedPlayer[]
}

export interface OutputDocument {
  /** ISO-8601 timestamp */
  generatedAt: string
  /** Standings site the rosters came from */
  source: string
  tournaments: SerializedDivision[]
}

export interface SerializeOptions {
  generatedAt?: Date
  source?: string
}

function serializePokemon(pokemon: PokemonExtraction): SerializedPokemon {
  return {
    rawSpecies: pokemon.rawSpecies,
    species: pokemon.species,
    speciesId: pokemon.speciesId,
    teraType: pokemon.teraType ?? null,
    ability: pokemon.ability ?? null,
    item: pokemon.item ?? null,
    moves: pokemon.moves,
    validFormats: pokemon.validFormats,
    issues: pokemon.issues,
  }
}

export function serializeResults(
  results: readonly DivisionResult[],
  options: SerializeOptions = {}
): OutputDocument {
  const { generatedAt = new Date(), source = STANDINGS_BASE_URL } = options
  return {
    generatedAt: generatedAt.toISOString(),
    source,
    tournaments: results.map((entry) => ({
      tournamentId: entry.tournament.id,
      name: entry.tournament.name,
      date: entry.tournament.date,
      division: entry.division,
      players: entry.players.map((player) => ({
        playerName: player.name,
        country: player.country ?? null,
        placing: player.placing ?? null,
        record: player.record,
        teamText: player.teamText,
        pokemon: player.pokemon.map(serializePokemon),
        isValid: player.isValid,
        issues: player.issues,
      })),
    })),
  }
}

/**
 * Writes the document as indented JSON, creating parent directories.
 */
export async function writeOutput(document: OutputDocument, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf8')
}
