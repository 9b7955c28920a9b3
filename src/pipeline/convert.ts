import type { Logger } from 'pino'
import { Resolver } from '../core/resolver.js'
import { LegalityValidator } from '../core/validator.js'
import type { ReferenceDataset } from '../dataset/reference-dataset.js'
import { splitPlayerName } from '../standings/listing-parser.js'
import type { RosterPlayer, RosterSlot } from '../standings/schemas.js'
import type {
  MoveExtraction,
  PlayerExtraction,
  PokemonExtraction,
  RosterEntry,
} from '../types/extraction.js'
import { renderTeam } from './team-text.js'

export const TERA_TYPES: ReadonlySet<string> = new Set([
  'Normal',
  'Fire',
  'Water',
  'Electric',
  'Grass',
  'Ice',
  'Fighting',
  'Poison',
  'Ground',
  'Flying',
  'Psychic',
  'Bug',
  'Rock',
  'Ghost',
  'Dragon',
  'Dark',
  'Steel',
  'Fairy',
  'Stellar',
])

export interface RosterConverterOptions {
  resolver?: Resolver
  validator?: LegalityValidator
  /** Parent of the default resolver's logger */
  logger?: Logger
}

/**
 * Anything that turns a published roster player into an extraction, on this
 * thread or another.
 */
export interface PlayerConverter {
  convertPlayer(player: RosterPlayer): PlayerExtraction | Promise<PlayerExtraction>
}

/**
 * Maps a published roster slot onto a roster entry. Blank labels count as
 * absent and the species label defaults to 'Unknown'.
 */
export function rosterEntryFromSlot(slot: RosterSlot): RosterEntry {
  return {
    species: slot.name || 'Unknown',
    teraType: slot.teratype || undefined,
    ability: slot.ability || undefined,
    item: slot.item || undefined,
    moves: (slot.badges ?? []).filter((move): move is string => Boolean(move)),
  }
}

/**
 * Resolves and validates roster entries against one reference dataset.
 *
 * Nothing here throws on bad input: every miss becomes an issue string on
 * the entry it concerns.
 */
export class RosterConverter implements PlayerConverter {
  private readonly resolver: Resolver
  private readonly validator: LegalityValidator

  constructor(
    private readonly dataset: ReferenceDataset,
    options: RosterConverterOptions = {}
  ) {
    this.resolver =
      options.resolver ??
      new Resolver(dataset, { logger: options.logger?.child({ module: 'resolver' }) })
    this.validator = options.validator ?? new LegalityValidator(dataset)
  }

  convertEntry(entry: RosterEntry): PokemonExtraction {
    const issues: string[] = []

    const rawSpecies = entry.species
    const speciesId = this.resolver.resolveSpecies(rawSpecies)
    const species = (speciesId && this.dataset.speciesName(speciesId)) || rawSpecies
    if (!speciesId) issues.push(`Unable to resolve species '${rawSpecies}'`)

    const resolved = entry.moves.map((raw) => {
      const candidate = this.resolver.resolveMove(raw)
      const name = candidate ? this.dataset.moveName(candidate) : undefined
      const id = name ? candidate : null
      if (!id) issues.push(`Move '${raw}' not found in reference data`)
      return { raw, id, name: name ?? raw }
    })

    if (entry.teraType && !TERA_TYPES.has(entry.teraType)) {
      issues.push(`Unknown Tera Type '${entry.teraType}'`)
    }
    if (entry.ability && !this.resolver.resolveAbility(entry.ability)) {
      issues.push(`Ability '${entry.ability}' not found in reference data`)
    }
    if (entry.item && !this.resolver.resolveItem(entry.item)) {
      issues.push(`Item '${entry.item}' not found in reference data`)
    }

    const moves: MoveExtraction[] = resolved.map(({ raw, id, name }) => {
      let legal = false
      if (id && speciesId) {
        legal = this.validator.canLearn(speciesId, id)
        if (!legal) issues.push(`${species} cannot learn ${name}`)
      } else if (id) {
        issues.push(`Unable to validate move '${raw}' without species data`)
      }
      return Object.freeze({ raw, id, name, legal })
    })

    const validFormats = speciesId ? this.validator.validFormats(speciesId) : []

    return Object.freeze({
      rawSpecies,
      species,
      speciesId,
      teraType: entry.teraType,
      ability: entry.ability,
      item: entry.item,
      moves: Object.freeze(moves),
      validFormats: Object.freeze(validFormats),
      issues: Object.freeze(issues),
    })
  }

  convertPlayer(player: RosterPlayer): PlayerExtraction {
    const { name, country } = splitPlayerName(player.name || 'Unknown')
    const pokemon = (player.decklist ?? []).map((slot) =>
      this.convertEntry(rosterEntryFromSlot(slot))
    )
    const issues = pokemon.flatMap((slot) => slot.issues)

    return {
      name,
      country,
      placing: player.placing ?? undefined,
      record: player.record ?? {},
      teamText: renderTeam(pokemon),
      pokemon,
      issues,
      isValid: issues.length === 0,
    }
  }
}
