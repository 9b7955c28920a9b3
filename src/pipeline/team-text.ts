import type { PokemonExtraction } from '../types/extraction.js'

/**
 * Renders slots in the plain-text team export layout:
 *
 * ```text
 * Flutter Mane @ Focus Sash
 * Ability: Protosynthesis
 * Tera Type: Stellar
 * Level: 50
 * - Shadow Ball
 * ```
 *
 * Slots are separated by a blank line.
 */
export function renderTeam(pokemon: readonly PokemonExtraction[]): string {
  return pokemon
    .map((slot) => {
      const lines = [slot.item ? `${slot.species} @ ${slot.item}` : slot.species]
      if (slot.ability) lines.push(`Ability: ${slot.ability}`)
      if (slot.teraType) lines.push(`Tera Type: ${slot.teraType}`)
      lines.push('Level: 50')
      for (const move of slot.moves) lines.push(`- ${move.name}`)
      return lines.join('\n')
    })
    .join('\n\n')
}
