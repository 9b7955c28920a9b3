export const REFERENCE_BASE_URL = 'https://play.pokemonshowdown.com/data'

/**
 * How a resource's body is encoded.
 * - `json`: plain JSON
 * - `json5`: JSON5 (unquoted keys, trailing commas)
 * - `module`: a script assigning one object or array literal
 */
export type PayloadFormat = 'json' | 'json5' | 'module'

export type ReferenceResourceKey =
  | 'pokedex'
  | 'moves'
  | 'items'
  | 'abilities'
  | 'learnsets'
  | 'formatsData'
  | 'formats'

export interface ReferenceResource {
  key: ReferenceResourceKey
  /** Path below the base URL; also the path below the local cache directory */
  remotePath: string
  format: PayloadFormat
}

export const REFERENCE_RESOURCES: readonly ReferenceResource[] = [
  { key: 'pokedex', remotePath: 'pokedex.json', format: 'json' },
  { key: 'moves', remotePath: 'moves.json', format: 'json' },
  { key: 'items', remotePath: 'text/items.json5', format: 'json5' },
  { key: 'abilities', remotePath: 'text/abilities.json5', format: 'json5' },
  { key: 'learnsets', remotePath: 'learnsets.json', format: 'json' },
  { key: 'formatsData', remotePath: 'formats-data.js', format: 'module' },
  { key: 'formats', remotePath: 'formats.js', format: 'module' },
]
