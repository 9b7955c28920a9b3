import { normalizeId, normalizeMoveLabel } from './normalizers/identifier.js'
import type {
  AliasIndex,
  NamedRecord,
  SpeciesRecord,
} from '../types/dataset.js'

/**
 * Records the alias index is built from, in corpus order.
 */
export interface AliasSource {
  species: Iterable<SpeciesRecord>
  moves: Iterable<NamedRecord>
  items: Iterable<NamedRecord>
  abilities: Iterable<NamedRecord>
}

type Normalizer = (value: string) => string

function register(
  map: Map<string, string>,
  names: Iterable<string | undefined>,
  id: string,
  normalize: Normalizer
): void {
  for (const name of names) {
    if (!name) continue
    const token = normalize(name)
    if (token && !map.has(token)) map.set(token, id)
  }
}

/**
 * A record is a base form when it names no base species, or names itself.
 */
export function isBaseForm(record: SpeciesRecord): boolean {
  const base = record.baseSpecies
  return !base || base === record.id || normalizeId(base) === record.id
}

/**
 * Surface forms under which a species record can appear in a roster.
 */
export function speciesAliases(record: SpeciesRecord): string[] {
  const names = [record.name, record.id]
  const { baseSpecies: base, forme } = record
  if (base) names.push(base)
  if (base && forme) {
    names.push(`${base}-${forme}`, `${base} ${forme}`, `${base} [${forme}]`, `${base} (${forme})`)
    const lowered = forme.toLowerCase()
    if (lowered === 'shadow') names.push(`${base} Shadow Rider`)
    if (lowered === 'ice') names.push(`${base} Ice Rider`)
  }
  // Cosmetic variants have no records of their own
  names.push(...record.cosmeticFormes)
  return names
}

function buildSpeciesMap(records: Iterable<SpeciesRecord>): Map<string, string> {
  const map = new Map<string, string>()
  const formes: SpeciesRecord[] = []

  for (const record of records) {
    if (isBaseForm(record)) register(map, speciesAliases(record), record.id, normalizeId)
    else formes.push(record)
  }
  for (const record of formes) {
    register(map, speciesAliases(record), record.id, normalizeId)
  }

  return map
}

function buildSimpleMap(
  records: Iterable<NamedRecord>,
  normalize: Normalizer
): Map<string, string> {
  const map = new Map<string, string>()
  for (const record of records) {
    register(map, [record.id, record.name, ...record.aliases], record.id, normalize)
  }
  return map
}

/**
 * Builds the per-category alias maps for a freshly loaded corpus.
 *
 * Insertion is first-writer-wins. Species base forms are registered before
 * any forme so an unmarked name always resolves to the base form.
 */
export function buildAliasIndex(source: AliasSource): AliasIndex {
  return {
    species: buildSpeciesMap(source.species),
    moves: buildSimpleMap(source.moves, normalizeMoveLabel),
    items: buildSimpleMap(source.items, normalizeId),
    abilities: buildSimpleMap(source.abilities, normalizeId),
  }
}
