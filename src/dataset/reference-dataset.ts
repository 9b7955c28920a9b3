import type { ZodType, ZodTypeDef } from 'zod'
import { buildAliasIndex } from '../core/alias-index.js'
import { normalizeId } from '../core/normalizers/identifier.js'
import type { ResolverCorpus } from '../core/resolver.js'
import type { LegalityCorpus } from '../core/validator.js'
import type {
  AliasIndex,
  FormatRecord,
  FormatSpeciesMeta,
  NamedRecord,
  SpeciesRecord,
} from '../types/dataset.js'
import { DatasetParseError } from './dataset-error.js'
import { referenceSchemas } from './schemas.js'
import type { NamedEntry } from './schemas.js'
import type { ReferenceResourceKey } from './sources.js'

/**
 * Decoded but unvalidated body of every reference resource.
 */
export type ReferencePayloads = Readonly<Record<ReferenceResourceKey, unknown>>

function validate<T>(
  key: ReferenceResourceKey,
  schema: ZodType<T, ZodTypeDef, unknown>,
  payload: unknown
): T {
  const result = schema.safeParse(payload)
  if (result.success) return result.data
  const issue = result.error.issues[0]
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
  throw new DatasetParseError(key, `${issue?.message ?? 'invalid payload'}${where}`, result.error)
}

function namedRecords(entries: Record<string, NamedEntry>): Map<string, NamedRecord> {
  const records = new Map<string, NamedRecord>()
  for (const [id, entry] of Object.entries(entries)) {
    records.set(
      id,
      Object.freeze({ id, name: entry.name, aliases: Object.freeze([...(entry.aliases ?? [])]) })
    )
  }
  return records
}

/**
 * Immutable snapshot of the reference corpus and its alias index.
 *
 * Built once per load, before any resolution starts, and only read
 * afterwards. Records and lists are frozen; maps are exposed read-only.
 */
export class ReferenceDataset implements ResolverCorpus, LegalityCorpus {
  readonly species: ReadonlyMap<string, SpeciesRecord>
  readonly moves: ReadonlyMap<string, NamedRecord>
  readonly items: ReadonlyMap<string, NamedRecord>
  readonly abilities: ReadonlyMap<string, NamedRecord>
  readonly learnsets: ReadonlyMap<string, ReadonlySet<string>>
  readonly formatsData: ReadonlyMap<string, FormatSpeciesMeta>
  readonly formats: readonly FormatRecord[]
  readonly aliases: AliasIndex
  /** Decoded payloads the snapshot was built from, for rebuilding it elsewhere */
  readonly payloads: ReferencePayloads

  private constructor(parts: Omit<ReferenceDataset, 'aliases' | 'speciesName' | 'moveName'>) {
    this.species = parts.species
    this.moves = parts.moves
    this.items = parts.items
    this.abilities = parts.abilities
    this.learnsets = parts.learnsets
    this.formatsData = parts.formatsData
    this.formats = parts.formats
    this.payloads = parts.payloads
    this.aliases = Object.freeze(
      buildAliasIndex({
        species: this.species.values(),
        moves: this.moves.values(),
        items: this.items.values(),
        abilities: this.abilities.values(),
      })
    )
    Object.freeze(this)
  }

  /**
   * Validates decoded payloads and builds a dataset from them.
   *
   * @throws {DatasetParseError} Naming the first resource with a bad shape
   */
  static fromPayloads(payloads: ReferencePayloads): ReferenceDataset {
    const pokedex = validate('pokedex', referenceSchemas.pokedex, payloads.pokedex)
    const moves = validate('moves', referenceSchemas.moves, payloads.moves)
    const items = validate('items', referenceSchemas.items, payloads.items)
    const abilities = validate('abilities', referenceSchemas.abilities, payloads.abilities)
    const learnsets = validate('learnsets', referenceSchemas.learnsets, payloads.learnsets)
    const formatsData = validate('formatsData', referenceSchemas.formatsData, payloads.formatsData)
    const formats = validate('formats', referenceSchemas.formats, payloads.formats)

    const species = new Map<string, SpeciesRecord>()
    for (const [id, entry] of Object.entries(pokedex)) {
      species.set(
        id,
        Object.freeze({
          id,
          name: entry.name,
          baseSpecies: entry.baseSpecies ?? undefined,
          forme: entry.forme ?? undefined,
          tags: Object.freeze([...(entry.tags ?? [])]),
          cosmeticFormes: Object.freeze([...(entry.cosmeticFormes ?? [])]),
          isNonstandard: entry.isNonstandard ?? null,
        })
      )
    }

    const learnable = new Map<string, ReadonlySet<string>>()
    for (const [id, entry] of Object.entries(learnsets)) {
      learnable.set(id, new Set(Object.keys(entry.learnset ?? {})))
    }

    const meta = new Map<string, FormatSpeciesMeta>()
    for (const [id, entry] of Object.entries(formatsData)) {
      meta.set(
        id,
        Object.freeze({ isNonstandard: entry.isNonstandard ?? null, tier: entry.tier ?? undefined })
      )
    }

    const formatRecords: FormatRecord[] = []
    for (const entry of formats) {
      const id = entry.id || normalizeId(entry.name)
      if (!id) continue
      formatRecords.push(
        Object.freeze({
          id,
          name: entry.name ?? id,
          gameType: entry.gameType ?? undefined,
          banlist: Object.freeze([...(entry.banlist ?? [])]),
        })
      )
    }

    return new ReferenceDataset({
      payloads,
      species,
      moves: namedRecords(moves),
      items: namedRecords(items),
      abilities: namedRecords(abilities),
      learnsets: learnable,
      formatsData: meta,
      formats: Object.freeze(formatRecords),
    })
  }

  /** Display name of a species id, or undefined when unknown */
  speciesName(id: string): string | undefined {
    return this.species.get(id)?.name
  }

  /** Display name of a move id, or undefined when unknown */
  moveName(id: string): string | undefined {
    return this.moves.get(id)?.name
  }
}
