import { z } from 'zod'

const optionalString = z.string().nullish()
const stringList = z.array(z.string()).nullish()

export const speciesEntrySchema = z
  .object({
    name: z.string(),
    baseSpecies: optionalString,
    forme: optionalString,
    tags: stringList,
    cosmeticFormes: stringList,
    isNonstandard: optionalString,
  })
  .passthrough()

export const namedEntrySchema = z
  .object({
    name: z.string(),
    aliases: stringList,
  })
  .passthrough()

export const learnsetEntrySchema = z
  .object({
    learnset: z.record(z.string(), z.unknown()).nullish(),
  })
  .passthrough()

export const formatsDataEntrySchema = z
  .object({
    isNonstandard: optionalString,
    tier: optionalString,
  })
  .passthrough()

export const formatEntrySchema = z
  .object({
    id: optionalString,
    name: optionalString,
    gameType: optionalString,
    banlist: stringList,
  })
  .passthrough()

export const referenceSchemas = {
  pokedex: z.record(z.string(), speciesEntrySchema),
  moves: z.record(z.string(), namedEntrySchema),
  items: z.record(z.string(), namedEntrySchema),
  abilities: z.record(z.string(), namedEntrySchema),
  learnsets: z.record(z.string(), learnsetEntrySchema),
  formatsData: z.record(z.string(), formatsDataEntrySchema),
  formats: z.array(formatEntrySchema),
} as const

export type SpeciesEntry = z.infer<typeof speciesEntrySchema>
export type NamedEntry = z.infer<typeof namedEntrySchema>
export type FormatEntry = z.infer<typeof formatEntrySchema>
