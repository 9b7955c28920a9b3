import { z } from 'zod'

export const rosterSlotSchema = z
  .object({
    name: z.string().nullish(),
    teratype: z.string().nullish(),
    ability: z.string().nullish(),
    item: z.string().nullish(),
    badges: z.array(z.string().nullish()).nullish(),
  })
  .passthrough()

export const playerRecordSchema = z
  .object({
    wins: z.number().optional(),
    losses: z.number().optional(),
    ties: z.number().optional(),
  })
  .passthrough()

export const rosterPlayerSchema = z
  .object({
    name: z.string().nullish(),
    placing: z.number().nullish(),
    record: playerRecordSchema.nullish(),
    decklist: z.array(rosterSlotSchema).nullish(),
  })
  .passthrough()

export const rosterPayloadSchema = z.array(rosterPlayerSchema)

export type RosterSlot = z.infer<typeof rosterSlotSchema>
export type RosterPlayer = z.infer<typeof rosterPlayerSchema>
