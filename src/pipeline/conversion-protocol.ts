import type { ReferencePayloads } from '../dataset/reference-dataset.js'
import type { RosterPlayer } from '../standings/schemas.js'
import type { PlayerExtraction } from '../types/extraction.js'

/**
 * Handed to every conversion worker when it starts.
 */
export interface ConversionWorkerData {
  /** Rebuilt into a dataset once per worker */
  payloads: ReferencePayloads
  logLevel: string
}

export interface ConversionRequest {
  id: number
  player: RosterPlayer
}

/**
 * Messages a worker posts back. Log lines are pino's serialized records.
 */
export type ConversionReply =
  | { kind: 'result'; id: number; player: PlayerExtraction }
  | { kind: 'failure'; id: number; message: string }
  | { kind: 'log'; line: string }
