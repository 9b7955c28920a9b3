import { RosterCanonError } from '../utils/errors.js'

/**
 * Error thrown when standings data for a tournament has an unexpected shape.
 * Contained to the tournament it concerns.
 */
export class ExtractionError extends RosterCanonError {
  public readonly tournamentId?: string
  public readonly division?: string

  constructor(
    message: string,
    tournamentId?: string,
    division?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'EXTRACTION_ERROR', { tournamentId, division, ...context })
    this.name = 'ExtractionError'
    this.tournamentId = tournamentId
    this.division = division
  }
}

/**
 * Error thrown at the next checkpoint after the run was interrupted.
 */
export class PipelineInterruptedError extends RosterCanonError {
  constructor(checkpoint: string) {
    super(`Run interrupted before ${checkpoint}`, 'PIPELINE_INTERRUPTED', { checkpoint })
    this.name = 'PipelineInterruptedError'
  }
}

/**
 * Error thrown when a conversion worker fails or the pool is closed under a
 * pending conversion. Contained to the tournament waiting on it.
 */
export class ConversionWorkerError extends RosterCanonError {
  public readonly cause?: Error

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, 'CONVERSION_WORKER_ERROR', context)
    this.name = 'ConversionWorkerError'
    this.cause = cause
  }
}
