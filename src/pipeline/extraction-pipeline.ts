import { availableParallelism } from 'node:os'
import type { Logger } from 'pino'
import type { RosterPlayer } from '../standings/schemas.js'
import type { RosterSource } from '../standings/standings-client.js'
import type {
  DivisionResult,
  PlayerExtraction,
  TournamentSummary,
} from '../types/extraction.js'
import { requirePositiveInteger } from '../utils/errors.js'
import { moduleLogger } from '../utils/logger.js'
import type { PlayerConverter } from './convert.js'
import { PipelineInterruptedError } from './pipeline-error.js'
import { mapWithConcurrency } from './task-pool.js'

export interface ExtractionPipelineOptions {
  source: RosterSource
  /**
   * Shared by every tournament. A `ConversionWorkerPool` spreads players over
   * worker threads; a plain `RosterConverter` converts them on this thread.
   */
  converter: PlayerConverter
  /** Tournaments processed at once (default: available parallelism) */
  workers?: number
  /** Aborting it interrupts the run at the next checkpoint */
  signal?: AbortSignal
  logger?: Logger
}

/**
 * Orders players by placing, unplaced players last. Stable.
 */
export function sortByPlacing(players: readonly PlayerExtraction[]): PlayerExtraction[] {
  return [...players].sort((a, b) => {
    if (a.placing === undefined) return b.placing === undefined ? 0 : 1
    if (b.placing === undefined) return -1
    return a.placing - b.placing
  })
}

/**
 * Fans tournaments out over a bounded pool and hands every player to the
 * converter shared by all of them.
 *
 * A tournament that fails is logged and left out of the results; its
 * siblings carry on. The converter's dataset must be fully built before the
 * pipeline starts, since conversions only ever read it.
 */
export class ExtractionPipeline {
  private readonly source: RosterSource
  private readonly converter: PlayerConverter
  private readonly workers: number
  private readonly signal?: AbortSignal
  private readonly logger: Logger

  constructor(options: ExtractionPipelineOptions) {
    this.source = options.source
    this.converter = options.converter
    this.workers = requirePositiveInteger(
      options.workers ?? availableParallelism(),
      'workers'
    )
    this.signal = options.signal
    this.logger = options.logger ?? moduleLogger('pipeline')
  }

  /**
   * @throws {PipelineInterruptedError} When the signal fires during the run
   */
  async run(
    summaries: readonly TournamentSummary[],
    divisions: readonly string[]
  ): Promise<DivisionResult[]> {
    this.checkpoint('run')
    const requested = [...new Set(divisions)]

    const settled = await mapWithConcurrency(summaries, this.workers, (summary) =>
      this.processTournament(summary, requested)
    )

    const results: DivisionResult[] = []
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(...outcome.value)
        return
      }
      if (this.signal?.aborted || outcome.reason instanceof PipelineInterruptedError) return
      this.logger.error(
        { tournamentId: summaries[index].id, err: outcome.reason },
        'tournament failed, skipping'
      )
    })

    this.checkpoint('writing results')
    this.logger.info(
      { tournaments: summaries.length, divisions: results.length },
      'extraction finished'
    )
    return results
  }

  async processTournament(
    summary: TournamentSummary,
    divisions: readonly string[]
  ): Promise<DivisionResult[]> {
    this.checkpoint(`tournament ${summary.id}`)
    const available = await this.source.listDivisions(summary.id, { signal: this.signal })
    const targets = divisions.filter((division) => available.includes(division))
    if (targets.length === 0) {
      this.logger.debug({ tournamentId: summary.id, available }, 'no requested divisions')
    }

    const results: DivisionResult[] = []
    for (const division of targets) {
      this.checkpoint(`division ${summary.id}/${division}`)
      const roster = await this.source.fetchRoster(summary.id, division, {
        signal: this.signal,
      })

      const pending: Promise<PlayerExtraction>[] = []
      try {
        for (const player of roster) {
          this.checkpoint(`player in ${summary.id}/${division}`)
          pending.push(this.convert(player))
        }
      } catch (error) {
        await Promise.allSettled(pending)
        throw error
      }

      const players = sortByPlacing(await Promise.all(pending))
      this.logger.debug(
        { tournamentId: summary.id, division, players: players.length },
        'division converted'
      )
      results.push({ tournament: summary, division, players })
    }
    return results
  }

  private async convert(player: RosterPlayer): Promise<PlayerExtraction> {
    return this.converter.convertPlayer(player)
  }

  private checkpoint(label: string): void {
    if (this.signal?.aborted) throw new PipelineInterruptedError(label)
  }
}
