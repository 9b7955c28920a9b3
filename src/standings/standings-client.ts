import { join } from 'node:path'
import type { Logger } from 'pino'
import { ExtractionError } from '../pipeline/pipeline-error.js'
import type { CachingFetcher } from '../services/http/caching-fetcher.js'
import type { TournamentSummary } from '../types/extraction.js'
import { describeError } from '../utils/errors.js'
import { moduleLogger } from '../utils/logger.js'
import { parseDivisions, parseTournamentList, STANDINGS_BASE_URL } from './listing-parser.js'
import { rosterPayloadSchema } from './schemas.js'
import type { RosterPlayer } from './schemas.js'

export const DEFAULT_DIVISIONS: readonly string[] = ['masters']

export interface RequestOptions {
  signal?: AbortSignal
}

/**
 * Where tournament listings and division rosters come from.
 */
export interface RosterSource {
  listTournaments(options?: RequestOptions): Promise<TournamentSummary[]>
  /** Divisions a tournament publishes; `masters` when the page lists none */
  listDivisions(tournamentId: string, options?: RequestOptions): Promise<string[]>
  fetchRoster(
    tournamentId: string,
    division: string,
    options?: RequestOptions
  ): Promise<RosterPlayer[]>
}

export interface StandingsClientOptions {
  fetcher: CachingFetcher
  /** Directory pages and rosters are cached under, mirroring their URL paths */
  cacheDir: string
  baseUrl?: string
  /** Re-download pages and rosters regardless of ETags */
  refresh?: boolean
  logger?: Logger
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

/**
 * Standings-site client going through the caching fetcher.
 */
export class StandingsClient implements RosterSource {
  private readonly fetcher: CachingFetcher
  private readonly cacheDir: string
  private readonly baseUrl: string
  private readonly refresh: boolean
  private readonly logger: Logger

  constructor(options: StandingsClientOptions) {
    this.fetcher = options.fetcher
    this.cacheDir = options.cacheDir
    this.baseUrl = (options.baseUrl ?? STANDINGS_BASE_URL).replace(/\/+$/, '')
    this.refresh = options.refresh ?? false
    this.logger = options.logger ?? moduleLogger('standings')
  }

  async listTournaments(options: RequestOptions = {}): Promise<TournamentSummary[]> {
    const html = await this.fetcher.fetchText(
      `${this.baseUrl}/`,
      join(this.cacheDir, 'index.html'),
      { force: this.refresh, signal: options.signal }
    )
    const summaries = parseTournamentList(html, this.baseUrl)
    this.logger.debug({ count: summaries.length }, 'tournaments listed')
    return summaries
  }

  async listDivisions(tournamentId: string, options: RequestOptions = {}): Promise<string[]> {
    const html = await this.fetcher.fetchText(
      `${this.baseUrl}/${tournamentId}/`,
      join(this.cacheDir, tournamentId, 'index.html'),
      { force: this.refresh, signal: options.signal }
    )
    const divisions = parseDivisions(html)
    return divisions.length > 0 ? divisions : [...DEFAULT_DIVISIONS]
  }

  /**
   * @throws {ExtractionError} When the roster is not a list of player records
   */
  async fetchRoster(
    tournamentId: string,
    division: string,
    options: RequestOptions = {}
  ): Promise<RosterPlayer[]> {
    const fileName = `${tournamentId}_${capitalize(division)}.json`
    const text = await this.fetcher.fetchText(
      `${this.baseUrl}/${tournamentId}/${division}/${fileName}`,
      join(this.cacheDir, tournamentId, division, fileName),
      { force: this.refresh, signal: options.signal }
    )

    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch (error) {
      throw new ExtractionError(
        `Roster for ${tournamentId}/${division} is not valid JSON: ${describeError(error)}`,
        tournamentId,
        division
      )
    }

    if (!Array.isArray(payload)) {
      throw new ExtractionError(
        `Unexpected payload for ${tournamentId}/${division}`,
        tournamentId,
        division
      )
    }

    const result = rosterPayloadSchema.safeParse(payload)
    if (!result.success) {
      const issue = result.error.issues[0]
      throw new ExtractionError(
        `Malformed roster for ${tournamentId}/${division}: ${issue?.message ?? 'invalid'} at ${issue?.path.join('.') ?? ''}`,
        tournamentId,
        division
      )
    }
    return result.data
  }
}
