import { Command, CommanderError, InvalidArgumentError } from 'commander'
import type { AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import { resolveConfig } from './config.js'
import type { PipelineConfigInput } from './config.js'
import { PipelineInterruptedError } from './pipeline/pipeline-error.js'
import { runExtraction } from './pipeline/run.js'
import { isRosterCanonError } from './utils/errors.js'
import { createLogger } from './utils/logger.js'

export const EXIT_SUCCESS = 0
export const EXIT_INTERRUPTED = 1
export const EXIT_EXTRACTION_FAILED = 2
export const EXIT_UNEXPECTED = 3

interface CliFlags {
  limit?: number
  divisions: string
  output: string
  workers?: number
  cacheDir?: string
  debug: boolean
  refreshStandings: boolean
  refreshReference: boolean
}

export interface CliOptions {
  signal?: AbortSignal
  /** Overrides the logger built from the flags */
  logger?: Logger
  http?: AxiosInstance
  env?: Readonly<Record<string, string | undefined>>
  referenceBaseUrl?: string
  standingsBaseUrl?: string
}

function positiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

function buildProgram(): Command {
  return new Command()
    .name('roster-canon')
    .description('Extract tournament teams from published standings into validated JSON.')
    .option('--limit <count>', 'limit the number of tournaments processed', positiveInteger)
    .option('--divisions <list>', 'comma-separated divisions to extract', 'masters')
    .option('--output <path>', 'output JSON path', 'tournament_teams.json')
    .option('--workers <count>', 'tournaments processed concurrently', positiveInteger)
    .option('--cache-dir <dir>', 'directory for cached downloads')
    .option('--debug', 'enable verbose logging', false)
    .option('--refresh-standings', 'redownload standings pages and rosters', false)
    .option('--refresh-reference', 'redownload reference data', false)
    .exitOverride()
}

/**
 * Parses command-line arguments (without the node and script entries) into
 * configuration input.
 *
 * @throws {CommanderError} On unknown or malformed options
 */
export function parseCliArgs(argv: readonly string[]): PipelineConfigInput {
  const program = buildProgram()
  program.parse([...argv], { from: 'user' })
  const flags = program.opts<CliFlags>()

  return {
    limit: flags.limit,
    divisions: flags.divisions.split(','),
    output: flags.output,
    workers: flags.workers,
    cacheDir: flags.cacheDir,
    logLevel: flags.debug ? 'debug' : undefined,
    refreshStandings: flags.refreshStandings,
    refreshReference: flags.refreshReference,
  }
}

/**
 * Maps a failure to the process exit code.
 */
export function exitCodeFor(error: unknown, signal?: AbortSignal): number {
  if (error instanceof PipelineInterruptedError || signal?.aborted) return EXIT_INTERRUPTED
  // Dataset, standings, transport and configuration failures
  if (isRosterCanonError(error)) return EXIT_EXTRACTION_FAILED
  return EXIT_UNEXPECTED
}

/**
 * Runs the command line and resolves to the exit code.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  let input: PipelineConfigInput
  try {
    input = parseCliArgs(argv)
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode
    throw error
  }

  let logger = options.logger ?? createLogger()
  try {
    const config = resolveConfig(input, options.env)
    logger = options.logger ?? createLogger({ level: config.logLevel })

    const summary = await runExtraction(config, {
      http: options.http,
      logger,
      signal: options.signal,
      referenceBaseUrl: options.referenceBaseUrl,
      standingsBaseUrl: options.standingsBaseUrl,
    })
    logger.info(
      {
        tournaments: summary.tournaments,
        divisions: summary.divisions,
        players: summary.players,
      },
      `wrote ${summary.outputPath}`
    )
    return EXIT_SUCCESS
  } catch (error) {
    const code = exitCodeFor(error, options.signal)
    if (code === EXIT_INTERRUPTED) logger.warn('interrupted by user')
    else logger.error({ err: error }, 'run failed')
    return code
  }
}
