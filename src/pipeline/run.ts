import { availableParallelism } from 'node:os'
import { join } from 'node:path'
import type { AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import type { PipelineConfig } from '../config.js'
import { ReferenceDataLoader } from '../dataset/loader.js'
import { serializeResults, writeOutput } from '../output/serializer.js'
import type { OutputDocument } from '../output/serializer.js'
import { CachingFetcher } from '../services/http/caching-fetcher.js'
import { STANDINGS_BASE_URL } from '../standings/listing-parser.js'
import { StandingsClient } from '../standings/standings-client.js'
import type { DivisionResult } from '../types/extraction.js'
import { logger as rootLogger } from '../utils/logger.js'
import { ConversionWorkerPool } from './conversion-pool.js'
import { ExtractionPipeline } from './extraction-pipeline.js'

export interface RunDependencies {
  /** Axios instance for every request (default: a fresh one) */
  http?: AxiosInstance
  logger?: Logger
  /** Aborting it interrupts the run */
  signal?: AbortSignal
  referenceBaseUrl?: string
  standingsBaseUrl?: string
  /** Clock for the output timestamp */
  now?: () => Date
}

export interface RunSummary {
  tournaments: number
  divisions: number
  players: number
  outputPath: string
  document: OutputDocument
}

/**
 * Loads reference data, extracts every listed tournament and writes the
 * output document.
 */
export async function runExtraction(
  config: PipelineConfig,
  deps: RunDependencies = {}
): Promise<RunSummary> {
  const logger = deps.logger ?? rootLogger
  const { signal } = deps

  const fetcher = new CachingFetcher({
    http: deps.http,
    timeoutMs: config.timeoutMs,
    logger: logger.child({ module: 'fetcher' }),
  })

  const dataset = await new ReferenceDataLoader({
    fetcher,
    cacheDir: join(config.cacheDir, 'reference'),
    baseUrl: deps.referenceBaseUrl,
    logger: logger.child({ module: 'reference-data' }),
  }).load({ forceRefresh: config.refreshReference, signal })

  const standingsBaseUrl = deps.standingsBaseUrl ?? STANDINGS_BASE_URL
  const source = new StandingsClient({
    fetcher,
    cacheDir: join(config.cacheDir, 'standings'),
    baseUrl: standingsBaseUrl,
    refresh: config.refreshStandings,
    logger: logger.child({ module: 'standings' }),
  })

  const listed = await source.listTournaments({ signal })
  const summaries = config.limit ? listed.slice(0, config.limit) : listed
  logger.info(
    { listed: listed.length, selected: summaries.length, divisions: config.divisions },
    'processing tournaments'
  )

  const conversions = new ConversionWorkerPool(dataset, {
    size: availableParallelism(),
    logger: logger.child({ module: 'conversion' }),
  })
  let results: DivisionResult[]
  try {
    const pipeline = new ExtractionPipeline({
      source,
      converter: conversions,
      workers: config.workers,
      signal,
      logger: logger.child({ module: 'pipeline' }),
    })
    results = await pipeline.run(summaries, config.divisions)
  } finally {
    await conversions.close()
  }

  const document = serializeResults(results, {
    generatedAt: (deps.now ?? (() => new Date()))(),
    source: standingsBaseUrl,
  })
  await writeOutput(document, config.output)

  return {
    tournaments: new Set(results.map((entry) => entry.tournament.id)).size,
    divisions: results.length,
    players: results.reduce((total, entry) => total + entry.players.length, 0),
    outputPath: config.output,
    document,
  }
}
