import { join } from 'node:path'
import type { Logger } from 'pino'
import type { CachingFetcher } from '../services/http/caching-fetcher.js'
import { moduleLogger } from '../utils/logger.js'
import { parsePayload } from './parsers.js'
import { ReferenceDataset } from './reference-dataset.js'
import type { ReferencePayloads } from './reference-dataset.js'
import { REFERENCE_BASE_URL, REFERENCE_RESOURCES } from './sources.js'
import type { ReferenceResourceKey } from './sources.js'

export interface ReferenceDataLoaderOptions {
  fetcher: CachingFetcher
  /** Directory the resources are cached under */
  cacheDir: string
  /** Defaults to the public reference data site */
  baseUrl?: string
  logger?: Logger
}

export interface LoadOptions {
  /** Re-download every resource regardless of ETags */
  forceRefresh?: boolean
  signal?: AbortSignal
}

/**
 * Fetches the seven reference resources and builds a dataset from them.
 */
export class ReferenceDataLoader {
  private readonly fetcher: CachingFetcher
  private readonly cacheDir: string
  private readonly baseUrl: string
  private readonly logger: Logger

  constructor(options: ReferenceDataLoaderOptions) {
    this.fetcher = options.fetcher
    this.cacheDir = options.cacheDir
    this.baseUrl = (options.baseUrl ?? REFERENCE_BASE_URL).replace(/\/+$/, '')
    this.logger = options.logger ?? moduleLogger('reference-data')
  }

  /**
   * @throws The first failure in resource order, once every fetch has
   * settled, so no cache write outlives the call
   */
  async load(options: LoadOptions = {}): Promise<ReferenceDataset> {
    const { forceRefresh = false, signal } = options
    const started = Date.now()

    const settled = await Promise.allSettled(
      REFERENCE_RESOURCES.map(async (resource): Promise<[ReferenceResourceKey, unknown]> => {
        const body = await this.fetcher.fetch(
          `${this.baseUrl}/${resource.remotePath}`,
          join(this.cacheDir, ...resource.remotePath.split('/')),
          { force: forceRefresh, signal }
        )
        return [resource.key, parsePayload(resource, body)]
      })
    )

    const entries: Array<[ReferenceResourceKey, unknown]> = []
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw outcome.reason
      entries.push(outcome.value)
    }

    const payloads: ReferencePayloads = {
      pokedex: undefined,
      moves: undefined,
      items: undefined,
      abilities: undefined,
      learnsets: undefined,
      formatsData: undefined,
      formats: undefined,
      ...Object.fromEntries(entries),
    }
    const dataset = ReferenceDataset.fromPayloads(payloads)

    this.logger.info(
      {
        species: dataset.species.size,
        moves: dataset.moves.size,
        formats: dataset.formats.length,
        durationMs: Date.now() - started,
      },
      'reference data loaded'
    )
    return dataset
  }
}
