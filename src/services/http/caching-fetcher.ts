/**
 * Conditional HTTP retrieval backed by an on-disk copy and an ETag sidecar
 * @module services/http/caching-fetcher
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import axios from 'axios'
import type { AxiosInstance, AxiosResponse, RawAxiosRequestHeaders } from 'axios'
import type { Logger } from 'pino'
import {
  FetchAbortedError,
  FetchHttpError,
  FetchNetworkError,
  FetchTimeoutError,
} from './fetch-error.js'
import type { FetchError } from './fetch-error.js'
import { requirePositiveInteger } from '../../utils/errors.js'
import { moduleLogger } from '../../utils/logger.js'

export const DEFAULT_FETCH_TIMEOUT_MS = 30000

/**
 * Options for the caching fetcher
 */
export interface CachingFetcherOptions {
  /** Axios instance to issue requests with (default: a fresh instance) */
  http?: AxiosInstance
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number
  logger?: Logger
}

/**
 * Options for a single retrieval
 */
export interface FetchOptions {
  /** Skip freshness checks and always download (default: false) */
  force?: boolean
  /** Aborts the in-flight request */
  signal?: AbortSignal
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readIfPresent(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path)
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

async function writeAtomically(path: string, data: Uint8Array | string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const temporary = `${path}.${process.pid}.${Date.now()}.tmp`
  try {
    await writeFile(temporary, data)
    await rename(temporary, path)
  } catch (error) {
    await rm(temporary, { force: true })
    throw error
  }
}

/**
 * Retrieves remote resources into a local cache, revalidating with ETags.
 *
 * When a local copy and its ETag exist, a HEAD request decides whether the
 * body needs transferring at all. Otherwise a conditional GET is issued and a
 * 304 keeps the local copy. Fresh bodies replace the local copy atomically.
 */
export class CachingFetcher {
  private readonly http: AxiosInstance
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: CachingFetcherOptions = {}) {
    this.http = options.http ?? axios.create()
    this.timeoutMs = requirePositiveInteger(
      options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      'timeoutMs'
    )
    this.logger = options.logger ?? moduleLogger('fetcher')
  }

  async fetch(url: string, localPath: string, options: FetchOptions = {}): Promise<Buffer> {
    const { force = false, signal } = options
    const etagPath = `${localPath}.etag`

    const local = force ? null : await readIfPresent(localPath)
    const storedEtag = local
      ? (await readIfPresent(etagPath))?.toString('utf8').trim() || undefined
      : undefined

    let headEtag: string | undefined
    if (local && storedEtag) {
      headEtag = await this.fetchHeadEtag(url, signal)
      if (headEtag === storedEtag) {
        this.logger.debug({ url }, 'etag unchanged, using cached copy')
        return local
      }
    }

    const headers: RawAxiosRequestHeaders = {}
    if (local && storedEtag) headers['If-None-Match'] = storedEtag

    const response = await this.request<ArrayBuffer>(url, 'GET', signal, headers)

    if (response.status === 304 && local) {
      this.logger.debug({ url }, 'not modified, using cached copy')
      return local
    }
    if (!isSuccess(response.status)) {
      throw new FetchHttpError(url, response.status)
    }

    const body = Buffer.from(response.data)
    await writeAtomically(localPath, body)

    const etag = headerValue(response, 'etag') ?? headEtag
    if (etag) await writeAtomically(etagPath, etag)
    else await rm(etagPath, { force: true })

    this.logger.debug({ url, bytes: body.length, etag }, 'downloaded')
    return body
  }

  async fetchText(url: string, localPath: string, options?: FetchOptions): Promise<string> {
    return (await this.fetch(url, localPath, options)).toString('utf8')
  }

  async fetchJson(url: string, localPath: string, options?: FetchOptions): Promise<unknown> {
    return JSON.parse(await this.fetchText(url, localPath, options))
  }

  /**
   * HEAD request for the remote ETag. Failures other than an abort are
   * reported as a missing ETag so the caller falls back to a GET.
   */
  private async fetchHeadEtag(url: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const response = await this.request(url, 'HEAD', signal)
      if (isSuccess(response.status)) return headerValue(response, 'etag')
      this.logger.debug({ url, status: response.status }, 'HEAD rejected')
    } catch (error) {
      if (error instanceof FetchAbortedError) throw error
      this.logger.debug({ url, err: error }, 'HEAD failed')
    }
    return undefined
  }

  private async request<T = unknown>(
    url: string,
    method: 'GET' | 'HEAD',
    signal?: AbortSignal,
    headers: RawAxiosRequestHeaders = {}
  ): Promise<AxiosResponse<T>> {
    try {
      return await this.http.request<T>({
        url,
        method,
        headers,
        signal,
        timeout: this.timeoutMs,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      })
    } catch (error) {
      throw this.classify(url, error)
    }
  }

  private classify(url: string, error: unknown): FetchError {
    const cause = error instanceof Error ? error : undefined
    if (axios.isCancel(error) || isAbortError(error)) {
      return new FetchAbortedError(url, cause)
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new FetchTimeoutError(url, this.timeoutMs, cause)
      }
      return new FetchNetworkError(url, error.message, cause)
    }
    return new FetchNetworkError(url, cause?.message ?? String(error), cause)
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
