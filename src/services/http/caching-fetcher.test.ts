import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { AxiosError } from 'axios'
import { CachingFetcher } from './caching-fetcher.js'
import {
  FetchAbortedError,
  FetchHttpError,
  FetchNetworkError,
  FetchTimeoutError,
} from './fetch-error.js'
import { InvalidParameterError } from '../../utils/errors.js'
import { silentLogger } from '../../utils/logger.js'
import { createFakeHttp } from '../../../tests/helpers/fake-http.js'
import type { FakeHandler } from '../../../tests/helpers/fake-http.js'

const RESOURCE_URL = 'https://data.test/pokedex.json'

describe('CachingFetcher', () => {
  let dir: string
  let localPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'roster-canon-fetch-'))
    localPath = join(dir, 'nested', 'pokedex.json')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function fetcherFor(handler: FakeHandler) {
    const fake = createFakeHttp(handler)
    const fetcher = new CachingFetcher({ http: fake.http, timeoutMs: 50, logger: silentLogger })
    return { fetcher, requests: fake.requests }
  }

  async function seed(body: string, etag?: string): Promise<void> {
    await mkdir(join(dir, 'nested'), { recursive: true })
    await writeFile(localPath, body)
    if (etag) await writeFile(`${localPath}.etag`, etag)
  }

  describe('constructor', () => {
    it('should reject a non-positive timeout', () => {
      expect(() => new CachingFetcher({ timeoutMs: 0 })).toThrow(InvalidParameterError)
    })
  })

  describe('without a local copy', () => {
    it('should download, store the body and store the etag', async () => {
      const { fetcher, requests } = fetcherFor(() => ({
        body: 'fresh',
        headers: { etag: '"v1"' },
      }))

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('fresh')
      expect(requests).toEqual([{ method: 'GET', url: RESOURCE_URL, ifNoneMatch: undefined }])
      expect(await readFile(localPath, 'utf8')).toBe('fresh')
      expect(await readFile(`${localPath}.etag`, 'utf8')).toBe('"v1"')
    })

    it('should not store an etag the response lacks', async () => {
      const { fetcher } = fetcherFor(() => ({ body: 'fresh' }))

      await fetcher.fetch(RESOURCE_URL, localPath)

      await expect(readFile(`${localPath}.etag`, 'utf8')).rejects.toMatchObject({
        code: 'ENOENT',
      })
    })

    it('should fail on an error status without writing anything', async () => {
      const { fetcher } = fetcherFor(() => ({ status: 500, body: 'oops' }))

      await expect(fetcher.fetch(RESOURCE_URL, localPath)).rejects.toThrow(
        `Request to ${RESOURCE_URL} failed with HTTP 500`
      )
      await expect(readFile(localPath)).rejects.toMatchObject({ code: 'ENOENT' })
    })

    it('should treat a 304 without a local copy as an error', async () => {
      const { fetcher } = fetcherFor(() => ({ status: 304 }))

      await expect(fetcher.fetch(RESOURCE_URL, localPath)).rejects.toBeInstanceOf(FetchHttpError)
    })
  })

  describe('with a local copy and etag', () => {
    it('should return the local copy when the HEAD etag is unchanged', async () => {
      await seed('cached', '"v1"')
      const { fetcher, requests } = fetcherFor(() => ({ headers: { etag: '"v1"' } }))

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('cached')
      expect(requests.map((request) => request.method)).toEqual(['HEAD'])
    })

    it('should send a conditional GET and keep the local copy on 304', async () => {
      await seed('cached', '"v1"')
      const { fetcher, requests } = fetcherFor((request) =>
        request.method === 'HEAD' ? { headers: { etag: '"v2"' } } : { status: 304 }
      )

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('cached')
      expect(requests).toEqual([
        { method: 'HEAD', url: RESOURCE_URL, ifNoneMatch: undefined },
        { method: 'GET', url: RESOURCE_URL, ifNoneMatch: '"v1"' },
      ])
    })

    it('should replace the local copy and etag when the resource changed', async () => {
      await seed('cached', '"v1"')
      const { fetcher } = fetcherFor((request) =>
        request.method === 'HEAD'
          ? { headers: { etag: '"v2"' } }
          : { body: 'updated', headers: { etag: '"v2"' } }
      )

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('updated')
      expect(await readFile(localPath, 'utf8')).toBe('updated')
      expect(await readFile(`${localPath}.etag`, 'utf8')).toBe('"v2"')
    })

    it('should keep the HEAD etag when the GET response has none', async () => {
      await seed('cached', '"v1"')
      const { fetcher } = fetcherFor((request) =>
        request.method === 'HEAD' ? { headers: { etag: '"v3"' } } : { body: 'updated' }
      )

      await fetcher.fetch(RESOURCE_URL, localPath)

      expect(await readFile(`${localPath}.etag`, 'utf8')).toBe('"v3"')
    })

    it('should fall back to a GET when the HEAD request fails', async () => {
      await seed('cached', '"v1"')
      const { fetcher, requests } = fetcherFor((request) =>
        request.method === 'HEAD'
          ? new AxiosError('socket hang up', 'ECONNRESET')
          : { body: 'updated', headers: { etag: '"v2"' } }
      )

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('updated')
      expect(requests.map((request) => request.method)).toEqual(['HEAD', 'GET'])
    })

    it('should leave the local copy untouched when the GET fails', async () => {
      await seed('cached', '"v1"')
      const { fetcher } = fetcherFor((request) =>
        request.method === 'HEAD' ? { status: 405 } : { status: 503 }
      )

      await expect(fetcher.fetch(RESOURCE_URL, localPath)).rejects.toBeInstanceOf(FetchHttpError)
      expect(await readFile(localPath, 'utf8')).toBe('cached')
      expect(await readFile(`${localPath}.etag`, 'utf8')).toBe('"v1"')
    })

    it('should skip revalidation when forced', async () => {
      await seed('cached', '"v1"')
      const { fetcher, requests } = fetcherFor(() => ({
        body: 'forced',
        headers: { etag: '"v9"' },
      }))

      const body = await fetcher.fetch(RESOURCE_URL, localPath, { force: true })

      expect(body.toString('utf8')).toBe('forced')
      expect(requests).toEqual([{ method: 'GET', url: RESOURCE_URL, ifNoneMatch: undefined }])
    })
  })

  describe('with a local copy but no etag', () => {
    it('should download unconditionally', async () => {
      await seed('cached')
      const { fetcher, requests } = fetcherFor(() => ({ body: 'fresh' }))

      const body = await fetcher.fetch(RESOURCE_URL, localPath)

      expect(body.toString('utf8')).toBe('fresh')
      expect(requests).toEqual([{ method: 'GET', url: RESOURCE_URL, ifNoneMatch: undefined }])
    })
  })

  describe('transport failures', () => {
    it('should report timeouts', async () => {
      const { fetcher } = fetcherFor(() => new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED'))

      const failure = fetcher.fetch(RESOURCE_URL, localPath)

      await expect(failure).rejects.toBeInstanceOf(FetchTimeoutError)
      await expect(failure).rejects.toThrow(`Request to ${RESOURCE_URL} timed out after 50ms`)
    })

    it('should report network errors', async () => {
      const { fetcher } = fetcherFor(() => new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND'))

      await expect(fetcher.fetch(RESOURCE_URL, localPath)).rejects.toBeInstanceOf(FetchNetworkError)
    })

    it('should report aborted requests', async () => {
      const controller = new AbortController()
      controller.abort()
      const { fetcher, requests } = fetcherFor(() => ({ body: 'never' }))

      await expect(
        fetcher.fetch(RESOURCE_URL, localPath, { signal: controller.signal })
      ).rejects.toBeInstanceOf(FetchAbortedError)
      expect(requests).toEqual([])
    })
  })

  describe('fetchText and fetchJson', () => {
    it('should decode the body', async () => {
      const { fetcher } = fetcherFor(() => ({ body: '{"mew":{"name":"Mew"}}' }))

      expect(await fetcher.fetchText(RESOURCE_URL, localPath)).toBe('{"mew":{"name":"Mew"}}')
      expect(await fetcher.fetchJson(RESOURCE_URL, localPath, { force: true })).toEqual({
        mew: { name: 'Mew' },
      })
    })
  })
})
