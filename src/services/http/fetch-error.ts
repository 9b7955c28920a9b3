/**
 * Transport error classes raised by the caching fetcher
 * @module services/http/fetch-error
 */

import { RosterCanonError } from '../../utils/errors.js'

/**
 * Category of a transport failure
 */
export type FetchErrorType = 'timeout' | 'network' | 'http' | 'aborted'

/**
 * Base error class for every failed retrieval
 */
export class FetchError extends RosterCanonError {
  /** Error type for categorization */
  public readonly type: FetchErrorType

  /** URL that was being retrieved */
  public readonly url: string

  /** Underlying transport error, when there is one */
  public readonly cause?: Error

  constructor(
    message: string,
    code: string,
    type: FetchErrorType,
    url: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(message, code, { url, ...context })
    this.name = 'FetchError'
    this.type = type
    this.url = url
    this.cause = cause
  }
}

/**
 * Error thrown when a request exceeds its timeout
 */
export class FetchTimeoutError extends FetchError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  constructor(url: string, timeoutMs: number, cause?: Error) {
    super(
      `Request to ${url} timed out after ${timeoutMs}ms`,
      'FETCH_TIMEOUT',
      'timeout',
      url,
      cause,
      { timeoutMs }
    )
    this.name = 'FetchTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when the request never produced a response
 */
export class FetchNetworkError extends FetchError {
  constructor(url: string, message: string, cause?: Error) {
    super(
      `Network error fetching ${url}: ${message}`,
      'FETCH_NETWORK_ERROR',
      'network',
      url,
      cause,
      { originalMessage: message }
    )
    this.name = 'FetchNetworkError'
  }
}

/**
 * Error thrown for a response status other than 2xx or 304
 */
export class FetchHttpError extends FetchError {
  /** HTTP status code */
  public readonly status: number

  constructor(url: string, status: number) {
    super(
      `Request to ${url} failed with HTTP ${status}`,
      'FETCH_HTTP_ERROR',
      'http',
      url,
      undefined,
      { status }
    )
    this.name = 'FetchHttpError'
    this.status = status
  }
}

/**
 * Error thrown when the caller aborted the request
 */
export class FetchAbortedError extends FetchError {
  constructor(url: string, cause?: Error) {
    super(`Request to ${url} was aborted`, 'FETCH_ABORTED', 'aborted', url, cause)
    this.name = 'FetchAbortedError'
  }
}

/**
 * Check if an error is a fetch error
 */
export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError
}
