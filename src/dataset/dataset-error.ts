import { RosterCanonError } from '../utils/errors.js'

/**
 * Error thrown when a reference resource cannot be parsed or has the wrong
 * shape. No dataset is published after one.
 */
export class DatasetParseError extends RosterCanonError {
  /** Resource that failed, e.g. 'formats' */
  public readonly resource: string

  public readonly cause?: Error

  constructor(resource: string, reason: string, cause?: Error) {
    super(
      `Failed to parse reference resource '${resource}': ${reason}`,
      'DATASET_PARSE_ERROR',
      { resource, reason }
    )
    this.name = 'DatasetParseError'
    this.resource = resource
    this.cause = cause
  }
}
