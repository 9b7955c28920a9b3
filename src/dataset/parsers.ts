import JSON5 from 'json5'
import { describeError } from '../utils/errors.js'
import { DatasetParseError } from './dataset-error.js'
import type { ReferenceResource } from './sources.js'

const MODULE_LITERAL = /=\s*([[{].*[\]}])\s*;?\s*$/s

/**
 * Extracts the object or array literal a script assigns, e.g. the body of
 * `exports.Formats = [ ... ];`, and parses it as JSON5.
 *
 * @throws {DatasetParseError} When no literal is found or it does not parse
 */
export function parseModuleLiteral(text: string, resource = 'module'): unknown {
  const match = MODULE_LITERAL.exec(text)
  if (!match) {
    throw new DatasetParseError(resource, 'no assigned object or array literal found')
  }
  try {
    return JSON5.parse(match[1])
  } catch (error) {
    throw new DatasetParseError(
      resource,
      describeError(error),
      error instanceof Error ? error : undefined
    )
  }
}

/**
 * Decodes a fetched resource body according to its declared format.
 */
export function parsePayload(resource: ReferenceResource, body: Buffer | string): unknown {
  const text = typeof body === 'string' ? body : body.toString('utf8')

  if (resource.format === 'module') return parseModuleLiteral(text, resource.key)

  try {
    return resource.format === 'json5' ? JSON5.parse(text) : JSON.parse(text)
  } catch (error) {
    throw new DatasetParseError(
      resource.key,
      describeError(error),
      error instanceof Error ? error : undefined
    )
  }
}
