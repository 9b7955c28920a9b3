import { normalizeId } from '../normalizers/identifier.js'
import {
  COMPOSITE_LEADING,
  COMPOSITE_TRAILING,
  DESCRIPTOR_KEYWORDS,
  DESCRIPTOR_RULES,
  DESCRIPTOR_STOP_WORDS,
  DESCRIPTOR_WORDS,
  ruleApplies,
} from './descriptors.js'

/**
 * A species label split into its base name and forme descriptor.
 */
export interface ParsedSpeciesLabel {
  /** Base species name as written, trimmed */
  base: string
  /** Descriptor text without its brackets; empty when the label has none */
  descriptor: string
}

const BRACKETS: ReadonlyArray<[string, string]> = [
  ['[', ']'],
  ['(', ')'],
]

function wordKey(token: string): string {
  return token.toLowerCase().replace(/[^a-z0-9]/g, '')
}

function isDescriptorWord(key: string): boolean {
  return (
    DESCRIPTOR_KEYWORDS.has(key) ||
    DESCRIPTOR_WORDS.has(key) ||
    DESCRIPTOR_STOP_WORDS.has(key)
  )
}

/**
 * Splits a roster species label into base and descriptor.
 *
 * A `[...]` segment is preferred, then `(...)`. Without brackets, the longest
 * trailing run of descriptor words that contains at least one descriptor
 * keyword is taken, provided a base word remains in front of it.
 *
 * @example
 * ```typescript
 * parseSpeciesLabel('Slowbro [Galarian Form]') // { base: 'Slowbro', descriptor: 'Galarian Form' }
 * parseSpeciesLabel('Ninetales Alolan') // { base: 'Ninetales', descriptor: 'Alolan' }
 * parseSpeciesLabel('Flutter Mane') // { base: 'Flutter Mane', descriptor: '' }
 * ```
 */
export function parseSpeciesLabel(label: string): ParsedSpeciesLabel {
  const text = label.trim()

  for (const [opener, closer] of BRACKETS) {
    const open = text.indexOf(opener)
    if (open === -1 || !text.includes(closer)) continue
    const trailing = text.slice(open + 1)
    const close = trailing.indexOf(closer)
    const descriptor = close === -1 ? trailing : trailing.slice(0, close)
    return { base: text.slice(0, open).trim(), descriptor: descriptor.trim() }
  }

  const tokens = text.split(/\s+/).filter((token) => token.length > 0)
  let start = tokens.length
  let keywordAt = -1
  while (start > 1 && isDescriptorWord(wordKey(tokens[start - 1]))) {
    start--
    if (DESCRIPTOR_KEYWORDS.has(wordKey(tokens[start]))) keywordAt = start
  }

  if (keywordAt === -1) return { base: text, descriptor: '' }
  return {
    base: tokens.slice(0, start).join(' '),
    descriptor: tokens.slice(start).join(' '),
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

function mapWord(word: string): string {
  return DESCRIPTOR_WORDS.get(word) ?? capitalize(word)
}

/**
 * Joins a descriptor onto its base as the reference corpus spells forme
 * names, e.g. `Slowbro` + `Galarian Form` → `Slowbro-Galar`.
 */
export function combineDescriptor(base: string, descriptor: string): string {
  const lowered = descriptor.replace(/–/g, '-').toLowerCase()
  const baseId = normalizeId(base)

  for (const rule of DESCRIPTOR_RULES) {
    if (ruleApplies(rule, baseId, lowered)) {
      return rule.suffix ? `${base}-${rule.suffix}` : base
    }
  }

  const words = lowered
    .split(/[^a-z0-9]+/)
    .filter((word) => word && !DESCRIPTOR_STOP_WORDS.has(word) && word !== baseId)

  const mapped: string[] = []
  for (let i = 0; i < words.length; i++) {
    const word = words[i]
    const next = words[i + 1]
    if (COMPOSITE_LEADING.has(word) && next !== undefined && COMPOSITE_TRAILING.has(next)) {
      mapped.push(`${mapWord(word)}-${mapWord(next)}`)
      i++
      continue
    }
    const replacement = mapWord(word)
    if (replacement) mapped.push(replacement)
  }

  return mapped.length > 0 ? `${base}-${mapped.join('-')}` : base
}

/**
 * Rewrites a roster species label into the corpus' `Base-Forme` spelling.
 * Labels without a descriptor come back trimmed and otherwise unchanged.
 */
export function normalizeSpeciesLabel(label: string): string {
  const { base, descriptor } = parseSpeciesLabel(label)
  if (!descriptor) return base
  return combineDescriptor(base, descriptor)
}
