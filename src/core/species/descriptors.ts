import table from './descriptors.json' with { type: 'json' }

/**
 * Suffix rule applied to a species descriptor before generic word mapping.
 */
export interface DescriptorRule {
  /** Base species ids the rule is limited to; any species when omitted */
  species?: ReadonlySet<string>
  /**
   * Every group must be satisfied; a group is satisfied when the lowercased
   * descriptor contains any of its words
   */
  requires: ReadonlyArray<readonly string[]>
  /** Suffix joined onto the base with a hyphen; empty keeps the bare base */
  suffix: string
}

/** Descriptor word → canonical forme word. An empty value drops the word. */
export const DESCRIPTOR_WORDS: ReadonlyMap<string, string> = new Map(
  Object.entries(table.words)
)

export const DESCRIPTOR_STOP_WORDS: ReadonlySet<string> = new Set(table.stopWords)

/** Words whose presence marks a trailing run of an unbracketed label as a descriptor */
export const DESCRIPTOR_KEYWORDS: ReadonlySet<string> = new Set(table.keywords)

export const GENDERED_SPECIES: ReadonlySet<string> = new Set(table.genderedSpecies)

export const COMPOSITE_LEADING: ReadonlySet<string> = new Set(
  table.composites.leading
)
export const COMPOSITE_TRAILING: ReadonlySet<string> = new Set(
  table.composites.trailing
)

const MAUSHOLD = new Set(['maushold'])
const TAUROS = new Set(['tauros'])

/** Checked in order; the first rule that applies decides the suffix. */
export const DESCRIPTOR_RULES: readonly DescriptorRule[] = [
  { species: GENDERED_SPECIES, requires: [['female', '♀']], suffix: 'F' },
  { species: GENDERED_SPECIES, requires: [['male']], suffix: '' },
  { species: MAUSHOLD, requires: [['four']], suffix: 'Four' },
  { species: MAUSHOLD, requires: [['three']], suffix: '' },
  { species: MAUSHOLD, requires: [['family']], suffix: 'Four' },
  { species: TAUROS, requires: [['paldea'], ['aqua']], suffix: 'Paldea-Aqua' },
  { species: TAUROS, requires: [['paldea'], ['blaze']], suffix: 'Paldea-Blaze' },
  { species: TAUROS, requires: [['paldea'], ['combat']], suffix: 'Paldea-Combat' },
  { species: TAUROS, requires: [['paldea']], suffix: 'Paldea' },
  { requires: [['bloodmoon']], suffix: 'Bloodmoon' },
]

export function ruleApplies(
  rule: DescriptorRule,
  baseId: string,
  descriptor: string
): boolean {
  if (rule.species && !rule.species.has(baseId)) return false
  return rule.requires.every((group) =>
    group.some((word) => descriptor.includes(word))
  )
}
