import { describe, it, expect } from 'vitest'
import { LegalityValidator } from '../../../src/core/validator.js'
import { createDataset } from '../../fixtures/reference.js'

describe('LegalityValidator', () => {
  const validator = new LegalityValidator(createDataset())

  describe('canLearn', () => {
    it('should read the species learnset', () => {
      expect(validator.canLearn('fluttermane', 'moonblast')).toBe(true)
      expect(validator.canLearn('conkeldurr', 'wideguard')).toBe(false)
    })

    it('should fall back to the base species learnset', () => {
      expect(validator.canLearn('slowbrogalar', 'hydropump')).toBe(true)
      expect(validator.canLearn('mausholdfour', 'popbomb')).toBe(true)
    })

    it('should prefer a forme learnset without merging the base', () => {
      expect(validator.canLearn('taurospaldeaaqua', 'hydropump')).toBe(true)
      expect(validator.canLearn('taurospaldeaaqua', 'protect')).toBe(false)
    })

    it('should return false for unknown species', () => {
      expect(validator.canLearn('missingno', 'protect')).toBe(false)
    })
  })

  describe('validFormats', () => {
    it('should exclude formats banning a category tag of the species', () => {
      expect(validator.validFormats('fluttermane')).toEqual([
        'gen9vgc2025regi',
        'gen9vgcbo3custom',
      ])
      expect(validator.validFormats('mew')).toEqual(['gen9vgc2025regh', 'gen9vgcbo3custom'])
      expect(validator.validFormats('calyrexshadow')).toEqual([
        'gen9vgc2025regi',
        'gen9vgcbo3custom',
      ])
    })

    it('should exclude formats banning the species by name', () => {
      expect(validator.validFormats('ninetalesalola')).toEqual([
        'gen9vgc2025regh',
        'gen9vgc2025regi',
      ])
    })

    it('should consider non-VGC formats when unrestricted', () => {
      expect(validator.validFormats('ninetalesalola', false)).toEqual([
        'gen9ou',
        'gen9vgc2025regh',
        'gen9vgc2025regi',
      ])
      expect(validator.validFormats('fluttermane', false)).toEqual([
        'gen9vgc2025regi',
        'gen9vgcbo3custom',
      ])
    })

    it('should return nothing for unreleased species', () => {
      expect(validator.validFormats('zarude')).toEqual([])
      expect(validator.validFormats('cramorant')).toEqual([])
    })
  })
})
