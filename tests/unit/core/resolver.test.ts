import { describe, it, expect } from 'vitest'
import { moveCandidates, Resolver } from '../../../src/core/resolver.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import { silentLogger } from '../../../src/utils/logger.js'
import { createDataset } from '../../fixtures/reference.js'

describe('Resolver', () => {
  const dataset = createDataset()
  const resolver = new Resolver(dataset, { logger: silentLogger })

  describe('constructor', () => {
    it('should reject a cutoff outside 0..1', () => {
      expect(() => new Resolver(dataset, { fuzzyCutoff: 1.5 })).toThrow(InvalidParameterError)
      expect(() => new Resolver(dataset, { fuzzyCutoff: -0.1 })).toThrow(
        "Invalid parameter 'fuzzyCutoff': must be between 0 and 1 (inclusive)"
      )
    })
  })

  describe('resolveSpecies', () => {
    it('should resolve bracketed forme labels', () => {
      expect(resolver.resolveSpecies('Slowbro [Galarian Form]')).toBe('slowbrogalar')
      expect(resolver.resolveSpecies('Tauros [Paldean Form - Aqua Breed]')).toBe(
        'taurospaldeaaqua'
      )
      expect(resolver.resolveSpecies('Basculegion [Female]')).toBe('basculegionf')
      expect(resolver.resolveSpecies('Necrozma [Dawn Wings]')).toBe('necrozmadawnwings')
      expect(resolver.resolveSpecies('Ursaluna [Bloodmoon]')).toBe('ursalunabloodmoon')
    })

    it('should resolve count formes', () => {
      expect(resolver.resolveSpecies('Maushold [Family of Three]')).toBe('maushold')
      expect(resolver.resolveSpecies('Maushold [Family of Four]')).toBe('mausholdfour')
    })

    it('should resolve unbracketed descriptors', () => {
      expect(resolver.resolveSpecies('Ninetales Alolan')).toBe('ninetalesalola')
      expect(resolver.resolveSpecies('Calyrex Shadow Rider')).toBe('calyrexshadow')
    })

    it('should resolve plain names', () => {
      expect(resolver.resolveSpecies('Flutter Mane')).toBe('fluttermane')
      expect(resolver.resolveSpecies('  slowbro ')).toBe('slowbro')
    })

    it('should return null for unknown labels', () => {
      expect(resolver.resolveSpecies('Xyzzy')).toBeNull()
      expect(resolver.resolveSpecies('')).toBeNull()
    })
  })

  describe('resolveSpeciesDetailed', () => {
    it('should report an exact hit on the rewritten label', () => {
      expect(resolver.resolveSpeciesDetailed('Slowbro [Galarian Form]')).toEqual({
        id: 'slowbrogalar',
        method: 'exact',
        candidate: 'slowbrogalar',
      })
    })

    it('should fall back to the base name when the forme is unknown', () => {
      expect(resolver.resolveSpeciesDetailed('Sinistcha [Unremarkable Form]')).toEqual({
        id: 'sinistcha',
        method: 'base',
        candidate: 'sinistcha',
      })
    })

    it('should match misspelled names approximately', () => {
      expect(resolver.resolveSpeciesDetailed('Fluter Mane')).toEqual({
        id: 'fluttermane',
        method: 'fuzzy',
        candidate: 'fluttermane',
      })
    })
  })

  describe('moveCandidates', () => {
    it('should list the label, the label without qualifiers and its leading words', () => {
      expect(moveCandidates(' Electro Shot (Singles) ')).toEqual([
        'Electro Shot (Singles)',
        'Electro Shot',
      ])
      expect(moveCandidates('Hidro Pomp')).toEqual(['Hidro Pomp', 'Hidro'])
      expect(moveCandidates('U-turn')).toEqual(['U-turn', 'U'])
    })

    it('should return nothing for a blank label', () => {
      expect(moveCandidates('   ')).toEqual([])
    })
  })

  describe('resolveMove', () => {
    it('should resolve exact and qualified labels', () => {
      expect(resolver.resolveMove('Shadow Ball')).toBe('shadowball')
      expect(resolver.resolveMove('Icy Wind (Doubles)')).toBe('icywind')
      expect(resolver.resolveMove('Electro Shot (Singles)')).toBe('electroshot')
      expect(resolver.resolveMove('U-turn')).toBe('uturn')
    })

    it('should resolve moves by their display name when the id differs', () => {
      expect(resolver.resolveMove('Population Bomb')).toBe('popbomb')
    })

    it('should match misspelled moves approximately', () => {
      expect(resolver.resolveMove('Hidro Pomp')).toBe('hydropump')
      expect(resolver.resolveMove('Shdow Ball')).toBe('shadowball')
    })

    it('should return null for unknown moves', () => {
      expect(resolver.resolveMove('Totally Made Up Move')).toBeNull()
      expect(resolver.resolveMove('')).toBeNull()
    })

    it('should not match anything below a stricter cutoff', () => {
      const strict = new Resolver(dataset, { fuzzyCutoff: 0.9, logger: silentLogger })
      expect(strict.resolveMove('Hidro Pomp')).toBeNull()
      expect(strict.resolveMove('Shdow Ball')).toBe('shadowball')
    })
  })

  describe('resolveItem and resolveAbility', () => {
    it('should resolve exact names', () => {
      expect(resolver.resolveItem('Focus Sash')).toBe('focussash')
      expect(resolver.resolveItem('choice-scarf')).toBe('choicescarf')
      expect(resolver.resolveAbility('Protosynthesis')).toBe('protosynthesis')
    })

    it('should never match approximately', () => {
      expect(resolver.resolveItem('Focus Sahs')).toBeNull()
      expect(resolver.resolveAbility('Intimidat')).toBeNull()
    })
  })
})
