import { describe, it, expect } from 'vitest'
import { DatasetParseError } from '../../../src/dataset/dataset-error.js'
import { parseModuleLiteral, parsePayload } from '../../../src/dataset/parsers.js'
import { REFERENCE_RESOURCES } from '../../../src/dataset/sources.js'
import type { ReferenceResource, ReferenceResourceKey } from '../../../src/dataset/sources.js'

function resource(key: ReferenceResourceKey): ReferenceResource {
  const found = REFERENCE_RESOURCES.find((entry) => entry.key === key)
  if (!found) throw new Error(`no resource ${key}`)
  return found
}

describe('Dataset Parsers', () => {
  describe('parseModuleLiteral', () => {
    it('should extract an assigned object literal', () => {
      const text = 'exports.BattleFormatsData = {\n  mew: {tier: "Uber",},\n};\n'
      expect(parseModuleLiteral(text)).toEqual({ mew: { tier: 'Uber' } })
    })

    it('should extract an assigned array literal', () => {
      const text = [
        '// generated listing',
        'exports.Formats = [',
        "  {section: 'S/V Doubles'},",
        "  {name: '[Gen 9] OU', banlist: ['Flutter Mane']},",
        '];',
      ].join('\n')

      expect(parseModuleLiteral(text)).toEqual([
        { section: 'S/V Doubles' },
        { name: '[Gen 9] OU', banlist: ['Flutter Mane'] },
      ])
    })

    it('should skip assignments that are not followed by a literal', () => {
      const text = 'var mode = "strict"; exports.X = {a: 1}'
      expect(parseModuleLiteral(text)).toEqual({ a: 1 })
    })

    it('should reject text without an assigned literal', () => {
      expect(() => parseModuleLiteral('module.exports = null', 'formats')).toThrow(
        "Failed to parse reference resource 'formats': no assigned object or array literal found"
      )
    })

    it('should reject a literal that does not parse', () => {
      let caught: unknown
      try {
        parseModuleLiteral('exports.X = {broken: }', 'formatsData')
      } catch (error) {
        caught = error
      }
      expect(caught).toBeInstanceOf(DatasetParseError)
      expect(caught).toMatchObject({ resource: 'formatsData', code: 'DATASET_PARSE_ERROR' })
    })
  })

  describe('parsePayload', () => {
    it('should decode JSON resources', () => {
      expect(parsePayload(resource('pokedex'), Buffer.from('{"mew":{"name":"Mew"}}'))).toEqual({
        mew: { name: 'Mew' },
      })
    })

    it('should decode JSON5 resources', () => {
      const body = "{focussash: {name: 'Focus Sash',},}"
      expect(parsePayload(resource('items'), body)).toEqual({
        focussash: { name: 'Focus Sash' },
      })
    })

    it('should decode module resources', () => {
      expect(parsePayload(resource('formats'), 'exports.Formats = [];')).toEqual([])
    })

    it('should name the resource when JSON is malformed', () => {
      expect(() => parsePayload(resource('moves'), '{"shadowball":')).toThrow(
        /^Failed to parse reference resource 'moves': /
      )
    })
  })
})
