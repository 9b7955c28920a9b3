import { ReferenceDataset } from '../../src/dataset/reference-dataset.js'
import type { ReferencePayloads } from '../../src/dataset/reference-dataset.js'
import type { FakeResponse } from '../helpers/fake-http.js'

/**
 * Small reference corpus covering regional formes, gendered formes,
 * count formes, category tags and nonstandard species.
 */
export function createReferencePayloads(): ReferencePayloads {
  return {
    pokedex: {
      slowbro: { name: 'Slowbro' },
      slowbrogalar: { name: 'Slowbro-Galar', baseSpecies: 'Slowbro', forme: 'Galar' },
      tauros: { name: 'Tauros' },
      taurospaldeacombat: {
        name: 'Tauros-Paldea-Combat',
        baseSpecies: 'Tauros',
        forme: 'Paldea-Combat',
      },
      taurospaldeaaqua: {
        name: 'Tauros-Paldea-Aqua',
        baseSpecies: 'Tauros',
        forme: 'Paldea-Aqua',
      },
      basculegion: { name: 'Basculegion' },
      basculegionf: { name: 'Basculegion-F', baseSpecies: 'Basculegion', forme: 'F' },
      sinistcha: { name: 'Sinistcha' },
      sinistchamasterpiece: {
        name: 'Sinistcha-Masterpiece',
        baseSpecies: 'Sinistcha',
        forme: 'Masterpiece',
      },
      calyrex: { name: 'Calyrex', tags: ['Restricted Legendary'] },
      calyrexshadow: {
        name: 'Calyrex-Shadow',
        baseSpecies: 'Calyrex',
        forme: 'Shadow',
        tags: ['Restricted Legendary'],
      },
      maushold: { name: 'Maushold' },
      mausholdfour: { name: 'Maushold-Four', baseSpecies: 'Maushold', forme: 'Four' },
      necrozma: { name: 'Necrozma', tags: ['Restricted Legendary'] },
      necrozmadawnwings: {
        name: 'Necrozma-Dawn-Wings',
        baseSpecies: 'Necrozma',
        forme: 'Dawn-Wings',
        tags: ['Restricted Legendary'],
      },
      ursaluna: { name: 'Ursaluna' },
      ursalunabloodmoon: {
        name: 'Ursaluna-Bloodmoon',
        baseSpecies: 'Ursaluna',
        forme: 'Bloodmoon',
      },
      ninetales: { name: 'Ninetales' },
      ninetalesalola: { name: 'Ninetales-Alola', baseSpecies: 'Ninetales', forme: 'Alola' },
      fluttermane: { name: 'Flutter Mane', tags: ['Paradox'] },
      conkeldurr: { name: 'Conkeldurr' },
      mew: { name: 'Mew', tags: ['Mythical'] },
      zarude: { name: 'Zarude', tags: ['Mythical'], isNonstandard: 'Past' },
      cramorant: { name: 'Cramorant' },
    },
    moves: {
      hydropump: { name: 'Hydro Pump' },
      shadowball: { name: 'Shadow Ball' },
      moonblast: { name: 'Moonblast' },
      icywind: { name: 'Icy Wind' },
      fakeout: { name: 'Fake Out' },
      popbomb: { name: 'Population Bomb' },
      electroshot: { name: 'Electro Shot' },
      wideguard: { name: 'Wide Guard' },
      protect: { name: 'Protect' },
      uturn: { name: 'U-turn' },
      bloodmoon: { name: 'Blood Moon' },
    },
    items: {
      focussash: { name: 'Focus Sash' },
      choicescarf: { name: 'Choice Scarf' },
      leftovers: { name: 'Leftovers' },
    },
    abilities: {
      protosynthesis: { name: 'Protosynthesis' },
      intimidate: { name: 'Intimidate' },
      guts: { name: 'Guts' },
    },
    learnsets: {
      fluttermane: { learnset: { shadowball: ['9M'], moonblast: ['9L'], protect: ['9M'], icywind: ['9M'] } },
      slowbro: { learnset: { hydropump: ['9L'], protect: ['9M'] } },
      conkeldurr: { learnset: { protect: ['9M'] } },
      taurospaldeaaqua: { learnset: { hydropump: ['9L'] } },
      basculegion: { learnset: { hydropump: ['9L'] } },
      maushold: { learnset: { popbomb: ['9L'], protect: ['9M'] } },
      ursalunabloodmoon: { learnset: { bloodmoon: ['9L'] } },
      mew: {},
    },
    formatsData: {
      fluttermane: { tier: 'OU' },
      zarude: { isNonstandard: 'Past' },
      cramorant: { isNonstandard: 'Unobtainable' },
    },
    formats: [
      { section: 'S/V Doubles', column: 1 },
      { name: '[Gen 9] VGC 2025 Reg I', gameType: 'doubles', banlist: ['Mythical'] },
      {
        name: '[Gen 9] VGC 2025 Reg H',
        gameType: 'doubles',
        banlist: ['Paradox', 'Restricted Legendary'],
      },
      { name: '[Gen 9] OU', banlist: ['Flutter Mane'] },
      { name: '[Gen 9] VGC Singles Trial', gameType: 'singles', banlist: [] },
      {
        id: 'gen9vgcbo3custom',
        name: '[Gen 9] VGC Bo3 Custom',
        gameType: 'doubles',
        banlist: ['Ninetales-Alola'],
      },
    ],
  }
}

export function createDataset(): ReferenceDataset {
  return ReferenceDataset.fromPayloads(createReferencePayloads())
}

/**
 * Routes serving the corpus the way the reference site lays it out below
 * `base`, each resource with its own ETag.
 */
export function referenceRoutes(
  base: string,
  overrides: Record<string, FakeResponse> = {}
): Record<string, FakeResponse> {
  const payloads = createReferencePayloads()
  const json = (value: unknown, etag: string): FakeResponse => ({
    body: JSON.stringify(value),
    headers: { etag },
  })

  return {
    [`${base}/pokedex.json`]: json(payloads.pokedex, '"dex"'),
    [`${base}/moves.json`]: json(payloads.moves, '"moves"'),
    [`${base}/text/items.json5`]: json(payloads.items, '"items"'),
    [`${base}/text/abilities.json5`]: json(payloads.abilities, '"abilities"'),
    [`${base}/learnsets.json`]: json(payloads.learnsets, '"learnsets"'),
    [`${base}/formats-data.js`]: {
      body: `exports.BattleFormatsData = ${JSON.stringify(payloads.formatsData)};`,
      headers: { etag: '"formats-data"' },
    },
    [`${base}/formats.js`]: {
      body: `exports.Formats = ${JSON.stringify(payloads.formats)};\n`,
      headers: { etag: '"formats"' },
    },
    ...overrides,
  }
}
