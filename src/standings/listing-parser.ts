import * as cheerio from 'cheerio'
import type { TournamentSummary } from '../types/extraction.js'

export const STANDINGS_BASE_URL = 'https://www.pokedata.ovh/standingsVGC'

const TOURNAMENT_TARGET = /location\.href\s*=\s*'([A-Za-z0-9_-]+)\/'/
const DIVISION_TARGET = /location\.href\s*=\s*'([a-z]+)\/'/i
const PLAYER_LABEL = /^(.+?)\s*\[([A-Z]{2})\]$/

function buttonTargets(html: string, pattern: RegExp): Array<{ target: string; label: string }> {
  const $ = cheerio.load(html)
  const found: Array<{ target: string; label: string }> = []

  $('button[onclick]').each((_, element) => {
    const button = $(element)
    const match = pattern.exec(button.attr('onclick') ?? '')
    if (!match) return
    button.find('br').replaceWith('\n')
    found.push({ target: match[1], label: button.text() })
  })

  return found
}

/**
 * Reads the tournament buttons of the standings landing page.
 *
 * A button's first text line is the tournament name and its second line the
 * date, with any leading dash removed.
 */
export function parseTournamentList(
  html: string,
  baseUrl: string = STANDINGS_BASE_URL
): TournamentSummary[] {
  return buttonTargets(html, TOURNAMENT_TARGET).map(({ target, label }) => {
    const lines = label
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)

    return {
      id: target,
      name: lines[0] ?? target,
      date: lines.length > 1 ? lines[1].replace(/^-\s*/, '') : '',
      url: `${baseUrl}/${target}/`,
    }
  })
}

/**
 * Division slugs linked from a tournament page, lowercased, unique and sorted.
 */
export function parseDivisions(html: string): string[] {
  const slugs = new Set(
    buttonTargets(html, DIVISION_TARGET).map(({ target }) => target.toLowerCase())
  )
  return [...slugs].sort()
}

/**
 * Splits a `Name [CC]` player label into the name and its country code.
 *
 * @example
 * ```typescript
 * splitPlayerName('Ash Ketchum [JP]') // { name: 'Ash Ketchum', country: 'JP' }
 * splitPlayerName('Gary') // { name: 'Gary' }
 * ```
 */
export function splitPlayerName(label: string): { name: string; country?: string } {
  const trimmed = label.trim()
  const match = PLAYER_LABEL.exec(trimmed)
  if (!match) return { name: trimmed }
  return { name: match[1].trim(), country: match[2] }
}
