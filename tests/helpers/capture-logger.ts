import { pino } from 'pino'
import type { Logger } from 'pino'

/**
 * Debug-level logger whose records are parsed into `lines` as they are written.
 */
export function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = []
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line)
        if (parsed && typeof parsed === 'object') lines.push({ ...parsed })
      },
    }
  )
  return { logger, lines }
}
