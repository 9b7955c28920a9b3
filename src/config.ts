import { availableParallelism } from 'node:os'
import { z } from 'zod'
import { ConfigurationError } from './utils/errors.js'

export const DEFAULT_DIVISION = 'masters'

const divisionsSchema = z
  .array(z.string())
  .transform((divisions) =>
    divisions.map((division) => division.trim().toLowerCase()).filter(Boolean)
  )
  .transform((divisions) => (divisions.length > 0 ? divisions : [DEFAULT_DIVISION]))

export const PipelineConfigSchema = z.object({
  /** Root of the on-disk cache; standings and reference data live below it */
  cacheDir: z.string().min(1).default('data'),
  /** Per-request timeout */
  timeoutMs: z.number().int().min(1).default(30000),
  /** Tournaments processed at once */
  workers: z.number().int().min(1).default(() => availableParallelism()),
  divisions: divisionsSchema.default([DEFAULT_DIVISION]),
  output: z.string().min(1).default('tournament_teams.json'),
  /** Only the first N tournaments of the listing */
  limit: z.number().int().min(1).optional(),
  logLevel: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  refreshStandings: z.boolean().default(false),
  refreshReference: z.boolean().default(false),
})

export type PipelineConfig = z.output<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>

type Environment = Readonly<Record<string, string | undefined>>

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return Number(value)
}

/**
 * Resolves the run configuration. Explicit input wins over the environment
 * (`ROSTER_CANON_CACHE_DIR`, `ROSTER_CANON_TIMEOUT_MS`, `LOG_LEVEL`), which
 * wins over the defaults.
 *
 * @throws {ConfigurationError} Naming the first invalid field
 */
export function resolveConfig(
  input: PipelineConfigInput = {},
  env: Environment = process.env
): PipelineConfig {
  const merged: PipelineConfigInput = {
    ...input,
    cacheDir: input.cacheDir ?? env.ROSTER_CANON_CACHE_DIR,
    timeoutMs: input.timeoutMs ?? envNumber(env.ROSTER_CANON_TIMEOUT_MS),
  }

  const logLevel = input.logLevel ?? (env.LOG_LEVEL?.toLowerCase() || undefined)
  const result = PipelineConfigSchema.safeParse({ ...merged, logLevel })
  if (result.success) return result.data

  const issue = result.error.issues[0]
  const field = issue?.path.join('.') || undefined
  throw new ConfigurationError(
    `Invalid configuration${field ? ` for '${field}'` : ''}: ${issue?.message ?? 'unknown error'}`,
    field,
    { issues: result.error.issues.map((entry) => entry.message) }
  )
}
