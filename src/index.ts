// Core resolution
export {
  Resolver,
  moveCandidates,
  type ResolverCorpus,
  type ResolverOptions,
  type SpeciesResolution,
  type SpeciesResolutionMethod,
} from './core/resolver.js'
export {
  LegalityValidator,
  CATEGORY_TAGS,
  UNRELEASED_STATUSES,
  type LegalityCorpus,
} from './core/validator.js'
export {
  buildAliasIndex,
  isBaseForm,
  speciesAliases,
  type AliasSource,
} from './core/alias-index.js'

// Normalizers and comparators
export {
  normalizeId,
  normalizeMoveLabel,
  MOVE_STOP_WORDS,
} from './core/normalizers/identifier.js'
export {
  parseSpeciesLabel,
  combineDescriptor,
  normalizeSpeciesLabel,
  type ParsedSpeciesLabel,
} from './core/species/label-parser.js'
export {
  sequenceRatio,
  closestMatch,
  DEFAULT_FUZZY_CUTOFF,
  type SequenceRatioOptions,
  type ClosestMatch,
  type ClosestMatchOptions,
} from './core/comparators.js'

// Reference data
export {
  ReferenceDataset,
  type ReferencePayloads,
} from './dataset/reference-dataset.js'
export {
  ReferenceDataLoader,
  type ReferenceDataLoaderOptions,
  type LoadOptions,
} from './dataset/loader.js'
export { parseModuleLiteral, parsePayload } from './dataset/parsers.js'
export {
  REFERENCE_BASE_URL,
  REFERENCE_RESOURCES,
  type ReferenceResource,
  type ReferenceResourceKey,
  type PayloadFormat,
} from './dataset/sources.js'
export { DatasetParseError } from './dataset/dataset-error.js'

// Fetching
export {
  CachingFetcher,
  DEFAULT_FETCH_TIMEOUT_MS,
  type CachingFetcherOptions,
  type FetchOptions,
} from './services/http/caching-fetcher.js'
export {
  FetchError,
  FetchTimeoutError,
  FetchNetworkError,
  FetchHttpError,
  FetchAbortedError,
  isFetchError,
  type FetchErrorType,
} from './services/http/fetch-error.js'

// Standings
export {
  StandingsClient,
  DEFAULT_DIVISIONS,
  type RosterSource,
  type StandingsClientOptions,
} from './standings/standings-client.js'
export {
  parseTournamentList,
  parseDivisions,
  splitPlayerName,
  STANDINGS_BASE_URL,
} from './standings/listing-parser.js'
export type { RosterPlayer, RosterSlot } from './standings/schemas.js'

// Pipeline
export {
  RosterConverter,
  rosterEntryFromSlot,
  TERA_TYPES,
  type PlayerConverter,
  type RosterConverterOptions,
} from './pipeline/convert.js'
export {
  ConversionWorkerPool,
  type ConversionWorkerPoolOptions,
} from './pipeline/conversion-pool.js'
export { renderTeam } from './pipeline/team-text.js'
export {
  ExtractionPipeline,
  sortByPlacing,
  type ExtractionPipelineOptions,
} from './pipeline/extraction-pipeline.js'
export { TaskPool, mapWithConcurrency } from './pipeline/task-pool.js'
export {
  ConversionWorkerError,
  ExtractionError,
  PipelineInterruptedError,
} from './pipeline/pipeline-error.js'
export { runExtraction, type RunDependencies, type RunSummary } from './pipeline/run.js'

// Output
export {
  serializeResults,
  writeOutput,
  type OutputDocument,
} from './output/serializer.js'

// Configuration and CLI
export {
  resolveConfig,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config.js'
export { runCli, parseCliArgs, exitCodeFor } from './cli.js'

// Errors and logging
export {
  RosterCanonError,
  InvalidParameterError,
  ConfigurationError,
  isRosterCanonError,
} from './utils/errors.js'
export { createLogger, logger, silentLogger } from './utils/logger.js'

// Types
export type * from './types/dataset.js'
export type * from './types/extraction.js'
