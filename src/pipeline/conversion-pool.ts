import { existsSync } from 'node:fs'
import { availableParallelism } from 'node:os'
import { fileURLToPath } from 'node:url'
import { Worker } from 'node:worker_threads'
import type { Logger } from 'pino'
import type { ReferenceDataset } from '../dataset/reference-dataset.js'
import type { RosterPlayer } from '../standings/schemas.js'
import type { PlayerExtraction } from '../types/extraction.js'
import { requirePositiveInteger } from '../utils/errors.js'
import { moduleLogger } from '../utils/logger.js'
import type {
  ConversionReply,
  ConversionRequest,
  ConversionWorkerData,
} from './conversion-protocol.js'
import type { PlayerConverter } from './convert.js'
import { ConversionWorkerError } from './pipeline-error.js'
import { TaskPool } from './task-pool.js'

export interface ConversionWorkerPoolOptions {
  /** Worker threads at most (default: available parallelism) */
  size?: number
  /** Receives the records workers log */
  logger?: Logger
}

interface PendingConversion {
  resolve: (player: PlayerExtraction) => void
  reject: (error: Error) => void
}

interface ConversionThread {
  worker: Worker
  pending: Map<number, PendingConversion>
}

const LOG_METHODS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const
type LogMethod = (typeof LOG_METHODS)[number]

function isLogMethod(label: string | undefined): label is LogMethod {
  return LOG_METHODS.some((method) => method === label)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Compiled builds ship the worker as JavaScript beside this module; from
 * sources it is loaded through tsx.
 */
function workerEntry(): { url: URL; execArgv?: string[] } {
  const compiled = new URL('./conversion-worker.js', import.meta.url)
  if (existsSync(fileURLToPath(compiled))) return { url: compiled }
  return {
    url: new URL('./conversion-worker.ts', import.meta.url),
    execArgv: ['--import', 'tsx'],
  }
}

/**
 * Converts players on worker threads, each holding its own copy of the
 * reference dataset.
 *
 * Threads start on demand, up to `size`, and are reused after that. A
 * conversion waits for a free thread. Call `close()` once the run is over.
 *
 * @example
 * ```typescript
 * const pool = new ConversionWorkerPool(dataset, { size: 4 })
 * try {
 *   const player = await pool.convertPlayer(rosterPlayer)
 * } finally {
 *   await pool.close()
 * }
 * ```
 */
export class ConversionWorkerPool implements PlayerConverter {
  readonly size: number
  private readonly workerData: ConversionWorkerData
  private readonly logger: Logger
  private readonly slots: TaskPool
  private readonly threads = new Set<ConversionThread>()
  private readonly idle: ConversionThread[] = []
  private nextId = 0
  private active = 0
  private peak = 0
  private closed = false

  constructor(dataset: ReferenceDataset, options: ConversionWorkerPoolOptions = {}) {
    this.size = requirePositiveInteger(options.size ?? availableParallelism(), 'size')
    this.logger = options.logger ?? moduleLogger('conversion')
    this.workerData = { payloads: dataset.payloads, logLevel: this.logger.level }
    this.slots = new TaskPool(this.size)
  }

  /** Worker threads started and still alive */
  get threadCount(): number {
    return this.threads.size
  }

  /** Most conversions that were ever in flight at once, each on its own thread */
  get peakConcurrency(): number {
    return this.peak
  }

  /**
   * @throws {ConversionWorkerError} When the worker fails or the pool closes first
   */
  convertPlayer(player: RosterPlayer): Promise<PlayerExtraction> {
    return this.slots.run(() => this.dispatch(player))
  }

  /**
   * Stops every worker. Conversions still pending are rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    const threads = [...this.threads]
    this.threads.clear()
    this.idle.length = 0
    for (const thread of threads) {
      this.rejectPending(thread, new ConversionWorkerError('Conversion pool closed'))
    }
    await Promise.all(threads.map((thread) => thread.worker.terminate()))
    this.logger.debug({ threads: threads.length, peak: this.peak }, 'conversion pool closed')
  }

  private async dispatch(player: RosterPlayer): Promise<PlayerExtraction> {
    if (this.closed) throw new ConversionWorkerError('Conversion pool closed')
    const thread = this.idle.pop() ?? this.spawn()
    this.active++
    this.peak = Math.max(this.peak, this.active)
    try {
      return await this.send(thread, player)
    } finally {
      this.active--
      if (this.threads.has(thread)) this.idle.push(thread)
    }
  }

  private send(thread: ConversionThread, player: RosterPlayer): Promise<PlayerExtraction> {
    const id = this.nextId++
    return new Promise((resolve, reject) => {
      thread.pending.set(id, { resolve, reject })
      const request: ConversionRequest = { id, player }
      thread.worker.postMessage(request)
    })
  }

  private spawn(): ConversionThread {
    const entry = workerEntry()
    const worker = new Worker(entry.url, {
      workerData: this.workerData,
      execArgv: entry.execArgv,
    })
    const thread: ConversionThread = { worker, pending: new Map() }

    worker.on('message', (reply: ConversionReply) => this.receive(thread, reply))
    worker.on('error', (error: Error) => {
      this.retire(thread, new ConversionWorkerError('Conversion worker failed', {}, error))
    })
    worker.on('exit', (exitCode: number) => {
      this.retire(
        thread,
        new ConversionWorkerError(`Conversion worker exited with code ${exitCode}`, { exitCode })
      )
    })

    this.threads.add(thread)
    this.logger.debug({ threads: this.threads.size, size: this.size }, 'conversion worker started')
    return thread
  }

  private receive(thread: ConversionThread, reply: ConversionReply): void {
    if (reply.kind === 'log') {
      this.forwardLog(reply.line)
      return
    }
    const pending = thread.pending.get(reply.id)
    if (!pending) return
    thread.pending.delete(reply.id)
    if (reply.kind === 'result') pending.resolve(reply.player)
    else pending.reject(new ConversionWorkerError(reply.message))
  }

  /** Drops a dead thread; the next conversion starts a fresh one */
  private retire(thread: ConversionThread, error: ConversionWorkerError): void {
    if (!this.threads.delete(thread)) return
    const index = this.idle.indexOf(thread)
    if (index >= 0) this.idle.splice(index, 1)
    this.logger.error({ err: error }, 'conversion worker stopped')
    this.rejectPending(thread, error)
  }

  private rejectPending(thread: ConversionThread, error: ConversionWorkerError): void {
    for (const pending of thread.pending.values()) pending.reject(error)
    thread.pending.clear()
  }

  private forwardLog(line: string): void {
    const record: unknown = JSON.parse(line)
    if (!isRecord(record)) return
    const { level, time: _time, msg, ...fields } = record
    const method = typeof level === 'number' ? this.logger.levels.labels[level] : undefined
    if (!isLogMethod(method)) return
    this.logger[method](fields, typeof msg === 'string' ? msg : '')
  }
}
