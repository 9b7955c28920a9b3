import { parentPort, workerData } from 'node:worker_threads'
import type { MessagePort } from 'node:worker_threads'
import { pino } from 'pino'
import { ReferenceDataset } from '../dataset/reference-dataset.js'
import { describeError } from '../utils/errors.js'
import type {
  ConversionReply,
  ConversionRequest,
  ConversionWorkerData,
} from './conversion-protocol.js'
import { RosterConverter } from './convert.js'

function connect(): MessagePort {
  if (!parentPort) throw new Error('The conversion worker must run in a worker thread')
  return parentPort
}

const port = connect()
const { payloads, logLevel }: ConversionWorkerData = workerData

function post(reply: ConversionReply): void {
  port.postMessage(reply)
}

// Records go to the parent, which logs them through the run logger
const logger = pino(
  { level: logLevel, base: null },
  { write: (line: string) => post({ kind: 'log', line }) }
)

const converter = new RosterConverter(ReferenceDataset.fromPayloads(payloads), { logger })

port.on('message', (request: ConversionRequest) => {
  try {
    post({ kind: 'result', id: request.id, player: converter.convertPlayer(request.player) })
  } catch (error) {
    post({ kind: 'failure', id: request.id, message: describeError(error) })
  }
})
