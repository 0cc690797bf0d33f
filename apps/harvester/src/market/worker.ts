/**
 * Market Parse Worker
 *
 * Consumes market-parse jobs: one URL per job, parsed through the shared
 * session pool and delivered to the batch sink. Terminal errors are logged
 * and rethrown so BullMQ marks the job failed.
 */

import { Worker } from 'bullmq'
import type { ConnectionOptions, Job } from 'bullmq'
import type { ILogger } from '@pricewatch/logger'
import { redisConnection } from '@pricewatch/redis'
import { loggers } from '../config/logger.js'
import { QUEUE_NAMES } from '../config/queues.js'
import type { MarketParseJobData } from '../config/queues.js'
import type { MarketPageParser } from './parser.js'
import type { ItemBatchSink, ParseOutcome } from './types.js'

const log = loggers.worker

export type MarketParseJob = Pick<Job<MarketParseJobData>, 'id' | 'data'>

export interface MarketParseDeps {
  parser: Pick<MarketPageParser, 'parse'>
  sink: ItemBatchSink
  logger?: ILogger
}

/**
 * Job payloads come from outside the process; an attempt limit must be a
 * non-negative integer or absent.
 */
function readAttemptLimit(value: unknown, jobId: string | undefined): number | undefined {
  if (value === undefined || value === null) return undefined
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value
  throw new Error(`market-parse job ${jobId ?? '?'} has invalid maxAttempts ${JSON.stringify(value)}`)
}

export async function processMarketParseJob(job: MarketParseJob, deps: MarketParseDeps): Promise<ParseOutcome> {
  const { url } = job.data
  const jobLogger = (deps.logger ?? log).child({ jobId: job.id, url })

  if (typeof url !== 'string' || url.length === 0) {
    jobLogger.error('Job has no url')
    throw new Error(`market-parse job ${job.id ?? '?'} has no url`)
  }

  let maxAttempts: number | undefined
  try {
    maxAttempts = readAttemptLimit(job.data.maxAttempts, job.id)
  } catch (error) {
    jobLogger.error('Job has an invalid attempt limit', {}, error)
    throw error
  }

  jobLogger.info('Processing parse job', { maxAttempts })
  const startTime = Date.now()

  try {
    const outcome = await deps.parser.parse(url, deps.sink, { maxAttempts })
    jobLogger.info('Parse job complete', { ...outcome, durationMs: Date.now() - startTime })
    return outcome
  } catch (error) {
    jobLogger.error('Parse job failed', { durationMs: Date.now() - startTime }, error)
    throw error
  }
}

export interface StartMarketParseWorkerOptions extends MarketParseDeps {
  concurrency?: number
  connection?: ConnectionOptions
}

export function startMarketParseWorker(
  options: StartMarketParseWorkerOptions
): Worker<MarketParseJobData, ParseOutcome> {
  const concurrency = options.concurrency ?? 1
  const { parser, sink, logger } = options

  log.info('Starting market parse worker', { concurrency })

  const worker = new Worker<MarketParseJobData, ParseOutcome>(
    QUEUE_NAMES.MARKET_PARSE,
    async job => processMarketParseJob(job, { parser, sink, logger }),
    {
      connection: options.connection ?? redisConnection,
      concurrency,
    }
  )

  worker.on('completed', job => {
    log.debug('Job completed', { jobId: job.id, url: job.data.url })
  })

  worker.on('failed', (job, error) => {
    log.warn('Job failed', { jobId: job?.id, url: job?.data.url, error: error.message })
  })

  worker.on('error', error => {
    log.error('Worker error', { error: error.message })
  })

  return worker
}
