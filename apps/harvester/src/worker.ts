#!/usr/bin/env node

/**
 * Harvester Worker
 * Checks that Redis is reachable, builds the session pool and starts the
 * market parse worker. Runs until SIGTERM/SIGINT.
 */

// Load environment variables first, before any other imports
import './env.js'

import { fileURLToPath } from 'node:url'
import type { Queue, Worker } from 'bullmq'
import { verifyRedisConnection } from '@pricewatch/redis'
import { logger } from './config/logger.js'
import { createMarketItemsQueue } from './config/queues.js'
import type { MarketItemsJobData, MarketParseJobData } from './config/queues.js'
import { loadSettings } from './config/settings.js'
import type { HarvesterSettings } from './config/settings.js'
import { SessionPool } from './market/fetch/session-pool.js'
import { createSessions } from './market/fetch/sessions.js'
import { MarketPageParser } from './market/parser.js'
import { QueueBatchSink } from './market/sink.js'
import type { NetworkSession, ParseOutcome } from './market/types.js'
import { startMarketParseWorker } from './market/worker.js'

const log = logger.child('main')

export interface Harvester {
  settings: HarvesterSettings
  worker: Worker<MarketParseJobData, ParseOutcome>
  itemsQueue: Queue<MarketItemsJobData>
  stop(): Promise<void>
}

function hasClose(session: NetworkSession): session is NetworkSession & { close(): Promise<void> } {
  return 'close' in session && typeof session.close === 'function'
}

export async function startHarvester(env: NodeJS.ProcessEnv = process.env): Promise<Harvester> {
  const settings = loadSettings(env)
  log.info('Starting harvester', {
    maxAttempts: settings.maxAttempts,
    postponeMs: settings.postponeMs,
    proxies: settings.proxyUrls.length,
    concurrency: settings.workerConcurrency,
  })

  // Fails fast when Redis stays unreachable past the retry budget. The queue
  // and worker below open their own connections.
  await verifyRedisConnection({
    maxRetries: settings.redisConnectMaxRetries,
    retryDelayMs: settings.redisConnectRetryDelayMs,
  })

  const sessions = createSessions(settings.proxyUrls)
  const parser = new MarketPageParser({
    sessions: new SessionPool(sessions),
    postponeMs: settings.postponeMs,
    maxAttempts: settings.maxAttempts,
  })
  const itemsQueue = createMarketItemsQueue()
  const sink = new QueueBatchSink(itemsQueue)
  const worker = startMarketParseWorker({ parser, sink, concurrency: settings.workerConcurrency })

  const stop = async (): Promise<void> => {
    await worker.close()
    await itemsQueue.close()
    await Promise.all(sessions.filter(hasClose).map(session => session.close()))
  }

  return { settings, worker, itemsQueue, stop }
}

// Track if shutdown is in progress to prevent double-shutdown
let isShuttingDown = false

async function shutdown(harvester: Harvester, signal: string): Promise<void> {
  if (isShuttingDown) {
    log.info('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  log.info('Starting graceful shutdown', { signal })
  const shutdownStart = Date.now()

  try {
    await harvester.stop()
    log.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

async function main(): Promise<void> {
  const harvester = await startHarvester()

  process.on('SIGTERM', () => void shutdown(harvester, 'SIGTERM'))
  process.on('SIGINT', () => void shutdown(harvester, 'SIGINT'))

  log.info('Workers are running. Press Ctrl+C to stop.')
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    log.fatal('Harvester failed to start', {}, error)
    process.exit(1)
  })
}
