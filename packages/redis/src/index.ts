/**
 * @pricewatch/redis - shared Redis connection utilities
 *
 * One source of truth for how pricewatch services reach Redis, which backs
 * the BullMQ queues the harvester reads parse requests from and writes item
 * batches to.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@pricewatch/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisEndpoint {
  host: string
  port: number
  password: string | undefined
}

/**
 * Resolve the Redis endpoint from REDIS_URL, falling back to
 * REDIS_HOST/REDIS_PORT/REDIS_PASSWORD.
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisEndpoint {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
      }
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
  }
}

const endpoint = parseRedisConfig()
const redisLogInfo = `${endpoint.host}:${endpoint.port}`

// =============================================================================
// Connection Options
// =============================================================================

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

const RECONNECT_ERRORS = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND']

/**
 * Connection options for long-lived clients.
 *
 * `maxRetriesPerRequest: null` is required by BullMQ workers. Dropped
 * connections reconnect with a linear delay capped at 30s; past 20 attempts
 * the outage is logged once per minute.
 */
export const redisConnection: RedisOptions = {
  host: endpoint.host,
  port: endpoint.port,
  password: endpoint.password,
  maxRetriesPerRequest: null,
  keepAlive: 10000,
  connectTimeout: 10000,
  enableOfflineQueue: true,

  retryStrategy(times: number) {
    consecutiveFailures = times

    if (times > 20) {
      const now = Date.now()
      if (now - lastCircuitBreakerLog > 60000) {
        lastCircuitBreakerLog = now
        log.error('Circuit breaker: prolonged outage', { attempts: times, connection: redisLogInfo })
      }
      return 30000
    }

    const delay = Math.min(times * 500, 30000)
    log.info('Reconnecting', { attempt: times, delayMs: delay })
    return delay
  },

  reconnectOnError(err: Error) {
    if (RECONNECT_ERRORS.some(code => err.message.includes(code))) {
      if (consecutiveFailures <= 20) {
        log.warn('Reconnecting due to error', { error: err.message })
      }
      return true
    }
    return false
  },
}

// =============================================================================
// Bounded connect
// =============================================================================

export interface ConnectRedisOptions {
  /** Retries after the first failed attempt (default: 5) */
  maxRetries?: number
  /** Delay before the first retry; doubles per retry, capped at 30s (default: 2000) */
  retryDelayMs?: number
  /** Connection options (default: redisConnection) */
  options?: RedisOptions
}

const DEFAULT_MAX_RETRIES = 5
const DEFAULT_RETRY_DELAY_MS = 2000
const MAX_RETRY_DELAY_MS = 30000

export function computeRetryDelay(retryDelayMs: number, retry: number): number {
  return Math.min(retryDelayMs * Math.pow(2, retry - 1), MAX_RETRY_DELAY_MS)
}

/**
 * Open one Redis connection, retrying failed connects.
 *
 * Each attempt builds a fresh lazily-connecting client with reconnection
 * disabled, so a refused connect rejects instead of looping inside ioredis.
 * The caller's retry strategy is restored once connected. After `maxRetries`
 * retries the last connection error is rethrown.
 */
export async function connectRedis(opts: ConnectRedisOptions = {}): Promise<Redis> {
  const maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES
  const retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
  const options = opts.options ?? redisConnection
  const connection = `${options.host ?? 'localhost'}:${options.port ?? 6379}`

  let retry = 0
  while (true) {
    const client = new Redis({ ...options, lazyConnect: true, retryStrategy: () => null })
    try {
      await client.connect()
      client.options.retryStrategy = options.retryStrategy
      consecutiveFailures = 0
      log.info('Connected', { connection, attempt: retry + 1 })
      return client
    } catch (error) {
      client.disconnect()
      retry += 1
      if (retry > maxRetries) {
        log.error('Failed to connect after all attempts', { attempts: retry, connection }, error)
        throw error
      }

      const delayMs = computeRetryDelay(retryDelayMs, retry)
      log.warn('Connection failed, retrying', { attempt: retry, maxRetries, delayMs }, error)
      await new Promise(resolve => setTimeout(resolve, delayMs))
    }
  }
}

// =============================================================================
// Startup check
// =============================================================================

/**
 * Gate startup on Redis being reachable. Connects with the same bounded
 * retries as connectRedis, then closes the client: BullMQ queues and
 * workers open their own connections from `redisConnection`.
 */
export async function verifyRedisConnection(opts?: ConnectRedisOptions): Promise<void> {
  const client = await connectRedis(opts)
  await client.quit()
}

export type { RedisOptions }
