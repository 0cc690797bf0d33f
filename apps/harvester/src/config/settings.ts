/**
 * Harvester settings read from the environment.
 *
 * Read once per call; pass `env` in tests instead of mutating process.env.
 */

export interface HarvesterSettings {
  /** Failed attempts tolerated per page before giving up */
  maxAttempts: number
  /** How long a session rests after use, and the most acquire() will wait */
  postponeMs: number
  /** Proxy URLs; empty means a single direct session */
  proxyUrls: string[]
  /** Parse jobs processed in parallel */
  workerConcurrency: number
  redisConnectMaxRetries: number
  redisConnectRetryDelayMs: number
}

export const DEFAULT_SETTINGS: HarvesterSettings = {
  maxAttempts: 300,
  postponeMs: 25_000,
  proxyUrls: [],
  workerConcurrency: 4,
  redisConnectMaxRetries: 5,
  redisConnectRetryDelayMs: 2000,
}

/**
 * Parse a non-negative integer, falling back on blank or invalid input.
 */
export function readIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback
}

export function readListEnv(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): HarvesterSettings {
  return {
    maxAttempts: readIntEnv(env.MARKET_MAX_ATTEMPTS, DEFAULT_SETTINGS.maxAttempts),
    postponeMs: readIntEnv(env.MARKET_POSTPONE_MS, DEFAULT_SETTINGS.postponeMs),
    proxyUrls: readListEnv(env.MARKET_PROXY_URLS),
    // Zero would start a worker that never takes a job
    workerConcurrency: Math.max(1, readIntEnv(env.MARKET_WORKER_CONCURRENCY, DEFAULT_SETTINGS.workerConcurrency)),
    redisConnectMaxRetries: readIntEnv(env.REDIS_CONNECT_MAX_RETRIES, DEFAULT_SETTINGS.redisConnectMaxRetries),
    redisConnectRetryDelayMs: readIntEnv(env.REDIS_CONNECT_RETRY_DELAY_MS, DEFAULT_SETTINGS.redisConnectRetryDelayMs),
  }
}
