/**
 * Market Page Parser
 *
 * Drives one page from request to delivered batch:
 * 1. Acquire a session (may wait up to the postponement)
 * 2. Fetch the page
 * 3. Extract the embedded item list
 * 4. Transform records into one batch
 * 5. Hand the batch to the sink, once
 *
 * A fetch without content or an unreadable snapshot is a failed attempt:
 * logged, counted, and followed by a fresh fetch with no added delay (the
 * session pool's rest period already spaces attempts out). The loop runs
 * while failedAttempts <= maxAttempts, so maxAttempts = 0 still makes one
 * attempt. Mapping errors, HTTP status errors and sink errors propagate.
 */

import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../config/logger.js'
import { MaxAttemptsReachedError } from './errors.js'
import { extractSnapshot } from './extract/snapshot.js'
import { PageFetcher } from './fetch/page-fetcher.js'
import { buildItemBatch } from './transform/item-transformer.js'
import { patchMarketName } from './transform/name-normalizer.js'
import type { ItemBatchSink, NameNormalizer, PageSource, ParseOptions, ParseOutcome, SessionSource } from './types.js'

export const DEFAULT_MAX_ATTEMPTS = 300
export const DEFAULT_POSTPONE_MS = 25_000

export interface MarketPageParserOptions {
  sessions: SessionSource
  fetcher?: PageSource
  normalizeName?: NameNormalizer
  /** Passed to every acquire() (default: 25s) */
  postponeMs?: number
  /** Used when parse() gets no maxAttempts (default: 300) */
  maxAttempts?: number
  logger?: ILogger
}

export class MarketPageParser {
  private readonly sessions: SessionSource
  private readonly fetcher: PageSource
  private readonly normalizeName: NameNormalizer
  private readonly postponeMs: number
  private readonly defaultMaxAttempts: number
  private readonly log: ILogger

  constructor(options: MarketPageParserOptions) {
    this.sessions = options.sessions
    this.fetcher = options.fetcher ?? new PageFetcher()
    this.normalizeName = options.normalizeName ?? patchMarketName
    this.postponeMs = options.postponeMs ?? DEFAULT_POSTPONE_MS
    this.defaultMaxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.log = options.logger ?? loggers.market
  }

  async parse(url: string, sink: ItemBatchSink, options: ParseOptions = {}): Promise<ParseOutcome> {
    const maxAttempts = options.maxAttempts ?? this.defaultMaxAttempts
    const { signal } = options
    let failedAttempts = 0

    while (failedAttempts <= maxAttempts) {
      signal?.throwIfAborted()
      const attempt = failedAttempts + 1

      const session = await untilAborted(this.sessions.acquire(this.postponeMs, signal), signal)

      const page = await this.fetcher.fetch(session, url, signal)
      if (page.status === 'no_content') {
        this.log.info('Page unavailable', {
          url,
          attempt,
          sessionId: session.id,
          reason: page.reason,
          durationMs: page.durationMs,
        })
        failedAttempts += 1
        continue
      }

      this.log.debug('Page fetched', { url, attempt, sessionId: session.id, durationMs: page.durationMs })

      const snapshot = extractSnapshot(page.html)
      if (!snapshot.ok) {
        this.log.error('Snapshot extraction failed', {
          url,
          attempt,
          sessionId: session.id,
          reason: snapshot.reason,
          details: snapshot.details,
        })
        failedAttempts += 1
        continue
      }

      const batch = buildItemBatch(snapshot.records, url, this.normalizeName)
      const itemCount = batch.items.length
      await sink.put(batch)

      this.log.info('Batch delivered', { url, attempt, records: snapshot.records.length, itemCount })
      return { attempts: attempt, itemCount }
    }

    this.log.warn('Max attempts reached', { url, attempts: failedAttempts })
    throw new MaxAttemptsReachedError(url)
  }
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as
 * `signal` fires. Covers session sources that ignore the signal.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}
