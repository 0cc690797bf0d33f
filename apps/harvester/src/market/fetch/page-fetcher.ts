/**
 * Page Fetcher
 *
 * One GET per call through the session it is handed. Every request carries
 * the same browser-like header profile and the same response timeout.
 *
 * Outcomes:
 * - non-2xx, whatever the body    → throws HttpStatusError
 * - 2xx challenge interstitial    → { status: 'no_content', reason: 'challenge' }
 * - 2xx with a usable body        → { status: 'content' }
 * - timeout / connection failure  → { status: 'no_content', reason: 'timeout' | 'transport_error' }
 * - caller abort                  → rejects with the signal's reason
 */

import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../../config/logger.js'
import { HttpStatusError } from '../errors.js'
import type { NetworkSession, NoContentReason, PageFetchResult, PageSource } from '../types.js'
import { isChallengePage } from './challenge.js'

export const MARKET_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  Connection: 'keep-alive',
  Referer: 'https://cs.money/csgo/trade',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'same-origin',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
}

export const RESPONSE_TIMEOUT_MS = 10_000

export interface PageFetcherOptions {
  /** Response timeout in ms (default: RESPONSE_TIMEOUT_MS) */
  timeoutMs?: number
  logger?: ILogger
}

export class PageFetcher implements PageSource {
  private readonly timeoutMs: number
  private readonly log: ILogger

  constructor(options: PageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? RESPONSE_TIMEOUT_MS
    this.log = options.logger ?? loggers.fetch
  }

  /**
   * Fetch `url` through `session`. Transport failures never escape; see the
   * module header for what does.
   */
  async fetch(session: NetworkSession, url: string, signal?: AbortSignal): Promise<PageFetchResult> {
    const startTime = Date.now()

    try {
      return await this.fetchOnce(session, url, startTime, signal)
    } catch (error) {
      if (error instanceof HttpStatusError) throw error
      signal?.throwIfAborted()

      const reason: NoContentReason = isAbortError(error) ? 'timeout' : 'transport_error'
      const message = reason === 'timeout' ? `Request timed out after ${this.timeoutMs}ms` : errorMessage(error)
      this.log.warn('Request failed', { url, sessionId: session.id, reason, error: message })

      return {
        status: 'no_content',
        reason,
        error: message,
        durationMs: Date.now() - startTime,
      }
    }
  }

  private async fetchOnce(
    session: NetworkSession,
    url: string,
    startTime: number,
    signal?: AbortSignal
  ): Promise<PageFetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)
    const onCallerAbort = () => controller.abort(signal?.reason)
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await session.get(url, {
        headers: { ...MARKET_REQUEST_HEADERS },
        signal: controller.signal,
      })
      if (!response.ok) {
        throw new HttpStatusError(url, response.status, response.statusText)
      }

      const text = await response.text()
      if (isChallengePage(text)) {
        this.log.warn('Challenge page detected', { url, sessionId: session.id, statusCode: response.status })
        return {
          status: 'no_content',
          reason: 'challenge',
          durationMs: Date.now() - startTime,
        }
      }

      return {
        status: 'content',
        html: text,
        statusCode: response.status,
        durationMs: Date.now() - startTime,
      }
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps socket errors: "fetch failed" with the real one as cause
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message
  }
  return String(error)
}
