/**
 * In-process session pool.
 *
 * acquire(postponeMs) hands out sessions round-robin. A session handed out
 * rests for `postponeMs` before it is offered again. When every session is
 * resting the caller sleeps until the first one wakes, but never longer
 * than `postponeMs`; past that the earliest-waking session is returned
 * anyway. An abort while waiting rejects with the signal's reason and
 * leaves every session as it was.
 *
 * Single-process only. Workers in separate processes each keep their own
 * pool and do not share rest periods.
 */

import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../../config/logger.js'
import type { NetworkSession, SessionSource } from '../types.js'

interface PoolEntry {
  session: NetworkSession
  availableAt: number
}

export interface SessionPoolOptions {
  logger?: ILogger
}

export class SessionPool implements SessionSource {
  private readonly entries: PoolEntry[]
  private readonly log: ILogger
  private cursor = 0

  constructor(sessions: NetworkSession[], options: SessionPoolOptions = {}) {
    if (sessions.length === 0) {
      throw new Error('SessionPool needs at least one session')
    }
    this.entries = sessions.map(session => ({ session, availableAt: 0 }))
    this.log = options.logger ?? loggers.sessions
  }

  get size(): number {
    return this.entries.length
  }

  async acquire(postponeMs: number, signal?: AbortSignal): Promise<NetworkSession> {
    const deadline = Date.now() + postponeMs

    while (true) {
      signal?.throwIfAborted()
      const now = Date.now()
      const free = this.nextFree(now)
      if (free) {
        return this.checkout(free, now, postponeMs)
      }

      const earliest = this.earliest()
      if (now >= deadline) {
        this.log.debug('All sessions resting, reusing earliest', { sessionId: earliest.session.id })
        return this.checkout(earliest, now, postponeMs)
      }

      await this.sleep(Math.max(1, Math.min(earliest.availableAt, deadline) - now), signal)
    }
  }

  private nextFree(now: number): PoolEntry | null {
    for (let i = 0; i < this.entries.length; i++) {
      const index = (this.cursor + i) % this.entries.length
      const entry = this.entries[index]
      if (entry.availableAt <= now) {
        this.cursor = (index + 1) % this.entries.length
        return entry
      }
    }
    return null
  }

  private earliest(): PoolEntry {
    return this.entries.reduce((best, entry) => (entry.availableAt < best.availableAt ? entry : best))
  }

  private checkout(entry: PoolEntry, now: number, postponeMs: number): NetworkSession {
    entry.availableAt = now + postponeMs
    return entry.session
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer)
        reject(signal?.reason)
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, ms)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}
