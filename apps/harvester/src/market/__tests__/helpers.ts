import { vi } from 'vitest'
import type { ILogger } from '@pricewatch/logger'
import type { NetworkSession, SessionResponse } from '../types.js'

export const MARKET_URL = 'https://market.test/csgo/trade?offset=0'

export function createSilentLogger(): ILogger {
  const logger: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
  }
  return logger
}

export function fakeResponse(body: string, status = 200, statusText = 'OK'): SessionResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => body,
  }
}

export function fakeSession(id: string, get: NetworkSession['get'] = vi.fn()): NetworkSession {
  return { id, get }
}

export function snapshotPage(data: unknown): string {
  return [
    '<!DOCTYPE html><html><head><title>Trade</title></head><body>',
    '<div id="__next"></div>',
    `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify(data)}</script>`,
    '</body></html>',
  ].join('')
}

export function skinsSnapshot(skins: unknown): unknown {
  return { props: { pageProps: { botInitData: { skinsInfo: { skins } } } } }
}
