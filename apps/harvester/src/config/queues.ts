import { Queue } from 'bullmq'
import type { ConnectionOptions } from 'bullmq'
import { redisConnection } from '@pricewatch/redis'
import type { ItemBatch, ItemCategory, MarketItem } from '../market/types.js'

// Queue names
export const QUEUE_NAMES = {
  MARKET_PARSE: 'market-parse',
  MARKET_ITEMS: 'market-items',
} as const

// Job data interfaces
export interface MarketParseJobData {
  url: string
  /** Overrides MARKET_MAX_ATTEMPTS for this page */
  maxAttempts?: number
}

/**
 * MarketItem as it travels through Redis: dates become ISO strings.
 */
export interface SerializedMarketItem {
  name: string
  price: number
  assetId: string
  nameId: number
  category: ItemCategory
  float: string | null
  unlockAt: string | null
  overpayFloat: number | null
}

export interface MarketItemsJobData {
  url: string
  observedAt: string
  items: SerializedMarketItem[]
}

function serializeItem(item: MarketItem): SerializedMarketItem {
  return {
    ...item,
    unlockAt: item.unlockAt ? item.unlockAt.toISOString() : null,
  }
}

export function serializeBatch(batch: ItemBatch): MarketItemsJobData {
  return {
    url: batch.url,
    observedAt: batch.observedAt.toISOString(),
    items: batch.items.map(serializeItem),
  }
}

// Queue factories; nothing connects until one is called
export function createMarketParseQueue(
  connection: ConnectionOptions = redisConnection
): Queue<MarketParseJobData> {
  return new Queue<MarketParseJobData>(QUEUE_NAMES.MARKET_PARSE, { connection })
}

export function createMarketItemsQueue(
  connection: ConnectionOptions = redisConnection
): Queue<MarketItemsJobData> {
  return new Queue<MarketItemsJobData>(QUEUE_NAMES.MARKET_ITEMS, { connection })
}
