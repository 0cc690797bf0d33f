/**
 * Item Transformer
 *
 * Maps raw page records to MarketItems. Pure and deterministic: the same
 * record always yields equal items.
 *
 * - A record without `fullName` yields nothing.
 * - A stacked record (stackSize + stackId + stackItems) yields the parent
 *   plus one item per sibling. Siblings share the parent's name, price,
 *   template and category, take wear and trade lock from their own entry,
 *   and never carry overpay.
 * - Anything else that does not fit throws ItemMappingError.
 */

import { ItemMappingError } from '../errors.js'
import { ITEM_CATEGORY_CODES } from '../types.js'
import type { ItemBatch, ItemCategory, MarketItem, NameNormalizer, RawItemRecord } from '../types.js'
import { patchMarketName } from './name-normalizer.js'

function isRecord(value: unknown): value is RawItemRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

function readPrice(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ItemMappingError('price', `expected a number, got ${JSON.stringify(value)}`)
  }
  return value
}

/**
 * Asset ids arrive as integers or strings; downstream always sees a string.
 */
function readAssetId(value: unknown, field: string): string {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value === 'string' && value.length > 0) return value
  throw new ItemMappingError(field, `expected an id, got ${JSON.stringify(value)}`)
}

function readNameId(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ItemMappingError('nameId', `expected an integer, got ${JSON.stringify(value)}`)
  }
  return value
}

export function decodeCategory(code: unknown): ItemCategory {
  const category = typeof code === 'number' ? ITEM_CATEGORY_CODES.get(code) : undefined
  if (!category) {
    throw new ItemMappingError('type', `unknown category code ${JSON.stringify(code)}`)
  }
  return category
}

/**
 * Wear is kept as printed. Numbers are rendered, never re-parsed.
 */
function readWear(value: unknown, field: string): string | null {
  if (isAbsent(value)) return null
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw new ItemMappingError(field, `expected a wear value, got ${JSON.stringify(value)}`)
}

/**
 * Trade lock end, in ms since the epoch. Absent or 0 means no lock.
 */
export function unlockDateFromMillis(value: unknown, field = 'tradeLock'): Date | null {
  if (isAbsent(value) || value === 0) return null
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ItemMappingError(field, `expected ms since epoch, got ${JSON.stringify(value)}`)
  }
  return new Date(value)
}

function readOverpayFloat(value: unknown): number | null {
  if (isAbsent(value)) return null
  if (!isRecord(value)) {
    throw new ItemMappingError('overpay', 'expected an object')
  }
  const overpayFloat = value.float
  if (isAbsent(overpayFloat)) return null
  if (typeof overpayFloat !== 'number') {
    throw new ItemMappingError('overpay.float', `expected a number, got ${JSON.stringify(overpayFloat)}`)
  }
  return overpayFloat
}

function isStack(raw: RawItemRecord): boolean {
  return 'stackSize' in raw && 'stackId' in raw && 'stackItems' in raw
}

export function toMarketItems(raw: unknown, normalizeName: NameNormalizer = patchMarketName): MarketItem[] {
  if (!isRecord(raw)) {
    throw new ItemMappingError('record', 'expected an object')
  }
  if (!('fullName' in raw)) {
    return []
  }
  const fullName = raw.fullName
  if (typeof fullName !== 'string') {
    throw new ItemMappingError('fullName', 'expected a string')
  }

  const shared = {
    name: normalizeName(fullName),
    price: readPrice(raw.price),
    nameId: readNameId(raw.nameId),
    category: decodeCategory(raw.type),
  }

  const items: MarketItem[] = [
    {
      ...shared,
      assetId: readAssetId(raw.assetId, 'assetId'),
      float: readWear(raw.float, 'float'),
      unlockAt: unlockDateFromMillis(raw.tradeLock),
      overpayFloat: readOverpayFloat(raw.overpay),
    },
  ]

  if (!isStack(raw)) {
    return items
  }

  const siblings = raw.stackItems
  if (!Array.isArray(siblings)) {
    throw new ItemMappingError('stackItems', 'expected an array')
  }

  siblings.forEach((sibling: unknown, index) => {
    const field = `stackItems[${index}]`
    if (!isRecord(sibling)) {
      throw new ItemMappingError(field, 'expected an object')
    }
    items.push({
      ...shared,
      assetId: readAssetId(sibling.id, `${field}.id`),
      float: readWear(sibling.float, `${field}.float`),
      unlockAt: unlockDateFromMillis(sibling.tradeLock, `${field}.tradeLock`),
      overpayFloat: null,
    })
  })

  return items
}

/**
 * Transform every record, in page order, into one batch.
 */
export function buildItemBatch(
  records: unknown[],
  url: string,
  normalizeName: NameNormalizer = patchMarketName,
  observedAt: Date = new Date()
): ItemBatch {
  const batch: ItemBatch = { url, observedAt, items: [] }
  for (const record of records) {
    batch.items.push(...toMarketItems(record, normalizeName))
  }
  return batch
}
