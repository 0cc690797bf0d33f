import { describe, it, expect } from 'vitest'
import { ItemMappingError } from '../errors.js'
import { buildItemBatch, decodeCategory, toMarketItems, unlockDateFromMillis } from '../transform/item-transformer.js'
import { patchMarketName } from '../transform/name-normalizer.js'
import { MARKET_URL } from './helpers.js'

const flatRecord = {
  fullName: 'AK-47 | Redline (Field-Tested)',
  price: 12.5,
  assetId: 25698110001,
  nameId: 1402,
  type: 3,
  float: '0.2531',
  tradeLock: null,
  overpay: { float: 1.75 },
}

const stackRecord = {
  fullName: 'Sticker | Crown (Foil)',
  price: 310,
  assetId: '25698110100',
  nameId: 9051,
  type: 12,
  float: null,
  tradeLock: 1645430400000,
  overpay: null,
  stackSize: 3,
  stackId: 'stack-9051',
  stackItems: [
    { id: 25698110101, float: null, tradeLock: 0 },
    { id: '25698110102', float: 0.01, tradeLock: 1645516800000 },
  ],
}

describe('toMarketItems', () => {
  it('skips a record without a name', () => {
    expect(toMarketItems({ price: 1, assetId: 1, nameId: 1, type: 3 })).toEqual([])
  })

  it('maps a single listing', () => {
    expect(toMarketItems(flatRecord)).toEqual([
      {
        name: 'AK-47 | Redline (Field-Tested)',
        price: 12.5,
        assetId: '25698110001',
        nameId: 1402,
        category: 'RIFLE',
        float: '0.2531',
        unlockAt: null,
        overpayFloat: 1.75,
      },
    ])
  })

  it('expands a stack into the parent and one item per sibling', () => {
    const items = toMarketItems(stackRecord)

    expect(items).toHaveLength(3)
    expect(items.map(item => item.assetId)).toEqual(['25698110100', '25698110101', '25698110102'])
    for (const item of items) {
      expect(item).toMatchObject({ name: 'Sticker | Crown (Foil)', price: 310, nameId: 9051, category: 'STICKER' })
    }
  })

  it('gives stack siblings their own wear and trade lock but no overpay', () => {
    const parentWithOverpay = { ...stackRecord, overpay: { float: 0.4 } }

    const [parent, first, second] = toMarketItems(parentWithOverpay)

    expect(parent.overpayFloat).toBe(0.4)
    expect(parent.unlockAt).toEqual(new Date(1645430400000))
    expect(first).toMatchObject({ float: null, unlockAt: null, overpayFloat: null })
    expect(second).toMatchObject({ float: '0.01', unlockAt: new Date(1645516800000), overpayFloat: null })
  })

  it('does not expand a record missing one of the stack keys', () => {
    const { stackId: _stackId, ...partial } = stackRecord

    expect(toMarketItems(partial)).toHaveLength(1)
  })

  it('applies the name normalizer to every item', () => {
    const items = toMarketItems({ ...stackRecord, fullName: 'Sticker |  Crown\n(Foil) ' }, patchMarketName)

    expect(items.map(item => item.name)).toEqual([
      'Sticker | Crown (Foil)',
      'Sticker | Crown (Foil)',
      'Sticker | Crown (Foil)',
    ])
  })

  it('is deterministic', () => {
    expect(toMarketItems(stackRecord)).toEqual(toMarketItems(stackRecord))
  })

  it('rejects an unknown category code', () => {
    expect(() => toMarketItems({ ...flatRecord, type: 99 })).toThrow(ItemMappingError)
    expect(() => toMarketItems({ ...flatRecord, type: 99 })).toThrow(
      'Cannot map item field "type": unknown category code 99'
    )
  })

  it('rejects a record that is not an object', () => {
    expect(() => toMarketItems('AK-47')).toThrow('Cannot map item field "record": expected an object')
  })

  it('names the sibling field that failed', () => {
    const broken = { ...stackRecord, stackItems: [{ id: 1 }, { float: '0.1' }] }

    try {
      toMarketItems(broken)
      expect.unreachable('mapping should fail')
    } catch (error) {
      expect(error).toBeInstanceOf(ItemMappingError)
      if (error instanceof ItemMappingError) expect(error.field).toBe('stackItems[1].id')
    }
  })

  it('rejects a non-numeric price', () => {
    expect(() => toMarketItems({ ...flatRecord, price: '12.50' })).toThrow('Cannot map item field "price"')
  })
})

describe('unlockDateFromMillis', () => {
  it('converts epoch milliseconds', () => {
    expect(unlockDateFromMillis(1645430400000)).toEqual(new Date('2022-02-21T08:00:00.000Z'))
  })

  it('reads absent or zero as no lock', () => {
    expect(unlockDateFromMillis(undefined)).toBeNull()
    expect(unlockDateFromMillis(null)).toBeNull()
    expect(unlockDateFromMillis(0)).toBeNull()
  })

  it('rejects a date string', () => {
    expect(() => unlockDateFromMillis('2022-02-21')).toThrow(ItemMappingError)
  })
})

describe('decodeCategory', () => {
  it('decodes every known code', () => {
    expect([2, 3, 4, 5, 6, 7, 8, 12, 13].map(decodeCategory)).toEqual([
      'KNIFE',
      'RIFLE',
      'SNIPER_RIFLE',
      'PISTOL',
      'SMG',
      'SHOTGUN',
      'MACHINEGUN',
      'STICKER',
      'GLOVE',
    ])
  })
})

describe('buildItemBatch', () => {
  it('keeps page order and skips unnamed records', () => {
    const observedAt = new Date('2024-03-01T12:00:00.000Z')

    const batch = buildItemBatch([flatRecord, { price: 1 }, stackRecord], MARKET_URL, patchMarketName, observedAt)

    expect(batch.url).toBe(MARKET_URL)
    expect(batch.observedAt).toBe(observedAt)
    expect(batch.items.map(item => item.assetId)).toEqual([
      '25698110001',
      '25698110100',
      '25698110101',
      '25698110102',
    ])
  })

  it('builds an empty batch from no records', () => {
    expect(buildItemBatch([], MARKET_URL).items).toEqual([])
  })
})
