import type { NameNormalizer } from '../types.js'

/**
 * Default market-name cleanup: NFC, trimmed, single spaces.
 *
 * Pages occasionally render names with doubled or non-breaking spaces,
 * which would otherwise split one item into several price series.
 */
export const patchMarketName: NameNormalizer = name =>
  name.normalize('NFC').replace(/\s+/g, ' ').trim()
