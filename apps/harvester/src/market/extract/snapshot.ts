/**
 * Snapshot Extractor
 *
 * The market page is server-rendered; its full state ships as JSON inside
 * `<script id="__NEXT_DATA__" type="application/json">`. The item list sits
 * at props.pageProps.botInitData.skinsInfo.skins.
 *
 * Accepts raw HTML or the already-decoded structure.
 */

import * as cheerio from 'cheerio'
import type { SnapshotFailureReason, SnapshotResult } from '../types.js'

export const SNAPSHOT_SCRIPT_SELECTOR = 'script#__NEXT_DATA__[type="application/json"]'

/** Keys leading from the snapshot root to the object holding the item list */
export const ITEM_LIST_PATH = ['props', 'pageProps', 'botInitData', 'skinsInfo'] as const

const ITEM_LIST_KEY = 'skins'

type Failure = { ok: false; reason: SnapshotFailureReason; details?: string }

export type SnapshotDataResult = { ok: true; data: unknown } | Failure

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Decode the embedded snapshot. Non-string input is taken as already
 * decoded and returned as is.
 */
export function readSnapshotData(source: unknown): SnapshotDataResult {
  if (typeof source !== 'string') {
    return { ok: true, data: source }
  }

  const $ = cheerio.load(source)
  const script = $(SNAPSHOT_SCRIPT_SELECTOR).first()
  if (script.length === 0) {
    return { ok: false, reason: 'MARKER_NOT_FOUND', details: 'No __NEXT_DATA__ script in page' }
  }

  const raw = script.text().trim()
  try {
    const data: unknown = JSON.parse(raw)
    return { ok: true, data }
  } catch (error) {
    return {
      ok: false,
      reason: 'MALFORMED_PAYLOAD',
      details: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

/**
 * Walk ITEM_LIST_PATH to the item list. A list that is present but not an
 * array means the page has no items, not that it is broken.
 */
export function readItemRecords(data: unknown): SnapshotResult {
  let node: unknown = data
  const walked: string[] = []

  for (const key of ITEM_LIST_PATH) {
    walked.push(key)
    if (!isRecord(node) || !(key in node)) {
      return { ok: false, reason: 'UNEXPECTED_SHAPE', details: `Missing ${walked.join('.')}` }
    }
    node = node[key]
  }

  if (!isRecord(node)) {
    return { ok: false, reason: 'UNEXPECTED_SHAPE', details: `${walked.join('.')} is not an object` }
  }

  const list = node[ITEM_LIST_KEY]
  return { ok: true, records: Array.isArray(list) ? list : [] }
}

export function extractSnapshot(source: unknown): SnapshotResult {
  const decoded = readSnapshotData(source)
  if (!decoded.ok) return decoded
  return readItemRecords(decoded.data)
}
