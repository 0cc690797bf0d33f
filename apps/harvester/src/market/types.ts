/**
 * Market Snapshot Types
 *
 * Shapes shared by the fetch → extract → transform → emit pipeline, and the
 * contracts of its collaborators (session source, sink, name normalizer).
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Raw page data
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One entry of the page's item list, exactly as embedded.
 *
 * Known fields: fullName, price, assetId, nameId, type, float, tradeLock,
 * overpay.float and, for stacked entries, stackSize/stackId/stackItems
 * (siblings carry id, float, tradeLock). The transformer checks each one.
 */
export type RawItemRecord = Record<string, unknown>

// ═══════════════════════════════════════════════════════════════════════════════
// Domain items
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Closed set of item classes. Unknown codes are a mapping error, never a
 * fallback bucket.
 */
export type ItemCategory =
  | 'KNIFE'
  | 'RIFLE'
  | 'SNIPER_RIFLE'
  | 'PISTOL'
  | 'SMG'
  | 'SHOTGUN'
  | 'MACHINEGUN'
  | 'STICKER'
  | 'GLOVE'

export const ITEM_CATEGORY_CODES: ReadonlyMap<number, ItemCategory> = new Map<number, ItemCategory>([
  [2, 'KNIFE'],
  [3, 'RIFLE'],
  [4, 'SNIPER_RIFLE'],
  [5, 'PISTOL'],
  [6, 'SMG'],
  [7, 'SHOTGUN'],
  [8, 'MACHINEGUN'],
  [12, 'STICKER'],
  [13, 'GLOVE'],
])

export interface MarketItem {
  /** Display name after normalization */
  name: string

  price: number

  /** Per-instance asset id, always a string */
  assetId: string

  /** Template id shared by every instance of the same item */
  nameId: number

  category: ItemCategory

  /** Wear value exactly as the page printed it */
  float: string | null

  /** End of the trade lock, or null when the item is tradable */
  unlockAt: Date | null

  /** Only ever set on a top-level record, never on stack siblings */
  overpayFloat: number | null
}

/**
 * Items from one successful extraction pass, in page order.
 * Built fresh per attempt; the sink owns it after put().
 */
export interface ItemBatch {
  url: string
  observedAt: Date
  items: MarketItem[]
}

export type NameNormalizer = (name: string) => string

// ═══════════════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════════════

export interface SessionRequestInit {
  headers: Record<string, string>
  signal: AbortSignal
}

/**
 * The part of a fetch Response the fetcher reads. Satisfied by both Node's
 * global Response and undici's.
 */
export interface SessionResponse {
  ok: boolean
  status: number
  statusText: string
  text(): Promise<string>
}

/**
 * One outbound network identity (a proxy, or the host itself).
 */
export interface NetworkSession {
  readonly id: string
  get(url: string, init: SessionRequestInit): Promise<SessionResponse>
}

/**
 * Hands out sessions. acquire() only rejects on caller abort: when every
 * session is resting it waits, at most `postponeMs`, and then returns one
 * anyway. An aborted acquire checks nothing out.
 */
export interface SessionSource {
  acquire(postponeMs: number, signal?: AbortSignal): Promise<NetworkSession>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch results
// ═══════════════════════════════════════════════════════════════════════════════

export type NoContentReason = 'challenge' | 'timeout' | 'transport_error'

export type PageFetchResult =
  | { status: 'content'; html: string; statusCode: number; durationMs: number }
  | { status: 'no_content'; reason: NoContentReason; error?: string; durationMs: number }

/**
 * Fetches one page through a session. Implementations report transport
 * trouble as no_content rather than throwing.
 */
export interface PageSource {
  fetch(session: NetworkSession, url: string, signal?: AbortSignal): Promise<PageFetchResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction results
// ═══════════════════════════════════════════════════════════════════════════════

export type SnapshotFailureReason =
  | 'MARKER_NOT_FOUND' // No embedded data script in the HTML
  | 'MALFORMED_PAYLOAD' // Script found but its body is not JSON
  | 'UNEXPECTED_SHAPE' // A key on the path to the item list is missing

/**
 * Records are left unvalidated; the transformer decides what a bad entry
 * means.
 */
export type SnapshotResult =
  | { ok: true; records: unknown[] }
  | { ok: false; reason: SnapshotFailureReason; details?: string }

// ═══════════════════════════════════════════════════════════════════════════════
// Sink
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Downstream consumer of finished batches. Called at most once per parse;
 * its failures propagate to the parse caller.
 */
export interface ItemBatchSink {
  put(batch: ItemBatch): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parse
// ═══════════════════════════════════════════════════════════════════════════════

export interface ParseOptions {
  /** Failed attempts tolerated; 0 still makes one attempt */
  maxAttempts?: number
  signal?: AbortSignal
}

export interface ParseOutcome {
  /** Attempts made, including the successful one */
  attempts: number
  itemCount: number
}
