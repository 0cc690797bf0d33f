/**
 * Market Errors
 *
 * Errors that escape a parse. Everything else (transport failures,
 * challenge pages on a 2xx, unreadable snapshots) is absorbed as a failed
 * attempt.
 */

/**
 * Every attempt failed. The sink was never called.
 */
export class MaxAttemptsReachedError extends Error {
  constructor(url: string) {
    super(`Gave up on ${url}: max attempts reached`)
    this.name = 'MaxAttemptsReachedError'
  }
}

/**
 * A raw record no longer matches the shape the transformer knows. Retrying
 * cannot fix it.
 */
export class ItemMappingError extends Error {
  readonly field: string

  constructor(field: string, message: string) {
    super(`Cannot map item field "${field}": ${message}`)
    this.name = 'ItemMappingError'
    this.field = field
  }
}

/**
 * The page answered with a non-2xx status.
 */
export class HttpStatusError extends Error {
  readonly statusCode: number

  constructor(url: string, statusCode: number, statusText: string) {
    const status = statusText ? `${statusCode} ${statusText}` : String(statusCode)
    super(`HTTP ${status} from ${url}`)
    this.name = 'HttpStatusError'
    this.statusCode = statusCode
  }
}
