import { createLogger } from '@pricewatch/logger'

export const logger = createLogger('harvester')

/**
 * Component loggers. Each prefixes its entries with
 * `harvester:<component>`.
 */
export const loggers = {
  market: logger.child('market'),
  fetch: logger.child('fetch'),
  sessions: logger.child('sessions'),
  queues: logger.child('queues'),
  worker: logger.child('worker'),
}
