/**
 * Batch sink backed by the market-items queue. One batch, one job.
 */

import type { Queue } from 'bullmq'
import type { ILogger } from '@pricewatch/logger'
import { loggers } from '../config/logger.js'
import { serializeBatch } from '../config/queues.js'
import type { MarketItemsJobData } from '../config/queues.js'
import type { ItemBatch, ItemBatchSink } from './types.js'

export const MARKET_ITEMS_JOB_NAME = 'market-items'

export class QueueBatchSink implements ItemBatchSink {
  private readonly log: ILogger

  constructor(
    private readonly queue: Pick<Queue<MarketItemsJobData>, 'add'>,
    logger: ILogger = loggers.queues
  ) {
    this.log = logger
  }

  async put(batch: ItemBatch): Promise<void> {
    const job = await this.queue.add(MARKET_ITEMS_JOB_NAME, serializeBatch(batch), {
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    })
    this.log.debug('Batch enqueued', { url: batch.url, jobId: job.id, items: batch.items.length })
  }
}
