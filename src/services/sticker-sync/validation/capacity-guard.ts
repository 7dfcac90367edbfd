import type { Logger } from 'pino'
import type { SyncDelta } from '@root/types/sticker-sync.types.js'
import {
  CapacityExceededError,
  CreationSizeInvalidError,
} from '@utils/errors.js'

/** Maximum stickers a collection may hold */
export const MAX_COLLECTION_SIZE = 120

/** Maximum stickers accepted by the initial creation call */
export const MAX_CREATION_BATCH = 30

export interface CapacityCheckResult {
  passed: boolean
  currentCount: number
  resultingCount: number
  limit: number
  errorMessage?: string
}

/**
 * Computes whether applying a delta keeps the collection within its limit.
 *
 * @param collection - Collection name, for reporting
 * @param remoteCount - Stickers currently in the remote collection
 * @param delta - Pending changes
 * @param logger - Logger instance
 * @param limit - Maximum collection size
 */
export function performCapacityCheck(
  collection: string,
  remoteCount: number,
  delta: Pick<SyncDelta, 'toUpload' | 'toDelete'>,
  logger: Logger,
  limit = MAX_COLLECTION_SIZE,
): CapacityCheckResult {
  const resultingCount =
    remoteCount - delta.toDelete.length + delta.toUpload.length

  logger.debug(
    `Collection ${collection} would hold ${resultingCount} stickers (currently ${remoteCount}, limit ${limit})`,
  )

  if (resultingCount > limit) {
    return {
      passed: false,
      currentCount: remoteCount,
      resultingCount,
      limit,
      errorMessage: `Your wanted operation will exceed the limit of ${limit} stickers, so it's aborted.`,
    }
  }

  return { passed: true, currentCount: remoteCount, resultingCount, limit }
}

/**
 * Capacity guard: throws before any remote mutation when the push would
 * leave the collection over its limit.
 *
 * @throws CapacityExceededError
 */
export function assertCapacity(
  collection: string,
  remoteCount: number,
  delta: Pick<SyncDelta, 'toUpload' | 'toDelete'>,
  logger: Logger,
  limit = MAX_COLLECTION_SIZE,
): CapacityCheckResult {
  const result = performCapacityCheck(collection, remoteCount, delta, logger, limit)
  if (!result.passed) {
    logger.error(result.errorMessage)
    throw new CapacityExceededError(collection, result.resultingCount, limit)
  }
  return result
}

/**
 * Creation guard: the initial batch must hold between 1 and `max` stickers.
 *
 * @throws CreationSizeInvalidError
 */
export function assertCreationSize(
  collection: string,
  count: number,
  max = MAX_CREATION_BATCH,
): void {
  if (count === 0 || count > max) {
    throw new CreationSizeInvalidError(collection, count, max)
  }
}
