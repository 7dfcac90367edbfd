import type { PullResult, PushResult } from '@root/types/sticker-sync.types.js'
import type { FailedChange } from '@services/sticker-sync/processors/change-applier.js'

/**
 * Result of a push that created the collection
 *
 * @param snapshotPath - Snapshot taken before the push
 * @param uploaded - Stickers the collection was created with
 */
export function createCreatedResult(
  snapshotPath: string,
  uploaded: number,
  reindex: PullResult,
): PushResult {
  return {
    mode: 'created',
    snapshotPath,
    titleUpdated: false,
    deleted: 0,
    uploaded,
    fixed: 0,
    failed: [],
    reindex,
  }
}

export interface UpdateCounts {
  titleUpdated: boolean
  deleted: number
  uploaded: number
  fixed: number
  failed: FailedChange[]
}

export function createUpdatedResult(
  snapshotPath: string,
  counts: UpdateCounts,
  reindex: PullResult,
): PushResult {
  return {
    mode: 'updated',
    snapshotPath,
    ...counts,
    reindex,
  }
}

/**
 * One-line summary of a push for the log
 */
export function summarizePush(result: PushResult): string {
  const parts = [
    `${result.deleted} deleted`,
    `${result.uploaded} uploaded`,
    `${result.fixed} fixed`,
  ]
  if (result.failed.length > 0) {
    parts.push(`${result.failed.length} failed`)
  }
  return `Push ${result.mode === 'created' ? 'created the collection' : 'completed'}: ${parts.join(', ')}`
}
