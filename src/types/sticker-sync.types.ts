import type { LocalFile } from '@root/types/pack.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'

export type SyncState =
  | 'idle'
  | 'fetching_remote'
  | 'empty_remote'
  | 'has_remote'
  | 'reconciling'
  | 'reindexing'
  | 'done'
  | 'aborted'

export interface FixEntry {
  local: LocalFile
  remote: RemoteItem
}

/**
 * Three-way delta between the local inventory and the remote inventory.
 * `toUpload`, `toDelete`, `toFix` and `unchanged` are pairwise disjoint.
 */
export interface SyncDelta {
  /** Local files the remote has never seen */
  toUpload: LocalFile[]
  /** Remote items no longer present locally */
  toDelete: RemoteItem[]
  /** Present on both sides with differing byte sizes */
  toFix: FixEntry[]
  /** Content keys present on both sides with equal sizes */
  unchanged: string[]
}

export type PullResult = {
  removed: number
  redownloaded: number
  downloaded: number
  items: number
}

export type PushResult = {
  mode: 'created' | 'updated'
  snapshotPath: string
  titleUpdated: boolean
  deleted: number
  uploaded: number
  fixed: number
  failed: ReadonlyArray<{ key: string; reason: string }>
  reindex: PullResult
}

export type DownloadResult = {
  directory: string
  downloaded: number
}
