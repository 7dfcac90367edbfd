import type { LocalFile } from '@root/types/pack.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'
import type { FixEntry, SyncDelta } from '@root/types/sticker-sync.types.js'

/**
 * Indexes remote items by unique content id. A repeated id keeps its first occurrence.
 */
export function indexRemoteItems(remote: readonly RemoteItem[]): Map<string, RemoteItem> {
  const byId = new Map<string, RemoteItem>()
  for (const item of remote) {
    if (!byId.has(item.uniqueContentId)) {
      byId.set(item.uniqueContentId, item)
    }
  }
  return byId
}

/**
 * Computes the three-way delta between the local and remote inventories.
 *
 * Local keys absent remotely are upload material, remote ids absent locally
 * are deletion material, and keys on both sides whose byte sizes differ need
 * repair. The direction of each action is decided by the calling flow.
 */
export function computeDelta(
  local: readonly LocalFile[],
  remote: readonly RemoteItem[],
): SyncDelta {
  const remoteById = indexRemoteItems(remote)
  const localKeys = new Set<string>()

  const toUpload: LocalFile[] = []
  const toFix: FixEntry[] = []
  const unchanged: string[] = []

  for (const file of local) {
    if (localKeys.has(file.contentKey)) continue
    localKeys.add(file.contentKey)

    const match = remoteById.get(file.contentKey)
    if (!match) {
      toUpload.push(file)
    } else if (match.byteSize !== file.byteSize) {
      toFix.push({ local: file, remote: match })
    } else {
      unchanged.push(file.contentKey)
    }
  }

  const toDelete = [...remoteById.values()].filter(
    (item) => !localKeys.has(item.uniqueContentId),
  )

  return { toUpload, toDelete, toFix, unchanged }
}

/**
 * True when applying the delta would change nothing
 */
export function isEmptyDelta(delta: SyncDelta): boolean {
  return (
    delta.toUpload.length === 0 &&
    delta.toDelete.length === 0 &&
    delta.toFix.length === 0
  )
}
