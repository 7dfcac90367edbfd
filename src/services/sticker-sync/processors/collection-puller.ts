import { mkdir } from 'node:fs/promises'
import { basename } from 'node:path'
import type { Logger } from 'pino'
import type { Emote } from '@root/types/pack.types.js'
import type { RemoteCollection, RemoteItem } from '@root/types/remote.types.js'
import type { PullResult } from '@root/types/sticker-sync.types.js'
import { LocalIOError } from '@utils/errors.js'
import { computeDelta, indexRemoteItems } from '@services/sticker-sync/diff/diff-engine.js'
import type { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import { scanStickerDirectory } from '@services/sticker-sync/utils/sticker-files.js'
import { downloadSticker, removeLocalFile } from '@services/sticker-sync/processors/sticker-downloader.js'

export interface PullContext {
  gateway: RemoteGateway
  stickerDir: string
  logger: Logger
}

export interface PullOutcome {
  result: PullResult
  /** Pack items mirroring the remote collection */
  items: Emote[]
}

/**
 * Mirrors the remote items as pack emotes, in remote order
 */
export function emotesFromRemote(items: readonly RemoteItem[]): Emote[] {
  return [...indexRemoteItems(items).values()].map((item) => ({
    emoji: item.emoji,
    remoteId: item.uniqueContentId,
  }))
}

/**
 * Reconciles the sticker directory with the remote collection as source of truth.
 *
 * Local-only files are deleted, size-mismatched files are deleted and
 * downloaded again, and remote-only stickers are downloaded. Downloads run
 * one after another.
 */
export async function pullCollection(
  context: PullContext,
  collection: RemoteCollection,
): Promise<PullOutcome> {
  const { gateway, stickerDir, logger } = context

  try {
    await mkdir(stickerDir, { recursive: true })
  } catch (error) {
    throw new LocalIOError('Failed to create sticker directory', stickerDir, error)
  }

  const local = await scanStickerDirectory(stickerDir, logger)
  const delta = computeDelta(local, collection.items)

  // Local-only content is not on the remote: remove it
  for (const file of delta.toUpload) {
    logger.info(`Cleaning up ${basename(file.path)}`)
    await removeLocalFile(file.path)
  }

  const toDownload: RemoteItem[] = [...delta.toDelete]
  for (const { local: file, remote } of delta.toFix) {
    logger.warn(`File size mismatch for ${basename(file.path)}, re-downloading...`)
    await removeLocalFile(file.path)
    toDownload.push(remote)
  }

  let index = 0
  for (const item of toDownload) {
    index++
    logger.debug(
      `Synchronizing indexes: ${item.uniqueContentId} ${index}/${toDownload.length}`,
    )
    await downloadSticker(gateway, item, stickerDir, logger)
  }

  const items = emotesFromRemote(collection.items)
  return {
    result: {
      removed: delta.toUpload.length,
      redownloaded: delta.toFix.length,
      downloaded: delta.toDelete.length,
      items: items.length,
    },
    items,
  }
}
