import { basename } from 'node:path'
import type { Logger } from 'pino'
import type { StickerEncoder } from '@root/types/encoder.types.js'
import type { LocalFile, Pack } from '@root/types/pack.types.js'
import type { RemoteItem, UploadPayload } from '@root/types/remote.types.js'
import type { FixEntry } from '@root/types/sticker-sync.types.js'
import { describeCause, EncodingFailureError } from '@utils/errors.js'
import { buildUploadPayload } from '@services/sticker-sync/payload/payload-builder.js'
import type { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import { downloadSticker, removeLocalFile } from '@services/sticker-sync/processors/sticker-downloader.js'

export interface ChangeContext {
  gateway: RemoteGateway
  encoder: StickerEncoder
  pack: Pack
  stickerDir: string
  logger: Logger
}

export interface FailedChange {
  key: string
  reason: string
}

export interface ChangeBatchResult {
  succeeded: number
  failed: FailedChange[]
}

/**
 * Deletes remote stickers that are gone locally. A failed deletion is logged
 * and counted; the remaining deletions still run.
 */
export async function applyDeletions(
  context: ChangeContext,
  items: readonly RemoteItem[],
): Promise<ChangeBatchResult> {
  const { gateway, logger } = context
  const failed: FailedChange[] = []
  let succeeded = 0

  for (const item of items) {
    try {
      await gateway.deleteItem(item.contentId)
      logger.info(`Deleted sticker: ${item.uniqueContentId}`)
      succeeded++
    } catch (error) {
      logger.error({ error }, `Failed to delete sticker ${item.uniqueContentId}`)
      failed.push({ key: item.uniqueContentId, reason: describeCause(error) })
    }
  }

  return { succeeded, failed }
}

/**
 * Encodes and uploads new local files. The local source file is removed once
 * its upload succeeds; the reindex downloads it back under its remote id.
 * A file that fails to encode is logged, counted and skipped. A rejected
 * upload ends the batch with the remote error, leaving the source file in place.
 */
export async function applyUploads(
  context: ChangeContext,
  files: readonly LocalFile[],
): Promise<ChangeBatchResult> {
  const { gateway, encoder, pack, logger } = context
  const failed: FailedChange[] = []
  let succeeded = 0

  let index = 0
  for (const file of files) {
    index++
    let payload: UploadPayload
    try {
      payload = await buildUploadPayload(encoder, file, pack.stickerType)
    } catch (error) {
      if (!(error instanceof EncodingFailureError)) throw error
      logger.error({ error }, `Failed to create sticker for ${basename(file.path)}`)
      failed.push({ key: file.contentKey, reason: describeCause(error) })
      continue
    }

    logger.info(`Uploading sticker ${index}/${files.length}: ${basename(file.path)}`)
    await gateway.addItem({
      ownerId: pack.operatorId,
      name: pack.name,
      item: payload,
    })
    await removeLocalFile(file.path)
    succeeded++
  }

  return { succeeded, failed }
}

/**
 * Replaces local files whose size differs from the remote copy with the
 * remote bytes. The first failure stops the remaining repairs.
 *
 * @returns Number of repaired files
 */
export async function applyRepairs(
  context: ChangeContext,
  fixes: readonly FixEntry[],
): Promise<number> {
  const { gateway, stickerDir, logger } = context
  let repaired = 0

  for (const { local, remote } of fixes) {
    logger.warn(`File size mismatch for ${basename(local.path)}, restoring remote copy`)
    const written = await downloadSticker(gateway, remote, stickerDir, logger)
    if (written !== local.path) {
      await removeLocalFile(local.path)
    }
    repaired++
  }

  return repaired
}
