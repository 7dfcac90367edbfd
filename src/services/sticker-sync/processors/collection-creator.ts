import { basename } from 'node:path'
import type { Logger } from 'pino'
import type { StickerEncoder } from '@root/types/encoder.types.js'
import type { LocalFile, Pack } from '@root/types/pack.types.js'
import type { UploadPayload } from '@root/types/remote.types.js'
import { buildUploadPayload } from '@services/sticker-sync/payload/payload-builder.js'
import type { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import { assertCreationSize, MAX_CREATION_BATCH } from '@services/sticker-sync/validation/capacity-guard.js'

export interface CreationContext {
  gateway: RemoteGateway
  encoder: StickerEncoder
  pack: Pack
  logger: Logger
  maxBatch?: number
}

/**
 * Creates the remote collection from every local file in one call.
 *
 * The batch size is checked before anything is encoded, and any encoding
 * failure aborts the creation.
 *
 * @returns Number of stickers the collection was created with
 */
export async function createCollectionFromFiles(
  context: CreationContext,
  files: readonly LocalFile[],
): Promise<number> {
  const { gateway, encoder, pack, logger } = context
  assertCreationSize(pack.name, files.length, context.maxBatch ?? MAX_CREATION_BATCH)

  const items: UploadPayload[] = []
  for (const file of files) {
    logger.debug(`Encoding ${basename(file.path)}`)
    items.push(await buildUploadPayload(encoder, file, pack.stickerType))
  }

  logger.info(`Creating sticker collection ${pack.name} with ${items.length} stickers`)
  await gateway.createCollection({
    ownerId: pack.operatorId,
    name: pack.name,
    title: pack.title,
    stickerType: pack.stickerType,
    items,
  })
  return items.length
}
