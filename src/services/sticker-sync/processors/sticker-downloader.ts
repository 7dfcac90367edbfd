import { rename, rm, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from 'pino'
import type { RemoteItem } from '@root/types/remote.types.js'
import { isNotFoundError, LocalIOError } from '@utils/errors.js'
import type { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import { partialDownloadPath, resolveExtension } from '@services/sticker-sync/utils/sticker-files.js'

/**
 * Downloads one remote sticker into the sticker directory as
 * `<unique content id>.<extension>`, replacing any file at that path.
 *
 * @returns Path of the written file
 */
export async function downloadSticker(
  gateway: RemoteGateway,
  item: RemoteItem,
  stickerDir: string,
  log: Logger,
): Promise<string> {
  const file = await gateway.fetchFile(item.contentId)
  const fileName = `${item.uniqueContentId}.${resolveExtension(item.format, file.filePath)}`
  const target = join(stickerDir, fileName)
  const tempPath = partialDownloadPath(target)

  try {
    await writeFile(tempPath, file.data)
    await rename(tempPath, target)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw new LocalIOError('Failed to write sticker file', target, error)
  }

  log.info(`Downloaded sticker: ${item.uniqueContentId}`)
  return target
}

/**
 * Deletes a local file; a file that is already gone is not an error
 */
export async function removeLocalFile(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (error) {
    if (isNotFoundError(error)) return
    throw new LocalIOError('Failed to delete sticker file', path, error)
  }
}
