import { readdir, stat, unlink } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import type { Logger } from 'pino'
import type { LocalFile } from '@root/types/pack.types.js'
import type { StickerFormat } from '@root/types/remote.types.js'
import { LocalIOError } from '@utils/errors.js'

export const PARTIAL_DOWNLOAD_SUFFIX = '.part'

const FORMAT_EXTENSIONS: Record<StickerFormat, string> = {
  static: 'webp',
  animated: 'tgs',
  video: 'webm',
}

/**
 * File stem: the name without its last extension
 */
export function fileStem(fileName: string): string {
  const ext = extname(fileName)
  return ext ? fileName.slice(0, -ext.length) : fileName
}

/**
 * Extension for a downloaded sticker. Taken from the remote file path when it
 * has one, otherwise derived from the sticker format.
 */
export function resolveExtension(
  format: StickerFormat,
  remoteFilePath?: string,
): string {
  const fromPath = remoteFilePath ? extname(remoteFilePath).slice(1) : ''
  return fromPath ? fromPath.toLowerCase() : FORMAT_EXTENSIONS[format]
}

/**
 * Temporary path a download is written to before it is renamed onto `target`.
 * It is a dot-file, so directory scans never pick it up.
 */
export function partialDownloadPath(target: string): string {
  return join(dirname(target), `.${basename(target)}${PARTIAL_DOWNLOAD_SUFFIX}`)
}

/**
 * Removes files that share a stem with another file.
 * Names are sorted lexicographically and the first one of each stem is kept.
 *
 * @returns The deleted file paths
 */
export async function deleteSameStemFiles(
  stickerDir: string,
  log: Logger,
): Promise<string[]> {
  const names = await listFileNames(stickerDir)
  const seen = new Set<string>()
  const deleted: string[] = []

  for (const name of names) {
    const stem = fileStem(name)
    if (!seen.has(stem)) {
      seen.add(stem)
      continue
    }
    const path = join(stickerDir, name)
    log.warn(`Deleting duplicate file: ${name}`)
    try {
      await unlink(path)
    } catch (error) {
      throw new LocalIOError('Failed to delete duplicate file', path, error)
    }
    deleted.push(path)
  }

  return deleted
}

/**
 * Lists the sticker files of a directory after removing same-stem duplicates.
 * Dot-files, partial downloads and subdirectories are ignored.
 */
export async function scanStickerDirectory(
  stickerDir: string,
  log: Logger,
): Promise<LocalFile[]> {
  await deleteSameStemFiles(stickerDir, log)
  const names = await listFileNames(stickerDir)

  const files: LocalFile[] = []
  for (const name of names) {
    const path = join(stickerDir, name)
    try {
      const info = await stat(path)
      files.push({ contentKey: fileStem(name), byteSize: info.size, path })
    } catch (error) {
      throw new LocalIOError('Failed to read sticker file', path, error)
    }
  }
  return files
}

async function listFileNames(stickerDir: string): Promise<string[]> {
  try {
    const entries = await readdir(stickerDir, { withFileTypes: true })
    return entries
      .filter(
        (entry) =>
          entry.isFile() &&
          !entry.name.startsWith('.') &&
          !entry.name.endsWith(PARTIAL_DOWNLOAD_SUFFIX),
      )
      .map((entry) => entry.name)
      .sort()
  } catch (error) {
    throw new LocalIOError('Failed to list sticker directory', stickerDir, error)
  }
}
