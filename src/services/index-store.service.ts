/**
 * Index Store
 *
 * Loads, validates and persists the pack descriptor (index.json).
 *
 * The pack carries an integrity tag binding its name and sticker type to the
 * operator allowed to mutate it. The tag is checked on every load with a
 * constant-time comparison; a mismatch rejects the file as tampered and it is
 * never repaired automatically.
 */

import { createHmac, timingSafeEqual } from 'node:crypto'
import { readFile, rename, writeFile } from 'node:fs/promises'
import {
  type IndexFile,
  IndexFileSchema,
} from '@schemas/pack/pack.schema.js'
import type { Pack, StickerType } from '@root/types/pack.types.js'
import {
  CorruptedIndexError,
  isNotFoundError,
  LocalIOError,
  PreconditionError,
} from '@utils/errors.js'

export const INDEX_FILE_NAME = 'index.json'

/**
 * Computes the integrity tag: hex HMAC-SHA256 of `name:stickerType` keyed by the operator id
 */
export function generateIntegrityTag(
  operatorId: string,
  name: string,
  stickerType: StickerType,
): string {
  return createHmac('sha256', Buffer.from(operatorId, 'utf8'))
    .update(`${name}:${stickerType}`, 'utf8')
    .digest('hex')
}

export class IndexStore {
  /**
   * Builds a fresh pack with its integrity tag and no items
   */
  create(
    title: string,
    name: string,
    stickerType: StickerType,
    operatorId: string,
  ): Pack {
    return {
      title,
      name,
      stickerType,
      operatorId,
      integrityTag: generateIntegrityTag(operatorId, name, stickerType),
      items: [],
    }
  }

  /**
   * Constant-time check of the pack's integrity tag
   */
  verify(pack: Pack): boolean {
    const expected = Buffer.from(
      generateIntegrityTag(pack.operatorId, pack.name, pack.stickerType),
      'utf8',
    )
    const actual = Buffer.from(pack.integrityTag, 'utf8')
    if (actual.length !== expected.length) {
      return false
    }
    return timingSafeEqual(actual, expected)
  }

  /**
   * Reads and validates a pack.
   *
   * @throws PreconditionError when the file does not exist
   * @throws CorruptedIndexError on malformed content or integrity mismatch
   */
  async load(path: string): Promise<Pack> {
    let raw: string
    try {
      raw = await readFile(path, 'utf8')
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new PreconditionError(
          `Index file not found: ${path}. Please sync in an initialized directory.`,
        )
      }
      throw new LocalIOError('Failed to read index file', path, error)
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new CorruptedIndexError(path, 'invalid JSON', { cause: error })
    }

    const parsed = IndexFileSchema.safeParse(json)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      throw new CorruptedIndexError(path, issues)
    }

    const pack = fromIndexFile(parsed.data)
    if (!this.verify(pack)) {
      throw new CorruptedIndexError(path, 'metadata has been tampered')
    }
    return pack
  }

  /**
   * Writes the pack atomically: a temporary sibling file is renamed over the target
   */
  async save(path: string, pack: Pack): Promise<void> {
    const tempPath = `${path}.tmp`
    const body = `${JSON.stringify(toIndexFile(pack), null, 2)}\n`
    try {
      await writeFile(tempPath, body, 'utf8')
      await rename(tempPath, path)
    } catch (error) {
      throw new LocalIOError('Failed to write index file', path, error)
    }
  }
}

export function toIndexFile(pack: Pack): IndexFile {
  return {
    title: pack.title,
    name: pack.name,
    sticker_type: pack.stickerType,
    operator_id: pack.operatorId,
    lock_ns: pack.integrityTag,
    emotes: pack.items.map((item) => ({
      emoji: item.emoji,
      file_id: item.remoteId,
    })),
  }
}

export function fromIndexFile(file: IndexFile): Pack {
  return {
    title: file.title,
    name: file.name,
    stickerType: file.sticker_type,
    operatorId: file.operator_id,
    integrityTag: file.lock_ns,
    items: file.emotes.map((emote) => ({
      emoji: emote.emoji,
      remoteId: emote.file_id,
    })),
  }
}
