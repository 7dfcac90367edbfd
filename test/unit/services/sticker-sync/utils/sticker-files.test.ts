import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  deleteSameStemFiles,
  fileStem,
  partialDownloadPath,
  resolveExtension,
  scanStickerDirectory,
} from '@services/sticker-sync/utils/sticker-files.js'
import { LocalIOError } from '@utils/errors.js'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  createTempDir,
  listDir,
  removeTempDir,
  writeFiles,
} from '../../../../helpers/tmp-dir.js'
import { createMockLogger } from '../../../../mocks/logger.js'

describe('sticker-files', () => {
  describe('fileStem', () => {
    it('should drop the last extension only', () => {
      expect(fileStem('abc.webp')).toBe('abc')
      expect(fileStem('abc.tar.gz')).toBe('abc.tar')
      expect(fileStem('abc')).toBe('abc')
    })
  })

  describe('resolveExtension', () => {
    it('should take the extension of the remote file path', () => {
      expect(resolveExtension('static', 'stickers/file_3.PNG')).toBe('png')
    })

    it('should derive the extension from the format otherwise', () => {
      expect(resolveExtension('static')).toBe('webp')
      expect(resolveExtension('animated')).toBe('tgs')
      expect(resolveExtension('video', 'stickers/file_3')).toBe('webm')
    })
  })

  describe('partialDownloadPath', () => {
    it('should hide the temporary file as a dot-file beside the target', () => {
      expect(partialDownloadPath(join('/packs', 'stickers', 'a.webp'))).toBe(
        join('/packs', 'stickers', '.a.webp.part'),
      )
    })
  })

  describe('with a sticker directory', () => {
    let dir: string

    beforeEach(async () => {
      dir = await createTempDir()
    })

    afterEach(async () => {
      await removeTempDir(dir)
    })

    it('should keep the first name of each stem in sorted order', async () => {
      await writeFiles(dir, { 'a.webp': '1', 'a.png': '22', 'b.gif': '3' })
      const logger = createMockLogger()

      const deleted = await deleteSameStemFiles(dir, logger)

      expect(deleted).toEqual([join(dir, 'a.webp')])
      expect(await listDir(dir)).toEqual(['a.png', 'b.gif'])
      expect(logger.warn).toHaveBeenCalledWith('Deleting duplicate file: a.webp')
    })

    it('should scan files with their stems and sizes, ignoring dot-files and folders', async () => {
      await writeFiles(dir, {
        'b.webp': 'bbbb',
        'a.png': 'aa',
        '.DS_Store': 'x',
      })
      await mkdir(join(dir, 'nested'))

      const files = await scanStickerDirectory(dir, createMockLogger())

      expect(files).toEqual([
        { contentKey: 'a', byteSize: 2, path: join(dir, 'a.png') },
        { contentKey: 'b', byteSize: 4, path: join(dir, 'b.webp') },
      ])
    })

    it('should skip leftover partial downloads', async () => {
      await writeFiles(dir, {
        'a.webp': 'aaaa',
        'b.webp.part': 'bb',
        '.c.webp.part': 'cc',
      })

      const files = await scanStickerDirectory(dir, createMockLogger())

      expect(files).toEqual([
        { contentKey: 'a', byteSize: 4, path: join(dir, 'a.webp') },
      ])
    })

    it('should throw LocalIOError for a missing directory', async () => {
      await expect(
        scanStickerDirectory(join(dir, 'missing'), createMockLogger()),
      ).rejects.toBeInstanceOf(LocalIOError)
    })
  })
})
