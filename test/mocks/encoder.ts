import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { StickerEncoder } from '@root/types/encoder.types.js'
import { vi } from 'vitest'

/**
 * Encoder stand-in that returns the file bytes unchanged as a static sticker.
 * Files whose base name is listed in `failFor` are rejected.
 */
export function createMockEncoder(failFor: string[] = []) {
  return vi.fn<StickerEncoder>(async (filePath) => {
    if (failFor.includes(basename(filePath))) {
      throw new Error('unsupported image')
    }
    const content = await readFile(filePath)
    return {
      data: new Uint8Array(content),
      format: 'static',
      emojiHints: [],
    }
  })
}
