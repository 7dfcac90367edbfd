import type { StickerFormat } from '@root/types/remote.types.js'

export interface EncodedSticker {
  data: Uint8Array
  format: StickerFormat
  emojiHints: string[]
}

/**
 * Converts an arbitrary local image or video into the remote wire format.
 * `scale` is the target edge length in pixels.
 */
export type StickerEncoder = (
  filePath: string,
  scale: number,
) => Promise<EncodedSticker>
