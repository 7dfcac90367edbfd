import type { StickerEncoder } from '@root/types/encoder.types.js'
import type { LocalFile, StickerType } from '@root/types/pack.types.js'
import type { UploadPayload } from '@root/types/remote.types.js'
import { EncodingFailureError } from '@utils/errors.js'

export const DEFAULT_EMOJI = '❤️'

const EMOJI_PATTERN =
  /\p{Regional_Indicator}{2}|[#*0-9]\u{FE0F}?\u{20E3}|\p{Extended_Pictographic}(?:\u{FE0F}|\p{Emoji_Modifier})?(?:\u{200D}\p{Extended_Pictographic}(?:\u{FE0F}|\p{Emoji_Modifier})?)*/gu

/**
 * Edge length the encoder scales to: custom emoji are 100px, stickers 512px
 */
export function scaleFor(stickerType: StickerType): number {
  return stickerType === 'custom_emoji' ? 100 : 512
}

/**
 * Emoji characters contained in a file stem, in order of appearance
 */
export function emojisFromFileName(stem: string): string[] {
  return stem.match(EMOJI_PATTERN) ?? []
}

/**
 * Emojis of an upload: those named in the file stem, else the encoder's
 * hints, else the default heart.
 */
export function pickEmojis(stem: string, hints: readonly string[]): string[] {
  const fromName = emojisFromFileName(stem)
  if (fromName.length > 0) return fromName
  const fromHints = hints.filter((hint) => hint.trim().length > 0)
  return fromHints.length > 0 ? fromHints : [DEFAULT_EMOJI]
}

/**
 * Encodes a local file into an upload payload.
 *
 * @throws EncodingFailureError when the encoder rejects the file
 */
export async function buildUploadPayload(
  encoder: StickerEncoder,
  file: LocalFile,
  stickerType: StickerType,
): Promise<UploadPayload> {
  let encoded: Awaited<ReturnType<StickerEncoder>>
  try {
    encoded = await encoder(file.path, scaleFor(stickerType))
  } catch (error) {
    throw new EncodingFailureError(file.path, error)
  }

  return {
    sourceKey: file.contentKey,
    data: encoded.data,
    format: encoded.format,
    emojis: pickEmojis(file.contentKey, encoded.emojiHints),
  }
}
