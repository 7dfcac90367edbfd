export const STICKER_TYPES = ['mask', 'regular', 'custom_emoji'] as const

export type StickerType = (typeof STICKER_TYPES)[number]

/**
 * One (emoji, remote unique content id) association recorded in the pack
 */
export interface Emote {
  emoji: string
  remoteId: string
}

/**
 * Persisted descriptor of one sticker collection (the local index)
 */
export interface Pack {
  title: string
  /** Globally unique collection identifier */
  name: string
  stickerType: StickerType
  /** Remote identity allowed to mutate the collection */
  operatorId: string
  /** Hex HMAC-SHA256 of `name:stickerType` keyed by operatorId */
  integrityTag: string
  items: Emote[]
}

/**
 * Sticker file found in the local sticker directory
 */
export interface LocalFile {
  /** File stem: a remote unique content id once downloaded, any name before upload */
  contentKey: string
  byteSize: number
  path: string
}
