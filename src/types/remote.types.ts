import type { StickerType } from '@root/types/pack.types.js'

export type StickerFormat = 'static' | 'animated' | 'video'

/**
 * Sticker as reported by the remote collection
 */
export interface RemoteItem {
  /** File handle used to delete or download this sticker */
  contentId: string
  /** Content-addressed id, stable across fetches; the diff key */
  uniqueContentId: string
  byteSize: number
  emoji: string
  format: StickerFormat
}

export interface RemoteCollection {
  name: string
  title: string
  stickerType: StickerType
  items: RemoteItem[]
}

/**
 * A missing collection is a valid state, not a failure
 */
export type CollectionLookup =
  | { status: 'found'; collection: RemoteCollection }
  | { status: 'not_found' }

export interface RemoteFile {
  data: Uint8Array
  /** Remote storage path, when the provider exposes one (e.g. `stickers/file_3.webp`) */
  filePath?: string
}

/**
 * Identity behind the credential, used as pack operator
 */
export interface BotIdentity {
  id: string
  username: string
}

export interface UploadPayload {
  /** Local content key the payload was built from */
  sourceKey: string
  data: Uint8Array
  format: StickerFormat
  emojis: string[]
}

export interface CreateCollectionInput {
  ownerId: string
  name: string
  title: string
  stickerType: StickerType
  items: UploadPayload[]
}

export interface AddItemInput {
  ownerId: string
  name: string
  item: UploadPayload
}

/**
 * Capability performing the remote operations.
 * Transport and protocol failures are raised; a missing collection is
 * reported through {@link CollectionLookup}.
 */
export interface RemoteClient {
  getMe(): Promise<BotIdentity>
  getCollection(name: string): Promise<CollectionLookup>
  createCollection(input: CreateCollectionInput): Promise<void>
  addItem(input: AddItemInput): Promise<void>
  deleteItem(contentId: string): Promise<void>
  renameCollection(name: string, title: string): Promise<void>
  fetchFile(contentId: string): Promise<RemoteFile>
  close?(): Promise<void>
}
