/**
 * Sticker Synchronization Service
 *
 * Keeps a local pack directory and its remote sticker collection in step.
 *
 * Responsible for:
 * - Pulling the remote collection into the sticker directory (remote is truth)
 * - Pushing local changes to the remote collection (local is truth), behind a
 *   snapshot of the sticker directory and the capacity and creation guards
 * - Creating pack directories for new or existing collections
 * - Rewriting the pack index once the remote-facing work of a step succeeded
 *
 * Every command walks the same state machine:
 * idle -> fetching_remote -> empty_remote | has_remote -> reconciling ->
 * reindexing -> done, with aborted reachable from anywhere.
 *
 * @example
 * const service = new StickerSyncService(log, { gateway, encoder, snapshots })
 * await service.push('/packs/cats')
 */

import { mkdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from 'pino'
import { type PackInput, PackInputSchema } from '@schemas/pack/pack.schema.js'
import type { StickerEncoder } from '@root/types/encoder.types.js'
import type { Pack } from '@root/types/pack.types.js'
import type { BotIdentity, RemoteCollection } from '@root/types/remote.types.js'
import type {
  DownloadResult,
  PullResult,
  PushResult,
  SyncState,
} from '@root/types/sticker-sync.types.js'
import {
  InvalidTransitionError,
  isNotFoundError,
  LocalIOError,
  PreconditionError,
  RemoteFailureError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import { INDEX_FILE_NAME, IndexStore } from '@services/index-store.service.js'
import type { SnapshotManager } from '@services/snapshot.service.js'
import {
  computeDelta,
  isEmptyDelta,
} from '@services/sticker-sync/diff/diff-engine.js'
import {
  applyDeletions,
  applyRepairs,
  applyUploads,
  type ChangeContext,
} from '@services/sticker-sync/processors/change-applier.js'
import { createCollectionFromFiles } from '@services/sticker-sync/processors/collection-creator.js'
import { pullCollection } from '@services/sticker-sync/processors/collection-puller.js'
import { downloadSticker } from '@services/sticker-sync/processors/sticker-downloader.js'
import type { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import {
  createCreatedResult,
  createUpdatedResult,
  summarizePush,
  type UpdateCounts,
} from '@services/sticker-sync/result-builder.js'
import {
  collectionNameFromLink,
  makeSetName,
  shareLinkFor,
} from '@services/sticker-sync/utils/pack-naming.js'
import {
  deleteSameStemFiles,
  scanStickerDirectory,
} from '@services/sticker-sync/utils/sticker-files.js'
import {
  assertCapacity,
  MAX_COLLECTION_SIZE,
} from '@services/sticker-sync/validation/capacity-guard.js'

export const STICKER_DIR_NAME = 'stickers'

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
  idle: ['fetching_remote', 'aborted'],
  fetching_remote: ['empty_remote', 'has_remote', 'aborted'],
  empty_remote: ['reconciling', 'done', 'aborted'],
  has_remote: ['reconciling', 'aborted'],
  reconciling: ['reindexing', 'done', 'aborted'],
  reindexing: ['done', 'aborted'],
  done: [],
  aborted: [],
}

export interface StickerSyncServiceOptions {
  gateway: RemoteGateway
  encoder: StickerEncoder
  snapshots: SnapshotManager
  indexStore?: IndexStore
  /** Maximum collection size enforced by the capacity guard */
  capacityLimit?: number
}

export interface InitResult {
  packDir: string
  pack: Pack
  /** Null when the collection does not exist remotely yet */
  pull: PullResult | null
}

export class StickerSyncService {
  private readonly log: Logger
  private readonly gateway: RemoteGateway
  private readonly encoder: StickerEncoder
  private readonly snapshots: SnapshotManager
  private readonly indexStore: IndexStore
  private readonly capacityLimit: number
  private currentState: SyncState = 'idle'

  constructor(baseLog: Logger, options: StickerSyncServiceOptions) {
    this.log = createServiceLogger(baseLog, 'STICKER_SYNC')
    this.gateway = options.gateway
    this.encoder = options.encoder
    this.snapshots = options.snapshots
    this.indexStore = options.indexStore ?? new IndexStore()
    this.capacityLimit = options.capacityLimit ?? MAX_COLLECTION_SIZE
  }

  get state(): SyncState {
    return this.currentState
  }

  /**
   * Pulls the remote collection into the pack directory.
   *
   * @throws PreconditionError when the index is missing or the collection
   * has not been created yet
   */
  sync(packDir: string): Promise<PullResult> {
    return this.runCommand(async () => {
      const pack = await this.loadPack(packDir)
      this.logWorkingOn(pack)

      const collection = await this.fetchRemote(pack.name)
      if (!collection) {
        throw new PreconditionError(
          `Sticker set ${pack.name} has not been created yet, push first`,
        )
      }

      const { result } = await this.mirror(packDir, pack, collection)
      this.transition('done')
      this.log.info(
        `Synced ${result.items} stickers (${result.downloaded} downloaded, ${result.redownloaded} re-downloaded, ${result.removed} removed)`,
      )
      return result
    })
  }

  /**
   * Pushes the sticker directory to the remote collection, creating the
   * collection when it does not exist, then reindexes from the remote.
   */
  push(packDir: string): Promise<PushResult> {
    return this.runCommand(async () => {
      const pack = await this.loadPack(packDir)
      const stickerDir = join(packDir, STICKER_DIR_NAME)
      await assertDirectory(stickerDir)
      this.logWorkingOn(pack)

      const snapshotPath = await this.snapshots.backup(stickerDir)
      const collection = await this.fetchRemote(pack.name)
      this.transition('reconciling')

      let result: PushResult
      if (!collection) {
        const files = await scanStickerDirectory(stickerDir, this.log)
        const created = await createCollectionFromFiles(
          {
            gateway: this.gateway,
            encoder: this.encoder,
            pack,
            logger: this.log,
          },
          files,
        )
        const reindex = await this.reindex(packDir, pack)
        result = createCreatedResult(snapshotPath, created, reindex)
      } else {
        const counts = await this.applyChanges(pack, stickerDir, collection)
        const reindex = await this.reindex(packDir, pack)
        result = createUpdatedResult(snapshotPath, counts, reindex)
      }

      this.transition('done')
      this.log.info(summarizePush(result))
      return result
    })
  }

  /**
   * Creates `<cwd>/<packName>` with a fresh index and pulls the collection
   * when it already exists remotely.
   *
   * @param bot - Authenticated identity; becomes the pack operator
   */
  init(
    cwd: string,
    input: { packName: string; packTitle: string; stickerType?: string },
    bot: BotIdentity,
  ): Promise<InitResult> {
    return this.runCommand(async () => {
      const valid = parsePackInput(input)
      const packDir = join(cwd, valid.packName)
      await createPackDirectory(packDir)
      this.log.info(`Pack directory inited: ${packDir}`)

      const pack = this.indexStore.create(
        valid.packTitle,
        makeSetName(valid.packName, bot.username),
        valid.stickerType,
        bot.id,
      )
      const indexPath = join(packDir, INDEX_FILE_NAME)
      await this.indexStore.save(indexPath, pack)
      await ensureDirectory(join(packDir, STICKER_DIR_NAME))

      const collection = await this.fetchRemote(pack.name)
      if (!collection) {
        this.transition('done')
        this.log.info(`Empty pack, and index file created: ${indexPath}`)
        return { packDir, pack, pull: null }
      }

      const mirrored = await this.mirror(packDir, pack, collection)
      this.transition('done')
      return { packDir, pack: mirrored.pack, pull: mirrored.result }
    })
  }

  /**
   * Creates a pack directory for an existing collection named by a share
   * link, and pulls it.
   */
  trace(cwd: string, link: string, bot: BotIdentity): Promise<InitResult> {
    return this.runCommand(async () => {
      const name = requireLinkName(link)
      const packDir = join(cwd, name)
      await assertAbsent(packDir)

      const collection = await this.fetchRemote(name)
      if (!collection) {
        throw new PreconditionError(`Sticker set not found: ${name}`)
      }

      await createPackDirectory(packDir)
      this.log.info(`Pack directory inited: ${packDir}`)
      const pack = this.indexStore.create(
        collection.title,
        collection.name,
        collection.stickerType,
        bot.id,
      )
      await this.indexStore.save(join(packDir, INDEX_FILE_NAME), pack)

      const mirrored = await this.mirror(packDir, pack, collection)
      this.transition('done')
      return { packDir, pack: mirrored.pack, pull: mirrored.result }
    })
  }

  /**
   * Downloads a collection into `<dir>/<name>` without creating an index
   */
  download(dir: string, link: string): Promise<DownloadResult> {
    return this.runCommand(async () => {
      const name = requireLinkName(link)
      await assertDirectory(dir, 'Download directory does not exist')
      this.log.info(`Preparing to download pack: ${name} to ${dir}`)

      const collection = await this.fetchRemote(name)
      if (!collection) {
        throw new PreconditionError(`Sticker set not found: ${name}`)
      }

      this.transition('reconciling')
      const directory = join(dir, name)
      await ensureDirectory(directory)
      await deleteSameStemFiles(directory, this.log)

      let downloaded = 0
      for (const item of collection.items) {
        await downloadSticker(this.gateway, item, directory, this.log)
        downloaded++
      }

      this.transition('done')
      this.log.info(`Downloaded sticker set: ${name}`)
      return { directory, downloaded }
    })
  }

  private async runCommand<T>(command: () => Promise<T>): Promise<T> {
    if (this.currentState !== 'idle') {
      if (this.currentState !== 'done' && this.currentState !== 'aborted') {
        throw new InvalidTransitionError(this.currentState, 'idle')
      }
      this.currentState = 'idle'
    }

    try {
      return await command()
    } catch (error) {
      if (this.state !== 'done' && this.state !== 'aborted') {
        this.transition('aborted')
      }
      throw error
    }
  }

  private transition(to: SyncState): void {
    if (!TRANSITIONS[this.currentState].includes(to)) {
      throw new InvalidTransitionError(this.currentState, to)
    }
    this.log.debug(`State ${this.currentState} -> ${to}`)
    this.currentState = to
  }

  private async fetchRemote(name: string): Promise<RemoteCollection | null> {
    this.transition('fetching_remote')
    const lookup = await this.gateway.getCollection(name)
    if (lookup.status === 'not_found') {
      this.transition('empty_remote')
      return null
    }
    this.transition('has_remote')
    return lookup.collection
  }

  private async loadPack(packDir: string): Promise<Pack> {
    const pack = await this.indexStore.load(join(packDir, INDEX_FILE_NAME))
    parsePackInput({
      packName: pack.name,
      packTitle: pack.title,
      stickerType: pack.stickerType,
    })
    return pack
  }

  /**
   * Pull flow: reconcile the sticker directory against the remote, then
   * rewrite the index to mirror it
   */
  private async mirror(
    packDir: string,
    pack: Pack,
    collection: RemoteCollection,
  ): Promise<{ result: PullResult; pack: Pack }> {
    this.transition('reconciling')
    const outcome = await pullCollection(
      {
        gateway: this.gateway,
        stickerDir: join(packDir, STICKER_DIR_NAME),
        logger: this.log,
      },
      collection,
    )

    this.transition('reindexing')
    const mirrored = { ...pack, items: outcome.items }
    await this.indexStore.save(join(packDir, INDEX_FILE_NAME), mirrored)
    return { result: outcome.result, pack: mirrored }
  }

  private async reindex(packDir: string, pack: Pack): Promise<PullResult> {
    this.transition('reindexing')
    const lookup = await this.gateway.getCollection(pack.name)
    if (lookup.status === 'not_found') {
      throw new RemoteFailureError(
        'getCollection',
        pack.name,
        'collection not found after push',
      )
    }

    const outcome = await pullCollection(
      {
        gateway: this.gateway,
        stickerDir: join(packDir, STICKER_DIR_NAME),
        logger: this.log,
      },
      lookup.collection,
    )
    await this.indexStore.save(join(packDir, INDEX_FILE_NAME), {
      ...pack,
      items: outcome.items,
    })
    return outcome.result
  }

  private async applyChanges(
    pack: Pack,
    stickerDir: string,
    collection: RemoteCollection,
  ): Promise<UpdateCounts> {
    const local = await scanStickerDirectory(stickerDir, this.log)
    const delta = computeDelta(local, collection.items)

    assertCapacity(
      pack.name,
      collection.items.length,
      delta,
      this.log,
      this.capacityLimit,
    )

    if (isEmptyDelta(delta)) {
      this.log.info('No sticker changes detected')
    } else {
      this.log.info(
        `Changes: ${delta.toDelete.length} to delete, ${delta.toUpload.length} to upload, ${delta.toFix.length} to fix`,
      )
    }

    let titleUpdated = false
    if (pack.title !== collection.title) {
      await this.gateway.renameCollection(pack.name, pack.title)
      this.log.info(`Updated title: ${collection.title} -> ${pack.title}`)
      titleUpdated = true
    }

    const context: ChangeContext = {
      gateway: this.gateway,
      encoder: this.encoder,
      pack,
      stickerDir,
      logger: this.log,
    }
    const deletions = await applyDeletions(context, delta.toDelete)
    const uploads = await applyUploads(context, delta.toUpload)
    const fixed = await applyRepairs(context, delta.toFix)

    return {
      titleUpdated,
      deleted: deletions.succeeded,
      uploaded: uploads.succeeded,
      fixed,
      failed: [...deletions.failed, ...uploads.failed],
    }
  }

  private logWorkingOn(pack: Pack): void {
    this.log.info(`Working on pack: ${shareLinkFor(pack.name)}`)
  }
}

/**
 * Validates pack creation input
 *
 * @throws PreconditionError listing every invalid field
 */
export function parsePackInput(input: unknown): PackInput {
  const parsed = PackInputSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new PreconditionError(`Invalid pack input: ${issues}`)
  }
  return parsed.data
}

function requireLinkName(link: string): string {
  const name = collectionNameFromLink(link)
  if (!name) {
    throw new PreconditionError(`Cannot read a sticker set name from link: ${link}`)
  }
  return name
}

async function assertDirectory(
  path: string,
  message = 'Sticker directory not found',
): Promise<void> {
  try {
    const info = await stat(path)
    if (info.isDirectory()) return
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw new LocalIOError('Failed to inspect directory', path, error)
    }
  }
  throw new PreconditionError(`${message}: ${path}`)
}

async function assertAbsent(path: string): Promise<void> {
  try {
    await stat(path)
  } catch (error) {
    if (isNotFoundError(error)) return
    throw new LocalIOError('Failed to inspect directory', path, error)
  }
  throw new PreconditionError(`Pack directory already exists: ${path}`)
}

async function createPackDirectory(path: string): Promise<void> {
  await assertAbsent(path)
  try {
    await mkdir(path)
  } catch (error) {
    throw new LocalIOError('Failed to create pack directory', path, error)
  }
}

async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true })
  } catch (error) {
    throw new LocalIOError('Failed to create directory', path, error)
  }
}
