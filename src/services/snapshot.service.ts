/**
 * Snapshot Manager
 *
 * Rotating point-in-time copies of the sticker directory, taken before a
 * push rewrites local files. Remote operations cannot be rolled back, so the
 * snapshot is the recovery path.
 *
 * Snapshots live in a `snapshots` directory next to the sticker directory and
 * are named `<prefix>_<YYYYMMDD_HHMMSS>`. Only the oldest one is ever deleted.
 */

import { cp, mkdir, readdir, rm, stat } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { Logger } from 'pino'
import { isNotFoundError, LocalIOError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'

export const SNAPSHOT_DIR_NAME = 'snapshots'
export const DEFAULT_SNAPSHOT_RETENTION = 4

export interface SnapshotManagerOptions {
  /** Snapshot count that triggers eviction before a new one is taken */
  retention?: number
  now?: () => Date
}

export interface SnapshotEntry {
  name: string
  path: string
}

/**
 * Formats a date as YYYYMMDD_HHMMSS in local time
 */
export function formatSnapshotTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export class SnapshotManager {
  private readonly log: Logger
  private readonly retention: number
  private readonly now: () => Date

  constructor(baseLog: Logger, options: SnapshotManagerOptions = {}) {
    this.log = createServiceLogger(baseLog, 'SNAPSHOT')
    this.retention = options.retention ?? DEFAULT_SNAPSHOT_RETENTION
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Directory holding the snapshots of a sticker directory
   */
  snapshotRoot(stickerDir: string): string {
    return join(dirname(stickerDir), SNAPSHOT_DIR_NAME)
  }

  /**
   * Existing snapshots of a sticker directory, oldest first
   */
  async list(stickerDir: string): Promise<SnapshotEntry[]> {
    const root = this.snapshotRoot(stickerDir)
    const pattern = new RegExp(
      `^${escapeRegExp(basename(stickerDir))}_(\\d{8}_\\d{6})(?:_(\\d+))?$`,
    )

    let names: string[]
    try {
      const entries = await readdir(root, { withFileTypes: true })
      names = entries
        .filter((entry) => entry.isDirectory() && pattern.test(entry.name))
        .map((entry) => entry.name)
    } catch (error) {
      if (isNotFoundError(error)) {
        return []
      }
      throw new LocalIOError('Failed to list snapshots', root, error)
    }

    const sortKey = (name: string): [string, number] => {
      const match = pattern.exec(name)
      return [match?.[1] ?? '', Number(match?.[2] ?? 0)]
    }

    return names
      .sort((a, b) => {
        const [stampA, seqA] = sortKey(a)
        const [stampB, seqB] = sortKey(b)
        return stampA === stampB ? seqA - seqB : stampA < stampB ? -1 : 1
      })
      .map((name) => ({ name, path: join(root, name) }))
  }

  /**
   * Copies the sticker directory into a new snapshot, evicting the oldest
   * snapshots first so that at most `retention` remain afterwards.
   *
   * @returns Path of the new snapshot
   * @throws LocalIOError when the sticker directory is missing or copying fails
   */
  async backup(stickerDir: string): Promise<string> {
    try {
      const info = await stat(stickerDir)
      if (!info.isDirectory()) {
        throw new LocalIOError('Sticker path is not a directory', stickerDir)
      }
    } catch (error) {
      if (error instanceof LocalIOError) throw error
      throw new LocalIOError('Sticker directory not found', stickerDir, error)
    }

    const existing = await this.list(stickerDir)
    const evictCount = Math.max(0, existing.length - (this.retention - 1))
    for (const snapshot of existing.slice(0, evictCount)) {
      try {
        await rm(snapshot.path, { recursive: true, force: true })
        this.log.debug(`Removed old snapshot ${snapshot.name}`)
      } catch (error) {
        throw new LocalIOError(
          'Failed to remove old snapshot',
          snapshot.path,
          error,
        )
      }
    }

    const root = this.snapshotRoot(stickerDir)
    const taken = new Set(existing.map((snapshot) => snapshot.name))
    const baseName = `${basename(stickerDir)}_${formatSnapshotTimestamp(this.now())}`
    let name = baseName
    for (let seq = 1; taken.has(name); seq++) {
      name = `${baseName}_${seq}`
    }
    const target = join(root, name)

    try {
      await mkdir(root, { recursive: true })
      await cp(stickerDir, target, {
        recursive: true,
        errorOnExist: true,
        force: false,
      })
    } catch (error) {
      throw new LocalIOError(
        'Failed to back up sticker directory',
        stickerDir,
        error,
      )
    }

    this.log.info(`Backed up ${stickerDir} to ${target}`)
    return target
  }
}
