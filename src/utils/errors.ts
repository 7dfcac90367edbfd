export type StickerSyncErrorCode =
  | 'CORRUPTED_INDEX'
  | 'PRECONDITION'
  | 'REMOTE_FAILURE'
  | 'LOCAL_IO'
  | 'CAPACITY_EXCEEDED'
  | 'CREATION_SIZE_INVALID'
  | 'ENCODING_FAILURE'
  | 'APP_INIT'
  | 'INVALID_TRANSITION'

/**
 * Base class for every failure the sync engine reports.
 * All of them are fatal to the running command.
 */
export class StickerSyncError extends Error {
  constructor(
    message: string,
    public readonly code: StickerSyncErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Index file failed to parse or failed its integrity check. Never repaired.
 */
export class CorruptedIndexError extends StickerSyncError {
  constructor(
    public readonly indexPath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Index file was corrupted (${indexPath}): ${reason}`, 'CORRUPTED_INDEX', options)
  }
}

/**
 * Local precondition missing: credentials, index, sticker directory, valid input
 */
export class PreconditionError extends StickerSyncError {
  constructor(message: string) {
    super(message, 'PRECONDITION')
  }
}

export class RemoteFailureError extends StickerSyncError {
  constructor(
    public readonly operation: string,
    public readonly target: string,
    cause: unknown,
  ) {
    super(
      `Remote ${operation} failed for ${target}: ${describeCause(cause)}`,
      'REMOTE_FAILURE',
      { cause },
    )
  }
}

export class LocalIOError extends StickerSyncError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(
      cause === undefined ? `${message}: ${path}` : `${message}: ${path} (${describeCause(cause)})`,
      'LOCAL_IO',
      { cause },
    )
  }
}

export class CapacityExceededError extends StickerSyncError {
  constructor(
    public readonly collection: string,
    public readonly resultingCount: number,
    public readonly limit: number,
  ) {
    super(
      `Operation on ${collection} would leave ${resultingCount} stickers, exceeding the limit of ${limit}; aborted`,
      'CAPACITY_EXCEEDED',
    )
  }
}

export class CreationSizeInvalidError extends StickerSyncError {
  constructor(
    public readonly collection: string,
    public readonly count: number,
    public readonly max: number,
  ) {
    super(
      count === 0
        ? `No stickers to create ${collection}; place files in the stickers directory`
        : `Cannot create ${collection} with ${count} stickers; at most ${max} are allowed on creation`,
      'CREATION_SIZE_INVALID',
    )
  }
}

export class EncodingFailureError extends StickerSyncError {
  constructor(
    public readonly file: string,
    cause: unknown,
  ) {
    super(`Failed to encode ${file}: ${describeCause(cause)}`, 'ENCODING_FAILURE', {
      cause,
    })
  }
}

/**
 * Credential could not be turned into an authenticated identity
 */
export class AppInitError extends StickerSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'APP_INIT', options)
  }
}

export class InvalidTransitionError extends StickerSyncError {
  constructor(from: string, to: string) {
    super(`Invalid sync state transition: ${from} -> ${to}`, 'INVALID_TRANSITION')
  }
}

/**
 * Message of an unknown thrown value, verbatim where there is one
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === 'string') return cause
  return String(cause)
}

/**
 * True for a filesystem error reporting a missing path
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
