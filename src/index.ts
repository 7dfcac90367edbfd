export { createProgram, PROGRAM_NAME, runCli } from './cli/program.js'
export type { CliDependencies, CliOutput } from './cli/context.js'
export {
  type AuthenticatedSession,
  authenticateCredentials,
  type CredentialCandidate,
  CredentialService,
  FileSecretStore,
  parseCredentials,
  type RemoteClientFactory,
  type SecretStore,
} from './services/credential.service.js'
export {
  generateIntegrityTag,
  INDEX_FILE_NAME,
  IndexStore,
} from './services/index-store.service.js'
export {
  RateLimiter,
  RateLimiterClosedError,
  type RateLimiterOptions,
  withRateLimiter,
} from './services/rate-limiter.service.js'
export { SnapshotManager } from './services/snapshot.service.js'
export {
  type InitResult,
  STICKER_DIR_NAME,
  StickerSyncService,
} from './services/sticker-sync.service.js'
export { computeDelta } from './services/sticker-sync/diff/diff-engine.js'
export { RemoteGateway } from './services/sticker-sync/remote/remote-gateway.js'
export {
  MAX_COLLECTION_SIZE,
  MAX_CREATION_BATCH,
} from './services/sticker-sync/validation/capacity-guard.js'
export { type AppConfig, loadConfig } from './shared/config/config-manager.js'
export type { StickerEncoder, EncodedSticker } from './types/encoder.types.js'
export type { Emote, LocalFile, Pack, StickerType } from './types/pack.types.js'
export type * from './types/remote.types.js'
export type * from './types/sticker-sync.types.js'
export * from './utils/errors.js'
export { createLogger, createServiceLogger } from './utils/logger.js'
