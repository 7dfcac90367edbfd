import type { Logger } from 'pino'
import {
  type AuthenticatedSession,
  CredentialService,
  FileSecretStore,
  type RemoteClientFactory,
  type SecretStore,
} from '@services/credential.service.js'
import { withRateLimiter } from '@services/rate-limiter.service.js'
import { SnapshotManager } from '@services/snapshot.service.js'
import { StickerSyncService } from '@services/sticker-sync.service.js'
import { RemoteGateway } from '@services/sticker-sync/remote/remote-gateway.js'
import type { AppConfig } from '@root/shared/config/config-manager.js'
import type { StickerEncoder } from '@root/types/encoder.types.js'
import { resolveCredentialsPath } from '@utils/data-dir.js'

export interface CliOutput {
  writeOut?: (text: string) => void
  writeErr?: (text: string) => void
}

/**
 * Everything the commands need from the outside world
 */
export interface CliDependencies {
  logger: Logger
  config: AppConfig
  clientFactory: RemoteClientFactory
  encoder: StickerEncoder
  /** Defaults to the credentials file in the data directory */
  secretStore?: SecretStore
  /** Defaults to the process working directory */
  cwd?: string
  output?: CliOutput
}

export function workingDirectory(deps: CliDependencies): string {
  return deps.cwd ?? process.cwd()
}

export function credentialService(deps: CliDependencies): CredentialService {
  const store =
    deps.secretStore ??
    new FileSecretStore(resolveCredentialsPath(deps.config.dataDir))
  return new CredentialService(deps.logger, store, deps.clientFactory)
}

/**
 * Runs a command against an authenticated session. The rate limiter lives
 * for the command only, and the remote client is closed afterwards.
 */
export async function withSyncService<T>(
  deps: CliDependencies,
  fn: (service: StickerSyncService, session: AuthenticatedSession) => Promise<T>,
): Promise<T> {
  const session = await credentialService(deps).resume()
  const { config, logger } = deps

  try {
    return await withRateLimiter(
      {
        maxConcurrent: config.maxConcurrentRequests,
        minIntervalMs: config.requestIntervalMs,
      },
      (limiter) => {
        const gateway = new RemoteGateway(session.client, limiter, logger, {
          readAttempts: config.readAttempts,
        })
        const service = new StickerSyncService(logger, {
          gateway,
          encoder: deps.encoder,
          snapshots: new SnapshotManager(logger, {
            retention: config.snapshotRetention,
          }),
        })
        return fn(service, session)
      },
    )
  } finally {
    await session.client.close?.()
  }
}
