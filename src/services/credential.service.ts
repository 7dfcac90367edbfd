/**
 * Credential Service
 *
 * Turns the stored credential triple (token, owner id, proxy) into an
 * authenticated session. Parsing is pure; authentication asks the remote
 * who the token belongs to.
 */

import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Logger } from 'pino'
import { CredentialsSchema } from '@schemas/credentials/credentials.schema.js'
import type { BotIdentity, RemoteClient } from '@root/types/remote.types.js'
import {
  AppInitError,
  describeCause,
  isNotFoundError,
  LocalIOError,
  PreconditionError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'

export interface CredentialCandidate {
  token: string
  ownerId: string
  proxy: string | null
}

export interface AuthenticatedSession extends CredentialCandidate {
  bot: BotIdentity
  client: RemoteClient
}

export type RemoteClientFactory = (credential: CredentialCandidate) => RemoteClient

/**
 * Storage for one serialized credential
 */
export interface SecretStore {
  read(): Promise<string | null>
  write(value: string): Promise<void>
  /** @returns false when nothing was stored */
  remove(): Promise<boolean>
}

/**
 * Parses a stored or user-supplied credential.
 *
 * @param raw - Serialized JSON or an already decoded object
 * @throws AppInitError when the value is not a valid credential
 */
export function parseCredentials(raw: unknown): CredentialCandidate {
  let value = raw
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw)
    } catch (error) {
      throw new AppInitError('Stored credentials are not valid JSON', {
        cause: error,
      })
    }
  }

  const parsed = CredentialsSchema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new AppInitError(`Invalid credentials: ${issues}`)
  }

  return {
    token: parsed.data.token,
    ownerId: parsed.data.owner_id,
    proxy: parsed.data.bot_proxy,
  }
}

export function serializeCredentials(candidate: CredentialCandidate): string {
  return JSON.stringify({
    token: candidate.token,
    owner_id: candidate.ownerId,
    bot_proxy: candidate.proxy,
  })
}

/**
 * Resolves the identity behind a credential.
 *
 * @throws AppInitError when the remote rejects the token or reports an
 * incomplete identity
 */
export async function authenticateCredentials(
  candidate: CredentialCandidate,
  clientFactory: RemoteClientFactory,
): Promise<AuthenticatedSession> {
  const client = clientFactory(candidate)

  let bot: BotIdentity
  try {
    bot = await client.getMe()
  } catch (error) {
    await client.close?.()
    throw new AppInitError(`Failed to authenticate: ${describeCause(error)}`, {
      cause: error,
    })
  }

  if (!bot.id || !bot.username) {
    await client.close?.()
    throw new AppInitError('Authenticated identity has no id or username')
  }

  return { ...candidate, bot, client }
}

/**
 * Keeps the credential in a JSON file readable by the owner only
 */
export class FileSecretStore implements SecretStore {
  constructor(private readonly path: string) {}

  async read(): Promise<string | null> {
    try {
      return await readFile(this.path, 'utf8')
    } catch (error) {
      if (isNotFoundError(error)) return null
      throw new LocalIOError('Failed to read credentials', this.path, error)
    }
  }

  async write(value: string): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true })
      await writeFile(this.path, value, { encoding: 'utf8', mode: 0o600 })
      await chmod(this.path, 0o600)
    } catch (error) {
      throw new LocalIOError('Failed to write credentials', this.path, error)
    }
  }

  async remove(): Promise<boolean> {
    const existing = await this.read()
    if (existing === null) return false
    try {
      await rm(this.path, { force: true })
    } catch (error) {
      throw new LocalIOError('Failed to remove credentials', this.path, error)
    }
    return true
  }
}

export class CredentialService {
  private readonly log: Logger

  constructor(
    baseLog: Logger,
    private readonly store: SecretStore,
    private readonly clientFactory: RemoteClientFactory,
  ) {
    this.log = createServiceLogger(baseLog, 'CREDENTIALS')
  }

  /**
   * Validates and authenticates a credential, then stores it
   */
  async login(input: {
    token: string
    ownerId: string
    proxy?: string | null
  }): Promise<AuthenticatedSession> {
    const candidate = parseCredentials({
      token: input.token,
      owner_id: input.ownerId,
      bot_proxy: input.proxy ?? null,
    })
    const session = await authenticateCredentials(candidate, this.clientFactory)
    await this.store.write(serializeCredentials(candidate))
    this.log.info(`Logged in as ${session.bot.username}`)
    return session
  }

  /**
   * @returns false when no credential was stored
   */
  async logout(): Promise<boolean> {
    const removed = await this.store.remove()
    if (removed) {
      this.log.info('You are now logged out.')
    } else {
      this.log.warn('No stored credentials found')
    }
    return removed
  }

  /**
   * Authenticated session from the stored credential
   *
   * @throws PreconditionError when nobody is logged in
   * @throws AppInitError when the stored credential is invalid or rejected
   */
  async resume(): Promise<AuthenticatedSession> {
    const stored = await this.store.read()
    if (stored === null) {
      throw new PreconditionError('You are not logged in. Please login first.')
    }
    const session = await authenticateCredentials(
      parseCredentials(stored),
      this.clientFactory,
    )
    this.log.debug(`Authenticated as ${session.bot.username}`)
    return session
  }
}
