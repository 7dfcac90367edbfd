import { readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'
import {
  authenticateCredentials,
  CredentialService,
  FileSecretStore,
  parseCredentials,
  serializeCredentials,
} from '@services/credential.service.js'
import { AppInitError, PreconditionError } from '@utils/errors.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createTempDir, removeTempDir } from '../../helpers/tmp-dir.js'
import { createMockLogger } from '../../mocks/logger.js'
import { FakeRemoteClient } from '../../mocks/remote-client.js'
import { MemorySecretStore } from '../../mocks/secret-store.js'

describe('credential.service', () => {
  describe('parseCredentials', () => {
    it('should parse a stored JSON credential', () => {
      expect(
        parseCredentials('{"token":"test-secret","owner_id":"123","bot_proxy":null}'),
      ).toEqual({ token: 'test-secret', ownerId: '123', proxy: null })
    })

    it('should default a missing proxy to null', () => {
      expect(parseCredentials({ token: 'test-secret', owner_id: '123' }).proxy).toBeNull()
    })

    it('should reject a non-numeric owner id', () => {
      expect(() =>
        parseCredentials({ token: 'test-secret', owner_id: 'abc' }),
      ).toThrow('Invalid credentials: owner_id: Invalid owner id')
    })

    it('should reject invalid JSON', () => {
      expect(() => parseCredentials('{')).toThrow(AppInitError)
    })

    it('should round-trip through serializeCredentials', () => {
      const candidate = { token: 'test-secret', ownerId: '123', proxy: 'socks5://proxy:1080' }
      expect(parseCredentials(serializeCredentials(candidate))).toEqual(candidate)
    })
  })

  describe('authenticateCredentials', () => {
    const candidate = { token: 'test-secret', ownerId: '123', proxy: null }

    it('should resolve the identity behind the token', async () => {
      const client = new FakeRemoteClient()
      const factory = vi.fn(() => client)

      const session = await authenticateCredentials(candidate, factory)

      expect(factory).toHaveBeenCalledWith(candidate)
      expect(session.bot).toEqual({ id: '4242', username: 'test_bot' })
      expect(session.client).toBe(client)
    })

    it('should fail with AppInitError when the remote rejects the token', async () => {
      const client = new FakeRemoteClient()
      client.failOn('getMe', 'test_bot', 'Unauthorized')

      await expect(authenticateCredentials(candidate, () => client)).rejects.toThrow(
        'Failed to authenticate: Unauthorized',
      )
      expect(client.closed).toBe(true)
    })

    it('should fail when the identity has no username', async () => {
      const client = new FakeRemoteClient()
      client.identity = { id: '4242', username: '' }

      await expect(
        authenticateCredentials(candidate, () => client),
      ).rejects.toBeInstanceOf(AppInitError)
    })
  })

  describe('FileSecretStore', () => {
    let dir: string

    beforeEach(async () => {
      dir = await createTempDir()
    })

    afterEach(async () => {
      await removeTempDir(dir)
    })

    it('should write, read and remove the credential file', async () => {
      const path = join(dir, 'nested', 'credentials.json')
      const store = new FileSecretStore(path)

      expect(await store.read()).toBeNull()
      await store.write('{"token":"test-secret"}')
      expect(await readFile(path, 'utf8')).toBe('{"token":"test-secret"}')
      expect(await store.read()).toBe('{"token":"test-secret"}')
      expect(await store.remove()).toBe(true)
      expect(await store.remove()).toBe(false)
    })

    it.skipIf(process.platform === 'win32')(
      'should restrict the file to its owner',
      async () => {
        const path = join(dir, 'credentials.json')
        await new FileSecretStore(path).write('{}')

        expect((await stat(path)).mode & 0o777).toBe(0o600)
      },
    )
  })

  describe('CredentialService', () => {
    it('should store the credential only after authenticating', async () => {
      const store = new MemorySecretStore()
      const client = new FakeRemoteClient()
      const service = new CredentialService(createMockLogger(), store, () => client)

      const session = await service.login({ token: 'test-secret', ownerId: '123' })

      expect(session.bot.username).toBe('test_bot')
      expect(store.value).toBe(
        serializeCredentials({ token: 'test-secret', ownerId: '123', proxy: null }),
      )
    })

    it('should not store a credential the remote rejects', async () => {
      const store = new MemorySecretStore()
      const client = new FakeRemoteClient()
      client.failOn('getMe', 'test_bot')
      const service = new CredentialService(createMockLogger(), store, () => client)

      await expect(
        service.login({ token: 'test-secret', ownerId: '123' }),
      ).rejects.toBeInstanceOf(AppInitError)
      expect(store.value).toBeNull()
    })

    it('should require a stored credential to resume', async () => {
      const service = new CredentialService(
        createMockLogger(),
        new MemorySecretStore(),
        () => new FakeRemoteClient(),
      )

      await expect(service.resume()).rejects.toBeInstanceOf(PreconditionError)
    })

    it('should resume an authenticated session from the store', async () => {
      const store = new MemorySecretStore(
        serializeCredentials({ token: 'test-secret', ownerId: '123', proxy: null }),
      )
      const service = new CredentialService(
        createMockLogger(),
        store,
        () => new FakeRemoteClient(),
      )

      const session = await service.resume()

      expect(session.ownerId).toBe('123')
      expect(session.bot.id).toBe('4242')
    })

    it('should report whether logout removed anything', async () => {
      const logger = createMockLogger()
      const store = new MemorySecretStore('{}')
      const service = new CredentialService(logger, store, () => new FakeRemoteClient())

      expect(await service.logout()).toBe(true)
      expect(logger.info).toHaveBeenCalledWith('You are now logged out.')
      expect(await service.logout()).toBe(false)
    })
  })
})
