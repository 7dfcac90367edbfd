/**
 * Remote Gateway
 *
 * Every call to the remote collection goes through here. Calls are issued
 * one at a time through a single-worker lane: the remote serializes writes
 * to one collection per session, so concurrent issuance only produces
 * ordering hazards. Each call also passes the shared rate limiter.
 *
 * Provider errors are wrapped in RemoteFailureError with the message kept
 * verbatim. Only idempotent reads may be retried.
 */

import pLimit, { type LimitFunction } from 'p-limit'
import type { Logger } from 'pino'
import type {
  AddItemInput,
  CollectionLookup,
  CreateCollectionInput,
  RemoteClient,
  RemoteFile,
} from '@root/types/remote.types.js'
import { RemoteFailureError } from '@utils/errors.js'
import type { RateLimiter } from '@services/rate-limiter.service.js'

export interface RemoteGatewayOptions {
  /** Attempts for idempotent reads; 1 disables retry (default: 1) */
  readAttempts?: number
}

export class RemoteGateway {
  private readonly lane: LimitFunction = pLimit(1)
  private readonly readAttempts: number

  constructor(
    private readonly client: RemoteClient,
    private readonly limiter: RateLimiter,
    private readonly log: Logger,
    options: RemoteGatewayOptions = {},
  ) {
    this.readAttempts = Math.max(1, options.readAttempts ?? 1)
  }

  /**
   * Looks up a collection; a missing collection is returned as `not_found`
   */
  getCollection(name: string): Promise<CollectionLookup> {
    return this.read('getCollection', name, () =>
      this.client.getCollection(name),
    )
  }

  fetchFile(contentId: string): Promise<RemoteFile> {
    return this.read('fetchFile', contentId, () =>
      this.client.fetchFile(contentId),
    )
  }

  createCollection(input: CreateCollectionInput): Promise<void> {
    return this.mutate('createCollection', input.name, () =>
      this.client.createCollection(input),
    )
  }

  addItem(input: AddItemInput): Promise<void> {
    return this.mutate('addItem', `${input.name}/${input.item.sourceKey}`, () =>
      this.client.addItem(input),
    )
  }

  deleteItem(contentId: string): Promise<void> {
    return this.mutate('deleteItem', contentId, () =>
      this.client.deleteItem(contentId),
    )
  }

  renameCollection(name: string, title: string): Promise<void> {
    return this.mutate('renameCollection', name, () =>
      this.client.renameCollection(name, title),
    )
  }

  private schedule<T>(task: () => Promise<T>): Promise<T> {
    return this.lane(() => this.limiter.run(task))
  }

  private async mutate<T>(
    operation: string,
    target: string,
    task: () => Promise<T>,
  ): Promise<T> {
    try {
      return await this.schedule(task)
    } catch (error) {
      throw new RemoteFailureError(operation, target, error)
    }
  }

  private async read<T>(
    operation: string,
    target: string,
    task: () => Promise<T>,
  ): Promise<T> {
    let lastError: unknown
    for (let attempt = 1; attempt <= this.readAttempts; attempt++) {
      try {
        return await this.schedule(task)
      } catch (error) {
        lastError = error
        if (attempt < this.readAttempts) {
          this.log.warn(
            { error },
            `Remote ${operation} for ${target} failed (attempt ${attempt}/${this.readAttempts}), retrying`,
          )
        }
      }
    }
    throw new RemoteFailureError(operation, target, lastError)
  }
}
