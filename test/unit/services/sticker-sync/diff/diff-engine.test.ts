import type { LocalFile } from '@root/types/pack.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'
import {
  computeDelta,
  indexRemoteItems,
  isEmptyDelta,
} from '@services/sticker-sync/diff/diff-engine.js'
import { describe, expect, it } from 'vitest'

const local = (contentKey: string, byteSize: number, ext = 'webp'): LocalFile => ({
  contentKey,
  byteSize,
  path: `/pack/stickers/${contentKey}.${ext}`,
})

const remote = (uniqueContentId: string, byteSize: number): RemoteItem => ({
  contentId: `file_${uniqueContentId}`,
  uniqueContentId,
  byteSize,
  emoji: '😀',
  format: 'static',
})

describe('computeDelta', () => {
  it('should classify an upload and a deletion when sizes match', () => {
    const delta = computeDelta(
      [local('abc123', 500, 'png'), local('def456', 900)],
      [remote('abc123', 500), remote('ghi789', 300)],
    )

    expect(delta.toUpload.map((f) => f.contentKey)).toEqual(['def456'])
    expect(delta.toDelete.map((r) => r.contentId)).toEqual(['file_ghi789'])
    expect(delta.toFix).toEqual([])
    expect(delta.unchanged).toEqual(['abc123'])
  })

  it('should mark a size mismatch for repair', () => {
    const delta = computeDelta(
      [local('abc123', 500, 'png'), local('def456', 900)],
      [remote('abc123', 400), remote('ghi789', 300)],
    )

    expect(delta.toFix).toEqual([
      { local: local('abc123', 500, 'png'), remote: remote('abc123', 400) },
    ])
    expect(delta.toUpload.map((f) => f.contentKey)).toEqual(['def456'])
    expect(delta.toDelete.map((r) => r.contentId)).toEqual(['file_ghi789'])
    expect(delta.unchanged).toEqual([])
  })

  it('should classify every key exactly once', () => {
    const localFiles = [
      local('a', 1),
      local('b', 2),
      local('c', 3),
      local('d', 4),
    ]
    const remoteItems = [remote('b', 2), remote('c', 30), remote('e', 5)]

    const delta = computeDelta(localFiles, remoteItems)
    const classified = [
      ...delta.toUpload.map((f) => f.contentKey),
      ...delta.toDelete.map((r) => r.uniqueContentId),
      ...delta.toFix.map((f) => f.local.contentKey),
      ...delta.unchanged,
    ]

    expect(classified.sort()).toEqual(['a', 'b', 'c', 'd', 'e'])
    expect(new Set(classified).size).toBe(classified.length)
  })

  it('should keep the first of repeated remote ids', () => {
    const first = remote('dup', 10)
    const second = { ...remote('dup', 20), contentId: 'file_dup_2' }

    expect(indexRemoteItems([first, second]).get('dup')).toBe(first)
    expect(computeDelta([], [first, second]).toDelete).toEqual([first])
  })

  it('should report an empty delta for identical inventories', () => {
    const delta = computeDelta([local('a', 1)], [remote('a', 1)])
    expect(isEmptyDelta(delta)).toBe(true)
  })

  it('should handle empty inputs', () => {
    const delta = computeDelta([], [])
    expect(delta).toEqual({ toUpload: [], toDelete: [], toFix: [], unchanged: [] })
    expect(isEmptyDelta(delta)).toBe(true)
  })
})
