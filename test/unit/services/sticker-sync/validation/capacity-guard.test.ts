import type { LocalFile } from '@root/types/pack.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'
import {
  assertCapacity,
  assertCreationSize,
  performCapacityCheck,
} from '@services/sticker-sync/validation/capacity-guard.js'
import {
  CapacityExceededError,
  CreationSizeInvalidError,
} from '@utils/errors.js'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'

const uploads = (count: number): LocalFile[] =>
  Array.from({ length: count }, (_, i) => ({
    contentKey: `new${i}`,
    byteSize: 10,
    path: `/pack/stickers/new${i}.png`,
  }))

const deletions = (count: number): RemoteItem[] =>
  Array.from({ length: count }, (_, i): RemoteItem => ({
    contentId: `file_${i}`,
    uniqueContentId: `u${i}`,
    byteSize: 10,
    emoji: '😀',
    format: 'static',
  }))

describe('performCapacityCheck', () => {
  it('should fail when 110 stickers plus 15 uploads exceed 120', () => {
    const result = performCapacityCheck(
      'cats',
      110,
      { toUpload: uploads(15), toDelete: [] },
      createMockLogger(),
    )

    expect(result).toEqual({
      passed: false,
      currentCount: 110,
      resultingCount: 125,
      limit: 120,
      errorMessage:
        "Your wanted operation will exceed the limit of 120 stickers, so it's aborted.",
    })
  })

  it('should pass when deletions make room for the uploads', () => {
    const result = performCapacityCheck(
      'cats',
      110,
      { toUpload: uploads(15), toDelete: deletions(5) },
      createMockLogger(),
    )

    expect(result.passed).toBe(true)
    expect(result.resultingCount).toBe(120)
  })
})

describe('assertCapacity', () => {
  it('should throw CapacityExceededError and log the reason', () => {
    const logger = createMockLogger()

    expect(() =>
      assertCapacity('cats', 110, { toUpload: uploads(15), toDelete: [] }, logger),
    ).toThrow(CapacityExceededError)
    expect(logger.error).toHaveBeenCalledWith(
      "Your wanted operation will exceed the limit of 120 stickers, so it's aborted.",
    )
  })

  it('should accept a custom limit', () => {
    expect(() =>
      assertCapacity(
        'cats',
        1,
        { toUpload: uploads(2), toDelete: [] },
        createMockLogger(),
        2,
      ),
    ).toThrow('Operation on cats would leave 3 stickers, exceeding the limit of 2; aborted')
  })
})

describe('assertCreationSize', () => {
  it('should reject an empty batch', () => {
    expect(() => assertCreationSize('cats', 0)).toThrow(
      'No stickers to create cats; place files in the stickers directory',
    )
  })

  it('should reject more than 30 stickers', () => {
    expect(() => assertCreationSize('cats', 31)).toThrow(CreationSizeInvalidError)
  })

  it('should accept between 1 and 30 stickers', () => {
    expect(() => assertCreationSize('cats', 1)).not.toThrow()
    expect(() => assertCreationSize('cats', 30)).not.toThrow()
  })
})
