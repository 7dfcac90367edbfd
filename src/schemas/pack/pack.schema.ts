import { z } from 'zod'
import { STICKER_TYPES } from '@root/types/pack.types.js'

export const StickerTypeSchema = z.enum(STICKER_TYPES)

// On-disk shape of index.json
export const EmoteRecordSchema = z.object({
  emoji: z.string(),
  file_id: z.string().min(1),
})

export const IndexFileSchema = z.object({
  title: z.string(),
  name: z.string().min(1),
  sticker_type: StickerTypeSchema,
  operator_id: z.string().min(1),
  lock_ns: z.string(),
  emotes: z.array(EmoteRecordSchema).default([]),
})

// Input accepted when creating or validating a pack
export const PackInputSchema = z.object({
  packName: z
    .string()
    .regex(
      /^[a-zA-Z0-9_]+$/,
      'must contain only letters, digits and underscores',
    ),
  packTitle: z
    .string()
    .min(1, 'must be between 1 and 64 characters')
    .max(64, 'must be between 1 and 64 characters'),
  stickerType: StickerTypeSchema.default('regular'),
})

export type IndexFile = z.infer<typeof IndexFileSchema>
export type EmoteRecord = z.infer<typeof EmoteRecordSchema>
export type PackInput = z.infer<typeof PackInputSchema>
