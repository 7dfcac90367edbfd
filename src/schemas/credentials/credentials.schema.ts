import { z } from 'zod'

// Stored credential triple
export const CredentialsSchema = z.object({
  token: z.string().min(1, 'token is required'),
  owner_id: z.string().regex(/^\d+$/, 'Invalid owner id'),
  bot_proxy: z.string().min(1).nullable().default(null),
})

export type CredentialsRecord = z.infer<typeof CredentialsSchema>
