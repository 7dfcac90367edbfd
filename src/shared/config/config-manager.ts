import { resolveDataDir, resolveEnvPath } from '@utils/data-dir.js'
import { validLogLevels } from '@utils/logger.js'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')

export const AppConfigSchema = z.object({
  dataDir: z.string().min(1),
  logLevel: z.enum(validLogLevels).default('info'),
  enableConsoleOutput: booleanFlag.default(true),
  maxConcurrentRequests: z.coerce.number().int().positive().default(20),
  requestIntervalMs: z.coerce.number().int().nonnegative().default(2000),
  snapshotRetention: z.coerce.number().int().min(1).default(4),
  readAttempts: z.coerce.number().int().min(1).max(5).default(1),
})

export type AppConfig = z.infer<typeof AppConfigSchema>

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Builds the application configuration from environment variables.
 * For the process environment, the `.env` file in the data directory is
 * loaded first; variables already set win.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = resolveDataDir(env)
  if (env === process.env) {
    loadDotenv({ path: resolveEnvPath(dataDir) })
  }

  const parsed = AppConfigSchema.safeParse({
    dataDir,
    logLevel: env.logLevel || undefined,
    enableConsoleOutput: env.enableConsoleOutput || undefined,
    maxConcurrentRequests: env.maxConcurrentRequests || undefined,
    requestIntervalMs: env.requestIntervalMs || undefined,
    snapshotRetention: env.snapshotRetention || undefined,
    readAttempts: env.readAttempts || undefined,
  })

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    )
  }

  return parsed.data
}
