import { homedir } from 'node:os'
import { resolve } from 'node:path'

export const APP_DIR_NAME = 'sticker-sync'

/**
 * Resolves the sticker-sync data directory based on platform and environment.
 *
 * Priority:
 * 1. env.dataDir (explicit override)
 * 2. Windows: %APPDATA%\sticker-sync
 * 3. macOS: ~/.config/sticker-sync
 * 4. Linux: $XDG_CONFIG_HOME/sticker-sync, else ~/.config/sticker-sync
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.dataDir) {
    return resolve(env.dataDir)
  }

  if (process.platform === 'win32') {
    const appData = env.APPDATA || env.LOCALAPPDATA
    if (appData) {
      return resolve(appData, APP_DIR_NAME)
    }
  }

  if (process.platform !== 'darwin' && env.XDG_CONFIG_HOME) {
    return resolve(env.XDG_CONFIG_HOME, APP_DIR_NAME)
  }

  return resolve(env.HOME || homedir(), '.config', APP_DIR_NAME)
}

/**
 * Resolves the log directory path: {dataDir}/logs
 */
export function resolveLogPath(dataDir: string): string {
  return resolve(dataDir, 'logs')
}

/**
 * Resolves the stored credential file: {dataDir}/credentials.json
 */
export function resolveCredentialsPath(dataDir: string): string {
  return resolve(dataDir, 'credentials.json')
}

/**
 * Resolves the .env file path: {dataDir}/.env
 */
export function resolveEnvPath(dataDir: string): string {
  return resolve(dataDir, '.env')
}
