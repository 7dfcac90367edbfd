import { join, resolve } from 'node:path'
import { type Command, Option } from 'commander'
import { STICKER_DIR_NAME } from '@services/sticker-sync.service.js'
import { STICKER_TYPES } from '@root/types/pack.types.js'
import {
  type CliDependencies,
  credentialService,
  withSyncService,
  workingDirectory,
} from '@root/cli/context.js'

interface LoginOptions {
  token: string
  uid: string
  proxy?: string
}

interface InitOptions {
  packName: string
  packTitle: string
  stickerType: string
}

interface LinkOptions {
  link: string
}

interface DownloadOptions extends LinkOptions {
  downloadDir: string
}

/**
 * Registers login and logout
 */
export function registerAuthCommands(program: Command, deps: CliDependencies): void {
  program
    .command('login')
    .description('Store and verify the bot credential')
    .requiredOption('-t, --token <token>', 'Bot token')
    .requiredOption('-u, --uid <ownerId>', 'Numeric id of the collection owner')
    .option('-p, --proxy <proxy>', 'Proxy for remote calls')
    .action(async (options: LoginOptions) => {
      const session = await credentialService(deps).login({
        token: options.token,
        ownerId: options.uid,
        proxy: options.proxy ?? null,
      })
      await session.client.close?.()
    })

  program
    .command('logout')
    .description('Remove the stored credential')
    .action(async () => {
      await credentialService(deps).logout()
    })
}

/**
 * Registers the pack commands: init, trace, download, sync and push
 */
export function registerPackCommands(program: Command, deps: CliDependencies): void {
  const { logger } = deps

  program
    .command('init')
    .description('Create a pack directory for a new or existing collection')
    .requiredOption('-n, --pack-name <name>', 'Pack name (letters, digits, underscores)')
    .requiredOption('-t, --pack-title <title>', 'Pack title')
    .addOption(
      new Option('-s, --sticker-type <type>', 'Sticker type')
        .choices(STICKER_TYPES)
        .default('regular'),
    )
    .action(async (options: InitOptions) => {
      const result = await withSyncService(deps, (service, session) =>
        service.init(
          workingDirectory(deps),
          {
            packName: options.packName,
            packTitle: options.packTitle,
            stickerType: options.stickerType,
          },
          session.bot,
        ),
      )
      logger.info('Initialization completed!')
      logger.info(
        `Put your stickers in ${join(result.packDir, STICKER_DIR_NAME)}, then run 'push' to publish them.`,
      )
    })

  program
    .command('trace')
    .description('Create a pack directory from an existing collection link')
    .requiredOption('-l, --link <link>', 'Share link of the collection')
    .action(async (options: LinkOptions) => {
      const result = await withSyncService(deps, (service, session) =>
        service.trace(workingDirectory(deps), options.link, session.bot),
      )
      logger.info(`Pack traced into ${result.packDir}`)
    })

  program
    .command('download')
    .description('Download a collection without creating a pack')
    .requiredOption('-l, --link <link>', 'Share link of the collection')
    .option('-d, --download-dir <dir>', 'Target directory', '.')
    .action(async (options: DownloadOptions) => {
      const dir = resolve(workingDirectory(deps), options.downloadDir)
      await withSyncService(deps, (service) => service.download(dir, options.link))
      logger.info('Download completed!')
    })

  program
    .command('sync')
    .description('Pull the remote collection into the current pack')
    .action(async () => {
      await withSyncService(deps, (service) => service.sync(workingDirectory(deps)))
    })

  program
    .command('push')
    .description('Push the current pack to the remote collection')
    .action(async () => {
      await withSyncService(deps, (service) => service.push(workingDirectory(deps)))
    })
}
