import { Command, CommanderError } from 'commander'
import { describeCause } from '@utils/errors.js'
import { registerAuthCommands, registerPackCommands } from '@root/cli/commands.js'
import type { CliDependencies } from '@root/cli/context.js'

export const PROGRAM_NAME = 'sticker-sync'

/**
 * Builds the command-line program. Commander exits are turned into
 * exceptions so that the caller decides the exit code.
 */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description('Keep a local sticker directory in sync with a remote sticker collection')
    .exitOverride()

  if (deps.output) {
    program.configureOutput(deps.output)
  }

  // Subcommands inherit the exit override and output settings
  registerAuthCommands(program, deps)
  registerPackCommands(program, deps)

  return program
}

/**
 * Runs one command.
 *
 * @param argv - User arguments, without the node and script paths
 * @returns Process exit code: 0 on success, 1 when the command aborted
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies,
): Promise<number> {
  const program = createProgram(deps)
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    deps.logger.error({ error }, describeCause(error))
    return 1
  }
}
