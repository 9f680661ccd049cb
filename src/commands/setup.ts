import type { CommandKitConfig } from '../config/schema.js'
import type { Logger } from '../core/types.js'
import { commandTargetFromNames } from '../parsing/command-line.js'
import { helpCommand } from './definitions/help.js'
import { DefaultErrorHandler } from './error-handler.js'
import { CommandHandler } from './handler.js'
import { CommandRegistry } from './registry.js'
import type { CommandDefinition } from './types.js'

/**
 * Options for the command setup.
 */
export interface SetupCommandsOptions {
  /** Application commands to register alongside the built-in help. */
  commands?: CommandDefinition[]
  /** Skip registering the built-in `/help` command. */
  withoutHelp?: boolean
  logger?: Logger
}

/**
 * Registers all application commands plus the built-in help command,
 * then returns a ready-to-use {@link CommandHandler}.
 *
 * Registration validates every definition, so a bad argument list or a
 * name clash fails here, at startup.
 */
export function setupCommands(
  config: CommandKitConfig,
  options: SetupCommandsOptions = {}
): { registry: CommandRegistry; handler: CommandHandler } {
  const registry = new CommandRegistry()

  for (const cmd of options.commands ?? []) {
    registry.register(cmd)
  }

  // Help goes last so its listing follows registration order
  if (!options.withoutHelp) {
    registry.register(helpCommand(registry))
  }

  const handler = new CommandHandler(registry, {
    botUsername: config.botUsername,
    defaultTarget: commandTargetFromNames(config.defaultTargets),
    errorHandler: new DefaultErrorHandler(config.errors),
    ...(options.logger ? { logger: options.logger } : {})
  })

  return { registry, handler }
}
