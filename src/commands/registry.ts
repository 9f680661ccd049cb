import { CommandDefinitionError } from '../core/errors.js'
import { COMMAND_MARKER, TARGET_SEPARATOR } from '../parsing/command-line.js'
import { validateArgumentSchemas } from '../parsing/resolver.js'
import type { BotCommand, CommandDefinition } from './types.js'

function checkCommandName(name: string): void {
  if (!name) throw new CommandDefinitionError('Command names must not be empty')
  if (/\s/.test(name)) throw new CommandDefinitionError(`Command name '${name}' must not contain whitespace`)
  if (name.includes(TARGET_SEPARATOR)) {
    throw new CommandDefinitionError(`Command name '${name}' must not contain '${TARGET_SEPARATOR}'`)
  }
  if (name.startsWith(COMMAND_MARKER)) {
    throw new CommandDefinitionError(`Command name '${name}' must not start with '${COMMAND_MARKER}'`)
  }
}

/**
 * Registry of bot commands, owned by the embedding application.
 *
 * Provides O(1) lookup by name or alias. Every definition is validated on
 * registration, so malformed commands fail at startup rather than when a
 * message arrives.
 */
export class CommandRegistry {
  private readonly commands: CommandDefinition[] = []
  /** Maps every alias (and primary name) to its command. */
  private readonly aliasMap = new Map<string, CommandDefinition>()

  /**
   * Registers a command definition, indexing its name and aliases.
   *
   * @throws CommandDefinitionError on a malformed or already taken name
   * @throws DuplicateArgumentAliasError, AliasOrderViolationError on a bad argument list
   */
  register(command: CommandDefinition): void {
    const names = [command.name, ...(command.aliases ?? [])]
    const keys = new Set<string>()
    for (const name of names) {
      checkCommandName(name)
      const key = name.toLowerCase()
      if (this.aliasMap.has(key) || keys.has(key)) {
        throw new CommandDefinitionError(`Command name '${name}' is already registered`)
      }
      keys.add(key)
    }

    validateArgumentSchemas(command.arguments ?? [])

    this.commands.push(command)
    for (const key of keys) this.aliasMap.set(key, command)
  }

  /** Looks up a command by name or alias (case-insensitive). */
  get(nameOrAlias: string): CommandDefinition | undefined {
    return this.aliasMap.get(nameOrAlias.toLowerCase())
  }

  /** Returns true when a name/alias maps to a registered command. */
  has(nameOrAlias: string): boolean {
    return this.aliasMap.has(nameOrAlias.toLowerCase())
  }

  /** Returns all registered command definitions in registration order. */
  all(): CommandDefinition[] {
    return [...this.commands]
  }

  /**
   * Builds the command list for Bot API `setMyCommands`. Commands marked
   * `hidden: true` are left out; per-caller visibility cannot apply here.
   */
  toBotCommands(): BotCommand[] {
    return this.commands
      .filter((cmd) => cmd.hidden !== true)
      .map((cmd) => ({ command: cmd.name, description: cmd.description }))
  }
}
