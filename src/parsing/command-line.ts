/** Character every command token must start with. */
export const COMMAND_MARKER = '/'

/** Separates a command name from the bot it addresses (`/cmd@bot`). */
export const TARGET_SEPARATOR = '@'

/**
 * Bitmask of command targets a command accepts.
 *
 * - `Unspecified`: `/cmd` with no `@bot` suffix
 * - `Self`: `/cmd@<this bot>`
 * - `Other`: `/cmd@<another bot>`
 */
export const CommandTarget = {
  Unspecified: 1,
  Self: 2,
  Other: 4,
  Any: 7
} as const

export type CommandTargetName = 'unspecified' | 'self' | 'other' | 'any'

const TARGET_BITS: Record<CommandTargetName, number> = {
  unspecified: CommandTarget.Unspecified,
  self: CommandTarget.Self,
  other: CommandTarget.Other,
  any: CommandTarget.Any
}

/** Combines target names (e.g. from configuration) into a mask. */
export function commandTargetFromNames(names: readonly CommandTargetName[]): number {
  return names.reduce((mask, name) => mask | TARGET_BITS[name], 0)
}

export interface CommandArgsSplit {
  /** First word of the message, including any `@target`. */
  command: string | undefined
  /** Remaining text after the first whitespace run. */
  args: string
}

/**
 * Splits the command token (including any target) from its argument text.
 *
 * - `/cmd@bot a b` → `{ command: '/cmd@bot', args: 'a b' }`
 * - `` → `{ command: undefined, args: '' }`
 */
export function splitCommandFromArgs(text: string): CommandArgsSplit {
  const trimmed = text.trimStart()
  if (!trimmed) return { command: undefined, args: '' }

  const match = /[ \t\r\n]+/.exec(trimmed)
  if (!match) return { command: trimmed, args: '' }

  return {
    command: trimmed.slice(0, match.index),
    args: trimmed.slice(match.index + match[0].length)
  }
}

export interface CommandTargetSplit {
  /** Command name without marker, or undefined when the token is not a command. */
  command: string | undefined
  /** Addressed bot; the caller's own name when no `@` was given. */
  target: string
  /** Whether the token carried an explicit `@target`. */
  targetSpecified: boolean
}

/**
 * Separates the command name from the bot it targets.
 */
export function splitCommandFromTarget(selfName: string, commandWithTarget: string | undefined): CommandTargetSplit {
  if (!commandWithTarget) {
    return { command: undefined, target: selfName, targetSpecified: false }
  }

  const at = commandWithTarget.indexOf(TARGET_SEPARATOR)
  const rawCommand = at >= 0 ? commandWithTarget.slice(0, at) : commandWithTarget
  const target = at >= 0 ? commandWithTarget.slice(at + 1) : selfName

  const command =
    rawCommand.startsWith(COMMAND_MARKER) && rawCommand.length > COMMAND_MARKER.length
      ? rawCommand.slice(COMMAND_MARKER.length)
      : undefined

  return { command, target, targetSpecified: at >= 0 }
}

/**
 * Returns true when a command addressed to `target` should be handled by
 * the bot named `selfName`, given the accepted target `mask`.
 *
 * @param target - explicit target, or undefined when the command had none
 */
export function filterCommandTarget(target: string | undefined, selfName: string, mask: number): boolean {
  let kind: number
  if (target === undefined) {
    kind = CommandTarget.Unspecified
  } else if (target === selfName) {
    kind = CommandTarget.Self
  } else {
    kind = CommandTarget.Other
  }
  return (mask & kind) !== 0
}

export interface ParsedCommandLine {
  command: string
  target: string
  targetSpecified: boolean
  args: string
}

/**
 * Preprocesses a full message. Returns `null` for text that is not a command.
 */
export function parseCommandLine(selfName: string, text: string): ParsedCommandLine | null {
  const { command: commandWithTarget, args } = splitCommandFromArgs(text)
  const { command, target, targetSpecified } = splitCommandFromTarget(selfName, commandWithTarget)
  if (command === undefined) return null
  return { command, target, targetSpecified, args }
}
