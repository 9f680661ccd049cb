import type { ArgumentSchema } from '../arguments/argument.js'
import type { CallerContext } from '../core/types.js'
import { COMMAND_MARKER } from '../parsing/command-line.js'
import { evaluatePermission } from '../permissions/expression.js'
import type { CommandDefinition } from './types.js'

/** Escapes `*` and `_` so text renders literally in Telegram Markdown. */
export function escapeForMarkdown(text: string): string {
  return text.replace(/\*/g, '\\*').replace(/_/g, '\\_')
}

function argumentLine(arg: ArgumentSchema): string {
  const kind = arg.isFlag ? 'flag' : arg.kind
  let line = `  ${escapeForMarkdown(arg.names.join(', '))} (\`${kind}\`): ${escapeForMarkdown(arg.description)}`
  if (arg.allowedValues) {
    line += ` (one of: ${escapeForMarkdown(arg.allowedValues.map(String).join(', '))})`
  }
  if (!arg.isFlag && arg.defaultValue !== undefined) {
    line += ` (default: ${escapeForMarkdown(String(arg.defaultValue))})`
  }
  return line
}

/**
 * Builds the usage text for one command:
 *
 * ```
 * /children (/c)
 * Set children amount
 * Arguments:
 *   amount, a (`float`): The new amount
 * Example:
 *   `/children 1.57`
 * ```
 */
export function generateHelpMessage(command: CommandDefinition): string {
  const names = [command.name, ...(command.aliases ?? [])].map((n) => `${COMMAND_MARKER}${escapeForMarkdown(n)}`)
  const [primary, ...aliases] = names
  const heading = aliases.length > 0 ? `${primary} (${aliases.join(', ')})` : `${primary}`

  const lines = [heading, command.description]
  const args = command.arguments ?? []
  if (args.length > 0) {
    const example = args
      .map((a) => a.example)
      .filter(Boolean)
      .join(' ')
    lines.push(
      'Arguments:',
      ...args.map(argumentLine),
      'Example:',
      `  \`${COMMAND_MARKER}${command.name}${example ? ` ${example}` : ''}\``
    )
  }
  return lines.join('\n')
}

/** Returns true when `caller` may see `command` in help listings. */
export async function isCommandVisible(command: CommandDefinition, caller: CallerContext): Promise<boolean> {
  const hidden = typeof command.hidden === 'function' ? await command.hidden(caller) : command.hidden
  if (hidden) return false
  if (!command.permissions) return true
  return evaluatePermission(command.permissions, caller)
}

/**
 * Lists the help of every command `caller` can see and use.
 */
export async function generateCommandList(
  commands: readonly CommandDefinition[],
  caller: CallerContext
): Promise<string> {
  const sections = ['Commands:']
  for (const command of commands) {
    if (await isCommandVisible(command, caller)) {
      sections.push(generateHelpMessage(command))
    }
  }
  return sections.join('\n\n')
}
