import { stringArgument } from '../../arguments/argument.js'
import { escapeForMarkdown, generateCommandList, generateHelpMessage, isCommandVisible } from '../help.js'
import type { CommandRegistry } from '../registry.js'
import type { CommandDefinition, CommandResult } from '../types.js'

/**
 * /help [command]
 * Lists the commands the caller can use, or shows help for one of them.
 */
export function helpCommand(registry: CommandRegistry): CommandDefinition {
  return {
    name: 'help',
    aliases: ['h'],
    description: 'List commands supported by this bot',
    arguments: [
      stringArgument({
        name: ['command', 'c'],
        description: 'Command to show help for',
        example: 'help',
        optional: true
      })
    ],
    async execute(ctx): Promise<CommandResult> {
      const requested = ctx.args.command
      if (typeof requested === 'string' && requested) {
        const name = requested.startsWith('/') ? requested.slice(1) : requested
        const target = registry.get(name)
        if (!target || !(await isCommandVisible(target, ctx.caller))) {
          return { content: `Unknown command: \`${escapeForMarkdown(name)}\``, error: true }
        }
        return { content: generateHelpMessage(target) }
      }

      return { content: await generateCommandList(registry.all(), ctx.caller) }
    }
  }
}
