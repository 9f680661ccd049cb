import { flag, floatArgument, integerArgument, selection, stringArgument } from '../arguments/argument.js'
import type { CommandDefinition } from '../commands/types.js'
import { NOBODY, supergroupChat, userId, userName } from '../permissions/builtin.js'
import { allOf, anyOf, not } from '../permissions/expression.js'

/** Mutable state shared by the example commands. */
export interface ExampleState {
  name?: string
  age?: number
  children?: number
  mood: string
}

/**
 * Sample commands showing arguments, flags, selections and permissions.
 */
export function createExampleCommands(
  state: ExampleState,
  owner: { id: string; username: string }
): CommandDefinition[] {
  const name: CommandDefinition = {
    name: 'name',
    aliases: ['n'],
    description: 'Get or set a name',
    arguments: [
      stringArgument({
        name: ['name', 'n'],
        description: 'The new name',
        example: 'Alice',
        optional: true,
        validator: (value) => value.trim().length > 0
      }),
      flag({ name: ['flag', 'f'], description: 'Some flag that changes the command behaviour' }),
      flag({ name: ['flag2', 'F'], description: 'Some other flag' })
    ],
    async execute(ctx) {
      const value = ctx.args.name
      const lines: string[] = []
      if (typeof value === 'string') {
        state.name = value
        lines.push(`New: ${value}`)
      } else {
        lines.push(`Current: ${state.name ?? 'none'}`)
      }
      lines.push(`Flag is: ${String(ctx.args.flag)}`, `Flag2 is: ${String(ctx.args.flag2)}`)
      return { content: lines.join('\n') }
    }
  }

  const age: CommandDefinition = {
    name: 'age',
    aliases: ['a'],
    description: 'Set age',
    arguments: [
      integerArgument({
        name: ['age', 'a'],
        description: 'The new age',
        example: '25',
        validator: (value) => value > 0
      })
    ],
    permissions: allOf(not(supergroupChat), anyOf(userName(owner.username), userId(owner.id))),
    async execute(ctx) {
      if (typeof ctx.args.age === 'number') state.age = ctx.args.age
      return { content: `New age: ${String(ctx.args.age)}` }
    }
  }

  const children: CommandDefinition = {
    name: 'children',
    aliases: ['c'],
    description: 'Set children amount',
    arguments: [
      floatArgument({
        name: ['amount', 'a'],
        description: 'The new amount',
        example: '1.57',
        optional: true,
        validator: (value) => value >= 0
      })
    ],
    permissions: NOBODY,
    async execute(ctx) {
      const amount = ctx.args.amount
      if (typeof amount !== 'number') return { content: `Current: ${String(state.children ?? 'none')}` }
      state.children = amount
      return { content: `New: ${amount}` }
    }
  }

  const mood: CommandDefinition = {
    name: 'mood',
    description: 'Set the bot mood',
    arguments: [
      selection({
        name: ['mood', 'm'],
        description: 'How the bot feels',
        allowedValues: ['happy', 'grumpy', 'sleepy'],
        converter: (raw) => raw.toLowerCase()
      })
    ],
    hidden: (caller) => caller.senderId !== owner.id,
    async execute(ctx) {
      if (typeof ctx.args.mood === 'string') state.mood = ctx.args.mood
      return { content: `Mood: ${state.mood}` }
    }
  }

  return [name, age, children, mood]
}
