import { describe, expect, it, vi } from 'vitest'

import { integerArgument, stringArgument } from '../src/arguments/argument.js'
import {
  DefaultErrorHandler,
  EXECUTION_FAILED_MESSAGE,
  PERMISSION_DENIED_MESSAGE
} from '../src/commands/error-handler.js'
import { CommandHandler, type CommandHandlerOptions } from '../src/commands/handler.js'
import { generateHelpMessage } from '../src/commands/help.js'
import { CommandRegistry } from '../src/commands/registry.js'
import type { CommandContext, CommandDefinition } from '../src/commands/types.js'
import { MissingRequiredArgumentError, UnterminatedQuoteError } from '../src/core/errors.js'
import { silentLogger } from '../src/core/logger.js'
import type { CallerContext } from '../src/core/types.js'
import { CommandTarget } from '../src/parsing/command-line.js'
import { NOBODY } from '../src/permissions/builtin.js'
import { permission } from '../src/permissions/expression.js'

const caller: CallerContext = {
  chatId: 'chat-1',
  chatType: 'private',
  senderId: '42',
  senderUsername: 'alice'
}

function makeCommand(overrides?: Partial<CommandDefinition>): CommandDefinition {
  return {
    name: 'test',
    description: 'A test command',
    aliases: [],
    async execute() {
      return { content: 'ok' }
    },
    ...overrides
  }
}

function setup(commands: CommandDefinition[], options: Partial<CommandHandlerOptions> = {}) {
  const registry = new CommandRegistry()
  for (const cmd of commands) registry.register(cmd)
  return new CommandHandler(registry, { botUsername: 'mybot', logger: silentLogger, ...options })
}

describe('CommandHandler', () => {
  it('returns null for non-command messages', async () => {
    const handler = setup([makeCommand({ name: 'ping' })])
    expect(await handler.execute('hello world', caller)).toBeNull()
    expect(await handler.invoke('hello world', caller)).toEqual({ state: 'skipped', reason: 'not-a-command' })
  })

  it('returns null for unrecognised slash commands', async () => {
    const handler = setup([makeCommand({ name: 'ping' })])
    expect(await handler.execute('/unknown', caller)).toBeNull()
    expect(await handler.invoke('/unknown', caller)).toEqual({ state: 'skipped', reason: 'unknown-command' })
  })

  it('executes a matched command', async () => {
    const execute = vi.fn(async (_ctx: CommandContext) => ({ content: 'pong' }))
    const handler = setup([makeCommand({ name: 'ping', execute })])

    const result = await handler.execute('/ping', caller)
    expect(result).toEqual({ content: 'pong' })
    expect(execute).toHaveBeenCalledWith({
      caller,
      invokedAs: 'ping',
      target: 'mybot',
      args: {},
      rawArgs: ''
    })
  })

  it('matches commands via alias', async () => {
    const execute = vi.fn(async (ctx: CommandContext) => ({ content: `via ${ctx.invokedAs}` }))
    const handler = setup([makeCommand({ name: 'children', aliases: ['c'], execute })])

    expect(await handler.execute('/c', caller)).toEqual({ content: 'via c' })
  })

  it('passes converted arguments', async () => {
    const seen: CommandContext[] = []
    const handler = setup([
      makeCommand({
        name: 'children',
        arguments: [integerArgument({ name: ['amount', 'a'], description: 'Amount', example: '2' })],
        async execute(ctx) {
          seen.push(ctx)
          return { content: 'ok' }
        }
      })
    ])

    await handler.execute('/children@mybot   --amount 2', caller)
    expect(seen).toHaveLength(1)
    expect(seen[0]?.args).toEqual({ amount: 2 })
    expect(seen[0]?.rawArgs).toBe('--amount 2')
    expect(seen[0]?.target).toBe('mybot')
  })

  it('reports whether text invokes a registered command', () => {
    const handler = setup([makeCommand({ name: 'ping' })])
    expect(handler.isCommand('/ping')).toBe(true)
    expect(handler.isCommand('/ping@otherbot')).toBe(true)
    expect(handler.isCommand('/pong')).toBe(false)
    expect(handler.isCommand('ping')).toBe(false)
  })

  describe('targets', () => {
    it('skips commands addressed to another bot', async () => {
      const execute = vi.fn(async () => ({ content: 'pong' }))
      const handler = setup([makeCommand({ name: 'ping', execute })])

      expect(await handler.invoke('/ping@otherbot', caller)).toEqual({ state: 'skipped', reason: 'target-mismatch' })
      expect(await handler.execute('/ping@otherbot', caller)).toBeNull()
      expect(execute).not.toHaveBeenCalled()
      expect(await handler.execute('/ping@mybot', caller)).toEqual({ content: 'pong' })
    })

    it('honours a per-command target mask', async () => {
      const handler = setup([makeCommand({ name: 'ping', target: CommandTarget.Any })])
      expect(await handler.execute('/ping@otherbot', caller)).toEqual({ content: 'ok' })
    })

    it('honours the default target mask', async () => {
      const handler = setup([makeCommand({ name: 'ping' })], { defaultTarget: CommandTarget.Self })
      expect(await handler.execute('/ping', caller)).toBeNull()
      expect(await handler.execute('/ping@mybot', caller)).toEqual({ content: 'ok' })
    })
  })

  describe('permissions', () => {
    it('rejects callers without permission silently by default', async () => {
      const execute = vi.fn(async () => ({ content: 'secret' }))
      const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const handler = setup([makeCommand({ name: 'secret', permissions: NOBODY, execute })], { logger })

      const outcome = await handler.invoke('/secret', caller)
      expect(outcome.state).toBe('rejected')
      expect(await handler.execute('/secret', caller)).toBeNull()
      expect(execute).not.toHaveBeenCalled()
      expect(logger.warn).toHaveBeenCalledWith('command.permission_denied', {
        command: 'secret',
        chatId: 'chat-1',
        senderId: '42',
        permissions: 'nobody'
      })
    })

    it('replies to denied callers when configured', async () => {
      const handler = setup([makeCommand({ name: 'secret', permissions: NOBODY })], {
        errorHandler: new DefaultErrorHandler({ silentDenial: false })
      })
      expect(await handler.execute('/secret', caller)).toEqual({ content: PERMISSION_DENIED_MESSAGE, error: true })
    })

    it('checks permissions before parsing arguments', async () => {
      const handler = setup([
        makeCommand({
          name: 'secret',
          permissions: NOBODY,
          arguments: [integerArgument({ name: 'n', description: '', example: '' })]
        })
      ])
      const outcome = await handler.invoke('/secret', caller)
      expect(outcome).toMatchObject({ state: 'rejected', reason: 'permission' })
    })

    it('treats a failing permission check as an execution failure', async () => {
      const broken = permission<CallerContext>('broken', () => {
        throw new Error('lookup failed')
      })
      const handler = setup([makeCommand({ name: 'ping', permissions: broken })])

      const outcome = await handler.invoke('/ping', caller)
      expect(outcome.state).toBe('failed')
      expect(await handler.execute('/ping', caller)).toEqual({ content: EXECUTION_FAILED_MESSAGE, error: true })
    })
  })

  describe('argument errors', () => {
    const children = makeCommand({
      name: 'children',
      description: 'Set children amount',
      arguments: [integerArgument({ name: 'amount', description: 'Amount', example: '2' })]
    })

    it('reports a parse rejection', async () => {
      const handler = setup([children])
      const outcome = await handler.invoke('/children', caller)

      expect(outcome.state).toBe('rejected')
      if (outcome.state === 'rejected' && outcome.reason === 'parse') {
        expect(outcome.error).toBeInstanceOf(MissingRequiredArgumentError)
      } else {
        throw new Error('expected a parse rejection')
      }
    })

    it('replies with the error and the command help', async () => {
      const handler = setup([children])
      expect(await handler.execute('/children', caller)).toEqual({
        content: ["❗ `Missing value for argument 'amount'`", '', generateHelpMessage(children)].join('\n'),
        error: true
      })
    })

    it('rejects unterminated quotes', async () => {
      const handler = setup([
        makeCommand({ name: 'echo', arguments: [stringArgument({ name: 'text', description: '', example: '' })] })
      ])
      const outcome = await handler.invoke('/echo "abc', caller)
      expect(outcome).toMatchObject({ state: 'rejected', reason: 'parse' })
      if (outcome.state === 'rejected' && outcome.reason === 'parse') {
        expect(outcome.error).toBeInstanceOf(UnterminatedQuoteError)
      }
    })
  })

  describe('execution errors', () => {
    const failing = makeCommand({
      name: 'fail',
      async execute() {
        throw new Error('boom')
      }
    })

    it('returns a generic reply and logs the failure', async () => {
      const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const handler = setup([failing], { logger })

      expect(await handler.execute('/fail', caller)).toEqual({ content: EXECUTION_FAILED_MESSAGE, error: true })
      expect(logger.error).toHaveBeenCalledWith('command.failed', { command: 'fail', stage: 'execute', error: 'boom' })
    })

    it('includes the stack when configured', async () => {
      const handler = setup([failing], { errorHandler: new DefaultErrorHandler({ printError: true }) })
      const reply = await handler.execute('/fail', caller)

      expect(reply?.error).toBe(true)
      expect(reply?.content.startsWith('💥 `Error: boom')).toBe(true)
    })
  })

  describe('per-command error handlers', () => {
    it('uses replies from the command handler', async () => {
      const handler = setup([
        makeCommand({
          name: 'secret',
          permissions: NOBODY,
          errorHandler: {
            async onPermissionError() {
              return { content: 'YOU SHALL NOT PASS' }
            }
          }
        })
      ])
      expect(await handler.execute('/secret', caller)).toEqual({ content: 'YOU SHALL NOT PASS' })
    })

    it('falls back to the default handler on undefined', async () => {
      const cmd = makeCommand({
        name: 'children',
        arguments: [integerArgument({ name: 'amount', description: 'Amount', example: '2' })],
        errorHandler: {
          async onValidationError() {
            return undefined
          }
        }
      })
      const handler = setup([cmd])
      const reply = await handler.execute('/children x', caller)

      expect(reply?.error).toBe(true)
      expect(reply?.content.split('\n')[0]).toBe(
        "❗ `Invalid value 'x' for argument 'amount': 'x' is not an integer`"
      )
    })

    it('stays silent on null', async () => {
      const handler = setup([
        makeCommand({
          name: 'fail',
          async execute() {
            throw new Error('boom')
          },
          errorHandler: {
            async onExecutionError() {
              return null
            }
          }
        })
      ])
      expect(await handler.execute('/fail', caller)).toBeNull()
    })
  })
})
