import { describe, expect, it } from 'vitest'

import {
  DefaultErrorHandler,
  EXECUTION_FAILED_MESSAGE,
  PERMISSION_DENIED_MESSAGE
} from '../src/commands/error-handler.js'
import type { CommandDefinition } from '../src/commands/types.js'
import { UnknownArgumentError } from '../src/core/errors.js'
import type { CallerContext } from '../src/core/types.js'

const caller: CallerContext = { chatId: 'chat-1', chatType: 'group', senderId: '42' }

const command: CommandDefinition = {
  name: 'ping',
  description: 'Health check',
  async execute() {
    return { content: 'pong' }
  }
}

describe('DefaultErrorHandler', () => {
  it('ignores permission errors by default', async () => {
    expect(await new DefaultErrorHandler().onPermissionError(caller, command)).toBeNull()
  })

  it('replies to permission errors when not silent', async () => {
    const handler = new DefaultErrorHandler({ silentDenial: false })
    expect(await handler.onPermissionError(caller, command)).toEqual({
      content: PERMISSION_DENIED_MESSAGE,
      error: true
    })
  })

  it('quotes the parse error above the help text', async () => {
    const reply = await new DefaultErrorHandler().onValidationError(
      caller,
      new UnknownArgumentError('--x'),
      '/ping\nHealth check'
    )
    expect(reply).toEqual({
      content: "❗ `Unknown argument '--x'`\n\n/ping\nHealth check",
      error: true
    })
  })

  it('hides execution errors unless asked to print them', async () => {
    expect(await new DefaultErrorHandler().onExecutionError(caller, new Error('boom'))).toEqual({
      content: EXECUTION_FAILED_MESSAGE,
      error: true
    })
    expect(await new DefaultErrorHandler({ printError: true }).onExecutionError(caller, 'plain failure')).toEqual({
      content: '💥 `plain failure`',
      error: true
    })
  })
})
