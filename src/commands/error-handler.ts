import type { CommandParseError } from '../core/errors.js'
import type { CallerContext } from '../core/types.js'
import type { CommandDefinition, CommandResult, ErrorHandler } from './types.js'

export const PERMISSION_DENIED_MESSAGE = '🛑 You do not have permission to use this command.'
export const EXECUTION_FAILED_MESSAGE = '💥 There was an error executing your command 😟'

export interface DefaultErrorHandlerOptions {
  /** Ignore commands from callers without permission instead of replying. */
  silentDenial?: boolean
  /** Include the error's stack in execution failure replies. */
  printError?: boolean
}

/**
 * Fallback handler used when a command's own handler declines an error.
 */
export class DefaultErrorHandler implements Required<ErrorHandler> {
  private readonly silentDenial: boolean
  private readonly printError: boolean

  constructor(options: DefaultErrorHandlerOptions = {}) {
    this.silentDenial = options.silentDenial ?? true
    this.printError = options.printError ?? false
  }

  async onPermissionError(_caller: CallerContext, _command: CommandDefinition): Promise<CommandResult | null> {
    if (this.silentDenial) return null
    return { content: PERMISSION_DENIED_MESSAGE, error: true }
  }

  async onValidationError(
    _caller: CallerContext,
    error: CommandParseError,
    helpMessage: string
  ): Promise<CommandResult> {
    return { content: [`❗ \`${error.message}\``, '', helpMessage].join('\n'), error: true }
  }

  async onExecutionError(_caller: CallerContext, error: unknown): Promise<CommandResult> {
    if (!this.printError) return { content: EXECUTION_FAILED_MESSAGE, error: true }
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error)
    return { content: `💥 \`${detail}\``, error: true }
  }
}
