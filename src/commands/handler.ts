import { CommandParseError } from '../core/errors.js'
import { logger as defaultLogger } from '../core/logger.js'
import type { CallerContext, Logger } from '../core/types.js'
import { CommandTarget, filterCommandTarget, parseCommandLine } from '../parsing/command-line.js'
import { parseArguments, type ParsedArguments } from '../parsing/resolver.js'
import { describePermission, evaluatePermission } from '../permissions/expression.js'
import { DefaultErrorHandler } from './error-handler.js'
import { generateHelpMessage } from './help.js'
import type { CommandRegistry } from './registry.js'
import type { CommandDefinition, CommandResult, ErrorHandler, InvocationOutcome } from './types.js'

export interface CommandHandlerOptions {
  /** This bot's username, used to resolve `/command@target`. */
  botUsername: string
  /** Target mask for commands that declare none. */
  defaultTarget?: number
  /** Fallback when a command's own error handler declines. */
  errorHandler?: Required<ErrorHandler>
  logger?: Logger
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Parses raw chat messages into command invocations and dispatches them
 * through the {@link CommandRegistry}.
 *
 * Each message moves through target filtering, the permission check,
 * argument parsing and finally the command itself, stopping at the first
 * step that fails.
 */
export class CommandHandler {
  private readonly botUsername: string
  private readonly defaultTarget: number
  private readonly errorHandler: Required<ErrorHandler>
  private readonly logger: Logger

  constructor(
    private readonly registry: CommandRegistry,
    options: CommandHandlerOptions
  ) {
    this.botUsername = options.botUsername
    this.defaultTarget = options.defaultTarget ?? (CommandTarget.Unspecified | CommandTarget.Self)
    this.errorHandler = options.errorHandler ?? new DefaultErrorHandler()
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Returns `true` when the text invokes a registered command, regardless
   * of target or permissions.
   */
  isCommand(text: string): boolean {
    const parsed = parseCommandLine(this.botUsername, text)
    return parsed !== null && this.registry.has(parsed.command)
  }

  /**
   * Runs one message through the invocation pipeline and reports where it
   * ended. Errors from the command itself are returned, not thrown.
   */
  async invoke(text: string, caller: CallerContext): Promise<InvocationOutcome> {
    const parsed = parseCommandLine(this.botUsername, text)
    if (!parsed) return { state: 'skipped', reason: 'not-a-command' }

    const command = this.registry.get(parsed.command)
    if (!command) return { state: 'skipped', reason: 'unknown-command' }

    const explicitTarget = parsed.targetSpecified ? parsed.target : undefined
    if (!filterCommandTarget(explicitTarget, this.botUsername, command.target ?? this.defaultTarget)) {
      this.logger.info('command.target_skipped', { command: command.name, target: parsed.target })
      return { state: 'skipped', reason: 'target-mismatch' }
    }

    if (command.permissions) {
      let granted: boolean
      try {
        granted = await evaluatePermission(command.permissions, caller)
      } catch (error) {
        this.logger.error('command.failed', { command: command.name, stage: 'permission', error: errorMessage(error) })
        return { state: 'failed', command, error }
      }
      if (!granted) {
        this.logger.warn('command.permission_denied', {
          command: command.name,
          chatId: caller.chatId,
          senderId: caller.senderId,
          permissions: describePermission(command.permissions)
        })
        return { state: 'rejected', reason: 'permission', command }
      }
    }

    let args: ParsedArguments
    try {
      args = parseArguments(parsed.args, command.arguments ?? [])
    } catch (error) {
      if (!(error instanceof CommandParseError)) throw error
      this.logger.info('command.parse_failed', {
        command: command.name,
        error: error.name,
        message: error.message
      })
      return { state: 'rejected', reason: 'parse', command, error }
    }

    try {
      const result = await command.execute({
        caller,
        invokedAs: parsed.command,
        target: parsed.target,
        args,
        rawArgs: parsed.args
      })
      this.logger.info('command.invoked', { command: command.name, chatId: caller.chatId })
      return { state: 'invoked', command, result }
    } catch (error) {
      this.logger.error('command.failed', { command: command.name, stage: 'execute', error: errorMessage(error) })
      return { state: 'failed', command, error }
    }
  }

  /**
   * Attempts to execute a command parsed from the message text and returns
   * the reply to send.
   *
   * Returns `null` when the message is not for any command here, or when
   * an error was handled without a reply.
   */
  async execute(text: string, caller: CallerContext): Promise<CommandResult | null> {
    const outcome = await this.invoke(text, caller)
    switch (outcome.state) {
      case 'skipped':
        return null
      case 'invoked':
        return outcome.result
      case 'rejected':
        if (outcome.reason === 'permission') {
          return this.handleError(outcome.command, (h) => h.onPermissionError?.(caller, outcome.command), () =>
            this.errorHandler.onPermissionError(caller, outcome.command)
          )
        }
        return this.handleError(
          outcome.command,
          (h) => h.onValidationError?.(caller, outcome.error, generateHelpMessage(outcome.command)),
          () => this.errorHandler.onValidationError(caller, outcome.error, generateHelpMessage(outcome.command))
        )
      case 'failed':
        return this.handleError(outcome.command, (h) => h.onExecutionError?.(caller, outcome.error), () =>
          this.errorHandler.onExecutionError(caller, outcome.error)
        )
    }
  }

  private async handleError(
    command: CommandDefinition,
    custom: (handler: ErrorHandler) => Promise<CommandResult | null | undefined> | undefined,
    fallback: () => Promise<CommandResult | null | undefined>
  ): Promise<CommandResult | null> {
    if (command.errorHandler) {
      const handled = await custom(command.errorHandler)
      if (handled !== undefined) return handled
    }
    return (await fallback()) ?? null
  }
}
