import type { ArgumentSchema } from '../arguments/argument.js'
import type { CommandParseError } from '../core/errors.js'
import type { CallerContext } from '../core/types.js'
import type { ParsedArguments } from '../parsing/resolver.js'
import type { PermissionNode } from '../permissions/expression.js'

/**
 * Context available to every command handler at execution time.
 */
export interface CommandContext {
  caller: CallerContext
  /** Name or alias the command was invoked with. */
  invokedAs: string
  /** Bot the command was addressed to. */
  target: string
  /** Converted argument values keyed by canonical argument name. */
  args: ParsedArguments
  /** Argument text as typed, before tokenizing. */
  rawArgs: string
}

/**
 * Result returned by a command handler.
 */
export interface CommandResult {
  content: string
  error?: boolean
}

/**
 * Turns rejected or failed invocations into replies.
 *
 * Each hook returns a reply, `null` when the error was handled without a
 * reply, or `undefined` to defer to the default handler.
 */
export interface ErrorHandler {
  onPermissionError?(
    caller: CallerContext,
    command: CommandDefinition
  ): Promise<CommandResult | null | undefined>
  onValidationError?(
    caller: CallerContext,
    error: CommandParseError,
    helpMessage: string
  ): Promise<CommandResult | null | undefined>
  onExecutionError?(caller: CallerContext, error: unknown): Promise<CommandResult | null | undefined>
}

/**
 * Definition of a single bot command.
 */
export interface CommandDefinition {
  /** Primary command name (e.g. "children"). */
  name: string
  /** Alternative names that also trigger this command. */
  aliases?: string[]
  /** One-line description shown in help listings. */
  description: string
  /** Accepted arguments, in positional order. */
  arguments?: ArgumentSchema[]
  /** Access rule; omitted means everybody. */
  permissions?: PermissionNode<CallerContext>
  /** Accepted {@link CommandTarget} mask; defaults to the handler's setting. */
  target?: number
  /** Hides the command from help listings, always or per caller. */
  hidden?: boolean | ((caller: CallerContext) => boolean | Promise<boolean>)
  /** Per-command error handling, consulted before the default handler. */
  errorHandler?: ErrorHandler
  /** Execute the command and return a result. */
  execute(ctx: CommandContext): Promise<CommandResult>
}

/**
 * Entry for Bot API `setMyCommands`.
 */
export interface BotCommand {
  command: string
  description: string
}

/** Why a message did not reach any command. */
export type SkipReason = 'not-a-command' | 'unknown-command' | 'target-mismatch'

/**
 * Terminal state of one invocation.
 */
export type InvocationOutcome =
  | { state: 'skipped'; reason: SkipReason }
  | { state: 'rejected'; reason: 'permission'; command: CommandDefinition }
  | { state: 'rejected'; reason: 'parse'; command: CommandDefinition; error: CommandParseError }
  | { state: 'invoked'; command: CommandDefinition; result: CommandResult }
  | { state: 'failed'; command: CommandDefinition; error: unknown }
