export { CommandRegistry } from './registry.js'
export { CommandHandler } from './handler.js'
export type { CommandHandlerOptions } from './handler.js'
export { setupCommands } from './setup.js'
export type { SetupCommandsOptions } from './setup.js'
export {
  DefaultErrorHandler,
  EXECUTION_FAILED_MESSAGE,
  PERMISSION_DENIED_MESSAGE
} from './error-handler.js'
export type { DefaultErrorHandlerOptions } from './error-handler.js'
export { escapeForMarkdown, generateCommandList, generateHelpMessage, isCommandVisible } from './help.js'
export { helpCommand } from './definitions/help.js'
export type {
  BotCommand,
  CommandContext,
  CommandDefinition,
  CommandResult,
  ErrorHandler,
  InvocationOutcome,
  SkipReason
} from './types.js'
