export * from './commands/index.js'
export {
  Argument,
  ARG_VALUE_SEPARATOR,
  booleanArgument,
  customArgument,
  flag,
  floatArgument,
  integerArgument,
  selection,
  stringArgument
} from './arguments/argument.js'
export type { ArgumentOptions, ArgumentSchema, FlagOptions, SelectionOptions } from './arguments/argument.js'
export {
  BUILTIN_CONVERTERS,
  convertBoolean,
  convertFloat,
  convertInteger,
  convertString
} from './arguments/converters.js'
export type { BuiltinKind, Converter, Validator, ValueKind } from './arguments/converters.js'
export {
  COMMAND_MARKER,
  CommandTarget,
  commandTargetFromNames,
  filterCommandTarget,
  parseCommandLine,
  splitCommandFromArgs,
  splitCommandFromTarget
} from './parsing/command-line.js'
export type { CommandTargetName, ParsedCommandLine } from './parsing/command-line.js'
export { QUOTE_CHARS, isQuoted, stripQuotes, tokenize } from './parsing/tokenizer.js'
export type { Token } from './parsing/tokenizer.js'
export {
  ARG_NAMING_PREFIXES,
  isArgumentKey,
  parseArguments,
  resolveArguments,
  validateArgumentSchemas
} from './parsing/resolver.js'
export type { ParsedArguments } from './parsing/resolver.js'
export {
  allOf,
  anyOf,
  describePermission,
  evaluatePermission,
  merge,
  not,
  permission
} from './permissions/expression.js'
export type { PermissionNode, PermissionOperator, PermissionPredicate } from './permissions/expression.js'
export {
  ANYBODY,
  NOBODY,
  groupAdmin,
  groupChat,
  groupCreator,
  privateChat,
  supergroupChat,
  userId,
  userName
} from './permissions/builtin.js'
export * from './core/errors.js'
export { createLogger, logger, silentLogger } from './core/logger.js'
export type { CallerContext, ChatType, Logger, MemberStatus } from './core/types.js'
export { configSchema } from './config/schema.js'
export type { CommandKitConfig } from './config/schema.js'
export { loadConfig } from './config/load.js'
