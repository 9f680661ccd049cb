/**
 * Base class for every error raised by the command kit.
 */
export class CommandKitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CommandKitError'
  }
}

// ── Construction-time errors ──

/** An argument declaration is malformed (bad name, missing converter). */
export class ArgumentDefinitionError extends CommandKitError {
  constructor(message: string) {
    super(message)
    this.name = 'ArgumentDefinitionError'
  }
}

/** Two arguments of one command share an alias. */
export class DuplicateArgumentAliasError extends CommandKitError {
  constructor(readonly alias: string) {
    super(`Argument alias '${alias}' is declared more than once`)
    this.name = 'DuplicateArgumentAliasError'
  }
}

/** A required argument is declared after an optional one. */
export class AliasOrderViolationError extends CommandKitError {
  constructor(
    readonly argument: string,
    readonly precededBy: string
  ) {
    super(`Required argument '${argument}' must not follow optional argument '${precededBy}'`)
    this.name = 'AliasOrderViolationError'
  }
}

/** A command declaration is malformed or clashes with a registered one. */
export class CommandDefinitionError extends CommandKitError {
  constructor(message: string) {
    super(message)
    this.name = 'CommandDefinitionError'
  }
}

/** A permission expression cannot be built. */
export class PermissionConstructionError extends CommandKitError {
  constructor(message: string) {
    super(message)
    this.name = 'PermissionConstructionError'
  }
}

// ── Per-message parse errors ──

/** Raised while turning message text into typed argument values. */
export class CommandParseError extends CommandKitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CommandParseError'
  }
}

export class UnterminatedQuoteError extends CommandParseError {
  constructor(
    readonly quote: string,
    readonly position: number
  ) {
    super(`Unterminated quote ${quote} opened at position ${position}`)
    this.name = 'UnterminatedQuoteError'
  }
}

export class UnknownArgumentError extends CommandParseError {
  constructor(readonly key: string) {
    super(`Unknown argument '${key}'`)
    this.name = 'UnknownArgumentError'
  }
}

export class MissingArgumentValueError extends CommandParseError {
  constructor(
    readonly key: string,
    readonly found?: string
  ) {
    super(
      found === undefined
        ? `Expected argument value for '${key}' but found end of input`
        : `Expected argument value for '${key}' but found named argument '${found}'`
    )
    this.name = 'MissingArgumentValueError'
  }
}

export class MissingRequiredArgumentError extends CommandParseError {
  constructor(readonly argument: string) {
    super(`Missing value for argument '${argument}'`)
    this.name = 'MissingRequiredArgumentError'
  }
}

export class UnexpectedFlagValueError extends CommandParseError {
  constructor(readonly key: string) {
    super(`Flag '${key}' does not take a value`)
    this.name = 'UnexpectedFlagValueError'
  }
}

/** Which step rejected an argument value. */
export type InvalidValueStage = 'conversion' | 'validation'

export class InvalidArgumentValueError extends CommandParseError {
  constructor(
    readonly argument: string,
    readonly rawValue: string,
    readonly stage: InvalidValueStage,
    cause?: unknown
  ) {
    super(
      stage === 'conversion'
        ? `Invalid value '${rawValue}' for argument '${argument}': ${describeCause(cause)}`
        : `Value '${rawValue}' is not allowed for argument '${argument}'`,
      { cause }
    )
    this.name = 'InvalidArgumentValueError'
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
