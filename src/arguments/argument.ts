import {
  ArgumentDefinitionError,
  InvalidArgumentValueError,
  MissingRequiredArgumentError
} from '../core/errors.js'
import {
  BUILTIN_CONVERTERS,
  convertBoolean,
  convertString,
  type BuiltinKind,
  type BuiltinValue,
  type Converter,
  type Validator,
  type ValueKind
} from './converters.js'

/** Separator between an argument key and an inline value (`--name=value`). */
export const ARG_VALUE_SEPARATOR = '='

/**
 * Type-erased view of an argument, as seen by the resolver and help output.
 */
export interface ArgumentSchema {
  /** Canonical name, always `names[0]`. */
  readonly name: string
  readonly names: readonly string[]
  readonly description: string
  readonly example: string
  readonly kind: ValueKind
  readonly isFlag: boolean
  readonly optional: boolean
  readonly defaultValue: unknown
  readonly allowedValues?: readonly unknown[]
  /** Converts and validates raw text; `undefined` means the argument was absent. */
  parse(raw: string | undefined): unknown
}

/**
 * User-facing options shared by every argument factory.
 */
export interface ArgumentOptions<T> {
  /** One name or a list of aliases; the first one is canonical. */
  name: string | readonly string[]
  description: string
  example: string
  optional?: boolean
  default?: T
  converter?: Converter<T>
  validator?: Validator<T>
}

interface ArgumentSpec<T> extends ArgumentOptions<T> {
  kind: ValueKind
  flag?: boolean
  allowedValues?: readonly T[]
}

function normalizeNames(name: string | readonly string[]): string[] {
  const names = typeof name === 'string' ? [name] : [...name]
  if (names.length === 0) {
    throw new ArgumentDefinitionError('Argument needs at least one name')
  }

  const seen = new Set<string>()
  for (const n of names) {
    if (!n) throw new ArgumentDefinitionError('Argument names must not be empty')
    if (/\s/.test(n)) throw new ArgumentDefinitionError(`Argument name '${n}' must not contain whitespace`)
    if (n.includes(ARG_VALUE_SEPARATOR)) {
      throw new ArgumentDefinitionError(`Argument name '${n}' must not contain '${ARG_VALUE_SEPARATOR}'`)
    }
    if (seen.has(n)) throw new ArgumentDefinitionError(`Argument name '${n}' is listed twice`)
    seen.add(n)
  }
  return names
}

/**
 * A single declared command argument. Immutable once constructed.
 */
export class Argument<T> implements ArgumentSchema {
  readonly name: string
  readonly names: readonly string[]
  readonly description: string
  readonly example: string
  readonly kind: ValueKind
  readonly isFlag: boolean
  readonly optional: boolean
  readonly defaultValue: T | undefined
  readonly allowedValues?: readonly T[]
  private readonly converter: Converter<T>
  private readonly validator?: Validator<T>

  constructor(spec: ArgumentSpec<T>) {
    const names = normalizeNames(spec.name)
    this.names = Object.freeze(names)
    this.name = names[0] ?? ''
    this.description = spec.description
    this.example = spec.example
    this.isFlag = spec.flag ?? false
    this.kind = this.isFlag ? 'boolean' : spec.kind
    this.optional = this.isFlag || (spec.optional ?? false)
    this.defaultValue = spec.default
    if (spec.allowedValues) this.allowedValues = Object.freeze([...spec.allowedValues])

    if (!spec.converter) {
      throw new ArgumentDefinitionError(`Argument '${this.name}' of kind '${spec.kind}' requires a converter`)
    }
    this.converter = spec.converter
    if (spec.validator) this.validator = spec.validator
    Object.freeze(this)
  }

  /**
   * Converts then validates `raw`.
   *
   * An absent value yields the default for optional arguments and fails
   * for required ones. Defaults are returned as declared, without validation.
   */
  parse(raw: string | undefined): T | undefined {
    if (raw === undefined) {
      if (this.optional) return this.defaultValue
      throw new MissingRequiredArgumentError(this.name)
    }

    let value: T
    try {
      value = this.converter(raw)
    } catch (error) {
      throw new InvalidArgumentValueError(this.name, raw, 'conversion', error)
    }

    if (this.validator) {
      let accepted: boolean
      try {
        accepted = this.validator(value)
      } catch (error) {
        throw new InvalidArgumentValueError(this.name, raw, 'validation', error)
      }
      if (!accepted) throw new InvalidArgumentValueError(this.name, raw, 'validation')
    }
    return value
  }
}

function builtinArgument<K extends BuiltinKind>(
  kind: K,
  options: ArgumentOptions<BuiltinValue[K]>
): Argument<BuiltinValue[K]> {
  return new Argument<BuiltinValue[K]>({
    ...options,
    kind,
    converter: options.converter ?? BUILTIN_CONVERTERS[kind]
  })
}

export function stringArgument(options: ArgumentOptions<string>): Argument<string> {
  return builtinArgument('string', options)
}

export function booleanArgument(options: ArgumentOptions<boolean>): Argument<boolean> {
  return builtinArgument('boolean', options)
}

export function integerArgument(options: ArgumentOptions<number>): Argument<number> {
  return builtinArgument('integer', options)
}

/** Decimal number; a trailing `%` is read as a percentage (`3%` → 0.03). */
export function floatArgument(options: ArgumentOptions<number>): Argument<number> {
  return builtinArgument('float', options)
}

/** Argument of a caller-defined type; the converter is mandatory. */
export function customArgument<T>(options: ArgumentOptions<T> & { converter: Converter<T> }): Argument<T> {
  return new Argument<T>({ ...options, kind: 'custom' })
}

export interface FlagOptions {
  name: string | readonly string[]
  description: string
}

/**
 * Boolean switch: optional, `false` unless present, never takes a value.
 */
export function flag(options: FlagOptions): Argument<boolean> {
  return new Argument<boolean>({
    name: options.name,
    description: options.description,
    example: '',
    kind: 'boolean',
    flag: true,
    optional: true,
    default: false,
    converter: convertBoolean
  })
}

export interface SelectionOptions extends Omit<ArgumentOptions<string>, 'example' | 'validator'> {
  allowedValues: readonly string[]
  /** Defaults to the first allowed value. */
  example?: string
}

/**
 * String argument restricted to a fixed set of values.
 */
export function selection(options: SelectionOptions): Argument<string> {
  const [first] = options.allowedValues
  if (first === undefined) {
    throw new ArgumentDefinitionError('Selection needs at least one allowed value')
  }
  const allowed = new Set(options.allowedValues)
  return new Argument<string>({
    ...options,
    kind: 'string',
    example: options.example ?? first,
    converter: options.converter ?? convertString,
    validator: (value) => allowed.has(value)
  })
}
