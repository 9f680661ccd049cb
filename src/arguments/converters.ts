/** Turns raw argument text into a typed value; throws on bad input. */
export type Converter<T> = (raw: string) => T

/** Accepts or rejects an already converted value. */
export type Validator<T> = (value: T) => boolean

export type BuiltinKind = 'string' | 'boolean' | 'integer' | 'float'

/** All value kinds an argument can declare. `custom` needs its own converter. */
export type ValueKind = BuiltinKind | 'custom'

/** Value type produced by each built-in kind. */
export interface BuiltinValue {
  string: string
  boolean: boolean
  integer: number
  float: number
}

const TRUE_WORDS = new Set(['y', 'yes', 'true', 't', '1'])
const FALSE_WORDS = new Set(['n', 'no', 'false', 'f', '0'])

const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

export function convertString(raw: string): string {
  return raw
}

export function convertBoolean(raw: string): boolean {
  const word = raw.trim().toLowerCase()
  if (TRUE_WORDS.has(word)) return true
  if (FALSE_WORDS.has(word)) return false
  throw new Error(`'${raw}' is not a boolean value`)
}

export function convertInteger(raw: string): number {
  const text = raw.trim()
  if (!INTEGER_PATTERN.test(text)) {
    throw new Error(`'${raw}' is not an integer`)
  }
  const value = Number.parseInt(text, 10)
  if (!Number.isSafeInteger(value)) {
    throw new Error(`'${raw}' is out of range`)
  }
  return value
}

/** Parses a decimal number; a trailing `%` divides the result by 100. */
export function convertFloat(raw: string): number {
  let text = raw.trim()
  const percent = text.endsWith('%')
  if (percent) text = text.slice(0, -1).trimEnd()

  if (!FLOAT_PATTERN.test(text)) {
    throw new Error(`'${raw}' is not a number`)
  }
  const value = Number(text)
  if (!Number.isFinite(value)) {
    throw new Error(`'${raw}' is out of range`)
  }
  return percent ? value / 100 : value
}

/** Default converter for every built-in kind. */
export const BUILTIN_CONVERTERS: { [K in BuiltinKind]: Converter<BuiltinValue[K]> } = {
  string: convertString,
  boolean: convertBoolean,
  integer: convertInteger,
  float: convertFloat
}
