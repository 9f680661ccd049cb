import { ARG_VALUE_SEPARATOR, type ArgumentSchema } from '../arguments/argument.js'
import {
  AliasOrderViolationError,
  DuplicateArgumentAliasError,
  MissingArgumentValueError,
  UnexpectedFlagValueError,
  UnknownArgumentError
} from '../core/errors.js'
import { stripQuotes, tokenize, type Token } from './tokenizer.js'

/** Prefixes marking a named argument key, longest first. */
export const ARG_NAMING_PREFIXES = ['--', '-'] as const

const FLAG_PRESENT_VALUE = 'true'

/** Canonical argument name → converted value. */
export type ParsedArguments = Record<string, unknown>

/** Returns true when the token can only be read as an argument key. */
export function isArgumentKey(token: Token): boolean {
  return !token.quoted && ARG_NAMING_PREFIXES.some((prefix) => token.text.startsWith(prefix))
}

function removeNamingPrefix(text: string): string {
  const prefix = ARG_NAMING_PREFIXES.find((p) => text.startsWith(p))
  return prefix ? text.slice(prefix.length) : text
}

/**
 * Checks a command's argument list once, at registration time.
 *
 * @throws DuplicateArgumentAliasError when two arguments share an alias
 * @throws AliasOrderViolationError when a required positional argument
 *   follows an optional one (flags are never positional and are exempt)
 */
export function validateArgumentSchemas(schemas: readonly ArgumentSchema[]): void {
  const aliases = new Set<string>()
  for (const schema of schemas) {
    for (const name of schema.names) {
      if (aliases.has(name)) throw new DuplicateArgumentAliasError(name)
      aliases.add(name)
    }
  }

  let firstOptional: ArgumentSchema | undefined
  for (const schema of schemas) {
    if (schema.isFlag) continue
    if (schema.optional) {
      firstOptional ??= schema
    } else if (firstOptional) {
      throw new AliasOrderViolationError(schema.name, firstOptional.name)
    }
  }
}

/**
 * Pool of arguments that have not received a value yet, indexed by alias.
 */
class SchemaPool {
  private readonly byAlias = new Map<string, ArgumentSchema>()
  private readonly pending: ArgumentSchema[]

  constructor(schemas: readonly ArgumentSchema[]) {
    this.pending = [...schemas]
    for (const schema of schemas) {
      for (const name of schema.names) this.byAlias.set(name, schema)
    }
  }

  lookup(alias: string): ArgumentSchema | undefined {
    return this.byAlias.get(alias)
  }

  take(schema: ArgumentSchema): void {
    for (const name of schema.names) this.byAlias.delete(name)
    const idx = this.pending.indexOf(schema)
    if (idx >= 0) this.pending.splice(idx, 1)
  }

  remaining(): readonly ArgumentSchema[] {
    return this.pending
  }

  /**
   * Splits `-fF` style keys into the flags they name. Returns undefined
   * unless every character is the single-character alias of a distinct,
   * still unsatisfied flag.
   */
  bundledFlags(name: string): ArgumentSchema[] | undefined {
    if (!name) return undefined
    const flags: ArgumentSchema[] = []
    for (const ch of name) {
      const schema = this.byAlias.get(ch)
      if (!schema || !schema.isFlag || flags.includes(schema)) return undefined
      flags.push(schema)
    }
    return flags
  }
}

/**
 * Maps tokens onto declared arguments.
 *
 * 1. Named pass: `--name value`, `-n value`, `--name=value`, flags and
 *    bundled single-character flags (`-fF`), left to right.
 * 2. Positional pass: leftover tokens fill the remaining non-flag
 *    arguments in declaration order; extra tokens are ignored.
 * 3. Defaulting pass: every argument still without a value gets its default
 *    or fails as missing, in declaration order.
 */
export function resolveArguments(tokens: readonly Token[], schemas: readonly ArgumentSchema[]): ParsedArguments {
  const pool = new SchemaPool(schemas)
  const values = new Map<ArgumentSchema, unknown>()
  const consumed = new Set<number>()

  for (let idx = 0; idx < tokens.length; idx++) {
    const token = tokens[idx]
    if (!token || consumed.has(idx) || !isArgumentKey(token)) continue
    consumed.add(idx)

    const key = token.text
    let name = removeNamingPrefix(key)
    let inlineValue: string | undefined
    const sep = name.indexOf(ARG_VALUE_SEPARATOR)
    if (sep >= 0) {
      inlineValue = name.slice(sep + 1)
      name = name.slice(0, sep)
    }

    const schema = pool.lookup(name)
    if (!schema) {
      const bundled = inlineValue === undefined ? pool.bundledFlags(name) : undefined
      if (!bundled) throw new UnknownArgumentError(key)
      for (const flagSchema of bundled) {
        values.set(flagSchema, flagSchema.parse(FLAG_PRESENT_VALUE))
        pool.take(flagSchema)
      }
      continue
    }

    if (schema.isFlag) {
      if (inlineValue !== undefined) throw new UnexpectedFlagValueError(key)
      values.set(schema, schema.parse(FLAG_PRESENT_VALUE))
      pool.take(schema)
      continue
    }

    let raw = inlineValue
    if (raw === undefined) {
      const next = tokens[idx + 1]
      if (!next) throw new MissingArgumentValueError(key)
      if (isArgumentKey(next)) throw new MissingArgumentValueError(key, next.text)
      consumed.add(idx + 1)
      raw = next.text
    }

    values.set(schema, schema.parse(stripQuotes(raw)))
    pool.take(schema)
  }

  const positional = pool.remaining().filter((schema) => !schema.isFlag)
  let slot = 0
  for (let idx = 0; idx < tokens.length && slot < positional.length; idx++) {
    const token = tokens[idx]
    if (!token || consumed.has(idx)) continue
    const schema = positional[slot++]
    if (!schema) break
    values.set(schema, schema.parse(stripQuotes(token.text)))
    consumed.add(idx)
  }

  // Own data properties, so names like `__proto__` keep their value
  return Object.fromEntries(
    schemas.map((schema): [string, unknown] => [
      schema.name,
      values.has(schema) ? values.get(schema) : schema.parse(undefined)
    ])
  )
}

/** Tokenizes argument text and resolves it against `schemas`. */
export function parseArguments(text: string, schemas: readonly ArgumentSchema[]): ParsedArguments {
  return resolveArguments(tokenize(text), schemas)
}
