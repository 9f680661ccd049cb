import { UnterminatedQuoteError } from '../core/errors.js'

/** Characters that open and close a quoted region. */
export const QUOTE_CHARS = ['"', "'"] as const

export type QuoteChar = (typeof QUOTE_CHARS)[number]

const ESCAPE_CHAR = '\\'

/**
 * A unit of argument text.
 *
 * Quote characters are kept in `text`; they are only stripped once the
 * resolver decides the token is a value.
 */
export interface Token {
  text: string
  quoted: boolean
}

function isQuoteChar(ch: string): ch is QuoteChar {
  return ch === '"' || ch === "'"
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'
}

/** Returns true when `text` is wrapped in one matching pair of quotes. */
export function isQuoted(text: string): boolean {
  if (text.length < 2) return false
  const first = text.charAt(0)
  return isQuoteChar(first) && text.endsWith(first)
}

/** Removes one enclosing pair of quotes, if present. */
export function stripQuotes(text: string): string {
  return isQuoted(text) ? text.slice(1, -1) : text
}

/**
 * Splits argument text into quote-aware tokens in a single pass.
 *
 * - Whitespace outside quotes separates tokens; runs of it collapse.
 * - `"` or `'` opens a region closed only by the same character.
 * - Inside a region `\` followed by the open quote yields that quote;
 *   any other backslash is kept as is.
 *
 * @throws UnterminatedQuoteError when input ends inside a quoted region.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = []
  let current = ''
  let inToken = false
  let openQuote: QuoteChar | null = null
  let openedAt = -1

  const flush = (): void => {
    if (!inToken) return
    tokens.push({ text: current, quoted: isQuoted(current) })
    current = ''
    inToken = false
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)

    if (openQuote) {
      if (ch === ESCAPE_CHAR && text.charAt(i + 1) === openQuote) {
        current += openQuote
        i++
        continue
      }
      current += ch
      if (ch === openQuote) openQuote = null
      continue
    }

    if (isWhitespace(ch)) {
      flush()
      continue
    }

    if (isQuoteChar(ch)) {
      openQuote = ch
      openedAt = i
    }
    current += ch
    inToken = true
  }

  if (openQuote) {
    throw new UnterminatedQuoteError(openQuote, openedAt)
  }

  flush()
  return tokens
}
