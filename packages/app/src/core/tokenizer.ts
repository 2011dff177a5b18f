import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import { makeLocation } from "./location.js"
import type { ParseOptions } from "./options.js"
import type { Source } from "./source.js"

// CHANGE: scan the Source buffer into tokens on demand
// WHY: the value parser pulls one token at a time; no token list is materialized
// QUOTE(TZ): "tokens are produced on demand"
// REF: req-tokenizer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t = nextToken(s): Right(t) → t.offset is the first byte of t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: errors point at the first offending byte
// COMPLEXITY: O(n) over the whole buffer

export type Punctuation = "{" | "}" | "[" | "]" | ":" | ","

export type Token =
  | { readonly kind: "punctuation"; readonly value: Punctuation; readonly offset: number }
  | { readonly kind: "string"; readonly value: string; readonly offset: number }
  | { readonly kind: "number"; readonly value: number; readonly offset: number }
  | { readonly kind: "literal"; readonly value: boolean | null; readonly offset: number }
  | { readonly kind: "end"; readonly offset: number }

export interface Scanner {
  readonly source: Source
  readonly bytes: Uint8Array
  readonly size: number
  readonly options: ParseOptions
  readonly tabSize: number
  offset: number
}

const SPACE = 0x20
const TAB = 0x09
const LINE_FEED = 0x0a
const CARRIAGE_RETURN = 0x0d
const DOUBLE_QUOTE = 0x22
const SINGLE_QUOTE = 0x27
const BACKSLASH = 0x5c
const PLUS = 0x2b
const MINUS = 0x2d
const DOT = 0x2e
const DIGIT_ZERO = 0x30
const DIGIT_NINE = 0x39
const LOWER_E = 0x65
const UPPER_E = 0x45
const LOWER_U = 0x75

const punctuationByByte: ReadonlyMap<number, Punctuation> = new Map(
  (["{", "}", "[", "]", ":", ","] as const).map((value): [number, Punctuation] => [value.charCodeAt(0), value])
)

const simpleEscapes: ReadonlyMap<number, string> = new Map([
  [DOUBLE_QUOTE, "\""],
  [BACKSLASH, "\\"],
  [0x2f, "/"],
  [0x62, "\b"],
  [0x66, "\f"],
  [0x6e, "\n"],
  [0x72, "\r"],
  [0x74, "\t"]
])

const literalWords: ReadonlyMap<string, boolean | null> = new Map([
  ["true", true],
  ["false", false],
  ["null", null]
])

const nonFiniteWords: ReadonlyMap<string, number> = new Map([
  ["Infinity", Number.POSITIVE_INFINITY],
  ["NaN", Number.NaN]
])

// ignoreBOM keeps a leading U+FEFF inside string contents
const utf8 = new TextDecoder("utf-8", { ignoreBOM: true })

const emptyBuffer = new Uint8Array(0)

export const makeScanner = (source: Source, options: ParseOptions, tabSize: number): Scanner => ({
  source,
  bytes: source.contents ?? emptyBuffer,
  size: source.size,
  options,
  tabSize,
  offset: 0
})

export const failAt = <A>(scanner: Scanner, offset: number, message: string): Either.Either<A, ParseError> =>
  Either.left(parseError(makeLocation(scanner.source, offset), message, scanner.tabSize))

const byteAt = (scanner: Scanner, offset: number): number | undefined =>
  offset < scanner.size ? scanner.bytes[offset] : undefined

const isDigit = (byte: number | undefined): boolean =>
  byte !== undefined && byte >= DIGIT_ZERO && byte <= DIGIT_NINE

const isWordByte = (byte: number | undefined): boolean =>
  byte !== undefined &&
  ((byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a) || isDigit(byte) || byte === 0x5f ||
    byte === 0x24)

const isLetter = (byte: number): boolean => (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a)

const hexValue = (byte: number | undefined): number | undefined => {
  if (byte === undefined) {
    return undefined
  }
  if (isDigit(byte)) {
    return byte - DIGIT_ZERO
  }
  if (byte >= 0x61 && byte <= 0x66) {
    return byte - 0x61 + 10
  }
  if (byte >= 0x41 && byte <= 0x46) {
    return byte - 0x41 + 10
  }
  return undefined
}

/**
 * Render a byte for an error message.
 *
 * @param byte - Byte value, or undefined at end of input.
 * @returns `'c'` for printable ASCII, `byte 0xNN` otherwise.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeByte = (byte: number | undefined): string => {
  if (byte === undefined) {
    return "end of input"
  }
  if (byte >= SPACE && byte < 0x7f) {
    return `'${String.fromCharCode(byte)}'`
  }
  return `byte 0x${byte.toString(16).toUpperCase().padStart(2, "0")}`
}

export const skipWhitespace = (scanner: Scanner): void => {
  for (;;) {
    const byte = byteAt(scanner, scanner.offset)
    if (byte !== SPACE && byte !== TAB && byte !== LINE_FEED && byte !== CARRIAGE_RETURN) {
      return
    }
    scanner.offset++
  }
}

const readWord = (scanner: Scanner, offset: number): string => {
  let end = offset
  while (isWordByte(byteAt(scanner, end))) {
    end++
  }
  return utf8.decode(scanner.bytes.subarray(offset, end))
}

const readHex4 = (scanner: Scanner, offset: number): Either.Either<number, ParseError> => {
  let code = 0
  for (let index = offset; index < offset + 4; index++) {
    const byte = byteAt(scanner, index)
    if (byte === undefined) {
      return failAt(scanner, index, "unterminated string")
    }
    const digit = hexValue(byte)
    if (digit === undefined) {
      return failAt(scanner, index, `invalid hex digit ${describeByte(byte)} in \\u escape`)
    }
    code = code * 16 + digit
  }
  return Either.right(code)
}

interface Escape {
  readonly text: string
  readonly next: number
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const readUnicodeEscape = (scanner: Scanner, offset: number): Either.Either<Escape, ParseError> => {
  // offset points at the first hex digit
  const high = readHex4(scanner, offset)
  if (Either.isLeft(high)) {
    return Either.left(high.left)
  }
  if (!isHighSurrogate(high.right)) {
    return Either.right({ text: String.fromCharCode(high.right), next: offset + 4 })
  }
  const pairStart = offset + 4
  if (byteAt(scanner, pairStart) !== BACKSLASH || byteAt(scanner, pairStart + 1) !== LOWER_U) {
    return failAt(scanner, pairStart, "high surrogate must be followed by a \\u low surrogate escape")
  }
  const low = readHex4(scanner, pairStart + 2)
  if (Either.isLeft(low)) {
    return Either.left(low.left)
  }
  if (!isLowSurrogate(low.right)) {
    return failAt(scanner, pairStart + 2, "high surrogate must be followed by a \\u low surrogate escape")
  }
  return Either.right({ text: String.fromCharCode(high.right, low.right), next: pairStart + 6 })
}

const readEscape = (scanner: Scanner, offset: number, quote: number): Either.Either<Escape, ParseError> => {
  // offset points at the byte after the backslash
  const byte = byteAt(scanner, offset)
  if (byte === undefined) {
    return failAt(scanner, offset, "unterminated string")
  }
  const simple = simpleEscapes.get(byte)
  if (simple !== undefined) {
    return Either.right({ text: simple, next: offset + 1 })
  }
  if (byte === SINGLE_QUOTE && quote === SINGLE_QUOTE) {
    return Either.right({ text: "'", next: offset + 1 })
  }
  if (byte === LOWER_U) {
    return readUnicodeEscape(scanner, offset + 1)
  }
  return failAt(scanner, offset, `invalid escape sequence: ${describeByte(byte)} after backslash`)
}

/**
 * Scan a quoted string starting at the current offset.
 *
 * @param scanner - Scanner positioned on the opening quote.
 * @returns String token, or ParseError at the offending byte.
 *
 * @pure false (advances scanner.offset)
 * @invariant the closing quote equals the opening quote
 * @complexity O(length)
 */
export const scanString = (scanner: Scanner): Either.Either<Token, ParseError> => {
  const start = scanner.offset
  const quote = byteAt(scanner, start) ?? DOUBLE_QUOTE
  const parts: Array<string> = []
  let index = start + 1
  let runStart = index
  for (;;) {
    const byte = byteAt(scanner, index)
    if (byte === undefined) {
      return failAt(scanner, index, "unterminated string")
    }
    if (byte === quote) {
      parts.push(utf8.decode(scanner.bytes.subarray(runStart, index)))
      scanner.offset = index + 1
      return Either.right({ kind: "string", value: parts.join(""), offset: start })
    }
    if (byte < SPACE) {
      return failAt(scanner, index, `invalid control character ${describeByte(byte)} in string`)
    }
    if (byte === BACKSLASH) {
      parts.push(utf8.decode(scanner.bytes.subarray(runStart, index)))
      const escape = readEscape(scanner, index + 1, quote)
      if (Either.isLeft(escape)) {
        return Either.left(escape.left)
      }
      parts.push(escape.right.text)
      index = escape.right.next
      runStart = index
      continue
    }
    index++
  }
}

const skipDigits = (scanner: Scanner, offset: number): number => {
  let index = offset
  while (isDigit(byteAt(scanner, index))) {
    index++
  }
  return index
}

const scanNonFinite = (
  scanner: Scanner,
  wordStart: number,
  negative: boolean
): Either.Either<Token, ParseError> | undefined => {
  const word = readWord(scanner, wordStart)
  const value = nonFiniteWords.get(word)
  if (value === undefined || (negative && word !== "Infinity")) {
    return undefined
  }
  const start = negative ? wordStart - 1 : wordStart
  const text = negative ? `-${word}` : word
  if (!scanner.options.allowInfinityAndNaN) {
    return failAt(scanner, start, `${text} is not allowed: Infinity and NaN literals are not enabled`)
  }
  scanner.offset = wordStart + word.length
  return Either.right({ kind: "number", value: negative ? -value : value, offset: start })
}

/**
 * Scan a number literal starting at the current offset.
 *
 * @param scanner - Scanner positioned on `-`, `+`, `.` or a digit.
 * @returns Number token, or ParseError at the first malformed byte.
 *
 * @pure false (advances scanner.offset)
 * @invariant `+` in the mantissa and a leading `.` need their options; `+` in the exponent does not
 * @complexity O(length)
 */
export const scanNumber = (scanner: Scanner): Either.Either<Token, ParseError> => {
  const { options } = scanner
  const start = scanner.offset
  let index = start
  const sign = byteAt(scanner, index)
  if (sign === MINUS) {
    const afterSign = byteAt(scanner, index + 1)
    if (afterSign !== undefined && isLetter(afterSign)) {
      const nonFinite = scanNonFinite(scanner, index + 1, true)
      if (nonFinite !== undefined) {
        return nonFinite
      }
    }
    index++
  } else if (sign === PLUS) {
    if (!options.allowExplicitPlusSignInMantissa) {
      return failAt(scanner, index, "explicit '+' sign on a number is not enabled")
    }
    index++
  }

  const first = byteAt(scanner, index)
  if (first === DIGIT_ZERO) {
    index++
    if (isDigit(byteAt(scanner, index))) {
      return failAt(scanner, index, "invalid number: leading zeros are not allowed")
    }
  } else if (isDigit(first)) {
    index = skipDigits(scanner, index)
  } else if (first === DOT) {
    if (!options.allowNumberToStartWithDot) {
      return failAt(scanner, index, "invalid number: a number starting with '.' is not enabled")
    }
  } else {
    return failAt(scanner, index, `invalid number: expected digit, found ${describeByte(first)}`)
  }

  if (byteAt(scanner, index) === DOT) {
    index++
    const digit = byteAt(scanner, index)
    if (!isDigit(digit)) {
      return failAt(scanner, index, `invalid number: expected digit after '.', found ${describeByte(digit)}`)
    }
    index = skipDigits(scanner, index)
  }

  const exponent = byteAt(scanner, index)
  if (exponent === LOWER_E || exponent === UPPER_E) {
    index++
    const exponentSign = byteAt(scanner, index)
    if (exponentSign === PLUS || exponentSign === MINUS) {
      index++
    }
    const digit = byteAt(scanner, index)
    if (!isDigit(digit)) {
      return failAt(scanner, index, `invalid number: expected digit in exponent, found ${describeByte(digit)}`)
    }
    index = skipDigits(scanner, index)
  }

  const text = utf8.decode(scanner.bytes.subarray(start, index))
  scanner.offset = index
  return Either.right({ kind: "number", value: Number(text), offset: start })
}

const scanWord = (scanner: Scanner): Either.Either<Token, ParseError> => {
  const start = scanner.offset
  const nonFinite = scanNonFinite(scanner, start, false)
  if (nonFinite !== undefined) {
    return nonFinite
  }
  const word = readWord(scanner, start)
  const literal = literalWords.get(word)
  if (literal === undefined) {
    return failAt(scanner, start, `unknown literal '${word}'`)
  }
  scanner.offset = start + word.length
  return Either.right({ kind: "literal", value: literal, offset: start })
}

/**
 * Skip whitespace and scan the next token.
 *
 * @param scanner - Scanner state; advanced past the token on success.
 * @returns The next token, an `end` token at end of buffer, or a ParseError.
 *
 * @pure false (advances scanner.offset)
 * @invariant an `end` token is produced only when offset = size
 * @complexity O(token length + whitespace)
 */
export const nextToken = (scanner: Scanner): Either.Either<Token, ParseError> => {
  skipWhitespace(scanner)
  const offset = scanner.offset
  const byte = byteAt(scanner, offset)
  if (byte === undefined) {
    return Either.right({ kind: "end", offset })
  }
  const punctuation = punctuationByByte.get(byte)
  if (punctuation !== undefined) {
    scanner.offset = offset + 1
    return Either.right({ kind: "punctuation", value: punctuation, offset })
  }
  if (byte === DOUBLE_QUOTE) {
    return scanString(scanner)
  }
  if (byte === SINGLE_QUOTE) {
    if (!scanner.options.allowSingleQuoteStrings) {
      return failAt(scanner, offset, "single-quoted strings are not enabled")
    }
    return scanString(scanner)
  }
  if (byte === MINUS || byte === PLUS || byte === DOT || isDigit(byte)) {
    return scanNumber(scanner)
  }
  if (isLetter(byte)) {
    return scanWord(scanner)
  }
  return failAt(scanner, offset, `unexpected character ${describeByte(byte)}`)
}

export const describeToken = (token: Token): string => {
  switch (token.kind) {
    case "punctuation":
      return `'${token.value}'`
    case "string":
      return "string"
    case "number":
      return "number"
    case "literal":
      return `'${String(token.value)}'`
    case "end":
      return "end of input"
  }
}
