import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import type { JsonValue } from "./json.js"
import type { ParseOptions } from "./options.js"
import { defaultOptions } from "./options.js"
import type { Source } from "./source.js"
import { defaultTabSize } from "./source.js"
import type { Scanner, Token } from "./tokenizer.js"
import { describeToken, failAt, makeScanner, nextToken } from "./tokenizer.js"

// CHANGE: build the value tree from the token stream with an explicit frame stack
// WHY: nesting depth must not be limited by the call stack
// QUOTE(TZ): "the first error aborts the entire parse and is the only error surfaced"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s,o: parse(s,o) = Right(v) → v is the only value in s ∧ s has no trailing data
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no partial value is returned on failure
// COMPLEXITY: O(n) time, O(depth) heap

interface ArrayFrame {
  readonly kind: "array"
  readonly items: Array<JsonValue>
}

interface ObjectFrame {
  readonly kind: "object"
  readonly members: Map<string, JsonValue>
  key: string
}

type Frame = ArrayFrame | ObjectFrame

const unterminated = (frame: Frame | undefined): string =>
  frame === undefined
    ? "premature end of input"
    : frame.kind === "array"
    ? "unterminated array"
    : "unterminated object"

const expectValue = <A>(scanner: Scanner, token: Token, parent: Frame | undefined): Either.Either<A, ParseError> =>
  token.kind === "end"
    ? failAt(scanner, token.offset, unterminated(parent))
    : failAt(scanner, token.offset, `expected value, found ${describeToken(token)}`)

// Reads `"name" :` and leaves the scanner before the member value.
const readMemberName = (
  scanner: Scanner,
  token: Token,
  frame: Frame
): Either.Either<string, ParseError> => {
  if (token.kind === "end") {
    return failAt(scanner, token.offset, unterminated(frame))
  }
  if (token.kind !== "string") {
    return failAt(
      scanner,
      token.offset,
      `expected string for object member name, found ${describeToken(token)}`
    )
  }
  const colon = nextToken(scanner)
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  if (colon.right.kind === "end") {
    return failAt(scanner, colon.right.offset, unterminated(frame))
  }
  if (colon.right.kind !== "punctuation" || colon.right.value !== ":") {
    return failAt(scanner, colon.right.offset, `expected ':', found ${describeToken(colon.right)}`)
  }
  return Either.right(token.value)
}

type Opened =
  | { readonly _tag: "Scalar"; readonly value: JsonValue }
  | { readonly _tag: "Frame"; readonly frame: Frame; readonly next: Token }

// Consumes the first token of a value: a scalar completes at once, a non-empty container opens a frame.
const openValue = (
  scanner: Scanner,
  token: Token,
  parent: Frame | undefined
): Either.Either<Opened, ParseError> => {
  if (token.kind === "end") {
    return expectValue(scanner, token, parent)
  }
  if (token.kind !== "punctuation") {
    return Either.right({ _tag: "Scalar", value: token.value })
  }
  if (token.value !== "[" && token.value !== "{") {
    return expectValue(scanner, token, parent)
  }
  const first = nextToken(scanner)
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  const after = first.right
  if (token.value === "[") {
    if (after.kind === "punctuation" && after.value === "]") {
      return Either.right({ _tag: "Scalar", value: [] })
    }
    return Either.right({ _tag: "Frame", frame: { kind: "array", items: [] }, next: after })
  }
  if (after.kind === "punctuation" && after.value === "}") {
    return Either.right({ _tag: "Scalar", value: new Map<string, JsonValue>() })
  }
  const frame: ObjectFrame = { kind: "object", members: new Map(), key: "" }
  const key = readMemberName(scanner, after, frame)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  frame.key = key.right
  const valueToken = nextToken(scanner)
  if (Either.isLeft(valueToken)) {
    return Either.left(valueToken.left)
  }
  return Either.right({ _tag: "Frame", frame, next: valueToken.right })
}

type Continuation =
  | { readonly _tag: "Next"; readonly token: Token }
  | { readonly _tag: "Closed"; readonly value: JsonValue }

// Stores a completed value in `frame` and reads the separator that follows it.
const attach = (
  scanner: Scanner,
  frame: Frame,
  value: JsonValue
): Either.Either<Continuation, ParseError> => {
  if (frame.kind === "array") {
    frame.items.push(value)
  } else {
    // last occurrence wins; the key keeps its first position
    frame.members.set(frame.key, value)
  }
  const close = frame.kind === "array" ? "]" : "}"
  const separator = nextToken(scanner)
  if (Either.isLeft(separator)) {
    return Either.left(separator.left)
  }
  const token = separator.right
  if (token.kind === "end") {
    return failAt(scanner, token.offset, unterminated(frame))
  }
  if (token.kind === "punctuation" && token.value === close) {
    return Either.right({ _tag: "Closed", value: frame.kind === "array" ? frame.items : frame.members })
  }
  if (token.kind !== "punctuation" || token.value !== ",") {
    return failAt(scanner, token.offset, `expected ',' or '${close}', found ${describeToken(token)}`)
  }
  const next = nextToken(scanner)
  if (Either.isLeft(next)) {
    return Either.left(next.left)
  }
  if (frame.kind === "array") {
    return Either.right({ _tag: "Next", token: next.right })
  }
  const key = readMemberName(scanner, next.right, frame)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  frame.key = key.right
  const valueToken = nextToken(scanner)
  if (Either.isLeft(valueToken)) {
    return Either.left(valueToken.left)
  }
  return Either.right({ _tag: "Next", token: valueToken.right })
}

const finish = (scanner: Scanner, value: JsonValue): Either.Either<JsonValue, ParseError> => {
  const trailing = nextToken(scanner)
  if (Either.isLeft(trailing)) {
    return Either.left(trailing.left)
  }
  if (trailing.right.kind !== "end") {
    return failAt(scanner, trailing.right.offset, `unexpected data after value: ${describeToken(trailing.right)}`)
  }
  return Either.right(value)
}

/**
 * Parse a whole Source into a value tree.
 *
 * @param source - Source to parse; never mutated.
 * @param options - Grammar relaxations; strict JSON by default.
 * @param tabSize - Tab width used when rendering error locations.
 * @returns Either with the value tree or the first ParseError.
 *
 * @pure true
 * @invariant all mutable state is local to one call
 * @complexity O(n)
 */
export const parse = (
  source: Source,
  options: ParseOptions = defaultOptions,
  tabSize: number = defaultTabSize
): Either.Either<JsonValue, ParseError> => {
  const scanner = makeScanner(source, options, tabSize)
  const stack: Array<Frame> = []
  const first = nextToken(scanner)
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  let token = first.right
  for (;;) {
    const opened = openValue(scanner, token, stack[stack.length - 1])
    if (Either.isLeft(opened)) {
      return Either.left(opened.left)
    }
    if (opened.right._tag === "Frame") {
      stack.push(opened.right.frame)
      token = opened.right.next
      continue
    }
    let value = opened.right.value
    for (;;) {
      const frame = stack[stack.length - 1]
      if (frame === undefined) {
        return finish(scanner, value)
      }
      const step = attach(scanner, frame, value)
      if (Either.isLeft(step)) {
        return Either.left(step.left)
      }
      if (step.right._tag === "Next") {
        token = step.right.token
        break
      }
      stack.pop()
      value = step.right.value
    }
  }
}
