import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { Location } from "./location.js"
import { formatLocation } from "./location.js"
import { defaultTabSize } from "./source.js"

// CHANGE: unify the error algebra for the parser and the CLI tool
// WHY: syntax errors carry a Location; IO, config and CLI failures stay distinct kinds
// QUOTE(TZ): "Single error kind, `ParseError`, parameterized by a Location and a message"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError: e.formatted = formatLocation(e.location) ++ ": " ++ e.message
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ParseError.formatted never changes after construction
// COMPLEXITY: O(1)/O(1)

export type ParseError = {
  readonly _tag: "ParseError"
  readonly location: Location
  readonly message: string
  readonly formatted: string
}
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseError

// formatted eagerly, at construction
export const parseError = (
  location: Location,
  message: string,
  tabSize: number = defaultTabSize
): ParseError => ({
  _tag: "ParseError",
  location,
  message,
  formatted: `${formatLocation(location, tabSize)}: ${message}`
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

/**
 * Render any application error as a single line for stderr.
 *
 * @param error - Tagged application error.
 * @returns Human-readable message.
 *
 * @pure true
 * @invariant ParseError renders as its precomputed `formatted` text
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("ParseError", (value) => value.formatted),
    Match.tag("FileError", (value) => `file error: ${value.message}`),
    Match.tag("ConfigError", (value) => `config error: ${value.message}`),
    Match.tag("CliError", (value) => `usage error: ${value.message}`),
    Match.exhaustive
  )
