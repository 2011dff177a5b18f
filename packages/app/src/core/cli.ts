import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for locjson
// WHY: argv becomes a typed CliArgs before any file is opened
// QUOTE(TZ): "callers may opt into" syntax relaxations
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parseCliArgs(argv) = Right(a) ∧ a.command = locate → |a.files| = 1 ∧ a.offset ≠ undefined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and malformed integers are CliError, never silently dropped
// COMPLEXITY: O(n) flags; each input path copies the file list

export type CliCommand = "check" | "locate"

export interface CliArgs {
  readonly command: CliCommand
  /** Input paths; `-` is standard input. */
  readonly files: ReadonlyArray<string>
  readonly configPath: string | undefined
  readonly relaxed: boolean | undefined
  readonly allowInfinityAndNaN: boolean | undefined
  readonly allowExplicitPlusSignInMantissa: boolean | undefined
  readonly allowSingleQuoteStrings: boolean | undefined
  readonly allowNumberToStartWithDot: boolean | undefined
  readonly tabSize: number | undefined
  readonly offset: number | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const STDIN_ARGUMENT = "-"

const isFlag = (value: string): boolean => value.startsWith("-") && value !== STDIN_ARGUMENT

const isBooleanLiteral = (value: string): boolean =>
  value === "true" || value === "false" || value === "1" || value === "0"

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseInteger = (
  flagName: string,
  value: string,
  minimum: number
): Either.Either<number, CliError> => {
  if (!/^\d+$/.test(value)) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
  }
  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    return Either.left(cliError(`--${flagName} must be an integer ≥ ${minimum}`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): CliCommand | undefined =>
  Match.value(value).pipe(
    Match.when("check", (): CliCommand | undefined => "check"),
    Match.when("locate", (): CliCommand | undefined => "locate"),
    Match.orElse(() => undefined)
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  files: [],
  configPath: undefined,
  relaxed: undefined,
  allowInfinityAndNaN: undefined,
  allowExplicitPlusSignInMantissa: undefined,
  allowSingleQuoteStrings: undefined,
  allowNumberToStartWithDot: undefined,
  tabSize: undefined,
  offset: undefined,
  json: false,
  silent: false,
  verbose: false
})

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

// `--flag` alone means true; a following true/false/1/0 is taken as its value
const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && isBooleanLiteral(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  relaxed: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      relaxed: value
    })),
  "allow-infinity-nan": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      allowInfinityAndNaN: value
    })),
  "allow-plus-sign": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      allowExplicitPlusSignInMantissa: value
    })),
  "allow-single-quotes": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      allowSingleQuoteStrings: value
    })),
  "allow-leading-dot": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      allowNumberToStartWithDot: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value
      })),
  "tab-size": (current, inlineValue, nextValue) =>
    parseValueFlag("tab-size", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseInteger("tab-size", value, 1), (tabSize) => ({ ...args, tabSize }))),
  offset: (current, inlineValue, nextValue) =>
    parseValueFlag("offset", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseInteger("offset", value, 0), (offset) => ({ ...args, offset })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  // only the first `=` separates name from value
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

// A leading word that is not a command is the first input file.
const parseCommandFromArgs = (rawArgs: ReadonlyArray<string>): ParsedCommand => {
  const first = rawArgs[0]
  const command = first === undefined ? undefined : parseCommand(first)
  if (command === undefined) {
    return { command: "check", startIndex: 0 }
  }
  return { command, startIndex: 1 }
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      args = { ...args, files: [...args.files, current] }
      index += 1
      continue
    }
    const nextValue = rawArgs[index + 1]
    const parsed = parseFlag(current, nextValue, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const validateArgs = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.command === "locate") {
    if (args.files.length !== 1) {
      return Either.left(cliError("locate expects exactly one input file"))
    }
    if (args.offset === undefined) {
      return Either.left(cliError("locate requires --offset"))
    }
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const parsed = parseCommandFromArgs(rawArgs)
  return Either.flatMap(
    parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    validateArgs
  )
}
