import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { cliError, parseCliArgs, STDIN_ARGUMENT } from "../core/cli.js"
import type { ResolvedSettings } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveSettings } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { describeKind } from "../core/json.js"
import { formatLocation, makeLocation } from "../core/location.js"
import { parse } from "../core/parse.js"
import type { CheckResult } from "../core/report.js"
import { hasFailures, renderHumanResults, renderJsonResults } from "../core/report.js"
import type { Source } from "../core/source.js"
import { loadConfigFile } from "../shell/config-file.js"
import { loadFile, loadStdin } from "../shell/source-loader.js"

// CHANGE: run check and locate over files or stdin
// WHY: syntax errors become exit code 1; every other failure stays a typed AppError
// QUOTE(TZ): "caller obtains a Source (via an external loader), calls `parse(source, options)`"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly results: ReadonlyArray<CheckResult>
  readonly output: string
  readonly exitCode: number
}

export interface ProgramIo {
  readonly stdin: Effect.Effect<Source, AppError>
}

const nodeIo: ProgramIo = { stdin: loadStdin }

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitOutput = (output: string, silent: boolean): Effect.Effect<void> =>
  silent || output.length === 0 ? Effect.void : writeStdout(output)

const loadInput = (
  input: string,
  io: ProgramIo
): Effect.Effect<Source, AppError, FileSystemService> => input === STDIN_ARGUMENT ? io.stdin : loadFile(input)

const checkInput = (
  input: string,
  settings: ResolvedSettings,
  io: ProgramIo
): Effect.Effect<CheckResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const source = yield* _(loadInput(input, io))
    const parsed = parse(source, settings.options, settings.tabSize)
    return Either.match(parsed, {
      onLeft: (error): CheckResult => ({ _tag: "Failed", file: source.fileName, error }),
      onRight: (value): CheckResult => ({ _tag: "Parsed", file: source.fileName, kind: describeKind(value) })
    })
  }).pipe(Effect.tap((result) => Effect.logDebug(`checked ${result.file}: ${result._tag}`)))

const handleCheck = (
  cli: CliArgs,
  settings: ResolvedSettings,
  io: ProgramIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const inputs = cli.files.length === 0 ? [STDIN_ARGUMENT] : cli.files
    const results = yield* _(
      Effect.forEach(inputs, (input) => checkInput(input, settings, io), { concurrency: 1 })
    )
    const output = cli.json ? renderJsonResults(results, settings.tabSize) : renderHumanResults(results)
    yield* _(emitOutput(output, cli.silent))
    return { results, output, exitCode: hasFailures(results) ? 1 : 0 }
  })

const handleLocate = (
  cli: CliArgs,
  settings: ResolvedSettings,
  io: ProgramIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const input = cli.files[0] ?? STDIN_ARGUMENT
    const offset = cli.offset ?? 0
    const source = yield* _(loadInput(input, io))
    if (offset > source.size) {
      return yield* _(
        Effect.fail(cliError(`--offset ${offset} is past the end of ${source.fileName} (${source.size} bytes)`))
      )
    }
    const output = formatLocation(makeLocation(source, offset), settings.tabSize)
    yield* _(emitOutput(output, cli.silent))
    return { results: [], output, exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs,
  settings: ResolvedSettings,
  io: ProgramIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli, settings, io)),
    Match.when("locate", () => handleLocate(cli, settings, io)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param io - Standard input provider; Node's stdin by default.
 * @returns ProgramResult with rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, stdin, stdout
 * @invariant exitCode is 1 iff some input failed to parse
 * @invariant stdin is read at most once per run
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  io: ProgramIo = nodeIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const fileConfig = yield* _(
        loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configPath !== undefined)
      )
      const settings = resolveSettings(cli, fileConfig)
      yield* _(Effect.logDebug(`settings: ${JSON.stringify(settings)}`))
      // stdin drains once; every `-` after the first reuses that Source
      const stdin = yield* _(Effect.cached(io.stdin))
      return yield* _(executeCommand(cli, settings, { stdin }))
    })
    return yield* _(
      program.pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })
