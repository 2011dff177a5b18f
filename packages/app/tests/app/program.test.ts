import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { Readable } from "node:stream"

import { runCli } from "../../src/app/program.js"
import { readSource, STDIN_FILE_NAME } from "../../src/shell/source-loader.js"
import { argv, provideNodeContext, stdinOf, withTempDir } from "./test-helpers.js"

describe("check", () => {
  it.effect("reports each file and exits 1 when one fails", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const good = yield* _(write("good.json", "{\"a\": [1, 2]}"))
        const bad = yield* _(write("bad.json", "{\n  \"a\": tru\n}"))
        const result = yield* _(runCli(argv("check", good, bad, "--silent")))
        expect(result.output).toBe(`${good}: ok (object)\n${bad}:2:8: unknown literal 'tru'`)
        expect(result.results.map((entry) => entry._tag)).toEqual(["Parsed", "Failed"])
        expect(result.exitCode).toBe(1)
      })
    )))

  it.effect("exits 0 when every input parses", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const file = yield* _(write("list.json", "[true, null]"))
        const result = yield* _(runCli(argv(file, "--silent")))
        expect(result.output).toBe(`${file}: ok (array)`)
        expect(result.exitCode).toBe(0)
      })
    )))

  it.effect("renders JSON results with the requested tab size", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const file = yield* _(write("tabs.json", "[\n\tx]"))
        const result = yield* _(runCli(argv(file, "--json", "--tab-size", "4", "--silent")))
        expect(JSON.parse(result.output)).toEqual([
          { file, ok: false, line: 2, column: 5, message: "unexpected character 'x'" }
        ])
        expect(result.exitCode).toBe(1)
      })
    )))

  it.effect("applies relaxed settings from a config file", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const config = yield* _(write("locjson.json", "{\"relaxed\": true}"))
        const file = yield* _(write("loose.json", "[.5, NaN, 'x', +1]"))
        const relaxed = yield* _(runCli(argv(file, "--config", config, "--silent")))
        expect(relaxed.exitCode).toBe(0)
        const strict = yield* _(runCli(argv(file, "--config", config, "--relaxed", "false", "--silent")))
        expect(strict.output).toBe(
          `${file}:1:2: invalid number: a number starting with '.' is not enabled`
        )
        expect(strict.exitCode).toBe(1)
      })
    )))

  it.effect("reads standard input for - and when no files are given", () =>
    provideNodeContext(
      Effect.gen(function*(_) {
        const dash = yield* _(runCli(argv("-", "--silent"), stdinOf("[1,\n\t2 3]")))
        expect(dash.output).toBe("<stdin>:2:11: expected ',' or ']', found number")
        expect(dash.exitCode).toBe(1)
        const implicit = yield* _(runCli(argv("--silent"), stdinOf("\"text\"")))
        expect(implicit.output).toBe("<stdin>: ok (string)")
      })
    ))

  it.effect("reads standard input once when - is given twice", () =>
    provideNodeContext(
      Effect.gen(function*(_) {
        const shared = Readable.from([Buffer.from("[1]")])
        const io = { stdin: readSource(STDIN_FILE_NAME, () => shared) }
        const result = yield* _(runCli(argv("check", "-", "-", "--silent"), io))
        expect(result.output).toBe("<stdin>: ok (array)\n<stdin>: ok (array)")
        expect(result.exitCode).toBe(0)
      })
    ))

  it.effect("fails with a file error for a missing input", () =>
    provideNodeContext(withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const error = yield* _(Effect.flip(runCli(argv(path.join(tempDir, "absent.json"), "--silent"))))
        expect(error._tag).toBe("FileError")
      })
    )))

  it.effect("fails with a usage error for an unknown flag", () =>
    provideNodeContext(
      Effect.gen(function*(_) {
        const error = yield* _(Effect.flip(runCli(argv("--frobnicate"))))
        expect(error._tag).toBe("CliError")
        expect(error.message).toBe("Unknown flag: --frobnicate")
      })
    ))
})

describe("locate", () => {
  it.effect("renders the location of a byte offset", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const file = yield* _(write("offsets.json", "ab\n\tcd"))
        const wide = yield* _(runCli(argv("locate", file, "--offset", "4", "--silent")))
        expect(wide.output).toBe(`${file}:2:9`)
        expect(wide.exitCode).toBe(0)
        const narrow = yield* _(runCli(argv("locate", file, "--offset", "4", "--tab-size", "2", "--silent")))
        expect(narrow.output).toBe(`${file}:2:3`)
      })
    )))

  it.effect("rejects an offset past the end of the input", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const file = yield* _(write("short.json", "ab\n\tcd"))
        const error = yield* _(Effect.flip(runCli(argv("locate", file, "--offset", "99", "--silent"))))
        expect(error.message).toBe(`--offset 99 is past the end of ${file} (6 bytes)`)
      })
    )))
})
