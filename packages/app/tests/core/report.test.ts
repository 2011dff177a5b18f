import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { cliError } from "../../src/core/cli.js"
import { configError, fileError, parseError, renderAppError } from "../../src/core/errors.js"
import { makeLocation } from "../../src/core/location.js"
import type { CheckResult } from "../../src/core/report.js"
import { hasFailures, renderHumanResults, renderJsonResults } from "../../src/core/report.js"
import { sourceFromString } from "../../src/core/source.js"

const broken = sourceFromString("broken.json", "{\n\t\"a\" 1}")
// offset 7 is the `1` after the tab-indented key
const failure = parseError(makeLocation(broken, 7), "expected ':', found number")

const results: ReadonlyArray<CheckResult> = [
  { _tag: "Parsed", file: "ok.json", kind: "object" },
  { _tag: "Failed", file: "broken.json", error: failure }
]

describe("report", () => {
  it.effect("renders one line per input", () =>
    Effect.sync(() => {
      expect(renderHumanResults(results)).toBe(
        "ok.json: ok (object)\nbroken.json:2:13: expected ':', found number"
      )
    }))

  it.effect("renders JSON entries with 1-based positions for the requested tab size", () =>
    Effect.sync(() => {
      expect(JSON.parse(renderJsonResults(results, 4))).toEqual([
        { file: "ok.json", ok: true, kind: "object" },
        { file: "broken.json", ok: false, line: 2, column: 9, message: "expected ':', found number" }
      ])
    }))

  it.effect("detects failures", () =>
    Effect.sync(() => {
      expect(hasFailures(results)).toBe(true)
      expect(hasFailures(results.slice(0, 1))).toBe(false)
      expect(hasFailures([])).toBe(false)
    }))
})

describe("renderAppError", () => {
  it.effect("prefixes each error kind", () =>
    Effect.sync(() => {
      expect(renderAppError(failure)).toBe("broken.json:2:13: expected ':', found number")
      expect(renderAppError(fileError("gone"))).toBe("file error: gone")
      expect(renderAppError(configError("bad"))).toBe("config error: bad")
      expect(renderAppError(cliError("Unknown flag: --x"))).toBe("usage error: Unknown flag: --x")
    }))
})
