import { Match } from "effect"

import type { ParseError } from "./errors.js"
import type { JsonKind } from "./json.js"
import { locationLineAndColumn } from "./location.js"

// CHANGE: describe check outcomes and render output formats
// WHY: check results render the same way for humans and for --json consumers
// QUOTE(TZ): "Rendered error format (stable, consumed by tooling/tests)"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Failed: renderHuman(r) = r.error.formatted
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: results keep input order
// COMPLEXITY: O(n)

export type CheckResult =
  | { readonly _tag: "Parsed"; readonly file: string; readonly kind: JsonKind }
  | { readonly _tag: "Failed"; readonly file: string; readonly error: ParseError }

export const hasFailures = (results: ReadonlyArray<CheckResult>): boolean =>
  results.some((result) => result._tag === "Failed")

const formatResult = (result: CheckResult): string =>
  Match.value(result).pipe(
    Match.tag("Parsed", (value) => `${value.file}: ok (${value.kind})`),
    Match.tag("Failed", (value) => value.error.formatted),
    Match.exhaustive
  )

/**
 * Render one line per checked input.
 *
 * @param results - Check outcomes in input order.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant failed inputs render exactly as ParseError.formatted
 * @complexity O(n)
 */
export const renderHumanResults = (results: ReadonlyArray<CheckResult>): string =>
  results.map((result) => formatResult(result)).join("\n")

const toJsonEntry = (result: CheckResult, tabSize: number) =>
  Match.value(result).pipe(
    Match.tag("Parsed", (value) => ({ file: value.file, ok: true, kind: value.kind })),
    Match.tag("Failed", (value) => {
      const position = locationLineAndColumn(value.error.location, tabSize)
      return {
        file: value.file,
        ok: false,
        line: position.line + 1,
        column: position.column + 1,
        message: value.error.message
      }
    }),
    Match.exhaustive
  )

/**
 * Render results as JSON text; line and column are 1-based like the human form.
 */
export const renderJsonResults = (results: ReadonlyArray<CheckResult>, tabSize: number): string =>
  JSON.stringify(
    results.map((result) => toJsonEntry(result, tabSize)),
    null,
    2
  )
