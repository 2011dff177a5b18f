import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs } from "../../src/core/cli.js"
import { argv } from "../app/test-helpers.js"

const parsedArgs = (...args: ReadonlyArray<string>): CliArgs => Either.getOrThrow(parseCliArgs(argv(...args)))

const usageError = (...args: ReadonlyArray<string>): string => {
  const parsed = parseCliArgs(argv(...args))
  return Either.isLeft(parsed) ? parsed.left.message : ""
}

describe("parseCliArgs", () => {
  it.effect("defaults to check with no inputs", () =>
    Effect.sync(() => {
      const args = parsedArgs()
      expect(args.command).toBe("check")
      expect(args.files).toEqual([])
      expect(args.relaxed).toBeUndefined()
      expect(args.json).toBe(false)
    }))

  it.effect("treats a leading non-command word as the first input", () =>
    Effect.sync(() => {
      const args = parsedArgs("a.json", "b.json")
      expect(args.command).toBe("check")
      expect(args.files).toEqual(["a.json", "b.json"])
    }))

  it.effect("keeps - as standard input rather than a flag", () =>
    Effect.sync(() => {
      expect(parsedArgs("check", "-", "--json").files).toEqual(["-"])
    }))

  it.effect("reads boolean switches alone or with an explicit value", () =>
    Effect.sync(() => {
      const args = parsedArgs("--relaxed", "false", "--allow-plus-sign", "in.json", "--allow-leading-dot=1")
      expect(args.relaxed).toBe(false)
      expect(args.allowExplicitPlusSignInMantissa).toBe(true)
      expect(args.allowNumberToStartWithDot).toBe(true)
      expect(args.allowSingleQuoteStrings).toBeUndefined()
      expect(args.files).toEqual(["in.json"])
    }))

  it.effect("reads value flags inline or from the next argument", () =>
    Effect.sync(() => {
      const args = parsedArgs("--tab-size=4", "--config", "custom.json", "x.json")
      expect(args.tabSize).toBe(4)
      expect(args.configPath).toBe("custom.json")
      expect(args.files).toEqual(["x.json"])
    }))

  it.effect("splits an inline value at the first = only", () =>
    Effect.sync(() => {
      expect(parsedArgs("--config=a=b.json").configPath).toBe("a=b.json")
      expect(parsedArgs("--config=").configPath).toBe("")
    }))

  it.effect("parses locate with its offset", () =>
    Effect.sync(() => {
      const args = parsedArgs("locate", "doc.json", "--offset", "12")
      expect(args.command).toBe("locate")
      expect(args.offset).toBe(12)
    }))

  it.effect("rejects unknown flags and missing values", () =>
    Effect.sync(() => {
      expect(usageError("--nope")).toBe("Unknown flag: --nope")
      expect(usageError("-x")).toBe("Unknown flag: -x")
      expect(usageError("--config")).toBe("Missing value for --config")
      expect(usageError("--config", "--json")).toBe("Missing value for --config")
      expect(usageError("--relaxed=maybe")).toBe("Invalid boolean value: maybe")
    }))

  it.effect("validates integer flags", () =>
    Effect.sync(() => {
      expect(usageError("--tab-size", "0")).toBe("--tab-size must be an integer ≥ 1")
      expect(usageError("--tab-size=two")).toBe("Invalid value for --tab-size: two")
      expect(usageError("locate", "f.json", "--offset=-1")).toBe("Invalid value for --offset: -1")
    }))

  it.effect("requires exactly one input and an offset for locate", () =>
    Effect.sync(() => {
      expect(usageError("locate", "--offset", "1")).toBe("locate expects exactly one input file")
      expect(usageError("locate", "a.json", "b.json", "--offset", "1")).toBe("locate expects exactly one input file")
      expect(usageError("locate", "a.json")).toBe("locate requires --offset")
    }))
})
