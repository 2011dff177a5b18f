import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields that are present", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig({ relaxed: true, tabSize: 4 }))
      expect(config).toEqual({ relaxed: true, tabSize: 4 })
    }))

  it.effect("rejects a tab size below 1", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig({ tabSize: 0 })))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects non-boolean flags", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig({ allowSingleQuoteStrings: "yes" })))
      expect(error._tag).toBe("ConfigError")
      expect(error.message).toContain("allowSingleQuoteStrings")
    }))
})

describe("loadConfigFile", () => {
  it.effect("loads and decodes a config file", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const path = yield* _(write(".locjsonrc.json", "{\n  \"allowNumberToStartWithDot\": true,\n  \"tabSize\": 2\n}\n"))
        const config = yield* _(loadConfigFile(path, true))
        expect(config).toEqual({ allowNumberToStartWithDot: true, tabSize: 2 })
      })
    )))

  it.effect("loads a config whose unknown members nest deeply", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const depth = 100_000
        const path = yield* _(
          write("deep.json", "{\"x\":" + "[".repeat(depth) + "]".repeat(depth) + ",\"tabSize\":3}")
        )
        const config = yield* _(loadConfigFile(path, true))
        expect(config).toEqual({ tabSize: 3 })
      })
    )))

  it.effect("returns undefined for a missing default config", () =>
    provideNodeContext(withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, ".locjsonrc.json"), false))
        expect(config).toBeUndefined()
      })
    )))

  it.effect("fails for a missing config named explicitly", () =>
    provideNodeContext(withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "custom.json")
        const error = yield* _(Effect.flip(loadConfigFile(missing, true)))
        expect(error._tag).toBe("FileError")
        expect(error.message).toBe(`Config file not found: ${missing}`)
      })
    )))

  it.effect("parses the config strictly and reports the location of a syntax error", () =>
    provideNodeContext(withTempDir(({ write }) =>
      Effect.gen(function*(_) {
        const path = yield* _(write("loose.json", "{relaxed: true}"))
        const error = yield* _(Effect.flip(loadConfigFile(path, true)))
        expect(error._tag).toBe("ConfigError")
        expect(error.message).toBe(`${path}:1:2: unknown literal 'relaxed'`)
      })
    )))
})
