import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import { defaultSettings } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { toPlainJson } from "../core/json.js"
import type { Json } from "../core/json.js"
import { parseFile } from "./source-loader.js"

// CHANGE: decode .locjsonrc.json with schema validation
// WHY: the config file goes through locjson's own strict parser, then a schema
// QUOTE(TZ): "ParseOptions is an immutable configuration value passed into `parse`"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decodeConfig(c) = Right(cfg) → cfg.tabSize = undefined ∨ cfg.tabSize ∈ ℕ⁺
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless it was named explicitly
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    relaxed: S.Boolean,
    allowInfinityAndNaN: S.Boolean,
    allowExplicitPlusSignInMantissa: S.Boolean,
    allowSingleQuoteStrings: S.Boolean,
    allowNumberToStartWithDot: S.Boolean,
    tabSize: S.Number.pipe(S.int(), S.greaterThanOrEqualTo(1))
  })
)

export const decodeConfig = (raw: Json): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(RawConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.relaxed === undefined ? {} : { relaxed: config.relaxed }),
      ...(config.allowInfinityAndNaN === undefined ? {} : { allowInfinityAndNaN: config.allowInfinityAndNaN }),
      ...(config.allowExplicitPlusSignInMantissa === undefined
        ? {}
        : { allowExplicitPlusSignInMantissa: config.allowExplicitPlusSignInMantissa }),
      ...(config.allowSingleQuoteStrings === undefined
        ? {}
        : { allowSingleQuoteStrings: config.allowSingleQuoteStrings }),
      ...(config.allowNumberToStartWithDot === undefined
        ? {}
        : { allowNumberToStartWithDot: config.allowNumberToStartWithDot }),
      ...(config.tabSize === undefined ? {} : { tabSize: config.tabSize })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

// the config itself is strict JSON
const readConfigJson = (path: string): Effect.Effect<Json, AppError, FileSystemService> =>
  pipe(
    parseFile(path, defaultSettings),
    Effect.map((value) => toPlainJson(value)),
    Effect.mapError((error) => error._tag === "ParseError" ? configError(error.formatted) : error)
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const raw = yield* _(readConfigJson(path))
    const decoded = yield* _(decodeConfig(raw))
    yield* _(Effect.logDebug(`loaded config ${path}`))
    return decoded
  })
