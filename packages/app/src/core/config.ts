import type { CliArgs } from "./cli.js"
import type { ParseOptions } from "./options.js"
import { defaultOptions, makeParseOptions, relaxedOptions } from "./options.js"
import { defaultTabSize } from "./source.js"

// CHANGE: define config merging rules and defaults for parse settings
// WHY: a flag given on the command line beats .locjsonrc.json, which beats the strict defaults
// QUOTE(TZ): "passed as explicit configuration values, never process-wide mutable state"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? preset(cli.relaxed ?? cfg.relaxed).k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved tabSize ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly relaxed?: boolean
  readonly allowInfinityAndNaN?: boolean
  readonly allowExplicitPlusSignInMantissa?: boolean
  readonly allowSingleQuoteStrings?: boolean
  readonly allowNumberToStartWithDot?: boolean
  readonly tabSize?: number
}

export interface ResolvedSettings {
  readonly options: ParseOptions
  readonly tabSize: number
}

export const DEFAULT_CONFIG_PATH = "./.locjsonrc.json"

export const defaultSettings: ResolvedSettings = {
  options: defaultOptions,
  tabSize: defaultTabSize
}

type OptionKey = keyof ParseOptions

const resolveFlag = (
  key: OptionKey,
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): boolean | undefined => cli[key] ?? fileConfig?.[key]

const resolveBase = (cli: CliArgs, fileConfig: FileConfig | undefined): ParseOptions =>
  (cli.relaxed ?? fileConfig?.relaxed ?? false) ? relaxedOptions : defaultOptions

const resolveOptions = (cli: CliArgs, fileConfig: FileConfig | undefined): ParseOptions => {
  const infinity = resolveFlag("allowInfinityAndNaN", cli, fileConfig)
  const plus = resolveFlag("allowExplicitPlusSignInMantissa", cli, fileConfig)
  const singleQuote = resolveFlag("allowSingleQuoteStrings", cli, fileConfig)
  const leadingDot = resolveFlag("allowNumberToStartWithDot", cli, fileConfig)
  return makeParseOptions(
    {
      ...(infinity === undefined ? {} : { allowInfinityAndNaN: infinity }),
      ...(plus === undefined ? {} : { allowExplicitPlusSignInMantissa: plus }),
      ...(singleQuote === undefined ? {} : { allowSingleQuoteStrings: singleQuote }),
      ...(leadingDot === undefined ? {} : { allowNumberToStartWithDot: leadingDot })
    },
    resolveBase(cli, fileConfig)
  )
}

/**
 * Resolve the effective parse settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .locjsonrc.json.
 * @returns Resolved options and tab size.
 *
 * @pure true
 * @invariant explicit flags win over the relaxed preset of either layer
 * @complexity O(1)
 */
export const resolveSettings = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedSettings => ({
  options: resolveOptions(cli, fileConfig),
  tabSize: cli.tabSize ?? fileConfig?.tabSize ?? defaultTabSize
})
