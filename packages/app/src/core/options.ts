// CHANGE: define the grammar toggles for relaxed JSON
// WHY: every option-dependent grammar decision reads this value, never a global
// QUOTE(TZ): "default all false (strict JSON per RFC 8259)"
// REF: req-options-1
// SOURCE: n/a
// FORMAT THEOREM: relaxedOptions = ∀flag: true; defaultOptions = ∀flag: false
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: options are immutable values
// COMPLEXITY: O(1)/O(1)

export interface ParseOptions {
  /** `Infinity`, `-Infinity` and `NaN` are numbers. */
  readonly allowInfinityAndNaN: boolean
  /** A number may start with `+`. The exponent takes `+` regardless. */
  readonly allowExplicitPlusSignInMantissa: boolean
  readonly allowSingleQuoteStrings: boolean
  /** `.5` is a number. */
  readonly allowNumberToStartWithDot: boolean
}

export const defaultOptions: ParseOptions = {
  allowInfinityAndNaN: false,
  allowExplicitPlusSignInMantissa: false,
  allowSingleQuoteStrings: false,
  allowNumberToStartWithDot: false
}

export const relaxedOptions: ParseOptions = {
  allowInfinityAndNaN: true,
  allowExplicitPlusSignInMantissa: true,
  allowSingleQuoteStrings: true,
  allowNumberToStartWithDot: true
}

export const makeParseOptions = (
  overrides: Partial<ParseOptions>,
  base: ParseOptions = defaultOptions
): ParseOptions => ({
  allowInfinityAndNaN: overrides.allowInfinityAndNaN ?? base.allowInfinityAndNaN,
  allowExplicitPlusSignInMantissa: overrides.allowExplicitPlusSignInMantissa ??
    base.allowExplicitPlusSignInMantissa,
  allowSingleQuoteStrings: overrides.allowSingleQuoteStrings ?? base.allowSingleQuoteStrings,
  allowNumberToStartWithDot: overrides.allowNumberToStartWithDot ?? base.allowNumberToStartWithDot
})
