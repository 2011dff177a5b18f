import type { LineAndColumn, LineAndIndex, Source } from "./source.js"
import { defaultTabSize, getLineAndColumn, getLineAndStartIndex } from "./source.js"

// CHANGE: pair a Source with a byte offset and render it as file:line:col
// WHY: every syntax error must carry a human-readable position
// QUOTE(TZ): "formats itself as `file:line:col`"
// REF: req-location-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: formatLocation(l) = name(l) ++ ":" ++ (line + 1) ++ ":" ++ (column + 1)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line/column values are 0-based; rendered text is 1-based
// COMPLEXITY: O(log lines + line length)

export interface Location {
  readonly source: Source | undefined
  readonly charIndex: number
}

export const unknownLocation: Location = { source: undefined, charIndex: 0 }

export const UNKNOWN_FILE_NAME = "<unknown>"

export const makeLocation = (source: Source | undefined, charIndex: number): Location => ({
  source,
  charIndex
})

export const locationLineAndStartIndex = (location: Location): LineAndIndex =>
  location.source === undefined
    ? { line: 0, index: 0 }
    : getLineAndStartIndex(location.source, location.charIndex)

export const locationLineAndColumn = (
  location: Location,
  tabSize: number = defaultTabSize
): LineAndColumn =>
  location.source === undefined
    ? { line: 0, column: 0 }
    : getLineAndColumn(location.source, location.charIndex, tabSize)

export const formatLineAndColumn = (value: LineAndColumn): string => `${value.line + 1}:${value.column + 1}`

const displayFileName = (location: Location): string => {
  const fileName = location.source?.fileName ?? ""
  return fileName.length === 0 ? UNKNOWN_FILE_NAME : fileName
}

/**
 * Append the rendered location to an existing text.
 *
 * @param buffer - Text to extend.
 * @param location - Location to render.
 * @param tabSize - Width of a tab stop used for the column.
 * @returns `buffer` followed by `file:line:col`.
 *
 * @pure true
 * @invariant a Location without a Source renders as `<unknown>:1:1`
 * @complexity O(log lines + line length)
 */
export const appendLocation = (
  buffer: string,
  location: Location,
  tabSize: number = defaultTabSize
): string => `${buffer}${displayFileName(location)}:${formatLineAndColumn(locationLineAndColumn(location, tabSize))}`

export const formatLocation = (location: Location, tabSize: number = defaultTabSize): string =>
  appendLocation("", location, tabSize)
