// CHANGE: model an input text as an immutable byte buffer with a line-start index
// WHY: map byte offsets to line/column in O(log lines) plus one scan of the line
// QUOTE(TZ): "answers offset→(line,column) queries"
// REF: req-source-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i ≤ size: getLineAndStartIndex(s, i).line = |{j < i : contents[j] = '\n' ∧ j + 1 < size}|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: lineStartIndexes is strictly increasing and every entry < size
// COMPLEXITY: O(size) to build, O(log lines + line length) per query

export interface Source {
  readonly fileName: string
  readonly contents: Uint8Array | undefined
  readonly size: number
  /** Offsets following each newline; line 0 (offset 0) is implicit. */
  readonly lineStartIndexes: ReadonlyArray<number>
}

export interface LineAndIndex {
  readonly line: number
  readonly index: number
}

export interface LineAndColumn {
  readonly line: number
  readonly column: number
}

export const defaultTabSize = 8

const NEWLINE = 0x0a
const TAB = 0x09

const textEncoder = new TextEncoder()

/**
 * Collect the offset of every byte that follows a newline.
 *
 * @param contents - Raw buffer.
 * @param size - Number of bytes of `contents` that belong to the source.
 * @returns Strictly increasing line start offsets, excluding offset 0.
 *
 * @pure true
 * @invariant every entry is < size
 * @complexity O(size)
 */
export const findLineStartIndexes = (
  contents: Uint8Array,
  size: number
): ReadonlyArray<number> => {
  const result: Array<number> = []
  const limit = Math.min(size, contents.length)
  for (let index = 0; index + 1 < limit; index++) {
    if (contents[index] === NEWLINE) {
      result.push(index + 1)
    }
  }
  return result
}

const makeSource = (fileName: string, contents: Uint8Array): Source => ({
  fileName,
  contents,
  size: contents.length,
  lineStartIndexes: findLineStartIndexes(contents, contents.length)
})

/**
 * Wrap a shared buffer without copying it. Only the first `size` bytes are visible.
 */
export const sourceFromBuffer = (fileName: string, contents: Uint8Array, size: number): Source =>
  makeSource(fileName, contents.subarray(0, Math.max(0, size)))

export const sourceFromString = (fileName: string, text: string): Source =>
  makeSource(fileName, textEncoder.encode(text))

export const sourceFromBytes = (fileName: string, bytes: ReadonlyArray<number>): Source =>
  makeSource(fileName, Uint8Array.from(bytes, (byte) => byte & 0xff))

// Same memory, unsigned view.
export const sourceFromSignedBytes = (fileName: string, bytes: Int8Array): Source =>
  makeSource(fileName, new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.length))

export const emptySource = (fileName: string): Source => ({
  fileName,
  contents: undefined,
  size: 0,
  lineStartIndexes: []
})

export const hasContents = (source: Source): boolean => source.contents !== undefined

/**
 * Find the line containing `charIndex` and the offset where that line starts.
 *
 * @param source - Source with a precomputed line index.
 * @param charIndex - Byte offset.
 * @returns 0-based line number and line start offset.
 *
 * @pure true
 * @invariant result.index ≤ charIndex whenever charIndex ≥ 0
 * @complexity O(log lines)
 */
export const getLineAndStartIndex = (source: Source, charIndex: number): LineAndIndex => {
  const starts = source.lineStartIndexes
  // count of line starts ≤ charIndex
  let low = 0
  let high = starts.length
  while (low < high) {
    const mid = (low + high) >>> 1
    const start = starts[mid] ?? 0
    if (start <= charIndex) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  if (low === 0) {
    return { line: 0, index: 0 }
  }
  return { line: low, index: starts[low - 1] ?? 0 }
}

const nextTabStop = (column: number, tabSize: number): number => (Math.floor(column / tabSize) + 1) * tabSize

/**
 * Resolve a byte offset to a line and a tab-expanded column.
 *
 * @param source - Source with a precomputed line index.
 * @param charIndex - Byte offset.
 * @param tabSize - Width of a tab stop.
 * @returns 0-based line and 0-based visual column.
 *
 * @pure true
 * @invariant a tab moves the column to the next multiple of tabSize
 * @complexity O(log lines + line length)
 */
export const getLineAndColumn = (
  source: Source,
  charIndex: number,
  tabSize: number = defaultTabSize
): LineAndColumn => {
  const { index, line } = getLineAndStartIndex(source, charIndex)
  const width = Math.max(1, Math.floor(tabSize))
  let column = 0
  for (let offset = index; offset < charIndex; offset++) {
    column = source.contents?.[offset] === TAB ? nextTabStop(column, width) : column + 1
  }
  return { line, column }
}
