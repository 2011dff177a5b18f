// Library surface: the pure parser and the file/stdin loaders.

export type { AppError, ConfigError, FileError, ParseError } from "./core/errors.js"
export { parseError, renderAppError } from "./core/errors.js"
export type { Json, JsonKind, JsonObject, JsonValue } from "./core/json.js"
export { describeKind, isJsonArray, isJsonObject, toPlainJson } from "./core/json.js"
export type { Location } from "./core/location.js"
export {
  appendLocation,
  formatLineAndColumn,
  formatLocation,
  locationLineAndColumn,
  locationLineAndStartIndex,
  makeLocation,
  unknownLocation
} from "./core/location.js"
export type { ParseOptions } from "./core/options.js"
export { defaultOptions, makeParseOptions, relaxedOptions } from "./core/options.js"
export { parse } from "./core/parse.js"
export type { LineAndColumn, LineAndIndex, Source } from "./core/source.js"
export {
  defaultTabSize,
  emptySource,
  getLineAndColumn,
  getLineAndStartIndex,
  hasContents,
  sourceFromBuffer,
  sourceFromBytes,
  sourceFromSignedBytes,
  sourceFromString
} from "./core/source.js"
export { loadFile, loadStdin, parseFile, readSource } from "./shell/source-loader.js"
