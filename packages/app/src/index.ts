export { parse } from "./core/parse.js"
export type { ParseOptions, UnicodeProfile } from "./core/options.js"
export { defaultParseOptions, MAX_DEPTH_CEILING, unicodeProfiles } from "./core/options.js"
export type {
  InvalidCharacter,
  InvalidEscapeCharacter,
  InvalidHex,
  InvalidNumber,
  NestingTooDeep,
  ParseError,
  UnexpectedCharacter,
  UnexpectedEnd
} from "./core/parse-error.js"
export { describeParseError } from "./core/parse-error.js"
export type {
  ArrayValue,
  BoolValue,
  NullValue,
  NumberValue,
  ObjectValue,
  StringValue,
  Value
} from "./core/value.js"
export { valueEquals } from "./core/value.js"
export type { Native } from "./core/native.js"
export { toNative } from "./core/native.js"
export type { CharsetError, DecodedText, Encoding } from "./core/charset.js"
export { decodeDocument } from "./core/charset.js"
