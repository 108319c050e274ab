export { parseText, parseTokens, tokenizeText } from "./core/document.js"
export type {
  AppError,
  InvalidNumber,
  InvalidTopLevel,
  MismatchedExpectation,
  OutOfBounds,
  ParseError,
  TrailingTokens,
  UnexpectedCharacter,
  UnexpectedValue
} from "./core/errors.js"
export { formatParseError } from "./core/errors.js"
export type { EmptyObjectPolicy, ParserOptions } from "./core/parser.js"
export { defaultParserOptions, parse } from "./core/parser.js"
export type { CursorReader } from "./core/reader.js"
export { consume, makeReader } from "./core/reader.js"
export { renderTokens, renderValue } from "./core/render.js"
export type { NumberToken, PunctuationChar, PunctuationToken, StringLiteralToken, Token } from "./core/token.js"
export { showToken, tokenToValue } from "./core/token.js"
export { tokenize } from "./core/tokenizer.js"
export type {
  ArrayValue,
  DocumentValue,
  FloatValue,
  IntegerValue,
  NumberValue,
  ObjectValue,
  StringValue,
  Value
} from "./core/value.js"
export { formatNumber } from "./core/value.js"
