import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import type { ParserOptions } from "./parser.js"
import { defaultParserOptions, parse } from "./parser.js"
import { makeReader } from "./reader.js"
import type { Token } from "./token.js"
import { tokenize } from "./tokenizer.js"
import type { DocumentValue } from "./value.js"

// CHANGE: chain the two stages over in-memory text
// WHY: callers hand over a string and get a tree or the first stage failure
// QUOTE(TZ): "raw text → Cursor Reader(chars) → Tokenizer → ordered Token sequence → Cursor Reader(tokens) → Parser"
// REF: req-document-1
// SOURCE: n/a
// FORMAT THEOREM: parseText(s) = tokenizeText(s) >>= parseTokens
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each stage owns a fresh reader
// COMPLEXITY: O(n)

// Array.from splits by code point, so positions count characters rather than UTF-16 units.
export const tokenizeText = (text: string): Either.Either<ReadonlyArray<Token>, ParseError> =>
  tokenize(makeReader(Array.from(text)))

export const parseTokens = (
  tokens: ReadonlyArray<Token>,
  options: ParserOptions = defaultParserOptions
): Either.Either<DocumentValue, ParseError> => parse(makeReader(tokens), options)

export const parseText = (
  text: string,
  options: ParserOptions = defaultParserOptions
): Either.Either<DocumentValue, ParseError> =>
  Either.flatMap(tokenizeText(text), (tokens) => parseTokens(tokens, options))
