import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ParseError } from "./errors.js"
import { invalidTopLevel, mismatchedExpectation, outOfBounds, trailingTokens, unexpectedValue } from "./errors.js"
import type { CursorReader } from "./reader.js"
import { consume } from "./reader.js"
import type { PunctuationChar, Token } from "./token.js"
import { isPunctuation, punctuation, showToken, tokenEquivalence } from "./token.js"
import type { ArrayValue, DocumentValue, ObjectValue, Value } from "./value.js"
import { arrayValue, objectValue, stringValue } from "./value.js"

// CHANGE: build a value tree from tokens by recursive descent
// WHY: keep structural validation separate from character-level scanning
// QUOTE(TZ): "the entire token reader must be exhausted by the time parsing of the top-level value completes"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: parse(r) = Right(v) → v._tag ∈ {Object, Array} ∧ r.isExhausted()
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: repeated object keys keep their first position and their last value
// COMPLEXITY: O(n) where n = number of tokens

/**
 * `accept` parses `{}` as an empty object; `reject` always reads a key after `{`,
 * so `{}` fails on the closing brace.
 */
export type EmptyObjectPolicy = "accept" | "reject"

export interface ParserOptions {
  readonly emptyObjects: EmptyObjectPolicy
}

export const defaultParserOptions: ParserOptions = { emptyObjects: "accept" }

type TokenReader = CursorReader<Token>

const consumePunctuation = (reader: TokenReader, char: PunctuationChar): Either.Either<void, ParseError> =>
  consume(reader, punctuation(char), tokenEquivalence, showToken)

const peekIs = (reader: TokenReader, char: PunctuationChar): boolean =>
  Option.match(reader.peek(), {
    onNone: () => false,
    onSome: (token) => isPunctuation(token, char)
  })

const skipComma = (reader: TokenReader): boolean => {
  if (!peekIs(reader, ",")) {
    return false
  }
  reader.advance()
  return true
}

const stripQuotes = (text: string): string => text.slice(1, -1)

const parseKey = (reader: TokenReader): Either.Either<string, ParseError> => {
  const token = reader.advance()
  if (Either.isLeft(token)) {
    return Either.left(token.left)
  }
  if (token.right._tag !== "StringLiteral") {
    return Either.left(mismatchedExpectation("string literal", showToken(token.right)))
  }
  return Either.right(stripQuotes(token.right.text))
}

const parseObject = (reader: TokenReader, options: ParserOptions): Either.Either<ObjectValue, ParseError> => {
  const opened = consumePunctuation(reader, "{")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entries = new Map<string, Value>()
  const isEmpty = options.emptyObjects === "accept" && peekIs(reader, "}")
  if (!isEmpty) {
    do {
      const key = parseKey(reader)
      if (Either.isLeft(key)) {
        return Either.left(key.left)
      }
      const colon = consumePunctuation(reader, ":")
      if (Either.isLeft(colon)) {
        return Either.left(colon.left)
      }
      const value = parseValue(reader, options)
      if (Either.isLeft(value)) {
        return Either.left(value.left)
      }
      entries.set(key.right, value.right)
    } while (skipComma(reader))
  }
  const closed = consumePunctuation(reader, "}")
  if (Either.isLeft(closed)) {
    return Either.left(closed.left)
  }
  return Either.right(objectValue(entries))
}

const parseArray = (reader: TokenReader, options: ParserOptions): Either.Either<ArrayValue, ParseError> => {
  const opened = consumePunctuation(reader, "[")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const items: Array<Value> = []
  while (!peekIs(reader, "]")) {
    const item = parseValue(reader, options)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    if (!skipComma(reader)) {
      break
    }
  }
  const closed = consumePunctuation(reader, "]")
  if (Either.isLeft(closed)) {
    return Either.left(closed.left)
  }
  return Either.right(arrayValue(items))
}

const parseValue = (reader: TokenReader, options: ParserOptions): Either.Either<Value, ParseError> => {
  const peeked = reader.peek()
  if (Option.isNone(peeked)) {
    return Either.left(outOfBounds(reader.position()))
  }
  const token = peeked.value
  if (isPunctuation(token, "{")) {
    return parseObject(reader, options)
  }
  if (isPunctuation(token, "[")) {
    return parseArray(reader, options)
  }
  if (token._tag === "Number") {
    reader.advance()
    return Either.right(token.value)
  }
  if (token._tag === "StringLiteral") {
    reader.advance()
    return Either.right(stringValue(stripQuotes(token.text)))
  }
  return Either.left(unexpectedValue(showToken(token)))
}

const parseDocument = (
  reader: TokenReader,
  options: ParserOptions
): Either.Either<DocumentValue, ParseError> =>
  Option.match(reader.peek(), {
    onNone: () => Either.left(invalidTopLevel("end of input")),
    onSome: (token): Either.Either<DocumentValue, ParseError> => {
      if (isPunctuation(token, "{")) {
        return parseObject(reader, options)
      }
      if (isPunctuation(token, "[")) {
        return parseArray(reader, options)
      }
      return Either.left(invalidTopLevel(`'${showToken(token)}'`))
    }
  })

/**
 * Parse a complete document from a token reader.
 *
 * @param reader - Reader over the token sequence.
 * @param options - Parser behaviour switches.
 * @returns Either with the top-level Object or Array, or the first ParseError.
 *
 * @pure false
 * @effect advances the reader
 * @invariant on success every token has been consumed
 * @complexity O(n)
 */
export const parse = (
  reader: TokenReader,
  options: ParserOptions = defaultParserOptions
): Either.Either<DocumentValue, ParseError> => {
  const document = parseDocument(reader, options)
  if (Either.isLeft(document)) {
    return document
  }
  const position = reader.position()
  const rest = reader.peek()
  if (Option.isSome(rest)) {
    return Either.left(trailingTokens(showToken(rest.value), position))
  }
  return document
}
