import * as Either from "effect/Either"
import * as Equivalence from "effect/Equivalence"
import * as Option from "effect/Option"

import type { ParseError } from "./errors.js"
import { invalidNumber, unexpectedCharacter } from "./errors.js"
import type { CursorReader } from "./reader.js"
import { consume } from "./reader.js"
import type { Token } from "./token.js"
import { isPunctuationChar, numberToken, punctuation, stringLiteral } from "./token.js"
import { floatValue, integerValue } from "./value.js"

// CHANGE: turn a character reader into an ordered token sequence
// WHY: the parser works on classified tokens rather than raw characters
// QUOTE(TZ): "never returns a partial sequence on failure (all-or-nothing)"
// REF: req-tokenize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: tokenize(r) = Right(ts) → r.isExhausted()
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: string literal tokens keep both quote characters; integer tokens are exact
// COMPLEXITY: O(n) where n = number of characters

const QUOTE = "\""
const DOT = "."

// Separators are \s without U+FEFF, plus U+001C..U+001F and U+0085.
const isWhitespace = (char: string): boolean => char !== "\uFEFF" && /^[\s\x1C-\x1F\x85]$/u.test(char)

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const showChar = (char: string): string => char

const peekMatches = (reader: CursorReader<string>, predicate: (char: string) => boolean): boolean =>
  Option.match(reader.peek(), {
    onNone: () => false,
    onSome: predicate
  })

const skipWhitespace = (reader: CursorReader<string>): void => {
  while (peekMatches(reader, isWhitespace)) {
    reader.advance()
  }
}

// No escape handling: the first quote after the opening one closes the literal.
const tokenizeString = (reader: CursorReader<string>): Either.Either<Token, ParseError> => {
  const opened = consume(reader, QUOTE, Equivalence.string, showChar)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const chars: Array<string> = [QUOTE]
  for (;;) {
    const next = reader.advance()
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    chars.push(next.right)
    if (next.right === QUOTE) {
      return Either.right(stringLiteral(chars.join("")))
    }
  }
}

const tokenizeNumber = (reader: CursorReader<string>): Either.Either<Token, ParseError> => {
  const start = reader.position()
  const digits: Array<string> = []
  let isFloat = false
  for (;;) {
    const peeked = reader.peek()
    if (Option.isNone(peeked)) {
      break
    }
    const char = peeked.value
    if (char === DOT) {
      if (isFloat) {
        return Either.left(invalidNumber(reader.position()))
      }
      isFloat = true
    } else if (!isDigit(char)) {
      break
    }
    reader.advance()
    digits.push(char)
  }
  const text = digits.join("")
  if (!isFloat) {
    return Either.right(numberToken(integerValue(BigInt(text))))
  }
  const value = Number.parseFloat(text)
  if (!Number.isFinite(value)) {
    return Either.left(invalidNumber(start))
  }
  return Either.right(numberToken(floatValue(value)))
}

const tokenizeNext = (
  reader: CursorReader<string>,
  char: string
): Either.Either<Token, ParseError> => {
  if (isPunctuationChar(char)) {
    reader.advance()
    return Either.right(punctuation(char))
  }
  if (char === QUOTE) {
    return tokenizeString(reader)
  }
  if (isDigit(char)) {
    return tokenizeNumber(reader)
  }
  return Either.left(unexpectedCharacter(char, reader.position()))
}

/**
 * Tokenize every remaining character of the reader.
 *
 * @param reader - Reader over the characters of the source text.
 * @returns Either with the full token sequence or the first ParseError.
 *
 * @pure false
 * @effect advances the reader
 * @invariant on success the reader is exhausted
 * @complexity O(n)
 */
export const tokenize = (
  reader: CursorReader<string>
): Either.Either<ReadonlyArray<Token>, ParseError> => {
  const tokens: Array<Token> = []
  for (;;) {
    skipWhitespace(reader)
    const peeked = reader.peek()
    if (Option.isNone(peeked)) {
      return Either.right(tokens)
    }
    const token = tokenizeNext(reader, peeked.value)
    if (Either.isLeft(token)) {
      return Either.left(token.left)
    }
    tokens.push(token.right)
  }
}
