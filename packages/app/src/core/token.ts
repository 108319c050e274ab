import { Match } from "effect"
import * as Equivalence from "effect/Equivalence"

import type { NumberValue, ObjectValue, Value } from "./value.js"
import { formatNumber, objectValue, stringValue } from "./value.js"

// CHANGE: represent lexical units as a tagged union
// WHY: punctuation, string literals and numbers share one ordered stream without loose typing
// QUOTE(TZ): "must become an explicit tagged union (Token variant)"
// REF: req-token-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ StringLiteralToken: t.text starts and ends with '"'
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: number tokens carry an already-converted value
// COMPLEXITY: O(1)/O(1)

export type PunctuationChar = "{" | "}" | "[" | "]" | ":" | ","

export type PunctuationToken = { readonly _tag: "Punctuation"; readonly char: PunctuationChar }
export type StringLiteralToken = { readonly _tag: "StringLiteral"; readonly text: string }
export type NumberToken = { readonly _tag: "Number"; readonly value: NumberValue }

export type Token = PunctuationToken | StringLiteralToken | NumberToken

const punctuationChars: ReadonlyArray<string> = ["{", "}", "[", "]", ":", ","]

export const isPunctuationChar = (char: string): char is PunctuationChar => punctuationChars.includes(char)

export const punctuation = (char: PunctuationChar): PunctuationToken => ({ _tag: "Punctuation", char })

export const stringLiteral = (text: string): StringLiteralToken => ({ _tag: "StringLiteral", text })

export const numberToken = (value: NumberValue): NumberToken => ({ _tag: "Number", value })

export const isPunctuation = (token: Token, char: PunctuationChar): boolean =>
  token._tag === "Punctuation" && token.char === char

/**
 * Render a token the way it appeared in the source.
 *
 * @pure true
 */
export const showToken = (token: Token): string =>
  Match.value(token).pipe(
    Match.tagsExhaustive({
      Punctuation: (t) => t.char,
      StringLiteral: (t) => t.text,
      Number: (t) => formatNumber(t.value)
    })
  )

export const tokenEquivalence: Equivalence.Equivalence<Token> = Equivalence.make(
  (self, that) => self._tag === that._tag && showToken(self) === showToken(that)
)

const describeToken = (type: string, value: Value): ObjectValue =>
  objectValue(new Map<string, Value>([["type", stringValue(type)], ["value", value]]))

/**
 * Describe a token as a `{ type, value }` object for the `tokens` listing.
 *
 * @pure true
 */
export const tokenToValue = (token: Token): ObjectValue =>
  Match.value(token).pipe(
    Match.tagsExhaustive({
      Punctuation: (t) => describeToken("punctuation", stringValue(t.char)),
      StringLiteral: (t) => describeToken("string", stringValue(t.text)),
      Number: (t) => describeToken(t.value._tag === "Float" ? "float" : "integer", t.value)
    })
  )
