import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for tokenizer, parser and CLI
// WHY: every failure is a value that aborts its stage and reaches the boundary typed
// QUOTE(TZ): "all fail fast, no retry, no partial output"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type OutOfBounds = { readonly _tag: "OutOfBounds"; readonly position: number }
export type UnexpectedCharacter = {
  readonly _tag: "UnexpectedCharacter"
  readonly char: string
  readonly position: number
}
export type InvalidNumber = { readonly _tag: "InvalidNumber"; readonly position: number }
export type MismatchedExpectation = {
  readonly _tag: "MismatchedExpectation"
  readonly expected: string
  readonly actual: string
}
export type UnexpectedValue = { readonly _tag: "UnexpectedValue"; readonly token: string }
export type TrailingTokens = {
  readonly _tag: "TrailingTokens"
  readonly token: string
  readonly position: number
}
export type InvalidTopLevel = { readonly _tag: "InvalidTopLevel"; readonly found: string }

export type ParseError =
  | OutOfBounds
  | UnexpectedCharacter
  | InvalidNumber
  | MismatchedExpectation
  | UnexpectedValue
  | TrailingTokens
  | InvalidTopLevel

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError = ParseError | CliError | ConfigError | FileError

export const outOfBounds = (position: number): OutOfBounds => ({
  _tag: "OutOfBounds",
  position
})

export const unexpectedCharacter = (char: string, position: number): UnexpectedCharacter => ({
  _tag: "UnexpectedCharacter",
  char,
  position
})

export const invalidNumber = (position: number): InvalidNumber => ({
  _tag: "InvalidNumber",
  position
})

export const mismatchedExpectation = (expected: string, actual: string): MismatchedExpectation => ({
  _tag: "MismatchedExpectation",
  expected,
  actual
})

export const unexpectedValue = (token: string): UnexpectedValue => ({
  _tag: "UnexpectedValue",
  token
})

export const trailingTokens = (token: string, position: number): TrailingTokens => ({
  _tag: "TrailingTokens",
  token,
  position
})

export const invalidTopLevel = (found: string): InvalidTopLevel => ({
  _tag: "InvalidTopLevel",
  found
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render a tokenizer or parser failure as a one-line diagnostic.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatParseError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.tagsExhaustive({
      OutOfBounds: (e) => `Unexpected end of input at index ${e.position}`,
      UnexpectedCharacter: (e) => `Unexpected char '${e.char}' at index ${e.position}`,
      InvalidNumber: (e) => `Invalid numeric at index ${e.position}`,
      MismatchedExpectation: (e) => `Expected '${e.expected}', got '${e.actual}'`,
      UnexpectedValue: (e) => `Unexpected JSON value: '${e.token}'`,
      TrailingTokens: (e) => `Unexpected token at end of file: '${e.token}' (token ${e.position})`,
      InvalidTopLevel: (e) => `Document must start with '{' or '[', got ${e.found}`
    })
  )

const isParseError = (error: AppError): error is ParseError =>
  error._tag !== "CliError" && error._tag !== "ConfigError" && error._tag !== "FileError"

export const formatAppError = (error: AppError): string => {
  if (isParseError(error)) {
    return `slimjson: parse error: ${formatParseError(error)}`
  }
  return Match.value(error).pipe(
    Match.tagsExhaustive({
      CliError: (e) => `slimjson: ${e.message}`,
      ConfigError: (e) => `slimjson: invalid config: ${e.message}`,
      FileError: (e) => `slimjson: ${e.message}`
    })
  )
}
