import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseText, tokenizeText } from "../../src/core/document.js"
import { renderTokens, renderValue } from "../../src/core/render.js"
import { arrayValue, floatValue, integerValue } from "../../src/core/value.js"

describe("renderValue", () => {
  it.effect("prints with the requested indentation", () =>
    Effect.sync(() => {
      const parsed = parseText(`{"a":[1,2.5],"b":"x"}`)
      expect(Either.map(parsed, (tree) => renderValue(tree, 2))).toEqual(
        Either.right(`{\n  "a": [\n    1,\n    2.5\n  ],\n  "b": "x"\n}`)
      )
      expect(Either.map(parsed, (tree) => renderValue(tree, 0))).toEqual(
        Either.right(`{"a":[1,2.5],"b":"x"}`)
      )
    }))

  it.effect("keeps a decimal point on whole floats", () =>
    Effect.sync(() => {
      expect(renderValue(arrayValue([floatValue(2), integerValue(2n), floatValue(0.5)]), 0)).toBe("[2.0,2,0.5]")
    }))

  it.effect("prints object keys in first-seen order, integer-like keys included", () =>
    Effect.sync(() => {
      expect(Either.map(parseText(`{"b":1,"10":2}`), (tree) => renderValue(tree, 0))).toEqual(
        Either.right(`{"b":1,"10":2}`)
      )
      expect(Either.map(parseText(`{"b":1,"10":2,"a":3,"2":4,"b":5}`), (tree) => renderValue(tree, 2))).toEqual(
        Either.right(`{\n  "b": 5,\n  "10": 2,\n  "a": 3,\n  "2": 4\n}`)
      )
    }))

  it.effect("prints integers beyond 2^53 digit for digit", () =>
    Effect.sync(() => {
      const long = "9".repeat(400)
      expect(Either.map(parseText("[12345678901234567891]"), (tree) => renderValue(tree, 0))).toEqual(
        Either.right("[12345678901234567891]")
      )
      expect(Either.map(parseText(`[${long}]`), (tree) => renderValue(tree, 0))).toEqual(Either.right(`[${long}]`))
    }))

  it.effect("escapes string contents and keys", () =>
    Effect.sync(() => {
      expect(Either.map(parseText(`{"a\tb": "\\"}`), (tree) => renderValue(tree, 0))).toEqual(
        Either.right(`{"a\\tb":"\\\\"}`)
      )
    }))

  it.effect("keeps empty containers on one line when indenting", () =>
    Effect.sync(() => {
      expect(Either.map(parseText(`{"a": [], "b": {}}`), (tree) => renderValue(tree, 4))).toEqual(
        Either.right(`{\n    "a": [],\n    "b": {}\n}`)
      )
    }))
})

describe("renderTokens", () => {
  it.effect("prints one JSON line per token", () =>
    Effect.sync(() => {
      expect(Either.map(tokenizeText(`[1, "a", 0.5]`), renderTokens)).toEqual(
        Either.right(
          [
            `{"type":"punctuation","value":"["}`,
            `{"type":"integer","value":1}`,
            `{"type":"punctuation","value":","}`,
            `{"type":"string","value":"\\"a\\""}`,
            `{"type":"punctuation","value":","}`,
            `{"type":"float","value":0.5}`,
            `{"type":"punctuation","value":"]"}`
          ].join("\n")
        )
      )
    }))

  it.effect("prints large integer tokens exactly", () =>
    Effect.sync(() => {
      expect(Either.map(tokenizeText("12345678901234567891"), renderTokens)).toEqual(
        Either.right(`{"type":"integer","value":12345678901234567891}`)
      )
    }))
})
