import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig } from "../../src/shell/config-file.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields present in the file", () =>
    Effect.gen(function*(_) {
      expect(yield* _(decodeConfig(`{"indent": 4}`))).toEqual({ indent: 4 })
      expect(yield* _(decodeConfig(`{}`))).toEqual({})
      expect(yield* _(decodeConfig(`{"indent": 0, "emptyObjects": "reject"}`))).toEqual({
        indent: 0,
        emptyObjects: "reject"
      })
    }))

  it.effect("rejects an out-of-range indent", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig(`{"indent": 12}`)))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects an unknown empty object policy", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig(`{"emptyObjects": "sometimes"}`)))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects malformed JSON", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig(`{"indent": `)))
      expect(error._tag).toBe("ConfigError")
    }))
})
