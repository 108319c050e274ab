import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "slimjson", ...args]

const cliError = (message: string) => Either.left({ _tag: "CliError", message })

describe("parseCliArgs", () => {
  it.effect("defaults to the parse command with a single file", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("doc.json"))).toEqual(
        Either.right({
          command: "parse",
          file: "doc.json",
          configPath: "./.slimjson.json",
          configPathExplicit: false,
          indent: undefined,
          emptyObjects: undefined,
          silent: false
        })
      )
    }))

  it.effect("reads the command and flags", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(
        argv("tokens", "doc.json", "--indent", "4", "--empty-objects=reject", "--config", "cfg.json", "--silent")
      )
      expect(parsed).toEqual(
        Either.right({
          command: "tokens",
          file: "doc.json",
          configPath: "cfg.json",
          configPathExplicit: true,
          indent: 4,
          emptyObjects: "reject",
          silent: true
        })
      )
    }))

  it.effect("treats a lone command word as the file path", () =>
    Effect.sync(() => {
      expect(Either.map(parseCliArgs(argv("tokens")), (args) => [args.command, args.file])).toEqual(
        Either.right(["parse", "tokens"])
      )
    }))

  it.effect("accepts flags before the file", () =>
    Effect.sync(() => {
      expect(Either.map(parseCliArgs(argv("--indent=0", "doc.json")), (args) => [args.indent, args.file])).toEqual(
        Either.right([0, "doc.json"])
      )
    }))

  it.effect("requires a file", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv())).toEqual(
        cliError("Missing file argument. Usage: slimjson [parse|tokens] <file> [options]")
      )
      expect(parseCliArgs(argv("--silent"))).toEqual(
        cliError("Missing file argument. Usage: slimjson [parse|tokens] <file> [options]")
      )
    }))

  it.effect("rejects a second positional argument", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("a.json", "b.json"))).toEqual(cliError("Unexpected positional argument: b.json"))
    }))

  it.effect("rejects unknown flags", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("doc.json", "--verbose"))).toEqual(cliError("Unknown flag: --verbose"))
      expect(parseCliArgs(argv("doc.json", "-x"))).toEqual(cliError("Unknown flag: -x"))
    }))

  it.effect("validates flag values", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("doc.json", "--indent", "11"))).toEqual(
        cliError("Invalid indent: 11 (expected an integer from 0 to 10)")
      )
      expect(parseCliArgs(argv("doc.json", "--indent=two"))).toEqual(
        cliError("Invalid indent: two (expected an integer from 0 to 10)")
      )
      expect(parseCliArgs(argv("doc.json", "--empty-objects", "maybe"))).toEqual(
        cliError("Invalid value for --empty-objects: maybe")
      )
      expect(parseCliArgs(argv("doc.json", "--config"))).toEqual(cliError("Missing value for --config"))
    }))

  it.effect("reports inherited object property names as unknown flags", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("--constructor", "f"))).toEqual(cliError("Unknown flag: --constructor"))
      expect(parseCliArgs(argv("doc.json", "--toString"))).toEqual(cliError("Unknown flag: --toString"))
    }))

  it.effect("takes the command from the first positional argument after flags", () =>
    Effect.sync(() => {
      expect(
        Either.map(parseCliArgs(argv("--silent", "tokens", "f.json")), (args) => [args.command, args.file, args.silent])
      ).toEqual(Either.right(["tokens", "f.json", true]))
      expect(
        Either.map(parseCliArgs(argv("--indent", "4", "tokens", "f.json")), (args) => [args.command, args.indent])
      ).toEqual(Either.right(["tokens", 4]))
    }))

  it.effect("rejects a third positional argument after a command", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("tokens", "a.json", "b.json"))).toEqual(cliError("Unexpected positional argument: b.json"))
    }))
})
