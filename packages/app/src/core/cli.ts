import { Match } from "effect"
import * as Either from "effect/Either"

import type { EmptyObjectPolicy } from "./parser.js"

// CHANGE: implement deterministic CLI parsing for slimjson
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "one positional argument, a file path"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.file is the last positional argument
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "parse" | "tokens"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly indent: number | undefined
  readonly emptyObjects: EmptyObjectPolicy | undefined
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const MAX_INDENT = 10

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.when("tokens", () => Either.right<CliCommand>("tokens")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseIndent = (value: string): Either.Either<number, CliError> => {
  const indent = Number(value)
  if (!/^\d+$/.test(value) || indent > MAX_INDENT) {
    return Either.left(cliError(`Invalid indent: ${value} (expected an integer from 0 to ${MAX_INDENT})`))
  }
  return Either.right(indent)
}

const parseEmptyObjects = (value: string): Either.Either<EmptyObjectPolicy, CliError> =>
  Match.value(value).pipe(
    Match.when("accept", () => Either.right<EmptyObjectPolicy>("accept")),
    Match.when("reject", () => Either.right<EmptyObjectPolicy>("reject")),
    Match.orElse(() => Either.left(cliError(`Invalid value for --empty-objects: ${value}`)))
  )

interface DraftArgs {
  readonly positionals: ReadonlyArray<string>
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly indent: number | undefined
  readonly emptyObjects: EmptyObjectPolicy | undefined
  readonly silent: boolean
}

const defaultArgs: DraftArgs = {
  positionals: [],
  configPath: "./.slimjson.json",
  configPathExplicit: false,
  indent: undefined,
  emptyObjects: undefined,
  silent: false
}

type Parsed = { readonly next: DraftArgs; readonly consumed: number }

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: DraftArgs, value: A) => DraftArgs
): Either.Either<Parsed, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<Parsed, CliError>

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => Either.right({ next: { ...current, silent: true }, consumed: 1 }),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, parseIndent, (args, value) => ({
      ...args,
      indent: value
    })),
  "empty-objects": (current, inlineValue, nextValue) =>
    parseValueFlag("empty-objects", current, inlineValue, nextValue, parseEmptyObjects, (args, value) => ({
      ...args,
      emptyObjects: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: DraftArgs
): Either.Either<Parsed, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const addPositional = (current: DraftArgs, value: string): Parsed => ({
  next: { ...current, positionals: [...current.positionals, value] },
  consumed: 1
})

const parseArgs = (rawArgs: ReadonlyArray<string>): Either.Either<DraftArgs, CliError> => {
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed: Either.Either<Parsed, CliError> = isFlag(current)
      ? parseFlag(current, rawArgs[index + 1], args)
      : Either.right(addPositional(args, current))
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

interface Operands {
  readonly command: CliCommand
  readonly operands: ReadonlyArray<string>
}

// The first positional selects the command only when something follows it,
// so `slimjson tokens` still reads a file named "tokens".
const splitCommand = (positionals: ReadonlyArray<string>): Operands => {
  const [first, ...rest] = positionals
  if (first === undefined || rest.length === 0) {
    return { command: "parse", operands: positionals }
  }
  return Either.match(parseCommand(first), {
    onLeft: (): Operands => ({ command: "parse", operands: positionals }),
    onRight: (command): Operands => ({ command, operands: rest })
  })
}

const finalize = (draft: DraftArgs): Either.Either<CliArgs, CliError> => {
  const { command, operands } = splitCommand(draft.positionals)
  const [file, extra] = operands
  if (file === undefined) {
    return Either.left(cliError("Missing file argument. Usage: slimjson [parse|tokens] <file> [options]"))
  }
  if (extra !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${extra}`))
  }
  return Either.right({
    command,
    file,
    configPath: draft.configPath,
    configPathExplicit: draft.configPathExplicit,
    indent: draft.indent,
    emptyObjects: draft.emptyObjects,
    silent: draft.silent
  })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to parse when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  return Either.flatMap(parseArgs(argv.slice(2)), finalize)
}
