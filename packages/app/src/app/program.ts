import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import { parseTokens, tokenizeText } from "../core/document.js"
import type { AppError } from "../core/errors.js"
import { renderTokens, renderValue } from "../core/render.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate read → tokenize → parse → print
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "feeds it to the tokenizer then the parser"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀file: run(file) = Right(r) → r.output = render(parse(tokenize(read(file))))
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once, only after both stages succeed
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

export const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

export const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const emitOutput = (output: string, silent: boolean): Effect.Effect<void> =>
  silent ? Effect.void : writeStdout(output)

const handleParse = (text: string, config: ResolvedConfig): Effect.Effect<string, AppError> =>
  Effect.gen(function*(_) {
    const tokens = yield* _(fromEither(tokenizeText(text)))
    const tree = yield* _(fromEither(parseTokens(tokens, config.parser)))
    return renderValue(tree, config.indent)
  })

const handleTokens = (text: string): Effect.Effect<string, AppError> =>
  Effect.map(fromEither(tokenizeText(text)), renderTokens)

const executeCommand = (
  cli: CliArgs,
  text: string,
  config: ResolvedConfig
): Effect.Effect<string, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("parse", () => handleParse(text, config)),
    Match.when("tokens", () => handleTokens(text)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant nothing is printed when either stage fails
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const text = yield* _(readSourceFile(cli.file))
    const output = yield* _(executeCommand(cli, text, config))
    yield* _(emitOutput(output, cli.silent))
    return { output }
  })
