import type { CliArgs } from "./cli.js"
import type { EmptyObjectPolicy, ParserOptions } from "./parser.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "serializes ... with 2-space indentation"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent is an integer in [0, MAX_INDENT]
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: number
  readonly emptyObjects?: EmptyObjectPolicy
}

export interface ResolvedConfig {
  readonly indent: number
  readonly parser: ParserOptions
}

export const DEFAULT_INDENT = 2

const resolveIndent = (cli: CliArgs, fileConfig: FileConfig | undefined): number =>
  cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT

const resolveEmptyObjects = (cli: CliArgs, fileConfig: FileConfig | undefined): EmptyObjectPolicy =>
  cli.emptyObjects ?? fileConfig?.emptyObjects ?? "accept"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .slimjson.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: resolveIndent(cli, fileConfig),
  parser: { emptyObjects: resolveEmptyObjects(cli, fileConfig) }
})
