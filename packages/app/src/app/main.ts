#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { runCli, writeStderr } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "On keyboard interrupt or end-of-input during interactive use, exits silently (code 0)"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: exitCode = 0 ⇔ runCli succeeds or is interrupted
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError becomes one stderr line and exit code 1; interruption exits 0
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.asVoid,
  Effect.catchAll((error) =>
    Effect.zipRight(
      writeStderr(formatAppError(error)),
      Effect.sync(() => {
        process.exitCode = 1
      })
    )
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
