import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document through the platform file system
// WHY: tokenizer and parser only ever see an in-memory string
// QUOTE(TZ): "reads entire file content as text"
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: read(p) = Right(s) → s = utf8(contents(p))
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: the whole file is read before parsing starts; a leading byte order mark is dropped
// COMPLEXITY: O(n)

const BOM = "\uFEFF"

const stripBom = (text: string): string => text.startsWith(BOM) ? text.slice(BOM.length) : text

const mapFsError = (path: string) => (error: PlatformError): AppError =>
  fileError(`Cannot read ${path}: ${error.message}`)

export const readSourceFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = yield* _(fs.readFileString(path).pipe(Effect.mapError(mapFsError(path))))
    return stripBom(text)
  })
