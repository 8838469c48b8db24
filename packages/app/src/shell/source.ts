import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Match } from "effect"
import * as Effect from "effect/Effect"

import type { Source } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: resolve CLI sources into document text
// WHY: inline documents and files feed the same command pipeline
// QUOTE(TZ): "text-in/text-out API surface"
// REF: req-source-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: |load(xs)| = |xs| ∧ order is preserved
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, AppError, FileSystem>
// INVARIANT: files are read sequentially in argv order
// COMPLEXITY: O(n)

const readSourceFile = (path: string): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(Effect.logDebug(`reading ${path}`))
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

const loadSource = (source: Source): Effect.Effect<string, AppError, FileSystemService> =>
  Match.value(source).pipe(
    Match.when({ _tag: "Inline" }, (value) => Effect.succeed(value.text)),
    Match.when({ _tag: "File" }, (value) => readSourceFile(value.path)),
    Match.exhaustive
  )

export const loadSources = (
  sources: ReadonlyArray<Source>
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService> =>
  Effect.forEach(sources, loadSource, { concurrency: 1 })
