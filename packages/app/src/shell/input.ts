import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Match } from "effect"
import * as Effect from "effect/Effect"

import type { InputSource } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: load the document text named on the command line
// PURITY: SHELL
// EFFECT: Effect<InputText, AppError, FileSystem>
// INVARIANT: the parser only ever sees the complete text
// COMPLEXITY: O(n)

export interface InputText {
  readonly source: string
  readonly text: string
}

export const INLINE_SOURCE = "<text>"

export const readInputFile = (
  path: string
): Effect.Effect<InputText, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Input file not found: ${path}`)))
    }
    const text = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return { source: path, text }
  })

export const readInput = (
  input: InputSource
): Effect.Effect<InputText, AppError, FileSystemService> =>
  Match.value(input).pipe(
    Match.tag("Inline", (inline) => Effect.succeed<InputText>({ source: INLINE_SOURCE, text: inline.text })),
    Match.tag("File", (file) => readInputFile(file.path)),
    Match.exhaustive
  )
