import { Match } from "effect"

import type { CliCommand } from "./cli.js"
import { usage } from "./cli.js"
import type { AppError } from "./errors.js"
import { formatValue } from "./format.js"
import { renderParseError } from "./position.js"
import type { JsonValue } from "./value.js"

// CHANGE: render command output and failures as text
// WHY: keep reporting pure and deterministic across CLI modes
// FORMAT THEOREM: ∀e ∈ ParseFailed: render(e) = source ":" line ":" column ": " message
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every AppError variant renders to a single non-empty message
// COMPLEXITY: O(n)

/**
 * Render the stdout payload of a successful command.
 *
 * @pure true
 */
export const renderOutput = (command: CliCommand, value: JsonValue): string =>
  Match.value(command).pipe(
    Match.when("show", () => formatValue(value)),
    Match.when("check", () => "ok"),
    Match.exhaustive
  )

/**
 * Render an application error for stderr.
 *
 * @pure true
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => `${e.message}\n${usage}`),
    Match.tag("ConfigError", (e) => `config error: ${e.message}`),
    Match.tag("FileError", (e) => e.message),
    Match.tag("ParseFailed", (e) => `${e.source}:${renderParseError(e.error, e.text)}`),
    Match.exhaustive
  )
