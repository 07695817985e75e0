import { Match } from "effect"

import type { ParseError } from "./errors.js"

// CHANGE: map parser offsets to line/column and render parse errors
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line and column are 1-based; '\n' ends a line
// COMPLEXITY: O(offset)

export interface Position {
  readonly line: number
  readonly column: number
}

export const locate = (text: string, offset: number): Position => {
  const bounded = Math.max(0, Math.min(offset, text.length))
  let line = 1
  let lineStart = 0
  for (let index = 0; index < bounded; index += 1) {
    if (text.charAt(index) === "\n") {
      line += 1
      lineStart = index + 1
    }
  }
  return { line, column: bounded - lineStart + 1 }
}

const describeFound = (text: string, offset: number): string =>
  offset < text.length ? JSON.stringify(text.charAt(offset)) : "end of input"

/**
 * Describe a ParseError without its position.
 *
 * @param error - Parser failure.
 * @param text - Input the failure refers to; used to name the offending character.
 *
 * @pure true
 */
export const describeParseError = (error: ParseError, text: string): string =>
  Match.value(error).pipe(
    Match.tag("MalformedNumber", (e) => `malformed number (expected ${e.expected})`),
    Match.tag("UnterminatedString", (e) => `unterminated string (expected ${e.expected})`),
    Match.tag("NoMatch", (e) => `unexpected ${describeFound(text, e.offset)} (expected ${e.expected})`),
    Match.tag("InvalidEscape", (e) => `invalid escape sequence (expected ${e.expected})`),
    Match.tag("DepthExceeded", (e) => `nesting too deep (expected ${e.expected})`),
    Match.exhaustive
  )

/**
 * Render a ParseError as `line:column: message`.
 *
 * @pure true
 * @invariant output starts with the 1-based position of error.offset
 */
export const renderParseError = (error: ParseError, text: string): string => {
  const { column, line } = locate(text, error.offset)
  return `${line}:${column}: ${describeParseError(error, text)}`
}
