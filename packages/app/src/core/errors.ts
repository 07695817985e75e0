import type { CliError } from "./cli.js"

// CHANGE: unify parser failures and the application error algebra
// WHY: every failure is a tagged value so callers can match exhaustively on it
// FORMAT THEOREM: ∀e ∈ ParseError: 0 ≤ e.offset ≤ |input|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type MalformedNumber = {
  readonly _tag: "MalformedNumber"
  readonly offset: number
  readonly expected: string
}
export type UnterminatedString = {
  readonly _tag: "UnterminatedString"
  readonly offset: number
  readonly expected: string
}
export type NoMatch = { readonly _tag: "NoMatch"; readonly offset: number; readonly expected: string }
export type InvalidEscape = {
  readonly _tag: "InvalidEscape"
  readonly offset: number
  readonly expected: string
}
export type DepthExceeded = {
  readonly _tag: "DepthExceeded"
  readonly offset: number
  readonly expected: string
  readonly maxDepth: number
}

export type ParseError =
  | MalformedNumber
  | UnterminatedString
  | NoMatch
  | InvalidEscape
  | DepthExceeded

export const malformedNumber = (offset: number, expected: string): MalformedNumber => ({
  _tag: "MalformedNumber",
  offset,
  expected
})

export const unterminatedString = (offset: number): UnterminatedString => ({
  _tag: "UnterminatedString",
  offset,
  expected: "closing '\"'"
})

export const noMatch = (offset: number, expected: string): NoMatch => ({
  _tag: "NoMatch",
  offset,
  expected
})

export const invalidEscape = (offset: number, expected: string): InvalidEscape => ({
  _tag: "InvalidEscape",
  offset,
  expected
})

export const depthExceeded = (offset: number, maxDepth: number): DepthExceeded => ({
  _tag: "DepthExceeded",
  offset,
  expected: `at most ${maxDepth} nested containers`,
  maxDepth
})

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFailed = {
  readonly _tag: "ParseFailed"
  readonly source: string
  readonly text: string
  readonly error: ParseError
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFailed

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFailed = (source: string, text: string, error: ParseError): ParseFailed => ({
  _tag: "ParseFailed",
  source,
  text,
  error
})
