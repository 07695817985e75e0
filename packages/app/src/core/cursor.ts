import type * as Either from "effect/Either"

import type { ParseError } from "./errors.js"

// CHANGE: shared cursor vocabulary for recognizers
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a recognizer never moves the offset backwards
// COMPLEXITY: O(1) except skipWhitespace, O(k) for k skipped characters

export interface Step<A> {
  readonly value: A
  readonly offset: number
}

export type Recognizer<A> = (input: string, offset: number) => Either.Either<Step<A>, ParseError>

export const step = <A>(value: A, offset: number): Step<A> => ({ value, offset })

export const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

export const skipWhitespace = (input: string, offset: number): number => {
  let index = offset
  while (index < input.length && isWhitespace(input.charAt(index))) {
    index += 1
  }
  return index
}

export const scanDigits = (input: string, offset: number): number => {
  let index = offset
  while (index < input.length && isDigit(input.charAt(index))) {
    index += 1
  }
  return index
}

/**
 * A NoMatch reported at the offset the recognizer started from means the
 * lookahead did not begin its production. Anything else is a committed failure.
 */
export const declined = (error: ParseError, offset: number): boolean =>
  error._tag === "NoMatch" && error.offset === offset
