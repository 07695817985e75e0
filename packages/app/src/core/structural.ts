import * as Either from "effect/Either"

import type { Step } from "./cursor.js"
import { declined, skipWhitespace, step } from "./cursor.js"
import { depthExceeded, noMatch } from "./errors.js"
import type { ParseError } from "./errors.js"
import { recognizeString } from "./literals.js"
import type { JsonValue } from "./value.js"

// CHANGE: array and object combinators over a caller-supplied value recognizer
// WHY: recursion goes through the recognizer argument, with depth passed explicitly
// FORMAT THEOREM: ∀d: array(value)(s, d) = Right(xs) → every x ∈ xs was parsed at depth d + 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: depth never exceeds maxDepth in a successful result
// COMPLEXITY: O(n) per container, excluding nested values

export type ValueRecognizer = (
  input: string,
  offset: number,
  depth: number
) => Either.Either<Step<JsonValue>, ParseError>

export type ContainerRecognizer<A> = (
  input: string,
  offset: number,
  depth: number
) => Either.Either<Step<A>, ParseError>

export interface StructuralOptions {
  readonly maxDepth: number
  readonly allowEmptyObject: boolean
}

const open = (
  input: string,
  offset: number,
  depth: number,
  bracket: string,
  maxDepth: number
): Either.Either<number, ParseError> => {
  if (input.charAt(offset) !== bracket) {
    return Either.left(noMatch(offset, `'${bracket}'`))
  }
  if (depth + 1 > maxDepth) {
    return Either.left(depthExceeded(offset, maxDepth))
  }
  return Either.right(depth + 1)
}

/**
 * Build the recognizer for `'[' ws (value ws (',' ws value ws)*)? ']'`.
 *
 * @param value - Recognizer invoked for every element.
 * @param options - Depth limit.
 *
 * @pure true
 * @invariant elements keep source order; a trailing comma is rejected
 */
export const recognizeArray = (
  value: ValueRecognizer,
  options: Pick<StructuralOptions, "maxDepth">
): ContainerRecognizer<ReadonlyArray<JsonValue>> =>
(input, offset, depth) => {
  const opened = open(input, offset, depth, "[", options.maxDepth)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const items: Array<JsonValue> = []
  let index = skipWhitespace(input, offset + 1)
  if (input.charAt(index) === "]") {
    return Either.right(step(items, index + 1))
  }
  while (index <= input.length) {
    const item = value(input, index, opened.right)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right.value)
    index = skipWhitespace(input, item.right.offset)
    const next = input.charAt(index)
    if (next === "]") {
      return Either.right(step(items, index + 1))
    }
    if (next !== ",") {
      return Either.left(noMatch(index, "',' or ']'"))
    }
    index = skipWhitespace(input, index + 1)
  }
  return Either.left(noMatch(input.length, "']'"))
}

const recognizeKey = (input: string, offset: number): Either.Either<Step<string>, ParseError> =>
  Either.mapLeft(
    recognizeString(input, offset),
    (error) => declined(error, offset) ? noMatch(offset, "string key") : error
  )

/**
 * Build the recognizer for `'{' ws pair ws (',' ws pair ws)* '}'`.
 *
 * At least one pair is required unless `allowEmptyObject` is set. A key seen
 * twice keeps the value of its last pair.
 *
 * @param value - Recognizer invoked for every member value.
 * @param options - Depth limit and empty-object policy.
 *
 * @pure true
 */
export const recognizeObject = (
  value: ValueRecognizer,
  options: StructuralOptions
): ContainerRecognizer<ReadonlyMap<string, JsonValue>> =>
(input, offset, depth) => {
  const opened = open(input, offset, depth, "{", options.maxDepth)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entries = new Map<string, JsonValue>()
  let index = skipWhitespace(input, offset + 1)
  if (options.allowEmptyObject && input.charAt(index) === "}") {
    return Either.right(step(entries, index + 1))
  }
  while (index <= input.length) {
    const key = recognizeKey(input, index)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    index = skipWhitespace(input, key.right.offset)
    if (input.charAt(index) !== ":") {
      return Either.left(noMatch(index, "':'"))
    }
    const member = value(input, skipWhitespace(input, index + 1), opened.right)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    entries.set(key.right.value, member.right.value)
    index = skipWhitespace(input, member.right.offset)
    const next = input.charAt(index)
    if (next === "}") {
      return Either.right(step(entries, index + 1))
    }
    if (next !== ",") {
      return Either.left(noMatch(index, "',' or '}'"))
    }
    index = skipWhitespace(input, index + 1)
  }
  return Either.left(noMatch(input.length, "'}'"))
}
