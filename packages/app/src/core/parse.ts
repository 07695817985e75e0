import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { Step } from "./cursor.js"
import { declined, skipWhitespace, step } from "./cursor.js"
import { noMatch } from "./errors.js"
import type { ParseError } from "./errors.js"
import { recognizeBool, recognizeNull, recognizeNumber, recognizeString } from "./literals.js"
import type { StructuralOptions, ValueRecognizer } from "./structural.js"
import { recognizeArray, recognizeObject } from "./structural.js"
import type { JsonValue } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "./value.js"

// CHANGE: value dispatcher and public parse entry point
// WHY: a single call turns a complete text buffer into a value tree or one terminal error
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → skipWs(s) consists of exactly one value followed by whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first committed failure is returned unchanged; no partial tree escapes
// COMPLEXITY: O(n) where n = |input|

export type ParseOptions = StructuralOptions

export const DEFAULT_MAX_DEPTH = 512

/** Largest accepted nesting limit. */
export const MAX_DEPTH_LIMIT = 1024

export interface ParseOverrides {
  readonly maxDepth?: number | undefined
  readonly allowEmptyObject?: boolean | undefined
}

export const defaultParseOptions: ParseOptions = {
  maxDepth: DEFAULT_MAX_DEPTH,
  allowEmptyObject: false
}

/**
 * Fill missing overrides from the defaults and cap the depth limit.
 *
 * @invariant 1 ≤ maxDepth ≤ MAX_DEPTH_LIMIT
 */
export const resolveParseOptions = (options: ParseOverrides): ParseOptions => {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
  return {
    maxDepth: Number.isNaN(maxDepth) ? DEFAULT_MAX_DEPTH : Math.max(1, Math.min(maxDepth, MAX_DEPTH_LIMIT)),
    allowEmptyObject: options.allowEmptyObject ?? defaultParseOptions.allowEmptyObject
  }
}

const lift = <A>(
  result: Either.Either<Step<A>, ParseError>,
  wrap: (value: A) => JsonValue
): Either.Either<Step<JsonValue>, ParseError> => Either.map(result, (found) => step(wrap(found.value), found.offset))

const makeValueRecognizer = (options: ParseOptions): ValueRecognizer => {
  const dispatch: ValueRecognizer = (input, offset, depth) => {
    for (const alternative of alternatives) {
      const result = alternative(input, offset, depth)
      if (Either.isRight(result) || !declined(result.left, offset)) {
        return result
      }
    }
    return Either.left(noMatch(offset, "value"))
  }
  const array = recognizeArray(dispatch, options)
  const object = recognizeObject(dispatch, options)
  const alternatives: ReadonlyArray<ValueRecognizer> = [
    (input, offset) => lift(recognizeNull(input, offset), () => jsonNull),
    (input, offset) => lift(recognizeBool(input, offset), jsonBool),
    (input, offset) => lift(recognizeNumber(input, offset), jsonNumber),
    (input, offset) => lift(recognizeString(input, offset), jsonString),
    (input, offset, depth) => lift(array(input, offset, depth), jsonArray),
    (input, offset, depth) => lift(object(input, offset, depth), jsonObject)
  ]
  return dispatch
}

/**
 * Parse a complete JSON-like document.
 *
 * Whitespace around the document is ignored; anything else after the value
 * is reported as `NoMatch` expecting the end of input.
 *
 * @param text - Complete input text.
 * @param options - Overrides for depth limit and empty-object policy; the
 *   depth limit is capped at MAX_DEPTH_LIMIT.
 * @returns Either with the value tree or the first ParseError.
 *
 * @pure true
 * @invariant Right(v) shares no mutable state with other parses
 * @complexity O(n)
 */
export const parse = (
  text: string,
  options: ParseOverrides = {}
): Either.Either<JsonValue, ParseError> => {
  const value = makeValueRecognizer(resolveParseOptions(options))
  const parsed = value(text, skipWhitespace(text, 0), 0)
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const end = skipWhitespace(text, parsed.right.offset)
  if (end < text.length) {
    return Either.left(noMatch(end, "end of input"))
  }
  return Either.right(parsed.right.value)
}

export const parseEffect = (
  text: string,
  options: ParseOverrides = {}
): Effect.Effect<JsonValue, ParseError> =>
  Effect.suspend(() => {
    const result = parse(text, options)
    return Either.isLeft(result) ? Effect.fail(result.left) : Effect.succeed(result.right)
  })
