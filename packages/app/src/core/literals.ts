import * as Either from "effect/Either"

import type { Recognizer, Step } from "./cursor.js"
import { isDigit, scanDigits, step } from "./cursor.js"
import { invalidEscape, malformedNumber, noMatch, unterminatedString } from "./errors.js"
import type { ParseError } from "./errors.js"
import type { Num } from "./value.js"
import { float, int, INT64_MAX, INT64_MIN } from "./value.js"

// CHANGE: leaf recognizers for keywords, numbers and strings
// WHY: the value dispatcher composes these in a fixed priority order
// FORMAT THEOREM: ∀s: number(s) = Right(Int(n)) ↔ s has neither '.' nor an exponent marker
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a recognizer fails with NoMatch at its start offset iff it consumed nothing
// COMPLEXITY: O(k) where k = length of the recognized literal

const keyword = <A>(text: string, value: A): Recognizer<A> => (input, offset) =>
  input.startsWith(text, offset)
    ? Either.right(step(value, offset + text.length))
    : Either.left(noMatch(offset, text))

export const recognizeNull: Recognizer<null> = keyword("null", null)

const recognizeTrue = keyword("true", true)
const recognizeFalse = keyword("false", false)

export const recognizeBool: Recognizer<boolean> = (input, offset) => {
  const result = recognizeTrue(input, offset)
  if (Either.isRight(result)) {
    return result
  }
  return Either.mapLeft(recognizeFalse(input, offset), () => noMatch(offset, "true or false"))
}

interface NumberParts {
  readonly negative: boolean
  readonly integer: string
  readonly fraction: string | undefined
  readonly exponent: string | undefined
  readonly end: number
}

const readSign = (input: string, offset: number): { readonly negative: boolean; readonly offset: number } => {
  const char = input.charAt(offset)
  if (char === "+" || char === "-") {
    return { negative: char === "-", offset: offset + 1 }
  }
  return { negative: false, offset }
}

const readFraction = (
  input: string,
  offset: number
): Either.Either<Step<string | undefined>, ParseError> => {
  if (input.charAt(offset) !== ".") {
    return Either.right(step(undefined, offset))
  }
  const end = scanDigits(input, offset + 1)
  if (end === offset + 1) {
    return Either.left(malformedNumber(offset + 1, "digit after '.'"))
  }
  return Either.right(step(input.slice(offset + 1, end), end))
}

const readExponent = (
  input: string,
  offset: number
): Either.Either<Step<string | undefined>, ParseError> => {
  const marker = input.charAt(offset)
  if (marker !== "e" && marker !== "E") {
    return Either.right(step(undefined, offset))
  }
  const sign = readSign(input, offset + 1)
  const end = scanDigits(input, sign.offset)
  if (end === sign.offset) {
    return Either.left(malformedNumber(sign.offset, "exponent digit"))
  }
  const digits = input.slice(sign.offset, end)
  return Either.right(step(sign.negative ? `-${digits}` : digits, end))
}

const readNumberParts = (input: string, offset: number): Either.Either<NumberParts, ParseError> => {
  const sign = readSign(input, offset)
  const integerEnd = scanDigits(input, sign.offset)
  if (integerEnd === sign.offset) {
    return Either.left(
      sign.offset === offset ? noMatch(offset, "number") : malformedNumber(sign.offset, "digit after sign")
    )
  }
  const fraction = readFraction(input, integerEnd)
  if (Either.isLeft(fraction)) {
    return Either.left(fraction.left)
  }
  const exponent = readExponent(input, fraction.right.offset)
  if (Either.isLeft(exponent)) {
    return Either.left(exponent.left)
  }
  return Either.right({
    negative: sign.negative,
    integer: input.slice(sign.offset, integerEnd),
    fraction: fraction.right.value,
    exponent: exponent.right.value,
    end: exponent.right.offset
  })
}

const toInt = (parts: NumberParts, offset: number): Either.Either<Num, ParseError> => {
  const magnitude = BigInt(parts.integer)
  const value = parts.negative ? -magnitude : magnitude
  if (value < INT64_MIN || value > INT64_MAX) {
    return Either.left(malformedNumber(offset, "integer within the signed 64-bit range"))
  }
  return Either.right(int(value))
}

const toFloat = (parts: NumberParts, offset: number): Either.Either<Num, ParseError> => {
  const magnitude = Number(`${parts.integer}.${parts.fraction ?? "0"}e${parts.exponent ?? "0"}`)
  if (!Number.isFinite(magnitude)) {
    return Either.left(malformedNumber(offset, "finite number"))
  }
  return Either.right(float(parts.negative ? -magnitude : magnitude))
}

/**
 * Recognize `[sign] digits ['.' digits] [('e'|'E') [sign] digits]`.
 *
 * A literal with a fractional part or an exponent becomes `Float`, even when
 * the exponent appears without a decimal point (`1e3`); anything else is
 * `Int`.
 *
 * @pure true
 * @invariant Int results lie in the signed 64-bit range
 * @complexity O(k)
 */
export const recognizeNumber: Recognizer<Num> = (input, offset) => {
  const parts = readNumberParts(input, offset)
  if (Either.isLeft(parts)) {
    return Either.left(parts.left)
  }
  const isFloat = parts.right.fraction !== undefined || parts.right.exponent !== undefined
  const num = isFloat ? toFloat(parts.right, offset) : toInt(parts.right, offset)
  return Either.map(num, (value) => step(value, parts.right.end))
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const isHex = (char: string): boolean => isDigit(char) || (char >= "a" && char <= "f") || (char >= "A" && char <= "F")

const decodeEscape = (input: string, offset: number): Either.Either<Step<string>, ParseError> => {
  const char = input.charAt(offset + 1)
  if (char === "") {
    return Either.left(unterminatedString(input.length))
  }
  if (char === "u") {
    const hex = input.slice(offset + 2, offset + 6)
    if (hex.length !== 4 || ![...hex].every(isHex)) {
      return Either.left(invalidEscape(offset, "four hex digits after '\\u'"))
    }
    return Either.right(step(String.fromCharCode(Number.parseInt(hex, 16)), offset + 6))
  }
  const decoded = simpleEscapes[char]
  if (decoded === undefined) {
    return Either.left(invalidEscape(offset, "one of \\\" \\\\ \\/ \\b \\f \\n \\r \\t \\u"))
  }
  return Either.right(step(decoded, offset + 2))
}

/**
 * Recognize a double-quoted string and decode its escape sequences.
 *
 * Characters other than `"` and `\` are copied verbatim, raw newlines
 * included.
 *
 * @pure true
 * @complexity O(k)
 */
export const recognizeString: Recognizer<string> = (input, offset) => {
  if (input.charAt(offset) !== "\"") {
    return Either.left(noMatch(offset, "string"))
  }
  let result = ""
  let chunkStart = offset + 1
  let index = chunkStart
  while (index < input.length) {
    const char = input.charAt(index)
    if (char === "\"") {
      return Either.right(step(result + input.slice(chunkStart, index), index + 1))
    }
    if (char === "\\") {
      const escape = decodeEscape(input, index)
      if (Either.isLeft(escape)) {
        return Either.left(escape.left)
      }
      result += input.slice(chunkStart, index) + escape.right.value
      index = escape.right.offset
      chunkStart = index
    } else {
      index += 1
    }
  }
  return Either.left(unterminatedString(input.length))
}
