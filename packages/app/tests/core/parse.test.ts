import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { ParseError } from "../../src/core/errors.js"
import type { ParseOverrides } from "../../src/core/parse.js"
import { MAX_DEPTH_LIMIT, parse, parseEffect } from "../../src/core/parse.js"
import type { JsonValue } from "../../src/core/value.js"
import {
  equals,
  INT64_MAX,
  INT64_MIN,
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString
} from "../../src/core/value.js"

const parsed = (text: string, options?: ParseOverrides): JsonValue => {
  const result = parse(text, options)
  if (Either.isLeft(result)) {
    throw new Error(`unexpected failure for ${JSON.stringify(text)}: ${JSON.stringify(result.left)}`)
  }
  return result.right
}

const failure = (text: string, options?: ParseOverrides): ParseError => {
  const result = parse(text, options)
  if (Either.isRight(result)) {
    throw new Error(`expected failure for ${JSON.stringify(text)}`)
  }
  return result.left
}

describe("parse: literals", () => {
  it.effect("parses keywords", () =>
    Effect.sync(() => {
      expect(parsed("null")).toEqual(jsonNull)
      expect(parsed("true")).toEqual(jsonBool(true))
      expect(parsed("false")).toEqual(jsonBool(false))
    }))

  it.effect("parses integer literals as Int", () =>
    Effect.sync(() => {
      expect(parsed("0")).toEqual(jsonInt(0n))
      expect(parsed("42")).toEqual(jsonInt(42n))
      expect(parsed("-17")).toEqual(jsonInt(-17n))
      expect(parsed("+5")).toEqual(jsonInt(5n))
      expect(parsed("9223372036854775807")).toEqual(jsonInt(INT64_MAX))
      expect(parsed("-9223372036854775808")).toEqual(jsonInt(INT64_MIN))
    }))

  it.effect("rejects integers outside the signed 64-bit range", () =>
    Effect.sync(() => {
      expect(failure("9223372036854775808")).toEqual({
        _tag: "MalformedNumber",
        offset: 0,
        expected: "integer within the signed 64-bit range"
      })
    }))

  it.effect("parses decimal and scientific literals as Float", () =>
    Effect.sync(() => {
      expect(parsed("123.456")).toEqual(jsonFloat(123.456))
      expect(parsed("-123.456")).toEqual(jsonFloat(-123.456))
      expect(parsed("1.05")).toEqual(jsonFloat(1.05))
      expect(parsed("1.23e4")).toEqual(jsonFloat(12300))
      expect(parsed("1.23e+4")).toEqual(jsonFloat(12300))
      expect(parsed("1.23e-4")).toEqual(jsonFloat(0.000123))
      expect(parsed("2E-2")).toEqual(jsonFloat(0.02))
    }))

  it.effect("treats an exponent without a decimal point as Float", () =>
    Effect.sync(() => {
      expect(parsed("1e3")).toEqual(jsonFloat(1000))
      expect(parsed("-4E0")).toEqual(jsonFloat(-4))
    }))

  it.effect("reports malformed numbers at the missing digit", () =>
    Effect.sync(() => {
      expect(failure("-")).toEqual({ _tag: "MalformedNumber", offset: 1, expected: "digit after sign" })
      expect(failure("1.")).toEqual({ _tag: "MalformedNumber", offset: 2, expected: "digit after '.'" })
      expect(failure("1e")).toEqual({ _tag: "MalformedNumber", offset: 2, expected: "exponent digit" })
      expect(failure("1e+")).toEqual({ _tag: "MalformedNumber", offset: 3, expected: "exponent digit" })
      expect(failure("1e999")).toEqual({ _tag: "MalformedNumber", offset: 0, expected: "finite number" })
    }))

  it.effect("decodes string escapes", () =>
    Effect.sync(() => {
      expect(parsed("\"hello\"")).toEqual(jsonString("hello"))
      expect(parsed("\"a\\\"b\"")).toEqual(jsonString("a\"b"))
      expect(parsed("\"\\u0041\\n\\t\\/\\\\\"")).toEqual(jsonString("A\n\t/\\"))
      expect(parsed("\"\\ud83d\\ude00\"")).toEqual(jsonString("\ud83d\ude00"))
      expect(parsed("\"line\nbreak\"")).toEqual(jsonString("line\nbreak"))
    }))

  it.effect("rejects invalid escapes", () =>
    Effect.sync(() => {
      expect(failure("\"\\x\"")).toEqual({
        _tag: "InvalidEscape",
        offset: 1,
        expected: "one of \\\" \\\\ \\/ \\b \\f \\n \\r \\t \\u"
      })
      expect(failure("\"\\u12\"")).toEqual({
        _tag: "InvalidEscape",
        offset: 1,
        expected: "four hex digits after '\\u'"
      })
    }))
})

describe("parse: containers", () => {
  it.effect("keeps array elements in source order", () =>
    Effect.sync(() => {
      expect(parsed("[1, 2, 3]")).toEqual(jsonArray([jsonInt(1n), jsonInt(2n), jsonInt(3n)]))
      expect(parsed("[\"a\", \"b\", \"c\"]")).toEqual(
        jsonArray([jsonString("a"), jsonString("b"), jsonString("c")])
      )
      expect(parsed("[]")).toEqual(jsonArray([]))
    }))

  it.effect("parses objects regardless of entry order", () =>
    Effect.sync(() => {
      const expected = jsonObject([["b", jsonInt(2n)], ["a", jsonInt(1n)]])
      expect(equals(parsed("{\"a\": 1, \"b\": 2}"), expected)).toBe(true)
    }))

  it.effect("nests arrays inside objects", () =>
    Effect.sync(() => {
      const value = parsed("{\"a\": 1, \"b\": [1, 2, 3]}")
      expect(value).toEqual(
        jsonObject([
          ["a", jsonInt(1n)],
          ["b", jsonArray([jsonInt(1n), jsonInt(2n), jsonInt(3n)])]
        ])
      )
    }))

  it.effect("keeps the last value of a duplicated key", () =>
    Effect.sync(() => {
      const value = parsed("{\"a\": 1, \"a\": 2}")
      expect(value).toEqual(jsonObject([["a", jsonInt(2n)]]))
    }))

  it.effect("ignores whitespace around delimiters and brackets", () =>
    Effect.sync(() => {
      const compact = parsed("{\"a\":[1,2],\"b\":{\"c\":null}}")
      const spaced = parsed(" \n{ \"a\" :\t[ 1 ,\r\n 2 ] ,\n\"b\" : {\"c\"  :  null } }\t\n")
      expect(equals(compact, spaced)).toBe(true)
    }))

  it.effect("rejects an empty object by default", () =>
    Effect.sync(() => {
      expect(failure("{}")).toEqual({ _tag: "NoMatch", offset: 1, expected: "string key" })
    }))

  it.effect("accepts an empty object when allowed", () =>
    Effect.sync(() => {
      expect(parsed("{}", { allowEmptyObject: true })).toEqual(jsonObject([]))
      expect(parsed("{\"a\": { }}", { allowEmptyObject: true })).toEqual(
        jsonObject([["a", jsonObject([])]])
      )
    }))

  it.effect("rejects trailing commas and missing delimiters", () =>
    Effect.sync(() => {
      expect(failure("[1, 2,]")).toEqual({ _tag: "NoMatch", offset: 6, expected: "value" })
      expect(failure("[1 2]")).toEqual({ _tag: "NoMatch", offset: 3, expected: "',' or ']'" })
      expect(failure("{\"a\" 1}")).toEqual({ _tag: "NoMatch", offset: 5, expected: "':'" })
      expect(failure("{1: 2}")).toEqual({ _tag: "NoMatch", offset: 1, expected: "string key" })
      expect(failure("[")).toEqual({ _tag: "NoMatch", offset: 1, expected: "value" })
    }))
})

describe("parse: failures", () => {
  it.effect("fails on empty input, truncated keywords and open strings", () =>
    Effect.sync(() => {
      expect(failure("")).toEqual({ _tag: "NoMatch", offset: 0, expected: "value" })
      expect(failure("tru")).toEqual({ _tag: "NoMatch", offset: 0, expected: "value" })
      expect(failure("nul")).toEqual({ _tag: "NoMatch", offset: 0, expected: "value" })
      expect(failure("\"unterminated")).toEqual({
        _tag: "UnterminatedString",
        offset: 13,
        expected: "closing '\"'"
      })
    }))

  it.effect("rejects text after the value", () =>
    Effect.sync(() => {
      expect(failure("[1] x")).toEqual({ _tag: "NoMatch", offset: 4, expected: "end of input" })
      expect(failure("1 2")).toEqual({ _tag: "NoMatch", offset: 2, expected: "end of input" })
    }))
})

describe("parse: depth guard", () => {
  it.effect("allows nesting up to maxDepth", () =>
    Effect.sync(() => {
      expect(parsed("[[1]]", { maxDepth: 2 })).toEqual(jsonArray([jsonArray([jsonInt(1n)])]))
    }))

  it.effect("fails with DepthExceeded at the first container past the limit", () =>
    Effect.sync(() => {
      expect(failure("[[[1]]]", { maxDepth: 2 })).toEqual({
        _tag: "DepthExceeded",
        offset: 2,
        expected: "at most 2 nested containers",
        maxDepth: 2
      })
      expect(failure("{\"a\": {\"b\": 1}}", { maxDepth: 1 })).toEqual({
        _tag: "DepthExceeded",
        offset: 6,
        expected: "at most 1 nested containers",
        maxDepth: 1
      })
    }))

  it.effect("applies the default limit of 512", () =>
    Effect.sync(() => {
      const nested = (depth: number): string => "[".repeat(depth) + "]".repeat(depth)
      expect(Either.isRight(parse(nested(512)))).toBe(true)
      const tooDeep = failure(nested(513))
      expect(tooDeep._tag).toBe("DepthExceeded")
      expect(tooDeep.offset).toBe(512)
    }))

  it.effect("keeps the default when overrides are undefined", () =>
    Effect.sync(() => {
      const nested = "[".repeat(513) + "]".repeat(513)
      expect(failure(nested, { maxDepth: undefined, allowEmptyObject: undefined })).toEqual({
        _tag: "DepthExceeded",
        offset: 512,
        expected: "at most 512 nested containers",
        maxDepth: 512
      })
      expect(failure("{}", { allowEmptyObject: undefined })._tag).toBe("NoMatch")
    }))

  it.effect("caps oversized limits so deep input fails instead of overflowing", () =>
    Effect.sync(() => {
      const nested = "[".repeat(100_000) + "]".repeat(100_000)
      expect(failure(nested, { maxDepth: 1_000_000 })).toEqual({
        _tag: "DepthExceeded",
        offset: MAX_DEPTH_LIMIT,
        expected: `at most ${MAX_DEPTH_LIMIT} nested containers`,
        maxDepth: MAX_DEPTH_LIMIT
      })
    }))
})

describe("parse: determinism", () => {
  it.effect("produces structurally equal trees for identical input", () =>
    Effect.sync(() => {
      const text = `{
        "name": "Grace",
        "age": 85,
        "retired": true,
        "scores": [90.0, -80.0, 85.1],
        "office": { "city": "Arlington", "zip": 22201, "floor": null }
      }`
      const first = parsed(text)
      const second = parsed(text)
      expect(first).not.toBe(second)
      expect(equals(first, second)).toBe(true)
    }))

  it.effect("exposes the same result through Effect", () =>
    Effect.gen(function*(_) {
      const value = yield* _(parseEffect("[true]"))
      expect(value).toEqual(jsonArray([jsonBool(true)]))
      const error = yield* _(Effect.flip(parseEffect("[true,]")))
      expect(error).toEqual({ _tag: "NoMatch", offset: 6, expected: "value" })
    }))
})
