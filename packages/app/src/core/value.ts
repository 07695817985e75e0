import { Match } from "effect"

// CHANGE: introduce the JsonValue tree produced by the parser
// WHY: callers match exhaustively on a closed set of variants instead of probing `typeof`
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Null, Bool, Number, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int payloads lie in [-2^63, 2^63 - 1]; trees are finite and acyclic
// COMPLEXITY: O(1) construction, O(n) equality

export type Num =
  | { readonly _tag: "Int"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }

export type JsonNull = { readonly _tag: "Null" }
export type JsonBool = { readonly _tag: "Bool"; readonly value: boolean }
export type JsonNumber = { readonly _tag: "Number"; readonly value: Num }
export type JsonString = { readonly _tag: "String"; readonly value: string }
export type JsonArray = { readonly _tag: "Array"; readonly items: ReadonlyArray<JsonValue> }
export type JsonObject = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, JsonValue> }

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObject

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

export const int = (value: bigint): Num => ({ _tag: "Int", value })

export const float = (value: number): Num => ({ _tag: "Float", value })

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBool = (value: boolean): JsonBool => ({ _tag: "Bool", value })

export const jsonNumber = (value: Num): JsonNumber => ({ _tag: "Number", value })

export const jsonInt = (value: bigint): JsonNumber => jsonNumber(int(value))

export const jsonFloat = (value: number): JsonNumber => jsonNumber(float(value))

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({ _tag: "Array", items })

export const jsonObject = (entries: Iterable<readonly [string, JsonValue]>): JsonObject => ({
  _tag: "Object",
  entries: new Map(entries)
})

const numEquals = (left: Num, right: Num): boolean =>
  Match.value(left).pipe(
    Match.tag("Int", (l) => right._tag === "Int" && l.value === right.value),
    // 0 and -0 compare equal, NaN never reaches the tree
    Match.tag("Float", (l) => right._tag === "Float" && l.value === right.value),
    Match.exhaustive
  )

const arrayEquals = (left: ReadonlyArray<JsonValue>, right: ReadonlyArray<JsonValue>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  return left.every((item, index) => {
    const other = right[index]
    return other !== undefined && equals(item, other)
  })
}

const objectEquals = (
  left: ReadonlyMap<string, JsonValue>,
  right: ReadonlyMap<string, JsonValue>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    const other = right.get(key)
    if (other === undefined || !equals(value, other)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality of two value trees.
 *
 * `Int` and `Float` never compare equal to each other, even for the same
 * magnitude. Object comparison ignores entry order.
 *
 * @pure true
 * @complexity O(n) where n = number of nodes
 */
export const equals = (left: JsonValue, right: JsonValue): boolean =>
  Match.value(left).pipe(
    Match.tag("Null", () => right._tag === "Null"),
    Match.tag("Bool", (l) => right._tag === "Bool" && l.value === right.value),
    Match.tag("Number", (l) => right._tag === "Number" && numEquals(l.value, right.value)),
    Match.tag("String", (l) => right._tag === "String" && l.value === right.value),
    Match.tag("Array", (l) => right._tag === "Array" && arrayEquals(l.items, right.items)),
    Match.tag("Object", (l) => right._tag === "Object" && objectEquals(l.entries, right.entries)),
    Match.exhaustive
  )
