import { Match, Order } from "effect"

import type { JsonValue, Num } from "./value.js"

// CHANGE: debug rendering of value trees
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rendering is deterministic; object entries appear sorted by key
// COMPLEXITY: O(n log n) for object keys, O(n) otherwise

const INDENT = "  "

const formatFloat = (value: number): string => {
  const text = Object.is(value, -0) ? "-0" : String(value)
  return /[.e]/.test(text) ? text : `${text}.0`
}

const formatNum = (num: Num): string =>
  Match.value(num).pipe(
    Match.tag("Int", (n) => `Int(${n.value.toString()})`),
    Match.tag("Float", (n) => `Float(${formatFloat(n.value)})`),
    Match.exhaustive
  )

const formatArray = (items: ReadonlyArray<JsonValue>, level: number): string => {
  if (items.length === 0) {
    return "Array []"
  }
  const pad = INDENT.repeat(level + 1)
  const lines = items.map((item) => `${pad}${render(item, level + 1)},`)
  return ["Array [", ...lines, `${INDENT.repeat(level)}]`].join("\n")
}

const formatObject = (entries: ReadonlyMap<string, JsonValue>, level: number): string => {
  if (entries.size === 0) {
    return "Object {}"
  }
  const pad = INDENT.repeat(level + 1)
  const keys = [...entries.keys()].toSorted(Order.string)
  const lines = keys.flatMap((key) => {
    const entry = entries.get(key)
    return entry === undefined ? [] : [`${pad}${JSON.stringify(key)}: ${render(entry, level + 1)},`]
  })
  return ["Object {", ...lines, `${INDENT.repeat(level)}}`].join("\n")
}

const render = (value: JsonValue, level: number): string =>
  Match.value(value).pipe(
    Match.tag("Null", () => "Null"),
    Match.tag("Bool", (v) => `Bool(${String(v.value)})`),
    Match.tag("Number", (v) => `Number(${formatNum(v.value)})`),
    Match.tag("String", (v) => `String(${JSON.stringify(v.value)})`),
    Match.tag("Array", (v) => formatArray(v.items, level)),
    Match.tag("Object", (v) => formatObject(v.entries, level)),
    Match.exhaustive
  )

/**
 * Render a value tree as indented debug text.
 *
 * @example
 * formatValue(jsonArray([jsonInt(1n)]))
 * // Array [
 * //   Number(Int(1)),
 * // ]
 *
 * @pure true
 * @complexity O(n log n)
 */
export const formatValue = (value: JsonValue): string => render(value, 0)
