import { Match } from "effect"

import type { JsonMap, JsonValue } from "./json.js"

// CHANGE: serialize JsonValue trees back to text without JSON.stringify
// WHY: escaping must mirror the parser so strings round-trip
// QUOTE(TZ): "emits {, then for each entry \"key\":value, ... then }"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(serialize(v)) = v for finite floats without exponent form
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: compact output has no whitespace outside strings
// COMPLEXITY: O(n)

export interface SerializeOptions {
  readonly indent?: number
}

const namedEscapes: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const escapeChar = (char: string): string => {
  const named = namedEscapes[char]
  if (named !== undefined) {
    return named
  }
  const code = char.charCodeAt(0)
  return code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : char
}

export const quoteString = (text: string): string => {
  let result = "\""
  for (const char of text) {
    result += escapeChar(char)
  }
  return result + "\""
}

const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  if (Number.isInteger(value) && Math.abs(value) < 1e21) {
    return value.toFixed(1)
  }
  return String(value)
}

interface Layout {
  readonly indent: number
  readonly level: number
}

const nested = (layout: Layout): Layout => ({ ...layout, level: layout.level + 1 })

const wrap = (open: string, close: string, parts: ReadonlyArray<string>, layout: Layout): string => {
  if (parts.length === 0) {
    return open + close
  }
  if (layout.indent <= 0) {
    return open + parts.join(",") + close
  }
  const inner = " ".repeat(layout.indent * (layout.level + 1))
  const outer = " ".repeat(layout.indent * layout.level)
  return `${open}\n${parts.map((part) => inner + part).join(",\n")}\n${outer}${close}`
}

const renderObject = (entries: JsonMap, layout: Layout): string => {
  const separator = layout.indent > 0 ? ": " : ":"
  const parts = [...entries].map(([key, value]) =>
    quoteString(key) + separator + renderValue(value, nested(layout))
  )
  return wrap("{", "}", parts, layout)
}

const renderArray = (items: ReadonlyArray<JsonValue>, layout: Layout): string =>
  wrap("[", "]", items.map((item) => renderValue(item, nested(layout))), layout)

const renderValue = (value: JsonValue, layout: Layout): string =>
  Match.value(value).pipe(
    Match.when({ _tag: "Null" }, () => "null"),
    Match.when({ _tag: "Bool" }, (node) => String(node.value)),
    Match.when({ _tag: "Int" }, (node) => node.value.toString()),
    Match.when({ _tag: "Float" }, (node) => formatFloat(node.value)),
    Match.when({ _tag: "String" }, (node) => quoteString(node.value)),
    Match.when({ _tag: "Object" }, (node) => renderObject(node.entries, layout)),
    Match.when({ _tag: "Array" }, (node) => renderArray(node.items, layout)),
    Match.exhaustive
  )

const rootLayout = (options: SerializeOptions | undefined): Layout => ({
  indent: options?.indent ?? 0,
  level: 0
})

/**
 * Serialize a map as an object; entries keep their iteration order.
 *
 * @pure true
 * @invariant empty map → "{}"
 * @complexity O(n)
 */
export const toJsonObject = (entries: JsonMap, options?: SerializeOptions): string =>
  renderObject(entries, rootLayout(options))

/**
 * Serialize a sequence as an array.
 *
 * @pure true
 * @invariant empty sequence → "[]"
 * @complexity O(n)
 */
export const toJsonArray = (items: ReadonlyArray<JsonValue>, options?: SerializeOptions): string =>
  renderArray(items, rootLayout(options))

export const serialize = (value: JsonValue, options?: SerializeOptions): string =>
  renderValue(value, rootLayout(options))
