import * as Either from "effect/Either"

import type { InvalidArray, InvalidInput, InvalidObject, InvalidValue, ParseError } from "./errors.js"
import { formatJsonError, invalidArray, invalidInput, invalidObject, invalidValue } from "./errors.js"
import type { JsonMap, JsonValue } from "./json.js"
import { jsonArray, jsonBool, jsonFloat, jsonInt, jsonNull, jsonObject, jsonString } from "./json.js"
import { maxDepth, scanPairs, splitTopLevel } from "./scanner.js"

// CHANGE: parse JSON-like text into a JsonValue tree without JSON.parse
// WHY: containers are located by depth counting, leaves by anchored patterns
// QUOTE(TZ): "implemented with manual quote/bracket-depth tracking rather than a formal tokenizer"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → v._tag ∈ {Object, Array}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: parseArray never returns a partially filled array
// COMPLEXITY: O(n·d) where d = nesting depth

// Containers nested deeper than this are rejected before any recursion.
export const MAX_NESTING_DEPTH = 1000

const TOO_DEEP = "nesting too deep"

const QUOTED_STRING = /^"(?:[^"\\]|\\.)*"$/su
const NUMBER = /^[+-]?\d+(?:\.\d+)?$/u
const HEX4 = /^[0-9a-fA-F]{4}$/u

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

const unescapeBody = (body: string): string | undefined => {
  let result = ""
  let index = 0
  while (index < body.length) {
    const char = body.charAt(index)
    if (char !== "\\") {
      result += char
      index += 1
      continue
    }
    const next = body.charAt(index + 1)
    if (next === "u") {
      const hex = body.slice(index + 2, index + 6)
      if (!HEX4.test(hex)) {
        return undefined
      }
      result += String.fromCharCode(Number.parseInt(hex, 16))
      index += 6
      continue
    }
    const decoded = simpleEscapes[next]
    if (decoded === undefined) {
      return undefined
    }
    result += decoded
    index += 2
  }
  return result
}

const readQuoted = (token: string): string | undefined =>
  QUOTED_STRING.test(token) ? unescapeBody(token.slice(1, -1)) : undefined

const parseNumber = (token: string): Either.Either<JsonValue, InvalidValue> => {
  if (!token.includes(".")) {
    return Either.right(jsonInt(BigInt(token)))
  }
  const value = Number(token)
  return Number.isFinite(value) ? Either.right(jsonFloat(value)) : Either.left(invalidValue(token))
}

const parseLeaf = (token: string): Either.Either<JsonValue, InvalidValue> => {
  if (QUOTED_STRING.test(token)) {
    const decoded = unescapeBody(token.slice(1, -1))
    return decoded === undefined ? Either.left(invalidValue(token)) : Either.right(jsonString(decoded))
  }
  if (NUMBER.test(token)) {
    return parseNumber(token)
  }
  if (token === "true" || token === "false") {
    return Either.right(jsonBool(token === "true"))
  }
  if (token === "null") {
    return Either.right(jsonNull)
  }
  return Either.left(invalidValue(token))
}

/**
 * Parse one token into a JsonValue.
 *
 * Tries object, array, quoted string, number, boolean and null, in that order.
 *
 * @param token - A trimmed token.
 * @returns Either with the value or the failure of the matching grammar.
 *
 * @pure true
 * @invariant Int iff the numeric literal has no decimal point
 * @complexity O(n)
 */
export const parseValue = (token: string): Either.Either<JsonValue, ParseError> => {
  if (token.startsWith("{")) {
    return Either.map(parseObject(token), jsonObject)
  }
  if (token.startsWith("[")) {
    return Either.map(parseArray(token), jsonArray)
  }
  return parseLeaf(token)
}

/**
 * Parse object text into an insertion-ordered map.
 *
 * @param text - Object text; surrounding whitespace is ignored.
 * @returns Either with the entries or InvalidObject.
 *
 * @pure true
 * @invariant duplicate keys: last value wins, first position is kept
 * @invariant nesting deeper than MAX_NESTING_DEPTH fails with InvalidObject
 * @complexity O(n·d)
 */
export const parseObject = (text: string): Either.Either<JsonMap, InvalidObject> => {
  const trimmed = text.trim()
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) {
    return Either.left(invalidObject(trimmed, "expected object braces"))
  }
  if (maxDepth(trimmed) > MAX_NESTING_DEPTH) {
    return Either.left(invalidObject(trimmed, TOO_DEEP))
  }
  const scanned = scanPairs(trimmed.slice(1, -1))
  if (Either.isLeft(scanned)) {
    return Either.left(invalidObject(trimmed, scanned.left))
  }
  const entries = new Map<string, JsonValue>()
  for (const pair of scanned.right) {
    const rawKey = pair.key.trim()
    const key = readQuoted(rawKey)
    if (key === undefined) {
      return Either.left(invalidObject(trimmed, `invalid key '${rawKey}'`))
    }
    if (pair.value === undefined) {
      return Either.left(invalidObject(trimmed, `missing colon after key '${key}'`))
    }
    const token = pair.value.trim()
    if (token.length === 0) {
      return Either.left(invalidObject(trimmed, `missing value for key '${key}'`))
    }
    const value = parseValue(token)
    if (Either.isLeft(value)) {
      return Either.left(invalidObject(trimmed, formatJsonError(value.left)))
    }
    entries.set(key, value.right)
  }
  return Either.right(entries)
}

/**
 * Parse array text into its elements.
 *
 * @param text - Array text; surrounding whitespace is ignored.
 * @returns Either with the elements or InvalidArray naming the first bad item.
 *
 * @pure true
 * @invariant element order follows the source
 * @invariant nesting deeper than MAX_NESTING_DEPTH fails with InvalidArray
 * @complexity O(n·d)
 */
export const parseArray = (text: string): Either.Either<ReadonlyArray<JsonValue>, InvalidArray> => {
  const trimmed = text.trim()
  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    return Either.left(invalidArray(trimmed, "expected array brackets"))
  }
  if (maxDepth(trimmed) > MAX_NESTING_DEPTH) {
    return Either.left(invalidArray(trimmed, TOO_DEEP))
  }
  const interior = trimmed.slice(1, -1)
  if (interior.trim().length === 0) {
    return Either.right([])
  }
  const segments = splitTopLevel(interior)
  if (Either.isLeft(segments)) {
    return Either.left(invalidArray(trimmed, segments.left))
  }
  const items: Array<JsonValue> = []
  for (const segment of segments.right) {
    const item = segment.trim()
    if (item.length === 0) {
      return Either.left(invalidArray(trimmed, "empty item"))
    }
    const value = parseValue(item)
    if (Either.isLeft(value)) {
      return Either.left(invalidArray(trimmed, `invalid item '${item}': ${formatJsonError(value.left)}`))
    }
    items.push(value.right)
  }
  return Either.right(items)
}

/**
 * Parse a top-level document; it must be an object or an array.
 *
 * @pure true
 * @complexity O(n·d)
 */
export const parse = (
  text: string
): Either.Either<JsonValue, InvalidInput | InvalidObject | InvalidArray> => {
  const trimmed = text.trim()
  if (trimmed.startsWith("{")) {
    return Either.map(parseObject(trimmed), jsonObject)
  }
  if (trimmed.startsWith("[")) {
    return Either.map(parseArray(trimmed), jsonArray)
  }
  return Either.left(invalidInput(text))
}
