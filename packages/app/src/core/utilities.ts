import * as Either from "effect/Either"

import type { InvalidArray, InvalidObject } from "./errors.js"
import type { JsonMap, JsonValue } from "./json.js"
import { parseArray, parseObject } from "./parse.js"
import type { SerializeOptions } from "./serialize.js"
import { toJsonArray, toJsonObject } from "./serialize.js"

// CHANGE: provide object/array utilities as parse → transform → serialize pipelines
// WHY: callers work on text while transforms stay pure functions over trees
// QUOTE(TZ): "merge, prefix-filter, key-count, key-list, and reverse operations"
// REF: req-utilities-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: keys(merge(a,b)) = keys(a) ∪ keys(b) ∧ ∀k ∈ keys(b): merge(a,b)[k] = b[k]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: inputs are never mutated; every result is a fresh tree
// COMPLEXITY: O(n)

/**
 * Overlay `right` onto `left`.
 *
 * @pure true
 * @invariant keys of `left` keep their positions; new keys follow in `right` order
 * @complexity O(n + m)
 */
export const mergeEntries = (left: JsonMap, right: JsonMap): JsonMap => new Map([...left, ...right])

export const filterEntriesByPrefix = (entries: JsonMap, prefix: string): JsonMap =>
  new Map([...entries].filter(([key]) => key.startsWith(prefix)))

export const reverseItems = (items: ReadonlyArray<JsonValue>): ReadonlyArray<JsonValue> => [...items].reverse()

export const mergeJsonObjects = (
  left: string,
  right: string,
  options?: SerializeOptions
): Either.Either<string, InvalidObject> =>
  Either.flatMap(parseObject(left), (leftEntries) =>
    Either.map(parseObject(right), (rightEntries) =>
      toJsonObject(mergeEntries(leftEntries, rightEntries), options)))

export const filterKeysByPrefix = (
  json: string,
  prefix: string,
  options?: SerializeOptions
): Either.Either<string, InvalidObject> =>
  Either.map(parseObject(json), (entries) => toJsonObject(filterEntriesByPrefix(entries, prefix), options))

export const countJsonObjectKeys = (json: string): Either.Either<number, InvalidObject> =>
  Either.map(parseObject(json), (entries) => entries.size)

export const getJsonObjectKeys = (json: string): Either.Either<ReadonlyArray<string>, InvalidObject> =>
  Either.map(parseObject(json), (entries) => [...entries.keys()])

export const reverseJsonArray = (
  json: string,
  options?: SerializeOptions
): Either.Either<string, InvalidArray> =>
  Either.map(parseArray(json), (items) => toJsonArray(reverseItems(items), options))

/**
 * Check whether text parses as an object.
 *
 * @pure true
 * @invariant never fails; any parse failure maps to false
 */
export const isValidJsonObject = (json: string): boolean => Either.isRight(parseObject(json))

export const isValidJsonArray = (json: string): boolean => Either.isRight(parseArray(json))
