// CHANGE: introduce a tagged JSON value tree for the hand-written parser
// WHY: keep integer/float distinction and key order explicit in the type
// QUOTE(TZ): "a tagged union with variants: Null, Bool, Number, String, Object, Array"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Null,Bool,Int,Float,String,Object,Array}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JsonValue is closed under Object/Array nesting; trees are never mutated
// COMPLEXITY: O(1)/O(1)

export type JsonMap = ReadonlyMap<string, JsonValue>

export interface JsonNull {
  readonly _tag: "Null"
}

export interface JsonBool {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface JsonInt {
  readonly _tag: "Int"
  readonly value: bigint
}

export interface JsonFloat {
  readonly _tag: "Float"
  readonly value: number
}

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
}

export interface JsonObject {
  readonly _tag: "Object"
  readonly entries: JsonMap
}

export interface JsonArray {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<JsonValue>
}

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonInt
  | JsonFloat
  | JsonString
  | JsonObject
  | JsonArray

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBool = (value: boolean): JsonBool => ({ _tag: "Bool", value })

export const jsonInt = (value: bigint): JsonInt => ({ _tag: "Int", value })

export const jsonFloat = (value: number): JsonFloat => ({ _tag: "Float", value })

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonObject = (entries: JsonMap): JsonObject => ({ _tag: "Object", entries })

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({ _tag: "Array", items })

export const isJsonObject = (value: JsonValue): value is JsonObject => value._tag === "Object"

export const isJsonArray = (value: JsonValue): value is JsonArray => value._tag === "Array"
