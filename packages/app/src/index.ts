export type {
  InvalidArray,
  InvalidInput,
  InvalidObject,
  InvalidValue,
  ParseError
} from "./core/errors.js"
export { formatJsonError, invalidArray, invalidInput, invalidObject, invalidValue } from "./core/errors.js"
export type {
  JsonArray,
  JsonBool,
  JsonFloat,
  JsonInt,
  JsonMap,
  JsonNull,
  JsonObject,
  JsonString,
  JsonValue
} from "./core/json.js"
export {
  isJsonArray,
  isJsonObject,
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString
} from "./core/json.js"
export { parse, parseArray, parseObject, parseValue } from "./core/parse.js"
export type { SerializeOptions } from "./core/serialize.js"
export { quoteString, serialize, toJsonArray, toJsonObject } from "./core/serialize.js"
export {
  countJsonObjectKeys,
  filterEntriesByPrefix,
  filterKeysByPrefix,
  getJsonObjectKeys,
  isValidJsonArray,
  isValidJsonObject,
  mergeEntries,
  mergeJsonObjects,
  reverseItems,
  reverseJsonArray
} from "./core/utilities.js"
