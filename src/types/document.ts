/**
 * The value `null` is used to indicate the lack of a value. It can be used interchangeably with the JavaScript `null`
 * value.
 *
 * @see https://infra.spec.whatwg.org/#nulls
 */
export type Null = null

/**
 * A JSON primitive also known as a scalar value, is a value that is not an object or array. It is a value that can be
 * represented as a single string, number, boolean, or null value.
 */
export type JsonPrimitive = string | number | boolean | Null

export interface JsonArray extends Array<JsonValue> {}

export interface JsonObject {
  [key: string]: JsonValue
}

/**
 * The internal representation of a JSON-LD document: the closed union of JSON values.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray

/**
 * A node map: for each graph name, the node objects of that graph keyed by their identifier.
 */
export type NodeMap = Record<string, Record<string, JsonObject>>
