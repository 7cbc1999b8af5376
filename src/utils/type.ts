import type { IRI } from "../types/basic.ts"
import type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "../types/document.ts"
import type { Container, ContainerKeyword } from "../types/keyword.ts"

export function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isArray(value: unknown): value is JsonArray {
  return Array.isArray(value)
}

export function isString(value: unknown): value is string {
  return typeof value === "string"
}

export function isStringArray(value: unknown): value is Array<string> {
  return Array.isArray(value) && value.every((item) => typeof item === "string")
}

/**
 * Check whether the given value is a scalar: a string, number or boolean. `null` is not a scalar.
 */
export function isScalar(value: unknown): value is Exclude<JsonPrimitive, null> {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
}

export function isEmptyObject(value: unknown): value is JsonObject {
  return isObject(value) && Object.keys(value).length === 0
}

/**
 * Check whether the given value is a subject with properties.
 *
 * @param value The value to check.
 *
 * @returns `true` if the value is a subject; otherwise `false`.
 */
export function isSubject(
  value: unknown,
): value is JsonObject & { "@value"?: undefined; "@list"?: undefined; "@set"?: undefined } {
  // A value is a subject of all of the following conditions are met:
  //
  // 1. It is an object.
  // 2. It does not have a `@value`, `@list`, or `@set` key.
  // 3. It has more than one key, or any existing key is not `@id`.

  if (isObject(value)) {
    const keys = Object.keys(value)
    return (
      !keys.includes("@value") &&
      !keys.includes("@list") &&
      !keys.includes("@set") &&
      (keys.length > 1 || !keys.includes("@id"))
    )
  }
  return false
}

/**
 * Check whether the given value is a subject reference: an object whose only key is `@id`.
 */
export function isSubjectRef(value: unknown): value is JsonObject & { "@id": JsonValue } {
  if (isObject(value)) {
    const keys = Object.keys(value)
    return keys.length === 1 && keys[0] === "@id"
  }
  return false
}

/**
 * Check whether the given value is a value object, i.e. an object with an `@value` key.
 */
export function isValueObject(value: unknown): value is JsonObject & { "@value": JsonValue } {
  return isObject(value) && "@value" in value
}

/**
 * Check whether the given value is a list object, i.e. an object with an `@list` key.
 */
export function isListObject(value: unknown): value is JsonObject & { "@list": JsonValue } {
  return isObject(value) && "@list" in value
}

/**
 * Check whether the given value is a graph object.
 *
 * @param value The value to check.
 *
 * @returns `true` if the value is a graph object; otherwise `false`.
 */
export function isGraphObject(value: unknown): value is JsonObject {
  // A value is a graph object if all of the following conditions are met:
  //
  // 1. It is an object.
  // 2. It has an `@graph` key.
  // 3. It may have `@id` or `@index` keys.

  if (isObject(value)) {
    const keys = Object.keys(value)
    return keys.includes("@graph") &&
      keys.filter((key) => key !== "@id" && key !== "@index").length === 1
  }
  return false
}

/**
 * Check whether the given value is a simple graph: a graph object without an `@id`.
 */
export function isSimpleGraph(value: unknown): value is JsonObject {
  return isGraphObject(value) && !("@id" in value)
}

/**
 * Check whether the given value is a blank node.
 *
 * @param value The value to check.
 *
 * @returns `true` if the value is a blank node; otherwise `false`.
 */
export function isBlankNode(value: unknown): value is JsonObject {
  // A value is a blank node if all of the following conditions are met:
  //
  // 1. It is an object.
  // 2. It has an `@id` key whose value is not a string, or is a string starting with "_:".
  // 3. It has no keys, or it has keys other than `@value`, `@set` or `@list`.

  if (isObject(value)) {
    if ("@id" in value) {
      const id = value["@id"]
      return typeof id !== "string" || id.startsWith("_:")
    }
    const keys = Object.keys(value)
    return keys.length === 0 || !keys.some((key) => ["@value", "@set", "@list"].includes(key))
  }
  return false
}

/**
 * Check whether the given string is a blank node identifier.
 */
export function isBlankNodeIdentifier(value: unknown): value is string {
  return typeof value === "string" && value.startsWith("_:")
}

/**
 * Check whether the given value is an absolute IRI or a blank node identifier.
 *
 * @param value The value to check.
 *
 * @returns `true` if the value is an absolute IRI or a blank node identifier; otherwise `false`.
 */
export function isAbsoluteIri(value: string): value is IRI {
  return /^([A-Za-z][A-Za-z0-9+\-.]*|_):[^\s]*$/.test(value)
}

const CONTAINER_KEYWORDS: ReadonlyArray<string> = ["@graph", "@id", "@index", "@language", "@list", "@set", "@type"]

function isContainerKeyword(value: unknown): value is ContainerKeyword {
  return typeof value === "string" && CONTAINER_KEYWORDS.includes(value)
}

/**
 * Check whether the given value is a valid `@container` entry and normalize it to an array.
 *
 * @param value The value of the `@container` entry.
 *
 * @returns The container mapping, or `null` if the value is not a valid container.
 */
export function toContainer(value: JsonValue): Container | null {
  // case 1
  if (value === null) {
    return []
  }

  // case 2
  if (isContainerKeyword(value)) {
    return [value]
  }

  if (Array.isArray(value)) {
    const keywords: Container = []
    for (const item of value) {
      if (!isContainerKeyword(item) || keywords.includes(item)) return null
      keywords.push(item)
    }

    // case 3
    if (keywords.length === 1) {
      return keywords
    }

    // case 4
    if (keywords.includes("@graph") && (keywords.includes("@id") || keywords.includes("@index"))) {
      const rest = keywords.filter((keyword) => !["@graph", "@id", "@index", "@set"].includes(keyword))
      const exclusive = !(keywords.includes("@id") && keywords.includes("@index"))
      return rest.length === 0 && exclusive ? keywords : null
    }

    // case 5
    if (keywords.includes("@set")) {
      return keywords.every((keyword) => keyword !== "@list") ? keywords : null
    }
  }

  return null
}
