import type { JsonArray, JsonObject, JsonValue } from "../types/document.ts"
import { isArray, isListObject, isObject, isValueObject } from "./type.ts"

export function asArray(value: JsonValue): JsonArray {
  return isArray(value) ? value : [value]
}

/**
 * The values of a property of a subject, as an array. Missing properties yield an empty array.
 */
export function getValues(subject: JsonObject, property: string): JsonArray {
  const value = subject[property]
  return value === undefined ? [] : asArray(value)
}

/**
 * Deep structural equality of two JSON values. Object key order is ignored.
 */
export function deepEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true
  if (isArray(a)) {
    return isArray(b) && a.length === b.length && a.every((item, index) => deepEqual(item, b[index]))
  }
  if (isObject(a)) {
    if (!isObject(b)) return false
    const keys = Object.keys(a)
    return keys.length === Object.keys(b).length && keys.every((key) => key in b && deepEqual(a[key], b[key]))
  }
  return false
}

/**
 * Compare two JSON-LD values for equality: two value objects are equal when their `@value`, `@type`, `@language`,
 * `@direction` and `@index` entries are; two node references when their `@id` is; scalars by identity. Lists are never
 * equal.
 */
export function compareValues(v1: JsonValue, v2: JsonValue): boolean {
  if (v1 === v2) return true

  if (isValueObject(v1) && isValueObject(v2)) {
    return deepEqual(v1["@value"], v2["@value"]) &&
      v1["@type"] === v2["@type"] &&
      v1["@language"] === v2["@language"] &&
      v1["@direction"] === v2["@direction"] &&
      v1["@index"] === v2["@index"]
  }

  if (isObject(v1) && isObject(v2) && "@id" in v1 && "@id" in v2 && !isListObject(v1) && !isListObject(v2)) {
    return v1["@id"] === v2["@id"]
  }

  return false
}

export function hasValue(subject: JsonObject, property: string, value: JsonValue): boolean {
  return getValues(subject, property).some((item) => compareValues(item, value))
}

export interface AddValueOptions {
  /** Always store the property as an array, even for a single value. */
  propertyIsArray?: boolean
  /** Store an array value as a single item instead of merging its items. */
  valueIsArray?: boolean
  allowDuplicate?: boolean
  prependValue?: boolean
}

/**
 * Add a value to a property of a subject, merging arrays and skipping duplicates unless allowed.
 */
export function addValue(subject: JsonObject, property: string, value: JsonValue, options: AddValueOptions = {}): void {
  const { propertyIsArray = false, valueIsArray = false, allowDuplicate = true, prependValue = false } = options

  if (valueIsArray) {
    subject[property] = value
    return
  }

  if (isArray(value)) {
    if (value.length === 0 && propertyIsArray && !(property in subject)) {
      subject[property] = []
    }
    const items = prependValue ? [...value].reverse() : value
    for (const item of items) {
      addValue(subject, property, item, { propertyIsArray, allowDuplicate, prependValue })
    }
    return
  }

  const existing = subject[property]
  if (existing === undefined) {
    subject[property] = propertyIsArray ? [value] : value
    return
  }

  if (!allowDuplicate && hasValue(subject, property, value)) return

  const values = asArray(existing)
  if (prependValue) {
    values.unshift(value)
  } else {
    values.push(value)
  }
  subject[property] = values
}

export function clone<T extends JsonValue>(value: T): T {
  return structuredClone(value)
}

/**
 * Order by length first, then lexicographically (code unit order).
 */
export function compareShortestLeast(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Lexicographic comparison by UTF-16 code units, the order JSON-LD algorithms sort keys and identifiers by.
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function sortedKeys(object: JsonObject): Array<string> {
  return Object.keys(object).sort(compareCodeUnits)
}
