import type { JsonValue } from "../types/document.ts"
import { formatNumber } from "./number.ts"
import { compareCodeUnits } from "./value.ts"

/**
 * Serialize a JSON value following the JSON Canonicalization Scheme (RFC 8785): no whitespace, object keys sorted by
 * UTF-16 code units, numbers in their shortest round-trip form and strings escaped the way `JSON.stringify` escapes
 * them.
 *
 * @see https://www.rfc-editor.org/rfc/rfc8785
 */
export function canonicalizeJson(value: JsonValue): string {
  if (value === null || typeof value === "boolean") {
    return String(value)
  }
  if (typeof value === "number") {
    return formatNumber(value)
  }
  if (typeof value === "string") {
    return JSON.stringify(value)
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalizeJson).join(",")}]`
  }
  const entries = Object.keys(value)
    .sort(compareCodeUnits)
    .map((key) => `${JSON.stringify(key)}:${canonicalizeJson(value[key])}`)
  return `{${entries.join(",")}}`
}
