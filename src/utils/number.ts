import { JsonLdError } from "../error.ts"

/**
 * Format a number in its canonical JSON form: the shortest decimal string that round-trips to the same double, in
 * fixed notation for magnitudes in `[1e-6, 1e21)` and exponential notation otherwise. Both zeros format as `"0"`.
 *
 * @throws {JsonLdError} `invalid number format` for `NaN` and the infinities, which have no JSON form.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new JsonLdError("invalid number format", `${value} cannot be serialized as JSON`, { value })
  }
  // `String` implements the ECMAScript Number::toString algorithm, which already yields the shortest form; `-0`
  // prints as "0".
  return String(value)
}

/**
 * The canonical lexical form of an `xsd:double`: one digit before the point, at least one after, and an `E`
 * exponent without a plus sign (`1.1E0`, `1.0E21`, `-5.0E-7`).
 */
export function toXsdDouble(value: number): string {
  if (!Number.isFinite(value)) {
    throw new JsonLdError("invalid number format", `${value} has no xsd:double lexical form`, { value })
  }
  return value.toExponential(15).replace(/(\d)0*e\+?/, "$1E")
}
