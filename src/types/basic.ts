/**
 * An IRI (Internationalized Resource Identifier) is a string that conforms to the syntax defined in [RFC3987]. Relative
 * IRI references are also represented as plain strings; `isAbsoluteIri` tells the two apart.
 *
 * @see https://www.w3.org/TR/json-ld11/#iris
 */
export type IRI = string

/**
 * A term is a short word defined in a context that MAY be expanded to an IRI.
 *
 * @see https://www.w3.org/TR/json-ld11/#dfn-term
 */
export type Term = string

/**
 * The base direction of a string, used with `@direction`.
 */
export type Direction = "ltr" | "rtl"

/**
 * Processing modes understood by the processor.
 */
export type ProcessingMode = "json-ld-1.0" | "json-ld-1.1"
