/**
 * Error codes raised by the processor. They are the error codes of the JSON-LD 1.1 API, plus the codes of the
 * canonicalization and number formatting algorithms.
 *
 * @see https://www.w3.org/TR/json-ld11-api/#jsonlderrorcode
 */
export type ErrorCode =
  | "canonicalization complexity exceeded"
  | "colliding keywords"
  | "conflicting indexes"
  | "context overflow"
  | "cyclic IRI mapping"
  | "invalid @embed value"
  | "invalid @id value"
  | "invalid @import value"
  | "invalid @included value"
  | "invalid @index value"
  | "invalid @nest value"
  | "invalid @prefix value"
  | "invalid @propagate value"
  | "invalid @protected value"
  | "invalid @reverse value"
  | "invalid @version value"
  | "invalid base direction"
  | "invalid base IRI"
  | "invalid container mapping"
  | "invalid context entry"
  | "invalid context nullification"
  | "invalid default language"
  | "invalid frame"
  | "invalid IRI mapping"
  | "invalid JSON literal"
  | "invalid keyword alias"
  | "invalid language map value"
  | "invalid language mapping"
  | "invalid language-tagged string"
  | "invalid language-tagged value"
  | "invalid local context"
  | "invalid number format"
  | "invalid processing mode"
  | "invalid remote context"
  | "invalid reverse property"
  | "invalid reverse property map"
  | "invalid reverse property value"
  | "invalid scoped context"
  | "invalid set or list object"
  | "invalid term definition"
  | "invalid type mapping"
  | "invalid type value"
  | "invalid typed value"
  | "invalid value object"
  | "invalid value object value"
  | "invalid vocab mapping"
  | "IRI confused with prefix"
  | "keyword redefinition"
  | "list of lists"
  | "loading document failed"
  | "loading remote context failed"
  | "multiple context link headers"
  | "processing mode conflict"
  | "protected term redefinition"
  | "recursive context inclusion"
  | "syntax error"

/**
 * The error every processor operation throws. `code` identifies the failure; `details` carries the offending values
 * when there are any.
 */
export class JsonLdError extends Error {
  readonly code: ErrorCode
  readonly details: Record<string, unknown>

  constructor(code: ErrorCode, message?: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message ? `${code}: ${message}` : code, options)
    this.name = "JsonLdError"
    this.code = code
    this.details = details
  }
}

export function isJsonLdError(error: unknown): error is JsonLdError {
  return error instanceof JsonLdError
}
