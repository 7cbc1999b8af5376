import type { ProcessingMode } from "../types/basic.ts"

/**
 * Check the processing mode (version) of a context.
 *
 * @param version The version string or number in the context.
 * @param expect The expected version number.
 *
 * @returns `true` if the version is equal to the expected version, `false` otherwise.
 */
export function checkVersion(version: string | number, expect: number): boolean {
  // the input version could be a string in the form of "1.1" or "json-ld-1.1"
  return parseFloat(version.toString().replace(/json-ld-/, "")) === expect
}

/**
 * Narrow a user supplied processing mode, accepting the bare version numbers as well.
 */
export function toProcessingMode(version: string | number): ProcessingMode | null {
  if (checkVersion(version, 1.0)) return "json-ld-1.0"
  if (checkVersion(version, 1.1)) return "json-ld-1.1"
  return null
}

/**
 * Well-formedness check for language tags, following the BCP47 `langtag` shape loosely.
 */
export function isWellFormedLanguage(language: string): boolean {
  return /^[a-zA-Z]{1,8}(-[a-zA-Z0-9]{1,8})*$/.test(language)
}
