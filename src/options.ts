import { JsonLdError } from "./error.ts"
import { createNodeDocumentLoader, type DocumentLoader, type RemoteDocument } from "./loader.ts"
import type { ProcessingMode } from "./types/basic.ts"
import type { JsonValue } from "./types/document.ts"
import type { Embed } from "./types/keyword.ts"
import { toProcessingMode } from "./utils/context.ts"

export type CanonicalizationAlgorithm = "URDNA2015" | "URGNA2012"

/**
 * Options accepted by every processor entry point. Each one only reads the options that concern it.
 *
 * @see https://www.w3.org/TR/json-ld11-api/#the-jsonldoptions-type
 */
export interface JsonLdOptions {
  /** The base IRI of the input; defaults to the URL the input was loaded from. */
  base?: string | null
  /** Replace arrays with a single element by that element when compacting. */
  compactArrays?: boolean
  /** Make IRIs relative to the base IRI when compacting. */
  compactToRelative?: boolean
  /** A context applied before the input's own context when expanding. */
  expandContext?: JsonValue | null
  processingMode?: ProcessingMode | "1.0" | "1.1"
  documentLoader?: DocumentLoader
  /** Iterate over object keys in code unit order instead of insertion order. */
  ordered?: boolean
  /** Keep top-level node objects that only carry an `@id`. */
  keepFreeFloatingNodes?: boolean

  embed?: Embed | boolean
  explicit?: boolean
  requireAll?: boolean
  /** Frame the default graph instead of the merge of all graphs. */
  frameDefault?: boolean
  omitDefault?: boolean
  omitGraph?: boolean
  pruneBlankNodeIdentifiers?: boolean

  produceGeneralizedRdf?: boolean
  useNativeTypes?: boolean
  useRdfType?: boolean

  algorithm?: CanonicalizationAlgorithm
  /** Upper bound on Hash N-Degree Quads invocations; derived from `maxWorkFactor` when absent. */
  maxDeepIterations?: number
  maxWorkFactor?: number
  /** `"application/n-quads"` makes string input of `normalize` parse as N-Quads. `fromRdf` always reads text as N-Quads. */
  inputFormat?: "application/n-quads" | null
}

/**
 * Options with every default applied, plus the state a single processor call owns.
 */
export interface ProcessingOptions {
  readonly base: string | null
  readonly compactArrays: boolean
  readonly compactToRelative: boolean
  readonly expandContext: JsonValue | null
  readonly processingMode: ProcessingMode
  readonly documentLoader: DocumentLoader
  readonly ordered: boolean
  readonly keepFreeFloatingNodes: boolean
  readonly embed: Embed
  readonly explicit: boolean
  readonly requireAll: boolean
  readonly frameDefault: boolean
  readonly omitDefault: boolean
  readonly omitGraph: boolean
  readonly pruneBlankNodeIdentifiers: boolean
  readonly produceGeneralizedRdf: boolean
  readonly useNativeTypes: boolean
  readonly useRdfType: boolean
  readonly algorithm: CanonicalizationAlgorithm
  readonly maxDeepIterations: number | null
  readonly maxWorkFactor: number
  readonly inputFormat: "application/n-quads" | null
  /** Remote contexts dereferenced during this call, keyed by their resolved URL, or the error loading them raised. */
  readonly contextCache: Map<string, RemoteDocument | JsonLdError>
}

/**
 * Apply the defaults to the caller's options. The result is frozen and carries a fresh context cache, so no state is
 * shared between calls.
 */
export function resolveOptions(options: JsonLdOptions = {}): ProcessingOptions {
  const processingMode = toProcessingMode(options.processingMode ?? "json-ld-1.1")
  if (processingMode === null) {
    throw new JsonLdError("invalid processing mode", `unknown processing mode ${options.processingMode}`)
  }
  const is11 = processingMode === "json-ld-1.1"

  let embed: Embed = "@once"
  if (options.embed === true) embed = "@once"
  else if (options.embed === false) embed = "@never"
  else if (options.embed !== undefined) embed = options.embed

  return Object.freeze({
    base: options.base ? options.base : null,
    compactArrays: options.compactArrays ?? true,
    compactToRelative: options.compactToRelative ?? true,
    expandContext: options.expandContext ?? null,
    processingMode,
    documentLoader: options.documentLoader ?? createNodeDocumentLoader(),
    ordered: options.ordered ?? false,
    keepFreeFloatingNodes: options.keepFreeFloatingNodes ?? false,
    embed,
    explicit: options.explicit ?? false,
    requireAll: options.requireAll ?? false,
    frameDefault: options.frameDefault ?? false,
    omitDefault: options.omitDefault ?? false,
    omitGraph: options.omitGraph ?? is11,
    pruneBlankNodeIdentifiers: options.pruneBlankNodeIdentifiers ?? is11,
    produceGeneralizedRdf: options.produceGeneralizedRdf ?? false,
    useNativeTypes: options.useNativeTypes ?? false,
    useRdfType: options.useRdfType ?? false,
    algorithm: options.algorithm ?? "URDNA2015",
    maxDeepIterations: options.maxDeepIterations ?? null,
    maxWorkFactor: options.maxWorkFactor ?? 3,
    inputFormat: options.inputFormat ?? null,
    contextCache: new Map<string, RemoteDocument | JsonLdError>(),
  })
}
