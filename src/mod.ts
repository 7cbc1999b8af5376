import type * as RDF from "@rdfjs/types"

import { canonize } from "./algorithms/canonize.ts"
import { compact as compactElement, compactIri } from "./algorithms/compact.ts"
import { newActiveContext, processContext } from "./algorithms/context.ts"
import { expand as expandElement, expandIri } from "./algorithms/expand.ts"
import { createNodeMap, flatten as flattenElement, IdentifierIssuer } from "./algorithms/flatten.ts"
import { cleanupNull, frameMergedOrDefault } from "./algorithms/frame.ts"
import { jsonldToRdf, rdfToJsonld } from "./algorithms/rdf.ts"
import { dereferenceContext, dereferenceContexts } from "./algorithms/resolve.ts"
import { isJsonLdError, JsonLdError } from "./error.ts"
import { type JsonLdOptions, type ProcessingOptions, resolveOptions } from "./options.ts"
import type { IRI } from "./types/basic.ts"
import type { ActiveContext } from "./types/context.ts"
import type { JsonArray, JsonObject, JsonValue, NodeMap } from "./types/document.ts"
import { RdfDataset } from "./utils/dataset.ts"
import { datasetFromRdfJs, parseNQuads } from "./utils/nquads.ts"
import { isArray, isObject, isString } from "./utils/type.ts"
import { asArray } from "./utils/value.ts"

export { JsonLdError, isJsonLdError } from "./error.ts"
export type { ErrorCode } from "./error.ts"
export {
  createCachingDocumentLoader,
  createNodeDocumentLoader,
  parseLinkHeader,
  rejectingDocumentLoader,
} from "./loader.ts"
export type { CachingDocumentLoader, DocumentLoader, NodeDocumentLoaderOptions, RemoteDocument } from "./loader.ts"
export type { CanonicalizationAlgorithm, JsonLdOptions } from "./options.ts"
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "./types/document.ts"
export type * from "./types/rdf.ts"
export { RdfDataset } from "./utils/dataset.ts"
export { datasetFromRdfJs, parseNQuads, serializeDataset, serializeQuad } from "./utils/nquads.ts"
export { formatNumber, toXsdDouble } from "./utils/number.ts"

/**
 * A JSON-LD document: a JSON tree, JSON text starting with `{` or `[`, or the URL of a document to load.
 */
export type JsonLdInput = JsonValue

interface LoadedDocument {
  document: JsonValue
  documentUrl: IRI | null
  contextUrl: IRI | null
}

interface ExpandedDocument {
  expanded: JsonArray
  /** The base IRI the document was expanded against; compaction makes IRIs relative to it. */
  base: IRI | null
}

async function loadDocument(input: JsonLdInput, options: ProcessingOptions): Promise<LoadedDocument> {
  if (!isString(input)) {
    return { document: input, documentUrl: null, contextUrl: null }
  }

  const text = input.trimStart()
  if (text.startsWith("{") || text.startsWith("[")) {
    try {
      return { document: JSON.parse(input), documentUrl: null, contextUrl: null }
    } catch (error) {
      throw new JsonLdError("loading document failed", "the input is not valid JSON", {}, { cause: error })
    }
  }

  try {
    const remote = await options.documentLoader(input)
    return { document: remote.document, documentUrl: remote.documentUrl, contextUrl: remote.contextUrl }
  } catch (error) {
    if (isJsonLdError(error)) throw error
    throw new JsonLdError("loading document failed", `could not load ${input}`, { url: input }, { cause: error })
  }
}

/**
 * The context a `context` argument stands for: the `@context` entry of a map that has one, the value itself otherwise.
 */
function contextOf(context: JsonValue): JsonValue {
  return isObject(context) && "@context" in context ? context["@context"] : context
}

async function expandDocument(
  input: JsonLdInput,
  options: ProcessingOptions,
  frameExpansion: boolean = false,
): Promise<ExpandedDocument> {
  const loaded = await loadDocument(input, options)
  const base = options.base ?? loaded.documentUrl

  // every remote context is in the cache before processing starts
  await dereferenceContexts(loaded.document, base, options)
  if (options.expandContext !== null) {
    await dereferenceContext(contextOf(options.expandContext), base, options)
  }
  if (loaded.contextUrl !== null) {
    await dereferenceContext(loaded.contextUrl, base, options)
  }

  let activeContext = newActiveContext(base, options.processingMode)
  if (options.expandContext !== null) {
    activeContext = processContext(activeContext, contextOf(options.expandContext), base, options)
  }
  if (loaded.contextUrl !== null) {
    activeContext = processContext(activeContext, loaded.contextUrl, base, options)
  }

  let expanded = expandElement(activeContext, null, loaded.document, base, options, frameExpansion)

  // a top-level map holding nothing but `@graph` stands for its graph
  if (isObject(expanded) && "@graph" in expanded && Object.keys(expanded).length === 1) {
    expanded = expanded["@graph"]
  }

  return { expanded: expanded === null ? [] : asArray(expanded), base }
}

async function processCompactionContext(
  context: JsonValue,
  base: IRI | null,
  options: ProcessingOptions,
): Promise<ActiveContext> {
  await dereferenceContext(context, base, options)
  return processContext(newActiveContext(base, options.processingMode), context, base, options)
}

/**
 * Compact an expanded document and put the context in front of it. Arrays become the value of `@graph`, or of its
 * alias.
 *
 * @param graph Always wrap the result in `@graph`, even for a single node.
 */
function compactDocument(
  expanded: JsonArray,
  context: JsonValue,
  activeContext: ActiveContext,
  options: ProcessingOptions,
  graph: boolean,
): JsonObject {
  let compacted = compactElement(activeContext, null, expanded, options)

  if (options.compactArrays && !graph && isArray(compacted)) {
    if (compacted.length === 1) compacted = compacted[0]
    else if (compacted.length === 0) compacted = {}
  } else if (graph && isObject(compacted)) {
    compacted = [compacted]
  }

  // empty contexts are left out
  const contexts = asArray(context).filter((item) => !isObject(item) || Object.keys(item).length > 0)
  const hasContext = contexts.length > 0
  const outputContext: JsonValue = contexts.length === 1 ? contexts[0] : contexts

  if (isArray(compacted)) {
    const graphAlias = compactIri(activeContext, "@graph", null, true) ?? "@graph"
    return hasContext ? { "@context": outputContext, [graphAlias]: compacted } : { [graphAlias]: compacted }
  }
  if (!isObject(compacted)) {
    return hasContext ? { "@context": outputContext } : {}
  }
  return hasContext ? { "@context": outputContext, ...compacted } : compacted
}

/**
 * Expand a document: every term, compact IRI and relative IRI is turned into an absolute IRI, values become value
 * objects, and the context is removed.
 *
 * @param input The document to expand.
 * @param options Options; `base`, `expandContext`, `documentLoader`, `processingMode` and `keepFreeFloatingNodes` are
 *   read.
 *
 * @returns The document in expanded form, always an array.
 */
export async function expand(input: JsonLdInput, options: JsonLdOptions = {}): Promise<JsonArray> {
  const resolved = resolveOptions(options)
  const { expanded } = await expandDocument(input, resolved)
  return expanded
}

/**
 * Compact a document with a context: the document is expanded first, then every IRI is shortened with the terms and
 * prefixes of the context.
 *
 * @param input The document to compact.
 * @param context The context, or a map holding it in `@context`.
 * @param options Options; `compactArrays` and `compactToRelative` shape the result.
 */
export async function compact(
  input: JsonLdInput,
  context: JsonValue,
  options: JsonLdOptions = {},
): Promise<JsonObject> {
  const resolved = resolveOptions(options)
  const { expanded, base } = await expandDocument(input, resolved)
  const localContext = contextOf(context)
  const activeContext = await processCompactionContext(localContext, base, resolved)
  return compactDocument(expanded, localContext, activeContext, resolved, false)
}

/**
 * Flatten a document: every node is collected into a single map at the top level, nested nodes are replaced by
 * references, and blank nodes are labelled `_:b0`, `_:b1`, ...
 *
 * @param input The document to flatten.
 * @param context A context to compact the result with, or `null` to keep it in expanded form.
 */
export async function flatten(
  input: JsonLdInput,
  context: JsonValue = null,
  options: JsonLdOptions = {},
): Promise<JsonArray | JsonObject> {
  const resolved = resolveOptions(options)
  const { expanded, base } = await expandDocument(input, resolved)
  const flattened = flattenElement(expanded)
  if (context === null) return flattened

  const localContext = contextOf(context)
  const activeContext = await processCompactionContext(localContext, base, resolved)
  return compactDocument(flattened, localContext, activeContext, resolved, true)
}

/**
 * Frame a document: the nodes matching the frame are pulled to the top level and the nodes they refer to are embedded
 * the way the frame describes. The result is compacted with the frame's context.
 *
 * @param input The document to frame.
 * @param frameInput The frame, as a JSON tree, JSON text or URL.
 * @param options Options; the framing flags `embed`, `explicit`, `requireAll`, `omitDefault`, `frameDefault`,
 *   `omitGraph` and `pruneBlankNodeIdentifiers` are read.
 */
export async function frame(
  input: JsonLdInput,
  frameInput: JsonLdInput,
  options: JsonLdOptions = {},
): Promise<JsonObject> {
  const resolved = resolveOptions(options)
  const { expanded, base } = await expandDocument(input, resolved)

  const loadedFrame = await loadDocument(frameInput, resolved)
  const frameDocument = loadedFrame.document
  const frameContext = isObject(frameDocument) ? frameDocument["@context"] ?? null : null
  const frameBase = resolved.base ?? loadedFrame.documentUrl
  const { expanded: expandedFrame } = await expandDocument(
    frameDocument,
    { ...resolved, base: frameBase, keepFreeFloatingNodes: true },
    true,
  )

  const activeContext = await processCompactionContext(frameContext ?? {}, base, resolved)

  // a frame with `@graph` at the top frames the default graph; otherwise all graphs are merged
  const framesGraph = isObject(frameDocument) &&
    Object.keys(frameDocument).some((key) => expandIri(activeContext, key, false, true) === "@graph")
  const merged = !resolved.frameDefault && !framesGraph

  const framed = frameMergedOrDefault(expanded, expandedFrame, resolved, merged)
  const compacted = compactDocument(framed, frameContext ?? {}, activeContext, resolved, !resolved.omitGraph)
  const cleaned = cleanupNull(compacted, activeContext)
  return isObject(cleaned) ? cleaned : {}
}

/**
 * Convert a document to an RDF dataset. Blank nodes are labelled `_:b0`, `_:b1`, ...
 *
 * @param options Options; `produceGeneralizedRdf` keeps triples with blank node predicates.
 */
export async function toRdf(input: JsonLdInput, options: JsonLdOptions = {}): Promise<RdfDataset> {
  const resolved = resolveOptions(options)
  const { expanded } = await expandDocument(input, resolved)
  return datasetOf(expanded, resolved)
}

function datasetOf(expanded: JsonArray, options: ProcessingOptions): RdfDataset {
  const issuer = new IdentifierIssuer("_:b")
  const nodeMap: NodeMap = { "@default": {} }
  createNodeMap(expanded, nodeMap, "@default", issuer)
  return jsonldToRdf(nodeMap, issuer, options)
}

/**
 * Convert an RDF dataset to a document in expanded form.
 *
 * @param dataset A dataset, RDF/JS quads such as an `n3` store, or N-Quads text.
 * @param options Options; `useNativeTypes` and `useRdfType` are read.
 */
export async function fromRdf(
  dataset: RdfDataset | string | Iterable<RDF.Quad>,
  options: JsonLdOptions = {},
): Promise<JsonArray> {
  const resolved = resolveOptions(options)
  let rdf: RdfDataset
  if (dataset instanceof RdfDataset) {
    rdf = dataset
  } else if (isString(dataset)) {
    // N-Quads is the only text format, and the default for text input
    rdf = parseNQuads(dataset)
  } else {
    rdf = datasetFromRdfJs(dataset)
  }
  return rdfToJsonld(rdf, resolved)
}

/**
 * Canonicalize a document, or a dataset, into canonical N-Quads. Isomorphic inputs give identical output.
 *
 * @param input A document; with `inputFormat` set to `application/n-quads`, N-Quads text; or a dataset.
 * @param options Options; `algorithm`, `maxDeepIterations` and `maxWorkFactor` are read.
 *
 * @throws {JsonLdError} `canonicalization complexity exceeded` when the blank nodes are too hard to tell apart.
 */
export async function normalize(input: JsonLdInput | RdfDataset, options: JsonLdOptions = {}): Promise<string> {
  const resolved = resolveOptions(options)

  let dataset: RdfDataset
  if (input instanceof RdfDataset) {
    dataset = input
  } else if (resolved.inputFormat === "application/n-quads") {
    if (!isString(input)) {
      throw new JsonLdError("syntax error", "N-Quads input must be a string")
    }
    dataset = parseNQuads(input)
  } else {
    const { expanded } = await expandDocument(input, resolved)
    dataset = datasetOf(expanded, { ...resolved, produceGeneralizedRdf: false })
  }

  return canonize(dataset, resolved)
}
