import { JsonLdError } from "../error.ts"
import type { RemoteDocument } from "../loader.ts"
import type { ProcessingOptions } from "../options.ts"
import type { IRI } from "../types/basic.ts"
import type { JsonObject, JsonValue } from "../types/document.ts"
import { resolveIri } from "../utils/iri.ts"
import { isAbsoluteIri, isArray, isObject, isString } from "../utils/type.ts"
import { asArray } from "../utils/value.ts"
import { MAX_CONTEXT_URLS } from "./context.ts"

/**
 * Load a remote context into the call's cache. A failed load is cached as the error, which context processing throws
 * if it ever needs the context.
 */
async function loadContext(url: string, options: ProcessingOptions): Promise<RemoteDocument | null> {
  const cached = options.contextCache.get(url)
  if (cached !== undefined) {
    return cached instanceof JsonLdError ? null : cached
  }

  try {
    const remote = await options.documentLoader(url)
    options.contextCache.set(url, remote)
    return remote
  } catch (error) {
    const failure = new JsonLdError("loading remote context failed", `could not load context ${url}`, { url }, {
      cause: error,
    })
    options.contextCache.set(url, failure)
    return null
  }
}

async function dereferenceScopedContexts(
  context: JsonObject,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  chain: Array<string>,
): Promise<void> {
  for (const definition of Object.values(context)) {
    if (isObject(definition) && "@context" in definition) {
      await dereferenceContext(definition["@context"], baseUrl, options, chain)
    }
  }
}

/**
 * Dereference the remote contexts a local context refers to, following them into the contexts they load, import, or
 * scope to terms.
 *
 * @param localContext The local context, as it appears as the value of `@context`.
 * @param baseUrl The URL relative context references resolve against.
 * @param options The options of the running processor call; its context cache is filled.
 * @param chain The remote contexts being walked, outermost first.
 */
export async function dereferenceContext(
  localContext: JsonValue,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  chain: Array<string> = [],
): Promise<void> {
  for (const context of asArray(localContext)) {
    if (isString(context)) {
      const url = resolveIri(baseUrl, context)
      // unresolvable references, cycles and overflows are reported by context processing
      if (!isAbsoluteIri(url) || chain.includes(url) || chain.length >= MAX_CONTEXT_URLS) continue
      if (options.contextCache.has(url)) continue

      const remote = await loadContext(url, options)
      if (remote !== null && isObject(remote.document) && "@context" in remote.document) {
        await dereferenceContext(remote.document["@context"], remote.documentUrl, options, [...chain, url])
      }
    } else if (isObject(context)) {
      const imported = context["@import"]
      if (isString(imported)) {
        const remote = await loadContext(resolveIri(baseUrl, imported), options)
        const importedContext = remote !== null && isObject(remote.document) ? remote.document["@context"] : undefined
        if (isObject(importedContext)) {
          await dereferenceScopedContexts(importedContext, baseUrl, options, chain)
        }
      }
      await dereferenceScopedContexts(context, baseUrl, options, chain)
    }
  }
}

/**
 * Walk a document and dereference every remote context it refers to, embedded or scoped, so that the processing
 * algorithms that follow can run without waiting on the document loader.
 *
 * @param element The document, a frame, or any JSON tree that may carry `@context` entries.
 * @param baseUrl The URL of the document.
 * @param options The options of the running processor call.
 */
export async function dereferenceContexts(
  element: JsonValue,
  baseUrl: IRI | null,
  options: ProcessingOptions,
): Promise<void> {
  if (isArray(element)) {
    for (const item of element) {
      await dereferenceContexts(item, baseUrl, options)
    }
    return
  }
  if (!isObject(element)) return

  for (const [key, value] of Object.entries(element)) {
    if (key === "@context") {
      await dereferenceContext(value, baseUrl, options)
    } else {
      await dereferenceContexts(value, baseUrl, options)
    }
  }
}
