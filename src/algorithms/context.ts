import { JsonLdError } from "../error.ts"
import type { ProcessingOptions } from "../options.ts"
import type { Direction, IRI, ProcessingMode, Term } from "../types/basic.ts"
import type {
  ActiveContext,
  AnyMap,
  ContainerMap,
  ContextDefinition,
  InverseContext,
  LanguageMap,
  TermDefinition,
  TypeLanguageMap,
  TypeMap,
} from "../types/context.ts"
import type { JsonValue } from "../types/document.ts"
import { hasKeywordForm, isKeyword } from "../types/keyword.ts"
import { checkVersion, isWellFormedLanguage } from "../utils/context.ts"
import { resolveIri } from "../utils/iri.ts"
import { isAbsoluteIri, isBlankNodeIdentifier, isObject, isString, toContainer } from "../utils/type.ts"
import { asArray, compareShortestLeast, deepEqual } from "../utils/value.ts"
import { expandIri } from "./expand.ts"

/**
 * Processors limit how deeply remote contexts may reference each other.
 */
export const MAX_CONTEXT_URLS = 10

const CONTEXT_KEYWORDS = ["@base", "@direction", "@import", "@language", "@propagate", "@protected", "@version", "@vocab"]

const TERM_DEFINITION_KEYWORDS = [
  "@id",
  "@reverse",
  "@container",
  "@context",
  "@direction",
  "@index",
  "@language",
  "@nest",
  "@prefix",
  "@protected",
  "@type",
]

/**
 * What a term definition needs to know about the context processing it is part of, threaded through IRI expansion
 * when one definition depends on another.
 */
export interface DefinitionScope {
  baseUrl: IRI | null
  options: ProcessingOptions
  overrideProtected: boolean
  remoteContexts: Array<string>
  validateScopedContext: boolean
}

function isDirection(value: JsonValue): value is Direction {
  return value === "ltr" || value === "rtl"
}

function isJsonLd10(activeContext: ActiveContext): boolean {
  return checkVersion(activeContext.processingMode, 1.0)
}

/**
 * A newly-initialized active context: no term definitions, no vocabulary mapping, no default language or direction,
 * and its base IRI set to the original base URL.
 */
export function newActiveContext(base: IRI | null, processingMode: ProcessingMode): ActiveContext {
  return {
    termDefinitions: new Map(),
    baseIri: base,
    originalBaseUrl: base,
    vocabularyMapping: null,
    defaultLanguage: null,
    defaultBaseDirection: null,
    previousContext: null,
    processingMode,
    inverseContext: null,
  }
}

/**
 * Copy an active context so the copy can be changed without affecting the original. Term definitions are never
 * changed once created, so they are shared.
 */
export function cloneActiveContext(activeContext: ActiveContext): ActiveContext {
  return {
    ...activeContext,
    termDefinitions: new Map(activeContext.termDefinitions),
    inverseContext: null,
  }
}

/**
 * When processing a JSON-LD data structure, each processing rule is applied using information provided by the active
 * context. This function merges a local context into an active context and returns the result as a new active context;
 * the given active context is left untouched.
 *
 * Local contexts may be a map, a string, `null`, or an array of those. A string is a reference to a remote context,
 * which must already be in the call's context cache (see `dereferenceContexts`). `null` resets the context unless it
 * holds protected terms. A map is a context definition: `@base`, `@direction`, `@language`, `@propagate`, `@version`
 * and `@vocab` are applied first, `@import` is merged underneath, and every other entry defines a term.
 *
 * If the context is not to be propagated, a reference to the previous context is retained so that it may be rolled
 * back when a new node object is entered.
 *
 * @param activeContext The active context.
 * @param localContext The local context to merge into the active context.
 * @param baseUrl The base URL used when resolving relative context URLs.
 * @param options The options of the running processor call.
 * @param remoteContexts The chain of remote contexts being processed, used to detect cyclic inclusions.
 * @param overrideProtected Whether or not protected terms can be overridden.
 * @param propagate Whether the context applies to nested node objects.
 * @param validateScopedContext Used to limit recursion when validating possibly recursive scoped contexts.
 *
 * @returns The new active context.
 */
export function processContext(
  activeContext: ActiveContext,
  localContext: JsonValue,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  remoteContexts: Array<string> = [],
  overrideProtected: boolean = false,
  propagate: boolean = true,
  validateScopedContext: boolean = true,
): ActiveContext {
  // Procedure:
  //
  // 1. Clone the active context into `result`.
  // 2. An `@propagate` entry of a map local context overrides `propagate`.
  // 3. A non-propagated context remembers the context it was derived from.
  // 4. Normalize the local context to an array.
  // 5. Merge each context: `null` resets, strings dereference remote contexts, maps define terms.
  // 6. Return `result`.

  // 1: clone the active context
  let result = cloneActiveContext(activeContext)

  // 2: the local context decides about its own propagation
  if (isObject(localContext) && "@propagate" in localContext) {
    const value = localContext["@propagate"]
    if (typeof value !== "boolean") {
      throw new JsonLdError("invalid @propagate value", "@propagate must be a boolean", { value })
    }
    propagate = value
  }

  // 3: keep the previous context around
  if (!propagate && result.previousContext === null) {
    result.previousContext = activeContext
  }

  // 4 & 5: merge every context
  for (const context of asArray(localContext)) {
    // 5.1: reset
    if (context === null) {
      if (!overrideProtected && [...result.termDefinitions.values()].some((definition) => definition["@protected"])) {
        throw new JsonLdError("invalid context nullification", "a context with protected terms cannot be reset")
      }
      const previous = result
      result = newActiveContext(activeContext.originalBaseUrl, activeContext.processingMode)
      if (!propagate) {
        result.previousContext = previous
      }
      continue
    }

    // 5.2: remote context
    if (isString(context)) {
      result = processRemoteContext(result, context, baseUrl, options, remoteContexts, validateScopedContext)
      continue
    }

    // 5.3: anything else must be a context definition
    if (!isObject(context)) {
      throw new JsonLdError("invalid local context", "a local context must be a map, a string or null", { context })
    }

    // 5.4 - 5.13: context definition
    result = processContextDefinition(
      result,
      context,
      baseUrl,
      options,
      remoteContexts,
      overrideProtected,
      validateScopedContext,
    )
  }

  return result
}

function processRemoteContext(
  result: ActiveContext,
  reference: string,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  remoteContexts: Array<string>,
  validateScopedContext: boolean,
): ActiveContext {
  // 5.2.1: resolve the reference
  const url = resolveIri(baseUrl, reference)
  if (!isAbsoluteIri(url)) {
    throw new JsonLdError("loading document failed", `cannot resolve context ${reference} without a base IRI`, {
      url: reference,
    })
  }

  // 5.2.2: a scoped context being validated may refer to a context already being processed
  if (!validateScopedContext && remoteContexts.includes(url)) {
    return result
  }

  // 5.2.3: cycles and overflow
  if (remoteContexts.includes(url)) {
    throw new JsonLdError("recursive context inclusion", `context ${url} includes itself`, {
      url,
      chain: remoteContexts,
    })
  }
  if (remoteContexts.length >= MAX_CONTEXT_URLS) {
    throw new JsonLdError("context overflow", `more than ${MAX_CONTEXT_URLS} nested remote contexts`, { url })
  }

  // 5.2.4 & 5.2.5: the document was dereferenced before processing started
  const remote = options.contextCache.get(url)
  if (remote === undefined) {
    throw new JsonLdError("loading remote context failed", `context ${url} was not dereferenced`, { url })
  }
  if (remote instanceof JsonLdError) throw remote
  const document = remote.document
  if (!isObject(document) || !("@context" in document)) {
    throw new JsonLdError("invalid remote context", `${url} has no top-level @context`, { url })
  }

  // 5.2.6: process the loaded context
  return processContext(
    result,
    document["@context"],
    remote.documentUrl,
    options,
    [...remoteContexts, url],
    false,
    true,
    validateScopedContext,
  )
}

function processContextDefinition(
  result: ActiveContext,
  context: ContextDefinition,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  remoteContexts: Array<string>,
  overrideProtected: boolean,
  validateScopedContext: boolean,
): ActiveContext {
  // 5.5: `@version`
  if ("@version" in context) {
    if (context["@version"] !== 1.1) {
      throw new JsonLdError("invalid @version value", "@version must be 1.1", { value: context["@version"] })
    }
    if (isJsonLd10(result)) {
      throw new JsonLdError("processing mode conflict", "@version 1.1 cannot be processed in json-ld-1.0 mode")
    }
  }

  // 5.6: `@import`
  if ("@import" in context) {
    if (isJsonLd10(result)) {
      throw new JsonLdError("invalid context entry", "@import is not supported in json-ld-1.0 mode")
    }
    const value = context["@import"]
    if (!isString(value)) {
      throw new JsonLdError("invalid @import value", "@import must be a string", { value })
    }
    const url = resolveIri(baseUrl, value)
    const remote = options.contextCache.get(url)
    if (remote === undefined) {
      throw new JsonLdError("loading remote context failed", `context ${url} was not dereferenced`, { url })
    }
    if (remote instanceof JsonLdError) throw remote
    const document = remote.document
    const imported = isObject(document) ? document["@context"] : undefined
    if (!isObject(imported)) {
      throw new JsonLdError("invalid remote context", `${url} has no @context map to import`, { url })
    }
    if ("@import" in imported) {
      throw new JsonLdError("invalid context entry", `imported context ${url} cannot import again`, { url })
    }
    context = { ...imported, ...context }
  }

  // 5.7: `@base`, ignored in remote contexts
  if ("@base" in context && remoteContexts.length === 0) {
    const value = context["@base"]
    if (value === null) {
      result.baseIri = null
    } else if (!isString(value)) {
      throw new JsonLdError("invalid base IRI", "@base must be a string or null", { value })
    } else if (isAbsoluteIri(value)) {
      result.baseIri = value
    } else if (result.baseIri !== null) {
      result.baseIri = resolveIri(result.baseIri, value)
    } else {
      throw new JsonLdError("invalid base IRI", `relative @base ${value} without a base IRI`, { value })
    }
  }

  // 5.8: `@vocab`
  if ("@vocab" in context) {
    const value = context["@vocab"]
    if (value === null) {
      result.vocabularyMapping = null
    } else if (!isString(value)) {
      throw new JsonLdError("invalid vocab mapping", "@vocab must be a string or null", { value })
    } else if (isJsonLd10(result) && !isAbsoluteIri(value)) {
      throw new JsonLdError("invalid vocab mapping", "@vocab must be an absolute IRI in json-ld-1.0 mode", { value })
    } else {
      const vocab = expandIri(result, value, true, true)
      if (vocab === null) {
        throw new JsonLdError("invalid vocab mapping", `@vocab ${value} does not expand to an IRI`, { value })
      }
      result.vocabularyMapping = vocab
    }
  }

  // 5.9: `@language`
  if ("@language" in context) {
    const value = context["@language"]
    if (value === null) {
      result.defaultLanguage = null
    } else if (isString(value)) {
      if (!isWellFormedLanguage(value)) {
        console.warn(`Language tag "${value}" is not well-formed.`)
      }
      result.defaultLanguage = value.toLowerCase()
    } else {
      throw new JsonLdError("invalid default language", "@language must be a string or null", { value })
    }
  }

  // 5.10: `@direction`
  if ("@direction" in context) {
    if (isJsonLd10(result)) {
      throw new JsonLdError("invalid context entry", "@direction is not supported in json-ld-1.0 mode")
    }
    const value = context["@direction"]
    if (value !== null && !isDirection(value)) {
      throw new JsonLdError("invalid base direction", `@direction must be "ltr", "rtl" or null`, { value })
    }
    result.defaultBaseDirection = value
  }

  // 5.11: `@propagate`, already applied by the caller
  if ("@propagate" in context) {
    if (isJsonLd10(result)) {
      throw new JsonLdError("invalid context entry", "@propagate is not supported in json-ld-1.0 mode")
    }
    if (typeof context["@propagate"] !== "boolean") {
      throw new JsonLdError("invalid @propagate value", "@propagate must be a boolean")
    }
  }

  if ("@protected" in context && typeof context["@protected"] !== "boolean") {
    throw new JsonLdError("invalid @protected value", "@protected must be a boolean", { value: context["@protected"] })
  }

  // 5.12 & 5.13: define every term
  const defined = new Map<Term, boolean>()
  const scope: DefinitionScope = { baseUrl, options, overrideProtected, remoteContexts, validateScopedContext }
  for (const key of Object.keys(context)) {
    if (CONTEXT_KEYWORDS.includes(key)) continue
    createTermDefinition(result, context, key, defined, scope)
  }

  return result
}

function isSameDefinition(a: TermDefinition, b: TermDefinition): boolean {
  return a["@id"] === b["@id"] &&
    a["@reverse"] === b["@reverse"] &&
    a["@type"] === b["@type"] &&
    a["@language"] === b["@language"] &&
    a["@direction"] === b["@direction"] &&
    a["@index"] === b["@index"] &&
    a["@nest"] === b["@nest"] &&
    a["@prefix"] === b["@prefix"] &&
    [...a["@container"]].sort().join() === [...b["@container"]].sort().join() &&
    deepEqual(a["@context"], b["@context"])
}

/**
 * This function creates a term definition in the active context for a term being processed in a local context.
 *
 * If the given term is a compact IRI, it may omit an IRI mapping by depending on its prefix having its own term
 * definition. If the prefix is an entry in the local context, then its term definition must first be created, through
 * recursion, before continuing. The map `defined` keeps track of whether or not a term has been defined or is
 * currently in the process of being defined, so that a term depending on itself is reported as a cyclic IRI mapping.
 *
 * After all dependencies for a term have been defined, the rest of the information in the local context for the given
 * term is taken into account, creating the appropriate IRI mapping, container mapping, and type mapping, language
 * mapping, or direction mapping for the term.
 *
 * The active context is changed in place; callers pass a context they cloned themselves.
 *
 * @param activeContext The active context.
 * @param localContext The local context being processed.
 * @param term The term to define.
 * @param defined A map of defined term mappings.
 * @param scope The context processing this definition is part of.
 * @param termProtected Whether or not the term is protected.
 */
export function createTermDefinition(
  activeContext: ActiveContext,
  localContext: ContextDefinition,
  term: Term,
  defined: Map<Term, boolean>,
  scope: DefinitionScope,
  termProtected: boolean = localContext["@protected"] === true,
): void {
  // 1: check if the `term` has already been defined
  const state = defined.get(term)
  if (state === true) return
  if (state === false) {
    throw new JsonLdError("cyclic IRI mapping", `the definition of "${term}" depends on itself`, { term })
  }

  // 2: the `term` cannot be an empty string
  if (term === "") {
    throw new JsonLdError("invalid term definition", "the empty string cannot be defined as a term")
  }
  defined.set(term, false)

  // 3: initialize `value`
  const raw = localContext[term]

  // 4: `term` is `@type`
  if (term === "@type") {
    if (isJsonLd10(activeContext)) {
      throw new JsonLdError("keyword redefinition", "@type cannot be redefined in json-ld-1.0 mode")
    }
    if (
      !isObject(raw) ||
      Object.keys(raw).some((key) => key !== "@container" && key !== "@protected") ||
      ("@container" in raw && raw["@container"] !== "@set") ||
      ("@protected" in raw && typeof raw["@protected"] !== "boolean")
    ) {
      throw new JsonLdError("keyword redefinition", "@type may only take @container: @set and @protected")
    }
  } // 5: `term` MUST NOT be a keyword
  else if (isKeyword(term)) {
    throw new JsonLdError("keyword redefinition", `keyword ${term} cannot be redefined`, { term })
  } else if (hasKeywordForm(term)) {
    console.warn(`Terms beginning with "@" are reserved for future use and ignored: "${term}".`)
    defined.set(term, true)
    return
  }

  // 6: initialize previous definition
  const previousDefinition = activeContext.termDefinitions.get(term)
  activeContext.termDefinitions.delete(term)

  // 7 - 9: `value` is `null`, a string or a map
  let simpleTerm = false
  let value: ContextDefinition
  if (raw === null) {
    value = { "@id": null }
  } else if (isString(raw)) {
    simpleTerm = true
    value = { "@id": raw }
  } else if (isObject(raw)) {
    value = raw
  } else {
    throw new JsonLdError("invalid term definition", `the definition of "${term}" must be a string, map or null`, {
      term,
    })
  }

  // 10: create a new term definition
  let definition: TermDefinition = {
    "@id": null,
    "@reverse": false,
    "@container": [],
    "@prefix": false,
    "@protected": termProtected,
  }

  // 11: `value` contains an `@protected` entry
  if ("@protected" in value) {
    if (isJsonLd10(activeContext)) {
      throw new JsonLdError("invalid term definition", "@protected is not supported in json-ld-1.0 mode", { term })
    }
    const protectedValue = value["@protected"]
    if (typeof protectedValue !== "boolean") {
      throw new JsonLdError("invalid @protected value", "@protected must be a boolean", { term })
    }
    definition["@protected"] = protectedValue
  }

  // 12: `value` contains an `@type` entry
  if ("@type" in value) {
    const type = value["@type"]
    if (!isString(type)) {
      throw new JsonLdError("invalid type mapping", `the @type of "${term}" must be a string`, { term })
    }
    const expandedType = expandIri(activeContext, type, false, true, localContext, defined, scope)
    if (expandedType === "@json" || expandedType === "@none") {
      if (isJsonLd10(activeContext)) {
        throw new JsonLdError("invalid type mapping", `${expandedType} is not supported in json-ld-1.0 mode`, { term })
      }
    } else if (
      expandedType === null ||
      (expandedType !== "@id" && expandedType !== "@vocab" &&
        (!isAbsoluteIri(expandedType) || isBlankNodeIdentifier(expandedType)))
    ) {
      throw new JsonLdError("invalid type mapping", `the @type of "${term}" must expand to an IRI`, { term, type })
    }
    definition["@type"] = expandedType
  }

  // 13: `value` contains an `@reverse` entry
  if ("@reverse" in value) {
    if ("@id" in value || "@nest" in value) {
      throw new JsonLdError("invalid reverse property", `reverse term "${term}" cannot have @id or @nest`, { term })
    }
    const reverse = value["@reverse"]
    if (!isString(reverse)) {
      throw new JsonLdError("invalid IRI mapping", `the @reverse of "${term}" must be a string`, { term })
    }
    if (hasKeywordForm(reverse)) {
      console.warn(`Values beginning with "@" are reserved for future use and ignored: "${reverse}".`)
      defined.set(term, true)
      return
    }
    const id = expandIri(activeContext, reverse, false, true, localContext, defined, scope)
    if (id === null || !isAbsoluteIri(id)) {
      throw new JsonLdError("invalid IRI mapping", `the @reverse of "${term}" must expand to an IRI`, { term })
    }
    definition["@id"] = id
    definition["@reverse"] = true
  } // 14: `value` contains an `@id` entry other than `term`
  else if ("@id" in value && value["@id"] !== term) {
    const id = value["@id"]
    // 14.1: a `null` IRI mapping keeps the term out of IRI expansion
    if (id !== null) {
      // 14.2.1 - 14.2.3
      if (!isString(id)) {
        throw new JsonLdError("invalid IRI mapping", `the @id of "${term}" must be a string`, { term })
      }
      if (!isKeyword(id) && hasKeywordForm(id)) {
        console.warn(`Values beginning with "@" are reserved for future use and ignored: "${id}".`)
        defined.set(term, true)
        return
      }
      const expandedId = expandIri(activeContext, id, false, true, localContext, defined, scope)
      if (expandedId === null || !(isKeyword(expandedId) || isAbsoluteIri(expandedId))) {
        throw new JsonLdError("invalid IRI mapping", `the @id of "${term}" must expand to an IRI or keyword`, {
          term,
          id,
        })
      }
      if (expandedId === "@context") {
        throw new JsonLdError("invalid keyword alias", "@context cannot be aliased", { term })
      }
      definition["@id"] = expandedId

      // 14.2.4: a term that looks like an IRI must expand to itself
      if (term.slice(1, -1).includes(":") || term.includes("/")) {
        defined.set(term, true)
        const expandedTerm = expandIri(activeContext, term, false, true, localContext, defined, scope)
        if (expandedTerm !== expandedId) {
          throw new JsonLdError("invalid IRI mapping", `"${term}" looks like an IRI but maps to ${expandedId}`, {
            term,
          })
        }
      }

      // 14.2.5: the prefix flag
      if (!term.includes(":") && !term.includes("/") && simpleTerm) {
        definition["@prefix"] = /[:/?#[\]@]$/.test(expandedId) || isBlankNodeIdentifier(expandedId)
      }
    }
  } // 15: compact IRI or absolute IRI
  else if (term.indexOf(":", 1) > 0) {
    const colon = term.indexOf(":", 1)
    const prefix = term.slice(0, colon)
    const suffix = term.slice(colon + 1)
    if (prefix in localContext) {
      createTermDefinition(activeContext, localContext, prefix, defined, scope)
    }
    const prefixId = activeContext.termDefinitions.get(prefix)?.["@id"]
    definition["@id"] = prefixId ? `${prefixId}${suffix}` : term
  } // 16: relative IRI
  else if (term.includes("/")) {
    const id = expandIri(activeContext, term, true, true)
    if (id === null || !isAbsoluteIri(id)) {
      throw new JsonLdError("invalid IRI mapping", `relative term "${term}" does not expand to an IRI`, { term })
    }
    definition["@id"] = id
  } // 17: `@type`
  else if (term === "@type") {
    definition["@id"] = "@type"
  } // 18: vocabulary mapping
  else if (activeContext.vocabularyMapping !== null) {
    definition["@id"] = `${activeContext.vocabularyMapping}${term}`
  } else {
    throw new JsonLdError("invalid IRI mapping", `"${term}" has no IRI mapping and there is no @vocab`, { term })
  }

  // 19: `value` contains an `@container` entry
  if ("@container" in value) {
    const rawContainer = value["@container"]
    const container = toContainer(rawContainer)
    if (container === null) {
      throw new JsonLdError("invalid container mapping", `invalid @container for "${term}"`, {
        term,
        container: rawContainer,
      })
    }
    if (
      isJsonLd10(activeContext) &&
      (!isString(rawContainer) || ["@graph", "@id", "@type"].includes(rawContainer))
    ) {
      throw new JsonLdError("invalid container mapping", `@container ${String(rawContainer)} needs json-ld-1.1`, {
        term,
      })
    }
    if (definition["@reverse"] && container.some((keyword) => keyword !== "@index" && keyword !== "@set")) {
      throw new JsonLdError("invalid reverse property", "reverse properties only support set and index containers", {
        term,
      })
    }
    definition["@container"] = container
    if (container.includes("@type")) {
      if (definition["@type"] === undefined) {
        definition["@type"] = "@id"
      } else if (definition["@type"] !== "@id" && definition["@type"] !== "@vocab") {
        throw new JsonLdError("invalid type mapping", "type maps need an @id or @vocab type mapping", { term })
      }
    }
  }

  // 20: `value` contains an `@index` entry
  if ("@index" in value) {
    if (isJsonLd10(activeContext) || !definition["@container"].includes("@index")) {
      throw new JsonLdError("invalid term definition", "@index needs an index container", { term })
    }
    const index = value["@index"]
    const expandedIndex = isString(index) && !isKeyword(index)
      ? expandIri(activeContext, index, false, true, localContext, defined, scope)
      : null
    if (!isString(index) || expandedIndex === null || !isAbsoluteIri(expandedIndex)) {
      throw new JsonLdError("invalid term definition", `@index of "${term}" must expand to an IRI`, { term })
    }
    definition["@index"] = index
  }

  // 21: `value` contains an `@context` entry
  if ("@context" in value) {
    if (isJsonLd10(activeContext)) {
      throw new JsonLdError("invalid term definition", "scoped contexts need json-ld-1.1", { term })
    }
    const context = value["@context"]
    try {
      processContext(activeContext, context, scope.baseUrl, scope.options, [...scope.remoteContexts], true, true, false)
    } catch (error) {
      throw new JsonLdError("invalid scoped context", `the scoped context of "${term}" is invalid`, { term }, {
        cause: error,
      })
    }
    definition["@context"] = context
    definition["@base"] = scope.baseUrl
  }

  // 22: `value` contains an `@language` entry and no `@type`
  if ("@language" in value && !("@type" in value)) {
    const language = value["@language"]
    if (language !== null && !isString(language)) {
      throw new JsonLdError("invalid language mapping", `@language of "${term}" must be a string or null`, { term })
    }
    if (isString(language) && !isWellFormedLanguage(language)) {
      console.warn(`Language tag "${language}" is not well-formed.`)
    }
    definition["@language"] = isString(language) ? language.toLowerCase() : null
  }

  // 23: `value` contains an `@direction` entry and no `@type`
  if ("@direction" in value && !("@type" in value)) {
    const direction = value["@direction"]
    if (direction !== null && !isDirection(direction)) {
      throw new JsonLdError("invalid base direction", `@direction of "${term}" must be "ltr", "rtl" or null`, {
        term,
      })
    }
    definition["@direction"] = direction
  }

  // 24: `value` contains an `@nest` entry
  if ("@nest" in value) {
    if (isJsonLd10(activeContext)) {
      throw new JsonLdError("invalid term definition", "@nest needs json-ld-1.1", { term })
    }
    const nest = value["@nest"]
    if (!isString(nest) || (isKeyword(nest) && nest !== "@nest")) {
      throw new JsonLdError("invalid @nest value", `@nest of "${term}" must be a term or @nest`, { term })
    }
    definition["@nest"] = nest
  }

  // 25: `value` contains an `@prefix` entry
  if ("@prefix" in value) {
    if (isJsonLd10(activeContext) || term.includes(":") || term.includes("/")) {
      throw new JsonLdError("invalid term definition", `"${term}" cannot carry @prefix`, { term })
    }
    const prefix = value["@prefix"]
    if (typeof prefix !== "boolean") {
      throw new JsonLdError("invalid @prefix value", "@prefix must be a boolean", { term })
    }
    if (prefix && isKeyword(definition["@id"])) {
      throw new JsonLdError("invalid term definition", "a keyword alias cannot be a prefix", { term })
    }
    definition["@prefix"] = prefix
  }

  // 26: no other entries
  const unknown = Object.keys(value).find((key) => !TERM_DEFINITION_KEYWORDS.includes(key))
  if (unknown !== undefined) {
    throw new JsonLdError("invalid term definition", `unexpected ${unknown} in the definition of "${term}"`, {
      term,
    })
  }

  // 27: protected terms may only be redefined identically
  if (!scope.overrideProtected && previousDefinition?.["@protected"]) {
    if (!isSameDefinition(definition, previousDefinition)) {
      throw new JsonLdError("protected term redefinition", `protected term "${term}" cannot be redefined`, { term })
    }
    definition = previousDefinition
  }

  // 28: store the definition
  activeContext.termDefinitions.set(term, definition)
  defined.set(term, true)
}

/**
 * An inverse context is a reverse lookup table that maps container mapping, type mappings, and language mappings to a
 * simple term for a given active context. It is only generated for an active context that is being used for
 * compaction.
 *
 * Each term in the active context is visited, ordered by length, shortest first (ties are broken by choosing the
 * lexicographically least term). For each term, an entry is added for each combination of container mapping and type
 * mapping or language mapping that would legally match the term, so the first term stored for a combination is the
 * preferred one. Terms without such mappings are also stored under the special key `@none`, which lets term selection
 * fall back to more generic terms.
 *
 * @param activeContext The active context.
 *
 * @return The inverse context.
 */
export function createInverseContext(activeContext: ActiveContext): InverseContext {
  // 1 & 2: initialize `result` and the default language
  const result: InverseContext = new Map()
  const defaultLanguage = activeContext.defaultLanguage?.toLowerCase() ?? "@none"

  // 3: visit each term, shortest first
  const terms = [...activeContext.termDefinitions.keys()].sort(compareShortestLeast)
  for (const term of terms) {
    // 3.1: skip terms that cannot be selected
    const definition = activeContext.termDefinitions.get(term)
    if (definition === undefined || definition["@id"] === null) continue

    // 3.2: initialize `container`
    const container = definition["@container"].length > 0 ? [...definition["@container"]].sort().join("") : "@none"

    // 3.3 - 3.6: find or create the container map
    const iri = definition["@id"]
    let containerMap: ContainerMap | undefined = result.get(iri)
    if (containerMap === undefined) {
      containerMap = new Map()
      result.set(iri, containerMap)
    }
    let typeLanguageMap: TypeLanguageMap | undefined = containerMap.get(container)
    if (typeLanguageMap === undefined) {
      const languageMap: LanguageMap = new Map()
      const typeMap: TypeMap = new Map()
      const anyMap: AnyMap = new Map([["@none", term]])
      typeLanguageMap = { "@language": languageMap, "@type": typeMap, "@any": anyMap }
      containerMap.set(container, typeLanguageMap)
    }

    // 3.7 - 3.9: the language map, and the type map
    const languageMap = typeLanguageMap["@language"]
    const typeMap = typeLanguageMap["@type"]
    const setIfAbsent = (map: Map<string, Term>, key: string) => {
      if (!map.has(key)) map.set(key, term)
    }

    const language = definition["@language"]
    const direction = definition["@direction"]
    // 3.10: this is a reverse property
    if (definition["@reverse"]) {
      setIfAbsent(typeMap, "@reverse")
    } // 3.11: this term definition has a type mapping which is `@none`
    else if (definition["@type"] === "@none") {
      setIfAbsent(languageMap, "@any")
      setIfAbsent(typeMap, "@any")
    } // 3.12: this term definition has a type mapping (other than `@none`)
    else if (definition["@type"] !== undefined) {
      setIfAbsent(typeMap, definition["@type"])
    } // 3.13: this term definition has both a language mapping and a direction mapping
    else if (language !== undefined && direction !== undefined) {
      let langDir: string
      if (language !== null && direction !== null) {
        langDir = `${language}_${direction}`.toLowerCase()
      } else if (language !== null) {
        langDir = language.toLowerCase()
      } else if (direction !== null) {
        langDir = `_${direction}`
      } else {
        langDir = "@null"
      }
      setIfAbsent(languageMap, langDir)
    } // 3.14: this term definition has a language mapping (might be `null`)
    else if (language !== undefined) {
      setIfAbsent(languageMap, language === null ? "@null" : language.toLowerCase())
    } // 3.15: this term definition has a direction mapping (might be `null`)
    else if (direction !== undefined) {
      setIfAbsent(languageMap, direction === null ? "@none" : `_${direction}`)
    } // 3.16: this active context has a default base direction
    else if (activeContext.defaultBaseDirection !== null) {
      setIfAbsent(languageMap, `${defaultLanguage}_${activeContext.defaultBaseDirection}`.toLowerCase())
      setIfAbsent(languageMap, "@none")
      setIfAbsent(typeMap, "@none")
    } // 3.17: otherwise
    else {
      setIfAbsent(languageMap, defaultLanguage)
      setIfAbsent(languageMap, "@none")
      setIfAbsent(typeMap, "@none")
    }
  }

  return result
}

/**
 * This algorithm, invoked via the IRI Compaction algorithm, makes use of an active context's inverse context to find
 * the term that is best used to compact an IRI.
 *
 * The inverse context's entry for the IRI is searched according to the preferred container mappings, in the order
 * they are given. Amongst terms with a matching container mapping, preference is given to those with a matching type
 * mapping or language mapping, over those without. Ties between terms that have the same mappings were already
 * resolved, shortest and then lexicographically least, when the inverse context was created.
 *
 * @param activeContext The active context.
 * @param keywordOrIri The keyword or IRI to find a term for.
 * @param containers An ordered list of preferred container mappings.
 * @param typeLanguage Whether to look for a term with a matching type mapping or language mapping.
 * @param preferredValues An ordered list of preferred values for the type mapping or language mapping.
 */
export function selectTerm(
  activeContext: ActiveContext,
  keywordOrIri: string,
  containers: Array<string>,
  typeLanguage: keyof TypeLanguageMap,
  preferredValues: Array<string>,
): Term | null {
  // 1 & 2: create the inverse context if needed
  if (activeContext.inverseContext === null) {
    activeContext.inverseContext = createInverseContext(activeContext)
  }

  // 3: the container map for the IRI
  const containerMap = activeContext.inverseContext.get(keywordOrIri)
  if (containerMap === undefined) return null

  // 4: the first preferred container holding a preferred value wins
  for (const container of containers) {
    const valueMap = containerMap.get(container)?.[typeLanguage]
    if (valueMap === undefined) continue
    for (const item of preferredValues) {
      const term = valueMap.get(item)
      if (term !== undefined) return term
    }
  }

  // 5: no term found
  return null
}
