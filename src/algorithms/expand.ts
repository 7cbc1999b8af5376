import { JsonLdError } from "../error.ts"
import type { ProcessingOptions } from "../options.ts"
import type { IRI } from "../types/basic.ts"
import type { ActiveContext, ContextDefinition, TermDefinition } from "../types/context.ts"
import type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "../types/document.ts"
import { hasKeywordForm, isKeyword } from "../types/keyword.ts"
import { checkVersion, isWellFormedLanguage } from "../utils/context.ts"
import { resolveIri } from "../utils/iri.ts"
import {
  isAbsoluteIri,
  isArray,
  isBlankNodeIdentifier,
  isEmptyObject,
  isGraphObject,
  isListObject,
  isObject,
  isScalar,
  isString,
  isStringArray,
  isSubject,
  isSubjectRef,
  isValueObject,
} from "../utils/type.ts"
import { addValue, asArray, compareCodeUnits, getValues, sortedKeys } from "../utils/value.ts"
import { createTermDefinition, type DefinitionScope, processContext } from "./context.ts"

const FRAMING_KEYWORDS = ["@default", "@embed", "@explicit", "@omitDefault", "@requireAll"]

const VALUE_OBJECT_KEYWORDS = ["@direction", "@index", "@language", "@type", "@value"]

/**
 * IRI expansion turns a term, compact IRI, keyword alias or relative IRI into an absolute IRI or keyword.
 *
 * While a local context is being processed, `localContext` and `defined` are passed so that terms the value depends
 * on are defined first.
 *
 * @param activeContext The active context.
 * @param value The string to expand.
 * @param documentRelative Resolve against the base IRI when nothing else applies.
 * @param vocab Treat the value as a vocabulary item: terms and `@vocab` apply.
 * @param localContext The local context being processed, if any.
 * @param defined The terms of `localContext` defined so far.
 * @param scope The context processing the expansion is part of.
 *
 * @returns The expanded IRI or keyword, or `null` if the value cannot be expanded.
 */
export function expandIri(
  activeContext: ActiveContext,
  value: string | null,
  documentRelative: boolean = false,
  vocab: boolean = false,
  localContext: ContextDefinition | null = null,
  defined: Map<string, boolean> | null = null,
  scope: DefinitionScope | null = null,
): IRI | null {
  // Procedure:
  //
  // 1. Keywords and `null` expand to themselves.
  // 2. Other strings of the form `@` + letters are reserved and expand to `null`.
  // 3. Define the term first if it is part of the local context being processed.
  // 4 & 5. Keyword aliases always apply; other terms only for vocabulary values.
  // 6. Compact IRIs use their prefix's mapping; absolute IRIs and blank node identifiers are returned as is.
  // 7. Vocabulary values are appended to `@vocab`.
  // 8. Document-relative values are resolved against the base IRI.

  // 1: keywords and `null`
  if (value === null || isKeyword(value)) return value

  // 2: reserved keyword form
  if (hasKeywordForm(value)) {
    console.warn(`Values beginning with "@" are reserved for future use and ignored: "${value}".`)
    return null
  }

  // 3: dependency on the local context being processed
  if (localContext !== null && defined !== null && scope !== null && value in localContext) {
    if (defined.get(value) !== true) {
      createTermDefinition(activeContext, localContext, value, defined, scope)
    }
  }

  // 4: keyword aliases
  const definition = activeContext.termDefinitions.get(value)
  if (definition !== undefined && isKeyword(definition["@id"])) return definition["@id"]

  // 5: terms
  if (vocab && definition !== undefined) return definition["@id"]

  // 6: compact IRIs, absolute IRIs and blank node identifiers
  const colon = value.indexOf(":", 1)
  if (colon > 0) {
    const prefix = value.slice(0, colon)
    const suffix = value.slice(colon + 1)

    // 6.2: blank node identifier or IRI with an authority
    if (prefix === "_" || suffix.startsWith("//")) return value

    // 6.3: the prefix may itself be defined by the local context
    if (localContext !== null && defined !== null && scope !== null && prefix in localContext) {
      if (defined.get(prefix) !== true) {
        createTermDefinition(activeContext, localContext, prefix, defined, scope)
      }
    }

    // 6.4: compact IRI
    const prefixDefinition = activeContext.termDefinitions.get(prefix)
    if (prefixDefinition !== undefined && prefixDefinition["@id"] !== null && prefixDefinition["@prefix"]) {
      return `${prefixDefinition["@id"]}${suffix}`
    }

    // 6.5: already an absolute IRI
    if (isAbsoluteIri(value)) return value
  }

  // 7: vocabulary mapping
  if (vocab && activeContext.vocabularyMapping !== null) {
    return `${activeContext.vocabularyMapping}${value}`
  }

  // 8: document-relative
  if (documentRelative) {
    return resolveIri(activeContext.baseIri, value)
  }

  return value
}

/**
 * Expand a scalar value into a value object or node reference, applying the type, language and direction mappings of
 * the active property.
 *
 * @param activeContext The active context.
 * @param activeProperty The property the value belongs to.
 * @param value The scalar to expand.
 */
export function expandValue(activeContext: ActiveContext, activeProperty: string | null, value: JsonPrimitive): JsonObject {
  const definition = activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty)
  const type = definition?.["@type"]

  // 1 & 2: node references
  if (type === "@id" && isString(value)) {
    return { "@id": expandIri(activeContext, value, true, false) }
  }
  if (type === "@vocab" && isString(value)) {
    return { "@id": expandIri(activeContext, value, true, true) }
  }

  // 3: value object
  const result: JsonObject = { "@value": value }

  // 4: datatype
  if (type !== undefined && type !== "@id" && type !== "@vocab" && type !== "@none") {
    result["@type"] = type
  } // 5: language and direction, for strings only
  else if (isString(value)) {
    const termLanguage = definition?.["@language"]
    const termDirection = definition?.["@direction"]
    const language = termLanguage !== undefined ? termLanguage : activeContext.defaultLanguage
    const direction = termDirection !== undefined ? termDirection : activeContext.defaultBaseDirection
    if (language !== null) result["@language"] = language
    if (direction !== null) result["@direction"] = direction
  }

  return result
}

/**
 * Expansion is the process of taking a JSON-LD document and applying a context such that all IRIs, types, and values
 * are expanded so that the context is no longer necessary.
 *
 * The algorithm walks the element recursively. Scalars become value objects, arrays are expanded item by item and
 * flattened, and maps have their contexts applied (embedded, property-scoped and type-scoped) before each entry is
 * expanded: keywords by their own rules, other properties through their term definitions and containers.
 *
 * @param activeContext The active context.
 * @param activeProperty The property the element is the value of, or `null` at the top level.
 * @param element The element to expand.
 * @param baseUrl The base URL of the document, used for embedded remote contexts.
 * @param options The options of the running processor call.
 * @param frameExpansion Allow the relaxed syntax of frames.
 * @param fromMap The element is a value of an index, id or type map.
 * @param insideList The element is the value of a list.
 *
 * @returns The expanded element: `null`, a map, or an array.
 */
export function expand(
  activeContext: ActiveContext,
  activeProperty: string | null,
  element: JsonValue,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  frameExpansion: boolean = false,
  fromMap: boolean = false,
  insideList: boolean = false,
): JsonValue {
  // 1: `null` expands to `null`
  if (element === null) return null

  // 2: `@default` values are not frames
  if (activeProperty === "@default") frameExpansion = false

  // 3: property-scoped context
  const propertyDefinition = activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty)
  const propertyScopedContext = propertyDefinition?.["@context"]
  const expandedActiveProperty = activeProperty === null ? null : expandIri(activeContext, activeProperty, false, true)

  // 4: scalars
  if (!isArray(element) && !isObject(element)) {
    // 4.1: free-floating scalars are dropped
    if (!insideList && (expandedActiveProperty === null || expandedActiveProperty === "@graph")) return null
    // 4.2: the property-scoped context applies to the value
    const context = propertyScopedContext === undefined
      ? activeContext
      : processContext(activeContext, propertyScopedContext, propertyDefinition?.["@base"] ?? null, options, [], true)
    // 4.3: expand the value
    return expandValue(context, activeProperty, element)
  }

  // 5: arrays
  if (isArray(element)) {
    const result: JsonArray = []
    const listContainer = insideList || (propertyDefinition?.["@container"].includes("@list") ?? false)
    for (const item of element) {
      // 5.2.1: expand the item
      const expandedItem = expand(activeContext, activeProperty, item, baseUrl, options, frameExpansion, fromMap)
      // 5.2.2: a list holds no lists
      if (listContainer && (isArray(expandedItem) || isListObject(expandedItem))) {
        throw new JsonLdError("list of lists", "a list cannot directly contain another list", {
          property: activeProperty,
        })
      }
      // 5.2.3: append
      if (isArray(expandedItem)) {
        result.push(...expandedItem)
      } else if (expandedItem !== null) {
        result.push(expandedItem)
      }
    }
    return result
  }

  // 6 & 7: a non-propagated context does not apply to new node objects
  if (activeContext.previousContext !== null && !fromMap) {
    const keys = Object.keys(element)
    const keepsContext = keys.some((key) => {
      const expandedKey = expandIri(activeContext, key, false, true)
      return expandedKey === "@value" || (expandedKey === "@id" && keys.length === 1)
    })
    if (!keepsContext) {
      activeContext = activeContext.previousContext
    }
  }

  // 8: property-scoped context
  if (propertyScopedContext !== undefined) {
    activeContext = processContext(
      activeContext,
      propertyScopedContext,
      propertyDefinition?.["@base"] ?? null,
      options,
      [],
      true,
    )
  }

  // 9: embedded context
  if ("@context" in element) {
    activeContext = processContext(activeContext, element["@context"], baseUrl, options)
  }

  // 10: contexts of types are looked up in the context before they apply
  const typeScopedContext = activeContext

  // 11: type-scoped contexts
  let typeKey: string | null = null
  for (const key of sortedKeys(element)) {
    if (expandIri(activeContext, key, false, true) !== "@type") continue
    typeKey ??= key
    const types = asArray(element[key]).filter(isString).sort(compareCodeUnits)
    for (const term of types) {
      const definition = typeScopedContext.termDefinitions.get(term)
      const scopedContext = definition?.["@context"]
      if (scopedContext !== undefined) {
        activeContext = processContext(
          activeContext,
          scopedContext,
          definition?.["@base"] ?? null,
          options,
          [],
          false,
          false,
        )
      }
    }
  }

  // 12: the input type decides whether `@value` holds JSON
  let inputType: string | null = null
  if (typeKey !== null) {
    const last = asArray(element[typeKey]).at(-1)
    if (isString(last)) {
      inputType = expandIri(activeContext, last, false, true)
    }
  }

  // 13 & 14: expand the entries
  const result: JsonObject = {}
  expandObject(
    activeContext,
    activeProperty,
    expandedActiveProperty,
    element,
    result,
    baseUrl,
    options,
    typeScopedContext,
    inputType,
    frameExpansion,
  )

  let output: JsonValue = result
  const count = Object.keys(result).length

  // 15: value objects
  if ("@value" in result) {
    if (
      Object.keys(result).some((key) => !VALUE_OBJECT_KEYWORDS.includes(key)) ||
      ("@type" in result && ("@language" in result || "@direction" in result))
    ) {
      throw new JsonLdError("invalid value object", "a value object has @value and at most one of @type or @language", {
        keys: Object.keys(result),
      })
    }
    const value = result["@value"]
    if (result["@type"] !== "@json") {
      if (value === null || (isArray(value) && value.length === 0)) {
        return null
      }
      if (!frameExpansion) {
        if (!isString(value) && "@language" in result) {
          throw new JsonLdError("invalid language-tagged value", "only strings can carry a language", { value })
        }
        const type = result["@type"]
        if (type !== undefined && (!isString(type) || !isAbsoluteIri(type) || isBlankNodeIdentifier(type))) {
          throw new JsonLdError("invalid typed value", "the @type of a value must be an IRI", { type })
        }
      }
    }
  } // 16: `@type` is always an array
  else if ("@type" in result && !isArray(result["@type"])) {
    result["@type"] = [result["@type"]]
  } // 17: sets and lists
  else if ("@set" in result || "@list" in result) {
    if (count > 2 || (count === 2 && !("@index" in result))) {
      throw new JsonLdError("invalid set or list object", "@set and @list may only be combined with @index", {
        keys: Object.keys(result),
      })
    }
    if ("@set" in result) {
      output = result["@set"]
    }
  }

  // 18: a lone `@language` carries nothing
  if (isObject(output) && Object.keys(output).length === 1 && "@language" in output) {
    return null
  }

  // 19: drop free-floating values and nodes
  if (
    isObject(output) &&
    !options.keepFreeFloatingNodes &&
    !insideList &&
    (expandedActiveProperty === null || expandedActiveProperty === "@graph")
  ) {
    const keys = Object.keys(output)
    if (keys.length === 0 || "@value" in output || "@list" in output) {
      return null
    }
    if (keys.length === 1 && "@id" in output && !frameExpansion) {
      return null
    }
  }

  return output
}

function getOrCreateMap(parent: JsonObject, key: string): JsonObject {
  const existing = parent[key]
  if (isObject(existing)) return existing
  const created: JsonObject = {}
  parent[key] = created
  return created
}

/**
 * Expand the entries of a map into `result`. Entries nested under `@nest` are expanded into the same result.
 */
function expandObject(
  activeContext: ActiveContext,
  activeProperty: string | null,
  expandedActiveProperty: string | null,
  element: JsonObject,
  result: JsonObject,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  typeScopedContext: ActiveContext,
  inputType: string | null,
  frameExpansion: boolean,
): void {
  const is10 = checkVersion(activeContext.processingMode, 1.0)
  const nests: Array<string> = []

  for (const key of options.ordered ? sortedKeys(element) : Object.keys(element)) {
    const value = element[key]

    // 13.1: `@context` was applied already
    if (key === "@context") continue

    // 13.2 & 13.3: only absolute IRIs and keywords are kept
    const expandedProperty = expandIri(activeContext, key, false, true)
    if (expandedProperty === null || !(isAbsoluteIri(expandedProperty) || isKeyword(expandedProperty))) continue

    // 13.4: keywords
    if (isKeyword(expandedProperty)) {
      // 13.4.1: a reverse property map holds no keywords
      if (expandedActiveProperty === "@reverse") {
        throw new JsonLdError("invalid reverse property map", `${key} cannot be used inside @reverse`, { key })
      }

      // 13.4.2: keywords appear once, except `@included` and `@type`
      if (expandedProperty in result && expandedProperty !== "@included" && (expandedProperty !== "@type" || is10)) {
        throw new JsonLdError("colliding keywords", `${expandedProperty} appears more than once`, {
          keyword: expandedProperty,
        })
      }

      let expandedValue: JsonValue | undefined

      switch (expandedProperty) {
        // 13.4.3: `@id`
        case "@id": {
          if (isString(value)) {
            const id = expandIri(activeContext, value, true, false)
            expandedValue = frameExpansion && id !== null ? [id] : id
          } else if (frameExpansion && isEmptyObject(value)) {
            expandedValue = [{}]
          } else if (frameExpansion && isStringArray(value)) {
            expandedValue = value.map((id) => expandIri(activeContext, id, true, false)).filter(isString)
          } else {
            throw new JsonLdError("invalid @id value", "@id must be a string", { value })
          }
          break
        }

        // 13.4.4: `@type`
        case "@type": {
          if (isString(value)) {
            expandedValue = expandIri(typeScopedContext, value, true, true)
          } else if (isStringArray(value)) {
            expandedValue = value.map((type) => expandIri(typeScopedContext, type, true, true)).filter(isString)
          } else if (frameExpansion && isEmptyObject(value)) {
            expandedValue = {}
          } else if (frameExpansion && isObject(value) && isString(value["@default"])) {
            expandedValue = { "@default": expandIri(typeScopedContext, value["@default"], true, true) }
          } else {
            throw new JsonLdError("invalid type value", "@type must be a string or an array of strings", { value })
          }
          if (expandedValue !== null && "@type" in result) {
            expandedValue = [...asArray(result["@type"]), ...asArray(expandedValue)]
          }
          break
        }

        // 13.4.6: `@graph`
        case "@graph": {
          expandedValue = asArray(expand(activeContext, "@graph", value, baseUrl, options, frameExpansion))
          break
        }

        // 13.4.7: `@included`
        case "@included": {
          if (is10) continue
          const included = asArray(expand(activeContext, activeProperty, value, baseUrl, options, frameExpansion))
          if (!included.every((item) => isSubject(item) || isSubjectRef(item))) {
            throw new JsonLdError("invalid @included value", "@included may only contain node objects")
          }
          expandedValue = "@included" in result ? [...asArray(result["@included"]), ...included] : included
          break
        }

        // 13.4.8: `@value`, stored even when `null`
        case "@value": {
          if (inputType === "@json") {
            if (is10) {
              throw new JsonLdError("invalid value object value", "@json values need json-ld-1.1")
            }
            result["@value"] = value
          } else if (value === null || isScalar(value)) {
            result["@value"] = frameExpansion && value !== null ? [value] : value
          } else if (frameExpansion && (isEmptyObject(value) || (isArray(value) && value.every(isScalar)))) {
            result["@value"] = asArray(value)
          } else {
            throw new JsonLdError("invalid value object value", "@value must be a scalar or null", { value })
          }
          continue
        }

        // 13.4.9: `@language`
        case "@language": {
          if (isString(value)) {
            if (!isWellFormedLanguage(value)) {
              console.warn(`Language tag "${value}" is not well-formed.`)
            }
            expandedValue = frameExpansion ? [value.toLowerCase()] : value.toLowerCase()
          } else if (frameExpansion && (isEmptyObject(value) || isStringArray(value))) {
            expandedValue = asArray(value)
          } else {
            throw new JsonLdError("invalid language-tagged string", "@language must be a string", { value })
          }
          break
        }

        // 13.4.10: `@direction`
        case "@direction": {
          if (is10) continue
          if (value === "ltr" || value === "rtl") {
            expandedValue = frameExpansion ? [value] : value
          } else if (frameExpansion && (isEmptyObject(value) || isArray(value))) {
            expandedValue = asArray(value)
          } else {
            throw new JsonLdError("invalid base direction", `@direction must be "ltr" or "rtl"`, { value })
          }
          break
        }

        // 13.4.11: `@index`
        case "@index": {
          if (!isString(value)) {
            throw new JsonLdError("invalid @index value", "@index must be a string", { value })
          }
          expandedValue = value
          break
        }

        // 13.4.12: `@list`
        case "@list": {
          // free-floating lists are dropped
          if (expandedActiveProperty === null || expandedActiveProperty === "@graph") continue
          const list = expand(activeContext, activeProperty, value, baseUrl, options, frameExpansion, false, true)
          if (isListObject(list) || (isArray(list) && list.some(isListObject))) {
            throw new JsonLdError("list of lists", "a list cannot directly contain another list", {
              property: activeProperty,
            })
          }
          expandedValue = asArray(list)
          break
        }

        // 13.4.13: `@set`
        case "@set": {
          expandedValue = expand(activeContext, activeProperty, value, baseUrl, options, frameExpansion)
          break
        }

        // 13.4.14: `@reverse`
        case "@reverse": {
          if (!isObject(value)) {
            throw new JsonLdError("invalid @reverse value", "@reverse must be a map", { value })
          }
          const reversed = expand(activeContext, "@reverse", value, baseUrl, options, frameExpansion)
          if (isObject(reversed)) {
            // 13.4.14.3: a double reverse is a forward property
            const doubleReversed = reversed["@reverse"]
            if (isObject(doubleReversed)) {
              for (const [property, item] of Object.entries(doubleReversed)) {
                addValue(result, property, item, { propertyIsArray: true })
              }
            }
            // 13.4.14.4: the rest are reverse properties
            const properties = Object.keys(reversed).filter((property) => property !== "@reverse")
            if (properties.length > 0) {
              const reverseMap = getOrCreateMap(result, "@reverse")
              for (const property of properties) {
                for (const item of asArray(reversed[property])) {
                  if (isValueObject(item) || isListObject(item)) {
                    throw new JsonLdError("invalid reverse property value", "reverse properties only take nodes", {
                      property,
                    })
                  }
                  addValue(reverseMap, property, item, { propertyIsArray: true })
                }
              }
            }
          }
          continue
        }

        // 13.4.15: `@nest`, expanded after the other entries
        case "@nest": {
          nests.push(key)
          continue
        }

        default: {
          // 13.4.16: framing keywords
          if (frameExpansion && FRAMING_KEYWORDS.includes(expandedProperty)) {
            expandedValue = expandedProperty === "@default"
              ? expand(activeContext, activeProperty, value, baseUrl, options, frameExpansion)
              : asArray(value)
            break
          }
          continue
        }
      }

      // 13.4.17: set the keyword, unless its value vanished
      if (expandedValue !== undefined && expandedValue !== null) {
        result[expandedProperty] = expandedValue
      }
      continue
    }

    // 13.5 - 13.9: other properties, through their term definitions
    const definition = activeContext.termDefinitions.get(key)
    const container = definition?.["@container"] ?? []
    let expandedValue: JsonValue

    if (definition?.["@type"] === "@json") {
      // 13.5: JSON literal
      expandedValue = { "@value": value, "@type": "@json" }
    } else if (definition !== undefined && container.includes("@language") && isObject(value)) {
      // 13.7: language map
      expandedValue = expandLanguageMap(activeContext, definition, value, options)
    } else if (
      definition !== undefined &&
      (container.includes("@index") || container.includes("@type") || container.includes("@id")) &&
      isObject(value)
    ) {
      // 13.8: index, id and type maps
      expandedValue = expandIndexMap(activeContext, key, definition, value, baseUrl, options, frameExpansion)
    } else {
      // 13.9: anything else
      expandedValue = expand(activeContext, key, value, baseUrl, options, frameExpansion)
    }

    // 13.10: nothing to add
    if (expandedValue === null) continue

    // 13.11: list container
    if (container.includes("@list") && !isListObject(expandedValue)) {
      expandedValue = { "@list": asArray(expandedValue) }
    }

    // 13.12: graph container
    if (container.includes("@graph") && !container.includes("@id") && !container.includes("@index")) {
      expandedValue = asArray(expandedValue).map((item): JsonValue => ({ "@graph": asArray(item) }))
    }

    if (definition?.["@reverse"]) {
      // 13.13: reverse property
      const reverseMap = getOrCreateMap(result, "@reverse")
      for (const item of asArray(expandedValue)) {
        if (isValueObject(item) || isListObject(item)) {
          throw new JsonLdError("invalid reverse property value", `reverse property ${key} only takes nodes`, {
            property: key,
          })
        }
        addValue(reverseMap, expandedProperty, item, { propertyIsArray: true })
      }
    } else {
      // 13.14: regular property
      addValue(result, expandedProperty, expandedValue, { propertyIsArray: true })
    }
  }

  // 14: nested properties
  for (const nestingKey of options.ordered ? [...nests].sort(compareCodeUnits) : nests) {
    for (const nestedValue of asArray(element[nestingKey])) {
      if (
        !isObject(nestedValue) ||
        Object.keys(nestedValue).some((key) => expandIri(activeContext, key, false, true) === "@value")
      ) {
        throw new JsonLdError("invalid @nest value", "@nest must hold maps of properties", { key: nestingKey })
      }
      expandObject(
        activeContext,
        activeProperty,
        expandedActiveProperty,
        nestedValue,
        result,
        baseUrl,
        options,
        typeScopedContext,
        inputType,
        frameExpansion,
      )
    }
  }
}

function expandLanguageMap(
  activeContext: ActiveContext,
  definition: TermDefinition,
  value: JsonObject,
  options: ProcessingOptions,
): JsonArray {
  const result: JsonArray = []
  const termDirection = definition["@direction"]
  const direction = termDirection !== undefined ? termDirection : activeContext.defaultBaseDirection

  for (const language of options.ordered ? sortedKeys(value) : Object.keys(value)) {
    const expandedLanguage = expandIri(activeContext, language, false, true)
    for (const item of asArray(value[language])) {
      if (item === null) continue
      if (!isString(item)) {
        throw new JsonLdError("invalid language map value", "language maps may only hold strings", { language })
      }
      const languageValue: JsonObject = { "@value": item }
      if (expandedLanguage !== "@none") {
        if (!isWellFormedLanguage(language)) {
          console.warn(`Language tag "${language}" is not well-formed.`)
        }
        languageValue["@language"] = language.toLowerCase()
      }
      if (direction !== null) {
        languageValue["@direction"] = direction
      }
      result.push(languageValue)
    }
  }

  return result
}

function expandIndexMap(
  activeContext: ActiveContext,
  key: string,
  definition: TermDefinition,
  value: JsonObject,
  baseUrl: IRI | null,
  options: ProcessingOptions,
  frameExpansion: boolean,
): JsonArray {
  const result: JsonArray = []
  const container = definition["@container"]
  const indexKey = definition["@index"] ?? "@index"

  for (const index of options.ordered ? sortedKeys(value) : Object.keys(value)) {
    // 13.8.3.1: id and type maps are not affected by non-propagated contexts
    let mapContext = activeContext
    if (container.includes("@id") || container.includes("@type")) {
      mapContext = activeContext.previousContext ?? activeContext
    }

    // 13.8.3.2: type maps apply the type-scoped context of their keys
    if (container.includes("@type")) {
      const indexDefinition = mapContext.termDefinitions.get(index)
      const scopedContext = indexDefinition?.["@context"]
      if (scopedContext !== undefined) {
        mapContext = processContext(mapContext, scopedContext, indexDefinition?.["@base"] ?? null, options)
      }
    }

    // 13.8.3.4 - 13.8.3.6: expand the values
    const expandedIndex = expandIri(activeContext, index, false, true)
    const indexValues = asArray(expand(mapContext, key, asArray(value[index]), baseUrl, options, frameExpansion, true))

    for (const indexValue of indexValues) {
      // 13.8.3.7.1: graph containers wrap their values
      const item: JsonValue = container.includes("@graph") && !isGraphObject(indexValue)
        ? { "@graph": asArray(indexValue) }
        : indexValue
      if (!isObject(item)) continue

      if (container.includes("@index") && indexKey !== "@index" && expandedIndex !== "@none") {
        // 13.8.3.7.2: property-valued index
        const expandedIndexKey = expandIri(activeContext, indexKey, false, true)
        if (expandedIndexKey !== null) {
          item[expandedIndexKey] = [expandValue(activeContext, indexKey, index), ...getValues(item, expandedIndexKey)]
        }
        if (isValueObject(item)) {
          throw new JsonLdError("invalid value object", "a value in a property-valued index cannot take properties", {
            index,
          })
        }
      } else if (container.includes("@index") && !("@index" in item) && expandedIndex !== "@none") {
        // 13.8.3.7.3
        item["@index"] = index
      } else if (container.includes("@id") && !("@id" in item) && expandedIndex !== "@none") {
        // 13.8.3.7.4
        item["@id"] = expandIri(activeContext, index, true, false)
      } else if (container.includes("@type") && expandedIndex !== null && expandedIndex !== "@none") {
        // 13.8.3.7.5
        item["@type"] = [expandedIndex, ...getValues(item, "@type")]
      }

      result.push(item)
    }
  }

  return result
}
