import { JsonLdError } from "../error.ts"
import type { ProcessingOptions } from "../options.ts"
import type { IRI } from "../types/basic.ts"
import type { ActiveContext, TypeLanguageMap } from "../types/context.ts"
import type { JsonArray, JsonObject, JsonValue } from "../types/document.ts"
import { isKeyword } from "../types/keyword.ts"
import { checkVersion } from "../utils/context.ts"
import { removeBase } from "../utils/iri.ts"
import {
  isArray,
  isGraphObject,
  isListObject,
  isObject,
  isSimpleGraph,
  isString,
  isSubjectRef,
  isValueObject,
} from "../utils/type.ts"
import { addValue, asArray, compareCodeUnits, compareShortestLeast, sortedKeys } from "../utils/value.ts"
import { createInverseContext, processContext, selectTerm } from "./context.ts"
import { expandIri } from "./expand.ts"

/**
 * This algorithm compacts an absolute IRI to the shortest matching term or compact IRI, or a keyword to its alias.
 *
 * @param activeContext The active context.
 * @param iri The IRI or keyword to compact.
 * @param value The value the IRI is used with as a property, which decides between terms with different mappings.
 * @param vocab Compact relative to the vocabulary mapping, choosing terms; otherwise relative to the base IRI.
 * @param reverse The IRI is used as a reverse property.
 * @param compactToRelative Make document-relative IRIs relative to the base IRI.
 *
 * @returns The compacted IRI, or `null` for a `null` IRI.
 */
export function compactIri(
  activeContext: ActiveContext,
  iri: string | null,
  value: JsonValue = null,
  vocab: boolean = false,
  reverse: boolean = false,
  compactToRelative: boolean = true,
): string | null {
  // Procedure:
  //
  // 1. `null` compacts to `null`.
  // 2. For vocabulary values, select a term through the inverse context, based on the shape of `value`.
  // 3. Vocabulary values may drop the vocabulary mapping.
  // 4 - 6. Otherwise pick the shortest, least compact IRI any prefix can build.
  // 7. An IRI whose scheme is a prefix would be misread as a compact IRI.
  // 8 & 9. Document-relative IRIs are made relative to the base IRI.

  // 1: `null`
  if (iri === null) return null

  // 2: term selection
  if (vocab) {
    activeContext.inverseContext ??= createInverseContext(activeContext)
    if (activeContext.inverseContext.has(iri)) {
      const term = selectTermFor(activeContext, iri, value, reverse)
      if (term !== null) return term
    }
  }

  // 3: vocabulary mapping
  const vocabulary = activeContext.vocabularyMapping
  if (vocab && vocabulary !== null && iri.startsWith(vocabulary) && iri.length > vocabulary.length) {
    const suffix = iri.slice(vocabulary.length)
    if (!activeContext.termDefinitions.has(suffix)) return suffix
  }

  // 4 & 5: compact IRIs
  let compacted: string | null = null
  for (const [term, definition] of activeContext.termDefinitions) {
    const id = definition["@id"]
    if (id === null || id === iri || !iri.startsWith(id) || !definition["@prefix"]) continue

    const candidate = `${term}:${iri.slice(id.length)}`
    const candidateDefinition = activeContext.termDefinitions.get(candidate)
    const usable = candidateDefinition === undefined || (candidateDefinition["@id"] === iri && value === null)
    if (usable && (compacted === null || compareShortestLeast(candidate, compacted) < 0)) {
      compacted = candidate
    }
  }

  // 6: the compact IRI, if any
  if (compacted !== null) return compacted

  // 7: an absolute IRI that reads as a compact IRI
  for (const [term, definition] of activeContext.termDefinitions) {
    if (definition["@prefix"] && iri.startsWith(`${term}:`) && !iri.startsWith(`${term}://`)) {
      throw new JsonLdError("IRI confused with prefix", `${iri} would expand through the prefix "${term}"`, {
        iri,
        term,
      })
    }
  }

  // 8: relative to the base IRI
  if (!vocab && compactToRelative && activeContext.baseIri !== null && !isKeyword(iri)) {
    return removeBase(activeContext.baseIri, iri)
  }

  // 9: as is
  return iri
}

/**
 * Work out which container, type and language mappings a term needs to fit `value`, then look one up.
 */
function selectTermFor(activeContext: ActiveContext, iri: IRI, value: JsonValue, reverse: boolean): string | null {
  const is10 = checkVersion(activeContext.processingMode, 1.0)

  // 2.1: the default language, with the default base direction
  const defaultLanguage = activeContext.defaultBaseDirection !== null
    ? `${activeContext.defaultLanguage ?? ""}_${activeContext.defaultBaseDirection}`.toLowerCase()
    : activeContext.defaultLanguage?.toLowerCase() ?? "@none"

  // 2.2: a value to be preserved stands for its first item
  if (isObject(value) && "@preserve" in value) {
    value = asArray(value["@preserve"])[0] ?? null
  }

  // 2.3 & 2.4
  const containers: Array<string> = []
  let typeLanguage: keyof TypeLanguageMap = "@language"
  let typeLanguageValue: string = "@null"

  // 2.5: indexed values
  if (isObject(value) && "@index" in value && !isGraphObject(value)) {
    containers.push("@index", "@index@set")
  }

  if (reverse) {
    // 2.6: reverse properties
    typeLanguage = "@type"
    typeLanguageValue = "@reverse"
    containers.push("@set")
  } else if (isListObject(value)) {
    // 2.7: lists, by the common type or language of their items
    if (!("@index" in value)) containers.push("@list")
    const list = asArray(value["@list"])
    let commonType: string | null = null
    let commonLanguage: string | null = list.length === 0 ? defaultLanguage : null

    for (const item of list) {
      let itemLanguage = "@none"
      let itemType = "@none"
      if (isValueObject(item)) {
        if ("@direction" in item) {
          itemLanguage = `${item["@language"] ?? ""}_${item["@direction"]}`.toLowerCase()
        } else if ("@language" in item) {
          itemLanguage = String(item["@language"]).toLowerCase()
        } else if ("@type" in item) {
          itemType = String(item["@type"])
        } else {
          itemLanguage = "@null"
        }
      } else {
        itemType = "@id"
      }

      if (commonLanguage === null) {
        commonLanguage = itemLanguage
      } else if (itemLanguage !== commonLanguage && isValueObject(item)) {
        commonLanguage = "@none"
      }
      if (commonType === null) {
        commonType = itemType
      } else if (itemType !== commonType) {
        commonType = "@none"
      }
      if (commonLanguage === "@none" && commonType === "@none") break
    }

    commonLanguage ??= "@none"
    commonType ??= "@none"
    if (commonType !== "@none") {
      typeLanguage = "@type"
      typeLanguageValue = commonType
    } else {
      typeLanguageValue = commonLanguage
    }
  } else if (isGraphObject(value)) {
    // 2.8: graph objects
    if ("@index" in value) containers.push("@graph@index", "@graph@index@set")
    if ("@id" in value) containers.push("@graph@id", "@graph@id@set")
    containers.push("@graph", "@graph@set", "@set")
    if (!("@index" in value)) containers.push("@graph@index", "@graph@index@set")
    if (!("@id" in value)) containers.push("@graph@id", "@graph@id@set")
    containers.push("@index", "@index@set")
    typeLanguage = "@type"
    typeLanguageValue = "@id"
  } else {
    // 2.9: other values
    if (isValueObject(value)) {
      if ("@direction" in value && !("@index" in value)) {
        typeLanguageValue = `${value["@language"] ?? ""}_${value["@direction"]}`.toLowerCase()
        containers.push("@language", "@language@set")
      } else if ("@language" in value && !("@index" in value)) {
        typeLanguageValue = String(value["@language"]).toLowerCase()
        containers.push("@language", "@language@set")
      } else if ("@type" in value) {
        typeLanguage = "@type"
        typeLanguageValue = String(value["@type"])
      }
    } else {
      typeLanguage = "@type"
      typeLanguageValue = "@id"
      containers.push("@id", "@id@set", "@type", "@set@type")
    }
    containers.push("@set")
  }

  // 2.10 - 2.12: fallbacks
  containers.push("@none")
  if (!is10) {
    if (!(isObject(value) && "@index" in value)) containers.push("@index", "@index@set")
    if (isValueObject(value) && Object.keys(value).length === 1) containers.push("@language", "@language@set")
  }

  // 2.14 - 2.19: preferred values
  const preferredValues: Array<string> = []
  if (typeLanguageValue === "@reverse") preferredValues.push("@reverse")

  const id = isObject(value) ? value["@id"] : undefined
  if ((typeLanguageValue === "@id" || typeLanguageValue === "@reverse") && isString(id)) {
    // a term whose IRI is the value's `@id` compacts the value to that term
    const compactedId = compactIri(activeContext, id, null, true)
    const definition = compactedId === null ? undefined : activeContext.termDefinitions.get(compactedId)
    if (definition?.["@id"] === id) {
      preferredValues.push("@vocab", "@id", "@none")
    } else {
      preferredValues.push("@id", "@vocab", "@none")
    }
  } else {
    preferredValues.push(typeLanguageValue, "@none")
    if (isListObject(value) && asArray(value["@list"]).length === 0) {
      typeLanguage = "@any"
    }
  }
  preferredValues.push("@any")
  for (const preferred of [...preferredValues]) {
    const underscore = preferred.indexOf("_")
    if (underscore > 0) preferredValues.push(preferred.slice(underscore))
  }

  // 2.20: term selection
  return selectTerm(activeContext, iri, containers, typeLanguage, preferredValues)
}

/** A node reference, or one whose only other entry is an `@index` the container holds. */
function isNodeReference(value: JsonObject, container: ReadonlyArray<string>): boolean {
  if (isSubjectRef(value)) return true
  return container.includes("@index") && Object.keys(value).length === 2 && "@id" in value && "@index" in value
}

/**
 * Compact a value object or node reference to a scalar where the term definition of the active property allows it;
 * otherwise compact its keywords.
 *
 * @param activeContext The active context.
 * @param activeProperty The property the value belongs to.
 * @param value The value object or node reference.
 * @param options The options of the running processor call.
 */
export function compactValue(
  activeContext: ActiveContext,
  activeProperty: string | null,
  value: JsonObject,
  options: ProcessingOptions,
): JsonValue {
  const definition = activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty)
  const type = definition?.["@type"]
  const container = definition?.["@container"] ?? []
  const alias = (keyword: string) => compactIri(activeContext, keyword, null, true) ?? keyword

  // node references
  if (isNodeReference(value, container)) {
    const id = value["@id"]
    if (!isString(id)) return null
    if (type === "@id" || type === "@vocab") {
      return compactIri(activeContext, id, null, type === "@vocab", false, options.compactToRelative)
    }
    return { [alias("@id")]: compactIri(activeContext, id, null, false, false, options.compactToRelative) }
  }

  const termLanguage = definition?.["@language"]
  const termDirection = definition?.["@direction"]
  const language = termLanguage !== undefined ? termLanguage : activeContext.defaultLanguage
  const direction = termDirection !== undefined ? termDirection : activeContext.defaultBaseDirection

  // an index must survive unless the container holds it
  const preserveIndex = "@index" in value && !container.includes("@index")

  if (!preserveIndex && type !== "@none") {
    // matching datatype
    if ("@type" in value && value["@type"] === type) {
      return value["@value"]
    }

    // matching language and direction, or a plain non-string value
    const valueLanguage = value["@language"]
    const valueDirection = value["@direction"] ?? null
    if (!("@type" in value)) {
      const sameLanguage = isString(valueLanguage)
        ? valueLanguage.toLowerCase() === language?.toLowerCase()
        : language === null
      if (!isString(value["@value"]) && !("@language" in value) && valueDirection === null) {
        return value["@value"]
      }
      if (type === undefined && sameLanguage && valueDirection === direction) {
        return value["@value"]
      }
    }
  }

  // the keywords of the value object
  const result: JsonObject = {}
  if (preserveIndex) result[alias("@index")] = value["@index"]
  const valueType = value["@type"]
  if (isString(valueType)) {
    result[alias("@type")] = compactIri(activeContext, valueType, null, true)
  } else if ("@language" in value) {
    result[alias("@language")] = value["@language"]
  }
  if ("@direction" in value) result[alias("@direction")] = value["@direction"]
  result[alias("@value")] = value["@value"]
  return result
}

function nestResultFor(activeContext: ActiveContext, result: JsonObject, property: string): JsonObject {
  const nest = activeContext.termDefinitions.get(property)?.["@nest"]
  if (nest === undefined) return result
  if (expandIri(activeContext, nest, false, true) !== "@nest") {
    throw new JsonLdError("invalid @nest value", `nesting property ${nest} must expand to @nest`, { property })
  }
  const existing = result[nest]
  if (isObject(existing)) return existing
  const created: JsonObject = {}
  result[nest] = created
  return created
}

/**
 * This algorithm compacts a JSON-LD document, such that the given context is applied. This must result in shortening
 * any applicable IRIs to terms or compact IRIs, any applicable keywords to keyword aliases, and any applicable JSON-LD
 * values expressed in expanded form to simple values such as strings or numbers.
 *
 * Scalars are already compact. Arrays are compacted item by item, and a lone item replaces the array when
 * `compactArrays` is set and the active property's container does not ask for an array. Maps are compacted entry by
 * entry: keys through IRI compaction, values through value compaction, and values reshaped into the index, language,
 * id, type and graph maps the context asks for.
 *
 * The element is never changed; the result is a new tree.
 *
 * @param activeContext The active context.
 * @param activeProperty The compacted property the element is the value of, or `null` at the top level.
 * @param element The expanded element to compact.
 * @param options The options of the running processor call.
 */
export function compact(
  activeContext: ActiveContext,
  activeProperty: string | null,
  element: JsonValue,
  options: ProcessingOptions,
): JsonValue {
  // 1: contexts of types are looked up in the context before they apply
  const typeScopedContext = activeContext

  // 2: scalars are already compact
  if (!isArray(element) && !isObject(element)) return element

  const propertyDefinition = activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty)

  // 3: arrays
  if (isArray(element)) {
    const result: JsonArray = []
    for (const item of element) {
      const compactedItem = compact(activeContext, activeProperty, item, options)
      if (compactedItem === null) continue
      // preserved framing defaults hold an array of their own
      if (isObject(item) && "@preserve" in item && isArray(compactedItem)) {
        result.push(...compactedItem)
      } else {
        result.push(compactedItem)
      }
    }
    const container = propertyDefinition?.["@container"] ?? []
    if (
      result.length !== 1 ||
      !options.compactArrays ||
      activeProperty === "@graph" ||
      activeProperty === "@set" ||
      container.includes("@list") ||
      container.includes("@set")
    ) {
      return result
    }
    return result[0]
  }

  // framing defaults
  if ("@preserve" in element) {
    return compact(activeContext, activeProperty, element["@preserve"], options)
  }

  // 5: a non-propagated context does not apply to new node objects
  if (activeContext.previousContext !== null && !isValueObject(element) && !isSubjectRef(element)) {
    activeContext = activeContext.previousContext
  }

  // 6: property-scoped context
  const propertyScopedContext = propertyDefinition?.["@context"]
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

  // 7: value objects and node references
  const definition = activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty)
  if (isValueObject(element) || isNodeReference(element, definition?.["@container"] ?? [])) {
    if (definition?.["@type"] === "@json") return element["@value"]
    return compactValue(activeContext, activeProperty, element, options)
  }

  // 8: lists in list containers
  const container = (activeProperty === null ? undefined : activeContext.termDefinitions.get(activeProperty))
    ?.["@container"] ?? []
  if (isListObject(element) && container.includes("@list")) {
    return compact(activeContext, activeProperty, element["@list"], options)
  }

  // 9 & 10
  const insideReverse = activeProperty === "@reverse"
  const result: JsonObject = {}

  // 11: type-scoped contexts
  if ("@type" in element) {
    const compactedTypes = asArray(element["@type"])
      .filter(isString)
      .map((type) => compactIri(typeScopedContext, type, null, true))
      .filter(isString)
      .sort(compareCodeUnits)
    for (const term of compactedTypes) {
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

  const alias = (keyword: string) => compactIri(activeContext, keyword, null, true) ?? keyword
  const is11 = checkVersion(activeContext.processingMode, 1.1)

  // 12: each entry
  for (const expandedProperty of options.ordered ? sortedKeys(element) : Object.keys(element)) {
    const expandedValue = element[expandedProperty]

    // 12.1: `@id`
    if (expandedProperty === "@id") {
      result[alias("@id")] = isString(expandedValue)
        ? compactIri(activeContext, expandedValue, null, false, false, options.compactToRelative)
        : expandedValue
      continue
    }

    // 12.2: `@type`
    if (expandedProperty === "@type") {
      const types = asArray(expandedValue).map((type) =>
        isString(type) ? compactIri(typeScopedContext, type, null, true) : type
      )
      const typeAlias = alias("@type")
      const typeContainer = activeContext.termDefinitions.get(typeAlias)?.["@container"] ?? []
      const typeAsArray = (is11 && typeContainer.includes("@set")) || !options.compactArrays
      addValue(result, typeAlias, isString(expandedValue) ? types[0] : types, { propertyIsArray: typeAsArray })
      continue
    }

    // 12.3: `@reverse`
    if (expandedProperty === "@reverse") {
      const compactedValue = compact(activeContext, "@reverse", expandedValue, options)
      if (isObject(compactedValue)) {
        for (const property of Object.keys(compactedValue)) {
          const definition = activeContext.termDefinitions.get(property)
          if (definition?.["@reverse"]) {
            const propertyAsArray = definition["@container"].includes("@set") || !options.compactArrays
            addValue(result, property, compactedValue[property], { propertyIsArray: propertyAsArray })
            delete compactedValue[property]
          }
        }
        if (Object.keys(compactedValue).length > 0) {
          result[alias("@reverse")] = compactedValue
        }
      }
      continue
    }

    // 12.5: the index is the key of an index map
    if (expandedProperty === "@index" && container.includes("@index")) continue

    // 12.6: value keywords
    if (["@direction", "@index", "@language", "@value"].includes(expandedProperty)) {
      result[alias(expandedProperty)] = expandedValue
      continue
    }

    // 12.7: an empty array
    if (isArray(expandedValue) && expandedValue.length === 0) {
      const itemActiveProperty = compactIri(activeContext, expandedProperty, expandedValue, true, insideReverse)
      if (itemActiveProperty !== null) {
        addValue(nestResultFor(activeContext, result, itemActiveProperty), itemActiveProperty, expandedValue, {
          propertyIsArray: true,
        })
      }
      continue
    }

    // 12.8: each item
    for (const expandedItem of asArray(expandedValue)) {
      compactItem(activeContext, expandedProperty, expandedItem, result, insideReverse, options)
    }
  }

  return result
}

// arrays holding several JSON literals, as opposed to one JSON literal that is an array
const jsonValueLists = new WeakSet<JsonArray>()

function compactItem(
  activeContext: ActiveContext,
  expandedProperty: string,
  expandedItem: JsonValue,
  result: JsonObject,
  insideReverse: boolean,
  options: ProcessingOptions,
): void {
  const alias = (keyword: string) => compactIri(activeContext, keyword, null, true) ?? keyword

  // 12.8.1 & 12.8.2: the term for the item, and where it nests
  const itemActiveProperty = compactIri(activeContext, expandedProperty, expandedItem, true, insideReverse)
  if (itemActiveProperty === null) return
  const nestResult = nestResultFor(activeContext, result, itemActiveProperty)

  // 12.8.3 & 12.8.4
  const container = activeContext.termDefinitions.get(itemActiveProperty)?.["@container"] ?? []
  const asArrayFlag = container.includes("@set") || itemActiveProperty === "@graph" ||
    itemActiveProperty === "@list" || !options.compactArrays

  // 12.8.5 & 12.8.6: compact the item's content
  let inner: JsonValue = expandedItem
  if (isListObject(expandedItem)) inner = expandedItem["@list"]
  else if (isGraphObject(expandedItem)) inner = expandedItem["@graph"]
  let compactedItem = compact(activeContext, itemActiveProperty, inner, options)

  // 12.8.7: lists
  if (isListObject(expandedItem)) {
    compactedItem = asArray(compactedItem)
    if (!container.includes("@list")) {
      const wrapped: JsonObject = { [alias("@list")]: compactedItem }
      if ("@index" in expandedItem) wrapped[alias("@index")] = expandedItem["@index"]
      addValue(nestResult, itemActiveProperty, wrapped, { propertyIsArray: asArrayFlag })
    } else {
      nestResult[itemActiveProperty] = compactedItem
    }
    return
  }

  // 12.8.8: graph objects
  if (isGraphObject(expandedItem)) {
    if (container.includes("@graph") && container.includes("@id")) {
      const mapObject = mapObjectFor(nestResult, itemActiveProperty)
      const id = expandedItem["@id"]
      const mapKey = isString(id)
        ? compactIri(activeContext, id, null, false, false, options.compactToRelative)
        : alias("@none")
      addValue(mapObject, mapKey ?? alias("@none"), compactedItem, { propertyIsArray: asArrayFlag })
    } else if (container.includes("@graph") && container.includes("@index") && isSimpleGraph(expandedItem)) {
      const mapObject = mapObjectFor(nestResult, itemActiveProperty)
      const index = expandedItem["@index"]
      addValue(mapObject, isString(index) ? index : alias("@none"), compactedItem, { propertyIsArray: asArrayFlag })
    } else if (container.includes("@graph") && isSimpleGraph(expandedItem)) {
      if (isArray(compactedItem) && compactedItem.length > 1) {
        compactedItem = { [alias("@included")]: compactedItem }
      }
      addValue(nestResult, itemActiveProperty, compactedItem, { propertyIsArray: asArrayFlag })
    } else {
      if (isArray(compactedItem) && compactedItem.length === 1 && options.compactArrays) {
        compactedItem = compactedItem[0]
      }
      const wrapped: JsonObject = { [alias("@graph")]: compactedItem }
      const id = expandedItem["@id"]
      if (isString(id)) {
        wrapped[alias("@id")] = compactIri(activeContext, id, null, false, false, options.compactToRelative)
      }
      if ("@index" in expandedItem) wrapped[alias("@index")] = expandedItem["@index"]
      addValue(nestResult, itemActiveProperty, wrapped, { propertyIsArray: asArrayFlag })
    }
    return
  }

  // 12.8.9: language, index, id and type maps
  if (
    (container.includes("@language") || container.includes("@index") || container.includes("@id") ||
      container.includes("@type")) && !container.includes("@graph")
  ) {
    const mapObject = mapObjectFor(nestResult, itemActiveProperty)
    let mapKey: string | null = null

    if (container.includes("@language")) {
      if (isValueObject(expandedItem) && isObject(compactedItem)) {
        compactedItem = expandedItem["@value"]
      }
      const language = isObject(expandedItem) ? expandedItem["@language"] : undefined
      if (isString(language)) mapKey = language
    } else if (container.includes("@index")) {
      const indexKey = activeContext.termDefinitions.get(itemActiveProperty)?.["@index"] ?? "@index"
      if (indexKey === "@index") {
        const index = isObject(expandedItem) ? expandedItem["@index"] : undefined
        if (isString(index)) mapKey = index
      } else if (isObject(compactedItem)) {
        // property-valued index: the first value of the property is the key
        const containerKey = compactIri(
          activeContext,
          expandIri(activeContext, indexKey, false, true) ?? indexKey,
          null,
          true,
        ) ?? indexKey
        const [first, ...others] = asArray(compactedItem[containerKey] ?? [])
        if (isString(first)) {
          mapKey = first
          if (others.length === 0) delete compactedItem[containerKey]
          else compactedItem[containerKey] = others.length === 1 ? others[0] : others
        }
      }
    } else if (container.includes("@id")) {
      if (isObject(compactedItem)) {
        const idKey = alias("@id")
        const id = compactedItem[idKey]
        if (isString(id)) mapKey = id
        delete compactedItem[idKey]
      }
    } else if (isObject(compactedItem)) {
      // type map: the first type is the key
      const typeKey = alias("@type")
      const [first, ...others] = asArray(compactedItem[typeKey] ?? [])
      if (isString(first)) mapKey = first
      if (others.length === 0) delete compactedItem[typeKey]
      else compactedItem[typeKey] = others.length === 1 ? others[0] : others

      // a node left with only its identifier compacts as a reference
      const id = isObject(expandedItem) ? expandedItem["@id"] : undefined
      if (Object.keys(compactedItem).length === 1 && isString(id)) {
        compactedItem = compact(activeContext, itemActiveProperty, { "@id": id }, options)
      }
    }

    addValue(mapObject, mapKey ?? alias("@none"), compactedItem, { propertyIsArray: asArrayFlag })
    return
  }

  // a JSON array is one value
  if (isValueObject(expandedItem) && expandedItem["@type"] === "@json" && isArray(compactedItem)) {
    const existing = nestResult[itemActiveProperty]
    if (existing === undefined && !asArrayFlag) {
      nestResult[itemActiveProperty] = compactedItem
    } else {
      let values: JsonArray = []
      if (isArray(existing) && jsonValueLists.has(existing)) values = existing
      else if (existing !== undefined) values = [existing]
      values.push(compactedItem)
      jsonValueLists.add(values)
      nestResult[itemActiveProperty] = values
    }
    return
  }

  // 12.8.10: anything else
  addValue(nestResult, itemActiveProperty, compactedItem, { propertyIsArray: asArrayFlag })
}

function mapObjectFor(parent: JsonObject, property: string): JsonObject {
  const existing = parent[property]
  if (isObject(existing)) return existing
  const created: JsonObject = {}
  parent[property] = created
  return created
}
