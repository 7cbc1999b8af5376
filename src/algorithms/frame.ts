import { JsonLdError } from "../error.ts"
import type { ProcessingOptions } from "../options.ts"
import type { ActiveContext } from "../types/context.ts"
import type { JsonArray, JsonObject, JsonValue, NodeMap } from "../types/document.ts"
import { type Embed, isKeyword } from "../types/keyword.ts"
import {
  isAbsoluteIri,
  isArray,
  isBlankNodeIdentifier,
  isEmptyObject,
  isListObject,
  isObject,
  isString,
  isSubject,
  isSubjectRef,
  isValueObject,
} from "../utils/type.ts"
import { addValue, asArray, clone, compareCodeUnits, getValues, sortedKeys } from "../utils/value.ts"
import { expandIri } from "./expand.ts"
import { createNodeMap, IdentifierIssuer, mergeNodeMapGraphs } from "./flatten.ts"

export interface FrameFlags {
  embed: Embed
  explicit: boolean
  requireAll: boolean
}

interface StackEntry {
  subject: JsonObject
  graph: string
}

/**
 * The state of one framing run. `graph` and `embedded` change as the frame descends; everything else is shared by the
 * whole run.
 */
export interface FramingState {
  readonly options: ProcessingOptions
  readonly graphMap: NodeMap
  /** The nodes of the graph being framed: the default graph, or the merge of all graphs. */
  readonly subjects: Record<string, JsonObject>
  readonly graph: string
  readonly embedded: boolean
  /** The nodes being embedded, outermost first, to refuse embedding a node inside itself. */
  readonly subjectStack: Array<StackEntry>
  /** The nodes embedded so far for the current top-level match, per graph. */
  readonly uniqueEmbeds: Map<string, Set<string>>
  /** How often each blank node identifier occurs in the output. */
  readonly bnodeCounts: Map<string, number>
}

type FrameParent = JsonObject | JsonArray

function addFrameOutput(parent: FrameParent, property: string | null, output: JsonValue): void {
  if (isArray(parent)) {
    parent.push(output)
  } else if (property !== null) {
    addValue(parent, property, output, { propertyIsArray: true })
  }
}

function countBlankNode(state: FramingState, id: string): void {
  state.bnodeCounts.set(id, (state.bnodeCounts.get(id) ?? 0) + 1)
}

/**
 * Check that a frame is a single map whose `@id` and `@type` constraints are IRIs or wildcards.
 */
export function validateFrame(frame: JsonValue): JsonObject {
  const frames = asArray(frame)
  const first = frames[0]
  if (frames.length !== 1 || !isObject(first)) {
    throw new JsonLdError("invalid frame", "a frame must be a single map", { frame })
  }

  for (const id of asArray(first["@id"] ?? [])) {
    if (!(isObject(id) || (isString(id) && isAbsoluteIri(id))) || isBlankNodeIdentifier(id)) {
      throw new JsonLdError("invalid frame", "@id in a frame must be an IRI or a wildcard", { id })
    }
  }

  for (const type of asArray(first["@type"] ?? [])) {
    if (!(isObject(type) || (isString(type) && (isAbsoluteIri(type) || type === "@json"))) ||
      isBlankNodeIdentifier(type)) {
      throw new JsonLdError("invalid frame", "@type in a frame must be an IRI or a wildcard", { type })
    }
  }

  return first
}

function flagValue(frame: JsonObject, keyword: string): JsonValue | undefined {
  if (!(keyword in frame)) return undefined
  const first = asArray(frame[keyword])[0]
  return isValueObject(first) ? first["@value"] : first
}

/**
 * The value of a framing flag: the frame's own keyword if it has one, the option otherwise.
 */
export function getFrameFlag(frame: JsonObject, options: ProcessingOptions, name: "embed"): Embed
export function getFrameFlag(
  frame: JsonObject,
  options: ProcessingOptions,
  name: "explicit" | "requireAll" | "omitDefault",
): boolean
export function getFrameFlag(
  frame: JsonObject,
  options: ProcessingOptions,
  name: "embed" | "explicit" | "requireAll" | "omitDefault",
): Embed | boolean {
  const value = flagValue(frame, `@${name}`)

  if (name === "embed") {
    if (value === undefined) return options.embed
    if (value === true) return "@once"
    if (value === false) return "@never"
    if (value === "@always" || value === "@once" || value === "@never") return value
    throw new JsonLdError("invalid @embed value", `@embed must be @always, @once or @never`, { value })
  }

  if (value === undefined) return options[name]
  return value === true || value === "true"
}

/**
 * The frame used for values the frame says nothing about: it matches anything, with the current flags.
 */
export function createImplicitFrame(flags: FrameFlags): JsonArray {
  return [{ "@embed": [flags.embed], "@explicit": [flags.explicit], "@requireAll": [flags.requireAll] }]
}

/**
 * Check a value object against a value pattern. Each of `@value`, `@type` and `@language` in the pattern lists the
 * accepted values; `{}` accepts any value that is present, and leaving it out accepts only values without it.
 */
export function valueMatch(pattern: JsonValue | undefined, value: JsonObject): boolean {
  if (!isObject(pattern)) return true

  const v1 = value["@value"]
  const t1 = value["@type"]
  const l1 = value["@language"]
  const v2 = "@value" in pattern ? asArray(pattern["@value"]) : []
  const t2 = "@type" in pattern ? asArray(pattern["@type"]) : []
  const l2 = "@language" in pattern ? asArray(pattern["@language"]) : []

  if (v2.length === 0 && t2.length === 0 && l2.length === 0) return true

  if (!(v2.includes(v1) || isEmptyObject(v2[0]))) return false
  if (!((t1 === undefined && t2.length === 0) || t2.includes(t1) || (t1 !== undefined && isEmptyObject(t2[0])))) {
    return false
  }
  const language = isString(l1) ? l1.toLowerCase() : l1
  const languages = l2.map((item) => (isString(item) ? item.toLowerCase() : item))
  if (
    !((language === undefined && languages.length === 0) || languages.includes(language) ||
      (language !== undefined && isEmptyObject(languages[0])))
  ) {
    return false
  }

  return true
}

/**
 * Check the node a reference points at against a node pattern.
 */
function nodeMatch(state: FramingState, pattern: JsonObject, value: JsonValue, flags: FrameFlags): boolean {
  if (!isObject(value)) return false
  const id = value["@id"]
  if (!isString(id)) return false
  const node = state.subjects[id]
  return node !== undefined && filterSubject(state, node, pattern, flags)
}

/**
 * Check whether a node matches a frame: by `@id`, by `@type`, or by its properties (duck typing). A frame without
 * any of those matches every node.
 */
export function filterSubject(state: FramingState, subject: JsonObject, frame: JsonObject, flags: FrameFlags): boolean {
  let wildcard = true
  let matchesSome = false

  for (const key of Object.keys(frame)) {
    let matchThis = false
    const nodeValues = getValues(subject, key)
    const frameValues = getValues(frame, key)
    const isEmpty = frameValues.length === 0

    if (key === "@id") {
      // any listed identifier, or the wildcard
      const first = frameValues[0]
      matchThis = first === undefined || isEmptyObject(first) || frameValues.includes(nodeValues[0])
      if (!flags.requireAll) return matchThis
    } else if (key === "@type") {
      wildcard = false
      if (isEmpty) {
        // match none: only nodes without types
        if (nodeValues.length > 0) return false
        matchThis = true
      } else if (frameValues.length === 1 && isEmptyObject(frameValues[0])) {
        // wildcard: any node with a type
        matchThis = nodeValues.length > 0
      } else {
        for (const type of frameValues) {
          if (isObject(type) && "@default" in type) {
            matchThis = true
          } else {
            matchThis ||= nodeValues.includes(type)
          }
        }
        if (!flags.requireAll) return matchThis
      }
    } else if (isKeyword(key)) {
      continue
    } else {
      const propertyFrame = frameValues[0]
      let hasDefault = false
      if (propertyFrame !== undefined) {
        validateFrame([propertyFrame])
        hasDefault = isObject(propertyFrame) && "@default" in propertyFrame
      }

      wildcard = false

      // a default stands in for a missing property
      if (nodeValues.length === 0 && hasDefault) continue

      // match none: only nodes without the property
      if (nodeValues.length > 0 && isEmpty) return false

      if (propertyFrame === undefined || !isObject(propertyFrame)) {
        matchThis = true
      } else if (isListObject(propertyFrame)) {
        const listPattern = asArray(propertyFrame["@list"])[0]
        const nodeList = nodeValues[0]
        if (isListObject(nodeList)) {
          const items = asArray(nodeList["@list"])
          if (isValueObject(listPattern)) {
            matchThis = items.some((item) => isObject(item) && valueMatch(listPattern, item))
          } else if (isSubject(listPattern) || isSubjectRef(listPattern)) {
            matchThis = items.some((item) => nodeMatch(state, listPattern, item, flags))
          }
        }
      } else if (isValueObject(propertyFrame)) {
        matchThis = nodeValues.some((value) => isObject(value) && valueMatch(propertyFrame, value))
      } else if (isSubjectRef(propertyFrame)) {
        matchThis = nodeValues.some((value) => nodeMatch(state, propertyFrame, value, flags))
      } else {
        matchThis = nodeValues.length > 0
      }
    }

    // every constraint must hold with `@requireAll`
    if (!matchThis && flags.requireAll) return false

    matchesSome ||= matchThis
  }

  return wildcard || matchesSome
}

function createsCircularReference(subject: JsonObject, graph: string, subjectStack: Array<StackEntry>): boolean {
  return subjectStack.some((entry) => entry.graph === graph && entry.subject["@id"] === subject["@id"])
}

/**
 * Frame the given subjects into `parent`, recursing into the properties of each match.
 *
 * @param state The framing state.
 * @param subjects The identifiers of the candidate nodes, in order.
 * @param frame The frame, an array holding a single map.
 * @param parent The output to add matches to.
 * @param property The property of `parent` matches are added under, or `null` at the top level.
 */
export function matchFrame(
  state: FramingState,
  subjects: Array<string>,
  frame: JsonValue,
  parent: FrameParent,
  property: string | null,
): void {
  const currentFrame = validateFrame(frame)
  const options = state.options
  const flags: FrameFlags = {
    embed: getFrameFlag(currentFrame, options, "embed"),
    explicit: getFrameFlag(currentFrame, options, "explicit"),
    requireAll: getFrameFlag(currentFrame, options, "requireAll"),
  }

  const graph = state.graphMap[state.graph] ?? {}
  const matches = subjects.filter((id) => {
    const subject = graph[id]
    return subject !== undefined && filterSubject(state, subject, currentFrame, flags)
  })

  for (const id of [...matches].sort(compareCodeUnits)) {
    const subject = graph[id]

    // each top-level match is embedded on its own
    if (property === null) state.uniqueEmbeds.clear()
    let embeds = state.uniqueEmbeds.get(state.graph)
    if (embeds === undefined) {
      embeds = new Set()
      state.uniqueEmbeds.set(state.graph, embeds)
    }

    // a node embedded elsewhere is not repeated at the top of a graph
    if (!state.embedded && embeds.has(id)) continue

    const output: JsonObject = { "@id": id }
    if (isBlankNodeIdentifier(id)) countBlankNode(state, id)

    // references only: `@never`, cycles, and repeated `@once` embeds
    if (
      state.embedded &&
      (flags.embed === "@never" || createsCircularReference(subject, state.graph, state.subjectStack) ||
        (flags.embed === "@once" && embeds.has(id)))
    ) {
      addFrameOutput(parent, property, output)
      continue
    }

    embeds.add(id)
    state.subjectStack.push({ subject, graph: state.graph })

    // the node names a graph
    if (id in state.graphMap) {
      let recurse: boolean
      let subframe: JsonValue
      if (!("@graph" in currentFrame)) {
        recurse = state.graph !== "@merged"
        subframe = {}
      } else {
        const graphFrame = asArray(currentFrame["@graph"])[0]
        subframe = isObject(graphFrame) ? graphFrame : {}
        recurse = !(id === "@merged" || id === "@default")
      }
      if (recurse) {
        matchFrame(
          { ...state, graph: id, embedded: false },
          Object.keys(state.graphMap[id]).sort(compareCodeUnits),
          [subframe],
          output,
          "@graph",
        )
      }
    }

    // included nodes
    if ("@included" in currentFrame) {
      matchFrame({ ...state, embedded: false }, subjects, currentFrame["@included"], output, "@included")
    }

    // the node's properties
    for (const prop of sortedKeys(subject)) {
      if (isKeyword(prop)) {
        output[prop] = clone(subject[prop])
        if (prop === "@type") {
          for (const type of asArray(subject[prop])) {
            if (isBlankNodeIdentifier(type)) countBlankNode(state, type)
          }
        }
        continue
      }

      if (flags.explicit && !(prop in currentFrame)) continue

      const propertyFrame = prop in currentFrame ? currentFrame[prop] : createImplicitFrame(flags)
      for (const object of asArray(subject[prop])) {
        if (isListObject(object)) {
          // lists are framed item by item
          const listPattern = asArray(propertyFrame)[0]
          const listFrame = isObject(listPattern) && "@list" in listPattern
            ? listPattern["@list"]
            : createImplicitFrame(flags)
          const list: JsonObject = { "@list": [] }
          addFrameOutput(output, prop, list)
          for (const item of asArray(object["@list"])) {
            const itemId = isSubjectRef(item) ? item["@id"] : undefined
            if (isString(itemId)) {
              matchFrame({ ...state, embedded: true }, [itemId], listFrame, list, "@list")
            } else {
              addFrameOutput(list, "@list", clone(item))
            }
          }
        } else if (isSubjectRef(object)) {
          const objectId = object["@id"]
          if (isString(objectId)) {
            matchFrame({ ...state, embedded: true }, [objectId], propertyFrame, output, prop)
          }
        } else if (isObject(object) && valueMatch(asArray(propertyFrame)[0], object)) {
          addFrameOutput(output, prop, clone(object))
        }
      }
    }

    // defaults for properties the frame names and the node lacks
    for (const prop of sortedKeys(currentFrame)) {
      if (prop === "@type") {
        const typeFrame = asArray(currentFrame[prop])[0]
        if (!isObject(typeFrame) || !("@default" in typeFrame)) continue
      } else if (isKeyword(prop)) {
        continue
      }

      const next = asArray(currentFrame[prop])[0]
      const nextFrame = isObject(next) ? next : {}
      if (!getFrameFlag(nextFrame, options, "omitDefault") && !(prop in output)) {
        const preserve = "@default" in nextFrame ? clone(nextFrame["@default"]) : "@null"
        output[prop] = [{ "@preserve": asArray(preserve) }]
      }
    }

    // reverse properties embed the nodes pointing at this one
    const reverseFrame = currentFrame["@reverse"]
    if (isObject(reverseFrame)) {
      for (const reverseProp of sortedKeys(reverseFrame)) {
        const subframe = reverseFrame[reverseProp]
        for (const candidate of Object.keys(state.subjects)) {
          const referencing = getValues(state.subjects[candidate], reverseProp)
            .some((value) => isObject(value) && value["@id"] === id)
          if (!referencing) continue

          const reverseOutput = isObject(output["@reverse"]) ? output["@reverse"] : {}
          output["@reverse"] = reverseOutput
          addValue(reverseOutput, reverseProp, [], { propertyIsArray: true })
          const target = reverseOutput[reverseProp]
          if (isArray(target)) {
            matchFrame({ ...state, embedded: true }, [candidate], subframe, target, property)
          }
        }
      }
    }

    addFrameOutput(parent, property, output)
    state.subjectStack.pop()
  }
}

/**
 * Drop the identifiers of blank nodes that occur only once in the output: nothing refers to them.
 */
function pruneBlankNodes(element: JsonValue, prune: Set<string>): JsonValue {
  if (isArray(element)) {
    return element.map((item) => pruneBlankNodes(item, prune))
  }
  if (!isObject(element) || isValueObject(element)) return element

  const result: JsonObject = {}
  for (const [key, value] of Object.entries(element)) {
    if (key === "@id" && isString(value) && prune.has(value)) continue
    result[key] = pruneBlankNodes(value, prune)
  }
  return result
}

/**
 * Frame an expanded document with an expanded frame. The document is flattened into a node map first; the frame is
 * matched against the default graph, or against the merge of all graphs when `merged` is set.
 *
 * @param input The expanded document.
 * @param frame The expanded frame.
 * @param options The options of the running processor call.
 * @param merged Match against the merge of all graphs.
 *
 * @returns The framed nodes, in expanded form, with defaults wrapped in `@preserve`.
 */
export function frameMergedOrDefault(
  input: JsonValue,
  frame: JsonValue,
  options: ProcessingOptions,
  merged: boolean,
): JsonArray {
  const graphMap: NodeMap = { "@default": {} }
  createNodeMap(clone(input), graphMap, "@default", new IdentifierIssuer("_:b"))

  let graph = "@default"
  if (merged) {
    graphMap["@merged"] = mergeNodeMapGraphs(graphMap)
    graph = "@merged"
  }

  const state: FramingState = {
    options,
    graphMap,
    subjects: graphMap[graph],
    graph,
    embedded: false,
    subjectStack: [],
    uniqueEmbeds: new Map(),
    bnodeCounts: new Map(),
  }

  const framed: JsonArray = []
  matchFrame(state, Object.keys(state.subjects).sort(compareCodeUnits), frame, framed, null)

  if (!options.pruneBlankNodeIdentifiers) return framed

  const prune = new Set([...state.bnodeCounts].filter(([, count]) => count === 1).map(([id]) => id))
  return asArray(pruneBlankNodes(framed, prune))
}

/**
 * Replace the `@null` placeholders of framing defaults by `null`, dropping them from arrays. Contexts and JSON literals
 * are left as they are.
 *
 * @param element The compacted framing result.
 * @param activeContext The context the result was compacted with.
 */
export function cleanupNull(element: JsonValue, activeContext: ActiveContext): JsonValue {
  if (element === "@null") return null
  if (isArray(element)) {
    return element.map((item) => cleanupNull(item, activeContext)).filter((item) => item !== null)
  }
  if (!isObject(element)) return element

  const keywords = Object.keys(element).map((key) => expandIri(activeContext, key, false, true))
  if (keywords.includes("@value")) return element

  const result: JsonObject = {}
  for (const [key, value] of Object.entries(element)) {
    if (expandIri(activeContext, key, false, true) === "@context") {
      result[key] = value
    } else if (activeContext.termDefinitions.get(key)?.["@type"] === "@json") {
      result[key] = value === "@null" ? null : value
    } else {
      result[key] = cleanupNull(value, activeContext)
    }
  }
  return result
}
