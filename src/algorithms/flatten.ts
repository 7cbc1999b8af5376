import { JsonLdError } from "../error.ts"
import type { JsonArray, JsonObject, JsonValue, NodeMap } from "../types/document.ts"
import { isKeyword } from "../types/keyword.ts"
import {
  isArray,
  isBlankNode,
  isBlankNodeIdentifier,
  isListObject,
  isObject,
  isString,
  isSubject,
  isSubjectRef,
  isValueObject,
} from "../utils/type.ts"
import { addValue, asArray, clone, compareCodeUnits, deepEqual, sortedKeys } from "../utils/value.ts"

/**
 * Issues blank node identifiers: a prefix followed by a counter. Existing identifiers are relabelled consistently,
 * in the order they are first seen.
 */
export class IdentifierIssuer {
  readonly prefix: string
  private counter: number
  private readonly existing: Map<string, string>

  constructor(prefix: string, existing: Map<string, string> = new Map(), counter: number = 0) {
    this.prefix = prefix
    this.existing = existing
    this.counter = counter
  }

  /**
   * The identifier issued for `old`, issuing a new one if there is none yet. Without `old`, a fresh identifier is
   * issued every time.
   */
  getId(old?: string | null): string {
    if (old !== undefined && old !== null) {
      const existing = this.existing.get(old)
      if (existing !== undefined) return existing
    }

    const id = `${this.prefix}${this.counter}`
    this.counter += 1
    if (old !== undefined && old !== null) {
      this.existing.set(old, id)
    }
    return id
  }

  hasId(old: string): boolean {
    return this.existing.has(old)
  }

  /**
   * The identifiers relabelled so far, in the order they were issued.
   */
  getOldIds(): Array<string> {
    return [...this.existing.keys()]
  }

  clone(): IdentifierIssuer {
    return new IdentifierIssuer(this.prefix, new Map(this.existing), this.counter)
  }
}

function relabelType(type: JsonValue, issuer: IdentifierIssuer): JsonValue {
  return isBlankNodeIdentifier(type) ? issuer.getId(type) : type
}

/**
 * This algorithm creates a map `nodeMap` holding an indexed representation of the graphs and nodes represented in the
 * passed expanded document. All nodes that are not uniquely identified by an IRI get assigned a (new) blank node
 * identifier. The resulting `nodeMap` will have an map entry for every graph in the document whose value is another
 * object with an entry for every node represented in the document. The default graph is stored under the `@default`
 * entry, all other graphs are stored under their graph name.
 *
 * The algorithm recursively runs over an expanded JSON-LD document to collect all entries of a node in a single map.
 * If a entry's value is a node object, it is replaced by a node object consisting of only an `@id` entry. If a node
 * object has no `@id` entry or it is identified by a blank node identifier, a new blank node identifier is generated.
 * This relabeling of blank node identifiers is also done for properties and values of `@type`.
 *
 * The input is not changed.
 *
 * @param element An expanded JSON-LD document.
 * @param nodeMap The node map to fill.
 * @param activeGraph The name of the currently active graph.
 * @param issuer The issuer relabelling blank nodes.
 * @param activeSubject The identifier of the node `element` stands for, when the caller already issued it.
 * @param list The list to append to, while inside a list object.
 */
export function createNodeMap(
  element: JsonValue,
  nodeMap: NodeMap,
  activeGraph: string,
  issuer: IdentifierIssuer,
  activeSubject?: string,
  list?: JsonArray,
): void {
  // 1: arrays
  if (isArray(element)) {
    for (const item of element) {
      createNodeMap(item, nodeMap, activeGraph, issuer, undefined, list)
    }
    return
  }

  // scalars only occur inside lists
  if (!isObject(element)) {
    list?.push(element)
    return
  }

  // 2 & 3: value objects
  if (isValueObject(element)) {
    const value = "@type" in element ? { ...element, "@type": relabelType(element["@type"], issuer) } : element
    list?.push(value)
    return
  }

  // 4: lists nested in lists
  if (list !== undefined && isListObject(element)) {
    const nested: JsonArray = []
    createNodeMap(element["@list"], nodeMap, activeGraph, issuer, undefined, nested)
    list.push({ "@list": nested })
    return
  }

  // 5: a node object; its types are labelled before anything it refers to
  for (const type of asArray(element["@type"] ?? [])) {
    if (isBlankNodeIdentifier(type)) issuer.getId(type)
  }

  const rawId = element["@id"]
  const id = activeSubject ?? (isBlankNode(element) ? issuer.getId(isString(rawId) ? rawId : null) : String(rawId))
  list?.push({ "@id": id })

  const graph = nodeMap[activeGraph] ??= {}
  const node = graph[id] ??= { "@id": id }

  for (const property of sortedKeys(element)) {
    const value = element[property]

    // 5.1: the identifier is already set
    if (property === "@id") continue

    // 5.2: reverse properties point at this node
    if (property === "@reverse") {
      const reference: JsonObject = { "@id": id }
      const reverseMap = isObject(value) ? value : {}
      for (const reverseProperty of Object.keys(reverseMap)) {
        for (const item of asArray(reverseMap[reverseProperty])) {
          if (!isObject(item)) continue
          const itemId = item["@id"]
          const itemName = isBlankNode(item) ? issuer.getId(isString(itemId) ? itemId : null) : String(itemId)
          createNodeMap(item, nodeMap, activeGraph, issuer, itemName)
          addValue(graph[itemName], reverseProperty, reference, { propertyIsArray: true, allowDuplicate: false })
        }
      }
      continue
    }

    // 5.3: named graphs
    if (property === "@graph") {
      nodeMap[id] ??= {}
      createNodeMap(value, nodeMap, id, issuer)
      continue
    }

    // 5.4: included nodes
    if (property === "@included") {
      createNodeMap(value, nodeMap, activeGraph, issuer)
      continue
    }

    // 5.5: other keywords are copied
    if (property !== "@type" && isKeyword(property)) {
      if (property === "@index" && property in node && !deepEqual(node[property], value)) {
        throw new JsonLdError("conflicting indexes", `node ${id} has two different indexes`, { id })
      }
      node[property] = value
      continue
    }

    // 5.6: properties and types
    const name = isBlankNodeIdentifier(property) ? issuer.getId(property) : property
    const objects = asArray(value)
    if (objects.length === 0) {
      addValue(node, name, [], { propertyIsArray: true })
      continue
    }

    for (const object of objects) {
      if (property === "@type") {
        addValue(node, name, relabelType(object, issuer), { propertyIsArray: true, allowDuplicate: false })
      } else if (isSubject(object) || isSubjectRef(object)) {
        const objectId = object["@id"]
        if ("@id" in object && (objectId === null || objectId === "")) continue
        const reference = isBlankNode(object) ? issuer.getId(isString(objectId) ? objectId : null) : String(objectId)
        addValue(node, name, { "@id": reference }, { propertyIsArray: true, allowDuplicate: false })
        createNodeMap(object, nodeMap, activeGraph, issuer, reference)
      } else if (isValueObject(object)) {
        const relabelled = "@type" in object ? { ...object, "@type": relabelType(object["@type"], issuer) } : object
        addValue(node, name, relabelled, { propertyIsArray: true, allowDuplicate: false })
      } else if (isListObject(object)) {
        const items: JsonArray = []
        createNodeMap(object["@list"], nodeMap, activeGraph, issuer, undefined, items)
        addValue(node, name, { "@list": items }, { propertyIsArray: true, allowDuplicate: false })
      }
    }
  }
}

/**
 * Merge the nodes of every graph of a node map into one map of nodes, as if all the graphs were the default graph.
 * Framing matches against this merged graph.
 */
export function mergeNodeMapGraphs(nodeMap: NodeMap): Record<string, JsonObject> {
  const merged: Record<string, JsonObject> = {}

  for (const graphName of Object.keys(nodeMap).sort(compareCodeUnits)) {
    const graph = nodeMap[graphName]
    for (const id of Object.keys(graph).sort(compareCodeUnits)) {
      const node = graph[id]
      const mergedNode = merged[id] ??= { "@id": id }
      for (const property of sortedKeys(node)) {
        if (isKeyword(property) && property !== "@type") {
          mergedNode[property] = clone(node[property])
        } else {
          for (const value of asArray(node[property])) {
            addValue(mergedNode, property, clone(value), { propertyIsArray: true, allowDuplicate: false })
          }
        }
      }
    }
  }

  return merged
}

/**
 * Fold the named graphs of a node map into the default graph: each graph becomes the `@graph` entry of the node
 * named like it, which is created when the default graph has none.
 *
 * @returns The default graph, with its named graphs embedded.
 */
export function mergeNodeMaps(nodeMap: NodeMap): Record<string, JsonObject> {
  const defaultGraph = nodeMap["@default"] ?? {}

  for (const graphName of Object.keys(nodeMap).sort(compareCodeUnits)) {
    if (graphName === "@default") continue
    const entry = defaultGraph[graphName] ??= { "@id": graphName }
    entry["@graph"] = nodesOf(nodeMap[graphName])
  }

  return defaultGraph
}

/**
 * The nodes of a graph ordered by identifier, leaving out nodes that consist of an `@id` only.
 */
function nodesOf(graph: Record<string, JsonObject>): JsonArray {
  return Object.keys(graph)
    .sort(compareCodeUnits)
    .map((id) => graph[id])
    .filter((node) => !isSubjectRef(node))
}

/**
 * This algorithm flattens an expanded JSON-LD document by collecting all properties of a node in a single map and
 * labeling all blank nodes with blank node identifiers. This resulting uniform shape of the document, may drastically
 * simplify the code required to process JSON-LD data in certain applications.
 *
 * First, a node map is generated using the Node Map Generation algorithm which collects all properties of a node in a
 * single map. In the next step, the named graphs are folded into the default graph, which is then turned into an
 * array of node objects ordered by identifier.
 *
 * @param element The expanded element to flatten.
 * @param issuer The issuer relabelling blank nodes; a fresh `_:b` issuer unless given.
 */
export function flatten(element: JsonValue, issuer: IdentifierIssuer = new IdentifierIssuer("_:b")): JsonArray {
  // 1 & 2: generate the node map
  const nodeMap: NodeMap = { "@default": {} }
  createNodeMap(clone(element), nodeMap, "@default", issuer)

  // 3 & 4: fold the named graphs into the default graph
  const defaultGraph = mergeNodeMaps(nodeMap)

  // 5 - 7: the nodes of the default graph
  return nodesOf(defaultGraph)
}
