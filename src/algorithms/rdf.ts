import { JsonLdError } from "../error.ts"
import type { ProcessingOptions } from "../options.ts"
import type { JsonArray, JsonObject, JsonValue, NodeMap } from "../types/document.ts"
import { isKeyword } from "../types/keyword.ts"
import {
  type BlankNodeTerm,
  type GraphTerm,
  type IriTerm,
  type LiteralTerm,
  type ObjectTerm,
  type Quad,
  RDF_FIRST,
  RDF_JSON_LITERAL,
  RDF_LANGSTRING,
  RDF_LIST,
  RDF_NIL,
  RDF_REST,
  RDF_TYPE,
  type SubjectTerm,
  XSD_BOOLEAN,
  XSD_DOUBLE,
  XSD_INTEGER,
  XSD_STRING,
} from "../types/rdf.ts"
import { isWellFormedLanguage } from "../utils/context.ts"
import { RdfDataset } from "../utils/dataset.ts"
import { canonicalizeJson } from "../utils/json.ts"
import { toXsdDouble } from "../utils/number.ts"
import {
  isAbsoluteIri,
  isArray,
  isBlankNodeIdentifier,
  isListObject,
  isObject,
  isString,
  isSubjectRef,
  isValueObject,
} from "../utils/type.ts"
import { addValue, asArray, compareCodeUnits, sortedKeys } from "../utils/value.ts"
import type { IdentifierIssuer } from "./flatten.ts"

const XSD_INTEGER_LEXICAL = /^[+-]?[0-9]+$/
const XSD_DOUBLE_LEXICAL = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([Ee][+-]?[0-9]+)?$/

function namedNode(value: string): IriTerm {
  return { termType: "NamedNode", value }
}

/**
 * The RDF term for an IRI or blank node identifier, or `null` for relative IRIs, which RDF cannot express.
 */
function toResource(id: string): IriTerm | BlankNodeTerm | null {
  if (isBlankNodeIdentifier(id)) return { termType: "BlankNode", value: id }
  return isAbsoluteIri(id) ? namedNode(id) : null
}

/**
 * This algorithm deserializes a JSON-LD document to an RDF dataset. RDF does not allow a blank node to be used as a
 * property, while JSON-LD does; unless `produceGeneralizedRdf` is set, triples with a blank node property are left
 * out. Relative IRIs cannot be expressed in RDF either: triples that would hold one are left out too.
 *
 * Each graph of the node map is processed in turn, ordered by name. Each node object in the graph has an `@id` entry
 * which corresponds to the subject, the other entries represent predicates. Lists are transformed into RDF collections
 * using the List to RDF Conversion algorithm.
 *
 * @param nodeMap A map which is the result of the Node Map Generation algorithm.
 * @param issuer The issuer that labelled the node map; list nodes get their labels from it.
 * @param options The options of the running processor call.
 */
export function jsonldToRdf(
  nodeMap: NodeMap,
  issuer: IdentifierIssuer,
  options: Pick<ProcessingOptions, "produceGeneralizedRdf">,
): RdfDataset {
  const dataset = new RdfDataset()

  // 1: each graph, ordered by name
  for (const name of Object.keys(nodeMap).sort(compareCodeUnits)) {
    // 1.1 & 1.2: skip graph names that are not well-formed
    let graph: GraphTerm
    if (name === "@default") {
      graph = { termType: "DefaultGraph", value: "" }
    } else {
      const resource = toResource(name)
      if (resource === null) continue
      graph = resource
    }

    // 1.3: each node, ordered by subject
    const nodes = nodeMap[name]
    for (const id of Object.keys(nodes).sort(compareCodeUnits)) {
      const subject = toResource(id)
      if (subject === null) continue

      const node = nodes[id]
      for (const property of sortedKeys(node)) {
        const values = asArray(node[property])

        // 1.3.2.1: types
        if (property === "@type") {
          for (const type of values) {
            const object = isString(type) ? toResource(type) : null
            if (object !== null) dataset.add({ subject, predicate: namedNode(RDF_TYPE), object, graph })
          }
          continue
        }

        // 1.3.2.2 - 1.3.2.4: keywords, blank node properties and relative IRIs
        if (isKeyword(property)) continue
        if (isBlankNodeIdentifier(property) && !options.produceGeneralizedRdf) continue
        const predicate = toResource(property)
        if (predicate === null) continue

        // 1.3.2.5: the objects
        for (const item of values) {
          const listTriples: Array<Quad> = []
          const object = objectToRdf(item, listTriples, graph, issuer)
          if (object !== null) dataset.add({ subject, predicate, object, graph })
          for (const triple of listTriples) dataset.add(triple)
        }
      }
    }
  }

  return dataset
}

/**
 * This algorithm takes a node object, list object, or value object and transforms it into a resource to be used as the
 * object of a triple. Value objects become literals; node objects become IRIs or blank nodes, or `null` when they
 * hold a relative IRI. The triples of a list are appended to `listTriples`.
 *
 * @param item A value object, list object, or node object.
 * @param listTriples The triples created for lists.
 * @param graph The graph the triples belong to.
 * @param issuer Labels the blank nodes of lists.
 */
export function objectToRdf(
  item: JsonValue,
  listTriples: Array<Quad>,
  graph: GraphTerm,
  issuer: IdentifierIssuer,
): ObjectTerm | null {
  // 1 & 2: node objects
  if (isString(item)) return toResource(item)
  if (!isObject(item)) return null
  if (!isValueObject(item) && !isListObject(item)) {
    const id = item["@id"]
    return isString(id) ? toResource(id) : null
  }

  // 3: list objects
  if (isListObject(item)) {
    return listToRdf(asArray(item["@list"]), listTriples, graph, issuer)
  }

  // 4 - 7: the value and its datatype
  const value = item["@value"]
  const type = item["@type"]
  const datatype = isString(type) ? type : null
  if (datatype !== null && datatype !== "@json" && !isAbsoluteIri(datatype)) return null

  const language = item["@language"]
  if (isString(language) && !isWellFormedLanguage(language)) return null

  let literal: LiteralTerm
  if (datatype === "@json") {
    // 8: JSON literals in canonical form
    literal = { termType: "Literal", value: canonicalizeJson(value), datatype: RDF_JSON_LITERAL }
  } else if (typeof value === "boolean") {
    // 9: booleans
    literal = { termType: "Literal", value: String(value), datatype: datatype ?? XSD_BOOLEAN }
  } else if (
    typeof value === "number" && (!Number.isInteger(value) || Math.abs(value) >= 1e21 || datatype === XSD_DOUBLE)
  ) {
    // 10: doubles
    literal = { termType: "Literal", value: toXsdDouble(value), datatype: datatype ?? XSD_DOUBLE }
  } else if (typeof value === "number") {
    // 11: integers
    literal = { termType: "Literal", value: value.toFixed(0), datatype: datatype ?? XSD_INTEGER }
  } else if (isString(language)) {
    // 12 & 14: language-tagged strings
    literal = { termType: "Literal", value: String(value), datatype: datatype ?? RDF_LANGSTRING, language }
  } else {
    literal = { termType: "Literal", value: String(value), datatype: datatype ?? XSD_STRING }
  }

  // 15
  return literal
}

/**
 * List Conversion is the process of taking a list object and transforming it into an RDF collection. Each element of
 * the list gets a fresh blank node carrying `rdf:first` and `rdf:rest`; items that cannot be expressed in RDF lose
 * their `rdf:first` triple but keep their place in the chain.
 *
 * @returns The head of the list: the first blank node, or `rdf:nil` for an empty list.
 */
export function listToRdf(
  list: JsonArray,
  listTriples: Array<Quad>,
  graph: GraphTerm,
  issuer: IdentifierIssuer,
): SubjectTerm {
  // 1: the empty list
  if (list.length === 0) return namedNode(RDF_NIL)

  // 2: a blank node per entry
  const bnodes: Array<BlankNodeTerm> = list.map(() => ({ termType: "BlankNode", value: issuer.getId() }))

  // 3: chain them
  list.forEach((item, index) => {
    const subject = bnodes[index]
    const embeddedTriples: Array<Quad> = []
    const object = objectToRdf(item, embeddedTriples, graph, issuer)
    if (object !== null) {
      listTriples.push({ subject, predicate: namedNode(RDF_FIRST), object, graph })
    }
    const rest: SubjectTerm = index + 1 < bnodes.length ? bnodes[index + 1] : namedNode(RDF_NIL)
    listTriples.push({ subject, predicate: namedNode(RDF_REST), object: rest, graph })
    listTriples.push(...embeddedTriples)
  })

  // 4
  return bnodes[0]
}

interface Usage {
  node: JsonObject
  property: string
  value: JsonObject
}

/**
 * Whether a node is a well-formed list node: referenced once, a single `rdf:first` and `rdf:rest`, and nothing else
 * apart from an optional `@type` of `rdf:List`.
 */
function isListNode(node: JsonObject, referencedOnce: Map<string, Usage | false>): boolean {
  const id = node["@id"]
  if (!isBlankNodeIdentifier(id) || !referencedOnce.get(id)) return false

  const first = node[RDF_FIRST]
  const rest = node[RDF_REST]
  if (!isArray(first) || first.length !== 1 || !isArray(rest) || rest.length !== 1) return false

  const keys = Object.keys(node).length
  if (keys === 3) return true
  const types = node["@type"]
  return keys === 4 && isArray(types) && types.length === 1 && types[0] === RDF_LIST
}

/**
 * This algorithm serializes an RDF dataset consisting of a default graph and zero or more named graphs into a JSON-LD
 * document in expanded form.
 *
 * Each graph is converted into a map of node objects; every RDF collection built from well-formed list nodes becomes
 * a list object, while collections that are not well-formed are kept as plain `rdf:first`/`rdf:rest` nodes. With
 * `useNativeTypes`, `xsd:integer`, `xsd:double` and `xsd:boolean` literals become JSON numbers and booleans. Unless
 * `useRdfType` is set, `rdf:type` triples with an IRI or blank node object become `@type` entries.
 *
 * @param dataset An RDF dataset to convert to a JSON-LD document.
 * @param options The options of the running processor call.
 */
export function rdfToJsonld(
  dataset: RdfDataset,
  options: Pick<ProcessingOptions, "useNativeTypes" | "useRdfType" | "processingMode">,
): JsonArray {
  // 1 - 3
  const defaultGraph: Record<string, JsonObject> = {}
  const graphMap = new Map<string, Record<string, JsonObject>>([["@default", defaultGraph]])
  const nilUsages = new Map<string, Array<Usage>>()
  const referencedOnce = new Map<string, Usage | false>()

  // 5: each graph
  for (const [name, quads] of dataset.graphs) {
    // 5.1 - 5.5
    let nodeMap = graphMap.get(name)
    if (nodeMap === undefined) {
      nodeMap = {}
      graphMap.set(name, nodeMap)
    }
    if (name !== "@default") defaultGraph[name] ??= { "@id": name }

    // 5.7: each triple
    for (const { subject, predicate, object } of quads) {
      const node = nodeMap[subject.value] ??= { "@id": subject.value }
      const objectIsNode = object.termType === "NamedNode" || object.termType === "BlankNode"
      if (objectIsNode) nodeMap[object.value] ??= { "@id": object.value }

      // 5.7.5: types
      if (predicate.value === RDF_TYPE && !options.useRdfType && objectIsNode) {
        addValue(node, "@type", object.value, { propertyIsArray: true, allowDuplicate: false })
        continue
      }

      // 5.7.6 - 5.7.8
      const value = rdfToObject(object, options)
      addValue(node, predicate.value, value, { propertyIsArray: true, allowDuplicate: false })

      if (!objectIsNode) continue
      const usage: Usage = { node, property: predicate.value, value }
      if (object.value === RDF_NIL) {
        // 5.7.9: the end of a collection
        const usages = nilUsages.get(name) ?? []
        usages.push(usage)
        nilUsages.set(name, usages)
      } else if (referencedOnce.has(object.value)) {
        // 5.7.10
        referencedOnce.set(object.value, false)
      } else if (isBlankNodeIdentifier(object.value)) {
        // 5.7.11: a candidate list node
        referencedOnce.set(object.value, usage)
      }
    }
  }

  // 6: rebuild the lists, walking from each rdf:nil back to the head
  for (const [name, graphObject] of graphMap) {
    for (const nilUsage of nilUsages.get(name) ?? []) {
      let node = nilUsage.node
      let property = nilUsage.property
      let head = nilUsage.value
      const list: JsonArray = []
      const listNodes: Array<string> = []

      while (property === RDF_REST && isListNode(node, referencedOnce)) {
        const id = node["@id"]
        const usage = isString(id) ? referencedOnce.get(id) : undefined
        if (!usage) break
        list.push(asArray(node[RDF_FIRST])[0])
        if (isString(id)) listNodes.push(id)
        node = usage.node
        property = usage.property
        head = usage.value
      }

      delete head["@id"]
      head["@list"] = list.reverse()
      for (const listNode of listNodes) delete graphObject[listNode]
    }
  }

  // 7 & 8: the default graph, with named graphs embedded
  const result: JsonArray = []
  for (const subject of Object.keys(defaultGraph).sort(compareCodeUnits)) {
    const node = defaultGraph[subject]
    const graphObject = graphMap.get(subject)
    if (graphObject !== undefined) {
      node["@graph"] = Object.keys(graphObject)
        .sort(compareCodeUnits)
        .map((id) => graphObject[id])
        .filter((item) => !isSubjectRef(item))
    }
    if (!isSubjectRef(node)) result.push(node)
  }

  // 9
  return result
}

/**
 * This algorithm transforms an RDF literal to a JSON-LD value object and an RDF blank node or IRI to a node
 * reference. Literals with datatype `rdf:JSON` become `@json` values.
 *
 * @throws {JsonLdError} `invalid JSON literal` for an `rdf:JSON` literal that is not JSON, and `invalid
 *   language-tagged string` for a malformed language tag.
 */
export function rdfToObject(
  term: ObjectTerm,
  options: Pick<ProcessingOptions, "useNativeTypes" | "processingMode">,
): JsonObject {
  // 1: IRIs and blank nodes
  if (term.termType !== "Literal") return { "@id": term.value }

  // 2.1 - 2.3
  const result: JsonObject = {}
  let converted: JsonValue = term.value
  let type: string | null = null

  if (term.language) {
    // 2.7: language-tagged strings
    if (!isWellFormedLanguage(term.language)) {
      throw new JsonLdError("invalid language-tagged string", `${term.language} is not a language tag`, {
        language: term.language,
      })
    }
    result["@value"] = converted
    result["@language"] = term.language
    return result
  }

  if (options.useNativeTypes && term.datatype === XSD_BOOLEAN) {
    // 2.4.2
    if (term.value === "true") converted = true
    else if (term.value === "false") converted = false
    else type = XSD_BOOLEAN
  } else if (options.useNativeTypes && term.datatype === XSD_INTEGER) {
    // 2.4.3: integers that a double holds exactly
    const number = Number(term.value)
    if (XSD_INTEGER_LEXICAL.test(term.value) && Number.isSafeInteger(number)) converted = number
    else type = XSD_INTEGER
  } else if (options.useNativeTypes && term.datatype === XSD_DOUBLE) {
    const number = Number(term.value)
    if (XSD_DOUBLE_LEXICAL.test(term.value) && Number.isFinite(number)) converted = number
    else type = XSD_DOUBLE
  } else if (term.datatype === RDF_JSON_LITERAL && options.processingMode !== "json-ld-1.0") {
    // 2.5: JSON literals
    try {
      converted = JSON.parse(term.value)
    } catch (error) {
      throw new JsonLdError("invalid JSON literal", "the lexical form is not JSON", { value: term.value }, {
        cause: error,
      })
    }
    type = "@json"
  } else if (term.datatype !== XSD_STRING) {
    // 2.8
    type = term.datatype
  }

  // 2.9 - 2.11
  result["@value"] = converted
  if (type !== null) result["@type"] = type
  return result
}
