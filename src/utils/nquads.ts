import type * as RDF from "@rdfjs/types"
import { Parser } from "n3"

import { JsonLdError } from "../error.ts"
import type { GraphTerm, ObjectTerm, Quad, RdfTerm, SubjectTerm } from "../types/rdf.ts"
import { RDF_LANGSTRING, XSD_STRING } from "../types/rdf.ts"
import { RdfDataset } from "./dataset.ts"

const ESCAPES: Record<string, string> = {
  "\b": "\\b",
  "\t": "\\t",
  "\n": "\\n",
  "\f": "\\f",
  "\r": "\\r",
  '"': '\\"',
  "\\": "\\\\",
}

/**
 * Escape a literal's lexical form the way canonical N-Quads does: the named escapes for the usual control characters,
 * `\uXXXX` for the rest of them.
 */
function escapeLiteral(value: string): string {
  return value.replace(/[\u0000-\u001f\u007f"\\]/g, (char) => {
    return ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")}`
  })
}

function serializeTerm(term: RdfTerm): string {
  switch (term.termType) {
    case "NamedNode":
      return `<${term.value}>`
    case "BlankNode":
      return term.value
    case "DefaultGraph":
      return ""
    case "Literal": {
      const lexical = `"${escapeLiteral(term.value)}"`
      if (term.language) return `${lexical}@${term.language}`
      return term.datatype === XSD_STRING ? lexical : `${lexical}^^<${term.datatype}>`
    }
  }
}

/**
 * Serialize a quad as an N-Quads line, newline included.
 */
export function serializeQuad(quad: Quad): string {
  const graph = serializeTerm(quad.graph)
  const terms = [serializeTerm(quad.subject), serializeTerm(quad.predicate), serializeTerm(quad.object)]
  if (graph !== "") terms.push(graph)
  return `${terms.join(" ")} .\n`
}

/**
 * Serialize a dataset as N-Quads, one line per quad, lines in code unit order.
 */
export function serializeDataset(dataset: RdfDataset): string {
  return dataset.quads().map(serializeQuad).sort().join("")
}

function toBlankNode(label: string): string {
  return label.startsWith("_:") ? label : `_:${label}`
}

function toSubject(term: RDF.Term): SubjectTerm {
  if (term.termType === "NamedNode") return { termType: "NamedNode", value: term.value }
  if (term.termType === "BlankNode") return { termType: "BlankNode", value: toBlankNode(term.value) }
  throw new JsonLdError("syntax error", `a ${term.termType} cannot be the subject or predicate of a quad`)
}

function toObject(term: RDF.Term): ObjectTerm {
  if (term.termType !== "Literal") return toSubject(term)
  if (term.language) {
    return { termType: "Literal", value: term.value, datatype: RDF_LANGSTRING, language: term.language }
  }
  return { termType: "Literal", value: term.value, datatype: term.datatype.value }
}

function toGraph(term: RDF.Term): GraphTerm {
  if (term.termType === "DefaultGraph") return { termType: "DefaultGraph", value: "" }
  return toSubject(term)
}

/**
 * Convert RDF/JS quads, such as those of an `n3` store, into a dataset. Blank node labels keep their names.
 */
export function datasetFromRdfJs(quads: Iterable<RDF.Quad>): RdfDataset {
  const dataset = new RdfDataset()
  for (const quad of quads) {
    const predicate = toSubject(quad.predicate)
    dataset.add({
      subject: toSubject(quad.subject),
      predicate,
      object: toObject(quad.object),
      graph: toGraph(quad.graph),
    })
  }
  return dataset
}

/**
 * Parse N-Quads text into a dataset.
 *
 * @throws {JsonLdError} `syntax error` when the text is not N-Quads.
 */
export function parseNQuads(text: string): RdfDataset {
  const parser = new Parser({ format: "N-Quads", blankNodePrefix: "" })
  let quads: Array<RDF.Quad>
  try {
    quads = parser.parse(text)
  } catch (error) {
    throw new JsonLdError("syntax error", "the input is not valid N-Quads", {}, { cause: error })
  }
  return datasetFromRdfJs(quads)
}
