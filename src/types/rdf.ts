import type { IRI } from "./basic.ts"

/**
 * An IRI node. Term type names follow the RDF/JS data model so terms convert without renaming.
 */
export interface IriTerm {
  termType: "NamedNode"
  value: IRI
}

/**
 * A blank node. The value keeps its `_:` prefix, the same spelling blank node identifiers have in JSON-LD.
 */
export interface BlankNodeTerm {
  termType: "BlankNode"
  value: string
}

export interface LiteralTerm {
  termType: "Literal"
  value: string
  datatype: IRI
  language?: string
}

export interface DefaultGraphTerm {
  termType: "DefaultGraph"
  value: ""
}

export type SubjectTerm = IriTerm | BlankNodeTerm
export type ObjectTerm = IriTerm | BlankNodeTerm | LiteralTerm
export type GraphTerm = IriTerm | BlankNodeTerm | DefaultGraphTerm
export type RdfTerm = IriTerm | BlankNodeTerm | LiteralTerm | DefaultGraphTerm

export interface Quad {
  subject: SubjectTerm
  /** A blank node predicate only appears in generalized RDF. */
  predicate: IriTerm | BlankNodeTerm
  object: ObjectTerm
  graph: GraphTerm
}

export const RDF = "http://www.w3.org/1999/02/22-rdf-syntax-ns#"
export const XSD = "http://www.w3.org/2001/XMLSchema#"

export const RDF_FIRST = `${RDF}first`
export const RDF_REST = `${RDF}rest`
export const RDF_NIL = `${RDF}nil`
export const RDF_TYPE = `${RDF}type`
export const RDF_LIST = `${RDF}List`
export const RDF_LANGSTRING = `${RDF}langString`
export const RDF_JSON_LITERAL = `${RDF}JSON`

export const XSD_BOOLEAN = `${XSD}boolean`
export const XSD_DOUBLE = `${XSD}double`
export const XSD_INTEGER = `${XSD}integer`
export const XSD_STRING = `${XSD}string`
