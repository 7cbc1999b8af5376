import { DataFactory, Store } from "n3"
import { describe, expect, it } from "vitest"
import { RDF_LANGSTRING, XSD_INTEGER, XSD_STRING } from "../src/types/rdf.ts"
import { datasetFromRdfJs, parseNQuads, serializeDataset, serializeQuad } from "../src/utils/nquads.ts"

const s = { termType: "NamedNode", value: "http://example.org/s" } as const
const p = { termType: "NamedNode", value: "http://example.org/p" } as const
const defaultGraph = { termType: "DefaultGraph", value: "" } as const

describe("serializeQuad", () => {
  it("escapes literals", () => {
    const object = { termType: "Literal", value: 'a"b\\c\nd\u0001\u001f', datatype: XSD_STRING } as const

    expect(serializeQuad({ subject: s, predicate: p, object, graph: defaultGraph })).toBe(
      '<http://example.org/s> <http://example.org/p> "a\\"b\\\\c\\nd\\u0001\\u001F" .\n',
    )
  })

  it("uses named escapes for backspace and form feed", () => {
    const object = { termType: "Literal", value: "a\bb\fc\td\re\u007f", datatype: XSD_STRING } as const

    expect(serializeQuad({ subject: s, predicate: p, object, graph: defaultGraph })).toBe(
      '<http://example.org/s> <http://example.org/p> "a\\bb\\fc\\td\\re\\u007F" .\n',
    )
  })

  it("writes language tags, datatypes and graph names", () => {
    const tagged = { termType: "Literal", value: "hi", datatype: RDF_LANGSTRING, language: "en" } as const
    const typed = { termType: "Literal", value: "7", datatype: XSD_INTEGER } as const
    const graph = { termType: "BlankNode", value: "_:g" } as const

    expect(serializeQuad({ subject: s, predicate: p, object: tagged, graph })).toBe(
      '<http://example.org/s> <http://example.org/p> "hi"@en _:g .\n',
    )
    expect(serializeQuad({ subject: s, predicate: p, object: typed, graph: defaultGraph })).toBe(
      `<http://example.org/s> <http://example.org/p> "7"^^<${XSD_INTEGER}> .\n`,
    )
  })
})

describe("parseNQuads", () => {
  it("reads quads and keeps blank node labels", () => {
    const dataset = parseNQuads('_:a <http://example.org/p> "v"@en <http://example.org/g> .\n')

    expect(dataset.quads()).toEqual([
      {
        subject: { termType: "BlankNode", value: "_:a" },
        predicate: p,
        object: { termType: "Literal", value: "v", datatype: RDF_LANGSTRING, language: "en" },
        graph: { termType: "NamedNode", value: "http://example.org/g" },
      },
    ])
  })

  it("writes back what it reads", () => {
    const text = [
      '<http://example.org/s> <http://example.org/p> "tab\\there" .\n',
      "<http://example.org/s> <http://example.org/p> _:x .\n",
    ].join("")

    expect(serializeDataset(parseNQuads(text))).toBe(text)
  })

  it("reports syntax errors", () => {
    expect(() => parseNQuads("<http://example.org/s> <http://example.org/p> .")).toThrow("syntax error")
  })
})

describe("datasetFromRdfJs", () => {
  it("converts the quads of an n3 store", () => {
    const { blankNode, defaultGraph: n3DefaultGraph, literal, namedNode, quad } = DataFactory
    const store = new Store([
      quad(namedNode("http://example.org/s"), namedNode("http://example.org/p"), blankNode("o"), n3DefaultGraph()),
      quad(blankNode("o"), namedNode("http://example.org/p"), literal("1", namedNode(XSD_INTEGER)), n3DefaultGraph()),
    ])

    expect(serializeDataset(datasetFromRdfJs(store.getQuads(null, null, null, null)))).toBe([
      '<http://example.org/s> <http://example.org/p> _:o .\n',
      `_:o <http://example.org/p> "1"^^<${XSD_INTEGER}> .\n`,
    ].join(""))
  })
})
