import { describe, expect, it } from "vitest"
import { fromRdf, rejectingDocumentLoader, serializeDataset, toRdf } from "../src/mod.ts"
import { RdfDataset } from "../src/utils/dataset.ts"

const options = { documentLoader: rejectingDocumentLoader }

const RDF = "http://www.w3.org/1999/02/22-rdf-syntax-ns#"
const XSD = "http://www.w3.org/2001/XMLSchema#"

describe("toRdf", () => {
  it("turns native values into typed literals and lists into collections", async () => {
    const document = {
      "@context": { "@vocab": "http://example.org/" },
      "@id": "http://example.org/s",
      "p": [1, 1.5, true, "x"],
      "q": { "@list": ["a"] },
    }

    const dataset = await toRdf(document, options)

    expect(dataset.size).toBe(7)
    expect(serializeDataset(dataset)).toBe([
      `<http://example.org/s> <http://example.org/p> "1"^^<${XSD}integer> .\n`,
      `<http://example.org/s> <http://example.org/p> "1.5E0"^^<${XSD}double> .\n`,
      `<http://example.org/s> <http://example.org/p> "true"^^<${XSD}boolean> .\n`,
      `<http://example.org/s> <http://example.org/p> "x" .\n`,
      `<http://example.org/s> <http://example.org/q> _:b0 .\n`,
      `_:b0 <${RDF}first> "a" .\n`,
      `_:b0 <${RDF}rest> <${RDF}nil> .\n`,
    ].join(""))
  })

  it("writes named graphs, language tags and types", async () => {
    const document = {
      "@id": "http://example.org/g",
      "@graph": {
        "@id": "http://example.org/s",
        "@type": "http://example.org/T",
        "http://example.org/label": { "@value": "hi", "@language": "en" },
      },
    }

    expect(serializeDataset(await toRdf(document, options))).toBe([
      `<http://example.org/s> <http://example.org/label> "hi"@en <http://example.org/g> .\n`,
      `<http://example.org/s> <${RDF}type> <http://example.org/T> <http://example.org/g> .\n`,
    ].join(""))
  })

  it("leaves out blank node properties unless generalized RDF is asked for", async () => {
    const document = { "@id": "http://example.org/s", "_:p": "x" }

    expect((await toRdf(document, options)).size).toBe(0)
    expect(serializeDataset(await toRdf(document, { ...options, produceGeneralizedRdf: true }))).toBe(
      `<http://example.org/s> _:b0 "x" .\n`,
    )
  })

  it("writes JSON literals in canonical form", async () => {
    const document = {
      "@id": "http://example.org/s",
      "http://example.org/data": { "@value": { "b": 1, "a": [true] }, "@type": "@json" },
    }

    expect(serializeDataset(await toRdf(document, options))).toBe(
      `<http://example.org/s> <http://example.org/data> "{\\"a\\":[true],\\"b\\":1}"^^<${RDF}JSON> .\n`,
    )
  })

  it("skips triples holding relative IRIs", async () => {
    const document = { "@id": "relative", "http://example.org/p": "x" }

    expect((await toRdf(document, options)).size).toBe(0)
  })
})

describe("RdfDataset", () => {
  it("keeps one copy of a triple per graph", () => {
    const subject = { termType: "NamedNode", value: "http://example.org/s" } as const
    const predicate = { termType: "NamedNode", value: "http://example.org/p" } as const
    const object = { termType: "Literal", value: "x", datatype: `${XSD}string` } as const
    const dataset = new RdfDataset()

    expect(dataset.add({ subject, predicate, object, graph: { termType: "DefaultGraph", value: "" } })).toBe(true)
    expect(dataset.add({ subject, predicate, object, graph: { termType: "DefaultGraph", value: "" } })).toBe(false)
    expect(dataset.add({ subject, predicate, object, graph: subject })).toBe(true)
    expect(dataset.size).toBe(2)
    expect([...dataset.graphs.keys()]).toEqual(["@default", "http://example.org/s"])
  })
})

describe("fromRdf", () => {
  const list = [
    `<http://example.org/s> <http://example.org/p> _:l1 .`,
    `_:l1 <${RDF}first> "a" .`,
    `_:l1 <${RDF}rest> _:l2 .`,
    `_:l2 <${RDF}first> "b" .`,
    `_:l2 <${RDF}rest> <${RDF}nil> .`,
  ].join("\n")

  it("rebuilds lists from well-formed collections", async () => {
    expect(await fromRdf(list, options)).toEqual([
      { "@id": "http://example.org/s", "http://example.org/p": [{ "@list": [{ "@value": "a" }, { "@value": "b" }] }] },
    ])
  })

  it("leaves a collection without an end as plain nodes", async () => {
    const text = [
      `<http://example.org/s> <http://example.org/p> _:l1 .`,
      `_:l1 <${RDF}first> "a" .`,
      `_:l1 <${RDF}rest> _:l2 .`,
      `_:l2 <${RDF}first> "b" .`,
    ].join("\n")

    expect(await fromRdf(text, options)).toEqual([
      { "@id": "_:l1", [`${RDF}first`]: [{ "@value": "a" }], [`${RDF}rest`]: [{ "@id": "_:l2" }] },
      { "@id": "_:l2", [`${RDF}first`]: [{ "@value": "b" }] },
      { "@id": "http://example.org/s", "http://example.org/p": [{ "@id": "_:l1" }] },
    ])
  })

  it("turns rdf:type into @type unless asked not to", async () => {
    const text = `<http://example.org/s> <${RDF}type> <http://example.org/T> .\n`

    expect(await fromRdf(text, options)).toEqual([{ "@id": "http://example.org/s", "@type": ["http://example.org/T"] }])
    expect(await fromRdf(text, { ...options, useRdfType: true })).toEqual([
      { "@id": "http://example.org/s", [`${RDF}type`]: [{ "@id": "http://example.org/T" }] },
    ])
  })

  it("converts native types on request", async () => {
    const text = [
      `<http://example.org/s> <http://example.org/p> "5"^^<${XSD}integer> .`,
      `<http://example.org/s> <http://example.org/p> "2.5E0"^^<${XSD}double> .`,
      `<http://example.org/s> <http://example.org/p> "true"^^<${XSD}boolean> .`,
      `<http://example.org/s> <http://example.org/p> "maybe"^^<${XSD}boolean> .`,
      `<http://example.org/s> <http://example.org/p> "plain"^^<${XSD}string> .`,
    ].join("\n")

    expect(await fromRdf(text, { ...options, useNativeTypes: true })).toEqual([
      {
        "@id": "http://example.org/s",
        "http://example.org/p": [
          { "@value": 5 },
          { "@value": 2.5 },
          { "@value": true },
          { "@value": "maybe", "@type": `${XSD}boolean` },
          { "@value": "plain" },
        ],
      },
    ])
    expect(await fromRdf(text, options)).toEqual([
      {
        "@id": "http://example.org/s",
        "http://example.org/p": [
          { "@value": "5", "@type": `${XSD}integer` },
          { "@value": "2.5E0", "@type": `${XSD}double` },
          { "@value": "true", "@type": `${XSD}boolean` },
          { "@value": "maybe", "@type": `${XSD}boolean` },
          { "@value": "plain" },
        ],
      },
    ])
  })

  it("parses JSON literals", async () => {
    const text = `<http://example.org/s> <http://example.org/p> "{\\"a\\":1}"^^<${RDF}JSON> .\n`

    expect(await fromRdf(text, options)).toEqual([
      { "@id": "http://example.org/s", "http://example.org/p": [{ "@value": { "a": 1 }, "@type": "@json" }] },
    ])
  })

  it("rejects JSON literals that are not JSON", async () => {
    const text = `<http://example.org/s> <http://example.org/p> "{oops"^^<${RDF}JSON> .\n`

    await expect(fromRdf(text, options)).rejects.toMatchObject({ code: "invalid JSON literal" })
  })

  it("embeds named graphs", async () => {
    const dataset = RdfDataset.from([{
      subject: { termType: "NamedNode", value: "http://example.org/s" },
      predicate: { termType: "NamedNode", value: "http://example.org/p" },
      object: { termType: "Literal", value: "x", datatype: `${XSD}string` },
      graph: { termType: "NamedNode", value: "http://example.org/g" },
    }])

    expect(await fromRdf(dataset, options)).toEqual([
      {
        "@id": "http://example.org/g",
        "@graph": [{ "@id": "http://example.org/s", "http://example.org/p": [{ "@value": "x" }] }],
      },
    ])
  })

  it("reads what toRdf writes", async () => {
    const document = [{
      "@id": "http://example.org/s",
      "http://example.org/p": [{ "@value": "x", "@language": "en" }],
      "http://example.org/q": [{ "@list": [{ "@id": "http://example.org/o" }] }],
    }]

    expect(await fromRdf(await toRdf(document, options), options)).toEqual(document)
  })
})
