import fc from "fast-check"
import { describe, expect, it } from "vitest"
import { createCachingDocumentLoader, expand, rejectingDocumentLoader } from "../src/mod.ts"
import type { JsonObject } from "../src/mod.ts"

const XSD_INTEGER = "http://www.w3.org/2001/XMLSchema#integer"
const options = { documentLoader: rejectingDocumentLoader }

describe("expand", () => {
  it("expands terms and wraps values", async () => {
    const document = {
      "@context": { "name": "http://schema.org/name" },
      "@id": "http://example.org/alice",
      "name": "Alice",
    }

    expect(await expand(document, options)).toEqual([
      { "@id": "http://example.org/alice", "http://schema.org/name": [{ "@value": "Alice" }] },
    ])
  })

  it("applies type coercion and resolves relative IRIs", async () => {
    const document = {
      "@context": {
        "@vocab": "http://example.org/",
        "knows": { "@type": "@id" },
        "age": { "@type": XSD_INTEGER },
      },
      "@id": "alice",
      "knows": "bob",
      "age": "42",
    }

    expect(await expand(document, { ...options, base: "http://example.org/people/" })).toEqual([
      {
        "@id": "http://example.org/people/alice",
        "http://example.org/knows": [{ "@id": "http://example.org/people/bob" }],
        "http://example.org/age": [{ "@value": "42", "@type": XSD_INTEGER }],
      },
    ])
  })

  it("expands language maps", async () => {
    const document = {
      "@context": { "label": { "@id": "http://example.org/label", "@container": "@language" } },
      "@id": "http://example.org/greeting",
      "label": { "en": "Hello", "DE": "Hallo" },
    }

    expect(await expand(document, options)).toEqual([
      {
        "@id": "http://example.org/greeting",
        "http://example.org/label": [
          { "@value": "Hello", "@language": "en" },
          { "@value": "Hallo", "@language": "de" },
        ],
      },
    ])
  })

  it("expands lists", async () => {
    const document = {
      "@context": { "items": { "@id": "http://example.org/items", "@container": "@list" } },
      "@id": "http://example.org/list",
      "items": ["a", { "@id": "http://example.org/b" }],
    }

    expect(await expand(document, options)).toEqual([
      {
        "@id": "http://example.org/list",
        "http://example.org/items": [{ "@list": [{ "@value": "a" }, { "@id": "http://example.org/b" }] }],
      },
    ])
  })

  it("refuses lists directly inside lists", async () => {
    const nested = {
      "@context": { "items": { "@id": "http://example.org/items", "@container": "@list" } },
      "@id": "http://example.org/list",
      "items": ["a", ["b"]],
    }
    const explicit = {
      "@id": "http://example.org/list",
      "http://example.org/items": { "@list": [{ "@list": ["b"] }] },
    }

    await expect(expand(nested, options)).rejects.toMatchObject({ code: "list of lists" })
    await expect(expand(explicit, { ...options, processingMode: "json-ld-1.0" })).rejects.toThrow("list of lists")
  })

  it("expands reverse properties", async () => {
    const document = {
      "@context": { "parent": { "@reverse": "http://example.org/child" } },
      "@id": "http://example.org/bob",
      "parent": { "@id": "http://example.org/alice" },
    }

    expect(await expand(document, options)).toEqual([
      {
        "@id": "http://example.org/bob",
        "@reverse": { "http://example.org/child": [{ "@id": "http://example.org/alice" }] },
      },
    ])
  })

  it("keeps JSON literals as they are", async () => {
    const document = {
      "@context": { "data": { "@id": "http://example.org/data", "@type": "@json" } },
      "@id": "http://example.org/thing",
      "data": { "b": [1, 2], "a": null },
    }

    expect(await expand(document, options)).toEqual([
      {
        "@id": "http://example.org/thing",
        "http://example.org/data": [{ "@value": { "b": [1, 2], "a": null }, "@type": "@json" }],
      },
    ])
  })

  it("drops properties that do not expand to IRIs and free-floating nodes", async () => {
    const document: JsonObject = {
      "@context": { "name": "http://schema.org/name" },
      "@graph": [
        { "@id": "http://example.org/only-id" },
        { "@id": "http://example.org/a", "unmapped": "dropped", "name": "A" },
      ],
    }

    expect(await expand(document, options)).toEqual([
      { "@id": "http://example.org/a", "http://schema.org/name": [{ "@value": "A" }] },
    ])
  })

  it("applies type-scoped contexts", async () => {
    const document = {
      "@context": {
        "@vocab": "http://example.org/",
        "Person": { "@context": { "name": "http://schema.org/name" } },
      },
      "@type": "Person",
      "name": "Alice",
    }

    expect(await expand(document, options)).toEqual([
      { "@type": ["http://example.org/Person"], "http://schema.org/name": [{ "@value": "Alice" }] },
    ])
  })

  it("reports invalid value objects", async () => {
    const document = {
      "@id": "http://example.org/a",
      "http://example.org/p": { "@value": "x", "@type": "http://example.org/T", "@language": "en" },
    }

    await expect(expand(document, options)).rejects.toMatchObject({ code: "invalid value object" })
  })

  it("expands documents given as JSON text", async () => {
    const text = '{"@id": "http://example.org/a", "http://example.org/p": 1}'

    expect(await expand(text, options)).toEqual([
      { "@id": "http://example.org/a", "http://example.org/p": [{ "@value": 1 }] },
    ])
  })

  it("loads documents by URL and resolves against their location", async () => {
    const loader = createCachingDocumentLoader()
    loader.addDocument("http://example.org/docs/a.jsonld", { "@id": "b", "http://example.org/p": "x" })

    expect(await expand("http://example.org/docs/a.jsonld", { documentLoader: loader })).toEqual([
      { "@id": "http://example.org/docs/b", "http://example.org/p": [{ "@value": "x" }] },
    ])
  })

  it("applies an expand context", async () => {
    const document = { "@id": "http://example.org/a", "name": "A" }

    expect(await expand(document, { ...options, expandContext: { "@context": { "name": "http://schema.org/name" } } }))
      .toEqual([{ "@id": "http://example.org/a", "http://schema.org/name": [{ "@value": "A" }] }])
  })

  it("leaves expanded documents as they are", async () => {
    const property = fc.constantFrom("name", "knows", "tag")
    const value = fc.oneof(
      fc.string(),
      fc.integer(),
      fc.boolean(),
      fc.array(fc.string(), { maxLength: 3 }),
      fc.record({ "@id": fc.constantFrom("http://example.org/a", "_:b0") }),
    )

    await fc.assert(
      fc.asyncProperty(fc.dictionary(property, value), async (properties) => {
        const document = { "@context": { "@vocab": "http://example.org/" }, "@id": "http://example.org/x", ...properties }
        const expanded = await expand(document, options)

        expect(await expand(expanded, options)).toEqual(expanded)
      }),
      { numRuns: 50 },
    )
  })
})
