import fc from "fast-check"
import { describe, expect, it } from "vitest"
import { compact, expand, rejectingDocumentLoader } from "../src/mod.ts"

const options = { documentLoader: rejectingDocumentLoader }

describe("compact", () => {
  it("chooses terms by the shape of the value", async () => {
    const input = [{
      "@id": "http://example.org/alice",
      "http://schema.org/name": [{ "@value": "Alice" }],
      "http://schema.org/knows": [{ "@id": "http://example.org/bob" }],
    }]
    const context = {
      "name": "http://schema.org/name",
      "knows": { "@id": "http://schema.org/knows", "@type": "@id" },
    }

    expect(await compact(input, context, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/alice",
      "name": "Alice",
      "knows": "http://example.org/bob",
    })
  })

  it("builds compact IRIs from prefixes", async () => {
    const input = { "@id": "http://example.org/a", "http://example.org/p": { "@id": "http://example.org/b" } }
    const context = { "ex": "http://example.org/" }

    expect(await compact(input, { "@context": context }, options)).toEqual({
      "@context": context,
      "@id": "ex:a",
      "ex:p": { "@id": "ex:b" },
    })
  })

  it("makes identifiers relative to the base IRI", async () => {
    const input = { "@id": "http://example.org/a", "http://example.org/p": { "@id": "http://example.org/b" } }
    const context = { "p": "http://example.org/p" }

    expect(await compact(input, context, { ...options, base: "http://example.org/" })).toEqual({
      "@context": context,
      "@id": "a",
      "p": { "@id": "b" },
    })
    expect(await compact(input, context, { ...options, base: "http://example.org/", compactToRelative: false }))
      .toEqual({
        "@context": context,
        "@id": "http://example.org/a",
        "p": { "@id": "http://example.org/b" },
      })
  })

  it("uses the vocabulary mapping and set containers", async () => {
    const input = {
      "@id": "http://example.org/x",
      "@type": "http://example.org/Thing",
      "http://example.org/tags": "one",
    }
    const context = { "@vocab": "http://example.org/", "tags": { "@container": "@set" } }

    expect(await compact(input, context, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/x",
      "@type": "Thing",
      "tags": ["one"],
    })
  })

  it("compacts lists and language maps", async () => {
    const input = {
      "@id": "http://example.org/l",
      "http://example.org/items": { "@list": ["a", "b"] },
      "http://example.org/label": [{ "@value": "Hello", "@language": "en" }, { "@value": "Hallo", "@language": "de" }],
    }
    const context = {
      "items": { "@id": "http://example.org/items", "@container": "@list" },
      "label": { "@id": "http://example.org/label", "@container": "@language" },
    }

    expect(await compact(input, context, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/l",
      "items": ["a", "b"],
      "label": { "en": "Hello", "de": "Hallo" },
    })
  })

  it("uses keyword aliases", async () => {
    const input = {
      "@id": "http://example.org/a",
      "@type": "http://schema.org/Person",
      "http://schema.org/name": "A",
    }
    const context = { "id": "@id", "type": "@type", "name": "http://schema.org/name" }

    expect(await compact(input, context, options)).toEqual({
      "@context": context,
      "id": "http://example.org/a",
      "type": "http://schema.org/Person",
      "name": "A",
    })
  })

  it("puts several top-level nodes under @graph and leaves out an empty context", async () => {
    const input = [
      { "@id": "http://example.org/a", "http://example.org/p": "x" },
      { "@id": "http://example.org/b", "http://example.org/p": "y" },
    ]

    expect(await compact(input, {}, options)).toEqual({
      "@graph": [
        { "@id": "http://example.org/a", "http://example.org/p": "x" },
        { "@id": "http://example.org/b", "http://example.org/p": "y" },
      ],
    })
  })

  it("keeps arrays when compactArrays is off", async () => {
    const input = { "@id": "http://example.org/a", "http://schema.org/name": "A" }
    const context = { "name": "http://schema.org/name" }

    expect(await compact(input, context, { ...options, compactArrays: false })).toEqual({
      "@context": context,
      "@graph": [{ "@id": "http://example.org/a", "name": ["A"] }],
    })
  })

  it("takes an index off node references in index maps", async () => {
    const input = {
      "@id": "http://example.org/s",
      "http://example.org/idx": [{ "@id": "http://example.org/x", "@index": "a" }],
    }
    const context = { "idx": { "@id": "http://example.org/idx", "@container": "@index", "@type": "@id" } }

    expect(await compact(input, context, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/s",
      "idx": { "a": "http://example.org/x" },
    })
  })

  it("gives back a compact document after expanding it with the same context", async () => {
    const context = { "@vocab": "http://example.org/" }
    const property = fc.constantFrom("name", "nick", "note")
    const value = fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.array(fc.string(), { minLength: 2, maxLength: 3 }))

    await fc.assert(
      fc.asyncProperty(fc.dictionary(property, value), async (properties) => {
        const document = { "@context": context, "@id": "http://example.org/x", "@type": "Thing", ...properties }
        const expanded = await expand(document, options)

        expect(await compact(expanded, context, options)).toEqual(document)
      }),
      { numRuns: 50 },
    )
  })
})
