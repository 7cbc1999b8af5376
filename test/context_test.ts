import { describe, expect, it } from "vitest"
import { newActiveContext, processContext, selectTerm } from "../src/algorithms/context.ts"
import { dereferenceContext } from "../src/algorithms/resolve.ts"
import { createCachingDocumentLoader, rejectingDocumentLoader } from "../src/loader.ts"
import { expand } from "../src/mod.ts"
import { resolveOptions } from "../src/options.ts"

const options = resolveOptions({ documentLoader: rejectingDocumentLoader })
const initial = () => newActiveContext(null, "json-ld-1.1")

describe("context processing", () => {
  it("defines terms, prefixes and the vocabulary mapping", () => {
    const context = processContext(initial(), {
      "@vocab": "http://example.org/vocab#",
      "name": "http://schema.org/name",
      "foaf": "http://xmlns.com/foaf/0.1/",
      "foaf:knows": { "@type": "@id" },
    }, null, options)

    expect(context.vocabularyMapping).toBe("http://example.org/vocab#")
    expect(context.termDefinitions.get("name")?.["@id"]).toBe("http://schema.org/name")
    expect(context.termDefinitions.get("name")?.["@prefix"]).toBe(false)
    expect(context.termDefinitions.get("foaf")?.["@prefix"]).toBe(true)
    expect(context.termDefinitions.get("foaf:knows")?.["@id"]).toBe("http://xmlns.com/foaf/0.1/knows")
    expect(context.termDefinitions.get("foaf:knows")?.["@type"]).toBe("@id")
  })

  it("leaves the active context untouched", () => {
    const active = initial()
    processContext(active, { "name": "http://schema.org/name" }, null, options)
    expect(active.termDefinitions.size).toBe(0)
  })

  it("resets on null", () => {
    const defined = processContext(initial(), { "@language": "EN", "name": "http://schema.org/name" }, null, options)
    expect(defined.defaultLanguage).toBe("en")
    const reset = processContext(defined, null, null, options)
    expect(reset.termDefinitions.size).toBe(0)
    expect(reset.defaultLanguage).toBeNull()
  })

  it("detects cyclic IRI mappings", () => {
    expect(() => processContext(initial(), { "a": "b:x", "b": "a:y" }, null, options)).toThrow("cyclic IRI mapping")
  })

  it("refuses to redefine keywords", () => {
    expect(() => processContext(initial(), { "@id": "http://example.org/id" }, null, options))
      .toThrow("keyword redefinition")
  })

  it("protects terms", () => {
    const protectedContext = processContext(
      initial(),
      { "@protected": true, "name": "http://schema.org/name" },
      null,
      options,
    )

    // an identical definition is allowed
    const same = processContext(protectedContext, { "name": "http://schema.org/name" }, null, options)
    expect(same.termDefinitions.get("name")?.["@protected"]).toBe(true)

    expect(() => processContext(protectedContext, { "name": "http://example.org/other" }, null, options))
      .toThrow("protected term redefinition")
    expect(() => processContext(protectedContext, null, null, options)).toThrow("invalid context nullification")
  })

  it("rejects @version in json-ld-1.0 mode", () => {
    expect(() => processContext(newActiveContext(null, "json-ld-1.0"), { "@version": 1.1 }, null, options))
      .toThrow("processing mode conflict")
  })
})

describe("remote contexts", () => {
  it("processes a dereferenced context", async () => {
    const loader = createCachingDocumentLoader()
    loader.addDocument("http://example.org/context.jsonld", { "@context": { "name": "http://schema.org/name" } })
    const remoteOptions = resolveOptions({ documentLoader: loader })

    await dereferenceContext("context.jsonld", "http://example.org/doc", remoteOptions)
    const context = processContext(initial(), "context.jsonld", "http://example.org/doc", remoteOptions)

    expect(context.termDefinitions.get("name")?.["@id"]).toBe("http://schema.org/name")
  })

  it("imports a context underneath the local one", async () => {
    const loader = createCachingDocumentLoader()
    loader.addDocument("http://example.org/base.jsonld", {
      "@context": { "name": "http://schema.org/name", "age": "http://schema.org/age" },
    })
    const remoteOptions = resolveOptions({ documentLoader: loader })
    const local = { "@import": "http://example.org/base.jsonld", "age": "http://example.org/age" }

    await dereferenceContext(local, null, remoteOptions)
    const context = processContext(initial(), local, null, remoteOptions)

    expect(context.termDefinitions.get("name")?.["@id"]).toBe("http://schema.org/name")
    expect(context.termDefinitions.get("age")?.["@id"]).toBe("http://example.org/age")
  })

  it("reports a context that includes itself", async () => {
    const loader = createCachingDocumentLoader()
    loader.addDocument("http://example.org/loop.jsonld", { "@context": "http://example.org/loop.jsonld" })
    const document = { "@context": "http://example.org/loop.jsonld", "@id": "http://example.org/a" }

    await expect(expand(document, { documentLoader: loader })).rejects.toThrow("recursive context inclusion")
  })

  it("reports contexts that cannot be loaded", async () => {
    const document = { "@context": "http://example.org/missing.jsonld", "@id": "http://example.org/a" }

    await expect(expand(document, { documentLoader: rejectingDocumentLoader })).rejects.toMatchObject({
      code: "loading remote context failed",
    })
  })
})

describe("term selection", () => {
  it("prefers the term whose language matches", () => {
    const context = processContext(initial(), {
      "name": "http://schema.org/name",
      "label": { "@id": "http://schema.org/name", "@language": "en" },
    }, null, options)

    expect(selectTerm(context, "http://schema.org/name", ["@none"], "@language", ["en", "@none"])).toBe("label")
    expect(selectTerm(context, "http://schema.org/name", ["@none"], "@language", ["@null", "@none"])).toBe("name")
    expect(selectTerm(context, "http://example.org/unknown", ["@none"], "@language", ["@none"])).toBeNull()
  })
})
