import { describe, expect, it } from "vitest"
import { getFrameFlag, validateFrame, valueMatch } from "../src/algorithms/frame.ts"
import { frame, rejectingDocumentLoader } from "../src/mod.ts"
import type { JsonObject } from "../src/mod.ts"
import { resolveOptions } from "../src/options.ts"

const options = { documentLoader: rejectingDocumentLoader }
const context = { "@vocab": "http://example.org/" }

const library: JsonObject = {
  "@context": context,
  "@graph": [
    { "@id": "http://example.org/library", "@type": "Library", "contains": { "@id": "http://example.org/book" } },
    { "@id": "http://example.org/book", "@type": "Book", "title": "Moby Dick" },
  ],
}

describe("frame", () => {
  it("embeds the nodes a match refers to", async () => {
    const framed = await frame(library, { "@context": context, "@type": "Library", "contains": { "@type": "Book" } }, {
      ...options,
    })

    expect(framed).toEqual({
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "contains": { "@id": "http://example.org/book", "@type": "Book", "title": "Moby Dick" },
    })
  })

  it("keeps references only with @embed @never", async () => {
    const framed = await frame(library, { "@context": context, "@type": "Library" }, { ...options, embed: "@never" })

    expect(framed).toEqual({
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "contains": { "@id": "http://example.org/book" },
    })
  })

  it("fills in defaults for missing properties", async () => {
    const framed = await frame(
      library,
      { "@context": context, "@type": "Book", "author": { "@default": "anonymous" }, "isbn": {} },
      options,
    )

    expect(framed).toEqual({
      "@context": context,
      "@id": "http://example.org/book",
      "@type": "Book",
      "title": "Moby Dick",
      "author": "anonymous",
      "isbn": null,
    })
  })

  it("leaves out properties the frame does not name when explicit", async () => {
    const framed = await frame(library, { "@context": context, "@type": "Book", "@explicit": true }, options)

    expect(framed).toEqual({
      "@context": context,
      "@id": "http://example.org/book",
      "@type": "Book",
    })
  })

  it("puts several matches under @graph", async () => {
    const framed = await frame(library, { "@context": context }, { ...options, embed: "@never" })

    expect(framed).toEqual({
      "@context": context,
      "@graph": [
        { "@id": "http://example.org/book", "@type": "Book", "title": "Moby Dick" },
        { "@id": "http://example.org/library", "@type": "Library", "contains": { "@id": "http://example.org/book" } },
      ],
    })
  })

  it("prunes blank node identifiers used once", async () => {
    const document = {
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "address": { "city": "Springfield" },
    }

    expect(await frame(document, { "@context": context, "@type": "Library" }, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "address": { "city": "Springfield" },
    })
    expect(
      await frame(document, { "@context": context, "@type": "Library" }, {
        ...options,
        pruneBlankNodeIdentifiers: false,
      }),
    ).toEqual({
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "address": { "@id": "_:b0", "city": "Springfield" },
    })
  })

  it("embeds nodes through every level of a nested frame", async () => {
    const document: JsonObject = {
      "@context": context,
      "@graph": [
        { "@id": "http://example.org/library", "@type": "Library", "contains": { "@id": "http://example.org/book" } },
        {
          "@id": "http://example.org/book",
          "@type": "Book",
          "title": "Moby Dick",
          "contains": { "@id": "http://example.org/chapter" },
        },
        { "@id": "http://example.org/chapter", "@type": "Chapter", "title": "Loomings" },
      ],
    }
    const shape = {
      "@context": context,
      "@type": "Library",
      "contains": { "@type": "Book", "contains": { "@type": "Chapter" } },
    }

    expect(await frame(document, shape, options)).toEqual({
      "@context": context,
      "@id": "http://example.org/library",
      "@type": "Library",
      "contains": {
        "@id": "http://example.org/book",
        "@type": "Book",
        "title": "Moby Dick",
        "contains": { "@id": "http://example.org/chapter", "@type": "Chapter", "title": "Loomings" },
      },
    })
  })

  it("keeps nulls inside JSON literals and contexts", async () => {
    const jsonContext = {
      "@vocab": "http://example.org/",
      "unused": null,
      "data": { "@id": "http://example.org/data", "@type": "@json" },
    }
    const document = { "@context": jsonContext, "@id": "http://example.org/x", "@type": "Record", "data": [1, null, 2] }

    expect(await frame(document, { "@context": jsonContext, "@type": "Record" }, options)).toEqual({
      "@context": jsonContext,
      "@id": "http://example.org/x",
      "@type": "Record",
      "data": [1, null, 2],
    })
  })

  it("prunes a blank node embedded inside a named graph", async () => {
    const document = {
      "@context": context,
      "@id": "http://example.org/g",
      "@graph": [{ "@id": "URN:example:a", "p": { "q": "x" } }],
    }

    const framed = await frame(document, { "@context": context, "@id": "http://example.org/g" }, {
      ...options,
      frameDefault: true,
    })

    expect(framed).toEqual({
      "@context": context,
      "@id": "http://example.org/g",
      "@graph": [{ "@id": "URN:example:a", "p": { "q": "x" } }],
    })
  })

  it("rejects a frame that is not a single map", async () => {
    await expect(frame(library, [{}, {}], options)).rejects.toThrow("invalid frame")
  })
})

describe("framing helpers", () => {
  it("validates frames", () => {
    expect(validateFrame([{ "@type": ["http://example.org/T"] }])).toEqual({ "@type": ["http://example.org/T"] })
    expect(() => validateFrame({ "@id": ["_:b0"] })).toThrow("invalid frame")
    expect(() => validateFrame({ "@type": ["relative"] })).toThrow("invalid frame")
  })

  it("reads flags from the frame before the options", () => {
    const resolved = resolveOptions({ ...options, embed: false, explicit: true })
    expect(getFrameFlag({}, resolved, "embed")).toBe("@never")
    expect(getFrameFlag({ "@embed": [true] }, resolved, "embed")).toBe("@once")
    expect(getFrameFlag({ "@embed": ["@always"] }, resolved, "embed")).toBe("@always")
    expect(getFrameFlag({}, resolved, "explicit")).toBe(true)
    expect(getFrameFlag({ "@explicit": [false] }, resolved, "explicit")).toBe(false)
    expect(() => getFrameFlag({ "@embed": ["@link"] }, resolved, "embed")).toThrow("invalid @embed value")
  })

  it("matches value patterns", () => {
    const value = { "@value": "hello", "@language": "en-US" }
    expect(valueMatch({ "@value": [{}] }, value)).toBe(false)
    expect(valueMatch({ "@value": [{}], "@language": ["EN-us"] }, value)).toBe(true)
    expect(valueMatch({ "@value": ["hello"], "@language": [{}] }, value)).toBe(true)
    expect(valueMatch({ "@value": ["bye"], "@language": [{}] }, value)).toBe(false)
  })
})
