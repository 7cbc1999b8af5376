import fc from "fast-check"
import { describe, expect, it } from "vitest"
import { canonize } from "../src/algorithms/canonize.ts"
import { normalize, rejectingDocumentLoader } from "../src/mod.ts"
import { resolveOptions } from "../src/options.ts"
import { parseNQuads } from "../src/utils/nquads.ts"

const options = { documentLoader: rejectingDocumentLoader }
const nquads = { ...options, inputFormat: "application/n-quads" } as const

const cycle = "_:a <http://example.org/p> _:b .\n_:b <http://example.org/p> _:a .\n"

describe("canonize", () => {
  it("labels blank nodes that only their neighbours tell apart", () => {
    expect(canonize(parseNQuads(cycle), resolveOptions(options))).toBe(
      "_:c14n0 <http://example.org/p> _:c14n1 .\n_:c14n1 <http://example.org/p> _:c14n0 .\n",
    )
  })

  it("tells a cycle apart from two self-loops", () => {
    const loops = "_:a <http://example.org/p> _:a .\n_:b <http://example.org/p> _:b .\n"

    const canonical = canonize(parseNQuads(loops), resolveOptions(options))
    expect(canonical).toBe("_:c14n0 <http://example.org/p> _:c14n0 .\n_:c14n1 <http://example.org/p> _:c14n1 .\n")
    expect(canonical).not.toBe(canonize(parseNQuads(cycle), resolveOptions(options)))
  })

  it("gives up once the deep iteration limit is reached", () => {
    expect(() => canonize(parseNQuads(cycle), resolveOptions({ ...options, maxDeepIterations: 3 })))
      .toThrow("canonicalization complexity exceeded")
    expect(() => canonize(parseNQuads(cycle), resolveOptions({ ...options, maxDeepIterations: 4 }))).not.toThrow()
  })

  it("derives the limit from the work factor", () => {
    // two blank nodes without a unique hash need four iterations: 2 ** 1 is too few, 2 ** 2 is enough
    expect(() => canonize(parseNQuads(cycle), resolveOptions({ ...options, maxWorkFactor: 1 })))
      .toThrow("canonicalization complexity exceeded")
    expect(() => canonize(parseNQuads(cycle), resolveOptions({ ...options, maxWorkFactor: 2 }))).not.toThrow()
  })

  it.each(["URDNA2015", "URGNA2012"] as const)("gives isomorphic datasets the same output with %s", (algorithm) => {
    const first = parseNQuads([
      '_:x <http://example.org/name> "Alice" .',
      "_:x <http://example.org/knows> _:y .",
      '_:y <http://example.org/name> "Bob" .',
    ].join("\n"))
    const second = parseNQuads([
      '_:n2 <http://example.org/name> "Bob" .',
      "_:n1 <http://example.org/knows> _:n2 .",
      '_:n1 <http://example.org/name> "Alice" .',
    ].join("\n"))

    const canonical = canonize(first, resolveOptions({ ...options, algorithm }))
    expect(canonize(second, resolveOptions({ ...options, algorithm }))).toBe(canonical)
    expect(canonical.split("\n")).toHaveLength(4)
    expect(canonical).not.toMatch(/_:(x|y|n1|n2) /)
  })

  it("does not depend on quad order or blank node labels", () => {
    const quads = (label: (name: string) => string) => [
      `${label("a")} <http://example.org/p> ${label("b")} .`,
      `${label("b")} <http://example.org/p> ${label("c")} .`,
      `${label("c")} <http://example.org/p> ${label("a")} .`,
      `${label("a")} <http://example.org/q> "x" .`,
    ]
    const expected = canonize(parseNQuads(quads((name) => `_:${name}`).join("\n")), resolveOptions(options))

    fc.assert(
      fc.property(
        fc.shuffledSubarray([0, 1, 2, 3], { minLength: 4 }),
        fc.stringMatching(/^[a-z]{1,6}$/),
        (order, prefix) => {
          const lines = quads((name) => `_:${prefix}${name}`)
          const text = order.map((index) => lines[index]).join("\n")
          expect(canonize(parseNQuads(text), resolveOptions(options))).toBe(expected)
        },
      ),
      { numRuns: 50 },
    )
  })
})

describe("normalize", () => {
  const expected = '<http://example.org/s> <http://example.org/p> _:c14n0 .\n_:c14n0 <http://example.org/q> "x" .\n'

  it("canonicalizes documents", async () => {
    const document = { "@id": "http://example.org/s", "http://example.org/p": { "http://example.org/q": "x" } }

    expect(await normalize(document, options)).toBe(expected)
  })

  it("canonicalizes N-Quads", async () => {
    const text = '_:foo <http://example.org/q> "x" .\n<http://example.org/s> <http://example.org/p> _:foo .\n'

    expect(await normalize(text, nquads)).toBe(expected)
  })

  it("wants text for N-Quads input", async () => {
    await expect(normalize({}, nquads)).rejects.toThrow("syntax error")
  })
})
