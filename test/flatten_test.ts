import { describe, expect, it } from "vitest"
import { createNodeMap, IdentifierIssuer, mergeNodeMapGraphs } from "../src/algorithms/flatten.ts"
import { flatten, rejectingDocumentLoader } from "../src/mod.ts"
import type { NodeMap } from "../src/types/document.ts"

const options = { documentLoader: rejectingDocumentLoader }

describe("IdentifierIssuer", () => {
  it("issues stable identifiers in order", () => {
    const issuer = new IdentifierIssuer("_:b")
    expect(issuer.getId("_:x")).toBe("_:b0")
    expect(issuer.getId()).toBe("_:b1")
    expect(issuer.getId("_:y")).toBe("_:b2")
    expect(issuer.getId("_:x")).toBe("_:b0")
    expect(issuer.hasId("_:y")).toBe(true)
    expect(issuer.getOldIds()).toEqual(["_:x", "_:y"])
  })

  it("clones independently", () => {
    const issuer = new IdentifierIssuer("_:c")
    issuer.getId("_:a")
    const copy = issuer.clone()
    copy.getId("_:b")
    expect(issuer.hasId("_:b")).toBe(false)
    expect(issuer.getId("_:c")).toBe("_:c1")
  })
})

describe("node map generation", () => {
  it("collects the properties of a node from every place it occurs", () => {
    const nodeMap: NodeMap = { "@default": {} }
    createNodeMap([
      { "@id": "http://example.org/a", "http://example.org/p": [{ "@value": "x" }] },
      { "@id": "http://example.org/a", "http://example.org/p": [{ "@value": "y" }, { "@value": "x" }] },
    ], nodeMap, "@default", new IdentifierIssuer("_:b"))

    expect(nodeMap).toEqual({
      "@default": {
        "http://example.org/a": {
          "@id": "http://example.org/a",
          "http://example.org/p": [{ "@value": "x" }, { "@value": "y" }],
        },
      },
    })
  })

  it("merges all graphs for framing", () => {
    const nodeMap: NodeMap = {
      "@default": { "http://example.org/a": { "@id": "http://example.org/a", "http://example.org/p": ["1"] } },
      "http://example.org/g": {
        "http://example.org/a": { "@id": "http://example.org/a", "http://example.org/p": ["2"] },
      },
    }

    expect(mergeNodeMapGraphs(nodeMap)).toEqual({
      "http://example.org/a": { "@id": "http://example.org/a", "http://example.org/p": ["1", "2"] },
    })
  })

  it("reports conflicting indexes", () => {
    const nodeMap: NodeMap = { "@default": {} }
    const element = [
      { "@id": "http://example.org/a", "@index": "one" },
      { "@id": "http://example.org/a", "@index": "two" },
    ]

    expect(() => createNodeMap(element, nodeMap, "@default", new IdentifierIssuer("_:b")))
      .toThrow("conflicting indexes")
  })
})

describe("flatten", () => {
  it("lifts embedded nodes to the top and labels blank nodes", async () => {
    const document = {
      "@context": { "@vocab": "http://example.org/" },
      "@id": "http://example.org/alice",
      "knows": { "name": "Bob" },
    }

    expect(await flatten(document, null, options)).toEqual([
      { "@id": "_:b0", "http://example.org/name": [{ "@value": "Bob" }] },
      { "@id": "http://example.org/alice", "http://example.org/knows": [{ "@id": "_:b0" }] },
    ])
  })

  it("relabels existing blank node identifiers", async () => {
    const document = [
      { "@id": "_:z", "http://example.org/p": { "@id": "_:y" } },
      { "@id": "_:y", "http://example.org/p": "leaf" },
    ]

    expect(await flatten(document, null, options)).toEqual([
      { "@id": "_:b0", "http://example.org/p": [{ "@id": "_:b1" }] },
      { "@id": "_:b1", "http://example.org/p": [{ "@value": "leaf" }] },
    ])
  })

  it("embeds named graphs in the node naming them", async () => {
    const document = {
      "@id": "http://example.org/g",
      "@graph": [{ "@id": "http://example.org/a", "http://example.org/p": "x" }],
    }

    expect(await flatten(document, null, options)).toEqual([
      {
        "@id": "http://example.org/g",
        "@graph": [{ "@id": "http://example.org/a", "http://example.org/p": [{ "@value": "x" }] }],
      },
    ])
  })

  it("compacts the flattened document under @graph", async () => {
    const document = {
      "@context": { "@vocab": "http://example.org/" },
      "@id": "http://example.org/alice",
      "knows": { "@id": "http://example.org/bob", "name": "Bob" },
    }
    const context = { "@vocab": "http://example.org/" }

    expect(await flatten(document, context, options)).toEqual({
      "@context": context,
      "@graph": [
        { "@id": "http://example.org/alice", "knows": { "@id": "http://example.org/bob" } },
        { "@id": "http://example.org/bob", "name": "Bob" },
      ],
    })
  })
})
