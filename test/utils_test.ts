import { describe, expect, it } from "vitest"
import type { JsonObject } from "../src/types/document.ts"
import { checkVersion, isWellFormedLanguage, toProcessingMode } from "../src/utils/context.ts"
import { removeBase, resolveIri } from "../src/utils/iri.ts"
import { canonicalizeJson } from "../src/utils/json.ts"
import { isAbsoluteIri, isBlankNodeIdentifier, toContainer } from "../src/utils/type.ts"
import { addValue, compareShortestLeast } from "../src/utils/value.ts"

describe("version checking", () => {
  it("accepts bare and prefixed versions", () => {
    expect(checkVersion("1.1", 1.1)).toBe(true)
    expect(checkVersion("json-ld-1.1", 1.1)).toBe(true)
    expect(checkVersion(1.1, 1.1)).toBe(true)
    expect(checkVersion("1.0", 1.0)).toBe(true)
    expect(checkVersion("json-ld-1.0", 1.0)).toBe(true)
    expect(checkVersion(1.0, 1.0)).toBe(true)
    expect(checkVersion("json-ld-1.0", 1.1)).toBe(false)
  })

  it("narrows processing modes", () => {
    expect(toProcessingMode("1.0")).toBe("json-ld-1.0")
    expect(toProcessingMode(1.1)).toBe("json-ld-1.1")
    expect(toProcessingMode("json-ld-2.0")).toBeNull()
  })
})

describe("IRI resolution", () => {
  const base = "http://example.com/a/b?q#f"

  it("resolves references against a base", () => {
    expect(resolveIri(base, "c")).toBe("http://example.com/a/c")
    expect(resolveIri(base, "../c")).toBe("http://example.com/c")
    expect(resolveIri(base, "/x/./y/../z")).toBe("http://example.com/x/z")
    expect(resolveIri(base, "#frag")).toBe("http://example.com/a/b?q#frag")
    expect(resolveIri(base, "?other")).toBe("http://example.com/a/b?other")
    expect(resolveIri(base, "//other.org/p")).toBe("http://other.org/p")
    expect(resolveIri(base, "urn:x:y")).toBe("urn:x:y")
  })

  it("leaves references alone without a base", () => {
    expect(resolveIri(null, "relative")).toBe("relative")
  })

  it("makes IRIs relative to a base", () => {
    const base = "http://example.com/a/b"
    expect(removeBase(base, "http://example.com/a/c")).toBe("c")
    expect(removeBase(base, "http://example.com/x/y")).toBe("../x/y")
    expect(removeBase(base, "http://example.com/a/b#x")).toBe("#x")
    expect(removeBase(base, "http://other.org/a")).toBe("http://other.org/a")
  })
})

describe("canonical JSON", () => {
  it("sorts keys and drops whitespace", () => {
    const value = { b: [1, "x"], a: { d: null, c: true } }
    expect(canonicalizeJson(value)).toBe('{"a":{"c":true,"d":null},"b":[1,"x"]}')
  })

  it("writes numbers in their shortest form", () => {
    expect(canonicalizeJson(1e21)).toBe("1e+21")
    expect(canonicalizeJson(0.1)).toBe("0.1")
    expect(canonicalizeJson(-0)).toBe("0")
  })

  it("escapes control characters", () => {
    expect(canonicalizeJson("a\u0007\n")).toBe('"a\\u0007\\n"')
  })
})

describe("type guards", () => {
  it("tells IRIs and blank node identifiers apart", () => {
    expect(isAbsoluteIri("http://example.com/")).toBe(true)
    expect(isAbsoluteIri("relative/path")).toBe(false)
    expect(isBlankNodeIdentifier("_:b0")).toBe(true)
    expect(isBlankNodeIdentifier("http://example.com/")).toBe(false)
  })

  it("normalizes container mappings", () => {
    expect(toContainer("@list")).toEqual(["@list"])
    expect(toContainer(["@graph", "@id"])).toEqual(["@graph", "@id"])
    expect(toContainer("@unknown")).toBeNull()
  })

  it("language tags", () => {
    expect(isWellFormedLanguage("en-US")).toBe(true)
    expect(isWellFormedLanguage("not a tag")).toBe(false)
  })
})

describe("value helpers", () => {
  it("orders terms shortest first", () => {
    expect(["bb", "a", "ab"].sort(compareShortestLeast)).toEqual(["a", "ab", "bb"])
  })

  it("adds values without duplicates", () => {
    const subject: JsonObject = { "@id": "http://example.com/s" }
    addValue(subject, "p", { "@value": 1 }, { propertyIsArray: true, allowDuplicate: false })
    addValue(subject, "p", { "@value": 1 }, { propertyIsArray: true, allowDuplicate: false })
    addValue(subject, "q", "x")
    expect(subject).toEqual({ "@id": "http://example.com/s", p: [{ "@value": 1 }], q: "x" })
  })
})
