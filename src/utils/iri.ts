import type { IRI } from "../types/basic.ts"

interface ParsedIri {
  scheme?: string
  authority?: string
  path: string
  query?: string
  fragment?: string
}

// RFC 3986, appendix B
const IRI_PARTS = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s

function parseIri(value: string): ParsedIri {
  const match = IRI_PARTS.exec(value)
  if (match === null) return { path: value }
  return {
    scheme: match[1],
    authority: match[2],
    path: match[3] ?? "",
    query: match[4],
    fragment: match[5],
  }
}

function composeIri(parts: ParsedIri): string {
  let result = ""
  if (parts.scheme !== undefined) result += `${parts.scheme}:`
  if (parts.authority !== undefined) result += `//${parts.authority}`
  result += parts.path
  if (parts.query !== undefined) result += `?${parts.query}`
  if (parts.fragment !== undefined) result += `#${parts.fragment}`
  return result
}

/**
 * Remove `.` and `..` segments from a path.
 *
 * @see https://www.rfc-editor.org/rfc/rfc3986#section-5.2.4
 */
export function removeDotSegments(path: string): string {
  let input = path
  const output: Array<string> = []

  while (input.length > 0) {
    if (input.startsWith("../")) {
      input = input.slice(3)
    } else if (input.startsWith("./")) {
      input = input.slice(2)
    } else if (input.startsWith("/./")) {
      input = input.slice(2)
    } else if (input === "/.") {
      input = "/"
    } else if (input.startsWith("/../")) {
      input = input.slice(3)
      output.pop()
    } else if (input === "/..") {
      input = "/"
      output.pop()
    } else if (input === "." || input === "..") {
      input = ""
    } else {
      const next = input.indexOf("/", input.startsWith("/") ? 1 : 0)
      const segment = next === -1 ? input : input.slice(0, next)
      output.push(segment)
      input = input.slice(segment.length)
    }
  }

  return output.join("")
}

/**
 * Resolve a (possibly relative) IRI reference against a base IRI. With a `null` base the reference is returned
 * unchanged.
 *
 * @see https://www.rfc-editor.org/rfc/rfc3986#section-5.2.2
 */
export function resolveIri(base: IRI | null, reference: string): string {
  if (base === null || base === "") return reference

  const r = parseIri(reference)
  if (r.scheme !== undefined) return reference

  const b = parseIri(base)
  const target: ParsedIri = { scheme: b.scheme, fragment: r.fragment, path: "" }

  if (r.authority !== undefined) {
    target.authority = r.authority
    target.path = removeDotSegments(r.path)
    target.query = r.query
  } else {
    target.authority = b.authority
    if (r.path === "") {
      target.path = b.path
      target.query = r.query ?? b.query
    } else {
      if (r.path.startsWith("/")) {
        target.path = removeDotSegments(r.path)
      } else if (b.authority !== undefined && b.path === "") {
        target.path = removeDotSegments(`/${r.path}`)
      } else {
        target.path = removeDotSegments(b.path.slice(0, b.path.lastIndexOf("/") + 1) + r.path)
      }
      target.query = r.query
    }
  }

  return composeIri(target)
}

/**
 * Turn an absolute IRI into a reference relative to the base IRI, the inverse of `resolveIri`. IRIs that do not share
 * the base's scheme and authority are returned unchanged.
 */
export function removeBase(base: IRI | null, iri: IRI): string {
  if (base === null || base === "") return iri

  const b = parseIri(base)
  let root = ""
  if (b.scheme !== undefined) root += `${b.scheme}:`
  if (b.authority !== undefined) root += `//${b.authority}`
  if (!iri.startsWith(root)) return iri

  const rel = parseIri(iri.slice(root.length))
  const baseSegments = removeDotSegments(b.path).split("/")
  const iriSegments = removeDotSegments(rel.path).split("/")

  // the last segment is only consumed when a query or fragment follows it
  const last = rel.fragment === undefined && rel.query === undefined ? 1 : 0
  while (baseSegments.length > 0 && iriSegments.length > last) {
    if (baseSegments[0] !== iriSegments[0]) break
    baseSegments.shift()
    iriSegments.shift()
  }

  let result = ""
  if (baseSegments.length > 0) {
    baseSegments.pop()
    result += "../".repeat(baseSegments.length)
  }
  result += iriSegments.join("/")

  if (rel.query !== undefined) result += `?${rel.query}`
  if (rel.fragment !== undefined) result += `#${rel.fragment}`

  return result === "" ? "./" : result
}
