import { readFile as readFileFromDisk } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { JsonLdError } from "./error.ts"
import type { JsonValue } from "./types/document.ts"
import { resolveIri } from "./utils/iri.ts"

/**
 * A document retrieved by a document loader.
 *
 * @see https://www.w3.org/TR/json-ld11-api/#remotedocument
 */
export interface RemoteDocument {
  /** The final URL of the document, after redirects. Relative references inside it resolve against this URL. */
  documentUrl: string
  document: JsonValue
  contentType: string | null
  /** The context referenced by an HTTP `Link` header, if any. */
  contextUrl: string | null
}

/**
 * Retrieves remote documents and contexts. It is the only place the processor waits on the outside world.
 */
export type DocumentLoader = (url: string) => Promise<RemoteDocument>

export interface LinkHeader {
  target: string
  params: Record<string, string>
}

export const LINK_HEADER_CONTEXT = "http://www.w3.org/ns/json-ld#context"

const ACCEPT_HEADER = "application/ld+json, application/json;q=0.9, */*;q=0.1"
const MAX_ALTERNATE_REDIRECTS = 1

const LINK_HEADERS = /(?:<[^>]*?>|"[^"]*?"|[^,])+/g
const LINK_HEADER = /\s*<([^>]*?)>\s*(?:;\s*(.*))?/
const LINK_HEADER_PARAMS = /(.*?)=(?:(?:"([^"]*?)")|([^"]*?))\s*(?:(?:;\s*)|$)/g

/**
 * Parse an HTTP `Link` header into its links, grouped by their `rel` parameter.
 *
 * @example
 * ```ts
 * parseLinkHeader('<ctx.jsonld>; rel="http://www.w3.org/ns/json-ld#context"')
 * // Map { "http://www.w3.org/ns/json-ld#context" => [{ target: "ctx.jsonld", params: { rel: "..." } }] }
 * ```
 */
export function parseLinkHeader(header: string): Map<string, Array<LinkHeader>> {
  const result = new Map<string, Array<LinkHeader>>()

  for (const entry of header.match(LINK_HEADERS) ?? []) {
    const match = LINK_HEADER.exec(entry)
    if (match === null) continue

    const link: LinkHeader = { target: match[1], params: {} }
    const params = match[2] ?? ""
    for (const param of params.matchAll(LINK_HEADER_PARAMS)) {
      if (param[1] === "") continue
      link.params[param[1].trim()] = param[2] ?? param[3]
    }

    const rel = link.params.rel ?? ""
    const links = result.get(rel) ?? []
    links.push(link)
    result.set(rel, links)
  }

  return result
}

function parseJson(text: string, url: string): JsonValue {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new JsonLdError("loading document failed", `${url} is not valid JSON`, { url }, { cause: error })
  }
}

function mediaType(header: string | null): string | null {
  if (header === null) return null
  return header.split(";")[0].trim().toLowerCase()
}

function isJsonMediaType(type: string | null): boolean {
  return type === "application/json" || type === "application/ld+json" || (type?.endsWith("+json") ?? false)
}

export interface NodeDocumentLoaderOptions {
  /** Replaces the global `fetch` for `http:` and `https:` URLs. */
  fetch?: typeof fetch
  /** Replaces the file system read for every other URL. */
  readFile?: (path: string) => Promise<string>
}

/**
 * The default document loader: `http:` and `https:` URLs are fetched with the JSON-LD `Accept` header and their
 * `Link` headers honoured, `file:` URLs and plain paths are read from disk. Failures surface as
 * `loading document failed`; nothing is retried.
 */
export function createNodeDocumentLoader(options: NodeDocumentLoaderOptions = {}): DocumentLoader {
  const fetchDocument = options.fetch ?? fetch
  const readFile = options.readFile ?? ((path: string) => readFileFromDisk(path, "utf8"))

  async function loadHttp(url: string, alternates: number): Promise<RemoteDocument> {
    let response: Response
    try {
      response = await fetchDocument(url, { headers: { Accept: ACCEPT_HEADER }, redirect: "follow" })
    } catch (error) {
      throw new JsonLdError("loading document failed", `could not retrieve ${url}`, { url }, { cause: error })
    }
    if (!response.ok) {
      throw new JsonLdError("loading document failed", `${url} answered ${response.status}`, {
        url,
        status: response.status,
      })
    }

    const documentUrl = response.url || url
    const contentType = mediaType(response.headers.get("content-type"))
    const linkHeader = response.headers.get("link")
    let contextUrl: string | null = null

    if (linkHeader !== null && contentType !== "application/ld+json") {
      const links = parseLinkHeader(linkHeader)

      const contexts = links.get(LINK_HEADER_CONTEXT) ?? []
      if (contexts.length > 1) {
        throw new JsonLdError("multiple context link headers", `${url} sent ${contexts.length} context links`, { url })
      }
      if (contexts.length === 1) {
        contextUrl = resolveIri(documentUrl, contexts[0].target)
      }

      // a non-JSON response may point at its JSON-LD representation
      const alternate = (links.get("alternate") ?? []).find((link) => link.params.type === "application/ld+json")
      if (!isJsonMediaType(contentType) && alternate !== undefined && alternates < MAX_ALTERNATE_REDIRECTS) {
        return loadHttp(resolveIri(documentUrl, alternate.target), alternates + 1)
      }
    }

    const text = await response.text()
    return { documentUrl, document: parseJson(text, url), contentType, contextUrl }
  }

  async function loadFile(url: string): Promise<RemoteDocument> {
    let text: string
    try {
      text = await readFile(url.startsWith("file:") ? fileURLToPath(url) : url)
    } catch (error) {
      throw new JsonLdError("loading document failed", `could not read ${url}`, { url }, { cause: error })
    }
    return { documentUrl: url, document: parseJson(text, url), contentType: "application/ld+json", contextUrl: null }
  }

  return (url: string) => {
    if (url.startsWith("http:") || url.startsWith("https:")) {
      return loadHttp(url, 0)
    }
    return loadFile(url)
  }
}

/**
 * A loader that fails for every URL, for callers that must never reach the network or the disk.
 */
export const rejectingDocumentLoader: DocumentLoader = (url: string) =>
  Promise.reject(new JsonLdError("loading document failed", `no document registered for ${url}`, { url }))

export interface CachingDocumentLoader extends DocumentLoader {
  /** Register a document that is then served for `url` without consulting the wrapped loader. */
  addDocument(url: string, document: JsonValue, contextUrl?: string | null): void
}

/**
 * Wrap a loader with a cache. Successful loads are remembered for the lifetime of the returned loader; failures are
 * not.
 */
export function createCachingDocumentLoader(next: DocumentLoader = rejectingDocumentLoader): CachingDocumentLoader {
  const documents = new Map<string, RemoteDocument>()

  const load = async (url: string): Promise<RemoteDocument> => {
    const cached = documents.get(url)
    if (cached !== undefined) return cached
    const remote = await next(url)
    documents.set(url, remote)
    return remote
  }

  return Object.assign(load, {
    addDocument(url: string, document: JsonValue, contextUrl: string | null = null): void {
      documents.set(url, { documentUrl: url, document, contentType: "application/ld+json", contextUrl })
    },
  })
}
