import { createHash } from "node:crypto"

import { JsonLdError } from "../error.ts"
import type { CanonicalizationAlgorithm, ProcessingOptions } from "../options.ts"
import type { Quad, RdfTerm } from "../types/rdf.ts"
import type { RdfDataset } from "../utils/dataset.ts"
import { serializeQuad } from "../utils/nquads.ts"
import { compareCodeUnits } from "../utils/value.ts"
import { IdentifierIssuer } from "./flatten.ts"

type Position = "s" | "o" | "g" | "p" | "r"

interface BlankNodeInfo {
  quads: Array<Quad>
  hash: string | null
}

interface HashResult {
  hash: string
  issuer: IdentifierIssuer
}

/**
 * Every permutation of `items`, in lexicographic order.
 */
function* permutations(items: Array<string>): Generator<Array<string>> {
  const current = [...items].sort(compareCodeUnits)
  while (true) {
    yield [...current]

    let i = current.length - 2
    while (i >= 0 && current[i] >= current[i + 1]) i--
    if (i < 0) return

    let j = current.length - 1
    while (current[j] <= current[i]) j--
    const swap = current[i]
    current[i] = current[j]
    current[j] = swap
    current.splice(i + 1, current.length - i - 1, ...current.slice(i + 1).reverse())
  }
}

function isBlankNodeTerm(term: RdfTerm): boolean {
  return term.termType === "BlankNode"
}

/**
 * One canonicalization run. URDNA2015 hashes with SHA-256; URGNA2012 hashes with SHA-1, labels the graph of a quad
 * `_:g` in first degree hashes and only relates blank nodes through subjects and objects.
 */
class Canonicalizer {
  private readonly algorithm: CanonicalizationAlgorithm
  private readonly blankNodeInfo: Map<string, BlankNodeInfo> = new Map()
  private readonly canonicalIssuer: IdentifierIssuer = new IdentifierIssuer("_:c14n")
  private readonly maxWorkFactor: number
  private maxDeepIterations: number | null
  private deepIterations: number = 0

  constructor(options: Pick<ProcessingOptions, "algorithm" | "maxDeepIterations" | "maxWorkFactor">) {
    this.algorithm = options.algorithm
    this.maxDeepIterations = options.maxDeepIterations
    this.maxWorkFactor = options.maxWorkFactor
  }

  private hash(input: string): string {
    return createHash(this.algorithm === "URDNA2015" ? "sha256" : "sha1").update(input).digest("hex")
  }

  canonize(dataset: RdfDataset): string {
    const quads = dataset.quads()

    // 1 & 2: the quads each blank node occurs in
    for (const quad of quads) {
      for (const term of [quad.subject, quad.object, quad.graph]) {
        if (!isBlankNodeTerm(term)) continue
        const info = this.blankNodeInfo.get(term.value)
        if (info === undefined) {
          this.blankNodeInfo.set(term.value, { quads: [quad], hash: null })
        } else if (!info.quads.includes(quad)) {
          info.quads.push(quad)
        }
      }
    }

    // 3 - 5: first degree hashes; nodes with a unique hash are labelled right away
    const hashToBlankNodes = new Map<string, Array<string>>()
    for (const id of this.blankNodeInfo.keys()) {
      const hash = this.hashFirstDegreeQuads(id)
      const ids = hashToBlankNodes.get(hash)
      if (ids === undefined) hashToBlankNodes.set(hash, [id])
      else ids.push(id)
    }

    const nonUnique: Array<Array<string>> = []
    for (const hash of [...hashToBlankNodes.keys()].sort(compareCodeUnits)) {
      const ids = hashToBlankNodes.get(hash) ?? []
      if (ids.length > 1) {
        nonUnique.push(ids)
      } else {
        this.canonicalIssuer.getId(ids[0])
      }
    }

    const nonUniqueCount = nonUnique.reduce((count, ids) => count + ids.length, 0)
    this.maxDeepIterations ??= nonUniqueCount ** this.maxWorkFactor

    // 6: the rest are told apart by the paths that reach them
    for (const ids of nonUnique) {
      const hashPathList: Array<HashResult> = []
      for (const id of ids) {
        if (this.canonicalIssuer.hasId(id)) continue
        const issuer = new IdentifierIssuer("_:b")
        issuer.getId(id)
        hashPathList.push(this.hashNDegreeQuads(id, issuer))
      }

      hashPathList.sort((a, b) => compareCodeUnits(a.hash, b.hash))
      for (const result of hashPathList) {
        for (const existing of result.issuer.getOldIds()) {
          this.canonicalIssuer.getId(existing)
        }
      }
    }

    // 7: relabel
    const lines = quads.map((quad) => serializeQuad(this.relabel(quad)))
    return lines.sort(compareCodeUnits).join("")
  }

  private relabel(quad: Quad): Quad {
    const label = <T extends RdfTerm>(term: T): T =>
      term.termType === "BlankNode" ? { ...term, value: this.canonicalIssuer.getId(term.value) } : term
    return {
      subject: label(quad.subject),
      predicate: quad.predicate,
      object: label(quad.object),
      graph: label(quad.graph),
    }
  }

  private hashFirstDegreeQuads(id: string): string {
    const info = this.blankNodeInfo.get(id)
    if (info === undefined) return ""
    if (info.hash !== null) return info.hash

    const label = <T extends RdfTerm>(term: T, graph: boolean): T => {
      if (term.termType !== "BlankNode") return term
      if (graph && this.algorithm === "URGNA2012") return { ...term, value: "_:g" }
      return { ...term, value: term.value === id ? "_:a" : "_:z" }
    }

    const nquads = info.quads.map((quad) =>
      serializeQuad({
        subject: label(quad.subject, false),
        predicate: quad.predicate,
        object: label(quad.object, false),
        graph: label(quad.graph, true),
      })
    )
    info.hash = this.hash(nquads.sort(compareCodeUnits).join(""))
    return info.hash
  }

  private hashRelatedBlankNode(related: string, quad: Quad, issuer: IdentifierIssuer, position: Position): string {
    let id: string
    if (this.canonicalIssuer.hasId(related)) id = this.canonicalIssuer.getId(related)
    else if (issuer.hasId(related)) id = issuer.getId(related)
    else id = this.hashFirstDegreeQuads(related)

    const predicate = this.algorithm === "URDNA2015" ? `<${quad.predicate.value}>` : quad.predicate.value
    return this.hash(position === "g" ? `${position}${id}` : `${position}${predicate}${id}`)
  }

  private createHashToRelated(id: string, issuer: IdentifierIssuer): Map<string, Array<string>> {
    const hashToRelated = new Map<string, Array<string>>()
    const add = (related: string, quad: Quad, position: Position): void => {
      const hash = this.hashRelatedBlankNode(related, quad, issuer, position)
      const list = hashToRelated.get(hash)
      if (list === undefined) hashToRelated.set(hash, [related])
      else list.push(related)
    }

    for (const quad of this.blankNodeInfo.get(id)?.quads ?? []) {
      if (this.algorithm === "URGNA2012") {
        if (isBlankNodeTerm(quad.subject) && quad.subject.value !== id) add(quad.subject.value, quad, "p")
        else if (isBlankNodeTerm(quad.object) && quad.object.value !== id) add(quad.object.value, quad, "r")
        continue
      }

      if (isBlankNodeTerm(quad.subject) && quad.subject.value !== id) add(quad.subject.value, quad, "s")
      if (isBlankNodeTerm(quad.object) && quad.object.value !== id) add(quad.object.value, quad, "o")
      if (isBlankNodeTerm(quad.graph) && quad.graph.value !== id) add(quad.graph.value, quad, "g")
    }

    return hashToRelated
  }

  private hashNDegreeQuads(id: string, issuer: IdentifierIssuer): HashResult {
    const limit = this.maxDeepIterations ?? Infinity
    if (this.deepIterations >= limit) {
      throw new JsonLdError(
        "canonicalization complexity exceeded",
        `more than ${limit} deep iterations are needed to canonicalize the dataset`,
        { limit },
      )
    }
    this.deepIterations += 1

    const hashToRelated = this.createHashToRelated(id, issuer)
    let data = ""

    for (const hash of [...hashToRelated.keys()].sort(compareCodeUnits)) {
      data += hash
      let chosenPath = ""
      let chosenIssuer: IdentifierIssuer | null = null

      for (const permutation of permutations(hashToRelated.get(hash) ?? [])) {
        let issuerCopy = issuer.clone()
        let path = ""
        const recursionList: Array<string> = []
        let skip = false

        for (const related of permutation) {
          if (this.canonicalIssuer.hasId(related)) {
            path += this.canonicalIssuer.getId(related)
          } else {
            if (!issuerCopy.hasId(related)) recursionList.push(related)
            path += issuerCopy.getId(related)
          }
          if (chosenPath.length !== 0 && path > chosenPath) {
            skip = true
            break
          }
        }
        if (skip) continue

        for (const related of recursionList) {
          const result = this.hashNDegreeQuads(related, issuerCopy)
          path += `${issuerCopy.getId(related)}<${result.hash}>`
          issuerCopy = result.issuer
          if (chosenPath.length !== 0 && path > chosenPath) {
            skip = true
            break
          }
        }
        if (skip) continue

        if (chosenPath.length === 0 || path < chosenPath) {
          chosenPath = path
          chosenIssuer = issuerCopy
        }
      }

      data += chosenPath
      if (chosenIssuer !== null) issuer = chosenIssuer
    }

    return { hash: this.hash(data), issuer }
  }
}

/**
 * Canonicalize a dataset: blank nodes get the labels `_:c14n0`, `_:c14n1`, ... in an order that only depends on the
 * structure of the dataset, so isomorphic datasets serialize identically.
 *
 * @param dataset The dataset to canonicalize.
 * @param options Picks the algorithm and bounds its work.
 *
 * @returns The canonical N-Quads, one line per quad, lines in code unit order.
 *
 * @throws {JsonLdError} `canonicalization complexity exceeded` when telling the blank nodes apart takes more Hash
 *   N-Degree Quads invocations than `maxDeepIterations` (by default the number of blank nodes without a unique first
 *   degree hash, raised to the power `maxWorkFactor`).
 */
export function canonize(
  dataset: RdfDataset,
  options: Pick<ProcessingOptions, "algorithm" | "maxDeepIterations" | "maxWorkFactor">,
): string {
  return new Canonicalizer(options).canonize(dataset)
}
