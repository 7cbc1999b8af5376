import type { GraphTerm, Quad, RdfTerm } from "../types/rdf.ts"

function termKey(term: RdfTerm): string {
  if (term.termType === "Literal") {
    return `L${JSON.stringify([term.value, term.datatype, term.language ?? ""])}`
  }
  return `${term.termType[0]}${term.value}`
}

function quadKey(quad: Quad): string {
  return `${termKey(quad.subject)} ${termKey(quad.predicate)} ${termKey(quad.object)}`
}

/**
 * The name a graph is filed under: `@default` for the default graph, the IRI or blank node identifier otherwise.
 */
export function graphName(graph: GraphTerm): string {
  return graph.termType === "DefaultGraph" ? "@default" : graph.value
}

/**
 * An RDF dataset: the quads of each graph, keyed by graph name. A graph never holds the same triple twice.
 */
export class RdfDataset {
  readonly graphs: Map<string, Array<Quad>> = new Map()
  private readonly seen: Map<string, Set<string>> = new Map()

  /**
   * Add a quad to the graph it names, unless the graph already holds the same triple.
   *
   * @returns `true` if the quad was added.
   */
  add(quad: Quad): boolean {
    const name = graphName(quad.graph)
    const key = quadKey(quad)

    let seen = this.seen.get(name)
    if (seen === undefined) {
      seen = new Set()
      this.seen.set(name, seen)
    }
    if (seen.has(key)) return false
    seen.add(key)

    const quads = this.graphs.get(name)
    if (quads === undefined) {
      this.graphs.set(name, [quad])
    } else {
      quads.push(quad)
    }
    return true
  }

  /** Every quad of the dataset, graph by graph. */
  quads(): Array<Quad> {
    return [...this.graphs.values()].flat()
  }

  get size(): number {
    let size = 0
    for (const quads of this.graphs.values()) size += quads.length
    return size
  }

  static from(quads: Iterable<Quad>): RdfDataset {
    const dataset = new RdfDataset()
    for (const quad of quads) dataset.add(quad)
    return dataset
  }
}
