import { Arc, Edge, VertexId } from './protocol/edge'
import { InvalidConfigurationError, OutOfRangeError } from './errors'

const assertVertexCount = (n: number) => {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidConfigurationError(`Vertex count must be a non-negative integer, got ${n}`)
  }
}

/**
 * Weighted adjacency-list graph over vertices `0..n-1`.
 *
 * An undirected graph stores every edge as two arcs, one per direction, except self-loops
 * which are stored once. `edgeCount()` halves the arc count accordingly.
 */
export class Graph {
  private adjacency: Edge[][]
  private directed: boolean

  constructor(vertexCount = 0, directed = true) {
    assertVertexCount(vertexCount)
    this.directed = directed
    this.adjacency = Array.from({ length: vertexCount }, () => [])
  }

  /** Transfers ownership of `source`'s storage into a new graph and leaves `source` empty. */
  static take(source: Graph): Graph {
    const graph = new Graph(0, source.directed)
    graph.moveFrom(source)
    return graph
  }

  vertexCount(): number {
    return this.adjacency.length
  }

  isDirected(): boolean {
    return this.directed
  }

  /** Weights must be finite; `Infinity` and `NaN` are rejected. */
  addEdge(u: VertexId, v: VertexId, weight: number) {
    this.assertVertex(u)
    this.assertVertex(v)
    if (!Number.isFinite(weight)) {
      throw new InvalidConfigurationError(`Edge weight must be a finite number, got ${weight}`)
    }
    this.adjacency[u].push({ to: v, weight })
    if (!this.directed && u !== v) {
      this.adjacency[v].push({ to: u, weight })
    }
  }

  /** Outgoing arcs of `u`, in insertion order. */
  neighbors(u: VertexId): readonly Readonly<Edge>[] {
    this.assertVertex(u)
    return this.adjacency[u]
  }

  edgeCount(): number {
    let arcs = 0
    for (const edges of this.adjacency) {
      arcs += edges.length
    }
    return this.directed ? arcs : Math.floor(arcs / 2)
  }

  /** Every stored arc, grouped by source vertex. Undirected edges show up once per direction. */
  *edges(): IterableIterator<Arc> {
    for (let from = 0; from < this.adjacency.length; from++) {
      for (const { to, weight } of this.adjacency[from]) {
        yield { from, to, weight }
      }
    }
  }

  /**
   * Grows or shrinks the vertex set. Shrinking drops the adjacency lists of removed vertices
   * but leaves arcs that point at them from surviving vertices in place.
   */
  resize(n: number) {
    assertVertexCount(n)
    if (n < this.adjacency.length) {
      this.adjacency.length = n
    } else {
      while (this.adjacency.length < n) {
        this.adjacency.push([])
      }
    }
  }

  /** Deep copy: the clone shares no adjacency storage with this graph. */
  clone(): Graph {
    const copy = new Graph(0, this.directed)
    copy.adjacency = this.adjacency.map((edges) => edges.map((edge) => ({ ...edge })))
    return copy
  }

  moveFrom(source: Graph) {
    if (source === this) {
      return
    }
    this.adjacency = source.adjacency
    this.directed = source.directed
    source.adjacency = []
  }

  private assertVertex(u: VertexId) {
    if (!Number.isInteger(u) || u < 0 || u >= this.adjacency.length) {
      throw new OutOfRangeError(`Vertex ${u} is outside [0, ${this.adjacency.length})`)
    }
  }
}
