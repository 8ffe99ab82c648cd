export type VertexId = number

/** A directed arc, owned by the adjacency list of its source vertex. */
export interface Edge {
  to: VertexId
  weight: number
}

/** An arc together with its source vertex, as produced by `Graph.edges()`. */
export interface Arc extends Edge {
  from: VertexId
}
