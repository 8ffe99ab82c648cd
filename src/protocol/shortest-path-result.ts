import { VertexId } from './edge'

/**
 * Distances and parents for every vertex of the graph a search ran on.
 * Unreached vertices have `dist[v] === Infinity` and `parent[v] === null`.
 */
export interface ShortestPathResult {
  dist: number[]
  parent: (VertexId | null)[]
  /** Only Bellman-Ford sets this. When true, `dist` and `parent` are not trustworthy. */
  hasNegativeCycle: boolean
}

export const createShortestPathResult = (vertexCount: number): ShortestPathResult => ({
  dist: new Array<number>(vertexCount).fill(Infinity),
  parent: new Array<VertexId | null>(vertexCount).fill(null),
  hasNegativeCycle: false,
})
