import { Graph } from './graph'
import { VertexId } from './protocol/edge'
import { ShortestPathResult } from './protocol/shortest-path-result'

/**
 * Presentation of graphs and search results. The algorithms never call this; the command runner
 * is handed one and decides what to show.
 */
export interface GraphRenderer {
  renderGraph(graph: Graph): void
  renderResult(result: ShortestPathResult): void
  renderPath(path: readonly VertexId[]): void
}

export const formatGraph = (graph: Graph): string => {
  const kind = graph.isDirected() ? 'Directed' : 'Undirected'
  const lines = [`${kind} graph, vertices: ${graph.vertexCount()}, edges: ${graph.edgeCount()}`]
  for (let u = 0; u < graph.vertexCount(); u++) {
    const arcs = graph.neighbors(u).map(({ to, weight }) => `(${to}, w=${weight})`)
    lines.push([`${u}:`, ...arcs].join(' '))
  }
  return lines.join('\n')
}

export const formatDistances = (result: ShortestPathResult): string => {
  const lines = ['vertex : distance']
  result.dist.forEach((distance, v) => lines.push(`${v} : ${distance === Infinity ? 'INF' : distance}`))
  return lines.join('\n')
}

export const formatPath = (path: readonly VertexId[]): string => {
  return path.length ? path.join(' -> ') : 'no path'
}

/** Writes plain text to the given sink, one call per rendered block. */
export class TextRenderer implements GraphRenderer {
  constructor(private readonly write: (text: string) => void) {}

  renderGraph(graph: Graph) {
    this.write(formatGraph(graph))
  }

  renderResult(result: ShortestPathResult) {
    if (result.hasNegativeCycle) {
      this.write('negative cycle reachable from the source; distances below are not reliable')
    }
    this.write(formatDistances(result))
  }

  renderPath(path: readonly VertexId[]) {
    this.write(formatPath(path))
  }
}
