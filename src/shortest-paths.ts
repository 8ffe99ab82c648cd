import { Graph } from './graph'
import { HashTablePriorityQueue } from './hash-priority-queue'
import { PriorityQueueFactory } from './priority-queue'
import { Arc, VertexId } from './protocol/edge'
import { ShortestPathResult, createShortestPathResult } from './protocol/shortest-path-result'

const defaultQueue: PriorityQueueFactory<VertexId, number> = () => new HashTablePriorityQueue<VertexId, number>()

const isValidSource = (graph: Graph, source: VertexId) =>
  Number.isInteger(source) && source >= 0 && source < graph.vertexCount()

/**
 * Dijkstra's algorithm from `source`.
 *
 * A vertex is re-enqueued on every improvement instead of having its key decreased; stale entries
 * are dropped when dequeued for an already settled vertex. Negative arcs are skipped, so vertices
 * only reachable through them may be left unreached or over-estimated.
 * An out-of-range source yields a result where nothing is reached.
 */
export const dijkstra = (
  graph: Graph,
  source: VertexId,
  createQueue: PriorityQueueFactory<VertexId, number> = defaultQueue
): ShortestPathResult => {
  const n = graph.vertexCount()
  const result = createShortestPathResult(n)
  if (!isValidSource(graph, source)) {
    return result
  }

  const { dist, parent } = result
  const settled = new Array<boolean>(n).fill(false)
  const queue = createQueue()
  dist[source] = 0
  queue.enqueue(source, 0)

  while (!queue.isEmpty()) {
    const u = queue.dequeue()
    if (settled[u]) {
      continue
    }
    settled[u] = true

    for (const { to, weight } of graph.neighbors(u)) {
      if (weight < 0) {
        continue
      }
      const candidate = dist[u] + weight
      if (candidate < dist[to]) {
        dist[to] = candidate
        parent[to] = u
        queue.enqueue(to, candidate)
      }
    }
  }
  return result
}

/**
 * Bellman-Ford from `source`. Runs at most `n - 1` relaxation passes, stopping early after a pass
 * that changes nothing, then one more pass to detect a negative cycle reachable from `source`.
 */
export const bellmanFord = (graph: Graph, source: VertexId): ShortestPathResult => {
  const n = graph.vertexCount()
  const result = createShortestPathResult(n)
  if (!isValidSource(graph, source)) {
    return result
  }

  const { dist, parent } = result
  const arcs: Arc[] = [...graph.edges()]
  dist[source] = 0

  for (let pass = 0; pass < n - 1; pass++) {
    let changed = false
    for (const { from, to, weight } of arcs) {
      if (dist[from] !== Infinity && dist[from] + weight < dist[to]) {
        dist[to] = dist[from] + weight
        parent[to] = from
        changed = true
      }
    }
    if (!changed) {
      break
    }
  }

  result.hasNegativeCycle = arcs.some(
    ({ from, to, weight }) => dist[from] !== Infinity && dist[from] + weight < dist[to]
  )
  return result
}
