import { promises as fs } from 'fs'
import { Graph } from './graph'
import { bellmanFord, dijkstra } from './shortest-paths'
import { BenchmarkRecord } from './protocol/benchmark-record'
import { VertexId } from './protocol/edge'
import { ShortestPathResult } from './protocol/shortest-path-result'
import { log } from './log'

export const CSV_HEADER = 'vertices,edges,algorithm,time_ms,ok'

/** Runs `fn` and reports how long it took in milliseconds. */
export const timed = <T>(fn: () => T): { value: T; elapsedMs: number } => {
  const start = performance.now()
  const value = fn()
  return { value, elapsedMs: performance.now() - start }
}

/** True when both tables reach the same vertices at distances within `tolerance` of each other. */
export const distancesAgree = (a: readonly number[], b: readonly number[], tolerance = 1e-6): boolean => {
  if (a.length !== b.length) {
    return false
  }
  return a.every((distance, v) => {
    const other = b[v]
    if (distance === Infinity || other === Infinity) {
      return distance === other
    }
    return Math.abs(distance - other) <= tolerance
  })
}

export interface Comparison {
  records: [BenchmarkRecord, BenchmarkRecord]
  dijkstra: ShortestPathResult
  bellmanFord: ShortestPathResult
}

/**
 * Times both algorithms from `source`. Bellman-Ford is only `ok` when it found no negative cycle
 * and its distances match Dijkstra's.
 */
export const compareAlgorithms = (graph: Graph, source: VertexId): Comparison => {
  const vertices = graph.vertexCount()
  const edges = graph.edgeCount()
  const fast = timed(() => dijkstra(graph, source))
  const slow = timed(() => bellmanFord(graph, source))
  const agree = distancesAgree(fast.value.dist, slow.value.dist)

  return {
    records: [
      { vertices, edges, algorithm: 'Dijkstra', elapsedMs: fast.elapsedMs, ok: fast.value.dist.length > 0 },
      {
        vertices,
        edges,
        algorithm: 'Bellman-Ford',
        elapsedMs: slow.elapsedMs,
        ok: !slow.value.hasNegativeCycle && agree,
      },
    ],
    dijkstra: fast.value,
    bellmanFord: slow.value,
  }
}

export const benchmarksToCsv = (records: readonly BenchmarkRecord[]): string => {
  const rows = records.map((r) => [r.vertices, r.edges, r.algorithm, r.elapsedMs.toFixed(3), r.ok ? 1 : 0].join(','))
  return [CSV_HEADER, ...rows].join('\n') + '\n'
}

export const saveBenchmarksToCsv = async (records: readonly BenchmarkRecord[], filePath: string) => {
  await fs.writeFile(filePath, benchmarksToCsv(records), { encoding: 'utf-8' })
  log(`saved ${records.length} benchmark records to ${filePath}`)
}
