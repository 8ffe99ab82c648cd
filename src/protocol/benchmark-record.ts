export type AlgorithmName = 'Dijkstra' | 'Bellman-Ford'

/** One timed algorithm run, as written to the benchmark CSV. */
export interface BenchmarkRecord {
  vertices: number
  edges: number
  algorithm: AlgorithmName
  elapsedMs: number
  ok: boolean
}
