import { Graph } from './graph'
import { InvalidConfigurationError } from './errors'

export interface RandomGraphOptions {
  vertices: number
  /** Chance, in [0, 1], that any given pair of distinct vertices gets an edge. */
  probability: number
  minWeight: number
  maxWeight: number
  directed: boolean
  /** Uniform source in [0, 1). Defaults to `Math.random`. */
  random?: () => number
}

/**
 * Builds a graph where each ordered pair of distinct vertices (each unordered pair when undirected)
 * is connected with the given probability, with a weight drawn uniformly from [minWeight, maxWeight).
 */
export const generateRandomGraph = (options: RandomGraphOptions): Graph => {
  const { vertices, probability, directed, random = Math.random } = options
  if (!Number.isInteger(vertices) || vertices < 0) {
    throw new InvalidConfigurationError(`Vertex count must be a non-negative integer, got ${vertices}`)
  }
  if (!(probability >= 0 && probability <= 1)) {
    throw new InvalidConfigurationError(`Edge probability must be in [0, 1], got ${probability}`)
  }
  const minWeight = Math.min(options.minWeight, options.maxWeight)
  const maxWeight = Math.max(options.minWeight, options.maxWeight)

  const graph = new Graph(vertices, directed)
  for (let u = 0; u < vertices; u++) {
    for (let v = directed ? 0 : u + 1; v < vertices; v++) {
      if (u === v) {
        continue
      }
      if (random() < probability) {
        graph.addEdge(u, v, minWeight + random() * (maxWeight - minWeight))
      }
    }
  }
  return graph
}
