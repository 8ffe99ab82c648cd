import { promises as fs } from 'fs'
import { Graph } from './graph'
import { GraphFormatError } from './errors'
import { log } from './log'

// Persisted layout:
//   <vertex_count> <edge_count> <directed:0|1>
//   <u> <v> <weight>        (one line per edge; undirected edges are written once)

export type LoadGraphResult = { ok: true; graph: Graph } | { ok: false; reason: string }

/** Largest vertex count a graph file may announce. */
export const MAX_FILE_VERTICES = 10_000_000

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const parseInteger = (token: string | undefined, what: string, line: number): number => {
  if (token === undefined || !INTEGER.test(token)) {
    throw new GraphFormatError(`expected an integer ${what}, got ${token ?? 'nothing'}`, line)
  }
  return Number(token)
}

const parseWeight = (token: string | undefined, line: number): number => {
  const value = token !== undefined && DECIMAL.test(token) ? Number(token) : NaN
  if (!Number.isFinite(value)) {
    throw new GraphFormatError(`expected a numeric weight, got ${token ?? 'nothing'}`, line)
  }
  return value
}

const tokenize = (line: string) => line.trim().split(/\s+/).filter(Boolean)

/** Writes `graph` in the persisted text layout. */
export const serializeGraph = (graph: Graph): string => {
  const lines: string[] = []
  for (const { from, to, weight } of graph.edges()) {
    if (!graph.isDirected() && from > to) {
      continue
    }
    lines.push(`${from} ${to} ${weight}`)
  }
  const header = `${graph.vertexCount()} ${lines.length} ${graph.isDirected() ? 1 : 0}`
  return [header, ...lines].join('\n') + '\n'
}

/**
 * Parses the persisted text layout. Throws `GraphFormatError` on a malformed header or edge line,
 * an out-of-range endpoint, or an edge count that does not match the header.
 */
export const parseGraphOrThrow = (text: string): Graph => {
  const lines = text.split(/\r?\n/)
  const isBlank = (index: number) => tokenize(lines[index]).length === 0

  let cursor = 0
  while (cursor < lines.length && isBlank(cursor)) {
    cursor++
  }
  if (cursor === lines.length) {
    throw new GraphFormatError('missing header', 1)
  }
  const header = tokenize(lines[cursor])
  const headerLine = cursor + 1
  if (header.length !== 3) {
    throw new GraphFormatError('header must be "<vertex_count> <edge_count> <directed>"', headerLine)
  }
  const vertexCount = parseInteger(header[0], 'vertex count', headerLine)
  const edgeCount = parseInteger(header[1], 'edge count', headerLine)
  if (vertexCount < 0 || edgeCount < 0) {
    throw new GraphFormatError('counts must not be negative', headerLine)
  }
  if (vertexCount > MAX_FILE_VERTICES) {
    throw new GraphFormatError(`vertex count ${vertexCount} exceeds the limit of ${MAX_FILE_VERTICES}`, headerLine)
  }
  if (header[2] !== '0' && header[2] !== '1') {
    throw new GraphFormatError(`directed flag must be 0 or 1, got ${header[2]}`, headerLine)
  }

  const graph = new Graph(vertexCount, header[2] === '1')
  let read = 0
  for (cursor++; cursor < lines.length; cursor++) {
    if (isBlank(cursor)) {
      continue
    }
    const lineNumber = cursor + 1
    if (read === edgeCount) {
      throw new GraphFormatError(`more edge lines than the ${edgeCount} announced`, lineNumber)
    }
    const fields = tokenize(lines[cursor])
    if (fields.length !== 3) {
      throw new GraphFormatError('edge must be "<u> <v> <weight>"', lineNumber)
    }
    const u = parseInteger(fields[0], 'source vertex', lineNumber)
    const v = parseInteger(fields[1], 'target vertex', lineNumber)
    const weight = parseWeight(fields[2], lineNumber)
    if (u < 0 || u >= vertexCount || v < 0 || v >= vertexCount) {
      throw new GraphFormatError(`edge ${u} -> ${v} is outside [0, ${vertexCount})`, lineNumber)
    }
    graph.addEdge(u, v, weight)
    read++
  }
  if (read !== edgeCount) {
    throw new GraphFormatError(`expected ${edgeCount} edges, found ${read}`, lines.length)
  }
  return graph
}

export const parseGraph = (text: string): LoadGraphResult => {
  try {
    return { ok: true, graph: parseGraphOrThrow(text) }
  } catch (err) {
    if (err instanceof GraphFormatError) {
      return { ok: false, reason: err.message }
    }
    throw err
  }
}

export const saveGraphToFile = async (graph: Graph, filePath: string) => {
  await fs.writeFile(filePath, serializeGraph(graph), { encoding: 'utf-8' })
  log(`saved graph to ${filePath}: ${graph.vertexCount()} vertices, ${graph.edgeCount()} edges`)
}

/** Reads and parses a graph file. Never rejects: read and parse failures come back as `ok: false`. */
export const loadGraphFromFile = async (filePath: string): Promise<LoadGraphResult> => {
  let text: string
  try {
    text = await fs.readFile(filePath, { encoding: 'utf-8' })
  } catch (err) {
    return { ok: false, reason: `cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}` }
  }
  const result = parseGraph(text)
  if (result.ok) {
    const { graph } = result
    log(`loaded graph from ${filePath}: ${graph.vertexCount()} vertices, ${graph.edgeCount()} edges`)
  }
  return result
}
