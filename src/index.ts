import { Graph } from './graph'
import { loadGraphFromFile, saveGraphToFile } from './graph-file'
import { generateRandomGraph } from './generate'
import { bellmanFord, dijkstra } from './shortest-paths'
import { restorePath } from './restore-path'
import { compareAlgorithms, saveBenchmarksToCsv, timed } from './benchmark'
import { GraphRenderer, TextRenderer } from './render'
import { InvalidConfigurationError } from './errors'
import { log, error } from './log'

export const USAGE = [
  'usage: sssp <command> ...',
  '  show <graph-file>',
  '  dijkstra <graph-file> <source> [target]',
  '  bellman-ford <graph-file> <source> [target]',
  '  compare <graph-file> <source> [csv-out]',
  '  generate <out-file> <vertices> <probability> <min-weight> <max-weight> [--undirected]',
].join('\n')

const parseInteger = (value: string | undefined, name: string): number => {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    throw new InvalidConfigurationError(`${name} must be an integer, got ${value ?? 'nothing'}`)
  }
  return Number(value)
}

const parseNumber = (value: string | undefined, name: string): number => {
  const parsed = value === undefined || value.trim() === '' ? NaN : Number(value)
  if (!Number.isFinite(parsed)) {
    throw new InvalidConfigurationError(`${name} must be a number, got ${value ?? 'nothing'}`)
  }
  return parsed
}

const requireArg = (value: string | undefined, name: string): string => {
  if (value === undefined) {
    throw new InvalidConfigurationError(`missing ${name}`)
  }
  return value
}

const loadGraph = async (filePath: string | undefined): Promise<Graph> => {
  const result = await loadGraphFromFile(requireArg(filePath, 'graph file'))
  if (!result.ok) {
    throw new InvalidConfigurationError(`failed to load graph: ${result.reason}`)
  }
  return result.graph
}

const runSearch = async (
  algorithm: 'dijkstra' | 'bellman-ford',
  args: string[],
  renderer: GraphRenderer
) => {
  const graph = await loadGraph(args[0])
  const source = parseInteger(args[1], 'source')
  const target = args[2] === undefined ? undefined : parseInteger(args[2], 'target')
  const search = algorithm === 'dijkstra' ? dijkstra : bellmanFord

  const { value: result, elapsedMs } = timed(() => search(graph, source))
  log(`${algorithm} finished in ${elapsedMs.toFixed(3)} ms`)
  renderer.renderResult(result)
  if (target !== undefined) {
    renderer.renderPath(restorePath(source, target, result.parent))
  }
}

const runCompare = async (args: string[]) => {
  const graph = await loadGraph(args[0])
  const source = parseInteger(args[1], 'source')
  const { records } = compareAlgorithms(graph, source)
  for (const record of records) {
    log(`algorithm: ${record.algorithm}, time: ${record.elapsedMs.toFixed(3)} ms, ok: ${record.ok ? 'OK' : 'FAIL'}`)
  }
  if (args[2] !== undefined) {
    await saveBenchmarksToCsv(records, args[2])
  }
}

const runGenerate = async (args: string[]) => {
  const outFile = requireArg(args[0], 'output file')
  const graph = generateRandomGraph({
    vertices: parseInteger(args[1], 'vertices'),
    probability: parseNumber(args[2], 'probability'),
    minWeight: parseNumber(args[3], 'min weight'),
    maxWeight: parseNumber(args[4], 'max weight'),
    directed: !args.slice(5).includes('--undirected'),
  })
  await saveGraphToFile(graph, outFile)
}

/**
 * Runs a single command. Resolves with the process exit code; bad input is reported through
 * `error` rather than rejected.
 */
export const run = async (
  args: string[],
  renderer: GraphRenderer = new TextRenderer((text) => console.log(text))
): Promise<number> => {
  const [command, ...rest] = args
  try {
    switch (command) {
      case 'show':
        renderer.renderGraph(await loadGraph(rest[0]))
        break
      case 'dijkstra':
      case 'bellman-ford':
        await runSearch(command, rest, renderer)
        break
      case 'compare':
        await runCompare(rest)
        break
      case 'generate':
        await runGenerate(rest)
        break
      default:
        error(command === undefined ? 'missing command' : `unknown command: ${command}`)
        error(USAGE)
        return 1
    }
  } catch (err) {
    if (err instanceof InvalidConfigurationError || err instanceof RangeError) {
      error(err.message)
      return 1
    }
    throw err
  }
  return 0
}
