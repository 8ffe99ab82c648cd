import { VertexId } from './protocol/edge'

/**
 * Rebuilds the vertex sequence from `source` to `target` out of a parent table.
 * Returns `[]` when `target` is out of range, unreached, or its parent chain never reaches
 * `source` (including chains that loop).
 */
export const restorePath = (
  source: VertexId,
  target: VertexId,
  parent: readonly (VertexId | null)[]
): VertexId[] => {
  const n = parent.length
  if (!Number.isInteger(target) || target < 0 || target >= n) {
    return []
  }
  if (parent[target] === null && target !== source) {
    return []
  }

  const reversed: VertexId[] = []
  let current: VertexId | null = target
  while (current !== null && reversed.length < n) {
    reversed.push(current)
    if (current === source) {
      return reversed.reverse()
    }
    const next: VertexId | null | undefined = parent[current]
    current = next ?? null
  }
  return []
}
