export * from './errors'
export * from './priority-queue'
export { HashTablePriorityQueue } from './hash-priority-queue'
export { BinaryHeapPriorityQueue } from './binary-heap-priority-queue'
export { Graph } from './graph'
export { dijkstra, bellmanFord } from './shortest-paths'
export { restorePath } from './restore-path'
export * from './graph-file'
export * from './generate'
export * from './benchmark'
export * from './render'
export * from './protocol/edge'
export * from './protocol/shortest-path-result'
export * from './protocol/benchmark-record'
