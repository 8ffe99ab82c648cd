import { OutOfRangeError } from './errors'

export type Orderable = number | string | bigint

/**
 * A min-priority queue: the smaller the priority, the higher the rank.
 * Elements sharing a priority keep their insertion order.
 */
export interface PriorityQueue<E, P extends Orderable> {
  isEmpty(): boolean
  getSize(): number
  /** The element at `index` when all elements are laid out by rank. */
  peek(index: number): E
  peekFirst(): E
  peekLast(): E
  enqueue(item: E, priority: P): void
  /** Removes and returns the highest ranked element. */
  dequeue(): E
}

export type PriorityQueueFactory<E, P extends Orderable> = () => PriorityQueue<E, P>

export const comparePriorities = <P extends Orderable>(a: P, b: P): number => (a < b ? -1 : a > b ? 1 : 0)

export const assertNotEmpty = (queue: { isEmpty(): boolean }, operation: string) => {
  if (queue.isEmpty()) {
    throw new OutOfRangeError(`${operation} on an empty priority queue`)
  }
}

export const assertPeekIndex = (index: number, size: number) => {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new OutOfRangeError(`Peek index ${index} is outside [0, ${size})`)
  }
}
