import { describe, expect, it } from 'vitest'
import { HashTablePriorityQueue } from './hash-priority-queue'
import { BinaryHeapPriorityQueue } from './binary-heap-priority-queue'
import { PriorityQueue } from './priority-queue'
import { OutOfRangeError } from './errors'

const implementations: [string, () => PriorityQueue<string, number>][] = [
  ['HashTablePriorityQueue', () => new HashTablePriorityQueue<string, number>()],
  ['BinaryHeapPriorityQueue', () => new BinaryHeapPriorityQueue<string, number>()],
]

const fill = (queue: PriorityQueue<string, number>, entries: [string, number][]) => {
  for (const [item, priority] of entries) {
    queue.enqueue(item, priority)
  }
  return queue
}

const drain = (queue: PriorityQueue<string, number>) => {
  const items: string[] = []
  while (!queue.isEmpty()) {
    items.push(queue.dequeue())
  }
  return items
}

describe.each(implementations)('%s', (_name, create) => {
  it('starts empty', () => {
    const queue = create()
    expect(queue.isEmpty()).toBe(true)
    expect(queue.getSize()).toBe(0)
  })

  it('dequeues by ascending priority, equal priorities in insertion order', () => {
    const queue = fill(create(), [
      ['A', 5],
      ['B', 1],
      ['C', 1],
      ['D', 3],
    ])
    expect(queue.getSize()).toBe(4)
    expect(drain(queue)).toEqual(['B', 'C', 'D', 'A'])
    expect(queue.isEmpty()).toBe(true)
  })

  it('peeks the first and last ranked elements without removing them', () => {
    const queue = fill(create(), [
      ['A', 5],
      ['B', 1],
      ['C', 1],
      ['D', 3],
      ['E', 5],
    ])
    expect(queue.peekFirst()).toBe('B')
    expect(queue.peekLast()).toBe('E')
    expect(queue.getSize()).toBe(5)
  })

  it('peeks by position in rank order', () => {
    const queue = fill(create(), [
      ['A', 5],
      ['B', 1],
      ['C', 1],
      ['D', 3],
      ['E', 5],
    ])
    expect([0, 1, 2, 3, 4].map((i) => queue.peek(i))).toEqual(['B', 'C', 'D', 'A', 'E'])
  })

  it('allows duplicate elements at the same priority', () => {
    const queue = fill(create(), [
      ['X', 2],
      ['X', 2],
      ['Y', 2],
    ])
    expect(drain(queue)).toEqual(['X', 'X', 'Y'])
  })

  it('interleaves enqueue and dequeue', () => {
    const queue = create()
    queue.enqueue('late', 10)
    queue.enqueue('early', 1)
    expect(queue.dequeue()).toBe('early')
    queue.enqueue('middle', 5)
    queue.enqueue('earliest', 0)
    expect(drain(queue)).toEqual(['earliest', 'middle', 'late'])
  })

  it('throws on access to an empty queue', () => {
    const queue = create()
    expect(() => queue.peekFirst()).toThrow(OutOfRangeError)
    expect(() => queue.peekLast()).toThrow(OutOfRangeError)
    expect(() => queue.dequeue()).toThrow(OutOfRangeError)
    expect(() => queue.peek(0)).toThrow(OutOfRangeError)
  })

  it('throws on a peek index outside the queue', () => {
    const queue = fill(create(), [
      ['A', 1],
      ['B', 2],
    ])
    expect(() => queue.peek(-1)).toThrow(OutOfRangeError)
    expect(() => queue.peek(2)).toThrow(OutOfRangeError)
    expect(() => queue.peek(0.5)).toThrow(OutOfRangeError)
  })
})

describe('HashTablePriorityQueue', () => {
  it('keeps one index entry per distinct priority', () => {
    const queue = new HashTablePriorityQueue<string>()
    queue.enqueue('A', 5)
    queue.enqueue('B', 1)
    queue.enqueue('C', 1)
    queue.enqueue('D', 3)
    expect(queue.distinctPriorityCount()).toBe(3)

    expect(queue.dequeue()).toBe('B')
    expect(queue.distinctPriorityCount()).toBe(3)
    expect(queue.dequeue()).toBe('C')
    expect(queue.distinctPriorityCount()).toBe(2)
  })

  it('matches repeated dequeues of a clone when peeking by position', () => {
    const queue = new HashTablePriorityQueue<string>()
    const entries: [string, number][] = [
      ['a', 4],
      ['b', 2],
      ['c', 4],
      ['d', 0],
      ['e', 2],
      ['f', 7],
      ['g', 0],
    ]
    for (const [item, priority] of entries) {
      queue.enqueue(item, priority)
    }

    const copy = queue.clone()
    const dequeued: string[] = []
    while (!copy.isEmpty()) {
      dequeued.push(copy.dequeue())
    }
    const peeked = Array.from({ length: queue.getSize() }, (_, i) => queue.peek(i))

    expect(peeked).toEqual(dequeued)
    expect(dequeued).toEqual(['d', 'g', 'b', 'e', 'a', 'c', 'f'])
    expect(queue.getSize()).toBe(7)
  })

  it('orders string priorities', () => {
    const queue = new HashTablePriorityQueue<number, string>()
    queue.enqueue(1, 'beta')
    queue.enqueue(2, 'alpha')
    queue.enqueue(3, 'gamma')
    expect(queue.peekFirst()).toBe(2)
    expect(queue.peekLast()).toBe(3)
  })

  it('keeps FIFO order across a long run of equal priorities', () => {
    const queue = new HashTablePriorityQueue<number>()
    for (let i = 0; i < 100; i++) {
      queue.enqueue(i, 0)
    }
    for (let i = 0; i < 50; i++) {
      expect(queue.dequeue()).toBe(i)
    }
    expect(queue.getSize()).toBe(50)
    expect(queue.peek(0)).toBe(50)
    expect(queue.peek(49)).toBe(99)
    expect(queue.peekLast()).toBe(99)

    queue.enqueue(100, 0)
    const rest: number[] = []
    while (!queue.isEmpty()) {
      rest.push(queue.dequeue())
    }
    expect(rest).toEqual(Array.from({ length: 51 }, (_, i) => 50 + i))
    expect(queue.distinctPriorityCount()).toBe(0)
  })
})
