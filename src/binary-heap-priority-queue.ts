import { Orderable, PriorityQueue, assertNotEmpty, assertPeekIndex, comparePriorities } from './priority-queue'

interface HeapEntry<E, P> {
  item: E
  priority: P
  sequence: number
}

/**
 * Binary min-heap implementation of `PriorityQueue`. Ties are broken by an insertion sequence
 * number so equal priorities still come out in FIFO order.
 */
export class BinaryHeapPriorityQueue<E, P extends Orderable = number> implements PriorityQueue<E, P> {
  private readonly heap: HeapEntry<E, P>[] = []
  private nextSequence = 0

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  getSize(): number {
    return this.heap.length
  }

  enqueue(item: E, priority: P) {
    this.heap.push({ item, priority, sequence: this.nextSequence++ })
    this.siftUp(this.heap.length - 1)
  }

  peekFirst(): E {
    assertNotEmpty(this, 'PeekFirst')
    return this.heap[0].item
  }

  // The largest entry is somewhere among the leaves.
  peekLast(): E {
    assertNotEmpty(this, 'PeekLast')
    let last = this.heap[this.heap.length >> 1]
    for (let i = (this.heap.length >> 1) + 1; i < this.heap.length; i++) {
      if (this.compare(this.heap[i], last) > 0) {
        last = this.heap[i]
      }
    }
    return last.item
  }

  peek(index: number): E {
    assertPeekIndex(index, this.heap.length)
    const ordered = [...this.heap].sort((a, b) => this.compare(a, b))
    return ordered[index].item
  }

  dequeue(): E {
    assertNotEmpty(this, 'Dequeue')
    const top = this.heap[0]
    const last = this.heap.pop()
    if (last && this.heap.length > 0) {
      this.heap[0] = last
      this.siftDown(0)
    }
    return top.item
  }

  private compare(a: HeapEntry<E, P>, b: HeapEntry<E, P>): number {
    return comparePriorities(a.priority, b.priority) || a.sequence - b.sequence
  }

  private swap(i: number, j: number) {
    const temp = this.heap[i]
    this.heap[i] = this.heap[j]
    this.heap[j] = temp
  }

  private siftUp(index: number) {
    while (index > 0) {
      const parent = (index - 1) >> 1
      if (this.compare(this.heap[index], this.heap[parent]) >= 0) {
        break
      }
      this.swap(index, parent)
      index = parent
    }
  }

  private siftDown(index: number) {
    const length = this.heap.length
    for (;;) {
      const left = 2 * index + 1
      const right = left + 1
      let smallest = index
      if (left < length && this.compare(this.heap[left], this.heap[smallest]) < 0) {
        smallest = left
      }
      if (right < length && this.compare(this.heap[right], this.heap[smallest]) < 0) {
        smallest = right
      }
      if (smallest === index) {
        return
      }
      this.swap(index, smallest)
      index = smallest
    }
  }
}
