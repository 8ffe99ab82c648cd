import { Orderable, PriorityQueue, assertNotEmpty, assertPeekIndex, comparePriorities } from './priority-queue'

/** FIFO run of elements that share one priority. */
class Bucket<E> {
  private items: E[] = []
  private head = 0

  get size(): number {
    return this.items.length - this.head
  }

  push(item: E) {
    this.items.push(item)
  }

  front(): E {
    return this.items[this.head]
  }

  back(): E {
    return this.items[this.items.length - 1]
  }

  at(offset: number): E {
    return this.items[this.head + offset]
  }

  shift(): E {
    const item = this.items[this.head]
    this.head += 1
    // Drop the consumed prefix once it dominates the backing array.
    if (this.head >= 32 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return item
  }

  clone(): Bucket<E> {
    const copy = new Bucket<E>()
    copy.items = this.items.slice(this.head)
    return copy
  }
}

/**
 * Priority queue backed by a hash table from priority to a FIFO bucket, plus a sorted index of
 * the distinct priorities currently present. A priority is in the index iff its bucket is non-empty.
 */
export class HashTablePriorityQueue<E, P extends Orderable = number> implements PriorityQueue<E, P> {
  private readonly buckets = new Map<P, Bucket<E>>()
  private readonly keys: P[] = []
  private size = 0

  isEmpty(): boolean {
    return this.size === 0
  }

  getSize(): number {
    return this.size
  }

  /** Number of distinct priorities currently enqueued. */
  distinctPriorityCount(): number {
    return this.keys.length
  }

  enqueue(item: E, priority: P) {
    let bucket = this.buckets.get(priority)
    if (!bucket) {
      bucket = new Bucket<E>()
      this.buckets.set(priority, bucket)
      this.keys.splice(this.lowerBound(priority), 0, priority)
    }
    bucket.push(item)
    this.size += 1
  }

  peekFirst(): E {
    assertNotEmpty(this, 'PeekFirst')
    return this.bucketAt(0).front()
  }

  peekLast(): E {
    assertNotEmpty(this, 'PeekLast')
    return this.bucketAt(this.keys.length - 1).back()
  }

  // Walks the distinct priorities in order, so this is linear in their count.
  peek(index: number): E {
    assertPeekIndex(index, this.size)
    let remaining = index
    for (let i = 0; i < this.keys.length; i++) {
      const bucket = this.bucketAt(i)
      if (remaining < bucket.size) {
        return bucket.at(remaining)
      }
      remaining -= bucket.size
    }
    throw new Error(`Bucket sizes do not add up to queue size ${this.size}`)
  }

  dequeue(): E {
    assertNotEmpty(this, 'Dequeue')
    const bucket = this.bucketAt(0)
    const item = bucket.shift()
    if (!bucket.size) {
      this.buckets.delete(this.keys[0])
      this.keys.shift()
    }
    this.size -= 1
    return item
  }

  /** An independent copy; dequeuing from it leaves this queue untouched. */
  clone(): HashTablePriorityQueue<E, P> {
    const copy = new HashTablePriorityQueue<E, P>()
    this.keys.forEach((key, i) => {
      copy.buckets.set(key, this.bucketAt(i).clone())
      copy.keys.push(key)
    })
    copy.size = this.size
    return copy
  }

  private bucketAt(keyIndex: number): Bucket<E> {
    const bucket = this.buckets.get(this.keys[keyIndex])
    if (!bucket) {
      throw new Error(`Priority index out of sync with buckets at position ${keyIndex}`)
    }
    return bucket
  }

  /** First position in `keys` whose priority is not below `priority`. */
  private lowerBound(priority: P): number {
    let low = 0
    let high = this.keys.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (comparePriorities(this.keys[mid], priority) < 0) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    return low
  }
}
