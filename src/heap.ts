import { EmptyQueueError, IndexOutOfRangeError } from './errors'
import { assertUint64 } from './uint64'

export interface HeapEntry<T> {
  readonly priority: bigint
  readonly payload: T
}

// Negative when `a` must leave the queue before `b`; only consulted for equal priorities
export type TieBreaker<T> = (a: T, b: T) => number

/**
 * Binary max-heap keyed by an unsigned 64-bit priority.
 * Equal priorities come out in no particular order unless a tie-breaker is given.
 */
export class PriorityQueue<T> {
  private entries: Array<HeapEntry<T>> = []
  // slot writes since `begin`, oldest first; undefined marks a slot that did not exist
  private journal: Array<{ index: number; previous: HeapEntry<T> | undefined }> | undefined
  private journalLength = 0

  public constructor(private readonly tieBreaker?: TieBreaker<T>) {}

  get size(): number {
    return this.entries.length
  }

  isEmpty = () => this.entries.length === 0

  insert = (priority: bigint, payload: T): void => {
    assertUint64('priority', priority)
    this.write(this.entries.length, { priority, payload })
    this.siftUp(this.entries.length - 1)
  }

  extractMax = (): HeapEntry<T> => {
    const top = this.entries[0]
    if (top === undefined) throw new EmptyQueueError()

    const lastIndex = this.entries.length - 1
    const last = this.entries[lastIndex]
    this.journal?.push({ index: lastIndex, previous: last })
    this.entries.length = lastIndex
    if (lastIndex > 0) {
      this.write(0, last)
      this.siftDown(0)
    }
    return top
  }

  peek = (): HeapEntry<T> | undefined => this.entries[0]

  /**
   * Entry at a storage position. Position 0 is the maximum; the rest are in heap
   * order, not priority order.
   */
  peekAt = (index: number): HeapEntry<T> => {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new IndexOutOfRangeError(index, this.entries.length)
    }
    return this.entries[index]
  }

  snapshot = (): ReadonlyArray<HeapEntry<T>> => this.entries.slice()

  restore = (entries: ReadonlyArray<HeapEntry<T>>): void => {
    this.entries = entries.slice()
  }

  /** Starts recording writes so `rollback` can undo them; cost grows with the writes, not the size. */
  begin = (): void => {
    this.journal = []
    this.journalLength = this.entries.length
  }

  commit = (): void => {
    this.journal = undefined
  }

  rollback = (): void => {
    const journal = this.journal
    if (journal === undefined) return
    for (let i = journal.length - 1; i >= 0; i--) {
      const { index, previous } = journal[i]
      if (previous !== undefined) this.entries[index] = previous
    }
    this.entries.length = this.journalLength
    this.journal = undefined
  }

  [Symbol.iterator](): Iterator<HeapEntry<T>> {
    return this.entries[Symbol.iterator]()
  }

  private write(index: number, entry: HeapEntry<T>): void {
    this.journal?.push({ index, previous: this.entries[index] })
    this.entries[index] = entry
  }

  private outranks(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    if (a.priority !== b.priority) return a.priority > b.priority
    return this.tieBreaker !== undefined && this.tieBreaker(a.payload, b.payload) < 0
  }

  private siftUp(index: number): void {
    const entry = this.entries[index]
    while (index > 0) {
      const parentIndex = (index - 1) >> 1
      const parent = this.entries[parentIndex]
      if (!this.outranks(entry, parent)) break
      this.write(index, parent)
      index = parentIndex
    }
    this.write(index, entry)
  }

  private siftDown(index: number): void {
    const length = this.entries.length
    const entry = this.entries[index]

    while (true) {
      const left = 2 * index + 1
      const right = left + 1
      let best = index
      let bestEntry = entry

      if (left < length && this.outranks(this.entries[left], bestEntry)) {
        best = left
        bestEntry = this.entries[left]
      }
      if (right < length && this.outranks(this.entries[right], bestEntry)) {
        best = right
        bestEntry = this.entries[right]
      }
      if (best === index) break

      this.write(index, bestEntry)
      index = best
    }
    this.write(index, entry)
  }
}
