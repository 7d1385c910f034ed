/**
 * Handoff - single-producer/single-consumer queue between pipeline stages
 *
 * With the default capacity of 0 the queue is a rendezvous: `put` resolves
 * only once the consumer has taken the item, so a slow consumer holds the
 * producer back one item at a time. A positive capacity lets the producer
 * run that many items ahead.
 *
 * @example
 * ```typescript
 * const queue = new Handoff<string>()
 *
 * const producer = (async () => {
 *   await queue.put('a')
 *   await queue.put('b')
 *   queue.close()
 * })()
 *
 * for await (const item of queue) {
 *   console.log(item)
 * }
 * await producer
 * ```
 */

/**
 * Raised by `put` after the queue was closed
 */
export class HandoffClosedError extends Error {
  constructor() {
    super('handoff is closed')
    this.name = 'HandoffClosedError'
  }
}

interface PendingPut<T> {
  item: T
  released: boolean
  resolve: () => void
  reject: (error: Error) => void
}

interface PendingTake<T> {
  resolve: (result: IteratorResult<T>) => void
  reject: (error: Error) => void
}

export class Handoff<T> implements AsyncIterable<T> {
  readonly capacity: number

  private readonly puts: PendingPut<T>[] = []
  private readonly takes: PendingTake<T>[] = []
  private closed: boolean = false
  private failure: Error | null = null

  constructor(capacity: number = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`handoff capacity must be a non-negative integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /**
   * Number of items put but not yet taken
   */
  get size(): number {
    return this.puts.length
  }

  /**
   * Hand an item to the consumer. Resolves once the item was taken, or
   * once it fits in the buffer.
   */
  put(item: T): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.closed) {
      return Promise.reject(new HandoffClosedError())
    }

    const taker = this.takes.shift()
    if (taker) {
      taker.resolve({ value: item, done: false })
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      this.puts.push({ item, released: false, resolve, reject })
      this.releaseBuffered()
    })
  }

  /**
   * Take the next item. Resolves `done` once the queue is closed and
   * drained; rejects once the queue was cancelled.
   */
  take(): Promise<IteratorResult<T>> {
    const next = this.puts.shift()
    if (next) {
      if (!next.released) {
        next.released = true
        next.resolve()
      }
      this.releaseBuffered()
      return Promise.resolve({ value: next.item, done: false })
    }

    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.takes.push({ resolve, reject })
    })
  }

  /**
   * Mark the end of the stream. Items already put are still delivered.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    for (const taker of this.takes.splice(0)) {
      taker.resolve({ value: undefined, done: true })
    }
  }

  /**
   * Abort both sides: pending and future puts and takes reject with
   * `reason`, and undelivered items are discarded.
   */
  cancel(reason: Error): void {
    if (this.failure) {
      return
    }
    this.failure = reason
    this.closed = true
    for (const pending of this.puts.splice(0)) {
      if (!pending.released) {
        pending.reject(reason)
      }
    }
    for (const taker of this.takes.splice(0)) {
      taker.reject(reason)
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const result = await this.take()
      if (result.done) {
        return
      }
      yield result.value
    }
  }

  private releaseBuffered(): void {
    const limit = Math.min(this.capacity, this.puts.length)
    for (let i = 0; i < limit; i++) {
      const pending = this.puts[i]
      if (!pending.released) {
        pending.released = true
        pending.resolve()
      }
    }
  }
}
