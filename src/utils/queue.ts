/**
 * Unbounded FIFO with a single async consumer.
 * After close(), pending items still drain, then iteration ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = []
  private waiters: Array<(result: IteratorResult<T>) => void> = []
  private closed = false

  get isClosed(): boolean {
    return this.closed
  }

  get size(): number {
    return this.items.length
  }

  /** Returns false once the queue is closed; the item is dropped. */
  push(item: T): boolean {
    if (this.closed) return false
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value: item, done: false })
    } else {
      this.items.push(item)
    }
    return true
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  /** Resolves null when the queue is closed and empty. */
  async next(): Promise<T | null> {
    const result = await this.pull()
    return result.done ? null : result.value
  }

  private pull(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.pull(),
    }
  }
}
