export class RequestQueue<T> {
  private queue: T[] = []
  private maxSize: number

  constructor(maxSize: number = Number.POSITIVE_INFINITY) {
    this.maxSize = maxSize
  }

  add(item: T): void {
    if (this.queue.length >= this.maxSize) {
      throw new Error(`Queue overflow: maximum size of ${this.maxSize} exceeded`)
    }
    this.queue.push(item)
  }

  clear(): void {
    this.queue = []
  }

  size(): number {
    return this.queue.length
  }

  /**
   * Empties the queue and hands back what it held, oldest first.
   */
  drain(): T[] {
    const items = this.queue
    this.clear()
    return items
  }
}
