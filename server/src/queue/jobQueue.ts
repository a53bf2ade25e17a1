import type { JobStore } from '../store/jobStore'

/**
 * FIFO of pending job ids. Any number of producers may enqueue; exactly one consumer
 * (the worker) calls next(). The store stays the source of truth: the queue is rebuilt
 * from it at startup and only ever holds ids.
 */
export class JobQueue {
  private readonly ids: string[] = []
  private readonly queued = new Set<string>()
  private waiter: ((id: string | undefined) => void) | null = null
  private closed = false

  /** Append an id. Ids already waiting are not added twice. Returns false once closed. */
  enqueue(id: string): boolean {
    if (this.closed) return false
    if (this.queued.has(id)) return true
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter(id)
      return true
    }
    this.queued.add(id)
    this.ids.push(id)
    return true
  }

  /** Non-blocking take; undefined when empty. */
  dequeue(): string | undefined {
    const id = this.ids.shift()
    if (id !== undefined) this.queued.delete(id)
    return id
  }

  /**
   * Wait for the next id. Resolves undefined once the queue is closed.
   * Single consumer: a second concurrent call is a programming error.
   */
  next(): Promise<string | undefined> {
    const id = this.dequeue()
    if (id !== undefined) return Promise.resolve(id)
    if (this.closed) return Promise.resolve(undefined)
    if (this.waiter) {
      return Promise.reject(new Error('JobQueue.next() already has a waiting consumer'))
    }
    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  /** Stop accepting ids and release a waiting consumer. Ids still queued remain pending in the store. */
  close(): void {
    this.closed = true
    const waiter = this.waiter
    this.waiter = null
    waiter?.(undefined)
  }

  get size(): number {
    return this.ids.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  snapshot(): string[] {
    return [...this.ids]
  }

  /** Enqueue every pending job in submission order. Returns how many were added. */
  async hydrate(store: JobStore): Promise<number> {
    const pending = await store.listPending()
    for (const id of pending) this.enqueue(id)
    return pending.length
  }
}
