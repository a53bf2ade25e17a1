/**
 * Serializes async tasks per key. Tasks for different keys run concurrently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key)
      })
    this.tails.set(key, tail)
    return result
  }

  /** Keys with a task queued or running. */
  get size(): number {
    return this.tails.size
  }
}
