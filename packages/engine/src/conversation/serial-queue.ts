/**
 * Runs tasks one at a time per key; different keys run independently.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)

    // The chain only tracks completion; callers see failures through `result`
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key)
    })

    return result
  }

  /** Keys with a task queued or running. */
  get activeKeys(): number {
    return this.tails.size
  }
}
