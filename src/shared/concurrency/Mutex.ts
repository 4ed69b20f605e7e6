/**
 * Promise-chained mutex
 *
 * Callers queue in FIFO order; the critical section may be async. A rejected
 * section releases the lock before the rejection reaches the caller.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined
    const next = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.tail
    this.tail = previous.then(() => next)

    await previous
    try {
      return await section()
    } finally {
      release()
    }
  }
}
