/**
 * Bounded task pool: at most `size` tasks in flight, any number queued.
 * One pool is created per extraction component and reused for every batch.
 */

export class TaskPool {
  private active = 0
  private readonly queue: Array<() => void> = []

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`)
    }
  }

  get pending(): number {
    return this.queue.length
  }

  /** Run `task` once a lane is free; resolves or rejects with the task */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++
        void task()
          .then(resolve, reject)
          .finally(() => {
            this.active--
            this.queue.shift()?.()
          })
      }
      if (this.active < this.size) {
        start()
      } else {
        this.queue.push(start)
      }
    })
  }

  /** Run every task through the pool; results keep input order */
  map<TIn, TOut>(inputs: readonly TIn[], task: (input: TIn) => Promise<TOut>): Promise<TOut[]> {
    return Promise.all(inputs.map((input) => this.run(() => task(input))))
  }
}
