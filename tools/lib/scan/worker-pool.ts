/**
 * Worker pool bounding concurrent filesystem calls during a scan.
 *
 * Tasks past the limit wait in a FIFO queue and start as soon as a worker
 * frees up.
 */

export const DEFAULT_MAX_WORKERS = 8

export class WorkerPool {
  private readonly maxWorkers: number
  private activeWorkers = 0
  private readonly queue: Array<() => void> = []

  constructor(maxWorkers: number = DEFAULT_MAX_WORKERS) {
    this.maxWorkers = Math.max(1, Math.floor(maxWorkers))
  }

  /**
   * Run a task through the pool, queueing it while the pool is at capacity
   */
  execute<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        this.activeWorkers++
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.activeWorkers--
            this.processQueue()
          })
      }

      if (this.activeWorkers < this.maxWorkers) run()
      else this.queue.push(run)
    })
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers) {
      const next = this.queue.shift()
      if (next) next()
    }
  }

  getStats(): { active: number; queued: number; max: number } {
    return { active: this.activeWorkers, queued: this.queue.length, max: this.maxWorkers }
  }
}
