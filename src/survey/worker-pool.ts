// src/survey/worker-pool.ts
import type { Thunk } from '../sources/types.js'

export type TaskResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown }

export interface PoolTask<T> {
  readonly id: number
  /** Never rejects. */
  readonly settled: Promise<TaskResult<T>>
  readonly done: boolean
  abort(reason?: unknown): void
}

type Limiter = <T>(fn: () => Promise<T>, signal: AbortSignal) => Promise<T>

function createLimiter(concurrency: number): Limiter {
  let running = 0
  const queue: Array<() => void> = []

  return async <T>(fn: () => Promise<T>, signal: AbortSignal): Promise<T> => {
    if (running >= concurrency) {
      await new Promise<void>((resolve) => queue.push(resolve))
    }
    running++
    try {
      signal.throwIfAborted()
      return await fn()
    } finally {
      running--
      queue.shift()?.()
    }
  }
}

/**
 * Runs thunks with at most `maxWorkers` of them in flight. Each task gets its
 * own AbortSignal; `terminate()` aborts every task that has not settled, and
 * their `settled` promises resolve at once with the abort reason.
 */
export class WorkerPool {
  readonly maxWorkers: number
  private limit: Limiter
  private active = new Map<number, AbortController>()
  private nextId = 1
  private terminated = false

  constructor(maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`)
    }
    this.maxWorkers = maxWorkers
    this.limit = createLimiter(maxWorkers)
  }

  get activeCount(): number {
    return this.active.size
  }

  submit<T>(thunk: Thunk<T>): PoolTask<T> {
    if (this.terminated) {
      throw new Error('Cannot submit to a terminated worker pool')
    }
    const id = this.nextId++
    const controller = new AbortController()
    this.active.set(id, controller)

    let done = false
    const finish = (result: TaskResult<T>) => {
      done = true
      this.active.delete(id)
      return result
    }
    const settled = new Promise<TaskResult<T>>((resolve) => {
      const { signal } = controller
      const onAbort = () => resolve({ ok: false, error: signal.reason })
      signal.addEventListener('abort', onAbort, { once: true })
      void this.limit(() => thunk(signal), signal).then(
        value => resolve({ ok: true, value }),
        (error: unknown) => resolve({ ok: false, error })
      ).finally(() => signal.removeEventListener('abort', onAbort))
    }).then(finish)

    return {
      id,
      settled,
      get done() { return done },
      abort: (reason?: unknown) => controller.abort(reason)
    }
  }

  terminate(): void {
    this.terminated = true
    for (const controller of this.active.values()) {
      controller.abort(new Error('Worker pool terminated'))
    }
  }
}
