// src/survey/scheduler.ts
import type { Code, CodeItem, CodeThunk } from '../analyzers/types.js'
import type { Repo, RepoItem, RepoThunk } from '../sources/types.js'
import { sameRepo } from '../sources/types.js'
import { SurveyInterruptedError } from '../errors/index.js'
import type { AnalyzerFeatures } from '../store/types.js'
import type { PoolTask, TaskResult, WorkerPool } from './worker-pool.js'

export interface RepoJob {
  kind: 'repo'
  sourceName: string
  key: string
  /** Features still to be surveyed once the repo is ready. */
  analyzerFeatures: AnalyzerFeatures
}

export interface CodeJob {
  kind: 'code'
  analyzerName: string
  repo: Repo
  key: string
}

export type JobOutcome =
  | { job: RepoJob; result: TaskResult<Repo> }
  | { job: CodeJob; result: TaskResult<Code> }

export interface SchedulerHandlers {
  onRepo(job: RepoJob, result: TaskResult<Repo>): Promise<void>
  onCode(job: CodeJob, result: TaskResult<Code>): Promise<void>
}

interface PendingJob {
  outcome: () => JobOutcome | null
  task: PoolTask<unknown>
  job: RepoJob | CodeJob
}

/**
 * Bounds deferred work to the pool's worker count. Ready items bypass the
 * pool and go straight to their handler; thunks become pending jobs whose
 * results are handed back through `waitForAny`.
 */
export class JobScheduler {
  private pending = new Map<number, PendingJob>()

  constructor(private pool: WorkerPool, private handlers: SchedulerHandlers) {}

  get pendingCount(): number {
    return this.pending.size
  }

  get isFull(): boolean {
    return this.pending.size >= this.pool.maxWorkers
  }

  async admitRepo(item: RepoItem, analyzerFeatures: AnalyzerFeatures): Promise<void> {
    if (item.kind === 'repo') {
      await this.handlers.onRepo(repoJob(item, analyzerFeatures), { ok: true, value: item })
      return
    }
    this.submitRepo(item, analyzerFeatures)
  }

  async admitCode(item: CodeItem): Promise<void> {
    if (item.kind === 'code') {
      await this.handlers.onCode(codeJob(item), { ok: true, value: item })
      return
    }
    this.submitCode(item)
  }

  private submitRepo(item: RepoThunk, analyzerFeatures: AnalyzerFeatures): void {
    this.ensureCapacity()
    const job = repoJob(item, analyzerFeatures)
    const task = this.pool.submit(item.thunk)
    let result: TaskResult<Repo> | null = null
    void task.settled.then(settled => { result = settled })
    this.pending.set(task.id, {
      job,
      task,
      outcome: () => result && { job, result }
    })
  }

  private submitCode(item: CodeThunk): void {
    this.ensureCapacity()
    const job = codeJob(item)
    const task = this.pool.submit(item.thunk)
    let result: TaskResult<Code> | null = null
    void task.settled.then(settled => { result = settled })
    this.pending.set(task.id, {
      job,
      task,
      outcome: () => result && { job, result }
    })
  }

  private ensureCapacity(): void {
    if (this.isFull) {
      throw new Error(`Cannot schedule more than ${this.pool.maxWorkers} concurrent jobs`)
    }
  }

  /**
   * Waits until at least one pending job settles, then delivers every settled
   * job to its handler. A job leaves the pending set before its handler runs.
   */
  async waitForAny(signal?: AbortSignal): Promise<void> {
    if (this.pending.size === 0) return
    signal?.throwIfAborted()

    const waiters: Promise<unknown>[] = [...this.pending.values()].map(pending => pending.task.settled)
    const abort = signal ? abortWaiter(signal) : null
    if (abort) waiters.push(abort.promise)
    try {
      await Promise.race(waiters)
    } finally {
      abort?.dispose()
    }
    if (signal?.aborted) {
      throw new SurveyInterruptedError()
    }

    const outcomes: JobOutcome[] = []
    for (const [id, pending] of this.pending) {
      const outcome = pending.outcome()
      if (outcome) {
        this.pending.delete(id)
        outcomes.push(outcome)
      }
    }
    for (const outcome of outcomes) {
      if (isRepoOutcome(outcome)) {
        await this.handlers.onRepo(outcome.job, outcome.result)
      } else {
        await this.handlers.onCode(outcome.job, outcome.result)
      }
    }
  }

  countRepoJobs(): number {
    let count = 0
    for (const { job } of this.pending.values()) {
      if (job.kind === 'repo') count++
    }
    return count
  }

  countCodeJobs(repo: { sourceName: string; key: string }): number {
    let count = 0
    for (const { job } of this.pending.values()) {
      if (job.kind === 'code' && sameRepo(job.repo, repo)) count++
    }
    return count
  }

  hasRepoJob(repo: { sourceName: string; key: string }): boolean {
    for (const { job } of this.pending.values()) {
      if (job.kind === 'repo' && sameRepo(job, repo)) return true
    }
    return false
  }

  cancelAll(): void {
    for (const pending of this.pending.values()) {
      pending.task.abort(new SurveyInterruptedError('Job cancelled'))
    }
    this.pending.clear()
  }
}

function isRepoOutcome(outcome: JobOutcome): outcome is Extract<JobOutcome, { job: RepoJob }> {
  return outcome.job.kind === 'repo'
}

function repoJob(item: RepoItem, analyzerFeatures: AnalyzerFeatures): RepoJob {
  return { kind: 'repo', sourceName: item.sourceName, key: item.key, analyzerFeatures }
}

function codeJob(item: CodeItem): CodeJob {
  return { kind: 'code', analyzerName: item.analyzerName, repo: item.repo, key: item.key }
}

function abortWaiter(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let listener = () => {}
  const promise = new Promise<void>(resolve => {
    listener = () => resolve()
    signal.addEventListener('abort', listener, { once: true })
  })
  return { promise, dispose: () => signal.removeEventListener('abort', listener) }
}
