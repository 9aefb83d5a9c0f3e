// src/survey/completion-tracker.ts
import type { Repo } from '../sources/types.js'
import { repoLabel, sameRepo } from '../sources/types.js'
import type { AnalyzerFeatures, CompletionStore } from '../store/types.js'
import type { Logger } from '../logging/logger.js'
import { errorMessage } from '../errors/index.js'

/**
 * `queued`: ready, waiting for its units to be listed.
 * `streaming`: units are being listed and scheduled.
 * `analyzing`: every unit is done or has a pending job.
 */
export type RepoPhase = 'queued' | 'streaming' | 'analyzing'

export interface InFlightRepo {
  repo: Repo
  analyzerFeatures: AnalyzerFeatures
  phase: RepoPhase
}

export class InFlightRepos {
  private entries: InFlightRepo[] = []

  get size(): number {
    return this.entries.length
  }

  add(repo: Repo, analyzerFeatures: AnalyzerFeatures): InFlightRepo {
    const entry: InFlightRepo = { repo, analyzerFeatures, phase: 'queued' }
    this.entries.push(entry)
    return entry
  }

  has(repo: { sourceName: string; key: string }): boolean {
    return this.entries.some(entry => sameRepo(entry.repo, repo))
  }

  remove(entry: InFlightRepo): void {
    this.entries = this.entries.filter(other => other !== entry)
  }

  /** Takes the oldest queued entry, marking it as streaming. */
  takeQueued(): InFlightRepo | null {
    const entry = this.entries.find(other => other.phase === 'queued')
    if (!entry) return null
    entry.phase = 'streaming'
    return entry
  }

  hasQueued(): boolean {
    return this.entries.some(entry => entry.phase === 'queued')
  }

  list(): InFlightRepo[] {
    return [...this.entries]
  }

  clear(): void {
    this.entries = []
  }
}

export interface RepoCompletionTrackerOptions {
  store: CompletionStore
  inFlight: InFlightRepos
  countCodeJobs: (repo: Repo) => number
  saveCodeFeatures: boolean
  logger: Logger
  onRepoCompleted?: (repo: Repo) => Promise<void>
}

/**
 * Finishes repos whose units have all been handled: aggregates their results,
 * cleans them up and drops them from the in-flight set.
 */
export class RepoCompletionTracker {
  completedCount = 0
  private cleaned = new WeakSet<Repo>()

  constructor(private options: RepoCompletionTrackerOptions) {}

  async check(): Promise<void> {
    const { inFlight, store, logger } = this.options
    const completed = inFlight.list().filter(entry =>
      entry.phase === 'analyzing' && this.options.countCodeJobs(entry.repo) === 0
    )
    for (const entry of completed) {
      const { repo } = entry
      await store.aggregateAndPersist(repo.sourceName, repo.key, !this.options.saveCodeFeatures)
      this.completedCount++
      logger.info(`Completed repo "${repoLabel(repo)}"`)
      // A repo counts as in flight until its cleanup is done
      await this.cleanup(repo)
      inFlight.remove(entry)
      await this.options.onRepoCompleted?.(repo)
    }
  }

  /** Runs the repo's cleanup unless it already ran. Failures are logged. */
  async cleanup(repo: Repo): Promise<void> {
    if (this.cleaned.has(repo)) return
    this.cleaned.add(repo)
    try {
      await repo.cleanup()
    } catch (error) {
      this.options.logger.warn(`Failed to clean up repo "${repoLabel(repo)}": ${errorMessage(error)}`)
    }
  }
}
