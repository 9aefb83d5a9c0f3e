// src/survey/runner.ts
import type { Analyzer } from '../analyzers/analyzer.js'
import type { Code, CodeItem, GetCodeFeatures } from '../analyzers/types.js'
import type { Source } from '../sources/source.js'
import type { Repo } from '../sources/types.js'
import { repoLabel } from '../sources/types.js'
import type { AnalyzerFeatures, CompletionStore } from '../store/types.js'
import type { Logger } from '../logging/logger.js'
import { SurveyInterruptedError, errorMessage } from '../errors/index.js'
import { WorkerPool, type TaskResult } from './worker-pool.js'
import { JobScheduler, type CodeJob, type RepoJob } from './scheduler.js'
import { RepoFeed } from './repo-feed.js'
import { InFlightRepos, RepoCompletionTracker, type InFlightRepo } from './completion-tracker.js'
import type { ProgressListener, SurveyCounts } from './progress.js'

export interface SurveyRunnerSettings {
  sources: Source[]
  analyzers: Analyzer<unknown>[]
  store: CompletionStore
  maxWorkers: number
  continueOnFailure: boolean
  saveCodeFeatures: boolean
  saveOccurrences: boolean
  useSavedFeatures: boolean
  logger: Logger
}

export interface SurveyRunOptions {
  /** Stop taking new repos once this many are fetching, in flight or done. */
  maxRepos?: number | null
  /** Stop recording units once this many have been recorded. */
  maxCodes?: number | null
  signal?: AbortSignal
  onProgress?: ProgressListener
}

/**
 * Drives one survey run: pulls repos from the feed, streams their units into
 * the scheduler and records results until the sources are exhausted or a
 * limit is hit.
 */
export class SurveyRunner {
  private settings: SurveyRunnerSettings
  private options: SurveyRunOptions
  private pool: WorkerPool
  private scheduler: JobScheduler
  private inFlight = new InFlightRepos()
  private tracker: RepoCompletionTracker
  private feed: RepoFeed
  private completedCodeCount = 0

  constructor(settings: SurveyRunnerSettings, options: SurveyRunOptions = {}) {
    this.settings = settings
    this.options = options
    this.pool = new WorkerPool(settings.maxWorkers)
    this.scheduler = new JobScheduler(this.pool, {
      onRepo: (job, result) => this.handleRepoResult(job, result),
      onCode: (job, result) => this.handleCodeResult(job, result)
    })
    this.tracker = new RepoCompletionTracker({
      store: settings.store,
      inFlight: this.inFlight,
      countCodeJobs: repo => this.scheduler.countCodeJobs(repo),
      saveCodeFeatures: settings.saveCodeFeatures,
      logger: settings.logger,
      onRepoCompleted: repo => this.emitRepoCompleted(repo)
    })

    const analyzerFeatures: AnalyzerFeatures = {}
    for (const analyzer of settings.analyzers) {
      analyzerFeatures[analyzer.name] = analyzer.getFeatureNames()
    }
    this.feed = new RepoFeed({
      sources: settings.sources,
      store: settings.store,
      analyzerFeatures,
      useSavedFeatures: settings.useSavedFeatures,
      isInFlight: repo => this.inFlight.has(repo) || this.scheduler.hasRepoJob(repo),
      handleFailure: (error, message) => this.handleFailure(error, message),
      logger: settings.logger
    })
  }

  private get counts(): SurveyCounts {
    return {
      completedRepos: this.tracker.completedCount,
      completedCodes: this.completedCodeCount
    }
  }

  async run(): Promise<SurveyCounts> {
    const { signal } = this.options
    await this.settings.store.initialize()
    try {
      for (;;) {
        this.throwIfInterrupted()
        await this.fill()
        if (this.scheduler.pendingCount === 0 && !this.inFlight.hasQueued()) break
        await this.scheduler.waitForAny(signal)
        await this.tracker.check()
      }
      this.throwIfInterrupted()
    } catch (error) {
      if (signal?.aborted && !(error instanceof SurveyInterruptedError)) {
        throw new SurveyInterruptedError()
      }
      throw error
    } finally {
      await this.unwind()
    }
    return this.counts
  }

  /** Handles ready repos, then admits new ones while there is room. */
  private async fill(): Promise<void> {
    for (;;) {
      this.throwIfInterrupted()
      const queued = this.inFlight.takeQueued()
      if (queued) {
        await this.handleRepo(queued)
        await this.tracker.check()
        continue
      }
      if (this.scheduler.isFull || this.reachedMaxRepos() || this.reachedMaxCodes()) return

      const candidate = await this.feed.next()
      if (!candidate) return
      if (candidate.item.kind === 'repo-thunk') {
        this.settings.logger.info(`Fetching repo "${repoLabel(candidate.item)}"`)
      }
      await this.scheduler.admitRepo(candidate.item, candidate.analyzerFeatures)
    }
  }

  private async handleRepo(entry: InFlightRepo): Promise<void> {
    const { repo, analyzerFeatures } = entry
    const { store, logger } = this.settings
    await store.recordRepoMetadata(repo.sourceName, repo.key, repo.metadata)

    let maxCodesReached = this.reachedMaxCodes()
    analyzers: for (const analyzer of this.settings.analyzers) {
      if (maxCodesReached) break
      const features = analyzerFeatures[analyzer.name]
      if (!features) {
        logger.info(`Skipping completed analyzer "${analyzer.name}" for repo "${repoLabel(repo)}"`)
        continue
      }
      logger.info(`Analyzing repo "${repoLabel(repo)}" with analyzer "${analyzer.name}"`)

      const failureMessage = `Failed to get analyzer "${analyzer.name}" codes for repo "${repoLabel(repo)}"`
      let codes: AsyncIterator<CodeItem>
      try {
        codes = analyzer.codeGenerator(repo, this.codeFeatureLookup(repo, analyzer.name, features))[Symbol.asyncIterator]()
      } catch (error) {
        this.handleFailure(error, failureMessage)
        continue
      }

      for (;;) {
        let next: IteratorResult<CodeItem>
        try {
          next = await codes.next()
        } catch (error) {
          this.handleFailure(error, failureMessage)
          continue analyzers
        }
        if (next.done) break

        if (next.value.kind === 'code-thunk') {
          await this.waitForCapacity()
        }
        if (this.reachedMaxCodes()) {
          maxCodesReached = true
          await codes.return?.()
          break analyzers
        }
        this.throwIfInterrupted()
        await this.scheduler.admitCode(next.value)
      }
    }

    if (maxCodesReached) {
      logger.info(`Max codes reached, "${repoLabel(repo)}" will not be fully analyzed`)
    }
    entry.phase = 'analyzing'
  }

  private codeFeatureLookup(repo: Repo, analyzerName: string, features: string[]): GetCodeFeatures {
    if (!this.settings.useSavedFeatures) {
      return async () => features
    }
    return codeKey => this.settings.store.outstandingUnitFeatures(repo.sourceName, repo.key, analyzerName, codeKey, features)
  }

  private async waitForCapacity(): Promise<void> {
    while (this.scheduler.isFull) {
      await this.scheduler.waitForAny(this.options.signal)
      await this.tracker.check()
    }
  }

  private async handleRepoResult(job: RepoJob, result: TaskResult<Repo>): Promise<void> {
    if (!result.ok) {
      this.handleFailure(result.error, `Failed to fetch repo "${repoLabel(job)}" from source "${job.sourceName}"`)
      return
    }
    this.inFlight.add(result.value, job.analyzerFeatures)
  }

  private async handleCodeResult(job: CodeJob, result: TaskResult<Code>): Promise<void> {
    if (!result.ok) {
      this.handleFailure(
        result.error,
        `Failed to analyze code "${job.key}" from repo "${repoLabel(job.repo)}" with analyzer "${job.analyzerName}"`
      )
      return
    }
    if (this.reachedMaxCodes()) return

    const code = result.value
    await this.settings.store.recordUnitResult({
      sourceName: code.repo.sourceName,
      repoKey: code.repo.key,
      analyzerName: code.analyzerName,
      codeKey: code.key,
      features: code.features
    }, this.settings.saveOccurrences)
    this.completedCodeCount++
    this.options.onProgress?.({ type: 'codeCompleted', code, ...this.counts })
  }

  private async emitRepoCompleted(repo: Repo): Promise<void> {
    const { onProgress } = this.options
    if (!onProgress) return
    const features = await this.settings.store.queryRepoAggregates({
      sourceNames: [repo.sourceName],
      repoKeys: [repo.key]
    })
    onProgress({ type: 'repoCompleted', repo, features, ...this.counts })
  }

  private handleFailure(error: unknown, message: string): void {
    if (this.settings.continueOnFailure) {
      this.settings.logger.error(`${message}, skipping: ${errorMessage(error)}`)
      return
    }
    this.settings.logger.error(message)
    throw error
  }

  /** Ready repos and units never wait on the scheduler, so the signal is checked here too. */
  private throwIfInterrupted(): void {
    if (this.options.signal?.aborted) throw new SurveyInterruptedError()
  }

  private reachedMaxRepos(): boolean {
    const { maxRepos } = this.options
    if (maxRepos === undefined || maxRepos === null) return false
    const started = this.tracker.completedCount + this.scheduler.countRepoJobs() + this.inFlight.size
    return started >= maxRepos
  }

  private reachedMaxCodes(): boolean {
    const { maxCodes } = this.options
    if (maxCodes === undefined || maxCodes === null) return false
    return this.completedCodeCount >= maxCodes
  }

  private async unwind(): Promise<void> {
    const { logger } = this.settings
    this.scheduler.cancelAll()
    this.pool.terminate()
    for (const entry of this.inFlight.list()) {
      logger.debug(`Cleaning up unfinished repo "${repoLabel(entry.repo)}"`)
      await this.tracker.cleanup(entry.repo)
    }
    this.inFlight.clear()
    await this.settings.store.close()
  }
}
