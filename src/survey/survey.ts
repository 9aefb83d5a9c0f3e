// src/survey/survey.ts
import { availableParallelism } from 'os'
import type { Analyzer } from '../analyzers/analyzer.js'
import type { Source } from '../sources/source.js'
import type { RepoMetadata } from '../sources/types.js'
import type { CodeFeature, FeatureFilters, RepoFeature } from '../store/types.js'
import { SqliteCompletionStore } from '../store/sqlite-store.js'
import { createConsoleLogger, type Logger } from '../logging/logger.js'
import { SurveyConfigError } from '../errors/index.js'
import { getDuplicates } from '../utils/collections.js'
import { SurveyRunner, type SurveyRunOptions } from './runner.js'
import type { SurveyCounts } from './progress.js'

export interface CodeSurveyOptions {
  sources: Source[]
  analyzers: Analyzer<unknown>[]
  /** SQLite file holding survey results; created when missing. */
  dbPath: string
  /**
   * Most repo fetches and unit analyses in flight at once. They run as async
   * tasks on this process's event loop, so only the waiting on git, the
   * network and the disk overlaps; CPU-bound analysis does not get faster with
   * more workers. Defaults to the number of available CPUs.
   */
  maxWorkers?: number
  /** Log and skip failing sources, analyzers and jobs instead of stopping. */
  continueOnFailure?: boolean
  /** Keep per-unit results after they are aggregated into their repo. */
  saveCodeFeatures?: boolean
  saveOccurrences?: boolean
  /** Skip units and repos whose features are already stored. */
  useSavedFeatures?: boolean
  logger?: Logger
}

export type RepoFeatureSummary = Pick<RepoFeature, 'updated' | 'occurrenceCount' | 'codeOccurrenceCount' | 'codeTotalCount'>
export type CodeFeatureSummary = Pick<CodeFeature, 'updated' | 'occurrenceCount' | 'occurrences'>

export interface SurveyTreeAnalyzer {
  features?: Record<string, RepoFeatureSummary>
  /** Only present while per-unit results are kept. */
  codes?: Record<string, { features: Record<string, CodeFeatureSummary> }>
}

export interface SurveyTree {
  sources: Record<string, {
    repos: Record<string, {
      analyzers: Record<string, SurveyTreeAnalyzer>
      repoMetadata: RepoMetadata
    }>
  }>
}

function assertUniqueNames(kind: string, names: string[]): void {
  const duplicates = getDuplicates(names)
  if (duplicates.length > 0) {
    throw new SurveyConfigError(
      `Cannot create survey with duplicate ${kind} names: ${duplicates.join(', ')}. ` +
      `Please set a unique name for each ${kind}.`
    )
  }
}

/**
 * Surveys repos from a set of sources with a set of analyzers. Results are
 * kept in `dbPath`, so repeated runs extend earlier ones and the results can
 * be inspected without running again.
 */
export class CodeSurvey {
  readonly sources: Source[]
  readonly analyzers: Analyzer<unknown>[]
  readonly dbPath: string
  readonly maxWorkers: number
  readonly continueOnFailure: boolean
  readonly saveCodeFeatures: boolean
  readonly saveOccurrences: boolean
  readonly useSavedFeatures: boolean
  private logger: Logger

  constructor(options: CodeSurveyOptions) {
    assertUniqueNames('source', options.sources.map(source => source.name))
    assertUniqueNames('analyzer', options.analyzers.map(analyzer => analyzer.name))
    if (!options.dbPath) {
      throw new SurveyConfigError('A database path is required')
    }
    if (options.maxWorkers !== undefined && (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1)) {
      throw new SurveyConfigError(`maxWorkers must be a positive integer, got ${options.maxWorkers}`)
    }

    this.sources = options.sources
    this.analyzers = options.analyzers
    this.dbPath = options.dbPath
    this.maxWorkers = options.maxWorkers ?? availableParallelism()
    this.continueOnFailure = options.continueOnFailure ?? true
    this.saveCodeFeatures = options.saveCodeFeatures ?? true
    this.saveOccurrences = options.saveOccurrences ?? true
    this.useSavedFeatures = options.useSavedFeatures ?? true
    this.logger = options.logger || createConsoleLogger()
  }

  /**
   * Runs until every source is exhausted or a limit is reached. Sources may
   * be endless, so pass `maxRepos`, `maxCodes` or an abort signal for them.
   */
  async run(options: SurveyRunOptions = {}): Promise<SurveyCounts> {
    this.logger.info(`Preparing database in ${this.dbPath}`)
    const runner = new SurveyRunner({
      sources: this.sources,
      analyzers: this.analyzers,
      store: new SqliteCompletionStore(this.dbPath),
      maxWorkers: this.maxWorkers,
      continueOnFailure: this.continueOnFailure,
      saveCodeFeatures: this.saveCodeFeatures,
      saveOccurrences: this.saveOccurrences,
      useSavedFeatures: this.useSavedFeatures,
      logger: this.logger
    }, options)
    return runner.run()
  }

  async getRepoFeatures(filters: FeatureFilters = {}): Promise<RepoFeature[]> {
    return this.withStore(store => store.queryRepoAggregates(filters))
  }

  async getCodeFeatures(filters: FeatureFilters = {}): Promise<CodeFeature[]> {
    return this.withStore(store => store.queryUnitResults(filters))
  }

  /** Repo and unit results nested by source, repo and analyzer. */
  async getSurveyTree(filters: FeatureFilters = {}): Promise<SurveyTree> {
    const [codeFeatures, repoFeatures] = await this.withStore(store =>
      Promise.all([store.queryUnitResults(filters), store.queryRepoAggregates(filters)])
    )
    const tree: SurveyTree = { sources: {} }
    const repoNode = (feature: CodeFeature | RepoFeature) => {
      const source = tree.sources[feature.sourceName] ??= { repos: {} }
      return source.repos[feature.repoKey] ??= { analyzers: {}, repoMetadata: feature.repoMetadata }
    }
    for (const c of codeFeatures) {
      const analyzer = repoNode(c).analyzers[c.analyzerName] ??= {}
      const codes = analyzer.codes ??= {}
      const code = codes[c.codeKey] ??= { features: {} }
      code.features[c.featureName] = {
        updated: c.updated,
        occurrenceCount: c.occurrenceCount,
        occurrences: c.occurrences
      }
    }
    for (const r of repoFeatures) {
      const analyzer = repoNode(r).analyzers[r.analyzerName] ??= {}
      const features = analyzer.features ??= {}
      features[r.featureName] = {
        updated: r.updated,
        occurrenceCount: r.occurrenceCount,
        codeOccurrenceCount: r.codeOccurrenceCount,
        codeTotalCount: r.codeTotalCount
      }
    }
    return tree
  }

  private async withStore<T>(query: (store: SqliteCompletionStore) => Promise<T>): Promise<T> {
    const store = new SqliteCompletionStore(this.dbPath)
    await store.initialize()
    try {
      return await query(store)
    } finally {
      await store.close()
    }
  }
}
