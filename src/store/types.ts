// src/store/types.ts
import type { Feature, Occurrence } from '../analyzers/features.js'
import type { RepoMetadata } from '../sources/types.js'

/** Analyzer name → feature names. */
export type AnalyzerFeatures = Record<string, string[]>

export interface FeatureFilters {
  sourceNames?: string[]
  repoKeys?: string[]
  analyzerNames?: string[]
  featureNames?: string[]
}

/** Aggregated feature counts for a whole repo. */
export interface RepoFeature {
  updated: Date
  sourceName: string
  repoKey: string
  analyzerName: string
  featureName: string
  occurrenceCount: number
  /** Units with at least one occurrence. */
  codeOccurrenceCount: number
  /** Units analysed for this feature, excluding skipped ones. */
  codeTotalCount: number
  repoMetadata: RepoMetadata
}

export interface CodeFeature {
  updated: Date
  sourceName: string
  repoKey: string
  analyzerName: string
  codeKey: string
  featureName: string
  /** `null` when analysis of the unit was skipped. */
  occurrenceCount: number | null
  /** `null` when skipped or when occurrences were not persisted. */
  occurrences: Occurrence[] | null
  repoMetadata: RepoMetadata
}

export interface UnitResult {
  sourceName: string
  repoKey: string
  analyzerName: string
  codeKey: string
  features: Record<string, Feature>
}

/**
 * Durable record of what has been analysed. All writes happen on the survey's
 * coordinating flow, never inside a worker.
 */
export interface CompletionStore {
  initialize(): Promise<void>
  close(): Promise<void>

  /** Subset of `requested` not yet aggregated for the repo; analyzers with nothing left are omitted. */
  outstandingFeatures(sourceName: string, repoKey: string, requested: AnalyzerFeatures): Promise<AnalyzerFeatures>
  outstandingUnitFeatures(
    sourceName: string,
    repoKey: string,
    analyzerName: string,
    codeKey: string,
    requested: string[]
  ): Promise<string[]>

  recordUnitResult(result: UnitResult, persistOccurrences: boolean): Promise<void>
  recordRepoMetadata(sourceName: string, repoKey: string, metadata: RepoMetadata): Promise<void>
  aggregateAndPersist(sourceName: string, repoKey: string, deleteUnitRecords: boolean): Promise<void>

  queryRepoAggregates(filters?: FeatureFilters): Promise<RepoFeature[]>
  queryUnitResults(filters?: FeatureFilters): Promise<CodeFeature[]>
}
