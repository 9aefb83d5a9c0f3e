// src/reporter/types.ts

/** Totals for one feature across every surveyed repo. */
export interface FeatureSummary {
  analyzerName: string
  featureName: string
  repoCount: number
  reposWithFeature: number
  occurrenceCount: number
  codeOccurrenceCount: number
  codeTotalCount: number
}
