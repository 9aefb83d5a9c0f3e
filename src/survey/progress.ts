// src/survey/progress.ts
import type { Code } from '../analyzers/types.js'
import type { Repo } from '../sources/types.js'
import type { RepoFeature } from '../store/types.js'

export interface SurveyCounts {
  completedRepos: number
  completedCodes: number
}

export type SurveyProgressEvent =
  | ({ type: 'codeCompleted'; code: Code } & SurveyCounts)
  | ({ type: 'repoCompleted'; repo: Repo; features: RepoFeature[] } & SurveyCounts)

export type ProgressListener = (event: SurveyProgressEvent) => void
