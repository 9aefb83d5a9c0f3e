// src/survey/index.ts
export { CodeSurvey } from './survey.js'
export type { CodeSurveyOptions, SurveyTree, SurveyTreeAnalyzer, RepoFeatureSummary, CodeFeatureSummary } from './survey.js'
export { SurveyRunner } from './runner.js'
export type { SurveyRunOptions, SurveyRunnerSettings } from './runner.js'
export type { SurveyCounts, SurveyProgressEvent, ProgressListener } from './progress.js'
export { WorkerPool } from './worker-pool.js'
export type { PoolTask, TaskResult } from './worker-pool.js'
export { JobScheduler } from './scheduler.js'
export type { CodeJob, RepoJob, JobOutcome, SchedulerHandlers } from './scheduler.js'
export { RepoFeed } from './repo-feed.js'
export type { RepoCandidate, RepoFeedOptions } from './repo-feed.js'
export { InFlightRepos, RepoCompletionTracker } from './completion-tracker.js'
export type { InFlightRepo, RepoPhase } from './completion-tracker.js'
