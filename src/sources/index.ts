// src/sources/index.ts
export { Source } from './source.js'
export type { SourceOptions } from './source.js'
export { LocalSource } from './local-source.js'
export { GitSource } from './git-source.js'
export type { GitSourceOptions } from './git-source.js'
export { GithubSampleSource } from './github-sample-source.js'
export type { GithubSampleSourceOptions } from './github-sample-source.js'
export { OctokitSearchClient } from './github-search.js'
export type { GithubSort, RepoSearchClient, RepoSearchPage, RepoSearchParams, SearchedRepo } from './github-search.js'
export { InlineSource } from './inline-source.js'
export { cloneGitRepo } from './git.js'
export type { CloneFn } from './git.js'
export * from './types.js'
