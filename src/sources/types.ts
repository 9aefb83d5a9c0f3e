// src/sources/types.ts

export type RepoMetadata = Record<string, unknown>

/** Work that may run in the worker pool; it must only use what it captured. */
export type Thunk<T> = (signal: AbortSignal) => Promise<T>

/** A repository available in a local directory for analysis. */
export interface Repo {
  kind: 'repo'
  sourceName: string
  /** Unique within the source. */
  key: string
  path: string
  /** Called once analysis of the repo has finished. */
  cleanup: () => void | Promise<void>
  metadata: RepoMetadata
}

/** A repo that still has to be prepared (e.g. cloned) before analysis. */
export interface RepoThunk {
  kind: 'repo-thunk'
  sourceName: string
  key: string
  thunk: Thunk<Repo>
}

export type RepoItem = Repo | RepoThunk

export function repoLabel(repo: { sourceName: string; key: string }): string {
  return `${repo.sourceName}:${repo.key}`
}

export function sameRepo(
  a: { sourceName: string; key: string },
  b: { sourceName: string; key: string }
): boolean {
  return a.sourceName === b.sourceName && a.key === b.key
}
