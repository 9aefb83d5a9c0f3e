// src/sources/source.ts
import type { Repo, RepoItem, RepoMetadata, RepoThunk, Thunk } from './types.js'
import { SurveyConfigError } from '../errors/index.js'

export interface SourceOptions {
  name?: string
}

/** Provides repos to be analysed by a survey. */
export abstract class Source {
  readonly name: string

  constructor(defaultName: string, options: SourceOptions = {}) {
    this.name = options.name ?? defaultName
    if (!this.name) {
      throw new SurveyConfigError('Source name cannot be empty')
    }
  }

  /**
   * Prepares the repo with the given key. Used by repoGenerator, and handy for
   * re-opening a repo named in survey results.
   */
  abstract fetchRepo(repoKey: string, signal?: AbortSignal): Promise<Repo>

  /** Repos ready for analysis, or thunks that prepare them. May never end. */
  abstract repoGenerator(): AsyncIterable<RepoItem>

  toString(): string {
    return this.name
  }

  protected repo(fields: { key: string; path: string; cleanup?: () => void | Promise<void>; metadata?: RepoMetadata }): Repo {
    return {
      kind: 'repo',
      sourceName: this.name,
      key: fields.key,
      path: fields.path,
      cleanup: fields.cleanup || (() => {}),
      metadata: fields.metadata || {}
    }
  }

  protected repoThunk(fields: { key: string; thunk: Thunk<Repo> }): RepoThunk {
    return {
      kind: 'repo-thunk',
      sourceName: this.name,
      key: fields.key,
      thunk: fields.thunk
    }
  }
}
