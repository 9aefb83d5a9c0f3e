// src/sources/git-source.ts
import type { Repo, RepoItem } from './types.js'
import { Source, type SourceOptions } from './source.js'
import { cloneGitRepo, removeDir, type CloneFn } from './git.js'
import { SourceError, errorMessage } from '../errors/index.js'

export interface GitSourceOptions extends SourceOptions {
  clone?: CloneFn
}

/**
 * Repos cloned from remote git URLs into temporary directories, which are
 * deleted on cleanup.
 */
export class GitSource extends Source {
  static readonly defaultName = 'git'
  private repoUrls: string[]
  private clone: CloneFn

  constructor(repoUrls: string[], options: GitSourceOptions = {}) {
    super(GitSource.defaultName, options)
    this.repoUrls = repoUrls
    this.clone = options.clone || cloneGitRepo
  }

  async fetchRepo(repoKey: string, signal?: AbortSignal): Promise<Repo> {
    let tempDir: string
    try {
      tempDir = await this.clone(repoKey, signal)
    } catch (error) {
      throw new SourceError(`Source ${this.name} failed to clone "${repoKey}": ${errorMessage(error)}`, { cause: error })
    }
    return this.repo({
      key: repoKey,
      path: tempDir,
      cleanup: () => removeDir(tempDir)
    })
  }

  async *repoGenerator(): AsyncGenerator<RepoItem> {
    for (const url of this.repoUrls) {
      yield this.repoThunk({
        key: url,
        thunk: signal => this.fetchRepo(url, signal)
      })
    }
  }
}
