// src/sources/local-source.ts
import type { Repo, RepoItem } from './types.js'
import { Source, type SourceOptions } from './source.js'

/**
 * Repos from local directories. The directory path doubles as the repo key,
 * and nothing is removed on cleanup.
 */
export class LocalSource extends Source {
  static readonly defaultName = 'local'
  private dirs: string[]

  constructor(dirs: string[], options: SourceOptions = {}) {
    super(LocalSource.defaultName, options)
    this.dirs = dirs
  }

  async fetchRepo(repoKey: string): Promise<Repo> {
    return this.repo({ key: repoKey, path: repoKey })
  }

  async *repoGenerator(): AsyncGenerator<RepoItem> {
    for (const dir of this.dirs) {
      yield await this.fetchRepo(dir)
    }
  }
}
