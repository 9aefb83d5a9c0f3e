// src/sources/inline-source.ts
import { mkdir, mkdtemp, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import type { Repo, RepoItem } from './types.js'
import { Source, type SourceOptions } from './source.js'
import { removeDir } from './git.js'

/**
 * A single repo written to a temporary directory from a map of relative paths
 * to file contents. Only use with trusted paths: they are not checked for
 * absolute or parent-directory segments.
 */
export class InlineSource extends Source {
  static readonly defaultName = 'inline'
  private pathToContent: Record<string, string>

  constructor(pathToContent: Record<string, string>, options: SourceOptions = {}) {
    super(InlineSource.defaultName, options)
    this.pathToContent = pathToContent
  }

  async fetchRepo(repoKey: string): Promise<Repo> {
    return this.repo({
      key: repoKey,
      path: repoKey,
      cleanup: () => removeDir(repoKey)
    })
  }

  async *repoGenerator(): AsyncGenerator<RepoItem> {
    const tempDir = await mkdtemp(join(tmpdir(), 'reposurvey-inline-'))
    for (const [relativePath, content] of Object.entries(this.pathToContent)) {
      const filePath = join(tempDir, relativePath)
      await mkdir(dirname(filePath), { recursive: true })
      await writeFile(filePath, content, 'utf-8')
    }
    yield await this.fetchRepo(tempDir)
  }
}
