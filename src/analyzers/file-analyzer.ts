// src/analyzers/file-analyzer.ts
import { glob } from 'glob'
import { join } from 'path'
import type { Repo } from '../sources/types.js'
import type { CodeItem, GetCodeFeatures } from './types.js'
import { Analyzer, type AnalyzerOptions } from './analyzer.js'
import { ignorePatternsFilter, type FileFilter, type FileInfo } from './file-filters.js'

export interface FileAnalyzerOptions<CodeRepr> extends AnalyzerOptions<CodeRepr> {
  /** Glob relative to the repo root. */
  fileGlob?: string
  fileFilters?: FileFilter[]
}

/**
 * Analyzer whose units of code are the files of a repo. Every file matching
 * the glob and passing the filters becomes a deferred analysis job keyed by
 * its path relative to the repo.
 */
export abstract class FileAnalyzer<CodeRepr> extends Analyzer<CodeRepr> {
  readonly fileGlob: string
  private fileFilters: FileFilter[]

  constructor(defaultName: string, defaultGlob: string, options: FileAnalyzerOptions<CodeRepr>) {
    super(defaultName, options)
    this.fileGlob = options.fileGlob || defaultGlob
    this.fileFilters = options.fileFilters || [ignorePatternsFilter()]
  }

  abstract prepareFile(file: FileInfo): Promise<CodeRepr | null>

  async prepareCodeRepresentation(repo: Repo, codeKey: string): Promise<CodeRepr | null> {
    return this.prepareFile(fileInfo(repo, codeKey))
  }

  async listFileKeys(repo: Repo): Promise<string[]> {
    const paths = await glob(this.fileGlob, { cwd: repo.path, nodir: true, posix: true })
    return paths
      .sort()
      .filter(relativePath => !this.fileFilters.some(filter => filter(fileInfo(repo, relativePath))))
  }

  async *codeGenerator(repo: Repo, getCodeFeatures: GetCodeFeatures): AsyncGenerator<CodeItem> {
    for (const fileKey of await this.listFileKeys(repo)) {
      const features = await getCodeFeatures(fileKey)
      if (features.length === 0) continue

      yield this.codeThunk({ repo, key: fileKey, features })
    }
  }
}

function fileInfo(repo: Repo, relativePath: string): FileInfo {
  return {
    repoPath: repo.path,
    relativePath,
    absPath: join(repo.path, relativePath)
  }
}
