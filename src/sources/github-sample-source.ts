// src/sources/github-sample-source.ts
import type { Repo, RepoItem } from './types.js'
import { Source, type SourceOptions } from './source.js'
import { cloneGitRepo, removeDir, type CloneFn } from './git.js'
import { OctokitSearchClient, type GithubSort, type RepoSearchClient, type SearchedRepo } from './github-search.js'
import { SourceError, errorMessage } from '../errors/index.js'
import { randomInt, seededRandom } from '../utils/random.js'
import { silentLogger, type Logger } from '../logging/logger.js'

export interface GithubSampleSourceOptions extends SourceOptions {
  searchQuery?: string
  /** Only repos tagged with this language are sampled. */
  language?: string | null
  /** Skip repos larger than this many kilobytes. `null` disables the limit. */
  maxKb?: number | null
  sort?: GithubSort
  authToken?: string
  randomSeed?: number
  client?: RepoSearchClient
  clone?: CloneFn
  logger?: Logger
}

const REPOS_PER_PAGE = 100
// GitHub only returns the first 1,000 search results
const MAX_RESULTS = 1000
const MAX_EMPTY_PAGES = 5

/**
 * Repos sampled from randomly chosen pages of GitHub repository search
 * results, cloned into temporary directories.
 *
 * The sequence never ends on its own; it stops only when several searches in
 * a row return no matching repos or fail.
 */
export class GithubSampleSource extends Source {
  static readonly defaultName = 'github_sample'
  private searchQuery: string
  private language: string | null
  private maxKb: number | null
  private sort: GithubSort
  private randomSeed?: number
  private client: RepoSearchClient
  private clone: CloneFn
  private logger: Logger

  constructor(options: GithubSampleSourceOptions = {}) {
    super(GithubSampleSource.defaultName, options)
    this.searchQuery = options.searchQuery || ''
    this.language = options.language?.toLowerCase() ?? null
    this.maxKb = options.maxKb === undefined ? 50_000 : options.maxKb
    this.sort = options.sort || 'updated'
    this.randomSeed = options.randomSeed
    this.client = options.client || new OctokitSearchClient(options.authToken)
    this.clone = options.clone || cloneGitRepo
    this.logger = options.logger || silentLogger
  }

  buildQuery(): string {
    const parts: string[] = []
    if (this.searchQuery) parts.push(this.searchQuery)
    if (this.language !== null) parts.push(`language:${this.language}`)
    if (this.maxKb !== null) parts.push(`size:<=${this.maxKb}`)
    return parts.join(' ')
  }

  private async searchPage(page: number): Promise<{ pageCount: number; repos: SearchedRepo[] }> {
    const result = await this.client.searchRepos({
      q: this.buildQuery(),
      sort: this.sort,
      perPage: REPOS_PER_PAGE,
      page
    })
    return {
      pageCount: Math.max(1, Math.ceil(Math.min(MAX_RESULTS, result.totalCount) / REPOS_PER_PAGE)),
      repos: result.items.filter(item =>
        this.language === null || String(item.language).toLowerCase() === this.language
      )
    }
  }

  private async cloneRepo(data: SearchedRepo, signal?: AbortSignal): Promise<Repo> {
    let tempDir: string
    try {
      tempDir = await this.clone(data.cloneUrl, signal)
    } catch (error) {
      throw new SourceError(`Source ${this.name} failed to clone from GitHub: ${errorMessage(error)}`, { cause: error })
    }
    return this.repo({
      key: data.fullName,
      path: tempDir,
      cleanup: () => removeDir(tempDir),
      metadata: { stars: data.stars }
    })
  }

  async fetchRepo(repoKey: string, signal?: AbortSignal): Promise<Repo> {
    const data = await this.client.getRepo(repoKey)
    return this.cloneRepo(data, signal)
  }

  async *repoGenerator(): AsyncGenerator<RepoItem> {
    const random = this.randomSeed === undefined ? Math.random : seededRandom(this.randomSeed)
    let pageCount = 1
    let emptyPages = 0

    while (emptyPages < MAX_EMPTY_PAGES) {
      this.logger.info(`Source "${this.name}" searching GitHub for repos`)
      let result: { pageCount: number; repos: SearchedRepo[] }
      try {
        result = await this.searchPage(randomInt(random, 1, pageCount))
      } catch (error) {
        // A failed search counts as an empty one
        this.logger.warn(`Source "${this.name}" GitHub search failed: ${errorMessage(error)}`)
        emptyPages++
        continue
      }
      pageCount = result.pageCount
      emptyPages = result.repos.length === 0 ? emptyPages + 1 : 0

      for (const data of result.repos) {
        yield this.repoThunk({
          key: data.fullName,
          thunk: signal => this.cloneRepo(data, signal)
        })
      }
    }
    this.logger.warn(`Source "${this.name}" found no repos in ${MAX_EMPTY_PAGES} searches, stopping`)
  }
}
