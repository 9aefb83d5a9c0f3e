// src/survey/repo-feed.ts
import type { Source } from '../sources/source.js'
import type { RepoItem } from '../sources/types.js'
import { repoLabel } from '../sources/types.js'
import type { AnalyzerFeatures, CompletionStore } from '../store/types.js'
import type { Logger } from '../logging/logger.js'

export interface RepoCandidate {
  item: RepoItem
  /** Features still missing for the repo; never empty. */
  analyzerFeatures: AnalyzerFeatures
}

export interface RepoFeedOptions {
  sources: Source[]
  store: CompletionStore
  analyzerFeatures: AnalyzerFeatures
  useSavedFeatures: boolean
  isInFlight: (repo: { sourceName: string; key: string }) => boolean
  /** Throws when the survey should stop on the failure. */
  handleFailure: (error: unknown, message: string) => void
  logger: Logger
}

interface SourceCursor {
  source: Source
  iterator: AsyncIterator<RepoItem>
}

/**
 * Draws repos from every source in turn and yields those that still have
 * features to survey.
 */
export class RepoFeed {
  private cursors: SourceCursor[]
  private turn = 0

  constructor(private options: RepoFeedOptions) {
    this.cursors = options.sources.map(source => ({
      source,
      iterator: source.repoGenerator()[Symbol.asyncIterator]()
    }))
  }

  get exhausted(): boolean {
    return this.cursors.length === 0
  }

  /** Next repo worth surveying, or `null` once every source is exhausted. */
  async next(): Promise<RepoCandidate | null> {
    const { logger } = this.options
    for (;;) {
      const item = await this.nextItem()
      if (!item) return null

      if (this.options.isInFlight(item)) {
        logger.info(`Skipping in-progress repo "${repoLabel(item)}"`)
        continue
      }

      const analyzerFeatures = this.options.useSavedFeatures
        ? await this.options.store.outstandingFeatures(item.sourceName, item.key, this.options.analyzerFeatures)
        : this.options.analyzerFeatures
      if (Object.keys(analyzerFeatures).length === 0) {
        logger.info(`Skipping fully analyzed repo "${repoLabel(item)}"`)
        continue
      }

      return { item, analyzerFeatures }
    }
  }

  private async nextItem(): Promise<RepoItem | null> {
    while (this.cursors.length > 0) {
      const index = this.turn % this.cursors.length
      const cursor = this.cursors[index]
      let result: IteratorResult<RepoItem>
      try {
        result = await cursor.iterator.next()
      } catch (error) {
        this.turn = index + 1
        this.options.handleFailure(error, `Failed to fetch repo from source "${cursor.source.name}"`)
        continue
      }
      if (result.done) {
        this.cursors.splice(index, 1)
        this.turn = index
        continue
      }
      this.turn = index + 1
      return result.value
    }
    return null
  }
}
