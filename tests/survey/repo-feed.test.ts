// tests/survey/repo-feed.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { RepoFeed, type RepoFeedOptions } from '../../src/survey/repo-feed.js'
import { SqliteCompletionStore } from '../../src/store/sqlite-store.js'
import { found } from '../../src/analyzers/features.js'
import { errorMessage } from '../../src/errors/index.js'
import type { Source } from '../../src/sources/source.js'
import { FakeSource, recordingLogger } from '../fixtures.js'

describe('RepoFeed', () => {
  let store: SqliteCompletionStore

  beforeEach(async () => {
    store = new SqliteCompletionStore(':memory:')
    await store.initialize()
  })

  afterEach(async () => {
    await store.close()
  })

  function feed(sources: Source[], overrides: Partial<RepoFeedOptions> = {}) {
    const { logger, logs } = recordingLogger()
    const failures: string[] = []
    const repoFeed = new RepoFeed({
      sources,
      store,
      analyzerFeatures: { words: ['x'] },
      useSavedFeatures: true,
      isInFlight: () => false,
      handleFailure: (error, message) => { failures.push(`${message}: ${errorMessage(error)}`) },
      logger,
      ...overrides
    })
    return { repoFeed, logs, failures }
  }

  async function drain(repoFeed: RepoFeed): Promise<string[]> {
    const labels: string[] = []
    for (let candidate = await repoFeed.next(); candidate; candidate = await repoFeed.next()) {
      labels.push(`${candidate.item.sourceName}:${candidate.item.key}`)
    }
    return labels
  }

  it('should take repos from each source in turn', async () => {
    const { repoFeed } = feed([
      new FakeSource('a', [{ key: 'a1' }, { key: 'a2' }, { key: 'a3' }]),
      new FakeSource('b', [{ key: 'b1', deferred: true }])
    ])

    expect(await drain(repoFeed)).toEqual(['a:a1', 'b:b1', 'a:a2', 'a:a3'])
    expect(repoFeed.exhausted).toBe(true)
  })

  it('should report a failing source and keep going with the others', async () => {
    const broken = new FakeSource('broken', [{ key: 'r1' }, { key: 'r2' }], { throwAfter: 1 })
    const healthy = new FakeSource('healthy', [{ key: 'r3' }, { key: 'r4' }])
    const { repoFeed, failures } = feed([broken, healthy])

    expect(await drain(repoFeed)).toEqual(['broken:r1', 'healthy:r3', 'healthy:r4'])
    expect(failures).toEqual(['Failed to fetch repo from source "broken": source broke'])
  })

  it('should stop when the failure handler throws', async () => {
    const { repoFeed } = feed([new FakeSource('broken', [{ key: 'r1' }], { throwAfter: 0 })], {
      handleFailure: (error) => { throw error }
    })

    await expect(repoFeed.next()).rejects.toThrow('source broke')
  })

  it('should skip repos that are already in flight', async () => {
    const { repoFeed, logs } = feed([new FakeSource('a', [{ key: 'a1' }, { key: 'a2' }])], {
      isInFlight: repo => repo.key === 'a1'
    })

    expect(await drain(repoFeed)).toEqual(['a:a2'])
    expect(logs).toContainEqual({ level: 'info', message: 'Skipping in-progress repo "a:a1"' })
  })

  it('should skip repos with every feature already aggregated', async () => {
    await store.recordUnitResult({ sourceName: 'a', repoKey: 'a1', analyzerName: 'words', codeKey: 'f', features: { x: found('x') } }, true)
    await store.aggregateAndPersist('a', 'a1', false)
    const { repoFeed, logs } = feed([new FakeSource('a', [{ key: 'a1' }, { key: 'a2' }])])

    expect(await drain(repoFeed)).toEqual(['a:a2'])
    expect(logs).toContainEqual({ level: 'info', message: 'Skipping fully analyzed repo "a:a1"' })
  })

  it('should only ask for features that are still missing', async () => {
    await store.recordUnitResult({ sourceName: 'a', repoKey: 'a1', analyzerName: 'words', codeKey: 'f', features: { x: found('x') } }, true)
    await store.aggregateAndPersist('a', 'a1', false)
    const { repoFeed } = feed([new FakeSource('a', [{ key: 'a1' }])], {
      analyzerFeatures: { words: ['x', 'y'], other: ['z'] }
    })

    const candidate = await repoFeed.next()
    expect(candidate?.analyzerFeatures).toEqual({ words: ['y'], other: ['z'] })
  })

  it('should ignore saved features when asked to', async () => {
    await store.recordUnitResult({ sourceName: 'a', repoKey: 'a1', analyzerName: 'words', codeKey: 'f', features: { x: found('x') } }, true)
    await store.aggregateAndPersist('a', 'a1', false)
    const { repoFeed } = feed([new FakeSource('a', [{ key: 'a1' }])], { useSavedFeatures: false })

    const candidate = await repoFeed.next()
    expect(candidate?.analyzerFeatures).toEqual({ words: ['x'] })
  })

  it('should return null without any sources', async () => {
    const { repoFeed } = feed([])
    expect(await repoFeed.next()).toBeNull()
  })
})
