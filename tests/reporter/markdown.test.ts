// tests/reporter/markdown.test.ts
import { describe, it, expect } from 'vitest'
import { MarkdownReporter, summarizeFeatures } from '../../src/reporter/markdown.js'
import type { RepoFeature } from '../../src/store/types.js'

function feature(fields: Partial<RepoFeature> & Pick<RepoFeature, 'repoKey' | 'occurrenceCount'>): RepoFeature {
  return {
    updated: new Date('2024-03-05T12:00:00Z'),
    sourceName: 'src',
    analyzerName: 'text',
    featureName: 'todo',
    codeOccurrenceCount: 0,
    codeTotalCount: 0,
    repoMetadata: {},
    ...fields
  }
}

const FEATURES: RepoFeature[] = [
  feature({ repoKey: 'r1', occurrenceCount: 3, codeOccurrenceCount: 2, codeTotalCount: 3 }),
  feature({ repoKey: 'r1', featureName: 'print', occurrenceCount: 0, codeTotalCount: 3 }),
  feature({ repoKey: 'r2', occurrenceCount: 0, codeTotalCount: 2 })
]

describe('summarizeFeatures', () => {
  it('should total each feature across repos', () => {
    expect(summarizeFeatures(FEATURES)).toEqual([
      { analyzerName: 'text', featureName: 'todo', repoCount: 2, reposWithFeature: 1, occurrenceCount: 3, codeOccurrenceCount: 2, codeTotalCount: 5 },
      { analyzerName: 'text', featureName: 'print', repoCount: 1, reposWithFeature: 0, occurrenceCount: 0, codeOccurrenceCount: 0, codeTotalCount: 3 }
    ])
  })
})

describe('MarkdownReporter', () => {
  const generatedAt = new Date('2024-03-05T12:00:00Z')

  it('should generate report header', () => {
    const report = new MarkdownReporter().generate(FEATURES, generatedAt)
    expect(report.split('\n').slice(0, 3)).toEqual([
      '# Repo Survey Report',
      'Generated: 2024-03-05',
      'Repos surveyed: 2'
    ])
  })

  it('should summarise features with shares of repos and files', () => {
    const lines = new MarkdownReporter().generate(FEATURES, generatedAt).split('\n')
    expect(lines).toContain('| text | todo | 1/2 (50%) | 2/5 (40%) | 3 |')
    expect(lines).toContain('| text | print | 0/1 (0%) | 0/3 (0%) | 0 |')
  })

  it('should list every repo feature', () => {
    const lines = new MarkdownReporter().generate(FEATURES, generatedAt).split('\n')
    expect(lines).toContain('| src | r1 | text | todo | 3 | 2 | 3 |')
    expect(lines).toContain('| src | r2 | text | todo | 0 | 0 | 2 |')
  })

  it('should show a dash when no files were analysed', () => {
    const lines = new MarkdownReporter().generate([feature({ repoKey: 'r1', occurrenceCount: 0 })], generatedAt).split('\n')
    expect(lines).toContain('| text | todo | 0/1 (0%) | 0/0 (-) | 0 |')
  })

  it('should escape pipes in cells', () => {
    const lines = new MarkdownReporter().generate([feature({ repoKey: 'a|b', occurrenceCount: 1 })], generatedAt).split('\n')
    expect(lines).toContain('| src | a\\|b | text | todo | 1 | 0 | 0 |')
  })

  it('should say when there are no results', () => {
    expect(new MarkdownReporter().generate([], generatedAt)).toBe(
      '# Repo Survey Report\nGenerated: 2024-03-05\nRepos surveyed: 0\n\nNo results yet. Run `reposurvey run` first.'
    )
  })
})
