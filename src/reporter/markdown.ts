// src/reporter/markdown.ts
import type { RepoFeature } from '../store/types.js'
import type { FeatureSummary } from './types.js'

export function summarizeFeatures(features: RepoFeature[]): FeatureSummary[] {
  const summaries = new Map<string, FeatureSummary>()
  for (const feature of features) {
    const key = `${feature.analyzerName}\0${feature.featureName}`
    let summary = summaries.get(key)
    if (!summary) {
      summary = {
        analyzerName: feature.analyzerName,
        featureName: feature.featureName,
        repoCount: 0,
        reposWithFeature: 0,
        occurrenceCount: 0,
        codeOccurrenceCount: 0,
        codeTotalCount: 0
      }
      summaries.set(key, summary)
    }
    summary.repoCount++
    if (feature.occurrenceCount > 0) summary.reposWithFeature++
    summary.occurrenceCount += feature.occurrenceCount
    summary.codeOccurrenceCount += feature.codeOccurrenceCount
    summary.codeTotalCount += feature.codeTotalCount
  }
  return [...summaries.values()]
}

function percent(part: number, total: number): string {
  return total === 0 ? '-' : `${Math.round((part / total) * 100)}%`
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|')
}

export class MarkdownReporter {
  generate(features: RepoFeature[], generatedAt: Date = new Date()): string {
    const lines: string[] = []
    const repos = new Set(features.map(f => `${f.sourceName}\0${f.repoKey}`))

    lines.push('# Repo Survey Report')
    lines.push(`Generated: ${generatedAt.toISOString().split('T')[0]}`)
    lines.push(`Repos surveyed: ${repos.size}`)
    lines.push('')

    if (features.length === 0) {
      lines.push('No results yet. Run `reposurvey run` first.')
      return lines.join('\n')
    }

    lines.push('## Features')
    lines.push('')
    lines.push('| Analyzer | Feature | Repos with feature | Files with feature | Occurrences |')
    lines.push('|----------|---------|--------------------|--------------------|-------------|')
    for (const s of summarizeFeatures(features)) {
      const repoShare = `${s.reposWithFeature}/${s.repoCount} (${percent(s.reposWithFeature, s.repoCount)})`
      const fileShare = `${s.codeOccurrenceCount}/${s.codeTotalCount} (${percent(s.codeOccurrenceCount, s.codeTotalCount)})`
      lines.push(`| ${escapeCell(s.analyzerName)} | ${escapeCell(s.featureName)} | ${repoShare} | ${fileShare} | ${s.occurrenceCount} |`)
    }
    lines.push('')

    lines.push('## Repos')
    lines.push('')
    lines.push(this.formatRepoTable(features))

    return lines.join('\n')
  }

  private formatRepoTable(features: RepoFeature[]): string {
    const lines: string[] = []
    lines.push('| Source | Repo | Analyzer | Feature | Occurrences | Files with feature | Files |')
    lines.push('|--------|------|----------|---------|-------------|--------------------|-------|')
    for (const f of features) {
      lines.push(
        `| ${escapeCell(f.sourceName)} | ${escapeCell(f.repoKey)} | ${escapeCell(f.analyzerName)} | ` +
        `${escapeCell(f.featureName)} | ${f.occurrenceCount} | ${f.codeOccurrenceCount} | ${f.codeTotalCount} |`
      )
    }
    return lines.join('\n')
  }
}
