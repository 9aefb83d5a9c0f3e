// src/analyzers/text-analyzer.ts
import { readFile } from 'fs/promises'
import { FileAnalyzer, type FileAnalyzerOptions } from './file-analyzer.js'
import { featureFinder, type FeatureFinder, type Occurrence } from './features.js'
import type { FileInfo } from './file-filters.js'

/**
 * Analyses files as plain UTF-8 text. Files that look binary (contain NUL
 * bytes) are skipped for every feature.
 */
export class TextAnalyzer extends FileAnalyzer<string> {
  static readonly defaultName = 'text'
  static readonly defaultGlob = '**/*'

  constructor(options: FileAnalyzerOptions<string>) {
    super(TextAnalyzer.defaultName, TextAnalyzer.defaultGlob, options)
  }

  async prepareFile(file: FileInfo): Promise<string | null> {
    const content = await readFile(file.absPath, 'utf-8')
    return content.includes('\0') ? null : content
  }
}

function withGlobalFlag(pattern: RegExp | string): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern, 'gm')
  return pattern.flags.includes('g') ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, pattern.flags + 'g')
}

/**
 * Finder reporting each match of `pattern` with its 1-based line and column.
 * String patterns are compiled with the `g` and `m` flags.
 */
export function regexFeatureFinder(name: string, pattern: RegExp | string): FeatureFinder<string> {
  const regex = withGlobalFlag(pattern)
  return featureFinder(name, (text: string) => {
    const occurrences: Occurrence[] = []
    for (const match of text.matchAll(new RegExp(regex))) {
      const index = match.index ?? 0
      const before = text.slice(0, index)
      const line = before.split('\n').length
      const column = index - before.lastIndexOf('\n')
      occurrences.push({ line, column, match: match[0] })
    }
    return occurrences
  })
}
