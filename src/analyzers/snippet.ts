// src/analyzers/snippet.ts
import type { Analyzer } from './analyzer.js'
import type { Feature } from './features.js'
import { InlineSource } from '../sources/inline-source.js'

/**
 * Runs every feature finder of `analyzer` over a string of code, written to a
 * throwaway repo as `filename`.
 */
export async function analyzeSnippet<CodeRepr>(
  analyzer: Analyzer<CodeRepr>,
  snippet: string,
  filename = 'snippet.txt'
): Promise<Record<string, Feature>> {
  const source = new InlineSource({ [filename]: snippet })
  for await (const item of source.repoGenerator()) {
    if (item.kind !== 'repo') continue
    try {
      const code = await analyzer.analyzeCode(item, filename, analyzer.getFeatureNames())
      return code.features
    } finally {
      await item.cleanup()
    }
  }
  throw new Error('Inline source produced no repo')
}
