// src/analyzers/index.ts
export { Analyzer } from './analyzer.js'
export type { AnalyzerOptions } from './analyzer.js'
export { FileAnalyzer } from './file-analyzer.js'
export type { FileAnalyzerOptions } from './file-analyzer.js'
export { TextAnalyzer, regexFeatureFinder } from './text-analyzer.js'
export { analyzeSnippet } from './snippet.js'
export { DEFAULT_IGNORE, ignorePatternsFilter, shouldIgnore } from './file-filters.js'
export type { FileFilter, FileInfo } from './file-filters.js'
export * from './features.js'
export * from './types.js'
