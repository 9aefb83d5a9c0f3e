// src/index.ts
export * from './sources/index.js'
export * from './analyzers/index.js'
export * from './store/index.js'
export * from './survey/index.js'
export { SurveyConfigError, SourceError, SurveyInterruptedError } from './errors/index.js'
export { createConsoleLogger, silentLogger } from './logging/logger.js'
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logging/logger.js'
export { loadConfig, parseConfig, buildSurvey, buildSources, buildAnalyzers } from './config/loader.js'
export { SurveyConfigSchema } from './config/schema.js'
export type {
  SurveyConfig,
  SourceConfig,
  LocalSourceConfig,
  GitSourceConfig,
  GithubSampleSourceConfig,
  AnalyzerConfig,
  FeatureConfig
} from './config/schema.js'
