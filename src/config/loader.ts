// src/config/loader.ts
import { readFileSync, existsSync } from 'fs'
import { dirname, isAbsolute, resolve } from 'path'
import yaml from 'yaml'
import type { ZodIssue } from 'zod'
import { SurveyConfigError, errorMessage } from '../errors/index.js'
import type { Logger } from '../logging/logger.js'
import type { Source } from '../sources/source.js'
import { LocalSource } from '../sources/local-source.js'
import { GitSource } from '../sources/git-source.js'
import { GithubSampleSource } from '../sources/github-sample-source.js'
import type { Analyzer } from '../analyzers/analyzer.js'
import { TextAnalyzer, regexFeatureFinder } from '../analyzers/text-analyzer.js'
import { unionFeatureFinder, type FeatureFinder } from '../analyzers/features.js'
import { ignorePatternsFilter } from '../analyzers/file-filters.js'
import { CodeSurvey } from '../survey/survey.js'
import {
  SurveyConfigSchema,
  type AnalyzerConfig,
  type FeatureConfig,
  type SourceConfig,
  type SurveyConfig
} from './schema.js'

export const DEFAULT_CONFIG_PATH = 'survey.yaml'

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Replaces `${VAR}` with the variable's value, or nothing when it is unset. */
export function expandEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '')
}

/** `['sources', 0, 'dirs']` becomes `sources[0].dirs`. */
export function formatIssuePath(path: ZodIssue['path']): string {
  return path.reduce<string>((text, part) => {
    if (typeof part === 'number') return `${text}[${part}]`
    return text ? `${text}.${part}` : part
  }, '')
}

export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): SurveyConfig {
  let raw: unknown
  try {
    raw = yaml.parse(expandEnvVars(text, env))
  } catch (error) {
    throw new SurveyConfigError(`Invalid YAML: ${errorMessage(error)}`)
  }
  if (!isMapping(raw)) {
    throw new SurveyConfigError('Survey config must be a mapping')
  }

  const result = SurveyConfigSchema.safeParse(raw)
  if (!result.success) {
    const problems = result.error.errors.map(err => `${formatIssuePath(err.path) || 'config'}: ${err.message}`)
    throw new SurveyConfigError(`Invalid survey config:\n${problems.join('\n')}`)
  }
  return result.data
}

export interface LoadedConfig {
  config: SurveyConfig
  /** Directory relative paths in the config are resolved against. */
  baseDir: string
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): LoadedConfig {
  const path = resolve(configPath)
  if (!existsSync(path)) {
    throw new SurveyConfigError(`Config not found: ${path}. Run "reposurvey init" to create one.`)
  }
  return {
    config: parseConfig(readFileSync(path, 'utf-8')),
    baseDir: dirname(path)
  }
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) || path === ':memory:' ? path : resolve(baseDir, path)
}

export function buildSources(configs: SourceConfig[], baseDir: string, logger: Logger): Source[] {
  return configs.map(config => {
    switch (config.type) {
      case 'local':
        return new LocalSource(config.dirs.map(dir => resolveFrom(baseDir, dir)), { name: config.name })
      case 'git':
        return new GitSource(config.urls, { name: config.name })
      case 'github_sample':
        return new GithubSampleSource({
          name: config.name,
          searchQuery: config.search_query,
          language: config.language,
          maxKb: config.max_kb,
          sort: config.sort,
          authToken: config.auth_token,
          randomSeed: config.random_seed,
          logger
        })
    }
  })
}

function buildFeature(config: FeatureConfig): FeatureFinder<string> {
  if ('any' in config) {
    return unionFeatureFinder(
      config.name,
      config.any.map((pattern, i) => regexFeatureFinder(`${config.name}_${i}`, pattern))
    )
  }
  return regexFeatureFinder(config.name, config.pattern)
}

export function buildAnalyzers(configs: AnalyzerConfig[]): Analyzer<string>[] {
  return configs.map(config => new TextAnalyzer({
    name: config.name,
    fileGlob: config.file_glob,
    fileFilters: [ignorePatternsFilter(config.ignore)],
    featureFinders: config.features.map(buildFeature)
  }))
}

export function buildSurvey({ config, baseDir }: LoadedConfig, logger: Logger, overrides: { continueOnFailure?: boolean } = {}): CodeSurvey {
  return new CodeSurvey({
    sources: buildSources(config.sources, baseDir, logger),
    analyzers: buildAnalyzers(config.analyzers),
    dbPath: resolveFrom(baseDir, config.database),
    maxWorkers: config.max_workers,
    continueOnFailure: overrides.continueOnFailure ?? config.continue_on_failure,
    saveCodeFeatures: config.save_code_features,
    saveOccurrences: config.save_occurrences,
    useSavedFeatures: config.use_saved_features,
    logger
  })
}
