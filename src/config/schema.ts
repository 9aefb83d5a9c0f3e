// src/config/schema.ts
import { z } from 'zod'
import { GITHUB_SORTS } from '../sources/github-search.js'
import { LOG_LEVELS } from '../logging/logger.js'
import { errorMessage } from '../errors/index.js'

const PatternSchema = z.string().min(1).superRefine((pattern, ctx) => {
  try {
    new RegExp(pattern)
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid pattern: ${errorMessage(error)}` })
  }
})

export const LocalSourceConfigSchema = z.object({
  type: z.literal('local'),
  name: z.string().min(1).optional(),
  dirs: z.array(z.string()).min(1)
}).strict()

export const GitSourceConfigSchema = z.object({
  type: z.literal('git'),
  name: z.string().min(1).optional(),
  urls: z.array(z.string()).min(1)
}).strict()

export const GithubSampleSourceConfigSchema = z.object({
  type: z.literal('github_sample'),
  name: z.string().min(1).optional(),
  search_query: z.string().optional(),
  language: z.string().optional(),
  /** `null` lifts the size limit. */
  max_kb: z.number().int().positive().nullable().optional(),
  sort: z.enum(GITHUB_SORTS).optional(),
  auth_token: z.string().optional(),
  random_seed: z.number().int().nonnegative().optional()
}).strict()

export const SourceConfigSchema = z.discriminatedUnion('type', [
  LocalSourceConfigSchema,
  GitSourceConfigSchema,
  GithubSampleSourceConfigSchema
])

export const RegexFeatureConfigSchema = z.object({
  name: z.string().min(1),
  pattern: PatternSchema
}).strict()

/** Occurrences of any of the patterns. */
export const UnionFeatureConfigSchema = z.object({
  name: z.string().min(1),
  any: z.array(PatternSchema).min(1)
}).strict()

export const FeatureConfigSchema = z.union([RegexFeatureConfigSchema, UnionFeatureConfigSchema])

export const TextAnalyzerConfigSchema = z.object({
  type: z.literal('text'),
  name: z.string().min(1).optional(),
  file_glob: z.string().min(1).optional(),
  /** Extra path segments or `*.ext` patterns to leave out. */
  ignore: z.array(z.string()).optional(),
  features: z.array(FeatureConfigSchema).min(1)
}).strict()

export const AnalyzerConfigSchema = TextAnalyzerConfigSchema

export const SurveyConfigSchema = z.object({
  database: z.string().min(1).default('survey.sqlite3'),
  max_workers: z.number().int().positive().optional(),
  continue_on_failure: z.boolean().default(true),
  save_code_features: z.boolean().default(true),
  save_occurrences: z.boolean().default(true),
  use_saved_features: z.boolean().default(true),
  log_level: z.enum(LOG_LEVELS).default('info'),
  sources: z.array(SourceConfigSchema).min(1),
  analyzers: z.array(AnalyzerConfigSchema).min(1)
}).strict()

export type LocalSourceConfig = z.infer<typeof LocalSourceConfigSchema>
export type GitSourceConfig = z.infer<typeof GitSourceConfigSchema>
export type GithubSampleSourceConfig = z.infer<typeof GithubSampleSourceConfigSchema>
export type SourceConfig = z.infer<typeof SourceConfigSchema>
export type FeatureConfig = z.infer<typeof FeatureConfigSchema>
export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>
export type SurveyConfig = z.infer<typeof SurveyConfigSchema>
