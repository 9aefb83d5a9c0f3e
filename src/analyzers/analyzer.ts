// src/analyzers/analyzer.ts
import type { Repo } from '../sources/types.js'
import type { Code, CodeItem, CodeThunk, GetCodeFeatures } from './types.js'
import { skipped, type Feature, type FeatureFinder } from './features.js'
import { getDuplicates } from '../utils/collections.js'
import { SurveyConfigError } from '../errors/index.js'

export interface AnalyzerOptions<CodeRepr> {
  featureFinders: FeatureFinder<CodeRepr>[]
  name?: string
}

/**
 * Turns a repo into a stream of per-unit feature analyses. `CodeRepr` is the
 * representation of a unit handed to each feature finder.
 */
export abstract class Analyzer<CodeRepr> {
  readonly name: string
  protected featureFinders: Map<string, FeatureFinder<CodeRepr>>

  constructor(defaultName: string, options: AnalyzerOptions<CodeRepr>) {
    this.name = options.name ?? defaultName
    if (!this.name) {
      throw new SurveyConfigError('Analyzer name cannot be empty')
    }
    const duplicates = getDuplicates(options.featureFinders.map(finder => finder.name))
    if (duplicates.length > 0) {
      throw new SurveyConfigError(
        `Cannot create analyzer "${this.name}" with duplicate feature names: ${duplicates.join(', ')}. ` +
        'Please set a unique name for each feature finder.'
      )
    }
    this.featureFinders = new Map(options.featureFinders.map(finder => [finder.name, finder]))
  }

  /**
   * Representation of one unit of code for the feature finders, or `null`
   * when the unit cannot be analysed (every feature is then skipped).
   */
  abstract prepareCodeRepresentation(repo: Repo, codeKey: string): Promise<CodeRepr | null>

  /**
   * Analyses or schedules every unit of the repo. `getCodeFeatures` narrows
   * each unit to its outstanding features; units with none are not yielded.
   */
  abstract codeGenerator(repo: Repo, getCodeFeatures: GetCodeFeatures): AsyncIterable<CodeItem>

  getFeatureNames(): string[] {
    return [...this.featureFinders.keys()]
  }

  async analyzeCode(repo: Repo, codeKey: string, features: string[]): Promise<Code> {
    const codeRepr = await this.prepareCodeRepresentation(repo, codeKey)
    const results: Record<string, Feature> = {}
    for (const featureName of features) {
      const finder = this.featureFinders.get(featureName)
      if (!finder) {
        throw new Error(`Analyzer "${this.name}" has no feature named "${featureName}"`)
      }
      results[featureName] = codeRepr === null ? skipped(featureName) : finder.find(codeRepr)
    }
    return this.code({ repo, key: codeKey, features: results })
  }

  toString(): string {
    return this.name
  }

  protected code(fields: { repo: Repo; key: string; features: Record<string, Feature> }): Code {
    return { kind: 'code', analyzerName: this.name, ...fields }
  }

  protected codeThunk(fields: { repo: Repo; key: string; features: string[] }): CodeThunk {
    return {
      kind: 'code-thunk',
      analyzerName: this.name,
      ...fields,
      thunk: () => this.analyzeCode(fields.repo, fields.key, fields.features)
    }
  }
}
