// src/commands/report.ts
import { Command } from 'commander'
import chalk from 'chalk'
import { writeFileSync } from 'fs'
import { DEFAULT_CONFIG_PATH, buildSurvey, loadConfig } from '../config/loader.js'
import { silentLogger } from '../logging/logger.js'
import { errorMessage } from '../errors/index.js'
import { MarkdownReporter } from '../reporter/markdown.js'
import type { FeatureFilters } from '../store/types.js'

interface ReportCommandOptions {
  config: string
  source: string[]
  repo: string[]
  analyzer: string[]
  feature: string[]
  tree?: boolean
  codes?: boolean
  format: string
  output?: string
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function filtersFromOptions(options: Pick<ReportCommandOptions, 'source' | 'repo' | 'analyzer' | 'feature'>): FeatureFilters {
  const filters: FeatureFilters = {}
  if (options.source.length > 0) filters.sourceNames = options.source
  if (options.repo.length > 0) filters.repoKeys = options.repo
  if (options.analyzer.length > 0) filters.analyzerNames = options.analyzer
  if (options.feature.length > 0) filters.featureNames = options.feature
  return filters
}

export const reportCommand = new Command('report')
  .description('Show stored survey results')
  .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .option('--source <name>', 'Only this source (repeatable)', collect, [])
  .option('--repo <key>', 'Only this repo (repeatable)', collect, [])
  .option('--analyzer <name>', 'Only this analyzer (repeatable)', collect, [])
  .option('--feature <name>', 'Only this feature (repeatable)', collect, [])
  .option('--tree', 'Print results nested by source, repo and analyzer as JSON')
  .option('--codes', 'Print per-file results as JSON')
  .option('-f, --format <format>', 'Output format (markdown|json)', 'markdown')
  .option('-o, --output <file>', 'Output to file instead of stdout')
  .action(async (options: ReportCommandOptions) => {
    try {
      const survey = buildSurvey(loadConfig(options.config), silentLogger)
      const filters = filtersFromOptions(options)

      let output: string
      if (options.tree) {
        output = JSON.stringify(await survey.getSurveyTree(filters), null, 2)
      } else if (options.codes) {
        output = JSON.stringify(await survey.getCodeFeatures(filters), null, 2)
      } else if (options.format === 'json') {
        output = JSON.stringify(await survey.getRepoFeatures(filters), null, 2)
      } else if (options.format === 'markdown') {
        output = new MarkdownReporter().generate(await survey.getRepoFeatures(filters))
      } else {
        throw new Error(`Unknown format "${options.format}"`)
      }

      if (options.output) {
        writeFileSync(options.output, output + '\n')
        console.log(chalk.green(`✓ Output saved to: ${options.output}`))
      } else {
        console.log(output)
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`))
      process.exitCode = 1
    }
  })
