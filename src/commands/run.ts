// src/commands/run.ts
import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import ora, { type Ora } from 'ora'
import { DEFAULT_CONFIG_PATH, buildSurvey, loadConfig } from '../config/loader.js'
import { createConsoleLogger, isLogLevel } from '../logging/logger.js'
import { SurveyInterruptedError, errorMessage } from '../errors/index.js'
import type { Analyzer } from '../analyzers/analyzer.js'
import type { SurveyProgressEvent } from '../survey/progress.js'

// More feature counters than this would not fit on one spinner line
export const MAX_PROGRESS_FEATURES = 10

interface RunCommandOptions {
  config: string
  maxRepos?: number
  maxCodes?: number
  strict?: boolean
  progress: boolean
  logLevel?: string
}

export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return n
}

/** Text for the progress spinner: repo and code counts plus repos per feature. */
export class ProgressText {
  private repos = 0
  private codes = 0
  private featureRepos: Map<string, number> | null

  constructor(
    analyzers: Analyzer<unknown>[],
    private limits: { maxRepos?: number; maxCodes?: number } = {}
  ) {
    const keys = analyzers.flatMap(a => a.getFeatureNames().map(f => `${a.name}/${f}`))
    this.featureRepos = keys.length <= MAX_PROGRESS_FEATURES
      ? new Map(keys.map(key => [key, 0]))
      : null
  }

  get showsFeatures(): boolean {
    return this.featureRepos !== null
  }

  update(event: SurveyProgressEvent): void {
    this.repos = event.completedRepos
    this.codes = event.completedCodes
    if (event.type !== 'repoCompleted' || !this.featureRepos) return
    for (const feature of event.features) {
      const key = `${feature.analyzerName}/${feature.featureName}`
      const count = this.featureRepos.get(key)
      if (count !== undefined && feature.occurrenceCount > 0) {
        this.featureRepos.set(key, count + 1)
      }
    }
  }

  render(): string {
    const of = (max?: number) => (max === undefined ? '' : `/${max}`)
    const parts = [`Repos: ${this.repos}${of(this.limits.maxRepos)}  Codes: ${this.codes}${of(this.limits.maxCodes)}`]
    if (this.featureRepos) {
      for (const [key, count] of this.featureRepos) {
        parts.push(`${key}: ${count}`)
      }
    }
    return parts.join('  ')
  }
}

export const runCommand = new Command('run')
  .description('Survey repos from the configured sources')
  .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .option('--max-repos <number>', 'Stop after this many repos', parsePositiveInt)
  .option('--max-codes <number>', 'Stop after this many files', parsePositiveInt)
  .option('--strict', 'Stop at the first failing repo or file')
  .option('--no-progress', 'Hide the progress spinner')
  .option('--log-level <level>', 'debug, info, warn or error')
  .action(async (options: RunCommandOptions) => {
    let spinner: Ora | null = null
    const controller = new AbortController()
    const onSigint = () => controller.abort()

    try {
      const loaded = loadConfig(options.config)
      const logLevel = options.logLevel ?? loaded.config.log_level
      if (!isLogLevel(logLevel)) {
        throw new InvalidArgumentError(`Unknown log level "${logLevel}"`)
      }
      const logger = createConsoleLogger({
        level: logLevel,
        stream: {
          write: (chunk: string) => {
            spinner?.clear()
            process.stderr.write(chunk)
            spinner?.render()
          }
        }
      })

      const survey = buildSurvey(loaded, logger, options.strict ? { continueOnFailure: false } : {})
      const progress = new ProgressText(survey.analyzers, { maxRepos: options.maxRepos, maxCodes: options.maxCodes })
      if (options.progress && !progress.showsFeatures) {
        logger.warn(`Not showing per-feature progress for more than ${MAX_PROGRESS_FEATURES} features`)
      }

      console.log()
      console.log(chalk.bgBlue.white.bold(' Repo Survey '))
      console.log(chalk.dim(`├─ Sources: ${survey.sources.map(s => chalk.cyan(s.name)).join(', ')}`))
      console.log(chalk.dim(`├─ Analyzers: ${survey.analyzers.map(a => chalk.cyan(a.name)).join(', ')}`))
      console.log(chalk.dim(`├─ Workers: ${survey.maxWorkers}`))
      console.log(chalk.dim(`└─ Database: ${survey.dbPath}`))
      console.log()

      if (options.progress) {
        spinner = ora(progress.render()).start()
      }
      process.once('SIGINT', onSigint)

      const counts = await survey.run({
        maxRepos: options.maxRepos,
        maxCodes: options.maxCodes,
        signal: controller.signal,
        onProgress: event => {
          progress.update(event)
          if (spinner) spinner.text = progress.render()
        }
      })

      spinner?.succeed(progress.render())
      spinner = null
      console.log(chalk.green(`\n✓ Surveyed ${counts.completedRepos} repos (${counts.completedCodes} files)`))
      console.log(chalk.dim('Run "reposurvey report" to see the results.'))
    } catch (error) {
      if (error instanceof SurveyInterruptedError) {
        spinner?.warn('Interrupted')
        process.exitCode = 130
        return
      }
      spinner?.fail('Error')
      console.error(chalk.red(`Error: ${errorMessage(error)}`))
      process.exitCode = 1
    } finally {
      process.removeListener('SIGINT', onSigint)
    }
  })
