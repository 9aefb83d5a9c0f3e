// src/commands/init.ts
import { Command } from 'commander'
import chalk from 'chalk'
import { initConfig } from '../config/init.js'
import { DEFAULT_CONFIG_PATH } from '../config/loader.js'
import { errorMessage } from '../errors/index.js'

interface InitCommandOptions {
  output: string
  force?: boolean
  dir: string[]
}

export const initCommand = new Command('init')
  .description('Create a starter survey configuration')
  .option('-o, --output <path>', 'Where to write the config', DEFAULT_CONFIG_PATH)
  .option('--force', 'Overwrite an existing config')
  .option('--dir <path>', 'Local directory to survey (repeatable)', (value: string, previous: string[]) => [...previous, value], [])
  .action((options: InitCommandOptions) => {
    try {
      const path = initConfig(options.output, { force: options.force, dirs: options.dir })
      console.log(chalk.green(`\n✓ Config created at: ${path}`))
      console.log(chalk.dim('Edit this file to choose your sources, analyzers and features.'))
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`))
      process.exitCode = 1
    }
  })
