#!/usr/bin/env node
import { Command } from 'commander'
import { runCommand } from './commands/run.js'
import { reportCommand } from './commands/report.js'
import { initCommand } from './commands/init.js'

const program = new Command()

program
  .name('reposurvey')
  .description('Survey feature usage across many code repositories')
  .version('0.1.0')

program.addCommand(runCommand)
program.addCommand(reportCommand)
program.addCommand(initCommand)

await program.parseAsync()
