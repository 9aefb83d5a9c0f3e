// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { dirname, resolve } from 'path'
import { DEFAULT_CONFIG_PATH } from './loader.js'

export interface StarterConfigOptions {
  /** Local directories to survey. */
  dirs?: string[]
  database?: string
}

export function generateConfig(options: StarterConfigOptions = {}): string {
  const dirs = options.dirs && options.dirs.length > 0 ? options.dirs : ['.']
  const dirLines = dirs.map(dir => `      - ${JSON.stringify(dir)}`).join('\n')

  return `# Repo survey configuration

# SQLite file holding results; later runs extend it
database: ${options.database || 'survey.sqlite3'}

# Parallel fetch/analysis jobs (defaults to the number of CPUs)
# max_workers: 4

continue_on_failure: true  # Log and skip failing repos and files
save_code_features: true   # Keep per-file results after aggregation
save_occurrences: true     # Keep the location of every match
use_saved_features: true   # Skip work already stored in the database
log_level: info

sources:
  - type: local
    dirs:
${dirLines}

  # Shallow clones of remote repositories
  # - type: git
  #   urls:
  #     - https://github.com/octocat/Hello-World.git

  # Random sample of GitHub repositories (runs until stopped or a limit is hit)
  # - type: github_sample
  #   language: typescript
  #   max_kb: 50000
  #   sort: updated
  #   auth_token: \${GITHUB_TOKEN}

analyzers:
  - type: text
    name: text
    file_glob: "**/*.{ts,js,py}"
    # ignore: [fixtures, "*.generated.ts"]
    features:
      - name: todo
        pattern: "\\\\b(TODO|FIXME)\\\\b"
      - name: debug_output
        any:
          - "console\\\\.log\\\\("
          - "\\\\bprint\\\\("
`
}

export interface InitConfigOptions extends StarterConfigOptions {
  force?: boolean
}

export function initConfig(outputPath: string = DEFAULT_CONFIG_PATH, options: InitConfigOptions = {}): string {
  const configPath = resolve(outputPath)

  if (existsSync(configPath) && !options.force) {
    throw new Error(`Config already exists: ${configPath}`)
  }

  mkdirSync(dirname(configPath), { recursive: true })
  writeFileSync(configPath, generateConfig(options), 'utf-8')

  return configPath
}
