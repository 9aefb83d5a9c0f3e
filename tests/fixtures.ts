// tests/fixtures.ts
import { mkdtemp, mkdir, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import { Source } from '../src/sources/source.js'
import type { Repo, RepoItem, RepoMetadata } from '../src/sources/types.js'
import { Analyzer } from '../src/analyzers/analyzer.js'
import type { CodeItem, GetCodeFeatures } from '../src/analyzers/types.js'
import { featureFinder, type FeatureFinder } from '../src/analyzers/features.js'
import type { Logger, LogLevel } from '../src/logging/logger.js'

export async function makeTempDir(prefix = 'reposurvey-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath)
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content)
  }
}

export interface RecordedLog {
  level: LogLevel
  message: string
}

export function recordingLogger(): { logger: Logger; logs: RecordedLog[] } {
  const logs: RecordedLog[] = []
  const record = (level: LogLevel) => (message: string) => { logs.push({ level, message }) }
  return {
    logs,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error')
    }
  }
}

export interface FakeRepoSpec {
  key: string
  /** Yield a thunk instead of a ready repo. */
  deferred?: boolean
  /** Preparing the repo throws. */
  fail?: boolean
  metadata?: RepoMetadata
}

/** In-memory source; records fetches and cleanups. */
export class FakeSource extends Source {
  fetched: string[] = []
  cleanups: string[] = []

  constructor(
    name: string,
    private specs: FakeRepoSpec[],
    private options: { throwAfter?: number; cleanupError?: boolean } = {}
  ) {
    super('fake', { name })
  }

  async fetchRepo(repoKey: string): Promise<Repo> {
    const spec = this.specs.find(s => s.key === repoKey)
    if (!spec || spec.fail) {
      throw new Error('clone failed')
    }
    this.fetched.push(repoKey)
    return this.repo({
      key: repoKey,
      path: `/fake/${this.name}/${repoKey}`,
      metadata: spec.metadata,
      cleanup: () => {
        this.cleanups.push(repoKey)
        if (this.options.cleanupError) throw new Error('cleanup failed')
      }
    })
  }

  async *repoGenerator(): AsyncGenerator<RepoItem> {
    for (const [index, spec] of this.specs.entries()) {
      if (index === this.options.throwAfter) {
        throw new Error('source broke')
      }
      if (spec.deferred) {
        yield this.repoThunk({ key: spec.key, thunk: () => this.fetchRepo(spec.key) })
      } else {
        yield await this.fetchRepo(spec.key)
      }
    }
  }
}

export const FAIL_UNIT = '!fail'

/** Counts each `x` in a unit's text. */
export const xFinder: FeatureFinder<string> = featureFinder('x', (text: string) =>
  [...text.matchAll(/x/g)].map(match => ({ index: match.index ?? 0 }))
)

/** Counts each `y` in a unit's text. */
export const yFinder: FeatureFinder<string> = featureFinder('y', (text: string) =>
  [...text.matchAll(/y/g)].map(match => ({ index: match.index ?? 0 }))
)

/**
 * Analyzer over a fixed set of text units shared by every repo. A unit whose
 * text is FAIL_UNIT throws when analysed.
 */
export class FakeAnalyzer extends Analyzer<string> {
  analyzed: string[] = []
  private deferred: boolean

  constructor(
    private units: Record<string, string>,
    options: { name?: string; deferred?: boolean; featureFinders?: FeatureFinder<string>[] } = {}
  ) {
    super('words', { name: options.name, featureFinders: options.featureFinders || [xFinder] })
    this.deferred = options.deferred ?? true
  }

  async prepareCodeRepresentation(repo: Repo, codeKey: string): Promise<string | null> {
    const text = this.units[codeKey]
    if (text === FAIL_UNIT) {
      throw new Error('analysis failed')
    }
    this.analyzed.push(`${repo.key}/${codeKey}`)
    return text ?? null
  }

  async *codeGenerator(repo: Repo, getCodeFeatures: GetCodeFeatures): AsyncGenerator<CodeItem> {
    for (const codeKey of Object.keys(this.units)) {
      const features = await getCodeFeatures(codeKey)
      if (features.length === 0) continue
      if (this.deferred) {
        yield this.codeThunk({ repo, key: codeKey, features })
      } else {
        yield await this.analyzeCode(repo, codeKey, features)
      }
    }
  }
}

/** A promise with its resolve function exposed. */
export function gate<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(r => { resolve = r })
  return { promise, resolve }
}
