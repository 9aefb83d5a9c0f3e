// src/store/sqlite-store.ts
import type Database from 'better-sqlite3'
import type { Occurrence } from '../analyzers/features.js'
import { occurrenceCount } from '../analyzers/features.js'
import type { RepoMetadata } from '../sources/types.js'
import type {
  AnalyzerFeatures,
  CodeFeature,
  CompletionStore,
  FeatureFilters,
  RepoFeature,
  UnitResult
} from './types.js'
import { openDatabase } from './database.js'

interface RepoFeatureRow {
  updated: string
  source_name: string
  repo_key: string
  analyzer_name: string
  feature_name: string
  occurrence_count: number
  code_occurrence_count: number
  code_total_count: number
}

interface CodeFeatureRow {
  updated: string
  source_name: string
  repo_key: string
  analyzer_name: string
  code_key: string
  feature_name: string
  occurrence_count: number | null
  occurrences: string | null
}

interface AggregateRow {
  analyzer_name: string
  feature_name: string
  updated: string
  occurrence_count: number
  code_occurrence_count: number
  code_total_count: number
}

interface MetadataRow {
  metadata_key: string
  metadata_value: string
}

export interface SqliteCompletionStoreOptions {
  now?: () => Date
}

function isOccurrence(value: unknown): value is Occurrence {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseOccurrences(text: string | null): Occurrence[] | null {
  if (text === null) return null
  const parsed: unknown = JSON.parse(text)
  if (!Array.isArray(parsed)) {
    throw new Error(`Stored occurrences are not a list: ${text.slice(0, 80)}`)
  }
  return parsed.filter(isOccurrence)
}

const FILTER_COLUMNS: Array<[keyof FeatureFilters, string]> = [
  ['sourceNames', 'source_name'],
  ['repoKeys', 'repo_key'],
  ['analyzerNames', 'analyzer_name'],
  ['featureNames', 'feature_name']
]

// An empty filter list matches nothing
function buildWhere(filters: FeatureFilters): { clause: string; params: string[] } {
  const conditions: string[] = []
  const params: string[] = []
  for (const [key, column] of FILTER_COLUMNS) {
    const values = filters[key]
    if (values === undefined) continue
    if (values.length === 0) {
      conditions.push('0')
      continue
    }
    conditions.push(`${column} IN (${values.map(() => '?').join(', ')})`)
    params.push(...values)
  }
  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params
  }
}

/**
 * Completion store on an SQLite file. `:memory:` works, but its contents are
 * gone once the store is closed.
 */
export class SqliteCompletionStore implements CompletionStore {
  readonly dbPath: string
  private db: Database.Database | null = null
  private now: () => Date

  constructor(dbPath: string, options: SqliteCompletionStoreOptions = {}) {
    this.dbPath = dbPath
    this.now = options.now || (() => new Date())
  }

  async initialize(): Promise<void> {
    if (!this.db) {
      this.db = openDatabase(this.dbPath)
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close()
      this.db = null
    }
  }

  private connection(): Database.Database {
    if (!this.db) {
      throw new Error(`Completion store ${this.dbPath} is not initialized`)
    }
    return this.db
  }

  async outstandingFeatures(sourceName: string, repoKey: string, requested: AnalyzerFeatures): Promise<AnalyzerFeatures> {
    const analyzerNames = Object.keys(requested)
    if (analyzerNames.length === 0) return {}

    const rows = this.connection().prepare(`
      SELECT DISTINCT analyzer_name, feature_name FROM repo_feature
      WHERE source_name = ? AND repo_key = ? AND analyzer_name IN (${analyzerNames.map(() => '?').join(', ')})
    `).all(sourceName, repoKey, ...analyzerNames) as Array<{ analyzer_name: string; feature_name: string }>

    const existing = new Set(rows.map(row => `${row.analyzer_name}\0${row.feature_name}`))
    const outstanding: AnalyzerFeatures = {}
    for (const [analyzerName, features] of Object.entries(requested)) {
      const missing = features.filter(feature => !existing.has(`${analyzerName}\0${feature}`))
      if (missing.length > 0) {
        outstanding[analyzerName] = missing
      }
    }
    return outstanding
  }

  async outstandingUnitFeatures(
    sourceName: string,
    repoKey: string,
    analyzerName: string,
    codeKey: string,
    requested: string[]
  ): Promise<string[]> {
    if (requested.length === 0) return []

    const rows = this.connection().prepare(`
      SELECT DISTINCT feature_name FROM code_feature
      WHERE source_name = ? AND repo_key = ? AND analyzer_name = ? AND code_key = ?
        AND feature_name IN (${requested.map(() => '?').join(', ')})
    `).all(sourceName, repoKey, analyzerName, codeKey, ...requested) as Array<{ feature_name: string }>

    const existing = new Set(rows.map(row => row.feature_name))
    return requested.filter(feature => !existing.has(feature))
  }

  async recordUnitResult(result: UnitResult, persistOccurrences: boolean): Promise<void> {
    const db = this.connection()
    const unitStmt = db.prepare(`
      INSERT INTO code_feature (updated, source_name, repo_key, analyzer_name, code_key, feature_name, occurrence_count, occurrences)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_name, repo_key, analyzer_name, code_key, feature_name) DO UPDATE SET
        updated = excluded.updated,
        occurrence_count = excluded.occurrence_count,
        occurrences = excluded.occurrences
    `)
    const countStmt = db.prepare(`
      INSERT INTO code_count (updated, source_name, repo_key, analyzer_name, code_key, feature_name, occurrence_count)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_name, repo_key, analyzer_name, code_key, feature_name) DO UPDATE SET
        updated = excluded.updated,
        occurrence_count = excluded.occurrence_count
    `)
    const updated = this.now().toISOString()
    const { sourceName, repoKey, analyzerName, codeKey } = result

    db.transaction(() => {
      for (const [featureName, feature] of Object.entries(result.features)) {
        const count = occurrenceCount(feature)
        const occurrences = feature.kind === 'found' && persistOccurrences
          ? JSON.stringify(feature.occurrences)
          : null
        unitStmt.run(updated, sourceName, repoKey, analyzerName, codeKey, featureName, count, occurrences)
        countStmt.run(updated, sourceName, repoKey, analyzerName, codeKey, featureName, count)
      }
    })()
  }

  async recordRepoMetadata(sourceName: string, repoKey: string, metadata: RepoMetadata): Promise<void> {
    const db = this.connection()
    const stmt = db.prepare(`
      INSERT INTO repo_metadata (updated, source_name, repo_key, metadata_key, metadata_value)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(source_name, repo_key, metadata_key) DO UPDATE SET
        updated = excluded.updated,
        metadata_value = excluded.metadata_value
    `)
    const updated = this.now().toISOString()

    db.transaction(() => {
      for (const [key, value] of Object.entries(metadata)) {
        stmt.run(updated, sourceName, repoKey, key, JSON.stringify(value ?? null))
      }
    })()
  }

  /**
   * Recomputes the repo's aggregates from the per-unit counts. Those are kept
   * in `code_count` even when the unit rows are deleted, and a unit recorded
   * again replaces its earlier counts, so aggregating again never double-counts
   * nor loses counts.
   */
  async aggregateAndPersist(sourceName: string, repoKey: string, deleteUnitRecords: boolean): Promise<void> {
    const db = this.connection()
    const aggregates = db.prepare(`
      SELECT
        analyzer_name,
        feature_name,
        MAX(updated) AS updated,
        COALESCE(SUM(occurrence_count), 0) AS occurrence_count,
        COALESCE(SUM(CASE WHEN occurrence_count >= 1 THEN 1 ELSE 0 END), 0) AS code_occurrence_count,
        COUNT(occurrence_count) AS code_total_count
      FROM code_count
      WHERE source_name = ? AND repo_key = ?
      GROUP BY analyzer_name, feature_name
    `)
    const upsert = db.prepare(`
      INSERT INTO repo_feature (
        updated, source_name, repo_key, analyzer_name, feature_name,
        occurrence_count, code_occurrence_count, code_total_count
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_name, repo_key, analyzer_name, feature_name) DO UPDATE SET
        updated = excluded.updated,
        occurrence_count = excluded.occurrence_count,
        code_occurrence_count = excluded.code_occurrence_count,
        code_total_count = excluded.code_total_count
    `)
    const deleteUnits = db.prepare('DELETE FROM code_feature WHERE source_name = ? AND repo_key = ?')

    db.transaction(() => {
      const rows = aggregates.all(sourceName, repoKey) as AggregateRow[]
      for (const row of rows) {
        upsert.run(
          row.updated,
          sourceName,
          repoKey,
          row.analyzer_name,
          row.feature_name,
          row.occurrence_count,
          row.code_occurrence_count,
          row.code_total_count
        )
      }
      if (deleteUnitRecords) {
        deleteUnits.run(sourceName, repoKey)
      }
    })()
  }

  private metadataLookup(): (sourceName: string, repoKey: string) => RepoMetadata {
    const stmt = this.connection().prepare(
      'SELECT metadata_key, metadata_value FROM repo_metadata WHERE source_name = ? AND repo_key = ?'
    )
    const cache = new Map<string, RepoMetadata>()

    return (sourceName, repoKey) => {
      const cacheKey = `${sourceName}\0${repoKey}`
      let metadata = cache.get(cacheKey)
      if (!metadata) {
        metadata = {}
        for (const row of stmt.all(sourceName, repoKey) as MetadataRow[]) {
          metadata[row.metadata_key] = JSON.parse(row.metadata_value)
        }
        cache.set(cacheKey, metadata)
      }
      return metadata
    }
  }

  async queryRepoAggregates(filters: FeatureFilters = {}): Promise<RepoFeature[]> {
    const { clause, params } = buildWhere(filters)
    const rows = this.connection().prepare(`
      SELECT updated, source_name, repo_key, analyzer_name, feature_name,
        occurrence_count, code_occurrence_count, code_total_count
      FROM repo_feature ${clause}
      ORDER BY source_name, repo_key, analyzer_name, feature_name
    `).all(...params) as RepoFeatureRow[]

    const metadata = this.metadataLookup()
    return rows.map(row => ({
      updated: new Date(row.updated),
      sourceName: row.source_name,
      repoKey: row.repo_key,
      analyzerName: row.analyzer_name,
      featureName: row.feature_name,
      occurrenceCount: row.occurrence_count,
      codeOccurrenceCount: row.code_occurrence_count,
      codeTotalCount: row.code_total_count,
      repoMetadata: metadata(row.source_name, row.repo_key)
    }))
  }

  async queryUnitResults(filters: FeatureFilters = {}): Promise<CodeFeature[]> {
    const { clause, params } = buildWhere(filters)
    const rows = this.connection().prepare(`
      SELECT updated, source_name, repo_key, analyzer_name, code_key, feature_name, occurrence_count, occurrences
      FROM code_feature ${clause}
      ORDER BY source_name, repo_key, analyzer_name, code_key, feature_name
    `).all(...params) as CodeFeatureRow[]

    const metadata = this.metadataLookup()
    return rows.map(row => ({
      updated: new Date(row.updated),
      sourceName: row.source_name,
      repoKey: row.repo_key,
      analyzerName: row.analyzer_name,
      codeKey: row.code_key,
      featureName: row.feature_name,
      occurrenceCount: row.occurrence_count,
      occurrences: parseOccurrences(row.occurrences),
      repoMetadata: metadata(row.source_name, row.repo_key)
    }))
  }
}
