// src/store/database.ts
import Database from 'better-sqlite3'

export function openDatabase(dbPath: string): Database.Database {
  const database = new Database(dbPath)
  database.pragma('journal_mode = WAL')
  initializeSchema(database)
  return database
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS repo_metadata (
      updated TEXT NOT NULL,
      source_name TEXT NOT NULL,
      repo_key TEXT NOT NULL,
      metadata_key TEXT NOT NULL,
      metadata_value TEXT NOT NULL,
      PRIMARY KEY (source_name, repo_key, metadata_key)
    );

    CREATE TABLE IF NOT EXISTS repo_feature (
      updated TEXT NOT NULL,
      source_name TEXT NOT NULL,
      repo_key TEXT NOT NULL,
      analyzer_name TEXT NOT NULL,
      feature_name TEXT NOT NULL,
      occurrence_count INTEGER NOT NULL,
      code_occurrence_count INTEGER NOT NULL,
      code_total_count INTEGER NOT NULL,
      PRIMARY KEY (source_name, repo_key, analyzer_name, feature_name)
    );

    CREATE TABLE IF NOT EXISTS code_feature (
      updated TEXT NOT NULL,
      source_name TEXT NOT NULL,
      repo_key TEXT NOT NULL,
      analyzer_name TEXT NOT NULL,
      code_key TEXT NOT NULL,
      feature_name TEXT NOT NULL,
      occurrence_count INTEGER,
      occurrences TEXT,
      PRIMARY KEY (source_name, repo_key, analyzer_name, code_key, feature_name)
    );

    CREATE INDEX IF NOT EXISTS idx_code_feature_repo ON code_feature(source_name, repo_key);

    -- Per-unit counts outlive code_feature rows, which may be deleted once aggregated
    CREATE TABLE IF NOT EXISTS code_count (
      updated TEXT NOT NULL,
      source_name TEXT NOT NULL,
      repo_key TEXT NOT NULL,
      analyzer_name TEXT NOT NULL,
      code_key TEXT NOT NULL,
      feature_name TEXT NOT NULL,
      occurrence_count INTEGER,
      PRIMARY KEY (source_name, repo_key, analyzer_name, code_key, feature_name)
    );
  `)
}
