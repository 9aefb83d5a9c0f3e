// src/store/index.ts
export { SqliteCompletionStore } from './sqlite-store.js'
export type { SqliteCompletionStoreOptions } from './sqlite-store.js'
export { openDatabase } from './database.js'
export * from './types.js'
