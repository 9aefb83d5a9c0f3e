// src/analyzers/types.ts
import type { Repo, Thunk } from '../sources/types.js'
import type { Feature } from './features.js'

/** Analysis results for one unit of code (e.g. a file) in a repo. */
export interface Code {
  kind: 'code'
  analyzerName: string
  repo: Repo
  /** Unique within the repo. */
  key: string
  features: Record<string, Feature>
}

/** A unit of code whose analysis still has to run. */
export interface CodeThunk {
  kind: 'code-thunk'
  analyzerName: string
  repo: Repo
  key: string
  features: string[]
  thunk: Thunk<Code>
}

export type CodeItem = Code | CodeThunk

/** Returns the feature names still outstanding for a unit of code. */
export type GetCodeFeatures = (codeKey: string) => Promise<string[]>
