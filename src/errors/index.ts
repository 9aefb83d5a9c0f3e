// src/errors/index.ts

/** Invalid survey setup, detected before any work starts. */
export class SurveyConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SurveyConfigError'
  }
}

/** A source failed to provide a repo. */
export class SourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SourceError'
  }
}

export class SurveyInterruptedError extends Error {
  constructor(message = 'Survey interrupted') {
    super(message)
    this.name = 'SurveyInterruptedError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
