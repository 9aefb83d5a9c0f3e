// src/analyzers/features.ts

/** Opaque JSON-like record describing where a feature occurred. */
export type Occurrence = Record<string, unknown>

/** Result of looking for one feature in one unit of code. */
export type FeatureOutcome =
  | { kind: 'skipped' }
  | { kind: 'found'; occurrences: Occurrence[] }

export type Feature = FeatureOutcome & { name: string }

/** Finder functions may return a bare occurrence list as shorthand. */
export type FeatureFinderResult = FeatureOutcome | Occurrence[]

export interface FeatureFinder<CodeRepr> {
  readonly name: string
  find(code: CodeRepr): Feature
}

export type FeatureFinderFunction<CodeRepr> = (code: CodeRepr) => FeatureFinderResult

export function skipped(name: string): Feature {
  return { name, kind: 'skipped' }
}

export function found(name: string, occurrences: Occurrence[] = []): Feature {
  return { name, kind: 'found', occurrences }
}

export function occurrenceCount(feature: FeatureOutcome): number | null {
  return feature.kind === 'skipped' ? null : feature.occurrences.length
}

function normalizeFeature(name: string, result: FeatureFinderResult): Feature {
  if (Array.isArray(result)) {
    return found(name, result)
  }
  return result.kind === 'skipped' ? skipped(name) : found(name, result.occurrences)
}

/**
 * Defines a named feature finder.
 *
 * @example
 * const hasTodo = featureFinder('todo', (text: string) =>
 *   [...text.matchAll(/TODO/g)].map(m => ({ index: m.index }))
 * )
 */
export function featureFinder<CodeRepr>(name: string, fn: FeatureFinderFunction<CodeRepr>): FeatureFinder<CodeRepr> {
  return {
    name,
    find: code => normalizeFeature(name, fn(code))
  }
}

/**
 * Defines a feature finder from a function with some leading arguments
 * already bound, e.g. `partialFeatureFinder('math', importsModule, 'math')`.
 */
export function partialFeatureFinder<CodeRepr, Args extends unknown[]>(
  name: string,
  fn: (...args: [...Args, CodeRepr]) => FeatureFinderResult,
  ...args: Args
): FeatureFinder<CodeRepr> {
  return featureFinder(name, (code: CodeRepr) => fn(...args, code))
}

/**
 * Union of the occurrences of several finders. The unit is only skipped when
 * every finder skips it.
 */
export function unionFeatureFinder<CodeRepr>(name: string, finders: FeatureFinder<CodeRepr>[]): FeatureFinder<CodeRepr> {
  return featureFinder(name, (code: CodeRepr): FeatureOutcome => {
    const results = finders.map(finder => finder.find(code))
    if (results.every(result => result.kind === 'skipped')) {
      return { kind: 'skipped' }
    }
    const occurrences: Occurrence[] = []
    for (const result of results) {
      if (result.kind === 'found') occurrences.push(...result.occurrences)
    }
    return { kind: 'found', occurrences }
  })
}
