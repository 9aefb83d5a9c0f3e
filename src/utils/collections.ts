// src/utils/collections.ts

/** Values that appear more than once, in order of their second appearance. */
export function getDuplicates<T>(items: Iterable<T>): T[] {
  const seen = new Set<T>()
  const duplicates: T[] = []
  for (const item of items) {
    if (seen.has(item)) {
      if (!duplicates.includes(item)) duplicates.push(item)
    } else {
      seen.add(item)
    }
  }
  return duplicates
}
