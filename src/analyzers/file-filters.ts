// src/analyzers/file-filters.ts

/** Location of a source file within a repo. */
export interface FileInfo {
  repoPath: string
  relativePath: string
  absPath: string
}

/** Returns `true` when the file should be excluded from analysis. */
export type FileFilter = (file: FileInfo) => boolean

export const DEFAULT_IGNORE = [
  'node_modules',
  '.git',
  '.venv',
  'venv',
  '__pycache__',
  'dist',
  'build',
  '*.min.js',
  '*.bundle.js',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml'
]

const BINARY_EXTENSIONS = [
  '.png', '.jpg', '.jpeg', '.gif', '.ico', '.svg',
  '.woff', '.woff2', '.ttf', '.eot',
  '.zip', '.tar', '.gz',
  '.pdf', '.doc', '.docx'
]

export function shouldIgnore(filePath: string, ignore: string[] = DEFAULT_IGNORE): boolean {
  const lowerPath = filePath.toLowerCase()
  const lowerSegments = lowerPath.split(/[/\\]/)

  for (const ext of BINARY_EXTENSIONS) {
    if (lowerPath.endsWith(ext)) return true
  }

  for (const pattern of ignore) {
    // Reject patterns with path traversal attempts
    if (pattern.includes('..')) continue

    if (pattern.startsWith('*.')) {
      if (lowerPath.endsWith(pattern.slice(1).toLowerCase())) return true
    } else {
      // Match whole segments: "build" excludes "build/x.py" but not "rebuild.py"
      const lowerPattern = pattern.toLowerCase()
      if (lowerSegments.some(seg => seg === lowerPattern)) return true
    }
  }

  return false
}

/** Filter excluding dependency and build directories, lock files and binaries. */
export function ignorePatternsFilter(extraIgnore: string[] = []): FileFilter {
  const patterns = [...DEFAULT_IGNORE, ...extraIgnore]
  return file => shouldIgnore(file.relativePath, patterns)
}
