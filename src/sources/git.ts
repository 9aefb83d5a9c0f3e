// src/sources/git.ts
import { spawn } from 'child_process'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { SourceError } from '../errors/index.js'

export type CloneFn = (cloneUrl: string, signal?: AbortSignal) => Promise<string>

function runGit(args: string[], signal?: AbortSignal): Promise<{ code: number | null; stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const child = spawn('git', args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      signal
    })

    let stdout = ''
    let stderr = ''

    child.stdout.on('data', (data) => {
      stdout += data.toString()
    })

    child.stderr.on('data', (data) => {
      stderr += data.toString()
    })

    child.on('close', (code) => {
      resolve({ code, stdout, stderr })
    })

    child.on('error', (err) => {
      reject(new SourceError(`Failed to run git: ${err.message}`, { cause: err }))
    })
  })
}

/**
 * Shallow-clones `cloneUrl` into a new temporary directory and returns its path.
 * The directory is removed again if the clone fails.
 */
export const cloneGitRepo: CloneFn = async (cloneUrl, signal) => {
  const tempDir = await mkdtemp(join(tmpdir(), 'reposurvey-'))
  try {
    const { code, stdout, stderr } = await runGit(['clone', '--depth', '1', cloneUrl, tempDir], signal)
    if (code !== 0) {
      throw new SourceError(
        `Failed to git clone "${cloneUrl}" with exit code ${code}\n> STDOUT ${stdout}\n> STDERR ${stderr}`
      )
    }
  } catch (error) {
    await removeDir(tempDir)
    throw error
  }
  return tempDir
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}
