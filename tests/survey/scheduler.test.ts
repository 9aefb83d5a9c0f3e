// tests/survey/scheduler.test.ts
import { describe, it, expect, beforeEach } from 'vitest'
import { JobScheduler, type CodeJob, type RepoJob } from '../../src/survey/scheduler.js'
import { WorkerPool, type TaskResult } from '../../src/survey/worker-pool.js'
import type { Code, CodeThunk } from '../../src/analyzers/types.js'
import type { Repo, RepoThunk } from '../../src/sources/types.js'
import { SurveyInterruptedError } from '../../src/errors/index.js'
import { gate } from '../fixtures.js'

function makeRepo(key: string): Repo {
  return { kind: 'repo', sourceName: 'src', key, path: `/repos/${key}`, cleanup: () => {}, metadata: {} }
}

function makeCode(repo: Repo, key: string): Code {
  return { kind: 'code', analyzerName: 'text', repo, key, features: {} }
}

function codeThunk(repo: Repo, key: string, wait: Promise<void> = Promise.resolve()): CodeThunk {
  return {
    kind: 'code-thunk',
    analyzerName: 'text',
    repo,
    key,
    features: ['x'],
    thunk: async () => {
      await wait
      return makeCode(repo, key)
    }
  }
}

function repoThunk(key: string, wait: Promise<void> = Promise.resolve()): RepoThunk {
  return {
    kind: 'repo-thunk',
    sourceName: 'src',
    key,
    thunk: async () => {
      await wait
      return makeRepo(key)
    }
  }
}

describe('JobScheduler', () => {
  let delivered: Array<{ kind: string; key: string; ok: boolean; pendingAtDelivery: number }>
  let scheduler: JobScheduler

  beforeEach(() => {
    delivered = []
    const record = async (job: RepoJob | CodeJob, result: TaskResult<unknown>) => {
      delivered.push({ kind: job.kind, key: job.key, ok: result.ok, pendingAtDelivery: scheduler.pendingCount })
    }
    scheduler = new JobScheduler(new WorkerPool(2), { onRepo: record, onCode: record })
  })

  it('should hand ready items straight to their handler', async () => {
    const repo = makeRepo('r1')
    await scheduler.admitRepo(repo, { text: ['x'] })
    await scheduler.admitCode(makeCode(repo, 'a.py'))

    expect(delivered).toEqual([
      { kind: 'repo', key: 'r1', ok: true, pendingAtDelivery: 0 },
      { kind: 'code', key: 'a.py', ok: true, pendingAtDelivery: 0 }
    ])
    expect(scheduler.pendingCount).toBe(0)
  })

  it('should be full once pending jobs reach the worker count', async () => {
    const repo = makeRepo('r1')
    const hold = gate()
    await scheduler.admitCode(codeThunk(repo, 'a.py', hold.promise))
    expect(scheduler.isFull).toBe(false)
    await scheduler.admitRepo(repoThunk('r2', hold.promise), { text: ['x'] })
    expect(scheduler.isFull).toBe(true)
    await expect(scheduler.admitCode(codeThunk(repo, 'b.py'))).rejects.toThrow('Cannot schedule more than 2 concurrent jobs')
    hold.resolve()
  })

  it('should remove settled jobs before calling their handlers', async () => {
    const repo = makeRepo('r1')
    const slow = gate()
    await scheduler.admitCode(codeThunk(repo, 'a.py'))
    await scheduler.admitCode(codeThunk(repo, 'b.py', slow.promise))

    await scheduler.waitForAny()
    expect(delivered).toEqual([{ kind: 'code', key: 'a.py', ok: true, pendingAtDelivery: 1 }])
    expect(scheduler.countCodeJobs(repo)).toBe(1)

    slow.resolve()
    await scheduler.waitForAny()
    expect(delivered[1]).toEqual({ kind: 'code', key: 'b.py', ok: true, pendingAtDelivery: 0 })
  })

  it('should deliver failures as results', async () => {
    await scheduler.admitRepo({
      kind: 'repo-thunk',
      sourceName: 'src',
      key: 'r1',
      thunk: async () => { throw new Error('clone failed') }
    }, { text: ['x'] })

    await scheduler.waitForAny()
    expect(delivered).toEqual([{ kind: 'repo', key: 'r1', ok: false, pendingAtDelivery: 0 }])
  })

  it('should return at once when nothing is pending', async () => {
    await scheduler.waitForAny()
    expect(delivered).toEqual([])
  })

  it('should count pending jobs by kind and repo', async () => {
    const hold = gate()
    const r1 = makeRepo('r1')
    await scheduler.admitCode(codeThunk(r1, 'a.py', hold.promise))
    await scheduler.admitRepo(repoThunk('r2', hold.promise), { text: ['x'] })

    expect(scheduler.countRepoJobs()).toBe(1)
    expect(scheduler.countCodeJobs(r1)).toBe(1)
    expect(scheduler.countCodeJobs(makeRepo('r2'))).toBe(0)
    expect(scheduler.hasRepoJob({ sourceName: 'src', key: 'r2' })).toBe(true)
    expect(scheduler.hasRepoJob({ sourceName: 'other', key: 'r2' })).toBe(false)
    hold.resolve()
  })

  it('should throw when interrupted while waiting', async () => {
    const controller = new AbortController()
    await scheduler.admitCode(codeThunk(makeRepo('r1'), 'a.py', new Promise<void>(() => {})))

    const waiting = scheduler.waitForAny(controller.signal)
    controller.abort()
    await expect(waiting).rejects.toThrow(SurveyInterruptedError)
    expect(delivered).toEqual([])
  })

  it('should drop pending jobs without delivering them on cancelAll', async () => {
    await scheduler.admitCode(codeThunk(makeRepo('r1'), 'a.py', new Promise<void>(() => {})))
    scheduler.cancelAll()

    expect(scheduler.pendingCount).toBe(0)
    await scheduler.waitForAny()
    expect(delivered).toEqual([])
  })
})
