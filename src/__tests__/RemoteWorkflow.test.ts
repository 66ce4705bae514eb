/**
 * Tests for the remote workflows (services/RemoteWorkflow.ts)
 *
 * Covers:
 * - automatic workflow: stop → discover → copy → verify → delete
 * - verification mismatch keeps the remote file and the local partial copy
 * - stop/discover failures abort before any file is touched
 * - per-file failure isolation, delete failures, cancellation
 * - copy-only workflow and direct upload workflow
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, stat } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { RemoteWorkflow, localPathFor, summarizeResults } from '../services/RemoteWorkflow'
import { ApiError, AuthError } from '../errors'
import type { WorkflowStepResult } from '../types/workflow'
import { FakeSession } from './helpers/fakeSession'
import { TEST_CREDENTIALS, createFakeApi } from './helpers/fakeApi'

const REMOTE_DIR = '/home/pi/kismet'
const CAPTURE = `${REMOTE_DIR}/capture_20240101.wiglecsv`
const CAPTURE_DATA = Buffer.alloc(1024, 'a')

let localDir: string

beforeEach(async () => {
  localDir = await mkdtemp(join(tmpdir(), 'capture-sync-workflow-'))
})

afterEach(async () => {
  await rm(localDir, { recursive: true, force: true })
})

function steps(results: WorkflowStepResult[]): string[] {
  return results.map((r) => `${r.step}:${r.status}`)
}

function automatic(session: FakeSession, signal?: AbortSignal) {
  return new RemoteWorkflow().runAutomaticWorkflow(session, {
    remoteDir: REMOTE_DIR,
    localDir,
    pattern: '*.wiglecsv',
    serviceName: 'kismet',
    signal
  })
}

// ── Automatic workflow ──────────────────────────────────────────────────────

describe('runAutomaticWorkflow', () => {
  it('copies, verifies and deletes a single capture file', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })

    const results = await automatic(session)

    expect(steps(results)).toEqual([
      'stop:succeeded',
      'discover:succeeded',
      'copy:succeeded',
      'verify:succeeded',
      'delete:succeeded'
    ])
    expect(session.executed[0]).toBe('sudo -n systemctl stop kismet')
    expect(session.deleted).toEqual([CAPTURE])
    expect(session.files.has(CAPTURE)).toBe(false)

    const local = await readFile(join(localDir, 'capture_20240101.wiglecsv'))
    expect(local.length).toBe(1024)

    const verifyResult = results[3]
    expect(verifyResult.transfer?.outcome).toBe('succeeded')
    expect(verifyResult.transfer?.sourceHash).toBe(verifyResult.transfer?.destinationHash)

    expect(summarizeResults(results)).toEqual({ total: 1, succeeded: 1, failed: 0, cancelled: 0, aborted: false })
  })

  it('reports a hash mismatch and keeps both copies when the local file is truncated', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA }, truncate: [CAPTURE] })

    const results = await automatic(session)

    expect(steps(results)).toEqual(['stop:succeeded', 'discover:succeeded', 'copy:succeeded', 'verify:failed'])
    const mismatch = results[3]
    expect(mismatch.errorKind).toBe('verification')
    expect(mismatch.terminal).toBe(true)
    expect(mismatch.message.startsWith(`Hash mismatch for ${CAPTURE}: remote `)).toBe(true)
    expect(mismatch.transfer?.outcome).toBe('hash-mismatch')

    expect(session.deleted).toEqual([])
    expect(session.files.has(CAPTURE)).toBe(true)
    const partial = await stat(join(localDir, 'capture_20240101.wiglecsv'))
    expect(partial.size).toBe(512)
  })

  it('aborts before discovery when the service cannot be stopped', async () => {
    const session = new FakeSession({
      files: { [CAPTURE]: CAPTURE_DATA },
      commands: {
        'sudo -n systemctl stop kismet': { code: 1, stdout: '', stderr: 'Failed to stop kismet.service: Access denied\n' }
      }
    })

    const results = await automatic(session)

    expect(results).toHaveLength(1)
    expect(results[0]).toMatchObject({
      step: 'stop',
      status: 'failed',
      fatal: true,
      errorKind: 'remote-exec',
      message: 'Cannot stop kismet: stop kismet failed: Failed to stop kismet.service: Access denied'
    })
    expect(session.executed).toEqual(['sudo -n systemctl stop kismet'])
    expect(session.downloaded).toEqual([])
    expect(session.files.has(CAPTURE)).toBe(true)
  })

  it('aborts when the remote directory cannot be listed', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA }, failList: true })

    const results = await automatic(session)

    expect(steps(results)).toEqual(['stop:succeeded', 'discover:failed'])
    expect(results[1].fatal).toBe(true)
    expect(summarizeResults(results).aborted).toBe(true)
  })

  it('finishes after discovery when there are no matching files', async () => {
    const session = new FakeSession({ files: { [`${REMOTE_DIR}/notes.txt`]: 'x' } })

    const results = await automatic(session)

    expect(steps(results)).toEqual(['stop:succeeded', 'discover:succeeded'])
    expect(results[1].message).toBe('Found 0 file(s) matching *.wiglecsv in /home/pi/kismet')
    expect(summarizeResults(results).total).toBe(0)
  })

  it('keeps going when one file fails to copy', async () => {
    const a = `${REMOTE_DIR}/a.wiglecsv`
    const b = `${REMOTE_DIR}/b.wiglecsv`
    const c = `${REMOTE_DIR}/c.wiglecsv`
    const session = new FakeSession({ files: { [a]: 'aaa', [b]: 'bbb', [c]: 'ccc' }, failDownload: [b] })

    const results = await automatic(session)

    const failed = results.filter((r) => r.status === 'failed')
    expect(failed).toHaveLength(1)
    expect(failed[0]).toMatchObject({ step: 'copy', file: b, terminal: true, errorKind: 'transport' })
    expect(session.deleted).toEqual([a, c])
    expect(session.files.has(b)).toBe(true)
    expect(summarizeResults(results)).toEqual({ total: 3, succeeded: 2, failed: 1, cancelled: 0, aborted: false })
  })

  it('reports a failed delete and leaves the local copy in place', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA }, failDelete: [CAPTURE] })

    const results = await automatic(session)

    const last = results[results.length - 1]
    expect(last).toMatchObject({ step: 'delete', status: 'failed', terminal: true, errorKind: 'remote-exec' })
    expect(last.message).toBe(`Delete failed: Cannot delete ${CAPTURE}: Permission denied; local copy kept`)
    expect((await stat(join(localDir, 'capture_20240101.wiglecsv'))).size).toBe(1024)
  })

  it('keeps sub-directories below the remote directory', async () => {
    const nested = `${REMOTE_DIR}/2024/01/nested.wiglecsv`
    const session = new FakeSession({ files: { [nested]: 'nested' } })

    await automatic(session)

    expect(await readFile(join(localDir, '2024', '01', 'nested.wiglecsv'), 'utf8')).toBe('nested')
  })

  it('never deletes after cancellation and cancels files not yet started', async () => {
    const a = `${REMOTE_DIR}/a.wiglecsv`
    const b = `${REMOTE_DIR}/b.wiglecsv`
    const session = new FakeSession({ files: { [a]: 'aaa', [b]: 'bbb' } })
    const controller = new AbortController()

    const workflow = new RemoteWorkflow()
    workflow.on('step', (result: WorkflowStepResult) => {
      if (result.step === 'verify' && result.status === 'succeeded') controller.abort()
    })

    const results = await workflow.runAutomaticWorkflow(session, {
      remoteDir: REMOTE_DIR,
      localDir,
      pattern: '*.wiglecsv',
      serviceName: 'kismet',
      signal: controller.signal
    })

    expect(steps(results)).toEqual([
      'stop:succeeded',
      'discover:succeeded',
      'copy:succeeded',
      'verify:succeeded',
      'delete:cancelled',
      'copy:cancelled'
    ])
    expect(results[4].message).toBe('Cancelled before delete; remote file kept')
    expect(results[5].file).toBe(b)
    expect(session.deleted).toEqual([])
    expect(summarizeResults(results)).toEqual({ total: 2, succeeded: 0, failed: 0, cancelled: 2, aborted: false })
  })

  it('does nothing when cancelled before it starts', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })
    const controller = new AbortController()
    controller.abort()

    const results = await automatic(session, controller.signal)

    expect(steps(results)).toEqual(['stop:cancelled'])
    expect(session.executed).toEqual([])
  })

  it('emits every result as a step event', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })
    const workflow = new RemoteWorkflow()
    const emitted: WorkflowStepResult[] = []
    workflow.on('step', (r: WorkflowStepResult) => emitted.push(r))

    const results = await workflow.runAutomaticWorkflow(session, {
      remoteDir: REMOTE_DIR,
      localDir,
      pattern: '*.wiglecsv',
      serviceName: 'kismet'
    })

    expect(emitted).toEqual(results)
  })
})

// ── Copy-only workflow ──────────────────────────────────────────────────────

describe('runCopyWorkflow', () => {
  it('copies and verifies without stopping the service or deleting', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })

    const results = await new RemoteWorkflow().runCopyWorkflow(session, {
      remoteDir: REMOTE_DIR,
      localDir,
      pattern: '*.wiglecsv'
    })

    expect(steps(results)).toEqual(['discover:succeeded', 'copy:succeeded', 'verify:succeeded'])
    expect(results[2].terminal).toBe(true)
    expect(session.executed.some((c) => c.includes('systemctl'))).toBe(false)
    expect(session.deleted).toEqual([])
  })
})

// ── Direct upload workflow ──────────────────────────────────────────────────

describe('runDirectUploadWorkflow', () => {
  it('deletes the remote file after the API acknowledges the upload', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })
    const { api, uploadFile } = createFakeApi()

    const results = await new RemoteWorkflow().runDirectUploadWorkflow(session, {
      remoteDir: REMOTE_DIR,
      pattern: '*.wiglecsv',
      serviceName: 'kismet',
      api,
      credentials: TEST_CREDENTIALS
    })

    expect(steps(results)).toEqual(['stop:succeeded', 'discover:succeeded', 'upload:succeeded', 'delete:succeeded'])
    expect(results[2].transactionId).toBe('20240101-capture_20240101.wiglecsv')
    expect(uploadFile).toHaveBeenCalledTimes(1)
    expect(uploadFile.mock.calls[0][0]).toEqual(TEST_CREDENTIALS)
    expect(uploadFile.mock.calls[0][1]).toBe('capture_20240101.wiglecsv')
    expect(uploadFile.mock.calls[0][2].equals(CAPTURE_DATA)).toBe(true)
    expect(session.deleted).toEqual([CAPTURE])
  })

  it('keeps the remote file when the response is not a success acknowledgment', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })
    const { api } = createFakeApi({
      onUpload: async () => {
        throw new ApiError('Upload not acknowledged: no success flag in response')
      }
    })

    const results = await new RemoteWorkflow().runDirectUploadWorkflow(session, {
      remoteDir: REMOTE_DIR,
      pattern: '*.wiglecsv',
      serviceName: 'kismet',
      api,
      credentials: TEST_CREDENTIALS
    })

    const last = results[results.length - 1]
    expect(last).toMatchObject({ step: 'upload', status: 'failed', terminal: true, fatal: false })
    expect(last.message).toBe('Upload failed: Upload not acknowledged: no success flag in response; remote file kept')
    expect(session.deleted).toEqual([])
  })

  it('stops uploading after an authentication failure', async () => {
    const files = {
      [`${REMOTE_DIR}/a.wiglecsv`]: 'aaa',
      [`${REMOTE_DIR}/b.wiglecsv`]: 'bbb',
      [`${REMOTE_DIR}/c.wiglecsv`]: 'ccc'
    }
    const session = new FakeSession({ files })
    const { api, uploadFile } = createFakeApi({
      onUpload: async () => {
        throw new AuthError('HTTP 401: Unauthorized', 401)
      }
    })

    const results = await new RemoteWorkflow().runDirectUploadWorkflow(session, {
      remoteDir: REMOTE_DIR,
      pattern: '*.wiglecsv',
      serviceName: 'kismet',
      api,
      credentials: TEST_CREDENTIALS
    })

    expect(steps(results)).toEqual([
      'stop:succeeded',
      'discover:succeeded',
      'upload:failed',
      'upload:cancelled',
      'upload:cancelled'
    ])
    expect(results[2]).toMatchObject({ fatal: true, errorKind: 'auth' })
    expect(uploadFile).toHaveBeenCalledTimes(1)
    expect(session.deleted).toEqual([])
    expect(summarizeResults(results)).toEqual({ total: 3, succeeded: 0, failed: 1, cancelled: 2, aborted: true })
  })

  it('uploads an explicit file list without listing the directory', async () => {
    const session = new FakeSession({ files: { [CAPTURE]: CAPTURE_DATA } })
    const { api } = createFakeApi()

    const results = await new RemoteWorkflow().runDirectUploadWorkflow(session, {
      files: [{ name: 'capture_20240101.wiglecsv', path: CAPTURE, size: 1024, modifiedAt: 0 }],
      pattern: '*.wiglecsv',
      serviceName: 'kismet',
      api,
      credentials: TEST_CREDENTIALS
    })

    expect(steps(results)).toEqual(['stop:succeeded', 'upload:succeeded', 'delete:succeeded'])
  })
})

// ── Helpers ─────────────────────────────────────────────────────────────────

describe('localPathFor', () => {
  it('keeps the path below the remote directory', () => {
    expect(localPathFor('/home/pi/kismet', '/home/pi/kismet/2024/a.wiglecsv', '/data')).toBe(join('/data', '2024', 'a.wiglecsv'))
  })

  it('falls back to the file name for paths outside the remote directory', () => {
    expect(localPathFor('/home/pi/kismet', '/tmp/b.wiglecsv', '/data')).toBe(join('/data', 'b.wiglecsv'))
  })
})

describe('summarizeRemote', () => {
  it('counts matching files and their total size', async () => {
    const session = new FakeSession({
      files: { [`${REMOTE_DIR}/a.wiglecsv`]: 'aaaa', [`${REMOTE_DIR}/b.wiglecsv`]: 'bb', [`${REMOTE_DIR}/c.log`]: 'c' }
    })

    expect(await new RemoteWorkflow().summarizeRemote(session, REMOTE_DIR, '*.wiglecsv')).toEqual({
      count: 2,
      totalBytes: 6
    })
  })
})
