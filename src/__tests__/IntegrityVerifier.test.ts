/**
 * Tests for SHA-256 verification on both ends of a transfer (services/IntegrityVerifier.ts)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { hashBuffer, hashLocal, hashRemote, verify } from '../services/IntegrityVerifier'
import { InvalidInputError, RemoteExecError } from '../errors'
import { FakeSession } from './helpers/fakeSession'

const HELLO = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
const EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'capture-sync-hash-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('local digests', () => {
  it('hashes buffers and files to the same lowercase hex', async () => {
    const path = join(dir, 'a.wiglecsv')
    await writeFile(path, 'hello')

    expect(hashBuffer(Buffer.from('hello'))).toBe(HELLO)
    expect(await hashLocal(path)).toBe(HELLO)
  })

  it('hashes an empty file', async () => {
    const path = join(dir, 'empty.wiglecsv')
    await writeFile(path, '')
    expect(await hashLocal(path)).toBe(EMPTY)
  })

  it('rejects when the file is missing', async () => {
    await expect(hashLocal(join(dir, 'missing'))).rejects.toThrow(/ENOENT/)
  })
})

describe('hashRemote', () => {
  it('runs sha256sum on the quoted path and parses the digest', async () => {
    const session = new FakeSession({ files: { '/data/my capture.wiglecsv': 'hello' } })

    expect(await hashRemote(session, '/data/my capture.wiglecsv')).toBe(HELLO)
    expect(session.executed).toEqual(["sha256sum -- '/data/my capture.wiglecsv'"])
  })

  it('normalizes an uppercase digest', async () => {
    const session = new FakeSession({
      commands: {
        "sha256sum -- '/data/a.wiglecsv'": { code: 0, stdout: `${HELLO.toUpperCase()}  /data/a.wiglecsv\n`, stderr: '' }
      }
    })
    expect(await hashRemote(session, '/data/a.wiglecsv')).toBe(HELLO)
  })

  it('fails on a non-zero exit', async () => {
    const session = new FakeSession()

    const err = await hashRemote(session, '/data/missing.wiglecsv').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RemoteExecError)
    expect(err).toMatchObject({
      message: 'sha256sum failed for /data/missing.wiglecsv: sha256sum: /data/missing.wiglecsv: No such file or directory',
      exitCode: 1
    })
  })

  it('fails on output that is not a digest', async () => {
    const session = new FakeSession({
      commands: { "sha256sum -- '/data/a.wiglecsv'": { code: 0, stdout: 'garbage\n', stderr: '' } }
    })
    await expect(hashRemote(session, '/data/a.wiglecsv')).rejects.toThrow('Unexpected sha256sum output for /data/a.wiglecsv')
  })

  it('refuses a relative path without running anything', async () => {
    const session = new FakeSession()
    await expect(hashRemote(session, 'data/a.wiglecsv')).rejects.toBeInstanceOf(InvalidInputError)
    expect(session.executed).toEqual([])
  })
})

describe('verify', () => {
  it('compares digests ignoring case and surrounding whitespace', () => {
    expect(verify(HELLO, `${HELLO.toUpperCase()}\n`)).toBe(true)
    expect(verify(HELLO, EMPTY)).toBe(false)
  })

  it('never verifies values that are not digests', () => {
    expect(verify('', '')).toBe(false)
    expect(verify('z'.repeat(64), 'z'.repeat(64))).toBe(false)
    expect(verify(HELLO.slice(1), HELLO.slice(1))).toBe(false)
  })
})
