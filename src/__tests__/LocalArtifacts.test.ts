import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'fs'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { LocalArtifacts, archiveName } from '../services/LocalArtifacts'
import { InvalidInputError } from '../errors'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'capture-sync-local-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('LocalArtifacts', () => {
  it('lists matching files recursively, sorted by path', async () => {
    await mkdir(join(dir, 'b'), { recursive: true })
    await writeFile(join(dir, 'b', 'two.wiglecsv'), '12')
    await writeFile(join(dir, 'a.wiglecsv'), '1')
    await writeFile(join(dir, 'notes.txt'), 'skip')

    expect(await LocalArtifacts.list(dir, '*.wiglecsv')).toEqual([
      { name: 'a.wiglecsv', path: join(dir, 'a.wiglecsv'), size: 1 },
      { name: 'two.wiglecsv', path: join(dir, 'b', 'two.wiglecsv'), size: 2 }
    ])
  })

  it('lists a missing directory as empty', async () => {
    expect(await LocalArtifacts.list(join(dir, 'never-created'), '*.wiglecsv')).toEqual([])
  })

  it('removes each file independently', async () => {
    const present = join(dir, 'a.wiglecsv')
    const missing = join(dir, 'missing.wiglecsv')
    await writeFile(present, 'x')

    const result = await LocalArtifacts.remove([present, missing])

    expect(result.removed).toEqual([present])
    expect(result.failed).toHaveLength(1)
    expect(result.failed[0].path).toBe(missing)
    expect(result.failed[0].error).toMatch(/^ENOENT/)
    expect(existsSync(present)).toBe(false)
  })

  it('names archives after the local date', () => {
    expect(archiveName(new Date(2024, 0, 2, 23, 59))).toBe('2024-01-02.zip')
  })

  it('zips the selected files and then deletes them', async () => {
    const a = join(dir, 'a.wiglecsv')
    const b = join(dir, 'b', 'two.wiglecsv')
    const gone = join(dir, 'gone.wiglecsv')
    await mkdir(join(dir, 'b'))
    await writeFile(a, 'first capture')
    await writeFile(b, 'second capture')

    const result = await LocalArtifacts.archive([a, b, gone], dir, { date: new Date(2024, 0, 2) })

    expect(result.archivePath).toBe(join(dir, '2024-01-02.zip'))
    expect(result.archived).toEqual([a, b])
    expect(result.skipped).toEqual([gone])
    expect(result.removal).toEqual({ removed: [a, b], failed: [] })
    expect(existsSync(a)).toBe(false)
    expect(existsSync(b)).toBe(false)

    const zip = await readFile(result.archivePath)
    expect(zip.subarray(0, 4)).toEqual(Buffer.from([0x50, 0x4b, 0x03, 0x04]))
    expect(zip.includes('a.wiglecsv')).toBe(true)
    expect(zip.includes('b/two.wiglecsv')).toBe(true)
  })

  it('refuses to replace an existing archive unless asked', async () => {
    const a = join(dir, 'a.wiglecsv')
    await writeFile(a, 'capture')
    await writeFile(join(dir, '2024-01-02.zip'), 'older archive')

    const err = await LocalArtifacts.archive([a], dir, { date: new Date(2024, 0, 2) }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(InvalidInputError)
    expect(err).toMatchObject({ message: `Archive already exists: ${join(dir, '2024-01-02.zip')}` })
    expect(existsSync(a)).toBe(true)
  })

  it('keeps the sources when the archive cannot be written', async () => {
    const a = join(dir, 'a.wiglecsv')
    await writeFile(a, 'capture')
    // a directory where the archive should go makes the write fail
    await mkdir(join(dir, '2024-01-02.zip'))

    await expect(
      LocalArtifacts.archive([a], dir, { date: new Date(2024, 0, 2), overwrite: true })
    ).rejects.toThrow(/EISDIR/)
    expect(existsSync(a)).toBe(true)
  })

  it('refuses an empty selection', async () => {
    await expect(LocalArtifacts.archive([join(dir, 'missing.wiglecsv')], dir)).rejects.toThrow('No files to archive')
  })
})
