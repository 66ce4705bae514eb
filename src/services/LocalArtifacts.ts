import { createWriteStream, existsSync, type Dirent } from 'fs'
import { mkdir, readdir, stat, unlink } from 'fs/promises'
import { basename, isAbsolute, join, relative, sep } from 'path'
import archiver from 'archiver'
import type { LocalFile } from '../types/remote'
import { InvalidInputError, errorMessage } from '../errors'
import { globToRegExp } from '../utils/pattern'

export interface RemoveResult {
  removed: string[]
  failed: Array<{ path: string; error: string }>
}

export interface ArchiveOptions {
  /** Names the archive `<YYYY-MM-DD>.zip`; default: today */
  date?: Date
  /** Replace an archive of the same name instead of refusing */
  overwrite?: boolean
}

export interface ArchiveResult {
  archivePath: string
  /** Sources written to the archive */
  archived: string[]
  /** Sources that no longer existed */
  skipped: string[]
  /** Deletion of the archived sources */
  removal: RemoveResult
}

/** Local calendar date as YYYY-MM-DD */
export function archiveName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.zip`
}

/** Entry name inside the archive: the path below `localDir`, else the file name */
function entryName(path: string, localDir: string): string {
  const rel = relative(localDir, path)
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return basename(path)
  return rel.split(sep).join('/')
}

function writeZip(archivePath: string, entries: Array<{ path: string; name: string }>): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = createWriteStream(archivePath)
    const archive = archiver('zip', { zlib: { level: 9 } })

    const fail = (err: Error) => {
      archive.abort()
      output.destroy()
      reject(err)
    }

    output.on('close', () => resolve())
    output.on('error', fail)
    archive.on('error', fail)
    archive.on('warning', fail)

    archive.pipe(output)
    for (const entry of entries) archive.file(entry.path, { name: entry.name })
    archive.finalize().catch(fail)
  })
}

/** Capture files already copied to this machine */
export class LocalArtifacts {
  /** Recursive scan of `localDir`; a missing directory lists as empty */
  static async list(localDir: string, pattern: string): Promise<LocalFile[]> {
    const matcher = globToRegExp(pattern)
    const files: LocalFile[] = []

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[]
      try {
        entries = await readdir(dir, { withFileTypes: true })
      } catch (err) {
        if (dir === localDir && isNotFound(err)) return
        throw err
      }

      for (const entry of entries) {
        const path = join(dir, entry.name)
        if (entry.isDirectory()) {
          await walk(path)
        } else if (entry.isFile() && matcher.test(entry.name)) {
          const info = await stat(path)
          files.push({ name: entry.name, path, size: info.size })
        }
      }
    }

    await walk(localDir)
    return files.sort((a, b) => a.path.localeCompare(b.path))
  }

  /**
   * Zip `paths` into `<localDir>/<YYYY-MM-DD>.zip`, then delete the sources.
   * Nothing is deleted unless the archive was written completely.
   */
  static async archive(paths: string[], localDir: string, options: ArchiveOptions = {}): Promise<ArchiveResult> {
    const archivePath = join(localDir, archiveName(options.date ?? new Date()))
    if (!options.overwrite && existsSync(archivePath)) {
      throw new InvalidInputError(`Archive already exists: ${archivePath}`)
    }

    const archived = paths.filter((path) => existsSync(path))
    const skipped = paths.filter((path) => !archived.includes(path))
    if (archived.length === 0) {
      throw new InvalidInputError('No files to archive')
    }

    await mkdir(localDir, { recursive: true })
    await writeZip(
      archivePath,
      archived.map((path) => ({ path, name: entryName(path, localDir) }))
    )

    return { archivePath, archived, skipped, removal: await LocalArtifacts.remove(archived) }
  }

  /** Delete local copies; each path is attempted independently */
  static async remove(paths: string[]): Promise<RemoveResult> {
    const result: RemoveResult = { removed: [], failed: [] }
    for (const path of paths) {
      try {
        await unlink(path)
        result.removed.push(path)
      } catch (err) {
        result.failed.push({ path, error: errorMessage(err) })
      }
    }
    return result
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
