import type { SFTPWrapper, FileEntry as SSH2FileEntry, Stats } from 'ssh2'
import { createReadStream, createWriteStream, promises as fsp } from 'fs'
import { basename, posix } from 'path'
import { EventEmitter } from 'events'
import type { Readable, Writable } from 'stream'
import { TransportError } from '../errors'

const S_IFMT = 0o170000
const S_IFDIR = 0o040000
const S_IFREG = 0o100000

const DEFAULT_IDLE_TIMEOUT = 60_000

export interface FileEntry {
  name: string
  path: string
  isDirectory: boolean
  isFile: boolean
  size: number
  modifiedAt: number
}

/**
 * SFTPService — wraps the ssh2 SFTP subsystem for the file operations the sync needs.
 * Emits: 'progress' → (transferId, deltaBytes, transferred, total)
 */
export class SFTPService extends EventEmitter {
  private sftp: SFTPWrapper
  private idleTimeoutMs: number

  constructor(sftp: SFTPWrapper, idleTimeoutMs: number = DEFAULT_IDLE_TIMEOUT) {
    super()
    this.sftp = sftp
    this.idleTimeoutMs = idleTimeoutMs
  }

  /** List directory contents */
  async readdir(remotePath: string): Promise<FileEntry[]> {
    return new Promise((resolve, reject) => {
      this.sftp.readdir(remotePath, (err, list) => {
        if (err) {
          reject(err)
          return
        }

        resolve(
          list
            .filter((item: SSH2FileEntry) => item.filename !== '.' && item.filename !== '..')
            .map((item: SSH2FileEntry) => {
              const mode = item.attrs.mode ?? 0
              return {
                name: item.filename,
                path: posix.join(remotePath, item.filename),
                isDirectory: (mode & S_IFMT) === S_IFDIR,
                isFile: (mode & S_IFMT) === S_IFREG,
                size: item.attrs.size ?? 0,
                modifiedAt: (item.attrs.mtime ?? 0) * 1000
              }
            })
        )
      })
    })
  }

  /** Walk a directory tree and return every regular file accepted by `filter` */
  async walk(remotePath: string, filter: (entry: FileEntry) => boolean): Promise<FileEntry[]> {
    const found: FileEntry[] = []
    for (const entry of await this.readdir(remotePath)) {
      if (entry.isDirectory) {
        found.push(...(await this.walk(entry.path, filter)))
      } else if (entry.isFile && filter(entry)) {
        found.push(entry)
      }
    }
    return found
  }

  async stat(remotePath: string): Promise<FileEntry> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (err, stats) => {
        if (err) {
          reject(err)
          return
        }
        resolve(this.statsToEntry(remotePath, stats))
      })
    })
  }

  async unlink(remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.unlink(remotePath, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  async mkdir(remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.mkdir(remotePath, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  /** Create directory recursively */
  async mkdirRecursive(remotePath: string): Promise<void> {
    const parts = remotePath.split('/').filter(Boolean)
    let current = ''
    for (const part of parts) {
      current += '/' + part
      try {
        await this.stat(current)
      } catch {
        await this.mkdir(current)
      }
    }
  }

  /**
   * Download a file from remote to local.
   * Resolves with the byte count written; rejects with TransportError.
   */
  async download(remotePath: string, localPath: string, transferId: string): Promise<number> {
    const stats = await this.stat(remotePath).catch((err: unknown) => {
      throw new TransportError(`Cannot stat ${remotePath}`, err)
    })
    return this.pipe(
      this.sftp.createReadStream(remotePath),
      createWriteStream(localPath),
      transferId,
      stats.size
    )
  }

  /** Upload a file from local to remote. Resolves with the byte count sent. */
  async upload(localPath: string, remotePath: string, transferId: string): Promise<number> {
    const localStats = await fsp.stat(localPath)
    return this.pipe(
      createReadStream(localPath),
      this.sftp.createWriteStream(remotePath),
      transferId,
      localStats.size
    )
  }

  /** Read a whole remote file into memory, under the same idle timeout as transfers */
  async readFile(remotePath: string, maxSize: number = 256 * 1024 * 1024): Promise<Buffer> {
    const stats = await this.stat(remotePath).catch((err: unknown) => {
      throw new TransportError(`Cannot stat ${remotePath}`, err)
    })
    if (stats.size > maxSize) {
      throw new TransportError(`File too large: ${stats.size} bytes (max: ${maxSize})`)
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = []
      const stream = this.sftp.createReadStream(remotePath)
      const idle = this.idleTimer(() => {
        stream.destroy()
        reject(new TransportError(`Read stalled for ${this.idleTimeoutMs}ms`))
      })

      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
        idle.arm()
      })
      stream.on('error', (err: Error) => {
        idle.clear()
        reject(new TransportError(err.message, err))
      })
      stream.on('end', () => {
        idle.clear()
        resolve(Buffer.concat(chunks))
      })
      idle.arm()
    })
  }

  close(): void {
    this.sftp.end()
  }

  /** Pipe with progress events and an idle timeout that is reset on every chunk */
  private pipe(readStream: Readable, writeStream: Writable, transferId: string, totalBytes: number): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      let transferred = 0
      let settled = false

      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        idle.clear()
        fn()
      }

      const fail = (err: unknown) => {
        settle(() => {
          readStream.destroy()
          writeStream.destroy()
          reject(err instanceof TransportError
            ? err
            : new TransportError(err instanceof Error ? err.message : 'Transfer failed', err))
        })
      }

      const idle = this.idleTimer(() => fail(new TransportError(`Transfer stalled for ${this.idleTimeoutMs}ms`)))

      readStream.on('data', (chunk: Buffer) => {
        transferred += chunk.length
        idle.arm()
        this.emit('progress', transferId, chunk.length, transferred, totalBytes)
      })

      readStream.on('error', fail)
      writeStream.on('error', fail)
      writeStream.on('finish', () => settle(() => resolve(transferred)))

      idle.arm()
      readStream.pipe(writeStream)
    })
  }

  /** Timer that fires `onIdle` once no chunk has arrived for the idle timeout */
  private idleTimer(onIdle: () => void): { arm: () => void; clear: () => void } {
    let timer: ReturnType<typeof setTimeout> | null = null
    const clear = () => {
      if (timer) clearTimeout(timer)
      timer = null
    }
    return {
      arm: () => {
        clear()
        timer = setTimeout(onIdle, this.idleTimeoutMs)
      },
      clear
    }
  }

  private statsToEntry(path: string, stats: Stats): FileEntry {
    return {
      name: basename(path) || path,
      path,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
      size: stats.size,
      modifiedAt: (stats.mtime ?? 0) * 1000
    }
  }
}
