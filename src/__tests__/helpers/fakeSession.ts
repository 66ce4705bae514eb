import { createHash } from 'crypto'
import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname, posix } from 'path'
import { createTransferRecord, toRemoteFiles, type RemoteSession } from '../../services/SecureChannel'
import type { CommandResult, RemoteFile } from '../../types/remote'
import type { TransferProgress, TransferRecord } from '../../types/transfer'
import { RemoteExecError, TransportError } from '../../errors'

export interface FakeSessionOptions {
  /** Remote files by absolute path */
  files?: Record<string, string | Buffer>
  /** Exact command → scripted result, checked before the built-in handlers */
  commands?: Record<string, CommandResult>
  /** Remote paths whose download writes only the first half of the file */
  truncate?: string[]
  failDownload?: string[]
  failDelete?: string[]
  failList?: boolean
}

const ok = (stdout = ''): CommandResult => ({ code: 0, stdout, stderr: '' })

/**
 * In-memory capture host. Downloads land on the real local disk so the
 * verifier can hash them.
 */
export class FakeSession implements RemoteSession {
  readonly host = 'capture.test'
  readonly files: Map<string, Buffer>
  readonly executed: string[] = []
  readonly deleted: string[] = []
  readonly downloaded: string[] = []
  closed = false

  private options: FakeSessionOptions

  constructor(options: FakeSessionOptions = {}) {
    this.options = options
    this.files = new Map(
      Object.entries(options.files ?? {}).map(([path, data]) => [path, Buffer.isBuffer(data) ? data : Buffer.from(data)])
    )
  }

  async execute(command: string): Promise<CommandResult> {
    this.executed.push(command)

    const scripted = this.options.commands?.[command]
    if (scripted) return scripted

    const sha = /^sha256sum -- '(.*)'$/.exec(command)
    if (sha) {
      const data = this.files.get(sha[1])
      if (!data) return { code: 1, stdout: '', stderr: `sha256sum: ${sha[1]}: No such file or directory\n` }
      return ok(`${createHash('sha256').update(data).digest('hex')}  ${sha[1]}\n`)
    }

    if (/^sudo -n systemctl (start|stop|restart) [\w@.-]+$/.test(command)) return ok()
    if (command === 'echo ok') return ok('ok\n')

    return { code: 127, stdout: '', stderr: `${command.split(' ')[0]}: command not found\n` }
  }

  async listFiles(remoteDir: string, pattern: string): Promise<RemoteFile[]> {
    if (this.options.failList) {
      throw new RemoteExecError(`Cannot list ${remoteDir}: Permission denied`, { command: `list ${remoteDir}` })
    }

    const prefix = remoteDir.endsWith('/') ? remoteDir : `${remoteDir}/`
    const entries = Array.from(this.files.entries())
      .filter(([path]) => path.startsWith(prefix))
      .map(([path, data]) => ({ name: posix.basename(path), path, size: data.length, modifiedAt: 0 }))
    return toRemoteFiles(entries, pattern)
  }

  async downloadFile(remotePath: string, localPath: string, onProgress?: TransferProgress): Promise<TransferRecord> {
    const record = createTransferRecord('download', remotePath, localPath)
    const data = this.files.get(remotePath)

    if (!data || this.options.failDownload?.includes(remotePath)) {
      record.outcome = 'transport-failed'
      throw new TransportError(`Transfer stalled for 100ms`)
    }

    const written = this.options.truncate?.includes(remotePath) ? data.subarray(0, Math.floor(data.length / 2)) : data
    await mkdir(dirname(localPath), { recursive: true })
    await writeFile(localPath, written)
    onProgress?.(written.length, written.length, data.length)

    this.downloaded.push(remotePath)
    record.bytesTransferred = written.length
    record.totalBytes = data.length
    record.completedAt = Date.now()
    return record
  }

  async uploadFile(localPath: string, remotePath: string, onProgress?: TransferProgress): Promise<TransferRecord> {
    const data = await readFile(localPath)
    this.files.set(remotePath, data)
    onProgress?.(data.length, data.length, data.length)

    const record = createTransferRecord('upload', localPath, remotePath, data.length)
    record.bytesTransferred = data.length
    return record
  }

  async readFile(remotePath: string): Promise<Buffer> {
    const data = this.files.get(remotePath)
    if (!data) throw new TransportError(`No such file: ${remotePath}`)
    return data
  }

  async deleteRemoteFile(remotePath: string): Promise<void> {
    if (this.options.failDelete?.includes(remotePath)) {
      throw new RemoteExecError(`Cannot delete ${remotePath}: Permission denied`, { command: `unlink ${remotePath}` })
    }
    this.files.delete(remotePath)
    this.deleted.push(remotePath)
  }

  close(): void {
    this.closed = true
  }
}
