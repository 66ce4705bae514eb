import { randomUUID } from 'crypto'
import { mkdir } from 'fs/promises'
import { dirname, posix } from 'path'
import { SSHService, type SSHConnection, type SSHConnectionOptions } from './SSHService'
import { SFTPService } from './SFTPService'
import type { CommandResult, HostCredentials, RemoteFile } from '../types/remote'
import type { TransferProgress, TransferRecord } from '../types/transfer'
import { RemoteExecError, TransportError, errorMessage, isSyncError } from '../errors'
import { validateRemotePath } from '../utils/shellEscape'
import { globToRegExp } from '../utils/pattern'

/**
 * An authenticated command + file-transfer session bound to one host.
 * Everything the workflows do on the device goes through this interface.
 */
export interface RemoteSession {
  readonly host: string

  /** Run a fully formed command; non-zero exit codes resolve, channel failures reject */
  execute(command: string, timeoutMs?: number): Promise<CommandResult>

  /** Recursively list regular files under `remoteDir` whose name matches `pattern` */
  listFiles(remoteDir: string, pattern: string): Promise<RemoteFile[]>

  /** Stream a remote file to disk; the record stays `pending` until verified */
  downloadFile(remotePath: string, localPath: string, onProgress?: TransferProgress): Promise<TransferRecord>

  uploadFile(localPath: string, remotePath: string, onProgress?: TransferProgress): Promise<TransferRecord>

  readFile(remotePath: string): Promise<Buffer>

  deleteRemoteFile(remotePath: string): Promise<void>

  close(): void
}

/** Fresh transfer record in the `pending` state */
export function createTransferRecord(
  direction: TransferRecord['direction'],
  sourcePath: string,
  destinationPath: string,
  totalBytes: number = 0
): TransferRecord {
  return {
    id: randomUUID(),
    direction,
    sourcePath,
    destinationPath,
    bytesTransferred: 0,
    totalBytes,
    outcome: 'pending',
    startedAt: Date.now()
  }
}

/** Sort and filter a raw listing into RemoteFiles */
export function toRemoteFiles(
  entries: Array<{ name: string; path: string; size: number; modifiedAt: number }>,
  pattern: string
): RemoteFile[] {
  const matcher = globToRegExp(pattern)
  return entries
    .filter((e) => matcher.test(e.name))
    .map((e) => ({ name: e.name, path: e.path, size: e.size, modifiedAt: e.modifiedAt }))
    .sort((a, b) => a.path.localeCompare(b.path))
}

/**
 * SSHSession — RemoteSession over one SSHConnection and its SFTP subsystem.
 */
export class SSHSession implements RemoteSession {
  private conn: SSHConnection
  private sftp: SFTPService
  private progressHandlers: Map<string, TransferProgress> = new Map()

  constructor(conn: SSHConnection, sftp: SFTPService) {
    this.conn = conn
    this.sftp = sftp

    this.sftp.on('progress', (transferId: string, delta: number, transferred: number, total: number) => {
      this.progressHandlers.get(transferId)?.(delta, transferred, total)
    })
  }

  get host(): string {
    return this.conn.host
  }

  execute(command: string, timeoutMs?: number): Promise<CommandResult> {
    return this.conn.exec(command, timeoutMs)
  }

  async listFiles(remoteDir: string, pattern: string): Promise<RemoteFile[]> {
    const dir = validateRemotePath(remoteDir)
    const matcher = globToRegExp(pattern)
    try {
      const entries = await this.sftp.walk(dir, (entry) => matcher.test(entry.name))
      return toRemoteFiles(entries, pattern)
    } catch (err) {
      throw new RemoteExecError(`Cannot list ${dir}: ${errorMessage(err)}`, {
        command: `list ${dir}`,
        cause: err
      })
    }
  }

  async downloadFile(remotePath: string, localPath: string, onProgress?: TransferProgress): Promise<TransferRecord> {
    const source = validateRemotePath(remotePath)
    const record = createTransferRecord('download', source, localPath)

    await mkdir(dirname(localPath), { recursive: true })
    return this.track(record, onProgress, () => this.sftp.download(source, localPath, record.id))
  }

  async uploadFile(localPath: string, remotePath: string, onProgress?: TransferProgress): Promise<TransferRecord> {
    const destination = validateRemotePath(remotePath)
    const record = createTransferRecord('upload', localPath, destination)

    await this.sftp.mkdirRecursive(posix.dirname(destination)).catch((err: unknown) => {
      throw new TransportError(`Cannot create ${posix.dirname(destination)}: ${errorMessage(err)}`, err)
    })
    return this.track(record, onProgress, () => this.sftp.upload(localPath, destination, record.id))
  }

  readFile(remotePath: string): Promise<Buffer> {
    return this.sftp.readFile(validateRemotePath(remotePath))
  }

  async deleteRemoteFile(remotePath: string): Promise<void> {
    const target = validateRemotePath(remotePath)
    try {
      await this.sftp.unlink(target)
    } catch (err) {
      throw new RemoteExecError(`Cannot delete ${target}: ${errorMessage(err)}`, {
        command: `unlink ${target}`,
        cause: err
      })
    }
  }

  close(): void {
    this.sftp.close()
    this.conn.disconnect()
  }

  private async track(
    record: TransferRecord,
    onProgress: TransferProgress | undefined,
    run: () => Promise<number>
  ): Promise<TransferRecord> {
    this.progressHandlers.set(record.id, (delta, transferred, total) => {
      record.bytesTransferred = transferred
      record.totalBytes = total
      onProgress?.(delta, transferred, total)
    })

    try {
      record.bytesTransferred = await run()
      return record
    } catch (err) {
      record.outcome = 'transport-failed'
      record.error = errorMessage(err)
      throw isSyncError(err) ? err : new TransportError(record.error, err)
    } finally {
      record.completedAt = Date.now()
      this.progressHandlers.delete(record.id)
    }
  }
}

/**
 * SecureChannelClient — opens sessions through the shared SSHService pool,
 * so there is never more than one live session per host.
 */
export class SecureChannelClient {
  private sshService: SSHService

  constructor(sshService: SSHService = new SSHService()) {
    this.sshService = sshService
  }

  /** Connect and open SFTP; rejects with ConnectionError */
  async connect(
    credentials: HostCredentials,
    options: SSHConnectionOptions & { transferIdleTimeoutMs?: number } = {}
  ): Promise<SSHSession> {
    const conn = await this.sshService.connect(credentials, options)
    try {
      const sftp = await conn.getSFTP()
      return new SSHSession(conn, new SFTPService(sftp, options.transferIdleTimeoutMs))
    } catch (err) {
      this.sshService.disconnect(conn.id)
      throw err
    }
  }

  disconnectAll(): void {
    this.sshService.disconnectAll()
  }
}
