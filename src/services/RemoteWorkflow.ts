import { EventEmitter } from 'events'
import { join, posix } from 'path'
import type { RemoteSession } from './SecureChannel'
import type { IngestionApi } from './IngestionApiClient'
import { ServiceControl } from './ServiceControl'
import { hashLocal, hashRemote, verify } from './IntegrityVerifier'
import type { RemoteFile } from '../types/remote'
import type { ApiCredentials } from '../types/api'
import type { TransferRecord } from '../types/transfer'
import type { WorkflowStep, WorkflowStepResult, WorkflowSummary } from '../types/workflow'
import { AuthError, CancelledError, VerificationMismatch, errorKind, errorMessage } from '../errors'

export interface CopyWorkflowOptions {
  remoteDir: string
  localDir: string
  pattern: string
  signal?: AbortSignal
}

export interface AutomaticWorkflowOptions extends CopyWorkflowOptions {
  serviceName: string
}

export interface DirectUploadWorkflowOptions {
  /** Scanned with `pattern` unless `files` is given */
  remoteDir?: string
  files?: RemoteFile[]
  pattern: string
  serviceName: string
  api: IngestionApi
  credentials: ApiCredentials
  signal?: AbortSignal
}

export interface RemoteSummary {
  count: number
  totalBytes: number
}

type StepInput = Omit<WorkflowStepResult, 'timestamp' | 'fatal' | 'terminal'> & {
  fatal?: boolean
  terminal?: boolean
}

/** Local destination of a remote file, keeping its path below `remoteDir` */
export function localPathFor(remoteDir: string, remotePath: string, localDir: string): string {
  const relative = posix.relative(posix.normalize(remoteDir), remotePath)
  if (!relative || relative.startsWith('..') || posix.isAbsolute(relative)) {
    return join(localDir, posix.basename(remotePath))
  }
  return join(localDir, ...relative.split('/'))
}

/** Count per-file outcomes from the terminal results of a run */
export function summarizeResults(results: WorkflowStepResult[]): WorkflowSummary {
  const summary: WorkflowSummary = { total: 0, succeeded: 0, failed: 0, cancelled: 0, aborted: false }

  for (const result of results) {
    if (result.fatal) summary.aborted = true
    if (!result.file || !result.terminal) continue

    summary.total++
    if (result.status === 'succeeded') summary.succeeded++
    else if (result.status === 'failed') summary.failed++
    else summary.cancelled++
  }
  return summary
}

/**
 * RemoteWorkflow — drives the capture host through stop, discover, copy,
 * verify and delete. Files are processed one after another; a failure on
 * one file never stops the others. A remote file is only deleted after it
 * verified in the same run.
 *
 * Emits:
 *   'step' → (result: WorkflowStepResult)
 */
export class RemoteWorkflow extends EventEmitter {
  private serviceControl: ServiceControl

  constructor(serviceControl: ServiceControl = new ServiceControl()) {
    super()
    this.serviceControl = serviceControl
  }

  /** Stop the service, then copy, verify and delete every matching file */
  async runAutomaticWorkflow(session: RemoteSession, options: AutomaticWorkflowOptions): Promise<WorkflowStepResult[]> {
    const results: WorkflowStepResult[] = []

    if (!(await this.stopService(session, options.serviceName, options.signal, results))) return results

    const files = await this.discover(session, options.remoteDir, options.pattern, results)
    if (!files) return results

    for (const file of files) {
      await this.copyFile(session, file, options, true, results)
    }
    return results
  }

  /** Copy and verify only; the service keeps running and nothing is deleted */
  async runCopyWorkflow(session: RemoteSession, options: CopyWorkflowOptions): Promise<WorkflowStepResult[]> {
    const results: WorkflowStepResult[] = []

    const files = await this.discover(session, options.remoteDir, options.pattern, results)
    if (!files) return results

    for (const file of files) {
      await this.copyFile(session, file, options, false, results)
    }
    return results
  }

  /**
   * Stream each file from the host straight to the ingestion API.
   * The remote copy is deleted only after a positive acknowledgment;
   * an auth failure aborts the run and the rest are cancelled.
   */
  async runDirectUploadWorkflow(
    session: RemoteSession,
    options: DirectUploadWorkflowOptions
  ): Promise<WorkflowStepResult[]> {
    const results: WorkflowStepResult[] = []

    if (!(await this.stopService(session, options.serviceName, options.signal, results))) return results

    let files: RemoteFile[] | null | undefined = options.files
    if (!files) {
      if (!options.remoteDir) {
        this.record(results, {
          step: 'discover',
          status: 'failed',
          fatal: true,
          message: 'No remote directory or file list given',
          errorKind: 'invalid-input'
        })
        return results
      }
      files = await this.discover(session, options.remoteDir, options.pattern, results)
      if (!files) return results
    }

    let authFailure: string | null = null

    for (const file of files) {
      if (authFailure) {
        this.cancelled(results, 'upload', file, `Skipped after authentication failure: ${authFailure}`)
        continue
      }
      if (options.signal?.aborted) {
        this.cancelled(results, 'upload', file, 'Cancelled before upload')
        continue
      }

      let data: Buffer
      try {
        data = await session.readFile(file.path)
      } catch (err) {
        this.failed(results, 'upload', file, `Cannot read ${file.path}: ${errorMessage(err)}`, err)
        continue
      }

      let transactionId: string | undefined
      try {
        const ack = await options.api.uploadFile(options.credentials, file.name, data, { signal: options.signal })
        transactionId = ack.transactionId
      } catch (err) {
        if (err instanceof CancelledError) {
          this.cancelled(results, 'upload', file, 'Upload cancelled; remote file kept')
        } else if (err instanceof AuthError) {
          authFailure = err.message
          this.record(results, {
            step: 'upload',
            status: 'failed',
            file: file.path,
            fatal: true,
            terminal: true,
            message: `Authentication failed: ${err.message}`,
            errorKind: 'auth'
          })
        } else {
          this.failed(results, 'upload', file, `Upload failed: ${errorMessage(err)}; remote file kept`, err)
        }
        continue
      }

      this.record(results, {
        step: 'upload',
        status: 'succeeded',
        file: file.path,
        message: transactionId ? `Uploaded ${file.name} as ${transactionId}` : `Uploaded ${file.name}`,
        transactionId
      })

      await this.deleteVerified(session, file, options.signal, results, 'file already uploaded')
    }
    return results
  }

  /** Number and total size of the artifacts waiting on the host */
  async summarizeRemote(session: RemoteSession, remoteDir: string, pattern: string): Promise<RemoteSummary> {
    const files = await session.listFiles(remoteDir, pattern)
    return {
      count: files.length,
      totalBytes: files.reduce((sum, f) => sum + f.size, 0)
    }
  }

  private async stopService(
    session: RemoteSession,
    serviceName: string,
    signal: AbortSignal | undefined,
    results: WorkflowStepResult[]
  ): Promise<boolean> {
    if (signal?.aborted) {
      this.record(results, { step: 'stop', status: 'cancelled', fatal: true, message: 'Cancelled before start' })
      return false
    }

    try {
      await this.serviceControl.stopService(session, serviceName)
    } catch (err) {
      this.record(results, {
        step: 'stop',
        status: 'failed',
        fatal: true,
        message: `Cannot stop ${serviceName}: ${errorMessage(err)}`,
        errorKind: errorKind(err)
      })
      return false
    }

    this.record(results, { step: 'stop', status: 'succeeded', message: `Stopped ${serviceName}` })
    return true
  }

  private async discover(
    session: RemoteSession,
    remoteDir: string,
    pattern: string,
    results: WorkflowStepResult[]
  ): Promise<RemoteFile[] | null> {
    try {
      const files = await session.listFiles(remoteDir, pattern)
      this.record(results, {
        step: 'discover',
        status: 'succeeded',
        message: `Found ${files.length} file(s) matching ${pattern} in ${remoteDir}`
      })
      return files
    } catch (err) {
      this.record(results, {
        step: 'discover',
        status: 'failed',
        fatal: true,
        message: `Cannot list ${remoteDir}: ${errorMessage(err)}`,
        errorKind: errorKind(err)
      })
      return null
    }
  }

  /** Copy and verify one file, then delete it when `deleteAfter` is set */
  private async copyFile(
    session: RemoteSession,
    file: RemoteFile,
    options: CopyWorkflowOptions,
    deleteAfter: boolean,
    results: WorkflowStepResult[]
  ): Promise<void> {
    if (options.signal?.aborted) {
      this.cancelled(results, 'copy', file, 'Cancelled before copy')
      return
    }

    const localPath = localPathFor(options.remoteDir, file.path, options.localDir)

    let transfer: TransferRecord
    try {
      transfer = await session.downloadFile(file.path, localPath)
    } catch (err) {
      this.failed(results, 'copy', file, `Copy failed: ${errorMessage(err)}`, err)
      return
    }
    this.record(results, {
      step: 'copy',
      status: 'succeeded',
      file: file.path,
      message: `Copied to ${localPath}`,
      transfer
    })

    if (options.signal?.aborted) {
      this.cancelled(results, 'verify', file, 'Cancelled before verify; remote file kept', transfer)
      return
    }

    let remoteDigest: string
    let localDigest: string
    try {
      remoteDigest = await hashRemote(session, file.path)
      localDigest = await hashLocal(localPath)
    } catch (err) {
      transfer.error = errorMessage(err)
      this.failed(results, 'verify', file, `Cannot verify: ${transfer.error}`, err, transfer)
      return
    }
    transfer.sourceHash = remoteDigest
    transfer.destinationHash = localDigest

    if (!verify(localDigest, remoteDigest)) {
      const mismatch = new VerificationMismatch(file.path, remoteDigest, localDigest)
      transfer.outcome = 'hash-mismatch'
      transfer.error = mismatch.message
      this.failed(results, 'verify', file, mismatch.message, mismatch, transfer)
      return
    }

    transfer.outcome = 'succeeded'
    this.record(results, {
      step: 'verify',
      status: 'succeeded',
      file: file.path,
      terminal: !deleteAfter,
      message: `Verified ${file.name}`,
      transfer
    })

    if (deleteAfter) await this.deleteVerified(session, file, options.signal, results, 'local copy kept')
  }

  private async deleteVerified(
    session: RemoteSession,
    file: RemoteFile,
    signal: AbortSignal | undefined,
    results: WorkflowStepResult[],
    keptNote: string
  ): Promise<void> {
    if (signal?.aborted) {
      this.cancelled(results, 'delete', file, 'Cancelled before delete; remote file kept')
      return
    }

    try {
      await session.deleteRemoteFile(file.path)
    } catch (err) {
      this.failed(results, 'delete', file, `Delete failed: ${errorMessage(err)}; ${keptNote}`, err)
      return
    }
    this.record(results, { step: 'delete', status: 'succeeded', file: file.path, terminal: true, message: `Deleted ${file.path}` })
  }

  private failed(
    results: WorkflowStepResult[],
    step: WorkflowStep,
    file: RemoteFile,
    message: string,
    err: unknown,
    transfer?: TransferRecord
  ): void {
    this.record(results, {
      step,
      status: 'failed',
      file: file.path,
      terminal: true,
      message,
      errorKind: errorKind(err),
      transfer
    })
  }

  private cancelled(
    results: WorkflowStepResult[],
    step: WorkflowStep,
    file: RemoteFile,
    message: string,
    transfer?: TransferRecord
  ): void {
    this.record(results, {
      step,
      status: 'cancelled',
      file: file.path,
      terminal: true,
      message,
      errorKind: 'cancelled',
      transfer
    })
  }

  private record(results: WorkflowStepResult[], input: StepInput): void {
    const result: WorkflowStepResult = {
      ...input,
      fatal: input.fatal ?? false,
      terminal: input.terminal ?? false,
      timestamp: Date.now()
    }
    results.push(result)
    this.emit('step', result)
  }
}
