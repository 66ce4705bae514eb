import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import { readFile } from 'fs/promises'
import type { IngestionApi } from './IngestionApiClient'
import type { LocalFile } from '../types/remote'
import type { ApiCredentials } from '../types/api'
import type { RetryPolicy } from '../types/settings'
import type { UploadJob, UploadJobStatusEvent, UploadState } from '../types/upload'
import { CancelledError, TransportError, errorMessage } from '../errors'
import { DEFAULT_RETRY_POLICY, withRetry } from '../utils/retry'

export const DEFAULT_UPLOAD_CONCURRENCY = 2
export const MAX_UPLOAD_CONCURRENCY = 8

export interface UploadCoordinatorOptions {
  api: IngestionApi
  credentials: ApiCredentials
  maxConcurrent?: number
  retry?: RetryPolicy
}

export interface RunOptions {
  signal?: AbortSignal
}

/** Clamp a requested concurrency to 1..8 */
export function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_UPLOAD_CONCURRENCY
  return Math.min(MAX_UPLOAD_CONCURRENCY, Math.max(1, Math.floor(value)))
}

export function isTerminal(state: UploadState): boolean {
  return state === 'succeeded' || state === 'failed' || state === 'cancelled'
}

/**
 * UploadCoordinator — uploads local artifacts to the ingestion API.
 * Bounded concurrency, per-job retry with backoff, cancellation.
 *
 * Emits:
 *   'update' → (event: UploadJobStatusEvent)
 *   'retry'  → (job: UploadJob, attempt: number, error: unknown, delayMs: number)
 */
export class UploadCoordinator extends EventEmitter {
  private jobs: Map<string, UploadJob> = new Map()
  private controllers: Map<string, AbortController> = new Map()
  private api: IngestionApi
  private credentials: ApiCredentials
  private retryPolicy: RetryPolicy
  readonly maxConcurrent: number

  constructor(options: UploadCoordinatorOptions) {
    super()
    this.api = options.api
    this.credentials = options.credentials
    this.retryPolicy = options.retry ?? DEFAULT_RETRY_POLICY
    this.maxConcurrent = clampConcurrency(options.maxConcurrent)
  }

  /** Queue files; a path that already has a queued or running job returns that job */
  enqueue(files: LocalFile[]): UploadJob[] {
    return files.map((file) => {
      const existing = this.findActive(file.path)
      if (existing) return existing

      const job: UploadJob = {
        id: randomUUID(),
        file,
        state: 'queued',
        bytesTransferred: 0,
        totalBytes: file.size,
        attempts: 0
      }
      this.jobs.set(job.id, job)
      this.emitUpdate(job, 0)
      return job
    })
  }

  /**
   * Run the given jobs (default: every job) until each one is terminal.
   * Jobs that are not queued are left as they are.
   */
  async runAll(jobs?: UploadJob[], options: RunOptions = {}): Promise<UploadJob[]> {
    const batch = (jobs ?? this.getAll()).filter((job) => this.jobs.get(job.id) === job)
    const { signal } = options

    const onAbort = () => {
      for (const job of batch) this.cancel(job.id)
    }
    if (signal?.aborted) onAbort()
    else signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const workerCount = Math.min(this.maxConcurrent, batch.length)
      const workers = Array.from({ length: workerCount }, () => this.processQueue(batch))
      await Promise.all(workers)
    } finally {
      signal?.removeEventListener('abort', onAbort)
    }
    return batch
  }

  /** Put a failed job back in the queue; it runs on the next runAll */
  retry(id: string): boolean {
    const job = this.jobs.get(id)
    if (!job || job.state !== 'failed') return false

    const delta = -job.bytesTransferred
    job.state = 'queued'
    job.bytesTransferred = 0
    job.attempts = 0
    job.error = undefined
    job.startedAt = undefined
    job.completedAt = undefined
    this.emitUpdate(job, delta)
    return true
  }

  /** Cancel a queued or running job */
  cancel(id: string): void {
    const job = this.jobs.get(id)
    if (!job || isTerminal(job.state)) return

    job.state = 'cancelled'
    job.completedAt = Date.now()
    this.controllers.get(id)?.abort()
    this.emitUpdate(job, 0)
  }

  /** Forget a finished job */
  remove(id: string): void {
    const job = this.jobs.get(id)
    if (job && isTerminal(job.state)) this.jobs.delete(id)
  }

  getAll(): UploadJob[] {
    return Array.from(this.jobs.values())
  }

  get(id: string): UploadJob | undefined {
    return this.jobs.get(id)
  }

  /** Take queued jobs from the batch one at a time until none are left */
  private async processQueue(batch: UploadJob[]): Promise<void> {
    for (;;) {
      const next = batch.find((job) => job.state === 'queued')
      if (!next) return
      await this.executeUpload(next)
    }
  }

  private async executeUpload(job: UploadJob): Promise<void> {
    const controller = new AbortController()
    this.controllers.set(job.id, controller)

    job.state = 'in-progress'
    job.startedAt = Date.now()
    this.emitUpdate(job, 0)

    try {
      const data = await readFile(job.file.path).catch((err: unknown) => {
        throw new TransportError(`Cannot read ${job.file.path}: ${errorMessage(err)}`, err)
      })
      job.totalBytes = data.length

      const ack = await withRetry(
        this.retryPolicy,
        (attempt) => {
          job.attempts = attempt
          return this.api.uploadFile(this.credentials, job.file.name, data, {
            signal: controller.signal,
            onProgress: (delta) => {
              if (job.state !== 'in-progress') return
              job.bytesTransferred += delta
              this.emitUpdate(job, delta)
            }
          })
        },
        {
          signal: controller.signal,
          onRetry: (attempt, err, delayMs) => {
            // restart progress from zero for the next attempt
            const delta = -job.bytesTransferred
            job.bytesTransferred = 0
            job.error = errorMessage(err)
            this.emitUpdate(job, delta)
            this.emit('retry', job, attempt, err, delayMs)
          }
        }
      )

      if (job.state !== 'in-progress') return

      const delta = job.totalBytes - job.bytesTransferred
      job.state = 'succeeded'
      job.bytesTransferred = job.totalBytes
      job.transactionId = ack.transactionId
      job.error = undefined
      job.completedAt = Date.now()
      this.emitUpdate(job, delta)
    } catch (err: unknown) {
      if (job.state !== 'in-progress') return

      job.state = err instanceof CancelledError ? 'cancelled' : 'failed'
      job.error = errorMessage(err, 'Upload failed')
      job.completedAt = Date.now()
      this.emitUpdate(job, 0)
    } finally {
      this.controllers.delete(job.id)
    }
  }

  private findActive(path: string): UploadJob | undefined {
    for (const job of this.jobs.values()) {
      if (job.file.path === path && !isTerminal(job.state)) return job
    }
    return undefined
  }

  private emitUpdate(job: UploadJob, deltaBytes: number): void {
    const event: UploadJobStatusEvent = {
      jobId: job.id,
      fileName: job.file.name,
      state: job.state,
      bytesTransferred: job.bytesTransferred,
      totalBytes: job.totalBytes,
      deltaBytes,
      attempt: job.attempts,
      transactionId: job.transactionId,
      error: job.error
    }
    this.emit('update', event)
  }
}
