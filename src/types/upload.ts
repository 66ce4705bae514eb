import type { LocalFile } from './remote'

export type UploadState = 'queued' | 'in-progress' | 'succeeded' | 'failed' | 'cancelled'

/** One artifact queued for the ingestion API */
export interface UploadJob {
  id: string
  file: LocalFile
  state: UploadState
  bytesTransferred: number
  totalBytes: number
  attempts: number
  transactionId?: string
  error?: string
  startedAt?: number
  completedAt?: number
}

/** Status event emitted for every state or progress change of a job */
export interface UploadJobStatusEvent {
  jobId: string
  fileName: string
  state: UploadState
  bytesTransferred: number
  totalBytes: number
  deltaBytes: number             // bytes sent since the previous event for this job
  attempt: number
  transactionId?: string
  error?: string
}
