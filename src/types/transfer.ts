/** Transfer direction, relative to this machine */
export type TransferDirection = 'upload' | 'download'

/** Outcome of a single transfer attempt */
export type TransferOutcome = 'pending' | 'succeeded' | 'hash-mismatch' | 'transport-failed'

/**
 * One attempt to move a file between the host and local storage.
 * `succeeded` is only ever set once both hashes are known and equal.
 */
export interface TransferRecord {
  id: string
  direction: TransferDirection
  sourcePath: string
  destinationPath: string
  bytesTransferred: number
  totalBytes: number
  sourceHash?: string
  destinationHash?: string
  outcome: TransferOutcome
  error?: string
  startedAt: number
  completedAt?: number
}

/** Progress callback: bytes moved since the previous call, running total, expected total */
export type TransferProgress = (deltaBytes: number, transferred: number, total: number) => void
