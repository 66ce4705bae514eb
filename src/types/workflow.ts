import type { SyncErrorKind } from '../errors'
import type { TransferRecord } from './transfer'

/** Steps of the remote workflows, in execution order */
export type WorkflowStep = 'stop' | 'discover' | 'copy' | 'verify' | 'upload' | 'delete'

export type WorkflowStepStatus = 'succeeded' | 'failed' | 'cancelled'

/** A single result emitted by a workflow run */
export interface WorkflowStepResult {
  step: WorkflowStep
  status: WorkflowStepStatus
  /** Remote path the result belongs to; absent for host-wide steps (stop, discover) */
  file?: string
  /** True when this result ended the whole run */
  fatal: boolean
  /** True when no further result will be emitted for `file` */
  terminal: boolean
  message: string
  errorKind?: SyncErrorKind
  transfer?: TransferRecord
  transactionId?: string
  timestamp: number
}

/** Summary counts for a finished run */
export interface WorkflowSummary {
  total: number
  succeeded: number
  failed: number
  cancelled: number
  aborted: boolean
}
