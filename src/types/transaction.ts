export type DownloadState = 'not-downloaded' | 'downloading' | 'downloaded' | 'failed'

/** A remote transaction (one processed upload) and its local overlay state */
export interface TransactionRecord {
  transactionId: string
  date: string                   // YYYYMMDD, taken from the transaction id
  status: string                 // remote processing status, e.g. "Success"
  fileName?: string
  discovered?: number            // new networks with GPS
  overlayFile: string            // "<transactionId>.kml"
  downloadState: DownloadState
  error?: string
}

export interface DownloadStatusEvent {
  transactionId: string
  state: DownloadState | 'cancelled'
  attempt: number
  bytes?: number
  path?: string
  error?: string
}
