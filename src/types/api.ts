/** Ingestion API credentials, already decrypted */
export interface ApiCredentials {
  apiName: string
  apiToken: string
}

/** Success acknowledgment for an uploaded artifact */
export interface UploadAck {
  success: true
  transactionId?: string
  message?: string
}

/** A transaction as listed by the API, before local state is attached */
export interface TransactionSummary {
  transactionId: string
  status: string
  fileName?: string
  discovered?: number
}

/** Account statistics shown on the dashboard */
export interface UserStats {
  discovered: number
  totalLocations: number
  monthRank: number | null
  previousMonthRank: number | null
  rank: number | null
  previousRank: number | null
}
