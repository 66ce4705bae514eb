import type { AuthMethod } from './remote'

/** Persisted application settings */
export interface AppSettings {
  // Capture device
  hostAddress: string
  hostPort: number
  hostUser: string
  hostAuthMethod: AuthMethod
  hostPrivateKeyPath: string
  hostPasswordEncrypted: string
  remoteDirectory: string
  captureServiceName: string
  artifactPattern: string

  // Local storage
  localDirectory: string
  overlayDirectory: string

  // Ingestion API
  apiBaseUrl: string
  apiName: string
  apiTokenEncrypted: string

  // Transfers
  uploadConcurrency: number
  retryMaxAttempts: number
  retryInitialDelay: number      // seconds
  retryMaxDelay: number          // seconds
  retryBackoffMultiplier: number
  retryJitter: boolean

  // Timeouts (seconds)
  connectionTimeout: number
  commandTimeout: number
  transferIdleTimeout: number
  apiTimeout: number

  // Log
  logMaxEntries: number
  logDebugMode: boolean
}

/** Backoff policy for retryable failures */
export interface RetryPolicy {
  maxAttempts: number            // total attempts, including the first
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  jitter: boolean
}

/** Explicit configuration value handed to every orchestrator and coordinator */
export interface SyncConfig {
  remoteDirectory: string
  localDirectory: string
  overlayDirectory: string
  captureServiceName: string
  artifactPattern: string
  uploadConcurrency: number
  retry: RetryPolicy
  timeouts: {
    connectMs: number
    commandMs: number
    transferIdleMs: number
    apiMs: number
  }
}
