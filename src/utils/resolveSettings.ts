import type { AppSettings, RetryPolicy, SyncConfig } from '../types/settings'
import { clampConcurrency } from '../services/UploadCoordinator'

/** Per-invocation overrides (command-line flags) */
export interface SyncOverrides {
  remoteDirectory?: string
  localDirectory?: string
  overlayDirectory?: string
  captureServiceName?: string
  artifactPattern?: string
  uploadConcurrency?: number
}

/** Retry policy in milliseconds from the seconds stored in settings */
export function resolveRetryPolicy(global: AppSettings): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(global.retryMaxAttempts)),
    initialDelayMs: global.retryInitialDelay * 1000,
    maxDelayMs: global.retryMaxDelay * 1000,
    backoffMultiplier: global.retryBackoffMultiplier,
    jitter: global.retryJitter
  }
}

/**
 * Resolve the explicit configuration handed to the workflows and coordinators.
 * Override values win where defined (not undefined).
 */
export function resolveSyncConfig(global: AppSettings, overrides: SyncOverrides = {}): SyncConfig {
  return {
    remoteDirectory: overrides.remoteDirectory ?? global.remoteDirectory,
    localDirectory: overrides.localDirectory ?? global.localDirectory,
    overlayDirectory: overrides.overlayDirectory ?? global.overlayDirectory,
    captureServiceName: overrides.captureServiceName ?? global.captureServiceName,
    artifactPattern: overrides.artifactPattern ?? global.artifactPattern,
    uploadConcurrency: clampConcurrency(overrides.uploadConcurrency ?? global.uploadConcurrency),
    retry: resolveRetryPolicy(global),
    timeouts: {
      connectMs: global.connectionTimeout * 1000,
      commandMs: global.commandTimeout * 1000,
      transferIdleMs: global.transferIdleTimeout * 1000,
      apiMs: global.apiTimeout * 1000
    }
  }
}
