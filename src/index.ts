export * from './errors'

export type * from './types/api'
export type * from './types/log'
export type * from './types/remote'
export type * from './types/settings'
export type * from './types/transaction'
export type * from './types/transfer'
export type * from './types/upload'
export type * from './types/workflow'

export { SSHService, SSHConnection, type SSHConnectionOptions } from './services/SSHService'
export { SFTPService } from './services/SFTPService'
export { SecureChannelClient, SSHSession, createTransferRecord, type RemoteSession } from './services/SecureChannel'
export { ServiceControl, serviceCommand, type ServiceAction, type HostAction } from './services/ServiceControl'
export { hashBuffer, hashLocal, hashRemote, verify } from './services/IntegrityVerifier'
export {
  RemoteWorkflow,
  localPathFor,
  summarizeResults,
  type AutomaticWorkflowOptions,
  type CopyWorkflowOptions,
  type DirectUploadWorkflowOptions,
  type RemoteSummary
} from './services/RemoteWorkflow'
export { UploadCoordinator, clampConcurrency, type UploadCoordinatorOptions } from './services/UploadCoordinator'
export {
  LocalArtifacts,
  archiveName,
  type ArchiveOptions,
  type ArchiveResult,
  type RemoveResult
} from './services/LocalArtifacts'
export { TransactionCoordinator, isValidDate, type TransactionCoordinatorOptions } from './services/TransactionCoordinator'
export {
  IngestionApiClient,
  errorForStatus,
  type IngestionApi,
  type IngestionApiClientOptions,
  type UploadOptions
} from './services/IngestionApiClient'
export { LogService, getLogService } from './services/LogService'
export { SettingsStore, DEFAULT_SETTINGS } from './services/SettingsStore'
export { KeyFileCipher, type SecretCipher } from './services/SecretCipher'
export { SettingsCredentialStore, type CredentialStore } from './services/CredentialStore'
export { resolveSyncConfig, resolveRetryPolicy, type SyncOverrides } from './utils/resolveSettings'
export { DEFAULT_RETRY_POLICY, getBackoffDelay, withRetry } from './utils/retry'
