/** SSH authentication method accepted by the secure channel */
export type AuthMethod = 'password' | 'publickey' | 'agent'

/** Host connection parameters, already decrypted by the credential store */
export interface HostCredentials {
  host: string
  port: number
  username: string
  authMethod: AuthMethod
  password?: string
  privateKeyPath?: string
  privateKeyData?: string
  passphrase?: string
}

/** A capture artifact on the remote host */
export interface RemoteFile {
  name: string
  path: string                   // absolute posix path on the host
  size: number
  modifiedAt: number             // Unix ms
  hash?: string                  // lowercase hex SHA-256, once computed
}

/** The local counterpart of a transferred or scanned artifact */
export interface LocalFile {
  name: string
  path: string
  size: number
  hash?: string
}

/** Result of a remote command */
export interface CommandResult {
  code: number | null            // null when the channel closed without an exit status
  stdout: string
  stderr: string
}

/** Connection state of a remote session */
export type SessionStatus = 'disconnected' | 'connecting' | 'authenticating' | 'connected' | 'error'
