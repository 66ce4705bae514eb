import { Client, type ConnectConfig, type ClientChannel, type SFTPWrapper } from 'ssh2'
import { readFileSync } from 'fs'
import { EventEmitter } from 'events'
import type { CommandResult, HostCredentials, SessionStatus } from '../types/remote'
import { ConnectionError, RemoteExecError } from '../errors'

/** Default timeout for remote commands (ms) */
const COMMAND_TIMEOUT = 30_000

export interface SSHConnectionOptions {
  readyTimeoutMs?: number
  commandTimeoutMs?: number
  keepAliveInterval?: number   // seconds
}

/**
 * Manages a single SSH connection to the capture host.
 *
 * Emits:
 *   'status' → (status: SessionStatus)
 *   'close'  → ()
 */
export class SSHConnection extends EventEmitter {
  readonly id: string
  private client: Client
  private credentials: HostCredentials
  private options: SSHConnectionOptions
  private _status: SessionStatus = 'disconnected'

  constructor(id: string, credentials: HostCredentials, options: SSHConnectionOptions = {}) {
    super()
    this.id = id
    this.credentials = credentials
    this.options = options
    this.client = new Client()
    this.setupClientEvents()
  }

  get status(): SessionStatus {
    return this._status
  }

  get host(): string {
    return this.credentials.host
  }

  /** Establish the SSH connection; rejects with ConnectionError */
  async connect(): Promise<void> {
    if (this._status === 'connected') return

    this.setStatus('connecting')

    const connectConfig: ConnectConfig = {
      host: this.credentials.host,
      port: this.credentials.port,
      username: this.credentials.username,
      keepaliveInterval: (this.options.keepAliveInterval ?? 30) * 1000,
      keepaliveCountMax: 3,
      readyTimeout: this.options.readyTimeoutMs ?? 15_000
    }

    try {
      this.configureAuth(connectConfig)
    } catch (err) {
      this.setStatus('error')
      throw new ConnectionError(
        `Cannot load credentials: ${err instanceof Error ? err.message : 'unknown error'}`,
        err
      )
    }

    this.setStatus('authenticating')

    return new Promise<void>((resolve, reject) => {
      const onReady = () => {
        cleanup()
        this.setStatus('connected')
        resolve()
      }

      const onError = (err: Error) => {
        cleanup()
        this.setStatus('error')
        reject(new ConnectionError(`Cannot connect to ${this.credentials.host}: ${err.message}`, err))
      }

      const cleanup = () => {
        this.client.removeListener('ready', onReady)
        this.client.removeListener('error', onError)
      }

      this.client.once('ready', onReady)
      this.client.once('error', onError)

      try {
        this.client.connect(connectConfig)
      } catch (err) {
        cleanup()
        this.setStatus('error')
        reject(new ConnectionError(
          `Cannot connect to ${this.credentials.host}: ${err instanceof Error ? err.message : 'unknown error'}`,
          err
        ))
      }
    })
  }

  /** Configure authentication on the ConnectConfig based on authMethod */
  private configureAuth(connectConfig: ConnectConfig): void {
    switch (this.credentials.authMethod) {
      case 'password':
        connectConfig.password = this.credentials.password
        break

      case 'publickey':
        if (this.credentials.privateKeyData) {
          connectConfig.privateKey = this.credentials.privateKeyData
        } else if (this.credentials.privateKeyPath) {
          connectConfig.privateKey = readFileSync(this.credentials.privateKeyPath)
        }
        if (this.credentials.passphrase) {
          connectConfig.passphrase = this.credentials.passphrase
        }
        break

      case 'agent':
        connectConfig.agent = process.env.SSH_AUTH_SOCK
        break
    }
  }

  /**
   * Executes a command with a timeout.
   * Uses a `settled` flag to prevent double-resolution from timeout/close/error races.
   * A non-zero exit code resolves normally; the caller interprets it.
   */
  exec(command: string, timeoutMs: number = this.options.commandTimeoutMs ?? COMMAND_TIMEOUT): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      if (this._status !== 'connected') {
        reject(new RemoteExecError('SSH connection is not active', { command }))
        return
      }

      this.client.exec(command, (err: Error | undefined, stream: ClientChannel) => {
        if (err) {
          reject(new RemoteExecError(`Cannot run command: ${err.message}`, { command, cause: err }))
          return
        }

        let stdout = ''
        let stderr = ''
        let settled = false

        const settle = (fn: () => void) => {
          if (settled) return
          settled = true
          clearTimeout(timer)
          fn()
        }

        const timer = setTimeout(() => {
          settle(() => {
            stream.destroy()
            reject(new RemoteExecError(`Command timed out after ${timeoutMs}ms`, { command }))
          })
        }, timeoutMs)

        stream.on('data', (d: Buffer) => {
          if (!settled) stdout += d.toString()
        })

        stream.stderr.on('data', (d: Buffer) => {
          if (!settled) stderr += d.toString()
        })

        stream.on('error', (streamErr: Error) => {
          settle(() => reject(new RemoteExecError(streamErr.message, { command, cause: streamErr })))
        })

        stream.on('close', (code?: number | null) => {
          settle(() => resolve({ stdout, stderr, code: typeof code === 'number' ? code : null }))
        })
      })
    })
  }

  /** Open the SFTP subsystem */
  getSFTP(): Promise<SFTPWrapper> {
    return new Promise((resolve, reject) => {
      if (this._status !== 'connected') {
        reject(new ConnectionError('Not connected'))
        return
      }
      this.client.sftp((err, sftp) => {
        if (err) reject(new ConnectionError(`Failed to open SFTP: ${err.message}`, err))
        else resolve(sftp)
      })
    })
  }

  /** Disconnect cleanly */
  disconnect(): void {
    this.client.end()
    this.setStatus('disconnected')
  }

  private setStatus(status: SessionStatus): void {
    this._status = status
    this.emit('status', status)
  }

  private setupClientEvents(): void {
    this.client.on('close', () => {
      if (this._status === 'connected') this.setStatus('disconnected')
      this.emit('close')
    })

    // Errors after the handshake surface through the pending exec/transfer that hit them
    this.client.on('error', () => {
      if (this._status === 'connected') this.setStatus('error')
    })
  }
}

/**
 * SSHService — connection pool keyed by host.
 * At most one connection per host is alive; creating another replaces it.
 */
export class SSHService {
  private connections: Map<string, SSHConnection> = new Map()

  /** Create a connection instance without connecting (for attaching listeners first) */
  create(credentials: HostCredentials, options: SSHConnectionOptions = {}): SSHConnection {
    const id = SSHService.keyFor(credentials)
    this.disconnect(id)

    const conn = new SSHConnection(id, credentials, options)
    this.connections.set(id, conn)
    return conn
  }

  /** Create and connect */
  async connect(credentials: HostCredentials, options: SSHConnectionOptions = {}): Promise<SSHConnection> {
    const conn = this.create(credentials, options)
    try {
      await conn.connect()
    } catch (err) {
      this.disconnect(conn.id)
      throw err
    }
    return conn
  }

  get(id: string): SSHConnection | undefined {
    return this.connections.get(id)
  }

  disconnect(id: string): void {
    const conn = this.connections.get(id)
    if (conn) {
      conn.disconnect()
      conn.removeAllListeners()
      this.connections.delete(id)
    }
  }

  disconnectAll(): void {
    for (const [id] of this.connections) {
      this.disconnect(id)
    }
  }

  static keyFor(credentials: Pick<HostCredentials, 'host' | 'port'>): string {
    return `${credentials.host}:${credentials.port}`
  }
}
