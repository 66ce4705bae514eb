/** Error kinds surfaced by the sync engine */
export type SyncErrorKind =
  | 'connection'
  | 'remote-exec'
  | 'transport'
  | 'verification'
  | 'api'
  | 'auth'
  | 'transient'
  | 'cancelled'
  | 'invalid-input'

/**
 * Base class for every error the engine raises.
 * `fatal` errors abort the whole run; `retryable` ones may be attempted again.
 */
export class SyncError extends Error {
  readonly kind: SyncErrorKind
  readonly fatal: boolean
  readonly retryable: boolean

  constructor(
    kind: SyncErrorKind,
    message: string,
    options: { fatal?: boolean; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'SyncError'
    this.kind = kind
    this.fatal = options.fatal ?? false
    this.retryable = options.retryable ?? false
  }
}

/** The remote session could not be established */
export class ConnectionError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super('connection', message, { fatal: true, cause })
    this.name = 'ConnectionError'
  }
}

/** A remote command could not run or returned an unusable result */
export class RemoteExecError extends SyncError {
  readonly command: string
  readonly exitCode: number | null
  readonly stderr: string

  constructor(
    message: string,
    details: { command: string; exitCode?: number | null; stderr?: string; cause?: unknown }
  ) {
    super('remote-exec', message, { cause: details.cause })
    this.name = 'RemoteExecError'
    this.command = details.command
    this.exitCode = details.exitCode ?? null
    this.stderr = details.stderr ?? ''
  }
}

/** Bytes could not be moved (stream error, idle timeout, dropped channel) */
export class TransportError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super('transport', message, { retryable: true, cause })
    this.name = 'TransportError'
  }
}

/** Digests on both sides of a transfer differ */
export class VerificationMismatch extends SyncError {
  readonly expected: string
  readonly actual: string

  constructor(path: string, expected: string, actual: string) {
    super('verification', `Hash mismatch for ${path}: remote ${expected}, local ${actual}`)
    this.name = 'VerificationMismatch'
    this.expected = expected
    this.actual = actual
  }
}

/** The ingestion API rejected a call */
export class ApiError extends SyncError {
  readonly status: number | null

  constructor(
    message: string,
    status: number | null = null,
    kind: 'api' | 'auth' | 'transient' = 'api',
    cause?: unknown
  ) {
    super(kind, message, {
      fatal: kind === 'auth',
      retryable: kind === 'transient',
      cause
    })
    this.name = 'ApiError'
    this.status = status
  }
}

/** Credentials were refused (401/403); needs operator action */
export class AuthError extends ApiError {
  constructor(message: string, status: number | null = null) {
    super(message, status, 'auth')
    this.name = 'AuthError'
  }
}

/** Network failure, timeout, rate limit or server error */
export class TransientError extends ApiError {
  constructor(message: string, status: number | null = null, cause?: unknown) {
    super(message, status, 'transient', cause)
    this.name = 'TransientError'
  }
}

/** The operation was cancelled by the caller */
export class CancelledError extends SyncError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message)
    this.name = 'CancelledError'
  }
}

/** Caller-supplied value failed validation */
export class InvalidInputError extends SyncError {
  constructor(message: string) {
    super('invalid-input', message)
    this.name = 'InvalidInputError'
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown, fallback = 'Unknown error'): string {
  if (err instanceof Error) return err.message || fallback
  if (typeof err === 'string') return err
  return fallback
}

/** Kind of an arbitrary thrown value, for per-item result reporting */
export function errorKind(err: unknown): SyncErrorKind | undefined {
  return isSyncError(err) ? err.kind : undefined
}
