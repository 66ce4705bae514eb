import { randomUUID } from 'crypto'
import type { ApiCredentials, TransactionSummary, UploadAck, UserStats } from '../types/api'
import { ApiError, AuthError, CancelledError, TransientError, errorMessage, type SyncError } from '../errors'
import { timeoutSignal, untilAborted } from '../utils/abort'

const DEFAULT_BASE_URL = 'https://api.wigle.net'
const DEFAULT_TIMEOUT = 60_000
const UPLOAD_CHUNK_SIZE = 64 * 1024

export interface UploadOptions {
  /** Called with the byte count of each chunk as the request body is consumed */
  onProgress?: (deltaBytes: number) => void
  signal?: AbortSignal
}

/**
 * The ingestion API as the coordinators see it.
 * Auth failures reject with AuthError, network trouble with TransientError.
 */
export interface IngestionApi {
  uploadFile(credentials: ApiCredentials, fileName: string, data: Buffer, options?: UploadOptions): Promise<UploadAck>
  queryTransactions(credentials: ApiCredentials, pageStart: number, pageSize: number, signal?: AbortSignal): Promise<TransactionSummary[]>
  downloadOverlay(credentials: ApiCredentials, transactionId: string, signal?: AbortSignal): Promise<Buffer>
  getUserStats(credentials: ApiCredentials, signal?: AbortSignal): Promise<UserStats>
}

export interface IngestionApiClientOptions {
  /** Default: https://api.wigle.net */
  baseUrl?: string
  timeoutMs?: number
  /** Override fetch (for testing) */
  fetchFn?: typeof fetch
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && value > 0 ? value : null
}

/** Map a non-2xx status to the matching error kind */
export function errorForStatus(status: number, detail: string): ApiError {
  const message = `HTTP ${status}${detail ? `: ${detail}` : ''}`
  if (status === 401 || status === 403) return new AuthError(message, status)
  if (status === 408 || status === 429 || status >= 500) return new TransientError(message, status)
  return new ApiError(message, status)
}

/** Interpret an upload response body; only `success: true` counts as acknowledged */
export function parseUploadAck(body: unknown): UploadAck {
  if (!isRecord(body) || body.success !== true) {
    const detail = isRecord(body) && typeof body.message === 'string' ? body.message : 'no success flag in response'
    throw new ApiError(`Upload not acknowledged: ${detail}`)
  }

  let transactionId = typeof body.transid === 'string' ? body.transid : undefined
  const results = body.results
  if (!transactionId && isRecord(results) && Array.isArray(results.transids)) {
    const first: unknown = results.transids[0]
    if (isRecord(first) && typeof first.transId === 'string') transactionId = first.transId
  }

  return {
    success: true,
    transactionId,
    message: typeof body.message === 'string' ? body.message : undefined
  }
}

/** Normalize one page of the transaction listing; malformed rows are skipped */
export function parseTransactions(body: unknown): TransactionSummary[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new ApiError('Malformed transaction listing')
  }

  const rows: TransactionSummary[] = []
  for (const row of body.results) {
    if (!isRecord(row) || typeof row.transid !== 'string' || row.transid.length < 8) continue
    rows.push({
      transactionId: row.transid,
      status: typeof row.status === 'string' ? row.status : 'unknown',
      fileName: typeof row.fileName === 'string' ? row.fileName : undefined,
      discovered: typeof row.discoveredGps === 'number' ? row.discoveredGps : undefined
    })
  }
  return rows
}

export function parseUserStats(body: unknown): UserStats {
  if (!isRecord(body) || !isRecord(body.statistics)) {
    throw new ApiError('No statistics in response')
  }
  const s = body.statistics
  const count = (v: unknown) => (typeof v === 'number' ? v : 0)

  return {
    discovered: count(s.discoveredWiFiGPS) + count(s.discoveredWiFi),
    totalLocations: count(s.totalWiFiLocations),
    monthRank: numberOrNull(s.monthRank),
    previousMonthRank: numberOrNull(s.prevMonthRank),
    rank: numberOrNull(s.rank),
    previousRank: numberOrNull(s.prevRank)
  }
}

/**
 * Multipart body with a single `file` part, produced chunk by chunk so
 * progress reflects what the HTTP stack has actually pulled.
 */
async function* multipartBody(
  boundary: string,
  fileName: string,
  data: Buffer,
  onProgress?: (deltaBytes: number) => void
): AsyncGenerator<Uint8Array> {
  const safeName = fileName.replace(/["\r\n]/g, '_')
  yield Buffer.from(
    `--${boundary}\r\n` +
      `Content-Disposition: form-data; name="file"; filename="${safeName}"\r\n` +
      'Content-Type: application/octet-stream\r\n\r\n'
  )

  for (let offset = 0; offset < data.length; offset += UPLOAD_CHUNK_SIZE) {
    const chunk = data.subarray(offset, offset + UPLOAD_CHUNK_SIZE)
    yield chunk
    onProgress?.(chunk.length)
  }

  yield Buffer.from(`\r\n--${boundary}--\r\n`)
}

/** The subset of RequestInit this client sends */
interface ApiRequestInit {
  method: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: AsyncIterable<Uint8Array>
}

/**
 * IngestionApiClient — WiGLE-style REST client over fetch with HTTP Basic auth.
 */
export class IngestionApiClient implements IngestionApi {
  private baseUrl: string
  private timeoutMs: number
  private fetchFn: typeof fetch

  constructor(options: IngestionApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT
    this.fetchFn = options.fetchFn ?? fetch
  }

  async uploadFile(
    credentials: ApiCredentials,
    fileName: string,
    data: Buffer,
    options: UploadOptions = {}
  ): Promise<UploadAck> {
    const boundary = `----capture-sync-${randomUUID()}`
    const body = await this.request(
      '/api/v2/file/upload',
      credentials,
      {
        method: 'POST',
        headers: { 'Content-Type': `multipart/form-data; boundary=${boundary}` },
        body: multipartBody(boundary, fileName, data, options.onProgress)
      },
      readJson,
      options.signal
    )
    return parseUploadAck(body)
  }

  async queryTransactions(
    credentials: ApiCredentials,
    pageStart: number,
    pageSize: number,
    signal?: AbortSignal
  ): Promise<TransactionSummary[]> {
    const path = `/api/v2/file/transactions?pagestart=${pageStart}&pageend=${pageStart + pageSize}`
    return parseTransactions(await this.request(path, credentials, { method: 'GET' }, readJson, signal))
  }

  async downloadOverlay(credentials: ApiCredentials, transactionId: string, signal?: AbortSignal): Promise<Buffer> {
    if (!/^[A-Za-z0-9_-]+$/.test(transactionId)) {
      throw new ApiError(`Invalid transaction id: ${transactionId}`)
    }
    return this.request(`/api/v2/file/kml/${transactionId}`, credentials, { method: 'GET' }, readBytes, signal)
  }

  async getUserStats(credentials: ApiCredentials, signal?: AbortSignal): Promise<UserStats> {
    return parseUserStats(await this.request('/api/v2/stats/user', credentials, { method: 'GET' }, readJson, signal))
  }

  /**
   * Perform an authenticated request and read its body with `read`.
   * The timeout and the caller's signal stay armed until the body is read;
   * non-2xx responses are mapped to errors.
   */
  private async request<T>(
    path: string,
    credentials: ApiCredentials,
    init: ApiRequestInit,
    read: (res: Response) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const basic = Buffer.from(`${credentials.apiName}:${credentials.apiToken}`).toString('base64')
    const guard = timeoutSignal(this.timeoutMs, signal)

    const fetchFn = this.fetchFn

    const interrupted = (err: unknown): SyncError | null => {
      if (signal?.aborted) return new CancelledError()
      if (guard.timedOut()) return new TransientError(`Request timed out after ${this.timeoutMs}ms`, null, err)
      return null
    }

    try {
      let res: Response
      try {
        res = await fetchFn(`${this.baseUrl}${path}`, {
          method: init.method,
          headers: {
            ...init.headers,
            Accept: 'application/json',
            Authorization: `Basic ${basic}`
          },
          body: init.body,
          // streamed request bodies require half-duplex
          ...(init.body ? { duplex: 'half' as const } : {}),
          signal: guard.signal
        })
      } catch (err) {
        throw interrupted(err) ?? new TransientError(`Network error: ${errorMessage(err)}`, null, err)
      }

      if (!res.ok) {
        let detail = ''
        try {
          detail = await untilAborted(res.text(), guard.signal)
        } catch (err) {
          // without a readable body the status alone is reported
          const reason = interrupted(err)
          if (reason) throw reason
        }
        throw errorForStatus(res.status, detail.slice(0, 200))
      }

      try {
        return await untilAborted(read(res), guard.signal)
      } catch (err) {
        throw interrupted(err) ?? err
      }
    } finally {
      guard.cleanup()
    }
  }
}

async function readJson(res: Response): Promise<unknown> {
  try {
    return await res.json()
  } catch (err) {
    throw new ApiError(`Response is not JSON: ${errorMessage(err)}`, res.status)
  }
}

async function readBytes(res: Response): Promise<Buffer> {
  try {
    return Buffer.from(await res.arrayBuffer())
  } catch (err) {
    throw new TransientError(`Overlay download interrupted: ${errorMessage(err)}`, null, err)
  }
}
