import { EventEmitter } from 'events'
import { existsSync } from 'fs'
import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import type { IngestionApi } from './IngestionApiClient'
import type { ApiCredentials, TransactionSummary } from '../types/api'
import type { RetryPolicy } from '../types/settings'
import type { DownloadStatusEvent, TransactionRecord } from '../types/transaction'
import { AuthError, CancelledError, InvalidInputError, errorMessage } from '../errors'
import { DEFAULT_RETRY_POLICY, withRetry } from '../utils/retry'

export const PAGE_SIZE = 100
const DEFAULT_MAX_PAGES = 10

export interface TransactionCoordinatorOptions {
  api: IngestionApi
  credentials: ApiCredentials
  retry?: RetryPolicy
  pageSize?: number
  maxPages?: number
}

export interface QueryOptions {
  /** Where overlays are kept; used to mark records already downloaded */
  overlayDir?: string
  signal?: AbortSignal
}

/** True for a real calendar date written as YYYYMMDD */
export function isValidDate(value: string): boolean {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value)
  if (!match) return false

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(Date.UTC(year, month - 1, day))
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
}

/** Date prefix of a transaction id ("20240103-00042" → "20240103") */
export function transactionDate(transactionId: string): string {
  return transactionId.slice(0, 8)
}

export function overlayFileName(transactionId: string): string {
  return `${transactionId}.kml`
}

/**
 * TransactionCoordinator — lists processed uploads by date and fetches
 * their overlay files.
 *
 * Emits:
 *   'update' → (event: DownloadStatusEvent)
 */
export class TransactionCoordinator extends EventEmitter {
  private api: IngestionApi
  private credentials: ApiCredentials
  private retryPolicy: RetryPolicy
  private pageSize: number
  private maxPages: number

  constructor(options: TransactionCoordinatorOptions) {
    super()
    this.api = options.api
    this.credentials = options.credentials
    this.retryPolicy = options.retry ?? DEFAULT_RETRY_POLICY
    this.pageSize = Math.max(1, Math.floor(options.pageSize ?? PAGE_SIZE))
    this.maxPages = Math.max(1, Math.floor(options.maxPages ?? DEFAULT_MAX_PAGES))
  }

  /**
   * Transactions whose date prefix lies in [dateFrom, dateTo].
   * The listing is newest first; paging stops at a short page or once a page
   * reaches back before `dateFrom`.
   */
  async query(dateFrom: string, dateTo: string, options: QueryOptions = {}): Promise<TransactionRecord[]> {
    if (!isValidDate(dateFrom)) throw new InvalidInputError(`Invalid start date: ${dateFrom} (expected YYYYMMDD)`)
    if (!isValidDate(dateTo)) throw new InvalidInputError(`Invalid end date: ${dateTo} (expected YYYYMMDD)`)
    if (dateFrom > dateTo) throw new InvalidInputError(`Start date ${dateFrom} is after end date ${dateTo}`)

    const seen = new Set<string>()
    const records: TransactionRecord[] = []

    for (let page = 0; page < this.maxPages; page++) {
      if (options.signal?.aborted) throw new CancelledError()

      const rows = await this.api.queryTransactions(this.credentials, page * this.pageSize, this.pageSize, options.signal)

      for (const row of rows) {
        const date = transactionDate(row.transactionId)
        if (date < dateFrom || date > dateTo || seen.has(row.transactionId)) continue
        seen.add(row.transactionId)
        records.push(this.toRecord(row, options.overlayDir))
      }

      if (rows.length < this.pageSize) break
      const oldest = rows.reduce((min, row) => {
        const date = transactionDate(row.transactionId)
        return date < min ? date : min
      }, transactionDate(rows[0].transactionId))
      if (oldest < dateFrom) break
    }

    return records
  }

  /**
   * Download overlays for the given records into `destDir`, one at a time.
   * An auth failure fails the current record and every remaining one
   * without calling the API again.
   */
  async downloadSelected(
    records: TransactionRecord[],
    destDir: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<TransactionRecord[]> {
    const { signal } = options
    let authError: AuthError | null = null

    for (const record of records) {
      if (authError) {
        record.downloadState = 'failed'
        record.error = authError.message
        this.emitUpdate({ transactionId: record.transactionId, state: 'failed', attempt: 0, error: record.error })
        continue
      }

      if (signal?.aborted) {
        this.emitUpdate({ transactionId: record.transactionId, state: 'cancelled', attempt: 0 })
        continue
      }

      const previousState = record.downloadState
      let attempt = 1
      record.downloadState = 'downloading'
      record.error = undefined
      this.emitUpdate({ transactionId: record.transactionId, state: 'downloading', attempt: 1 })

      try {
        const data = await withRetry(
          this.retryPolicy,
          (n) => {
            attempt = n
            return this.api.downloadOverlay(this.credentials, record.transactionId, signal)
          },
          {
            signal,
            onRetry: (next, err) => {
              this.emitUpdate({
                transactionId: record.transactionId,
                state: 'downloading',
                attempt: next,
                error: errorMessage(err)
              })
            }
          }
        )

        const path = join(destDir, record.overlayFile)
        await mkdir(destDir, { recursive: true })
        await writeFile(path, data)

        record.downloadState = 'downloaded'
        this.emitUpdate({ transactionId: record.transactionId, state: 'downloaded', attempt, bytes: data.length, path })
      } catch (err) {
        if (err instanceof CancelledError) {
          record.downloadState = previousState
          this.emitUpdate({ transactionId: record.transactionId, state: 'cancelled', attempt })
          continue
        }

        record.downloadState = 'failed'
        record.error = errorMessage(err, 'Download failed')
        this.emitUpdate({ transactionId: record.transactionId, state: 'failed', attempt, error: record.error })
        if (err instanceof AuthError) authError = err
      }
    }

    return records
  }

  /** Records whose overlay has not been downloaded yet */
  selectNew(records: TransactionRecord[]): TransactionRecord[] {
    return records.filter((r) => r.downloadState !== 'downloaded')
  }

  private toRecord(row: TransactionSummary, overlayDir?: string): TransactionRecord {
    const overlayFile = overlayFileName(row.transactionId)
    const downloaded = overlayDir !== undefined && existsSync(join(overlayDir, overlayFile))
    return {
      transactionId: row.transactionId,
      date: transactionDate(row.transactionId),
      status: row.status,
      fileName: row.fileName,
      discovered: row.discovered,
      overlayFile,
      downloadState: downloaded ? 'downloaded' : 'not-downloaded'
    }
  }

  private emitUpdate(event: DownloadStatusEvent): void {
    this.emit('update', event)
  }
}
