import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { LogEntry, LogLevel, LogSource } from '../types/log'

const DEFAULT_MAX_ENTRIES = 5000

/**
 * LogService — central event-based log aggregator for device and API activity.
 *
 * Stores log entries per session in memory (FIFO with configurable max).
 * Emits 'entry' events with (sessionId, LogEntry) so the CLI can print them.
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
  }

  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /** Add a log entry for a session */
  log(
    sessionId: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      sessionId
    }

    // Debug entries are returned but neither stored nor emitted unless debug mode is on
    if (level === 'debug' && !this.debugMode) return entry

    let sessionEntries = this.entries.get(sessionId)
    if (!sessionEntries) {
      sessionEntries = []
      this.entries.set(sessionId, sessionEntries)
    }

    sessionEntries.push(entry)

    while (sessionEntries.length > this.maxEntries) {
      sessionEntries.shift()
    }

    this.emit('entry', sessionId, entry)
    return entry
  }

  getEntries(sessionId: string): LogEntry[] {
    return this.entries.get(sessionId) ?? []
  }

  clearEntries(sessionId: string): void {
    this.entries.delete(sessionId)
  }

  /** Export log entries as formatted text */
  exportLog(sessionId: string): string {
    return this.getEntries(sessionId)
      .map((e) => LogService.format(e))
      .join('\n')
  }

  /** One-line text form of an entry */
  static format(e: LogEntry): string {
    const ts = new Date(e.timestamp).toISOString()
    const level = e.level.toUpperCase().padEnd(7)
    const src = e.source.toUpperCase().padEnd(8)
    const detail = e.details ? `\n  ${e.details}` : ''
    return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
  }

  // ── Static helper methods for common log messages ──

  static connecting(log: LogService, sessionId: string, host: string, port: number): void {
    log.log(sessionId, 'info', 'ssh', `Connecting to ${host}:${port}...`)
  }

  static authenticating(log: LogService, sessionId: string, method: string): void {
    log.log(sessionId, 'info', 'ssh', `Authenticating with method: ${method}...`)
  }

  static connected(log: LogService, sessionId: string): void {
    log.log(sessionId, 'success', 'ssh', 'Connection established.')
  }

  static connectionFailed(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'error', 'ssh', `Connection failed: ${reason}`)
  }

  static terminated(log: LogService, sessionId: string): void {
    log.log(sessionId, 'info', 'ssh', 'SSH connection terminated.')
  }

  static serviceAction(log: LogService, sessionId: string, action: string, unit: string): void {
    log.log(sessionId, 'info', 'ssh', `Service ${unit}: ${action} requested.`)
  }

  static transferStarted(log: LogService, sessionId: string, filename: string, direction: string): void {
    log.log(sessionId, 'info', 'sftp', `File transfer started: ${filename} (${direction})`)
  }

  static transferCompleted(log: LogService, sessionId: string, filename: string): void {
    log.log(sessionId, 'success', 'sftp', `File transfer completed: ${filename}`)
  }

  static transferFailed(log: LogService, sessionId: string, filename: string, reason: string): void {
    log.log(sessionId, 'error', 'sftp', `File transfer failed: ${filename} — ${reason}`)
  }

  static uploadRetry(log: LogService, sessionId: string, filename: string, attempt: number): void {
    log.log(sessionId, 'warning', 'upload', `Retrying ${filename} (attempt ${attempt})`)
  }

  static apiError(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'error', 'api', `Ingestion API error: ${reason}`)
  }
}

let logServiceInstance: LogService | null = null

/** Get (or create) the singleton LogService */
export function getLogService(): LogService {
  if (!logServiceInstance) {
    logServiceInstance = new LogService()
  }
  return logServiceInstance
}
