/** Severity level for a log entry */
export type LogLevel = 'info' | 'warning' | 'error' | 'success' | 'debug'

/** Source subsystem that generated the log entry */
export type LogSource = 'ssh' | 'sftp' | 'workflow' | 'upload' | 'api' | 'system'

/** A single activity log entry */
export interface LogEntry {
  id: string
  timestamp: number              // Unix ms
  level: LogLevel
  source: LogSource
  message: string
  details?: string
  sessionId: string
}
