import { describe, it, expect, vi } from 'vitest'
import { LogService } from '../services/LogService'
import type { LogEntry } from '../types/log'

describe('LogService', () => {
  it('keeps the newest entries per session', () => {
    const log = new LogService(3)
    for (const n of [1, 2, 3, 4]) log.log('cli', 'info', 'workflow', `m${n}`)
    log.log('other', 'info', 'workflow', 'x')

    expect(log.getEntries('cli').map((e) => e.message)).toEqual(['m2', 'm3', 'm4'])
    expect(log.getEntries('other')).toHaveLength(1)

    log.clearEntries('cli')
    expect(log.getEntries('cli')).toEqual([])
  })

  it('drops debug entries unless debug mode is on', () => {
    const log = new LogService()
    const listener = vi.fn()
    log.on('entry', listener)

    log.log('cli', 'debug', 'upload', 'hidden')
    expect(listener).not.toHaveBeenCalled()
    expect(log.getEntries('cli')).toEqual([])

    log.setDebugMode(true)
    const entry = log.log('cli', 'debug', 'upload', 'shown')
    expect(listener).toHaveBeenCalledWith('cli', entry)
  })

  it('formats entries as single lines with optional details', () => {
    const entry: LogEntry = {
      id: 'e1',
      timestamp: 0,
      level: 'info',
      source: 'ssh',
      message: 'Connecting to capture.test:22...',
      sessionId: 'cli'
    }

    expect(LogService.format(entry)).toBe('[1970-01-01T00:00:00.000Z] [INFO   ] [SSH     ] Connecting to capture.test:22...')
    expect(LogService.format({ ...entry, level: 'error', details: 'ECONNREFUSED' })).toBe(
      '[1970-01-01T00:00:00.000Z] [ERROR  ] [SSH     ] Connecting to capture.test:22...\n  ECONNREFUSED'
    )
  })

  it('writes the common messages through the static helpers', () => {
    const log = new LogService()

    LogService.connecting(log, 'cli', 'capture.test', 22)
    LogService.uploadRetry(log, 'cli', 'a.wiglecsv', 2)

    expect(log.getEntries('cli').map((e) => [e.level, e.source, e.message])).toEqual([
      ['info', 'ssh', 'Connecting to capture.test:22...'],
      ['warning', 'upload', 'Retrying a.wiglecsv (attempt 2)']
    ])
  })

  it('exports a session as formatted lines', () => {
    const log = new LogService()
    const first = log.log('cli', 'info', 'workflow', 'one')
    const second = log.log('cli', 'error', 'api', 'two', 'HTTP 500')

    expect(log.exportLog('cli')).toBe(`${LogService.format(first)}\n${LogService.format(second)}`)
    expect(log.exportLog('missing')).toBe('')
  })
})
