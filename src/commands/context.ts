import chalk from 'chalk'
import { join } from 'path'
import { LogService, getLogService } from '../services/LogService'
import { SettingsStore, APP_NAME } from '../services/SettingsStore'
import { KeyFileCipher } from '../services/SecretCipher'
import { SettingsCredentialStore } from '../services/CredentialStore'
import { SecureChannelClient, type RemoteSession } from '../services/SecureChannel'
import { IngestionApiClient } from '../services/IngestionApiClient'
import type { LogEntry } from '../types/log'
import type { SyncConfig } from '../types/settings'
import { errorMessage } from '../errors'
import { getConfigDirectory } from '../utils/platform'
import { resolveSyncConfig, type SyncOverrides } from '../utils/resolveSettings'

/** Log session id used for everything a CLI invocation does */
export const CLI_SESSION = 'cli'

/** Everything a command needs, built once from the persisted settings */
export interface CommandContext {
  settings: SettingsStore
  credentials: SettingsCredentialStore
  config: SyncConfig
  log: LogService
  signal: AbortSignal
}

const interrupt = new AbortController()

/** First Ctrl-C cancels the running operation, the second one exits */
export function installInterruptHandler(): void {
  process.once('SIGINT', () => {
    console.error(chalk.yellow('\nCancelling... (press Ctrl-C again to exit now)'))
    interrupt.abort()
    process.once('SIGINT', () => process.exit(130))
  })
}

/** Settings and key file live under CAPTURE_SYNC_HOME when set */
export function getHomeDirectory(): string {
  return process.env.CAPTURE_SYNC_HOME || getConfigDirectory(APP_NAME)
}

export function createContext(overrides: SyncOverrides = {}): CommandContext {
  const home = getHomeDirectory()
  const settings = new SettingsStore({ cwd: home })
  const all = settings.getAll()

  const log = getLogService()
  log.setMaxEntries(all.logMaxEntries)
  log.setDebugMode(all.logDebugMode)
  if (log.listenerCount('entry') === 0) {
    log.on('entry', (_sessionId: string, entry: LogEntry) => printEntry(entry))
  }

  return {
    settings,
    credentials: new SettingsCredentialStore(settings, new KeyFileCipher(join(home, 'master.key'))),
    config: resolveSyncConfig(all, overrides),
    log,
    signal: interrupt.signal
  }
}

export function createApiClient(ctx: CommandContext): IngestionApiClient {
  return new IngestionApiClient({
    baseUrl: ctx.settings.get('apiBaseUrl'),
    timeoutMs: ctx.config.timeouts.apiMs
  })
}

/**
 * Open a session to the capture host, run `fn`, and always close it.
 * Connection progress is logged; credentials never are.
 */
export async function withSession<T>(ctx: CommandContext, fn: (session: RemoteSession) => Promise<T>): Promise<T> {
  const credentials = ctx.credentials.getHostCredentials()
  const client = new SecureChannelClient()

  LogService.connecting(ctx.log, CLI_SESSION, credentials.host, credentials.port)
  LogService.authenticating(ctx.log, CLI_SESSION, credentials.authMethod)

  let session: RemoteSession
  try {
    session = await client.connect(credentials, {
      readyTimeoutMs: ctx.config.timeouts.connectMs,
      commandTimeoutMs: ctx.config.timeouts.commandMs,
      transferIdleTimeoutMs: ctx.config.timeouts.transferIdleMs
    })
  } catch (err) {
    LogService.connectionFailed(ctx.log, CLI_SESSION, errorMessage(err))
    throw err
  }
  LogService.connected(ctx.log, CLI_SESSION)

  try {
    return await fn(session)
  } finally {
    session.close()
    LogService.terminated(ctx.log, CLI_SESSION)
  }
}

const LEVEL_COLORS: Record<LogEntry['level'], (text: string) => string> = {
  info: (t) => t,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  debug: chalk.dim
}

export function printEntry(entry: LogEntry): void {
  const line = LEVEL_COLORS[entry.level](LogService.format(entry))
  if (entry.level === 'error') console.error(line)
  else console.log(line)
}

/** Print a failure and exit non-zero */
export function fail(prefix: string, error: unknown): never {
  console.error(chalk.red(prefix), errorMessage(error))
  process.exit(1)
}
