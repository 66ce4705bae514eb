import Conf from 'conf'
import type { AppSettings } from '../types/settings'
import { getDataDirectory, getDefaultPrivateKeyPath } from '../utils/platform'

export const APP_NAME = 'capture-sync'

export const DEFAULT_SETTINGS: AppSettings = {
  hostAddress: '',
  hostPort: 22,
  hostUser: 'pi',
  hostAuthMethod: 'publickey',
  hostPrivateKeyPath: getDefaultPrivateKeyPath(),
  hostPasswordEncrypted: '',
  remoteDirectory: '/home/pi/kismet',
  captureServiceName: 'kismet',
  artifactPattern: '*.wiglecsv',

  localDirectory: getDataDirectory(APP_NAME, 'captures'),
  overlayDirectory: getDataDirectory(APP_NAME, 'overlays'),

  apiBaseUrl: 'https://api.wigle.net',
  apiName: '',
  apiTokenEncrypted: '',

  uploadConcurrency: 2,
  retryMaxAttempts: 3,
  retryInitialDelay: 1,
  retryMaxDelay: 30,
  retryBackoffMultiplier: 2,
  retryJitter: true,

  connectionTimeout: 15,
  commandTimeout: 30,
  transferIdleTimeout: 60,
  apiTimeout: 60,

  logMaxEntries: 5000,
  logDebugMode: false
}

export interface SettingsStoreOptions {
  /** Directory holding settings.json; defaults to the per-user config dir */
  cwd?: string
}

/**
 * SettingsStore — persists preferences using conf.
 */
export class SettingsStore {
  private store: Conf<{ settings: AppSettings }>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<{ settings: AppSettings }>({
      projectName: APP_NAME,
      configName: 'settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Where the settings file lives */
  get path(): string {
    return this.store.path
  }

  /** Get all settings; keys added since the file was written get defaults */
  getAll(): AppSettings {
    const saved = this.store.get('settings')
    return { ...DEFAULT_SETTINGS, ...saved }
  }

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.getAll()[key]
  }

  /** Update one or more settings */
  update(updates: Partial<AppSettings>): AppSettings {
    const updated = { ...this.getAll(), ...updates }
    this.store.set('settings', updated)
    return updated
  }

  /** Reset all settings to defaults */
  reset(): AppSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return { ...DEFAULT_SETTINGS }
  }
}
