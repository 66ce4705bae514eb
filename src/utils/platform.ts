import { platform, homedir } from 'os'
import { join } from 'path'

/** Check if running on Windows */
export function isWindows(): boolean {
  return platform() === 'win32'
}

/** Get the default SSH key directory */
export function getSSHDirectory(): string {
  return join(homedir(), '.ssh')
}

/** Default private key used for publickey auth */
export function getDefaultPrivateKeyPath(): string {
  return join(getSSHDirectory(), 'id_rsa')
}

/** Per-user configuration directory (APPDATA on Windows, ~/.config elsewhere) */
export function getConfigDirectory(appName: string): string {
  const base = isWindows() ? process.env.APPDATA || homedir() : join(homedir(), '.config')
  return join(base, appName)
}

/** Default data directory for pulled artifacts and overlays */
export function getDataDirectory(appName: string, sub: string): string {
  return join(homedir(), appName, sub)
}
