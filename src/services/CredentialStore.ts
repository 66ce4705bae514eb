import type { SecretCipher } from './SecretCipher'
import type { SettingsStore } from './SettingsStore'
import type { ApiCredentials } from '../types/api'
import type { HostCredentials } from '../types/remote'
import { InvalidInputError, errorMessage } from '../errors'

/** Source of decrypted credentials; nothing downstream sees the ciphertext */
export interface CredentialStore {
  getApiCredentials(): ApiCredentials
  getHostCredentials(): HostCredentials
}

/**
 * SettingsCredentialStore — reads credentials from settings and decrypts
 * the secret parts with the active cipher. Secrets are encrypted before
 * they are written back.
 */
export class SettingsCredentialStore implements CredentialStore {
  private settings: SettingsStore
  private cipher: SecretCipher

  constructor(settings: SettingsStore, cipher: SecretCipher) {
    this.settings = settings
    this.cipher = cipher
  }

  getApiCredentials(): ApiCredentials {
    const { apiName, apiTokenEncrypted } = this.settings.getAll()
    if (!apiName) throw new InvalidInputError('API name is not configured')
    if (!apiTokenEncrypted) throw new InvalidInputError('API token is not configured')

    return { apiName, apiToken: this.reveal(apiTokenEncrypted, 'API token') }
  }

  getHostCredentials(): HostCredentials {
    const s = this.settings.getAll()
    if (!s.hostAddress) throw new InvalidInputError('Host address is not configured')
    if (!s.hostUser) throw new InvalidInputError('Host user is not configured')

    const credentials: HostCredentials = {
      host: s.hostAddress,
      port: s.hostPort,
      username: s.hostUser,
      authMethod: s.hostAuthMethod
    }

    switch (s.hostAuthMethod) {
      case 'password':
        if (!s.hostPasswordEncrypted) throw new InvalidInputError('Host password is not configured')
        credentials.password = this.reveal(s.hostPasswordEncrypted, 'host password')
        break
      case 'publickey':
        if (!s.hostPrivateKeyPath) throw new InvalidInputError('Private key path is not configured')
        credentials.privateKeyPath = s.hostPrivateKeyPath
        if (s.hostPasswordEncrypted) {
          credentials.passphrase = this.reveal(s.hostPasswordEncrypted, 'key passphrase')
        }
        break
      case 'agent':
        break
    }
    return credentials
  }

  /** Encrypt and store the API token */
  setApiToken(token: string): void {
    this.settings.update({ apiTokenEncrypted: this.cipher.encrypt(token) })
  }

  /** Encrypt and store the host password (or key passphrase) */
  setHostPassword(password: string): void {
    this.settings.update({ hostPasswordEncrypted: this.cipher.encrypt(password) })
  }

  private reveal(ciphertext: string, what: string): string {
    try {
      return this.cipher.decrypt(ciphertext)
    } catch (err) {
      throw new InvalidInputError(`Cannot decrypt ${what}: ${errorMessage(err)}`)
    }
  }
}
