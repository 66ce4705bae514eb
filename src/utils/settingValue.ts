import type { AppSettings } from '../types/settings'
import type { AuthMethod } from '../types/remote'
import { InvalidInputError } from '../errors'

type KeysOfType<T, V> = { [K in keyof T]: T[K] extends V ? K : never }[keyof T]

type StringKey = Exclude<KeysOfType<AppSettings, string>, SecretKey | 'hostAuthMethod'>
type NumberKey = KeysOfType<AppSettings, number>
type BooleanKey = KeysOfType<AppSettings, boolean>

/** Settings only ever written encrypted, through `config set-secret` */
export type SecretKey = 'hostPasswordEncrypted' | 'apiTokenEncrypted'

const STRING_KEYS = [
  'hostAddress',
  'hostUser',
  'hostPrivateKeyPath',
  'remoteDirectory',
  'captureServiceName',
  'artifactPattern',
  'localDirectory',
  'overlayDirectory',
  'apiBaseUrl',
  'apiName'
] as const satisfies readonly StringKey[]

const NUMBER_KEYS = [
  'hostPort',
  'uploadConcurrency',
  'retryMaxAttempts',
  'retryInitialDelay',
  'retryMaxDelay',
  'retryBackoffMultiplier',
  'connectionTimeout',
  'commandTimeout',
  'transferIdleTimeout',
  'apiTimeout',
  'logMaxEntries'
] as const satisfies readonly NumberKey[]

const BOOLEAN_KEYS = ['retryJitter', 'logDebugMode'] as const satisfies readonly BooleanKey[]

const AUTH_METHODS: readonly AuthMethod[] = ['password', 'publickey', 'agent']

function isStringKey(key: string): key is StringKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberKey {
  return NUMBER_KEYS.some((k) => k === key)
}

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key)
}

function isAuthMethod(value: string): value is AuthMethod {
  return AUTH_METHODS.some((m) => m === value)
}

/** Every key `config set` accepts */
export const EDITABLE_KEYS: readonly string[] = [...STRING_KEYS, ...NUMBER_KEYS, ...BOOLEAN_KEYS, 'hostAuthMethod']

export function isSecretKey(key: string): key is SecretKey {
  return key === 'hostPasswordEncrypted' || key === 'apiTokenEncrypted'
}

/**
 * Parse a command-line value for one setting into a settings update.
 * Secret keys are refused; they go through the cipher.
 */
export function parseSettingValue(key: string, raw: string): Partial<AppSettings> {
  const update: Partial<AppSettings> = {}

  if (isSecretKey(key)) {
    throw new InvalidInputError(`${key} cannot be set directly; use "config set-secret"`)
  }

  if (key === 'hostAuthMethod') {
    if (!isAuthMethod(raw)) {
      throw new InvalidInputError(`Invalid auth method: ${raw} (expected ${AUTH_METHODS.join(', ')})`)
    }
    update.hostAuthMethod = raw
  } else if (isStringKey(key)) {
    update[key] = raw.trim()
  } else if (isNumberKey(key)) {
    const value = Number(raw)
    if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(`${key} must be a non-negative number, got "${raw}"`)
    }
    update[key] = value
  } else if (isBooleanKey(key)) {
    const normalized = raw.trim().toLowerCase()
    if (normalized !== 'true' && normalized !== 'false') {
      throw new InvalidInputError(`${key} must be true or false, got "${raw}"`)
    }
    update[key] = normalized === 'true'
  } else {
    throw new InvalidInputError(`Unknown setting: ${key}`)
  }

  return update
}
