import { randomBytes, createCipheriv, createDecipheriv, pbkdf2Sync } from 'crypto'
import { existsSync, mkdirSync, readFileSync, writeFileSync, chmodSync } from 'fs'
import { dirname } from 'path'
import { isWindows } from '../utils/platform'

const ALGORITHM = 'aes-256-gcm'
const IV_LENGTH = 16
const TAG_LENGTH = 16
const SALT_LENGTH = 32
const KEY_LENGTH = 32
const ITERATIONS = 100_000

/**
 * Protects secrets at rest. The core only ever sees decrypted values;
 * which variant is active is decided by the composition root.
 */
export interface SecretCipher {
  readonly variant: 'os-native' | 'symmetric-key-file'
  encrypt(plaintext: string): string
  decrypt(ciphertext: string): string
}

function deriveKey(password: string, salt: Buffer): Buffer {
  return pbkdf2Sync(password, salt, ITERATIONS, KEY_LENGTH, 'sha512')
}

/**
 * Encrypt a plaintext string using AES-256-GCM.
 * Returns a base64 string containing: salt + iv + authTag + ciphertext
 */
export function encrypt(plaintext: string, password: string): string {
  const salt = randomBytes(SALT_LENGTH)
  const key = deriveKey(password, salt)
  const iv = randomBytes(IV_LENGTH)

  const cipher = createCipheriv(ALGORITHM, key, iv)
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
  const tag = cipher.getAuthTag()

  return Buffer.concat([salt, iv, tag, encrypted]).toString('base64')
}

/** Decrypt a string produced by encrypt(); throws if the key or data is wrong */
export function decrypt(encryptedBase64: string, password: string): string {
  const combined = Buffer.from(encryptedBase64, 'base64')
  if (combined.length < SALT_LENGTH + IV_LENGTH + TAG_LENGTH) {
    throw new Error('Encrypted value is truncated')
  }

  const salt = combined.subarray(0, SALT_LENGTH)
  const iv = combined.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH)
  const tag = combined.subarray(SALT_LENGTH + IV_LENGTH, SALT_LENGTH + IV_LENGTH + TAG_LENGTH)
  const ciphertext = combined.subarray(SALT_LENGTH + IV_LENGTH + TAG_LENGTH)

  const key = deriveKey(password, salt)
  const decipher = createDecipheriv(ALGORITHM, key, iv)
  decipher.setAuthTag(tag)

  return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8')
}

/**
 * KeyFileCipher — symmetric-key-file variant.
 * A random 256-bit master key lives in a file readable only by the owner;
 * it is created on first use.
 */
export class KeyFileCipher implements SecretCipher {
  readonly variant = 'symmetric-key-file' as const
  private keyFile: string
  private masterKey: string | null = null

  constructor(keyFile: string) {
    this.keyFile = keyFile
  }

  encrypt(plaintext: string): string {
    if (!plaintext) return ''
    return encrypt(plaintext, this.getMasterKey())
  }

  decrypt(ciphertext: string): string {
    if (!ciphertext) return ''
    return decrypt(ciphertext, this.getMasterKey())
  }

  private getMasterKey(): string {
    if (this.masterKey) return this.masterKey

    if (existsSync(this.keyFile)) {
      this.masterKey = readFileSync(this.keyFile, 'utf8').trim()
    } else {
      mkdirSync(dirname(this.keyFile), { recursive: true })
      this.masterKey = randomBytes(32).toString('hex')
      writeFileSync(this.keyFile, this.masterKey, { mode: 0o600 })
      // mode is ignored on Windows; the file relies on the profile ACL there
      if (!isWindows()) chmodSync(this.keyFile, 0o600)
    }
    return this.masterKey
  }
}
