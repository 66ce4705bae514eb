import { createHash } from 'crypto'
import { createReadStream } from 'fs'
import type { RemoteSession } from './SecureChannel'
import { RemoteExecError } from '../errors'
import { shellEscape, validateRemotePath } from '../utils/shellEscape'

const DIGEST_PATTERN = /^([0-9a-fA-F]{64})(?:\s|$)/

/** SHA-256 of a local file, streamed, as lowercase hex */
export function hashLocal(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256')
    const stream = createReadStream(path)
    stream.on('data', (chunk) => hash.update(chunk))
    stream.on('error', reject)
    stream.on('end', () => resolve(hash.digest('hex')))
  })
}

/** SHA-256 of an in-memory buffer, as lowercase hex */
export function hashBuffer(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * SHA-256 computed on the host with `sha256sum`, so the file is not transferred twice.
 * Rejects with RemoteExecError on a non-zero exit or unparsable output.
 */
export async function hashRemote(session: RemoteSession, path: string): Promise<string> {
  const command = `sha256sum -- ${shellEscape(validateRemotePath(path))}`
  const result = await session.execute(command)

  if (result.code !== 0) {
    throw new RemoteExecError(`sha256sum failed for ${path}: ${result.stderr.trim() || `exit code ${result.code ?? 'none'}`}`, {
      command,
      exitCode: result.code,
      stderr: result.stderr
    })
  }

  const match = DIGEST_PATTERN.exec(result.stdout.trim())
  if (!match) {
    throw new RemoteExecError(`Unexpected sha256sum output for ${path}`, { command, exitCode: result.code })
  }
  return match[1].toLowerCase()
}

/** Exact digest equality; anything that is not a 64-hex digest never verifies */
export function verify(localDigest: string, remoteDigest: string): boolean {
  const a = localDigest.trim().toLowerCase()
  const b = remoteDigest.trim().toLowerCase()
  return /^[0-9a-f]{64}$/.test(a) && a === b
}
