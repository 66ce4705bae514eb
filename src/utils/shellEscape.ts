import { posix } from 'path'
import { InvalidInputError } from '../errors'

/**
 * Shell-escape a string for safe interpolation into a shell command.
 * Wraps in single quotes and escapes embedded single quotes.
 *
 * @example shellEscape("foo'bar") => "'foo'\\''bar'"
 * @example shellEscape("normal") => "'normal'"
 */
export function shellEscape(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'"
}

/** Validates a systemd unit name against injection attacks (max 256 chars) */
export function isValidUnitName(unit: string): boolean {
  return unit.length > 0 && unit.length <= 256 && /^[a-zA-Z0-9@._-]+$/.test(unit)
}

/**
 * Validate a remote path before it is interpolated into a command.
 * Must be absolute and free of NUL and line breaks. Returns the normalized path.
 */
export function validateRemotePath(remotePath: string): string {
  if (!remotePath) throw new InvalidInputError('Remote path cannot be empty')
  if (/[\0\r\n]/.test(remotePath))
    throw new InvalidInputError('Remote path contains control characters')
  if (!remotePath.startsWith('/'))
    throw new InvalidInputError(`Remote path must be absolute: ${remotePath}`)

  return posix.normalize(remotePath)
}
