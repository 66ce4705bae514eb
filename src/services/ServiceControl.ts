import type { RemoteSession } from './SecureChannel'
import type { CommandResult } from '../types/remote'
import { InvalidInputError, RemoteExecError } from '../errors'
import { isValidUnitName } from '../utils/shellEscape'

/** Lifecycle actions on the capture service */
export type ServiceAction = 'start' | 'stop' | 'restart'

/** Host power actions */
export type HostAction = 'reboot' | 'shutdown'

const VALID_ACTIONS: ReadonlySet<ServiceAction> = new Set(['start', 'stop', 'restart'])

/** `sudo -n` fails instead of prompting when a password would be needed */
const HOST_COMMANDS: Record<HostAction, string> = {
  reboot: 'sudo -n reboot',
  shutdown: 'sudo -n shutdown -h now'
}

export function serviceCommand(action: ServiceAction, unit: string): string {
  if (!VALID_ACTIONS.has(action)) throw new InvalidInputError(`Invalid service action: ${action}`)
  if (!isValidUnitName(unit)) throw new InvalidInputError(`Invalid unit name: ${unit}`)
  return `sudo -n systemctl ${action} ${unit}`
}

function requireSuccess(command: string, result: CommandResult, what: string): CommandResult {
  if (result.code !== 0) {
    const reason = result.stderr.trim() || `exit code ${result.code ?? 'none'}`
    throw new RemoteExecError(`${what} failed: ${reason}`, {
      command,
      exitCode: result.code,
      stderr: result.stderr
    })
  }
  return result
}

/**
 * Controls the capture service and the host itself.
 *
 * Stateless — each method is a thin wrapper that executes one command
 * over an existing session and interprets its exit code.
 */
export class ServiceControl {
  async runServiceAction(session: RemoteSession, action: ServiceAction, unit: string): Promise<void> {
    const command = serviceCommand(action, unit)
    requireSuccess(command, await session.execute(command), `${action} ${unit}`)
  }

  startService(session: RemoteSession, unit: string): Promise<void> {
    return this.runServiceAction(session, 'start', unit)
  }

  stopService(session: RemoteSession, unit: string): Promise<void> {
    return this.runServiceAction(session, 'stop', unit)
  }

  restartService(session: RemoteSession, unit: string): Promise<void> {
    return this.runServiceAction(session, 'restart', unit)
  }

  /**
   * Reboot or power off the host.
   * The channel usually drops before an exit status arrives; that counts as sent.
   */
  async runHostAction(session: RemoteSession, action: HostAction): Promise<void> {
    const command = HOST_COMMANDS[action]
    const result = await session.execute(command)
    if (result.code === null) return
    requireSuccess(command, result, action)
  }

  rebootHost(session: RemoteSession): Promise<void> {
    return this.runHostAction(session, 'reboot')
  }

  shutdownHost(session: RemoteSession): Promise<void> {
    return this.runHostAction(session, 'shutdown')
  }

  /** `systemctl is-active`; any non-zero exit is reported as not running */
  async isActive(session: RemoteSession, unit: string): Promise<boolean> {
    if (!isValidUnitName(unit)) throw new InvalidInputError(`Invalid unit name: ${unit}`)
    const { stdout, code } = await session.execute(`systemctl is-active ${unit}`)
    return code === 0 && stdout.trim() === 'active'
  }

  /** Round-trip a trivial command to prove the session works */
  async testConnection(session: RemoteSession): Promise<boolean> {
    const { stdout, code } = await session.execute('echo ok')
    return code === 0 && stdout.trim() === 'ok'
  }
}
