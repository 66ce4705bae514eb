import { Command } from 'commander'
import chalk from 'chalk'
import { CLI_SESSION, createContext, fail, withSession } from './context'
import { LogService } from '../services/LogService'
import { ServiceControl, type HostAction, type ServiceAction } from '../services/ServiceControl'
import { RemoteWorkflow } from '../services/RemoteWorkflow'
import { LocalArtifacts } from '../services/LocalArtifacts'
import { InvalidInputError } from '../errors'
import { formatFileSize } from '../utils/fileSize'

const SERVICE_ACTIONS: readonly ServiceAction[] = ['start', 'stop', 'restart']
const HOST_ACTIONS: readonly HostAction[] = ['reboot', 'shutdown']

function parseServiceAction(value: string): ServiceAction {
  const action = SERVICE_ACTIONS.find((a) => a === value)
  if (!action) throw new InvalidInputError(`Invalid action: ${value} (expected ${SERVICE_ACTIONS.join(', ')})`)
  return action
}

function parseHostAction(value: string): HostAction {
  const action = HOST_ACTIONS.find((a) => a === value)
  if (!action) throw new InvalidInputError(`Invalid action: ${value} (expected ${HOST_ACTIONS.join(', ')})`)
  return action
}

export function registerDeviceCommands(program: Command): void {
  const control = new ServiceControl()

  program
    .command('test')
    .description('Check that the capture host is reachable and accepts commands')
    .action(async () => {
      try {
        const ctx = createContext()
        const ok = await withSession(ctx, (session) => control.testConnection(session))
        if (!ok) {
          console.log(chalk.yellow('Connected, but the test command returned unexpected output.'))
          process.exitCode = 1
          return
        }
        console.log(chalk.green('Connection OK.'))
      } catch (error) {
        fail('Connection test failed:', error)
      }
    })

  program
    .command('service <action>')
    .description('Start, stop or restart the capture service')
    .action(async (value: string) => {
      try {
        const action = parseServiceAction(value)
        const ctx = createContext()
        const unit = ctx.config.captureServiceName

        await withSession(ctx, async (session) => {
          LogService.serviceAction(ctx.log, CLI_SESSION, action, unit)
          await control.runServiceAction(session, action, unit)
        })
        ctx.log.log(CLI_SESSION, 'success', 'ssh', `Service ${unit}: ${action} completed.`)
      } catch (error) {
        fail('Service command failed:', error)
      }
    })

  program
    .command('host <action>')
    .description('Reboot or shut down the capture host')
    .action(async (value: string) => {
      try {
        const action = parseHostAction(value)
        const ctx = createContext()
        await withSession(ctx, (session) => control.runHostAction(session, action))
        ctx.log.log(CLI_SESSION, 'success', 'ssh', `Host ${action} requested.`)
      } catch (error) {
        fail('Host command failed:', error)
      }
    })

  program
    .command('status')
    .description('Show the capture service state and pending files on both sides')
    .action(async () => {
      try {
        const ctx = createContext()
        const { captureServiceName, remoteDirectory, artifactPattern, localDirectory } = ctx.config

        const [active, remote] = await withSession(ctx, async (session) => [
          await control.isActive(session, captureServiceName),
          await new RemoteWorkflow(control).summarizeRemote(session, remoteDirectory, artifactPattern)
        ] as const)
        const local = await LocalArtifacts.list(localDirectory, artifactPattern)
        const localBytes = local.reduce((sum, f) => sum + f.size, 0)

        console.log(`Service ${captureServiceName}: ${active ? chalk.green('active') : chalk.yellow('inactive')}`)
        console.log(`Files on host:   ${remote.count} (${formatFileSize(remote.totalBytes)})`)
        console.log(`Files on disk:   ${local.length} (${formatFileSize(localBytes)})`)
      } catch (error) {
        fail('Cannot read status:', error)
      }
    })
}
