import { Command } from 'commander'
import chalk from 'chalk'
import { CLI_SESSION, createApiClient, createContext, fail, withSession, type CommandContext } from './context'
import { RemoteWorkflow, summarizeResults } from '../services/RemoteWorkflow'
import type { LogLevel } from '../types/log'
import type { WorkflowStepResult } from '../types/workflow'

const STATUS_LEVELS: Record<WorkflowStepResult['status'], LogLevel> = {
  succeeded: 'success',
  failed: 'error',
  cancelled: 'warning'
}

/** Log line for one workflow result */
export function describeStep(result: WorkflowStepResult): string {
  const subject = result.file ? ` ${result.file}` : ''
  return `[${result.step}]${subject}: ${result.message}`
}

function createWorkflow(ctx: CommandContext): RemoteWorkflow {
  const workflow = new RemoteWorkflow()
  workflow.on('step', (result: WorkflowStepResult) => {
    const level = result.step === 'copy' && result.status === 'succeeded' ? 'info' : STATUS_LEVELS[result.status]
    ctx.log.log(CLI_SESSION, level, 'workflow', describeStep(result))
  })
  return workflow
}

function report(results: WorkflowStepResult[]): void {
  const summary = summarizeResults(results)
  const line = `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled`

  if (summary.aborted) {
    console.log(chalk.red(`Run aborted. ${line}.`))
  } else if (summary.failed > 0 || summary.cancelled > 0) {
    console.log(chalk.yellow(`Finished with problems. ${line}.`))
  } else {
    console.log(chalk.green(`Done. ${line}.`))
  }

  if (summary.aborted || summary.failed > 0) process.exitCode = 1
}

interface DirOptions {
  remoteDir?: string
  localDir?: string
  pattern?: string
}

function addDirOptions(command: Command): Command {
  return command
    .option('--remote-dir <dir>', 'Remote capture directory')
    .option('--local-dir <dir>', 'Local destination directory')
    .option('--pattern <glob>', 'Artifact file name pattern')
}

function contextFor(options: DirOptions): CommandContext {
  return createContext({
    remoteDirectory: options.remoteDir,
    localDirectory: options.localDir,
    artifactPattern: options.pattern
  })
}

export function registerSyncCommands(program: Command): void {
  addDirOptions(
    program
      .command('sync')
      .description('Stop the capture service, copy and verify every artifact, then delete it from the host')
  ).action(async (options: DirOptions) => {
    try {
      const ctx = contextFor(options)
      const results = await withSession(ctx, (session) =>
        createWorkflow(ctx).runAutomaticWorkflow(session, {
          remoteDir: ctx.config.remoteDirectory,
          localDir: ctx.config.localDirectory,
          pattern: ctx.config.artifactPattern,
          serviceName: ctx.config.captureServiceName,
          signal: ctx.signal
        })
      )
      report(results)
    } catch (error) {
      fail('Sync failed:', error)
    }
  })

  addDirOptions(
    program
      .command('copy')
      .description('Copy and verify artifacts without stopping the service or deleting anything')
  ).action(async (options: DirOptions) => {
    try {
      const ctx = contextFor(options)
      const results = await withSession(ctx, (session) =>
        createWorkflow(ctx).runCopyWorkflow(session, {
          remoteDir: ctx.config.remoteDirectory,
          localDir: ctx.config.localDirectory,
          pattern: ctx.config.artifactPattern,
          signal: ctx.signal
        })
      )
      report(results)
    } catch (error) {
      fail('Copy failed:', error)
    }
  })

  addDirOptions(
    program
      .command('direct-upload')
      .description('Upload artifacts from the host straight to the API, deleting each one once acknowledged')
  ).action(async (options: DirOptions) => {
    try {
      const ctx = contextFor(options)
      const credentials = ctx.credentials.getApiCredentials()
      const api = createApiClient(ctx)

      const results = await withSession(ctx, (session) =>
        createWorkflow(ctx).runDirectUploadWorkflow(session, {
          remoteDir: ctx.config.remoteDirectory,
          pattern: ctx.config.artifactPattern,
          serviceName: ctx.config.captureServiceName,
          api,
          credentials,
          signal: ctx.signal
        })
      )
      report(results)
    } catch (error) {
      fail('Direct upload failed:', error)
    }
  })
}
