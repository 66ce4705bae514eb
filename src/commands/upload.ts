import { Command } from 'commander'
import chalk from 'chalk'
import { CLI_SESSION, createApiClient, createContext, fail } from './context'
import { LogService } from '../services/LogService'
import { LocalArtifacts } from '../services/LocalArtifacts'
import { UploadCoordinator } from '../services/UploadCoordinator'
import type { UploadJob, UploadJobStatusEvent } from '../types/upload'
import { InvalidInputError } from '../errors'
import { formatFileSize, formatPercent } from '../utils/fileSize'

function parseConcurrency(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidInputError(`Invalid concurrency: ${value}`)
  return n
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload local artifacts to the ingestion API')
    .option('-c, --concurrency <n>', 'Parallel uploads (1-8)')
    .option('--local-dir <dir>', 'Directory to scan')
    .option('--pattern <glob>', 'Artifact file name pattern')
    .option('--remove-uploaded', 'Delete local files once their upload succeeded')
    .action(async (options: { concurrency?: string; localDir?: string; pattern?: string; removeUploaded?: boolean }) => {
      try {
        const ctx = createContext({
          localDirectory: options.localDir,
          artifactPattern: options.pattern,
          uploadConcurrency: options.concurrency ? parseConcurrency(options.concurrency) : undefined
        })
        const credentials = ctx.credentials.getApiCredentials()

        const files = await LocalArtifacts.list(ctx.config.localDirectory, ctx.config.artifactPattern)
        if (files.length === 0) {
          console.log(chalk.yellow(`No files matching ${ctx.config.artifactPattern} in ${ctx.config.localDirectory}.`))
          return
        }

        const coordinator = new UploadCoordinator({
          api: createApiClient(ctx),
          credentials,
          maxConcurrent: ctx.config.uploadConcurrency,
          retry: ctx.config.retry
        })

        coordinator.on('update', (event: UploadJobStatusEvent) => {
          switch (event.state) {
            case 'in-progress':
              if (event.deltaBytes === 0 && event.bytesTransferred === 0) {
                LogService.transferStarted(ctx.log, CLI_SESSION, event.fileName, 'upload')
              } else {
                ctx.log.log(
                  CLI_SESSION,
                  'debug',
                  'upload',
                  `${event.fileName}: ${formatPercent(event.bytesTransferred, event.totalBytes)}`
                )
              }
              break
            case 'succeeded':
              LogService.transferCompleted(ctx.log, CLI_SESSION, event.fileName)
              break
            case 'failed':
              LogService.transferFailed(ctx.log, CLI_SESSION, event.fileName, event.error ?? 'unknown error')
              break
            case 'cancelled':
              ctx.log.log(CLI_SESSION, 'warning', 'upload', `Upload cancelled: ${event.fileName}`)
              break
          }
        })
        coordinator.on('retry', (job: UploadJob, attempt: number) => {
          LogService.uploadRetry(ctx.log, CLI_SESSION, job.file.name, attempt)
        })

        const totalBytes = files.reduce((sum, f) => sum + f.size, 0)
        console.log(
          chalk.blue(`Uploading ${files.length} file(s), ${formatFileSize(totalBytes)}, ${coordinator.maxConcurrent} at a time...`)
        )

        const jobs = await coordinator.runAll(coordinator.enqueue(files), { signal: ctx.signal })
        const succeeded = jobs.filter((j) => j.state === 'succeeded')
        const failed = jobs.filter((j) => j.state === 'failed')
        const cancelled = jobs.filter((j) => j.state === 'cancelled')

        if (options.removeUploaded && succeeded.length > 0) {
          const removal = await LocalArtifacts.remove(succeeded.map((j) => j.file.path))
          for (const f of removal.failed) {
            ctx.log.log(CLI_SESSION, 'warning', 'system', `Cannot remove ${f.path}: ${f.error}`)
          }
          console.log(chalk.dim(`Removed ${removal.removed.length} uploaded file(s).`))
        }

        const line = `${succeeded.length} uploaded, ${failed.length} failed, ${cancelled.length} cancelled`
        console.log(failed.length > 0 ? chalk.yellow(line) : chalk.green(line))
        if (failed.length > 0) process.exitCode = 1
      } catch (error) {
        fail('Upload failed:', error)
      }
    })
}
