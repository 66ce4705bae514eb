import { Command } from 'commander'
import chalk from 'chalk'
import { CLI_SESSION, createApiClient, createContext, fail, type CommandContext } from './context'
import { LogService } from '../services/LogService'
import { TransactionCoordinator } from '../services/TransactionCoordinator'
import type { DownloadStatusEvent, TransactionRecord } from '../types/transaction'
import type { UserStats } from '../types/api'

function createCoordinator(ctx: CommandContext): TransactionCoordinator {
  const coordinator = new TransactionCoordinator({
    api: createApiClient(ctx),
    credentials: ctx.credentials.getApiCredentials(),
    retry: ctx.config.retry
  })

  coordinator.on('update', (event: DownloadStatusEvent) => {
    switch (event.state) {
      case 'downloading':
        if (event.attempt > 1) {
          ctx.log.log(CLI_SESSION, 'warning', 'api', `Retrying overlay ${event.transactionId} (attempt ${event.attempt})`)
        } else {
          ctx.log.log(CLI_SESSION, 'info', 'api', `Downloading overlay ${event.transactionId}...`)
        }
        break
      case 'downloaded':
        ctx.log.log(CLI_SESSION, 'success', 'api', `Saved ${event.path ?? event.transactionId}`)
        break
      case 'failed':
        LogService.apiError(ctx.log, CLI_SESSION, `${event.transactionId}: ${event.error ?? 'download failed'}`)
        break
      case 'cancelled':
        ctx.log.log(CLI_SESSION, 'warning', 'api', `Skipped ${event.transactionId} (cancelled)`)
        break
    }
  })
  return coordinator
}

/** One table row per transaction */
export function formatTransaction(record: TransactionRecord): string {
  const discovered = record.discovered !== undefined ? String(record.discovered) : '-'
  const state = record.downloadState === 'downloaded' ? 'downloaded' : ''
  return [record.transactionId.padEnd(20), record.status.padEnd(12), discovered.padStart(8), ' ', state].join(' ').trimEnd()
}

function formatRank(current: number | null, previous: number | null): string {
  if (current === null) return '-'
  if (previous === null || previous === current) return String(current)
  const diff = previous - current
  return `${current} (${diff > 0 ? '+' : ''}${diff})`
}

export function formatStats(stats: UserStats): string[] {
  return [
    `Discovered networks: ${stats.discovered}`,
    `Total locations:     ${stats.totalLocations}`,
    `Monthly rank:        ${formatRank(stats.monthRank, stats.previousMonthRank)}`,
    `Overall rank:        ${formatRank(stats.rank, stats.previousRank)}`
  ]
}

export function registerTransactionCommands(program: Command): void {
  program
    .command('stats')
    .description('Show account statistics from the ingestion API')
    .action(async () => {
      try {
        const ctx = createContext()
        const stats = await createApiClient(ctx).getUserStats(ctx.credentials.getApiCredentials(), ctx.signal)
        for (const line of formatStats(stats)) console.log(line)
      } catch (error) {
        fail('Cannot load statistics:', error)
      }
    })

  const tx = program.command('tx').description('Query uploaded transactions and download their overlays')

  tx.command('query <from> <to>')
    .description('List transactions between two dates (YYYYMMDD, inclusive)')
    .action(async (from: string, to: string) => {
      try {
        const ctx = createContext()
        const records = await createCoordinator(ctx).query(from, to, {
          overlayDir: ctx.config.overlayDirectory,
          signal: ctx.signal
        })

        if (records.length === 0) {
          console.log(chalk.yellow('No transactions in that range.'))
          return
        }
        for (const record of records) console.log(formatTransaction(record))
        console.log(chalk.dim(`${records.length} transaction(s)`))
      } catch (error) {
        fail('Query failed:', error)
      }
    })

  tx.command('download <from> <to>')
    .description('Download overlay files for transactions between two dates')
    .option('--new', 'Only transactions whose overlay is not downloaded yet')
    .action(async (from: string, to: string, options: { new?: boolean }) => {
      try {
        const ctx = createContext()
        const coordinator = createCoordinator(ctx)
        const overlayDir = ctx.config.overlayDirectory

        const records = await coordinator.query(from, to, { overlayDir, signal: ctx.signal })
        const selected = options.new ? coordinator.selectNew(records) : records
        if (selected.length === 0) {
          console.log(chalk.yellow('Nothing to download.'))
          return
        }

        await coordinator.downloadSelected(selected, overlayDir, { signal: ctx.signal })
        const downloaded = selected.filter((r) => r.downloadState === 'downloaded').length
        const failed = selected.filter((r) => r.downloadState === 'failed').length

        const line = `${downloaded} downloaded, ${failed} failed`
        console.log(failed > 0 ? chalk.yellow(line) : chalk.green(line))
        if (failed > 0) process.exitCode = 1
      } catch (error) {
        fail('Download failed:', error)
      }
    })
}
