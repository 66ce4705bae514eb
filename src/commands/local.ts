import { Command } from 'commander'
import chalk from 'chalk'
import { CLI_SESSION, createContext, fail, type CommandContext } from './context'
import { LocalArtifacts } from '../services/LocalArtifacts'
import type { LocalFile } from '../types/remote'
import { InvalidInputError } from '../errors'
import { formatFileSize } from '../utils/fileSize'

interface LocalOptions {
  localDir?: string
  pattern?: string
}

/**
 * Pick files from a local scan by name or path; no names selects all of them.
 * Unknown names reject so a typo never widens the selection.
 */
export function selectLocalFiles(files: LocalFile[], names: string[]): LocalFile[] {
  if (names.length === 0) return files

  return names.map((name) => {
    const match = files.find((f) => f.path === name || f.name === name)
    if (!match) throw new InvalidInputError(`No local artifact named ${name}`)
    return match
  })
}

async function scan(ctx: CommandContext, names: string[]): Promise<LocalFile[]> {
  const files = await LocalArtifacts.list(ctx.config.localDirectory, ctx.config.artifactPattern)
  return selectLocalFiles(files, names)
}

function contextFor(options: LocalOptions): CommandContext {
  return createContext({ localDirectory: options.localDir, artifactPattern: options.pattern })
}

function reportRemovalFailures(ctx: CommandContext, failed: Array<{ path: string; error: string }>): void {
  for (const f of failed) {
    ctx.log.log(CLI_SESSION, 'warning', 'system', `Cannot remove ${f.path}: ${f.error}`)
  }
  if (failed.length > 0) process.exitCode = 1
}

export function registerLocalCommands(program: Command): void {
  const local = program.command('local').description('Manage artifacts already copied to this machine')

  local
    .command('list')
    .description('List local artifacts')
    .option('--local-dir <dir>', 'Directory to scan')
    .option('--pattern <glob>', 'Artifact file name pattern')
    .action(async (options: LocalOptions) => {
      try {
        const ctx = contextFor(options)
        const files = await scan(ctx, [])
        for (const f of files) console.log(`${f.path}  ${chalk.dim(formatFileSize(f.size))}`)
        console.log(chalk.dim(`${files.length} file(s) in ${ctx.config.localDirectory}`))
      } catch (error) {
        fail('Cannot list local artifacts:', error)
      }
    })

  local
    .command('archive [files...]')
    .description('Zip local artifacts into <YYYY-MM-DD>.zip, then delete the originals (default: all)')
    .option('--local-dir <dir>', 'Directory to scan')
    .option('--pattern <glob>', 'Artifact file name pattern')
    .option('--overwrite', 'Replace an existing archive of the same name')
    .action(async (names: string[], options: LocalOptions & { overwrite?: boolean }) => {
      try {
        const ctx = contextFor(options)
        const files = await scan(ctx, names)
        if (files.length === 0) {
          console.log(chalk.yellow(`No files matching ${ctx.config.artifactPattern} in ${ctx.config.localDirectory}.`))
          return
        }

        const result = await LocalArtifacts.archive(
          files.map((f) => f.path),
          ctx.config.localDirectory,
          { overwrite: options.overwrite }
        )
        ctx.log.log(CLI_SESSION, 'success', 'system', `Archived ${result.archived.length} file(s) to ${result.archivePath}`)
        reportRemovalFailures(ctx, result.removal.failed)
        console.log(chalk.green(`Archived to ${result.archivePath}, removed ${result.removal.removed.length} source file(s).`))
      } catch (error) {
        fail('Archive failed:', error)
      }
    })

  local
    .command('delete [files...]')
    .description('Delete local artifacts (default: all)')
    .option('--local-dir <dir>', 'Directory to scan')
    .option('--pattern <glob>', 'Artifact file name pattern')
    .action(async (names: string[], options: LocalOptions) => {
      try {
        const ctx = contextFor(options)
        const files = await scan(ctx, names)
        const removal = await LocalArtifacts.remove(files.map((f) => f.path))
        reportRemovalFailures(ctx, removal.failed)
        console.log(chalk.green(`Removed ${removal.removed.length} file(s).`))
      } catch (error) {
        fail('Delete failed:', error)
      }
    })
}
