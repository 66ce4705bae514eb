#!/usr/bin/env tsx

/**
 * capture-sync CLI: drives the capture host and the ingestion API
 */

import { Command } from 'commander'
import { createRequire } from 'module'
import { installInterruptHandler } from './commands/context'
import { registerConfigCommand } from './commands/config'
import { registerDeviceCommands } from './commands/device'
import { registerSyncCommands } from './commands/sync'
import { registerUploadCommand } from './commands/upload'
import { registerLocalCommands } from './commands/local'
import { registerTransactionCommands } from './commands/transactions'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

const program = new Command()

program
  .name('capture-sync')
  .description('Sync capture files from a remote survey device to the ingestion API')
  .version(pkg.version)

registerConfigCommand(program)
registerDeviceCommands(program)
registerSyncCommands(program)
registerUploadCommand(program)
registerLocalCommands(program)
registerTransactionCommands(program)

installInterruptHandler()
await program.parseAsync(process.argv)
