import { Command } from 'commander'
import chalk from 'chalk'
import { createInterface } from 'readline/promises'
import { createContext, fail } from './context'
import type { AppSettings } from '../types/settings'
import { InvalidInputError } from '../errors'
import { EDITABLE_KEYS, isSecretKey, parseSettingValue } from '../utils/settingValue'

const SECRET_NAMES = ['api-token', 'host-password'] as const
type SecretName = (typeof SECRET_NAMES)[number]

function isSecretName(value: string): value is SecretName {
  return SECRET_NAMES.some((name) => name === value)
}

/** Settings as printed by `config show`; secrets only show whether they are set */
export function describeSettings(settings: AppSettings): Array<[string, string]> {
  return Object.entries(settings).map(([key, value]): [string, string] => {
    if (isSecretKey(key)) return [key, value ? '(set)' : '(not set)']
    return [key, String(value)]
  })
}

async function promptSecret(label: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    return (await rl.question(`${label}: `)).trim()
  } finally {
    rl.close()
  }
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Show and edit settings')

  config
    .command('show')
    .description('Print the current settings')
    .action(() => {
      try {
        const ctx = createContext()
        console.log(chalk.dim(ctx.settings.path))
        for (const [key, value] of describeSettings(ctx.settings.getAll())) {
          console.log(`  ${key.padEnd(24)} ${value}`)
        }
      } catch (error) {
        fail('Cannot read settings:', error)
      }
    })

  config
    .command('set <key> <value>')
    .description(`Change one setting (${EDITABLE_KEYS.join(', ')})`)
    .action((key: string, value: string) => {
      try {
        const ctx = createContext()
        ctx.settings.update(parseSettingValue(key, value))
        console.log(chalk.green(`${key} updated.`))
      } catch (error) {
        fail('Cannot update setting:', error)
      }
    })

  config
    .command('set-secret <name> [value]')
    .description('Store an encrypted secret: api-token or host-password (prompted when omitted)')
    .action(async (name: string, value: string | undefined) => {
      try {
        if (!isSecretName(name)) {
          throw new InvalidInputError(`Unknown secret: ${name} (expected ${SECRET_NAMES.join(' or ')})`)
        }
        const secret = value ?? (await promptSecret(name))
        const ctx = createContext()

        if (name === 'api-token') ctx.credentials.setApiToken(secret)
        else ctx.credentials.setHostPassword(secret)

        console.log(chalk.green(secret ? `${name} stored.` : `${name} cleared.`))
      } catch (error) {
        fail('Cannot store secret:', error)
      }
    })

  config
    .command('reset')
    .description('Restore default settings (secrets are cleared too)')
    .action(() => {
      try {
        createContext().settings.reset()
        console.log(chalk.green('Settings reset.'))
      } catch (error) {
        fail('Cannot reset settings:', error)
      }
    })
}
