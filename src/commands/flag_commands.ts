import { InvalidArgumentError, type Command } from 'commander'
import chalk from 'chalk'
import { bootstrap, shutdown } from '../bootstrap.ts'
import type FlagManager from '../flag_manager.ts'
import { ValidationError } from '../errors.ts'

type Boot = () => Promise<FlagManager>

export function register(program: Command, boot: Boot = bootstrap): void {
  async function withManager(action: (manager: FlagManager) => Promise<void>): Promise<void> {
    let manager: FlagManager | undefined
    try {
      manager = await boot()
      await action(manager)
    } catch (err) {
      console.error(chalk.red(`Error: ${describeError(err)}`))
      process.exitCode = 1
    } finally {
      if (manager) await shutdown(manager)
    }
  }

  program
    .command('flag:setup')
    .description('Create the feature flag tables')
    .action(() =>
      withManager(async manager => {
        console.log(chalk.dim('Creating feature flag tables...'))
        await manager.ensureTables()
        console.log(chalk.green('Feature flag tables created successfully.'))
      })
    )

  program
    .command('flag:list')
    .description('List features with their overrides')
    .action(() =>
      withManager(async manager => {
        const features = await manager.features()

        if (features.length === 0) {
          console.log(chalk.dim('No features defined.'))
          return
        }

        console.log(chalk.bold(`Features (${features.length}):\n`))
        for (const feature of features) {
          const overrides = await manager.overrides(feature.key)
          console.log(
            `  ${chalk.cyan(feature.key)} ${state(feature.defaultEnabled)} ${chalk.dim(
              `(${overrides.length} override${overrides.length === 1 ? '' : 's'})`
            )}`
          )
          if (feature.description) console.log(`    ${chalk.dim(feature.description)}`)
          for (const o of overrides) {
            console.log(
              `    ${chalk.dim(`#${o.id}`)} ${o.targetType} ${o.targetIdentifier} → ${state(o.enabled)}`
            )
          }
        }
      })
    )

  program
    .command('flag:create')
    .description('Create a feature')
    .argument('<key>', 'unique feature key')
    .option('--enabled', 'enable the feature by default', false)
    .option('--description <text>', 'what the feature controls')
    .action((key: string, options: { enabled: boolean; description?: string }) =>
      withManager(async manager => {
        const feature = await manager.createFeature({
          key,
          defaultEnabled: options.enabled,
          description: options.description,
        })
        console.log(chalk.green(`Feature "${feature.key}" created (${onOff(feature.defaultEnabled)}).`))
      })
    )

  program
    .command('flag:default')
    .description("Change a feature's default state")
    .argument('<key>', 'feature key')
    .argument('<state>', 'on or off', parseState)
    .action((key: string, enabled: boolean) =>
      withManager(async manager => {
        await manager.updateFeature(key, { defaultEnabled: enabled })
        console.log(chalk.green(`Feature "${key}" is now ${onOff(enabled)} by default.`))
      })
    )

  program
    .command('flag:delete')
    .description('Delete a feature and all of its overrides')
    .argument('<key>', 'feature key')
    .action((key: string) =>
      withManager(async manager => {
        await manager.deleteFeature(key)
        console.log(chalk.green(`Feature "${key}" deleted.`))
      })
    )

  program
    .command('flag:override')
    .description('Add a user or group override')
    .argument('<key>', 'feature key')
    .argument('<type>', 'User or Group')
    .argument('<identifier>', 'user id or group name')
    .argument('<state>', 'on or off', parseState)
    .action((key: string, targetType: string, targetIdentifier: string, enabled: boolean) =>
      withManager(async manager => {
        const override = await manager.addOverride(key, { targetType, targetIdentifier, enabled })
        console.log(
          chalk.green(
            `Override #${override.id} added: ${override.targetType} ${override.targetIdentifier} → ${onOff(override.enabled)}.`
          )
        )
      })
    )

  program
    .command('flag:unoverride')
    .description('Remove an override')
    .argument('<id>', 'override id', parseId)
    .action((id: number) =>
      withManager(async manager => {
        await manager.removeOverride(id)
        console.log(chalk.green(`Override #${id} removed.`))
      })
    )

  program
    .command('flag:check')
    .description('Evaluate a feature for a user and their groups')
    .argument('<key>', 'feature key')
    .option('--user <id>', 'user id', '')
    .option('--group <names...>', 'group memberships', [])
    .action((key: string, options: { user: string; group: string[] }) =>
      withManager(async manager => {
        const result = await manager.evaluate({
          featureKey: key,
          userId: options.user,
          groups: options.group,
        })
        console.log(`${chalk.cyan(key)} → ${state(result.enabled)} ${chalk.dim(`(${result.reason})`)}`)
      })
    )
}

function parseState(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
      return true
    case 'off':
    case 'false':
      return false
    default:
      throw new InvalidArgumentError('Expected "on" or "off".')
  }
}

function parseId(value: string): number {
  const id = Number(value)
  if (!Number.isInteger(id) || id <= 0) throw new InvalidArgumentError('Expected a positive integer.')
  return id
}

function state(enabled: boolean): string {
  return enabled ? chalk.green('enabled') : chalk.red('disabled')
}

function onOff(enabled: boolean): string {
  return enabled ? 'on' : 'off'
}

function describeError(err: unknown): string {
  if (err instanceof ValidationError) return err.messages.join('; ')
  return err instanceof Error ? err.message : String(err)
}
