import { Command } from 'commander'
import { register } from './commands/flag_commands.ts'

const program = new Command()
  .name('flag')
  .description('Manage feature flags and their user/group overrides')

register(program)

await program.parseAsync(process.argv)
