import { Command } from 'commander'
import { upCommand } from './up.js'
import { downCommand } from './down.js'

export function migrateCommand(): Command {
  return new Command('migrate')
    .description('Manage the store schema')
    .addCommand(upCommand())
    .addCommand(downCommand())
}
