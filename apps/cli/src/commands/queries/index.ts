import { Command } from 'commander'
import { catalog, queryNames } from '@storelens/analytics'
import { logger } from '../../utils/logger.js'
import { formatTable } from '../../utils/table.js'
import type { GlobalOptions } from '../../types.js'

export function queriesCommand(): Command {
  return new Command('queries')
    .description('List the catalog queries')
    .action((_options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>()
      const rows = queryNames.map(name => ({
        name,
        parameters: catalog[name].parameters.join(', '),
        description: catalog[name].description
      }))

      logger.log(opts.json ? JSON.stringify(rows, null, 2) : formatTable(rows))
    })
}
