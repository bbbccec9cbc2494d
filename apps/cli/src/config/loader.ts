import { resolve } from 'node:path'
import { cosmiconfig } from 'cosmiconfig'
import {
  DialectSchema,
  StoreLensConfigSchema,
  type StoreLensConfig,
  type StoreLensConfigInput
} from './schema.js'
import { ConfigurationError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

const MODULE_NAME = 'storelens'

export const SEARCH_PLACES = [
  'package.json',
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.mjs`
]

export interface LoadConfigOptions {
  /** Explicit config file; otherwise the search starts at `cwd` */
  configPath?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
}

async function readConfigFile(options: LoadConfigOptions): Promise<unknown> {
  const cwd = options.cwd ?? process.cwd()
  const explorer = cosmiconfig(MODULE_NAME, { searchPlaces: SEARCH_PLACES })

  if (options.configPath) {
    const filePath = resolve(cwd, options.configPath)
    try {
      const result = await explorer.load(filePath)
      return result?.config ?? {}
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load configuration from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        [],
        ['Check that the file exists and is valid JSON or JavaScript']
      )
    }
  }

  const result = await explorer.search(cwd)
  if (!result) {
    logger.debug('No configuration file found, using defaults')
    return {}
  }
  logger.debug(`Using configuration from ${result.filepath}`)
  return result.config
}

/**
 * Load configuration: file (or defaults), then `DATABASE_URL` and
 * `DATABASE_DIALECT` from the environment, then validation.
 *
 * @throws ConfigurationError listing every invalid field
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StoreLensConfig> {
  const env = options.env ?? process.env
  const raw = await readConfigFile(options)

  const validation = StoreLensConfigSchema.safeParse(raw)
  if (!validation.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      ['Fix the listed fields in your storelens configuration']
    )
  }

  const config = validation.data
  const url = env['DATABASE_URL']
  if (url) {
    config.database.url = url
  }

  const dialect = env['DATABASE_DIALECT']
  if (dialect) {
    const parsed = DialectSchema.safeParse(dialect)
    if (!parsed.success) {
      throw new ConfigurationError(`Unsupported DATABASE_DIALECT "${dialect}"`, [], [
        `Use one of: ${DialectSchema.options.join(', ')}`
      ])
    }
    config.database.dialect = parsed.data
  }

  return config
}

/**
 * Typed helper for `storelens.config.js`.
 */
export function defineConfig(config: StoreLensConfigInput): StoreLensConfigInput {
  return config
}
