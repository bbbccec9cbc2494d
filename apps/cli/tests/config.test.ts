/**
 * Tests for configuration loading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig } from '../src/config/loader.js'
import { ConfigurationError } from '../src/utils/errors.js'

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'storelens-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} })

    expect(config).toEqual({
      database: {
        dialect: 'sqlite',
        url: 'storelens.sqlite',
        pool: { max: 10, connectionTimeoutMillis: 5000 }
      },
      queryTimeoutMs: 30000
    })
  })

  it('finds .storelensrc.json in the working directory', async () => {
    await writeFile(
      join(dir, '.storelensrc.json'),
      JSON.stringify({
        database: { dialect: 'postgres', url: 'postgres://localhost/store', pool: { max: 4 } },
        queryTimeoutMs: 1500
      })
    )

    const config = await loadConfig({ cwd: dir, env: {} })

    expect(config).toEqual({
      database: {
        dialect: 'postgres',
        url: 'postgres://localhost/store',
        pool: { max: 4, connectionTimeoutMillis: 5000 }
      },
      queryTimeoutMs: 1500
    })
  })

  it('reads the storelens key of package.json', async () => {
    await writeFile(
      join(dir, 'package.json'),
      JSON.stringify({ name: 'shop', storelens: { database: { url: 'shop.sqlite' } } })
    )

    const config = await loadConfig({ cwd: dir, env: {} })

    expect(config.database.url).toBe('shop.sqlite')
  })

  it('loads an explicit config path', async () => {
    await writeFile(join(dir, 'custom.json'), JSON.stringify({ queryTimeoutMs: 250 }))

    const config = await loadConfig({ cwd: dir, configPath: 'custom.json', env: {} })

    expect(config.queryTimeoutMs).toBe(250)
  })

  it('overlays DATABASE_URL and DATABASE_DIALECT', async () => {
    await writeFile(join(dir, '.storelensrc.json'), JSON.stringify({ database: { url: 'file.sqlite' } }))

    const config = await loadConfig({
      cwd: dir,
      env: { DATABASE_URL: 'postgres://db.internal/store', DATABASE_DIALECT: 'postgres' }
    })

    expect(config.database.url).toBe('postgres://db.internal/store')
    expect(config.database.dialect).toBe('postgres')
  })

  it('lists every invalid field', async () => {
    await writeFile(
      join(dir, '.storelensrc.json'),
      JSON.stringify({ database: { dialect: 'oracle' }, queryTimeoutMs: -5 })
    )

    const error = await loadConfig({ cwd: dir, env: {} }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigurationError)
    expect(error).toMatchObject({
      errors: [
        "database.dialect: Invalid enum value. Expected 'sqlite' | 'postgres', received 'oracle'",
        'queryTimeoutMs: Number must be greater than 0'
      ]
    })
  })

  it('rejects an unsupported DATABASE_DIALECT', async () => {
    await expect(loadConfig({ cwd: dir, env: { DATABASE_DIALECT: 'oracle' } })).rejects.toThrow(
      'Unsupported DATABASE_DIALECT "oracle"'
    )
  })

  it('reports a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'missing.json', env: {} })).rejects.toThrow(
      ConfigurationError
    )
  })
})
