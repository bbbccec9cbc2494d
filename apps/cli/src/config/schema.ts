import { z } from 'zod'

export const DialectSchema = z.enum(['sqlite', 'postgres'])

export const DatabaseConfigSchema = z.object({
  dialect: DialectSchema.default('sqlite'),
  /** Postgres connection string or SQLite file path */
  url: z.string().min(1).default('storelens.sqlite'),
  pool: z
    .object({
      max: z.number().int().positive().default(10),
      connectionTimeoutMillis: z.number().int().positive().default(5000)
    })
    .default({})
})

export const StoreLensConfigSchema = z.object({
  database: DatabaseConfigSchema.default({}),
  /** Per-query timeout in milliseconds */
  queryTimeoutMs: z.number().int().positive().default(30_000)
})

export type StoreLensConfig = z.infer<typeof StoreLensConfigSchema>
export type StoreLensConfigInput = z.input<typeof StoreLensConfigSchema>
