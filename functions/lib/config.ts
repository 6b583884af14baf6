/**
 * Environment configuration
 *
 * Read once at startup. `dotenv` fills `process.env` from a local .env file
 * before `loadConfig` validates it.
 */

import { z } from 'zod'
import { DEFAULT_ZOBRIST_SEED } from './zobrist'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).optional(),
  SEARCH_DEPTH: z.coerce.number().int().min(1).max(10).default(6),
  ZOBRIST_SEED: z.coerce.number().int().default(DEFAULT_ZOBRIST_SEED),
  CORS_ORIGINS: z.string().min(1).default('*'),
  LOG_REQUESTS: booleanFlag.default('false'),
})

export interface AppConfig {
  port: number
  host: string
  /** SQLite file for the position cache; null disables the cache */
  databasePath: string | null
  searchDepth: number
  zobristSeed: number
  /** '*' or an explicit list of allowed origins */
  corsOrigins: '*' | string[]
  logRequests: boolean
}

/**
 * Validates the environment and maps it to application config.
 *
 * @throws Error naming the first invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.errors[0]
    throw new Error(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`)
  }

  const data = parsed.data
  const origins = data.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0)

  return {
    port: data.PORT,
    host: data.HOST,
    databasePath: data.DATABASE_PATH ?? null,
    searchDepth: data.SEARCH_DEPTH,
    zobristSeed: data.ZOBRIST_SEED,
    corsOrigins: origins.includes('*') ? '*' : origins,
    logRequests: data.LOG_REQUESTS,
  }
}
