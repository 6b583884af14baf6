import { createClient } from '@libsql/client'
import { drizzle } from 'drizzle-orm/libsql'
import * as schema from './schema'

const CREATE_POSITIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS positions (
    hash INTEGER NOT NULL,
    player INTEGER NOT NULL,
    depth INTEGER NOT NULL,
    moves TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (hash, player)
  )
`

/**
 * Turns a plain file path into a libsql URL. URLs with a scheme and
 * ':memory:' pass through unchanged.
 */
export function toDatabaseUrl(path: string): string {
  if (path === ':memory:' || /^[a-z][a-z0-9+.-]*:/i.test(path)) {
    return path
  }
  return `file:${path}`
}

/**
 * Create a Drizzle database client backed by SQLite, creating the
 * positions table if needed. Pass ':memory:' for a throwaway database.
 *
 * @example
 * ```typescript
 * const db = await createDb(config.databasePath)
 * const store = new DrizzlePositionStore(db)
 * ```
 */
export async function createDb(path: string) {
  const client = createClient({ url: toDatabaseUrl(path) })
  await client.execute(CREATE_POSITIONS_TABLE)
  return drizzle(client, { schema })
}

export type Database = Awaited<ReturnType<typeof createDb>>
