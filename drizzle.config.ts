import type { Config } from 'drizzle-kit'
import { toDatabaseUrl } from './shared/db/client'

export default {
  schema: './shared/db/schema.ts',
  out: './drizzle',
  dialect: 'turso',
  dbCredentials: {
    url: toDatabaseUrl(process.env.DATABASE_PATH ?? 'positions.db'),
  },
} satisfies Config
