import { sqliteTable, text, integer, primaryKey, customType } from 'drizzle-orm/sqlite-core'

/**
 * Signed 64-bit INTEGER column read and written as bigint.
 * Zobrist hashes use 63 bits, so they always fit.
 */
const int64 = customType<{ data: bigint; driverData: number | bigint }>({
  dataType() {
    return 'integer'
  },
  toDriver(value) {
    return value
  },
  fromDriver(value) {
    return BigInt(value)
  },
})

// =============================================================================
// Positions Table (AI evaluation cache)
// =============================================================================

export const positions = sqliteTable('positions', {
  hash: int64('hash').notNull(),
  player: integer('player').notNull(), // 1 (black) or -1 (white) to move
  depth: integer('depth').notNull(),
  // JSON object: "(row,col)" -> score
  moves: text('moves', { mode: 'json' }).$type<Record<string, number>>().notNull(),
  updatedAt: integer('updated_at').notNull(),
}, (table) => [
  primaryKey({ columns: [table.hash, table.player] }),
])
