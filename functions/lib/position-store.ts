/**
 * SQLite-backed storage for the position cache.
 */

import { and, eq, gte } from 'drizzle-orm'
import type { Database } from '../../shared/db/client'
import { positionMovesSchema } from '../../shared/db/json-schemas'
import { positions } from '../../shared/db/schema'
import type { Player } from './game'
import type { PositionRecord, PositionStore } from './position-cache'

export class DrizzlePositionStore implements PositionStore {
  constructor(private readonly db: Database) {}

  async findDepth(hash: bigint, player: Player): Promise<number | null> {
    const rows = await this.db
      .select({ depth: positions.depth })
      .from(positions)
      .where(and(eq(positions.hash, hash), eq(positions.player, player)))
      .limit(1)

    return rows.length > 0 ? rows[0].depth : null
  }

  async find(hash: bigint, player: Player, minDepth: number): Promise<PositionRecord | null> {
    const rows = await this.db
      .select({ depth: positions.depth, moves: positions.moves })
      .from(positions)
      .where(
        and(eq(positions.hash, hash), eq(positions.player, player), gte(positions.depth, minDepth))
      )
      .limit(1)

    if (rows.length === 0) {
      return null
    }

    return {
      hash,
      player,
      depth: rows[0].depth,
      moves: positionMovesSchema.parse(rows[0].moves),
    }
  }

  async upsert(record: PositionRecord): Promise<void> {
    const now = Date.now()
    await this.db
      .insert(positions)
      .values({
        hash: record.hash,
        player: record.player,
        depth: record.depth,
        moves: record.moves,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: [positions.hash, positions.player],
        set: { depth: record.depth, moves: record.moves, updatedAt: now },
      })
  }
}
