/**
 * Persistent position cache
 *
 * Stores root move scores per (Zobrist hash, side to move) with depth
 * dominance: a shallower result never replaces a deeper one. The backend is
 * optional; without one every lookup misses and every store is a no-op.
 */

import type { ScoredMove } from './ai-engine'
import { getErrorMessage } from './errors'
import { type Move, type Player, isInBounds } from './game'

export interface PositionKey {
  hash: bigint
  player: Player
}

export interface CacheEntry {
  depth: number
  moves: ScoredMove[]
}

/**
 * Persisted record: move scores keyed by "(row,col)".
 */
export interface PositionRecord {
  hash: bigint
  player: Player
  depth: number
  moves: Record<string, number>
}

/**
 * Storage backend for the cache.
 */
export interface PositionStore {
  /** Depth of the stored entry for the key, or null if none exists */
  findDepth(hash: bigint, player: Player): Promise<number | null>
  /** Stored entry for the key when its depth is at least `minDepth` */
  find(hash: bigint, player: Player, minDepth: number): Promise<PositionRecord | null>
  /** Inserts or replaces the entry for the record's key */
  upsert(record: PositionRecord): Promise<void>
}

// ============================================================================
// MOVE KEYS
// ============================================================================

const MOVE_KEY_PATTERN = /^\((\d+),(\d+)\)$/

/**
 * Formats a move as its persisted key, e.g. "(2,3)".
 */
export function formatMoveKey(move: Move): string {
  return `(${move.row},${move.col})`
}

/**
 * Parses a persisted key back into a move. Returns null for anything that is
 * not exactly "(row,col)" on the board.
 */
export function parseMoveKey(key: string): Move | null {
  const match = MOVE_KEY_PATTERN.exec(key)
  if (!match) return null
  const row = Number(match[1])
  const col = Number(match[2])
  return isInBounds(row, col) ? { row, col } : null
}

export function serializeMoveScores(moves: readonly ScoredMove[]): Record<string, number> {
  const record: Record<string, number> = {}
  for (const { move, score } of moves) {
    record[formatMoveKey(move)] = score
  }
  return record
}

/**
 * Converts a persisted map back to an ordered list, dropping unparsable keys.
 */
export function deserializeMoveScores(record: Record<string, number>): ScoredMove[] {
  const moves: ScoredMove[] = []
  for (const [key, score] of Object.entries(record)) {
    const move = parseMoveKey(key)
    if (move === null) {
      console.warn(`deserializeMoveScores: skipping malformed entry ${key}`)
      continue
    }
    moves.push({ move, score })
  }
  return moves
}

// ============================================================================
// POSITION CACHE
// ============================================================================

export class PositionCache {
  constructor(private readonly backend: PositionStore | null) {}

  isAvailable(): boolean {
    return this.backend !== null
  }

  /**
   * Returns the cached entry when one exists with depth >= minDepth.
   * Backend failures count as a miss.
   */
  async lookup(key: PositionKey, minDepth: number): Promise<CacheEntry | null> {
    if (!this.backend) {
      return null
    }

    try {
      const record = await this.backend.find(key.hash, key.player, minDepth)
      if (!record) {
        console.log(`PositionCache: miss hash=${key.hash} player=${key.player} minDepth=${minDepth}`)
        return null
      }

      const moves = deserializeMoveScores(record.moves)
      if (moves.length === 0) {
        console.warn(`PositionCache: entry hash=${key.hash} player=${key.player} has no usable moves`)
        return null
      }

      console.log(`PositionCache: hit hash=${key.hash} player=${key.player} depth=${record.depth}`)
      return { depth: record.depth, moves }
    } catch (error) {
      console.error(`PositionCache: lookup failed: ${getErrorMessage(error)}`)
      return null
    }
  }

  /**
   * Stores move scores for a position unless an entry at equal or greater
   * depth already exists. A skipped write still reports success; only a
   * missing or failing backend returns false.
   *
   * The depth check and the write are separate backend calls, so two
   * concurrent stores for the same key may both write.
   */
  async store(key: PositionKey, depth: number, moves: readonly ScoredMove[]): Promise<boolean> {
    if (!this.backend) {
      return false
    }

    try {
      const existingDepth = await this.backend.findDepth(key.hash, key.player)
      if (existingDepth !== null && existingDepth >= depth) {
        console.log(
          `PositionCache: keeping depth ${existingDepth} entry, skipping depth ${depth} for hash=${key.hash}`
        )
        return true
      }

      await this.backend.upsert({
        hash: key.hash,
        player: key.player,
        depth,
        moves: serializeMoveScores(moves),
      })
      console.log(`PositionCache: stored hash=${key.hash} player=${key.player} depth=${depth}`)
      return true
    } catch (error) {
      console.error(`PositionCache: store failed: ${getErrorMessage(error)}`)
      return false
    }
  }
}
