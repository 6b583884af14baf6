import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import { sql } from 'drizzle-orm'
import { type Database, createDb } from '../../shared/db/client'
import { positions } from '../../shared/db/schema'
import { createInitialBoard } from './game'
import { PositionCache, type PositionKey } from './position-cache'
import { DrizzlePositionStore } from './position-store'
import { ZobristHasher } from './zobrist'

// Close to the 63-bit ceiling, beyond Number.MAX_SAFE_INTEGER
const LARGE_HASH = (1n << 62n) + 12345n

describe('DrizzlePositionStore', () => {
  let db: Database
  let store: DrizzlePositionStore

  beforeEach(async () => {
    db = await createDb(':memory:')
    store = new DrizzlePositionStore(db)
  })

  it('finds nothing in an empty table', async () => {
    expect(await store.findDepth(LARGE_HASH, 1)).toBeNull()
    expect(await store.find(LARGE_HASH, 1, 0)).toBeNull()
  })

  it('round-trips a record keyed by a large hash', async () => {
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 6, moves: { '(2,3)': 1.5 } })

    expect(await store.findDepth(LARGE_HASH, 1)).toBe(6)
    expect(await store.find(LARGE_HASH, 1, 6)).toEqual({
      hash: LARGE_HASH,
      player: 1,
      depth: 6,
      moves: { '(2,3)': 1.5 },
    })
  })

  it('does not confuse neighbouring hashes', async () => {
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 6, moves: { '(2,3)': 1.5 } })
    expect(await store.findDepth(LARGE_HASH + 1n, 1)).toBeNull()
  })

  it('separates entries by side to move', async () => {
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 6, moves: { '(2,3)': 1 } })
    await store.upsert({ hash: LARGE_HASH, player: -1, depth: 3, moves: { '(2,4)': -1 } })

    expect(await store.findDepth(LARGE_HASH, 1)).toBe(6)
    expect(await store.findDepth(LARGE_HASH, -1)).toBe(3)
  })

  it('filters by minimum depth', async () => {
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 4, moves: { '(2,3)': 1 } })
    expect(await store.find(LARGE_HASH, 1, 5)).toBeNull()
    expect(await store.find(LARGE_HASH, 1, 4)).not.toBeNull()
  })

  it('replaces the row on conflict', async () => {
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 4, moves: { '(2,3)': 1 } })
    await store.upsert({ hash: LARGE_HASH, player: 1, depth: 7, moves: { '(5,4)': 2 } })

    const rows = await db.select({ depth: positions.depth, moves: positions.moves }).from(positions)
    expect(rows).toEqual([{ depth: 7, moves: { '(5,4)': 2 } }])
  })

  it('returns every stored key and leaves key filtering to the cache', async () => {
    await store.upsert({
      hash: LARGE_HASH,
      player: 1,
      depth: 4,
      moves: { '(2,3)': 1, 'not-a-move': 2 },
    })

    expect(await store.find(LARGE_HASH, 1, 0)).toEqual({
      hash: LARGE_HASH,
      player: 1,
      depth: 4,
      moves: { '(2,3)': 1, 'not-a-move': 2 },
    })
  })

  it('rejects stored scores that are not numbers', async () => {
    await db.run(
      sql`INSERT INTO positions (hash, player, depth, moves, updated_at) VALUES (${LARGE_HASH}, 1, 4, '{"(2,3)":"high"}', 0)`
    )

    await expect(store.find(LARGE_HASH, 1, 0)).rejects.toThrow()
  })
})

describe('PositionCache with SQLite', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('persists root scores for a real position hash', async () => {
    const cache = new PositionCache(new DrizzlePositionStore(await createDb(':memory:')))
    const key: PositionKey = { hash: new ZobristHasher().computeHash(createInitialBoard(), 1), player: 1 }
    const moves = [
      { move: { row: 2, col: 3 }, score: 0.5 },
      { move: { row: 3, col: 2 }, score: 0.25 },
    ]

    expect(await cache.store(key, 3, moves)).toBe(true)
    expect(await cache.store(key, 2, [])).toBe(true)
    expect(await cache.lookup(key, 3)).toEqual({ depth: 3, moves })
  })

  it('skips unparsable keys from a stored entry', async () => {
    const store = new DrizzlePositionStore(await createDb(':memory:'))
    const cache = new PositionCache(store)
    const key: PositionKey = { hash: LARGE_HASH, player: -1 }
    await store.upsert({ ...key, depth: 4, moves: { '(2,4)': 1.5, bogus: 9 } })

    expect(await cache.lookup(key, 4)).toEqual({
      depth: 4,
      moves: [{ move: { row: 2, col: 4 }, score: 1.5 }],
    })
    expect(console.warn).toHaveBeenCalledWith('deserializeMoveScores: skipping malformed entry bogus')
  })
})
