import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import type { ScoredMove } from './ai-engine'
import {
  PositionCache,
  type PositionKey,
  deserializeMoveScores,
  formatMoveKey,
  parseMoveKey,
  serializeMoveScores,
} from './position-cache'
import { MemoryPositionStore } from './test-utils'

const KEY: PositionKey = { hash: 123456789012345678n, player: 1 }

const MOVES: ScoredMove[] = [
  { move: { row: 2, col: 3 }, score: 1.5 },
  { move: { row: 5, col: 4 }, score: -0.25 },
]

describe('move keys', () => {
  it('formats moves as "(row,col)"', () => {
    expect(formatMoveKey({ row: 2, col: 3 })).toBe('(2,3)')
  })

  it('parses every board cell back from its key', () => {
    for (let row = 0; row < 8; row++) {
      for (let col = 0; col < 8; col++) {
        expect(parseMoveKey(formatMoveKey({ row, col }))).toEqual({ row, col })
      }
    }
  })

  it('rejects malformed or off-board keys', () => {
    expect(parseMoveKey('2,3')).toBeNull()
    expect(parseMoveKey('(2, 3)')).toBeNull()
    expect(parseMoveKey('(8,0)')).toBeNull()
    expect(parseMoveKey('(a,b)')).toBeNull()
  })

  it('serializes scores keyed by move', () => {
    expect(serializeMoveScores(MOVES)).toEqual({ '(2,3)': 1.5, '(5,4)': -0.25 })
  })

  it('drops unparsable entries when deserializing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(deserializeMoveScores({ '(2,3)': 1.5, bogus: 9, '(5,4)': -0.25 })).toEqual(MOVES)
    expect(warn).toHaveBeenCalledWith('deserializeMoveScores: skipping malformed entry bogus')
    warn.mockRestore()
  })
})

describe('PositionCache', () => {
  let store: MemoryPositionStore
  let cache: PositionCache

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    store = new MemoryPositionStore()
    cache = new PositionCache(store)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('without a backend', () => {
    it('is unavailable, misses and refuses to store', async () => {
      const detached = new PositionCache(null)
      expect(detached.isAvailable()).toBe(false)
      expect(await detached.lookup(KEY, 1)).toBeNull()
      expect(await detached.store(KEY, 4, MOVES)).toBe(false)
    })
  })

  describe('lookup', () => {
    it('misses on an empty store', async () => {
      expect(cache.isAvailable()).toBe(true)
      expect(await cache.lookup(KEY, 1)).toBeNull()
    })

    it('returns stored moves in order', async () => {
      await cache.store(KEY, 4, MOVES)
      expect(await cache.lookup(KEY, 4)).toEqual({ depth: 4, moves: MOVES })
    })

    it('misses when the entry is shallower than required', async () => {
      await cache.store(KEY, 4, MOVES)
      expect(await cache.lookup(KEY, 5)).toBeNull()
    })

    it('keeps the side to move apart', async () => {
      await cache.store(KEY, 4, MOVES)
      expect(await cache.lookup({ hash: KEY.hash, player: -1 }, 1)).toBeNull()
    })

    it('treats an entry with no usable moves as a miss', async () => {
      store._put({ hash: KEY.hash, player: KEY.player, depth: 6, moves: { junk: 1 } })
      expect(await cache.lookup(KEY, 1)).toBeNull()
    })

    it('treats backend failures as a miss', async () => {
      await cache.store(KEY, 4, MOVES)
      store.failWith = new Error('disk I/O error')
      expect(await cache.lookup(KEY, 1)).toBeNull()
      expect(console.error).toHaveBeenCalledWith('PositionCache: lookup failed: disk I/O error')
    })
  })

  describe('store', () => {
    it('writes a new entry', async () => {
      expect(await cache.store(KEY, 4, MOVES)).toBe(true)
      expect(store._get(KEY.hash, KEY.player)).toEqual({
        hash: KEY.hash,
        player: 1,
        depth: 4,
        moves: { '(2,3)': 1.5, '(5,4)': -0.25 },
      })
    })

    it('keeps a deeper entry and still reports success', async () => {
      await cache.store(KEY, 4, MOVES)
      const shallow: ScoredMove[] = [{ move: { row: 0, col: 0 }, score: 9 }]

      expect(await cache.store(KEY, 3, shallow)).toBe(true)
      expect(await cache.lookup(KEY, 1)).toEqual({ depth: 4, moves: MOVES })
    })

    it('keeps an entry of equal depth', async () => {
      await cache.store(KEY, 4, MOVES)
      const same: ScoredMove[] = [{ move: { row: 0, col: 0 }, score: 9 }]

      expect(await cache.store(KEY, 4, same)).toBe(true)
      expect(await cache.lookup(KEY, 4)).toEqual({ depth: 4, moves: MOVES })
    })

    it('replaces a shallower entry', async () => {
      await cache.store(KEY, 4, MOVES)
      const deeper: ScoredMove[] = [{ move: { row: 4, col: 5 }, score: 2 }]

      expect(await cache.store(KEY, 5, deeper)).toBe(true)
      expect(await cache.lookup(KEY, 5)).toEqual({ depth: 5, moves: deeper })
      expect(store._size()).toBe(1)
    })

    it('checks the existing depth before writing', async () => {
      await cache.store(KEY, 4, MOVES)
      expect(store._getCalls()).toEqual(['findDepth', 'upsert'])
    })

    it('reports false when the backend fails', async () => {
      store.failWith = new Error('database is locked')
      expect(await cache.store(KEY, 4, MOVES)).toBe(false)
      expect(console.error).toHaveBeenCalledWith('PositionCache: store failed: database is locked')
    })
  })
})
