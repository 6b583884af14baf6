/**
 * Test utilities
 *
 * Provides:
 * - In-memory PositionStore implementation
 * - Board builders from compact row strings
 * - Request/context helpers for testing handlers
 */

import type { BotDependencies } from './bot'
import type { Env, RequestContext } from './context'
import { type Board, type Cell, type Player, BLACK, EMPTY, WHITE, createBoard } from './game'
import { PositionCache, type PositionRecord, type PositionStore } from './position-cache'
import { type RandomSource, createSeededRandom } from './random'
import { ZobristHasher } from './zobrist'

/**
 * In-memory mock implementation of PositionStore
 */
export class MemoryPositionStore implements PositionStore {
  private records: Map<string, PositionRecord> = new Map()

  // Track backend calls for verification
  private calls: string[] = []

  /** When set, every call rejects with this error */
  failWith: Error | null = null

  private key(hash: bigint, player: Player): string {
    return `${hash}:${player}`
  }

  private check(call: string): void {
    this.calls.push(call)
    if (this.failWith) throw this.failWith
  }

  async findDepth(hash: bigint, player: Player): Promise<number | null> {
    this.check('findDepth')
    return this.records.get(this.key(hash, player))?.depth ?? null
  }

  async find(hash: bigint, player: Player, minDepth: number): Promise<PositionRecord | null> {
    this.check('find')
    const record = this.records.get(this.key(hash, player))
    if (!record || record.depth < minDepth) return null
    return { ...record, moves: { ...record.moves } }
  }

  async upsert(record: PositionRecord): Promise<void> {
    this.check('upsert')
    this.records.set(this.key(record.hash, record.player), { ...record, moves: { ...record.moves } })
  }

  // Internal methods for the mock
  _get(hash: bigint, player: Player): PositionRecord | undefined {
    return this.records.get(this.key(hash, player))
  }

  _put(record: PositionRecord): void {
    this.records.set(this.key(record.hash, record.player), record)
  }

  _size(): number {
    return this.records.size
  }

  _getCalls(): string[] {
    return this.calls
  }
}

const CELL_CHARS: Record<string, Cell> = {
  '.': EMPTY,
  B: BLACK,
  W: WHITE,
}

/**
 * Builds a board from 8 strings of 8 characters: 'B' black, 'W' white, '.' empty.
 */
export function boardFromRows(rows: string[]): Board {
  return createBoard(
    rows.map((row) =>
      [...row].map((char) => {
        const cell = CELL_CHARS[char]
        if (cell === undefined) throw new Error(`Unknown cell character: ${char}`)
        return cell
      })
    )
  )
}

/**
 * Bot dependencies with a seeded random source and an optional in-memory store.
 */
export function createTestBotDependencies(
  options: { store?: PositionStore | null; searchDepth?: number; random?: RandomSource } = {}
): BotDependencies {
  return {
    hasher: new ZobristHasher(),
    cache: new PositionCache(options.store ?? null),
    searchDepth: options.searchDepth ?? 2,
    random: options.random ?? createSeededRandom(7),
  }
}

export function createTestEnv(
  options: { store?: PositionStore | null; searchDepth?: number; random?: RandomSource } = {}
): Env {
  return { bot: createTestBotDependencies(options) }
}

/**
 * Create a JSON POST request
 */
export function createMockRequest(url: string, body: unknown): Request {
  return new Request(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })
}

export function createMockContext(env: Env, request: Request): RequestContext {
  return { request, env }
}

/**
 * Parse a JSON object response body
 */
export async function readJson(response: Response): Promise<Record<string, unknown>> {
  const data: unknown = await response.json()
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Expected a JSON object response')
  }
  return Object.fromEntries(Object.entries(data))
}
