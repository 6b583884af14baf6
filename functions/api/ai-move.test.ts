import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { onRequestPost } from './ai-move'
import type { Env } from '../lib/context'
import { createInitialBoard, getValidMoves } from '../lib/game'
import {
  MemoryPositionStore,
  boardFromRows,
  createMockContext,
  createMockRequest,
  createTestEnv,
  readJson,
} from '../lib/test-utils'

const ENDPOINT = 'https://example.com/api/ai-move'
const EMPTY_ROW = '........'

async function post(env: Env, body: unknown): Promise<Response> {
  return onRequestPost(createMockContext(env, createMockRequest(ENDPOINT, body)))
}

describe('POST /api/ai-move', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('plays a legal move at the default difficulty', async () => {
    const board = createInitialBoard()
    const response = await post(createTestEnv(), { board, player: 1 })

    expect(response.status).toBe(200)

    const data = await readJson(response)
    expect(getValidMoves(board, 1)).toContainEqual(data.move)
    expect(data).toMatchObject({
      nextPlayer: -1,
      gameOver: false,
      winner: null,
      cache: { hit: false, source: 'search', depth: 2, available: false },
    })
  })

  it('reports cache hits on repeated positions', async () => {
    const env = createTestEnv({ store: new MemoryPositionStore() })
    const body = { board: createInitialBoard(), player: 1, difficulty: 'hard' }

    const first = await readJson(await post(env, body))
    const second = await readJson(await post(env, body))

    expect(first.cache).toEqual({ hit: false, source: 'search', depth: 2, available: true })
    expect(second.cache).toEqual({ hit: true, source: 'cache', depth: 2, available: true })
    expect(second.move).toEqual(first.move)
  })

  it('plays a forced move and finishes the game', async () => {
    const board = boardFromRows(['BW......', ...Array<string>(7).fill(EMPTY_ROW)])
    const response = await post(createTestEnv(), { board, player: 1, difficulty: 'easy' })

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({
      move: { row: 0, col: 2 },
      nextPlayer: null,
      validMoves: [],
      gameOver: true,
      winner: 1,
      cache: { hit: false, source: 'forced', depth: 0, available: false },
    })
  })

  it('accepts difficulty labels in any case', async () => {
    const response = await post(createTestEnv(), {
      board: createInitialBoard(),
      player: -1,
      difficulty: 'EXPERT',
    })

    expect(response.status).toBe(200)
  })

  it('returns 409 when the player has no legal moves', async () => {
    const board = boardFromRows(['BB......', ...Array<string>(7).fill(EMPTY_ROW)])
    const response = await post(createTestEnv(), { board, player: 1 })

    expect(response.status).toBe(409)
    expect(await response.json()).toEqual({ error: 'No legal moves for player' })
  })

  it('rejects an unknown difficulty', async () => {
    const response = await post(createTestEnv(), {
      board: createInitialBoard(),
      player: 1,
      difficulty: 'insane',
    })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({
      error: 'Validation error',
      details: 'Difficulty must be one of: easy, medium, hard, expert',
    })
  })

  it('rejects a board with invalid cells', async () => {
    const board = createInitialBoard().map((row) => row.map((cell): number => cell))
    board[0][0] = 3
    const response = await post(createTestEnv(), { board, player: 1 })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({
      error: 'Validation error',
      details: 'Cells must be -1, 0 or 1',
    })
  })
})
