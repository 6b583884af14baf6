/**
 * Server-side Bot AI for Othello
 *
 * Runs one AI turn: reuse cached root scores when a deep enough entry
 * exists, otherwise search and cache the result, then let the difficulty
 * policy pick the move.
 */

import type { Difficulty, MoveResult, ScoredMove } from './ai-engine'
import { selectMoveByDifficulty } from './difficulty'
import { searchPosition } from './engines/negamax-engine'
import { EngineError, getErrorMessage } from './errors'
import { type Board, type Move, type Player, getValidMoves } from './game'
import type { PositionCache, PositionKey } from './position-cache'
import { type RandomSource, pickRandom } from './random'
import type { ZobristHasher } from './zobrist'

/**
 * Long-lived collaborators, constructed once at startup.
 */
export interface BotDependencies {
  hasher: ZobristHasher
  cache: PositionCache
  /** Negamax depth used for fresh searches and required of cache hits */
  searchDepth: number
  random: RandomSource
}

interface ScoreSource {
  moveScores: ScoredMove[]
  cacheHit: boolean
  depth: number
  nodesSearched: number
}

async function loadOrSearch(
  board: Board,
  player: Player,
  key: PositionKey,
  searchDepth: number,
  cache: PositionCache
): Promise<ScoreSource | null> {
  if (cache.isAvailable()) {
    const cached = await cache.lookup(key, searchDepth)
    if (cached) {
      return { moveScores: cached.moves, cacheHit: true, depth: cached.depth, nodesSearched: 0 }
    }
  }

  console.log(`suggestMove: running fresh search at depth ${searchDepth}`)
  const result = searchPosition(board, player, searchDepth)
  if (!result.moveScores || result.moveScores.length === 0) {
    return null
  }

  if (cache.isAvailable()) {
    const stored = await cache.store(key, searchDepth, result.moveScores)
    if (!stored) {
      console.warn('suggestMove: failed to store position in cache')
    }
  }

  return {
    moveScores: result.moveScores,
    cacheHit: false,
    depth: searchDepth,
    nodesSearched: result.nodesSearched,
  }
}

/**
 * Chooses the AI move for `player`.
 *
 * @throws EngineError NO_LEGAL_MOVES when the player has no move; forced
 * passes must be resolved before asking the bot to play
 */
export async function suggestMove(
  board: Board,
  player: Player,
  difficulty: Difficulty,
  deps: BotDependencies
): Promise<MoveResult> {
  const startTime = Date.now()
  const validMoves = getValidMoves(board, player)

  if (validMoves.length === 0) {
    throw new EngineError('NO_LEGAL_MOVES', 'AI called with no valid moves')
  }

  // Low-confidence result, reported at depth 0
  const fallback = (nodesSearched: number): MoveResult => ({
    move: pickRandom(deps.random, validMoves),
    cacheHit: false,
    source: 'fallback',
    depth: 0,
    searchInfo: { nodesSearched, timeUsed: Date.now() - startTime },
  })

  // If only one move, return it immediately
  if (validMoves.length === 1) {
    return {
      move: validMoves[0],
      cacheHit: false,
      source: 'forced',
      depth: 0,
      searchInfo: { nodesSearched: 0, timeUsed: Date.now() - startTime },
    }
  }

  // Every difficulty searches equally deep; difficulty only shapes the selection
  const searchDepth = deps.searchDepth
  const key: PositionKey = { hash: deps.hasher.computeHash(board, player), player }

  const scores = await loadOrSearch(board, player, key, searchDepth, deps.cache)
  if (!scores) {
    console.warn('suggestMove: search produced no evaluations, falling back to a random move')
    return fallback(0)
  }

  let move: Move
  try {
    move = selectMoveByDifficulty(scores.moveScores, difficulty, deps.random)
  } catch (error) {
    console.error(`suggestMove: move selection failed: ${getErrorMessage(error)}`)
    return fallback(scores.nodesSearched)
  }

  return {
    move,
    cacheHit: scores.cacheHit,
    source: scores.cacheHit ? 'cache' : 'search',
    depth: scores.depth,
    searchInfo: { nodesSearched: scores.nodesSearched, timeUsed: Date.now() - startTime },
  }
}
