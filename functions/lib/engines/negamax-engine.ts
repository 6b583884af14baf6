/**
 * Negamax Engine
 *
 * Negamax search with alpha-beta pruning. Scores are always from the
 * perspective of the player to move at each node. At the root the engine can
 * collect a score for every legal move, which is what the position cache
 * stores and the difficulty selector chooses from.
 */

import type { ScoredMove } from '../ai-engine'
import { type Board, type Move, type Player, applyMove, getValidMoves, hasValidMoves, opponentOf } from '../game'
import { evaluatePosition } from './evaluation'

// ============================================================================
// NEGAMAX SEARCH
// ============================================================================

export interface NegamaxSearchResult {
  score: number
  move: Move | null
  /** Scores of the scanned root moves in enumeration order, when collected */
  moveScores: ScoredMove[] | null
  nodesSearched: number
}

/**
 * Negamax with alpha-beta pruning.
 *
 * When the opponent has no reply the same player moves again (forced pass):
 * the child is searched with the same window and its score is not negated.
 */
export function negamaxSearch(
  board: Board,
  player: Player,
  depth: number,
  alpha = -Infinity,
  beta = Infinity,
  collectRootScores = false
): NegamaxSearchResult {
  const moves = getValidMoves(board, player)
  if (depth === 0 || moves.length === 0) {
    return { score: evaluatePosition(board, player), move: null, moveScores: null, nodesSearched: 1 }
  }

  const opponent = opponentOf(player)
  const moveScores: ScoredMove[] | null = collectRootScores ? [] : null
  let bestScore = -Infinity
  let bestMove: Move | null = null
  let nodesSearched = 1

  for (const move of moves) {
    const result = applyMove(board, player, move.row, move.col)
    if (!result.success) continue

    let score: number
    if (hasValidMoves(result.board, opponent)) {
      const child = negamaxSearch(result.board, opponent, depth - 1, -beta, -alpha)
      nodesSearched += child.nodesSearched
      score = -child.score
    } else {
      const child = negamaxSearch(result.board, player, depth - 1, alpha, beta)
      nodesSearched += child.nodesSearched
      score = child.score
    }

    moveScores?.push({ move, score })

    // Later equal scores do not displace the first best move
    if (score > bestScore) {
      bestScore = score
      bestMove = move
    }

    alpha = Math.max(alpha, score)
    if (alpha >= beta) break
  }

  return { score: bestScore, move: bestMove, moveScores, nodesSearched }
}

/**
 * Full-window root search that scores every legal move.
 */
export function searchPosition(board: Board, player: Player, depth: number): NegamaxSearchResult {
  return negamaxSearch(board, player, depth, -Infinity, Infinity, true)
}
