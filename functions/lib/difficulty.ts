/**
 * Difficulty selection policies
 *
 * Every difficulty reads the same scored move list; they differ only in how
 * a move is picked from it.
 */

import { type Difficulty, type ScoredMove, DIFFICULTIES } from './ai-engine'
import { EngineError } from './errors'
import type { Move } from './game'
import { type RandomSource, pickRandom, randomInRange } from './random'

export const MEDIUM_TOP_K = 3
export const EASY_NOISE = 0.3
export const EASY_CENTER_BIAS = 0.1

const BOARD_CENTER = 3.5
const MAX_CENTER_DISTANCE = 7

function isDifficulty(label: string): label is Difficulty {
  return (DIFFICULTIES as readonly string[]).includes(label)
}

/**
 * Normalizes a difficulty label (case-insensitive).
 *
 * @throws EngineError INVALID_DIFFICULTY for unknown labels
 */
export function parseDifficulty(label: string): Difficulty {
  const normalized = label.trim().toLowerCase()
  if (!isDifficulty(normalized)) {
    throw new EngineError(
      'INVALID_DIFFICULTY',
      `Invalid difficulty level: ${label}. Must be one of: ${DIFFICULTIES.join(', ')}`
    )
  }
  return normalized
}

// ============================================================================
// POLICIES
// ============================================================================

function requireMoves(moveScores: readonly ScoredMove[]): void {
  if (moveScores.length === 0) {
    throw new EngineError('EMPTY_MOVE_LIST', 'No moves available for selection')
  }
}

function firstMax(entries: readonly ScoredMove[]): ScoredMove {
  let best = entries[0]
  for (const entry of entries) {
    if (entry.score > best.score) best = entry
  }
  return best
}

/**
 * Hard: the highest score, first one on ties.
 */
export function selectHardMove(moveScores: readonly ScoredMove[]): Move {
  requireMoves(moveScores)
  return firstMax(moveScores).move
}

/**
 * Medium: uniform pick among the top-K scores.
 */
export function selectMediumMove(
  moveScores: readonly ScoredMove[],
  random: RandomSource,
  k = MEDIUM_TOP_K
): Move {
  requireMoves(moveScores)
  const sorted = [...moveScores].sort((a, b) => b.score - a.score)
  return pickRandom(random, sorted.slice(0, k)).move
}

/**
 * Easy: scores are blurred with uniform noise and nudged toward the center
 * before taking the best.
 */
export function selectEasyMove(
  moveScores: readonly ScoredMove[],
  random: RandomSource,
  noise = EASY_NOISE,
  centerBias = EASY_CENTER_BIAS
): Move {
  requireMoves(moveScores)
  const noisy = moveScores.map(({ move, score }) => {
    const centerDistance = Math.abs(move.row - BOARD_CENTER) + Math.abs(move.col - BOARD_CENTER)
    const centerBonus = (centerBias * (MAX_CENTER_DISTANCE - centerDistance)) / MAX_CENTER_DISTANCE
    return { move, score: score + randomInRange(random, -noise, noise) + centerBonus }
  })
  return firstMax(noisy).move
}

/**
 * Picks a move from the scored list according to `difficulty`.
 *
 * @throws EngineError EMPTY_MOVE_LIST or INVALID_DIFFICULTY
 */
export function selectMoveByDifficulty(
  moveScores: readonly ScoredMove[],
  difficulty: string,
  random: RandomSource
): Move {
  requireMoves(moveScores)

  switch (parseDifficulty(difficulty)) {
    case 'easy':
      return selectEasyMove(moveScores, random)
    case 'medium':
      return selectMediumMove(moveScores, random)
    case 'hard':
    case 'expert':
      return selectHardMove(moveScores)
  }
}
