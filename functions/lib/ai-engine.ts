/**
 * AI engine types
 *
 * Shapes shared by the search, the position cache, the difficulty selector
 * and the bot that ties them together.
 */

import type { Move } from './game'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * A root move and its negamax score from the mover's perspective.
 */
export interface ScoredMove {
  move: Move
  score: number
}

/**
 * Supported difficulty labels. Difficulty changes how a move is picked
 * from the scored list, not how deep the search goes.
 */
export const DIFFICULTIES = ['easy', 'medium', 'hard', 'expert'] as const

export type Difficulty = (typeof DIFFICULTIES)[number]

export const DEFAULT_DIFFICULTY: Difficulty = 'medium'

/**
 * Where the scores behind a chosen move came from.
 * - cache: a stored entry at sufficient depth
 * - search: a fresh negamax search
 * - forced: the only legal move, no search needed
 * - fallback: random legal move after the search or selection failed
 */
export type MoveSource = 'cache' | 'search' | 'forced' | 'fallback'

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Number of positions visited by the search (0 when it did not run) */
  nodesSearched: number
  /** Time spent on move selection (ms) */
  timeUsed: number
}

/**
 * Result returned from AI move selection.
 */
export interface MoveResult {
  move: Move
  cacheHit: boolean
  source: MoveSource
  /** Depth of the search behind the move; 0 for forced or low-confidence moves */
  depth: number
  searchInfo: SearchInfo
}
