/**
 * Position Evaluation
 *
 * Scores a board from one player's perspective as a phase-weighted sum of
 * six heuristics: corners, mobility, frontier discs, stability, parity and
 * tempo. Each component is a relative-advantage percentage on roughly
 * [-100, 100]; positive favors `player`.
 */

import {
  type Board,
  type Player,
  BOARD_SIZE,
  DIRECTIONS,
  EMPTY,
  getFlips,
  getValidMoves,
  isInBounds,
  opponentOf,
} from '../game'

// ============================================================================
// PHASE WEIGHTS
// ============================================================================

export interface EvalWeights {
  corner: number
  mobility: number
  parity: number
  stability: number
  frontier: number
  tempo: number
}

/** Captures at or above this count make a move "forcing" */
export const FORCING_FLIP_COUNT = 3

/** Parity amplification starts past this share of filled cells */
export const ENDGAME_PROGRESS = 0.85
const ENDGAME_SPAN = 0.15

/**
 * Share of the board that is filled, 0 at an empty board and 1 when full.
 */
export function gameProgress(board: Board): number {
  let filled = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell !== EMPTY) filled++
    }
  }
  return Math.max(0, Math.min(1, filled / (BOARD_SIZE * BOARD_SIZE)))
}

/**
 * Weights interpolated linearly between the opening and the full board.
 */
export function phaseWeights(progress: number): EvalWeights {
  return {
    corner: 150 + 200 * progress,
    mobility: 120 - 80 * progress,
    parity: 5 + 95 * progress,
    stability: 100 + 150 * progress,
    frontier: 60 - 30 * progress,
    tempo: 40 * (1 - progress),
  }
}

function relativeAdvantage(mine: number, theirs: number): number {
  const total = mine + theirs
  if (total === 0) return 0
  return (100 * (mine - theirs)) / total
}

// ============================================================================
// CORNERS
// ============================================================================

interface CornerRegion {
  corner: readonly [number, number]
  xSquare: readonly [number, number]
  cSquares: ReadonlyArray<readonly [number, number]>
}

const CORNER_REGIONS: readonly CornerRegion[] = [
  {
    corner: [0, 0],
    xSquare: [1, 1],
    cSquares: [[0, 1], [1, 0], [0, 2], [2, 0], [1, 2], [2, 1]],
  },
  {
    corner: [0, 7],
    xSquare: [1, 6],
    cSquares: [[0, 6], [1, 7], [0, 5], [2, 7], [1, 5], [2, 6]],
  },
  {
    corner: [7, 0],
    xSquare: [6, 1],
    cSquares: [[6, 0], [7, 1], [5, 0], [7, 2], [5, 1], [6, 2]],
  },
  {
    corner: [7, 7],
    xSquare: [6, 6],
    cSquares: [[6, 7], [7, 6], [5, 7], [7, 5], [5, 6], [6, 5]],
  },
]

const CORNER_VALUE = 100
const X_SQUARE_PENALTY = 25
const C_SQUARE_PENALTY = 5

/**
 * Corner ownership with danger zones around empty corners.
 * Unlike the other components this is a raw difference, not a percentage.
 */
export function cornerScore(board: Board, player: Player): number {
  let mine = 0
  let theirs = 0

  const credit = (owner: number, amount: number) => {
    if (owner === player) mine += amount
    else if (owner !== EMPTY) theirs += amount
  }

  for (const { corner, xSquare, cSquares } of CORNER_REGIONS) {
    const occupant = board[corner[0]][corner[1]]
    if (occupant !== EMPTY) {
      credit(occupant, CORNER_VALUE)
      continue
    }

    credit(board[xSquare[0]][xSquare[1]], -X_SQUARE_PENALTY)
    for (const [row, col] of cSquares) {
      credit(board[row][col], -C_SQUARE_PENALTY)
    }
  }

  return mine - theirs
}

// ============================================================================
// MOBILITY
// ============================================================================

const CURRENT_MOBILITY_WEIGHT = 0.7
const POTENTIAL_MOBILITY_WEIGHT = 0.3

/**
 * Current legal moves blended with potential mobility (empty cells next to
 * an opponent disc).
 */
export function mobilityScore(board: Board, player: Player): number {
  const opponent = opponentOf(player)
  let myPotential = 0
  let oppPotential = 0

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] !== EMPTY) continue

      let touchesOpponent = false
      let touchesPlayer = false
      for (const [dr, dc] of DIRECTIONS) {
        const r = row + dr
        const c = col + dc
        if (!isInBounds(r, c)) continue
        if (board[r][c] === opponent) touchesOpponent = true
        if (board[r][c] === player) touchesPlayer = true
      }

      if (touchesOpponent) myPotential++
      if (touchesPlayer) oppPotential++
    }
  }

  const mine =
    CURRENT_MOBILITY_WEIGHT * getValidMoves(board, player).length +
    POTENTIAL_MOBILITY_WEIGHT * myPotential
  const theirs =
    CURRENT_MOBILITY_WEIGHT * getValidMoves(board, opponent).length +
    POTENTIAL_MOBILITY_WEIGHT * oppPotential

  return relativeAdvantage(mine, theirs)
}

// ============================================================================
// FRONTIER
// ============================================================================

function isFrontier(board: Board, row: number, col: number): boolean {
  return DIRECTIONS.some(([dr, dc]) => {
    const r = row + dr
    const c = col + dc
    return isInBounds(r, c) && board[r][c] === EMPTY
  })
}

/**
 * Frontier discs border an empty cell and are exposed to capture, so fewer is better.
 */
export function frontierScore(board: Board, player: Player): number {
  let mine = 0
  let theirs = 0

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const cell = board[row][col]
      if (cell === EMPTY || !isFrontier(board, row, col)) continue
      if (cell === player) mine++
      else theirs++
    }
  }

  return relativeAdvantage(theirs, mine)
}

// ============================================================================
// STABILITY
// ============================================================================

const STABLE = 2

/**
 * Per-cell stability classes: 0 unstable, 1 semi-stable, 2 stable.
 * Only the stable class is currently assigned.
 */
export function stabilityMap(board: Board): number[][] {
  const stability = Array.from({ length: BOARD_SIZE }, () => Array<number>(BOARD_SIZE).fill(0))
  const last = BOARD_SIZE - 1

  const sweep = (startRow: number, startCol: number, dr: number, dc: number, piece: number) => {
    let r = startRow
    let c = startCol
    while (isInBounds(r, c) && board[r][c] === piece) {
      stability[r][c] = STABLE
      r += dr
      c += dc
    }
  }

  for (const row of [0, last]) {
    for (const col of [0, last]) {
      const piece = board[row][col]
      if (piece === EMPTY) continue
      const dr = row === 0 ? 1 : -1
      const dc = col === 0 ? 1 : -1
      sweep(row, col, 0, dc, piece)
      sweep(row, col, dr, 0, piece)
      sweep(row, col, dr, dc, piece)
    }
  }

  // A full edge of one color can never be flipped
  const edges: Array<Array<[number, number]>> = [
    Array.from({ length: BOARD_SIZE }, (_, i): [number, number] => [0, i]),
    Array.from({ length: BOARD_SIZE }, (_, i): [number, number] => [last, i]),
    Array.from({ length: BOARD_SIZE }, (_, i): [number, number] => [i, 0]),
    Array.from({ length: BOARD_SIZE }, (_, i): [number, number] => [i, last]),
  ]
  for (const edge of edges) {
    const [firstRow, firstCol] = edge[0]
    const piece = board[firstRow][firstCol]
    if (piece === EMPTY) continue
    if (edge.every(([r, c]) => board[r][c] === piece)) {
      for (const [r, c] of edge) stability[r][c] = STABLE
    }
  }

  return stability
}

export function stabilityScore(board: Board, player: Player): number {
  const stability = stabilityMap(board)
  let mine = 0
  let theirs = 0

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const cell = board[row][col]
      if (cell === player) mine += stability[row][col]
      else if (cell !== EMPTY) theirs += stability[row][col]
    }
  }

  return relativeAdvantage(mine, theirs)
}

// ============================================================================
// PARITY
// ============================================================================

/**
 * Disc-count advantage. Late in the game a lead is amplified, scaling the
 * multiplier from 1 at 85% filled to 3 at a full board.
 */
export function parityScore(board: Board, player: Player): number {
  let mine = 0
  let theirs = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell === player) mine++
      else if (cell !== EMPTY) theirs++
    }
  }

  const base = relativeAdvantage(mine, theirs)
  const progress = gameProgress(board)

  if (progress > ENDGAME_PROGRESS && mine > theirs) {
    return base * (1 + (2 * (progress - ENDGAME_PROGRESS)) / ENDGAME_SPAN)
  }
  return base
}

// ============================================================================
// TEMPO
// ============================================================================

function countForcingMoves(board: Board, player: Player): number {
  let forcing = 0
  for (const { row, col } of getValidMoves(board, player)) {
    if (getFlips(board, player, row, col).length >= FORCING_FLIP_COUNT) {
      forcing++
    }
  }
  return forcing
}

/**
 * Initiative: who has more moves that capture several discs at once.
 */
export function tempoScore(board: Board, player: Player): number {
  return relativeAdvantage(
    countForcingMoves(board, player),
    countForcingMoves(board, opponentOf(player))
  )
}

// ============================================================================
// POSITION EVALUATION
// ============================================================================

export interface EvalBreakdown {
  progress: number
  corner: number
  mobility: number
  parity: number
  stability: number
  frontier: number
  tempo: number
  total: number
}

/**
 * Evaluates every component and the weighted total.
 */
export function evaluateBreakdown(board: Board, player: Player): EvalBreakdown {
  const progress = gameProgress(board)
  const weights = phaseWeights(progress)

  const corner = cornerScore(board, player)
  const mobility = mobilityScore(board, player)
  const parity = parityScore(board, player)
  const stability = stabilityScore(board, player)
  const frontier = frontierScore(board, player)
  const tempo = tempoScore(board, player)

  const total =
    (weights.corner * corner) / 100 +
    (weights.mobility * mobility) / 100 +
    (weights.parity * parity) / 100 +
    (weights.stability * stability) / 100 +
    (weights.frontier * frontier) / 100 +
    (weights.tempo * tempo) / 100

  return { progress, corner, mobility, parity, stability, frontier, tempo, total }
}

/**
 * Evaluates the board position from the perspective of the given player.
 */
export function evaluatePosition(board: Board, player: Player): number {
  return evaluateBreakdown(board, player).total
}
