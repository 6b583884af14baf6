/**
 * Server-side game logic for Othello
 *
 * Legal-move generation, board transition and turn resolution.
 * Boards are immutable snapshots: every transition returns a new board.
 */

export const BOARD_SIZE = 8

export const EMPTY = 0
export const BLACK = 1
export const WHITE = -1

export type Player = 1 | -1
export type Cell = Player | 0
export type Board = ReadonlyArray<ReadonlyArray<Cell>>

export interface Move {
  row: number
  col: number
}

export type ApplyMoveResult =
  | { success: true; board: Board; flips: Move[] }
  | { success: false; reason: 'invalid-move' }

export interface GameResult {
  board: Board
  /** Player to act next, or null once the game is over */
  nextPlayer: Player | null
  validMoves: Move[]
  gameOver: boolean
  /** Side with strictly more discs at the end, null on a draw or mid-game */
  winner: Player | null
}

export type MakeMoveResult =
  | { success: true; result: GameResult }
  | { success: false; reason: 'invalid-move' }

export const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
]

// ============================================================================
// BOARD CONSTRUCTION
// ============================================================================

/**
 * Creates an empty game board.
 */
export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(EMPTY))
}

/**
 * Creates the standard starting position.
 */
export function createInitialBoard(): Board {
  const board = Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(EMPTY))
  board[3][3] = WHITE
  board[3][4] = BLACK
  board[4][3] = BLACK
  board[4][4] = WHITE
  return board
}

function toCell(value: number): Cell {
  if (value === BLACK || value === WHITE || value === EMPTY) {
    return value
  }
  throw new Error(`Invalid cell value: ${value}`)
}

/**
 * Builds a board from raw rows, enforcing the 8x8 shape and cell values.
 */
export function createBoard(rows: ReadonlyArray<ReadonlyArray<number>>): Board {
  if (rows.length !== BOARD_SIZE || rows.some((row) => row.length !== BOARD_SIZE)) {
    throw new Error(`Board must be ${BOARD_SIZE}x${BOARD_SIZE}`)
  }
  return rows.map((row) => row.map(toCell))
}

export function cloneBoard(board: Board): Cell[][] {
  return board.map((row) => [...row])
}

// ============================================================================
// RULES
// ============================================================================

export function opponentOf(player: Player): Player {
  return player === BLACK ? WHITE : BLACK
}

export function isInBounds(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE
}

/**
 * Returns the discs captured by placing `player` at (row, col).
 * Empty when the cell is occupied, out of bounds, or captures nothing.
 */
export function getFlips(board: Board, player: Player, row: number, col: number): Move[] {
  if (!isInBounds(row, col) || board[row][col] !== EMPTY) {
    return []
  }

  const opponent = opponentOf(player)
  const flips: Move[] = []

  for (const [dr, dc] of DIRECTIONS) {
    const line: Move[] = []
    let r = row + dr
    let c = col + dc

    while (isInBounds(r, c) && board[r][c] === opponent) {
      line.push({ row: r, col: c })
      r += dr
      c += dc
    }

    if (line.length > 0 && isInBounds(r, c) && board[r][c] === player) {
      flips.push(...line)
    }
  }

  return flips
}

/**
 * Returns all legal moves for `player` in row-major order.
 */
export function getValidMoves(board: Board, player: Player): Move[] {
  const moves: Move[] = []
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (getFlips(board, player, row, col).length > 0) {
        moves.push({ row, col })
      }
    }
  }
  return moves
}

export function hasValidMoves(board: Board, player: Player): boolean {
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (getFlips(board, player, row, col).length > 0) {
        return true
      }
    }
  }
  return false
}

export function countDiscs(board: Board): { black: number; white: number } {
  let black = 0
  let white = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell === BLACK) black++
      else if (cell === WHITE) white++
    }
  }
  return { black, white }
}

// ============================================================================
// BOARD TRANSITION
// ============================================================================

/**
 * Applies a move to the board, returning a new board state.
 */
export function applyMove(board: Board, player: Player, row: number, col: number): ApplyMoveResult {
  const flips = getFlips(board, player, row, col)
  if (flips.length === 0) {
    return { success: false, reason: 'invalid-move' }
  }

  const newBoard = cloneBoard(board)
  newBoard[row][col] = player
  for (const flip of flips) {
    newBoard[flip.row][flip.col] = player
  }

  return { success: true, board: newBoard, flips }
}

// ============================================================================
// TURN RESOLUTION
// ============================================================================

/**
 * Picks the side with strictly more discs, or null on a tie.
 */
export function determineWinner(board: Board): Player | null {
  const { black, white } = countDiscs(board)
  if (black > white) return BLACK
  if (white > black) return WHITE
  return null
}

/**
 * Makes a move and resolves whose turn it is next.
 *
 * If the opponent cannot move they pass and the mover continues; if neither
 * side can move the game is over.
 */
export function makeMove(board: Board, player: Player, row: number, col: number): MakeMoveResult {
  const applied = applyMove(board, player, row, col)
  if (!applied.success) {
    return applied
  }

  let nextPlayer = opponentOf(player)
  let validMoves = getValidMoves(applied.board, nextPlayer)

  if (validMoves.length === 0) {
    // Opponent must pass
    nextPlayer = player
    validMoves = getValidMoves(applied.board, player)
  }

  const gameOver = validMoves.length === 0

  return {
    success: true,
    result: {
      board: applied.board,
      nextPlayer: gameOver ? null : nextPlayer,
      validMoves,
      gameOver,
      winner: gameOver ? determineWinner(applied.board) : null,
    },
  }
}
