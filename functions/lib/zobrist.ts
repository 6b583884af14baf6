/**
 * Zobrist hashing for Othello positions
 *
 * One 63-bit key per (cell, occupant) plus one per side to move, generated
 * from a fixed seed so hashes stay valid across restarts. 63 bits keep the
 * value inside a signed 64-bit database column.
 */

import { type Board, type Player, BOARD_SIZE, BLACK, EMPTY } from './game'
import { type RandomSource, createSeededRandom } from './random'

export const DEFAULT_ZOBRIST_SEED = 42

function random63(random: RandomSource): bigint {
  const high = BigInt(Math.floor(random() * 0x80000000))
  const low = BigInt(Math.floor(random() * 0x100000000))
  return (high << 32n) | low
}

function pieceIndex(row: number, col: number, piece: Player): number {
  return (row * BOARD_SIZE + col) * 2 + (piece === BLACK ? 0 : 1)
}

export class ZobristHasher {
  private readonly pieceKeys: bigint[]
  private readonly blackToMove: bigint
  private readonly whiteToMove: bigint

  constructor(seed = DEFAULT_ZOBRIST_SEED) {
    const random = createSeededRandom(seed)
    this.pieceKeys = Array.from({ length: BOARD_SIZE * BOARD_SIZE * 2 }, () => random63(random))
    this.blackToMove = random63(random)
    this.whiteToMove = random63(random)
  }

  private sideKey(player: Player): bigint {
    return player === BLACK ? this.blackToMove : this.whiteToMove
  }

  /**
   * Computes the hash of a position from scratch.
   */
  computeHash(board: Board, player: Player): bigint {
    let hash = 0n
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        const piece = board[row][col]
        if (piece !== EMPTY) {
          hash ^= this.pieceKeys[pieceIndex(row, col, piece)]
        }
      }
    }
    return hash ^ this.sideKey(player)
  }

  /**
   * Updates a hash after a transition from `oldBoard` to `newBoard`.
   * Agrees bit-for-bit with `computeHash(newBoard, newPlayer)`.
   */
  updateHash(
    currentHash: bigint,
    oldBoard: Board,
    newBoard: Board,
    oldPlayer: Player,
    newPlayer: Player
  ): bigint {
    let hash = currentHash ^ this.sideKey(oldPlayer) ^ this.sideKey(newPlayer)

    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        const before = oldBoard[row][col]
        const after = newBoard[row][col]
        if (before === after) continue

        if (before !== EMPTY) hash ^= this.pieceKeys[pieceIndex(row, col, before)]
        if (after !== EMPTY) hash ^= this.pieceKeys[pieceIndex(row, col, after)]
      }
    }

    return hash
  }
}
