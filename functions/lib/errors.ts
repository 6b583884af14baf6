/**
 * Error handling utilities
 *
 * Typed engine errors plus consistent message extraction for logging.
 */

export type EngineErrorCode = 'NO_LEGAL_MOVES' | 'EMPTY_MOVE_LIST' | 'INVALID_DIFFICULTY'

/**
 * Raised when a caller breaks an engine contract: asking the AI to move
 * without legal moves, selecting from nothing, or naming an unknown difficulty.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code)
}

/**
 * Extract a message from an unknown error value.
 *
 * @example
 * try {
 *   await cache.store(key, depth, moves)
 * } catch (err) {
 *   console.error(`store failed: ${getErrorMessage(err)}`)
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}
