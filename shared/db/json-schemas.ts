import { z } from 'zod'

// =============================================================================
// Position Moves Schema
// =============================================================================

/**
 * Persisted move scores. Keys should read "(row,col)"; the position cache
 * skips any that do not.
 */
export const positionMovesSchema = z.record(z.string(), z.number())
