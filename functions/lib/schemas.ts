import { z } from 'zod'
import { DEFAULT_DIFFICULTY, DIFFICULTIES } from './ai-engine'
import { BOARD_SIZE } from './game'

// Board schemas
export const cellSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)], {
  errorMap: () => ({ message: 'Cells must be -1, 0 or 1' }),
})

export const boardSchema = z
  .array(z.array(cellSchema).length(BOARD_SIZE, `Board rows must have ${BOARD_SIZE} cells`))
  .length(BOARD_SIZE, `Board must have ${BOARD_SIZE} rows`)

export const playerSchema = z.union([z.literal(1), z.literal(-1)], {
  errorMap: () => ({ message: 'Player must be 1 or -1' }),
})

const coordinateSchema = z
  .number()
  .int()
  .min(0, 'Coordinates must be between 0 and 7')
  .max(BOARD_SIZE - 1, 'Coordinates must be between 0 and 7')

// Move schemas
export const moveRequestSchema = z.object({
  board: boardSchema,
  player: playerSchema,
  row: coordinateSchema,
  col: coordinateSchema,
})

export const aiMoveRequestSchema = z.object({
  board: boardSchema,
  player: playerSchema,
  difficulty: z
    .string()
    .default(DEFAULT_DIFFICULTY)
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(DIFFICULTIES, {
      errorMap: () => ({ message: `Difficulty must be one of: ${DIFFICULTIES.join(', ')}` }),
    })),
})

export const validMovesRequestSchema = z.object({
  board: boardSchema,
  player: playerSchema,
})

// Error response schema
export const errorResponseSchema = z.object({
  error: z.string(),
  details: z.string().optional(),
})

export type ErrorResponse = z.infer<typeof errorResponseSchema>

// Helper to format validation errors
export function formatZodError(error: z.ZodError): ErrorResponse {
  return {
    error: 'Validation error',
    details: error.errors[0].message,
  }
}
