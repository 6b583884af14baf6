/**
 * Move API endpoint
 *
 * POST /api/move - Apply a human move and resolve the next turn
 */

import type { RequestContext } from '../lib/context'
import { makeMove } from '../lib/game'
import { errorResponse, jsonResponse } from '../lib/http'
import { formatZodError, moveRequestSchema } from '../lib/schemas'

export async function onRequestPost(context: RequestContext): Promise<Response> {
  try {
    const body: unknown = await context.request.json()
    const parseResult = moveRequestSchema.safeParse(body)

    if (!parseResult.success) {
      return jsonResponse(formatZodError(parseResult.error), 400)
    }

    const { board, player, row, col } = parseResult.data
    const outcome = makeMove(board, player, row, col)

    if (!outcome.success) {
      return errorResponse('Invalid move', 400)
    }

    return jsonResponse(outcome.result)
  } catch (error) {
    if (error instanceof SyntaxError) {
      return errorResponse('Invalid JSON body', 400)
    }
    console.error('POST /api/move error:', error)
    return errorResponse('Internal server error', 500)
  }
}
