/**
 * Valid Moves API endpoint
 *
 * POST /api/valid-moves - List the legal moves for a player
 */

import type { RequestContext } from '../lib/context'
import { getValidMoves } from '../lib/game'
import { errorResponse, jsonResponse } from '../lib/http'
import { formatZodError, validMovesRequestSchema } from '../lib/schemas'

export async function onRequestPost(context: RequestContext): Promise<Response> {
  try {
    const body: unknown = await context.request.json()
    const parseResult = validMovesRequestSchema.safeParse(body)

    if (!parseResult.success) {
      return jsonResponse(formatZodError(parseResult.error), 400)
    }

    const { board, player } = parseResult.data
    return jsonResponse({ validMoves: getValidMoves(board, player) })
  } catch (error) {
    if (error instanceof SyntaxError) {
      return errorResponse('Invalid JSON body', 400)
    }
    console.error('POST /api/valid-moves error:', error)
    return errorResponse('Internal server error', 500)
  }
}
