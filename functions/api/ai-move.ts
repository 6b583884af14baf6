/**
 * AI Move API endpoint
 *
 * POST /api/ai-move - Let the bot choose and play a move
 */

import { suggestMove } from '../lib/bot'
import type { RequestContext } from '../lib/context'
import { isEngineError } from '../lib/errors'
import { makeMove } from '../lib/game'
import { errorResponse, jsonResponse } from '../lib/http'
import { aiMoveRequestSchema, formatZodError } from '../lib/schemas'

export async function onRequestPost(context: RequestContext): Promise<Response> {
  const { bot } = context.env

  try {
    const body: unknown = await context.request.json()
    const parseResult = aiMoveRequestSchema.safeParse(body)

    if (!parseResult.success) {
      return jsonResponse(formatZodError(parseResult.error), 400)
    }

    const { board, player, difficulty } = parseResult.data
    const selection = await suggestMove(board, player, difficulty, bot)
    const outcome = makeMove(board, player, selection.move.row, selection.move.col)

    if (!outcome.success) {
      console.error(
        `POST /api/ai-move: selected move (${selection.move.row},${selection.move.col}) is not legal`
      )
      return errorResponse('Internal server error', 500)
    }

    return jsonResponse({
      ...outcome.result,
      move: selection.move,
      cache: {
        hit: selection.cacheHit,
        source: selection.source,
        depth: selection.depth,
        available: bot.cache.isAvailable(),
      },
    })
  } catch (error) {
    if (error instanceof SyntaxError) {
      return errorResponse('Invalid JSON body', 400)
    }
    if (isEngineError(error, 'NO_LEGAL_MOVES')) {
      console.error('POST /api/ai-move: AI invoked without legal moves')
      return errorResponse('No legal moves for player', 409)
    }
    console.error('POST /api/ai-move error:', error)
    return errorResponse('Internal server error', 500)
  }
}
