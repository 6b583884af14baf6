/**
 * GET /api/health - Liveness check with cache availability
 */

import type { RequestContext } from '../lib/context'
import { jsonResponse } from '../lib/http'

export async function onRequestGet(context: RequestContext): Promise<Response> {
  return jsonResponse({
    status: 'ok',
    cache: context.env.bot.cache.isAvailable() ? 'available' : 'unavailable',
  })
}
