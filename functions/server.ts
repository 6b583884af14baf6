/**
 * Fastify host for the API handlers.
 *
 * Handlers keep the Pages Functions shape (web Request in, web Response
 * out); this module adapts them to Fastify routes and forwards request
 * bodies as raw text.
 */

import cors from '@fastify/cors'
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify'
import * as aiMove from './api/ai-move'
import * as health from './api/health'
import * as move from './api/move'
import * as validMoves from './api/valid-moves'
import type { Env, RequestContext } from './lib/context'

type Handler = (context: RequestContext) => Promise<Response>

export interface ServerOptions {
  corsOrigins: '*' | string[]
  logRequests: boolean
}

function toWebRequest(request: FastifyRequest): Request {
  const url = new URL(request.url, 'http://localhost')
  const contentType = request.headers['content-type']
  return new Request(url, {
    method: request.method,
    headers: contentType ? { 'Content-Type': contentType } : undefined,
    body: typeof request.body === 'string' ? request.body : undefined,
  })
}

export async function buildServer(env: Env, options: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logRequests })

  // Bodies reach the handlers unparsed; they own JSON decoding and its errors
  app.removeAllContentTypeParsers()
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body)
  })

  await app.register(cors, {
    origin: options.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
  })

  const route = (handler: Handler) => async (request: FastifyRequest, reply: FastifyReply) => {
    const response = await handler({ request: toWebRequest(request), env })
    reply.code(response.status)
    response.headers.forEach((value, name) => {
      reply.header(name, value)
    })
    return reply.send(await response.text())
  }

  app.get('/api/health', route(health.onRequestGet))
  app.post('/api/move', route(move.onRequestPost))
  app.post('/api/ai-move', route(aiMove.onRequestPost))
  app.post('/api/valid-moves', route(validMoves.onRequestPost))

  return app
}
