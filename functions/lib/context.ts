/**
 * Request context for the API handlers.
 *
 * The hasher, cache and random source are built once per process by
 * `createEnv` and shared by every request.
 */

import { createDb } from '../../shared/db/client'
import type { BotDependencies } from './bot'
import type { AppConfig } from './config'
import { PositionCache } from './position-cache'
import { DrizzlePositionStore } from './position-store'
import { ZobristHasher } from './zobrist'

export interface Env {
  bot: BotDependencies
}

export interface RequestContext {
  request: Request
  env: Env
}

export async function createEnv(config: AppConfig): Promise<Env> {
  let store: DrizzlePositionStore | null = null
  if (config.databasePath) {
    store = new DrizzlePositionStore(await createDb(config.databasePath))
    console.log(`createEnv: position cache at ${config.databasePath}`)
  } else {
    console.warn('createEnv: DATABASE_PATH not set, position cache disabled')
  }

  return {
    bot: {
      hasher: new ZobristHasher(config.zobristSeed),
      cache: new PositionCache(store),
      searchDepth: config.searchDepth,
      random: Math.random,
    },
  }
}
