import 'dotenv/config'
import { loadConfig } from './lib/config'
import { createEnv } from './lib/context'
import { buildServer } from './server'

async function main(): Promise<void> {
  const config = loadConfig(process.env)
  const env = await createEnv(config)
  const app = await buildServer(env, {
    corsOrigins: config.corsOrigins,
    logRequests: config.logRequests,
  })

  await app.listen({ port: config.port, host: config.host })
  console.log(`[Server] Listening on http://${config.host}:${config.port} (search depth ${config.searchDepth})`)
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error)
  process.exit(1)
})
