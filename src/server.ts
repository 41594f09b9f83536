import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { getAuthConfig } from './auth/config.ts'
import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { createStores } from './database/stores.ts'
import { errorMessage, log } from './plumbing/logger.ts'
import { parseNumber } from './plumbing/parse-number.ts'
import { defaultProviders, getEnabledProviders } from './providers/registry.ts'

const start = async (): Promise<void> => {
  const config = getAuthConfig()
  await initializeDatabase()

  const app = createApp({
    ...createStores(),
    config,
    checkHealth: checkDatabaseHealth,
  })

  if (!process.env.PORT) {
    log('process.env.PORT is undefined - defaulting to 3000')
  }
  const port = parseNumber(process.env.PORT, 3000)

  const server = serve({ fetch: app.fetch, port }, () => {
    log({
      message: `Service listening at http://localhost:${port}`,
      providers: getEnabledProviders(defaultProviders),
      redirectUri: config.redirectUri,
    })
  })

  const stop = (signal: string) => {
    log({ message: 'Shutting down', signal })
    server.close()
    shutdownDatabase().catch((error: unknown) => {
      log({ message: 'Shutdown failed', error: errorMessage(error) })
    })
  }
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)
}

start().catch((error: unknown) => {
  log({ message: 'Failed to start service', error: errorMessage(error) })
  process.exitCode = 1
})
