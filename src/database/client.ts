import { Client, type ClientOptions } from 'cassandra-driver'
import { errorMessage, log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-number.ts'
import { type DatabaseConfig, getDatabaseConfig } from './config.ts'

let databaseClient: Client | null = null

/**
 * SCYLLA_DISABLED=true runs the service on in-memory stores. Tests never
 * connect unless SCYLLA_ENABLE_IN_TESTS=true.
 */
export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }
  return true
}

export const buildClientOptions = (
  config: DatabaseConfig,
  options?: { skipKeyspace?: boolean },
): ClientOptions => ({
  contactPoints: config.hosts.map((host) => `${host}:${config.port}`),
  localDataCenter: config.localDataCenter,
  // Migrations connect before the keyspace exists
  keyspace: options?.skipKeyspace ? undefined : config.keyspace,
  credentials:
    config.username && config.password
      ? { username: config.username, password: config.password }
      : undefined,
  sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
  socketOptions: {
    connectTimeout: config.connectTimeoutMs,
  },
})

export const getDatabaseClient = (): Client => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }
  return databaseClient
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })

export const initializeDatabase = async (options?: {
  skipKeyspace?: boolean
}): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }
  if (databaseClient) {
    log('Database client already initialized')
    return
  }

  const config = getDatabaseConfig()
  const maxRetries = parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3)
  const retryDelayMs = parseNumber(
    process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
    1_000,
  )

  for (let attempt = 1; ; attempt++) {
    const client = new Client(buildClientOptions(config, options))
    try {
      await client.connect()
      databaseClient = client
      log({
        message: 'Database connection established',
        hosts: config.hosts,
        keyspace: options?.skipKeyspace ? '(none - for migrations)' : config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })
      return
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        error: errorMessage(error),
        attempt,
      })
      await client.shutdown().catch((shutdownError: unknown) => {
        log({
          message: 'Error shutting down failed client',
          error: errorMessage(shutdownError),
        })
      })

      if (attempt >= maxRetries) {
        throw error instanceof Error ? error : new Error(errorMessage(error))
      }
      await sleep(retryDelayMs)
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null
  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: errorMessage(error),
    })
  }
}
