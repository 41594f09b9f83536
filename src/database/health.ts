import { errorMessage } from '../plumbing/logger.ts'
import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'

export const REQUIRED_TABLES = [
  'credentials',
  'credentials_by_provider',
  'credentials_by_id',
  'profiles',
  'oauth_state',
] as const

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    keyspaceExists?: boolean
    hostCount?: number
    missingTables?: string[]
  }
}

/**
 * Connectivity plus schema check. Unmigrated tables make the service
 * unhealthy.
 */
export const checkDatabaseHealth = async (): Promise<DatabaseHealthStatus> => {
  if (!isDatabaseEnabledForEnv()) {
    return {
      isHealthy: true,
      message: 'Database disabled for this environment',
    }
  }

  try {
    const client = getDatabaseClient()
    const { keyspace } = getDatabaseConfig()

    await client.execute('SELECT now() FROM system.local')

    const keyspaceResult = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [keyspace],
      { prepare: true },
    )
    const tableResult = await client.execute(
      'SELECT table_name FROM system_schema.tables WHERE keyspace_name = ?',
      [keyspace],
      { prepare: true },
    )
    const present = new Set(
      tableResult.rows.map((row): unknown => row.table_name),
    )
    const missingTables = REQUIRED_TABLES.filter((table) => !present.has(table))

    const keyspaceExists = keyspaceResult.rows.length > 0
    const isHealthy = keyspaceExists && missingTables.length === 0

    return {
      isHealthy,
      message: isHealthy
        ? 'Database connection is healthy'
        : 'Database schema is not migrated',
      details: {
        keyspaceExists,
        hostCount: client.hosts.length,
        missingTables,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message: errorMessage(error),
    }
  }
}
