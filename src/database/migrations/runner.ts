import type { Client } from 'cassandra-driver'
import { errorMessage, log } from '../../plumbing/logger.ts'
import type {
  Migration,
  MigrationContext,
  MigrationHistoryRow,
} from './types.ts'

const optionalDate = (value: unknown): Date | undefined =>
  value instanceof Date ? value : undefined

/**
 * Keyspace and history table must exist before the history can be read, so
 * they are created here as well as by migrations 001 and 002.
 */
export const ensureMigrationHistory = async (
  client: Client,
  { keyspace, replicationFactor }: MigrationContext,
): Promise<void> => {
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': ${replicationFactor}
    }
  `)
  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

/** Every history row, rolled back or not. */
export const getMigrationHistory = async (
  client: Client,
  keyspace: string,
): Promise<MigrationHistoryRow[]> => {
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${keyspace}.migration_history`,
  )
  return result.rows.flatMap((row) => {
    const version: unknown = row.version
    if (typeof version !== 'string') {
      return []
    }
    return [
      {
        version,
        appliedAt: optionalDate(row.applied_at),
        rolledBackAt: optionalDate(row.rolled_back_at),
      },
    ]
  })
}

export const getAppliedMigrations = async (
  client: Client,
  keyspace: string,
): Promise<string[]> => {
  // CQL has no IS NULL filter; rolled-back rows are dropped here
  const history = await getMigrationHistory(client, keyspace)
  return history
    .filter((row) => row.rolledBackAt === undefined)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: Client,
  keyspace: string,
  migration: Migration,
  action: 'up' | 'down',
  now: Date = new Date(),
): Promise<void> => {
  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${keyspace}.migration_history (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
      { prepare: true },
    )
  } else {
    await client.execute(
      `UPDATE ${keyspace}.migration_history SET rolled_back_at = ? WHERE version = ?`,
      [now, migration.version],
      { prepare: true },
    )
  }
}

/**
 * Apply every pending migration in version order, or roll back the most
 * recently applied one.
 */
export const runMigrations = async (
  client: Client,
  context: MigrationContext,
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
): Promise<string[]> => {
  await ensureMigrationHistory(client, context)
  const applied = await getAppliedMigrations(client, context.keyspace)

  const ordered = [...migrations].sort((a, b) =>
    a.version.localeCompare(b.version),
  )

  if (direction === 'up') {
    const pending = ordered.filter((m) => !applied.includes(m.version))
    for (const migration of pending) {
      log({
        message: 'Running migration',
        version: migration.version,
        name: migration.name,
      })
      try {
        await migration.up(client, context)
        await recordMigration(client, context.keyspace, migration, 'up')
      } catch (error) {
        log({
          message: 'Migration failed',
          version: migration.version,
          error: errorMessage(error),
        })
        throw error
      }
      log({ message: 'Migration completed', version: migration.version })
    }
    return pending.map((m) => m.version)
  }

  const last = ordered.filter((m) => applied.includes(m.version)).at(-1)
  if (!last) {
    log('No migrations to rollback')
    return []
  }

  log({
    message: 'Rolling back migration',
    version: last.version,
    name: last.name,
  })
  try {
    await last.down(client, context)
    await recordMigration(client, context.keyspace, last, 'down')
  } catch (error) {
    log({
      message: 'Migration rollback failed',
      version: last.version,
      error: errorMessage(error),
    })
    throw error
  }
  log({ message: 'Migration rolled back', version: last.version })
  return [last.version]
}
