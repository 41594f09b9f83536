#!/usr/bin/env node
import 'dotenv/config'
import { errorMessage, log } from '../../plumbing/logger.ts'
import {
  getDatabaseClient,
  initializeDatabase,
  shutdownDatabase,
} from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'

const USAGE = [
  'Usage: migrate [up|down|status]',
  '  up     - Apply pending migrations',
  '  down   - Rollback last migration',
  '  status - Show migration status',
].join('\n')

const main = async (command: string | undefined): Promise<number> => {
  if (command !== 'up' && command !== 'down' && command !== 'status') {
    console.log(USAGE)
    return 1
  }

  // Connect without keyspace so that migration 001 can create it
  await initializeDatabase({ skipKeyspace: true })
  try {
    const client = getDatabaseClient()
    const { keyspace, replicationFactor } = getDatabaseConfig()
    const migrations = loadMigrations()

    if (command === 'status') {
      const status = await getMigrationStatus(client, keyspace, migrations)
      console.table(
        status.map((s) => ({
          version: s.version,
          name: s.name,
          applied: s.applied ? '✓' : '✗',
          appliedAt: s.appliedAt?.toISOString() ?? '-',
          rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
        })),
      )
      return 0
    }

    const versions = await runMigrations(
      client,
      { keyspace, replicationFactor },
      migrations,
      command,
    )
    log({
      message:
        command === 'up'
          ? 'Migrations applied successfully'
          : 'Migration rolled back successfully',
      versions,
    })
    return 0
  } finally {
    await shutdownDatabase()
  }
}

main(process.argv[2])
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log({ message: 'Migration error', error: errorMessage(error) })
    process.exitCode = 1
  })
