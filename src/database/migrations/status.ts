import type { Client } from 'cassandra-driver'
import { getMigrationHistory } from './runner.ts'
import type { Migration, MigrationStatus } from './types.ts'

export const getMigrationStatus = async (
  client: Client,
  keyspace: string,
  migrations: Migration[],
): Promise<MigrationStatus[]> => {
  const history = new Map(
    (await getMigrationHistory(client, keyspace)).map((row) => [
      row.version,
      row,
    ]),
  )

  return migrations.map((migration) => {
    const row = history.get(migration.version)
    return {
      version: migration.version,
      name: migration.name,
      applied: row !== undefined && row.rolledBackAt === undefined,
      appliedAt: row?.appliedAt,
      rolledBackAt: row?.rolledBackAt,
    }
  })
}
