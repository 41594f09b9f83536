import type { Client } from 'cassandra-driver'

export interface MigrationContext {
  keyspace: string
  replicationFactor: number
}

export interface Migration {
  version: string
  name: string
  description: string
  up: (client: Client, context: MigrationContext) => Promise<void>
  down: (client: Client, context: MigrationContext) => Promise<void>
}

export interface MigrationHistoryRow {
  version: string
  appliedAt?: Date
  rolledBackAt?: Date
}

export interface MigrationStatus {
  version: string
  name: string
  applied: boolean
  appliedAt?: Date
  rolledBackAt?: Date
}
