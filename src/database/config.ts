import { parseNumber } from '../plumbing/parse-number.ts'

export interface DatabaseConfig {
  hosts: string[]
  port: number
  keyspace: string
  localDataCenter: string
  username?: string
  password?: string
  isSslEnabled: boolean
  connectTimeoutMs: number
  /** Used when migrations create the keyspace. */
  replicationFactor: number
}

const KEYSPACE_PATTERN = /^[a-z][a-z0-9_]{0,47}$/

export const getDatabaseConfig = (): DatabaseConfig => {
  const hosts = (process.env.SCYLLA_HOSTS || 'localhost')
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0)

  // Interpolated into CQL, so only plain identifiers are accepted
  const keyspace = process.env.SCYLLA_KEYSPACE?.trim() || 'matchmaking_auth'
  if (!KEYSPACE_PATTERN.test(keyspace)) {
    throw new Error(`SCYLLA_KEYSPACE is not a valid keyspace name: ${keyspace}`)
  }

  return {
    hosts,
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace,
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    replicationFactor: parseNumber(process.env.SCYLLA_REPLICATION_FACTOR, 1),
  }
}
