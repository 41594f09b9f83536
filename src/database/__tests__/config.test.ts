import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { getDatabaseConfig } from '../config.ts'

const originalEnv = process.env

describe('Database configuration', () => {
  beforeEach(() => {
    process.env = { ...originalEnv }
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('SCYLLA_')) {
        delete process.env[key]
      }
    }
  })

  afterEach(() => {
    process.env = originalEnv
  })

  it('should fall back to local defaults', () => {
    expect(getDatabaseConfig()).toEqual({
      hosts: ['localhost'],
      port: 9042,
      keyspace: 'matchmaking_auth',
      localDataCenter: 'datacenter1',
      username: undefined,
      password: undefined,
      isSslEnabled: false,
      connectTimeoutMs: 10_000,
      replicationFactor: 1,
    })
  })

  it('should parse env vars and trim multiple hosts', () => {
    process.env.SCYLLA_HOSTS = 'host1, host2 ,,host3 '
    process.env.SCYLLA_PORT = '19042'
    process.env.SCYLLA_KEYSPACE = 'matchmaking_staging'
    process.env.SCYLLA_LOCAL_DATACENTER = 'dc-east'
    process.env.SCYLLA_USERNAME = 'scylla-user'
    process.env.SCYLLA_PASSWORD = 'test-secret'
    process.env.SCYLLA_SSL = 'true'
    process.env.SCYLLA_CONNECT_TIMEOUT_MS = '5000'
    process.env.SCYLLA_REPLICATION_FACTOR = '3'

    const config = getDatabaseConfig()

    expect(config.hosts).toEqual(['host1', 'host2', 'host3'])
    expect(config.port).toBe(19042)
    expect(config.keyspace).toBe('matchmaking_staging')
    expect(config.localDataCenter).toBe('dc-east')
    expect(config.username).toBe('scylla-user')
    expect(config.password).toBe('test-secret')
    expect(config.isSslEnabled).toBe(true)
    expect(config.connectTimeoutMs).toBe(5000)
    expect(config.replicationFactor).toBe(3)
  })

  it('should fall back to defaults on invalid numeric env vars', () => {
    process.env.SCYLLA_PORT = 'not-a-number'
    process.env.SCYLLA_CONNECT_TIMEOUT_MS = 'also-not-a-number'

    const config = getDatabaseConfig()

    expect(config.port).toBe(9042)
    expect(config.connectTimeoutMs).toBe(10_000)
  })

  it.each(['Matchmaking', '1auth', 'auth; DROP KEYSPACE x', 'a-b'])(
    'should refuse the keyspace name %s',
    (keyspace) => {
      process.env.SCYLLA_KEYSPACE = keyspace

      expect(() => getDatabaseConfig()).toThrow(
        `SCYLLA_KEYSPACE is not a valid keyspace name: ${keyspace}`,
      )
    },
  )
})
