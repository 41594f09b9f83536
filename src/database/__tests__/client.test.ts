import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  buildClientOptions,
  getDatabaseClient,
  initializeDatabase,
  isDatabaseEnabledForEnv,
} from '../client.ts'
import type { DatabaseConfig } from '../config.ts'

const config: DatabaseConfig = {
  hosts: ['scylla-1', 'scylla-2'],
  port: 9042,
  keyspace: 'matchmaking_auth',
  localDataCenter: 'dc1',
  isSslEnabled: false,
  connectTimeoutMs: 2_000,
  replicationFactor: 1,
}

describe('Database client', () => {
  const originalEnv = process.env

  beforeEach(() => {
    process.env = { ...originalEnv }
    delete process.env.SCYLLA_DISABLED
    delete process.env.SCYLLA_ENABLE_IN_TESTS
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    process.env = originalEnv
  })

  describe('isDatabaseEnabledForEnv', () => {
    it('should be off under the test environment by default', () => {
      process.env.NODE_ENV = 'test'

      expect(isDatabaseEnabledForEnv()).toBe(false)
    })

    it('should be on in tests only when explicitly enabled', () => {
      process.env.NODE_ENV = 'test'
      process.env.SCYLLA_ENABLE_IN_TESTS = 'true'

      expect(isDatabaseEnabledForEnv()).toBe(true)
    })

    it('should honour SCYLLA_DISABLED outside tests', () => {
      process.env.NODE_ENV = 'production'
      expect(isDatabaseEnabledForEnv()).toBe(true)

      process.env.SCYLLA_DISABLED = 'true'
      expect(isDatabaseEnabledForEnv()).toBe(false)
    })
  })

  describe('buildClientOptions', () => {
    it('should map the config onto driver options', () => {
      expect(buildClientOptions(config)).toEqual({
        contactPoints: ['scylla-1:9042', 'scylla-2:9042'],
        localDataCenter: 'dc1',
        keyspace: 'matchmaking_auth',
        credentials: undefined,
        sslOptions: undefined,
        socketOptions: { connectTimeout: 2_000 },
      })
    })

    it('should leave the keyspace out for migrations', () => {
      expect(buildClientOptions(config, { skipKeyspace: true }).keyspace).toBeUndefined()
    })

    it('should pass credentials only when both are set', () => {
      expect(
        buildClientOptions({ ...config, username: 'scylla-user' }).credentials,
      ).toBeUndefined()
      expect(
        buildClientOptions({
          ...config,
          username: 'scylla-user',
          password: 'test-secret',
          isSslEnabled: true,
        }),
      ).toMatchObject({
        credentials: { username: 'scylla-user', password: 'test-secret' },
        sslOptions: { rejectUnauthorized: true },
      })
    })
  })

  it('should skip initialization when the database is disabled', async () => {
    process.env.SCYLLA_DISABLED = 'true'

    await initializeDatabase()

    expect(console.log).toHaveBeenCalledWith(
      expect.objectContaining({
        message: 'Database initialization skipped for current environment',
      }),
    )
    expect(() => getDatabaseClient()).toThrow(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  })
})
