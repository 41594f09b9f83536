import {
  createInMemoryOAuthStateStore,
  createScyllaOAuthStateStore,
  type OAuthStateStore,
} from '../auth/oauth-state-storage.ts'
import { createInMemoryCredentialStore } from '../credentials/memory-store.ts'
import { createScyllaCredentialStore } from '../credentials/scylla-store.ts'
import type { CredentialStore } from '../credentials/store.ts'
import { log } from '../plumbing/logger.ts'
import { createScyllaProfileStore } from '../profiles/scylla-store.ts'
import { createInMemoryProfileStore, type ProfileStore } from '../profiles/store.ts'
import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'

export interface Stores {
  credentials: CredentialStore
  profiles: ProfileStore
  oauthStates: OAuthStateStore
}

/**
 * ScyllaDB-backed stores once initializeDatabase() has run, process-local
 * ones when the database is disabled.
 */
export const createStores = (): Stores => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database disabled: using in-memory stores, data is lost on restart')
    return {
      credentials: createInMemoryCredentialStore(),
      profiles: createInMemoryProfileStore(),
      oauthStates: createInMemoryOAuthStateStore(),
    }
  }

  const client = getDatabaseClient()
  const { keyspace } = getDatabaseConfig()
  return {
    credentials: createScyllaCredentialStore(client, keyspace),
    profiles: createScyllaProfileStore(client, keyspace),
    oauthStates: createScyllaOAuthStateStore(client, keyspace),
  }
}
