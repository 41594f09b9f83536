import { migration as migration001 } from './migrations/001-create-keyspace.ts'
import { migration as migration002 } from './migrations/002-create-migration-history.ts'
import { migration as migration003 } from './migrations/003-create-credentials-table.ts'
import { migration as migration004 } from './migrations/004-create-credentials-by-provider-table.ts'
import { migration as migration005 } from './migrations/005-create-credentials-by-id-table.ts'
import { migration as migration006 } from './migrations/006-create-profiles-table.ts'
import { migration as migration007 } from './migrations/007-create-oauth-state-table.ts'
import type { Migration } from './types.ts'

export const loadMigrations = (): Migration[] =>
  [
    migration001,
    migration002,
    migration003,
    migration004,
    migration005,
    migration006,
    migration007,
  ].sort((a, b) => a.version.localeCompare(b.version))
