#!/usr/bin/env node
import 'dotenv/config'
import {
  initializeDatabase,
  isDatabaseEnabledForEnv,
  shutdownDatabase,
} from '../database/client.ts'
import { createStores } from '../database/stores.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import { runAdminCommand } from './admin.ts'

const main = async (): Promise<number> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Admin commands need the database; unset SCYLLA_DISABLED')
    return 1
  }

  await initializeDatabase()
  try {
    return await runAdminCommand(createStores().credentials, process.argv.slice(2))
  } finally {
    await shutdownDatabase()
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log({ message: 'Admin command error', error: errorMessage(error) })
    process.exitCode = 1
  })
