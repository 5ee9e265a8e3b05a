import type { Logger } from "pino"

import { ensureKeeperConfigFile } from "../config/keeper-config.js"
import { resolveStoreConfig } from "../persistence/config.js"
import {
  applyMigrations,
  getSchemaRevision,
  openPersistenceDatabase,
  resolvePersistenceDatabasePath,
} from "../persistence/database.js"

export type RunMigrateOptions = {
  target?: string | null
  homeDirectory?: string
  environment?: NodeJS.ProcessEnv
}

export type MigrateResult = {
  dbPath: string
  applied: string[]
  revision: string | null
}

/**
 * Brings the store to a schema revision without starting the scheduler.
 *
 * @param logger Command-scoped logger.
 * @param options Target revision plus home and environment overrides.
 * @returns Applied revisions and the revision the store is now at.
 */
export const runMigrate = async (
  logger: Logger,
  options: RunMigrateOptions = {}
): Promise<MigrateResult> => {
  const { config } = await ensureKeeperConfigFile(options.homeDirectory)
  const storeConfig = resolveStoreConfig(options.environment ?? process.env)
  const keeperHome = storeConfig.keeperHome ?? config.keeperHome
  const dbPath = resolvePersistenceDatabasePath({ keeperHome })

  const database = openPersistenceDatabase({
    dbPath,
    busyTimeoutMs: storeConfig.busyTimeoutMs,
    migrate: false,
  })

  try {
    const applied = applyMigrations(database, { target: options.target ?? undefined })
    const revision = getSchemaRevision(database)

    logger.info({ command: "migrate", dbPath, applied, revision }, "Schema revision")

    return { dbPath, applied, revision }
  } finally {
    database.close()
  }
}
