import fs from "node:fs"
import os from "node:os"
import path from "node:path"

import Database from "better-sqlite3"

import { describeError, MigrationError, withStore } from "./errors.js"
import { SQL_MIGRATIONS, type SqlMigration } from "./migrations.js"

export type StoreDatabase = Database.Database

export type PersistenceDatabaseOptions = {
  dbPath?: string
  keeperHome?: string
  busyTimeoutMs?: number
  /** Apply every pending revision on open. Defaults to true. */
  migrate?: boolean
}

export type ApplyMigrationsOptions = {
  /** Last revision to apply. Every known revision is applied when omitted. */
  target?: string
  migrations?: SqlMigration[]
  now?: () => number
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5_000

/**
 * Resolves a durable state location under keeper home so state persists across restarts without
 * coupling to the current working directory.
 *
 * @param options Optional overrides for custom embedding and tests.
 * @returns Absolute path for the persistence SQLite file.
 */
export const resolvePersistenceDatabasePath = (
  options: PersistenceDatabaseOptions = {}
): string => {
  if (options.dbPath) {
    return path.resolve(options.dbPath)
  }

  const keeperHome =
    options.keeperHome ?? process.env.KEEPER_HOME ?? path.join(os.homedir(), ".keeper")
  return path.join(keeperHome, "data", "keeper-state.db")
}

/**
 * Opens the SQLite database and applies schema migrations so components can rely on consistent
 * storage contracts immediately.
 *
 * @param options Optional path and lock-wait overrides for runtime and tests.
 * @returns Open SQLite database instance, migrated unless `migrate` is false.
 */
export const openPersistenceDatabase = (
  options: PersistenceDatabaseOptions = {}
): StoreDatabase => {
  const dbPath = resolvePersistenceDatabasePath(options)

  const database = withStore("store.open", () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })

    const opened = new Database(dbPath)
    opened.pragma("journal_mode = WAL")
    opened.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`)
    opened.pragma("foreign_keys = ON")
    return opened
  })

  if (options.migrate === false) {
    return database
  }

  try {
    applyMigrations(database)
  } catch (error) {
    database.close()
    throw error
  }

  return database
}

const assertAscending = (migrations: SqlMigration[]): void => {
  for (let index = 1; index < migrations.length; index += 1) {
    const previous = migrations[index - 1]
    const current = migrations[index]
    if (previous && current && previous.id >= current.id) {
      throw new MigrationError(
        current.id,
        `Schema revisions must be strictly ascending: ${previous.id} precedes ${current.id}`
      )
    }
  }
}

/**
 * Brings the store up to `target`, applying each pending revision exactly once and in order.
 * Each revision commits atomically with its bookkeeping row, so a failure leaves the store at
 * the last revision that succeeded.
 *
 * @param database Open SQLite database instance.
 * @param options Target revision and overrides for tests.
 * @returns Ids of the revisions applied by this call, empty when already up to date.
 */
export const applyMigrations = (
  database: StoreDatabase,
  options: ApplyMigrationsOptions = {}
): string[] => {
  const migrations = options.migrations ?? SQL_MIGRATIONS
  const now = options.now ?? Date.now
  const target = options.target

  assertAscending(migrations)

  if (target !== undefined && !migrations.some((migration) => migration.id === target)) {
    throw new MigrationError(target, `Unknown schema revision: ${target}`)
  }

  try {
    database.exec(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at INTEGER NOT NULL
      )`
    )
  } catch (error) {
    throw new MigrationError(null, `Cannot prepare schema_migrations: ${describeError(error)}`, {
      cause: error,
    })
  }

  const hasMigration = database.prepare<[string], { id: string }>(
    "SELECT id FROM schema_migrations WHERE id = ?"
  )
  const insertMigration = database.prepare<[string, number]>(
    "INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)"
  )

  const applied: string[] = []

  for (const migration of migrations) {
    if (target !== undefined && migration.id > target) {
      break
    }

    if (hasMigration.get(migration.id)) {
      continue
    }

    const runMigration = database.transaction(() => {
      for (const statement of migration.statements) {
        database.exec(statement)
      }

      insertMigration.run(migration.id, now())
    })

    try {
      runMigration()
    } catch (error) {
      throw new MigrationError(
        migration.id,
        `Migration ${migration.id} failed: ${describeError(error)}`,
        { cause: error }
      )
    }

    applied.push(migration.id)
  }

  return applied
}

/**
 * Reports the last applied schema revision.
 *
 * @param database Open SQLite database instance.
 * @returns Highest applied revision id, or null for an empty store.
 */
export const getSchemaRevision = (database: StoreDatabase): string | null => {
  return withStore("schema.revision", () => {
    const table = database
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'"
      )
      .get()

    if (!table) {
      return null
    }

    const row = database
      .prepare<[], { id: string }>("SELECT id FROM schema_migrations ORDER BY id DESC LIMIT 1")
      .get()

    return row?.id ?? null
  })
}
