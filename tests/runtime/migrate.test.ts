import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"

import pino from "pino"
import { afterEach, describe, expect, it } from "vitest"

import { MigrationError } from "../../src/persistence/index.js"
import { runMigrate } from "../../src/runtime/migrate.js"

const TEMP_PREFIX = path.join(tmpdir(), "keeper-migrate-")
const cleanupPaths: string[] = []
const logger = pino({ level: "silent" })

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

describe("runMigrate", () => {
  it("migrates to a target revision and then to the latest", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const environment = { KEEPER_HOME: path.join(homeDirectory, "state") }

    // Act
    const partial = await runMigrate(logger, {
      target: "002_messages",
      homeDirectory,
      environment,
    })
    const full = await runMigrate(logger, { homeDirectory, environment })

    // Assert
    expect(partial).toEqual({
      dbPath: path.join(homeDirectory, "state", "data", "keeper-state.db"),
      applied: ["001_schema_migrations", "002_messages"],
      revision: "002_messages",
    })
    expect(full.applied).toEqual([
      "003_memory_facts",
      "004_tasks",
      "005_tool_calls",
      "006_artifacts",
    ])
    expect(full.revision).toBe("006_artifacts")
  })

  it("uses keeper home from the config file when the environment has none", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    // Act
    const result = await runMigrate(logger, { homeDirectory, environment: {} })

    // Assert
    expect(result.dbPath).toBe(path.join(homeDirectory, ".keeper", "data", "keeper-state.db"))
  })

  it("fails with MigrationError for an unknown target", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    // Act
    const result = runMigrate(logger, { target: "999_missing", homeDirectory, environment: {} })

    // Assert
    await expect(result).rejects.toThrow(MigrationError)
  })
})
