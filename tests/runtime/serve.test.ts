import { mkdtemp, rm } from "node:fs/promises"
import { existsSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"

import pino from "pino"
import { afterEach, describe, expect, it, vi } from "vitest"

import { runServe } from "../../src/runtime/serve.js"

const TEMP_PREFIX = path.join(tmpdir(), "keeper-serve-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

describe("runServe", () => {
  it("opens the store, runs until shutdown and closes cleanly", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const logger = pino({ level: "silent" })
    const waitForShutdown = vi.fn(async () => "SIGTERM")

    // Act
    await runServe(logger, {
      homeDirectory,
      environment: { KEEPER_SCHEDULER_ENABLED: "0" },
      waitForShutdown,
    })

    // Assert
    expect(waitForShutdown).toHaveBeenCalledOnce()
    expect(existsSync(path.join(homeDirectory, ".config", "keeper", "config.json"))).toBe(true)
    expect(existsSync(path.join(homeDirectory, ".keeper", "data", "keeper-state.db"))).toBe(true)
  })

  it("rejects invalid scheduler configuration before opening the store", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const logger = pino({ level: "silent" })

    // Act
    const result = runServe(logger, {
      homeDirectory,
      environment: { KEEPER_SCHEDULER_TICK_MS: "10" },
      waitForShutdown: async () => "SIGTERM",
    })

    // Assert
    await expect(result).rejects.toThrow("KEEPER_SCHEDULER_TICK_MS must be an integer >= 1000")
    expect(existsSync(path.join(homeDirectory, ".keeper", "data", "keeper-state.db"))).toBe(false)
  })
})
