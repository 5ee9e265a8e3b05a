import pino from "pino"
import { describe, expect, it, vi } from "vitest"

import { runCommand } from "../../src/cli/runner.js"

describe("runCommand", () => {
  it("dispatches to the selected command handler with its arguments", async () => {
    // Arrange
    const logger = pino({ level: "silent" })
    const migrateHandler = vi.fn(async () => {})
    const serveHandler = vi.fn(async () => {})
    const parsed = { command: "migrate" as const, target: "002_messages" }

    // Act
    await runCommand(parsed, logger, {
      migrate: migrateHandler,
      serve: serveHandler,
    })

    // Assert
    expect(migrateHandler).toHaveBeenCalledWith(logger, parsed)
    expect(serveHandler).not.toHaveBeenCalled()
  })
})
