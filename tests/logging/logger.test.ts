import { describe, expect, it } from "vitest"

import { createComponentLogger, createLogger } from "../../src/logging/logger.js"

describe("createLogger", () => {
  it("reads the runtime env from the given environment", () => {
    // Arrange
    const environment = { NODE_ENV: "production" }

    // Act
    const logger = createLogger({ environment })

    // Assert
    expect(logger.level).toBe("info")
  })

  it("prefers an explicit log level", () => {
    expect(createLogger({ environment: { NODE_ENV: "test" }, logLevel: "warn" }).level).toBe("warn")
  })
})

describe("createComponentLogger", () => {
  it("tags records with the component name", () => {
    // Arrange
    const parent = createLogger({ environment: { NODE_ENV: "test" } })

    // Act
    const child = createComponentLogger("scheduler", parent)

    // Assert
    expect(child.bindings()).toMatchObject({ component: "scheduler" })
  })
})
