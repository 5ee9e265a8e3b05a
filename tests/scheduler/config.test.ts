import { describe, expect, it } from "vitest"

import { resolveSchedulerConfig } from "../../src/scheduler/config.js"

describe("resolveSchedulerConfig", () => {
  it("uses defaults when the environment is empty", () => {
    expect(resolveSchedulerConfig({})).toEqual({
      enabled: true,
      tickMs: 30_000,
      batchSize: 20,
      catchUpPolicy: "fire_once",
      catchUpGraceMs: 30_000,
      timezone: "UTC",
    })
  })

  it("reads overrides from the environment", () => {
    // Arrange
    const environment = {
      KEEPER_SCHEDULER_ENABLED: "0",
      KEEPER_SCHEDULER_TICK_MS: "5000",
      KEEPER_SCHEDULER_BATCH_SIZE: "3",
      KEEPER_SCHEDULER_CATCH_UP: "skip",
      KEEPER_SCHEDULER_CATCH_UP_GRACE_MS: "0",
      KEEPER_SCHEDULER_TIMEZONE: "Europe/Vienna",
    }

    // Act
    const config = resolveSchedulerConfig(environment)

    // Assert
    expect(config).toEqual({
      enabled: false,
      tickMs: 5_000,
      batchSize: 3,
      catchUpPolicy: "skip",
      catchUpGraceMs: 0,
      timezone: "Europe/Vienna",
    })
  })

  it("rejects a tick below one second", () => {
    expect(() => resolveSchedulerConfig({ KEEPER_SCHEDULER_TICK_MS: "500" })).toThrow(
      "KEEPER_SCHEDULER_TICK_MS must be an integer >= 1000"
    )
  })

  it("defaults the catch-up grace window to one tick", () => {
    expect(resolveSchedulerConfig({ KEEPER_SCHEDULER_TICK_MS: "5000" }).catchUpGraceMs).toBe(5_000)
  })

  it("rejects a negative catch-up grace window", () => {
    expect(() => resolveSchedulerConfig({ KEEPER_SCHEDULER_CATCH_UP_GRACE_MS: "-1" })).toThrow(
      "Invalid scheduler config: KEEPER_SCHEDULER_CATCH_UP_GRACE_MS must be an integer >= 0"
    )
  })

  it("rejects an unknown catch-up policy", () => {
    expect(() => resolveSchedulerConfig({ KEEPER_SCHEDULER_CATCH_UP: "replay_all" })).toThrow(
      "Invalid scheduler config: KEEPER_SCHEDULER_CATCH_UP: must be one of fire_once, skip"
    )
  })

  it("rejects an unknown timezone", () => {
    expect(() => resolveSchedulerConfig({ KEEPER_SCHEDULER_TIMEZONE: "Mars/Olympus" })).toThrow(
      "KEEPER_SCHEDULER_TIMEZONE is not a known timezone (Mars/Olympus)"
    )
  })
})
