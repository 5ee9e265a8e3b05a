import { describe, expect, it } from "vitest"

import { createMonotonicClock } from "../../src/persistence/index.js"

describe("createMonotonicClock", () => {
  it("never steps backwards when the source does", () => {
    // Arrange
    const readings = [1_000, 900, 1_200, 1_100]
    const clock = createMonotonicClock(() => readings.shift() ?? 0)

    // Act
    const values = [clock(), clock(), clock(), clock()]

    // Assert
    expect(values).toEqual([1_000, 1_000, 1_200, 1_200])
  })
})
